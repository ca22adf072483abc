/**
 * Settings Repository
 *
 * Key-value storage for configuration, values stored as JSON.
 */

import { execute, select } from '../database';
import type { AppSettings, AttendanceRules, SyncSettings } from '../../types';
import type { SettingsRow } from '../../types/api';

// Default attendance rules
export const DEFAULT_ATTENDANCE_RULES: AttendanceRules = {
  checkInWindowStart: '04:00',
  checkOutWindowStart: '14:00',
  standardWorkdayHours: 9,
  presentHours: 9,
  halfDayHours: 4,
  workingDays: [1, 2, 3, 4], // Monday to Thursday
  dayOffDays: [5, 6], // Friday and Saturday
};

// Default device sync settings
export const DEFAULT_SYNC_SETTINGS: SyncSettings = {
  retryAttempts: 3,
  retryDelayMs: 1000,
  connectionTimeoutMs: 5000,
  batchSize: 50,
  overlapDays: 2,
};

// Default app settings
export const DEFAULT_APP_SETTINGS: AppSettings = {
  attendance: DEFAULT_ATTENDANCE_RULES,
  sync: DEFAULT_SYNC_SETTINGS,
};

/**
 * Get a setting value by key
 */
export async function getSetting(key: string): Promise<string | null> {
  const rows = await select<Pick<SettingsRow, 'value'>>(
    'SELECT value FROM settings WHERE key = ?',
    [key]
  );
  return rows[0]?.value ?? null;
}

/**
 * Set a setting value
 */
export async function setSetting(key: string, value: string): Promise<void> {
  await execute(
    `INSERT INTO settings (key, value, updated_at)
     VALUES (?, ?, datetime('now'))
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    [key, value]
  );
}

/**
 * Delete a setting
 */
export async function deleteSetting(key: string): Promise<void> {
  await execute('DELETE FROM settings WHERE key = ?', [key]);
}

/**
 * Get typed setting value
 */
export async function getTypedSetting<T>(key: string, defaultValue: T): Promise<T> {
  const value = await getSetting(key);
  if (value === null) {
    return defaultValue;
  }
  try {
    return JSON.parse(value) as T;
  } catch (error) {
    console.warn(`[settings] Ignoring unreadable value for "${key}":`, error);
    return defaultValue;
  }
}

/**
 * Set typed setting value
 */
export async function setTypedSetting<T>(key: string, value: T): Promise<void> {
  await setSetting(key, JSON.stringify(value));
}

/**
 * Attendance rules; fields missing from the stored value keep their defaults
 */
export async function getAttendanceRules(): Promise<AttendanceRules> {
  const stored = await getTypedSetting<Partial<AttendanceRules>>('attendance', {});
  return { ...DEFAULT_ATTENDANCE_RULES, ...stored };
}

export async function getSyncSettings(): Promise<SyncSettings> {
  const stored = await getTypedSetting<Partial<SyncSettings>>('sync', {});
  return { ...DEFAULT_SYNC_SETTINGS, ...stored };
}

/**
 * Get full app settings
 */
export async function getAppSettings(): Promise<AppSettings> {
  const [attendance, sync] = await Promise.all([getAttendanceRules(), getSyncSettings()]);
  return { attendance, sync };
}

/**
 * Update app settings (partial update)
 */
export async function updateAppSettings(settings: Partial<AppSettings>): Promise<AppSettings> {
  if (settings.attendance !== undefined) {
    await setTypedSetting('attendance', settings.attendance);
  }
  if (settings.sync !== undefined) {
    await setTypedSetting('sync', settings.sync);
  }
  return getAppSettings();
}

// Export repository object for consistency with other repositories
export const settingsRepository = {
  getSetting,
  setSetting,
  deleteSetting,
  getTypedSetting,
  setTypedSetting,
  getAttendanceRules,
  getSyncSettings,
  getAppSettings,
  updateAppSettings,
  DEFAULT_ATTENDANCE_RULES,
  DEFAULT_SYNC_SETTINGS,
  DEFAULT_APP_SETTINGS,
};
