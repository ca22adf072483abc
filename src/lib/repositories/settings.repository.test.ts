/**
 * Property-based tests for Settings Repository
 *
 * Stored settings persist and read back; fields that were never stored
 * fall back to their defaults.
 */

import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import * as fc from 'fast-check';
import { initTestDatabase, closeTestDatabase, resetTestDatabase } from '../test-utils';
import {
  DEFAULT_APP_SETTINGS,
  DEFAULT_ATTENDANCE_RULES,
  DEFAULT_SYNC_SETTINGS,
  deleteSetting,
  getAppSettings,
  getAttendanceRules,
  getSetting,
  getSyncSettings,
  getTypedSetting,
  setSetting,
  updateAppSettings,
} from './settings.repository';
import type { AttendanceRules } from '../../types';

// Initialize test database
initTestDatabase();

const timeArb = fc
  .tuple(fc.integer({ min: 0, max: 23 }), fc.integer({ min: 0, max: 59 }))
  .map(([h, m]) => `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`);

const weekdaysArb = fc.uniqueArray(fc.integer({ min: 0, max: 6 }), { maxLength: 7 });

const attendanceRulesArb: fc.Arbitrary<AttendanceRules> = fc.record({
  checkInWindowStart: timeArb,
  checkOutWindowStart: timeArb,
  standardWorkdayHours: fc.integer({ min: 1, max: 12 }),
  presentHours: fc.integer({ min: 1, max: 12 }),
  halfDayHours: fc.integer({ min: 1, max: 6 }),
  workingDays: weekdaysArb,
  dayOffDays: weekdaysArb,
});

describe('Settings Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
    vi.restoreAllMocks();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('returns defaults when nothing is stored', async () => {
    expect(await getAppSettings()).toEqual(DEFAULT_APP_SETTINGS);
  });

  it('persists attendance rules', async () => {
    await fc.assert(
      fc.asyncProperty(attendanceRulesArb, async (rules) => {
        await updateAppSettings({ attendance: rules });
        expect(await getAttendanceRules()).toEqual(rules);
      }),
      { numRuns: 30 }
    );
  });

  it('fills fields missing from a stored value with defaults', async () => {
    await setSetting('sync', JSON.stringify({ batchSize: 10 }));

    expect(await getSyncSettings()).toEqual({ ...DEFAULT_SYNC_SETTINGS, batchSize: 10 });
    expect(await getAttendanceRules()).toEqual(DEFAULT_ATTENDANCE_RULES);
  });

  it('falls back to the default for an unreadable value', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await setSetting('sync', '{not json');

    expect(await getTypedSetting('sync', DEFAULT_SYNC_SETTINGS)).toEqual(DEFAULT_SYNC_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('overwrites and deletes raw values', async () => {
    await setSetting('theme', '"dark"');
    await setSetting('theme', '"light"');
    expect(await getSetting('theme')).toBe('"light"');

    await deleteSetting('theme');
    expect(await getSetting('theme')).toBeNull();
  });
});
