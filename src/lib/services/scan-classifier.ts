/**
 * Scan Classifier
 * Infers whether a scan is a check-in or a check-out from its time of day.
 * Terminals do not record a reliable direction, so time is the only signal.
 */

import { minutesOfDay, parseTimeToMinutes } from '../utils/timezone';
import { DEFAULT_ATTENDANCE_RULES } from '../repositories/settings.repository';
import type { AttendanceRules, ScanDirection } from '../../types';

export type ClassifierWindows = Pick<AttendanceRules, 'checkInWindowStart' | 'checkOutWindowStart'>;

/**
 * Classify a wall-clock timestamp.
 *
 * Scans from `checkInWindowStart` up to (not including) `checkOutWindowStart`
 * are check-ins; everything else, including the small hours after midnight,
 * is a check-out. With the defaults: 04:00–13:59 in, 14:00–03:59 out.
 */
export function classifyScan(
  timestamp: string,
  windows: ClassifierWindows = DEFAULT_ATTENDANCE_RULES
): ScanDirection {
  const minutes = minutesOfDay(timestamp);
  const inStart = parseTimeToMinutes(windows.checkInWindowStart);
  const outStart = parseTimeToMinutes(windows.checkOutWindowStart);

  const isCheckIn = inStart <= outStart
    ? minutes >= inStart && minutes < outStart
    : minutes >= inStart || minutes < outStart;

  return isCheckIn ? 'check_in' : 'check_out';
}
