/**
 * Calendar Context Resolver
 * Classifies a single calendar day for an employee. Pure: the caller loads
 * the day's record, holiday and approved requests.
 *
 * Precedence, first match wins:
 *   1. before joining date   -> not_yet_joined
 *   2. after today           -> future
 *   3. paid holiday          -> holiday (flagged present if attendance exists)
 *   4. day-off weekday       -> day_off, or day_off_present with extra time
 *   5. any other day         -> leave, permission, present or absent
 */

import { dayOfWeek, minutesBetween } from '../utils/timezone';
import { DEFAULT_ATTENDANCE_RULES } from '../repositories/settings.repository';
import type {
  AttendanceRules,
  DailyAttendanceRecord,
  DayContext,
  LeaveRequest,
  PaidHoliday,
  PermissionRequest,
} from '../../types';

export interface DayContextInput {
  date: string;
  today: string;
  joiningDate: string | null;
  record: DailyAttendanceRecord | null;
  holiday: PaidHoliday | null;
  approvedLeave: LeaveRequest | null;
  approvedPermission: PermissionRequest | null;
}

/**
 * Whether a record shows the employee on site
 */
export function hasAttendance(record: DailyAttendanceRecord | null): record is DailyAttendanceRecord {
  return record !== null && (record.firstCheckIn !== null || record.lastCheckOut !== null);
}

/**
 * Hours credited for a day: first scan to last scan, however the scans paired.
 * An incomplete day is credited a full standard day.
 */
export function hoursWorked(record: DailyAttendanceRecord, rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES): number {
  if (record.isIncompleteDay) {
    return rules.standardWorkdayHours;
  }
  if (record.firstScanAt && record.lastScanAt) {
    return minutesBetween(record.firstScanAt, record.lastScanAt) / 60;
  }
  return record.totalWorkedMinutes / 60;
}

/**
 * Hours over (or under, when negative) the standard day. Zero on incomplete days.
 */
function extraTime(record: DailyAttendanceRecord, rules: AttendanceRules): number {
  if (record.isIncompleteDay) return 0;
  return hoursWorked(record, rules) - rules.standardWorkdayHours;
}

export function resolveDayContext(
  input: DayContextInput,
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): DayContext {
  const { date, record } = input;

  if (input.joiningDate && date < input.joiningDate) {
    return { kind: 'not_yet_joined', date };
  }

  if (date > input.today) {
    return { kind: 'future', date };
  }

  if (input.holiday) {
    const present = hasAttendance(record);
    return {
      kind: 'holiday',
      date,
      present,
      label: present ? `Present - ${input.holiday.description}` : input.holiday.description,
    };
  }

  if (rules.dayOffDays.includes(dayOfWeek(date))) {
    if (!hasAttendance(record)) {
      return { kind: 'day_off', date };
    }
    return {
      kind: 'day_off_present',
      date,
      hoursWorked: hoursWorked(record, rules),
      extraTimeHours: input.approvedPermission ? 0 : extraTime(record, rules),
    };
  }

  if (input.approvedLeave) {
    return { kind: 'leave', date, label: input.approvedLeave.leaveType ?? 'Leave' };
  }

  if (input.approvedPermission) {
    return { kind: 'permission', date };
  }

  if (hasAttendance(record)) {
    return {
      kind: 'present',
      date,
      hoursWorked: hoursWorked(record, rules),
      extraTimeHours: extraTime(record, rules),
    };
  }

  return { kind: 'absent', date };
}

/**
 * Extra time a resolved day contributes to a range total
 */
export function extraTimeOf(context: DayContext): number {
  return context.kind === 'present' || context.kind === 'day_off_present' ? context.extraTimeHours : 0;
}
