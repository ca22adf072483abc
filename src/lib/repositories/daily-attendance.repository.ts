/**
 * Daily Attendance Repository
 * One reconciled record per employee per day
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import { AttendanceError, AttendanceErrorCodes } from '../errors';
import { ATTENDANCE_STATUSES } from '../../types';
import type { AttendanceStatus, DailyAttendanceRecord } from '../../types';
import type { DailyAttendanceRow } from '../../types/api';

/**
 * Read a stored status, rejecting values outside the closed set
 * (legacy rows used free text such as "half-day")
 */
export function parseAttendanceStatus(value: string): AttendanceStatus {
  const status = ATTENDANCE_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new AttendanceError(
      AttendanceErrorCodes.INVALID_STATUS,
      `Unknown attendance status: ${value}`,
      { value }
    );
  }
  return status;
}

/**
 * Map database row to DailyAttendanceRecord model
 */
function mapRowToRecord(row: DailyAttendanceRow): DailyAttendanceRecord {
  return {
    employeeId: row.employee_id,
    date: row.date,
    firstCheckIn: row.first_check_in,
    lastCheckOut: row.last_check_out,
    firstScanAt: row.first_scan_at,
    lastScanAt: row.last_scan_at,
    totalWorkedMinutes: row.total_worked_minutes,
    entryPairCount: row.entry_pair_count,
    status: parseAttendanceStatus(row.status),
    statusReason: row.status_reason,
    isIncompleteDay: row.is_incomplete_day === 1,
  };
}

/**
 * Get the record for an employee on a date
 */
export async function getDailyRecord(employeeId: string, date: string): Promise<DailyAttendanceRecord | null> {
  const rows = await select<DailyAttendanceRow>(
    'SELECT * FROM daily_attendance WHERE employee_id = ? AND date = ?',
    [employeeId, date]
  );
  const row = rows[0];
  return row ? mapRowToRecord(row) : null;
}

/**
 * Records for an employee between two dates (inclusive), by date
 */
export async function listDailyRecords(
  employeeId: string,
  startDate: string,
  endDate: string
): Promise<DailyAttendanceRecord[]> {
  const rows = await select<DailyAttendanceRow>(
    `SELECT * FROM daily_attendance
     WHERE employee_id = ? AND date >= ? AND date <= ?
     ORDER BY date ASC`,
    [employeeId, startDate, endDate]
  );
  return rows.map(mapRowToRecord);
}

/**
 * Insert or replace the record for (employee_id, date)
 */
export async function upsertDailyRecord(record: DailyAttendanceRecord): Promise<void> {
  const timestamp = new Date().toISOString();
  await execute(
    `INSERT INTO daily_attendance
     (id, employee_id, date, first_check_in, last_check_out, first_scan_at, last_scan_at,
      total_worked_minutes, entry_pair_count, status, status_reason, is_incomplete_day, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(employee_id, date) DO UPDATE SET
       first_check_in = excluded.first_check_in,
       last_check_out = excluded.last_check_out,
       first_scan_at = excluded.first_scan_at,
       last_scan_at = excluded.last_scan_at,
       total_worked_minutes = excluded.total_worked_minutes,
       entry_pair_count = excluded.entry_pair_count,
       status = excluded.status,
       status_reason = excluded.status_reason,
       is_incomplete_day = excluded.is_incomplete_day,
       updated_at = excluded.updated_at`,
    [
      randomUUID(),
      record.employeeId,
      record.date,
      record.firstCheckIn,
      record.lastCheckOut,
      record.firstScanAt,
      record.lastScanAt,
      record.totalWorkedMinutes,
      record.entryPairCount,
      record.status,
      record.statusReason,
      record.isIncompleteDay ? 1 : 0,
      timestamp,
      timestamp,
    ]
  );
}

export const dailyAttendanceRepository = {
  getDailyRecord,
  listDailyRecords,
  upsertDailyRecord,
};
