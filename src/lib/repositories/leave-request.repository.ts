/**
 * Leave Request Repository
 * Read access to the approval workflow's leave requests
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import { AttendanceError, AttendanceErrorCodes } from '../errors';
import type { LeaveRequest, CreateLeaveRequestInput, RequestStatus } from '../../types';
import type { LeaveRequestRow } from '../../types/api';

const REQUEST_STATUSES: readonly RequestStatus[] = ['pending', 'approved', 'rejected'];

/**
 * Read a stored request status, rejecting values outside the closed set
 */
export function parseRequestStatus(value: string): RequestStatus {
  const status = REQUEST_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new AttendanceError(
      AttendanceErrorCodes.INVALID_STATUS,
      `Unknown request status: ${value}`,
      { value }
    );
  }
  return status;
}

function mapRowToLeaveRequest(row: LeaveRequestRow): LeaveRequest {
  return {
    id: row.id,
    employeeId: row.employee_id,
    startDate: row.start_date,
    endDate: row.end_date,
    leaveType: row.leave_type,
    status: parseRequestStatus(row.status),
    reason: row.reason,
  };
}

/**
 * Requests in the given statuses that overlap [startDate, endDate]
 */
export async function listLeaveRequestsInRange(
  employeeId: string,
  startDate: string,
  endDate: string,
  statuses: RequestStatus[] = ['approved', 'pending']
): Promise<LeaveRequest[]> {
  if (statuses.length === 0) return [];
  const rows = await select<LeaveRequestRow>(
    `SELECT * FROM leave_requests
     WHERE employee_id = ? AND start_date <= ? AND end_date >= ?
       AND status IN (${statuses.map(() => '?').join(', ')})
     ORDER BY start_date ASC`,
    [employeeId, endDate, startDate, ...statuses]
  );
  return rows.map(mapRowToLeaveRequest);
}

/**
 * The approved request covering a date, if any
 */
export async function getApprovedLeaveForDate(employeeId: string, date: string): Promise<LeaveRequest | null> {
  const requests = await listLeaveRequestsInRange(employeeId, date, date, ['approved']);
  return requests[0] ?? null;
}

export async function createLeaveRequest(data: CreateLeaveRequestInput): Promise<LeaveRequest> {
  const id = randomUUID();
  await execute(
    `INSERT INTO leave_requests (id, employee_id, start_date, end_date, leave_type, status, reason)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [id, data.employeeId, data.startDate, data.endDate, data.leaveType ?? null, data.status ?? 'pending', data.reason]
  );
  const rows = await select<LeaveRequestRow>('SELECT * FROM leave_requests WHERE id = ?', [id]);
  const row = rows[0];
  if (!row) {
    throw new Error('Failed to create leave request');
  }
  return mapRowToLeaveRequest(row);
}

export const leaveRequestRepository = {
  listLeaveRequestsInRange,
  getApprovedLeaveForDate,
  createLeaveRequest,
};
