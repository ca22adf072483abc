/**
 * Permission Request Repository
 * Read access to short absences granted within a working day
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import { addDays } from '../utils/timezone';
import { parseRequestStatus } from './leave-request.repository';
import type { PermissionRequest, CreatePermissionRequestInput, RequestStatus } from '../../types';
import type { PermissionRequestRow } from '../../types/api';

function mapRowToPermissionRequest(row: PermissionRequestRow): PermissionRequest {
  return {
    id: row.id,
    employeeId: row.employee_id,
    startTime: row.start_time,
    endTime: row.end_time,
    status: parseRequestStatus(row.status),
    reason: row.reason,
  };
}

/**
 * Requests in the given statuses whose time span touches [startDate, endDate]
 */
export async function listPermissionRequestsInRange(
  employeeId: string,
  startDate: string,
  endDate: string,
  statuses: RequestStatus[] = ['approved', 'pending']
): Promise<PermissionRequest[]> {
  if (statuses.length === 0) return [];
  const rows = await select<PermissionRequestRow>(
    `SELECT * FROM permission_requests
     WHERE employee_id = ? AND start_time < ? AND end_time >= ?
       AND status IN (${statuses.map(() => '?').join(', ')})
     ORDER BY start_time ASC`,
    [employeeId, `${addDays(endDate, 1)}T00:00:00`, `${startDate}T00:00:00`, ...statuses]
  );
  return rows.map(mapRowToPermissionRequest);
}

/**
 * The approved request falling on a date, if any
 */
export async function getApprovedPermissionForDate(
  employeeId: string,
  date: string
): Promise<PermissionRequest | null> {
  const requests = await listPermissionRequestsInRange(employeeId, date, date, ['approved']);
  return requests[0] ?? null;
}

export async function createPermissionRequest(data: CreatePermissionRequestInput): Promise<PermissionRequest> {
  const id = randomUUID();
  await execute(
    `INSERT INTO permission_requests (id, employee_id, start_time, end_time, status, reason)
     VALUES (?, ?, ?, ?, ?, ?)`,
    [id, data.employeeId, data.startTime, data.endTime, data.status ?? 'pending', data.reason]
  );
  const rows = await select<PermissionRequestRow>('SELECT * FROM permission_requests WHERE id = ?', [id]);
  const row = rows[0];
  if (!row) {
    throw new Error('Failed to create permission request');
  }
  return mapRowToPermissionRequest(row);
}

export const permissionRequestRepository = {
  listPermissionRequestsInRange,
  getApprovedPermissionForDate,
  createPermissionRequest,
};
