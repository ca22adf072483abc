/**
 * Sync Failure Repository
 * Append-only audit trail of failed syncs and reconciliations, kept for
 * later manual follow-up. Rows are only ever marked resolved, never deleted.
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import { addDays } from '../utils/timezone';
import type {
  SyncFailureEvent,
  SyncFailureKind,
  CreateSyncFailureInput,
  SyncFailureFilter,
} from '../../types';
import type { SyncFailureRow } from '../../types/api';

const FAILURE_KINDS: readonly SyncFailureKind[] = [
  'config_error',
  'connection_error',
  'unmatched_employee',
  'reconciliation_error',
  'sync_error',
];

function parseFailureKind(value: string): SyncFailureKind {
  return FAILURE_KINDS.find((kind) => kind === value) ?? 'sync_error';
}

function serializePayload(payload: unknown): string | null {
  if (payload === undefined || payload === null) return null;
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload);
  } catch {
    return String(payload);
  }
}

function mapRowToFailure(row: SyncFailureRow): SyncFailureEvent {
  return {
    id: row.id,
    errorKind: parseFailureKind(row.error_kind),
    message: row.message,
    deviceAddress: row.device_address,
    employeeId: row.employee_id,
    rawPayload: row.raw_payload,
    resolved: row.resolved === 1,
    resolutionNote: row.resolution_note,
    createdAt: row.created_at,
  };
}

export async function getFailureById(id: string): Promise<SyncFailureEvent | null> {
  const rows = await select<SyncFailureRow>('SELECT * FROM sync_failures WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToFailure(row) : null;
}

/**
 * Persist a failure
 */
export async function recordFailure(input: CreateSyncFailureInput): Promise<SyncFailureEvent> {
  const id = randomUUID();
  await execute(
    `INSERT INTO sync_failures (id, error_kind, message, device_address, employee_id, raw_payload, resolved, created_at)
     VALUES (?, ?, ?, ?, ?, ?, 0, ?)`,
    [
      id,
      input.errorKind,
      input.message,
      input.deviceAddress ?? null,
      input.employeeId ?? null,
      serializePayload(input.rawPayload),
      new Date().toISOString(),
    ]
  );
  const failure = await getFailureById(id);
  if (!failure) {
    throw new Error('Failed to record sync failure');
  }
  return failure;
}

/**
 * Failures by creation date (inclusive) and resolution status, newest first
 */
export async function listFailures(filter: SyncFailureFilter = {}): Promise<SyncFailureEvent[]> {
  let query = 'SELECT * FROM sync_failures WHERE 1=1';
  const params: unknown[] = [];

  if (filter.from) {
    query += ' AND created_at >= ?';
    params.push(filter.from);
  }
  if (filter.to) {
    query += ' AND created_at < ?';
    params.push(addDays(filter.to, 1));
  }
  if (filter.resolved !== undefined) {
    query += ' AND resolved = ?';
    params.push(filter.resolved ? 1 : 0);
  }

  query += ' ORDER BY created_at DESC, rowid DESC';

  const rows = await select<SyncFailureRow>(query, params);
  return rows.map(mapRowToFailure);
}

/**
 * Mark a failure as handled
 */
export async function resolveFailure(id: string, note: string): Promise<SyncFailureEvent> {
  await execute(
    'UPDATE sync_failures SET resolved = 1, resolution_note = ? WHERE id = ?',
    [note, id]
  );
  const failure = await getFailureById(id);
  if (!failure) {
    throw new Error(`Sync failure not found: ${id}`);
  }
  return failure;
}

export const syncFailureRepository = {
  getFailureById,
  recordFailure,
  listFailures,
  resolveFailure,
};
