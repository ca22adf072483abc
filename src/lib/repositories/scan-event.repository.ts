/**
 * Scan Event Repository
 * Storage for raw biometric scans attributed to employees
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import { addDays } from '../utils/timezone';
import type { ScanEvent, ScanDirection, CreateScanEventInput } from '../../types';
import type { ScanEventRow } from '../../types/api';

// Multi-row INSERT: 50 rows × 7 columns = 350 params (within SQLite's 999 limit)
const ROWS_PER_INSERT = 50;

/**
 * Generate a unique ID for new scans
 */
function generateId(): string {
  return randomUUID();
}

/**
 * Get current ISO timestamp
 */
function now(): string {
  return new Date().toISOString();
}

function parseDirection(value: string | null): ScanDirection | null {
  if (value === 'check_in' || value === 'check_out') {
    return value;
  }
  return null;
}

/**
 * Map database row to ScanEvent model
 */
function mapRowToScanEvent(row: ScanEventRow): ScanEvent {
  return {
    id: row.id,
    employeeId: row.employee_id,
    timestamp: row.timestamp,
    direction: parseDirection(row.direction),
    deviceAddress: row.device_address,
    isManual: row.is_manual === 1,
    sequenceIndex: row.sequence_index,
    isExtraScan: row.is_extra_scan === 1,
    createdAt: row.created_at,
  };
}

/**
 * Get a scan by ID
 */
export async function getScanEventById(id: string): Promise<ScanEvent | null> {
  const rows = await select<ScanEventRow>('SELECT * FROM scan_events WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToScanEvent(row) : null;
}

/**
 * Scans for one employee on one calendar day, oldest first
 */
export async function getScansForEmployeeOnDate(employeeId: string, date: string): Promise<ScanEvent[]> {
  const rows = await select<ScanEventRow>(
    `SELECT * FROM scan_events
     WHERE employee_id = ? AND timestamp >= ? AND timestamp < ?
     ORDER BY timestamp ASC`,
    [employeeId, `${date}T00:00:00`, `${addDays(date, 1)}T00:00:00`]
  );
  return rows.map(mapRowToScanEvent);
}

/**
 * Insert scans, skipping any whose (employee_id, timestamp) already exists.
 * Runs in the caller's transaction, if any.
 */
export async function insertScans(
  scans: CreateScanEventInput[]
): Promise<{ inserted: number; duplicates: number }> {
  let inserted = 0;
  let duplicates = 0;

  for (let i = 0; i < scans.length; i += ROWS_PER_INSERT) {
    const chunk = scans.slice(i, i + ROWS_PER_INSERT);
    const placeholders: string[] = [];
    const params: unknown[] = [];

    for (const scan of chunk) {
      placeholders.push('(?, ?, ?, ?, ?, 0, ?)');
      params.push(
        generateId(),
        scan.employeeId,
        scan.timestamp,
        scan.deviceAddress,
        scan.isManual ? 1 : 0,
        now(),
      );
    }

    const result = await execute(
      `INSERT OR IGNORE INTO scan_events
       (id, employee_id, timestamp, device_address, is_manual, is_extra_scan, created_at)
       VALUES ${placeholders.join(', ')}`,
      params
    );

    inserted += result.rowsAffected;
    duplicates += chunk.length - result.rowsAffected;
  }

  return { inserted, duplicates };
}

/**
 * Insert a single scan. Returns null when the scan is a duplicate.
 */
export async function insertScan(scan: CreateScanEventInput): Promise<ScanEvent | null> {
  const id = generateId();
  const result = await execute(
    `INSERT OR IGNORE INTO scan_events
     (id, employee_id, timestamp, device_address, is_manual, is_extra_scan, created_at)
     VALUES (?, ?, ?, ?, ?, 0, ?)`,
    [id, scan.employeeId, scan.timestamp, scan.deviceAddress, scan.isManual ? 1 : 0, now()]
  );
  if (result.rowsAffected === 0) {
    return null;
  }
  return getScanEventById(id);
}

/**
 * Persist the fields the reconciler derives for each scan
 */
export async function updateDerivedFields(
  updates: Array<{ id: string; direction: ScanDirection; sequenceIndex: number; isExtraScan: boolean }>
): Promise<void> {
  for (const update of updates) {
    await execute(
      `UPDATE scan_events SET direction = ?, sequence_index = ?, is_extra_scan = ? WHERE id = ?`,
      [update.direction, update.sequenceIndex, update.isExtraScan ? 1 : 0, update.id]
    );
  }
}

/**
 * Newest scan timestamp stored from a device, or null if it has none
 */
export async function getLatestScanTimestamp(deviceAddress: string): Promise<string | null> {
  const rows = await select<{ latest: string | null }>(
    'SELECT MAX(timestamp) AS latest FROM scan_events WHERE device_address = ?',
    [deviceAddress]
  );
  return rows[0]?.latest ?? null;
}

export const scanEventRepository = {
  getScanEventById,
  getScansForEmployeeOnDate,
  insertScans,
  insertScan,
  updateDerivedFields,
  getLatestScanTimestamp,
};
