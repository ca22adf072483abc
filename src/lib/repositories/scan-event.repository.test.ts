/**
 * Tests for Scan Event Repository
 * Uniqueness on (employee_id, timestamp) and per-day reads
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { initTestDatabase, closeTestDatabase, resetTestDatabase, countRows, seedEmployee } from '../test-utils';
import {
  getLatestScanTimestamp,
  getScanEventById,
  getScansForEmployeeOnDate,
  insertScan,
  insertScans,
  updateDerivedFields,
} from './scan-event.repository';

// Initialize test database
initTestDatabase();

const DEVICE = '192.168.1.201:4370';

describe('Scan Event Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('never stores two scans with the same employee and timestamp', async () => {
    const minuteArb = fc.integer({ min: 0, max: 59 });

    await fc.assert(
      fc.asyncProperty(fc.array(minuteArb, { minLength: 1, maxLength: 120 }), async (minutes) => {
        resetTestDatabase();
        const employee = await seedEmployee();
        const scans = minutes.map((minute) => ({
          employeeId: employee.id,
          timestamp: `2024-03-04T09:${String(minute).padStart(2, '0')}:00`,
          deviceAddress: DEVICE,
        }));

        const result = await insertScans(scans);

        const distinct = new Set(minutes).size;
        expect(result.inserted).toBe(distinct);
        expect(result.duplicates).toBe(minutes.length - distinct);
        expect(countRows('scan_events')).toBe(distinct);
      }),
      { numRuns: 25 }
    );
  });

  it('returns null when a single scan is a duplicate', async () => {
    const employee = await seedEmployee();
    const scan = { employeeId: employee.id, timestamp: '2024-03-04T09:00:00', deviceAddress: 'manual', isManual: true };

    const first = await insertScan(scan);
    const second = await insertScan(scan);

    expect(first?.isManual).toBe(true);
    expect(first?.direction).toBeNull();
    expect(second).toBeNull();
  });

  it('reads one day of scans in time order', async () => {
    const employee = await seedEmployee();
    await insertScans([
      { employeeId: employee.id, timestamp: '2024-03-04T18:00:00', deviceAddress: DEVICE },
      { employeeId: employee.id, timestamp: '2024-03-05T00:00:00', deviceAddress: DEVICE },
      { employeeId: employee.id, timestamp: '2024-03-04T08:00:00', deviceAddress: DEVICE },
      { employeeId: employee.id, timestamp: '2024-03-03T23:59:59', deviceAddress: DEVICE },
    ]);

    const scans = await getScansForEmployeeOnDate(employee.id, '2024-03-04');

    expect(scans.map((scan) => scan.timestamp)).toEqual(['2024-03-04T08:00:00', '2024-03-04T18:00:00']);
  });

  it('updates derived fields', async () => {
    const employee = await seedEmployee();
    const scan = await insertScan({ employeeId: employee.id, timestamp: '2024-03-04T15:00:00', deviceAddress: DEVICE });
    if (!scan) throw new Error('scan was not inserted');

    await updateDerivedFields([{ id: scan.id, direction: 'check_out', sequenceIndex: 3, isExtraScan: true }]);

    const updated = await getScanEventById(scan.id);
    expect(updated?.direction).toBe('check_out');
    expect(updated?.sequenceIndex).toBe(3);
    expect(updated?.isExtraScan).toBe(true);
  });

  it('finds the newest scan per device', async () => {
    const employee = await seedEmployee();
    expect(await getLatestScanTimestamp(DEVICE)).toBeNull();

    await insertScans([
      { employeeId: employee.id, timestamp: '2024-03-04T09:00:00', deviceAddress: DEVICE },
      { employeeId: employee.id, timestamp: '2024-03-06T09:00:00', deviceAddress: DEVICE },
      { employeeId: employee.id, timestamp: '2024-03-09T09:00:00', deviceAddress: 'manual' },
    ]);

    expect(await getLatestScanTimestamp(DEVICE)).toBe('2024-03-06T09:00:00');
  });
});
