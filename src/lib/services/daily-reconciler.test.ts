/**
 * Tests for the Daily Reconciler against an in-memory database
 */

import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  testSelect,
  countRows,
  seedEmployee,
  seedScans,
} from '../test-utils';
import { withTransaction } from '../database';
import { DailyReconciler, dedupePairs } from './daily-reconciler';
import { getDailyRecord, upsertDailyRecord } from '../repositories/daily-attendance.repository';
import { createLeaveRequest } from '../repositories/leave-request.repository';
import { listFailures } from '../repositories/sync-failure.repository';
import { getScansForEmployeeOnDate } from '../repositories/scan-event.repository';
import { isAttendanceError } from '../errors';

initTestDatabase();

const DATE = '2024-03-04';

describe('DailyReconciler', () => {
  beforeEach(() => {
    resetTestDatabase();
    vi.restoreAllMocks();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('stores the reconciled record and derived scan fields', async () => {
    const employee = await seedEmployee();
    await seedScans(employee.id, DATE, ['09:00', '12:00', '19:00']);

    const outcome = await new DailyReconciler().reconcileDay(employee.id, DATE);

    expect(outcome.kind).toBe('record');
    const stored = await getDailyRecord(employee.id, DATE);
    expect(stored).toEqual({
      employeeId: employee.id,
      date: DATE,
      firstCheckIn: `${DATE}T09:00:00`,
      lastCheckOut: `${DATE}T19:00:00`,
      firstScanAt: `${DATE}T09:00:00`,
      lastScanAt: `${DATE}T19:00:00`,
      totalWorkedMinutes: 600,
      entryPairCount: 1,
      status: 'present',
      statusReason: 'Present (10.0 hours worked)',
      isIncompleteDay: false,
    });

    const scans = testSelect<{ direction: string; sequence_index: number; is_extra_scan: number }>(
      'SELECT direction, sequence_index, is_extra_scan FROM scan_events ORDER BY timestamp'
    );
    expect(scans).toEqual([
      { direction: 'check_in', sequence_index: 1, is_extra_scan: 0 },
      { direction: 'check_in', sequence_index: 2, is_extra_scan: 0 },
      { direction: 'check_out', sequence_index: 3, is_extra_scan: 1 },
    ]);
  });

  it('returns no_record and writes nothing when there are no scans', async () => {
    const employee = await seedEmployee();

    const outcome = await new DailyReconciler().reconcileDay(employee.id, DATE);

    expect(outcome).toEqual({ kind: 'no_record' });
    expect(countRows('daily_attendance')).toBe(0);
  });

  it('does not apply before the joining date or to unknown employees', async () => {
    const employee = await seedEmployee({ joiningDate: '2024-03-05' });
    await seedScans(employee.id, DATE, ['09:00', '18:00']);
    const reconciler = new DailyReconciler();

    expect(await reconciler.reconcileDay(employee.id, DATE)).toEqual({
      kind: 'not_applicable',
      reason: 'before_joining_date',
    });
    expect(await reconciler.reconcileDay('missing', DATE)).toEqual({
      kind: 'not_applicable',
      reason: 'unknown_employee',
    });
    expect(countRows('daily_attendance')).toBe(0);
  });

  it('is idempotent', async () => {
    const employee = await seedEmployee();
    await seedScans(employee.id, DATE, ['08:30', '17:45']);
    const reconciler = new DailyReconciler();

    const first = await reconciler.reconcileDay(employee.id, DATE);
    const firstStored = await getDailyRecord(employee.id, DATE);
    const second = await reconciler.reconcileDay(employee.id, DATE);
    const secondStored = await getDailyRecord(employee.id, DATE);

    expect(second).toEqual(first);
    expect(secondStored).toEqual(firstStored);
    expect(countRows('daily_attendance')).toBe(1);
  });

  it('marks the day as leave when approved leave covers it', async () => {
    const employee = await seedEmployee();
    await seedScans(employee.id, DATE, ['09:00', '19:00']);
    await createLeaveRequest({
      employeeId: employee.id,
      startDate: DATE,
      endDate: DATE,
      leaveType: 'sick',
      status: 'approved',
      reason: 'Flu',
    });

    await new DailyReconciler().reconcileDay(employee.id, DATE);

    const stored = await getDailyRecord(employee.id, DATE);
    expect(stored?.status).toBe('leave');
    expect(stored?.statusReason).toBe('Approved leave: sick');
  });

  it('rolls back a failed write', async () => {
    const employee = await seedEmployee();
    await seedScans(employee.id, DATE, ['09:00', '19:00']);
    const reconciler = new DailyReconciler({
      saveDay: (record) =>
        withTransaction(async () => {
          await upsertDailyRecord(record);
          throw new Error('disk full');
        }),
    });

    const error = await reconciler.reconcileDay(employee.id, DATE).catch((caught: unknown) => caught);
    expect(isAttendanceError(error, 'RECONCILIATION_ERROR')).toBe(true);
    expect(await getDailyRecord(employee.id, DATE)).toBeNull();
  });

  it('isolates a failing pair and records it', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const good = await seedEmployee({ displayName: 'Good' });
    const bad = await seedEmployee({ displayName: 'Bad' });
    await seedScans(good.id, DATE, ['09:00', '19:00']);
    await seedScans(bad.id, DATE, ['09:00', '19:00']);

    const reconciler = new DailyReconciler({
      getScans: async (employeeId, date) => {
        if (employeeId === bad.id) {
          throw new Error('corrupt row');
        }
        return getScansForEmployeeOnDate(employeeId, date);
      },
    });

    const result = await reconciler.reconcileMany([
      { employeeId: bad.id, date: DATE },
      { employeeId: good.id, date: DATE },
    ]);

    expect(result.outcomes).toHaveLength(1);
    expect(result.outcomes[0]?.employeeId).toBe(good.id);
    expect(result.errors).toEqual([
      {
        employeeId: bad.id,
        date: DATE,
        message: `Failed to reconcile ${bad.id} on ${DATE}: corrupt row`,
      },
    ]);
    expect(await getDailyRecord(good.id, DATE)).not.toBeNull();
    expect(await getDailyRecord(bad.id, DATE)).toBeNull();

    const failures = await listFailures();
    expect(failures).toHaveLength(1);
    expect(failures[0]?.errorKind).toBe('reconciliation_error');
    expect(failures[0]?.employeeId).toBe(bad.id);
    expect(failures[0]?.rawPayload).toBe(JSON.stringify({ date: DATE }));
  });

  it('reprocesses every day of a range', async () => {
    const employee = await seedEmployee();
    await seedScans(employee.id, '2024-03-05', ['09:00', '18:00']);

    const result = await new DailyReconciler().reconcileRange(employee.id, '2024-03-04', '2024-03-06');

    expect(result.outcomes.map((entry) => entry.outcome.kind)).toEqual(['no_record', 'record', 'no_record']);
    expect(result.errors).toEqual([]);
  });

  describe('recordManualScan', () => {
    it('inserts a manual scan and reconciles its day', async () => {
      const employee = await seedEmployee();

      const result = await new DailyReconciler().recordManualScan(employee.id, `${DATE}T09:00:00`);

      expect(result.duplicate).toBe(false);
      expect(result.scan?.isManual).toBe(true);
      expect(result.scan?.deviceAddress).toBe('manual');
      expect(result.outcome.kind).toBe('record');
      expect((await getDailyRecord(employee.id, DATE))?.status).toBe('in_office');
    });

    it('ignores a duplicate scan', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const employee = await seedEmployee();
      const reconciler = new DailyReconciler();

      await reconciler.recordManualScan(employee.id, `${DATE}T09:00:00`);
      const again = await reconciler.recordManualScan(employee.id, `${DATE}T09:00:00`);

      expect(again.duplicate).toBe(true);
      expect(again.scan).toBeNull();
      expect(countRows('scan_events')).toBe(1);
    });

    it('rejects an unreadable timestamp', async () => {
      const employee = await seedEmployee();

      const error = await new DailyReconciler()
        .recordManualScan(employee.id, 'yesterday morning')
        .catch((caught: unknown) => caught);
      expect(isAttendanceError(error, 'INVALID_INPUT')).toBe(true);
    });
  });
});

describe('dedupePairs', () => {
  it('keeps the first occurrence of each pair', () => {
    expect(
      dedupePairs([
        { employeeId: 'a', date: DATE },
        { employeeId: 'b', date: DATE },
        { employeeId: 'a', date: DATE },
      ])
    ).toEqual([
      { employeeId: 'a', date: DATE },
      { employeeId: 'b', date: DATE },
    ]);
  });
});
