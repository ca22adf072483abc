/**
 * Daily Reconciler
 * Rebuilds the stored attendance record for one (employee, date) from its scans.
 *
 * Each day is written in its own transaction, so a failure for one pair rolls
 * back only that pair; batch callers log it and move on.
 */

import { withTransaction } from '../database';
import { AttendanceError, AttendanceErrorCodes, errorMessage } from '../errors';
import { eachDate, extractLocalDate, normalizeDeviceTimestamp } from '../utils/timezone';
import { processDay } from './rule-engine';
import type { DerivedScanFields } from './rule-engine';
import { getEmployeeById } from '../repositories/employee.repository';
import {
  getScansForEmployeeOnDate,
  insertScan,
  updateDerivedFields,
} from '../repositories/scan-event.repository';
import { upsertDailyRecord } from '../repositories/daily-attendance.repository';
import { getApprovedLeaveForDate } from '../repositories/leave-request.repository';
import { getApprovedPermissionForDate } from '../repositories/permission-request.repository';
import { getAttendanceRules } from '../repositories/settings.repository';
import { recordFailure } from '../repositories/sync-failure.repository';
import type {
  AttendanceRules,
  CreateScanEventInput,
  CreateSyncFailureInput,
  DailyAttendanceRecord,
  Employee,
  EmployeeDate,
  LeaveRequest,
  PermissionRequest,
  ReconcileBatchResult,
  ReconcileOutcome,
  ReconciliationError,
  ScanEvent,
} from '../../types';

export interface DailyReconcilerDeps {
  getEmployee: (id: string) => Promise<Employee | null>;
  getScans: (employeeId: string, date: string) => Promise<ScanEvent[]>;
  getApprovedLeave: (employeeId: string, date: string) => Promise<LeaveRequest | null>;
  getApprovedPermission: (employeeId: string, date: string) => Promise<PermissionRequest | null>;
  getRules: () => Promise<AttendanceRules>;
  /** Persist derived scan fields and the record; must be atomic */
  saveDay: (record: DailyAttendanceRecord, scans: DerivedScanFields[]) => Promise<void>;
  insertScan: (scan: CreateScanEventInput) => Promise<ScanEvent | null>;
  recordFailure: (failure: CreateSyncFailureInput) => Promise<unknown>;
}

export interface ManualScanResult {
  scan: ScanEvent | null;
  duplicate: boolean;
  outcome: ReconcileOutcome;
}

async function saveDayInTransaction(record: DailyAttendanceRecord, scans: DerivedScanFields[]): Promise<void> {
  await withTransaction(async () => {
    await updateDerivedFields(scans);
    await upsertDailyRecord(record);
  });
}

const DEFAULT_DEPS: DailyReconcilerDeps = {
  getEmployee: getEmployeeById,
  getScans: getScansForEmployeeOnDate,
  getApprovedLeave: getApprovedLeaveForDate,
  getApprovedPermission: getApprovedPermissionForDate,
  getRules: getAttendanceRules,
  saveDay: saveDayInTransaction,
  insertScan,
  recordFailure,
};

export class DailyReconciler {
  private deps: DailyReconcilerDeps;

  constructor(deps: Partial<DailyReconcilerDeps> = {}) {
    this.deps = { ...DEFAULT_DEPS, ...deps };
  }

  /**
   * Reconcile one (employee, date).
   * Throws a RECONCILIATION_ERROR if reading or writing fails.
   */
  async reconcileDay(employeeId: string, date: string): Promise<ReconcileOutcome> {
    try {
      const employee = await this.deps.getEmployee(employeeId);
      if (!employee) {
        return { kind: 'not_applicable', reason: 'unknown_employee' };
      }
      if (employee.joiningDate && date < employee.joiningDate) {
        return { kind: 'not_applicable', reason: 'before_joining_date' };
      }

      const scans = await this.deps.getScans(employeeId, date);
      if (scans.length === 0) {
        return { kind: 'no_record' };
      }

      const [leave, permission, rules] = await Promise.all([
        this.deps.getApprovedLeave(employeeId, date),
        this.deps.getApprovedPermission(employeeId, date),
        this.deps.getRules(),
      ]);

      const processed = processDay(employeeId, date, scans, { leave, permission }, rules);
      if (!processed) {
        return { kind: 'no_record' };
      }

      await this.deps.saveDay(processed.record, processed.scans);
      return { kind: 'record', record: processed.record };
    } catch (error) {
      throw new AttendanceError(
        AttendanceErrorCodes.RECONCILIATION_ERROR,
        `Failed to reconcile ${employeeId} on ${date}: ${errorMessage(error)}`,
        { employeeId, date }
      );
    }
  }

  /**
   * Reconcile many pairs. A failing pair is logged, recorded in the failure
   * audit and reported; the rest still run.
   */
  async reconcileMany(pairs: EmployeeDate[]): Promise<ReconcileBatchResult> {
    const result: ReconcileBatchResult = { outcomes: [], errors: [] };

    for (const { employeeId, date } of dedupePairs(pairs)) {
      try {
        const outcome = await this.reconcileDay(employeeId, date);
        result.outcomes.push({ employeeId, date, outcome });
      } catch (error) {
        const failure: ReconciliationError = { employeeId, date, message: errorMessage(error) };
        console.error(`[DailyReconciler] ${failure.message}`);
        result.errors.push(failure);
        await this.recordReconciliationFailure(failure);
      }
    }

    return result;
  }

  /**
   * Reprocess every day of a range for one employee
   */
  async reconcileRange(employeeId: string, startDate: string, endDate: string): Promise<ReconcileBatchResult> {
    const pairs = eachDate(startDate, endDate).map((date) => ({ employeeId, date }));
    console.log(`[DailyReconciler] Reprocessing ${pairs.length} days for ${employeeId}`);
    return this.reconcileMany(pairs);
  }

  /**
   * Add a scan by hand and reconcile its day. A duplicate scan is ignored,
   * and the day is still reconciled.
   */
  async recordManualScan(employeeId: string, timestamp: string, deviceAddress = 'manual'): Promise<ManualScanResult> {
    const normalized = normalizeDeviceTimestamp(timestamp);
    if (!normalized) {
      throw new AttendanceError(AttendanceErrorCodes.INVALID_INPUT, `Invalid scan timestamp: ${timestamp}`, {
        timestamp,
      });
    }

    if (!(await this.deps.getEmployee(employeeId))) {
      throw new AttendanceError(AttendanceErrorCodes.INVALID_INPUT, `Unknown employee: ${employeeId}`, {
        employeeId,
      });
    }

    const scan = await this.deps.insertScan({
      employeeId,
      timestamp: normalized,
      deviceAddress,
      isManual: true,
    });
    if (!scan) {
      console.warn(`[DailyReconciler] Duplicate scan ignored: ${employeeId} at ${normalized}`);
    }

    const outcome = await this.reconcileDay(employeeId, extractLocalDate(normalized));
    return { scan, duplicate: scan === null, outcome };
  }

  private async recordReconciliationFailure(failure: ReconciliationError): Promise<void> {
    try {
      await this.deps.recordFailure({
        errorKind: 'reconciliation_error',
        message: failure.message,
        employeeId: failure.employeeId,
        rawPayload: { date: failure.date },
      });
    } catch (auditError) {
      console.error('[DailyReconciler] Could not record reconciliation failure:', auditError);
    }
  }
}

/**
 * Distinct pairs, in first-seen order
 */
export function dedupePairs(pairs: EmployeeDate[]): EmployeeDate[] {
  const seen = new Set<string>();
  const unique: EmployeeDate[] = [];
  for (const pair of pairs) {
    const key = `${pair.employeeId}|${pair.date}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(pair);
    }
  }
  return unique;
}
