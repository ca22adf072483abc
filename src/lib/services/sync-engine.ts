/**
 * Sync Engine
 *
 * Pulls attendance records from the active terminal, stores new scans in
 * batches (each batch its own transaction) and reconciles every
 * (employee, date) the pull touched.
 *
 * States: idle -> connecting -> syncing -> committing -> idle, with failed
 * reachable from any state. A new sync may start from idle or failed.
 */

import { withTransaction, yieldToEventLoop } from '../database';
import { AttendanceError, AttendanceErrorCodes, errorMessage, isAttendanceError } from '../errors';
import { addDays, extractLocalDate } from '../utils/timezone';
import { DeviceCommunicationService, deviceAddress } from './device-communication';
import type { DeviceAttendanceRecord } from './device-communication';
import { DailyReconciler } from './daily-reconciler';
import { DatabaseNotificationSink } from './notification-sink';
import { SyncLock } from './sync-lock';
import { getActiveDevice, updateLastSyncAt } from '../repositories/device.repository';
import { getBiometricIdMap, listActiveAdminIds } from '../repositories/employee.repository';
import { getLatestScanTimestamp, insertScans } from '../repositories/scan-event.repository';
import { getSyncSettings } from '../repositories/settings.repository';
import { recordFailure } from '../repositories/sync-failure.repository';
import type {
  ConnectionTestResult,
  CreateScanEventInput,
  CreateSyncFailureInput,
  Device,
  EmployeeDate,
  NotificationSink,
  ReconcileBatchResult,
  SyncEngine as SyncEngineContract,
  SyncFailureKind,
  SyncOptions,
  SyncProgress,
  SyncResult,
  SyncSettings,
  SyncState,
} from '../../types';

export type SyncProgressCallback = (progress: SyncProgress) => void;

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
  idle: ['connecting', 'failed'],
  connecting: ['syncing', 'failed'],
  syncing: ['committing', 'failed'],
  committing: ['idle', 'failed'],
  failed: ['connecting', 'failed'],
};

export class SyncStateMachine {
  private state: SyncState = 'idle';

  get current(): SyncState {
    return this.state;
  }

  /**
   * Move to `next`. Throws SYNC_ERROR for a transition the machine does not allow.
   */
  transition(next: SyncState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new AttendanceError(
        AttendanceErrorCodes.SYNC_ERROR,
        `Illegal sync state transition: ${this.state} -> ${next}`,
        { from: this.state, to: next }
      );
    }
    this.state = next;
  }
}

export interface SyncEngineDeps {
  getActiveDevice: () => Promise<Device | null>;
  getSyncSettings: () => Promise<SyncSettings>;
  getBiometricIdMap: () => Promise<Map<string, string>>;
  getLatestScanTimestamp: (deviceAddress: string) => Promise<string | null>;
  /** Insert one batch atomically */
  insertBatch: (scans: CreateScanEventInput[]) => Promise<{ inserted: number; duplicates: number }>;
  updateLastSyncAt: (deviceId: string, syncedAt: string) => Promise<void>;
  recordFailure: (failure: CreateSyncFailureInput) => Promise<unknown>;
  listAdminIds: () => Promise<string[]>;
  reconcileMany: (pairs: EmployeeDate[]) => Promise<ReconcileBatchResult>;
  notificationSink: NotificationSink;
  devices: DeviceCommunicationService;
}

interface UnmatchedId {
  count: number;
  sample: Record<string, unknown>;
}

interface SyncRun {
  device: Device | null;
  recordsAdded: number;
  errors: string[];
  touched: EmployeeDate[];
  failed: boolean;
  onProgress: SyncProgressCallback | undefined;
}

const reconciler = new DailyReconciler();
// One sync per process, however many engines are built
const processLock = new SyncLock();

const DEFAULT_DEPS: SyncEngineDeps = {
  getActiveDevice,
  getSyncSettings,
  getBiometricIdMap,
  getLatestScanTimestamp,
  insertBatch: (scans) => withTransaction(() => insertScans(scans)),
  updateLastSyncAt,
  recordFailure,
  listAdminIds: listActiveAdminIds,
  reconcileMany: (pairs) => reconciler.reconcileMany(pairs),
  notificationSink: new DatabaseNotificationSink(),
  devices: new DeviceCommunicationService(),
};

function failureKind(error: unknown): SyncFailureKind {
  if (isAttendanceError(error, AttendanceErrorCodes.CONFIG_ERROR)) return 'config_error';
  if (isAttendanceError(error, AttendanceErrorCodes.CONNECTION_ERROR)) return 'connection_error';
  return 'sync_error';
}

/**
 * Sync Engine class
 * Owns the state machine. Engines share the process-wide sync lock unless
 * given their own.
 */
export class SyncEngine implements SyncEngineContract {
  private deps: SyncEngineDeps;
  private lock: SyncLock;
  private machine = new SyncStateMachine();

  constructor(deps: Partial<SyncEngineDeps> = {}, lock: SyncLock = processLock) {
    this.deps = { ...DEFAULT_DEPS, ...deps };
    this.lock = lock;
  }

  isRunning(): boolean {
    return this.lock.isRunning();
  }

  getState(): SyncState {
    return this.machine.current;
  }

  /**
   * Run one sync. Returns `already_running` at once, without touching the
   * database, when another sync holds the lock.
   */
  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    if (!this.lock.tryAcquire()) {
      console.warn('[SyncEngine] Sync already in progress, skipping');
      return { status: 'already_running', recordsAdded: 0, errors: ['Sync already in progress'] };
    }

    const run: SyncRun = {
      device: null,
      recordsAdded: 0,
      errors: [],
      touched: [],
      failed: false,
      onProgress: options.onProgress,
    };

    try {
      try {
        await this.pull(run, options.fullSync ?? false);
      } catch (error) {
        await this.fail(run, error);
      }

      // Batches committed before a failure are reconciled too
      try {
        await this.reconcileTouched(run);
      } catch (error) {
        await this.fail(run, error);
      }

      if (!run.failed) {
        await this.complete(run);
      }

      if (run.errors.length > 0) {
        console.warn(`[SyncEngine] Sync finished with ${run.errors.length} error(s):`, run.errors);
      } else {
        console.log(`[SyncEngine] Sync completed successfully: ${run.recordsAdded} scans added`);
      }

      return {
        status: run.failed ? 'error' : 'success',
        recordsAdded: run.recordsAdded,
        errors: run.errors,
      };
    } finally {
      this.lock.release();
    }
  }

  /**
   * Connect to the active device, read device info and disconnect
   */
  async testConnection(): Promise<ConnectionTestResult> {
    const device = await this.deps.getActiveDevice();
    if (!device) {
      return { success: false, error: 'No active device configured', latency: 0 };
    }
    const settings = await this.deps.getSyncSettings();
    return this.deps.devices.testConnection(device, settings);
  }

  private async pull(run: SyncRun, fullSync: boolean): Promise<void> {
    const device = await this.deps.getActiveDevice();
    if (!device) {
      throw new AttendanceError(AttendanceErrorCodes.CONFIG_ERROR, 'No active device configured');
    }
    run.device = device;
    const settings = await this.deps.getSyncSettings();
    const address = deviceAddress(device);

    this.enter(run, 'connecting', `Connecting to ${address}...`);
    const client = await this.deps.devices.connect(device, settings);

    let records: DeviceAttendanceRecord[];
    try {
      this.enter(run, 'syncing', 'Reading attendance records...');
      records = await client.getAttendanceRecords();
    } finally {
      await this.deps.devices.safeDisconnect(client);
    }

    const fresh = fullSync ? records : await this.sinceLastSync(records, address, settings.overlapDays);
    const scans = await this.matchEmployees(run, fresh, address);

    this.enter(run, 'committing', `Storing ${scans.length} scans...`, scans.length);
    await this.storeInBatches(run, scans, settings.batchSize);
  }

  /**
   * Drop records older than the latest stored scan minus the overlap window
   */
  private async sinceLastSync(
    records: DeviceAttendanceRecord[],
    address: string,
    overlapDays: number
  ): Promise<DeviceAttendanceRecord[]> {
    const latest = await this.deps.getLatestScanTimestamp(address);
    if (!latest) {
      console.log('[SyncEngine] No stored scans for this device, processing all records');
      return records;
    }

    const cutoff = addDays(extractLocalDate(latest), -overlapDays);
    const fresh = records.filter((record) => extractLocalDate(record.timestamp) >= cutoff);
    console.log(`[SyncEngine] Last scan ${latest}, keeping records from ${cutoff}: ${records.length} -> ${fresh.length}`);
    return fresh;
  }

  /**
   * Map device user ids to employees. Each unmatched id is recorded once.
   */
  private async matchEmployees(
    run: SyncRun,
    records: DeviceAttendanceRecord[],
    address: string
  ): Promise<CreateScanEventInput[]> {
    const biometricIds = await this.deps.getBiometricIdMap();
    const scans: CreateScanEventInput[] = [];
    const unmatched = new Map<string, UnmatchedId>();

    for (const record of records) {
      const employeeId = biometricIds.get(record.deviceUserId);
      if (employeeId) {
        scans.push({ employeeId, timestamp: record.timestamp, deviceAddress: address });
        continue;
      }
      const entry = unmatched.get(record.deviceUserId);
      if (entry) {
        entry.count++;
      } else {
        unmatched.set(record.deviceUserId, { count: 1, sample: record.raw });
      }
    }

    if (unmatched.size > 0) {
      console.warn(`[SyncEngine] ${unmatched.size} device user id(s) match no employee: ${Array.from(unmatched.keys()).join(', ')}`);
    }

    for (const [deviceUserId, { count, sample }] of unmatched) {
      try {
        await this.deps.recordFailure({
          errorKind: 'unmatched_employee',
          message: `No employee with biometric id ${deviceUserId} (${count} record${count === 1 ? '' : 's'})`,
          deviceAddress: address,
          rawPayload: { deviceUserId, count, sample },
        });
      } catch (error) {
        const message = `Could not record unmatched id ${deviceUserId}: ${errorMessage(error)}`;
        console.error(`[SyncEngine] ${message}`);
        run.errors.push(message);
      }
    }

    return scans;
  }

  private async storeInBatches(run: SyncRun, scans: CreateScanEventInput[], batchSize: number): Promise<void> {
    const size = Math.max(1, batchSize);
    let duplicates = 0;

    for (let offset = 0; offset < scans.length; offset += size) {
      const batch = scans.slice(offset, offset + size);
      try {
        const result = await this.deps.insertBatch(batch);
        run.recordsAdded += result.inserted;
        duplicates += result.duplicates;
      } catch (error) {
        throw new AttendanceError(
          AttendanceErrorCodes.SYNC_ERROR,
          `Failed to store scans at offset ${offset}: ${errorMessage(error)}`,
          { offset, size: batch.length, sample: batch[0] ?? null }
        );
      }

      for (const scan of batch) {
        run.touched.push({ employeeId: scan.employeeId, date: extractLocalDate(scan.timestamp) });
      }

      const stored = Math.min(offset + size, scans.length);
      this.emit(run, 'committing', stored, scans.length, `Stored ${stored} / ${scans.length} scans`);
      await yieldToEventLoop();
    }

    console.log(`[SyncEngine] Stored ${run.recordsAdded} new scans, ${duplicates} already present`);
  }

  private async reconcileTouched(run: SyncRun): Promise<void> {
    if (run.touched.length === 0) {
      return;
    }
    const result = await this.deps.reconcileMany(run.touched);
    console.log(`[SyncEngine] Reconciled ${result.outcomes.length} days, ${result.errors.length} failed`);
    for (const failure of result.errors) {
      run.errors.push(failure.message);
    }
  }

  private async complete(run: SyncRun): Promise<void> {
    if (run.device) {
      const syncedAt = new Date().toISOString();
      try {
        await this.deps.updateLastSyncAt(run.device.id, syncedAt);
      } catch (error) {
        const message = `Failed to update sync timestamp: ${errorMessage(error)}`;
        console.error(`[SyncEngine] ${message}`);
        run.errors.push(message);
      }
    }
    this.enter(run, 'idle', 'Sync complete');
  }

  /**
   * Mark the run failed, persist the failure and notify administrators
   */
  private async fail(run: SyncRun, error: unknown): Promise<void> {
    const errorKind = failureKind(error);
    const message = errorMessage(error);
    console.error(`[SyncEngine] Sync failed (${errorKind}):`, message);

    run.failed = true;
    run.errors.push(message);
    this.enter(run, 'failed', message);

    const failure: CreateSyncFailureInput = {
      errorKind,
      message,
      deviceAddress: run.device ? deviceAddress(run.device) : null,
      rawPayload: isAttendanceError(error) ? error.details ?? null : null,
    };

    try {
      await this.deps.recordFailure(failure);
    } catch (auditError) {
      const auditMessage = `Could not record sync failure: ${errorMessage(auditError)}`;
      console.error(`[SyncEngine] ${auditMessage}`);
      run.errors.push(auditMessage);
    }

    try {
      const adminIds = await this.deps.listAdminIds();
      await this.deps.notificationSink.notify(adminIds, `Attendance sync failed: ${message}`);
    } catch (notifyError) {
      const notifyMessage = `Could not notify administrators: ${errorMessage(notifyError)}`;
      console.error(`[SyncEngine] ${notifyMessage}`);
      run.errors.push(notifyMessage);
    }
  }

  private enter(run: SyncRun, phase: SyncState, message: string, total = 0): void {
    this.machine.transition(phase);
    this.emit(run, phase, 0, total, message);
  }

  private emit(run: SyncRun, phase: SyncState, current: number, total: number, message: string): void {
    run.onProgress?.({ phase, current, total, message });
  }
}

// Export singleton instance
let syncEngine: SyncEngine | null = null;

export function getSyncEngine(): SyncEngine {
  if (!syncEngine) {
    syncEngine = new SyncEngine();
  }
  return syncEngine;
}
