/**
 * Services exports
 */

export { classifyScan } from './scan-classifier';
export type { ClassifierWindows } from './scan-classifier';

export {
  RuleEngine,
  processDay,
  deriveScanFields,
  walkPairs,
  deriveAttendanceStatus,
} from './rule-engine';

export type { ScanInput, DerivedScanFields, DayApprovals, PairWalkResult, ProcessedDay } from './rule-engine';

export { DailyReconciler, dedupePairs } from './daily-reconciler';
export type { DailyReconcilerDeps, ManualScanResult } from './daily-reconciler';

export { resolveDayContext, extraTimeOf, hasAttendance, hoursWorked } from './calendar-context';
export type { DayContextInput } from './calendar-context';

export {
  ReportGenerator,
  calculateSummaryMetrics,
  buildDayContexts,
  leaveBucket,
} from './report-generator';

export type { EmployeeRangeData, ReportDataSource, ReportGeneratorOptions, LeaveBucket } from './report-generator';

export {
  DeviceCommunicationService,
  DeviceErrorCodes,
  createDeviceError,
  deviceAddress,
} from './device-communication';

export type {
  DeviceError,
  DeviceErrorCode,
  DeviceClient,
  DeviceClientFactory,
  DeviceAttendanceRecord,
  DeviceCommunicationOptions,
} from './device-communication';

export { ZKTecoClient } from './zkteco-client';

export { SyncLock } from './sync-lock';

export { SyncEngine, SyncStateMachine, getSyncEngine } from './sync-engine';
export type { SyncEngineDeps, SyncProgressCallback } from './sync-engine';

export { BackgroundSyncRunner } from './background-sync';

export { DatabaseNotificationSink, SYNC_FAILURE_NOTIFICATION } from './notification-sink';
