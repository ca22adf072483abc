/**
 * Type exports for the attendance reconciliation core
 */

export { ATTENDANCE_STATUSES } from './models';

// Data models
export type {
  Device,
  DeviceConfig,
  DeviceInfo,
  Employee,
  EmployeeStatus,
  EmployeeRole,
  CreateEmployeeInput,
  EmployeeFilter,
  ScanDirection,
  ScanEvent,
  CreateScanEventInput,
  AttendanceStatus,
  DailyAttendanceRecord,
  RequestStatus,
  LeaveRequest,
  CreateLeaveRequestInput,
  PermissionRequest,
  CreatePermissionRequestInput,
  HolidayType,
  PaidHoliday,
  CreateHolidayInput,
  SyncFailureKind,
  SyncFailureEvent,
  CreateSyncFailureInput,
  SyncFailureFilter,
  Notification,
  SummaryMetrics,
  EmployeeReportRow,
  AttendanceRules,
  SyncSettings,
  AppSettings,
} from './models';

// Service types
export type {
  SyncOptions,
  SyncOutcomeStatus,
  SyncResult,
  SyncState,
  ConnectionTestResult,
  SyncProgress,
  SyncEngine,
  ReconcileOutcome,
  EmployeeDate,
  ReconciliationError,
  ReconcileBatchResult,
  DayContext,
  DayContextKind,
  ReportGenerator,
  NotificationSink,
  DeviceRepository,
  HolidayRepository,
} from './services';
