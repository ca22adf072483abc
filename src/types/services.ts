/**
 * Service interface types for the attendance reconciliation core
 */

import type {
  Device,
  DeviceInfo,
  DailyAttendanceRecord,
  PaidHoliday,
  CreateHolidayInput,
  SummaryMetrics,
  EmployeeReportRow,
} from './models';

// ============================================================================
// Sync Engine Types
// ============================================================================

export interface SyncOptions {
  /** Re-read every record on the device instead of only those since the last sync */
  fullSync?: boolean;
  onProgress?: (progress: SyncProgress) => void;
}

export type SyncOutcomeStatus = 'success' | 'error' | 'already_running';

export interface SyncResult {
  status: SyncOutcomeStatus;
  recordsAdded: number;
  errors: string[];
}

export type SyncState = 'idle' | 'connecting' | 'syncing' | 'committing' | 'failed';

export interface ConnectionTestResult {
  success: boolean;
  deviceInfo?: DeviceInfo;
  error?: string;
  latency: number;
}

export interface SyncProgress {
  phase: SyncState;
  current: number;
  total: number;
  message: string;
}

export interface SyncEngine {
  sync(options?: SyncOptions): Promise<SyncResult>;
  isRunning(): boolean;
  getState(): SyncState;
  testConnection(): Promise<ConnectionTestResult>;
}

// ============================================================================
// Reconciler Types
// ============================================================================

export type ReconcileOutcome =
  | { kind: 'record'; record: DailyAttendanceRecord }
  | { kind: 'no_record' }
  | { kind: 'not_applicable'; reason: 'unknown_employee' | 'before_joining_date' };

export interface EmployeeDate {
  employeeId: string;
  date: string;
}

export interface ReconciliationError extends EmployeeDate {
  message: string;
}

export interface ReconcileBatchResult {
  outcomes: Array<EmployeeDate & { outcome: ReconcileOutcome }>;
  errors: ReconciliationError[];
}

// ============================================================================
// Calendar Context Types
// ============================================================================

export type DayContext =
  | { kind: 'not_yet_joined'; date: string }
  | { kind: 'future'; date: string }
  | { kind: 'holiday'; date: string; present: boolean; label: string }
  | { kind: 'day_off'; date: string }
  | { kind: 'day_off_present'; date: string; hoursWorked: number; extraTimeHours: number }
  | { kind: 'leave'; date: string; label: string }
  | { kind: 'permission'; date: string }
  | { kind: 'present'; date: string; hoursWorked: number; extraTimeHours: number }
  | { kind: 'absent'; date: string };

export type DayContextKind = DayContext['kind'];

// ============================================================================
// Report Generator Types
// ============================================================================

export interface ReportGenerator {
  aggregate(employeeId: string, startDate: string, endDate: string): Promise<SummaryMetrics>;
  aggregateMany(employeeIds: string[], startDate: string, endDate: string): Promise<EmployeeReportRow[]>;
  buildCalendar(employeeId: string, startDate: string, endDate: string): Promise<DayContext[]>;
}

// ============================================================================
// Notification Sink Types
// ============================================================================

export interface NotificationSink {
  notify(adminIds: string[], message: string): Promise<void>;
}

// ============================================================================
// Device Repository Types
// ============================================================================

export interface DeviceRepository {
  getDeviceById(id: string): Promise<Device | null>;
  getActiveDevice(): Promise<Device | null>;
  listDevices(): Promise<Device[]>;
  updateLastSyncAt(id: string, syncedAt: string): Promise<void>;
}

// ============================================================================
// Holiday Repository Types
// ============================================================================

export interface HolidayRepository {
  listHolidays(): Promise<PaidHoliday[]>;
  listHolidaysInRange(startDate: string, endDate: string): Promise<PaidHoliday[]>;
  getHolidayForDate(date: string): Promise<PaidHoliday | null>;
  createHoliday(data: CreateHolidayInput): Promise<PaidHoliday>;
  deleteHoliday(id: string): Promise<void>;
}
