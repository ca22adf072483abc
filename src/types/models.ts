/**
 * Data model types for the attendance reconciliation core
 */

// ============================================================================
// Device Types
// ============================================================================

export interface Device {
  id: string;
  name: string;
  ip: string;
  port: number;
  commKey: string;
  isActive: boolean;
  lastSyncAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface DeviceConfig {
  id: string;
  name: string;
  ip: string;
  port: number;
  commKey: string;
}

export interface DeviceInfo {
  serialNumber: string;
  firmwareVersion: string;
  userCount: number;
  logCount: number;
  lastActivity: string;
}

// ============================================================================
// Employee Types
// ============================================================================

export type EmployeeStatus = 'active' | 'inactive';

export type EmployeeRole = 'employee' | 'manager' | 'admin';

export interface Employee {
  id: string;
  displayName: string;
  biometricId: string | null;
  joiningDate: string | null;
  status: EmployeeStatus;
  role: EmployeeRole;
  createdAt: string;
  updatedAt: string;
}

export interface CreateEmployeeInput {
  displayName: string;
  biometricId?: string;
  joiningDate?: string;
  status?: EmployeeStatus;
  role?: EmployeeRole;
}

export interface EmployeeFilter {
  status?: EmployeeStatus | 'all';
  role?: EmployeeRole;
  linkedOnly?: boolean;
}

// ============================================================================
// Scan / Attendance Types
// ============================================================================

export type ScanDirection = 'check_in' | 'check_out';

/** One biometric terminal reading, attributed to an employee. */
export interface ScanEvent {
  id: string;
  employeeId: string;
  /** Device wall-clock time, `YYYY-MM-DDTHH:mm:ss` */
  timestamp: string;
  direction: ScanDirection | null;
  deviceAddress: string;
  isManual: boolean;
  sequenceIndex: number | null;
  isExtraScan: boolean;
  createdAt: string;
}

export interface CreateScanEventInput {
  employeeId: string;
  timestamp: string;
  deviceAddress: string;
  isManual?: boolean;
}

export const ATTENDANCE_STATUSES = [
  'present',
  'half_day',
  'partial',
  'in_office',
  'leave',
  'permission',
  'absent',
] as const;

export type AttendanceStatus = typeof ATTENDANCE_STATUSES[number];

export interface DailyAttendanceRecord {
  employeeId: string;
  date: string;
  firstCheckIn: string | null;
  lastCheckOut: string | null;
  /** Earliest and latest scan of the day, whatever their direction */
  firstScanAt: string | null;
  lastScanAt: string | null;
  totalWorkedMinutes: number;
  entryPairCount: number;
  status: AttendanceStatus;
  statusReason: string | null;
  isIncompleteDay: boolean;
}

// ============================================================================
// Approval Workflow Types (read-only for this core)
// ============================================================================

export type RequestStatus = 'pending' | 'approved' | 'rejected';

export interface LeaveRequest {
  id: string;
  employeeId: string;
  startDate: string;
  endDate: string;
  leaveType: string | null;
  status: RequestStatus;
  reason: string;
}

export interface CreateLeaveRequestInput {
  employeeId: string;
  startDate: string;
  endDate: string;
  leaveType?: string;
  status?: RequestStatus;
  reason: string;
}

export interface PermissionRequest {
  id: string;
  employeeId: string;
  startTime: string;
  endTime: string;
  status: RequestStatus;
  reason: string;
}

export interface CreatePermissionRequestInput {
  employeeId: string;
  startTime: string;
  endTime: string;
  status?: RequestStatus;
  reason: string;
}

export type HolidayType = 'day' | 'range';

export interface PaidHoliday {
  id: string;
  holidayType: HolidayType;
  startDate: string;
  endDate: string | null;
  description: string;
  createdAt: string;
}

export interface CreateHolidayInput {
  holidayType?: HolidayType;
  startDate: string;
  endDate?: string;
  description: string;
}

// ============================================================================
// Sync Failure Audit Types
// ============================================================================

export type SyncFailureKind =
  | 'config_error'
  | 'connection_error'
  | 'unmatched_employee'
  | 'reconciliation_error'
  | 'sync_error';

export interface SyncFailureEvent {
  id: string;
  errorKind: SyncFailureKind;
  message: string;
  deviceAddress: string | null;
  employeeId: string | null;
  rawPayload: string | null;
  resolved: boolean;
  resolutionNote: string | null;
  createdAt: string;
}

export interface CreateSyncFailureInput {
  errorKind: SyncFailureKind;
  message: string;
  deviceAddress?: string | null;
  employeeId?: string | null;
  rawPayload?: unknown;
}

export interface SyncFailureFilter {
  from?: string;
  to?: string;
  resolved?: boolean;
}

// ============================================================================
// Notification Types
// ============================================================================

export interface Notification {
  id: string;
  employeeId: string;
  message: string;
  notificationType: string;
  status: 'unread' | 'read';
  createdAt: string;
}

// ============================================================================
// Report Types
// ============================================================================

export interface SummaryMetrics {
  totalDays: number;
  totalWorkingDays: number;
  presentDays: number;
  absentDays: number;
  annualLeaveDays: number;
  unpaidLeaveDays: number;
  paidLeaveDays: number;
  permissionHours: number;
  dayOffDays: number;
  incompleteDays: number;
  attendancePercentage: number;
  extraTimeHours: number;
}

export interface EmployeeReportRow {
  employeeId: string;
  metrics: SummaryMetrics | null;
  /** Set when aggregation failed for this employee; surfaces render it as a banner */
  error: string | null;
}

// ============================================================================
// Settings Types
// ============================================================================

export interface AttendanceRules {
  /** Scans from this time until checkOutWindowStart are check-ins (HH:mm) */
  checkInWindowStart: string;
  /** Scans from this time until checkInWindowStart (wrapping midnight) are check-outs */
  checkOutWindowStart: string;
  standardWorkdayHours: number;
  presentHours: number;
  halfDayHours: number;
  /** 0=Sunday, 1=Monday, etc. */
  workingDays: number[];
  dayOffDays: number[];
}

export interface SyncSettings {
  retryAttempts: number;
  retryDelayMs: number;
  connectionTimeoutMs: number;
  batchSize: number;
  /** Days re-read before the newest stored scan on incremental syncs */
  overlapDays: number;
}

export interface AppSettings {
  attendance: AttendanceRules;
  sync: SyncSettings;
}
