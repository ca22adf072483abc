/**
 * Database row types (SQLite column layout) for the attendance core
 */

export interface DeviceRow {
  id: string;
  name: string;
  ip: string;
  port: number;
  comm_key: string;
  is_active: number;
  last_sync_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface EmployeeRow {
  id: string;
  display_name: string;
  biometric_id: string | null;
  joining_date: string | null;
  status: string;
  role: string;
  created_at: string;
  updated_at: string;
}

export interface ScanEventRow {
  id: string;
  employee_id: string;
  timestamp: string;
  direction: string | null;
  device_address: string;
  is_manual: number;
  sequence_index: number | null;
  is_extra_scan: number;
  created_at: string;
}

export interface DailyAttendanceRow {
  id: string;
  employee_id: string;
  date: string;
  first_check_in: string | null;
  last_check_out: string | null;
  first_scan_at: string | null;
  last_scan_at: string | null;
  total_worked_minutes: number;
  entry_pair_count: number;
  status: string;
  status_reason: string | null;
  is_incomplete_day: number;
  created_at: string;
  updated_at: string;
}

export interface LeaveRequestRow {
  id: string;
  employee_id: string;
  start_date: string;
  end_date: string;
  leave_type: string | null;
  status: string;
  reason: string;
}

export interface PermissionRequestRow {
  id: string;
  employee_id: string;
  start_time: string;
  end_time: string;
  status: string;
  reason: string;
}

export interface PaidHolidayRow {
  id: string;
  holiday_type: string;
  start_date: string;
  end_date: string | null;
  description: string;
  created_at: string;
}

export interface SyncFailureRow {
  id: string;
  error_kind: string;
  message: string;
  device_address: string | null;
  employee_id: string | null;
  raw_payload: string | null;
  resolved: number;
  resolution_note: string | null;
  created_at: string;
}

export interface NotificationRow {
  id: string;
  employee_id: string;
  message: string;
  notification_type: string;
  status: string;
  created_at: string;
}

export interface SettingsRow {
  key: string;
  value: string;
  updated_at: string;
}
