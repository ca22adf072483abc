/**
 * SQLite schema, applied by initDatabase().
 */

export const SCHEMA = `
-- Biometric terminals
CREATE TABLE IF NOT EXISTS devices (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    ip TEXT NOT NULL,
    port INTEGER NOT NULL DEFAULT 4370,
    comm_key TEXT DEFAULT '',
    is_active INTEGER NOT NULL DEFAULT 1,
    last_sync_at TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Employee directory
CREATE TABLE IF NOT EXISTS employees (
    id TEXT PRIMARY KEY,
    display_name TEXT NOT NULL,
    biometric_id TEXT UNIQUE,
    joining_date TEXT,
    status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'inactive')),
    role TEXT NOT NULL DEFAULT 'employee' CHECK (role IN ('employee', 'manager', 'admin')),
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Raw scans attributed to employees
CREATE TABLE IF NOT EXISTS scan_events (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    timestamp TEXT NOT NULL,
    direction TEXT CHECK (direction IN ('check_in', 'check_out')),
    device_address TEXT NOT NULL,
    is_manual INTEGER NOT NULL DEFAULT 0,
    sequence_index INTEGER,
    is_extra_scan INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(employee_id, timestamp)
);

-- One reconciled record per employee per day
CREATE TABLE IF NOT EXISTS daily_attendance (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    first_check_in TEXT,
    last_check_out TEXT,
    first_scan_at TEXT,
    last_scan_at TEXT,
    total_worked_minutes INTEGER NOT NULL DEFAULT 0,
    entry_pair_count INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL,
    status_reason TEXT,
    is_incomplete_day INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(employee_id, date)
);

CREATE TABLE IF NOT EXISTS leave_requests (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    start_date TEXT NOT NULL,
    end_date TEXT NOT NULL,
    leave_type TEXT,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'approved', 'rejected')),
    reason TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS permission_requests (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    start_time TEXT NOT NULL,
    end_time TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'approved', 'rejected')),
    reason TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS paid_holidays (
    id TEXT PRIMARY KEY,
    holiday_type TEXT NOT NULL DEFAULT 'day' CHECK (holiday_type IN ('day', 'range')),
    start_date TEXT NOT NULL,
    end_date TEXT,
    description TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Append-only audit trail of device and reconciliation failures
CREATE TABLE IF NOT EXISTS sync_failures (
    id TEXT PRIMARY KEY,
    error_kind TEXT NOT NULL,
    message TEXT NOT NULL,
    device_address TEXT,
    employee_id TEXT,
    raw_payload TEXT,
    resolved INTEGER NOT NULL DEFAULT 0,
    resolution_note TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    employee_id TEXT NOT NULL REFERENCES employees(id) ON DELETE CASCADE,
    message TEXT NOT NULL,
    notification_type TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'unread' CHECK (status IN ('unread', 'read')),
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_employees_biometric_id ON employees(biometric_id);
CREATE INDEX IF NOT EXISTS idx_scan_events_timestamp ON scan_events(timestamp);
CREATE INDEX IF NOT EXISTS idx_scan_events_employee_timestamp ON scan_events(employee_id, timestamp);
CREATE INDEX IF NOT EXISTS idx_daily_attendance_employee_date ON daily_attendance(employee_id, date);
CREATE INDEX IF NOT EXISTS idx_leave_requests_employee ON leave_requests(employee_id, start_date, end_date);
CREATE INDEX IF NOT EXISTS idx_permission_requests_employee ON permission_requests(employee_id, start_time);
CREATE INDEX IF NOT EXISTS idx_sync_failures_created ON sync_failures(created_at);
`;

/** Tables in delete order (children before parents) */
export const TABLES = [
  'notifications',
  'sync_failures',
  'daily_attendance',
  'scan_events',
  'leave_requests',
  'permission_requests',
  'paid_holidays',
  'employees',
  'devices',
  'settings',
] as const;
