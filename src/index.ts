/**
 * Attendance reconciliation core
 *
 * Open the database with initDatabase(path) before calling any service.
 */

export { initDatabase, closeDatabase, withTransaction } from './lib/database';
export { AttendanceError, AttendanceErrorCodes, isAttendanceError, errorMessage } from './lib/errors';
export type { AttendanceErrorCode } from './lib/errors';

export * from './lib/services';
// The classes take precedence over the same-named interfaces in ./types
export { SyncEngine, ReportGenerator } from './lib/services';
export type { SyncEngine as SyncEngineContract, ReportGenerator as ReportGeneratorContract } from './types';

export { employeeRepository } from './lib/repositories/employee.repository';
export { scanEventRepository } from './lib/repositories/scan-event.repository';
export { dailyAttendanceRepository } from './lib/repositories/daily-attendance.repository';
export { leaveRequestRepository } from './lib/repositories/leave-request.repository';
export { permissionRequestRepository } from './lib/repositories/permission-request.repository';
export { holidayRepository } from './lib/repositories/holiday.repository';
export { deviceRepository, saveDevice } from './lib/repositories/device.repository';
export { syncFailureRepository } from './lib/repositories/sync-failure.repository';
export { notificationRepository } from './lib/repositories/notification.repository';
export {
  settingsRepository,
  DEFAULT_ATTENDANCE_RULES,
  DEFAULT_SYNC_SETTINGS,
  DEFAULT_APP_SETTINGS,
} from './lib/repositories/settings.repository';

export * from './types';
