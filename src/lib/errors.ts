/**
 * Error taxonomy for reconciliation, sync and aggregation.
 */

export const AttendanceErrorCodes = {
  CONFIG_ERROR: 'CONFIG_ERROR',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  DUPLICATE_SCAN: 'DUPLICATE_SCAN',
  UNMATCHED_EMPLOYEE: 'UNMATCHED_EMPLOYEE',
  RECONCILIATION_ERROR: 'RECONCILIATION_ERROR',
  AGGREGATION_ERROR: 'AGGREGATION_ERROR',
  SYNC_ERROR: 'SYNC_ERROR',
  INVALID_STATUS: 'INVALID_STATUS',
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type AttendanceErrorCode = typeof AttendanceErrorCodes[keyof typeof AttendanceErrorCodes];

export class AttendanceError extends Error {
  readonly code: AttendanceErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AttendanceErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AttendanceError';
    this.code = code;
    if (details) {
      this.details = details;
    }
  }
}

export function isAttendanceError(error: unknown, code?: AttendanceErrorCode): error is AttendanceError {
  return error instanceof AttendanceError && (code === undefined || error.code === code);
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
