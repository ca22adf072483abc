/**
 * Rule Engine Implementation
 * Turns one employee's scans for one day into a daily attendance record.
 * Pure: reads nothing and writes nothing.
 */

import { classifyScan } from './scan-classifier';
import { minutesBetween } from '../utils/timezone';
import { DEFAULT_ATTENDANCE_RULES } from '../repositories/settings.repository';
import type {
  AttendanceRules,
  AttendanceStatus,
  DailyAttendanceRecord,
  LeaveRequest,
  PermissionRequest,
  ScanDirection,
} from '../../types';

/** The parts of a stored scan the engine looks at */
export interface ScanInput {
  id: string;
  timestamp: string;
}

/** Fields derived for each scan, written back by the reconciler */
export interface DerivedScanFields {
  id: string;
  timestamp: string;
  direction: ScanDirection;
  sequenceIndex: number;
  isExtraScan: boolean;
}

/** Approved requests covering the day being processed */
export interface DayApprovals {
  leave: LeaveRequest | null;
  permission: PermissionRequest | null;
}

export interface PairWalkResult {
  totalWorkedMinutes: number;
  entryPairCount: number;
  firstCheckIn: string | null;
  lastCheckOut: string | null;
  firstScanAt: string | null;
  lastScanAt: string | null;
  hasActiveCheckIn: boolean;
}

export interface ProcessedDay {
  record: DailyAttendanceRecord;
  scans: DerivedScanFields[];
}

const NO_APPROVALS: DayApprovals = { leave: null, permission: null };

/**
 * Number scans 1..N in time order, flag everything after the second as extra,
 * and classify each one
 */
export function deriveScanFields(
  scans: ScanInput[],
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): DerivedScanFields[] {
  return [...scans]
    .sort((a, b) => a.timestamp.localeCompare(b.timestamp))
    .map((scan, index) => ({
      id: scan.id,
      timestamp: scan.timestamp,
      direction: classifyScan(scan.timestamp, rules),
      sequenceIndex: index + 1,
      isExtraScan: index + 1 > 2,
    }));
}

/**
 * Walk classified scans in time order pairing check-ins with check-outs.
 *
 * A check-in opens an interval when none is open; a further check-in while
 * one is open is redundant. A check-out closes the open interval, or is
 * ignored when nothing is open.
 */
export function walkPairs(scans: Array<{ timestamp: string; direction: ScanDirection }>): PairWalkResult {
  let openedAt: string | null = null;
  let totalWorkedMinutes = 0;
  let entryPairCount = 0;
  let firstCheckIn: string | null = null;
  let lastCheckOut: string | null = null;
  let firstScanAt: string | null = null;
  let lastScanAt: string | null = null;

  for (const scan of scans) {
    firstScanAt ??= scan.timestamp;
    lastScanAt = scan.timestamp;
    if (scan.direction === 'check_in') {
      firstCheckIn ??= scan.timestamp;
      openedAt ??= scan.timestamp;
      continue;
    }

    lastCheckOut = scan.timestamp;
    if (openedAt !== null) {
      totalWorkedMinutes += minutesBetween(openedAt, scan.timestamp);
      entryPairCount += 1;
      openedAt = null;
    }
  }

  return {
    totalWorkedMinutes,
    entryPairCount,
    firstCheckIn,
    lastCheckOut,
    firstScanAt,
    lastScanAt,
    hasActiveCheckIn: openedAt !== null,
  };
}

function formatHours(minutes: number): string {
  return (minutes / 60).toFixed(1);
}

/**
 * Derive the day's status and a short explanation, first match wins
 */
export function deriveAttendanceStatus(
  walk: PairWalkResult,
  scanCount: number,
  approvals: DayApprovals,
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): { status: AttendanceStatus; statusReason: string } {
  if (approvals.leave) {
    return {
      status: 'leave',
      statusReason: `Approved leave: ${approvals.leave.leaveType ?? approvals.leave.reason}`,
    };
  }

  if (approvals.permission) {
    const minutes = minutesBetween(approvals.permission.startTime, approvals.permission.endTime);
    return {
      status: 'permission',
      statusReason: `Approved permission (${formatHours(minutes)}h)`,
    };
  }

  if (walk.hasActiveCheckIn) {
    return {
      status: 'in_office',
      statusReason: scanCount === 1
        ? `Single scan - ${rules.standardWorkdayHours} hours assigned`
        : 'Checked in, no check-out yet',
    };
  }

  if (walk.firstCheckIn && walk.lastCheckOut) {
    const hours = walk.totalWorkedMinutes / 60;
    const worked = formatHours(walk.totalWorkedMinutes);
    if (hours >= rules.presentHours) {
      return { status: 'present', statusReason: `Present (${worked} hours worked)` };
    }
    if (hours >= rules.halfDayHours) {
      return { status: 'half_day', statusReason: `Half day (${worked} hours worked)` };
    }
    return { status: 'partial', statusReason: `Partial day (${worked} hours worked)` };
  }

  if (walk.firstCheckIn) {
    return { status: 'in_office', statusReason: 'Checked in, no check-out yet' };
  }

  return { status: 'absent', statusReason: 'Check-out without check-in' };
}

/**
 * Process a day's scans into a daily record.
 * Returns null when there are no scans.
 */
export function processDay(
  employeeId: string,
  date: string,
  scans: ScanInput[],
  approvals: DayApprovals = NO_APPROVALS,
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): ProcessedDay | null {
  if (scans.length === 0) {
    return null;
  }

  const derived = deriveScanFields(scans, rules);
  const walk = walkPairs(derived);
  const { status, statusReason } = deriveAttendanceStatus(walk, scans.length, approvals, rules);

  return {
    record: {
      employeeId,
      date,
      firstCheckIn: walk.firstCheckIn,
      lastCheckOut: walk.lastCheckOut,
      firstScanAt: walk.firstScanAt,
      lastScanAt: walk.lastScanAt,
      totalWorkedMinutes: walk.totalWorkedMinutes,
      entryPairCount: walk.entryPairCount,
      status,
      statusReason,
      isIncompleteDay: scans.length === 1,
    },
    scans: derived,
  };
}

/**
 * RuleEngine class implementation
 */
export class RuleEngine {
  private rules: AttendanceRules;

  constructor(rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES) {
    this.rules = rules;
  }

  /**
   * Update the attendance rules
   */
  setRules(rules: AttendanceRules): void {
    this.rules = rules;
  }

  /**
   * Get current rules
   */
  getRules(): AttendanceRules {
    return this.rules;
  }

  /**
   * Process a day's scans
   */
  processDay(employeeId: string, date: string, scans: ScanInput[], approvals?: DayApprovals): ProcessedDay | null {
    return processDay(employeeId, date, scans, approvals, this.rules);
  }

  /**
   * Classify a single scan
   */
  classify(timestamp: string): ScanDirection {
    return classifyScan(timestamp, this.rules);
  }
}

export default RuleEngine;
