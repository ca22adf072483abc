/**
 * Report Generator Implementation
 * Rolls daily records, leave, permissions and holidays up into range summaries.
 *
 * calculateSummaryMetrics is the single aggregation used by every report,
 * export and dashboard; nothing else recomputes these numbers.
 */

import { AttendanceError, AttendanceErrorCodes, errorMessage, isAttendanceError } from '../errors';
import {
  addDays,
  dayOfWeek,
  daysInclusive,
  eachDate,
  isValidDate,
  localToday,
  toWallClockMs,
} from '../utils/timezone';
import { extraTimeOf, hasAttendance, resolveDayContext } from './calendar-context';
import { getEmployeeById } from '../repositories/employee.repository';
import { listDailyRecords } from '../repositories/daily-attendance.repository';
import { listLeaveRequestsInRange } from '../repositories/leave-request.repository';
import { listPermissionRequestsInRange } from '../repositories/permission-request.repository';
import { holidayCovers, holidayEndDate, listHolidaysInRange } from '../repositories/holiday.repository';
import { DEFAULT_ATTENDANCE_RULES, getAttendanceRules } from '../repositories/settings.repository';
import type {
  AttendanceRules,
  AttendanceStatus,
  DailyAttendanceRecord,
  DayContext,
  Employee,
  EmployeeReportRow,
  LeaveRequest,
  PaidHoliday,
  PermissionRequest,
  ReportGenerator as ReportGeneratorContract,
  SummaryMetrics,
} from '../../types';

/** Everything the aggregation reads for one employee and range */
export interface EmployeeRangeData {
  employee: Employee;
  records: DailyAttendanceRecord[];
  /** Approved and pending requests overlapping the range */
  leaves: LeaveRequest[];
  permissions: PermissionRequest[];
  holidays: PaidHoliday[];
}

export interface ReportDataSource {
  getEmployee: (id: string) => Promise<Employee | null>;
  listRecords: (employeeId: string, startDate: string, endDate: string) => Promise<DailyAttendanceRecord[]>;
  listLeaves: (employeeId: string, startDate: string, endDate: string) => Promise<LeaveRequest[]>;
  listPermissions: (employeeId: string, startDate: string, endDate: string) => Promise<PermissionRequest[]>;
  listHolidays: (startDate: string, endDate: string) => Promise<PaidHoliday[]>;
  getRules: () => Promise<AttendanceRules>;
}

export interface ReportGeneratorOptions {
  source?: Partial<ReportDataSource>;
  /** Source of "now"; decides which dates are in the future */
  clock?: () => Date;
  /** Fire-and-forget sync kicked off when a report is read */
  backgroundSync?: { trigger(): void } | null;
}

export type LeaveBucket = 'annual' | 'unpaid' | 'paid';

const PRESENT_STATUSES: readonly AttendanceStatus[] = ['present', 'half_day', 'partial'];
// Monday..Friday, for paid holidays
const HOLIDAY_WEEKDAYS = [1, 2, 3, 4, 5];
const MS_PER_HOUR = 3_600_000;

const DEFAULT_SOURCE: ReportDataSource = {
  getEmployee: getEmployeeById,
  listRecords: listDailyRecords,
  listLeaves: (employeeId, startDate, endDate) => listLeaveRequestsInRange(employeeId, startDate, endDate),
  listPermissions: (employeeId, startDate, endDate) =>
    listPermissionRequestsInRange(employeeId, startDate, endDate),
  listHolidays: listHolidaysInRange,
  getRules: getAttendanceRules,
};

/**
 * Bucket a leave type by name. Annual, vacation, sick and illness share one
 * bucket; "unpaid" is checked before "paid"; unknown or missing types are annual.
 */
export function leaveBucket(leaveType: string | null): LeaveBucket {
  const name = (leaveType ?? '').toLowerCase();
  if (['annual', 'vacation', 'sick', 'illness'].some((word) => name.includes(word))) {
    return 'annual';
  }
  if (name.includes('unpaid')) {
    return 'unpaid';
  }
  if (name.includes('paid') || name.includes('holiday')) {
    return 'paid';
  }
  return 'annual';
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // `|| 0` turns -0 into 0
  return Math.round(value * factor) / factor || 0;
}

function isApproved(request: { status: string }): boolean {
  return request.status === 'approved';
}

function leaveCovers(leave: LeaveRequest, date: string): boolean {
  return leave.startDate <= date && date <= leave.endDate;
}

function permissionCovers(permission: PermissionRequest, date: string): boolean {
  return permission.startTime.slice(0, 10) <= date && date <= permission.endTime.slice(0, 10);
}

/**
 * Hours of a permission inside [startDate 00:00, endDate + 1 00:00)
 */
function permissionHoursInRange(permission: PermissionRequest, startDate: string, endDate: string): number {
  const from = Math.max(toWallClockMs(permission.startTime), toWallClockMs(startDate));
  const to = Math.min(toWallClockMs(permission.endTime), toWallClockMs(addDays(endDate, 1)));
  return to > from ? (to - from) / MS_PER_HOUR : 0;
}

/**
 * Resolve every date of the range for one employee
 */
export function buildDayContexts(
  data: EmployeeRangeData,
  startDate: string,
  endDate: string,
  today: string,
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): DayContext[] {
  const recordsByDate = new Map(data.records.map((record) => [record.date, record]));
  const approvedLeaves = data.leaves.filter(isApproved);
  const approvedPermissions = data.permissions.filter(isApproved);

  return eachDate(startDate, endDate).map((date) =>
    resolveDayContext(
      {
        date,
        today,
        joiningDate: data.employee.joiningDate,
        record: recordsByDate.get(date) ?? null,
        holiday: data.holidays.find((holiday) => holidayCovers(holiday, date)) ?? null,
        approvedLeave: approvedLeaves.find((leave) => leaveCovers(leave, date)) ?? null,
        approvedPermission: approvedPermissions.find((permission) => permissionCovers(permission, date)) ?? null,
      },
      rules
    )
  );
}

/**
 * Compute the summary metrics for one employee over [startDate, endDate]
 */
export function calculateSummaryMetrics(
  data: EmployeeRangeData,
  startDate: string,
  endDate: string,
  today: string,
  rules: AttendanceRules = DEFAULT_ATTENDANCE_RULES
): SummaryMetrics {
  const dates = eachDate(startDate, endDate);
  const recordsByDate = new Map(data.records.map((record) => [record.date, record]));
  const approvedLeaves = data.leaves.filter(isApproved);
  const approvedPermissions = data.permissions.filter(isApproved);
  const isHoliday = (date: string) => data.holidays.some((holiday) => holidayCovers(holiday, date));
  const hasApprovedLeave = (date: string) => approvedLeaves.some((leave) => leaveCovers(leave, date));

  const presentDays = data.records.filter(
    (record) => hasAttendance(record) || PRESENT_STATUSES.includes(record.status)
  ).length;

  let annualLeaveDays = 0;
  let unpaidLeaveDays = 0;
  let paidLeaveDays = 0;
  for (const leave of data.leaves) {
    const from = leave.startDate > startDate ? leave.startDate : startDate;
    const to = leave.endDate < endDate ? leave.endDate : endDate;
    const days = daysInclusive(from, to);
    switch (leaveBucket(leave.leaveType)) {
      case 'annual':
        annualLeaveDays += days;
        break;
      case 'unpaid':
        unpaidLeaveDays += days;
        break;
      case 'paid':
        paidLeaveDays += days;
        break;
    }
  }

  for (const holiday of data.holidays) {
    const from = holiday.startDate > startDate ? holiday.startDate : startDate;
    const last = holidayEndDate(holiday);
    const to = last < endDate ? last : endDate;
    paidLeaveDays += eachDate(from, to).filter((date) => HOLIDAY_WEEKDAYS.includes(dayOfWeek(date))).length;
  }

  const permissionHours = data.permissions.reduce(
    (total, permission) => total + permissionHoursInRange(permission, startDate, endDate),
    0
  );

  const dayOffCandidates = dates.filter((date) => rules.dayOffDays.includes(dayOfWeek(date)));
  const usedDayOffs = dayOffCandidates.filter(
    (date) => hasAttendance(recordsByDate.get(date) ?? null) || hasApprovedLeave(date) || isHoliday(date)
  ).length;
  const dayOffDays = Math.max(0, dayOffCandidates.length - usedDayOffs);

  const joiningDate = data.employee.joiningDate;
  const absentDays = dates.filter(
    (date) =>
      rules.workingDays.includes(dayOfWeek(date)) &&
      (!joiningDate || date >= joiningDate) &&
      date <= today &&
      !recordsByDate.has(date) &&
      !hasApprovedLeave(date) &&
      !isHoliday(date) &&
      !approvedPermissions.some((permission) => permissionCovers(permission, date))
  ).length;

  const incompleteDays = data.records.filter((record) => record.isIncompleteDay).length;

  const extraTimeHours = buildDayContexts(data, startDate, endDate, today, rules).reduce(
    (total, context) => total + extraTimeOf(context),
    0
  );

  const totalWorkingDays = dayOffDays + presentDays + annualLeaveDays + paidLeaveDays;
  const attendancePercentage = totalWorkingDays > 0 ? (presentDays / totalWorkingDays) * 100 : 0;

  return {
    totalDays: dates.length,
    totalWorkingDays,
    presentDays,
    absentDays,
    annualLeaveDays,
    unpaidLeaveDays,
    paidLeaveDays,
    permissionHours: round(permissionHours, 2),
    dayOffDays,
    incompleteDays,
    attendancePercentage: round(attendancePercentage, 1),
    extraTimeHours: round(extraTimeHours, 1),
  };
}

/**
 * Report Generator class
 * Loads an employee's data for a range and aggregates it
 */
export class ReportGenerator implements ReportGeneratorContract {
  private source: ReportDataSource;
  private clock: () => Date;
  private backgroundSync: { trigger(): void } | null;

  constructor(options: ReportGeneratorOptions = {}) {
    this.source = { ...DEFAULT_SOURCE, ...options.source };
    this.clock = options.clock ?? (() => new Date());
    this.backgroundSync = options.backgroundSync ?? null;
  }

  /**
   * Summary metrics for one employee. Throws AGGREGATION_ERROR when the
   * employee is unknown or the data cannot be read.
   */
  async aggregate(employeeId: string, startDate: string, endDate: string): Promise<SummaryMetrics> {
    this.backgroundSync?.trigger();
    return this.compute(employeeId, startDate, endDate);
  }

  /**
   * Best-effort report for many employees: a failing employee yields a row
   * with an error message instead of failing the whole report
   */
  async aggregateMany(employeeIds: string[], startDate: string, endDate: string): Promise<EmployeeReportRow[]> {
    this.backgroundSync?.trigger();
    const rows: EmployeeReportRow[] = [];
    for (const employeeId of employeeIds) {
      try {
        const metrics = await this.compute(employeeId, startDate, endDate);
        rows.push({ employeeId, metrics, error: null });
      } catch (error) {
        console.error(`[ReportGenerator] Aggregation failed for ${employeeId}:`, errorMessage(error));
        rows.push({ employeeId, metrics: null, error: errorMessage(error) });
      }
    }
    return rows;
  }

  /**
   * The resolved context of every date in the range
   */
  async buildCalendar(employeeId: string, startDate: string, endDate: string): Promise<DayContext[]> {
    const { data, rules } = await this.load(employeeId, startDate, endDate);
    return buildDayContexts(data, startDate, endDate, this.today(), rules);
  }

  private async compute(employeeId: string, startDate: string, endDate: string): Promise<SummaryMetrics> {
    const { data, rules } = await this.load(employeeId, startDate, endDate);
    return calculateSummaryMetrics(data, startDate, endDate, this.today(), rules);
  }

  private today(): string {
    return localToday(this.clock());
  }

  private async load(
    employeeId: string,
    startDate: string,
    endDate: string
  ): Promise<{ data: EmployeeRangeData; rules: AttendanceRules }> {
    if (!isValidDate(startDate) || !isValidDate(endDate) || endDate < startDate) {
      throw new AttendanceError(
        AttendanceErrorCodes.INVALID_INPUT,
        `Invalid date range: ${startDate} to ${endDate}`,
        { startDate, endDate }
      );
    }

    try {
      const employee = await this.source.getEmployee(employeeId);
      if (!employee) {
        throw new AttendanceError(AttendanceErrorCodes.AGGREGATION_ERROR, `Unknown employee: ${employeeId}`, {
          employeeId,
        });
      }

      const [records, leaves, permissions, holidays, rules] = await Promise.all([
        this.source.listRecords(employeeId, startDate, endDate),
        this.source.listLeaves(employeeId, startDate, endDate),
        this.source.listPermissions(employeeId, startDate, endDate),
        this.source.listHolidays(startDate, endDate),
        this.source.getRules(),
      ]);

      return { data: { employee, records, leaves, permissions, holidays }, rules };
    } catch (error) {
      if (isAttendanceError(error, AttendanceErrorCodes.AGGREGATION_ERROR)) {
        throw error;
      }
      throw new AttendanceError(
        AttendanceErrorCodes.AGGREGATION_ERROR,
        `Failed to load report data for ${employeeId}: ${errorMessage(error)}`,
        { employeeId, startDate, endDate }
      );
    }
  }
}

export default ReportGenerator;
