/**
 * Tests for the Rule Engine
 *
 * Incomplete-day marking, pair walking and status derivation.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  processDay,
  walkPairs,
  deriveScanFields,
  RuleEngine,
} from './rule-engine';
import type { ScanInput } from './rule-engine';
import type { LeaveRequest, PermissionRequest } from '../../types';

const DATE = '2024-03-04';

function scansAt(...times: string[]): ScanInput[] {
  return times.map((time, index) => ({ id: `scan-${index}`, timestamp: `${DATE}T${time}:00` }));
}

const timeArbitrary = fc.tuple(
  fc.integer({ min: 0, max: 23 }),
  fc.integer({ min: 0, max: 59 })
).map(([h, m]) => `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}`);

const leave: LeaveRequest = {
  id: 'leave-1',
  employeeId: 'emp-1',
  startDate: DATE,
  endDate: DATE,
  leaveType: 'annual',
  status: 'approved',
  reason: 'Family trip',
};

const permission: PermissionRequest = {
  id: 'perm-1',
  employeeId: 'emp-1',
  startTime: `${DATE}T10:00:00`,
  endTime: `${DATE}T12:30:00`,
  status: 'approved',
  reason: 'Dentist',
};

describe('processDay', () => {
  it('returns null when there are no scans', () => {
    expect(processDay('emp-1', DATE, [])).toBeNull();
  });

  it('counts 09:00 to 19:00 as 600 minutes and present', () => {
    const result = processDay('emp-1', DATE, scansAt('09:00', '19:00'));

    expect(result?.record).toEqual({
      employeeId: 'emp-1',
      date: DATE,
      firstCheckIn: `${DATE}T09:00:00`,
      lastCheckOut: `${DATE}T19:00:00`,
      firstScanAt: `${DATE}T09:00:00`,
      lastScanAt: `${DATE}T19:00:00`,
      totalWorkedMinutes: 600,
      entryPairCount: 1,
      status: 'present',
      statusReason: 'Present (10.0 hours worked)',
      isIncompleteDay: false,
    });
  });

  it('marks a single morning scan as in office and incomplete', () => {
    const result = processDay('emp-1', DATE, scansAt('09:00'));

    expect(result?.record.status).toBe('in_office');
    expect(result?.record.isIncompleteDay).toBe(true);
    expect(result?.record.statusReason).toBe('Single scan - 9 hours assigned');
    expect(result?.record.totalWorkedMinutes).toBe(0);
  });

  it('marks a lone check-out as absent and incomplete', () => {
    const result = processDay('emp-1', DATE, scansAt('18:00'));

    expect(result?.record.status).toBe('absent');
    expect(result?.record.firstCheckIn).toBeNull();
    expect(result?.record.lastCheckOut).toBe(`${DATE}T18:00:00`);
    expect(result?.record.isIncompleteDay).toBe(true);
  });

  it('keeps the earliest check-in open when a second one arrives', () => {
    const result = processDay('emp-1', DATE, scansAt('08:00', '09:00', '17:00'));

    expect(result?.record.totalWorkedMinutes).toBe(540);
    expect(result?.record.entryPairCount).toBe(1);
    expect(result?.record.status).toBe('present');
  });

  it('ignores a check-out with nothing open', () => {
    const result = processDay('emp-1', DATE, scansAt('02:00', '08:00', '16:00'));

    expect(result?.record.totalWorkedMinutes).toBe(480);
    expect(result?.record.entryPairCount).toBe(1);
    expect(result?.record.firstCheckIn).toBe(`${DATE}T08:00:00`);
    expect(result?.record.lastCheckOut).toBe(`${DATE}T16:00:00`);
    expect(result?.record.status).toBe('half_day');
    expect(result?.record.statusReason).toBe('Half day (8.0 hours worked)');
  });

  it('reports an unmatched check-in as in office', () => {
    const result = processDay('emp-1', DATE, scansAt('08:00', '09:30'));

    expect(result?.record.status).toBe('in_office');
    expect(result?.record.statusReason).toBe('Checked in, no check-out yet');
    expect(result?.record.isIncompleteDay).toBe(false);
  });

  it('records the first and last scan whatever their direction', () => {
    const result = processDay('emp-1', DATE, scansAt('02:00', '09:00', '13:30'));

    expect(result?.record.firstScanAt).toBe(`${DATE}T02:00:00`);
    expect(result?.record.lastScanAt).toBe(`${DATE}T13:30:00`);
    expect(result?.record.lastCheckOut).toBe(`${DATE}T02:00:00`);
  });

  it('grades short days as half day or partial', () => {
    expect(processDay('emp-1', DATE, scansAt('10:00', '14:30'))?.record.status).toBe('half_day');
    const partial = processDay('emp-1', DATE, scansAt('11:00', '14:00'));
    expect(partial?.record.status).toBe('partial');
    expect(partial?.record.statusReason).toBe('Partial day (3.0 hours worked)');
  });

  it('lets approved leave win over scans', () => {
    const result = processDay('emp-1', DATE, scansAt('09:00', '19:00'), { leave, permission });

    expect(result?.record.status).toBe('leave');
    expect(result?.record.statusReason).toBe('Approved leave: annual');
    expect(result?.record.totalWorkedMinutes).toBe(600);
  });

  it('lets approved permission win over attendance', () => {
    const result = processDay('emp-1', DATE, scansAt('09:00', '19:00'), { leave: null, permission });

    expect(result?.record.status).toBe('permission');
    expect(result?.record.statusReason).toBe('Approved permission (2.5h)');
  });

  it('numbers scans in time order and flags extras', () => {
    const result = processDay('emp-1', DATE, [
      { id: 'c', timestamp: `${DATE}T18:00:00` },
      { id: 'a', timestamp: `${DATE}T08:00:00` },
      { id: 'b', timestamp: `${DATE}T12:00:00` },
    ]);

    expect(result?.scans).toEqual([
      { id: 'a', timestamp: `${DATE}T08:00:00`, direction: 'check_in', sequenceIndex: 1, isExtraScan: false },
      { id: 'b', timestamp: `${DATE}T12:00:00`, direction: 'check_in', sequenceIndex: 2, isExtraScan: false },
      { id: 'c', timestamp: `${DATE}T18:00:00`, direction: 'check_out', sequenceIndex: 3, isExtraScan: true },
    ]);
  });
});

describe('Rule Engine - Property Tests', () => {
  it('marks a day incomplete exactly when it has one scan', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(timeArbitrary, { minLength: 0, maxLength: 6 }),
        (times) => {
          const result = processDay('emp-1', DATE, scansAt(...times));
          if (times.length === 0) {
            expect(result).toBeNull();
          } else {
            expect(result?.record.isIncompleteDay).toBe(times.length === 1);
          }
        }
      ),
      { numRuns: 100 }
    );
  });

  it('produces identical records for identical input', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(timeArbitrary, { minLength: 1, maxLength: 6 }),
        (times) => {
          const first = processDay('emp-1', DATE, scansAt(...times));
          const second = processDay('emp-1', DATE, scansAt(...times));
          expect(second).toEqual(first);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('never counts more pairs than check-outs or negative minutes', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(timeArbitrary, { minLength: 1, maxLength: 8 }),
        (times) => {
          const derived = deriveScanFields(scansAt(...times));
          const walk = walkPairs(derived);
          const checkOuts = derived.filter((scan) => scan.direction === 'check_out').length;
          expect(walk.entryPairCount).toBeLessThanOrEqual(checkOuts);
          expect(walk.totalWorkedMinutes).toBeGreaterThanOrEqual(0);
        }
      ),
      { numRuns: 100 }
    );
  });
});

describe('RuleEngine class', () => {
  it('applies its configured rules', () => {
    const engine = new RuleEngine({
      checkInWindowStart: '04:00',
      checkOutWindowStart: '14:00',
      standardWorkdayHours: 8,
      presentHours: 8,
      halfDayHours: 4,
      workingDays: [1, 2, 3, 4, 5],
      dayOffDays: [0, 6],
    });

    expect(engine.processDay('emp-1', DATE, scansAt('09:00', '17:00'))?.record.status).toBe('present');
    expect(engine.processDay('emp-1', DATE, scansAt('09:00'))?.record.statusReason).toBe(
      'Single scan - 8 hours assigned'
    );
    expect(engine.classify(`${DATE}T13:00:00`)).toBe('check_in');
  });
});
