/**
 * Tests for the Scan Classifier
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { classifyScan } from './scan-classifier';

function timestampAt(hours: number, minutes: number): string {
  return `2024-03-04T${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:00`;
}

describe('classifyScan', () => {
  it('treats the morning window as check-in', () => {
    expect(classifyScan('2024-03-04T04:00:00')).toBe('check_in');
    expect(classifyScan('2024-03-04T09:15:30')).toBe('check_in');
    expect(classifyScan('2024-03-04T13:59:59')).toBe('check_in');
  });

  it('treats afternoon, evening and small hours as check-out', () => {
    expect(classifyScan('2024-03-04T14:00:00')).toBe('check_out');
    expect(classifyScan('2024-03-04T23:59:00')).toBe('check_out');
    expect(classifyScan('2024-03-04T00:00:00')).toBe('check_out');
    expect(classifyScan('2024-03-04T03:59:00')).toBe('check_out');
  });

  it('honours configured boundaries', () => {
    const windows = { checkInWindowStart: '06:00', checkOutWindowStart: '12:00' };
    expect(classifyScan('2024-03-04T05:30:00', windows)).toBe('check_out');
    expect(classifyScan('2024-03-04T11:59:00', windows)).toBe('check_in');
    expect(classifyScan('2024-03-04T12:00:00', windows)).toBe('check_out');
  });

  it('handles a check-in window that wraps midnight', () => {
    const windows = { checkInWindowStart: '22:00', checkOutWindowStart: '06:00' };
    expect(classifyScan('2024-03-04T23:00:00', windows)).toBe('check_in');
    expect(classifyScan('2024-03-04T02:00:00', windows)).toBe('check_in');
    expect(classifyScan('2024-03-04T07:00:00', windows)).toBe('check_out');
  });

  it('classifies every minute of the day by the 04:00 and 14:00 boundaries', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 23 }),
        fc.integer({ min: 0, max: 59 }),
        (hours, minutes) => {
          const expected = hours >= 4 && hours < 14 ? 'check_in' : 'check_out';
          expect(classifyScan(timestampAt(hours, minutes))).toBe(expected);
        }
      ),
      { numRuns: 200 }
    );
  });
});
