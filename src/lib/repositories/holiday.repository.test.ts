/**
 * Tests for Holiday Repository
 * Single-day and range holidays, and range overlap queries
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { initTestDatabase, closeTestDatabase, resetTestDatabase } from '../test-utils';
import {
  createHoliday,
  deleteHoliday,
  getHolidayForDate,
  holidayCovers,
  listHolidays,
  listHolidaysInRange,
} from './holiday.repository';

// Initialize test database
initTestDatabase();

describe('Holiday Repository', () => {
  beforeEach(() => {
    resetTestDatabase();
  });

  afterAll(() => {
    closeTestDatabase();
  });

  it('infers the holiday type from the end date', async () => {
    const day = await createHoliday({ startDate: '2024-03-05', description: 'Founders Day' });
    const range = await createHoliday({ startDate: '2024-04-09', endDate: '2024-04-12', description: 'Spring Break' });

    expect(day.holidayType).toBe('day');
    expect(day.endDate).toBeNull();
    expect(range.holidayType).toBe('range');
    expect(range.endDate).toBe('2024-04-12');
  });

  it('ignores the end date of a single-day holiday', async () => {
    const day = await createHoliday({
      holidayType: 'day',
      startDate: '2024-03-05',
      endDate: '2024-03-09',
      description: 'Founders Day',
    });

    expect(day.endDate).toBeNull();
    expect(holidayCovers(day, '2024-03-06')).toBe(false);
  });

  it('finds holidays overlapping a range', async () => {
    await createHoliday({ startDate: '2024-03-05', description: 'Founders Day' });
    await createHoliday({ startDate: '2024-03-28', endDate: '2024-04-02', description: 'Spring Break' });
    await createHoliday({ startDate: '2024-05-01', description: 'Labour Day' });

    const march = await listHolidaysInRange('2024-03-01', '2024-03-31');
    expect(march.map((holiday) => holiday.description)).toEqual(['Founders Day', 'Spring Break']);

    expect((await getHolidayForDate('2024-04-01'))?.description).toBe('Spring Break');
    expect(await getHolidayForDate('2024-04-03')).toBeNull();
  });

  it('deletes a holiday', async () => {
    const holiday = await createHoliday({ startDate: '2024-03-05', description: 'Founders Day' });

    await deleteHoliday(holiday.id);

    expect(await listHolidays()).toEqual([]);
  });
});
