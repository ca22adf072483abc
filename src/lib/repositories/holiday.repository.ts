/**
 * Holiday Repository
 *
 * Paid holidays, declared as a single day or an inclusive date range.
 */

import { randomUUID } from 'node:crypto';
import { execute, select } from '../database';
import type { PaidHoliday, CreateHolidayInput, HolidayType, HolidayRepository } from '../../types';
import type { PaidHolidayRow } from '../../types/api';

function parseHolidayType(value: string): HolidayType {
  return value === 'range' ? 'range' : 'day';
}

function rowToHoliday(row: PaidHolidayRow): PaidHoliday {
  return {
    id: row.id,
    holidayType: parseHolidayType(row.holiday_type),
    startDate: row.start_date,
    endDate: row.end_date,
    description: row.description,
    createdAt: row.created_at,
  };
}

/**
 * Last day a holiday covers
 */
export function holidayEndDate(holiday: PaidHoliday): string {
  return holiday.holidayType === 'range' && holiday.endDate ? holiday.endDate : holiday.startDate;
}

/**
 * Whether a holiday covers a date
 */
export function holidayCovers(holiday: PaidHoliday, date: string): boolean {
  return holiday.startDate <= date && date <= holidayEndDate(holiday);
}

/**
 * List all holidays
 */
export async function listHolidays(): Promise<PaidHoliday[]> {
  const rows = await select<PaidHolidayRow>(
    'SELECT * FROM paid_holidays ORDER BY start_date ASC'
  );
  return rows.map(rowToHoliday);
}

/**
 * Holidays overlapping [startDate, endDate]
 */
export async function listHolidaysInRange(startDate: string, endDate: string): Promise<PaidHoliday[]> {
  const rows = await select<PaidHolidayRow>(
    `SELECT * FROM paid_holidays
     WHERE (holiday_type = 'day' AND start_date >= ? AND start_date <= ?)
        OR (holiday_type = 'range' AND start_date <= ? AND COALESCE(end_date, start_date) >= ?)
     ORDER BY start_date ASC`,
    [startDate, endDate, endDate, startDate]
  );
  return rows.map(rowToHoliday);
}

/**
 * The holiday covering a date, if any
 */
export async function getHolidayForDate(date: string): Promise<PaidHoliday | null> {
  const holidays = await listHolidaysInRange(date, date);
  return holidays[0] ?? null;
}

async function getHoliday(id: string): Promise<PaidHoliday | null> {
  const rows = await select<PaidHolidayRow>('SELECT * FROM paid_holidays WHERE id = ?', [id]);
  const row = rows[0];
  return row ? rowToHoliday(row) : null;
}

/**
 * Create a new holiday
 */
export async function createHoliday(data: CreateHolidayInput): Promise<PaidHoliday> {
  const id = randomUUID();
  const holidayType = data.holidayType ?? (data.endDate ? 'range' : 'day');
  await execute(
    `INSERT INTO paid_holidays (id, holiday_type, start_date, end_date, description, created_at)
     VALUES (?, ?, ?, ?, ?, datetime('now'))`,
    [id, holidayType, data.startDate, holidayType === 'range' ? data.endDate ?? null : null, data.description]
  );
  const holiday = await getHoliday(id);
  if (!holiday) {
    throw new Error('Failed to create holiday');
  }
  return holiday;
}

/**
 * Delete a holiday
 */
export async function deleteHoliday(id: string): Promise<void> {
  await execute('DELETE FROM paid_holidays WHERE id = ?', [id]);
}

// Export repository object for consistency with other repositories
export const holidayRepository: HolidayRepository = {
  listHolidays,
  listHolidaysInRange,
  getHolidayForDate,
  createHoliday,
  deleteHoliday,
};
