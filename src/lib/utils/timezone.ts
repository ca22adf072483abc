/**
 * Wall-clock date/time utilities
 *
 * ZKTeco terminals record LOCAL time with no zone information. Scans are
 * stored as "wall clock" strings (`YYYY-MM-DDTHH:mm:ss`, no `Z`) and every
 * calculation here works on those components directly, via UTC arithmetic,
 * so the host time zone and DST never shift a scan to another day.
 */

const TIME_ONLY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const WALL_CLOCK = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/;

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, '0');
}

/**
 * Format Date components read in the host's local zone as a wall-clock string.
 * node-zklib builds its Date objects from the device's local fields.
 */
export function formatLocalDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Normalize a raw device time to `YYYY-MM-DDTHH:mm:ss`.
 * Returns null when the value cannot be read as a time.
 */
export function normalizeDeviceTimestamp(raw: unknown): string | null {
  if (raw instanceof Date) {
    return isNaN(raw.getTime()) ? null : formatLocalDateTime(raw);
  }
  if (typeof raw === 'number') {
    return normalizeDeviceTimestamp(new Date(raw));
  }
  if (typeof raw === 'string') {
    // The trailing Z some firmwares append is not a real zone
    const match = WALL_CLOCK.exec(raw.trim().replace(/Z$/, ''));
    if (!match || match[4] === undefined) return null;
    return `${match[1]}-${match[2]}-${match[3]}T${match[4]}:${match[5]}:${match[6] ?? '00'}`;
  }
  return null;
}

/**
 * Parse time string (HH:mm) to minutes since midnight
 */
export function parseTimeToMinutes(time: string): number {
  const match = TIME_ONLY.exec(time);
  if (!match) return 0;
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Extract the date portion (YYYY-MM-DD) of a wall-clock timestamp
 */
export function extractLocalDate(timestamp: string): string {
  return timestamp.replace(/Z$/, '').slice(0, 10);
}

/**
 * Extract HH:mm from a wall-clock timestamp
 */
export function formatTime24(timestamp: string | null): string {
  if (!timestamp) return '';
  if (TIME_ONLY.test(timestamp)) return timestamp.substring(0, 5);
  const match = WALL_CLOCK.exec(timestamp);
  if (!match || match[4] === undefined) return '';
  return `${match[4]}:${match[5]}`;
}

/**
 * Milliseconds of a wall-clock timestamp or date, measured as if it were UTC.
 * Only meaningful for differences and ordering.
 */
export function toWallClockMs(value: string): number {
  const match = WALL_CLOCK.exec(value);
  if (!match) {
    throw new Error(`Invalid date/time: ${value}`);
  }
  return Date.UTC(
    Number(match[1]),
    Number(match[2]) - 1,
    Number(match[3]),
    Number(match[4] ?? 0),
    Number(match[5] ?? 0),
    Number(match[6] ?? 0)
  );
}

/**
 * Whole minutes from `start` to `end` (negative if end is earlier)
 */
export function minutesBetween(start: string, end: string): number {
  return Math.round((toWallClockMs(end) - toWallClockMs(start)) / MS_PER_MINUTE);
}

/**
 * Minutes since midnight of a wall-clock timestamp
 */
export function minutesOfDay(timestamp: string): number {
  return parseTimeToMinutes(formatTime24(timestamp));
}

/**
 * Format a UTC-based Date as YYYY-MM-DD
 */
function formatUtcDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Add (or subtract) whole days to a YYYY-MM-DD date
 */
export function addDays(date: string, days: number): string {
  return formatUtcDate(new Date(toWallClockMs(date) + days * MS_PER_DAY));
}

/**
 * Day of week of a YYYY-MM-DD date: 0 = Sunday, 1 = Monday, etc.
 */
export function dayOfWeek(date: string): number {
  return new Date(toWallClockMs(date)).getUTCDay();
}

/**
 * Every date from start to end inclusive (empty when end < start)
 */
export function eachDate(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  for (let current = startDate; current <= endDate; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/**
 * Number of calendar days from start to end inclusive
 */
export function daysInclusive(startDate: string, endDate: string): number {
  if (endDate < startDate) return 0;
  return Math.round((toWallClockMs(endDate) - toWallClockMs(startDate)) / MS_PER_DAY) + 1;
}

/**
 * Today's date on the local wall clock
 */
export function localToday(now: Date = new Date()): string {
  return formatLocalDateTime(now).slice(0, 10);
}

/**
 * Whether a string is a real YYYY-MM-DD calendar date (2024-02-30 is not)
 */
export function isValidDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const ms = toWallClockMs(value);
  return !isNaN(ms) && formatUtcDate(new Date(ms)) === value;
}
