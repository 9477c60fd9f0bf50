/**
 * Date Helper Utilities
 *
 * Calendar-date arithmetic for aging and scheduling.
 *
 * Calendar dates are represented as `Date` values at UTC midnight so that
 * day differences never drift with the host timezone or DST changes.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Build a calendar date from year / month (1-12) / day
 */
export function calendarDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Calendar date of a local timestamp (uses local date parts, no timezone shift)
 *
 * @example
 * toCalendarDate(new Date(2025, 11, 25, 15, 30)) // => 2025-12-25T00:00:00Z
 */
export function toCalendarDate(date: Date): Date {
  return calendarDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

/**
 * Today's calendar date in the process timezone
 */
export function today(now: Date = new Date()): Date {
  return toCalendarDate(now);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Whole days from `from` to `to` (positive when `to` is later)
 */
export function diffInDays(to: Date, from: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Weekday index with Monday = 0 ... Sunday = 6
 */
export function weekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

/**
 * Monday of the week containing `date`
 */
export function startOfWeek(date: Date): Date {
  return addDays(date, -weekdayIndex(date));
}

/**
 * First day of the month after the month containing `date`
 */
export function startOfNextMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
}

export function isSameMonth(a: Date, b: Date): boolean {
  return a.getUTCFullYear() === b.getUTCFullYear() && a.getUTCMonth() === b.getUTCMonth();
}

/**
 * Format as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Format as MM/DD/YYYY (statement and report display format)
 */
export function formatDisplayDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${month}/${day}/${date.getUTCFullYear()}`;
}

/**
 * Parse a calendar date from spreadsheet input
 *
 * Accepts Date objects, Excel serial numbers, YYYY-MM-DD and MM/DD/YYYY
 * strings, then anything `Date` itself understands.
 *
 * @returns calendar date, or null if the value is not a date
 */
export function parseCalendarDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toCalendarDate(value);
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value <= 0) return null;
    // Excel serial date: days since 1899-12-30
    const serialEpoch = Date.UTC(1899, 11, 30);
    return new Date(serialEpoch + Math.floor(value) * MS_PER_DAY);
  }

  if (typeof value !== 'string') return null;

  const raw = value.trim();
  if (!raw) return null;

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})/.exec(raw);
  if (iso) {
    return validParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/.exec(raw);
  if (us) {
    const year = us[3].length === 2 ? 2000 + Number(us[3]) : Number(us[3]);
    return validParts(year, Number(us[1]), Number(us[2]));
  }

  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? null : toCalendarDate(parsed);
}

function validParts(year: number, month: number, day: number): Date | null {
  const date = calendarDate(year, month, day);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}
