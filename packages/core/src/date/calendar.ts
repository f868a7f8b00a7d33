import type { DateSelection } from '../domain/types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Number of days in a month (1..12) of a Gregorian year.
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Checks that year/month/day name a real Gregorian date.
 *
 * @example
 * isValidCalendarDate(2024, 2, 29) // true (leap year)
 * isValidCalendarDate(2025, 2, 29) // false
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= daysInMonth(year, month);
}

/**
 * Calendar date of `now` in the process's local time zone.
 */
export function localCalendarDate(now: Date): DateSelection {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}

/**
 * Shifts a calendar date by whole days, across month and year boundaries.
 * Arithmetic runs in UTC so DST changes in the local zone cannot skip a day.
 */
export function addDays(date: DateSelection, days: number): DateSelection {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day) + days * MS_PER_DAY);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/**
 * Whether two selections name the same day.
 */
export function isSameDate(a: DateSelection, b: DateSelection): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/**
 * Renders a selection as `YYYY-MM-DD`.
 */
export function toIsoDateString(date: DateSelection): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Midnight UTC at the start of the date, in milliseconds since epoch.
 */
export function utcStartOfDate(date: DateSelection): number {
  return Date.UTC(date.year, date.month - 1, date.day);
}
