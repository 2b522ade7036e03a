/**
 * Calendar date helpers for `YYYY-MM-DD` strings.
 *
 * All arithmetic happens in UTC so a look-back window never shifts with the
 * host time zone.
 */

import { DateRangeError } from '../errors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse a `YYYY-MM-DD` string into a UTC midnight Date, or null when the
 * string is malformed or names a day that does not exist (2024-02-30).
 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE.test(value)) {
    return null;
  }

  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return formatIsoDate(date) === value ? date : null;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Throws DateRangeError unless both dates are valid and start <= end
 */
export function assertDateRange(startDate: string, endDate: string): void {
  const start = parseIsoDate(startDate);
  if (!start) {
    throw new DateRangeError(`Invalid start date '${startDate}', expected YYYY-MM-DD`, { startDate });
  }

  const end = parseIsoDate(endDate);
  if (!end) {
    throw new DateRangeError(`Invalid end date '${endDate}', expected YYYY-MM-DD`, { endDate });
  }

  if (start.getTime() > end.getTime()) {
    throw new DateRangeError(`Start date ${startDate} is after end date ${endDate}`, {
      startDate,
      endDate,
    });
  }
}

/**
 * Inclusive range test. Keys are compared as strings, which orders
 * zero-padded ISO dates chronologically.
 */
export function isWithinRange(date: string, startDate: string, endDate: string): boolean {
  return date >= startDate && date <= endDate;
}

/**
 * Subtract whole days from a `YYYY-MM-DD` date
 *
 * @example
 * subtractDays('2024-01-07', 7) // '2023-12-31'
 */
export function subtractDays(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  if (!date) {
    throw new DateRangeError(`Invalid date '${isoDate}', expected YYYY-MM-DD`, { date: isoDate });
  }
  if (!Number.isInteger(days) || days < 0) {
    throw new DateRangeError(`Look-back must be a non-negative whole number of days, got ${days}`, {
      days,
    });
  }
  return formatIsoDate(new Date(date.getTime() - days * MS_PER_DAY));
}
