import { Logger } from '@nestjs/common';
import { DateRange } from '../analytics';

const logger = new Logger('DateUtils');

/**
 * Date utilities, including demo mode support.
 *
 * When the DEMO_DATE environment variable is set, getCurrentDate() returns
 * that instant instead of the real clock, so a warehouse snapshot from a
 * past month can be served as "current".
 *
 * Example: DEMO_DATE="2025-09-15T12:00:00Z"
 */
export function getCurrentDate(): Date {
  const demoDate = process.env.DEMO_DATE;
  if (demoDate) {
    const parsed = new Date(demoDate);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
    logger.warn(`Invalid DEMO_DATE: ${demoDate}, using real time`);
  }
  return new Date();
}

/**
 * Full UTC calendar month before the month containing `reference`.
 *
 * @example
 * previousCalendarMonth(new Date('2025-03-10T08:00:00Z'))
 * // { start: 2025-02-01T00:00:00.000Z, end: 2025-02-28T23:59:59.999Z }
 */
export function previousCalendarMonth(reference: Date): DateRange {
  const year = reference.getUTCFullYear();
  const month = reference.getUTCMonth();
  return {
    start: new Date(Date.UTC(year, month - 1, 1, 0, 0, 0, 0)),
    // Day 0 of the current month is the last day of the previous one
    end: new Date(Date.UTC(year, month, 0, 23, 59, 59, 999)),
  };
}

/**
 * 'YYYY-MM' in UTC.
 */
export function formatMonth(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/**
 * 'YYYY-MM-DD' in UTC.
 */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
