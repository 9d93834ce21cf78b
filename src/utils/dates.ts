/**
 * Calendar helpers
 *
 * Billing dates are YYYY-MM-DD strings in UTC. Timestamps are Unix ms.
 */

import { ValidationError } from './errors';

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Start of the given date (00:00:00.000 UTC) */
export function startOfDay(date: string): number {
  const match = DATE_PATTERN.exec(date);
  if (!match) {
    throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  if (toDateString(ms) !== date) {
    throw new ValidationError(`Invalid date "${date}"`);
  }
  return ms;
}

/** Last millisecond of the given date (23:59:59.999 UTC) */
export function endOfDay(date: string): number {
  return startOfDay(date) + MS_PER_DAY - 1;
}

export function toDateString(ms: number): string {
  return new Date(ms).toISOString().split('T')[0];
}

export function addDays(date: string, days: number): string {
  return toDateString(startOfDay(date) + days * MS_PER_DAY);
}

export function isValidDate(date: string): boolean {
  try {
    startOfDay(date);
    return true;
  } catch {
    return false;
  }
}

/** YYYY-MM-DD strings compare correctly as strings */
export function maxDate(a: string, b: string): string {
  return a > b ? a : b;
}
