/**
 * Date helpers for bar and fiscal-period handling
 */

import { differenceInCalendarDays, format, isValid, parseISO, subYears } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date | null {
  const parsed = parseISO(dateStr);
  return isValid(parsed) ? parsed : null;
}

export function isValidDateString(dateStr: string): boolean {
  return parseDate(dateStr) !== null;
}

/** Lexicographic comparison is exact for yyyy-MM-dd strings. */
export function compareDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Calendar days from `from` to `to`; `null` if either date is invalid. */
export function daysBetween(from: string, to: string): number | null {
  const start = parseDate(from);
  const end = parseDate(to);
  if (!start || !end) return null;
  return differenceInCalendarDays(end, start);
}

export function yearsBefore(dateStr: string, years: number): string {
  const parsed = parseDate(dateStr);
  if (!parsed) {
    throw new Error(`Invalid date: ${dateStr}`);
  }
  return formatDate(subYears(parsed, years));
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}
