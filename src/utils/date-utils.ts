/**
 * Date helpers shared by the guardrail engine and the phase state machine.
 */

export const MS_PER_DAY = 86400 * 1000;
export const MS_PER_HOUR = 3600 * 1000;

/**
 * Whole days elapsed between an ISO timestamp and `now` (floored).
 * Returns null when there is no timestamp. An unparseable timestamp counts
 * as 0 days elapsed, so it trips "changed too recently" throttles.
 */
export function daysSince(timestamp: string | null | undefined, now: Date): number | null {
  if (timestamp === null || timestamp === undefined || timestamp === '') {
    return null;
  }
  const parsed = Date.parse(timestamp);
  if (Number.isNaN(parsed)) {
    return 0;
  }
  return Math.floor((now.getTime() - parsed) / MS_PER_DAY);
}

/**
 * Whole calendar days between two dates, compared at UTC midnight.
 */
export function utcDaysBetween(start: Date, end: Date): number {
  const startUtc = Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate());
  const endUtc = Date.UTC(end.getUTCFullYear(), end.getUTCMonth(), end.getUTCDate());
  return Math.round((endUtc - startUtc) / MS_PER_DAY);
}

/**
 * UTC midnight of a YYYY-MM-DD date, or null when the string is not a real
 * calendar date.
 */
export function parseCalendarDate(value: string): Date | null {
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    return null;
  }
  return date;
}

export function addHours(now: Date, hours: number): Date {
  return new Date(now.getTime() + hours * MS_PER_HOUR);
}

/**
 * Round a dollar amount to cents.
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
