/**
 * Calendar helpers for YYYY-MM-DD date keys (UTC)
 */

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isDateKey(value: string): boolean {
  const match = value.match(DATE_KEY);
  if (!match) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return toDateKey(date) === value;
}

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseDateKey(key: string): Date {
  return new Date(`${key}T00:00:00.000Z`);
}

export function addDays(key: string, days: number): string {
  return toDateKey(new Date(parseDateKey(key).getTime() + days * DAY_MS));
}

/**
 * Whole days between two date keys, always >= 0
 */
export function daysApart(a: string, b: string): number {
  return Math.abs(Math.round((parseDateKey(a).getTime() - parseDateKey(b).getTime()) / DAY_MS));
}

/**
 * ISO-8601 week key, e.g. "2026-W03"
 */
export function isoWeekKey(key: string): string {
  const date = parseDateKey(key);
  // Thursday of the same ISO week decides the year
  const weekday = date.getUTCDay() || 7;
  const thursday = new Date(date.getTime() + (4 - weekday) * DAY_MS);
  const yearStart = Date.UTC(thursday.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((thursday.getTime() - yearStart) / DAY_MS + 1) / 7);
  return `${thursday.getUTCFullYear()}-W${String(week).padStart(2, '0')}`;
}
