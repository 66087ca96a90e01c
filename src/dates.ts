import { ParseError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})T/;

/**
 * Calendar day of an ISO date or date-time, as YYYY-MM-DD.
 *
 * Date-times with an offset are converted to UTC first; naive date-times
 * (Todoist floating times) keep their written date.
 */
export function calendarDay(iso: string): string {
  const s = iso.trim();
  if (DATE_ONLY.test(s)) {
    assertValidDay(s, iso);
    return s;
  }

  const m = DATE_PREFIX.exec(s);
  if (!m) throw new ParseError(`not an ISO date: ${iso}`, iso);

  const hasOffset = /(?:[zZ]|[+-]\d\d:?\d\d)$/.test(s);
  if (!hasOffset) {
    const day = `${m[1]}-${m[2]}-${m[3]}`;
    assertValidDay(day, iso);
    return day;
  }

  const ms = Date.parse(s);
  if (!Number.isFinite(ms)) throw new ParseError(`not an ISO date: ${iso}`, iso);
  return new Date(ms).toISOString().slice(0, 10);
}

/** calendarDay, or undefined when the input is missing or unparseable. */
export function tryCalendarDay(iso?: string): string | undefined {
  if (!iso) return undefined;
  try {
    return calendarDay(iso);
  } catch {
    return undefined;
  }
}

function assertValidDay(day: string, input: string) {
  const ms = Date.parse(`${day}T00:00:00.000Z`);
  if (!Number.isFinite(ms) || new Date(ms).toISOString().slice(0, 10) !== day) {
    throw new ParseError(`invalid calendar date: ${input}`, input);
  }
}

/** Whole calendar days from `from` to `to` (both YYYY-MM-DD). */
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from}T00:00:00.000Z`);
  const b = Date.parse(`${to}T00:00:00.000Z`);
  return Math.round((b - a) / DAY_MS);
}

export function addDays(day: string, days: number): string {
  const ms = Date.parse(`${day}T00:00:00.000Z`) + days * DAY_MS;
  return new Date(ms).toISOString().slice(0, 10);
}

/** Local calendar day of `now`. */
export function today(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
