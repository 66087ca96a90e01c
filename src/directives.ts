/**
 * Directives embedded in task text.
 *
 * - Recurrence: "every 3 days", "weekly", "every monday", "every 15th", ...
 *   resolved to a fixed interval in days (months and years are NOT calendar
 *   accurate: 30 and 365 by default).
 * - Star: title or notes ending in ⭐ or *.
 * - Tag: a whole-word tag token (default "#mirror") anywhere in the notes.
 *
 * Everything here is pure text work.
 */

export interface RecurrenceUnits {
  day: number;
  week: number;
  month: number;
  year: number;
}

export const DEFAULT_RECURRENCE_UNITS: RecurrenceUnits = { day: 1, week: 7, month: 30, year: 365 };

/** Interval used when text is recurring but no pattern matches. */
export const DEFAULT_FALLBACK_DAYS = 7;

export const DEFAULT_TAG = '#mirror';

export interface RecurrenceOptions {
  /** The service already flagged the item as recurring (Todoist is_recurring). */
  recurring?: boolean;
  units?: RecurrenceUnits;
  fallbackDays?: number;
}

const WEEKDAYS = 'monday|tuesday|wednesday|thursday|friday|saturday|sunday';

const NUMERIC = /\bevery\s+(\d+)\s+(day|week|month|year)s?\b/;
const ORDINAL_DAY = /\bevery\s+\d+(?:st|nd|rd|th)\b/;
const WEEKDAY = new RegExp(`\\bevery\\s+(?:${WEEKDAYS})s?\\b`);
const SIGNALS_RECURRENCE = /\bevery\b/;

export function parseRecurrence(text: string, opts: RecurrenceOptions = {}): number | undefined {
  const units = opts.units ?? DEFAULT_RECURRENCE_UNITS;
  // "every!" (repeat after completion) counts as "every"
  const s = text.toLowerCase().replace(/every!/g, 'every');

  const numeric = NUMERIC.exec(s);
  if (numeric) {
    const n = Number(numeric[1]);
    if (n > 0) return n * unitDays(numeric[2], units);
  }

  if (/\bevery\s+day\b|\bdaily\b/.test(s)) return units.day;
  if (/\bevery\s+week\b|\bweekly\b/.test(s) || WEEKDAY.test(s)) return units.week;
  if (/\bevery\s+month\b|\bmonthly\b/.test(s) || ORDINAL_DAY.test(s)) return units.month;
  if (/\bevery\s+year\b|\byearly\b|\bannually\b/.test(s)) return units.year;

  if (opts.recurring || SIGNALS_RECURRENCE.test(s)) return opts.fallbackDays ?? DEFAULT_FALLBACK_DAYS;
  return undefined;
}

function unitDays(unit: string | undefined, units: RecurrenceUnits): number {
  switch (unit) {
    case 'week':
      return units.week;
    case 'month':
      return units.month;
    case 'year':
      return units.year;
    default:
      return units.day;
  }
}

/**
 * The repeat-after-completion directive in a notes field: the text from
 * "every!" to the end of its line, or undefined.
 */
export function findRecurrenceDirective(notes: string): string | undefined {
  const m = /every!\s*[^\n]*/i.exec(notes);
  return m ? m[0].trim() : undefined;
}

export function parseRecurrenceDirective(notes: string, opts: RecurrenceOptions = {}): number | undefined {
  const directive = findRecurrenceDirective(notes);
  return directive === undefined ? undefined : parseRecurrence(directive, opts);
}

const STAR_AT_END = /(?:\u2B50\uFE0F?|\*)$/u;

export function isStarred(title: string, notes: string): boolean {
  return STAR_AT_END.test(title.trimEnd()) || STAR_AT_END.test(notes.trimEnd());
}

export function stripStarMarker(text: string): string {
  return untilStable(text, (s) => collapse(s.replace(/\u2B50\uFE0F?/gu, '').replace(/[\s*]+$/, '')));
}

function escapeRegExp(s: string) {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function tagPattern(tag: string, flags: string) {
  return new RegExp(`(?<![\\p{L}\\p{N}_#@])${escapeRegExp(tag)}(?![\\p{L}\\p{N}_])`, flags);
}

export function isTagged(notes: string, tag: string = DEFAULT_TAG): boolean {
  return tagPattern(tag, 'iu').test(notes);
}

export function stripTag(text: string, tag: string = DEFAULT_TAG): string {
  const re = tagPattern(tag, 'giu');
  return untilStable(text, (s) => collapse(s.replace(re, '')));
}

/** Strip star and tag markers; the result carries neither. */
export function stripMarkers(text: string, tag: string = DEFAULT_TAG): string {
  return untilStable(text, (s) => stripTag(stripStarMarker(s), tag));
}

/** Single spaces inside each line, no leading/trailing whitespace. Newlines survive. */
function collapse(s: string): string {
  return s
    .split('\n')
    .map((line) => line.replace(/[ \t\r\f\v]+/g, ' ').trim())
    .join('\n')
    .trim();
}

function untilStable(input: string, step: (s: string) => string): string {
  let prev = input;
  let next = step(prev);
  while (next !== prev) {
    prev = next;
    next = step(prev);
  }
  return next;
}
