import type { Item } from '../model.js';
import { daysBetween, today, tryCalendarDay } from '../dates.js';
import { isStarred, isTagged } from '../directives.js';

export type Criterion =
  | { kind: 'priority'; min: number }
  | { kind: 'labels'; names: string[] }
  | { kind: 'starred' }
  | { kind: 'tagged'; tag: string }
  | { kind: 'all' };

export interface EligibilityRule {
  /** Item needs a due date or a deadline. */
  requireDate: boolean;
  /** Items due more than this many days ahead are left out. */
  lookaheadDays?: number;
  /** At least one must hold; an empty list admits everything. */
  anyOf: Criterion[];
}

export type Verdict = { eligible: true } | { eligible: false; reason: string };

const yes: Verdict = { eligible: true };

export function matches(item: Item, criterion: Criterion): boolean {
  switch (criterion.kind) {
    case 'priority':
      return (item.priority ?? 1) >= criterion.min;
    case 'labels': {
      const wanted = new Set(criterion.names);
      return (item.labels ?? []).some((l) => wanted.has(l));
    }
    case 'starred':
      return isStarred(item.title, item.notes);
    case 'tagged':
      return isTagged(item.notes, criterion.tag);
    case 'all':
      return true;
  }
}

export function classify(item: Item, rule: EligibilityRule, now: Date = new Date()): Verdict {
  const when = item.due ?? item.deadline;

  if (rule.requireDate && !when) return { eligible: false, reason: 'no due date or deadline' };

  if (rule.lookaheadDays !== undefined && when) {
    const day = tryCalendarDay(when);
    // unparseable dates stay eligible
    if (day) {
      const ahead = daysBetween(today(now), day);
      if (ahead > rule.lookaheadDays) return { eligible: false, reason: `due in ${ahead} days` };
    }
  }

  if (rule.anyOf.length && !rule.anyOf.some((c) => matches(item, c))) {
    return { eligible: false, reason: 'no criterion matched' };
  }
  return yes;
}
