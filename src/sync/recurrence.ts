import type { Collection, Item } from '../model.js';
import type { Logger } from '../log.js';
import type { TaskProvider } from '../providers/provider.js';
import {
  DEFAULT_FALLBACK_DAYS,
  DEFAULT_RECURRENCE_UNITS,
  findRecurrenceDirective,
  parseRecurrence,
  type RecurrenceUnits,
} from '../directives.js';
import { addDays, tryCalendarDay } from '../dates.js';
import { ignoreNotFound } from '../errors.js';
import { Cycle, type CycleOptions, type SyncReport } from './report.js';

export interface RecurrenceJob {
  name: string;
  provider: TaskProvider;
  /** List names to scan; empty scans every list. */
  lists: string[];
  units?: RecurrenceUnits;
  fallbackDays?: number;
}

/**
 * Next due date for a task completed at `completedAt` that repeats every
 * `intervalDays`: the completion's calendar day (UTC) plus the interval.
 */
export function nextDue(completedAt: string, intervalDays: number): string | undefined {
  const day = tryCalendarDay(completedAt);
  return day ? addDays(day, intervalDays) : undefined;
}

/**
 * Repeat-after-completion for services without it: a completed task whose
 * notes carry "every! <interval>" is recreated with a new due date, then the
 * completed one is deleted.
 */
export class RecurrenceRunner {
  constructor(
    private job: RecurrenceJob,
    private logger: Logger,
    private clock: () => Date = () => new Date(),
  ) {}

  get name() {
    return this.job.name;
  }

  async run(opts: CycleOptions = { dryRun: false }): Promise<SyncReport> {
    const cycle = new Cycle(this.job.name, opts, this.logger);
    const startedAt = this.clock().toISOString();

    let lists: Collection[];
    try {
      lists = this.select(await this.job.provider.listCollections());
    } catch (e) {
      cycle.fail('collections', e);
      return cycle.finish(undefined, startedAt);
    }

    for (const list of lists) {
      let items: Item[];
      try {
        items = await this.job.provider.listItems(list.id, { includeCompleted: true });
      } catch (e) {
        cycle.fail('enumerate', e, list.id);
        continue;
      }
      const open = items.filter((i) => i.status === 'open');
      for (const item of items) {
        if (item.status === 'completed') await this.recur(cycle, item, open);
      }
    }

    const report = cycle.finish(undefined, startedAt);
    this.logger.info(`cycle done`, report.counts);
    return report;
  }

  private select(all: Collection[]): Collection[] {
    const { lists } = this.job;
    if (!lists.length) return all;
    for (const name of lists) {
      if (!all.some((c) => c.name === name)) this.logger.warn(`list "${name}" not found`);
    }
    return all.filter((c) => lists.includes(c.name));
  }

  /** `open` holds the list's open items; a next occurrence already among them is not created again. */
  private async recur(cycle: Cycle, item: Item, open: Item[]) {
    const { provider } = this.job;
    const directive = findRecurrenceDirective(item.notes);
    if (directive === undefined) return;

    const interval = parseRecurrence(directive, {
      units: this.job.units ?? DEFAULT_RECURRENCE_UNITS,
      fallbackDays: this.job.fallbackDays ?? DEFAULT_FALLBACK_DAYS,
    });
    if (interval === undefined) return;

    if (!item.completedAt) {
      this.logger.warn(`completed task "${item.title}" has no completion time; skipping`);
      return;
    }
    const due = nextDue(item.completedAt, interval);
    if (!due) {
      this.logger.warn(`completed task "${item.title}" has an unreadable completion time; skipping`, item.completedAt);
      return;
    }

    const action = {
      source: { service: provider.name, id: item.id },
      target: { service: provider.name, collectionId: item.collectionId },
      title: item.title,
    };
    const existing = open.find(
      (o) =>
        o.title === item.title && findRecurrenceDirective(o.notes) === directive && tryCalendarDay(o.due) === due,
    );
    if (existing) {
      // left over from a cycle whose delete failed
      cycle.noop({ ...action, target: { ...action.target, id: existing.id }, detail: `next occurrence due ${due} exists` });
    } else {
      const created = await cycle.mutate('create', { ...action, detail: `${directive} -> due ${due}` }, () =>
        provider.insertItem(item.collectionId, { title: item.title, notes: item.notes, due }),
      );
      if (created.status !== 'done' && created.status !== 'planned') return;
    }

    await cycle.mutate(
      'delete',
      {
        target: { service: provider.name, collectionId: item.collectionId, id: item.id },
        title: item.title,
        detail: 'completed occurrence',
      },
      () => ignoreNotFound(provider.deleteItem(item.collectionId, item.id)),
    );
  }
}
