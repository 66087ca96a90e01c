import type { Item } from '../model.js';
import type { Logger } from '../log.js';
import type { JsonStore, SyncState } from '../store/jsonStore.js';
import type { MirrorJob } from './job.js';
import type { Cycle } from './report.js';
import { daysBetween, tryCalendarDay } from '../dates.js';
import { errorMessage, ignoreNotFound } from '../errors.js';

export const DEFAULT_CASCADE_TOLERANCE_DAYS = 1;

/**
 * Whether completing a mirror item should complete its source.
 *
 * A source due more than `toleranceDays` after the mirror's due date is most
 * likely the next occurrence of a recurring task and is left open. Missing or
 * unparseable dates cascade.
 */
export function shouldCascadeCompletion(
  mirrorDue: string | undefined,
  sourceDue: string | undefined,
  toleranceDays = DEFAULT_CASCADE_TOLERANCE_DAYS,
): boolean {
  if (!mirrorDue) return true;
  const mirrorDay = tryCalendarDay(mirrorDue);
  const sourceDay = tryCalendarDay(sourceDue);
  if (!mirrorDay || !sourceDay) return true;
  return daysBetween(mirrorDay, sourceDay) <= toleranceDays;
}

export interface CascadeResult {
  /** Mirror ids the cascade dealt with; the forward pass and sweep leave them alone. */
  handled: Set<string>;
  /** Sources whose pair the cascade removed; not mirrored again until the next cycle. */
  held: Set<string>;
}

type SourceCompletion = 'completed' | 'declined' | 'pending';

/**
 * Handles completed mirror items before the forward pass: completes the
 * source where the job asks for it, then deletes the mirror item and its pair.
 * A source completion that fails or runs out of budget keeps both, so the
 * next cycle tries again.
 */
export class CompletionCascade {
  constructor(
    private store: JsonStore,
    private logger: Logger,
  ) {}

  async run(job: MirrorJob, state: SyncState, cycle: Cycle, mirrorItems: Item[]): Promise<CascadeResult> {
    const result: CascadeResult = { handled: new Set(), held: new Set() };

    for (const m of mirrorItems) {
      if (m.status !== 'completed') continue;

      const sourceId = this.store.lookupByMirror(state, m.id);
      if (sourceId === undefined) {
        if (await this.deleteMirror(job, cycle, m, 'completed, not mapped')) result.handled.add(m.id);
        continue;
      }
      result.handled.add(m.id);

      const completion = job.cascadeCompletion ? await this.completeSource(job, state, cycle, m, sourceId) : 'declined';
      if (completion === 'pending') continue;

      if (!(await this.deleteMirror(job, cycle, m, 'completed on mirror'))) continue;
      if (!cycle.dryRun) {
        this.store.removeByMirror(state, m.id);
        result.held.add(sourceId);
      }
    }

    return result;
  }

  private async completeSource(
    job: MirrorJob,
    state: SyncState,
    cycle: Cycle,
    m: Item,
    sourceId: string,
  ): Promise<SourceCompletion> {
    let collectionId = this.store.pairMeta(state, sourceId)?.sourceCollectionId ?? '';
    let cascade: boolean;

    try {
      const source = await job.source.getItem(collectionId, sourceId);
      if (!source.found) {
        this.logger.debug(`source ${sourceId} is gone; nothing to complete`);
        cascade = false;
      } else if (source.value.status === 'completed') {
        cascade = false;
      } else {
        collectionId = source.value.collectionId;
        const sourceDue = source.value.due ?? source.value.deadline;
        cascade = shouldCascadeCompletion(m.due, sourceDue, job.cascadeToleranceDays);
        if (!cascade) {
          this.logger.info(`not completing "${source.value.title}": source due ${sourceDue} is past mirror due ${m.due}`);
        }
      }
    } catch (e) {
      this.logger.warn(`cannot check source ${sourceId}; completing anyway`, errorMessage(e));
      cascade = true;
    }

    if (!cascade) return 'declined';
    const outcome = await cycle.mutate(
      'complete',
      {
        source: { service: job.mirror.name, id: m.id },
        target: { service: job.source.name, collectionId, id: sourceId },
        title: m.title,
        detail: 'mirror item completed',
      },
      () => job.source.completeItem(collectionId, sourceId),
    );
    return outcome.status === 'done' || outcome.status === 'planned' ? 'completed' : 'pending';
  }

  private async deleteMirror(job: MirrorJob, cycle: Cycle, m: Item, detail: string): Promise<boolean> {
    const outcome = await cycle.mutate(
      'delete',
      { target: { service: job.mirror.name, collectionId: m.collectionId, id: m.id }, title: m.title, detail },
      () => ignoreNotFound(job.mirror.deleteItem(m.collectionId, m.id)),
    );
    return outcome.status === 'done' || outcome.status === 'planned';
  }
}
