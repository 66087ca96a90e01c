import type { ServiceName } from '../model.js';
import type { Logger } from '../log.js';
import { errorMessage } from '../errors.js';

export type MutationKind = 'create' | 'update' | 'delete' | 'complete';

export type SyncActionKind = MutationKind | 'noop' | 'skipped';

export interface SyncAction {
  kind: SyncActionKind;
  executed: boolean;
  source?: { service: ServiceName; id: string };
  target: { service: ServiceName; collectionId: string; id?: string };
  title?: string;
  detail: string;
}

export type SyncStage = 'collections' | 'cascade' | 'enumerate' | 'write' | 'sweep' | 'persist';

export interface SyncError {
  stage: SyncStage;
  id?: string;
  error: string;
}

export interface SyncReport {
  job: string;
  dryRun: boolean;
  lastSyncAt?: string;
  newLastSyncAt: string;
  counts: Record<SyncActionKind, number>;
  actions: SyncAction[];
  errors: SyncError[];
  durationMs: number;
}

export type Outcome<T> =
  | { status: 'done'; value: T }
  | { status: 'planned' }
  | { status: 'skipped' }
  | { status: 'failed'; error: unknown };

export interface CycleOptions {
  dryRun: boolean;
  /** Stop issuing mutating operations after this many. */
  limit?: number;
}

/**
 * Accumulates one job cycle's report and gates every mutating call through
 * the dry-run flag and the operation budget.
 */
export class Cycle {
  readonly actions: SyncAction[] = [];
  readonly errors: SyncError[] = [];
  readonly counts: Record<SyncActionKind, number> = {
    create: 0,
    update: 0,
    delete: 0,
    complete: 0,
    noop: 0,
    skipped: 0,
  };

  private spent = 0;
  private readonly started = Date.now();

  constructor(
    readonly job: string,
    readonly opts: CycleOptions,
    private logger: Logger,
  ) {}

  get dryRun() {
    return this.opts.dryRun;
  }

  budgetLeft(): boolean {
    return this.opts.limit === undefined || this.spent < this.opts.limit;
  }

  record(action: Omit<SyncAction, 'executed'>, executed = false) {
    this.actions.push({ ...action, executed });
    this.counts[action.kind] += 1;
  }

  noop(action: Omit<SyncAction, 'executed' | 'kind'>) {
    this.record({ ...action, kind: 'noop' });
  }

  fail(stage: SyncStage, error: unknown, id?: string) {
    const message = errorMessage(error);
    this.errors.push({ stage, id, error: message });
    this.logger.error(`${stage} failed${id ? ` for ${id}` : ''}`, message);
  }

  /** Run a mutating call unless dry-run or out of budget. Failures are recorded, never thrown. */
  async mutate<T>(
    kind: MutationKind,
    action: Omit<SyncAction, 'executed' | 'kind'>,
    run: () => Promise<T>,
  ): Promise<Outcome<T>> {
    const label = `${kind} ${action.target.service}:${action.target.collectionId}${action.target.id ? `/${action.target.id}` : ''}${action.title ? ` "${action.title}"` : ''}`;

    if (!this.budgetLeft()) {
      this.record({ ...action, kind: 'skipped', detail: `limit reached: ${action.detail}` });
      this.logger.debug(`limit reached, skipping ${label}`);
      return { status: 'skipped' };
    }
    this.spent += 1;

    if (this.dryRun) {
      this.record({ ...action, kind });
      this.logger.info(`[dry-run] would ${label}: ${action.detail}`);
      return { status: 'planned' };
    }

    try {
      const value = await run();
      this.record({ ...action, kind }, true);
      this.logger.info(`${label}: ${action.detail}`);
      return { status: 'done', value };
    } catch (error) {
      this.fail('write', error, action.target.id ?? action.source?.id);
      return { status: 'failed', error };
    }
  }

  finish(lastSyncAt: string | undefined, newLastSyncAt: string): SyncReport {
    return {
      job: this.job,
      dryRun: this.dryRun,
      lastSyncAt,
      newLastSyncAt,
      counts: { ...this.counts },
      actions: [...this.actions],
      errors: [...this.errors],
      durationMs: Date.now() - this.started,
    };
  }
}
