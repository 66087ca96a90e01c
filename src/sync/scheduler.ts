import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../log.js';
import { errorMessage } from '../errors.js';
import type { CycleOptions, SyncReport } from './report.js';

export interface RunnableJob {
  readonly name: string;
  run(opts: CycleOptions): Promise<SyncReport>;
}

export type SchedulerState = 'idle' | 'running' | 'terminated';

export interface SchedulerOptions extends CycleOptions {
  /** Called with every finished job report. */
  onReport?: (report: SyncReport) => void;
}

/** Runs every job once per cycle, in order; one job failing never stops the others. */
export class Scheduler {
  private current: SchedulerState = 'idle';

  constructor(
    private jobs: RunnableJob[],
    private logger: Logger,
    private opts: SchedulerOptions = { dryRun: false },
  ) {}

  get state(): SchedulerState {
    return this.current;
  }

  async runOnce(): Promise<SyncReport[]> {
    if (this.current === 'terminated') throw new Error('scheduler is terminated');
    this.current = 'running';
    const reports: SyncReport[] = [];

    try {
      for (const job of this.jobs) {
        this.logger.info(`job ${job.name} start`, { dryRun: this.opts.dryRun });
        try {
          const report = await job.run({ dryRun: this.opts.dryRun, limit: this.opts.limit });
          reports.push(report);
          this.opts.onReport?.(report);
        } catch (e) {
          this.logger.error(`job ${job.name} failed`, errorMessage(e));
        }
      }
    } finally {
      this.current = 'idle';
    }

    return reports;
  }

  /** Loop until `signal` aborts; an abort ends the sleep, never a running cycle. */
  async runForever(intervalMinutes: number, signal: AbortSignal): Promise<void> {
    const waitMs = Math.max(0, intervalMinutes) * 60_000;
    let cycles = 0;

    while (!signal.aborted) {
      cycles++;
      try {
        await this.runOnce();
      } catch (e) {
        this.logger.error(`cycle ${cycles} failed`, errorMessage(e));
      }
      if (signal.aborted) break;

      this.logger.info(`sleeping ${intervalMinutes}m`);
      try {
        await sleep(waitMs, undefined, { signal });
      } catch (e) {
        if (!signal.aborted) throw e;
      }
    }

    this.current = 'terminated';
    this.logger.info(`stopped after ${cycles} cycle(s)`);
  }
}
