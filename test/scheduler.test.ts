import { describe, expect, it } from 'vitest';
import { createLogger } from '../src/log.js';
import { Cycle, type CycleOptions, type SyncReport } from '../src/sync/report.js';
import { Scheduler, type RunnableJob } from '../src/sync/scheduler.js';

const quiet = createLogger('silent');

function job(name: string, body: (opts: CycleOptions) => void = () => {}): RunnableJob & { runs: CycleOptions[] } {
  const runs: CycleOptions[] = [];
  return {
    name,
    runs,
    async run(opts) {
      runs.push(opts);
      body(opts);
      return new Cycle(name, opts, quiet).finish(undefined, '2024-01-10T00:00:00.000Z');
    },
  };
}

describe('Scheduler', () => {
  it('runs every job in order and keeps going past a failing one', async () => {
    const seen: string[] = [];
    const a = job('a');
    const broken = job('broken', () => {
      throw new Error('boom');
    });
    const c = job('c');
    const scheduler = new Scheduler([a, broken, c], quiet, {
      dryRun: true,
      limit: 5,
      onReport: (r: SyncReport) => seen.push(r.job),
    });

    const reports = await scheduler.runOnce();

    expect(reports.map((r) => r.job)).toEqual(['a', 'c']);
    expect(seen).toEqual(['a', 'c']);
    expect(a.runs).toEqual([{ dryRun: true, limit: 5 }]);
    expect(broken.runs).toHaveLength(1);
    expect(scheduler.state).toBe('idle');
  });

  it('is running while a cycle is in progress', async () => {
    let observed = '';
    const scheduler: Scheduler = new Scheduler(
      [
        job('a', () => {
          observed = scheduler.state;
        }),
      ],
      quiet,
    );

    await scheduler.runOnce();

    expect(observed).toBe('running');
  });

  it('loops until aborted and then terminates', async () => {
    const controller = new AbortController();
    const a = job('a', () => {
      if (a.runs.length === 3) controller.abort();
    });
    const scheduler = new Scheduler([a], quiet);

    await scheduler.runForever(0, controller.signal);

    expect(a.runs).toHaveLength(3);
    expect(scheduler.state).toBe('terminated');
    await expect(scheduler.runOnce()).rejects.toThrow('scheduler is terminated');
  });

  it('wakes from the sleep when aborted', async () => {
    const controller = new AbortController();
    const a = job('a', () => {
      setTimeout(() => controller.abort(), 5);
    });
    const scheduler = new Scheduler([a], quiet);

    await scheduler.runForever(60, controller.signal);

    expect(a.runs).toHaveLength(1);
    expect(scheduler.state).toBe('terminated');
  });
});
