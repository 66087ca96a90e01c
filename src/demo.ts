import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { addDays, today } from './dates.js';
import type { Logger } from './log.js';
import { collection } from './model.js';
import { MockProvider } from './providers/mock.js';
import { JsonStore } from './store/jsonStore.js';
import { DEFAULT_CASCADE_TOLERANCE_DAYS } from './sync/cascade.js';
import { Reconciler } from './sync/reconciler.js';
import type { SyncReport } from './sync/report.js';

/**
 * A priority-style mirror between two memory providers, run as a dry run.
 * The state directory is temporary and removed before returning.
 */
export async function runMockDemo(logger: Logger, now: Date = new Date()): Promise<{
  report: SyncReport;
  source: MockProvider;
  mirror: MockProvider;
  stateDir: string;
}> {
  const day = today(now);

  const source = new MockProvider({
    name: 'mockA',
    listsCompleted: false,
    collections: [collection('inbox', 'Inbox', true), collection('home', 'Home')],
    items: [
      { id: 'a1', collectionId: 'inbox', title: 'Pay rent ⭐', notes: '', status: 'open', priority: 4, due: day },
      { id: 'a2', collectionId: 'inbox', title: 'Someday idea', notes: '', status: 'open', priority: 1 },
      {
        id: 'a3',
        collectionId: 'home',
        title: 'Call plumber',
        notes: '',
        status: 'open',
        labels: ['errand'],
        due: addDays(day, 1),
      },
      { id: 'a4', collectionId: 'home', title: 'Renew passport', notes: '', status: 'open', priority: 3, due: addDays(day, 30) },
    ],
  });

  const mirror = new MockProvider({
    name: 'mockB',
    collections: [collection('list-1', 'My Tasks')],
    items: [
      { id: 'b1', collectionId: 'list-1', title: 'Old errand', notes: '', status: 'completed', completedAt: now.toISOString() },
    ],
  });

  const stateDir = await mkdtemp(path.join(os.tmpdir(), 'task-mirror-demo-'));
  const store = new JsonStore(stateDir, 'mock', logger);
  const reconciler = new Reconciler(
    {
      name: 'mock',
      source,
      mirror,
      sourceCollections: [],
      excludedCollections: [],
      target: { kind: 'single', listName: '@default' },
      eligibility: {
        requireDate: true,
        lookaheadDays: 1,
        anyOf: [
          { kind: 'priority', min: 2 },
          { kind: 'labels', names: ['errand'] },
        ],
      },
      notesStyle: 'provenance',
      stripMarkers: true,
      tag: '#mirror',
      compareDue: false,
      cascadeCompletion: true,
      cascadeToleranceDays: DEFAULT_CASCADE_TOLERANCE_DAYS,
    },
    store,
    logger,
    () => now,
  );

  try {
    const report = await reconciler.run({ dryRun: true });
    return { report, source, mirror, stateDir };
  } finally {
    await rm(stateDir, { recursive: true, force: true });
  }
}
