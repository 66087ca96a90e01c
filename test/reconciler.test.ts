import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { existsSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { collection, type Item, type Lookup } from '../src/model.js';
import { createLogger } from '../src/log.js';
import { RemoteTransientError } from '../src/errors.js';
import { MockProvider } from '../src/providers/mock.js';
import type { ListItemsOptions } from '../src/providers/provider.js';
import { JsonStore } from '../src/store/jsonStore.js';
import { Reconciler } from '../src/sync/reconciler.js';
import type { MirrorJob } from '../src/sync/job.js';

const NOW = new Date(2024, 0, 10, 9);
const quiet = createLogger('silent');

function open(id: string, patch: Partial<Item> = {}): Item {
  return { id, collectionId: 'p1', title: id, notes: '', status: 'open', ...patch };
}

function todoist(items: Item[] = []) {
  return new MockProvider({
    name: 'todoist',
    listsCompleted: false,
    collections: [collection('p1', 'Todoist Inbox', true)],
    items,
  });
}

function google(items: Item[] = []) {
  return new MockProvider({ name: 'google', collections: [collection('L1', 'My Tasks')], items });
}

function starredJob(source: MockProvider, mirror: MockProvider, patch: Partial<MirrorJob> = {}): MirrorJob {
  return {
    name: 'test',
    source,
    mirror,
    sourceCollections: [],
    excludedCollections: [],
    target: { kind: 'single', listName: 'My Tasks' },
    eligibility: { requireDate: false, anyOf: [{ kind: 'starred' }] },
    notesStyle: 'source',
    stripMarkers: true,
    tag: '#mirror',
    compareDue: true,
    cascadeCompletion: true,
    cascadeToleranceDays: 1,
    ...patch,
  };
}

function priorityJob(source: MockProvider, mirror: MockProvider): MirrorJob {
  return starredJob(source, mirror, {
    eligibility: {
      requireDate: true,
      lookaheadDays: 1,
      anyOf: [
        { kind: 'priority', min: 2 },
        { kind: 'labels', names: ['mirror'] },
      ],
    },
    notesStyle: 'provenance',
    compareDue: false,
  });
}

async function setup(job: MirrorJob) {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'task-mirror-'));
  const store = new JsonStore(dir, job.name);
  return { store, reconciler: new Reconciler(job, store, quiet, () => NOW) };
}

describe('Reconciler', () => {
  it('mirrors a starred item without its marker', async () => {
    const source = todoist([open('s1', { title: 'Pay rent ⭐' })]);
    const mirror = google();
    const { store, reconciler } = await setup(starredJob(source, mirror));

    const report = await reconciler.run();

    expect(mirror.calls).toEqual([
      { op: 'insertItem', collectionId: 'L1', id: 'google-1', draft: { title: 'Pay rent', notes: '' } },
    ]);
    expect(report.counts).toMatchObject({ create: 1, delete: 0 });
    const state = await store.load();
    expect(state.sourceToMirror).toEqual({ s1: 'google-1' });
    expect(state.pairs.s1).toMatchObject({ mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    expect(state.lastSyncAt).toBe(NOW.toISOString());
  });

  it('makes no calls on a second run without changes', async () => {
    const source = todoist([open('s1', { title: 'Pay rent ⭐', due: '2024-01-10' })]);
    const mirror = google();
    const { reconciler } = await setup(starredJob(source, mirror));

    await reconciler.run();
    const second = await reconciler.run();

    expect(mirror.calls).toHaveLength(1);
    expect(source.calls).toHaveLength(0);
    expect(second.counts).toMatchObject({ create: 0, update: 0, delete: 0, noop: 1 });
  });

  it('writes provenance notes and substitutes the deadline for a missing due date', async () => {
    const source = todoist([
      open('s1', { title: 'File taxes', priority: 4, due: '2024-01-10', deadline: '2024-01-15' }),
      open('s2', { title: 'Renew ID', priority: 4, deadline: '2024-01-11' }),
      open('s3', { title: 'Later', priority: 4, due: '2024-01-20' }),
      open('s4', { title: 'Low', priority: 1, due: '2024-01-10' }),
    ]);
    const mirror = google();
    const { reconciler } = await setup(priorityJob(source, mirror));

    await reconciler.run();

    expect(mirror.calls).toEqual([
      {
        op: 'insertItem',
        collectionId: 'L1',
        id: 'google-1',
        draft: {
          title: 'File taxes',
          notes: 'Synced from Todoist\nOriginal ID: s1\nDeadline: 2024-01-15',
          due: '2024-01-10',
        },
      },
      {
        op: 'insertItem',
        collectionId: 'L1',
        id: 'google-2',
        draft: { title: 'Renew ID', notes: 'Synced from Todoist\nOriginal ID: s2', due: '2024-01-11' },
      },
    ]);
  });

  it('updates a mirror whose source changed', async () => {
    const source = todoist([open('s1', { title: 'New title ⭐', due: '2024-01-11' })]);
    const mirror = google([{ id: 'g1', collectionId: 'L1', title: 'Old', notes: '', status: 'open' }]);
    const { store, reconciler } = await setup(starredJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(mirror.calls).toEqual([
      { op: 'updateItem', collectionId: 'L1', id: 'g1', draft: { title: 'New title', notes: '', due: '2024-01-11' } },
    ]);
    expect(report.actions[0]?.detail).toBe('changed: title, due');
  });

  it('completes the source and removes the mirror when the mirror is completed', async () => {
    const source = todoist([open('s1', { title: 'Pay rent', priority: 4, due: '2024-01-10' })]);
    const mirror = google([
      {
        id: 'g1',
        collectionId: 'L1',
        title: 'Pay rent',
        notes: 'Synced from Todoist\nOriginal ID: s1',
        status: 'completed',
        due: '2024-01-10T00:00:00.000Z',
      },
    ]);
    const { store, reconciler } = await setup(priorityJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    await reconciler.run();

    expect(source.calls).toEqual([{ op: 'completeItem', collectionId: 'p1', id: 's1' }]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect((await store.load()).sourceToMirror).toEqual({});

    await reconciler.run();
    expect(source.calls).toHaveLength(1);
    expect(mirror.calls).toHaveLength(1);
  });

  it('leaves the source open when it is due well after the completed mirror', async () => {
    const source = todoist([open('s1', { title: 'Water plants', priority: 4, due: '2024-01-12' })]);
    const mirror = google([
      { id: 'g1', collectionId: 'L1', title: 'Water plants', notes: '', status: 'completed', due: '2024-01-09' },
    ]);
    const { store, reconciler } = await setup(priorityJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(source.calls).toEqual([]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect(report.counts.complete).toBe(0);
  });

  it('deletes mapped completed mirrors without completing the source when the job does not cascade', async () => {
    const source = todoist([open('s1', { title: 'Read ⭐' })]);
    const mirror = google([{ id: 'g1', collectionId: 'L1', title: 'Read', notes: '', status: 'completed' }]);
    const { store, reconciler } = await setup(starredJob(source, mirror, { cascadeCompletion: false }));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    await reconciler.run();

    expect(source.calls).toEqual([]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect((await store.load()).sourceToMirror).toEqual({});

    await reconciler.run();
    expect(mirror.calls[1]).toEqual({
      op: 'insertItem',
      collectionId: 'L1',
      id: 'google-1',
      draft: { title: 'Read', notes: '' },
    });
  });

  it('keeps the completed mirror and its pair when completing the source fails', async () => {
    class FlakySource extends MockProvider {
      failures = 1;
      override async completeItem(collectionId: string, itemId: string): Promise<void> {
        if (this.failures > 0) {
          this.failures -= 1;
          throw new RemoteTransientError('HTTP 503', 503);
        }
        return super.completeItem(collectionId, itemId);
      }
    }
    const source = new FlakySource({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Todoist Inbox', true)],
      items: [open('s1', { title: 'Pay rent', priority: 4, due: '2024-01-10' })],
    });
    const mirror = google([
      { id: 'g1', collectionId: 'L1', title: 'Pay rent', notes: '', status: 'completed', due: '2024-01-10T00:00:00.000Z' },
    ]);
    const { store, reconciler } = await setup(priorityJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const first = await reconciler.run();

    expect(first.errors).toEqual([{ stage: 'write', id: 's1', error: 'HTTP 503' }]);
    expect(mirror.calls).toEqual([]);
    expect(source.peek('s1')?.status).toBe('open');
    expect((await store.load()).sourceToMirror).toEqual({ s1: 'g1' });

    await reconciler.run();

    expect(source.calls).toEqual([{ op: 'completeItem', collectionId: 'p1', id: 's1' }]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect((await store.load()).sourceToMirror).toEqual({});
  });

  it('completes the source anyway when it cannot be read', async () => {
    class UnreadableSource extends MockProvider {
      override async getItem(_collectionId: string, _itemId: string): Promise<Lookup<Item>> {
        throw new RemoteTransientError('HTTP 502', 502);
      }
    }
    const source = new UnreadableSource({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Todoist Inbox', true)],
      items: [open('s1', { title: 'Water plants', priority: 4, due: '2024-01-12' })],
    });
    const mirror = google([
      { id: 'g1', collectionId: 'L1', title: 'Water plants', notes: '', status: 'completed', due: '2024-01-09' },
    ]);
    const { store, reconciler } = await setup(priorityJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(source.calls).toEqual([{ op: 'completeItem', collectionId: 'p1', id: 's1' }]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect(report.errors).toEqual([]);
    expect((await store.load()).sourceToMirror).toEqual({});
  });

  it('deletes the completed mirror of a source that no longer exists', async () => {
    const source = todoist([open('s1', { title: 'Pay rent', priority: 4, due: '2024-01-10' })]);
    source.remove('s1');
    const mirror = google([
      { id: 'g1', collectionId: 'L1', title: 'Pay rent', notes: '', status: 'completed', due: '2024-01-10' },
    ]);
    const { store, reconciler } = await setup(priorityJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(source.calls).toEqual([]);
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect(report.counts.complete).toBe(0);
    expect((await store.load()).sourceToMirror).toEqual({});
  });

  it('deletes unmapped completed items from per-project lists too', async () => {
    const source = new MockProvider({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Work')],
    });
    const mirror = new MockProvider({
      name: 'google',
      collections: [collection('L1', 'Work')],
      items: [
        { id: 'g9', collectionId: 'L1', title: 'Done', notes: '', status: 'completed' },
        { id: 'g8', collectionId: 'L1', title: 'Mine', notes: '', status: 'open' },
      ],
    });
    const job = starredJob(source, mirror, {
      target: { kind: 'per-collection' },
      eligibility: { requireDate: false, anyOf: [] },
      cascadeCompletion: false,
    });
    const { reconciler } = await setup(job);

    await reconciler.run();
    await reconciler.run();

    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g9' }]);
    expect(mirror.peek('g8')).toBeDefined();
  });

  it('deletes unmapped completed mirror items on every cycle until they are gone', async () => {
    class FlakyMirror extends MockProvider {
      failures = 1;
      override async deleteItem(collectionId: string, itemId: string): Promise<void> {
        if (this.failures > 0) {
          this.failures -= 1;
          throw new RemoteTransientError('HTTP 503', 503);
        }
        return super.deleteItem(collectionId, itemId);
      }
    }
    const mirror = new FlakyMirror({
      name: 'google',
      collections: [collection('L1', 'My Tasks')],
      items: [
        { id: 'g9', collectionId: 'L1', title: 'Done', notes: '', status: 'completed' },
        { id: 'g8', collectionId: 'L1', title: 'Mine', notes: '', status: 'open' },
      ],
    });
    const { reconciler } = await setup(starredJob(todoist(), mirror));

    const first = await reconciler.run();
    expect(first.errors).toEqual([{ stage: 'write', id: 'g9', error: 'HTTP 503' }]);
    expect(mirror.peek('g9')).toBeDefined();

    await reconciler.run();
    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g9' }]);
    expect(mirror.peek('g8')).toBeDefined();
  });

  it('recreates a mirror that was deleted remotely', async () => {
    const source = todoist([open('s1', { title: 'Pay rent ⭐' })]);
    const mirror = google();
    const { store, reconciler } = await setup(starredJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g-gone', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(mirror.calls).toEqual([
      { op: 'insertItem', collectionId: 'L1', id: 'google-1', draft: { title: 'Pay rent', notes: '' } },
    ]);
    expect(report.actions[0]?.detail).toBe('mirror missing, recreated');
    expect((await store.load()).sourceToMirror).toEqual({ s1: 'google-1' });
  });

  it('deletes the mirror of an item that is no longer eligible', async () => {
    const source = todoist([open('s1', { title: 'Pay rent' })]);
    const mirror = google([{ id: 'g1', collectionId: 'L1', title: 'Pay rent', notes: '', status: 'open' }]);
    const { store, reconciler } = await setup(starredJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    await reconciler.run();

    expect(mirror.calls).toEqual([{ op: 'deleteItem', collectionId: 'L1', id: 'g1' }]);
    expect((await store.load()).sourceToMirror).toEqual({});
  });

  it('keeps pairs whose source collection could not be read', async () => {
    class BrokenSource extends MockProvider {
      override async listItems(_collectionId: string, _opts: ListItemsOptions): Promise<Item[]> {
        throw new RemoteTransientError('HTTP 500', 500);
      }
    }
    const source = new BrokenSource({ name: 'todoist', collections: [collection('p1', 'Inbox', true)] });
    const mirror = google([{ id: 'g1', collectionId: 'L1', title: 'Pay rent', notes: '', status: 'open' }]);
    const { store, reconciler } = await setup(starredJob(source, mirror));
    const state = await store.load();
    store.insert(state, 's1', 'g1', { mirrorCollectionId: 'L1', sourceCollectionId: 'p1' });
    await store.save(state);

    const report = await reconciler.run();

    expect(report.errors).toEqual([{ stage: 'enumerate', id: 'p1', error: 'HTTP 500' }]);
    expect(mirror.calls).toEqual([]);
    expect((await store.load()).sourceToMirror).toEqual({ s1: 'g1' });
  });

  it('recreates a deleted per-project list and its items', async () => {
    const source = new MockProvider({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Work')],
      items: [
        open('s1', {
          title: 'Standup ⭐',
          notes: 'desc',
          due: '2024-01-11',
          recurrence: { recurring: true, source: 'every! 3 days' },
        }),
      ],
    });
    const mirror = google();
    const job = starredJob(source, mirror, {
      target: { kind: 'per-collection' },
      eligibility: { requireDate: false, anyOf: [] },
      notesStyle: 'recurrence',
      stripMarkers: false,
      cascadeCompletion: false,
    });
    const { store, reconciler } = await setup(job);
    const state = await store.load();
    store.insertCollection(state, 'p1', 'L-gone');
    store.insert(state, 's1', 'g-old', { mirrorCollectionId: 'L-gone', sourceCollectionId: 'p1' });
    await store.save(state);

    await reconciler.run();

    expect(mirror.calls).toEqual([
      { op: 'createCollection', name: 'Work', id: 'google-1' },
      {
        op: 'insertItem',
        collectionId: 'google-1',
        id: 'google-2',
        draft: { title: 'Standup ⭐', notes: 'every! 3 days\n\ndesc', due: '2024-01-11' },
      },
    ]);
    const after = await store.load();
    expect(after.collectionMapping).toEqual({ p1: 'google-1' });
    expect(after.sourceToMirror).toEqual({ s1: 'google-2' });
  });

  it('reuses an existing list with the project name', async () => {
    const source = new MockProvider({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Work')],
      items: [open('s1', { title: 'Standup' })],
    });
    const mirror = new MockProvider({ name: 'google', collections: [collection('W', 'Work')] });
    const job = starredJob(source, mirror, {
      target: { kind: 'per-collection' },
      eligibility: { requireDate: false, anyOf: [] },
    });
    const { store, reconciler } = await setup(job);

    await reconciler.run();

    expect(mirror.calls).toEqual([
      { op: 'insertItem', collectionId: 'W', id: 'google-1', draft: { title: 'Standup', notes: '' } },
    ]);
    expect((await store.load()).collectionMapping).toEqual({ p1: 'W' });
  });

  it('never scans the target list when source and mirror are the same service', async () => {
    const gtasks = new MockProvider({
      name: 'google',
      collections: [collection('L1', 'Personal'), collection('T', 'TRMNL')],
      items: [
        { id: 'a', collectionId: 'L1', title: 'Dentist ⭐', notes: '', status: 'open' },
        { id: 'b', collectionId: 'T', title: 'Manual ⭐', notes: '', status: 'open' },
      ],
    });
    const { reconciler } = await setup(
      starredJob(gtasks, gtasks, {
        target: { kind: 'single', listName: 'TRMNL' },
        eligibility: { requireDate: false, anyOf: [{ kind: 'starred' }, { kind: 'tagged', tag: '#mirror' }] },
      }),
    );

    await reconciler.run();
    await reconciler.run();

    expect(gtasks.calls).toEqual([
      { op: 'insertItem', collectionId: 'T', id: 'google-1', draft: { title: 'Dentist', notes: '' } },
    ]);
  });

  it('stops mutating after the limit and picks up the rest next run', async () => {
    const source = todoist([open('s1', { title: 'A ⭐' }), open('s2', { title: 'B ⭐' }), open('s3', { title: 'C ⭐' })]);
    const mirror = google();
    const { reconciler } = await setup(starredJob(source, mirror));

    const first = await reconciler.run({ dryRun: false, limit: 2 });
    expect(first.counts).toMatchObject({ create: 2, skipped: 1 });
    expect(mirror.calls).toHaveLength(2);

    await reconciler.run();
    expect(mirror.calls).toHaveLength(3);
    expect(mirror.calls[2]).toMatchObject({ op: 'insertItem', draft: { title: 'C' } });
  });

  it('makes no mutating calls and saves nothing in dry-run', async () => {
    const source = todoist([open('s1', { title: 'Pay rent ⭐' })]);
    const mirror = google([{ id: 'g9', collectionId: 'L1', title: 'Done', notes: '', status: 'completed' }]);
    const { store, reconciler } = await setup(starredJob(source, mirror));

    const report = await reconciler.run({ dryRun: true });

    expect(mirror.calls).toEqual([]);
    expect(source.calls).toEqual([]);
    expect(report.dryRun).toBe(true);
    expect(report.counts).toMatchObject({ create: 1, delete: 1 });
    expect(report.actions.every((a) => !a.executed)).toBe(true);
    expect(existsSync(store.statePath())).toBe(false);
  });

  it('plans list creation with a placeholder id in dry-run', async () => {
    const source = new MockProvider({
      name: 'todoist',
      listsCompleted: false,
      collections: [collection('p1', 'Work')],
      items: [open('s1', { title: 'Standup' })],
    });
    const mirror = google();
    const job = starredJob(source, mirror, {
      target: { kind: 'per-collection' },
      eligibility: { requireDate: false, anyOf: [] },
    });
    const { reconciler } = await setup(job);

    const report = await reconciler.run({ dryRun: true });

    expect(mirror.calls).toEqual([]);
    expect(report.actions).toEqual([
      {
        kind: 'create',
        executed: false,
        source: { service: 'todoist', id: 's1' },
        target: { service: 'google', collectionId: 'dry-run:p1' },
        title: 'Standup',
        detail: 'new eligible item',
      },
    ]);
  });
});
