import { SERVICE_LABELS, type Collection, type Item, type ItemDraft } from '../model.js';
import type { Logger } from '../log.js';
import type { JsonStore, SyncState } from '../store/jsonStore.js';
import { acquireLock } from '../store/lock.js';
import { stripMarkers } from '../directives.js';
import { tryCalendarDay } from '../dates.js';
import { errorMessage, ignoreNotFound } from '../errors.js';
import { classify } from './eligibility.js';
import { CompletionCascade } from './cascade.js';
import { Cycle, type CycleOptions, type SyncReport } from './report.js';
import type { MirrorJob } from './job.js';

const DRY_RUN_PREFIX = 'dry-run:';

function sameDue(a: string | null | undefined, b: string | null | undefined): boolean {
  if (!a || !b) return !a && !b;
  const da = tryCalendarDay(a);
  const db = tryCalendarDay(b);
  return da && db ? da === db : a === b;
}

/** Per-cycle working set. */
interface Pass {
  state: SyncState;
  cycle: Cycle;
  /** sourceCollectionId -> mirrorCollectionId */
  targets: Map<string, string>;
  /** Mirror collections whose items were listed. */
  listed: Set<string>;
  mirrorItems: Map<string, Item>;
  /** Mirror ids the cascade dealt with this cycle. */
  handled: Set<string>;
  /** Sources whose pair the cascade removed this cycle. */
  held: Set<string>;
  /** Source collections that could not be read or resolved this cycle. */
  failedSources: Set<string>;
  eligible: Set<string>;
}

/**
 * One-directional mirror: converges the mirror service to the eligible
 * items of the source service for one job.
 */
export class Reconciler {
  private cascade: CompletionCascade;

  constructor(
    private job: MirrorJob,
    private store: JsonStore,
    private logger: Logger,
    private clock: () => Date = () => new Date(),
  ) {
    this.cascade = new CompletionCascade(store, logger);
  }

  get name() {
    return this.job.name;
  }

  async run(opts: CycleOptions = { dryRun: false }): Promise<SyncReport> {
    const cycle = new Cycle(this.job.name, opts, this.logger);
    const lock = opts.dryRun ? undefined : await acquireLock(this.store.getDir(), this.job.name);

    try {
      const state = await this.store.load();
      const lastSyncAt = state.lastSyncAt;
      const newLastSyncAt = this.clock().toISOString();

      await this.reconcile(state, cycle);

      if (!opts.dryRun) {
        state.lastSyncAt = newLastSyncAt;
        try {
          await this.store.save(state);
        } catch (e) {
          this.logger.error(`saving state for ${this.job.name} failed`, errorMessage(e));
          throw e;
        }
      }

      const report = cycle.finish(lastSyncAt, newLastSyncAt);
      this.logger.info(`cycle done`, report.counts);
      return report;
    } finally {
      await lock?.release();
    }
  }

  private async reconcile(state: SyncState, cycle: Cycle): Promise<void> {
    const { job } = this;

    let sourceCollections: Collection[];
    let mirrorCollections: Collection[];
    try {
      sourceCollections = this.selectSources(await job.source.listCollections());
      mirrorCollections = await job.mirror.listCollections();
    } catch (e) {
      cycle.fail('collections', e);
      return;
    }

    const pass: Pass = {
      state,
      cycle,
      targets: new Map(),
      listed: new Set(),
      mirrorItems: new Map(),
      handled: new Set(),
      held: new Set(),
      failedSources: new Set(),
      eligible: new Set(),
    };

    await this.resolveTargets(pass, sourceCollections, mirrorCollections);
    if (job.source.name === job.mirror.name) {
      const targetIds = new Set(pass.targets.values());
      sourceCollections = sourceCollections.filter((c) => !targetIds.has(c.id));
    }

    await this.listMirror(pass);
    const cascaded = await this.cascade.run(job, state, cycle, [...pass.mirrorItems.values()]);
    pass.handled = cascaded.handled;
    pass.held = cascaded.held;
    for (const id of pass.handled) pass.mirrorItems.delete(id);

    const now = this.clock();
    for (const sc of sourceCollections) {
      const targetId = pass.targets.get(sc.id);
      if (targetId === undefined || pass.failedSources.has(sc.id)) continue;

      let items: Item[];
      try {
        items = await job.source.listItems(sc.id, { includeCompleted: false });
      } catch (e) {
        cycle.fail('enumerate', e, sc.id);
        pass.failedSources.add(sc.id);
        continue;
      }

      for (const item of items) {
        if (item.status !== 'open') continue;
        const verdict = classify(item, job.eligibility, now);
        if (!verdict.eligible) {
          this.logger.debug(`skip "${item.title}": ${verdict.reason}`);
          continue;
        }
        pass.eligible.add(item.id);
        if (pass.held.has(item.id)) continue;
        await this.forward(pass, item, targetId);
      }
    }

    await this.sweep(pass);
  }

  private selectSources(all: Collection[]): Collection[] {
    const { sourceCollections: wanted, excludedCollections: excluded } = this.job;
    const names = new Set(all.map((c) => c.name));
    for (const w of wanted) {
      if (!names.has(w)) this.logger.warn(`source collection "${w}" not found`);
    }
    return all.filter((c) => (!wanted.length || wanted.includes(c.name)) && !excluded.includes(c.name));
  }

  private async resolveTargets(pass: Pass, sources: Collection[], mirrorCollections: Collection[]) {
    const { target } = this.job;

    if (target.kind === 'single') {
      const id = await this.resolveSingle(pass, target.listName, mirrorCollections);
      for (const sc of sources) {
        if (id === undefined) pass.failedSources.add(sc.id);
        else pass.targets.set(sc.id, id);
      }
      return;
    }

    for (const sc of sources) {
      const id = await this.resolvePerCollection(pass, sc, mirrorCollections);
      if (id === undefined) pass.failedSources.add(sc.id);
      else pass.targets.set(sc.id, id);
    }
  }

  private async resolveSingle(pass: Pass, listName: string, mirrorCollections: Collection[]) {
    const hit = listName === '@default' ? mirrorCollections[0] : mirrorCollections.find((c) => c.name === listName);
    if (hit) return hit.id;

    if (listName === '@default') {
      pass.cycle.fail('collections', new Error(`${this.job.mirror.name} has no lists`));
      return undefined;
    }
    return this.createCollection(pass, listName, listName);
  }

  private async resolvePerCollection(pass: Pass, sc: Collection, mirrorCollections: Collection[]) {
    const { state } = pass;
    const mapped = this.store.lookupCollection(state, sc.id);

    if (mapped !== undefined) {
      if (mirrorCollections.some((c) => c.id === mapped)) return mapped;
      try {
        const look = await this.job.mirror.getCollection(mapped);
        if (look.found) return mapped;
      } catch (e) {
        pass.cycle.fail('collections', e, mapped);
        return undefined;
      }
      this.logger.info(`list ${mapped} for "${sc.name}" no longer exists`);
      this.store.removeCollection(state, sc.id);
    }

    const taken = new Set(Object.values(state.collectionMapping));
    const byName = mirrorCollections.find((c) => c.name === sc.name && !taken.has(c.id));
    if (byName) {
      this.store.insertCollection(state, sc.id, byName.id);
      return byName.id;
    }

    const created = await this.createCollection(pass, sc.name, sc.id);
    if (created !== undefined && !created.startsWith(DRY_RUN_PREFIX)) {
      this.store.insertCollection(state, sc.id, created);
      mirrorCollections.push({ kind: 'real', id: created, name: sc.name });
    }
    return created;
  }

  private async createCollection(pass: Pass, name: string, placeholderKey: string): Promise<string | undefined> {
    if (pass.cycle.dryRun) {
      this.logger.info(`[dry-run] would create list "${name}"`);
      return `${DRY_RUN_PREFIX}${placeholderKey}`;
    }
    try {
      const c = await this.job.mirror.createCollection(name);
      this.logger.info(`created list "${name}"`, { id: c.id });
      return c.id;
    } catch (e) {
      pass.cycle.fail('collections', e, name);
      return undefined;
    }
  }

  private async listMirror(pass: Pass) {
    for (const id of new Set(pass.targets.values())) {
      if (id.startsWith(DRY_RUN_PREFIX)) continue;
      try {
        const items = await this.job.mirror.listItems(id, { includeCompleted: true });
        for (const item of items) pass.mirrorItems.set(item.id, item);
        pass.listed.add(id);
      } catch (e) {
        pass.cycle.fail('enumerate', e, id);
        for (const [sc, mc] of pass.targets) {
          if (mc === id) pass.failedSources.add(sc);
        }
      }
    }
  }

  notesFor(item: Item): string {
    switch (this.job.notesStyle) {
      case 'provenance': {
        const lines = [`Synced from ${SERVICE_LABELS[this.job.source.name]}`, `Original ID: ${item.id}`];
        if (item.due && item.deadline) lines.push(`Deadline: ${item.deadline}`);
        return lines.join('\n');
      }
      case 'source':
        return this.job.stripMarkers ? stripMarkers(item.notes, this.job.tag) : item.notes;
      case 'recurrence': {
        const rule = item.recurrence?.recurring ? item.recurrence.source : undefined;
        return [rule, item.notes].filter((p): p is string => !!p?.trim()).join('\n\n');
      }
    }
  }

  draftFor(item: Item): ItemDraft {
    const title = this.job.stripMarkers ? stripMarkers(item.title, this.job.tag) : item.title;
    const draft: ItemDraft = { title, notes: this.notesFor(item) };
    const due = item.due ?? item.deadline;
    if (due) draft.due = due;
    return draft;
  }

  private async forward(pass: Pass, item: Item, targetId: string) {
    const { job, store } = this;
    const { state, cycle } = pass;
    const draft = this.draftFor(item);
    const mirrorId = store.lookupBySource(state, item.id);

    if (mirrorId !== undefined) {
      if (pass.handled.has(mirrorId)) return;

      let mirror = pass.mirrorItems.get(mirrorId);
      if (!mirror) {
        const collectionId = store.pairMeta(state, item.id)?.mirrorCollectionId || targetId;
        if (!collectionId.startsWith(DRY_RUN_PREFIX)) {
          try {
            const look = await job.mirror.getItem(collectionId, mirrorId);
            if (look.found) mirror = look.value;
          } catch (e) {
            cycle.fail('write', e, item.id);
            return;
          }
        }
      }

      if (mirror) {
        const meta = store.pairMeta(state, item.id);
        if (meta && (!meta.sourceCollectionId || !meta.mirrorCollectionId)) {
          meta.sourceCollectionId = item.collectionId;
          meta.mirrorCollectionId = mirror.collectionId;
        }
        await this.updateIfChanged(pass, item, mirror, draft);
        return;
      }
      this.logger.info(`mirror of "${draft.title}" is gone; recreating`, { mirrorId });
    }

    const outcome = await cycle.mutate(
      'create',
      {
        source: { service: job.source.name, id: item.id },
        target: { service: job.mirror.name, collectionId: targetId },
        title: draft.title,
        detail: mirrorId === undefined ? 'new eligible item' : 'mirror missing, recreated',
      },
      () => job.mirror.insertItem(targetId, draft),
    );
    if (outcome.status === 'done') {
      store.insert(state, item.id, outcome.value.id, {
        mirrorCollectionId: targetId,
        sourceCollectionId: item.collectionId,
      });
    }
  }

  private async updateIfChanged(pass: Pass, item: Item, mirror: Item, draft: ItemDraft) {
    const { job } = this;
    const changed: string[] = [];
    if (mirror.title !== draft.title) changed.push('title');
    if (mirror.notes !== draft.notes) changed.push('notes');
    if (job.compareDue && !sameDue(mirror.due, draft.due)) changed.push('due');

    const action = {
      source: { service: job.source.name, id: item.id },
      target: { service: job.mirror.name, collectionId: mirror.collectionId, id: mirror.id },
      title: draft.title,
    };

    if (!changed.length) {
      pass.cycle.noop({ ...action, detail: 'up to date' });
      return;
    }

    const update: ItemDraft = { title: draft.title, notes: draft.notes };
    if (job.compareDue) update.due = draft.due ?? null;
    await pass.cycle.mutate('update', { ...action, detail: `changed: ${changed.join(', ')}` }, () =>
      job.mirror.updateItem(mirror.collectionId, mirror.id, update),
    );
  }

  /** Remove mirrors whose source left the eligible set, and pairs whose mirror is gone. */
  private async sweep(pass: Pass) {
    const { job, store } = this;
    const { state, cycle } = pass;
    const singleTarget = job.target.kind === 'single' ? [...pass.targets.values()][0] : undefined;

    for (const [sourceId, mirrorId] of Object.entries(state.sourceToMirror)) {
      if (pass.eligible.has(sourceId) || pass.handled.has(mirrorId)) continue;

      const meta = store.pairMeta(state, sourceId);
      if (pass.failedSources.size && (!meta?.sourceCollectionId || pass.failedSources.has(meta.sourceCollectionId))) {
        // its source collection was not read this cycle
        continue;
      }

      const mirror = pass.mirrorItems.get(mirrorId);
      const collectionId = mirror?.collectionId ?? (meta?.mirrorCollectionId || singleTarget);
      if (!collectionId || (!mirror && pass.listed.has(collectionId))) {
        this.logger.debug(`mirror ${mirrorId} no longer exists; dropping pair`);
        if (!cycle.dryRun) store.removeBySource(state, sourceId);
        continue;
      }

      const outcome = await cycle.mutate(
        'delete',
        {
          source: { service: job.source.name, id: sourceId },
          target: { service: job.mirror.name, collectionId, id: mirrorId },
          title: mirror?.title,
          detail: 'source no longer eligible',
        },
        () => ignoreNotFound(job.mirror.deleteItem(collectionId, mirrorId)),
      );
      if (outcome.status === 'done') store.removeBySource(state, sourceId);
    }
  }
}
