import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { createLogger, type Logger } from '../log.js';
import { errorMessage } from '../errors.js';

export interface PairMeta {
  mirrorCollectionId: string;
  sourceCollectionId?: string;
  linkedAt: string;
}

export interface SyncState {
  /** State schema version. */
  version: 1;
  sourceToMirror: Record<string, string>;
  mirrorToSource: Record<string, string>;
  pairs: Record<string, PairMeta>;
  /** sourceCollectionId -> mirrorCollectionId */
  collectionMapping: Record<string, string>;
  lastSyncAt?: string;
}

const idMap = z.record(z.string(), z.string());

const StateSchema = z.object({
  version: z.literal(1),
  sourceToMirror: idMap.default({}),
  mirrorToSource: idMap.default({}),
  pairs: z
    .record(
      z.string(),
      z.object({
        mirrorCollectionId: z.string(),
        sourceCollectionId: z.string().optional(),
        linkedAt: z.string(),
      }),
    )
    .default({}),
  collectionMapping: idMap.default({}),
  lastSyncAt: z.string().optional(),
});

/** Mapping files written by the earlier single-purpose scripts. */
const LegacySchema = z.object({
  todoist_to_gtasks: idMap.optional(),
  gtasks_to_todoist: idMap.optional(),
  original_to_trmnl: idMap.optional(),
  trmnl_to_original: idMap.optional(),
  project_to_list: idMap.optional(),
  last_sync: z.string().nullish(),
});

type LegacyState = z.infer<typeof LegacySchema>;

export function emptyState(): SyncState {
  return { version: 1, sourceToMirror: {}, mirrorToSource: {}, pairs: {}, collectionMapping: {} };
}

function hasOwn(obj: Record<string, unknown>, key: string) {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

export class JsonStore {
  constructor(
    private dir: string,
    private name = 'state',
    private logger: Logger = createLogger('silent'),
  ) {}

  getDir() {
    return this.dir;
  }

  statePath() {
    return path.join(this.dir, `${this.name}.json`);
  }

  private migrateLegacy(input: LegacyState): SyncState {
    const state = emptyState();
    const linkedAt = new Date().toISOString();
    const forward = { ...input.todoist_to_gtasks, ...input.original_to_trmnl };
    const reverse = { ...input.gtasks_to_todoist, ...input.trmnl_to_original };

    for (const [s, m] of Object.entries(forward)) {
      state.sourceToMirror[s] = m;
      // the old files never recorded which list a mirror lives in
      state.pairs[s] = { mirrorCollectionId: '', linkedAt };
    }
    for (const [m, s] of Object.entries(reverse)) state.mirrorToSource[m] = s;
    state.collectionMapping = { ...input.project_to_list };
    if (input.last_sync) state.lastSyncAt = input.last_sync;
    return state;
  }

  private parse(json: unknown): SyncState | undefined {
    const current = StateSchema.safeParse(json);
    if (current.success) return current.data;

    if (json && typeof json === 'object' && !('version' in json)) {
      const legacy = LegacySchema.safeParse(json);
      if (legacy.success) {
        this.logger.info(`migrating legacy mapping file ${this.statePath()}`);
        return this.migrateLegacy(legacy.data);
      }
    }

    this.logger.warn(`state file ${this.statePath()} failed validation; starting empty`, {
      issues: current.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return undefined;
  }

  async load(): Promise<SyncState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath(), 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return emptyState();
      this.logger.warn(`cannot read state file ${this.statePath()}; starting empty`, errorMessage(e));
      return emptyState();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.logger.warn(`state file ${this.statePath()} is not valid JSON; starting empty`, errorMessage(e));
      return emptyState();
    }

    const state = this.parse(json) ?? emptyState();
    const dropped = this.repair(state);
    if (dropped.length) this.logger.warn(`dropped ${dropped.length} inconsistent mapping entries`, dropped);
    return state;
  }

  /**
   * Reduce the indices to one bijection: a forward entry survives only when
   * its reverse entry agrees. Missing pair metadata is filled in, orphaned
   * metadata removed. Returns a description of every dropped entry.
   */
  repair(state: SyncState): string[] {
    const dropped: string[] = [];

    for (const [s, m] of Object.entries(state.sourceToMirror)) {
      if (state.mirrorToSource[m] !== s) {
        delete state.sourceToMirror[s];
        dropped.push(`sourceToMirror ${s} -> ${m}`);
      }
    }
    for (const [m, s] of Object.entries(state.mirrorToSource)) {
      if (state.sourceToMirror[s] !== m) {
        delete state.mirrorToSource[m];
        dropped.push(`mirrorToSource ${m} -> ${s}`);
      }
    }
    for (const s of Object.keys(state.pairs)) {
      if (!hasOwn(state.sourceToMirror, s)) delete state.pairs[s];
    }
    for (const s of Object.keys(state.sourceToMirror)) {
      state.pairs[s] ??= { mirrorCollectionId: '', linkedAt: new Date().toISOString() };
    }

    const owners = new Map<string, string>();
    for (const [sc, mc] of Object.entries(state.collectionMapping)) {
      const other = owners.get(mc);
      if (other !== undefined) {
        delete state.collectionMapping[sc];
        dropped.push(`collectionMapping ${sc} -> ${mc} (already mapped from ${other})`);
        continue;
      }
      owners.set(mc, sc);
    }

    return dropped;
  }

  private async backupStateFile(): Promise<void> {
    try {
      await stat(this.statePath());
    } catch {
      return;
    }
    await copyFile(this.statePath(), this.statePath() + '.bak');
  }

  async save(state: SyncState): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.backupStateFile();
    const tmp = this.statePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await rename(tmp, this.statePath());
  }

  lookupBySource(state: SyncState, sourceId: string): string | undefined {
    return hasOwn(state.sourceToMirror, sourceId) ? state.sourceToMirror[sourceId] : undefined;
  }

  lookupByMirror(state: SyncState, mirrorId: string): string | undefined {
    return hasOwn(state.mirrorToSource, mirrorId) ? state.mirrorToSource[mirrorId] : undefined;
  }

  pairMeta(state: SyncState, sourceId: string): PairMeta | undefined {
    return state.pairs[sourceId];
  }

  /** Link two ids, dropping whatever either was linked to before. */
  insert(
    state: SyncState,
    sourceId: string,
    mirrorId: string,
    meta: Omit<PairMeta, 'linkedAt'> & { linkedAt?: string },
  ): void {
    this.removeBySource(state, sourceId);
    this.removeByMirror(state, mirrorId);
    state.sourceToMirror[sourceId] = mirrorId;
    state.mirrorToSource[mirrorId] = sourceId;
    state.pairs[sourceId] = { ...meta, linkedAt: meta.linkedAt ?? new Date().toISOString() };
  }

  removeBySource(state: SyncState, sourceId: string): void {
    const mirrorId = this.lookupBySource(state, sourceId);
    if (mirrorId !== undefined) delete state.mirrorToSource[mirrorId];
    delete state.sourceToMirror[sourceId];
    delete state.pairs[sourceId];
  }

  removeByMirror(state: SyncState, mirrorId: string): void {
    const sourceId = this.lookupByMirror(state, mirrorId);
    if (sourceId !== undefined) {
      delete state.sourceToMirror[sourceId];
      delete state.pairs[sourceId];
    }
    delete state.mirrorToSource[mirrorId];
  }

  lookupCollection(state: SyncState, sourceCollectionId: string): string | undefined {
    return hasOwn(state.collectionMapping, sourceCollectionId)
      ? state.collectionMapping[sourceCollectionId]
      : undefined;
  }

  insertCollection(state: SyncState, sourceCollectionId: string, mirrorCollectionId: string): void {
    for (const [sc, mc] of Object.entries(state.collectionMapping)) {
      if (mc === mirrorCollectionId) delete state.collectionMapping[sc];
    }
    state.collectionMapping[sourceCollectionId] = mirrorCollectionId;
  }

  removeCollection(state: SyncState, sourceCollectionId: string): void {
    delete state.collectionMapping[sourceCollectionId];
  }

  /** True when both indices describe the same bijection and `pairs` covers it exactly. */
  checkBijection(state: SyncState): boolean {
    const forward = Object.entries(state.sourceToMirror);
    if (forward.length !== Object.keys(state.mirrorToSource).length) return false;
    if (forward.length !== Object.keys(state.pairs).length) return false;
    return forward.every(([s, m]) => state.mirrorToSource[m] === s && hasOwn(state.pairs, s));
  }
}
