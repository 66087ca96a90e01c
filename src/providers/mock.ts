import { collection, found, notFound, type Collection, type Item, type ItemDraft, type Lookup, type ServiceName } from '../model.js';
import { RemoteNotFoundError } from '../errors.js';
import type { ListItemsOptions, TaskProvider } from './provider.js';

export type MockCall =
  | { op: 'createCollection'; name: string; id: string }
  | { op: 'insertItem'; collectionId: string; id: string; draft: ItemDraft }
  | { op: 'updateItem'; collectionId: string; id: string; draft: ItemDraft }
  | { op: 'deleteItem'; collectionId: string; id: string }
  | { op: 'completeItem'; collectionId: string; id: string };

export interface MockProviderOptions {
  name?: ServiceName;
  collections?: Collection[];
  items?: Item[];
  /** Services like Todoist never list completed items. */
  listsCompleted?: boolean;
}

/**
 * In-memory provider for local dev and tests.
 *
 * Every mutating call is recorded in `calls`; ids are sequential
 * (`<name>-<n>`) so tests can predict them.
 */
export class MockProvider implements TaskProvider {
  readonly name: ServiceName;
  readonly calls: MockCall[] = [];

  private collections = new Map<string, Collection>();
  private items = new Map<string, Item>();
  private seq = 0;
  private listsCompleted: boolean;

  constructor(opts: MockProviderOptions = {}) {
    this.name = opts.name ?? 'mockA';
    this.listsCompleted = opts.listsCompleted ?? true;
    for (const c of opts.collections ?? []) this.collections.set(c.id, c);
    for (const i of opts.items ?? []) this.items.set(i.id, { ...i });
  }

  private nextId() {
    this.seq += 1;
    return `${this.name}-${this.seq}`;
  }

  /** Current state of an item, for assertions. */
  peek(id: string): Item | undefined {
    return this.items.get(id);
  }

  /** Items of one collection regardless of status. */
  all(collectionId: string): Item[] {
    return [...this.items.values()].filter((i) => i.collectionId === collectionId);
  }

  /** Change an item outside the engine, as a user would. */
  edit(id: string, patch: Partial<Omit<Item, 'id'>>): void {
    const existing = this.items.get(id);
    if (!existing) throw new RemoteNotFoundError('item', id);
    this.items.set(id, { ...existing, ...patch });
  }

  /** Delete outside the engine (not recorded). */
  remove(id: string): void {
    this.items.delete(id);
  }

  removeCollection(id: string): void {
    this.collections.delete(id);
    for (const item of this.all(id)) this.items.delete(item.id);
  }

  async listCollections(): Promise<Collection[]> {
    return [...this.collections.values()];
  }

  async getCollection(id: string): Promise<Lookup<Collection>> {
    const c = this.collections.get(id);
    return c ? found(c) : notFound;
  }

  async createCollection(name: string): Promise<Collection> {
    const c = collection(this.nextId(), name);
    this.collections.set(c.id, c);
    this.calls.push({ op: 'createCollection', name, id: c.id });
    return c;
  }

  async listItems(collectionId: string, opts: ListItemsOptions): Promise<Item[]> {
    if (!this.collections.has(collectionId)) throw new RemoteNotFoundError('collection', collectionId);
    const includeCompleted = opts.includeCompleted && this.listsCompleted;
    return this.all(collectionId)
      .filter((i) => includeCompleted || i.status === 'open')
      .map((i) => ({ ...i }));
  }

  async getItem(collectionId: string, itemId: string): Promise<Lookup<Item>> {
    const i = this.items.get(itemId);
    return i && i.collectionId === collectionId ? found({ ...i }) : notFound;
  }

  async insertItem(collectionId: string, draft: ItemDraft): Promise<Item> {
    if (!this.collections.has(collectionId)) throw new RemoteNotFoundError('collection', collectionId);
    const item: Item = {
      id: this.nextId(),
      collectionId,
      title: draft.title,
      notes: draft.notes,
      status: draft.status ?? 'open',
      updatedAt: new Date().toISOString(),
    };
    if (draft.due) item.due = draft.due;
    this.items.set(item.id, item);
    this.calls.push({ op: 'insertItem', collectionId, id: item.id, draft });
    return { ...item };
  }

  private require(collectionId: string, itemId: string): Item {
    const i = this.items.get(itemId);
    if (!i || i.collectionId !== collectionId) throw new RemoteNotFoundError('item', itemId);
    return i;
  }

  async updateItem(collectionId: string, itemId: string, draft: ItemDraft): Promise<void> {
    const existing = this.require(collectionId, itemId);
    const next: Item = { ...existing, title: draft.title, notes: draft.notes, updatedAt: new Date().toISOString() };
    if (draft.due === null) delete next.due;
    else if (draft.due !== undefined) next.due = draft.due;
    if (draft.status) next.status = draft.status;
    this.items.set(itemId, next);
    this.calls.push({ op: 'updateItem', collectionId, id: itemId, draft });
  }

  async deleteItem(collectionId: string, itemId: string): Promise<void> {
    this.require(collectionId, itemId);
    this.items.delete(itemId);
    this.calls.push({ op: 'deleteItem', collectionId, id: itemId });
  }

  async completeItem(collectionId: string, itemId: string): Promise<void> {
    const existing = this.require(collectionId, itemId);
    const now = new Date().toISOString();
    this.items.set(itemId, { ...existing, status: 'completed', completedAt: now, updatedAt: now });
    this.calls.push({ op: 'completeItem', collectionId, id: itemId });
  }
}
