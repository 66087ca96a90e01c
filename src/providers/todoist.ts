import { collection, found, notFound, type Collection, type Item, type ItemDraft, type Lookup } from '../model.js';
import { logRetries, type ListItemsOptions, type TaskProvider } from './provider.js';
import type { Logger } from '../log.js';
import { requestJson, requestJsonBody, type FetchLike, type JsonRequestOptions } from '../http.js';
import { isNotFound, toRemoteError } from '../errors.js';

export interface TodoistProviderOptions {
  /** Personal API token */
  token: string;
  /** Name given to the inbox project when it is mirrored */
  inboxName?: string;
  /** Request-per-second cap */
  rps?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  /** Receives retry warnings */
  logger?: Logger;
}

interface TodoistProject {
  id: string;
  name: string;
  inbox_project?: boolean;
  is_archived?: boolean;
}

interface TodoistDue {
  /** YYYY-MM-DD, or a date-time for timed tasks */
  date: string;
  /** Older API shape keeps the timed value separately */
  datetime?: string | null;
  string?: string;
  is_recurring?: boolean;
}

interface TodoistTask {
  id: string;
  project_id: string;
  content: string;
  description?: string;
  priority?: number;
  labels?: string[];
  due?: TodoistDue | null;
  deadline?: { date: string } | null;
  checked?: boolean;
  completed_at?: string | null;
  updated_at?: string | null;
}

interface TodoistPage<T> {
  results: T[];
  next_cursor?: string | null;
}

interface TodoistTaskPayload {
  content: string;
  description: string;
  project_id?: string;
  due_date?: string;
  due_datetime?: string;
  due_string?: string;
}

const API_BASE = 'https://api.todoist.com/api/v1';

export const DEFAULT_INBOX_NAME = 'Todoist Inbox';

function toItem(t: TodoistTask): Item {
  const item: Item = {
    id: t.id,
    collectionId: t.project_id,
    title: t.content,
    notes: t.description ?? '',
    status: t.checked ? 'completed' : 'open',
    priority: t.priority,
    labels: t.labels ?? [],
  };
  if (t.due) {
    item.due = t.due.datetime ?? t.due.date;
    item.recurrence = { recurring: !!t.due.is_recurring, source: t.due.string };
  }
  if (t.deadline?.date) item.deadline = t.deadline.date;
  if (t.completed_at) item.completedAt = t.completed_at;
  if (t.updated_at) item.updatedAt = t.updated_at;
  return item;
}

function toPayload(draft: ItemDraft, projectId?: string): TodoistTaskPayload {
  const payload: TodoistTaskPayload = { content: draft.title, description: draft.notes };
  if (projectId) payload.project_id = projectId;
  if (draft.due === null) payload.due_string = 'no date';
  else if (draft.due !== undefined) {
    if (/^\d{4}-\d{2}-\d{2}$/.test(draft.due)) payload.due_date = draft.due;
    else payload.due_datetime = draft.due;
  }
  return payload;
}

export class TodoistProvider implements TaskProvider {
  readonly name = 'todoist' as const;

  private fetcher: FetchLike;
  private inboxName: string;

  constructor(private opts: TodoistProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.inboxName = opts.inboxName ?? DEFAULT_INBOX_NAME;
  }

  private request(path: string, init: JsonRequestOptions = {}) {
    const opts: JsonRequestOptions = {
      rps: this.opts.rps,
      onRetry: logRetries(this.opts.logger),
      ...init,
      headers: { authorization: `Bearer ${this.opts.token}`, ...(init.headers ?? {}) },
    };
    return { url: `${API_BASE}${path}`, opts };
  }

  private async api<T>(path: string, init?: JsonRequestOptions): Promise<T> {
    const { url, opts } = this.request(path, init);
    return requestJsonBody<T>(url, opts, this.fetcher);
  }

  private async apiVoid(path: string, init?: JsonRequestOptions): Promise<void> {
    const { url, opts } = this.request(path, init);
    await requestJson<unknown>(url, opts, this.fetcher);
  }

  private async paginate<T>(path: string, query: JsonRequestOptions['query'] = {}): Promise<T[]> {
    const out: T[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.api<TodoistPage<T>>(path, { query: { limit: 200, ...query, cursor } });
      out.push(...page.results);
      cursor = page.next_cursor ?? undefined;
    } while (cursor);
    return out;
  }

  private toCollection(p: TodoistProject): Collection {
    return collection(p.id, p.inbox_project ? this.inboxName : p.name, !!p.inbox_project);
  }

  async listCollections(): Promise<Collection[]> {
    try {
      const projects = await this.paginate<TodoistProject>('/projects');
      return projects.filter((p) => !p.is_archived).map((p) => this.toCollection(p));
    } catch (e) {
      throw toRemoteError(e, 'collection', '*');
    }
  }

  async getCollection(id: string): Promise<Lookup<Collection>> {
    try {
      return found(this.toCollection(await this.api<TodoistProject>(`/projects/${encodeURIComponent(id)}`)));
    } catch (e) {
      if (isNotFound(e)) return notFound;
      throw toRemoteError(e, 'collection', id);
    }
  }

  async createCollection(name: string): Promise<Collection> {
    try {
      return this.toCollection(await this.api<TodoistProject>('/projects', { method: 'POST', body: { name } }));
    } catch (e) {
      throw toRemoteError(e, 'collection', name);
    }
  }

  /** Todoist lists open tasks only; `includeCompleted` has no effect. */
  async listItems(projectId: string, _opts: ListItemsOptions): Promise<Item[]> {
    try {
      const tasks = await this.paginate<TodoistTask>('/tasks', { project_id: projectId });
      return tasks.map(toItem);
    } catch (e) {
      throw toRemoteError(e, 'collection', projectId);
    }
  }

  async getItem(_projectId: string, itemId: string): Promise<Lookup<Item>> {
    try {
      return found(toItem(await this.api<TodoistTask>(`/tasks/${encodeURIComponent(itemId)}`)));
    } catch (e) {
      if (isNotFound(e)) return notFound;
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async insertItem(projectId: string, draft: ItemDraft): Promise<Item> {
    try {
      return toItem(await this.api<TodoistTask>('/tasks', { method: 'POST', body: toPayload(draft, projectId) }));
    } catch (e) {
      throw toRemoteError(e, 'collection', projectId);
    }
  }

  async updateItem(_projectId: string, itemId: string, draft: ItemDraft): Promise<void> {
    try {
      await this.apiVoid(`/tasks/${encodeURIComponent(itemId)}`, { method: 'POST', body: toPayload(draft) });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async deleteItem(_projectId: string, itemId: string): Promise<void> {
    try {
      await this.apiVoid(`/tasks/${encodeURIComponent(itemId)}`, { method: 'DELETE' });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async completeItem(_projectId: string, itemId: string): Promise<void> {
    try {
      await this.apiVoid(`/tasks/${encodeURIComponent(itemId)}/close`, { method: 'POST' });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }
}
