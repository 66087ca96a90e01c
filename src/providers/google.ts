import { collection, found, notFound, type Collection, type Item, type ItemDraft, type Lookup } from '../model.js';
import { logRetries, type ListItemsOptions, type TaskProvider } from './provider.js';
import type { Logger } from '../log.js';
import { requestJson, requestJsonBody, type FetchLike, type JsonRequestOptions } from '../http.js';
import { isNotFound, toRemoteError } from '../errors.js';
import { tryCalendarDay } from '../dates.js';

export interface GoogleTasksProviderOptions {
  /** OAuth client id */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** OAuth refresh token */
  refreshToken: string;
  /** Request-per-second cap */
  rps?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  /** Receives retry warnings */
  logger?: Logger;
}

interface GoogleTokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
  scope?: string;
}

interface GoogleTaskList {
  id: string;
  title: string;
  updated?: string;
}

interface GoogleTask {
  id: string;
  title?: string;
  notes?: string;
  status: 'needsAction' | 'completed';
  due?: string;
  completed?: string;
  deleted?: boolean;
  updated?: string;
}

interface GooglePage<T> {
  items?: T[];
  nextPageToken?: string;
}

const API_BASE = 'https://tasks.googleapis.com/tasks/v1';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';

function toItem(listId: string, t: GoogleTask): Item {
  return {
    id: t.id,
    collectionId: listId,
    title: t.title ?? '',
    notes: t.notes ?? '',
    status: t.status === 'completed' ? 'completed' : 'open',
    due: t.due,
    completedAt: t.completed,
    updatedAt: t.updated,
  };
}

/** Google Tasks keeps only the date of `due`; it must still be an RFC 3339 timestamp. */
export function toGoogleDue(due: string): string {
  const day = tryCalendarDay(due);
  return day ? `${day}T00:00:00.000Z` : due;
}

interface GoogleTaskPayload {
  title: string;
  notes: string;
  status?: GoogleTask['status'];
  /** null clears the due date */
  due?: string | null;
}

function toPayload(draft: ItemDraft): GoogleTaskPayload {
  const payload: GoogleTaskPayload = {
    title: draft.title,
    notes: draft.notes,
  };
  if (draft.due !== undefined) payload.due = draft.due === null ? null : toGoogleDue(draft.due);
  if (draft.status) payload.status = draft.status === 'completed' ? 'completed' : 'needsAction';
  return payload;
}

export class GoogleTasksProvider implements TaskProvider {
  readonly name = 'google' as const;

  private fetcher: FetchLike;
  private accessToken?: { token: string; expMs: number };

  constructor(private opts: GoogleTasksProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  private async getAccessToken(): Promise<string> {
    const now = Date.now();
    if (this.accessToken && this.accessToken.expMs - 30_000 > now) return this.accessToken.token;

    const body = new URLSearchParams({
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      refresh_token: this.opts.refreshToken,
      grant_type: 'refresh_token',
    });

    const res = await this.fetcher(TOKEN_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body,
    });

    if (!res.ok) {
      const txt = await res.text().catch(() => '');
      throw new Error(`Google token refresh failed: HTTP ${res.status} ${txt}`);
    }

    const json: GoogleTokenResponse = await res.json();
    this.accessToken = { token: json.access_token, expMs: now + json.expires_in * 1000 };
    return json.access_token;
  }

  private async request(path: string, init: JsonRequestOptions = {}) {
    const token = await this.getAccessToken();
    const opts: JsonRequestOptions = {
      rps: this.opts.rps,
      onRetry: logRetries(this.opts.logger),
      ...init,
      headers: { authorization: `Bearer ${token}`, ...(init.headers ?? {}) },
    };
    return { url: `${API_BASE}${path}`, opts };
  }

  private async api<T>(path: string, init?: JsonRequestOptions): Promise<T> {
    const { url, opts } = await this.request(path, init);
    return requestJsonBody<T>(url, opts, this.fetcher);
  }

  private async apiVoid(path: string, init?: JsonRequestOptions): Promise<void> {
    const { url, opts } = await this.request(path, init);
    await requestJson<unknown>(url, opts, this.fetcher);
  }

  private async paginate<T>(path: string, query: JsonRequestOptions['query'] = {}): Promise<T[]> {
    const out: T[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.api<GooglePage<T>>(path, { query: { maxResults: 100, ...query, pageToken } });
      out.push(...(page.items ?? []));
      pageToken = page.nextPageToken;
    } while (pageToken);
    return out;
  }

  async listCollections(): Promise<Collection[]> {
    try {
      const lists = await this.paginate<GoogleTaskList>('/users/@me/lists');
      return lists.map((l) => collection(l.id, l.title));
    } catch (e) {
      throw toRemoteError(e, 'collection', '*');
    }
  }

  async getCollection(id: string): Promise<Lookup<Collection>> {
    try {
      const l = await this.api<GoogleTaskList>(`/users/@me/lists/${encodeURIComponent(id)}`);
      return found(collection(l.id, l.title));
    } catch (e) {
      if (isNotFound(e)) return notFound;
      throw toRemoteError(e, 'collection', id);
    }
  }

  async createCollection(name: string): Promise<Collection> {
    try {
      const l = await this.api<GoogleTaskList>('/users/@me/lists', { method: 'POST', body: { title: name } });
      return collection(l.id, l.title);
    } catch (e) {
      throw toRemoteError(e, 'collection', name);
    }
  }

  async listItems(listId: string, opts: ListItemsOptions): Promise<Item[]> {
    try {
      const tasks = await this.paginate<GoogleTask>(`/lists/${encodeURIComponent(listId)}/tasks`, {
        showCompleted: opts.includeCompleted,
        showHidden: opts.includeCompleted,
      });
      return tasks.filter((t) => !t.deleted).map((t) => toItem(listId, t));
    } catch (e) {
      throw toRemoteError(e, 'collection', listId);
    }
  }

  async getItem(listId: string, itemId: string): Promise<Lookup<Item>> {
    try {
      const t = await this.api<GoogleTask>(`/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(itemId)}`);
      return t.deleted ? notFound : found(toItem(listId, t));
    } catch (e) {
      if (isNotFound(e)) return notFound;
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async insertItem(listId: string, draft: ItemDraft): Promise<Item> {
    try {
      const t = await this.api<GoogleTask>(`/lists/${encodeURIComponent(listId)}/tasks`, {
        method: 'POST',
        body: toPayload(draft),
      });
      return toItem(listId, t);
    } catch (e) {
      throw toRemoteError(e, 'collection', listId);
    }
  }

  async updateItem(listId: string, itemId: string, draft: ItemDraft): Promise<void> {
    try {
      await this.apiVoid(`/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(itemId)}`, {
        method: 'PATCH',
        body: toPayload(draft),
      });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async deleteItem(listId: string, itemId: string): Promise<void> {
    try {
      await this.apiVoid(`/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(itemId)}`, {
        method: 'DELETE',
      });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }

  async completeItem(listId: string, itemId: string): Promise<void> {
    try {
      await this.apiVoid(`/lists/${encodeURIComponent(listId)}/tasks/${encodeURIComponent(itemId)}`, {
        method: 'PATCH',
        body: { status: 'completed' },
      });
    } catch (e) {
      throw toRemoteError(e, 'item', itemId);
    }
  }
}
