import type { Collection, Item, ItemDraft, Lookup, ServiceName } from '../model.js';
import type { Logger } from '../log.js';
import type { RetryInfo } from '../http.js';
import { errorMessage } from '../errors.js';

export interface ListItemsOptions {
  /** Include completed (and hidden) items. Services that never list completed items ignore this. */
  includeCompleted: boolean;
}

/**
 * Capability one remote task service exposes to the engine.
 *
 * Not-found is a value for reads (`Lookup`) and a RemoteNotFoundError for
 * writes; every other failure is a RemoteTransientError.
 */
export interface TaskProvider {
  readonly name: ServiceName;

  listCollections(): Promise<Collection[]>;
  getCollection(id: string): Promise<Lookup<Collection>>;
  createCollection(name: string): Promise<Collection>;

  listItems(collectionId: string, opts: ListItemsOptions): Promise<Item[]>;
  getItem(collectionId: string, itemId: string): Promise<Lookup<Item>>;
  /** Returns the stored item (with its new id). */
  insertItem(collectionId: string, draft: ItemDraft): Promise<Item>;
  updateItem(collectionId: string, itemId: string, draft: ItemDraft): Promise<void>;
  deleteItem(collectionId: string, itemId: string): Promise<void>;
  completeItem(collectionId: string, itemId: string): Promise<void>;
}

/** `onRetry` hook that warns about every HTTP retry; undefined without a logger. */
export function logRetries(logger?: Logger): ((retry: RetryInfo) => void) | undefined {
  if (!logger) return undefined;
  return ({ url, attempt, waitMs, status, error }) =>
    logger.warn(`retry ${attempt} for ${new URL(url).pathname} in ${waitMs}ms`, status ?? errorMessage(error));
}
