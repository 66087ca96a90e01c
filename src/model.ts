export type ServiceName = 'google' | 'todoist' | 'mockA' | 'mockB';

export type ItemStatus = 'open' | 'completed';

export interface Recurrence {
  recurring: boolean;
  /** Human-readable rule as the service shows it (e.g. "every! 3 days"). */
  source?: string;
}

export interface Item {
  /** Provider-local id (opaque). */
  id: string;
  collectionId: string;
  title: string;
  /** Free text; '' when the provider has none. May embed directives. */
  notes: string;
  status: ItemStatus;
  /** ISO date (YYYY-MM-DD) or date-time. */
  due?: string;
  /** ISO date. Todoist only. */
  deadline?: string;
  completedAt?: string;
  /** Todoist priority, 1 (none) .. 4 (p1). */
  priority?: number;
  labels?: string[];
  recurrence?: Recurrence;
  updatedAt?: string;
}

export interface ItemDraft {
  title: string;
  notes: string;
  /** On update: undefined leaves the due date alone, null clears it. */
  due?: string | null;
  status?: ItemStatus;
}

export type Collection =
  | { kind: 'real'; id: string; name: string }
  | { kind: 'inbox'; id: string; name: string };

export type Lookup<T> = { found: true; value: T } | { found: false };

export function found<T>(value: T): Lookup<T> {
  return { found: true, value };
}

export const notFound: Lookup<never> = { found: false };

export function collection(id: string, name: string, inbox = false): Collection {
  return inbox ? { kind: 'inbox', id, name } : { kind: 'real', id, name };
}

export const SERVICE_LABELS: Record<ServiceName, string> = {
  google: 'Google Tasks',
  todoist: 'Todoist',
  mockA: 'Mock A',
  mockB: 'Mock B',
};
