import type { TaskProvider } from '../providers/provider.js';
import type { EligibilityRule } from './eligibility.js';

export type MirrorTarget =
  /** One list found by name; '@default' is the first list the service returns. */
  | { kind: 'single'; listName: string }
  /** One mirror list per source collection, same name. */
  | { kind: 'per-collection' };

/**
 * - provenance: "Synced from <Service>\nOriginal ID: <id>" (+ deadline line)
 * - source: the source notes, markers stripped
 * - recurrence: the recurrence rule, a blank line, the description
 */
export type NotesStyle = 'provenance' | 'source' | 'recurrence';

export interface MirrorJob {
  name: string;
  source: TaskProvider;
  mirror: TaskProvider;
  /** Source collection names to read; empty reads all. */
  sourceCollections: string[];
  excludedCollections: string[];
  target: MirrorTarget;
  eligibility: EligibilityRule;
  notesStyle: NotesStyle;
  /** Strip star and tag markers from mirrored text. */
  stripMarkers: boolean;
  /** Tag token to strip. */
  tag: string;
  /** Push due-date changes after creation. */
  compareDue: boolean;
  /** Complete the source when its mirror is completed. */
  cascadeCompletion: boolean;
  cascadeToleranceDays: number;
}
