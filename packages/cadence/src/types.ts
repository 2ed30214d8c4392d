export interface CompletionEvent {
  occurredAt: Date;
  /** Signed offset of occurredAt from when the completion was expected. */
  deviationMs: number;
}

export interface TrackerStats {
  numCompletions: number;
  numIntervals: number;
  lastCompletion: CompletionEvent | null;
  lastIntervalMs: number | null;
  averageIntervalMs: number | null;
  spreadMs: number | null;
  nextExpected: Date | null;
  early: Date | null;
  late: Date | null;
}

/** Plain persisted shape of a tracker. */
export interface TrackerRecord {
  id: number;
  name: string;
  createdAt: string;
  modifiedAt: string;
  history: Array<{ occurredAt: string; deviationMs: number }>;
}

/** Read-only snapshot handed to the presentation layer. */
export interface TrackerView {
  readonly id: number;
  readonly name: string;
  readonly createdAt: Date;
  readonly modifiedAt: Date;
  readonly history: readonly CompletionEvent[];
  readonly stats: TrackerStats;
}

export type HistoryAction =
  | { kind: 'delete' }
  | { kind: 'replace'; completion: string | CompletionEvent };

export type SortDirection = 'next-first' | 'next-last';

export interface PageEntry {
  tag: string;
  tracker: TrackerView;
}

export type Clock = () => Date;
