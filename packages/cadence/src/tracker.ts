import { computeStats, copyStats, DEFAULT_SPREAD_MULTIPLIER } from './stats.js';
import { parseCompletion, isTimestampYear, MIN_TIMESTAMP_YEAR, MAX_TIMESTAMP_YEAR } from './time-parser.js';
import {
  IndexOutOfRangeError, InvalidNameError, ParseError, ok, err, type Result,
} from './errors.js';
import type {
  Clock, CompletionEvent, HistoryAction, TrackerRecord, TrackerStats, TrackerView,
} from './types.js';

export const DEFAULT_MAX_HISTORY = 12;

export interface TrackerOptions {
  maxHistory?: number;
  spreadMultiplier?: number;
  clock?: Clock;
}

interface TrackerState {
  id: number;
  name: string;
  createdAt: Date;
  modifiedAt: Date;
  history: CompletionEvent[];
}

/** Completions must survive a backup, whose timestamps carry a two-digit year. */
export function isValidEvent(event: CompletionEvent): boolean {
  return !Number.isNaN(event.occurredAt.getTime())
    && isTimestampYear(event.occurredAt)
    && Number.isFinite(event.deviationMs);
}

export function invalidEventError(): ParseError {
  return new ParseError(`Completion must be a valid date between ${MIN_TIMESTAMP_YEAR} and ${MAX_TIMESTAMP_YEAR}`);
}

function byOccurredAt(a: CompletionEvent, b: CompletionEvent): number {
  return a.occurredAt.getTime() - b.occurredAt.getTime();
}

function copyEvent(e: CompletionEvent): CompletionEvent {
  return { occurredAt: new Date(e.occurredAt.getTime()), deviationMs: e.deviationMs };
}

/**
 * One recurring task: its identity, a bounded completion history kept sorted
 * by time, and statistics derived from that history on demand.
 */
export class Tracker {
  readonly id: number;
  readonly createdAt: Date;
  private _name: string;
  private _modifiedAt: Date;
  private _history: CompletionEvent[];
  private cachedStats: TrackerStats | null = null;
  private _spreadMultiplier: number;
  private readonly maxHistory: number;
  private readonly clock: Clock;

  private constructor(state: TrackerState, options: TrackerOptions) {
    this.id = state.id;
    this._name = state.name;
    this.createdAt = state.createdAt;
    this._modifiedAt = state.modifiedAt;
    this.maxHistory = Math.max(1, options.maxHistory ?? DEFAULT_MAX_HISTORY);
    this._spreadMultiplier = options.spreadMultiplier ?? DEFAULT_SPREAD_MULTIPLIER;
    this.clock = options.clock ?? (() => new Date());
    this._history = this.normalize(state.history);
  }

  static create(id: number, name: string, options: TrackerOptions = {}): Tracker {
    const now = (options.clock ?? (() => new Date()))();
    return new Tracker({ id, name: name.trim(), createdAt: now, modifiedAt: now, history: [] }, options);
  }

  static fromRecord(record: TrackerRecord, options: TrackerOptions = {}): Tracker {
    return new Tracker({
      id: record.id,
      name: record.name,
      createdAt: new Date(record.createdAt),
      modifiedAt: new Date(record.modifiedAt),
      history: record.history.map(h => ({ occurredAt: new Date(h.occurredAt), deviationMs: h.deviationMs })),
    }, options);
  }

  get name(): string { return this._name; }
  get modifiedAt(): Date { return this._modifiedAt; }
  get history(): readonly CompletionEvent[] { return this._history; }
  get spreadMultiplier(): number { return this._spreadMultiplier; }

  setSpreadMultiplier(k: number): void {
    if (k === this._spreadMultiplier) return;
    this._spreadMultiplier = k;
    this.cachedStats = null;
  }

  getStats(): TrackerStats {
    return copyStats(this.stats());
  }

  /** Backfilled completions are sorted into place; the oldest overflow is dropped. */
  recordCompletion(event: CompletionEvent): void {
    this._history = this.normalize([...this._history, copyEvent(event)]);
    this.touch();
  }

  editHistory(index: number, action: HistoryAction): Result<void, IndexOutOfRangeError | ParseError> {
    if (!Number.isInteger(index) || index < 0 || index >= this._history.length) {
      return err(new IndexOutOfRangeError(index, this._history.length));
    }
    const next = [...this._history];
    if (action.kind === 'delete') {
      next.splice(index, 1);
    } else {
      let replacement: CompletionEvent;
      if (typeof action.completion === 'string') {
        const parsed = parseCompletion(action.completion, this.clock());
        if (!parsed.ok) return parsed;
        replacement = parsed.value;
      } else {
        replacement = copyEvent(action.completion);
      }
      if (!isValidEvent(replacement)) return err(invalidEventError());
      next[index] = replacement;
    }
    this._history = this.normalize(next);
    this.touch();
    return ok(undefined);
  }

  rename(name: string): Result<void, InvalidNameError> {
    const trimmed = name.trim();
    if (!trimmed) return err(new InvalidNameError());
    this._name = trimmed;
    this._modifiedAt = this.clock();
    return ok(undefined);
  }

  clone(): Tracker {
    return new Tracker({
      id: this.id,
      name: this._name,
      createdAt: this.createdAt,
      modifiedAt: this._modifiedAt,
      history: this._history.map(copyEvent),
    }, { maxHistory: this.maxHistory, spreadMultiplier: this._spreadMultiplier, clock: this.clock });
  }

  toRecord(): TrackerRecord {
    return {
      id: this.id,
      name: this._name,
      createdAt: this.createdAt.toISOString(),
      modifiedAt: this._modifiedAt.toISOString(),
      history: this._history.map(h => ({ occurredAt: h.occurredAt.toISOString(), deviationMs: h.deviationMs })),
    };
  }

  view(): TrackerView {
    return {
      id: this.id,
      name: this._name,
      createdAt: new Date(this.createdAt.getTime()),
      modifiedAt: new Date(this._modifiedAt.getTime()),
      history: this._history.map(copyEvent),
      stats: this.getStats(),
    };
  }

  private stats(): TrackerStats {
    if (!this.cachedStats) this.cachedStats = computeStats(this._history, this._spreadMultiplier);
    return this.cachedStats;
  }

  private normalize(history: CompletionEvent[]): CompletionEvent[] {
    const sorted = [...history].sort(byOccurredAt);
    return sorted.length > this.maxHistory ? sorted.slice(-this.maxHistory) : sorted;
  }

  private touch(): void {
    this.cachedStats = null;
    this._modifiedAt = this.clock();
  }
}
