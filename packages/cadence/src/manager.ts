import { Tracker, invalidEventError, isValidEvent, type TrackerOptions } from './tracker.js';
import { JsonFileStore, type StoreRoot, type TrackerStore } from './store.js';
import { toBackup, fromBackup, type BackupDocument } from './backup.js';
import { DEFAULT_SPREAD_MULTIPLIER } from './stats.js';
import { log } from './log.js';
import {
  CadenceError, ConfigError, IndexOutOfRangeError, InvalidNameError, NotFoundError, ParseError, StoreError,
  describeError, ok, err, type Result,
} from './errors.js';
import type {
  CompletionEvent, HistoryAction, PageEntry, SortDirection, TrackerStats, TrackerView,
} from './types.js';

export const TAGS = 'abcdefghijklmnopqrstuvwxyz';
export const PAGE_SIZE = TAGS.length;

export interface ManagerOptions extends TrackerOptions {
  sortDirection?: SortDirection;
}

function toStoreError(e: unknown): StoreError {
  return e instanceof StoreError ? e : new StoreError(describeError(e), { cause: e });
}

function tagKey(page: number, tag: string): string {
  return `${page}:${tag}`;
}

/**
 * Owns the tracker collection: allocates ids, orders and pages trackers for
 * display, maps per-page tags to ids and commits every change to the store.
 *
 * Mutations run on a copy of the affected tracker. The copy replaces the live
 * one only after the store accepted the commit, so the in-memory collection
 * always equals what was last committed.
 */
export class TrackerManager {
  private trackers: Map<number, Tracker>;
  private nextId: number;
  private _activePage = 0;
  private _sortDirection: SortDirection;
  private _spreadMultiplier: number;
  private tagIndex = new Map<string, number>();
  private closed = false;

  private constructor(
    private readonly store: TrackerStore,
    root: StoreRoot,
    private readonly options: ManagerOptions,
  ) {
    this._sortDirection = options.sortDirection ?? 'next-first';
    this._spreadMultiplier = options.spreadMultiplier ?? DEFAULT_SPREAD_MULTIPLIER;
    this.trackers = new Map();
    let maxId = 0;
    for (const record of Object.values(root.trackers)) {
      this.trackers.set(record.id, Tracker.fromRecord(record, this.trackerOptions()));
      maxId = Math.max(maxId, record.id);
    }
    this.nextId = Math.max(root.nextId, maxId + 1);
  }

  /** Take ownership of an open store. The store is closed if its root cannot be read. */
  static open(store: TrackerStore, options: ManagerOptions = {}): Result<TrackerManager, StoreError> {
    let root: StoreRoot;
    try {
      root = store.readRoot();
    } catch (e) {
      try {
        store.close();
      } catch (closeError) {
        log.error(`Closing store after failed read: ${describeError(closeError)}`);
      }
      return err(toStoreError(e));
    }
    const manager = new TrackerManager(store, root, options);
    log.debug(`Opened tracker store with ${manager.trackers.size} trackers, next id ${manager.nextId}`);
    return ok(manager);
  }

  static openFile(filePath: string, options: ManagerOptions = {}): Result<TrackerManager, StoreError> {
    let store: JsonFileStore;
    try {
      store = JsonFileStore.open(filePath);
    } catch (e) {
      return err(toStoreError(e));
    }
    return TrackerManager.open(store, options);
  }

  get count(): number { return this.trackers.size; }
  get activePage(): number { return this._activePage; }
  get sortDirection(): SortDirection { return this._sortDirection; }
  get spreadMultiplier(): number { return this._spreadMultiplier; }
  get isClosed(): boolean { return this.closed; }

  // ─── Mutations ───

  createTracker(name: string): Result<number, InvalidNameError | StoreError> {
    if (!name.trim()) return err(new InvalidNameError());
    const id = this.nextId;
    const tracker = Tracker.create(id, name, this.trackerOptions());
    const next = new Map(this.trackers).set(id, tracker);
    const committed = this.commit(next, id + 1);
    if (!committed.ok) return committed;
    log.debug(`Tracker '${tracker.name}' added with id ${id}`);
    return ok(id);
  }

  /** Returns whether a tracker was removed. Unknown ids are not an error. */
  deleteTracker(id: number): Result<boolean, StoreError> {
    if (this.closed) return err(this.closedError());
    if (!this.trackers.has(id)) return ok(false);
    const next = new Map(this.trackers);
    next.delete(id);
    const committed = this.commit(next, this.nextId);
    if (!committed.ok) return committed;
    log.debug(`Tracker ${id} deleted`);
    return ok(true);
  }

  recordCompletion(id: number, event: CompletionEvent): Result<TrackerView, NotFoundError | ParseError | StoreError> {
    if (!isValidEvent(event)) return err(invalidEventError());
    return this.mutate<ParseError>(id, working => {
      working.recordCompletion(event);
      return ok(undefined);
    });
  }

  editHistory(id: number, index: number, action: HistoryAction): Result<TrackerView, NotFoundError | IndexOutOfRangeError | ParseError | StoreError> {
    return this.mutate(id, working => working.editHistory(index, action));
  }

  renameTracker(id: number, name: string): Result<TrackerView, NotFoundError | InvalidNameError | StoreError> {
    return this.mutate(id, working => working.rename(name));
  }

  /** Replace the whole collection with the trackers of a backup document. */
  restoreBackup(data: unknown): Result<number, ParseError | StoreError> {
    const records = fromBackup(data);
    if (!records.ok) return records;
    const next = new Map<number, Tracker>();
    let maxId = 0;
    for (const record of records.value) {
      next.set(record.id, Tracker.fromRecord(record, this.trackerOptions()));
      maxId = Math.max(maxId, record.id);
    }
    const committed = this.commit(next, Math.max(this.nextId, maxId + 1));
    if (!committed.ok) return committed;
    this.tagIndex.clear();
    this._activePage = 0;
    log.info(`Restored ${next.size} trackers from backup`);
    return ok(next.size);
  }

  // ─── Queries ───

  getTracker(id: number): Result<TrackerView, NotFoundError> {
    const tracker = this.trackers.get(id);
    return tracker ? ok(tracker.view()) : err(new NotFoundError(id));
  }

  getStats(id: number): Result<TrackerStats, NotFoundError> {
    const tracker = this.trackers.get(id);
    return tracker ? ok(tracker.getStats()) : err(new NotFoundError(id));
  }

  exportBackup(): BackupDocument {
    return toBackup([...this.trackers.values()].map(t => t.toRecord()));
  }

  // ─── Ordering, paging and tags ───

  pageCount(): number {
    return Math.ceil(this.trackers.size / PAGE_SIZE);
  }

  /**
   * Sorted slice for `page` with tags a–z in display order. Tags handed out by
   * any earlier listing expire.
   */
  listPage(page: number): PageEntry[] {
    this.tagIndex.clear();
    if (!Number.isInteger(page) || page < 0 || page >= this.pageCount()) return [];
    this._activePage = page;
    const start = page * PAGE_SIZE;
    return this.sortedTrackers().slice(start, start + PAGE_SIZE).map((tracker, i) => {
      const tag = TAGS[i];
      this.tagIndex.set(tagKey(page, tag), tracker.id);
      return { tag, tracker: tracker.view() };
    });
  }

  resolveTag(page: number, tag: string): number | undefined {
    return this.tagIndex.get(tagKey(page, tag));
  }

  setActivePage(page: number): boolean {
    if (!Number.isInteger(page) || page < 0 || page >= this.pageCount()) return false;
    this._activePage = page;
    return true;
  }

  nextPage(): boolean { return this.setActivePage(this._activePage + 1); }
  previousPage(): boolean { return this.setActivePage(this._activePage - 1); }
  firstPage(): boolean { return this.setActivePage(0); }

  toggleSortDirection(): SortDirection {
    this._sortDirection = this._sortDirection === 'next-first' ? 'next-last' : 'next-first';
    return this._sortDirection;
  }

  setSpreadMultiplier(k: number): Result<void, ConfigError> {
    if (!Number.isFinite(k) || k < 0) return err(new ConfigError(`Spread multiplier must be a non-negative number, got ${k}`));
    this._spreadMultiplier = k;
    for (const tracker of this.trackers.values()) tracker.setSpreadMultiplier(k);
    return ok(undefined);
  }

  // ─── Lifecycle ───

  /** Commit the current state and release the store. Safe to call twice. */
  close(): Result<void, StoreError> {
    if (this.closed) return ok(undefined);
    let failure: StoreError | null = null;
    try {
      this.store.commit(this.root(this.trackers, this.nextId));
      log.debug('Final commit succeeded');
    } catch (e) {
      failure = toStoreError(e);
      log.error(`Final commit failed, changes since the last commit are discarded: ${failure.message}`);
    } finally {
      this.closed = true;
      try {
        this.store.close();
      } catch (e) {
        failure ??= toStoreError(e);
        log.error(`Releasing store failed: ${describeError(e)}`);
      }
    }
    return failure ? err(failure) : ok(undefined);
  }

  // ─── Internals ───

  private trackerOptions(): TrackerOptions {
    return {
      maxHistory: this.options.maxHistory,
      spreadMultiplier: this._spreadMultiplier,
      clock: this.options.clock,
    };
  }

  private mutate<E extends CadenceError>(
    id: number,
    change: (working: Tracker) => Result<void, E>,
  ): Result<TrackerView, E | NotFoundError | StoreError> {
    if (this.closed) return err(this.closedError());
    const tracker = this.trackers.get(id);
    if (!tracker) return err(new NotFoundError(id));
    const working = tracker.clone();
    const changed = change(working);
    if (!changed.ok) return changed;
    const committed = this.commit(new Map(this.trackers).set(id, working), this.nextId);
    if (!committed.ok) return committed;
    return ok(working.view());
  }

  private commit(trackers: Map<number, Tracker>, nextId: number): Result<void, StoreError> {
    if (this.closed) return err(this.closedError());
    try {
      this.store.commit(this.root(trackers, nextId));
    } catch (e) {
      const error = toStoreError(e);
      log.error(`Commit failed, change rolled back: ${error.message}`);
      return err(error);
    }
    this.trackers = trackers;
    this.nextId = nextId;
    log.debug(`Committed ${trackers.size} trackers, next id ${nextId}`);
    return ok(undefined);
  }

  private root(trackers: Map<number, Tracker>, nextId: number): StoreRoot {
    const records: StoreRoot['trackers'] = {};
    for (const t of trackers.values()) records[String(t.id)] = t.toRecord();
    return { trackers: records, nextId };
  }

  private sortedTrackers(): Tracker[] {
    const keyed = [...this.trackers.values()].map(t => ({ t, key: this.sortKey(t) }));
    keyed.sort((a, b) => a.key[0] - b.key[0] || a.key[1] - b.key[1] || a.t.id - b.t.id);
    return keyed.map(k => k.t);
  }

  /**
   * Three buckets: trackers with a predicted next completion (by that date),
   * trackers with only a last completion (by that date) and trackers without
   * completions (by id). The direction only reorders the buckets.
   */
  private sortKey(t: Tracker): [bucket: number, key: number] {
    const stats = t.getStats();
    const nextFirst = this._sortDirection === 'next-first';
    if (stats.nextExpected) return [nextFirst ? 0 : 2, stats.nextExpected.getTime()];
    if (stats.lastCompletion) return [1, stats.lastCompletion.occurredAt.getTime()];
    return [nextFirst ? 2 : 0, t.id];
  }

  private closedError(): StoreError {
    return new StoreError('Tracker manager is closed');
  }
}
