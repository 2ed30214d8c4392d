import { emptyRoot, type StoreRoot, type TrackerStore } from '../../src/store.js';
import { StoreError } from '../../src/errors.js';

/** In-process store; flip `failCommit` or `failRead` to simulate a broken disk. */
export class MemoryStore implements TrackerStore {
  commits = 0;
  closed = false;
  failCommit = false;
  failRead = false;
  private saved: StoreRoot;

  constructor(root: StoreRoot = emptyRoot()) {
    this.saved = structuredClone(root);
  }

  get root(): StoreRoot {
    return structuredClone(this.saved);
  }

  readRoot(): StoreRoot {
    if (this.failRead) throw new StoreError('read failed');
    return structuredClone(this.saved);
  }

  commit(root: StoreRoot): void {
    if (this.failCommit) throw new StoreError('disk full');
    this.saved = structuredClone(root);
    this.commits++;
  }

  close(): void {
    this.closed = true;
  }
}

/** A clock that only moves when told to. */
export function fixedClock(start: Date): { now: () => Date; set: (d: Date) => void } {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    set: (d: Date) => { current = new Date(d.getTime()); },
  };
}
