import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StoreError, describeError } from './errors.js';
import { log } from './log.js';
import type { TrackerRecord } from './types.js';

export const STORE_VERSION = 1;

/** Everything the manager persists in one commit. */
export interface StoreRoot {
  trackers: Record<string, TrackerRecord>;
  nextId: number;
}

/**
 * Transactional persistence for the tracker collection. `commit` is atomic:
 * after it returns the new root is durable, and when it throws the previous
 * root is still the one on disk.
 */
export interface TrackerStore {
  readRoot(): StoreRoot;
  commit(root: StoreRoot): void;
  close(): void;
}

const isoDate = z.string().refine(s => !Number.isNaN(Date.parse(s)), { message: 'invalid timestamp' });

// Bare timestamp strings are completions with no deviation.
const historyEntrySchema = z.union([
  z.string().transform(occurredAt => ({ occurredAt, deviationMs: 0 })),
  z.object({
    occurredAt: z.string(),
    deviationMs: z.number().finite().default(0),
  }),
]).refine(h => !Number.isNaN(Date.parse(h.occurredAt)), { message: 'invalid occurredAt timestamp' });

const trackerRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  createdAt: isoDate,
  modifiedAt: isoDate,
  history: z.array(historyEntrySchema).default([]),
});

const storeFileSchema = z.object({
  version: z.literal(STORE_VERSION).default(STORE_VERSION),
  nextId: z.number().int().positive().default(1),
  trackers: z.record(trackerRecordSchema).default({}),
});

export function emptyRoot(): StoreRoot {
  return { trackers: {}, nextId: 1 };
}

/** Validate a parsed store document and repair a `nextId` that lags behind the ids in use. */
export function parseStoreDocument(data: unknown, source = 'store'): StoreRoot {
  const parsed = storeFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StoreError(`Invalid ${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  const trackers: Record<string, TrackerRecord> = {};
  let maxId = 0;
  for (const [key, record] of Object.entries(parsed.data.trackers)) {
    if (String(record.id) !== key) {
      throw new StoreError(`Invalid ${source}: tracker key ${key} holds id ${record.id}`);
    }
    trackers[key] = record;
    maxId = Math.max(maxId, record.id);
  }
  return { trackers, nextId: Math.max(parsed.data.nextId, maxId + 1) };
}

function pidIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
}

/**
 * JSON document on disk, written through a temp file and renamed into place.
 * A `<file>.lock` beside it marks the single process allowed to write.
 */
export class JsonFileStore implements TrackerStore {
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly lockPath: string,
  ) {}

  static open(filePath: string): JsonFileStore {
    const resolved = path.resolve(filePath);
    const lockPath = `${resolved}.lock`;
    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    } catch (e) {
      throw new StoreError(`Cannot create ${path.dirname(resolved)}: ${describeError(e)}`, { cause: e });
    }
    JsonFileStore.acquireLock(lockPath);
    return new JsonFileStore(resolved, lockPath);
  }

  private static acquireLock(lockPath: string): void {
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        fs.writeFileSync(lockPath, String(process.pid), { flag: 'wx' });
        return;
      } catch (e) {
        if (!(e instanceof Error && 'code' in e && e.code === 'EEXIST')) {
          throw new StoreError(`Cannot lock ${lockPath}: ${describeError(e)}`, { cause: e });
        }
      }
      let owner = 0;
      try {
        owner = Number(fs.readFileSync(lockPath, 'utf-8').trim());
      } catch (e) {
        log.debug(`Lock ${lockPath} vanished while reading: ${describeError(e)}`);
      }
      // Our own pid counts as live: another handle in this process holds the store.
      if (Number.isInteger(owner) && owner > 0 && (owner === process.pid || pidIsAlive(owner))) {
        throw new StoreError(`Store is in use by process ${owner} (${lockPath})`);
      }
      log.warn(`Taking over stale lock ${lockPath}${owner ? ` left by process ${owner}` : ''}`);
      fs.rmSync(lockPath, { force: true });
    }
    throw new StoreError(`Cannot lock ${lockPath}`);
  }

  readRoot(): StoreRoot {
    this.assertOpen();
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return emptyRoot();
      throw new StoreError(`Cannot read ${this.filePath}: ${describeError(e)}`, { cause: e });
    }
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (e) {
      throw new StoreError(`Corrupt store ${this.filePath}: ${describeError(e)}`, { cause: e });
    }
    return parseStoreDocument(data, this.filePath);
  }

  commit(root: StoreRoot): void {
    this.assertOpen();
    const tmp = `${this.filePath}.tmp`;
    const doc = { version: STORE_VERSION, nextId: root.nextId, trackers: root.trackers };
    try {
      const fd = fs.openSync(tmp, 'w');
      try {
        fs.writeFileSync(fd, JSON.stringify(doc, null, 2));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.filePath);
    } catch (e) {
      fs.rmSync(tmp, { force: true });
      throw new StoreError(`Commit to ${this.filePath} failed: ${describeError(e)}`, { cause: e });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    fs.rmSync(this.lockPath, { force: true });
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreError(`Store ${this.filePath} is closed`);
  }
}
