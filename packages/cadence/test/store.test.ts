import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonFileStore, emptyRoot, parseStoreDocument, type StoreRoot } from '../src/store.js';
import { StoreError } from '../src/errors.js';
import { configureLogging } from '../src/log.js';

configureLogging({ level: 'silent' });

const sample: StoreRoot = {
  nextId: 3,
  trackers: {
    '2': {
      id: 2,
      name: 'Water plants',
      createdAt: '2024-01-01T10:00:00.000Z',
      modifiedAt: '2024-01-03T10:00:00.000Z',
      history: [{ occurredAt: '2024-01-03T09:00:00.000Z', deviationMs: -60_000 }],
    },
  },
};

describe('JsonFileStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cadence-store-test-'));
    file = join(dir, 'trackers.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read an empty root when the file does not exist', () => {
    const store = JsonFileStore.open(file);
    expect(store.readRoot()).toEqual(emptyRoot());
    store.close();
  });

  it('should persist a committed root across reopen', () => {
    const store = JsonFileStore.open(file);
    store.commit(sample);
    store.close();

    const reopened = JsonFileStore.open(file);
    expect(reopened.readRoot()).toEqual(sample);
    reopened.close();
    expect(JSON.parse(readFileSync(file, 'utf-8')).version).toBe(1);
  });

  it('should leave no temp file behind', () => {
    const store = JsonFileStore.open(file);
    store.commit(sample);
    store.close();
    expect(readdirSync(dir)).toEqual(['trackers.json']);
  });

  it('should hold a lock file with its pid until closed', () => {
    const store = JsonFileStore.open(file);
    expect(readFileSync(`${file}.lock`, 'utf-8')).toBe(String(process.pid));
    store.close();
    expect(existsSync(`${file}.lock`)).toBe(false);
    store.close();
  });

  it('should refuse a store locked by another live process', () => {
    writeFileSync(`${file}.lock`, String(process.ppid));
    expect(() => JsonFileStore.open(file)).toThrow(`Store is in use by process ${process.ppid}`);
  });

  it('should refuse a second handle on the same file in this process', () => {
    const store = JsonFileStore.open(file);
    expect(() => JsonFileStore.open(file)).toThrow(`Store is in use by process ${process.pid}`);
    store.close();
    const again = JsonFileStore.open(file);
    again.close();
  });

  it('should take over a lock left by a dead process', () => {
    writeFileSync(`${file}.lock`, '2147483646');
    const store = JsonFileStore.open(file);
    expect(readFileSync(`${file}.lock`, 'utf-8')).toBe(String(process.pid));
    store.close();
  });

  it('should report corrupt JSON as a StoreError', () => {
    writeFileSync(file, '{ not json');
    const store = JsonFileStore.open(file);
    expect(() => store.readRoot()).toThrow(StoreError);
    store.close();
  });

  it('should refuse to commit after close', () => {
    const store = JsonFileStore.open(file);
    store.close();
    expect(() => store.commit(sample)).toThrow(`Store ${file} is closed`);
  });
});

describe('parseStoreDocument', () => {
  const stamp = '2024-01-01T10:00:00.000Z';

  it('should raise a nextId that lags behind the ids in use', () => {
    const root = parseStoreDocument({
      nextId: 1,
      trackers: { '5': { id: 5, name: 'Dishes', createdAt: stamp, modifiedAt: stamp } },
    });
    expect(root.nextId).toBe(6);
    expect(root.trackers['5'].history).toEqual([]);
  });

  it('should read bare timestamps as completions without deviation', () => {
    const root = parseStoreDocument({
      trackers: {
        '1': { id: 1, name: 'Dishes', createdAt: stamp, modifiedAt: stamp, history: ['2024-01-03T09:00:00.000Z'] },
      },
    });
    expect(root.trackers['1'].history).toEqual([{ occurredAt: '2024-01-03T09:00:00.000Z', deviationMs: 0 }]);
  });

  it('should reject a key that does not match the tracker id', () => {
    expect(() => parseStoreDocument({
      trackers: { '1': { id: 2, name: 'Dishes', createdAt: stamp, modifiedAt: stamp } },
    }, 'test')).toThrow('Invalid test: tracker key 1 holds id 2');
  });

  it('should reject unparseable creation and modification dates', () => {
    expect(() => parseStoreDocument({
      trackers: { '1': { id: 1, name: 'Dishes', createdAt: 'garbage', modifiedAt: stamp } },
    }, 'test')).toThrow('Invalid test: trackers.1.createdAt: invalid timestamp');
    expect(() => parseStoreDocument({
      trackers: { '1': { id: 1, name: 'Dishes', createdAt: stamp, modifiedAt: 'garbage' } },
    })).toThrow(StoreError);
  });

  it('should reject unparseable completion timestamps', () => {
    expect(() => parseStoreDocument({
      trackers: { '1': { id: 1, name: 'Dishes', createdAt: stamp, modifiedAt: stamp, history: ['soon'] } },
    })).toThrow(StoreError);
  });
});
