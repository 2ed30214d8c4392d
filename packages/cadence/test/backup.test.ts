import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fromBackup, readBackupFile, toBackup, writeBackupFile } from '../src/backup.js';
import type { TrackerRecord } from '../src/types.js';

function iso(year: number, month: number, day: number, hour: number, minute: number): string {
  return new Date(year, month, day, hour, minute).toISOString();
}

const record: TrackerRecord = {
  id: 3,
  name: 'Change filter',
  createdAt: iso(2024, 0, 2, 3, 4),
  modifiedAt: iso(2024, 1, 1, 8, 0),
  history: [
    { occurredAt: iso(2024, 0, 5, 12, 0), deviationMs: -90 * 60_000 },
    { occurredAt: iso(2024, 1, 1, 8, 0), deviationMs: 30_000 },
    { occurredAt: iso(2024, 1, 2, 8, 0), deviationMs: -61_000 },
  ],
};

describe('toBackup', () => {
  it('should write minute timestamps and whole-minute deviations', () => {
    expect(toBackup([record])).toEqual({
      '3': {
        name: 'Change filter',
        created: '240102T0304',
        modified: '240201T0800',
        history: [['240105T1200', '-90'], ['240201T0800', '0'], ['240202T0800', '-1']],
      },
    });
  });

  it('should order entries by id', () => {
    const doc = toBackup([{ ...record, id: 10 }, { ...record, id: 2 }]);
    expect(Object.keys(doc)).toEqual(['2', '10']);
  });
});

describe('fromBackup', () => {
  it('should accept pairs, bare timestamps and numeric minutes', () => {
    const r = fromBackup({
      '3': {
        name: 'Change filter',
        created: '240102T0304',
        modified: '240102T0304',
        history: [['240105T1200', '-30'], '240106T0800', ['240107T0900', 15]],
      },
    });
    expect(r).toEqual({
      ok: true,
      value: [{
        id: 3,
        name: 'Change filter',
        createdAt: iso(2024, 0, 2, 3, 4),
        modifiedAt: iso(2024, 0, 2, 3, 4),
        history: [
          { occurredAt: iso(2024, 0, 5, 12, 0), deviationMs: -30 * 60_000 },
          { occurredAt: iso(2024, 0, 6, 8, 0), deviationMs: 0 },
          { occurredAt: iso(2024, 0, 7, 9, 0), deviationMs: 15 * 60_000 },
        ],
      }],
    });
  });

  it('should bring back last-century completions unchanged', () => {
    const old: TrackerRecord = {
      ...record,
      history: [{ occurredAt: iso(1999, 4, 1, 0, 0), deviationMs: 0 }, { occurredAt: iso(2024, 0, 5, 12, 0), deviationMs: 0 }],
    };
    const doc = toBackup([old]);
    expect(doc['3'].history).toEqual([['990501T0000', '0'], ['240105T1200', '0']]);
    const r = fromBackup(doc);
    expect(r.ok ? r.value[0].history.map(h => h.occurredAt) : null).toEqual([iso(1999, 4, 1, 0, 0), iso(2024, 0, 5, 12, 0)]);
  });

  it('should reject keys that are not positive integers', () => {
    const r = fromBackup({ abc: { name: 'X', created: '240102T0304', modified: '240102T0304' } });
    expect(r.ok ? null : r.error.message).toBe("Invalid backup: tracker key 'abc' is not a positive integer");
  });

  it('should reject fractional minutes', () => {
    const r = fromBackup({
      '3': { name: 'X', created: '240102T0304', modified: '240102T0304', history: [['240105T1200', '1.5']] },
    });
    expect(r.ok ? null : r.error.message).toBe("tracker 3 history 0: '1.5' is not whole minutes");
  });

  it('should reject malformed timestamps', () => {
    const r = fromBackup({ '3': { name: 'X', created: '2024-01-02', modified: '240102T0304' } });
    expect(r.ok ? null : r.error.message).toBe(
      "tracker 3 created: Invalid timestamp '2024-01-02' (expected YYMMDDTHHMM)",
    );
  });

  it('should reject documents of the wrong shape', () => {
    expect(fromBackup([1, 2]).ok).toBe(false);
    expect(fromBackup({ '1': { name: '' } }).ok).toBe(false);
  });
});

describe('backup files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cadence-backup-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write indented JSON that reads back to the same trackers', () => {
    const file = join(dir, 'nested', 'backup.json');
    const doc = toBackup([record]);
    expect(writeBackupFile(file, doc)).toEqual({ ok: true, value: file });
    expect(readFileSync(file, 'utf-8').startsWith('{\n   "3": {\n      "name": "Change filter"')).toBe(true);

    const data = readBackupFile(file);
    expect(data.ok).toBe(true);
    if (!data.ok) return;
    const records = fromBackup(data.value);
    expect(records.ok ? records.value.map(r => r.history.length) : null).toEqual([3]);
  });

  it('should report unreadable files', () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{');
    const r = readBackupFile(file);
    expect(r.ok ? null : r.error.code).toBe('store_error');
  });
});
