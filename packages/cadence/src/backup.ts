import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { formatTimestamp, parseTimestamp, MINUTE_MS } from './time-parser.js';
import { ParseError, StoreError, describeError, ok, err, type Result } from './errors.js';
import type { TrackerRecord } from './types.js';

/**
 * Backup format: one entry per tracker id with minute-precision
 * `YYMMDDTHHMM` timestamps and deviations as whole minutes.
 */
export interface BackupEntry {
  name: string;
  created: string;
  modified: string;
  history: Array<[string, string]>;
}

export type BackupDocument = Record<string, BackupEntry>;

const minutesSchema = z.union([z.string(), z.number()]);

const backupHistorySchema = z.union([
  z.string().transform(ts => [ts, '0'] as const),
  z.tuple([z.string()]).transform(([ts]) => [ts, '0'] as const),
  z.tuple([z.string(), minutesSchema]).transform(([ts, mins]) => [ts, String(mins)] as const),
]);

const backupEntrySchema = z.object({
  name: z.string().min(1),
  created: z.string(),
  modified: z.string(),
  history: z.array(backupHistorySchema).default([]),
});

const backupDocumentSchema = z.record(backupEntrySchema);

function toIso(text: string, what: string): string {
  const parsed = parseTimestamp(text);
  if (!parsed.ok) throw new ParseError(`${what}: ${parsed.error.message}`);
  return parsed.value.toISOString();
}

export function toBackup(records: readonly TrackerRecord[]): BackupDocument {
  const doc: BackupDocument = {};
  for (const r of [...records].sort((a, b) => a.id - b.id)) {
    doc[String(r.id)] = {
      name: r.name,
      created: formatTimestamp(new Date(r.createdAt)),
      modified: formatTimestamp(new Date(r.modifiedAt)),
      history: r.history.map(h => [
        formatTimestamp(new Date(h.occurredAt)),
        String(Math.trunc(h.deviationMs / MINUTE_MS)),
      ]),
    };
  }
  return doc;
}

export function fromBackup(data: unknown): Result<TrackerRecord[], ParseError> {
  const parsed = backupDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(new ParseError(`Invalid backup: ${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  const records: TrackerRecord[] = [];
  try {
    for (const [key, entry] of Object.entries(parsed.data)) {
      const id = Number(key);
      if (!Number.isInteger(id) || id < 1) throw new ParseError(`Invalid backup: tracker key '${key}' is not a positive integer`);
      records.push({
        id,
        name: entry.name,
        createdAt: toIso(entry.created, `tracker ${key} created`),
        modifiedAt: toIso(entry.modified, `tracker ${key} modified`),
        history: entry.history.map(([ts, mins], i) => {
          const minutes = Number(mins.trim() || '0');
          if (!Number.isInteger(minutes)) throw new ParseError(`tracker ${key} history ${i}: '${mins}' is not whole minutes`);
          return { occurredAt: toIso(ts, `tracker ${key} history ${i}`), deviationMs: minutes * MINUTE_MS };
        }),
      });
    }
  } catch (e) {
    if (e instanceof ParseError) return err(e);
    throw e;
  }
  return ok(records.sort((a, b) => a.id - b.id));
}

export function writeBackupFile(file: string, doc: BackupDocument): Result<string, StoreError> {
  const resolved = path.resolve(file);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, JSON.stringify(doc, null, 3));
    return ok(resolved);
  } catch (e) {
    return err(new StoreError(`Cannot write backup ${resolved}: ${describeError(e)}`, { cause: e }));
  }
}

/** Raw JSON of a backup file; validate it with `fromBackup`. */
export function readBackupFile(file: string): Result<unknown, StoreError> {
  try {
    return ok(JSON.parse(fs.readFileSync(file, 'utf-8')));
  } catch (e) {
    return err(new StoreError(`Cannot read backup ${file}: ${describeError(e)}`, { cause: e }));
  }
}
