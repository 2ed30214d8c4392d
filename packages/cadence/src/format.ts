import chalk from 'chalk';
import { formatDuration, formatTimestamp } from './time-parser.js';
import type { PageEntry, SortDirection, TrackerView } from './types.js';

const OPEN_CIRCLE = '○';
const CLOSED_CIRCLE = '●';

/** `○ ● ○` for page 2 of 3; `activePage` is 0-indexed. */
export function pageBanner(activePage: number, pageCount: number): string {
  const markers: string[] = [];
  for (let i = 0; i < pageCount; i++) markers.push(i === activePage ? CLOSED_CIRCLE : OPEN_CIRCLE);
  return markers.join(' ');
}

/** `YY-MM-DD` in local time. */
export function shortDate(date: Date | null): string {
  if (!date) return '   ~    ';
  const p = (n: number) => String(n).padStart(2, '0');
  return `${p(date.getFullYear() % 100)}-${p(date.getMonth() + 1)}-${p(date.getDate())}`;
}

export type Urgency = 'late' | 'due' | 'upcoming' | 'none';

/** Where `now` falls relative to the early/late window of the next completion. */
export function urgency(tracker: TrackerView, now: Date = new Date()): Urgency {
  const { nextExpected, early, late } = tracker.stats;
  if (!nextExpected || !early || !late) return 'none';
  const t = now.getTime();
  if (t > late.getTime()) return 'late';
  if (t >= early.getTime()) return 'due';
  return 'upcoming';
}

const urgencyColor: Record<Urgency, (s: string) => string> = {
  late: chalk.red,
  due: chalk.yellow,
  upcoming: chalk.blue,
  none: chalk.white,
};

export function listHeader(): string {
  return chalk.green(' tag   next       last      tracker name');
}

export function formatRow(entry: PageEntry, now: Date = new Date()): string {
  const { tracker } = entry;
  const color = urgencyColor[urgency(tracker, now)];
  const next = shortDate(tracker.stats.nextExpected);
  const last = shortDate(tracker.stats.lastCompletion?.occurredAt ?? null);
  return ` ${chalk.gray(entry.tag)}     ${color(next)}  ${last}  ${tracker.name}`;
}

export function formatPage(entries: PageEntry[], activePage: number, pageCount: number, direction: SortDirection, now: Date = new Date()): string {
  if (entries.length === 0) return chalk.gray('No trackers found.');
  const lines = [listHeader(), ...entries.map(e => formatRow(e, now))];
  const footer = [pageCount > 1 ? pageBanner(activePage, pageCount) : '', direction === 'next-last' ? chalk.gray('(reversed)') : '']
    .filter(Boolean)
    .join('  ');
  if (footer) lines.push('', footer);
  return lines.join('\n');
}

function optTimestamp(date: Date | null): string {
  return date ? formatTimestamp(date) : '~';
}

function optDuration(ms: number | null): string {
  return ms === null ? '~' : formatDuration(ms);
}

export function formatTrackerInfo(tracker: TrackerView): string {
  const s = tracker.stats;
  const history = tracker.history.length
    ? tracker.history.map((h, i) => `    ${chalk.gray(String(i + 1).padStart(2))}. ${formatTimestamp(h.occurredAt)} ${formatDuration(h.deviationMs)}`)
    : [chalk.gray('    none')];
  return [
    chalk.bold(tracker.name),
    '',
    `  id:          ${tracker.id}`,
    `  created:     ${formatTimestamp(tracker.createdAt)}`,
    `  modified:    ${formatTimestamp(tracker.modifiedAt)}`,
    `  completions: (${s.numCompletions})`,
    ...history,
    `  intervals:   (${s.numIntervals})`,
    `    last:      ${optDuration(s.lastIntervalMs)}`,
    `    average:   ${optDuration(s.averageIntervalMs)}`,
    `    spread:    ${optDuration(s.spreadMs)}`,
    `  next:        ${optTimestamp(s.nextExpected)}`,
    `    early:     ${optTimestamp(s.early)}`,
    `    late:      ${optTimestamp(s.late)}`,
  ].join('\n');
}

/** JSON-friendly snapshot for `--json` output. */
export function trackerJson(tracker: TrackerView): Record<string, unknown> {
  const s = tracker.stats;
  return {
    id: tracker.id,
    name: tracker.name,
    createdAt: tracker.createdAt.toISOString(),
    modifiedAt: tracker.modifiedAt.toISOString(),
    history: tracker.history.map(h => ({ occurredAt: h.occurredAt.toISOString(), deviation: formatDuration(h.deviationMs) })),
    stats: {
      numCompletions: s.numCompletions,
      numIntervals: s.numIntervals,
      lastInterval: s.lastIntervalMs === null ? null : formatDuration(s.lastIntervalMs),
      averageInterval: s.averageIntervalMs === null ? null : formatDuration(s.averageIntervalMs),
      spread: s.spreadMs === null ? null : formatDuration(s.spreadMs),
      nextExpected: s.nextExpected?.toISOString() ?? null,
      early: s.early?.toISOString() ?? null,
      late: s.late?.toISOString() ?? null,
    },
  };
}
