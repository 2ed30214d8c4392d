import type { CompletionEvent, TrackerStats } from './types.js';

export const DEFAULT_SPREAD_MULTIPLIER = 1.5;

/**
 * Derive interval statistics from a history sorted ascending by occurredAt.
 *
 * Intervals are the gaps between consecutive completions. The spread is the
 * mean absolute deviation of those gaps from their average and bounds the
 * early/late window around the next expected completion.
 */
export function computeStats(history: readonly CompletionEvent[], spreadMultiplier = DEFAULT_SPREAD_MULTIPLIER): TrackerStats {
  const numCompletions = history.length;
  const newest = numCompletions > 0 ? history[numCompletions - 1] : null;
  const lastCompletion = newest
    ? { occurredAt: new Date(newest.occurredAt.getTime()), deviationMs: newest.deviationMs }
    : null;

  const intervals: number[] = [];
  for (let i = 1; i < numCompletions; i++) {
    intervals.push(history[i].occurredAt.getTime() - history[i - 1].occurredAt.getTime());
  }
  const numIntervals = intervals.length;

  if (numIntervals === 0 || !lastCompletion) {
    return {
      numCompletions,
      numIntervals,
      lastCompletion,
      lastIntervalMs: null,
      averageIntervalMs: null,
      spreadMs: null,
      nextExpected: null,
      early: null,
      late: null,
    };
  }

  const averageIntervalMs = intervals.reduce((sum, i) => sum + i, 0) / numIntervals;
  const spreadMs = numIntervals < 2
    ? 0
    : intervals.reduce((sum, i) => sum + Math.abs(i - averageIntervalMs), 0) / numIntervals;

  const next = lastCompletion.occurredAt.getTime() + averageIntervalMs;
  const window = spreadMultiplier * spreadMs;

  return {
    numCompletions,
    numIntervals,
    lastCompletion,
    lastIntervalMs: intervals[numIntervals - 1],
    averageIntervalMs,
    spreadMs,
    nextExpected: new Date(next),
    early: new Date(next - window),
    late: new Date(next + window),
  };
}

function copyDate(date: Date | null): Date | null {
  return date ? new Date(date.getTime()) : null;
}

/** Copy with fresh `Date` objects, so callers cannot reach cached state. */
export function copyStats(stats: TrackerStats): TrackerStats {
  const last = stats.lastCompletion;
  return {
    ...stats,
    lastCompletion: last ? { occurredAt: new Date(last.occurredAt.getTime()), deviationMs: last.deviationMs } : null,
    nextExpected: copyDate(stats.nextExpected),
    early: copyDate(stats.early),
    late: copyDate(stats.late),
  };
}
