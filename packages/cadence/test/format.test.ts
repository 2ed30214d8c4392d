import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatPage, formatRow, formatTrackerInfo, pageBanner, shortDate, trackerJson, urgency } from '../src/format.js';
import { Tracker } from '../src/tracker.js';
import { fixedClock } from './helpers/memory-store.js';
import type { TrackerView } from '../src/types.js';

beforeAll(() => {
  chalk.level = 0;
});

const clock = fixedClock(new Date(2024, 0, 1, 12, 0));

function weekly(): TrackerView {
  const t = Tracker.create(4, 'Water plants', { clock: clock.now });
  for (const day of [1, 8, 15]) t.recordCompletion({ occurredAt: new Date(2024, 0, day), deviationMs: 0 });
  return t.view();
}

function fresh(): TrackerView {
  return Tracker.create(5, 'Descale kettle', { clock: clock.now }).view();
}

describe('pageBanner', () => {
  it('should mark the active page', () => {
    expect(pageBanner(1, 3)).toBe('○ ● ○');
    expect(pageBanner(0, 1)).toBe('●');
  });
});

describe('shortDate', () => {
  it('should render YY-MM-DD or a placeholder', () => {
    expect(shortDate(new Date(2024, 2, 5))).toBe('24-03-05');
    expect(shortDate(null)).toBe('   ~    ');
  });
});

describe('urgency', () => {
  it('should place now relative to the predicted window', () => {
    const view = weekly();
    expect(urgency(view, new Date(2024, 0, 20))).toBe('upcoming');
    expect(urgency(view, new Date(2024, 0, 22))).toBe('due');
    expect(urgency(view, new Date(2024, 0, 23))).toBe('late');
    expect(urgency(fresh())).toBe('none');
  });
});

describe('formatRow', () => {
  it('should show tag, next, last and name', () => {
    expect(formatRow({ tag: 'a', tracker: weekly() }, new Date(2024, 0, 16))).toBe(' a     24-01-22  24-01-15  Water plants');
    expect(formatRow({ tag: 'b', tracker: fresh() })).toBe(' b        ~         ~      Descale kettle');
  });
});

describe('formatPage', () => {
  it('should say when there is nothing to list', () => {
    expect(formatPage([], 0, 0, 'next-first')).toBe('No trackers found.');
  });

  it('should add a banner for several pages and mark a reversed order', () => {
    const text = formatPage([{ tag: 'a', tracker: fresh() }], 1, 2, 'next-last');
    expect(text.split('\n')).toEqual([
      ' tag   next       last      tracker name',
      ' a        ~         ~      Descale kettle',
      '',
      '○ ●  (reversed)',
    ]);
  });
});

describe('formatTrackerInfo', () => {
  it('should list history and prediction', () => {
    const lines = formatTrackerInfo(weekly()).split('\n');
    expect(lines[0]).toBe('Water plants');
    expect(lines).toContain('  id:          4');
    expect(lines).toContain('  completions: (3)');
    expect(lines).toContain('     1. 240101T0000 +0m');
    expect(lines).toContain('    average:   +7d');
    expect(lines).toContain('    spread:    +0m');
    expect(lines).toContain('  next:        240122T0000');
  });

  it('should show placeholders without a prediction', () => {
    const lines = formatTrackerInfo(fresh()).split('\n');
    expect(lines).toContain('    none');
    expect(lines).toContain('  next:        ~');
  });
});

describe('trackerJson', () => {
  it('should render dates as ISO strings and durations as text', () => {
    const json = trackerJson(weekly());
    expect(json.id).toBe(4);
    expect(json.stats).toEqual({
      numCompletions: 3,
      numIntervals: 2,
      lastInterval: '+7d',
      averageInterval: '+7d',
      spread: '+0m',
      nextExpected: new Date(2024, 0, 22).toISOString(),
      early: new Date(2024, 0, 22).toISOString(),
      late: new Date(2024, 0, 22).toISOString(),
    });
  });
});
