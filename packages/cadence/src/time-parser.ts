/**
 * Parse human-friendly datetimes and compact signed durations.
 *
 * Dates are resolved year-first and never day-first: `24-01-02` is
 * 2 January 2024 and `01/02/2024` is 2 January 2024. Everything is local time.
 */

import { ParseError, InvalidUnitError, ok, err, type Result } from './errors.js';
import type { CompletionEvent } from './types.js';

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Years a `YYMMDDTHHMM` timestamp can name. */
export const MIN_TIMESTAMP_YEAR = 1969;
export const MAX_TIMESTAMP_YEAR = 2068;

const UNIT_MS: Record<string, number> = {
  d: DAY_MS,
  h: HOUR_MS,
  m: MINUTE_MS,
  s: SECOND_MS,
};

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

interface TimeOfDay { h: number; m: number; s: number }

const MIDNIGHT: TimeOfDay = { h: 0, m: 0, s: 0 };

export function parseDatetime(input: string, now: Date = new Date()): Result<Date, ParseError> {
  const trimmed = input.trim().toLowerCase().replace(/,/g, ' ').replace(/\s+/g, ' ');
  if (!trimmed) return err(new ParseError('Missing datetime'));

  if (trimmed === 'now') return ok(new Date(now.getTime()));

  // "today", "yesterday", "tomorrow", optionally "yesterday 9am"
  const rel = trimmed.match(/^(today|yesterday|tomorrow)(?: (.+))?$/);
  if (rel) {
    const offset = rel[1] === 'yesterday' ? -1 : rel[1] === 'tomorrow' ? 1 : 0;
    const time = rel[2] ? parseTimeOfDay(rel[2]) : MIDNIGHT;
    if (!time) return invalid(input);
    return build(input, now.getFullYear(), now.getMonth() + 1, now.getDate() + offset, time, false);
  }

  // Compact "241231T2359", "241231", "20241231"
  const compact = trimmed.match(/^(\d{6}|\d{8})(?:t(\d{2})(\d{2}))?$/);
  if (compact) {
    const digits = compact[1];
    const year = expandYear(digits.slice(0, digits.length - 4));
    const month = Number(digits.slice(-4, -2));
    const day = Number(digits.slice(-2));
    const time = compact[2] ? { h: Number(compact[2]), m: Number(compact[3]), s: 0 } : MIDNIGHT;
    return build(input, year, month, day, time);
  }

  // "12/31/2024": a four-digit year last means month first
  const monthFirst = trimmed.match(/^(\d{1,2})([-/.])(\d{1,2})\2(\d{4})(?:(?:t| )(.+))?$/);
  if (monthFirst) {
    return withTime(input, Number(monthFirst[4]), Number(monthFirst[1]), Number(monthFirst[3]), monthFirst[5]);
  }

  // "2024-12-31", "24/12/31", "2024.12.31 15:00", "2024-12-31T15:00"
  const yearFirst = trimmed.match(/^(\d{4}|\d{1,2})([-/.])(\d{1,2})\2(\d{1,2})(?:(?:t| )(.+))?$/);
  if (yearFirst) {
    return withTime(input, expandYear(yearFirst[1]), Number(yearFirst[3]), Number(yearFirst[4]), yearFirst[5]);
  }

  // "12/31" in the current year
  const monthDay = trimmed.match(/^(\d{1,2})\/(\d{1,2})(?: (.+))?$/);
  if (monthDay) {
    return withTime(input, now.getFullYear(), Number(monthDay[1]), Number(monthDay[2]), monthDay[3]);
  }

  // "jan 5", "january 5 2024 3pm"
  const nameFirst = trimmed.match(/^([a-z]+)\.? (\d{1,2})(?:st|nd|rd|th)?(?: (\d{4}))?(?: (.+))?$/);
  const nameMonth = nameFirst ? monthIndex(nameFirst[1]) : null;
  if (nameFirst && nameMonth !== null) {
    const year = nameFirst[3] ? Number(nameFirst[3]) : now.getFullYear();
    return withTime(input, year, nameMonth, Number(nameFirst[2]), nameFirst[4]);
  }

  // "5 jan 2024", "5th january"
  const dayFirst = trimmed.match(/^(\d{1,2})(?:st|nd|rd|th)? ([a-z]+)\.?(?: (\d{4}))?(?: (.+))?$/);
  const dayMonth = dayFirst ? monthIndex(dayFirst[2]) : null;
  if (dayFirst && dayMonth !== null) {
    const year = dayFirst[3] ? Number(dayFirst[3]) : now.getFullYear();
    return withTime(input, year, dayMonth, Number(dayFirst[1]), dayFirst[4]);
  }

  // A bare time means today
  const time = parseTimeOfDay(trimmed);
  if (time) return build(input, now.getFullYear(), now.getMonth() + 1, now.getDate(), time);

  return invalid(input);
}

function parseTimeOfDay(s: string): TimeOfDay | null {
  // "9am", "10:30am", "3 pm"
  const ampm = s.match(/^(\d{1,2})(?::(\d{2}))?\s*(am|pm)$/);
  if (ampm) {
    let h = Number(ampm[1]);
    const m = ampm[2] ? Number(ampm[2]) : 0;
    if (h < 1 || h > 12 || m > 59) return null;
    if (ampm[3] === 'pm' && h < 12) h += 12;
    if (ampm[3] === 'am' && h === 12) h = 0;
    return { h, m, s: 0 };
  }
  // "14:00", "14:00:30"
  const mil = s.match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
  if (mil) {
    const h = Number(mil[1]);
    const m = Number(mil[2]);
    const sec = mil[3] ? Number(mil[3]) : 0;
    if (h > 23 || m > 59 || sec > 59) return null;
    return { h, m, s: sec };
  }
  return null;
}

function withTime(input: string, year: number, month: number, day: number, timeText: string | undefined): Result<Date, ParseError> {
  const time = timeText ? parseTimeOfDay(timeText) : MIDNIGHT;
  if (!time) return invalid(input);
  return build(input, year, month, day, time);
}

function build(input: string, year: number, month: number, day: number, time: TimeOfDay, strict = true): Result<Date, ParseError> {
  if (strict && (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month))) {
    return invalid(input);
  }
  if (time.h > 23 || time.m > 59 || time.s > 59) return invalid(input);
  const d = new Date(2000, 0, 1, time.h, time.m, time.s, 0);
  d.setFullYear(year, month - 1, day);
  return ok(d);
}

/** Two-digit years pivot like strptime's `%y`: 69–99 are 19xx, 00–68 are 20xx. */
function expandYear(text: string): number {
  if (text.length === 4) return Number(text);
  const yy = Number(text);
  return yy >= 69 ? 1900 + yy : 2000 + yy;
}

function daysInMonth(year: number, month: number): number {
  return new Date(year, month, 0).getDate();
}

function monthIndex(token: string): number | null {
  if (token.length < 3) return null;
  const idx = MONTHS.findIndex(m => m.startsWith(token));
  return idx >= 0 ? idx + 1 : null;
}

function invalid(input: string): { ok: false; error: ParseError } {
  return err(new ParseError(`Could not parse datetime '${input.trim()}'`));
}

/**
 * Parse a signed duration such as `2d-3h5m`. Every component carries its own
 * sign and the components are summed.
 */
export function parseDuration(input: string): Result<number, ParseError> {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) return err(new ParseError('Missing duration'));
  if (!/^(?:[+-]?\d+[a-z])+$/.test(trimmed)) {
    return err(new ParseError(`Invalid duration '${input.trim()}' (expected e.g. 2d-3h5m)`));
  }

  let total = 0;
  for (const [, sign, digits, unit] of trimmed.matchAll(/([+-]?)(\d+)([a-z])/g)) {
    const unitMs = UNIT_MS[unit];
    if (unitMs === undefined) return err(new InvalidUnitError(unit));
    const n = Number(digits) * unitMs;
    total += sign === '-' ? -n : n;
  }
  return ok(total);
}

/**
 * Render a duration to the nearest minute. Negative durations sign every
 * component so the text parses back to the same value.
 */
export function formatDuration(ms: number): string {
  let minutes = Math.round(Math.abs(ms) / MINUTE_MS);
  if (minutes === 0) return '+0m';
  const sign = ms < 0 ? '-' : '+';

  const days = Math.floor(minutes / 1440);
  minutes %= 1440;
  const hours = Math.floor(minutes / 60);
  minutes %= 60;

  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes) parts.push(`${minutes}m`);
  return sign === '+' ? `+${parts.join('')}` : parts.map(p => `-${p}`).join('');
}

/**
 * Parse `<datetime>[, <duration>]` into a completion event. When both halves
 * are malformed both messages are reported.
 */
export function parseCompletion(input: string, now: Date = new Date()): Result<CompletionEvent, ParseError> {
  const comma = input.indexOf(',');
  const dtText = comma >= 0 ? input.slice(0, comma) : input;
  const tdText = comma >= 0 ? input.slice(comma + 1).trim() : '';

  const dt = parseDatetime(dtText, now);
  const td: Result<number, ParseError> = tdText ? parseDuration(tdText) : ok(0);

  if (!dt.ok && !td.ok) return err(new ParseError(`${dt.error.message}; ${td.error.message}`));
  if (!dt.ok) return dt;
  if (!td.ok) return td;
  return ok({ occurredAt: dt.value, deviationMs: td.value });
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Fixed-width `YYMMDDTHHMM` in local time, e.g. `241231T2359`. */
export function formatTimestamp(date: Date): string {
  return `${pad2(date.getFullYear() % 100)}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}T${pad2(date.getHours())}${pad2(date.getMinutes())}`;
}

export function parseTimestamp(text: string): Result<Date, ParseError> {
  const m = text.trim().match(/^(\d{2})(\d{2})(\d{2})T(\d{2})(\d{2})$/);
  if (!m) return err(new ParseError(`Invalid timestamp '${text}' (expected YYMMDDTHHMM)`));
  return build(text, expandYear(m[1]), Number(m[2]), Number(m[3]), { h: Number(m[4]), m: Number(m[5]), s: 0 });
}

export function isTimestampYear(date: Date): boolean {
  const year = date.getFullYear();
  return year >= MIN_TIMESTAMP_YEAR && year <= MAX_TIMESTAMP_YEAR;
}

export function formatCompletion(event: CompletionEvent): string {
  return `${formatTimestamp(event.occurredAt)}, ${formatDuration(event.deviationMs)}`;
}
