/**
 * Resolves date specifications into yyyy-MM-dd calendar dates.
 * Supports relative offsets (3d, 2w) and absolute ISO dates (2026-03-01).
 *
 * Calendar arithmetic runs in UTC so DST never shifts a day.
 */

import type { CalendarDate } from '../types/task.js';
import { InvalidDateSpecError } from '../errors.js';

const RELATIVE_RE = /^(\d+)([dw])$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const MIN_DATE: CalendarDate = '0001-01-01';
export const MAX_DATE: CalendarDate = '9999-12-31';

const DAY_MS = 86_400_000;
/** Largest magnitude a Date can hold */
const MAX_TIME_MS = 8.64e15;

/** Format a Date's local calendar day as yyyy-MM-dd */
export function formatDate(d: Date): CalendarDate {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Today's local calendar date */
export function today(now: Date = new Date()): CalendarDate {
  return formatDate(now);
}

function toUtcMs(date: CalendarDate): number | null {
  const m = ISO_DATE_RE.exec(date);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);

  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  // Rejects rollovers like 2026-02-30
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.getTime();
}

function fromUtcMs(ms: number): CalendarDate {
  const d = new Date(ms);
  const y = String(d.getUTCFullYear()).padStart(4, '0');
  const m = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Whether a string is a real yyyy-MM-dd date in the supported range */
export function isCalendarDate(value: string): value is CalendarDate {
  return toUtcMs(value) !== null && value >= MIN_DATE && value <= MAX_DATE;
}

/**
 * Add days to a calendar date. Returns null when the result leaves the
 * supported range.
 */
export function addDays(date: CalendarDate, n: number): CalendarDate | null {
  const base = toUtcMs(date);
  if (base === null || !Number.isSafeInteger(n)) return null;

  const result = base + n * DAY_MS;
  if (!Number.isSafeInteger(result) || Math.abs(result) > MAX_TIME_MS) return null;

  const year = new Date(result).getUTCFullYear();
  return year >= 1 && year <= 9999 ? fromUtcMs(result) : null;
}

/**
 * Resolve a date specification against a reference date.
 *
 * @param spec - "3d", "2w" or "2026-03-01"
 * @param reference - the date relative offsets count from
 * @throws InvalidDateSpecError when the spec is malformed or overflows
 */
export function resolveDateSpec(spec: string, reference: CalendarDate): CalendarDate {
  const rel = RELATIVE_RE.exec(spec);
  if (rel) {
    const count = Number(rel[1]);
    const days = rel[2] === 'w' ? count * 7 : count;
    const resolved = addDays(reference, days);
    if (resolved === null) throw new InvalidDateSpecError(spec, 'date out of range');
    return resolved;
  }

  if (/[dw]$/.test(spec)) {
    throw new InvalidDateSpecError(spec, 'offset must be a whole number');
  }
  if (!ISO_DATE_RE.test(spec)) {
    throw new InvalidDateSpecError(spec, 'unrecognised format');
  }
  if (!isCalendarDate(spec)) {
    throw new InvalidDateSpecError(spec, 'no such calendar date');
  }
  return spec;
}
