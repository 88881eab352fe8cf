// ── Due Dates ─────────────────────────────────────────────────────────────

import { RemindersError, type DateComponents } from './types.js';

const RELATIVE_RE = /^\+(\d+)([mhdw])$/i;

const DATE_TIME_FORMATS = [
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/,
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})$/,
];

const DATE_ONLY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function dateToComponents(dt: Date): DateComponents {
  return {
    year: dt.getFullYear(),
    month: dt.getMonth() + 1,
    day: dt.getDate(),
    hour: dt.getHours(),
    minute: dt.getMinutes(),
    second: dt.getSeconds(),
  };
}

/** Resolves calendar components to a local-time instant. All-day dates land on midnight. */
export function componentsToDate(c: DateComponents): Date {
  // setFullYear keeps years 0-99 literal; the Date constructor maps them to 19xx
  const dt = new Date(0);
  dt.setFullYear(c.year, c.month - 1, c.day);
  dt.setHours(c.hour ?? 0, c.minute ?? 0, c.second ?? 0, 0);
  return dt;
}

function isRealDate(c: DateComponents): boolean {
  const dt = componentsToDate(c);
  return (
    !isNaN(dt.getTime()) &&
    dt.getFullYear() === c.year &&
    dt.getMonth() === c.month - 1 &&
    dt.getDate() === c.day &&
    dt.getHours() === (c.hour ?? 0) &&
    dt.getMinutes() === (c.minute ?? 0) &&
    dt.getSeconds() === (c.second ?? 0)
  );
}

export function parseDueDate(input: string, now: Date = new Date()): DateComponents {
  const s = input.trim();

  // 1. Relative shortcuts: +Nm, +Nh, +Nd, +Nw
  const m = RELATIVE_RE.exec(s);
  if (m) {
    const n = parseInt(m[1], 10);
    const unit = m[2].toLowerCase();
    const dt = new Date(now.getTime());
    if (unit === 'm') {
      dt.setMinutes(dt.getMinutes() + n);
    } else if (unit === 'h') {
      dt.setHours(dt.getHours() + n);
    } else if (unit === 'd') {
      dt.setDate(dt.getDate() + n);
    } else {
      dt.setDate(dt.getDate() + n * 7);
    }
    return dateToComponents(dt);
  }

  // 2. Named shortcuts
  const sl = s.toLowerCase();
  if (sl === 'today') {
    return {
      year: now.getFullYear(),
      month: now.getMonth() + 1,
      day: now.getDate(),
      hour: 23,
      minute: 59,
    };
  }
  if (sl === 'tomorrow') {
    const dt = new Date(now.getTime());
    dt.setDate(dt.getDate() + 1);
    return {
      year: dt.getFullYear(),
      month: dt.getMonth() + 1,
      day: dt.getDate(),
      hour: 9,
      minute: 0,
    };
  }

  // 3. ISO-like dates, with or without a time of day
  for (const fmt of DATE_TIME_FORMATS) {
    const match = fmt.exec(s);
    if (match) {
      const c: DateComponents = {
        year: parseInt(match[1], 10),
        month: parseInt(match[2], 10),
        day: parseInt(match[3], 10),
        hour: parseInt(match[4], 10),
        minute: parseInt(match[5], 10),
      };
      if (match[6]) c.second = parseInt(match[6], 10);
      if (isRealDate(c)) return c;
    }
  }

  const dateOnly = DATE_ONLY_RE.exec(s);
  if (dateOnly) {
    const c: DateComponents = {
      year: parseInt(dateOnly[1], 10),
      month: parseInt(dateOnly[2], 10),
      day: parseInt(dateOnly[3], 10),
    };
    if (isRealDate(c)) return c;
  }

  throw new RemindersError(`Cannot parse date: '${input}'`);
}

// ── Formatting ────────────────────────────────────────────────────────────

const RELATIVE_UNITS: Array<[Intl.RelativeTimeFormatUnit, number]> = [
  ['year', 365 * 86400],
  ['month', 30 * 86400],
  ['week', 7 * 86400],
  ['day', 86400],
  ['hour', 3600],
  ['minute', 60],
  ['second', 1],
];

const relativeFormatter = new Intl.RelativeTimeFormat('en', { numeric: 'always' });

/** "in 2 hours", "3 days ago" */
export function fmtRelative(dt: Date, now: Date = new Date()): string {
  const diffSeconds = (dt.getTime() - now.getTime()) / 1000;
  const abs = Math.abs(diffSeconds);
  for (let i = 0; i < RELATIVE_UNITS.length; i++) {
    const [unit, size] = RELATIVE_UNITS[i];
    if (abs < size) continue;
    const value = Math.round(diffSeconds / size);
    // 59.6 minutes rounds to 60, which reads as 1 hour
    if (i > 0 && Math.abs(value) * size >= RELATIVE_UNITS[i - 1][1]) {
      const [largerUnit, largerSize] = RELATIVE_UNITS[i - 1];
      return relativeFormatter.format(Math.round(diffSeconds / largerSize), largerUnit);
    }
    return relativeFormatter.format(value, unit);
  }
  return relativeFormatter.format(0, 'second');
}

export function toEpochSeconds(dt: Date): number {
  return Math.trunc(dt.getTime() / 1000);
}
