import type { DayWindow } from '../types/report.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isValidISODate(dateStr: string): boolean {
  const match = ISO_DATE_PATTERN.exec(dateStr);
  if (match === null) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim() === '') return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

function zonedParts(epochSeconds: number, timeZone: string): ZonedParts {
  const parts = getFormatter(timeZone).formatToParts(new Date(epochSeconds * 1000));
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part === undefined ? 0 : Number(part.value);
  };
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second'),
  };
}

/**
 * Offset of `timeZone` from UTC at the given instant, in seconds (Kyiv in winter: 7200).
 */
export function timeZoneOffsetSeconds(epochSeconds: number, timeZone: string): number {
  const p = zonedParts(epochSeconds, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second) / 1000;
  return asUtc - Math.floor(epochSeconds);
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Calendar date (YYYY-MM-DD) of an instant in `timeZone`.
 */
export function toLocalDate(epochSeconds: number, timeZone: string): string {
  const p = zonedParts(epochSeconds, timeZone);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)}`;
}

/**
 * Wall-clock time (HH:MM) of an instant in `timeZone`.
 */
export function formatLocalTime(epochSeconds: number, timeZone: string): string {
  const p = zonedParts(epochSeconds, timeZone);
  return `${pad2(p.hour)}:${pad2(p.minute)}`;
}

function localMidnight(year: number, month: number, day: number, timeZone: string): number {
  const guess = Date.UTC(year, month - 1, day) / 1000;
  const firstOffset = timeZoneOffsetSeconds(guess, timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = timeZoneOffsetSeconds(candidate, timeZone);
  return secondOffset === firstOffset ? candidate : guess - secondOffset;
}

/**
 * Inclusive unix-second bounds of a calendar day in `timeZone`.
 * Days with a DST change are 23 or 25 hours long.
 */
export function resolveDayWindow(date: string, timeZone: string): DayWindow {
  const match = ISO_DATE_PATTERN.exec(date);
  if (match === null || !isValidISODate(date)) {
    throw new Error(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  if (!isValidTimeZone(timeZone)) {
    throw new Error(`Unknown timezone "${timeZone}"`);
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);

  const next = new Date(Date.UTC(year, month - 1, day + 1));
  const start = localMidnight(year, month, day, timeZone);
  const nextStart = localMidnight(next.getUTCFullYear(), next.getUTCMonth() + 1, next.getUTCDate(), timeZone);

  return { date, timezone: timeZone, start, end: nextStart - 1 };
}

export function nowUnixSeconds(nowMs: number = Date.now()): number {
  return Math.floor(nowMs / 1000);
}
