/**
 * Time utilities for consistent date handling
 *
 * All calendar logic (months, days, as-of dates) runs in UTC so a series
 * scores the same on every host.
 */

import { format, isValid, parse, parseISO } from 'date-fns';
import type { RawTimestamp } from '@/types/trends';

export const DAY_MS = 24 * 60 * 60 * 1000;

// Upstream timeline labels: "Nov 3, 2024", "November 2024", "03/11/2024", ...
const LABEL_FORMATS = [
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM yyyy',
  'MMMM yyyy',
  'd MMM yyyy',
  'd/M/yyyy',
  'yyyy-MM',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

function toUtcCalendarDay(local: Date): Date {
  return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()));
}

function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value)) return null;
  // Values this small are epoch seconds (upstream timeline "timestamp" fields)
  const ms = Math.abs(value) < 1e11 ? value * 1000 : value;
  const date = new Date(ms);
  return isValid(date) ? date : null;
}

function parseLabel(label: string): Date | null {
  // Ranges such as "Nov 3 – 9, 2024" or "Dec 31, 2023 - Jan 6, 2024" start at the first part
  const [first] = label.split(/\s[–-]\s/);
  let start = first.trim();
  if (!/\d{4}/.test(start)) {
    const year = label.match(/(\d{4})\s*$/);
    if (year) {
      start = `${start}, ${year[1]}`;
    }
  }

  for (const pattern of LABEL_FORMATS) {
    const parsed = parse(start, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return toUtcCalendarDay(parsed);
    }
  }
  return null;
}

export function parseTimestamp(raw: RawTimestamp): Date | null {
  if (raw instanceof Date) {
    return isValid(raw) ? new Date(raw.getTime()) : null;
  }
  if (typeof raw === 'number') {
    return fromEpoch(raw);
  }
  if (typeof raw !== 'string') {
    return null;
  }

  const value = raw.trim();
  if (!value) return null;

  if (/^\d+$/.test(value)) {
    return fromEpoch(Number(value));
  }
  if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    const parsed = parseISO(value);
    return isValid(parsed) ? toUtcCalendarDay(parsed) : null;
  }
  if (/^\d{4}-\d{2}-\d{2}T/.test(value)) {
    const parsed = parseISO(value);
    return isValid(parsed) ? parsed : null;
  }
  return parseLabel(value);
}

/** Calendar month 1-12 (UTC). */
export function utcMonth(date: Date): number {
  return date.getUTCMonth() + 1;
}

export function yearMonthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(utcMonth(date)).padStart(2, '0')}`;
}

export function formatUtcDate(date: Date): string {
  return format(
    new Date(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
    'yyyy-MM-dd'
  );
}
