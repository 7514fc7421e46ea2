/**
 * Sign-in Activity
 * Merges cloud sign-in and on-prem last-logon into one activity value
 */

import { ResolvedActivity } from '../types';
import { TIMESTAMP_PLACEHOLDERS } from '../utils/constants';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Milliseconds between 1601-01-01 (FileTime epoch) and 1970-01-01
const FILETIME_EPOCH_OFFSET_MS = 11644473600000;
const FILETIME_NEVER = '9223372036854775807';

// Date parsing reads bare numbers as years ("1" -> 2001)
const NUMERIC = /^[-+]?\d+(\.\d+)?$/;

/**
 * Interpret a directory timestamp. Placeholders, other types and
 * "zero" dates (at or before 1970-01-01) come back as null.
 */
export function parseTimestamp(value: unknown): Date | null {
  let date: Date;

  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (
      !trimmed ||
      NUMERIC.test(trimmed) ||
      TIMESTAMP_PLACEHOLDERS.includes(trimmed.toLowerCase())
    ) {
      return null;
    }
    date = new Date(trimmed);
  } else {
    return null;
  }

  const time = date.getTime();
  if (Number.isNaN(time) || time <= 0) {
    return null;
  }
  return new Date(time);
}

/**
 * Convert an AD FileTime (100ns intervals since 1601-01-01 UTC),
 * e.g. lastLogonTimestamp, to a Date.
 */
export function parseFileTime(value: string | number): Date | null {
  const text = String(value).trim();
  if (!/^\d+$/.test(text) || text === FILETIME_NEVER) {
    return null;
  }

  const ticks = Number(text);
  if (ticks === 0) {
    return null;
  }
  return parseTimestamp(new Date(ticks / 10000 - FILETIME_EPOCH_OFFSET_MS));
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Cloud sign-in takes precedence; the on-prem value is only a fallback.
 * Cloud recency keeps one decimal, on-prem recency is whole days.
 */
export function mergeSignIn(cloud: unknown, onPrem: unknown, now: Date): ResolvedActivity {
  const cloudDate = parseTimestamp(cloud);
  if (cloudDate) {
    return {
      source: 'Cloud',
      lastActivity: cloudDate,
      daysSince: roundTo((now.getTime() - cloudDate.getTime()) / MS_PER_DAY, 1),
    };
  }

  const onPremDate = parseTimestamp(onPrem);
  if (onPremDate) {
    return {
      source: 'OnPrem',
      lastActivity: onPremDate,
      daysSince: roundTo((now.getTime() - onPremDate.getTime()) / MS_PER_DAY, 0),
    };
  }

  return { source: 'None', lastActivity: null, daysSince: null };
}
