/**
 * Archive date for a file: the date embedded in the camera's filename wins,
 * then the best creation-like filesystem timestamp.
 *
 * Camera names look like `VID_20241011_185020_00_003.insv`: a prefix token,
 * an 8-digit date block, then fields that are ignored here.
 */

import type { CalendarDate, DateSource, ManagedFamily } from '@footage-archive/contracts';
import { calendarDate, calendarDateFromTimestamp } from './calendar-date.js';

/**
 * Platform capability: the best available creation-like timestamp.
 * `birthtime` is undefined where the platform does not report one.
 */
export interface FileTimestamps {
  birthtime?: Date;
  mtime: Date;
}

export interface ResolvedDate {
  date: CalendarDate;
  source: DateSource;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const patternCache = new Map<string, RegExp>();

function filenameDatePattern(prefixes: string[]): RegExp {
  const key = prefixes.join('\u0000');
  const cached = patternCache.get(key);
  if (cached) {
    return cached;
  }

  // Longest first so PRO_VID is tried before VID.
  const alternatives = [...prefixes]
    .sort((left, right) => right.length - left.length)
    .map(escapeRegExp)
    .join('|');
  const pattern = new RegExp(`^(?:${alternatives})_(\\d{4})(\\d{2})(\\d{2})(?:[_.]|$)`, 'i');
  patternCache.set(key, pattern);
  return pattern;
}

export function parseFilenameDate(filename: string, family: ManagedFamily): CalendarDate | undefined {
  if (family.datePrefixes.length === 0) {
    return undefined;
  }

  const match = filenameDatePattern(family.datePrefixes).exec(filename);
  if (!match) {
    return undefined;
  }

  return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function bestCreationTimestamp(timestamps: FileTimestamps): { timestamp: Date; source: DateSource } {
  if (timestamps.birthtime && timestamps.birthtime.getTime() > 0) {
    return { timestamp: timestamps.birthtime, source: 'birthtime' };
  }
  return { timestamp: timestamps.mtime, source: 'mtime' };
}

export function resolveDate(
  filename: string,
  timestamps: FileTimestamps,
  family: ManagedFamily,
): ResolvedDate {
  const fromName = parseFilenameDate(filename, family);
  if (fromName) {
    return { date: fromName, source: 'filename' };
  }

  const best = bestCreationTimestamp(timestamps);
  return { date: calendarDateFromTimestamp(best.timestamp), source: best.source };
}
