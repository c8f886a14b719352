/**
 * The one definition of a date folder name, shared by placement and repair.
 *
 * Accepted: `YYYY-MM-DD`, or that prefix followed by `-`, a space or `/`
 * and any suffix (`2024-10-11 Paris Trip`, `2024-10-11-vacation`).
 */

import type { CalendarDate } from '@footage-archive/contracts';
import { calendarDate, formatIsoDate } from './calendar-date.js';

export const DATE_FOLDER_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:([ /-])(.*))?$/s;

export interface ParsedDateFolder {
  date: CalendarDate;
  suffix?: string;
}

/**
 * Parse a folder name. Names whose digits are not a real date do not count.
 */
export function parseDateFolderName(name: string): ParsedDateFolder | undefined {
  const match = DATE_FOLDER_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }

  const date = calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  if (!date) {
    return undefined;
  }

  const suffix = match[5];
  return suffix ? { date, suffix } : { date };
}

export function isDateFolderName(name: string): boolean {
  return parseDateFolderName(name) !== undefined;
}

/**
 * True when `name` is a date folder owned by `date`.
 */
export function dateFolderMatches(name: string, date: CalendarDate): boolean {
  const iso = formatIsoDate(date);
  if (!name.startsWith(iso)) {
    return false;
  }
  return isDateFolderName(name);
}
