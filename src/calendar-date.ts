import type { CalendarDate } from '@footage-archive/contracts';

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  // Day 0 of the next month is the last day of this one.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function calendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  return isValidCalendarDate(year, month, day) ? { year, month, day } : undefined;
}

/**
 * Local calendar date of a timestamp; time of day is dropped.
 */
export function calendarDateFromTimestamp(timestamp: Date): CalendarDate {
  return {
    year: timestamp.getFullYear(),
    month: timestamp.getMonth() + 1,
    day: timestamp.getDate(),
  };
}

export function formatIsoDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function sameCalendarDate(left: CalendarDate, right: CalendarDate): boolean {
  return left.year === right.year && left.month === right.month && left.day === right.day;
}
