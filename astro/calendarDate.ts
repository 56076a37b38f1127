/**
 * Calendar-day values without a time zone attached.
 *
 * Birth dates and cache days are compared as plain year/month/day triples;
 * "today" is always taken from the local clock of the running process.
 */

export type CalendarDate = {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
};

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

const WEEKDAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parse a strict YYYY-MM-DD string. Returns null for anything that is not a
 * real calendar day (e.g. 2023-02-29).
 */
export function parseIsoDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function toIsoDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, "0")}-${String(date.month).padStart(2, "0")}-${String(date.day).padStart(2, "0")}`;
}

export function todayLocal(now: Date = new Date()): CalendarDate {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

/** 1-based: January 1st is day 1. */
export function dayOfYear(date: CalendarDate): number {
  const start = Date.UTC(date.year, 0, 0);
  const current = Date.UTC(date.year, date.month - 1, date.day);
  return Math.round((current - start) / MS_PER_DAY);
}

export function weekdayName(date: CalendarDate): string {
  const weekday = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return WEEKDAY_NAMES[weekday] ?? "Sunday";
}
