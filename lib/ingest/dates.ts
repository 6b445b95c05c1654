import type { CalendarDate } from "@/lib/domain/types";

// YYYY-MM-DD or YYYY/MM/DD, optionally followed by a time part
const ISO_LIKE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ][0-9:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;
// M/D/YYYY
const US_SLASH = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parses a terrestrial date cell into a timezone-naive calendar date.
 * Returns null for anything unparseable, including impossible dates like 2018-02-30.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const s = value.trim();
  let m = ISO_LIKE.exec(s);
  if (m) return calendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
  m = US_SLASH.exec(s);
  if (m) return calendarDate(Number(m[3]), Number(m[1]), Number(m[2]));
  return null;
}

function calendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;
  return Object.freeze({ year, month, day });
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function formatDayKey(date: CalendarDate): string {
  const yyyy = String(date.year).padStart(4, "0");
  const mm = String(date.month).padStart(2, "0");
  const dd = String(date.day).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

