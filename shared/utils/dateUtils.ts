import { CalendarDate } from '../types/index';

// YYYY-MM-DD, optionally followed by a time part
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
// M/D/YYYY, optionally followed by a time part
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|\s)/;

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

function toValidDate(year: number, month: number, day: number): CalendarDate | null {
  // Validate date - create UTC date to avoid timezone issues
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Normalize a date or datetime cell to a calendar date (YYYY-MM-DD).
 *
 * Accepts `YYYY-MM-DD` and `M/D/YYYY`, each optionally followed by a time. The
 * written day is kept regardless of any time or offset that follows, so
 * "2024-01-19 16:00:00-05:00" stays on the 19th.
 *
 * @returns the calendar date, or null if the value is empty, in another format, or not a real date
 */
export function toCalendarDate(value: string | null): CalendarDate | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();

  const iso = trimmed.match(ISO_DATE);
  if (iso) {
    return toValidDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
  }

  const us = trimmed.match(US_DATE);
  if (us) {
    return toValidDate(parseInt(us[3], 10), parseInt(us[1], 10), parseInt(us[2], 10));
  }

  return null;
}

/**
 * Parse a timestamp cell written in one of the date formats `toCalendarDate`
 * accepts. Returns null for empty or unparseable values.
 */
export function toTimestamp(value: string | null): Date | null {
  if (value === null || toCalendarDate(value) === null) {
    return null;
  }
  const parsed = new Date(value.trim());
  return isNaN(parsed.getTime()) ? null : parsed;
}
