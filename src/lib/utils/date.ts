/**
 * Date helpers. Dates travel through the app as ISO calendar strings
 * (YYYY-MM-DD) so they survive JSON unchanged and compare lexically.
 */

import type { DateRange } from '@/types/anilist';
import { DEFAULT_RANGE_DAYS } from '@/config/anilist';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, length: number): string {
  return String(value).padStart(length, '0');
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

function isRealDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = utcDate(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Check that a string is an ISO date naming a real calendar day.
 */
export function isIsoDate(value: string | null | undefined): value is string {
  if (!value) return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  return isRealDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Convert an ISO date to AniList's FuzzyDateInt form.
 * @param isoDate - e.g. "2024-03-05"
 * @returns e.g. 20240305
 */
export function toFuzzyDateInt(isoDate: string): number {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new RangeError(`Invalid ISO date: ${isoDate}`);
  }
  return Number(match[1]) * 10000 + Number(match[2]) * 100 + Number(match[3]);
}

/**
 * Build an ISO date from AniList's fuzzy date parts.
 * Returns null unless year, month and day are all present and valid.
 */
export function fuzzyDateToIso(
  year: number | null | undefined,
  month: number | null | undefined,
  day: number | null | undefined
): string | null {
  if (!year || !month || !day) return null;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (!isRealDate(year, month, day)) return null;
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Format a Date as an ISO date in the local calendar.
 */
export function toIsoDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

/**
 * Shift an ISO date by a number of days.
 */
export function addDays(isoDate: string, days: number): string {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new RangeError(`Invalid ISO date: ${isoDate}`);
  }
  const date = utcDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  date.setUTCDate(date.getUTCDate() + days);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * Return the range with its bounds in order.
 */
export function normalizeRange(range: DateRange): DateRange {
  return range.from > range.to ? { from: range.to, to: range.from } : range;
}

/**
 * The range shown when the page opens: the last week through today.
 */
export function getDefaultRange(today: Date = new Date()): DateRange {
  const to = toIsoDate(today);
  return { from: addDays(to, -DEFAULT_RANGE_DAYS), to };
}

export function formatRangeSubtitle(range: DateRange): string {
  return `${range.from} → ${range.to} (based on AniList startDate)`;
}
