import { addDays, format, isValid, parse, subDays } from "date-fns";
import type { DateWindow } from "./types.js";

export const ISO_DATE_FORMAT = "yyyy-MM-dd";
export const ARCHIVE_DATE_FORMAT = "yyyyMMdd";

/**
 * Parses a strict YYYY-MM-DD calendar date at local midnight.
 * Returns null for anything else, including overflowing days like 2025-02-30.
 */
export function parseIsoDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(0));
  if (!isValid(parsed) || format(parsed, ISO_DATE_FORMAT) !== value) {
    return null;
  }
  return parsed;
}

export function formatIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function toArchiveDateCode(date: Date): string {
  return format(date, ARCHIVE_DATE_FORMAT);
}

export function dateWindow(end: Date, ndays: number): DateWindow {
  return {
    start: formatIsoDate(subDays(end, ndays - 1)),
    end: formatIsoDate(end),
  };
}

/** Every calendar day in [end - (ndays - 1), end], oldest first. */
export function windowDays(end: Date, ndays: number): Date[] {
  const start = subDays(end, ndays - 1);
  return Array.from({ length: ndays }, (_, i) => addDays(start, i));
}
