import type { Logger } from "winston";
import { dateWindow, formatIsoDate, windowDays } from "./dates.js";
import type { DayFetcher, RangeResult, TradeTable } from "./types.js";

/**
 * Fetches every calendar day of the window ending at `end`, one at a time and
 * oldest first, and concatenates the days that had data. Weekends and
 * holidays simply come back unavailable from the fetcher.
 */
export async function aggregateRange(
  end: Date,
  ndays: number,
  fetchDay: DayFetcher,
  logger: Logger
): Promise<RangeResult> {
  if (!Number.isInteger(ndays) || ndays < 1) {
    throw new RangeError(`ndays must be a positive integer, got ${ndays}`);
  }

  const log = logger.child({ component: "bhavcopy.range" });
  const window = dateWindow(end, ndays);
  log.info(`Date range: ${window.start} to ${window.end}`);

  const rows: TradeTable = [];
  const fetchedDates: string[] = [];
  const missingDates: string[] = [];

  for (const day of windowDays(end, ndays)) {
    const result = await fetchDay(day);
    if (result.status === "ok" && result.rows.length > 0) {
      rows.push(...result.rows);
      fetchedDates.push(result.date);
      log.info(`Added data for ${result.date}, total rows now: ${rows.length}`);
    } else {
      missingDates.push(formatIsoDate(day));
      log.warn(`No data available for ${formatIsoDate(day)}`);
    }
  }

  if (rows.length === 0) {
    log.error("No data was retrieved for the entire date range", { window });
    return { status: "unavailable", window, missingDates };
  }

  return { status: "ok", window, rows, fetchedDates, missingDates };
}
