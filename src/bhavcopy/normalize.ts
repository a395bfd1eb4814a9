import type { Logger } from "winston";
import type { DailyTradeRow } from "./types.js";

const EQUITY_SERIES = "EQ";

/**
 * Narrows a day's rows to the equity series. Falls back to a case-insensitive
 * match, and returns the input untouched when neither finds anything.
 */
export function normalizeRows<T extends Pick<DailyTradeRow, "series">>(
  rows: T[],
  logger?: Logger
): T[] {
  logger?.debug("Security series found", {
    series: [...new Set(rows.map((row) => row.series))],
  });

  const exact = rows.filter((row) => row.series === EQUITY_SERIES);
  if (exact.length > 0) {
    logger?.info(`Found ${exact.length} rows with series ${EQUITY_SERIES}`);
    return exact;
  }

  logger?.warn(`No exact '${EQUITY_SERIES}' matches, trying case-insensitive match`);
  const relaxed = rows.filter((row) => row.series.toUpperCase() === EQUITY_SERIES);
  if (relaxed.length > 0) {
    logger?.info(`Found ${relaxed.length} rows after case-insensitive match`);
    return relaxed;
  }

  logger?.warn("No equity series rows found, keeping all rows");
  return rows;
}
