import type { Logger } from "winston";
import { formatIsoDate } from "./bhavcopy/dates.js";
import { aggregateRange } from "./bhavcopy/range.js";
import type { DailyTradeRow, DateWindow, DayFetcher, TradeTable } from "./bhavcopy/types.js";

export const TOP_MOVERS_LIMIT = 10;

export const NO_RANGE_DATA_ERROR = "No data available for the specified date range";

export interface MoverRecord {
  symbol: string;
  startPrice: number;
  endPrice: number;
  pctChange: number;
  series: string | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  value: number | null;
  /** False when the symbol has no row on the requested end date. */
  complete: boolean;
}

export interface MoversReport {
  gainers: MoverRecord[];
  losers: MoverRecord[];
  window: DateWindow;
  tradingDates: string[];
}

export interface ErrorResult {
  error: string;
}

export function isErrorResult(value: unknown): value is ErrorResult {
  return typeof value === "object" && value !== null && "error" in value && typeof value.error === "string";
}

interface PriceChange {
  symbol: string;
  series: string;
  startPrice: number;
  endPrice: number;
  pctChange: number;
}

export function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

// Unfiltered days can list one symbol under several series.
function instrumentKey(row: Pick<DailyTradeRow, "symbol" | "series">): string {
  return `${row.symbol}\u0000${row.series.toUpperCase()}`;
}

/**
 * Start/end price per instrument (symbol and series). With a single trading
 * date both come from that day's row (open to close). Across several dates the
 * start is the open of the instrument's first row and the end the close of its
 * last row; instruments seen on a single date only are dropped. Order follows
 * first appearance in the table.
 */
export function priceChanges(rows: TradeTable): PriceChange[] {
  const tradingDates = new Set(rows.map((row) => row.tradeDate));
  const byInstrument = new Map<string, { first: DailyTradeRow; last: DailyTradeRow; dates: Set<string> }>();

  for (const row of rows) {
    const seen = byInstrument.get(instrumentKey(row));
    if (seen) {
      seen.last = row;
      seen.dates.add(row.tradeDate);
    } else {
      byInstrument.set(instrumentKey(row), { first: row, last: row, dates: new Set([row.tradeDate]) });
    }
  }

  const changes: PriceChange[] = [];
  for (const { first, last, dates } of byInstrument.values()) {
    if (tradingDates.size > 1 && dates.size < 2) {
      continue;
    }
    const startPrice = first.open;
    const endPrice = last.close;
    const pctChange = ((endPrice - startPrice) / startPrice) * 100;
    // zero start price
    if (startPrice === 0 || !Number.isFinite(pctChange)) {
      continue;
    }
    changes.push({ symbol: first.symbol, series: first.series, startPrice, endPrice, pctChange });
  }
  return changes;
}

function toMoverRecord(change: PriceChange, latest: DailyTradeRow | undefined): MoverRecord {
  return {
    symbol: change.symbol,
    startPrice: round2(change.startPrice),
    endPrice: round2(change.endPrice),
    pctChange: round2(change.pctChange),
    series: latest?.series ?? null,
    open: latest ? round2(latest.open) : null,
    high: latest ? round2(latest.high) : null,
    low: latest ? round2(latest.low) : null,
    close: latest ? round2(latest.close) : null,
    volume: latest ? round2(latest.volume) : null,
    value: latest ? round2(latest.value) : null,
    complete: latest !== undefined,
  };
}

/**
 * Ranks gainers and losers from an aggregated table. Auxiliary fields are
 * taken from each symbol's row on `endDate`; symbols without one are still
 * ranked, flagged incomplete.
 */
export function rankMovers(
  rows: TradeTable,
  endDate: string,
  window: DateWindow,
  logger?: Logger
): MoversReport {
  const tradingDates = [...new Set(rows.map((row) => row.tradeDate))].sort();
  logger?.info(`Number of unique dates in data: ${tradingDates.length}`);

  const changes = priceChanges(rows);

  const latestByInstrument = new Map<string, DailyTradeRow>();
  for (const row of rows) {
    if (row.tradeDate === endDate && !latestByInstrument.has(instrumentKey(row))) {
      latestByInstrument.set(instrumentKey(row), row);
    }
  }
  if (latestByInstrument.size === 0) {
    logger?.warn(`No data found for exact date ${endDate}`, { availableDates: tradingDates });
  }

  const gainers = changes
    .filter((change) => change.pctChange > 0)
    .sort((a, b) => b.pctChange - a.pctChange)
    .slice(0, TOP_MOVERS_LIMIT);
  const losers = changes
    .filter((change) => change.pctChange < 0)
    .sort((a, b) => a.pctChange - b.pctChange)
    .slice(0, TOP_MOVERS_LIMIT);
  logger?.info(`Found ${gainers.length} gainers and ${losers.length} losers`);

  const toRecord = (change: PriceChange) =>
    toMoverRecord(change, latestByInstrument.get(instrumentKey(change)));

  return {
    gainers: gainers.map(toRecord),
    losers: losers.map(toRecord),
    window,
    tradingDates,
  };
}

export async function computeTopMovers(
  end: Date,
  ndays: number,
  fetchDay: DayFetcher,
  logger: Logger
): Promise<MoversReport | ErrorResult> {
  const log = logger.child({ component: "movers" });
  log.info(`Starting top movers for date: ${formatIsoDate(end)}, ndays: ${ndays}`);

  const range = await aggregateRange(end, ndays, fetchDay, logger);
  if (range.status === "unavailable") {
    return { error: NO_RANGE_DATA_ERROR };
  }

  return rankMovers(range.rows, range.window.end, range.window, log);
}
