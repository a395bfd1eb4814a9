/** One instrument's end-of-day record from a bhav copy. */
export interface DailyTradeRow {
  /** Trading date as published in the file (YYYY-MM-DD). */
  tradeDate: string;
  symbol: string;
  /** Series code such as "EQ"; casing is not guaranteed upstream. */
  series: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  value: number;
}

export type TradeTable = DailyTradeRow[];

export interface DateWindow {
  start: string;
  end: string;
}

export type DayFetchResult =
  | { status: "ok"; date: string; rows: TradeTable }
  | { status: "unavailable"; date: string; reason: string };

export type RangeResult =
  | {
      status: "ok";
      window: DateWindow;
      rows: TradeTable;
      fetchedDates: string[];
      missingDates: string[];
    }
  | { status: "unavailable"; window: DateWindow; missingDates: string[] };

export type DayFetcher = (date: Date) => Promise<DayFetchResult>;
