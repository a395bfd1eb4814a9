import type { Logger } from "winston";
import { parseIsoDate } from "./bhavcopy/dates.js";
import type { DayFetcher, TradeTable } from "./bhavcopy/types.js";
import { computeTopMovers, type ErrorResult, type MoversReport } from "./movers.js";

export const MAX_WINDOW_DAYS = 366;

export const NO_DAY_DATA_ERROR = "No data available for the specified date";

export interface NseiService {
  trades(date: string): Promise<TradeTable | ErrorResult>;
  getTopMovers(date: string, ndays?: number): Promise<MoversReport | ErrorResult>;
}

function invalidDate(date: string): ErrorResult {
  return { error: `Invalid date "${date}", expected YYYY-MM-DD` };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createNseiService({ fetchDay, logger }: { fetchDay: DayFetcher; logger: Logger }): NseiService {
  const log = logger.child({ component: "service" });

  return {
    async trades(date) {
      log.info(`Fetching trades for date: ${date}`);
      const parsed = parseIsoDate(date);
      if (!parsed) {
        return invalidDate(date);
      }

      try {
        const result = await fetchDay(parsed);
        if (result.status === "unavailable" || result.rows.length === 0) {
          log.warn(`No data available for date: ${date}`);
          return { error: NO_DAY_DATA_ERROR };
        }
        log.info(`Retrieved ${result.rows.length} records for date: ${date}`);
        return result.rows;
      } catch (error) {
        log.error(`Error retrieving trades for date ${date}: ${errorMessage(error)}`);
        return { error: `Failed to retrieve trades: ${errorMessage(error)}` };
      }
    },

    async getTopMovers(date, ndays = 1) {
      const parsed = parseIsoDate(date);
      if (!parsed) {
        return invalidDate(date);
      }
      if (!Number.isInteger(ndays) || ndays < 1 || ndays > MAX_WINDOW_DAYS) {
        return { error: `ndays must be an integer between 1 and ${MAX_WINDOW_DAYS}, got ${ndays}` };
      }

      try {
        return await computeTopMovers(parsed, ndays, fetchDay, logger);
      } catch (error) {
        log.error(`Error computing top movers for ${date}: ${errorMessage(error)}`);
        return { error: `Failed to compute top movers: ${errorMessage(error)}` };
      }
    },
  };
}
