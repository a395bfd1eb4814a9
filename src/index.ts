import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "winston";
import { z } from "zod";
import { createBhavCopySource, DEFAULT_ARCHIVE_BASE_URL, DEFAULT_USER_AGENT, type FetchLike } from "./bhavcopy/source.js";
import { createLogger } from "./logger.js";
import { isErrorResult } from "./movers.js";
import { createNseiService, MAX_WINDOW_DAYS } from "./service.js";

// Configuration schema
export const configSchema = z.object({
  debug: z.boolean().default(false).describe("Enable debug logging on stderr"),
  archiveBaseUrl: z.string().url().default(DEFAULT_ARCHIVE_BASE_URL).describe("Base URL of the NSE archives host"),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT).describe("User-Agent sent to the archives host"),
  fetchTimeoutMs: z.number().int().positive().default(30_000).describe("Timeout for a single bhav copy download"),
  logDir: z.string().min(1).default("logs").describe("Directory for the rotating log file"),
});

export type ServerConfig = z.infer<typeof configSchema>;

const jsonContent = (payload: unknown, isError = false) => ({
  content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
  isError,
});

export default function createStatelessServer({
  config,
  logger = createLogger({ logDir: config.logDir, debug: config.debug }),
  fetchImpl,
}: {
  config: ServerConfig;
  logger?: Logger;
  fetchImpl?: FetchLike;
}) {
  const server = new McpServer({
    name: "nsei",
    version: "1.0.0",
  });

  const service = createNseiService({
    fetchDay: createBhavCopySource({
      archiveBaseUrl: config.archiveBaseUrl,
      userAgent: config.userAgent,
      fetchTimeoutMs: config.fetchTimeoutMs,
      logger,
      fetchImpl,
    }),
    logger,
  });

  // ==================== TRADES ====================

  server.tool(
    "trades",
    "Get the equity (EQ series) bhav copy rows for a single trading date",
    {
      date: z.string().describe("Trading date in format YYYY-MM-DD"),
    },
    async ({ date }) => {
      try {
        const result = await service.trades(date);
        return jsonContent(result, isErrorResult(result));
      } catch (error) {
        return jsonContent({ error: `Failed to retrieve trades: ${error}` }, true);
      }
    }
  );

  server.resource(
    "trades",
    new ResourceTemplate("nsei://trades/{date}", { list: undefined }),
    { description: "Equity bhav copy rows for a trading date", mimeType: "application/json" },
    async (uri, { date }) => {
      const day = Array.isArray(date) ? date[0] : date;
      let payload: unknown;
      try {
        payload = await service.trades(day ?? "");
      } catch (error) {
        payload = { error: `Failed to retrieve trades: ${error}` };
      }
      return {
        contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(payload) }],
      };
    }
  );

  // ==================== MOVERS ====================

  server.tool(
    "get_top_movers",
    "Get the top 10 gainers and losers over the ndays calendar days ending on the given date",
    {
      date: z.string().describe("End date in format YYYY-MM-DD"),
      ndays: z
        .number()
        .int()
        .min(1)
        .max(MAX_WINDOW_DAYS)
        .default(1)
        .describe("Number of calendar days leading up to and including date. Default is 1"),
    },
    async ({ date, ndays }) => {
      try {
        const result = await service.getTopMovers(date, ndays);
        return jsonContent(result, isErrorResult(result));
      } catch (error) {
        return jsonContent({ error: `Failed to compute top movers: ${error}` }, true);
      }
    }
  );

  return server.server;
}
