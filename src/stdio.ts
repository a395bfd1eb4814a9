#!/usr/bin/env node
import * as dotenv from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import createStatelessServer, { configSchema } from "./index.js";
import { createLogger } from "./logger.js";

dotenv.config();

function configFromEnv(env: NodeJS.ProcessEnv) {
  const timeout = env.NSEI_FETCH_TIMEOUT_MS;
  return configSchema.safeParse({
    debug: env.NSEI_DEBUG === "true" || env.NSEI_DEBUG === "1",
    archiveBaseUrl: env.NSEI_ARCHIVE_BASE_URL || undefined,
    userAgent: env.NSEI_USER_AGENT || undefined,
    fetchTimeoutMs: timeout ? Number(timeout) : undefined,
    logDir: env.NSEI_LOG_DIR || undefined,
  });
}

async function main() {
  const parsed = configFromEnv(process.env);
  if (!parsed.success) {
    console.error(`Invalid configuration: ${parsed.error.message}`);
    process.exit(1);
  }
  const config = parsed.data;

  const logger = createLogger({ logDir: config.logDir, debug: config.debug });
  const server = createStatelessServer({ config, logger });
  await server.connect(new StdioServerTransport());
  logger.info("NSEI MCP server running on stdio", { logDir: config.logDir });
}

main().catch((error) => {
  console.error("Fatal error starting server:", error);
  process.exit(1);
});
