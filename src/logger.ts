import path from "node:path";
import winston from "winston";

export const LOG_FILE_NAME = "nsei_mcp_server.log";
export const LOG_MAX_BYTES = 10 * 1024 * 1024;
export const LOG_MAX_FILES = 5;

export interface LoggerOptions {
  logDir: string;
  debug?: boolean;
}

const lineFormat = winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} - ${String(component ?? "nsei")} - ${level.toUpperCase()} - ${String(message)}${extra}`;
});

/**
 * Size-rotated file log plus stderr. Nothing is written to stdout, which
 * carries the MCP stdio transport.
 */
export function createLogger({ logDir, debug = false }: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: "debug",
    format: winston.format.combine(winston.format.timestamp(), lineFormat),
    transports: [
      new winston.transports.File({
        filename: path.join(logDir, LOG_FILE_NAME),
        level: "debug",
        maxsize: LOG_MAX_BYTES,
        maxFiles: LOG_MAX_FILES,
        tailable: true,
      }),
      new winston.transports.Console({
        level: debug ? "debug" : "info",
        stderrLevels: Object.keys(winston.config.npm.levels),
      }),
    ],
  });
}

export function createSilentLogger(): winston.Logger {
  return winston.createLogger({ silent: true });
}
