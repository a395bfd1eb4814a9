import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import AdmZip from "adm-zip";
import { parse } from "csv-parse/sync";
import type { Logger } from "winston";
import { z } from "zod";
import { formatIsoDate, toArchiveDateCode } from "./dates.js";
import { normalizeRows } from "./normalize.js";
import type { DayFetcher, DayFetchResult, TradeTable } from "./types.js";

export const DEFAULT_ARCHIVE_BASE_URL = "https://nsearchives.nseindia.com";

// The archive rejects requests carrying a non-browser client identifier.
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

export interface ArchiveResponse {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBufferLike>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<ArchiveResponse>;

export interface BhavCopySourceOptions {
  archiveBaseUrl: string;
  userAgent: string;
  fetchTimeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  /** Parent directory for per-call temp directories; defaults to the OS temp dir. */
  tmpRoot?: string;
}

// Blank cells must fail rather than coerce to 0.
const numeric = z.string().min(1).pipe(z.coerce.number().refine(Number.isFinite, "expected a finite number"));

const REQUIRED_COLUMNS = [
  "TradDt",
  "TckrSymb",
  "SctySrs",
  "OpnPric",
  "HghPric",
  "LwPric",
  "ClsPric",
  "TtlTradgVol",
  "TtlTrfVal",
] as const;

const bhavCopyRecordSchema = z
  .object({
    TradDt: z.string().min(1),
    TckrSymb: z.string().min(1),
    SctySrs: z.string(),
    OpnPric: numeric,
    HghPric: numeric,
    LwPric: numeric,
    ClsPric: numeric,
    TtlTradgVol: numeric,
    TtlTrfVal: numeric,
  })
  .transform((record) => ({
    tradeDate: record.TradDt,
    symbol: record.TckrSymb,
    series: record.SctySrs,
    open: record.OpnPric,
    high: record.HghPric,
    low: record.LwPric,
    close: record.ClsPric,
    volume: record.TtlTradgVol,
    value: record.TtlTrfVal,
  }));

export function bhavCopyUrl(date: Date, archiveBaseUrl: string = DEFAULT_ARCHIVE_BASE_URL): string {
  const base = archiveBaseUrl.replace(/\/+$/, "");
  return `${base}/content/cm/BhavCopy_NSE_CM_0_0_0_${toArchiveDateCode(date)}_F_0000.csv.zip`;
}

/**
 * Parses bhav copy CSV text into typed rows. A header missing one of the
 * required columns throws; individual rows with blank or non-numeric values
 * are skipped.
 */
export function parseBhavCopyCsv(text: string, logger?: Logger): TradeTable {
  const records: unknown = parse(text, {
    columns: (header: string[]) => {
      const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
      if (missing.length > 0) {
        throw new Error(`Bhav copy is missing columns: ${missing.join(", ")}`);
      }
      return header;
    },
    bom: true,
    trim: true,
    skip_empty_lines: true,
  });

  const rows: TradeTable = [];
  let skipped = 0;
  for (const record of z.array(z.unknown()).parse(records)) {
    const parsed = bhavCopyRecordSchema.safeParse(record);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      skipped++;
      logger?.debug("Skipping malformed bhav copy row", { record, issues: parsed.error.issues });
    }
  }
  if (skipped > 0) {
    logger?.warn(`Skipped ${skipped} malformed bhav copy rows`);
  }
  return rows;
}

export function createBhavCopySource(options: BhavCopySourceOptions): DayFetcher {
  const logger = options.logger.child({ component: "bhavcopy.source" });
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));

  const download = async (date: Date, workDir: string): Promise<DayFetchResult> => {
    const isoDate = formatIsoDate(date);
    const url = bhavCopyUrl(date, options.archiveBaseUrl);
    logger.debug(`Downloading from URL: ${url}`);

    const response = await fetchImpl(url, {
      headers: { "User-Agent": options.userAgent },
      signal: AbortSignal.timeout(options.fetchTimeoutMs),
    });
    if (!response.ok) {
      logger.warn(`Download failed with status code: ${response.status}`, { date: isoDate });
      return { status: "unavailable", date: isoDate, reason: `HTTP ${response.status}` };
    }

    const zipPath = path.join(workDir, "bhavcopy.zip");
    await writeFile(zipPath, Buffer.from(await response.arrayBuffer()));

    const entry = new AdmZip(zipPath)
      .getEntries()
      .find((candidate) => !candidate.isDirectory && candidate.entryName.toLowerCase().endsWith(".csv"));
    if (!entry) {
      logger.warn("No CSV file found in zip archive", { date: isoDate });
      return { status: "unavailable", date: isoDate, reason: "archive contains no CSV file" };
    }

    const csvPath = path.join(workDir, "bhavcopy.csv");
    await writeFile(csvPath, entry.getData());
    const parsed = parseBhavCopyCsv(await readFile(csvPath, "utf-8"), logger);
    if (parsed.length === 0) {
      logger.warn("Bhav copy contains no valid rows", { date: isoDate });
      return { status: "unavailable", date: isoDate, reason: "no valid rows in bhav copy" };
    }
    const rows = normalizeRows(parsed, logger);

    logger.info(`Downloaded and processed bhav copy. Row count: ${rows.length}`, { date: isoDate });
    return { status: "ok", date: isoDate, rows };
  };

  return async (date) => {
    const isoDate = formatIsoDate(date);
    logger.info(`Downloading bhav copy for date: ${isoDate}`);

    let workDir: string | undefined;
    try {
      workDir = await mkdtemp(path.join(options.tmpRoot ?? tmpdir(), "bhavcopy-"));
      return await download(date, workDir);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Download error: ${reason}`, { date: isoDate });
      return { status: "unavailable", date: isoDate, reason };
    } finally {
      if (workDir) {
        await rm(workDir, { recursive: true, force: true }).catch((error: unknown) =>
          logger.warn(`Failed to remove temp directory ${workDir}: ${String(error)}`)
        );
      }
    }
  };
}
