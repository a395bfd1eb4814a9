import AdmZip from "adm-zip";
import type { ArchiveResponse, FetchLike } from "./bhavcopy/source.js";
import type { DailyTradeRow } from "./bhavcopy/types.js";

const CSV_HEADER =
  "TradDt,BizDt,Sgmt,FinInstrmTp,TckrSymb,SctySrs,OpnPric,HghPric,LwPric,ClsPric,LastPric,TtlTradgVol,TtlTrfVal";

export function tradeRow(
  tradeDate: string,
  symbol: string,
  open: number,
  close: number,
  overrides: Partial<DailyTradeRow> = {}
): DailyTradeRow {
  return {
    tradeDate,
    symbol,
    series: "EQ",
    open,
    high: Math.max(open, close),
    low: Math.min(open, close),
    close,
    volume: 1000,
    value: 100000,
    ...overrides,
  };
}

export function bhavCopyCsv(rows: DailyTradeRow[]): string {
  const lines = rows.map((row) =>
    [
      row.tradeDate,
      row.tradeDate,
      "CM",
      "STK",
      row.symbol,
      row.series,
      row.open,
      row.high,
      row.low,
      row.close,
      row.close,
      row.volume,
      row.value,
    ].join(",")
  );
  return [CSV_HEADER, ...lines].join("\n") + "\n";
}

export function zipArchive(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, "utf-8"));
  }
  return zip.toBuffer();
}

export function archiveResponse(body: Buffer, status = 200): ArchiveResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    arrayBuffer: async () => body.buffer.slice(body.byteOffset, body.byteOffset + body.byteLength),
  };
}

/**
 * Serves zipped bhav copies keyed by their 8-digit date code and answers 404
 * for every other day. Requested URLs are recorded in order.
 */
export function fakeArchive(days: Record<string, DailyTradeRow[]>): { fetchImpl: FetchLike; requested: string[] } {
  const requested: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    requested.push(url);
    const code = /_(\d{8})_F_0000\.csv\.zip$/.exec(url)?.[1];
    const rows = code ? days[code] : undefined;
    if (!code || !rows) {
      return archiveResponse(Buffer.alloc(0), 404);
    }
    return archiveResponse(zipArchive({ [`BhavCopy_NSE_CM_0_0_0_${code}_F_0000.csv`]: bhavCopyCsv(rows) }));
  };
  return { fetchImpl, requested };
}
