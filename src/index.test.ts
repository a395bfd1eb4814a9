import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import createStatelessServer, { configSchema } from "./index.js";
import { createSilentLogger } from "./logger.js";
import { fakeArchive, tradeRow } from "./testUtils.js";

function toolText(result: unknown): { text: string; isError: boolean } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (first?.type !== "text") {
    throw new Error("expected text content");
  }
  return { text: first.text, isError: parsed.isError ?? false };
}

describe("configSchema", () => {
  it("fills in defaults", () => {
    expect(configSchema.parse({})).toEqual({
      debug: false,
      archiveBaseUrl: "https://nsearchives.nseindia.com",
      userAgent: expect.stringContaining("Mozilla/5.0"),
      fetchTimeoutMs: 30000,
      logDir: "logs",
    });
  });

  it("rejects a non-positive timeout", () => {
    expect(configSchema.safeParse({ fetchTimeoutMs: 0 }).success).toBe(false);
  });
});

describe("nsei MCP server", () => {
  let client: Client;
  let requested: string[];

  beforeEach(async () => {
    const archive = fakeArchive({
      "20250410": [tradeRow("2025-04-10", "INFY", 1400, 1420), tradeRow("2025-04-10", "TCS", 3500, 3400)],
      "20250411": [
        tradeRow("2025-04-11", "INFY", 1420, 1540),
        tradeRow("2025-04-11", "TCS", 3400, 3150),
        tradeRow("2025-04-11", "GOLDBEES", 60, 66, { series: "BE" }),
      ],
    });
    requested = archive.requested;

    const server = createStatelessServer({
      config: configSchema.parse({ archiveBaseUrl: "http://archive.test" }),
      logger: createSilentLogger(),
      fetchImpl: archive.fetchImpl,
    });
    client = new Client({ name: "test-client", version: "1.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it("lists both tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(["get_top_movers", "trades"]);
  });

  it("returns a day's equity rows from the trades tool", async () => {
    const { text, isError } = toolText(await client.callTool({ name: "trades", arguments: { date: "2025-04-11" } }));

    expect(isError).toBe(false);
    expect(JSON.parse(text)).toEqual([
      tradeRow("2025-04-11", "INFY", 1420, 1540),
      tradeRow("2025-04-11", "TCS", 3400, 3150),
    ]);
  });

  it("returns an error object for a day without data", async () => {
    const { text, isError } = toolText(await client.callTool({ name: "trades", arguments: { date: "2025-04-12" } }));

    expect(isError).toBe(true);
    expect(JSON.parse(text)).toEqual({ error: "No data available for the specified date" });
  });

  it("serves the trades resource template", async () => {
    const { contents } = await client.readResource({ uri: "nsei://trades/2025-04-10" });

    const first = contents[0];
    expect(first.mimeType).toBe("application/json");
    expect("text" in first && typeof first.text === "string" && JSON.parse(first.text)).toEqual([
      tradeRow("2025-04-10", "INFY", 1400, 1420),
      tradeRow("2025-04-10", "TCS", 3500, 3400),
    ]);
  });

  it("ranks movers over a window", async () => {
    const { text, isError } = toolText(
      await client.callTool({ name: "get_top_movers", arguments: { date: "2025-04-11", ndays: 3 } })
    );

    expect(isError).toBe(false);
    const report = JSON.parse(text);
    expect(requested).toHaveLength(3);
    expect(report.window).toEqual({ start: "2025-04-09", end: "2025-04-11" });
    expect(report.tradingDates).toEqual(["2025-04-10", "2025-04-11"]);
    expect(report.gainers).toEqual([
      {
        symbol: "INFY",
        startPrice: 1400,
        endPrice: 1540,
        pctChange: 10,
        series: "EQ",
        open: 1420,
        high: 1540,
        low: 1420,
        close: 1540,
        volume: 1000,
        value: 100000,
        complete: true,
      },
    ]);
    expect(report.losers.map((mover: { symbol: string; pctChange: number }) => [mover.symbol, mover.pctChange])).toEqual([
      ["TCS", -10],
    ]);
  });

  it("returns an error object when the window has no data", async () => {
    const { text, isError } = toolText(
      await client.callTool({ name: "get_top_movers", arguments: { date: "2025-04-13", ndays: 2 } })
    );

    expect(isError).toBe(true);
    expect(JSON.parse(text)).toEqual({ error: "No data available for the specified date range" });
  });
});
