#!/usr/bin/env node
import "dotenv/config";
import { getConfig } from "../config.js";
import { LedgerStore } from "../ledger/index.js";
import { PortfolioService } from "../portfolio/portfolio-service.js";
import { StockMarketData } from "../portfolio/stock-market-data.js";
import { renderStatsReport } from "./report.js";

async function main(): Promise<void> {
  const config = getConfig();
  const dataDir = process.argv[2] ?? config.dataDir;
  const stockMarketData = config.quotes.refresh
    ? new StockMarketData({
        baseUrl: config.quotes.baseUrl,
        cacheTtlMs: config.quotes.cacheTtlMs,
        concurrency: config.quotes.concurrency,
      })
    : undefined;

  const service = new PortfolioService(new LedgerStore(dataDir), {
    oversell: config.oversellPolicy,
    stockMarketData,
  });
  const snapshot = await service.getSnapshot();
  console.log(renderStatsReport(snapshot).join("\n"));
}

main().catch((err: unknown) => {
  console.error("[Stats] Failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
