import "dotenv/config";
import { getConfig } from "./config.js";
import { startGateway } from "./gateway/server.js";
import { getPortfolioService } from "./portfolio/index.js";

async function main(): Promise<void> {
  const config = getConfig();
  const service = getPortfolioService();
  console.log(`[Boot] premium-ledger starting (data: ${service.getDataDir()})`);
  console.log(
    `[Boot] Oversell policy: ${config.oversellPolicy}; live quotes: ${config.quotes.refresh ? "on" : "off"}`,
  );

  // ── Ledger check ────────────────────────────────────────────────────────
  const ledger = await service.loadLedger();
  console.log(
    `[Boot] Ledger ready (${ledger.stockTransactions.length} stock / ${ledger.optionTransactions.length} option transactions, ${ledger.diagnostics.length} skipped rows)`,
  );

  // ── Gateway ─────────────────────────────────────────────────────────────
  const server = await startGateway({ service }, config.port);

  // ── Graceful shutdown ───────────────────────────────────────────────────
  const shutdown = (signal: string): void => {
    console.log(`[Boot] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("[Boot] Fatal error:", err);
  process.exit(1);
});
