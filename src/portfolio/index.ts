export { StockMarketData } from "./stock-market-data.js";
export type { Quote, StockMarketDataOptions } from "./stock-market-data.js";
export { PortfolioService } from "./portfolio-service.js";
export type { PortfolioServiceOptions, ReadOptions, LoadedBooks } from "./portfolio-service.js";
export {
  buildPortfolioSnapshot,
  buildBooks,
  buildAnalytics,
  buildDailyReturns,
  buildNetWorth,
} from "./snapshot.js";
export type { PortfolioSnapshot, LedgerBooks, SnapshotOptions } from "./snapshot.js";
export { calculateAnalytics, fractionalDaysSince } from "./analytics.js";
export type { PortfolioAnalytics, AnalyticsInput } from "./analytics.js";
export { calculateDailyReturns, trailingReturns } from "./daily-returns.js";
export type { DailyReturn, TradeDetail } from "./daily-returns.js";
export { DEPOSIT, parseCurrency, isDeposit, totalDeposits } from "./deposits.js";
export type { FundingTransaction } from "./deposits.js";
export { UNMAPPED_SECTOR, calculateSectorExposure, calculatePositionDetails } from "./exposure.js";
export type { SectorExposure, PositionDetail } from "./exposure.js";
export { formatCurrency, formatPercentage, formatPnl } from "./format.js";
export { calculateNetWorth, latestVix } from "./net-worth.js";
export type { NetWorthMonth } from "./net-worth.js";
export {
  calculateStockPerformance,
  calculateOptionPerformance,
  calculateWeeklyPerformance,
  weeklyStatus,
  WEEKLY_TARGET_PERCENT,
} from "./performance.js";
export type { TradePerformance, WeeklyPerformance, WeeklyStatus } from "./performance.js";
export { portfolioValueAsOf, valueAsOfFor } from "./portfolio-value.js";
export type { LedgerHistory } from "./portfolio-value.js";
export { calculateRiskMetrics, unrealizedStatus } from "./risk.js";
export type { RiskMetrics, UnrealizedStatus } from "./risk.js";
export { calculateSymbolSummaries, getSymbolDetails } from "./symbol-analysis.js";
export type { SymbolSummary, SymbolDetails } from "./symbol-analysis.js";
export {
  calculateTimeWeightedReturn,
  calculateLedgerTimeWeightedReturn,
  consolidateCashFlows,
} from "./time-weighted-return.js";
export type { CashFlow, TimeWeightedReturn } from "./time-weighted-return.js";

import { getConfig } from "../config.js";
import { LedgerStore } from "../ledger/ledger-store.js";
import { PortfolioService } from "./portfolio-service.js";
import { StockMarketData } from "./stock-market-data.js";

let service: PortfolioService | null = null;

/** Lazily initialise and return the singleton portfolio service from the environment config. */
export function getPortfolioService(): PortfolioService {
  if (!service) {
    const config = getConfig();
    const stockMarketData = config.quotes.refresh
      ? new StockMarketData({
          baseUrl: config.quotes.baseUrl,
          cacheTtlMs: config.quotes.cacheTtlMs,
          concurrency: config.quotes.concurrency,
        })
      : undefined;
    service = new PortfolioService(new LedgerStore(config.dataDir), {
      oversell: config.oversellPolicy,
      stockMarketData,
    });
  }
  return service;
}
