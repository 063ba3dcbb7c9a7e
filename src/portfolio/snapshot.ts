import { calculateCashPosition, type CashPosition } from "../account/cash-position.js";
import type { Diagnostic } from "../ledger/diagnostics.js";
import type { LedgerData } from "../ledger/ledger-store.js";
import { calculateOptionPositions } from "../options/option-positions.js";
import type { OptionPosition } from "../options/option-position.js";
import { buildPositions } from "../stocks/positions.js";
import type { OversellPolicy, Position } from "../stocks/stock-transaction.js";
import { calculateAnalytics, type PortfolioAnalytics } from "./analytics.js";
import { calculateDailyReturns, type DailyReturn } from "./daily-returns.js";
import {
  calculatePositionDetails,
  calculateSectorExposure,
  type PositionDetail,
  type SectorExposure,
} from "./exposure.js";
import { calculateNetWorth, latestVix, type NetWorthMonth } from "./net-worth.js";
import {
  calculateOptionPerformance,
  calculateStockPerformance,
  calculateWeeklyPerformance,
  type TradePerformance,
  type WeeklyPerformance,
} from "./performance.js";
import { valueAsOfFor } from "./portfolio-value.js";
import { calculateRiskMetrics, type RiskMetrics } from "./risk.js";
import {
  calculateLedgerTimeWeightedReturn,
  type TimeWeightedReturn,
} from "./time-weighted-return.js";

export interface SnapshotOptions {
  oversell: OversellPolicy;
  now: Date;
}

/** Positions derived from one ledger load, plus everything skipped along the way. */
export interface LedgerBooks {
  stockPositions: Position[];
  optionPositions: OptionPosition[];
  diagnostics: Diagnostic[];
}

export interface PortfolioSnapshot {
  asOf: string; // ISO 8601
  analytics: PortfolioAnalytics;
  cashPosition: CashPosition;
  risk: RiskMetrics;
  dailyReturns: DailyReturn[];
  stockPerformance: TradePerformance;
  optionPerformance: TradePerformance;
  weeklyPerformance: WeeklyPerformance;
  timeWeightedReturn: TimeWeightedReturn;
  sectorExposure: SectorExposure[];
  positionDetails: PositionDetail[];
  diagnostics: Diagnostic[];
}

export function buildBooks(ledger: LedgerData, options: SnapshotOptions): LedgerBooks {
  const stocks = buildPositions(ledger.stockTransactions, ledger.prices, { oversell: options.oversell });
  const optionBook = calculateOptionPositions(ledger.optionTransactions, ledger.stockTransactions, {
    oversell: options.oversell,
    now: options.now,
  });

  return {
    stockPositions: stocks.positions,
    optionPositions: optionBook.positions,
    diagnostics: [...ledger.diagnostics, ...stocks.diagnostics, ...optionBook.diagnostics],
  };
}

export function buildAnalytics(ledger: LedgerData, books: LedgerBooks, now: Date): PortfolioAnalytics {
  return calculateAnalytics({
    funding: ledger.funding,
    stockTransactions: ledger.stockTransactions,
    stockPositions: books.stockPositions,
    optionPositions: books.optionPositions,
    now,
  });
}

export function buildDailyReturns(books: LedgerBooks): DailyReturn[] {
  return calculateDailyReturns(books.optionPositions, books.stockPositions);
}

/** Everything the dashboard and the stats report show, recomputed from the ledger. */
export function buildPortfolioSnapshot(ledger: LedgerData, options: SnapshotOptions): PortfolioSnapshot {
  const { now, oversell } = options;
  const books = buildBooks(ledger, options);
  const analytics = buildAnalytics(ledger, books, now);
  const cashPosition = calculateCashPosition(analytics, ledger.savings);
  const dailyReturns = buildDailyReturns(books);

  return {
    asOf: now.toISOString(),
    analytics,
    cashPosition,
    risk: calculateRiskMetrics(analytics, books.stockPositions, dailyReturns, latestVix(ledger.vix)),
    dailyReturns,
    stockPerformance: calculateStockPerformance(books.stockPositions),
    optionPerformance: calculateOptionPerformance(books.optionPositions),
    weeklyPerformance: calculateWeeklyPerformance(
      analytics.totalPortfolioValue,
      books.stockPositions,
      books.optionPositions,
      now,
    ),
    timeWeightedReturn: calculateLedgerTimeWeightedReturn(ledger, now, { oversell }),
    sectorExposure: calculateSectorExposure(books.stockPositions, books.optionPositions, ledger.sectors),
    positionDetails: calculatePositionDetails(books.stockPositions, books.optionPositions),
    diagnostics: books.diagnostics,
  };
}

export function buildNetWorth(ledger: LedgerData, options: SnapshotOptions): NetWorthMonth[] {
  const books = buildBooks(ledger, options);
  const analytics = buildAnalytics(ledger, books, options.now);
  return calculateNetWorth(
    ledger.savings,
    analytics.totalPortfolioValue,
    valueAsOfFor(ledger, { oversell: options.oversell }),
    options.now,
  );
}
