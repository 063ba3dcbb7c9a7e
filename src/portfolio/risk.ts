import type { Position } from "../stocks/stock-transaction.js";
import type { PortfolioAnalytics } from "./analytics.js";
import { trailingReturns, type DailyReturn } from "./daily-returns.js";

const TRAILING_DAYS = 7;
const UNREALIZED_WARNING_PERCENT = -5;
const UNREALIZED_LIMIT_PERCENT = -10;

export type UnrealizedStatus = "compliant" | "approaching" | "exceeded";

export interface RiskMetrics {
  atRiskCapital: number;
  /** Deposits + premiums + realised stock P&L. */
  totalCapital: number;
  capitalUtilization: number; // percent of totalCapital
  /** Sum of the last seven daily-return buckets. */
  trailingPnl: number;
  trailingReturnPercent: number; // of at-risk capital
  unrealizedPnl: number;
  unrealizedPercent: number; // of at-risk capital
  unrealizedStatus: UnrealizedStatus;
  vix: number;
}

export function unrealizedStatus(percent: number): UnrealizedStatus {
  if (percent < UNREALIZED_LIMIT_PERCENT) {
    return "exceeded";
  }
  if (percent < UNREALIZED_WARNING_PERCENT) {
    return "approaching";
  }
  return "compliant";
}

export function calculateRiskMetrics(
  analytics: Pick<
    PortfolioAnalytics,
    "totalActiveCapital" | "totalDeposits" | "totalPremiums" | "totalStockPnl"
  >,
  stockPositions: readonly Position[],
  dailyReturns: readonly DailyReturn[],
  vix: number,
): RiskMetrics {
  const atRiskCapital = analytics.totalActiveCapital;
  const totalCapital = analytics.totalDeposits + analytics.totalPremiums + analytics.totalStockPnl;
  const unrealizedPnl = stockPositions
    .filter((p) => p.type === "open")
    .reduce((sum, p) => sum + p.unrealizedPnl, 0);

  const hasCapitalAtRisk = atRiskCapital > 0;
  const trailingPnl = hasCapitalAtRisk ? trailingReturns(dailyReturns, TRAILING_DAYS) : 0;
  const unrealizedPercent = hasCapitalAtRisk ? (unrealizedPnl / atRiskCapital) * 100 : 0;

  return {
    atRiskCapital,
    totalCapital,
    capitalUtilization: totalCapital > 0 ? (atRiskCapital / totalCapital) * 100 : 0,
    trailingPnl,
    trailingReturnPercent: hasCapitalAtRisk ? (trailingPnl / atRiskCapital) * 100 : 0,
    unrealizedPnl,
    unrealizedPercent,
    unrealizedStatus: unrealizedStatus(unrealizedPercent),
    vix,
  };
}
