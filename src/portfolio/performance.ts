import { differenceInHours, endOfWeek, startOfWeek } from "date-fns";
import { parseIsoDate, toIsoDate } from "../ledger/dates.js";
import type { OptionPosition } from "../options/option-position.js";
import type { Position } from "../stocks/stock-transaction.js";

// ── Win / loss ──

export interface TradePerformance {
  winCount: number;
  lossCount: number;
  /** Break-even trades count here but neither as a win nor a loss. */
  totalClosedCount: number;
  winRate: number; // percent of closed trades
  avgWin: number;
  avgLoss: number; // negative
}

function summarize(outcomes: readonly number[]): TradePerformance {
  const wins = outcomes.filter((v) => v > 0);
  const losses = outcomes.filter((v) => v < 0);
  const sum = (values: number[]) => values.reduce((total, v) => total + v, 0);

  return {
    winCount: wins.length,
    lossCount: losses.length,
    totalClosedCount: outcomes.length,
    winRate: outcomes.length > 0 ? (wins.length / outcomes.length) * 100 : 0,
    avgWin: wins.length > 0 ? sum(wins) / wins.length : 0,
    avgLoss: losses.length > 0 ? sum(losses) / losses.length : 0,
  };
}

export function calculateStockPerformance(positions: readonly Position[]): TradePerformance {
  return summarize(positions.filter((p) => p.type === "closed").map((p) => p.realizedPnl));
}

export function calculateOptionPerformance(positions: readonly OptionPosition[]): TradePerformance {
  return summarize(positions.filter((p) => p.status !== "Open").map((p) => p.netPremium));
}

// ── Weekly target ──

export const WEEKLY_TARGET_PERCENT = 1;
const WEEKLY_VIOLATION_PERCENT = 0.5;

export type WeeklyStatus = "compliant" | "warning" | "violation";

export interface WeeklyPerformance {
  weekStartDate: string;
  weeklyPnl: number;
  weeklyReturnPercent: number;
  status: WeeklyStatus;
  targetWeeklyReturn: number;
  daysRemainingInWeek: number;
}

export function weeklyStatus(returnPercent: number): WeeklyStatus {
  if (returnPercent < WEEKLY_VIOLATION_PERCENT) {
    return "violation";
  }
  if (returnPercent < WEEKLY_TARGET_PERCENT) {
    return "warning";
  }
  return "compliant";
}

/**
 * Income booked in the Monday-to-Sunday week containing `now`: gross premium
 * of options opened that week plus realised P&L of stock sold that week.
 */
export function calculateWeeklyPerformance(
  portfolioValue: number,
  stockPositions: readonly Position[],
  optionPositions: readonly OptionPosition[],
  now: Date,
): WeeklyPerformance {
  const weekStart = startOfWeek(now, { weekStartsOn: 1 });
  const weekEnd = endOfWeek(now, { weekStartsOn: 1 });
  const inWeek = (date: string) => {
    const day = parseIsoDate(date);
    return day !== undefined && day >= weekStart && day <= weekEnd;
  };

  let weeklyPnl = 0;
  for (const opt of optionPositions) {
    if (inWeek(opt.openDate)) {
      weeklyPnl += opt.premiumCollected;
    }
  }
  for (const pos of stockPositions) {
    if (pos.type === "closed" && inWeek(pos.closeDate)) {
      weeklyPnl += pos.realizedPnl;
    }
  }

  const weeklyReturnPercent = portfolioValue > 0 ? (weeklyPnl / portfolioValue) * 100 : 0;

  return {
    weekStartDate: toIsoDate(weekStart),
    weeklyPnl,
    weeklyReturnPercent,
    status: weeklyStatus(weeklyReturnPercent),
    targetWeeklyReturn: WEEKLY_TARGET_PERCENT,
    daysRemainingInWeek: Math.max(0, Math.floor(differenceInHours(weekEnd, now) / 24)),
  };
}
