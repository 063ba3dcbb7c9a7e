import type { OptionPosition } from "../options/option-position.js";
import type { Position } from "../stocks/stock-transaction.js";

export interface TradeDetail {
  symbol: string;
  type: "Call" | "Put" | "Stock";
  amount: number;
}

export interface DailyReturn {
  date: string; // YYYY-MM-DD
  premiums: number;
  stockGains: number;
  totalReturns: number;
  premiumDetails: TradeDetail[];
  stockDetails: TradeDetail[];
}

/**
 * Bucket realised income by calendar day: option net premium lands on the
 * position's open date, realised stock P&L on the sale date.
 */
export function calculateDailyReturns(
  optionPositions: readonly OptionPosition[],
  stockPositions: readonly Position[],
): DailyReturn[] {
  const byDate = new Map<string, DailyReturn>();

  const bucket = (date: string): DailyReturn => {
    let entry = byDate.get(date);
    if (!entry) {
      entry = { date, premiums: 0, stockGains: 0, totalReturns: 0, premiumDetails: [], stockDetails: [] };
      byDate.set(date, entry);
    }
    return entry;
  };

  for (const pos of optionPositions) {
    if (pos.openDate === "") {
      continue;
    }
    const entry = bucket(pos.openDate);
    entry.premiums += pos.netPremium;
    entry.premiumDetails.push({ symbol: pos.symbol, type: pos.optionType, amount: pos.netPremium });
  }

  for (const pos of stockPositions) {
    if (pos.type !== "closed") {
      continue;
    }
    const entry = bucket(pos.closeDate);
    entry.stockGains += pos.realizedPnl;
    entry.stockDetails.push({ symbol: pos.symbol, type: "Stock", amount: pos.realizedPnl });
  }

  return [...byDate.values()]
    .map((entry) => ({ ...entry, totalReturns: entry.premiums + entry.stockGains }))
    .toSorted((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Sum of the last `days` buckets (fewer when the series is shorter). */
export function trailingReturns(dailyReturns: readonly DailyReturn[], days: number): number {
  return dailyReturns.slice(-days).reduce((sum, day) => sum + day.totalReturns, 0);
}
