import { monthEnd, toIsoMonth } from "../ledger/dates.js";
import type { SavingsRow, VixRow } from "../ledger/records.js";

export interface NetWorthMonth {
  month: string; // YYYY-MM
  savingsBalance: number;
  brokerageBalance: number;
  totalNetWorth: number;
}

/**
 * Savings plus brokerage per savings month. The current month uses the live
 * book value; earlier months are replayed to their last second.
 */
export function calculateNetWorth(
  savings: readonly SavingsRow[],
  livePortfolioValue: number,
  valueAsOf: (instant: Date) => number,
  now: Date,
): NetWorthMonth[] {
  const currentMonth = toIsoMonth(now);

  return savings.flatMap(({ month, balance }) => {
    let brokerageBalance = livePortfolioValue;
    if (month !== currentMonth) {
      const end = monthEnd(month);
      if (!end) {
        return [];
      }
      brokerageBalance = valueAsOf(end);
    }
    return [
      {
        month,
        savingsBalance: balance,
        brokerageBalance,
        totalNetWorth: balance + brokerageBalance,
      },
    ];
  });
}

/** Last recorded VIX close, 0 without one. */
export function latestVix(rows: readonly VixRow[]): number {
  return rows.at(-1)?.value ?? 0;
}
