import type { PortfolioAnalytics } from "../portfolio/analytics.js";
import type { SavingsRow } from "../ledger/records.js";

/**
 * Where the money sits. Dry powder is derived from the ledger, not read
 * from the broker: deposits + premiums + realised P&L - active capital.
 */
export interface CashPosition {
  // Balances
  activeCapital: number; // open put collateral + open stock cost basis
  dryPowder: number;
  savingsBalance: number; // latest savings.csv row, 0 without one
}

/** Pure read over the analytics; nothing is stored. */
export function calculateCashPosition(
  analytics: Pick<
    PortfolioAnalytics,
    "totalActiveCapital" | "totalDeposits" | "totalPremiums" | "totalStockPnl"
  >,
  savings: readonly SavingsRow[],
): CashPosition {
  const activeCapital = analytics.totalActiveCapital;
  const dryPowder =
    analytics.totalDeposits + analytics.totalPremiums + analytics.totalStockPnl - activeCapital;

  return {
    activeCapital,
    dryPowder,
    savingsBalance: latestSavingsBalance(savings),
  };
}

export function latestSavingsBalance(savings: readonly SavingsRow[]): number {
  return savings.at(-1)?.balance ?? 0;
}
