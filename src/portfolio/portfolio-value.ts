import { toIsoDate } from "../ledger/dates.js";
import { buildOptionPositions } from "../options/option-positions.js";
import type { OptionTransaction } from "../options/option-position.js";
import type { LotTrackerOptions } from "../stocks/lot-tracker.js";
import { calculateAllPositions } from "../stocks/positions.js";
import type { StockTransaction } from "../stocks/stock-transaction.js";
import { totalDeposits, type FundingTransaction } from "./deposits.js";

/** The transaction history a book value can be replayed from. */
export interface LedgerHistory {
  funding: readonly FundingTransaction[];
  stockTransactions: readonly StockTransaction[];
  optionTransactions: readonly OptionTransaction[];
}

/**
 * Book value at `asOf`: deposits to date, net premium of every option
 * position built from trades to date, and realised stock P&L of sales to
 * date. Market prices play no part.
 */
export function portfolioValueAsOf(
  history: LedgerHistory,
  asOf: Date,
  options: LotTrackerOptions = {},
): number {
  // Ledger dates carry no time of day, so a record counts once its day has begun.
  const day = toIsoDate(asOf);
  const upTo = <T extends { date: string }>(records: readonly T[]) => records.filter((r) => r.date <= day);

  const deposits = totalDeposits(upTo(history.funding));

  const { positions: optionPositions } = buildOptionPositions(upTo(history.optionTransactions), { now: asOf });
  const premiums = optionPositions.reduce((sum, p) => sum + p.netPremium, 0);

  const realized = calculateAllPositions(upTo(history.stockTransactions), {}, options)
    .filter((p) => p.type === "closed")
    .reduce((sum, p) => sum + p.realizedPnl, 0);

  return deposits + premiums + realized;
}

/** Bind a history so callers can ask for values by instant alone. */
export function valueAsOfFor(
  history: LedgerHistory,
  options: LotTrackerOptions = {},
): (asOf: Date) => number {
  return (asOf) => portfolioValueAsOf(history, asOf, options);
}
