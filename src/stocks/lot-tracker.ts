import type { Diagnostic } from "../ledger/diagnostics.js";
import { InsufficientLotsError } from "../ledger/errors.js";
import type { Lot, OversellPolicy, Position, StockTransaction } from "./stock-transaction.js";

// Float residue below this is treated as zero shares.
const SHARE_EPSILON = 1e-9;

export interface LotTrackerOptions {
  /** Defaults to "error". */
  oversell?: OversellPolicy;
}

export interface LotTrackerResult {
  /** One closed position per Sell that consumed at least one lot, in transaction order. */
  closed: Position[];
  /** Remaining lots per symbol, oldest first. Symbols with no lots left are absent. */
  openLots: Map<string, Lot[]>;
  diagnostics: Diagnostic[];
}

/**
 * Replay buy/sell transactions into FIFO lots.
 *
 * Transactions for one symbol must be chronological; symbols may interleave.
 * The input is never mutated.
 */
export function trackLots(
  transactions: readonly StockTransaction[],
  options: LotTrackerOptions = {},
): LotTrackerResult {
  const policy = options.oversell ?? "error";
  const openLots = new Map<string, Lot[]>();
  const closed: Position[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const tx of transactions) {
    if (tx.type === "Buy") {
      const lots = openLots.get(tx.symbol) ?? [];
      lots.push({
        date: tx.date,
        shares: tx.shares,
        price: tx.price,
        costBasis: tx.amount + tx.commission,
      });
      openLots.set(tx.symbol, lots);
      continue;
    }

    const lots = openLots.get(tx.symbol) ?? [];
    const available = totalShares(lots);
    if (tx.shares > available + SHARE_EPSILON) {
      if (policy === "error") {
        throw new InsufficientLotsError(tx.symbol, tx.date, tx.shares, available);
      }
      diagnostics.push({
        code: "INSUFFICIENT_LOTS",
        message: `Sell of ${tx.shares} ${tx.symbol} on ${tx.date} exceeds the ${available} shares held; only ${available} matched.`,
      });
    }

    const consumed = consumeLots(lots, tx.shares);
    if (lots.length === 0) {
      openLots.delete(tx.symbol);
    }
    if (consumed.length > 0) {
      closed.push(toClosedPosition(tx, consumed));
    }
  }

  return { closed, openLots, diagnostics };
}

/** Take `shares` from the front of the queue, splitting the last lot touched if needed. */
function consumeLots(queue: Lot[], shares: number): Lot[] {
  const consumed: Lot[] = [];
  let remaining = shares;

  while (remaining > SHARE_EPSILON && queue.length > 0) {
    const lot = queue[0];
    if (lot.shares <= remaining + SHARE_EPSILON) {
      consumed.push(lot);
      queue.shift();
      remaining -= lot.shares;
      continue;
    }

    const costBasisFraction = lot.costBasis * (remaining / lot.shares);
    consumed.push({
      date: lot.date,
      shares: remaining,
      price: lot.price,
      costBasis: costBasisFraction,
    });
    lot.shares -= remaining;
    lot.costBasis -= costBasisFraction;
    remaining = 0;
  }

  return consumed;
}

function toClosedPosition(tx: StockTransaction, consumed: Lot[]): Position {
  let shares = 0;
  let costBasis = 0;
  let weightedPrice = 0;
  let openDate = consumed[0].date;

  for (const lot of consumed) {
    shares += lot.shares;
    costBasis += lot.costBasis;
    weightedPrice += lot.price * lot.shares;
    if (lot.date < openDate) {
      openDate = lot.date;
    }
  }

  const saleProceeds = tx.amount - tx.commission;
  const realizedPnl = saleProceeds - costBasis;

  return {
    symbol: tx.symbol,
    type: "closed",
    shares,
    avgBuyPrice: weightedPrice / shares,
    avgSellPrice: tx.price,
    costBasis,
    saleProceeds,
    realizedPnl,
    returnPercent: costBasis > 0 ? (realizedPnl / costBasis) * 100 : 0,
    openDate,
    closeDate: tx.date,
    currentPrice: 0,
    marketValue: 0,
    unrealizedPnl: 0,
    unrealizedPercent: 0,
  };
}

export function totalShares(lots: readonly Lot[]): number {
  return lots.reduce((sum, lot) => sum + lot.shares, 0);
}

export function totalCostBasis(lots: readonly Lot[]): number {
  return lots.reduce((sum, lot) => sum + lot.costBasis, 0);
}
