import { daysBetween } from "../ledger/dates.js";
import type { Diagnostic } from "../ledger/diagnostics.js";
import { averageCostBasisBySymbol } from "../stocks/positions.js";
import type { LotTrackerOptions } from "../stocks/lot-tracker.js";
import type { StockTransaction } from "../stocks/stock-transaction.js";
import { nextStatus, projectExpiry } from "./option-lifecycle.js";
import { CONTRACT_MULTIPLIER, type OptionPosition, type OptionTransaction } from "./option-position.js";

export interface OptionPositionOptions {
  /** Average cost basis per share of each underlying still held; prices covered-call capital. */
  stockCostBasis?: Record<string, number>;
  /** Evaluation instant for the lazy-expiry projection. Defaults to the current time. */
  now?: Date;
}

export interface OptionBook {
  positions: OptionPosition[];
  diagnostics: Diagnostic[];
}

/**
 * Fold option transactions into one position per position id, sorted by
 * open date then position id. Rows with an empty position id are ignored.
 */
export function buildOptionPositions(
  transactions: readonly OptionTransaction[],
  options: OptionPositionOptions = {},
): OptionBook {
  const stockCostBasis = options.stockCostBasis ?? {};
  const now = options.now ?? new Date();
  const byId = new Map<string, OptionPosition>();
  const diagnostics: Diagnostic[] = [];

  for (const tx of transactions) {
    if (tx.positionId === "") {
      continue;
    }

    let position = byId.get(tx.positionId);
    if (!position) {
      position = emptyPosition(tx);
      byId.set(tx.positionId, position);
      if (tx.action !== "Sell to Open") {
        diagnostics.push({
          code: "UNEXPECTED_OPENING_ACTION",
          message: `Position ${tx.positionId} starts with "${tx.action}" on ${tx.date} instead of "Sell to Open".`,
        });
      }
    }

    applyTransaction(position, tx, stockCostBasis);
  }

  const positions = [...byId.values()]
    .map((position) => withMetrics(projectExpiry(position, now)))
    .toSorted((a, b) => {
      if (a.openDate !== b.openDate) {
        return a.openDate < b.openDate ? -1 : 1;
      }
      if (a.positionId !== b.positionId) {
        return a.positionId < b.positionId ? -1 : 1;
      }
      return 0;
    });

  return { positions, diagnostics };
}

/** Option positions with covered-call capital priced from the stock ledger's open lots. */
export function calculateOptionPositions(
  optionTransactions: readonly OptionTransaction[],
  stockTransactions: readonly StockTransaction[],
  options: Omit<OptionPositionOptions, "stockCostBasis"> & LotTrackerOptions = {},
): OptionBook {
  const stockCostBasis = averageCostBasisBySymbol(stockTransactions, { oversell: options.oversell });
  return buildOptionPositions(optionTransactions, { stockCostBasis, now: options.now });
}

function emptyPosition(tx: OptionTransaction): OptionPosition {
  return {
    positionId: tx.positionId,
    symbol: tx.symbol,
    optionType: tx.optionType,
    strike: tx.strike,
    expiry: tx.expiry,
    contracts: tx.contracts,
    status: "Open",
    // Replaced by the Sell to Open date; kept for positions that never had one.
    openDate: tx.date,
    closeDate: "",
    premiumCollected: 0,
    premiumPaid: 0,
    netPremium: 0,
    commissions: 0,
    maxProfit: 0,
    daysHeld: 0,
    daysToExpiry: 0,
    percentReturn: 0,
    annualizedReturn: 0,
    capital: 0,
  };
}

function applyTransaction(
  position: OptionPosition,
  tx: OptionTransaction,
  stockCostBasis: Record<string, number>,
): void {
  switch (tx.action) {
    case "Sell to Open":
      position.openDate = tx.date;
      position.premiumCollected += tx.premium;
      position.commissions += tx.commission;
      position.capital = capitalRequirement(tx, stockCostBasis);
      break;
    case "Buy to Close":
      position.premiumPaid += Math.abs(tx.premium);
      position.commissions += tx.commission;
      position.closeDate = tx.date;
      break;
    case "Expired":
    case "Assigned":
    case "Exercised":
      position.closeDate = tx.date;
      break;
  }
  position.status = nextStatus(position.status, tx);
}

/**
 * Cash-secured puts reserve the strike. Covered calls are backed by shares
 * already counted at their cost basis, falling back to the trade-time price.
 */
export function capitalRequirement(
  tx: Pick<OptionTransaction, "optionType" | "symbol" | "strike" | "contracts" | "stockPrice">,
  stockCostBasis: Record<string, number>,
): number {
  const perShare = tx.optionType === "Put" ? tx.strike : (stockCostBasis[tx.symbol] ?? tx.stockPrice);
  return perShare * tx.contracts * CONTRACT_MULTIPLIER;
}

function withMetrics(position: OptionPosition): OptionPosition {
  const netPremium = position.premiumCollected - position.premiumPaid - position.commissions;
  const daysHeld = position.closeDate !== "" ? daysBetween(position.openDate, position.closeDate) : 0;
  const daysToExpiry = Math.max(1, daysBetween(position.openDate, position.expiry));
  const percentReturn = position.capital > 0 ? (netPremium / position.capital) * 100 : 0;

  return {
    ...position,
    netPremium,
    maxProfit: position.premiumCollected,
    daysHeld,
    daysToExpiry,
    percentReturn,
    annualizedReturn: (percentReturn / daysToExpiry) * 365,
  };
}
