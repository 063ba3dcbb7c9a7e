import type { Diagnostic } from "../ledger/diagnostics.js";
import { totalCostBasis, totalShares, trackLots, type LotTrackerOptions } from "./lot-tracker.js";
import type { Lot, Position, PriceMap, StockTransaction } from "./stock-transaction.js";

export interface PositionBook {
  positions: Position[];
  diagnostics: Diagnostic[];
}

/**
 * Open and closed positions for every symbol, sorted by symbol, then open
 * before closed, then open date. Recomputed from scratch on every call.
 */
export function buildPositions(
  transactions: readonly StockTransaction[],
  prices: PriceMap = {},
  options: LotTrackerOptions = {},
): PositionBook {
  const { closed, openLots, diagnostics } = trackLots(transactions, options);

  const positions = [...closed];
  for (const [symbol, lots] of openLots) {
    const open = toOpenPosition(symbol, lots, prices[symbol] ?? 0);
    if (open) {
      positions.push(open);
    }
  }

  positions.sort(comparePositions);
  return { positions, diagnostics };
}

export function calculateAllPositions(
  transactions: readonly StockTransaction[],
  prices: PriceMap = {},
  options: LotTrackerOptions = {},
): Position[] {
  return buildPositions(transactions, prices, options).positions;
}

/** Remaining cost basis per share for every symbol still held. */
export function averageCostBasisBySymbol(
  transactions: readonly StockTransaction[],
  options: LotTrackerOptions = {},
): Record<string, number> {
  const { openLots } = trackLots(transactions, options);
  const result: Record<string, number> = {};
  for (const [symbol, lots] of openLots) {
    const shares = totalShares(lots);
    if (shares > 0) {
      result[symbol] = totalCostBasis(lots) / shares;
    }
  }
  return result;
}

function toOpenPosition(symbol: string, lots: readonly Lot[], currentPrice: number): Position | undefined {
  const shares = totalShares(lots);
  if (lots.length === 0 || shares <= 0) {
    return undefined;
  }

  const costBasis = totalCostBasis(lots);
  const openDate = lots.reduce((earliest, lot) => (lot.date < earliest ? lot.date : earliest), lots[0].date);
  const marketValue = currentPrice * shares;
  const unrealizedPnl = marketValue - costBasis;

  return {
    symbol,
    type: "open",
    shares,
    avgBuyPrice: costBasis / shares,
    avgSellPrice: 0,
    costBasis,
    saleProceeds: 0,
    realizedPnl: 0,
    returnPercent: 0,
    openDate,
    closeDate: "",
    currentPrice,
    marketValue,
    unrealizedPnl,
    unrealizedPercent: costBasis > 0 ? (unrealizedPnl / costBasis) * 100 : 0,
  };
}

export function comparePositions(a: Position, b: Position): number {
  if (a.symbol !== b.symbol) {
    return a.symbol < b.symbol ? -1 : 1;
  }
  if (a.type !== b.type) {
    return a.type === "open" ? -1 : 1;
  }
  if (a.openDate !== b.openDate) {
    return a.openDate < b.openDate ? -1 : 1;
  }
  return 0;
}
