import type { OptionPosition } from "../options/option-position.js";
import type { Position } from "../stocks/stock-transaction.js";

export interface SymbolSummary {
  symbol: string;
  premiums: number; // option net premiums
  stockPnl: number; // realised
  capital: number; // open options + open stock
  totalPnl: number;
}

export interface SymbolDetails {
  symbol: string;
  totalPremium: number;
  totalStockPnl: number;
  optionTradesCount: number;
  currentCapital: number;
  averageDaysToExpiry: number;
  avgOptionReturn: number;
  totalPnl: number;
  percentOfOverallPnl: number;
}

export function calculateSymbolSummaries(
  stockPositions: readonly Position[],
  optionPositions: readonly OptionPosition[],
): SymbolSummary[] {
  const bySymbol = new Map<string, SymbolSummary>();
  const entry = (symbol: string): SymbolSummary => {
    let summary = bySymbol.get(symbol);
    if (!summary) {
      summary = { symbol, premiums: 0, stockPnl: 0, capital: 0, totalPnl: 0 };
      bySymbol.set(symbol, summary);
    }
    return summary;
  };

  for (const opt of optionPositions) {
    const summary = entry(opt.symbol);
    summary.premiums += opt.netPremium;
    if (opt.status === "Open") {
      summary.capital += opt.capital;
    }
  }
  for (const pos of stockPositions) {
    const summary = entry(pos.symbol);
    if (pos.type === "closed") {
      summary.stockPnl += pos.realizedPnl;
    } else {
      summary.capital += pos.costBasis;
    }
  }

  return [...bySymbol.values()]
    .map((s) => ({ ...s, totalPnl: s.premiums + s.stockPnl }))
    .toSorted((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
}

/** Undefined when the symbol has neither stock nor option history. */
export function getSymbolDetails(
  symbol: string,
  stockPositions: readonly Position[],
  optionPositions: readonly OptionPosition[],
  portfolioTotalPnl: number,
): SymbolDetails | undefined {
  const options = optionPositions.filter((p) => p.symbol === symbol);
  const stocks = stockPositions.filter((p) => p.symbol === symbol);
  if (options.length === 0 && stocks.length === 0) {
    return undefined;
  }

  let totalPremium = 0;
  let currentCapital = 0;
  let dteSum = 0;
  let returnSum = 0;
  let returnCount = 0;
  for (const opt of options) {
    totalPremium += opt.netPremium;
    dteSum += opt.daysToExpiry;
    if (opt.percentReturn !== 0) {
      returnSum += opt.percentReturn;
      returnCount++;
    }
    if (opt.status === "Open") {
      currentCapital += opt.capital;
    }
  }

  let totalStockPnl = 0;
  for (const pos of stocks) {
    if (pos.type === "closed") {
      totalStockPnl += pos.realizedPnl;
    } else {
      currentCapital += pos.costBasis;
    }
  }

  const totalPnl = totalPremium + totalStockPnl;
  return {
    symbol,
    totalPremium,
    totalStockPnl,
    optionTradesCount: options.length,
    currentCapital,
    averageDaysToExpiry: options.length > 0 ? dteSum / options.length : 0,
    avgOptionReturn: returnCount > 0 ? returnSum / returnCount : 0,
    totalPnl,
    percentOfOverallPnl: portfolioTotalPnl !== 0 ? (totalPnl / portfolioTotalPnl) * 100 : 0,
  };
}
