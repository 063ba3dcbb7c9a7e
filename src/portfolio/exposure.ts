import type { OptionPosition } from "../options/option-position.js";
import type { Position } from "../stocks/stock-transaction.js";

export const UNMAPPED_SECTOR = "Other";

export interface PositionDetail {
  symbol: string;
  type: "Stock" | "Call" | "Put";
  amount: number;
}

export interface SectorExposure {
  sector: string;
  amount: number;
  positions: PositionDetail[];
}

const byAmountDescending = <T extends { amount: number }>(a: T, b: T): number => b.amount - a.amount;

/**
 * Capital at work per sector: open stock cost basis plus open cash-secured
 * put collateral. Calls are left out; their shares are already counted.
 */
export function calculateSectorExposure(
  stockPositions: readonly Position[],
  optionPositions: readonly OptionPosition[],
  sectors: Readonly<Record<string, string>>,
): SectorExposure[] {
  const bySector = new Map<string, SectorExposure>();

  const add = (detail: PositionDetail) => {
    const sector = sectors[detail.symbol] || UNMAPPED_SECTOR;
    const exposure = bySector.get(sector) ?? { sector, amount: 0, positions: [] };
    exposure.positions.push(detail);
    exposure.amount += detail.amount;
    bySector.set(sector, exposure);
  };

  for (const pos of stockPositions) {
    if (pos.type === "open") {
      add({ symbol: pos.symbol, type: "Stock", amount: pos.costBasis });
    }
  }
  for (const opt of optionPositions) {
    if (opt.status === "Open" && opt.optionType === "Put") {
      add({ symbol: opt.symbol, type: "Put", amount: opt.capital });
    }
  }

  return [...bySector.values()].filter((e) => e.amount > 0).toSorted(byAmountDescending);
}

/**
 * One entry per capital commitment: a stock with an open call shows as a
 * single Call entry at the stock's cost basis, other open stock as Stock,
 * and each open put as Put.
 */
export function calculatePositionDetails(
  stockPositions: readonly Position[],
  optionPositions: readonly OptionPosition[],
): PositionDetail[] {
  const openStock = new Map<string, number>();
  for (const pos of stockPositions) {
    if (pos.type === "open") {
      openStock.set(pos.symbol, pos.costBasis);
    }
  }

  const covered = new Map<string, number>();
  for (const opt of optionPositions) {
    const costBasis = openStock.get(opt.symbol);
    if (opt.status === "Open" && opt.optionType === "Call" && costBasis !== undefined) {
      covered.set(opt.symbol, costBasis);
    }
  }

  const details: PositionDetail[] = [];
  for (const [symbol, amount] of covered) {
    details.push({ symbol, type: "Call", amount });
  }
  for (const [symbol, amount] of openStock) {
    if (!covered.has(symbol)) {
      details.push({ symbol, type: "Stock", amount });
    }
  }
  for (const opt of optionPositions) {
    if (opt.status === "Open" && opt.optionType === "Put") {
      details.push({ symbol: opt.symbol, type: "Put", amount: opt.capital });
    }
  }

  return details.toSorted(byAmountDescending);
}
