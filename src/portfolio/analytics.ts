import { differenceInMilliseconds } from "date-fns";
import { parseIsoDate } from "../ledger/dates.js";
import type { OptionPosition } from "../options/option-position.js";
import type { Position, StockTransaction } from "../stocks/stock-transaction.js";
import { totalDeposits, type FundingTransaction } from "./deposits.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface PortfolioAnalytics {
  // Premiums
  /** Sum of positive net premiums; losing positions do not reduce it. */
  totalPremiums: number;
  /** Gross premium collected by the positions counted in totalPremiums. */
  collectedPremiums: number;
  /** Sum of every net premium, losses included. */
  netPremiums: number;
  largestPremium: number;
  smallestPremium: number;
  averagePremium: number;
  premiumPerDay: number;
  avgReturnPerTrade: number;
  dailyTheta: number;

  // Counts
  openOptionsCount: number;
  closedOptionsCount: number;
  optionTradesCount: number;
  stockTradesCount: number;
  totalTradesCount: number;

  // Capital
  totalCapital: number;
  optionsActiveCapital: number;
  /** Open cash-secured put capital + open stock cost basis. */
  totalActiveCapital: number;

  // Portfolio
  totalDeposits: number;
  totalStockPnl: number;
  daysSinceStart: number;
  totalPortfolioValue: number;
  totalPortfolioProfit: number;
  totalPortfolioProfitPercent: number;
}

export interface AnalyticsInput {
  funding: readonly FundingTransaction[];
  stockTransactions: readonly StockTransaction[];
  stockPositions: readonly Position[];
  optionPositions: readonly OptionPosition[];
  now: Date;
}

export function calculateAnalytics(input: AnalyticsInput): PortfolioAnalytics {
  const { stockPositions, optionPositions, now } = input;

  let totalPremiums = 0;
  let collectedPremiums = 0;
  let netPremiums = 0;
  let largestPremium = 0;
  let smallestPremium = Number.POSITIVE_INFINITY;
  let premiumCount = 0;
  let returnSum = 0;
  let returnCount = 0;
  let dailyTheta = 0;
  let openOptionsCount = 0;
  let totalCapital = 0;
  let optionsActiveCapital = 0;
  let putCapital = 0;
  let earliestOpen: string | undefined;

  for (const pos of optionPositions) {
    const isOpen = pos.status === "Open";
    if (isOpen) {
      openOptionsCount++;
      dailyTheta += pos.netPremium / pos.daysToExpiry;
    }

    netPremiums += pos.netPremium;
    if (pos.netPremium > 0) {
      totalPremiums += pos.netPremium;
      collectedPremiums += pos.premiumCollected;
      premiumCount++;
      largestPremium = Math.max(largestPremium, pos.netPremium);
      smallestPremium = Math.min(smallestPremium, pos.netPremium);
    }

    if (pos.capital > 0) {
      totalCapital += pos.capital;
      if (isOpen) {
        optionsActiveCapital += pos.capital;
        if (pos.optionType === "Put") {
          putCapital += pos.capital;
        }
      }
    }

    if (pos.percentReturn !== 0) {
      returnSum += pos.percentReturn;
      returnCount++;
    }

    if (earliestOpen === undefined || pos.openDate < earliestOpen) {
      earliestOpen = pos.openDate;
    }
  }

  let totalStockPnl = 0;
  let openStockCostBasis = 0;
  for (const pos of stockPositions) {
    if (pos.type === "closed") {
      totalStockPnl += pos.realizedPnl;
    } else {
      openStockCostBasis += pos.costBasis;
    }
  }

  const daysSinceFirstOption = earliestOpen !== undefined ? fractionalDaysSince(earliestOpen, now) : 0;
  const earliestStockDate = input.stockTransactions.reduce<string | undefined>(
    (earliest, tx) => (earliest === undefined || tx.date < earliest ? tx.date : earliest),
    undefined,
  );

  const deposits = totalDeposits(input.funding);
  const totalPortfolioProfit = totalPremiums + totalStockPnl;

  return {
    totalPremiums,
    collectedPremiums,
    netPremiums,
    largestPremium,
    smallestPremium: premiumCount > 0 ? smallestPremium : 0,
    averagePremium: premiumCount > 0 ? totalPremiums / premiumCount : 0,
    premiumPerDay: daysSinceFirstOption > 0 ? totalPremiums / daysSinceFirstOption : 0,
    avgReturnPerTrade: returnCount > 0 ? returnSum / returnCount : 0,
    dailyTheta,

    openOptionsCount,
    closedOptionsCount: optionPositions.length - openOptionsCount,
    optionTradesCount: optionPositions.length,
    stockTradesCount: stockPositions.length,
    totalTradesCount: optionPositions.length + stockPositions.length,

    totalCapital,
    optionsActiveCapital,
    totalActiveCapital: putCapital + openStockCostBasis,

    totalDeposits: deposits,
    totalStockPnl,
    daysSinceStart:
      earliestStockDate !== undefined ? Math.floor(fractionalDaysSince(earliestStockDate, now)) : 0,
    totalPortfolioValue: deposits + totalPremiums + totalStockPnl,
    totalPortfolioProfit,
    totalPortfolioProfitPercent: deposits > 0 ? (totalPortfolioProfit / deposits) * 100 : 0,
  };
}

/** Days, with fractions, from local midnight of `date` to `now`. */
export function fractionalDaysSince(date: string, now: Date): number {
  const start = parseIsoDate(date);
  return start ? differenceInMilliseconds(now, start) / MS_PER_DAY : 0;
}
