/**
 * Portfolio analytics over one small hand-checked ledger:
 *   - two deposits and a withdrawal
 *   - AAPL held, MSFT bought and sold at a profit
 *   - an expired AAPL put, an AAPL call bought back at a loss, an open NVDA put
 */

import { describe, it, expect } from "vitest";
import { calculateCashPosition } from "../account/cash-position.js";
import { buildOptionPositions } from "../options/option-positions.js";
import type { OptionTransaction } from "../options/option-position.js";
import { averageCostBasisBySymbol, calculateAllPositions } from "../stocks/positions.js";
import type { StockTransaction } from "../stocks/stock-transaction.js";
import { calculateAnalytics } from "./analytics.js";
import { calculateDailyReturns, trailingReturns } from "./daily-returns.js";
import type { FundingTransaction } from "./deposits.js";
import { calculatePositionDetails, calculateSectorExposure } from "./exposure.js";
import { calculateNetWorth, latestVix } from "./net-worth.js";
import {
  calculateOptionPerformance,
  calculateStockPerformance,
  calculateWeeklyPerformance,
  weeklyStatus,
} from "./performance.js";
import { valueAsOfFor } from "./portfolio-value.js";
import { calculateSymbolSummaries, getSymbolDetails } from "./symbol-analysis.js";

// ── Fixture ──

const NOW = new Date(2024, 5, 5, 12, 0, 0); // Wednesday 2024-06-05, local noon

const funding: FundingTransaction[] = [
  { date: "2024-01-02", type: "Deposit", amount: 50_000 },
  { date: "2024-02-01", type: "Deposit", amount: 10_000 },
  { date: "2024-02-15", type: "Withdrawal", amount: 1_000 },
];

function stock(
  date: string,
  type: "Buy" | "Sell",
  symbol: string,
  shares: number,
  price: number,
  commission: number,
): StockTransaction {
  return { date, type, symbol, shares, price, amount: shares * price, commission, transactionId: date };
}

const stockTransactions: StockTransaction[] = [
  stock("2024-01-03", "Buy", "AAPL", 100, 150, 0),
  stock("2024-01-04", "Buy", "MSFT", 50, 300, 0),
  stock("2024-01-20", "Sell", "MSFT", 50, 320, 0),
];

function option(overrides: Partial<OptionTransaction>): OptionTransaction {
  return {
    date: "2024-01-05",
    action: "Sell to Open",
    symbol: "AAPL",
    optionType: "Put",
    strike: 140,
    expiry: "2024-01-19",
    contracts: 1,
    premium: 200,
    stockPrice: 150,
    commission: 1,
    positionId: "P1",
    notes: "",
    ...overrides,
  };
}

const optionTransactions: OptionTransaction[] = [
  option({}),
  option({ date: "2024-01-19", action: "Expired", premium: 0, commission: 0 }),
  option({
    positionId: "P2",
    date: "2024-01-22",
    optionType: "Call",
    strike: 160,
    expiry: "2024-02-16",
    premium: 150,
    stockPrice: 152,
  }),
  option({
    positionId: "P2",
    date: "2024-02-05",
    action: "Buy to Close",
    optionType: "Call",
    strike: 160,
    expiry: "2024-02-16",
    premium: -300,
  }),
  option({
    positionId: "P3",
    date: "2024-06-03",
    symbol: "NVDA",
    strike: 500,
    expiry: "2024-06-21",
    contracts: 2,
    premium: 800,
    stockPrice: 520,
    commission: 2,
  }),
];

const stockPositions = calculateAllPositions(stockTransactions, { AAPL: 160 });
const { positions: optionPositions } = buildOptionPositions(optionTransactions, {
  stockCostBasis: averageCostBasisBySymbol(stockTransactions),
  now: NOW,
});
const analytics = calculateAnalytics({ funding, stockTransactions, stockPositions, optionPositions, now: NOW });

// ── Analytics ──

describe("calculateAnalytics", () => {
  it("should count only positive net premiums in total premiums", () => {
    expect(analytics.totalPremiums).toBe(997);
    expect(analytics.collectedPremiums).toBe(1000);
    expect(analytics.netPremiums).toBe(845);
    expect(analytics.largestPremium).toBe(798);
    expect(analytics.smallestPremium).toBe(199);
    expect(analytics.averagePremium).toBe(498.5);
  });

  it("should count positions and trades", () => {
    expect(analytics.openOptionsCount).toBe(1);
    expect(analytics.closedOptionsCount).toBe(2);
    expect(analytics.optionTradesCount).toBe(3);
    expect(analytics.stockTradesCount).toBe(2);
    expect(analytics.totalTradesCount).toBe(5);
  });

  it("should exclude covered-call capital from active capital", () => {
    expect(analytics.totalCapital).toBe(129_000);
    expect(analytics.optionsActiveCapital).toBe(100_000);
    expect(analytics.totalActiveCapital).toBe(115_000);
  });

  it("should value the portfolio from deposits, premiums and realized stock P&L", () => {
    expect(analytics.totalDeposits).toBe(60_000);
    expect(analytics.totalStockPnl).toBe(1_000);
    expect(analytics.totalPortfolioValue).toBe(61_997);
    expect(analytics.totalPortfolioProfit).toBe(1_997);
    expect(analytics.totalPortfolioProfitPercent).toBeCloseTo((1_997 / 60_000) * 100, 10);
  });

  it("should derive per-day and per-trade yields", () => {
    expect(analytics.dailyTheta).toBeCloseTo(798 / 18, 10);
    expect(analytics.avgReturnPerTrade).toBeCloseTo(
      ((199 / 14_000) * 100 + (-152 / 15_000) * 100 + (798 / 100_000) * 100) / 3,
      10,
    );
    expect(analytics.premiumPerDay).toBeCloseTo(997 / 152.5, 1);
    expect(analytics.daysSinceStart).toBe(154);
  });

  it("should report zeros for an empty ledger", () => {
    const empty = calculateAnalytics({
      funding: [],
      stockTransactions: [],
      stockPositions: [],
      optionPositions: [],
      now: NOW,
    });

    expect(empty.smallestPremium).toBe(0);
    expect(empty.premiumPerDay).toBe(0);
    expect(empty.totalPortfolioProfitPercent).toBe(0);
    expect(empty.daysSinceStart).toBe(0);
  });
});

// ── Daily returns ──

describe("calculateDailyReturns", () => {
  it("should book premiums on open dates and stock gains on close dates", () => {
    const daily = calculateDailyReturns(optionPositions, stockPositions);

    expect(daily.map((d) => [d.date, d.totalReturns])).toEqual([
      ["2024-01-05", 199],
      ["2024-01-20", 1_000],
      ["2024-01-22", -152],
      ["2024-06-03", 798],
    ]);
    expect(daily[2].premiumDetails).toEqual([{ symbol: "AAPL", type: "Call", amount: -152 }]);
    expect(daily[1].stockDetails).toEqual([{ symbol: "MSFT", type: "Stock", amount: 1_000 }]);
  });

  it("should merge an option open and a stock sale on the same day", () => {
    const { positions: options } = buildOptionPositions(
      [option({ date: "2025-01-05", expiry: "2025-01-17", symbol: "AMD", premium: 101 })],
      { now: new Date(2025, 0, 6) },
    );
    const stocks = calculateAllPositions([
      stock("2025-01-02", "Buy", "TSLA", 10, 200, 0),
      stock("2025-01-05", "Sell", "TSLA", 10, 210, 0),
    ]);

    const daily = calculateDailyReturns(options, stocks);

    expect(daily).toEqual([
      {
        date: "2025-01-05",
        premiums: 100,
        stockGains: 100,
        totalReturns: 200,
        premiumDetails: [{ symbol: "AMD", type: "Put", amount: 100 }],
        stockDetails: [{ symbol: "TSLA", type: "Stock", amount: 100 }],
      },
    ]);
  });

  it("should sum the trailing buckets", () => {
    const daily = calculateDailyReturns(optionPositions, stockPositions);

    expect(trailingReturns(daily, 2)).toBe(646);
    expect(trailingReturns(daily, 7)).toBe(1_845);
  });
});

// ── Exposure ──

describe("calculateSectorExposure", () => {
  it("should group open stock and open puts by sector, unmapped into Other", () => {
    const exposure = calculateSectorExposure(stockPositions, optionPositions, { AAPL: "Technology" });

    expect(exposure).toEqual([
      { sector: "Other", amount: 100_000, positions: [{ symbol: "NVDA", type: "Put", amount: 100_000 }] },
      {
        sector: "Technology",
        amount: 15_000,
        positions: [{ symbol: "AAPL", type: "Stock", amount: 15_000 }],
      },
    ]);
  });
});

describe("calculatePositionDetails", () => {
  it("should list open stock and open puts largest first", () => {
    expect(calculatePositionDetails(stockPositions, optionPositions)).toEqual([
      { symbol: "NVDA", type: "Put", amount: 100_000 },
      { symbol: "AAPL", type: "Stock", amount: 15_000 },
    ]);
  });

  it("should show a covered stock once, as a Call at the stock's cost basis", () => {
    const { positions: calls } = buildOptionPositions(
      [
        option({ positionId: "C1", date: "2024-06-03", optionType: "Call", strike: 170, expiry: "2024-06-21" }),
        option({ positionId: "C2", date: "2024-06-04", optionType: "Call", strike: 175, expiry: "2024-06-28" }),
      ],
      { stockCostBasis: { AAPL: 150 }, now: NOW },
    );

    expect(calculatePositionDetails(stockPositions, calls)).toEqual([
      { symbol: "AAPL", type: "Call", amount: 15_000 },
    ]);
  });
});

// ── Cash ──

describe("calculateCashPosition", () => {
  it("should derive dry powder and read the latest savings balance", () => {
    const cash = calculateCashPosition(analytics, [
      { month: "2024-05", balance: 4_000 },
      { month: "2024-06", balance: 4_500 },
    ]);

    expect(cash).toEqual({ activeCapital: 115_000, dryPowder: -53_003, savingsBalance: 4_500 });
  });
});

// ── Performance ──

describe("trade performance", () => {
  it("should summarize closed stock positions", () => {
    expect(calculateStockPerformance(stockPositions)).toEqual({
      winCount: 1,
      lossCount: 0,
      totalClosedCount: 1,
      winRate: 100,
      avgWin: 1_000,
      avgLoss: 0,
    });
  });

  it("should summarize non-open option positions", () => {
    expect(calculateOptionPerformance(optionPositions)).toEqual({
      winCount: 1,
      lossCount: 1,
      totalClosedCount: 2,
      winRate: 50,
      avgWin: 199,
      avgLoss: -152,
    });
  });
});

describe("calculateWeeklyPerformance", () => {
  it("should count premium opened and stock closed in the current Monday-Sunday week", () => {
    const weekly = calculateWeeklyPerformance(61_997, stockPositions, optionPositions, NOW);

    expect(weekly.weekStartDate).toBe("2024-06-03");
    expect(weekly.weeklyPnl).toBe(800);
    expect(weekly.weeklyReturnPercent).toBeCloseTo((800 / 61_997) * 100, 10);
    expect(weekly.status).toBe("compliant");
    expect(weekly.targetWeeklyReturn).toBe(1);
    expect(weekly.daysRemainingInWeek).toBe(4);
  });

  it("should classify weekly returns against the thresholds", () => {
    expect(weeklyStatus(0.49)).toBe("violation");
    expect(weeklyStatus(0.5)).toBe("warning");
    expect(weeklyStatus(0.99)).toBe("warning");
    expect(weeklyStatus(1)).toBe("compliant");
  });
});

// ── Symbols ──

describe("symbol analysis", () => {
  it("should summarize every symbol alphabetically", () => {
    expect(calculateSymbolSummaries(stockPositions, optionPositions)).toEqual([
      { symbol: "AAPL", premiums: 47, stockPnl: 0, capital: 15_000, totalPnl: 47 },
      { symbol: "MSFT", premiums: 0, stockPnl: 1_000, capital: 0, totalPnl: 1_000 },
      { symbol: "NVDA", premiums: 798, stockPnl: 0, capital: 100_000, totalPnl: 798 },
    ]);
  });

  it("should detail one symbol against the portfolio total", () => {
    const details = getSymbolDetails("AAPL", stockPositions, optionPositions, 1_997);

    expect(details).toBeDefined();
    expect(details?.totalPremium).toBe(47);
    expect(details?.optionTradesCount).toBe(2);
    expect(details?.currentCapital).toBe(15_000);
    expect(details?.averageDaysToExpiry).toBe(19.5);
    expect(details?.percentOfOverallPnl).toBeCloseTo((47 / 1_997) * 100, 10);
  });

  it("should return undefined for a symbol with no history", () => {
    expect(getSymbolDetails("ZZZ", stockPositions, optionPositions, 1_997)).toBeUndefined();
  });
});

// ── Net worth ──

describe("calculateNetWorth", () => {
  it("should replay past months and use the live value for the current month", () => {
    const valueAsOf = valueAsOfFor({ funding, stockTransactions, optionTransactions });
    const months = calculateNetWorth(
      [
        { month: "2024-04", balance: 5_000 },
        { month: "2024-06", balance: 6_000 },
      ],
      61_997,
      valueAsOf,
      NOW,
    );

    expect(months).toEqual([
      { month: "2024-04", savingsBalance: 5_000, brokerageBalance: 61_047, totalNetWorth: 66_047 },
      { month: "2024-06", savingsBalance: 6_000, brokerageBalance: 61_997, totalNetWorth: 67_997 },
    ]);
  });

  it("should read the latest VIX close", () => {
    expect(latestVix([])).toBe(0);
    expect(
      latestVix([
        { date: "2024-06-03", value: 13.1 },
        { date: "2024-06-04", value: 12.6 },
      ]),
    ).toBe(12.6);
  });
});
