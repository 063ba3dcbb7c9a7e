import type { PositionDetail } from "../portfolio/exposure.js";
import { formatCurrency, formatPercentage, formatPnl } from "../portfolio/format.js";
import { WEEKLY_TARGET_PERCENT } from "../portfolio/performance.js";
import type { UnrealizedStatus } from "../portfolio/risk.js";
import type { PortfolioSnapshot } from "../portfolio/snapshot.js";

const RULE = "━".repeat(54);
const LABEL_WIDTH = 27;
const TOP_POSITIONS = 10;
const CONCENTRATION_WARNING_PERCENT = 10;

const UNREALIZED_LABELS: Record<UnrealizedStatus, string> = {
  compliant: "✓ Risk Compliant",
  approaching: "⚠ Approaching Limit",
  exceeded: "✗ Limit Exceeded",
};

function header(title: string): string[] {
  const pad = Math.max(0, Math.floor((RULE.length - title.length) / 2));
  return [RULE, `${" ".repeat(pad)}${title}`, RULE];
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function share(amount: number, of: number): number {
  return of > 0 ? (amount / of) * 100 : 0;
}

interface SymbolTotal {
  symbol: string;
  types: string[];
  total: number;
}

function groupBySymbol(details: readonly PositionDetail[]): SymbolTotal[] {
  const bySymbol = new Map<string, SymbolTotal>();
  for (const detail of details) {
    const entry = bySymbol.get(detail.symbol) ?? { symbol: detail.symbol, types: [], total: 0 };
    entry.types.push(detail.type);
    entry.total += detail.amount;
    bySymbol.set(detail.symbol, entry);
  }
  return [...bySymbol.values()].toSorted(
    (a, b) => b.total - a.total || (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0),
  );
}

/** The stats report as printable lines. */
export function renderStatsReport(snapshot: PortfolioSnapshot): string[] {
  const { analytics, cashPosition, risk, timeWeightedReturn } = snapshot;
  const lines: string[] = [];

  // ── Overview ──
  lines.push(...header("PORTFOLIO OVERVIEW"));
  lines.push(row("Total Portfolio Value", formatCurrency(analytics.totalPortfolioValue)));
  lines.push(row("Total Profit/Loss", formatPnl(analytics.totalPortfolioProfit)));
  lines.push(row("Portfolio Return", formatPercentage(analytics.totalPortfolioProfitPercent)));
  lines.push(row("Total Deposits", formatCurrency(analytics.totalDeposits)));
  lines.push(row("Days Active", String(analytics.daysSinceStart)));
  lines.push(
    row(
      "Time-Weighted Return",
      `${formatPercentage(timeWeightedReturn.cumulative)} (Ann: ${formatPercentage(timeWeightedReturn.annualized)})`,
    ),
  );
  lines.push("");

  // ── Analytics ──
  lines.push(...header("ANALYTICS METRICS"));
  lines.push(row("Total Premiums Collected", formatCurrency(analytics.totalPremiums)));
  lines.push(row("Total Stock P/L", formatPnl(analytics.totalStockPnl)));
  lines.push(row("Daily Theta", formatCurrency(analytics.dailyTheta)));
  lines.push(row("Premium Per Day", formatCurrency(analytics.premiumPerDay)));
  lines.push(row("Number of Option Trades", String(analytics.optionTradesCount)));
  lines.push(row("Number of Stock Trades", String(analytics.stockTradesCount)));
  lines.push(row("Total Number of Trades", String(analytics.totalTradesCount)));
  lines.push(row("Avg Return Per Option", formatPercentage(analytics.avgReturnPerTrade)));
  lines.push(row("Largest Premium", formatCurrency(analytics.largestPremium)));
  lines.push(row("Smallest Premium", formatCurrency(analytics.smallestPremium)));
  lines.push(row("Average Premium", formatCurrency(analytics.averagePremium)));
  lines.push("");

  // ── Risk ──
  lines.push(...header("RISK METRICS"));
  lines.push(
    row(
      "At Risk Capital",
      `${formatCurrency(risk.atRiskCapital)} (${risk.capitalUtilization.toFixed(1)}% of ${formatCurrency(risk.totalCapital)})`,
    ),
  );
  const weekly = risk.trailingReturnPercent < WEEKLY_TARGET_PERCENT ? "⚠ Below Target" : "✓ On Track";
  lines.push(
    row(
      "Weekly Return Rate",
      `${weekly} ${formatPercentage(risk.trailingReturnPercent)} (${formatPnl(risk.trailingPnl)})`,
    ),
  );
  lines.push(
    row(
      "Unrealized P/L",
      `${UNREALIZED_LABELS[risk.unrealizedStatus]} ${formatPnl(risk.unrealizedPnl)} (${risk.unrealizedPercent.toFixed(1)}% of at risk)`,
    ),
  );
  lines.push(row("Available Cash (Dry)", formatCurrency(cashPosition.dryPowder)));
  lines.push(row("Savings Balance", formatCurrency(cashPosition.savingsBalance)));
  lines.push(row("VIX", risk.vix.toFixed(2)));
  lines.push("");

  // ── Sectors ──
  lines.push(...header("SECTOR EXPOSURE"));
  if (snapshot.sectorExposure.length === 0) {
    lines.push("No active positions");
  }
  for (const sector of snapshot.sectorExposure) {
    const percent = share(sector.amount, risk.totalCapital).toFixed(1);
    lines.push(`${sector.sector.padEnd(26)}${formatCurrency(sector.amount)} (${percent}%)`);
  }
  lines.push("");

  // ── Positions ──
  lines.push(...header("POSITION DETAILS"));
  const symbols = groupBySymbol(snapshot.positionDetails);
  if (symbols.length === 0) {
    lines.push("No active positions");
  }
  for (const entry of symbols.slice(0, TOP_POSITIONS)) {
    const percent = share(entry.total, risk.totalCapital);
    const flag = percent > CONCENTRATION_WARNING_PERCENT ? " ⚠" : "";
    lines.push(
      `${entry.symbol.padEnd(7)}${entry.types.join(" + ").padEnd(16)}${formatCurrency(entry.total)} (${percent.toFixed(1)}%)${flag}`,
    );
  }
  if (symbols.length > TOP_POSITIONS) {
    lines.push("", `... and ${symbols.length - TOP_POSITIONS} more positions`);
  }
  lines.push("", RULE);

  return lines;
}
