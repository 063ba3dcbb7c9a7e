import { differenceInMilliseconds, subSeconds } from "date-fns";
import { parseIsoDate } from "../ledger/dates.js";
import type { LotTrackerOptions } from "../stocks/lot-tracker.js";
import { isDeposit } from "./deposits.js";
import { valueAsOfFor, type LedgerHistory } from "./portfolio-value.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface CashFlow {
  date: string; // YYYY-MM-DD
  amount: number;
}

export interface TimeWeightedReturn {
  /** Percent, e.g. -1 for a 1% loss. */
  cumulative: number;
  /** Percent per year. */
  annualized: number;
  /** Sub-periods linked into the result. */
  periods: number;
  /** Sub-periods dropped because they started at a value of zero or less. */
  skippedPeriods: number;
}

const NO_RETURN: TimeWeightedReturn = { cumulative: 0, annualized: 0, periods: 0, skippedPeriods: 0 };

/** One flow per calendar day, summed, oldest first. */
export function consolidateCashFlows(flows: readonly CashFlow[]): CashFlow[] {
  const byDate = new Map<string, number>();
  for (const flow of flows) {
    byDate.set(flow.date, (byDate.get(flow.date) ?? 0) + flow.amount);
  }
  return [...byDate.entries()]
    .map(([date, amount]) => ({ date, amount }))
    .toSorted((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Link sub-period returns between deposits geometrically.
 *
 * Each deposit closes a period at the book value one second before it
 * lands; the next period starts from that value plus the deposit. The last
 * period runs to `now`.
 */
export function calculateTimeWeightedReturn(
  cashFlows: readonly CashFlow[],
  valueAsOf: (instant: Date) => number,
  now: Date,
): TimeWeightedReturn {
  const flows = consolidateCashFlows(cashFlows).flatMap((flow) => {
    const instant = parseIsoDate(flow.date);
    return instant ? [{ instant, amount: flow.amount }] : [];
  });
  if (flows.length === 0) {
    return NO_RETURN;
  }

  const returns: number[] = [];
  let skippedPeriods = 0;
  const closePeriod = (startValue: number, endValue: number) => {
    if (startValue > 0) {
      returns.push((endValue - startValue) / startValue);
    } else {
      skippedPeriods++;
    }
  };

  let startValue = flows[0].amount;
  for (const flow of flows.slice(1)) {
    const endValue = valueAsOf(subSeconds(flow.instant, 1));
    closePeriod(startValue, endValue);
    startValue = endValue + flow.amount;
  }
  closePeriod(startValue, valueAsOf(now));

  const growth = returns.reduce((product, r) => product * (1 + r), 1);
  const cumulative = growth - 1;

  let daysActive = differenceInMilliseconds(now, flows[0].instant) / MS_PER_DAY;
  if (daysActive <= 0) {
    daysActive = 1;
  }
  const annualized = Math.pow(growth, 365 / daysActive) - 1;

  return {
    cumulative: cumulative * 100,
    annualized: annualized * 100,
    periods: returns.length,
    skippedPeriods,
  };
}

/** Time-weighted return of the deposits in a ledger, valued by replaying its history. */
export function calculateLedgerTimeWeightedReturn(
  history: LedgerHistory,
  now: Date,
  options: LotTrackerOptions = {},
): TimeWeightedReturn {
  const deposits = history.funding.filter(isDeposit).map(({ date, amount }) => ({ date, amount }));
  return calculateTimeWeightedReturn(deposits, valueAsOfFor(history, options), now);
}
