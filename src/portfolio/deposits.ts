/** A cash movement between the bank and the brokerage account. */
export interface FundingTransaction {
  date: string; // YYYY-MM-DD, normalised from "January 2 2006"
  type: string; // "Deposit", "Withdrawal", ...
  amount: number;
}

export const DEPOSIT = "Deposit";

/** "$10,000.00" → 10000. Returns undefined for anything that is not a number once `$` and commas are gone. */
export function parseCurrency(value: string): number | undefined {
  const cleaned = value.trim().replace(/^\$/, "").replace(/,/g, "");
  if (cleaned === "") {
    return undefined;
  }
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : undefined;
}

export function isDeposit(tx: FundingTransaction): boolean {
  return tx.type === DEPOSIT;
}

export function totalDeposits(funding: readonly FundingTransaction[]): number {
  return funding.filter(isDeposit).reduce((sum, tx) => sum + tx.amount, 0);
}
