export type OptionAction = "Sell to Open" | "Buy to Close" | "Expired" | "Assigned" | "Exercised";

export type OptionType = "Call" | "Put";

export type OptionStatus = "Open" | "Expired" | "Assigned" | "Exercised" | "Closed Early" | "Rolled";

export interface OptionTransaction {
  date: string; // YYYY-MM-DD
  action: OptionAction;
  symbol: string; // underlying, "NVDA"
  optionType: OptionType;
  strike: number;
  expiry: string; // YYYY-MM-DD
  contracts: number;
  premium: number; // positive for credit, negative for debit
  stockPrice: number; // underlying price at trade time, 0 when not recorded
  commission: number;
  positionId: string;
  notes: string;
}

export interface OptionPosition {
  positionId: string;
  symbol: string;
  optionType: OptionType;
  strike: number;
  expiry: string;
  contracts: number;
  status: OptionStatus;
  openDate: string;
  closeDate: string; // empty while open

  premiumCollected: number;
  premiumPaid: number;
  netPremium: number; // collected - paid - commissions
  commissions: number;
  maxProfit: number;

  // Time
  daysHeld: number;
  daysToExpiry: number; // from open date, at least 1

  // Yield
  percentReturn: number;
  annualizedReturn: number;
  capital: number;
}

export const OPTION_ACTIONS: readonly OptionAction[] = [
  "Sell to Open",
  "Buy to Close",
  "Expired",
  "Assigned",
  "Exercised",
];

export const OPTION_TYPES: readonly OptionType[] = ["Call", "Put"];

export const OPTION_STATUSES: readonly OptionStatus[] = [
  "Open",
  "Expired",
  "Assigned",
  "Exercised",
  "Closed Early",
  "Rolled",
];

export const CONTRACT_MULTIPLIER = 100;

/** Format: "NVDA-260214-P-800" */
export function formatOptionSymbol(
  position: Pick<OptionPosition, "symbol" | "optionType" | "strike" | "expiry">,
): string {
  const dateStr = position.expiry.replace(/-/g, "").slice(2); // YYMMDD
  const typeChar = position.optionType === "Call" ? "C" : "P";
  return `${position.symbol}-${dateStr}-${typeChar}-${position.strike}`;
}
