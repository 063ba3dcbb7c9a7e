export class LedgerError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

/** Thrown by the lot tracker when a Sell asks for more shares than the open lots hold. */
export class InsufficientLotsError extends LedgerError {
  readonly symbol: string;
  readonly date: string;
  readonly requested: number;
  readonly available: number;

  constructor(symbol: string, date: string, requested: number, available: number) {
    super(
      "INSUFFICIENT_LOTS",
      `Sell of ${requested} ${symbol} on ${date} exceeds the ${available} shares held in open lots.`,
      { symbol, date, requested, available },
    );
    this.name = "InsufficientLotsError";
    this.symbol = symbol;
    this.date = date;
    this.requested = requested;
    this.available = available;
  }
}
