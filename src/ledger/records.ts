import type { OptionAction, OptionTransaction, OptionType } from "../options/option-position.js";
import { OPTION_ACTIONS, OPTION_TYPES } from "../options/option-position.js";
import { parseCurrency, type FundingTransaction } from "../portfolio/deposits.js";
import type { PriceMap, StockTransaction } from "../stocks/stock-transaction.js";
import type { CsvRecord } from "./csv.js";
import { parseFundingDate, parseIsoDate, toIsoDate } from "./dates.js";
import type { Diagnostic, DiagnosticCode, ParseResult } from "./diagnostics.js";

// ── Row reading ──

/** Raised inside a row parser; turned into a diagnostic and the row is skipped. */
class RowRejected extends Error {
  constructor(
    readonly code: DiagnosticCode,
    message: string,
  ) {
    super(message);
  }
}

class RowReader {
  constructor(private readonly fields: string[]) {}

  text(index: number, name: string): string {
    const value = this.fields[index] ?? "";
    if (value === "") {
      throw new RowRejected("MISSING_FIELD", `${name} is empty`);
    }
    return value;
  }

  optionalText(index: number): string {
    return this.fields[index] ?? "";
  }

  number(index: number, name: string): number {
    const raw = this.text(index, name);
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new RowRejected("INVALID_NUMBER", `${name} "${raw}" is not a number`);
    }
    return value;
  }

  /** Blank reads as 0. */
  optionalNumber(index: number, name: string): number {
    return this.optionalText(index) === "" ? 0 : this.number(index, name);
  }

  isoDate(index: number, name: string): string {
    const raw = this.text(index, name);
    if (!parseIsoDate(raw)) {
      throw new RowRejected("INVALID_DATE", `${name} "${raw}" is not a YYYY-MM-DD date`);
    }
    return raw;
  }
}

function parseRecords<T>(
  source: string,
  records: readonly CsvRecord[],
  minColumns: number,
  parseRow: (row: RowReader, line: number) => T,
): ParseResult<T> {
  const parsed: T[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const record of records) {
    const base = { source, row: record.line, record: record.fields };
    if (record.fields.length < minColumns) {
      diagnostics.push({
        ...base,
        code: "SHORT_ROW",
        message: `expected at least ${minColumns} columns, found ${record.fields.length}`,
      });
      continue;
    }
    try {
      parsed.push(parseRow(new RowReader(record.fields), record.line));
    } catch (err) {
      if (!(err instanceof RowRejected)) {
        throw err;
      }
      diagnostics.push({ ...base, code: err.code, message: err.message });
    }
  }

  return { records: parsed, diagnostics };
}

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

// ── Files ──

/** transactions.csv: Date,Type,Amount */
export function parseFundingRecords(records: readonly CsvRecord[]): ParseResult<FundingTransaction> {
  return parseRecords("transactions.csv", records, 3, (row) => {
    const rawDate = row.text(0, "Date");
    const date = parseFundingDate(rawDate);
    if (!date) {
      throw new RowRejected("INVALID_DATE", `Date "${rawDate}" is neither "January 2 2006" nor YYYY-MM-DD`);
    }
    const rawAmount = row.text(2, "Amount");
    const amount = parseCurrency(rawAmount);
    if (amount === undefined) {
      throw new RowRejected("INVALID_NUMBER", `Amount "${rawAmount}" is not a currency amount`);
    }
    return { date: toIsoDate(date), type: row.text(1, "Type"), amount };
  });
}

/** stocks_transactions.csv: Date,Type,Symbol,Shares,Price,Amount,Commission */
export function parseStockRecords(records: readonly CsvRecord[]): ParseResult<StockTransaction> {
  return parseRecords("stocks_transactions.csv", records, 6, (row, line) => {
    const date = row.isoDate(0, "Date");
    const type = row.text(1, "Type");
    if (type !== "Buy" && type !== "Sell") {
      throw new RowRejected("UNKNOWN_TYPE", `Type "${type}" is neither Buy nor Sell`);
    }
    const shares = row.number(3, "Shares");
    if (shares <= 0) {
      throw new RowRejected("INVALID_NUMBER", `Shares must be positive, got ${shares}`);
    }
    return {
      date,
      type,
      symbol: row.text(2, "Symbol").toUpperCase(),
      shares,
      price: row.number(4, "Price"),
      amount: row.number(5, "Amount"),
      commission: row.optionalNumber(6, "Commission"),
      transactionId: String(line),
    };
  });
}

/** options_transactions.csv: Date,Action,Symbol,Type,Strike,Expiry,Contracts,Premium,StockPrice,Commission,PositionID,Notes */
export function parseOptionRecords(records: readonly CsvRecord[]): ParseResult<OptionTransaction> {
  return parseRecords("options_transactions.csv", records, 8, (row) => {
    const date = row.isoDate(0, "Date");
    const action: string = row.text(1, "Action");
    if (!isOneOf<OptionAction>(OPTION_ACTIONS, action)) {
      throw new RowRejected("UNKNOWN_ACTION", `Action "${action}" is not one of ${OPTION_ACTIONS.join(", ")}`);
    }
    const optionType: string = row.text(3, "Type");
    if (!isOneOf<OptionType>(OPTION_TYPES, optionType)) {
      throw new RowRejected("UNKNOWN_TYPE", `Type "${optionType}" is neither Call nor Put`);
    }
    const contracts = row.number(6, "Contracts");
    if (!Number.isInteger(contracts) || contracts <= 0) {
      throw new RowRejected("INVALID_NUMBER", `Contracts must be a positive whole number, got ${contracts}`);
    }
    return {
      date,
      action,
      symbol: row.text(2, "Symbol").toUpperCase(),
      optionType,
      strike: row.number(4, "Strike"),
      expiry: row.isoDate(5, "Expiry"),
      contracts,
      premium: row.number(7, "Premium"),
      stockPrice: row.optionalNumber(8, "StockPrice"),
      commission: row.optionalNumber(9, "Commission"),
      positionId: row.optionalText(10),
      notes: row.optionalText(11),
    };
  });
}

export interface PriceRow {
  symbol: string;
  price: number;
}

/** stock_prices.csv: Ticker,Price */
export function parsePriceRecords(records: readonly CsvRecord[]): ParseResult<PriceRow> {
  return parseRecords("stock_prices.csv", records, 2, (row) => ({
    symbol: row.text(0, "Ticker").toUpperCase(),
    price: row.number(1, "Price"),
  }));
}

export interface SectorRow {
  symbol: string;
  sector: string;
}

/** sectors.csv: Symbol,Sector */
export function parseSectorRecords(records: readonly CsvRecord[]): ParseResult<SectorRow> {
  return parseRecords("sectors.csv", records, 2, (row) => ({
    symbol: row.text(0, "Symbol").toUpperCase(),
    sector: row.text(1, "Sector"),
  }));
}

export interface SavingsRow {
  month: string; // YYYY-MM
  balance: number;
}

/** savings.csv: Month,Balance */
export function parseSavingsRecords(records: readonly CsvRecord[]): ParseResult<SavingsRow> {
  return parseRecords("savings.csv", records, 2, (row) => {
    const month = row.text(0, "Month");
    if (!/^\d{4}-\d{2}$/.test(month)) {
      throw new RowRejected("INVALID_DATE", `Month "${month}" is not YYYY-MM`);
    }
    return { month, balance: row.number(1, "Balance") };
  });
}

export interface VixRow {
  date: string;
  value: number;
}

/** vix.csv: Date,VIX */
export function parseVixRecords(records: readonly CsvRecord[]): ParseResult<VixRow> {
  return parseRecords("vix.csv", records, 2, (row) => ({
    date: row.text(0, "Date"),
    value: row.number(1, "VIX"),
  }));
}

/** Later rows win when a ticker repeats. */
export function toPriceMap(rows: readonly PriceRow[]): PriceMap {
  const prices: PriceMap = {};
  for (const { symbol, price } of rows) {
    prices[symbol] = price;
  }
  return prices;
}

export function toSectorMap(rows: readonly SectorRow[]): Record<string, string> {
  const sectors: Record<string, string> = {};
  for (const { symbol, sector } of rows) {
    sectors[symbol] = sector;
  }
  return sectors;
}
