import fs from "node:fs/promises";
import path from "node:path";
import type { OptionTransaction } from "../options/option-position.js";
import type { FundingTransaction } from "../portfolio/deposits.js";
import type { PriceMap, StockTransaction } from "../stocks/stock-transaction.js";
import { parseCsvRecords, type CsvRecord } from "./csv.js";
import { formatDiagnostic, type Diagnostic, type ParseResult } from "./diagnostics.js";
import { LedgerError } from "./errors.js";
import {
  parseFundingRecords,
  parseOptionRecords,
  parsePriceRecords,
  parseSavingsRecords,
  parseSectorRecords,
  parseStockRecords,
  parseVixRecords,
  toPriceMap,
  toSectorMap,
  type SavingsRow,
  type VixRow,
} from "./records.js";

export const LEDGER_FILES = {
  funding: "transactions.csv",
  stocks: "stocks_transactions.csv",
  options: "options_transactions.csv",
  prices: "stock_prices.csv",
  sectors: "sectors.csv",
  savings: "savings.csv",
  vix: "vix.csv",
} as const;

export interface LedgerData {
  funding: FundingTransaction[];
  stockTransactions: StockTransaction[];
  optionTransactions: OptionTransaction[];
  prices: PriceMap;
  sectors: Record<string, string>;
  savings: SavingsRow[];
  vix: VixRow[];
  /** Rows skipped while loading, across every file. */
  diagnostics: Diagnostic[];
}

/**
 * Reads the CSV files of one data directory. Nothing is cached: every
 * `load()` sees the files as they are on disk now.
 */
export class LedgerStore {
  private dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = path.resolve(dataDir);
  }

  getPath(): string {
    return this.dataDir;
  }

  async load(): Promise<LedgerData> {
    const [funding, stocks, options, prices, sectors, savings, vix] = await Promise.all([
      this.readFile(LEDGER_FILES.funding, parseFundingRecords),
      this.readFile(LEDGER_FILES.stocks, parseStockRecords),
      this.readFile(LEDGER_FILES.options, parseOptionRecords),
      this.readFile(LEDGER_FILES.prices, parsePriceRecords),
      this.readFile(LEDGER_FILES.sectors, parseSectorRecords),
      this.readFile(LEDGER_FILES.savings, parseSavingsRecords),
      this.readFile(LEDGER_FILES.vix, parseVixRecords),
    ]);

    const diagnostics = [
      ...funding.diagnostics,
      ...stocks.diagnostics,
      ...options.diagnostics,
      ...prices.diagnostics,
      ...sectors.diagnostics,
      ...savings.diagnostics,
      ...vix.diagnostics,
    ];
    for (const diagnostic of diagnostics) {
      console.warn(`[Ledger] Skipped ${formatDiagnostic(diagnostic)}`);
    }

    return {
      funding: funding.records,
      stockTransactions: stocks.records,
      optionTransactions: options.records,
      prices: toPriceMap(prices.records),
      sectors: toSectorMap(sectors.records),
      savings: savings.records,
      vix: vix.records,
      diagnostics,
    };
  }

  private async readFile<T>(
    name: string,
    parseRecords: (records: CsvRecord[]) => ParseResult<T>,
  ): Promise<ParseResult<T>> {
    let content: string;
    try {
      content = await fs.readFile(path.join(this.dataDir, name), "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return { records: [], diagnostics: [] };
      }
      throw err;
    }
    let records: CsvRecord[];
    try {
      records = parseCsvRecords(content);
    } catch (err) {
      if (err instanceof LedgerError && err.code === "MALFORMED_CSV") {
        // The whole file is unreadable; the other files still load.
        return {
          records: [],
          diagnostics: [{ code: "MALFORMED_CSV", source: name, message: err.message }],
        };
      }
      throw err;
    }
    return parseRecords(records);
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
