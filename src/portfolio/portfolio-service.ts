import type { LedgerData, LedgerStore } from "../ledger/ledger-store.js";
import { trackLots } from "../stocks/index.js";
import type { OversellPolicy } from "../stocks/stock-transaction.js";
import type { DailyReturn } from "./daily-returns.js";
import type { PositionDetail, SectorExposure } from "./exposure.js";
import type { NetWorthMonth } from "./net-worth.js";
import {
  buildAnalytics,
  buildBooks,
  buildDailyReturns,
  buildNetWorth,
  buildPortfolioSnapshot,
  type LedgerBooks,
  type PortfolioSnapshot,
} from "./snapshot.js";
import type { StockMarketData } from "./stock-market-data.js";
import { calculateSymbolSummaries, getSymbolDetails, type SymbolDetails, type SymbolSummary } from "./symbol-analysis.js";
import { calculateLedgerTimeWeightedReturn, type TimeWeightedReturn } from "./time-weighted-return.js";

export interface PortfolioServiceOptions {
  oversell: OversellPolicy;
  /** Live quote source; when absent the recorded prices are used as-is. */
  stockMarketData?: StockMarketData;
  clock?: () => Date;
}

export interface ReadOptions {
  /** Drop cached quotes before pricing. */
  refresh?: boolean;
}

export interface LoadedBooks extends LedgerBooks {
  ledger: LedgerData;
  now: Date;
}

/**
 * Reads the ledger on every call and derives positions and analytics from it.
 * Nothing is persisted between calls apart from the quote cache.
 */
export class PortfolioService {
  private store: LedgerStore;
  private stockMarketData: StockMarketData | undefined;
  private oversell: OversellPolicy;
  private clock: () => Date;

  constructor(store: LedgerStore, options: PortfolioServiceOptions) {
    this.store = store;
    this.stockMarketData = options.stockMarketData;
    this.oversell = options.oversell;
    this.clock = options.clock ?? (() => new Date());
  }

  getDataDir(): string {
    return this.store.getPath();
  }

  /** Ledger with live quotes laid over the recorded prices of every held symbol. */
  async loadLedger(options: ReadOptions = {}): Promise<LedgerData> {
    const ledger = await this.store.load();
    if (!this.stockMarketData) {
      return ledger;
    }

    if (options.refresh) {
      this.stockMarketData.clearCache();
    }
    const { openLots } = trackLots(ledger.stockTransactions, { oversell: "saturate" });
    const held = [...openLots.keys()];
    if (held.length === 0) {
      return ledger;
    }
    const prices = await this.stockMarketData.overlayPrices(ledger.prices, held);
    return { ...ledger, prices };
  }

  async loadBooks(options: ReadOptions = {}): Promise<LoadedBooks> {
    const ledger = await this.loadLedger(options);
    const now = this.clock();
    return { ledger, now, ...buildBooks(ledger, { oversell: this.oversell, now }) };
  }

  async getSnapshot(options: ReadOptions = {}): Promise<PortfolioSnapshot> {
    const ledger = await this.loadLedger(options);
    return buildPortfolioSnapshot(ledger, { oversell: this.oversell, now: this.clock() });
  }

  async getDailyReturns(): Promise<DailyReturn[]> {
    return buildDailyReturns(await this.loadBooks());
  }

  async getTimeWeightedReturn(): Promise<TimeWeightedReturn> {
    const ledger = await this.store.load();
    return calculateLedgerTimeWeightedReturn(ledger, this.clock(), { oversell: this.oversell });
  }

  async getNetWorth(): Promise<NetWorthMonth[]> {
    const ledger = await this.store.load();
    return buildNetWorth(ledger, { oversell: this.oversell, now: this.clock() });
  }

  async getExposure(): Promise<{ sectors: SectorExposure[]; positions: PositionDetail[] }> {
    const snapshot = await this.getSnapshot();
    return { sectors: snapshot.sectorExposure, positions: snapshot.positionDetails };
  }

  async getSymbolSummaries(): Promise<SymbolSummary[]> {
    const books = await this.loadBooks();
    return calculateSymbolSummaries(books.stockPositions, books.optionPositions);
  }

  async getSymbolDetails(symbol: string): Promise<SymbolDetails | undefined> {
    const books = await this.loadBooks();
    const analytics = buildAnalytics(books.ledger, books, books.now);
    return getSymbolDetails(
      symbol.toUpperCase(),
      books.stockPositions,
      books.optionPositions,
      analytics.totalPortfolioProfit,
    );
  }
}
