import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PriceMap } from "../stocks/stock-transaction.js";

const DEFAULT_BASE_URL = "https://query1.finance.yahoo.com";
const DEFAULT_CACHE_TTL_MS = 30_000; // 30 seconds
const DEFAULT_CONCURRENCY = 4;

const ChartResponse = Type.Object({
  chart: Type.Object({
    result: Type.Union([
      Type.Array(Type.Object({ meta: Type.Object({ regularMarketPrice: Type.Number() }) })),
      Type.Null(),
    ]),
  }),
});

export interface Quote {
  symbol: string;
  price: number;
}

export interface StockMarketDataOptions {
  baseUrl?: string;
  cacheTtlMs?: number;
  /** Upper bound on requests in flight at once. */
  concurrency?: number;
}

interface CachedQuote {
  price: number;
  timestamp: number;
}

/**
 * Live US stock quotes from the Yahoo Finance chart endpoint, cached per
 * symbol. Used only to overlay the prices recorded in stock_prices.csv.
 */
export class StockMarketData {
  private cache = new Map<string, CachedQuote>();
  private baseUrl: string;
  private cacheTtlMs: number;
  private concurrency: number;

  constructor(options: StockMarketDataOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  clearCache(): void {
    this.cache.clear();
  }

  async fetchQuote(symbol: string): Promise<Quote> {
    const key = symbol.toUpperCase();
    const cached = this.cache.get(key);
    if (cached && Date.now() - cached.timestamp < this.cacheTtlMs) {
      return { symbol: key, price: cached.price };
    }

    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(key)}?interval=1d&range=1d`;
    const res = await fetch(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": "premium-ledger/0.1",
      },
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Yahoo Finance API error (${res.status}): ${body}`);
    }

    const data: unknown = await res.json();
    const price = Value.Check(ChartResponse, data)
      ? data.chart.result?.[0]?.meta.regularMarketPrice
      : undefined;
    if (price === undefined) {
      throw new Error(`No price data for ${key}`);
    }

    this.cache.set(key, { price, timestamp: Date.now() });
    return { symbol: key, price };
  }

  /**
   * Quotes for every symbol that could be priced. The chart endpoint has no
   * bulk form, so requests go out in batches of `concurrency`; a failing
   * symbol is logged and left out.
   */
  async fetchQuotes(symbols: string[]): Promise<Quote[]> {
    const keys = [...new Set(symbols.map((s) => s.toUpperCase()))];
    const quotes: Quote[] = [];

    for (let start = 0; start < keys.length; start += this.concurrency) {
      const batch = keys.slice(start, start + this.concurrency);
      const settled = await Promise.allSettled(batch.map((key) => this.fetchQuote(key)));
      settled.forEach((result, index) => {
        if (result.status === "fulfilled") {
          quotes.push(result.value);
        } else {
          const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
          console.warn(`[Quotes] ${batch[index]}: ${reason}; keeping the recorded price`);
        }
      });
    }

    return quotes;
  }

  /** A copy of `prices` with live quotes laid over the given symbols. */
  async overlayPrices(prices: PriceMap, symbols: string[]): Promise<PriceMap> {
    const quotes = await this.fetchQuotes(symbols);
    const merged: PriceMap = { ...prices };
    for (const quote of quotes) {
      merged[quote.symbol] = quote.price;
    }
    return merged;
  }
}
