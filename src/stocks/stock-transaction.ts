export type StockTransactionType = "Buy" | "Sell";

export interface StockTransaction {
  date: string; // YYYY-MM-DD
  type: StockTransactionType;
  symbol: string;
  shares: number;
  price: number;
  /** Cash effect as recorded by the broker (shares × price). */
  amount: number;
  commission: number;
  /** Line number of the row in the source file; the header is line 1. */
  transactionId: string;
}

/** Shares acquired by one Buy, shrunk by later Sells. */
export interface Lot {
  date: string;
  shares: number;
  price: number;
  costBasis: number;
}

export type PositionType = "open" | "closed";

export interface Position {
  symbol: string;
  type: PositionType;
  shares: number;
  avgBuyPrice: number;
  /** Closed only. */
  avgSellPrice: number;
  costBasis: number;
  /** Closed only. */
  saleProceeds: number;
  /** Closed only. */
  realizedPnl: number;
  returnPercent: number;
  openDate: string;
  /** Closed only, empty for open positions. */
  closeDate: string;
  currentPrice: number;
  marketValue: number;
  unrealizedPnl: number;
  unrealizedPercent: number;
}

/** What the lot tracker does when a Sell exceeds the shares in open lots. */
export type OversellPolicy = "error" | "saturate";

export type PriceMap = Record<string, number>;
