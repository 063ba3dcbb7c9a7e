export type {
  StockTransaction,
  StockTransactionType,
  Lot,
  Position,
  PositionType,
  OversellPolicy,
  PriceMap,
} from "./stock-transaction.js";
export { trackLots, totalShares, totalCostBasis } from "./lot-tracker.js";
export type { LotTrackerOptions, LotTrackerResult } from "./lot-tracker.js";
export {
  buildPositions,
  calculateAllPositions,
  averageCostBasisBySymbol,
  comparePositions,
} from "./positions.js";
export type { PositionBook } from "./positions.js";
