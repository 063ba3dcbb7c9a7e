import { optionsHandlers } from "./options.js";
import { portfolioHandlers } from "./portfolio.js";
import { stocksHandlers } from "./stocks.js";
import type { GatewayRequestHandlers } from "./types.js";

export const gatewayHandlers: GatewayRequestHandlers = {
  ...portfolioHandlers,
  ...stocksHandlers,
  ...optionsHandlers,
};

export type {
  GatewayError,
  GatewayErrorCode,
  GatewayRequestContext,
  GatewayRequestHandler,
  GatewayRequestHandlers,
  RespondFn,
} from "./types.js";
