import type { PortfolioService } from "../../portfolio/portfolio-service.js";

export type GatewayErrorCode = "INVALID_PARAMS" | "NOT_FOUND" | "METHOD_NOT_FOUND" | "INTERNAL_ERROR";

export interface GatewayError {
  code: GatewayErrorCode;
  message: string;
}

export type RespondFn = (ok: boolean, payload?: unknown, error?: GatewayError) => void;

export interface GatewayRequestContext {
  service: PortfolioService;
}

export interface GatewayRequestOptions {
  method: string;
  params: unknown;
  respond: RespondFn;
  context: GatewayRequestContext;
}

export type GatewayRequestHandler = (options: GatewayRequestOptions) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;
