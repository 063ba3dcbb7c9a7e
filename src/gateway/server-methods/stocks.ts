import { Type } from "@sinclair/typebox";
import { readParams, toGatewayError } from "./params.js";
import type { GatewayRequestHandlers } from "./types.js";

const PositionsParams = Type.Object(
  {
    symbol: Type.Optional(Type.String({ minLength: 1 })),
    type: Type.Optional(Type.Union([Type.Literal("open"), Type.Literal("closed")])),
  },
  { additionalProperties: false },
);
const SymbolParams = Type.Object({ symbol: Type.String({ minLength: 1 }) }, { additionalProperties: false });
const NoParams = Type.Object({}, { additionalProperties: false });

export const stocksHandlers: GatewayRequestHandlers = {
  "stocks.positions": async ({ params, respond, context }) => {
    const parsed = readParams(PositionsParams, params, respond);
    if (!parsed) {
      return;
    }
    try {
      const { stockPositions } = await context.service.loadBooks();
      const symbol = parsed.symbol?.toUpperCase();
      const positions = stockPositions.filter(
        (p) => (!symbol || p.symbol === symbol) && (!parsed.type || p.type === parsed.type),
      );
      respond(true, { positions, total: positions.length });
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "stocks.symbols": async ({ params, respond, context }) => {
    if (!readParams(NoParams, params, respond)) {
      return;
    }
    try {
      const symbols = await context.service.getSymbolSummaries();
      respond(true, { symbols });
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "stocks.symbol": async ({ params, respond, context }) => {
    const parsed = readParams(SymbolParams, params, respond);
    if (!parsed) {
      return;
    }
    try {
      const details = await context.service.getSymbolDetails(parsed.symbol);
      if (!details) {
        respond(false, undefined, {
          code: "NOT_FOUND",
          message: `No stock or option history for ${parsed.symbol.toUpperCase()}`,
        });
        return;
      }
      respond(true, details);
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },
};
