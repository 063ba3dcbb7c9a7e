import { Type } from "@sinclair/typebox";
import { formatOptionSymbol, OPTION_STATUSES } from "../../options/index.js";
import { readParams, toGatewayError } from "./params.js";
import type { GatewayRequestHandlers } from "./types.js";

const PositionsParams = Type.Object(
  {
    symbol: Type.Optional(Type.String({ minLength: 1 })),
    status: Type.Optional(Type.Union(OPTION_STATUSES.map((s) => Type.Literal(s)))),
  },
  { additionalProperties: false },
);

export const optionsHandlers: GatewayRequestHandlers = {
  "options.positions": async ({ params, respond, context }) => {
    const parsed = readParams(PositionsParams, params, respond);
    if (!parsed) {
      return;
    }
    try {
      const { optionPositions } = await context.service.loadBooks();
      const symbol = parsed.symbol?.toUpperCase();
      const positions = optionPositions
        .filter((p) => (!symbol || p.symbol === symbol) && (!parsed.status || p.status === parsed.status))
        .map((p) => ({ ...p, contract: formatOptionSymbol(p) }));
      respond(true, { positions, total: positions.length });
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },
};
