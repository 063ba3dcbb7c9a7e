import { Type } from "@sinclair/typebox";
import { readParams, toGatewayError } from "./params.js";
import type { GatewayRequestHandlers } from "./types.js";

const GetParams = Type.Object({ refresh: Type.Optional(Type.Boolean()) }, { additionalProperties: false });
const NoParams = Type.Object({}, { additionalProperties: false });

export const portfolioHandlers: GatewayRequestHandlers = {
  "portfolio.get": async ({ params, respond, context }) => {
    const parsed = readParams(GetParams, params, respond);
    if (!parsed) {
      return;
    }
    try {
      const snapshot = await context.service.getSnapshot({ refresh: parsed.refresh ?? false });
      respond(true, snapshot);
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "portfolio.dailyReturns": async ({ params, respond, context }) => {
    if (!readParams(NoParams, params, respond)) {
      return;
    }
    try {
      const dailyReturns = await context.service.getDailyReturns();
      respond(true, { dailyReturns, total: dailyReturns.length });
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "portfolio.twr": async ({ params, respond, context }) => {
    if (!readParams(NoParams, params, respond)) {
      return;
    }
    try {
      respond(true, await context.service.getTimeWeightedReturn());
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "portfolio.netWorth": async ({ params, respond, context }) => {
    if (!readParams(NoParams, params, respond)) {
      return;
    }
    try {
      const months = await context.service.getNetWorth();
      respond(true, { months });
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },

  "portfolio.exposure": async ({ params, respond, context }) => {
    if (!readParams(NoParams, params, respond)) {
      return;
    }
    try {
      respond(true, await context.service.getExposure());
    } catch (err) {
      respond(false, undefined, toGatewayError(err));
    }
  },
};
