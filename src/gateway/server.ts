import type { Server } from "node:http";
import express, { type ErrorRequestHandler, type Express } from "express";
import { gatewayHandlers } from "./server-methods/index.js";
import type {
  GatewayError,
  GatewayRequestContext,
  GatewayRequestHandlers,
} from "./server-methods/index.js";

export type RpcResponse = { ok: true; payload: unknown } | { ok: false; error: GatewayError };

/** Run one RPC method and collect what it responds with. */
export async function dispatch(
  method: string,
  params: unknown,
  context: GatewayRequestContext,
  handlers: GatewayRequestHandlers = gatewayHandlers,
): Promise<RpcResponse> {
  const handler = Object.hasOwn(handlers, method) ? handlers[method] : undefined;
  if (!handler) {
    return { ok: false, error: { code: "METHOD_NOT_FOUND", message: `Unknown method: ${method}` } };
  }

  let response: RpcResponse | undefined;
  try {
    await handler({
      method,
      params,
      context,
      respond: (ok, payload, error) => {
        if (response) {
          return;
        }
        response = ok
          ? { ok: true, payload }
          : { ok: false, error: error ?? { code: "INTERNAL_ERROR", message: `${method} failed` } };
      },
    });
  } catch (err) {
    console.error(`[Gateway] ${method} threw:`, err);
    return {
      ok: false,
      error: { code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) },
    };
  }

  return response ?? { ok: false, error: { code: "INTERNAL_ERROR", message: `${method} sent no response` } };
}

function statusFor(response: RpcResponse): number {
  if (response.ok) {
    return 200;
  }
  switch (response.error.code) {
    case "INVALID_PARAMS":
      return 400;
    case "NOT_FOUND":
    case "METHOD_NOT_FOUND":
      return 404;
    default:
      return 500;
  }
}

/** An express.json() parse failure as an RPC error; anything else is left to express. */
export function toBodyError(err: unknown): GatewayError | undefined {
  if (err instanceof Error && "type" in err && err.type === "entity.parse.failed") {
    return { code: "INVALID_PARAMS", message: `Malformed request body: ${err.message}` };
  }
  return undefined;
}

export function createGatewayApp(
  context: GatewayRequestContext,
  handlers: GatewayRequestHandlers = gatewayHandlers,
): Express {
  const app = express();
  app.use(express.json());

  // ── Health ──────────────────────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  // ── RPC ─────────────────────────────────────────────────────────────────
  app.post("/rpc/:method", async (req, res) => {
    const method = req.params.method;
    const started = Date.now();
    const response = await dispatch(method, req.body, context, handlers);
    if (!response.ok) {
      console.warn(`[Gateway] ${method} → ${response.error.code}: ${response.error.message}`);
    }
    console.log(`[Gateway] ${method} ${Date.now() - started}ms`);
    res.status(statusFor(response)).json(response);
  });

  const onBodyError: ErrorRequestHandler = (err, req, res, next) => {
    const error = toBodyError(err);
    if (!error) {
      next(err);
      return;
    }
    console.warn(`[Gateway] ${req.path} → ${error.code}: ${error.message}`);
    const response: RpcResponse = { ok: false, error };
    res.status(statusFor(response)).json(response);
  };
  app.use(onBodyError);

  return app;
}

export function startGateway(context: GatewayRequestContext, port: number): Promise<Server> {
  const app = createGatewayApp(context);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`[Gateway] Listening on http://localhost:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
