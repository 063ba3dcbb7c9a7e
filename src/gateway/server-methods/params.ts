import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { LedgerError } from "../../ledger/errors.js";
import type { GatewayError, RespondFn } from "./types.js";

/**
 * Validate RPC params against a schema. On failure the error is sent and
 * `undefined` returned, so handlers can bail out early.
 */
export function readParams<T extends TSchema>(
  schema: T,
  params: unknown,
  respond: RespondFn,
): Static<T> | undefined {
  const value = params ?? {};
  if (Value.Check(schema, value)) {
    return value;
  }
  const problems = [...Value.Errors(schema, value)].map((e) =>
    e.path ? `${e.path.slice(1)}: ${e.message}` : e.message,
  );
  respond(false, undefined, { code: "INVALID_PARAMS", message: problems.join("; ") });
  return undefined;
}

export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof LedgerError && (err.code === "INVALID_PARAMS" || err.code === "NOT_FOUND")) {
    return { code: err.code, message: err.message };
  }
  return { code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) };
}
