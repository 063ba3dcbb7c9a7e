import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { LedgerError } from "./ledger/errors.js";

const ConfigSchema = Type.Object({
  LEDGER_DATA_DIR: Type.String({ minLength: 1, default: "data" }),
  PORT: Type.Integer({ minimum: 1, maximum: 65_535, default: 8080 }),
  OVERSELL_POLICY: Type.Union([Type.Literal("error"), Type.Literal("saturate")], { default: "error" }),
  QUOTE_REFRESH: Type.Boolean({ default: false }),
  QUOTE_BASE_URL: Type.String({ minLength: 1, default: "https://query1.finance.yahoo.com" }),
  QUOTE_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 32, default: 4 }),
  QUOTE_CACHE_TTL_MS: Type.Integer({ minimum: 0, default: 30_000 }),
});

type ConfigEnv = Static<typeof ConfigSchema>;

export interface LedgerConfig {
  dataDir: string;
  port: number;
  oversellPolicy: ConfigEnv["OVERSELL_POLICY"];
  quotes: {
    refresh: boolean;
    baseUrl: string;
    concurrency: number;
    cacheTtlMs: number;
  };
}

/**
 * Read configuration from environment variables. Unset variables take their
 * defaults; every invalid one is reported in a single error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(ConfigSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(ConfigSchema, Value.Default(ConfigSchema, raw));
  if (!Value.Check(ConfigSchema, candidate)) {
    const problems = [...Value.Errors(ConfigSchema, candidate)].map(
      (e) => `${e.path.slice(1)}: ${e.message}`,
    );
    throw new LedgerError("INVALID_CONFIG", `Invalid configuration: ${problems.join("; ")}`, {
      problems,
    });
  }

  return {
    dataDir: candidate.LEDGER_DATA_DIR,
    port: candidate.PORT,
    oversellPolicy: candidate.OVERSELL_POLICY,
    quotes: {
      refresh: candidate.QUOTE_REFRESH,
      baseUrl: candidate.QUOTE_BASE_URL,
      concurrency: candidate.QUOTE_CONCURRENCY,
      cacheTtlMs: candidate.QUOTE_CACHE_TTL_MS,
    },
  };
}

let cachedConfig: LedgerConfig | null = null;

export function getConfig(): LedgerConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
