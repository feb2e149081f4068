import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const Interval = Type.Integer({ minimum: 0 });

export const LoaderConfigSchema = Type.Object({
  databaseUrl: Type.String({ minLength: 1 }),
  sources: Type.Object({
    steamSpyUrl: Type.String({ minLength: 1 }),
    steamStoreUrl: Type.String({ minLength: 1 }),
    steamChartsUrl: Type.String({ minLength: 1 }),
    storeCountryCode: Type.String({ minLength: 2, maxLength: 2 }),
    userAgent: Type.String({ minLength: 1 }),
    requestTimeoutMs: Type.Integer({ minimum: 1 }),
  }),
  retry: Type.Object({
    maxAttempts: Type.Integer({ minimum: 1, maximum: 10 }),
    baseDelayMs: Interval,
    maxDelayMs: Interval,
  }),
  intervals: Type.Object({
    steamSpyAll: Interval,
    steamSpyDetail: Interval,
    steamCharts: Interval,
    steamStore: Interval,
  }),
  pipeline: Type.Object({
    loadBatchSize: Type.Integer({ minimum: 1, maximum: 5000 }),
    maxFailureRate: Type.Number({ minimum: 0, maximum: 1 }),
    runTimeoutMs: Type.Integer({ minimum: 1 }),
  }),
});

export type LoaderConfig = Static<typeof LoaderConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

type Env = Record<string, string | undefined>;

function str(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : fallback;
}

function num(env: Env, key: string, fallback: number): number {
  const value = env[key];
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  // NaN is left in place so the schema check reports the key
  return Number(value);
}

/**
 * Read loader configuration from environment variables.
 * Throws ConfigError when a value is out of range or not a number.
 */
export function loadConfig(env: Env = process.env): LoaderConfig {
  const candidate = {
    databaseUrl: str(
      env,
      "DATABASE_URL",
      "postgresql://localhost:5432/steam_analytics"
    ),
    sources: {
      steamSpyUrl: str(env, "STEAMSPY_API_URL", "https://steamspy.com/api.php"),
      steamStoreUrl: str(
        env,
        "STEAM_STORE_API_URL",
        "https://store.steampowered.com/api/appdetails"
      ),
      steamChartsUrl: str(
        env,
        "STEAMCHARTS_BASE_URL",
        "https://steamcharts.com"
      ),
      storeCountryCode: str(env, "STORE_COUNTRY_CODE", "us"),
      userAgent: str(
        env,
        "USER_AGENT",
        "Mozilla/5.0 (X11; Linux x86_64) steam-analytics-loader/0.1"
      ),
      requestTimeoutMs: num(env, "REQUEST_TIMEOUT_MS", 30_000),
    },
    retry: {
      maxAttempts: num(env, "MAX_RETRIES", 3),
      baseDelayMs: num(env, "RETRY_BASE_DELAY_MS", 2000),
      maxDelayMs: num(env, "RETRY_MAX_DELAY_MS", 30_000),
    },
    intervals: {
      steamSpyAll: num(env, "STEAMSPY_ALL_INTERVAL_MS", 60_000),
      steamSpyDetail: num(env, "STEAMSPY_DETAIL_INTERVAL_MS", 1000),
      steamCharts: num(env, "STEAMCHARTS_INTERVAL_MS", 2000),
      steamStore: num(env, "STEAM_STORE_INTERVAL_MS", 1500),
    },
    pipeline: {
      loadBatchSize: num(env, "LOAD_BATCH_SIZE", 100),
      maxFailureRate: num(env, "MAX_FAILURE_RATE", 0.5),
      runTimeoutMs: num(env, "RUN_TIMEOUT_MS", 6 * 60 * 60 * 1000),
    },
  };

  if (!Value.Check(LoaderConfigSchema, candidate)) {
    const problems = [...Value.Errors(LoaderConfigSchema, candidate)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigError("Invalid loader configuration", problems);
  }

  return candidate;
}

let cached: LoaderConfig | undefined;

export function getConfig(): LoaderConfig {
  cached ??= loadConfig();
  return cached;
}
