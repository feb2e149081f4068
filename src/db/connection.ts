import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { getConfig } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Configure pg to parse JSON/JSONB as objects instead of strings
types.setTypeParser(
  types.builtins.JSON,
  (val: string) => JSON.parse(val) as unknown
);
types.setTypeParser(
  types.builtins.JSONB,
  (val: string) => JSON.parse(val) as unknown
);
// Calendar dates stay "YYYY-MM-DD"; a Date would shift with the local zone
types.setTypeParser(types.builtins.DATE, (val: string) => val);
// Prices and percentages are NUMERIC(10,2); well inside double precision
types.setTypeParser(types.builtins.NUMERIC, (val: string) => Number(val));

/**
 * Helper to convert JavaScript objects to JSONB SQL expressions for Kysely inserts/updates.
 * This is needed because Kysely doesn't automatically serialize objects to JSON for PostgreSQL.
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}

// ============================================================================
// Configuration
// ============================================================================

const DATABASE_URL = getConfig().databaseUrl;

const poolConfig: pg.PoolConfig = {
  connectionString: DATABASE_URL,
  max: 10, // Maximum pool connections
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 5000, // Connection timeout
};

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

export const pool = new Pool(poolConfig);

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(): Promise<void> {
  try {
    // db.destroy() already closes the pool, so we only need to call it once
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  const url = new URL(DATABASE_URL);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

/**
 * Get pool statistics
 */
export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
