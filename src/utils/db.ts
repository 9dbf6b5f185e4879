import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { ServerConfig } from "../config/sync.config";
import * as schema from "../db/schema";

export type Database = NodePgDatabase<typeof schema>;

/**
 * Connection pool configuration values (for logging/debugging)
 */
export interface PoolConfig {
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export type PoolSettings = Pick<
  ServerConfig,
  "dbPoolMax" | "dbPoolIdleTimeoutSeconds" | "dbConnectTimeoutSeconds"
>;

/**
 * Pool settings from the validated server config
 * (DB_POOL_MAX, DB_POOL_TIMEOUT, DB_CONNECT_TIMEOUT)
 */
export function getPoolConfig(settings: PoolSettings): PoolConfig {
  return {
    max: settings.dbPoolMax,
    idleTimeoutMillis: settings.dbPoolIdleTimeoutSeconds * 1000,
    connectionTimeoutMillis: settings.dbConnectTimeoutSeconds * 1000,
  };
}

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

export function createDatabase(
  databaseUrl: string,
  poolSettings: PoolSettings,
): DatabaseHandle {
  const pool = new Pool({
    connectionString: databaseUrl,
    ...getPoolConfig(poolSettings),
  });

  pool.on("error", (err) => {
    console.error("[Database] Idle client error:", err.message);
  });

  return { pool, db: drizzle(pool, { schema }) };
}

/**
 * Cheap round-trip used by the health endpoint
 */
export async function checkDatabaseHealth(
  pool: Pool,
): Promise<{ healthy: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1");
    return { healthy: true };
  } catch (error) {
    return {
      healthy: false,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}
