/**
 * Sync & Server Configuration
 *
 * Environment is read once at startup and validated with Zod so a bad
 * deployment fails at boot instead of on the first cash sale.
 *
 * @module config/sync.config
 */

import { z } from "zod";
import { isValidTimezone } from "../utils/timezone.utils";

const syncEnvSchema = z.object({
  // Legacy id of the roster account that bills anonymous cash sales
  CASH_ACCOUNT_LEGACY_ID: z.coerce.number().int().positive().default(999999999),
  // First synthetic family id handed to cash customers
  CASH_FAMILY_ID_FLOOR: z.coerce.number().int().positive().default(9500000),
  CASH_CODE_PREFIX: z.string().trim().min(1).max(4).default("C"),
  SESSION_IDLE_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(720),
  SYNC_BATCH_MAX_ITEMS: z.coerce.number().int().min(1).max(5000).default(500),
  BUSINESS_TIMEZONE: z
    .string()
    .min(1)
    .refine(isValidTimezone, "Must be an IANA timezone name")
    .default("UTC"),
});

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  PORT: z.coerce.number().int().positive().default(3001),
  LISTEN_HOST: z.string().default("::"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  // Seconds an idle pooled client is kept
  DB_POOL_TIMEOUT: z.coerce.number().int().positive().default(30),
  // Seconds to wait for a new connection
  DB_CONNECT_TIMEOUT: z.coerce.number().int().positive().default(10),
  BODY_LIMIT_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(5 * 1024 * 1024),
  CORS_ORIGIN: z.string().optional(),
});

export interface SyncConfig {
  cashAccountLegacyId: number;
  cashFamilyIdFloor: number;
  cashCodePrefix: string;
  sessionIdleTimeoutMinutes: number;
  batchMaxItems: number;
  businessTimezone: string;
}

export interface ServerConfig {
  nodeEnv: "development" | "test" | "production";
  databaseUrl: string;
  port: number;
  host: string;
  dbPoolMax: number;
  dbPoolIdleTimeoutSeconds: number;
  dbConnectTimeoutSeconds: number;
  bodyLimitBytes: number;
  corsOrigin: string | undefined;
}

type Env = Record<string, string | undefined>;

function formatEnvIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
    .join("\n");
}

export function loadSyncConfig(env: Env = process.env): SyncConfig {
  const parsed = syncEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(
      `Invalid sync configuration:\n${formatEnvIssues(parsed.error)}`,
    );
  }

  const values = parsed.data;
  return {
    cashAccountLegacyId: values.CASH_ACCOUNT_LEGACY_ID,
    cashFamilyIdFloor: values.CASH_FAMILY_ID_FLOOR,
    cashCodePrefix: values.CASH_CODE_PREFIX.toUpperCase(),
    sessionIdleTimeoutMinutes: values.SESSION_IDLE_TIMEOUT_MINUTES,
    batchMaxItems: values.SYNC_BATCH_MAX_ITEMS,
    businessTimezone: values.BUSINESS_TIMEZONE,
  };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  // BACKEND_PORT wins over PORT when both are set
  const parsed = serverEnvSchema.safeParse({
    ...env,
    PORT: env.BACKEND_PORT ?? env.PORT,
  });
  if (!parsed.success) {
    throw new Error(
      `Invalid server configuration:\n${formatEnvIssues(parsed.error)}`,
    );
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    host: values.LISTEN_HOST,
    dbPoolMax: values.DB_POOL_MAX,
    dbPoolIdleTimeoutSeconds: values.DB_POOL_TIMEOUT,
    dbConnectTimeoutSeconds: values.DB_CONNECT_TIMEOUT,
    bodyLimitBytes: values.BODY_LIMIT_BYTES,
    corsOrigin: values.CORS_ORIGIN,
  };
}
