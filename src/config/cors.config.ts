/**
 * CORS Configuration Module
 *
 * POS stations run the client in a browser and talk to this server with a
 * bearer token, so no cookies are involved and credentials stay off.
 *
 * Configuration via CORS_ORIGIN environment variable:
 * - Single origin: "https://pos.district.example"
 * - Multiple origins: "https://pos.district.example,https://training.district.example"
 * - Development: "http://localhost:5173" (default when not set)
 */

import type { FastifyCorsOptions } from "@fastify/cors";

// =============================================================================
// Types
// =============================================================================

interface CorsConfig {
  origins: string[];
  methods: string[];
  allowedHeaders: string[];
  exposedHeaders: string[];
  maxAge: number;
}

interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// =============================================================================
// Constants
// =============================================================================

const ALLOWED_METHODS = ["GET", "POST", "OPTIONS"];
const ALLOWED_HEADERS = ["Content-Type", "Authorization"];
const EXPOSED_HEADERS = ["Content-Type"];

// Preflight cache duration (24 hours in seconds)
const PREFLIGHT_MAX_AGE = 86400;

const DEFAULT_DEV_ORIGINS = ["http://localhost:5173"];

// =============================================================================
// Validation
// =============================================================================

function validateOriginUrl(origin: string): string[] {
  const errors: string[] = [];

  try {
    const url = new URL(origin);

    const isLocalhost =
      url.hostname === "localhost" || url.hostname === "127.0.0.1";
    if (url.protocol !== "https:" && !isLocalhost) {
      errors.push(
        `Origin "${origin}" must use HTTPS (HTTP only allowed for localhost)`,
      );
    }

    if (url.pathname !== "/" && url.pathname !== "") {
      errors.push(
        `Origin "${origin}" should not include path - use "${url.origin}"`,
      );
    }
  } catch {
    errors.push(`Origin "${origin}" is not a valid URL`);
  }

  return errors;
}

export function validateCorsConfig(
  config: CorsConfig,
  nodeEnv: string | undefined = process.env.NODE_ENV,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.origins.length === 0) {
    errors.push("CORS_ORIGIN must specify at least one origin");
  }

  for (const origin of config.origins) {
    errors.push(...validateOriginUrl(origin));
  }

  if (nodeEnv === "production") {
    const localhostOrigins = config.origins.filter(
      (o) => o.includes("localhost") || o.includes("127.0.0.1"),
    );
    if (localhostOrigins.length > 0) {
      warnings.push(
        `Localhost origins in production: ${localhostOrigins.join(", ")}`,
      );
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =============================================================================
// Configuration Builder
// =============================================================================

export function parseOrigins(raw: string | undefined): string[] {
  const corsOrigin = raw?.trim();

  if (!corsOrigin) {
    return DEFAULT_DEV_ORIGINS;
  }

  return corsOrigin
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

export function buildCorsConfig(corsOrigin?: string): CorsConfig {
  return {
    origins: parseOrigins(corsOrigin),
    methods: ALLOWED_METHODS,
    allowedHeaders: ALLOWED_HEADERS,
    exposedHeaders: EXPOSED_HEADERS,
    maxAge: PREFLIGHT_MAX_AGE,
  };
}

/**
 * Fastify CORS plugin options.
 * Throws on invalid configuration in production, warns elsewhere.
 */
export function getFastifyCorsOptions(
  corsOrigin: string | undefined = process.env.CORS_ORIGIN,
  nodeEnv: string | undefined = process.env.NODE_ENV,
): FastifyCorsOptions {
  const config = buildCorsConfig(corsOrigin);
  const validation = validateCorsConfig(config, nodeEnv);

  for (const warning of validation.warnings) {
    console.warn(`[CORS Warning] ${warning}`);
  }

  if (!validation.valid) {
    const errorMessage = `CORS Configuration Errors:\n${validation.errors.map((e) => `  - ${e}`).join("\n")}`;

    if (nodeEnv === "production") {
      throw new Error(errorMessage);
    } else if (nodeEnv !== "test") {
      console.error(`[CORS Error] ${errorMessage}`);
    }
  }

  return {
    origin: config.origins,
    credentials: false,
    methods: config.methods,
    allowedHeaders: config.allowedHeaders,
    exposedHeaders: config.exposedHeaders,
    maxAge: config.maxAge,
    preflightContinue: false,
  };
}
