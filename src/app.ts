import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { ZodError } from "zod";
import { getFastifyCorsOptions } from "./config/cors.config";
import type { SyncConfig } from "./config/sync.config";
import { SyncErrorCode } from "./constants/sync";
import { healthRoutes, type DatabaseHealth } from "./routes/health";
import { posLineRoutes } from "./routes/pos-lines";
import { posSyncRoutes } from "./routes/pos-sync";
import { createPosServices } from "./services/pos-services";
import type { PosStore } from "./types/store.types";
import { formatZodError } from "./utils/api-response";

const DEFAULT_BODY_LIMIT_BYTES = 5 * 1024 * 1024;

export interface BuildAppOptions {
  store: PosStore;
  config: SyncConfig;
  nodeEnv?: string;
  /** Pino request logging; off under test unless set */
  logger?: boolean;
  bodyLimit?: number;
  corsOrigin?: string;
  checkDatabase?: () => Promise<DatabaseHealth>;
}

export function buildApp(options: BuildAppOptions): FastifyInstance {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? "development";
  const isTest = nodeEnv === "test";
  const isProduction = nodeEnv === "production";
  const bodyLimit = options.bodyLimit ?? DEFAULT_BODY_LIMIT_BYTES;
  const startedAt = Date.now();

  const app = Fastify({
    logger: options.logger ?? !isTest,
    bodyLimit,
  });

  const services = createPosServices(options.store, options.config);

  app.decorateRequest("stationSession", null);

  // Global error handler for errors thrown outside the route handlers
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error instanceof ZodError) {
      app.log.warn({ error }, "Zod validation error caught by global handler");
      return reply.status(400).send({
        success: false,
        error: {
          code: SyncErrorCode.VALIDATION_ERROR,
          message: "Invalid request",
          details: formatZodError(error),
        },
      });
    }

    // Body parsing runs before preHandler hooks
    if (
      error.code === "FST_ERR_CTP_EMPTY_JSON_BODY" ||
      error.code === "FST_ERR_CTP_INVALID_JSON_BODY" ||
      (error.statusCode === 400 && error instanceof SyntaxError)
    ) {
      app.log.warn({ error }, "Request body parsing error");
      return reply.status(400).send({
        success: false,
        error: {
          code: "BAD_REQUEST",
          message: "Request body must be valid JSON",
        },
      });
    }

    if (error.code === "FST_ERR_CTP_BODY_TOO_LARGE") {
      app.log.warn({ error }, "Request body too large");
      return reply.status(413).send({
        success: false,
        error: {
          code: "PAYLOAD_TOO_LARGE",
          message: `Request body exceeds maximum size of ${bodyLimit} bytes`,
        },
      });
    }

    if (error.validation) {
      app.log.warn({ error }, "Fastify schema validation error");
      return reply.status(400).send({
        success: false,
        error: {
          code: SyncErrorCode.VALIDATION_ERROR,
          message: error.message,
        },
      });
    }

    if (error.statusCode === 429) {
      return reply.status(429).send({
        success: false,
        error: { code: "RATE_LIMIT_EXCEEDED", message: error.message },
      });
    }

    const statusCode =
      error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      app.log.error({ error }, "Unhandled request error");
    }
    return reply.status(statusCode).send({
      success: false,
      error: {
        code:
          statusCode >= 500
            ? SyncErrorCode.INTERNAL_ERROR
            : error.code || "ERROR",
        message:
          statusCode >= 500 && isProduction
            ? "An unexpected error occurred"
            : error.message || "An unexpected error occurred",
      },
    });
  });

  app.register(cors, getFastifyCorsOptions(options.corsOrigin, nodeEnv));

  app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
      },
    },
  });

  // Rate limiting is off under test
  if (!isTest) {
    app.register(rateLimit, {
      max: isProduction ? 300 : 1000,
      timeWindow: "1 minute",
      keyGenerator: (request) => {
        const forwarded = request.headers["x-forwarded-for"];
        const first = Array.isArray(forwarded) ? forwarded[0] : forwarded;
        return first?.split(",")[0]?.trim() || request.ip || "unknown";
      },
      addHeaders: {
        "x-ratelimit-limit": true,
        "x-ratelimit-remaining": true,
        "x-ratelimit-reset": true,
      },
      errorResponseBuilder: (_request, context) => ({
        statusCode: 429,
        code: "RATE_LIMIT_EXCEEDED",
        message: `Too many requests. Please try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      }),
    });
  }

  app.register(healthRoutes, {
    checkDatabase:
      options.checkDatabase ?? (async () => ({ healthy: true })),
  });
  app.register(posSyncRoutes, { prefix: "/api/pos", services });
  app.register(posLineRoutes, { prefix: "/api/pos", services });

  // Root endpoint - API information and status
  app.get("/", async () => {
    return {
      name: "Cafeteria POS Sync API",
      version: process.env.npm_package_version || "1.0.0",
      status: "running",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      endpoints: {
        health: "/api/health",
        transactions: "/api/pos/transactions",
        payments: "/api/pos/payments",
        deletions: "/api/pos/deletions",
        syncValidate: "/api/pos/sync/validate",
        accountActivity: "/api/pos/accounts/:accountId/activity",
        lines: "/api/pos/lines/:mealType/:lineNum/open",
        lineLogs: "/api/pos/line-logs/:lineLogId",
        sessions: "/api/pos/sessions/:sessionId/sync-status",
      },
    };
  });

  return app;
}
