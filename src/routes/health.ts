import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

export interface DatabaseHealth {
  healthy: boolean;
  error?: string;
}

export interface HealthRouteOptions {
  checkDatabase: () => Promise<DatabaseHealth>;
}

/**
 * Timeout wrapper for health checks - ensures fast response even if the
 * database is slow
 */
function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  defaultValue: T,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((resolve) => {
      timer = setTimeout(() => resolve(defaultValue), timeoutMs);
    }),
  ]).finally(() => clearTimeout(timer));
}

/**
 * Health check endpoint
 * GET /api/health
 */
export async function healthRoutes(
  fastify: FastifyInstance,
  options: HealthRouteOptions,
) {
  fastify.get(
    "/api/health",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const HEALTH_CHECK_TIMEOUT = 2000;

      const database = await withTimeout(
        options.checkDatabase(),
        HEALTH_CHECK_TIMEOUT,
        { healthy: false, error: "Health check timeout" },
      );

      // Degradation is reported in the body; load balancers only look for 200
      reply.code(200);

      return {
        status: database.healthy ? "ok" : "degraded",
        timestamp: new Date().toISOString(),
        services: { database },
        version: process.env.npm_package_version || "1.0.0",
      };
    },
  );
}
