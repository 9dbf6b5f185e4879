/**
 * POS Sync API Routes
 *
 * Upload and reconciliation endpoints for cafeteria POS stations that record
 * offline and flush their buffers when connectivity returns.
 *
 * Routes (registered under /api/pos):
 * POST /transactions                     - Sales batch
 * POST /payments                         - Cash/check payment batch
 * POST /deletions                        - Void previously synced items
 * POST /sync/validate                    - Compare station buffer with server
 * GET  /accounts/:accountId/activity     - Account's line day across stations
 * POST /logout                           - Revoke the calling session
 *
 * Security Controls:
 * - Bearer station session token on every route
 * - Zod validation of every body, param and query
 * - Line abilities checked for every line a batch touches before any write
 * - Unexpected failures roll the batch back and return a generic message
 *
 * @module routes/pos-sync
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { SyncErrorCode } from "../constants/sync";
import {
  createStationSessionMiddleware,
  requireStationSession,
} from "../middleware/station-session.middleware";
import {
  accountActivityParamsSchema,
  accountActivityQuerySchema,
  createPosSyncSchemas,
  syncValidationSchema,
} from "../schemas/pos-sync.schema";
import type { PosServices } from "../services/pos-services";
import {
  assertLineAbilities,
  type LineRef,
} from "../services/station-session.service";
import { handleKnownError, sendValidationError } from "../utils/api-response";

export interface PosRouteOptions {
  services: PosServices;
}

/**
 * Distinct lines touched by a batch, in first-seen order
 */
export function distinctLines(items: readonly LineRef[]): LineRef[] {
  const seen = new Map<string, LineRef>();
  for (const { mealType, lineNum } of items) {
    const key = `${mealType}${lineNum}`;
    if (!seen.has(key)) {
      seen.set(key, { mealType, lineNum });
    }
  }
  return [...seen.values()];
}

function sendBatchFailure(reply: FastifyReply, message: string): FastifyReply {
  return reply.code(500).send({
    success: false,
    results: [],
    error: { code: SyncErrorCode.SYNC_BATCH_FAILED, message },
  });
}

export async function posSyncRoutes(
  fastify: FastifyInstance,
  options: PosRouteOptions,
) {
  const { services } = options;
  const schemas = createPosSyncSchemas(services.config);
  const stationSessionMiddleware = createStationSessionMiddleware(
    services.sessions,
  );

  /**
   * POST /transactions
   * Sales recorded at the station, in recording order
   */
  fastify.post(
    "/transactions",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const parseResult = schemas.transactionBatch.safeParse(request.body);
      if (!parseResult.success) {
        return sendValidationError(reply, parseResult.error);
      }
      const { transactions } = parseResult.data;

      try {
        assertLineAbilities(session, distinctLines(transactions));

        const response = await services.transactions.submitBatch(
          transactions,
          { session, now: new Date() },
        );
        return reply.code(200).send(response);
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosSync] Transaction batch failed:", error);
        return sendBatchFailure(reply, "Failed to sync transactions");
      }
    },
  );

  /**
   * POST /payments
   * Cash and check payments recorded at the station
   */
  fastify.post(
    "/payments",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const parseResult = schemas.paymentBatch.safeParse(request.body);
      if (!parseResult.success) {
        return sendValidationError(reply, parseResult.error);
      }
      const { payments } = parseResult.data;

      try {
        assertLineAbilities(session, distinctLines(payments));

        const response = await services.payments.submitBatch(payments, {
          session,
          now: new Date(),
        });
        return reply.code(200).send(response);
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosSync] Payment batch failed:", error);
        return sendBatchFailure(reply, "Failed to sync payments");
      }
    },
  );

  /**
   * POST /deletions
   * Voids; the line of each original is checked by the service
   */
  fastify.post(
    "/deletions",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const parseResult = schemas.deletionBatch.safeParse(request.body);
      if (!parseResult.success) {
        return sendValidationError(reply, parseResult.error);
      }

      try {
        const response = await services.deletions.submitDeletions(
          parseResult.data.deletions,
          { session, now: new Date() },
        );
        return reply.code(200).send(response);
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosSync] Deletion batch failed:", error);
        return sendBatchFailure(reply, "Failed to sync deletions");
      }
    },
  );

  /**
   * POST /sync/validate
   */
  fastify.post(
    "/sync/validate",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parseResult = syncValidationSchema.safeParse(request.body);
      if (!parseResult.success) {
        return sendValidationError(reply, parseResult.error);
      }

      try {
        const response = await services.validation.validate(parseResult.data);
        return reply.code(200).send(response);
      } catch (error) {
        console.error("[PosSync] Sync validation failed:", error);
        return reply.code(500).send({
          success: false,
          error: {
            code: SyncErrorCode.INTERNAL_ERROR,
            message: "Failed to validate sync state",
          },
        });
      }
    },
  );

  /**
   * GET /accounts/:accountId/activity?lineDate=YYYY-MM-DD&mealType=L
   */
  fastify.get(
    "/accounts/:accountId/activity",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const paramsResult = accountActivityParamsSchema.safeParse(
        request.params,
      );
      if (!paramsResult.success) {
        return sendValidationError(
          reply,
          paramsResult.error,
          "Invalid path parameters",
        );
      }
      const queryResult = accountActivityQuerySchema.safeParse(request.query);
      if (!queryResult.success) {
        return sendValidationError(
          reply,
          queryResult.error,
          "Invalid query parameters",
        );
      }

      try {
        const activity = await services.activity.getActivity(
          { accountId: paramsResult.data.accountId, ...queryResult.data },
          session,
        );
        return reply.code(200).send({ success: true, data: activity });
      } catch (error) {
        console.error("[PosSync] Account activity error:", error);
        return reply.code(500).send({
          success: false,
          error: {
            code: SyncErrorCode.INTERNAL_ERROR,
            message: "Failed to load account activity",
          },
        });
      }
    },
  );

  /**
   * POST /logout
   */
  fastify.post(
    "/logout",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      try {
        const revoked = await services.sessions.revoke(session);
        return reply.code(200).send({
          success: true,
          data: { sessionId: revoked.id, status: revoked.status },
        });
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosSync] Logout error:", error);
        return reply.code(500).send({
          success: false,
          error: {
            code: SyncErrorCode.INTERNAL_ERROR,
            message: "Failed to log out",
          },
        });
      }
    },
  );
}
