/**
 * POS Line Log & Session Routes
 *
 * Routes (registered under /api/pos):
 * POST /lines/:mealType/:lineNum/open      - Open today's log, bind session
 * GET  /line-logs/:lineLogId/sync-info     - Bound session counts per status
 * POST /line-logs/:lineLogId/close         - Close once other sessions finished
 * POST /sessions/:sessionId/sync-status    - Report flush progress
 *
 * @module routes/pos-lines
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { SyncErrorCode } from "../constants/sync";
import {
  createStationSessionMiddleware,
  requireStationSession,
} from "../middleware/station-session.middleware";
import {
  closeLineBodySchema,
  lineLogParamsSchema,
  lineParamsSchema,
  openLineBodySchema,
  sessionParamsSchema,
  sessionSyncStatusSchema,
} from "../schemas/pos-sync.schema";
import type { LineLog } from "../types/pos-sync.types";
import { handleKnownError, sendValidationError } from "../utils/api-response";
import type { PosRouteOptions } from "./pos-sync";

function serializeLineLog(lineLog: LineLog) {
  return {
    id: lineLog.id,
    mealType: lineLog.mealType,
    lineNum: lineLog.lineNum,
    lineDate: lineLog.lineDate,
    openedAt: lineLog.openedAt?.toISOString() ?? null,
    openedBy: lineLog.openedBy,
    closedAt: lineLog.closedAt?.toISOString() ?? null,
    closedBy: lineLog.closedBy,
    startCash: lineLog.startCash,
    endCash: lineLog.endCash,
  };
}

function sendInternalError(reply: FastifyReply, message: string) {
  return reply.code(500).send({
    success: false,
    error: { code: SyncErrorCode.INTERNAL_ERROR, message },
  });
}

export async function posLineRoutes(
  fastify: FastifyInstance,
  options: PosRouteOptions,
) {
  const { services } = options;
  const stationSessionMiddleware = createStationSessionMiddleware(
    services.sessions,
  );

  /**
   * POST /lines/:mealType/:lineNum/open
   */
  fastify.post(
    "/lines/:mealType/:lineNum/open",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const paramsResult = lineParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return sendValidationError(
          reply,
          paramsResult.error,
          "Invalid path parameters",
        );
      }
      const bodyResult = openLineBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        return sendValidationError(reply, bodyResult.error);
      }

      try {
        const result = await services.lineLogs.openLine({
          session,
          ...paramsResult.data,
          lineDate: bodyResult.data.lineDate,
          startCash: bodyResult.data.startCash,
        });
        return reply.code(200).send({
          success: true,
          data: {
            lineLog: serializeLineLog(result.lineLog),
            status: result.status,
            alreadyOpen: result.alreadyOpen,
          },
        });
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosLines] Open line error:", error);
        return sendInternalError(reply, "Failed to open line");
      }
    },
  );

  /**
   * GET /line-logs/:lineLogId/sync-info
   */
  fastify.get(
    "/line-logs/:lineLogId/sync-info",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const paramsResult = lineLogParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return sendValidationError(
          reply,
          paramsResult.error,
          "Invalid path parameters",
        );
      }

      try {
        const info = await services.lineLogs.getSyncInfo(
          paramsResult.data.lineLogId,
        );
        return reply.code(200).send({ success: true, data: info });
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosLines] Sync info error:", error);
        return sendInternalError(reply, "Failed to load line log sync info");
      }
    },
  );

  /**
   * POST /line-logs/:lineLogId/close
   */
  fastify.post(
    "/line-logs/:lineLogId/close",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const paramsResult = lineLogParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return sendValidationError(
          reply,
          paramsResult.error,
          "Invalid path parameters",
        );
      }
      const bodyResult = closeLineBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        return sendValidationError(reply, bodyResult.error);
      }

      try {
        const result = await services.lineLogs.closeLine({
          session,
          lineLogId: paramsResult.data.lineLogId,
          endCash: bodyResult.data.endCash,
        });
        return reply.code(200).send({
          success: true,
          data: {
            lineLog: serializeLineLog(result.lineLog),
            status: result.status,
            sessionFinished: result.sessionFinished,
          },
        });
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosLines] Close line error:", error);
        return sendInternalError(reply, "Failed to close line");
      }
    },
  );

  /**
   * POST /sessions/:sessionId/sync-status
   */
  fastify.post(
    "/sessions/:sessionId/sync-status",
    { preHandler: [stationSessionMiddleware] },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const session = requireStationSession(request);

      const paramsResult = sessionParamsSchema.safeParse(request.params);
      if (!paramsResult.success) {
        return sendValidationError(
          reply,
          paramsResult.error,
          "Invalid path parameters",
        );
      }
      const bodyResult = sessionSyncStatusSchema.safeParse(request.body);
      if (!bodyResult.success) {
        return sendValidationError(reply, bodyResult.error);
      }

      try {
        const updated = await services.sessions.reportSyncStatus(
          session,
          paramsResult.data.sessionId,
          bodyResult.data.status,
        );
        return reply.code(200).send({
          success: true,
          data: {
            sessionId: updated.id,
            status: updated.status,
            closedAt: updated.closedAt?.toISOString() ?? null,
          },
        });
      } catch (error) {
        const handledReply = handleKnownError(error, reply);
        if (handledReply) return handledReply;

        console.error("[PosLines] Session sync status error:", error);
        return sendInternalError(reply, "Failed to update session status");
      }
    },
  );
}
