/**
 * Error envelopes shared by the POS route plugins.
 *
 * @module utils/api-response
 */

import type { FastifyReply } from "fastify";
import type { z } from "zod";
import { SyncErrorCode } from "../constants/sync";
import { LineLogStateError } from "../services/line-log-state-machine";
import { SessionStateError } from "../services/session-state-machine";
import {
  LinePermissionError,
  SessionAccessError,
} from "../services/station-session.service";

/**
 * Format Zod validation errors for API response
 */
export function formatZodError(
  error: z.ZodError,
): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

export function sendValidationError(
  reply: FastifyReply,
  error: z.ZodError,
  message = "Invalid request body",
): FastifyReply {
  return reply.code(400).send({
    success: false,
    error: {
      code: SyncErrorCode.VALIDATION_ERROR,
      message,
      details: formatZodError(error),
    },
  });
}

/**
 * Handle known domain errors with appropriate HTTP status
 */
export function handleKnownError(
  error: unknown,
  reply: FastifyReply,
): FastifyReply | null {
  if (error instanceof LinePermissionError) {
    return reply.code(403).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
  }

  if (error instanceof LineLogStateError) {
    const status =
      error.code === SyncErrorCode.LINE_LOG_NOT_FOUND ? 404 : 409;
    return reply.code(status).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {}),
      },
    });
  }

  if (error instanceof SessionStateError) {
    return reply.code(409).send({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    });
  }

  if (error instanceof SessionAccessError) {
    const status = error.code === SyncErrorCode.SESSION_NOT_FOUND ? 404 : 403;
    return reply.code(status).send({
      success: false,
      error: { code: error.code, message: error.message },
    });
  }

  return null;
}
