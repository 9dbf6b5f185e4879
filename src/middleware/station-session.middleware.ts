/**
 * Station Session Authentication Middleware
 *
 * Authenticates POS station requests by the bearer token issued when the
 * station session was created.
 *
 * Security Features:
 * - Only the SHA-256 hash of the token is looked up
 * - Missing and invalid tokens get the same 401 body
 * - Abandoned, synced and idle-expired sessions do not authenticate
 *
 * @module middleware/station-session.middleware
 */

import type { FastifyReply, FastifyRequest } from "fastify";
import { SyncErrorCode } from "../constants/sync";
import type { StationSessionService } from "../services/station-session.service";
import type { StationSession } from "../types/pos-sync.types";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the station session middleware */
    stationSession: StationSession | null;
  }
}

/**
 * Token from `Authorization: Bearer <token>`
 */
export function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers["authorization"];
  if (!authHeader || typeof authHeader !== "string") {
    return null;
  }

  const match = /^Bearer\s+(\S+)\s*$/i.exec(authHeader);
  return match ? match[1] : null;
}

/**
 * Extract client IP address from request
 */
function extractClientIp(request: FastifyRequest): string {
  const forwarded = request.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(",")[0].trim();
  }
  return request.ip || "unknown";
}

export function createStationSessionMiddleware(
  sessions: StationSessionService,
) {
  return async function stationSessionMiddleware(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    const token = extractBearerToken(request);
    const session = token ? await sessions.resolve(token) : undefined;

    if (!session) {
      if (token) {
        console.warn("[StationSessionMiddleware] Authentication failed:", {
          ip: extractClientIp(request),
          path: request.url,
          timestamp: new Date().toISOString(),
        });
      }
      return reply.code(401).send({
        success: false,
        error: {
          code: SyncErrorCode.UNAUTHORIZED,
          message: "A valid station session token is required",
        },
      });
    }

    request.stationSession = session;
  };
}

/**
 * Session attached by the middleware
 *
 * @throws Error when the route was registered without the middleware
 */
export function requireStationSession(request: FastifyRequest): StationSession {
  if (!request.stationSession) {
    throw new Error("Station session not found on request");
  }
  return request.stationSession;
}
