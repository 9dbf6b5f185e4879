/**
 * Station Session Service
 *
 * A session binds one station, one user and (once a line is opened) one line
 * log to a bearer token and a set of line abilities (`line:L10`, `line:*`).
 *
 * Security Model:
 * - The plain token is returned once, at creation; only its SHA-256 hash is
 *   stored
 * - A token authenticates only while the session is `active` and not closed
 * - Logging in again abandons every other active session of the user
 * - Sessions idle longer than the configured timeout are abandoned on lookup
 *
 * @module services/station-session.service
 */

import crypto from "crypto";
import { addMinutes, isAfter } from "date-fns";
import type { SyncConfig } from "../config/sync.config";
import {
  LINE_ABILITY_PREFIX,
  SyncErrorCode,
  WILDCARD_ABILITY_SUFFIX,
} from "../constants/sync";
import type {
  SessionStatus,
  Station,
  StationContact,
  StationSession,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import {
  assertSessionTransition,
  SessionStateError,
} from "./session-state-machine";
import { StationService } from "./station.service";

const SESSION_CONFIG = {
  /** Session token length in bytes (32 bytes = 256 bits) */
  TOKEN_LENGTH: 32,
};

// ============================================================================
// Tokens
// ============================================================================

export function generateSessionToken(): string {
  return crypto.randomBytes(SESSION_CONFIG.TOKEN_LENGTH).toString("hex");
}

export function hashSessionToken(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

// ============================================================================
// Abilities
// ============================================================================

export interface LineRef {
  mealType: string;
  lineNum: number;
}

export function lineCode(line: LineRef): string {
  return `${line.mealType}${line.lineNum}`;
}

/**
 * Exact match, or a wildcard ability ("line:*") whose prefix matches
 */
export function hasAbility(
  abilities: readonly string[],
  ability: string,
): boolean {
  if (abilities.includes(ability)) {
    return true;
  }

  return abilities.some(
    (granted) =>
      granted.endsWith(WILDCARD_ABILITY_SUFFIX) &&
      ability.startsWith(granted.slice(0, -1)),
  );
}

export function canActOnLine(
  session: Pick<StationSession, "abilities">,
  line: LineRef,
): boolean {
  return hasAbility(session.abilities, LINE_ABILITY_PREFIX + lineCode(line));
}

export class LinePermissionError extends Error {
  readonly code = SyncErrorCode.LINE_NOT_PERMITTED;

  constructor(readonly details: { lines: string[] }) {
    super(
      `Session is not permitted to act on line${details.lines.length === 1 ? "" : "s"} ${details.lines.join(", ")}`,
    );
    this.name = "LinePermissionError";
  }
}

/**
 * @throws LinePermissionError naming every denied line
 */
export function assertLineAbilities(
  session: Pick<StationSession, "abilities">,
  lines: readonly LineRef[],
): void {
  const denied = new Set<string>();
  for (const line of lines) {
    if (!canActOnLine(session, line)) {
      denied.add(lineCode(line));
    }
  }

  if (denied.size > 0) {
    throw new LinePermissionError({ lines: [...denied] });
  }
}

// ============================================================================
// Errors
// ============================================================================

export class SessionAccessError extends Error {
  constructor(
    readonly code:
      | typeof SyncErrorCode.SESSION_NOT_FOUND
      | typeof SyncErrorCode.STATION_MISMATCH,
    message: string,
  ) {
    super(message);
    this.name = "SessionAccessError";
  }
}

// ============================================================================
// Service
// ============================================================================

export interface CreateSessionInput {
  station: StationContact;
  userId: number;
  username?: string | null;
  abilities: string[];
  lineLogId?: number | null;
}

export interface CreatedSession {
  session: StationSession;
  station: Station;
  /** Plain token; not recoverable after this call */
  token: string;
  revokedSessions: number;
}

export type ReportableSyncStatus = Extract<SessionStatus, "syncing" | "synced">;

export class StationSessionService {
  constructor(
    private readonly store: PosStore,
    private readonly config: Pick<SyncConfig, "sessionIdleTimeoutMinutes">,
  ) {}

  async createSession(
    input: CreateSessionInput,
    now: Date = new Date(),
  ): Promise<CreatedSession> {
    return this.store.transaction(async (tx) => {
      const station = await new StationService(tx).registerStation(
        input.station,
        now,
      );

      const revokedSessions = await tx.abandonActiveSessionsForUser(
        input.userId,
        now,
      );

      const token = generateSessionToken();
      const session = await tx.createSession({
        stationId: station.id,
        userId: input.userId,
        username: input.username ?? null,
        lineLogId: input.lineLogId ?? null,
        tokenHash: hashSessionToken(token),
        abilities: [...input.abilities],
        status: "active",
        openedAt: now,
        lastActivityAt: now,
        closedAt: null,
      });

      return { session, station, token, revokedSessions };
    });
  }

  /**
   * Session behind a bearer token, or undefined for unknown, closed,
   * non-active and idle-expired tokens. A hit refreshes last activity.
   */
  async resolve(
    token: string,
    now: Date = new Date(),
  ): Promise<StationSession | undefined> {
    if (!token) {
      return undefined;
    }

    const session = await this.store.findSessionByTokenHash(
      hashSessionToken(token),
    );
    if (!session || session.status !== "active" || session.closedAt) {
      return undefined;
    }

    const idleDeadline = addMinutes(
      session.lastActivityAt,
      this.config.sessionIdleTimeoutMinutes,
    );
    if (isAfter(now, idleDeadline)) {
      await this.store.updateSession(session.id, {
        status: "abandoned",
        closedAt: now,
      });
      console.warn("[StationSession] Session expired after inactivity", {
        sessionId: session.id,
        stationId: session.stationId,
        userId: session.userId,
        lastActivityAt: session.lastActivityAt.toISOString(),
      });
      return undefined;
    }

    const touched = await this.store.updateSession(session.id, {
      lastActivityAt: now,
    });
    return touched ?? session;
  }

  /**
   * Logout
   */
  async revoke(
    session: StationSession,
    now: Date = new Date(),
  ): Promise<StationSession> {
    assertSessionTransition(session.id, session.status, "abandoned");
    const updated = await this.store.updateSession(session.id, {
      status: "abandoned",
      closedAt: now,
    });
    return updated ?? { ...session, status: "abandoned", closedAt: now };
  }

  /**
   * A station reports flush progress for one of its earlier sessions.
   * The calling session cannot target itself: once it left `active` its own
   * token would stop resolving halfway through the flush.
   */
  async reportSyncStatus(
    caller: StationSession,
    targetSessionId: number,
    status: ReportableSyncStatus,
    now: Date = new Date(),
  ): Promise<StationSession> {
    const target = await this.store.findSession(targetSessionId);
    if (!target) {
      throw new SessionAccessError(
        SyncErrorCode.SESSION_NOT_FOUND,
        `Session ${targetSessionId} not found`,
      );
    }

    if (target.stationId !== caller.stationId) {
      throw new SessionAccessError(
        SyncErrorCode.STATION_MISMATCH,
        "Session belongs to a different station",
      );
    }

    if (target.id === caller.id) {
      throw new SessionStateError(
        "A session cannot report its own sync status; close the line or log out instead",
        { sessionId: target.id, from: target.status, to: status },
      );
    }

    if (target.status === status) {
      return target;
    }

    assertSessionTransition(target.id, target.status, status);
    const updated = await this.store.updateSession(target.id, {
      status,
      ...(status === "synced" && !target.closedAt ? { closedAt: now } : {}),
    });
    return updated ?? target;
  }
}
