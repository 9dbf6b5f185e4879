/**
 * Station Session State Machine
 *
 * ```
 *   active ──► syncing ──► synced (terminal)
 *     │  ╲        │          ▲
 *     │   ╲───────┼──────────┘
 *     ▼           ▼
 *   abandoned ─► syncing | synced
 * ```
 *
 * Only `active` sessions authenticate. A station that logged in again (which
 * abandons its previous session) still reports the old session's flush
 * progress, hence `abandoned → syncing`.
 *
 * @module services/session-state-machine
 */

import { SyncErrorCode } from "../constants/sync";
import type { SessionStatus } from "../types/pos-sync.types";

export const VALID_SESSION_TRANSITIONS: Record<
  SessionStatus,
  readonly SessionStatus[]
> = {
  active: ["syncing", "synced", "abandoned"],
  syncing: ["synced", "abandoned"],
  abandoned: ["syncing", "synced"],
  synced: [],
};

export class SessionStateError extends Error {
  readonly code = SyncErrorCode.INVALID_SESSION_TRANSITION;

  constructor(
    message: string,
    readonly details: {
      sessionId: number;
      from: SessionStatus;
      to: SessionStatus;
    },
  ) {
    super(message);
    this.name = "SessionStateError";
  }
}

export function canTransitionSession(
  from: SessionStatus,
  to: SessionStatus,
): boolean {
  return VALID_SESSION_TRANSITIONS[from].includes(to);
}

export function assertSessionTransition(
  sessionId: number,
  from: SessionStatus,
  to: SessionStatus,
): void {
  if (!canTransitionSession(from, to)) {
    const allowed = VALID_SESSION_TRANSITIONS[from];
    throw new SessionStateError(
      `Session ${sessionId} cannot move from ${from} to ${to}` +
        (allowed.length > 0
          ? ` (allowed: ${allowed.join(", ")})`
          : ` (${from} is terminal)`),
      { sessionId, from, to },
    );
  }
}

/**
 * Statuses that keep a line log from closing
 */
export function isSessionInFlight(status: SessionStatus): boolean {
  return status === "active" || status === "syncing";
}
