/**
 * Line Log Service
 *
 * One line log per (meal type, line number, business date), created the
 * first time a station opens that line for the day. Stations bind their
 * session to the log when they open it; the log can close once no other
 * bound session is still active or flushing.
 *
 * @module services/line-log.service
 */

import type { SyncConfig } from "../config/sync.config";
import { SyncErrorCode } from "../constants/sync";
import type {
  CashTillSnapshot,
  LineLog,
  LineLogKey,
  LineLogStatus,
  LineLogSyncInfo,
  SessionStatus,
  StationSession,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import { getBusinessDate } from "../utils/timezone.utils";
import {
  assertLineLogTransition,
  deriveLineLogStatus,
  LineLogStateError,
} from "./line-log-state-machine";
import {
  assertSessionTransition,
  isSessionInFlight,
} from "./session-state-machine";
import { assertLineAbilities } from "./station-session.service";

export interface OpenLineInput {
  session: StationSession;
  mealType: string;
  lineNum: number;
  lineDate?: string;
  startCash?: CashTillSnapshot | null;
}

export interface OpenLineResult {
  lineLog: LineLog;
  status: LineLogStatus;
  alreadyOpen: boolean;
}

export interface CloseLineInput {
  session: StationSession;
  lineLogId: number;
  endCash?: CashTillSnapshot | null;
}

export interface CloseLineResult {
  lineLog: LineLog;
  status: LineLogStatus;
  sessionFinished: boolean;
}

async function findOrCreateLineLog(
  store: PosStore,
  key: LineLogKey,
): Promise<LineLog> {
  return (await store.findLineLog(key)) ?? store.createLineLog(key);
}

function emptySessionCounts(): Record<SessionStatus, number> {
  return { active: 0, syncing: 0, synced: 0, abandoned: 0 };
}

export class LineLogService {
  constructor(
    private readonly store: PosStore,
    private readonly config: Pick<SyncConfig, "businessTimezone">,
  ) {}

  businessDate(now: Date = new Date()): string {
    return getBusinessDate(now, this.config.businessTimezone);
  }

  findOrCreateForDay(key: LineLogKey): Promise<LineLog> {
    return findOrCreateLineLog(this.store, key);
  }

  async requireLineLog(lineLogId: number): Promise<LineLog> {
    const lineLog = await this.store.findLineLogById(lineLogId);
    if (!lineLog) {
      throw new LineLogStateError(
        SyncErrorCode.LINE_LOG_NOT_FOUND,
        `Line log ${lineLogId} not found`,
        { lineLogId },
      );
    }
    return lineLog;
  }

  /**
   * Opens today's log for the line (no-op when already open) and binds the
   * calling session to it.
   *
   * @throws LinePermissionError, LineLogStateError (LINE_LOG_CLOSED)
   */
  async openLine(
    input: OpenLineInput,
    now: Date = new Date(),
  ): Promise<OpenLineResult> {
    const line = { mealType: input.mealType, lineNum: input.lineNum };
    assertLineAbilities(input.session, [line]);

    return this.store.transaction(async (tx) => {
      const key = { ...line, lineDate: input.lineDate ?? this.businessDate(now) };
      const lineLog = await findOrCreateLineLog(tx, key);
      const status = deriveLineLogStatus(lineLog);

      let opened = lineLog;
      if (status !== "open") {
        assertLineLogTransition(lineLog.id, status, "open");
        opened =
          (await tx.updateLineLog(lineLog.id, {
            openedAt: now,
            openedBy: input.session.userId,
            startCash: input.startCash ?? null,
          })) ?? lineLog;
      }

      await tx.updateSession(input.session.id, { lineLogId: lineLog.id });

      return {
        lineLog: opened,
        status: deriveLineLogStatus(opened),
        alreadyOpen: status === "open",
      };
    });
  }

  async getSyncInfo(lineLogId: number): Promise<LineLogSyncInfo> {
    const lineLog = await this.requireLineLog(lineLogId);
    const counts = await this.store.countSessionsByStatus(lineLogId);
    const sessions = { ...emptySessionCounts(), ...counts };
    const status = deriveLineLogStatus(lineLog);

    return {
      lineLogId,
      status,
      sessions,
      readyToClose:
        status === "open" && sessions.active + sessions.syncing === 0,
    };
  }

  /**
   * Closes the log once every other bound session has finished. The closing
   * session is finished too when it is bound to this log.
   *
   * @throws LinePermissionError, LineLogStateError
   */
  async closeLine(
    input: CloseLineInput,
    now: Date = new Date(),
  ): Promise<CloseLineResult> {
    return this.store.transaction(async (tx) => {
      const lineLog = await tx.findLineLogById(input.lineLogId);
      if (!lineLog) {
        throw new LineLogStateError(
          SyncErrorCode.LINE_LOG_NOT_FOUND,
          `Line log ${input.lineLogId} not found`,
          { lineLogId: input.lineLogId },
        );
      }

      assertLineAbilities(input.session, [lineLog]);
      assertLineLogTransition(
        lineLog.id,
        deriveLineLogStatus(lineLog),
        "closed",
      );

      const bound = await tx.listSessionsForLineLog(lineLog.id);
      const blocking = bound.filter(
        (s) => s.id !== input.session.id && isSessionInFlight(s.status),
      );
      if (blocking.length > 0) {
        throw new LineLogStateError(
          SyncErrorCode.LINE_LOG_NOT_READY,
          `Line log ${lineLog.id} still has ${blocking.length} station session(s) recording or syncing`,
          {
            lineLogId: lineLog.id,
            blockingSessionIds: blocking.map((s) => s.id),
          },
        );
      }

      const closed =
        (await tx.updateLineLog(lineLog.id, {
          closedAt: now,
          closedBy: input.session.userId,
          endCash: input.endCash ?? null,
        })) ?? lineLog;

      const sessionFinished = input.session.lineLogId === lineLog.id;
      if (sessionFinished) {
        assertSessionTransition(input.session.id, input.session.status, "synced");
        await tx.updateSession(input.session.id, {
          status: "synced",
          closedAt: now,
        });
      }

      return {
        lineLog: closed,
        status: deriveLineLogStatus(closed),
        sessionFinished,
      };
    });
  }
}
