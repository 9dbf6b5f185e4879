/**
 * Line Log State Machine
 *
 * ```
 *   not_opened ──open()──► open ──close()──► closed (terminal)
 * ```
 *
 * Status is derived from the open/close timestamps rather than stored, so a
 * closed log can never be reopened by a stray write to a status column.
 *
 * @module services/line-log-state-machine
 */

import { SyncErrorCode } from "../constants/sync";
import type { LineLog, LineLogStatus } from "../types/pos-sync.types";

export const VALID_LINE_LOG_TRANSITIONS: Record<
  LineLogStatus,
  readonly LineLogStatus[]
> = {
  not_opened: ["open"],
  open: ["closed"],
  closed: [],
};

export type LineLogErrorCode =
  | typeof SyncErrorCode.LINE_LOG_NOT_FOUND
  | typeof SyncErrorCode.LINE_LOG_CLOSED
  | typeof SyncErrorCode.LINE_LOG_NOT_OPEN
  | typeof SyncErrorCode.LINE_LOG_NOT_READY;

export class LineLogStateError extends Error {
  constructor(
    readonly code: LineLogErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LineLogStateError";
  }
}

export function deriveLineLogStatus(
  log: Pick<LineLog, "openedAt" | "closedAt"> | undefined,
): LineLogStatus {
  if (log?.closedAt) {
    return "closed";
  }
  return log?.openedAt ? "open" : "not_opened";
}

/**
 * @throws LineLogStateError with the code the API reports for `from`
 */
export function assertLineLogTransition(
  lineLogId: number,
  from: LineLogStatus,
  to: LineLogStatus,
): void {
  if (VALID_LINE_LOG_TRANSITIONS[from].includes(to)) {
    return;
  }

  const code =
    from === "closed"
      ? SyncErrorCode.LINE_LOG_CLOSED
      : SyncErrorCode.LINE_LOG_NOT_OPEN;

  throw new LineLogStateError(
    code,
    from === "closed"
      ? `Line log ${lineLogId} is closed`
      : `Line log ${lineLogId} cannot move from ${from} to ${to}`,
    { lineLogId, from, to },
  );
}
