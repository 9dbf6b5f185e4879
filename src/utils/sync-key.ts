/**
 * Sync key codec.
 *
 * Stations build every sync key as `{lineLogId}-{sessionId}-{localId}` so a
 * retried upload is recognized without negotiating ids with the server.
 * Provenance (which station session recorded an item) is read only through
 * parseSyncKey.
 *
 * @module utils/sync-key
 */

export interface SyncKeyParts {
  lineLogId: number;
  sessionId: number;
  localId: number;
}

const SYNC_KEY_PATTERN = /^(\d+)-(\d+)-(\d+)$/;

export function formatSyncKey(parts: SyncKeyParts): string {
  return `${parts.lineLogId}-${parts.sessionId}-${parts.localId}`;
}

/**
 * Returns null for keys that do not follow the station convention. Such keys
 * are still valid for idempotency; they just carry no provenance.
 */
export function parseSyncKey(syncKey: string): SyncKeyParts | null {
  const match = SYNC_KEY_PATTERN.exec(syncKey.trim());
  if (!match) {
    return null;
  }

  const [, lineLogId, sessionId, localId] = match;
  const parts = {
    lineLogId: Number(lineLogId),
    sessionId: Number(sessionId),
    localId: Number(localId),
  };

  if (!Object.values(parts).every(Number.isSafeInteger)) {
    return null;
  }

  return parts;
}

export function sessionIdFromSyncKey(syncKey: string): number | null {
  return parseSyncKey(syncKey)?.sessionId ?? null;
}
