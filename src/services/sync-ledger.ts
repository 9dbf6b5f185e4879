/**
 * Idempotency Ledger
 *
 * At-most-once acceptance of sync items keyed by the station-generated sync
 * key. A replayed key is never an error: it resolves to the id persisted the
 * first time.
 *
 * @module services/sync-ledger
 */

import type { LedgerKind, PosStore } from "../types/store.types";

export type LedgerOutcome =
  | { status: "created"; id: number }
  | { status: "duplicate"; id: number };

export class SyncLedger {
  constructor(
    private readonly store: PosStore,
    private readonly kind: LedgerKind,
  ) {}

  /**
   * Id already persisted under this key, if any
   */
  lookup(syncKey: string): Promise<number | undefined> {
    return this.store.findSyncedId(this.kind, syncKey);
  }

  /**
   * Runs the insert for a key the caller has already looked up. `insert`
   * resolves to undefined when the unique constraint rejected the row, which
   * means a concurrent request persisted the same key first.
   */
  async record(
    syncKey: string,
    insert: () => Promise<number | undefined>,
  ): Promise<LedgerOutcome> {
    const id = await insert();
    if (id !== undefined) {
      return { status: "created", id };
    }

    const winner = await this.lookup(syncKey);
    if (winner === undefined) {
      throw new Error(
        `Sync key "${syncKey}" was rejected as a duplicate ${this.kind} but no row holds it`,
      );
    }
    return { status: "duplicate", id: winner };
  }

  async accept(
    syncKey: string,
    insert: () => Promise<number | undefined>,
  ): Promise<LedgerOutcome> {
    const existing = await this.lookup(syncKey);
    if (existing !== undefined) {
      return { status: "duplicate", id: existing };
    }
    return this.record(syncKey, insert);
  }
}
