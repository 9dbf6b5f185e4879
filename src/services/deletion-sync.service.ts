/**
 * Deletion Sync Service
 *
 * A station voids a sale or payment by uploading a deletion that names the
 * original sync key. The original row is copied into the audit log and
 * removed in the same transaction. Deleting something the server never saw
 * (or already removed) is a successful no-op.
 *
 * @module services/deletion-sync.service
 */

import type {
  AuditSnapshot,
  DeletionSyncItem,
  NewDeletionRecord,
  PaymentRecord,
  SaleRecord,
  SyncBatchResponse,
  SyncContext,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import { buildBatchResponse, SyncResultCollector } from "./sync-results";
import { SyncLedger } from "./sync-ledger";
import { assertLineAbilities } from "./station-session.service";

type DeletionTarget =
  | { table: "transactions"; record: SaleRecord }
  | { table: "payments"; record: PaymentRecord };

/**
 * Every business field of the original, JSON-safe
 */
export function toAuditSnapshot(
  record: SaleRecord | PaymentRecord,
): AuditSnapshot {
  const snapshot: AuditSnapshot = {};
  for (const [field, value] of Object.entries(record)) {
    if (value instanceof Date) {
      snapshot[field] = value.toISOString();
    } else if (
      value === null ||
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      snapshot[field] = value;
    }
  }
  return snapshot;
}

function auditRow(
  item: DeletionSyncItem,
  target: DeletionTarget,
  context: SyncContext,
): NewDeletionRecord {
  const { record } = target;
  return {
    syncKey: item.syncKey,
    originalSyncKey: item.originalSyncKey,
    sourceTable: target.table,
    originalId: record.id,
    accountId: record.accountId,
    familyId: record.familyId,
    lineType: record.lineType,
    lineNum: record.lineNum,
    lineDate: record.lineDate,
    amount:
      target.table === "transactions"
        ? target.record.price
        : target.record.amount,
    deletedBy: context.session.userId,
    deletedAt: context.now,
    snapshot: toAuditSnapshot(record),
  };
}

export class DeletionSyncService {
  constructor(private readonly store: PosStore) {}

  /**
   * @throws LinePermissionError when an original belongs to a line the
   *   session may not act on; nothing in the batch is kept
   */
  async submitDeletions(
    items: readonly DeletionSyncItem[],
    context: SyncContext,
  ): Promise<SyncBatchResponse> {
    return this.store.transaction(async (tx) => {
      const ledger = new SyncLedger(tx, "deletion");
      const results = new SyncResultCollector();

      for (const item of items) {
        const existingId = await ledger.lookup(item.syncKey);
        if (existingId !== undefined) {
          results.duplicate(item, existingId);
          continue;
        }

        const target = await this.findOriginal(tx, item);
        if (!target) {
          results.notFound(item);
          continue;
        }

        assertLineAbilities(context.session, [
          { mealType: target.record.lineType, lineNum: target.record.lineNum },
        ]);

        const outcome = await ledger.record(item.syncKey, () =>
          tx.insertDeletionRecord(auditRow(item, target, context)),
        );

        if (outcome.status === "created") {
          if (target.table === "transactions") {
            await tx.deleteSaleRecord(target.record.id);
          } else {
            await tx.deletePaymentRecord(target.record.id);
          }
        }

        results.fromOutcome(item, outcome);
      }

      return buildBatchResponse(results);
    });
  }

  private async findOriginal(
    tx: PosStore,
    item: DeletionSyncItem,
  ): Promise<DeletionTarget | undefined> {
    if (item.tableName === "transactions") {
      const record = await tx.findSaleRecord(item.originalSyncKey);
      return record ? { table: "transactions", record } : undefined;
    }

    const record = await tx.findPaymentRecord(item.originalSyncKey);
    return record ? { table: "payments", record } : undefined;
  }
}
