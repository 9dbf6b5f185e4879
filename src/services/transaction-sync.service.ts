/**
 * Transaction Sync Service
 *
 * Accepts a batch of sales recorded offline at a station. The batch is one
 * storage transaction; each item's outcome is reported on its own:
 *
 * - replayed sync key      → success, duplicate, original server id
 * - roster account missing → success, billed from the station's hints
 * - cash account missing   → that item fails with CASH_ACCOUNT_NOT_CONFIGURED,
 *                            the batch still commits and carries a warning
 * - anything unexpected    → thrown; the whole batch rolls back
 *
 * @module services/transaction-sync.service
 */

import type { SyncConfig } from "../config/sync.config";
import type {
  BillingIdentity,
  NewSaleRecord,
  SyncBatchResponse,
  SyncContext,
  TransactionSyncItem,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import { accountTokenOf } from "../utils/account-ref";
import { sessionIdFromSyncKey } from "../utils/sync-key";
import {
  approvalFor,
  cashBillingIdentity,
  classifySale,
  resolveBillingIdentity,
} from "./billing-identity";
import {
  CashAccountNotConfiguredError,
  CashCustomerResolver,
} from "./cash-customer.service";
import { buildBatchResponse, SyncResultCollector } from "./sync-results";
import { SyncLedger } from "./sync-ledger";

export type TransactionSyncConfig = Pick<
  SyncConfig,
  "cashAccountLegacyId" | "cashFamilyIdFloor" | "cashCodePrefix"
>;

export class TransactionSyncService {
  constructor(
    private readonly store: PosStore,
    private readonly config: TransactionSyncConfig,
  ) {}

  async submitBatch(
    items: readonly TransactionSyncItem[],
    context: SyncContext,
  ): Promise<SyncBatchResponse> {
    return this.store.transaction(async (tx) => {
      const ledger = new SyncLedger(tx, "transaction");
      const cash = new CashCustomerResolver(tx, this.config);
      const results = new SyncResultCollector();

      for (const item of items) {
        const existingId = await ledger.lookup(item.syncKey);
        if (existingId !== undefined) {
          results.duplicate(item, existingId);
          continue;
        }

        let identity: BillingIdentity;
        try {
          identity = await this.resolveIdentity(tx, cash, item);
        } catch (error) {
          if (error instanceof CashAccountNotConfiguredError) {
            results.cashFailure(item, error);
            continue;
          }
          throw error;
        }

        const row = await this.buildRecord(tx, item, identity, context);
        const outcome = await ledger.record(item.syncKey, () =>
          tx.insertSaleRecord(row),
        );
        results.fromOutcome(item, outcome);
      }

      const response = buildBatchResponse(results);
      if (response.cashTransactionsFailed) {
        console.warn("[TransactionSync] Cash sales rejected in batch", {
          sessionId: context.session.id,
          failed: results.cashFailureCount,
          total: items.length,
        });
      }
      return response;
    });
  }

  private async resolveIdentity(
    tx: PosStore,
    cash: CashCustomerResolver,
    item: TransactionSyncItem,
  ): Promise<BillingIdentity> {
    const account = item.account;
    switch (account.kind) {
      case "cash": {
        const placeholder = await cash.resolveCashAccount();
        const familyId = await cash.nextSyntheticFamilyId(
          item.lineDate,
          item.mealType,
        );
        return cashBillingIdentity(placeholder, familyId);
      }
      case "real": {
        const lookup = await tx.findAccount(account.accountId);
        if (!lookup) {
          console.warn(
            "[TransactionSync] Account not on roster, using station hints",
            { accountId: account.accountId, syncKey: item.syncKey },
          );
        }
        return resolveBillingIdentity(lookup, {
          accountId: account.accountId,
          familyId: item.familyId,
          schoolCode: item.schoolCode,
        });
      }
    }
  }

  private async buildRecord(
    tx: PosStore,
    item: TransactionSyncItem,
    identity: BillingIdentity,
    context: SyncContext,
  ): Promise<NewSaleRecord> {
    const isCash = item.account.kind === "cash";
    const needsCatalog =
      item.itemType === null || (item.transactionCode === null && !isCash);
    const catalogItem = needsCatalog
      ? await tx.findMenuItem(item.itemId)
      : undefined;

    const { itemType, transactionCode } = classifySale({
      clientItemType: item.itemType,
      clientTransactionCode: item.transactionCode,
      catalogItemType: catalogItem?.itemType?.trim() || null,
      isCash,
    });

    return {
      syncKey: item.syncKey,
      userId: item.userId ?? context.session.userId,
      accountId: identity.accountId,
      familyId: identity.familyId,
      schoolId: identity.schoolId,
      itemId: item.itemId,
      itemType,
      transactionCode,
      ...approvalFor(identity, itemType),
      price: item.price,
      lineType: item.mealType,
      lineNum: item.lineNum,
      lineDate: item.lineDate,
      accountToken: accountTokenOf(item.account),
      stationSessionId: sessionIdFromSyncKey(item.syncKey),
      transactedAt: item.timestampUTC ?? context.now,
    };
  }
}
