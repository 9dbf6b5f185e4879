/**
 * Payment Sync Service
 *
 * Mirrors the transaction engine for cash and check payments. A cash payment
 * settles a sale rung up under the same cash code earlier in the day, so it
 * takes that sale's synthetic family id instead of allocating a new one.
 *
 * @module services/payment-sync.service
 */

import type { SyncConfig } from "../config/sync.config";
import type {
  BillingIdentity,
  NewPaymentRecord,
  PaymentSyncItem,
  SyncBatchResponse,
  SyncContext,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import { accountTokenOf } from "../utils/account-ref";
import { encodePaymentMemo } from "../utils/payment-memo";
import { sessionIdFromSyncKey } from "../utils/sync-key";
import {
  cashBillingIdentity,
  resolveBillingIdentity,
} from "./billing-identity";
import {
  CashAccountNotConfiguredError,
  CashCustomerResolver,
} from "./cash-customer.service";
import { buildBatchResponse, SyncResultCollector } from "./sync-results";
import { SyncLedger } from "./sync-ledger";

export type PaymentSyncConfig = Pick<
  SyncConfig,
  "cashAccountLegacyId" | "cashFamilyIdFloor" | "cashCodePrefix"
>;

export class PaymentSyncService {
  constructor(
    private readonly store: PosStore,
    private readonly config: PaymentSyncConfig,
  ) {}

  async submitBatch(
    items: readonly PaymentSyncItem[],
    context: SyncContext,
  ): Promise<SyncBatchResponse> {
    return this.store.transaction(async (tx) => {
      const ledger = new SyncLedger(tx, "payment");
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

        const row = this.buildRecord(item, identity, context);
        const outcome = await ledger.record(item.syncKey, () =>
          tx.insertPaymentRecord(row),
        );
        results.fromOutcome(item, outcome);
      }

      const response = buildBatchResponse(results);
      if (response.cashTransactionsFailed) {
        console.warn("[PaymentSync] Cash payments rejected in batch", {
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
    item: PaymentSyncItem,
  ): Promise<BillingIdentity> {
    const account = item.account;
    switch (account.kind) {
      case "cash": {
        const placeholder = await cash.resolveCashAccount();
        const familyId = await cash.findSaleFamilyId(
          account.token,
          item.lineDate,
          item.mealType,
        );
        return cashBillingIdentity(placeholder, familyId);
      }
      case "real": {
        const lookup = await tx.findAccount(account.accountId);
        if (!lookup) {
          console.warn(
            "[PaymentSync] Account not on roster, using station hints",
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

  private buildRecord(
    item: PaymentSyncItem,
    identity: BillingIdentity,
    context: SyncContext,
  ): NewPaymentRecord {
    return {
      syncKey: item.syncKey,
      userId: item.userId ?? context.session.userId,
      accountId: identity.accountId,
      familyId: identity.familyId,
      schoolId: identity.schoolId,
      paymentType: item.paymentType,
      amount: item.amount,
      memo: encodePaymentMemo(item),
      checkNumber: item.checkNumber,
      lineType: item.mealType,
      lineNum: item.lineNum,
      lineDate: item.lineDate,
      accountToken: accountTokenOf(item.account),
      stationSessionId: sessionIdFromSyncKey(item.syncKey),
      paidAt: item.timestampUTC ?? context.now,
    };
  }
}
