/**
 * Sync Validation Service
 *
 * Lets a station check, after a connectivity gap, whether the server holds
 * everything it recorded for one account on one line day.
 *
 * - count mode: the server reports its counts. Matching counts prove nothing
 *   (different items can add up to the same number), so only a station with
 *   nothing buffered is declared in sync.
 * - full mode: the station sends its sync keys. It is in sync when none of
 *   them is missing on the server; keys only the server has come from other
 *   stations and do not matter.
 *
 * @module services/sync-validation.service
 */

import type {
  SyncKeyComparison,
  SyncValidationRequest,
  SyncValidationResponse,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";

export function compareSyncKeys(
  clientKeys: readonly string[],
  serverKeys: readonly string[],
): Required<SyncKeyComparison> {
  const server = new Set(serverKeys);
  const client = new Set(clientKeys);

  return {
    clientCount: clientKeys.length,
    serverCount: serverKeys.length,
    missingFromServer: clientKeys.filter((key) => !server.has(key)),
    missingFromClient: serverKeys.filter((key) => !client.has(key)),
  };
}

export class SyncValidationService {
  constructor(private readonly store: PosStore) {}

  async validate(
    request: SyncValidationRequest,
  ): Promise<SyncValidationResponse> {
    const accountId = await this.resolveAccountId(request.accountId);
    const filter = {
      accountId,
      lineDate: request.lineDate,
      lineType: request.mealType,
    };

    const [sales, payments] = await Promise.all([
      this.store.listSaleRecords(filter),
      this.store.listPaymentRecords(filter),
    ]);
    const serverSaleKeys = sales.map((sale) => sale.syncKey);
    const serverPaymentKeys = payments.map((payment) => payment.syncKey);

    if (request.mode === "count") {
      return {
        success: true,
        mode: "count",
        isInSync: request.transactionCount === 0 && request.paymentCount === 0,
        transactions: {
          clientCount: request.transactionCount,
          serverCount: serverSaleKeys.length,
        },
        payments: {
          clientCount: request.paymentCount,
          serverCount: serverPaymentKeys.length,
        },
      };
    }

    const transactions = compareSyncKeys(
      request.transactionSyncKeys,
      serverSaleKeys,
    );
    const paymentComparison = compareSyncKeys(
      request.paymentSyncKeys,
      serverPaymentKeys,
    );

    return {
      success: true,
      mode: "full",
      isInSync:
        transactions.missingFromServer.length === 0 &&
        paymentComparison.missingFromServer.length === 0,
      transactions,
      payments: paymentComparison,
    };
  }

  /**
   * Stations may know an account by its roster id or its legacy id
   */
  private async resolveAccountId(id: number): Promise<number> {
    const direct = await this.store.findAccount(id);
    if (direct) {
      return direct.accountId;
    }
    const legacy = await this.store.findAccountByLegacyId(id);
    return legacy?.accountId ?? id;
  }
}
