/**
 * Per-item result bookkeeping shared by the upload engines.
 *
 * @module services/sync-results
 */

import type {
  SyncBatchResponse,
  SyncItemResult,
} from "../types/pos-sync.types";
import type { CashAccountNotConfiguredError } from "./cash-customer.service";
import type { LedgerOutcome } from "./sync-ledger";

interface ItemRef {
  localId: number;
  syncKey: string;
}

export class SyncResultCollector {
  readonly results: SyncItemResult[] = [];
  private cashError: CashAccountNotConfiguredError | undefined;
  private cashFailures = 0;

  get cashFailureCount(): number {
    return this.cashFailures;
  }

  get cashConfigurationError(): CashAccountNotConfiguredError | undefined {
    return this.cashError;
  }

  created(item: ItemRef, serverId: number): void {
    this.results.push({
      localId: item.localId,
      syncKey: item.syncKey,
      serverId,
      success: true,
    });
  }

  duplicate(item: ItemRef, serverId: number): void {
    this.results.push({
      localId: item.localId,
      syncKey: item.syncKey,
      serverId,
      success: true,
      duplicate: true,
    });
  }

  fromOutcome(item: ItemRef, outcome: LedgerOutcome): void {
    if (outcome.status === "duplicate") {
      this.duplicate(item, outcome.id);
    } else {
      this.created(item, outcome.id);
    }
  }

  notFound(item: ItemRef): void {
    this.results.push({
      localId: item.localId,
      syncKey: item.syncKey,
      serverId: null,
      success: true,
      notFound: true,
    });
  }

  cashFailure(item: ItemRef, error: CashAccountNotConfiguredError): void {
    this.cashError = error;
    this.cashFailures += 1;
    this.results.push({
      localId: item.localId,
      syncKey: item.syncKey,
      serverId: null,
      success: false,
      error: error.code,
      errorMessage: error.message,
    });
  }
}

/**
 * The batch succeeds as a whole even when cash items failed; the warning
 * tells the station an administrator has to act before those items retry.
 */
export function buildBatchResponse(
  collector: SyncResultCollector,
): SyncBatchResponse {
  const response: SyncBatchResponse = {
    success: true,
    results: collector.results,
  };

  const cashError = collector.cashConfigurationError;
  if (cashError) {
    response.warning = cashError.code;
    response.warningMessage = cashError.message;
    response.cashTransactionsFailed = true;
  }

  return response;
}
