/**
 * Service wiring for one store handle.
 *
 * @module services/pos-services
 */

import type { SyncConfig } from "../config/sync.config";
import type { PosStore } from "../types/store.types";
import { AccountActivityService } from "./account-activity.service";
import { DeletionSyncService } from "./deletion-sync.service";
import { LineLogService } from "./line-log.service";
import { PaymentSyncService } from "./payment-sync.service";
import { StationSessionService } from "./station-session.service";
import { SyncValidationService } from "./sync-validation.service";
import { TransactionSyncService } from "./transaction-sync.service";

export interface PosServices {
  config: SyncConfig;
  sessions: StationSessionService;
  lineLogs: LineLogService;
  transactions: TransactionSyncService;
  payments: PaymentSyncService;
  deletions: DeletionSyncService;
  validation: SyncValidationService;
  activity: AccountActivityService;
}

export function createPosServices(
  store: PosStore,
  config: SyncConfig,
): PosServices {
  return {
    config,
    sessions: new StationSessionService(store, config),
    lineLogs: new LineLogService(store, config),
    transactions: new TransactionSyncService(store, config),
    payments: new PaymentSyncService(store, config),
    deletions: new DeletionSyncService(store),
    validation: new SyncValidationService(store),
    activity: new AccountActivityService(store),
  };
}
