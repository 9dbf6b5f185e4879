/**
 * POS Sync Types
 *
 * Domain records persisted by the sync engines and the request/response
 * shapes exchanged with POS stations.
 *
 * @module types/pos-sync.types
 */

import type { DeletionSourceTable, PaymentMethod } from "../constants/sync";

// ============================================================================
// Identity & Sessions
// ============================================================================

export interface Station {
  id: number;
  deviceId: string;
  browser: string;
  isPrivate: boolean;
  macAddress: string | null;
  ipAddress: string | null;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

/**
 * What a station reports about itself on login
 */
export interface StationContact {
  deviceId: string;
  browser: string;
  isPrivate: boolean;
  macAddress?: string | null;
  ipAddress?: string | null;
}

export type SessionStatus = "active" | "syncing" | "synced" | "abandoned";

export interface StationSession {
  id: number;
  stationId: number;
  userId: number;
  username: string | null;
  lineLogId: number | null;
  tokenHash: string;
  abilities: string[];
  status: SessionStatus;
  openedAt: Date;
  lastActivityAt: Date;
  closedAt: Date | null;
}

// ============================================================================
// Line Logs
// ============================================================================

export type LineLogStatus = "not_opened" | "open" | "closed";

/**
 * Denomination breakdown counted at the till; stored as-is
 */
export type CashTillSnapshot = Record<string, unknown>;

export interface LineLogKey {
  mealType: string;
  lineNum: number;
  lineDate: string;
}

export interface LineLog extends LineLogKey {
  id: number;
  openedAt: Date | null;
  openedBy: number | null;
  closedAt: Date | null;
  closedBy: number | null;
  startCash: CashTillSnapshot | null;
  endCash: CashTillSnapshot | null;
  createdAt: Date;
}

export interface LineLogSyncInfo {
  lineLogId: number;
  status: LineLogStatus;
  sessions: Record<SessionStatus, number>;
  readyToClose: boolean;
}

// ============================================================================
// Roster & Catalog (read-only collaborators)
// ============================================================================

export interface AccountLookup {
  accountId: number;
  legacyId: number | null;
  familyId: number | null;
  schoolId: string | null;
  status: string | null;
  approvalMethod: string | null;
  approvalCode: string | null;
}

export interface MenuItem {
  itemId: number;
  itemType: string | null;
  description: string | null;
}

// ============================================================================
// Account references
// ============================================================================

/**
 * Account token as sent by a station, decided once at parse time
 */
export type AccountRef =
  | { kind: "real"; accountId: number }
  | { kind: "cash"; token: string };

/**
 * Resolved billing target of a sale or payment
 */
export interface BillingIdentity {
  accountId: number;
  familyId: number | null;
  schoolId: string | null;
  approvalMethod: string | null;
  approvalCode: string | null;
  source: "roster" | "client_hint" | "cash_placeholder";
}

// ============================================================================
// Persisted records
// ============================================================================

export interface SaleRecord {
  id: number;
  syncKey: string;
  userId: number | null;
  accountId: number;
  familyId: number | null;
  schoolId: string | null;
  itemId: number;
  itemType: string;
  transactionCode: string;
  approvalMethod: string | null;
  approvalCode: string | null;
  price: number;
  lineType: string;
  lineNum: number;
  lineDate: string;
  accountToken: string;
  stationSessionId: number | null;
  transactedAt: Date;
  createdAt: Date;
}

export type NewSaleRecord = Omit<SaleRecord, "id" | "createdAt">;

export interface PaymentRecord {
  id: number;
  syncKey: string;
  userId: number | null;
  accountId: number;
  familyId: number | null;
  schoolId: string | null;
  paymentType: PaymentMethod;
  amount: number;
  memo: string;
  checkNumber: string | null;
  lineType: string;
  lineNum: number;
  lineDate: string;
  accountToken: string;
  stationSessionId: number | null;
  paidAt: Date;
  createdAt: Date;
}

export type NewPaymentRecord = Omit<PaymentRecord, "id" | "createdAt">;

export type AuditSnapshot = Record<string, string | number | boolean | null>;

export interface DeletionRecord {
  id: number;
  syncKey: string;
  originalSyncKey: string;
  sourceTable: DeletionSourceTable;
  originalId: number;
  accountId: number;
  familyId: number | null;
  lineType: string;
  lineNum: number;
  lineDate: string;
  amount: number;
  deletedBy: number;
  deletedAt: Date;
  snapshot: AuditSnapshot;
}

export type NewDeletionRecord = Omit<DeletionRecord, "id">;

// ============================================================================
// Upload items (after validation)
// ============================================================================

interface SyncItemBase {
  syncKey: string;
  localId: number;
  userId: number | null;
  account: AccountRef;
  familyId: number | null;
  schoolCode: string | null;
  lineDate: string;
  mealType: string;
  lineNum: number;
  timestampUTC: Date | null;
}

export interface TransactionSyncItem extends SyncItemBase {
  itemId: number;
  price: number;
  transactionCode: string | null;
  itemType: string | null;
}

export interface PaymentSyncItem extends SyncItemBase {
  paymentType: PaymentMethod;
  amount: number;
  memo: string | null;
  checkNumber: string | null;
}

export interface DeletionSyncItem {
  syncKey: string;
  originalSyncKey: string;
  tableName: DeletionSourceTable;
  localId: number;
}

// ============================================================================
// Results
// ============================================================================

export interface SyncItemResult {
  localId: number;
  syncKey: string;
  serverId: number | null;
  success: boolean;
  duplicate?: true;
  notFound?: true;
  error?: string;
  errorMessage?: string;
}

export interface SyncBatchResponse {
  success: boolean;
  results: SyncItemResult[];
  warning?: string;
  warningMessage?: string;
  cashTransactionsFailed?: boolean;
}

/**
 * Who is uploading: the resolved session behind the bearer token
 */
export interface SyncContext {
  session: StationSession;
  now: Date;
}

// ============================================================================
// Sync validation
// ============================================================================

export type SyncValidationMode = "count" | "full";

export interface SyncValidationRequest {
  accountId: number;
  lineDate: string;
  mealType: string;
  mode: SyncValidationMode;
  transactionCount: number;
  paymentCount: number;
  transactionSyncKeys: string[];
  paymentSyncKeys: string[];
}

export interface SyncKeyComparison {
  clientCount: number;
  serverCount: number;
  missingFromServer?: string[];
  missingFromClient?: string[];
}

export interface SyncValidationResponse {
  success: true;
  mode: SyncValidationMode;
  isInSync: boolean;
  transactions: SyncKeyComparison;
  payments: SyncKeyComparison;
}

// ============================================================================
// Account activity
// ============================================================================

export interface StationAttribution {
  stationSessionId: number | null;
  isOtherStation: boolean;
  stationLabel: string;
}

export interface SaleActivityEntry extends StationAttribution {
  id: number;
  syncKey: string;
  itemId: number;
  itemDescription: string | null;
  itemType: string;
  transactionCode: string;
  price: number;
  lineNum: number;
  transactedAt: string;
}

export interface PaymentActivityEntry extends StationAttribution {
  id: number;
  syncKey: string;
  paymentType: PaymentMethod;
  amount: number;
  memo: string;
  lineNum: number;
  paidAt: string;
}

export interface AccountActivity {
  accountId: number;
  lineDate: string;
  mealType: string;
  transactions: SaleActivityEntry[];
  payments: PaymentActivityEntry[];
}
