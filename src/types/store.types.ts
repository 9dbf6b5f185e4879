/**
 * Storage boundary for the POS sync core.
 *
 * The PostgreSQL implementation lives in db/drizzle-store.ts; tests use an
 * in-memory implementation of the same contract.
 *
 * @module types/store.types
 */

import type {
  AccountLookup,
  CashTillSnapshot,
  DeletionRecord,
  LineLog,
  LineLogKey,
  MenuItem,
  NewDeletionRecord,
  NewPaymentRecord,
  NewSaleRecord,
  PaymentRecord,
  SaleRecord,
  SessionStatus,
  Station,
  StationSession,
} from "./pos-sync.types";

export type LedgerKind = "transaction" | "payment" | "deletion";

export type NewStation = Omit<Station, "id">;

export type StationPatch = Partial<
  Pick<Station, "macAddress" | "ipAddress" | "lastSeenAt">
>;

export type NewStationSession = Omit<StationSession, "id">;

export type StationSessionPatch = Partial<
  Pick<StationSession, "status" | "lineLogId" | "lastActivityAt" | "closedAt">
>;

export interface LineLogPatch {
  openedAt?: Date;
  openedBy?: number;
  closedAt?: Date;
  closedBy?: number;
  startCash?: CashTillSnapshot | null;
  endCash?: CashTillSnapshot | null;
}

/**
 * Scope in which synthetic family ids are allocated
 */
export interface CashFamilyScope {
  placeholderAccountId: number;
  lineDate: string;
  lineType: string;
}

export interface AccountDayFilter {
  accountId: number;
  lineDate: string;
  lineType: string;
}

export interface PosStore {
  /**
   * Run work in one storage transaction. A throw rolls back every write
   * made through the handle passed to `work`.
   */
  transaction<T>(work: (tx: PosStore) => Promise<T>): Promise<T>;

  // Stations
  findStationByFingerprint(
    deviceId: string,
    browser: string,
    isPrivate: boolean,
  ): Promise<Station | undefined>;
  createStation(data: NewStation): Promise<Station>;
  updateStation(id: number, patch: StationPatch): Promise<Station | undefined>;

  // Sessions
  findSession(id: number): Promise<StationSession | undefined>;
  findSessionByTokenHash(tokenHash: string): Promise<StationSession | undefined>;
  createSession(data: NewStationSession): Promise<StationSession>;
  updateSession(
    id: number,
    patch: StationSessionPatch,
  ): Promise<StationSession | undefined>;
  /** Marks every active session of the user abandoned; returns how many */
  abandonActiveSessionsForUser(userId: number, at: Date): Promise<number>;
  listSessionsForLineLog(lineLogId: number): Promise<StationSession[]>;
  listSessions(ids: number[]): Promise<StationSession[]>;
  countSessionsByStatus(
    lineLogId: number,
  ): Promise<Partial<Record<SessionStatus, number>>>;

  // Line logs
  findLineLog(key: LineLogKey): Promise<LineLog | undefined>;
  findLineLogById(id: number): Promise<LineLog | undefined>;
  /** Creates the log or returns the one another request created first */
  createLineLog(key: LineLogKey): Promise<LineLog>;
  updateLineLog(id: number, patch: LineLogPatch): Promise<LineLog | undefined>;

  // Roster & catalog
  findAccount(accountId: number): Promise<AccountLookup | undefined>;
  findAccountByLegacyId(legacyId: number): Promise<AccountLookup | undefined>;
  findMenuItem(itemId: number): Promise<MenuItem | undefined>;
  listMenuItems(itemIds: number[]): Promise<MenuItem[]>;

  // Idempotency ledger
  findSyncedId(kind: LedgerKind, syncKey: string): Promise<number | undefined>;
  /** Returns undefined when the sync key already exists */
  insertSaleRecord(row: NewSaleRecord): Promise<number | undefined>;
  insertPaymentRecord(row: NewPaymentRecord): Promise<number | undefined>;
  insertDeletionRecord(row: NewDeletionRecord): Promise<number | undefined>;

  findSaleRecord(syncKey: string): Promise<SaleRecord | undefined>;
  findPaymentRecord(syncKey: string): Promise<PaymentRecord | undefined>;
  findDeletionRecord(syncKey: string): Promise<DeletionRecord | undefined>;
  deleteSaleRecord(id: number): Promise<void>;
  deletePaymentRecord(id: number): Promise<void>;

  // Cash customers
  /** Exclusive until the surrounding transaction ends */
  lockCashFamilyScope(scope: CashFamilyScope): Promise<void>;
  maxCashFamilyId(
    scope: CashFamilyScope,
    floor: number,
  ): Promise<number | undefined>;
  findLatestCashSaleFamilyId(
    scope: CashFamilyScope,
    accountToken: string,
  ): Promise<number | undefined>;

  // Account day views
  listSaleRecords(filter: AccountDayFilter): Promise<SaleRecord[]>;
  listPaymentRecords(filter: AccountDayFilter): Promise<PaymentRecord[]>;
}
