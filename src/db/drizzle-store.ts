/**
 * PostgreSQL implementation of PosStore on drizzle-orm.
 *
 * Every sync-key insert is `ON CONFLICT (sync_key) DO NOTHING RETURNING id`,
 * so two stations racing on the same key end with exactly one row and the
 * loser sees `undefined`.
 *
 * @module db/drizzle-store
 */

import {
  and,
  asc,
  count,
  desc,
  eq,
  gte,
  inArray,
  isNotNull,
  isNull,
  max,
  sql,
} from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import * as schema from "./schema";
import {
  accounts,
  deletionLog,
  lineLogs,
  menuItems,
  paymentRecords,
  saleRecords,
  stationSessions,
  stations,
} from "./schema";
import type {
  AccountLookup,
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
} from "../types/pos-sync.types";
import type {
  AccountDayFilter,
  CashFamilyScope,
  LedgerKind,
  LineLogPatch,
  NewStation,
  NewStationSession,
  PosStore,
  StationPatch,
  StationSessionPatch,
} from "../types/store.types";

type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

function toSaleRecord(row: typeof saleRecords.$inferSelect): SaleRecord {
  return { ...row, price: Number(row.price) };
}

function toPaymentRecord(
  row: typeof paymentRecords.$inferSelect,
): PaymentRecord {
  return { ...row, amount: Number(row.amount) };
}

function toDeletionRecord(row: typeof deletionLog.$inferSelect): DeletionRecord {
  return { ...row, amount: Number(row.amount) };
}

function cashScopeLockKey(scope: CashFamilyScope): string {
  return `cash-family:${scope.placeholderAccountId}:${scope.lineDate}:${scope.lineType}`;
}

export class DrizzlePosStore implements PosStore {
  constructor(private readonly db: Executor) {}

  transaction<T>(work: (tx: PosStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzlePosStore(tx)));
  }

  // ==========================================================================
  // Stations
  // ==========================================================================

  async findStationByFingerprint(
    deviceId: string,
    browser: string,
    isPrivate: boolean,
  ): Promise<Station | undefined> {
    const [row] = await this.db
      .select()
      .from(stations)
      .where(
        and(
          eq(stations.deviceId, deviceId),
          eq(stations.browser, browser),
          eq(stations.isPrivate, isPrivate),
        ),
      )
      .limit(1);
    return row;
  }

  async createStation(data: NewStation): Promise<Station> {
    const [row] = await this.db.insert(stations).values(data).returning();
    return row;
  }

  async updateStation(
    id: number,
    patch: StationPatch,
  ): Promise<Station | undefined> {
    const [row] = await this.db
      .update(stations)
      .set(patch)
      .where(eq(stations.id, id))
      .returning();
    return row;
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  async findSession(id: number): Promise<StationSession | undefined> {
    const [row] = await this.db
      .select()
      .from(stationSessions)
      .where(eq(stationSessions.id, id))
      .limit(1);
    return row;
  }

  async findSessionByTokenHash(
    tokenHash: string,
  ): Promise<StationSession | undefined> {
    const [row] = await this.db
      .select()
      .from(stationSessions)
      .where(eq(stationSessions.tokenHash, tokenHash))
      .limit(1);
    return row;
  }

  async createSession(data: NewStationSession): Promise<StationSession> {
    const [row] = await this.db
      .insert(stationSessions)
      .values(data)
      .returning();
    return row;
  }

  async updateSession(
    id: number,
    patch: StationSessionPatch,
  ): Promise<StationSession | undefined> {
    const [row] = await this.db
      .update(stationSessions)
      .set(patch)
      .where(eq(stationSessions.id, id))
      .returning();
    return row;
  }

  async abandonActiveSessionsForUser(userId: number, at: Date): Promise<number> {
    const rows = await this.db
      .update(stationSessions)
      .set({ status: "abandoned", closedAt: at })
      .where(
        and(
          eq(stationSessions.userId, userId),
          eq(stationSessions.status, "active"),
          isNull(stationSessions.closedAt),
        ),
      )
      .returning({ id: stationSessions.id });
    return rows.length;
  }

  async listSessionsForLineLog(lineLogId: number): Promise<StationSession[]> {
    return this.db
      .select()
      .from(stationSessions)
      .where(eq(stationSessions.lineLogId, lineLogId))
      .orderBy(asc(stationSessions.id));
  }

  async listSessions(ids: number[]): Promise<StationSession[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(stationSessions)
      .where(inArray(stationSessions.id, ids));
  }

  async countSessionsByStatus(
    lineLogId: number,
  ): Promise<Partial<Record<SessionStatus, number>>> {
    const rows = await this.db
      .select({ status: stationSessions.status, total: count() })
      .from(stationSessions)
      .where(eq(stationSessions.lineLogId, lineLogId))
      .groupBy(stationSessions.status);

    const counts: Partial<Record<SessionStatus, number>> = {};
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  // ==========================================================================
  // Line logs
  // ==========================================================================

  async findLineLog(key: LineLogKey): Promise<LineLog | undefined> {
    const [row] = await this.db
      .select()
      .from(lineLogs)
      .where(
        and(
          eq(lineLogs.mealType, key.mealType),
          eq(lineLogs.lineNum, key.lineNum),
          eq(lineLogs.lineDate, key.lineDate),
        ),
      )
      .limit(1);
    return row;
  }

  async findLineLogById(id: number): Promise<LineLog | undefined> {
    const [row] = await this.db
      .select()
      .from(lineLogs)
      .where(eq(lineLogs.id, id))
      .limit(1);
    return row;
  }

  async createLineLog(key: LineLogKey): Promise<LineLog> {
    const [created] = await this.db
      .insert(lineLogs)
      .values(key)
      .onConflictDoNothing({
        target: [lineLogs.mealType, lineLogs.lineNum, lineLogs.lineDate],
      })
      .returning();
    if (created) {
      return created;
    }

    const existing = await this.findLineLog(key);
    if (!existing) {
      throw new Error(
        `Line log ${key.mealType}${key.lineNum} ${key.lineDate} conflicted but could not be read back`,
      );
    }
    return existing;
  }

  async updateLineLog(
    id: number,
    patch: LineLogPatch,
  ): Promise<LineLog | undefined> {
    const [row] = await this.db
      .update(lineLogs)
      .set(patch)
      .where(eq(lineLogs.id, id))
      .returning();
    return row;
  }

  // ==========================================================================
  // Roster & catalog
  // ==========================================================================

  async findAccount(accountId: number): Promise<AccountLookup | undefined> {
    const [row] = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.accountId, accountId))
      .limit(1);
    return row;
  }

  async findAccountByLegacyId(
    legacyId: number,
  ): Promise<AccountLookup | undefined> {
    const [row] = await this.db
      .select()
      .from(accounts)
      .where(eq(accounts.legacyId, legacyId))
      .limit(1);
    return row;
  }

  async findMenuItem(itemId: number): Promise<MenuItem | undefined> {
    const [row] = await this.db
      .select()
      .from(menuItems)
      .where(eq(menuItems.itemId, itemId))
      .limit(1);
    return row;
  }

  async listMenuItems(itemIds: number[]): Promise<MenuItem[]> {
    if (itemIds.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(menuItems)
      .where(inArray(menuItems.itemId, itemIds));
  }

  // ==========================================================================
  // Idempotency ledger
  // ==========================================================================

  async findSyncedId(
    kind: LedgerKind,
    syncKey: string,
  ): Promise<number | undefined> {
    switch (kind) {
      case "transaction": {
        const [row] = await this.db
          .select({ id: saleRecords.id })
          .from(saleRecords)
          .where(eq(saleRecords.syncKey, syncKey))
          .limit(1);
        return row?.id;
      }
      case "payment": {
        const [row] = await this.db
          .select({ id: paymentRecords.id })
          .from(paymentRecords)
          .where(eq(paymentRecords.syncKey, syncKey))
          .limit(1);
        return row?.id;
      }
      case "deletion": {
        const [row] = await this.db
          .select({ id: deletionLog.id })
          .from(deletionLog)
          .where(eq(deletionLog.syncKey, syncKey))
          .limit(1);
        return row?.id;
      }
    }
  }

  async insertSaleRecord(row: NewSaleRecord): Promise<number | undefined> {
    const [inserted] = await this.db
      .insert(saleRecords)
      .values({ ...row, price: row.price.toFixed(2) })
      .onConflictDoNothing({ target: saleRecords.syncKey })
      .returning({ id: saleRecords.id });
    return inserted?.id;
  }

  async insertPaymentRecord(
    row: NewPaymentRecord,
  ): Promise<number | undefined> {
    const [inserted] = await this.db
      .insert(paymentRecords)
      .values({ ...row, amount: row.amount.toFixed(2) })
      .onConflictDoNothing({ target: paymentRecords.syncKey })
      .returning({ id: paymentRecords.id });
    return inserted?.id;
  }

  async insertDeletionRecord(
    row: NewDeletionRecord,
  ): Promise<number | undefined> {
    const [inserted] = await this.db
      .insert(deletionLog)
      .values({ ...row, amount: row.amount.toFixed(2) })
      .onConflictDoNothing({ target: deletionLog.syncKey })
      .returning({ id: deletionLog.id });
    return inserted?.id;
  }

  async findSaleRecord(syncKey: string): Promise<SaleRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(saleRecords)
      .where(eq(saleRecords.syncKey, syncKey))
      .limit(1);
    return row ? toSaleRecord(row) : undefined;
  }

  async findPaymentRecord(syncKey: string): Promise<PaymentRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(paymentRecords)
      .where(eq(paymentRecords.syncKey, syncKey))
      .limit(1);
    return row ? toPaymentRecord(row) : undefined;
  }

  async findDeletionRecord(
    syncKey: string,
  ): Promise<DeletionRecord | undefined> {
    const [row] = await this.db
      .select()
      .from(deletionLog)
      .where(eq(deletionLog.syncKey, syncKey))
      .limit(1);
    return row ? toDeletionRecord(row) : undefined;
  }

  async deleteSaleRecord(id: number): Promise<void> {
    await this.db.delete(saleRecords).where(eq(saleRecords.id, id));
  }

  async deletePaymentRecord(id: number): Promise<void> {
    await this.db.delete(paymentRecords).where(eq(paymentRecords.id, id));
  }

  // ==========================================================================
  // Cash customers
  // ==========================================================================

  async lockCashFamilyScope(scope: CashFamilyScope): Promise<void> {
    await this.db.execute(
      sql`select pg_advisory_xact_lock(hashtext(${cashScopeLockKey(scope)}))`,
    );
  }

  async maxCashFamilyId(
    scope: CashFamilyScope,
    floor: number,
  ): Promise<number | undefined> {
    const [row] = await this.db
      .select({ value: max(saleRecords.familyId) })
      .from(saleRecords)
      .where(
        and(
          eq(saleRecords.accountId, scope.placeholderAccountId),
          eq(saleRecords.lineDate, scope.lineDate),
          eq(saleRecords.lineType, scope.lineType),
          gte(saleRecords.familyId, floor),
        ),
      );
    return row?.value ?? undefined;
  }

  async findLatestCashSaleFamilyId(
    scope: CashFamilyScope,
    accountToken: string,
  ): Promise<number | undefined> {
    const [row] = await this.db
      .select({ familyId: saleRecords.familyId })
      .from(saleRecords)
      .where(
        and(
          eq(saleRecords.accountId, scope.placeholderAccountId),
          eq(saleRecords.lineDate, scope.lineDate),
          eq(saleRecords.lineType, scope.lineType),
          eq(saleRecords.accountToken, accountToken),
          isNotNull(saleRecords.familyId),
        ),
      )
      .orderBy(desc(saleRecords.id))
      .limit(1);
    return row?.familyId ?? undefined;
  }

  // ==========================================================================
  // Account day views
  // ==========================================================================

  async listSaleRecords(filter: AccountDayFilter): Promise<SaleRecord[]> {
    const rows = await this.db
      .select()
      .from(saleRecords)
      .where(
        and(
          eq(saleRecords.accountId, filter.accountId),
          eq(saleRecords.lineDate, filter.lineDate),
          eq(saleRecords.lineType, filter.lineType),
        ),
      )
      .orderBy(asc(saleRecords.transactedAt), asc(saleRecords.id));
    return rows.map(toSaleRecord);
  }

  async listPaymentRecords(filter: AccountDayFilter): Promise<PaymentRecord[]> {
    const rows = await this.db
      .select()
      .from(paymentRecords)
      .where(
        and(
          eq(paymentRecords.accountId, filter.accountId),
          eq(paymentRecords.lineDate, filter.lineDate),
          eq(paymentRecords.lineType, filter.lineType),
        ),
      )
      .orderBy(asc(paymentRecords.paidAt), asc(paymentRecords.id));
    return rows.map(toPaymentRecord);
  }
}
