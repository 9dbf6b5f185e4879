import {
  pgTable,
  serial,
  integer,
  varchar,
  boolean,
  numeric,
  date,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type {
  AuditSnapshot,
  CashTillSnapshot,
  SessionStatus,
} from "../types/pos-sync.types";
import type { DeletionSourceTable, PaymentMethod } from "../constants/sync";

// Roster accounts (read-only here; maintained by the district's roster import)
export const accounts = pgTable("accounts", {
  accountId: integer("account_id").primaryKey(),
  legacyId: integer("legacy_id").unique(),
  familyId: integer("family_id"),
  schoolId: varchar("school_id", { length: 16 }),
  status: varchar("status", { length: 16 }),
  approvalMethod: varchar("approval_method", { length: 8 }),
  approvalCode: varchar("approval_code", { length: 16 }),
});

// Menu catalog (read-only here)
export const menuItems = pgTable("menu_items", {
  itemId: integer("item_id").primaryKey(),
  itemType: varchar("item_type", { length: 1 }),
  description: varchar("description", { length: 120 }),
});

export const stations = pgTable(
  "pos_stations",
  {
    id: serial("id").primaryKey(),
    deviceId: varchar("device_id", { length: 128 }).notNull(),
    browser: varchar("browser", { length: 128 }).notNull(),
    isPrivate: boolean("is_private").notNull().default(false),
    macAddress: varchar("mac_address", { length: 32 }),
    ipAddress: varchar("ip_address", { length: 64 }),
    firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull(),
    lastSeenAt: timestamp("last_seen_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    fingerprintIdx: uniqueIndex("pos_stations_fingerprint_idx").on(
      t.deviceId,
      t.browser,
      t.isPrivate,
    ),
  }),
);

export const lineLogs = pgTable(
  "pos_line_logs",
  {
    id: serial("id").primaryKey(),
    mealType: varchar("meal_type", { length: 1 }).notNull(),
    lineNum: integer("line_num").notNull(),
    lineDate: date("line_date", { mode: "string" }).notNull(),
    openedAt: timestamp("opened_at", { withTimezone: true }),
    openedBy: integer("opened_by"),
    closedAt: timestamp("closed_at", { withTimezone: true }),
    closedBy: integer("closed_by"),
    startCash: jsonb("start_cash").$type<CashTillSnapshot>(),
    endCash: jsonb("end_cash").$type<CashTillSnapshot>(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => ({
    lineDayIdx: uniqueIndex("pos_line_logs_line_day_idx").on(
      t.mealType,
      t.lineNum,
      t.lineDate,
    ),
  }),
);

export const stationSessions = pgTable(
  "pos_station_sessions",
  {
    id: serial("id").primaryKey(),
    stationId: integer("station_id")
      .notNull()
      .references(() => stations.id),
    userId: integer("user_id").notNull(),
    username: varchar("username", { length: 64 }),
    lineLogId: integer("line_log_id").references(() => lineLogs.id),
    tokenHash: varchar("token_hash", { length: 64 }).notNull().unique(),
    abilities: jsonb("abilities").$type<string[]>().notNull(),
    status: varchar("status", { length: 16 }).$type<SessionStatus>().notNull(),
    openedAt: timestamp("opened_at", { withTimezone: true }).notNull(),
    lastActivityAt: timestamp("last_activity_at", {
      withTimezone: true,
    }).notNull(),
    closedAt: timestamp("closed_at", { withTimezone: true }),
  },
  (t) => ({
    userStatusIdx: index("pos_station_sessions_user_status_idx").on(
      t.userId,
      t.status,
    ),
    lineLogIdx: index("pos_station_sessions_line_log_idx").on(t.lineLogId),
  }),
);

export const saleRecords = pgTable(
  "pos_transactions",
  {
    id: serial("id").primaryKey(),
    syncKey: varchar("sync_key", { length: 64 }).notNull().unique(),
    userId: integer("user_id"),
    accountId: integer("account_id").notNull(),
    familyId: integer("family_id"),
    schoolId: varchar("school_id", { length: 16 }),
    itemId: integer("item_id").notNull(),
    itemType: varchar("item_type", { length: 1 }).notNull(),
    transactionCode: varchar("transaction_code", { length: 1 }).notNull(),
    approvalMethod: varchar("approval_method", { length: 8 }),
    approvalCode: varchar("approval_code", { length: 16 }),
    price: numeric("price", { precision: 10, scale: 2 }).notNull(),
    lineType: varchar("line_type", { length: 1 }).notNull(),
    lineNum: integer("line_num").notNull(),
    lineDate: date("line_date", { mode: "string" }).notNull(),
    accountToken: varchar("account_token", { length: 32 }).notNull(),
    stationSessionId: integer("station_session_id"),
    transactedAt: timestamp("transacted_at", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => ({
    accountDayIdx: index("pos_transactions_account_day_idx").on(
      t.accountId,
      t.lineDate,
      t.lineType,
    ),
    cashFamilyIdx: index("pos_transactions_cash_family_idx").on(
      t.accountId,
      t.lineDate,
      t.lineType,
      t.familyId,
    ),
  }),
);

export const paymentRecords = pgTable(
  "pos_payments",
  {
    id: serial("id").primaryKey(),
    syncKey: varchar("sync_key", { length: 64 }).notNull().unique(),
    userId: integer("user_id"),
    accountId: integer("account_id").notNull(),
    familyId: integer("family_id"),
    schoolId: varchar("school_id", { length: 16 }),
    paymentType: varchar("payment_type", { length: 8 })
      .$type<PaymentMethod>()
      .notNull(),
    amount: numeric("amount", { precision: 10, scale: 2 }).notNull(),
    memo: varchar("memo", { length: 18 }).notNull(),
    checkNumber: varchar("check_number", { length: 32 }),
    lineType: varchar("line_type", { length: 1 }).notNull(),
    lineNum: integer("line_num").notNull(),
    lineDate: date("line_date", { mode: "string" }).notNull(),
    accountToken: varchar("account_token", { length: 32 }).notNull(),
    stationSessionId: integer("station_session_id"),
    paidAt: timestamp("paid_at", { withTimezone: true }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (t) => ({
    accountDayIdx: index("pos_payments_account_day_idx").on(
      t.accountId,
      t.lineDate,
      t.lineType,
    ),
  }),
);

export const deletionLog = pgTable("pos_deletion_log", {
  id: serial("id").primaryKey(),
  syncKey: varchar("sync_key", { length: 64 }).notNull().unique(),
  originalSyncKey: varchar("original_sync_key", { length: 64 }).notNull(),
  sourceTable: varchar("source_table", { length: 16 })
    .$type<DeletionSourceTable>()
    .notNull(),
  originalId: integer("original_id").notNull(),
  accountId: integer("account_id").notNull(),
  familyId: integer("family_id"),
  lineType: varchar("line_type", { length: 1 }).notNull(),
  lineNum: integer("line_num").notNull(),
  lineDate: date("line_date", { mode: "string" }).notNull(),
  amount: numeric("amount", { precision: 10, scale: 2 }).notNull(),
  deletedBy: integer("deleted_by").notNull(),
  deletedAt: timestamp("deleted_at", { withTimezone: true }).notNull(),
  snapshot: jsonb("snapshot").$type<AuditSnapshot>().notNull(),
});
