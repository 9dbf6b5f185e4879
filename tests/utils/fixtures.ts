/**
 * Test Fixtures
 *
 * Config, sessions and upload items shared by unit and route tests.
 *
 * @module tests/utils/fixtures
 */

import type { SyncConfig } from "../../src/config/sync.config";
import { StationSessionService } from "../../src/services/station-session.service";
import type {
  PaymentSyncItem,
  StationSession,
  SyncContext,
  TransactionSyncItem,
} from "../../src/types/pos-sync.types";
import { formatSyncKey } from "../../src/utils/sync-key";
import type { MemoryPosStore } from "./memory-store";

export const TEST_LINE_DATE = "2026-03-02";
export const TEST_NOW = new Date("2026-03-02T17:30:00.000Z");

export const CASH_PLACEHOLDER_ACCOUNT_ID = 900;

export const testSyncConfig: SyncConfig = {
  cashAccountLegacyId: 999999999,
  cashFamilyIdFloor: 9500000,
  cashCodePrefix: "C",
  sessionIdleTimeoutMinutes: 720,
  batchMaxItems: 500,
  businessTimezone: "UTC",
};

export function seedCashPlaceholder(store: MemoryPosStore): void {
  store.seedAccount({
    accountId: CASH_PLACEHOLDER_ACCOUNT_ID,
    legacyId: testSyncConfig.cashAccountLegacyId,
    schoolId: "CASH",
  });
}

export interface TestSessionOptions {
  abilities?: string[];
  userId?: number;
  deviceId?: string;
  lineLogId?: number | null;
}

export async function createTestSession(
  store: MemoryPosStore,
  options: TestSessionOptions = {},
): Promise<{ session: StationSession; token: string }> {
  const sessions = new StationSessionService(store, testSyncConfig);
  const { session, token } = await sessions.createSession(
    {
      station: {
        deviceId: options.deviceId ?? "device-1",
        browser: "chrome",
        isPrivate: false,
      },
      userId: options.userId ?? 7,
      username: "cashier",
      abilities: options.abilities ?? ["line:*"],
      lineLogId: options.lineLogId ?? null,
    },
    TEST_NOW,
  );
  return { session, token };
}

export function contextFor(session: StationSession): SyncContext {
  return { session, now: TEST_NOW };
}

export function keyFor(sessionId: number, localId: number, lineLogId = 1) {
  return formatSyncKey({ lineLogId, sessionId, localId });
}

export function buildTransactionItem(
  overrides: Partial<TransactionSyncItem> = {},
): TransactionSyncItem {
  return {
    syncKey: "1-1-1",
    localId: 1,
    userId: null,
    account: { kind: "real", accountId: 1001 },
    familyId: null,
    schoolCode: null,
    lineDate: TEST_LINE_DATE,
    mealType: "L",
    lineNum: 10,
    timestampUTC: null,
    itemId: 50,
    price: 2.75,
    transactionCode: null,
    itemType: null,
    ...overrides,
  };
}

export function buildPaymentItem(
  overrides: Partial<PaymentSyncItem> = {},
): PaymentSyncItem {
  return {
    syncKey: "1-1-1",
    localId: 1,
    userId: null,
    account: { kind: "real", accountId: 1001 },
    familyId: null,
    schoolCode: null,
    lineDate: TEST_LINE_DATE,
    mealType: "L",
    lineNum: 10,
    timestampUTC: null,
    paymentType: "CASH",
    amount: 5,
    memo: null,
    checkNumber: null,
    ...overrides,
  };
}
