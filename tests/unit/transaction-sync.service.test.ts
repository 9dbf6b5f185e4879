/**
 * Transaction Sync Service Unit Tests
 *
 * | Test ID   | Requirement                                               |
 * |-----------|-----------------------------------------------------------|
 * | TS-U-001  | roster sale is billed with roster identity and approval   |
 * | TS-U-002  | replayed sync key returns the original server id          |
 * | TS-U-003  | roster miss bills from station hints and warns            |
 * | TS-U-004  | cash sales get sequential synthetic family ids            |
 * | TS-U-005  | missing cash account fails only the cash items            |
 * | TS-U-006  | unexpected failure rolls the whole batch back             |
 * | TS-U-007  | concurrent batches never share a synthetic family id      |
 * | TS-U-008  | classification and provenance details                     |
 * | TS-U-009  | new, duplicate and roster-miss items commit in one batch  |
 * | TS-U-010  | a replay with a changed payload keeps the stored row      |
 *
 * @test-level Unit
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TransactionSyncService } from "../../src/services/transaction-sync.service";
import type { StationSession } from "../../src/types/pos-sync.types";
import { MemoryPosStore } from "../utils/memory-store";
import {
  buildTransactionItem,
  CASH_PLACEHOLDER_ACCOUNT_ID,
  contextFor,
  createTestSession,
  keyFor,
  seedCashPlaceholder,
  TEST_LINE_DATE,
  TEST_NOW,
  testSyncConfig,
} from "../utils/fixtures";

const CASH_ERROR_MESSAGE =
  "Cash placeholder account (legacy id 999999999) is not configured. Cash sales cannot be billed until an administrator creates it.";

describe("TransactionSyncService", () => {
  let store: MemoryPosStore;
  let service: TransactionSyncService;
  let session: StationSession;

  beforeEach(async () => {
    store = new MemoryPosStore();
    service = new TransactionSyncService(store, testSyncConfig);
    ({ session } = await createTestSession(store));
  });

  function cashItem(localId: number, token: string) {
    return buildTransactionItem({
      syncKey: keyFor(session.id, localId),
      localId,
      account: { kind: "cash", token },
    });
  }

  it("TS-U-001: bills a roster account with its family, school and approval", async () => {
    // GIVEN: A roster account approved for free meals and a lunch menu item
    store.seedAccount({
      accountId: 1001,
      legacyId: 501,
      familyId: 300,
      schoolId: "EL1",
      approvalMethod: "DC",
      approvalCode: "F",
    });
    store.seedMenuItem({ itemId: 50, itemType: "L", description: "Pizza" });
    const syncKey = keyFor(session.id, 1);

    // WHEN: The station uploads one sale without a classification
    const response = await service.submitBatch(
      [buildTransactionItem({ syncKey, familyId: 999, schoolCode: "ZZZ" })],
      contextFor(session),
    );

    // THEN: The sale is stored with roster data and the catalog type
    const stored = store.tables.sales[0];
    expect(response).toEqual({
      success: true,
      results: [{ localId: 1, syncKey, serverId: stored.id, success: true }],
    });
    expect(stored).toMatchObject({
      syncKey,
      userId: session.userId,
      accountId: 1001,
      familyId: 300,
      schoolId: "EL1",
      itemId: 50,
      itemType: "L",
      transactionCode: "L",
      approvalMethod: "DC",
      approvalCode: "F",
      price: 2.75,
      lineType: "L",
      lineNum: 10,
      lineDate: TEST_LINE_DATE,
      accountToken: "1001",
      stationSessionId: session.id,
      transactedAt: TEST_NOW,
    });
  });

  it("TS-U-002: a replayed sync key is a successful duplicate", async () => {
    const item = buildTransactionItem({ syncKey: keyFor(session.id, 1) });
    const first = await service.submitBatch([item], contextFor(session));
    const second = await service.submitBatch([item], contextFor(session));

    expect(second.results).toEqual([
      {
        localId: 1,
        syncKey: item.syncKey,
        serverId: first.results[0].serverId,
        success: true,
        duplicate: true,
      },
    ]);
    expect(store.tables.sales).toHaveLength(1);
  });

  it("TS-U-002b: a key repeated inside one batch is stored once", async () => {
    const item = buildTransactionItem({ syncKey: keyFor(session.id, 4) });

    const response = await service.submitBatch(
      [item, { ...item, localId: 5 }],
      contextFor(session),
    );

    expect(response.results[1]).toMatchObject({
      localId: 5,
      duplicate: true,
      serverId: response.results[0].serverId,
    });
    expect(store.tables.sales).toHaveLength(1);
  });

  it("TS-U-003: an account the roster does not know bills from station hints", async () => {
    const syncKey = keyFor(session.id, 2);

    const response = await service.submitBatch(
      [
        buildTransactionItem({
          syncKey,
          localId: 2,
          account: { kind: "real", accountId: 2002 },
          familyId: 44,
          schoolCode: "HS1",
          itemType: "L",
        }),
      ],
      contextFor(session),
    );

    expect(response.results[0].success).toBe(true);
    expect(store.tables.sales[0]).toMatchObject({
      accountId: 2002,
      familyId: 44,
      schoolId: "HS1",
      approvalMethod: null,
      approvalCode: null,
    });
    expect(console.warn).toHaveBeenCalledWith(
      "[TransactionSync] Account not on roster, using station hints",
      { accountId: 2002, syncKey },
    );
  });

  it("TS-U-004: cash sales bill the placeholder with sequential family ids", async () => {
    seedCashPlaceholder(store);

    await service.submitBatch(
      [cashItem(1, "C1"), cashItem(2, "C2"), cashItem(3, "C1")],
      contextFor(session),
    );

    expect(
      store.tables.sales.map((s) => [s.accountToken, s.familyId]),
    ).toEqual([
      ["C1", 9500000],
      ["C2", 9500001],
      ["C1", 9500002],
    ]);
    expect(store.tables.sales[0]).toMatchObject({
      accountId: CASH_PLACEHOLDER_ACCOUNT_ID,
      schoolId: null,
      itemType: "C",
      transactionCode: "C",
      approvalMethod: null,
    });
    expect(store.lockedScopes[0]).toEqual({
      placeholderAccountId: CASH_PLACEHOLDER_ACCOUNT_ID,
      lineDate: TEST_LINE_DATE,
      lineType: "L",
    });
  });

  it("TS-U-004b: family ids continue from earlier batches and are scoped by line type", async () => {
    seedCashPlaceholder(store);
    await service.submitBatch([cashItem(1, "C1")], contextFor(session));

    await service.submitBatch(
      [
        cashItem(2, "C2"),
        buildTransactionItem({
          syncKey: keyFor(session.id, 3),
          localId: 3,
          account: { kind: "cash", token: "C3" },
          mealType: "B",
        }),
      ],
      contextFor(session),
    );

    expect(store.tables.sales.map((s) => s.familyId)).toEqual([
      9500000, 9500001, 9500000,
    ]);
  });

  it("TS-U-005: a missing cash account fails only the cash items", async () => {
    // GIVEN: No placeholder account on the roster
    const roster = buildTransactionItem({ syncKey: keyFor(session.id, 1) });
    const cashA = cashItem(2, "C1");
    const cashB = cashItem(3, "C2");

    // WHEN: A mixed batch is uploaded
    const response = await service.submitBatch(
      [cashA, roster, cashB],
      contextFor(session),
    );

    // THEN: The roster sale commits, cash items fail with the warning
    expect(response).toEqual({
      success: true,
      results: [
        {
          localId: 2,
          syncKey: cashA.syncKey,
          serverId: null,
          success: false,
          error: "CASH_ACCOUNT_NOT_CONFIGURED",
          errorMessage: CASH_ERROR_MESSAGE,
        },
        {
          localId: 1,
          syncKey: roster.syncKey,
          serverId: store.tables.sales[0].id,
          success: true,
        },
        {
          localId: 3,
          syncKey: cashB.syncKey,
          serverId: null,
          success: false,
          error: "CASH_ACCOUNT_NOT_CONFIGURED",
          errorMessage: CASH_ERROR_MESSAGE,
        },
      ],
      warning: "CASH_ACCOUNT_NOT_CONFIGURED",
      warningMessage: CASH_ERROR_MESSAGE,
      cashTransactionsFailed: true,
    });
    expect(store.tables.sales).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      "[TransactionSync] Cash sales rejected in batch",
      { sessionId: session.id, failed: 2, total: 3 },
    );
  });

  it("TS-U-005b: failed cash items go through once the account exists", async () => {
    const item = cashItem(1, "C1");
    await service.submitBatch([item], contextFor(session));

    seedCashPlaceholder(store);
    const retry = await service.submitBatch([item], contextFor(session));

    expect(retry.results[0]).toMatchObject({ success: true });
    expect(retry.warning).toBeUndefined();
    expect(store.tables.sales[0].familyId).toBe(9500000);
  });

  it("TS-U-006: an unexpected storage fault rolls the whole batch back", async () => {
    const first = buildTransactionItem({ syncKey: keyFor(session.id, 1) });
    const second = buildTransactionItem({
      syncKey: keyFor(session.id, 2),
      localId: 2,
    });
    store.onSaleInsert((row) => {
      if (row.syncKey === second.syncKey) {
        throw new Error("disk full");
      }
    });

    await expect(
      service.submitBatch([first, second], contextFor(session)),
    ).rejects.toThrow("disk full");
    expect(store.tables.sales).toHaveLength(0);

    store.onSaleInsert(undefined);
    const retry = await service.submitBatch(
      [first, second],
      contextFor(session),
    );
    expect(retry.results.map((r) => r.duplicate)).toEqual([
      undefined,
      undefined,
    ]);
    expect(store.tables.sales).toHaveLength(2);
  });

  it("TS-U-007: concurrent cash batches receive distinct family ids", async () => {
    seedCashPlaceholder(store);
    const { session: other } = await createTestSession(store, {
      userId: 8,
      deviceId: "device-2",
    });
    const batchA = [1, 2, 3].map((n) => cashItem(n, `C${n}`));
    const batchB = [1, 2, 3].map((n) =>
      buildTransactionItem({
        syncKey: keyFor(other.id, n),
        localId: n,
        account: { kind: "cash", token: `C${n + 10}` },
      }),
    );

    await Promise.all([
      service.submitBatch(batchA, contextFor(session)),
      service.submitBatch(batchB, contextFor(other)),
    ]);

    const familyIds = store.tables.sales
      .map((s) => s.familyId)
      .sort((a, b) => (a ?? 0) - (b ?? 0));
    expect(familyIds).toEqual([
      9500000, 9500001, 9500002, 9500003, 9500004, 9500005,
    ]);
  });

  it("TS-U-009: new, duplicate and roster-miss items commit in one batch", async () => {
    // GIVEN: A roster account and one sale already synced
    store.seedAccount({ accountId: 1001, familyId: 300, schoolId: "EL1" });
    const stored = buildTransactionItem({
      syncKey: keyFor(session.id, 2),
      localId: 2,
    });
    const earlier = await service.submitBatch([stored], contextFor(session));
    const fresh = buildTransactionItem({ syncKey: keyFor(session.id, 1) });
    const unknown = buildTransactionItem({
      syncKey: keyFor(session.id, 3),
      localId: 3,
      account: { kind: "real", accountId: 2002 },
      familyId: 44,
    });

    // WHEN: One batch carries a new sale, the replay and an unknown account
    const response = await service.submitBatch(
      [fresh, stored, unknown],
      contextFor(session),
    );

    // THEN: Every item succeeds and the new rows are committed together
    const byKey = new Map(store.tables.sales.map((s) => [s.syncKey, s]));
    expect(response).toEqual({
      success: true,
      results: [
        {
          localId: 1,
          syncKey: fresh.syncKey,
          serverId: byKey.get(fresh.syncKey)?.id,
          success: true,
        },
        {
          localId: 2,
          syncKey: stored.syncKey,
          serverId: earlier.results[0].serverId,
          success: true,
          duplicate: true,
        },
        {
          localId: 3,
          syncKey: unknown.syncKey,
          serverId: byKey.get(unknown.syncKey)?.id,
          success: true,
        },
      ],
    });
    expect(store.tables.sales).toHaveLength(3);
    expect(byKey.get(fresh.syncKey)).toMatchObject({ familyId: 300 });
    expect(byKey.get(unknown.syncKey)).toMatchObject({
      accountId: 2002,
      familyId: 44,
    });
  });

  it("TS-U-010: a replay with a changed payload keeps the stored row", async () => {
    const syncKey = keyFor(session.id, 1);
    const first = await service.submitBatch(
      [buildTransactionItem({ syncKey, price: 2.75, itemId: 50 })],
      contextFor(session),
    );

    const replay = await service.submitBatch(
      [buildTransactionItem({ syncKey, price: 9.99, itemId: 51, localId: 8 })],
      contextFor(session),
    );

    expect(replay.results).toEqual([
      {
        localId: 8,
        syncKey,
        serverId: first.results[0].serverId,
        success: true,
        duplicate: true,
      },
    ]);
    expect(store.tables.sales).toHaveLength(1);
    expect(store.tables.sales[0]).toMatchObject({ price: 2.75, itemId: 50 });
  });

  describe("TS-U-008: classification and provenance", () => {
    beforeEach(() => {
      store.seedAccount({
        accountId: 1001,
        approvalMethod: "DC",
        approvalCode: "R",
      });
    });

    it("non-reimbursable sales carry no approval data", async () => {
      await service.submitBatch(
        [
          buildTransactionItem({
            syncKey: keyFor(session.id, 1),
            itemType: "M",
            transactionCode: "R",
          }),
        ],
        contextFor(session),
      );

      expect(store.tables.sales[0]).toMatchObject({
        itemType: "M",
        transactionCode: "R",
        approvalMethod: null,
        approvalCode: null,
      });
    });

    it("keeps the station's user and timestamp when sent", async () => {
      const at = new Date("2026-03-02T16:01:02Z");
      await service.submitBatch(
        [
          buildTransactionItem({
            syncKey: keyFor(session.id, 1),
            userId: 42,
            timestampUTC: at,
          }),
        ],
        contextFor(session),
      );

      expect(store.tables.sales[0].userId).toBe(42);
      expect(store.tables.sales[0].transactedAt).toEqual(at);
    });

    it("keys without provenance store no station session", async () => {
      await service.submitBatch(
        [buildTransactionItem({ syncKey: "offline-1" })],
        contextFor(session),
      );

      expect(store.tables.sales[0].stationSessionId).toBeNull();
    });

    it("bills under the catalog type when the station sends only an item type", async () => {
      // GIVEN: Catalog item 77 is a la carte
      store.seedMenuItem({ itemId: 77, itemType: "C", description: "Cookie" });

      // WHEN: The station labels it lunch and sends no billing code
      await service.submitBatch(
        [
          buildTransactionItem({
            syncKey: keyFor(session.id, 1),
            itemId: 77,
            itemType: "L",
            transactionCode: null,
          }),
        ],
        contextFor(session),
      );

      // THEN: The station's item type is kept, the code follows the catalog
      expect(store.tables.sales[0]).toMatchObject({
        itemType: "L",
        transactionCode: "C",
      });
    });

    it("unknown menu items default to a la carte", async () => {
      await service.submitBatch(
        [buildTransactionItem({ syncKey: keyFor(session.id, 1), itemId: 404 })],
        contextFor(session),
      );

      expect(store.tables.sales[0]).toMatchObject({
        itemType: "C",
        transactionCode: "C",
        approvalMethod: null,
      });
    });
  });
});
