/**
 * Account Activity Service
 *
 * What an account bought and paid on one line day, across every station.
 * Each entry says whether another station recorded it, read from the
 * session id embedded in its sync key.
 *
 * @module services/account-activity.service
 */

import type {
  AccountActivity,
  StationAttribution,
  StationSession,
} from "../types/pos-sync.types";
import type { PosStore } from "../types/store.types";
import { sessionIdFromSyncKey } from "../utils/sync-key";

export interface AccountActivityQuery {
  accountId: number;
  lineDate: string;
  mealType: string;
}

export function attributeToStation(
  syncKey: string,
  sessionStations: ReadonlyMap<number, number>,
  callerStationId: number,
): StationAttribution {
  const stationSessionId = sessionIdFromSyncKey(syncKey);
  const stationId =
    stationSessionId === null ? undefined : sessionStations.get(stationSessionId);

  if (stationId === undefined) {
    return { stationSessionId, isOtherStation: false, stationLabel: "Unknown" };
  }

  const isOtherStation = stationId !== callerStationId;
  return {
    stationSessionId,
    isOtherStation,
    stationLabel: isOtherStation ? `St${stationId}` : "This Station",
  };
}

export class AccountActivityService {
  constructor(private readonly store: PosStore) {}

  async getActivity(
    query: AccountActivityQuery,
    caller: StationSession,
  ): Promise<AccountActivity> {
    const filter = {
      accountId: query.accountId,
      lineDate: query.lineDate,
      lineType: query.mealType,
    };
    const [sales, payments] = await Promise.all([
      this.store.listSaleRecords(filter),
      this.store.listPaymentRecords(filter),
    ]);

    const sessionIds = new Set<number>();
    for (const { syncKey } of [...sales, ...payments]) {
      const sessionId = sessionIdFromSyncKey(syncKey);
      if (sessionId !== null) {
        sessionIds.add(sessionId);
      }
    }

    const [sessions, items] = await Promise.all([
      this.store.listSessions([...sessionIds]),
      this.store.listMenuItems([...new Set(sales.map((s) => s.itemId))]),
    ]);
    const sessionStations = new Map(sessions.map((s) => [s.id, s.stationId]));
    const descriptions = new Map(items.map((i) => [i.itemId, i.description]));

    return {
      ...query,
      transactions: sales.map((sale) => ({
        id: sale.id,
        syncKey: sale.syncKey,
        itemId: sale.itemId,
        itemDescription: descriptions.get(sale.itemId) ?? null,
        itemType: sale.itemType,
        transactionCode: sale.transactionCode,
        price: sale.price,
        lineNum: sale.lineNum,
        transactedAt: sale.transactedAt.toISOString(),
        ...attributeToStation(sale.syncKey, sessionStations, caller.stationId),
      })),
      payments: payments.map((payment) => ({
        id: payment.id,
        syncKey: payment.syncKey,
        paymentType: payment.paymentType,
        amount: payment.amount,
        memo: payment.memo,
        lineNum: payment.lineNum,
        paidAt: payment.paidAt.toISOString(),
        ...attributeToStation(
          payment.syncKey,
          sessionStations,
          caller.stationId,
        ),
      })),
    };
  }
}
