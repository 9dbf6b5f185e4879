/**
 * Cash Customer Resolver
 *
 * Anonymous walk-up buyers are rung up under a cash code ("C", "C12", ...).
 * Their sales bill a single placeholder roster account, and each sale gets a
 * synthetic family id so a later cash payment can be matched to it.
 *
 * One resolver is created per upload batch. The placeholder lookup result
 * (found or missing) is kept on that instance, so a batch of fifty cash sales
 * queries the roster once and a missing account fails each of them with the
 * same error without touching unrelated items.
 *
 * @module services/cash-customer.service
 */

import type { SyncConfig } from "../config/sync.config";
import { SyncErrorCode } from "../constants/sync";
import type { AccountLookup } from "../types/pos-sync.types";
import type { CashFamilyScope, PosStore } from "../types/store.types";
import { isCashToken } from "../utils/account-ref";

export class CashAccountNotConfiguredError extends Error {
  readonly code = SyncErrorCode.CASH_ACCOUNT_NOT_CONFIGURED;

  constructor(readonly legacyId: number) {
    super(
      `Cash placeholder account (legacy id ${legacyId}) is not configured. Cash sales cannot be billed until an administrator creates it.`,
    );
    this.name = "CashAccountNotConfiguredError";
  }
}

type PlaceholderLookup =
  | { status: "resolved"; account: AccountLookup }
  | { status: "missing"; error: CashAccountNotConfiguredError };

export type CashResolverConfig = Pick<
  SyncConfig,
  "cashAccountLegacyId" | "cashFamilyIdFloor" | "cashCodePrefix"
>;

export class CashCustomerResolver {
  private placeholder: PlaceholderLookup | undefined;

  constructor(
    private readonly store: PosStore,
    private readonly config: CashResolverConfig,
  ) {}

  isCashToken(token: string): boolean {
    return isCashToken(token, this.config.cashCodePrefix);
  }

  /**
   * @throws CashAccountNotConfiguredError
   */
  async resolveCashAccount(): Promise<AccountLookup> {
    if (!this.placeholder) {
      const account = await this.store.findAccountByLegacyId(
        this.config.cashAccountLegacyId,
      );
      this.placeholder = account
        ? { status: "resolved", account }
        : {
            status: "missing",
            error: new CashAccountNotConfiguredError(
              this.config.cashAccountLegacyId,
            ),
          };

      if (!account) {
        console.error(
          `[CashCustomer] Placeholder account with legacy id ${this.config.cashAccountLegacyId} not found`,
        );
      }
    }

    if (this.placeholder.status === "missing") {
      throw this.placeholder.error;
    }
    return this.placeholder.account;
  }

  /**
   * Next free synthetic family id in the (date, line type) scope: the
   * highest id allocated so far plus one, or the floor. The scope stays
   * locked until the surrounding transaction ends, so concurrent batches
   * queue here instead of reading the same max.
   *
   * @throws CashAccountNotConfiguredError
   */
  async nextSyntheticFamilyId(
    lineDate: string,
    lineType: string,
  ): Promise<number> {
    const scope = await this.scopeFor(lineDate, lineType);
    await this.store.lockCashFamilyScope(scope);

    const current = await this.store.maxCashFamilyId(
      scope,
      this.config.cashFamilyIdFloor,
    );
    return current === undefined ? this.config.cashFamilyIdFloor : current + 1;
  }

  /**
   * Family id of the latest cash sale rung up under the same token in the
   * scope, or null when the customer bought nothing (yet) on this server.
   *
   * @throws CashAccountNotConfiguredError
   */
  async findSaleFamilyId(
    token: string,
    lineDate: string,
    lineType: string,
  ): Promise<number | null> {
    const scope = await this.scopeFor(lineDate, lineType);
    const familyId = await this.store.findLatestCashSaleFamilyId(scope, token);
    return familyId ?? null;
  }

  private async scopeFor(
    lineDate: string,
    lineType: string,
  ): Promise<CashFamilyScope> {
    const account = await this.resolveCashAccount();
    return { placeholderAccountId: account.accountId, lineDate, lineType };
  }
}
