/**
 * Billing identity and sale classification.
 *
 * Pure functions: no storage access, so every rule here is tested directly.
 *
 * @module services/billing-identity
 */

import {
  A_LA_CARTE_ITEM_TYPE,
  CASH_TRANSACTION_CODE,
  REIMBURSABLE_ITEM_TYPES,
} from "../constants/sync";
import type {
  AccountLookup,
  BillingIdentity,
} from "../types/pos-sync.types";

/**
 * What the station knew about the buyer when it recorded the item
 */
export interface ClientIdentityHints {
  accountId: number;
  familyId: number | null;
  schoolCode: string | null;
}

/**
 * Roster data when the account is known, otherwise the station's hints.
 * Never fails: a sale recorded at the line is kept even when the server's
 * roster copy is behind.
 */
export function resolveBillingIdentity(
  lookup: AccountLookup | undefined,
  hints: ClientIdentityHints,
): BillingIdentity {
  if (!lookup) {
    return {
      accountId: hints.accountId,
      familyId: hints.familyId,
      schoolId: hints.schoolCode,
      approvalMethod: null,
      approvalCode: null,
      source: "client_hint",
    };
  }

  return {
    accountId: lookup.accountId,
    familyId: lookup.familyId ?? hints.familyId,
    schoolId: lookup.schoolId ?? hints.schoolCode,
    approvalMethod: lookup.approvalMethod,
    approvalCode: lookup.approvalCode,
    source: "roster",
  };
}

/**
 * Anonymous cash customers belong to no school, whatever the placeholder
 * account's roster row says.
 */
export function cashBillingIdentity(
  placeholder: AccountLookup,
  familyId: number | null,
): BillingIdentity {
  return {
    accountId: placeholder.accountId,
    familyId,
    schoolId: null,
    approvalMethod: null,
    approvalCode: null,
    source: "cash_placeholder",
  };
}

export function isReimbursableItemType(itemType: string): boolean {
  return REIMBURSABLE_ITEM_TYPES.has(itemType);
}

/**
 * Approval provenance only travels with reimbursable meals
 */
export function approvalFor(
  identity: BillingIdentity,
  itemType: string,
): { approvalMethod: string | null; approvalCode: string | null } {
  if (!isReimbursableItemType(itemType)) {
    return { approvalMethod: null, approvalCode: null };
  }
  return {
    approvalMethod: identity.approvalMethod,
    approvalCode: identity.approvalCode,
  };
}

export interface SaleClassificationInput {
  clientItemType: string | null;
  clientTransactionCode: string | null;
  catalogItemType: string | null;
  isCash: boolean;
}

export interface SaleClassification {
  itemType: string;
  transactionCode: string;
}

/**
 * Station values win (its menu state is what the cashier saw), then the
 * catalog, then a la carte. The billing code never comes from the station's
 * item type: without a station code it is the cash code for cash sales,
 * otherwise the catalog type.
 */
export function classifySale(
  input: SaleClassificationInput,
): SaleClassification {
  const itemType =
    input.clientItemType ?? input.catalogItemType ?? A_LA_CARTE_ITEM_TYPE;

  const transactionCode =
    input.clientTransactionCode ??
    (input.isCash
      ? CASH_TRANSACTION_CODE
      : input.catalogItemType ?? A_LA_CARTE_ITEM_TYPE);

  return { itemType, transactionCode };
}
