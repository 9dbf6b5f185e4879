/**
 * Billing Identity Unit Tests
 *
 * Pure resolution of who a sale bills, how it is classified and when
 * approval provenance travels with it.
 *
 * @test-level Unit
 * @justification Pure functions - no storage or I/O
 */

import { describe, it, expect } from "vitest";
import {
  approvalFor,
  cashBillingIdentity,
  classifySale,
  isReimbursableItemType,
  resolveBillingIdentity,
} from "../../src/services/billing-identity";
import type { AccountLookup } from "../../src/types/pos-sync.types";

const rosterAccount: AccountLookup = {
  accountId: 1001,
  legacyId: 501,
  familyId: 300,
  schoolId: "EL1",
  status: "A",
  approvalMethod: "DC",
  approvalCode: "F",
};

describe("resolveBillingIdentity", () => {
  it("BI-U-001: uses roster data when the account is known", () => {
    const identity = resolveBillingIdentity(rosterAccount, {
      accountId: 1001,
      familyId: 999,
      schoolCode: "ZZZ",
    });

    expect(identity).toEqual({
      accountId: 1001,
      familyId: 300,
      schoolId: "EL1",
      approvalMethod: "DC",
      approvalCode: "F",
      source: "roster",
    });
  });

  it("BI-U-002: fills null roster fields from the station hints", () => {
    const identity = resolveBillingIdentity(
      { ...rosterAccount, familyId: null, schoolId: null },
      { accountId: 1001, familyId: 12, schoolCode: "MS2" },
    );

    expect(identity.familyId).toBe(12);
    expect(identity.schoolId).toBe("MS2");
    expect(identity.source).toBe("roster");
  });

  it("BI-U-003: falls back to hints without approval data on a roster miss", () => {
    // GIVEN: The server's roster copy does not know the account yet
    // WHEN: Resolving with the station's hints
    const identity = resolveBillingIdentity(undefined, {
      accountId: 2002,
      familyId: 44,
      schoolCode: "HS1",
    });

    // THEN: The sale still bills, approval provenance is unknown
    expect(identity).toEqual({
      accountId: 2002,
      familyId: 44,
      schoolId: "HS1",
      approvalMethod: null,
      approvalCode: null,
      source: "client_hint",
    });
  });

  it("BI-U-004: cash identity bills the placeholder with the given family id and no school", () => {
    const placeholder: AccountLookup = {
      ...rosterAccount,
      accountId: 900,
      schoolId: "CASH",
    };

    expect(cashBillingIdentity(placeholder, 9500003)).toEqual({
      accountId: 900,
      familyId: 9500003,
      schoolId: null,
      approvalMethod: null,
      approvalCode: null,
      source: "cash_placeholder",
    });
  });
});

describe("approval provenance", () => {
  const identity = resolveBillingIdentity(rosterAccount, {
    accountId: 1001,
    familyId: null,
    schoolCode: null,
  });

  it.each(["L", "B", "A", "X"])(
    "BI-U-005: reimbursable type %s carries approval data",
    (itemType) => {
      expect(isReimbursableItemType(itemType)).toBe(true);
      expect(approvalFor(identity, itemType)).toEqual({
        approvalMethod: "DC",
        approvalCode: "F",
      });
    },
  );

  it.each(["C", "M", "G", "S"])(
    "BI-U-006: non-reimbursable type %s carries none",
    (itemType) => {
      expect(isReimbursableItemType(itemType)).toBe(false);
      expect(approvalFor(identity, itemType)).toEqual({
        approvalMethod: null,
        approvalCode: null,
      });
    },
  );
});

describe("classifySale", () => {
  it("BI-U-007: station values win over the catalog", () => {
    expect(
      classifySale({
        clientItemType: "B",
        clientTransactionCode: "R",
        catalogItemType: "L",
        isCash: false,
      }),
    ).toEqual({ itemType: "B", transactionCode: "R" });
  });

  it("BI-U-008: catalog type is used when the station sends none", () => {
    expect(
      classifySale({
        clientItemType: null,
        clientTransactionCode: null,
        catalogItemType: "L",
        isCash: false,
      }),
    ).toEqual({ itemType: "L", transactionCode: "L" });
  });

  it("BI-U-009: defaults to a la carte", () => {
    expect(
      classifySale({
        clientItemType: null,
        clientTransactionCode: null,
        catalogItemType: null,
        isCash: false,
      }),
    ).toEqual({ itemType: "C", transactionCode: "C" });
  });

  it("BI-U-010: cash sales bill under the cash code unless the station says otherwise", () => {
    expect(
      classifySale({
        clientItemType: "L",
        clientTransactionCode: null,
        catalogItemType: null,
        isCash: true,
      }),
    ).toEqual({ itemType: "L", transactionCode: "C" });

    expect(
      classifySale({
        clientItemType: "L",
        clientTransactionCode: "P",
        catalogItemType: null,
        isCash: true,
      }),
    ).toEqual({ itemType: "L", transactionCode: "P" });
  });

  it("BI-U-011: the billing code comes from the catalog, not the station's item type", () => {
    // GIVEN: The station tags an a la carte catalog item as lunch, with no code
    const input = {
      clientItemType: "L",
      clientTransactionCode: null,
      catalogItemType: "C",
      isCash: false,
    };

    // WHEN: The sale is classified
    const result = classifySale(input);

    // THEN: The item type is the station's, the code is the catalog's
    expect(result).toEqual({ itemType: "L", transactionCode: "C" });
  });

  it("BI-U-012: without a catalog entry the billing code is a la carte", () => {
    expect(
      classifySale({
        clientItemType: "B",
        clientTransactionCode: null,
        catalogItemType: null,
        isCash: false,
      }),
    ).toEqual({ itemType: "B", transactionCode: "C" });
  });
});
