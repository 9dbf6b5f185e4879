/**
 * Account token parsing.
 *
 * Stations send the buyer as either a numeric roster id or a cash code
 * (marker prefix followed by anything, e.g. "C12"). The token is turned into
 * an AccountRef once, at the request boundary.
 *
 * @module utils/account-ref
 */

import { ACCOUNT_TOKEN_MAX_LENGTH, MAX_RECORD_ID } from "../constants/sync";
import type { AccountRef } from "../types/pos-sync.types";

const NUMERIC_TOKEN = /^\d+$/;

export function isCashToken(token: string, cashPrefix: string): boolean {
  return token.trim().toUpperCase().startsWith(cashPrefix.toUpperCase());
}

function isRecordId(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_RECORD_ID;
}

/**
 * Returns null when the token is neither a roster id nor a cash code that
 * fits the stored token column.
 * Cash tokens are upper-cased so "c12" and "C12" are the same customer.
 */
export function parseAccountRef(
  raw: string | number,
  cashPrefix: string,
): AccountRef | null {
  if (typeof raw === "number") {
    return isRecordId(raw) ? { kind: "real", accountId: raw } : null;
  }

  const token = raw.trim();
  if (NUMERIC_TOKEN.test(token)) {
    const accountId = Number(token);
    return isRecordId(accountId) ? { kind: "real", accountId } : null;
  }

  if (
    token.length > 0 &&
    token.length <= ACCOUNT_TOKEN_MAX_LENGTH &&
    isCashToken(token, cashPrefix)
  ) {
    return { kind: "cash", token: token.toUpperCase() };
  }

  return null;
}

/**
 * The raw token as stored on sale and payment rows
 */
export function accountTokenOf(ref: AccountRef): string {
  switch (ref.kind) {
    case "real":
      return String(ref.accountId);
    case "cash":
      return ref.token;
  }
}
