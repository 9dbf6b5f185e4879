/**
 * Payment memo encoding.
 *
 * Downstream reporting reads these memos by position, so the format is
 * fixed:
 * - check: "CHK " + first 14 chars of the memo (or legacy check number)
 * - cash:  "{mealType}{lineNum mod 10} CASH", e.g. "L0 CASH" for line 10
 *
 * @module utils/payment-memo
 */

import {
  CASH_MEMO_SUFFIX,
  CHECK_MEMO_MAX_CHARS,
  CHECK_MEMO_PREFIX,
  type PaymentMethod,
} from "../constants/sync";

export interface PaymentMemoInput {
  paymentType: PaymentMethod;
  memo: string | null;
  checkNumber: string | null;
  mealType: string;
  lineNum: number;
}

export function encodePaymentMemo(input: PaymentMemoInput): string {
  if (input.paymentType === "CHECK") {
    const source = input.memo ?? input.checkNumber ?? "";
    return CHECK_MEMO_PREFIX + source.slice(0, CHECK_MEMO_MAX_CHARS);
  }

  return `${input.mealType}${input.lineNum % 10}${CASH_MEMO_SUFFIX}`;
}
