/**
 * POS Sync Constants
 *
 * Item classifications, billing codes and error codes shared by the sync
 * engines, the route layer and the station client contract.
 *
 * Item type codes (single character, as printed on the line):
 * - L: Lunch, B: Breakfast, A: After-school snack, X: Extra meal
 * - C: A la carte, M: Milk, G: Guest, S: Staff
 */

// Reimbursable meal classifications carry subsidy approval provenance
export const REIMBURSABLE_ITEM_TYPES: ReadonlySet<string> = new Set([
  "L",
  "B",
  "A",
  "X",
]);

// Catch-all classification when neither client nor catalog supply one
export const A_LA_CARTE_ITEM_TYPE = "C";

// Billing code stamped on cash sales when the client sends none
export const CASH_TRANSACTION_CODE = "C";

// Memo column width used by downstream reporting
export const CHECK_MEMO_PREFIX = "CHK ";
export const CHECK_MEMO_MAX_CHARS = 14;
export const CASH_MEMO_SUFFIX = " CASH";

export const SYNC_KEY_MAX_LENGTH = 64;

// Storage column limits: int4 ids, varchar(32) tokens, numeric(10,2) money
export const MAX_RECORD_ID = 2147483647;
export const ACCOUNT_TOKEN_MAX_LENGTH = 32;
export const MAX_MONEY_AMOUNT = 99999999.99;

// Capability prefix for line abilities (line:L10, line:*)
export const LINE_ABILITY_PREFIX = "line:";
export const WILDCARD_ABILITY_SUFFIX = ":*";

export const PAYMENT_METHODS = ["CASH", "CHECK"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const DELETION_SOURCE_TABLES = ["transactions", "payments"] as const;
export type DeletionSourceTable = (typeof DELETION_SOURCE_TABLES)[number];

/**
 * Machine-readable error codes returned by the POS API
 */
export const SyncErrorCode = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  UNAUTHORIZED: "UNAUTHORIZED",
  LINE_NOT_PERMITTED: "LINE_NOT_PERMITTED",
  CASH_ACCOUNT_NOT_CONFIGURED: "CASH_ACCOUNT_NOT_CONFIGURED",
  SYNC_BATCH_FAILED: "SYNC_BATCH_FAILED",
  LINE_LOG_NOT_FOUND: "LINE_LOG_NOT_FOUND",
  LINE_LOG_CLOSED: "LINE_LOG_CLOSED",
  LINE_LOG_NOT_OPEN: "LINE_LOG_NOT_OPEN",
  LINE_LOG_NOT_READY: "LINE_LOG_NOT_READY",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  STATION_MISMATCH: "STATION_MISMATCH",
  INVALID_SESSION_TRANSITION: "INVALID_SESSION_TRANSITION",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type SyncErrorCode = (typeof SyncErrorCode)[keyof typeof SyncErrorCode];
