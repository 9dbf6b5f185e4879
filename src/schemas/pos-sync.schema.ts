/**
 * POS Sync Validation Schemas
 *
 * Zod schemas for every POS endpoint. Upload items are parsed straight into
 * the domain item types: account tokens become AccountRef values, codes are
 * upper-cased, and optional fields are normalized to null.
 *
 * Schemas that depend on deployment settings (cash code prefix, batch size)
 * come from createPosSyncSchemas.
 *
 * @module schemas/pos-sync.schema
 */

import { z } from "zod";
import type { SyncConfig } from "../config/sync.config";
import {
  ACCOUNT_TOKEN_MAX_LENGTH,
  DELETION_SOURCE_TABLES,
  MAX_MONEY_AMOUNT,
  MAX_RECORD_ID,
  PAYMENT_METHODS,
  SYNC_KEY_MAX_LENGTH,
} from "../constants/sync";
import type {
  DeletionSyncItem,
  PaymentSyncItem,
  SyncValidationRequest,
  TransactionSyncItem,
} from "../types/pos-sync.types";
import { parseAccountRef } from "../utils/account-ref";
import { isValidLineDate } from "../utils/timezone.utils";

// =============================================================================
// Base Schemas (Reusable)
// =============================================================================

/** Integer sent as a JSON number or a digit string (path params) */
const integerSchema = z.union([
  z.number().int("Must be an integer"),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Must be an integer")
    .transform(Number),
]);

const positiveIdSchema = integerSchema.pipe(
  z
    .number()
    .int()
    .positive("Must be a positive id")
    .max(MAX_RECORD_ID, `Cannot exceed ${MAX_RECORD_ID}`),
);

const numericSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(\.\d+)?$/, "Must be numeric")
      .transform(Number),
  ])
  .pipe(z.number().finite("Must be a finite number"));

/** numeric(10,2): at most 2 decimals, |value| <= 99999999.99 */
const moneySchema = numericSchema.pipe(
  z
    .number()
    .min(-MAX_MONEY_AMOUNT, `Cannot be less than -${MAX_MONEY_AMOUNT}`)
    .max(MAX_MONEY_AMOUNT, `Cannot exceed ${MAX_MONEY_AMOUNT}`)
    .refine(
      (value) => Math.round(value * 100) / 100 === value,
      "Cannot have more than 2 decimal places",
    ),
);

const syncKeySchema = z
  .string()
  .trim()
  .min(1, "Sync key is required")
  .max(SYNC_KEY_MAX_LENGTH, `Sync key cannot exceed ${SYNC_KEY_MAX_LENGTH} characters`);

export const lineDateSchema = z
  .string()
  .refine(isValidLineDate, "Must be a date in YYYY-MM-DD format");

export const mealTypeSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]$/, "Meal type must be a single letter")
  .transform((value) => value.toUpperCase());

export const lineNumSchema = integerSchema.pipe(
  z.number().int().min(0, "Line number cannot be negative").max(999),
);

const singleCodeSchema = z
  .string()
  .trim()
  .length(1, "Must be a single character")
  .transform((value) => value.toUpperCase());

const optionalIdSchema = integerSchema
  .pipe(
    z
      .number()
      .int()
      .min(-MAX_RECORD_ID - 1, `Cannot be less than ${-MAX_RECORD_ID - 1}`)
      .max(MAX_RECORD_ID, `Cannot exceed ${MAX_RECORD_ID}`),
  )
  .nullish();

const schoolCodeSchema = z.string().trim().max(16).nullish();

/** Non-numeric or out-of-range user ids fall back to the session user */
const userIdSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const id = typeof value === "number" ? value : Number(value.trim());
    return Number.isInteger(id) && id > 0 && id <= MAX_RECORD_ID ? id : null;
  });

const timestampSchema = z
  .string()
  .datetime({ offset: true, message: "Must be an ISO 8601 timestamp" })
  .nullish();

const cashTillSchema = z.record(z.string(), z.unknown()).nullish();

function toDate(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

function emptyToNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

// =============================================================================
// Upload Schemas
// =============================================================================

export interface PosSyncSchemaOptions {
  cashCodePrefix: SyncConfig["cashCodePrefix"];
  batchMaxItems: SyncConfig["batchMaxItems"];
}

export function createPosSyncSchemas(options: PosSyncSchemaOptions) {
  const accountRefSchema = z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .max(
          ACCOUNT_TOKEN_MAX_LENGTH,
          `Account token cannot exceed ${ACCOUNT_TOKEN_MAX_LENGTH} characters`,
        ),
    ])
    .transform((raw, ctx) => {
      const ref = parseAccountRef(raw, options.cashCodePrefix);
      if (!ref) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Must be a numeric account id or a cash code starting with "${options.cashCodePrefix}"`,
        });
        return z.NEVER;
      }
      return ref;
    });

  const itemBaseShape = {
    syncKey: syncKeySchema,
    localId: z.number().int("localId must be an integer"),
    userId: userIdSchema,
    studentId: accountRefSchema,
    familyId: optionalIdSchema,
    schoolCode: schoolCodeSchema,
    lineDate: lineDateSchema,
    mealType: mealTypeSchema,
    lineNum: lineNumSchema,
    timestampUTC: timestampSchema,
  };

  const transactionItemSchema = z
    .object({
      ...itemBaseShape,
      itemId: positiveIdSchema,
      price: moneySchema,
      transactionCode: singleCodeSchema.nullish(),
      itemType: singleCodeSchema.nullish(),
    })
    .transform(
      (raw): TransactionSyncItem => ({
        syncKey: raw.syncKey,
        localId: raw.localId,
        userId: raw.userId,
        account: raw.studentId,
        familyId: raw.familyId ?? null,
        schoolCode: emptyToNull(raw.schoolCode),
        lineDate: raw.lineDate,
        mealType: raw.mealType,
        lineNum: raw.lineNum,
        timestampUTC: toDate(raw.timestampUTC),
        itemId: raw.itemId,
        price: raw.price,
        transactionCode: raw.transactionCode ?? null,
        itemType: raw.itemType ?? null,
      }),
    );

  const paymentItemSchema = z
    .object({
      ...itemBaseShape,
      paymentType: z
        .string()
        .trim()
        .transform((value) => value.toUpperCase())
        .pipe(z.enum(PAYMENT_METHODS)),
      amount: moneySchema,
      memo: z.string().max(255).nullish(),
      checkNumber: z
        .union([z.string().trim().max(32), z.number().int().transform(String)])
        .nullish(),
    })
    .transform(
      (raw): PaymentSyncItem => ({
        syncKey: raw.syncKey,
        localId: raw.localId,
        userId: raw.userId,
        account: raw.studentId,
        familyId: raw.familyId ?? null,
        schoolCode: emptyToNull(raw.schoolCode),
        lineDate: raw.lineDate,
        mealType: raw.mealType,
        lineNum: raw.lineNum,
        timestampUTC: toDate(raw.timestampUTC),
        paymentType: raw.paymentType,
        amount: raw.amount,
        memo: emptyToNull(raw.memo),
        checkNumber: emptyToNull(raw.checkNumber),
      }),
    );

  const deletionItemSchema = z.object({
    syncKey: syncKeySchema,
    originalSyncKey: syncKeySchema,
    tableName: z.enum(DELETION_SOURCE_TABLES),
    localId: z.number().int("localId must be an integer"),
  }) satisfies z.ZodType<DeletionSyncItem>;

  const batchOf = <T extends z.ZodTypeAny>(item: T, noun: string) =>
    z
      .array(item)
      .min(1, `At least one ${noun} is required`)
      .max(
        options.batchMaxItems,
        `Cannot sync more than ${options.batchMaxItems} ${noun}s at once`,
      );

  return {
    transactionBatch: z.object({
      transactions: batchOf(transactionItemSchema, "transaction"),
    }),
    paymentBatch: z.object({
      payments: batchOf(paymentItemSchema, "payment"),
    }),
    deletionBatch: z.object({
      deletions: batchOf(deletionItemSchema, "deletion"),
    }),
  };
}

// =============================================================================
// Sync Validation
// =============================================================================

export const syncValidationSchema = z
  .object({
    studentId: positiveIdSchema,
    lineDate: lineDateSchema,
    mealType: mealTypeSchema,
    mode: z.enum(["count", "full"]).default("count"),
    transactionCount: z.number().int().min(0).default(0),
    paymentCount: z.number().int().min(0).default(0),
    transactionSyncKeys: z.array(syncKeySchema).max(10000).default([]),
    paymentSyncKeys: z.array(syncKeySchema).max(10000).default([]),
  })
  .transform(
    (raw): SyncValidationRequest => ({
      accountId: raw.studentId,
      lineDate: raw.lineDate,
      mealType: raw.mealType,
      mode: raw.mode,
      transactionCount: raw.transactionCount,
      paymentCount: raw.paymentCount,
      transactionSyncKeys: raw.transactionSyncKeys,
      paymentSyncKeys: raw.paymentSyncKeys,
    }),
  );

// =============================================================================
// Line Logs, Sessions, Activity
// =============================================================================

export const lineParamsSchema = z.object({
  mealType: mealTypeSchema,
  lineNum: lineNumSchema,
});

export const openLineBodySchema = z
  .object({
    lineDate: lineDateSchema.optional(),
    startCash: cashTillSchema,
  })
  .default({});

export const lineLogParamsSchema = z.object({
  lineLogId: positiveIdSchema,
});

export const closeLineBodySchema = z
  .object({
    endCash: cashTillSchema,
  })
  .default({});

export const sessionParamsSchema = z.object({
  sessionId: positiveIdSchema,
});

export const sessionSyncStatusSchema = z.object({
  status: z.enum(["syncing", "synced"]),
});

export const accountActivityParamsSchema = z.object({
  accountId: positiveIdSchema,
});

export const accountActivityQuerySchema = z.object({
  lineDate: lineDateSchema,
  mealType: mealTypeSchema,
});
