// /src/contracts/rates.ts
/**
 * FMR rate table contract.
 *
 * Bedroom sizes are 0 (studio) through 5 ("5+"). Every size must have an entry.
 * Amounts are in dollars; the engine converts to cents internally.
 */

import { z } from "zod";

export const BEDROOM_SIZES = [0, 1, 2, 3, 4, 5] as const;

export type BedroomSize = typeof BEDROOM_SIZES[number];

export const MAX_BEDROOM_SIZE: BedroomSize = 5;

export const BEDROOM_SIZE_LABELS: Readonly<Record<BedroomSize, string>> = {
  0: "Studio",
  1: "1 BR",
  2: "2 BR",
  3: "3 BR",
  4: "4 BR",
  5: "5+ BR",
};

export function isBedroomSize(v: unknown): v is BedroomSize {
  return typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= MAX_BEDROOM_SIZE;
}

/** Bedroom size from an object key or CSV cell label: exactly "0".."5". */
export function parseBedroomKey(key: string): BedroomSize | null {
  if (!/^[0-5]$/.test(key)) return null;
  const size = Number(key);
  return isBedroomSize(size) ? size : null;
}

export const RateRecordSchema = z
  .object({
    paymentStandard: z.number().finite().min(0),
    fmr: z.number().finite().min(0),
  })
  .strict();

export type RateRecord = z.infer<typeof RateRecordSchema>;

export type FmrRates = Readonly<Record<BedroomSize, Readonly<RateRecord>>>;

/** ISO calendar date, e.g. 2025-01-01. */
export const EffectiveDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

/**
 * Immutable snapshot of the active rate table.
 * `version` increases on every replacement so results can be traced to the table that produced them.
 */
export interface FmrRateTable {
  readonly version: number;
  readonly effectiveDate: string;
  readonly rates: FmrRates;
}

/** Single-entry edit payload (admin form). */
export const RateEntryUpdateSchema = z
  .object({
    bedroomSize: z.number().int().min(0).max(MAX_BEDROOM_SIZE),
    paymentStandard: z.number().finite().min(0),
    fmr: z.number().finite().min(0),
  })
  .strict();

export type RateEntryUpdate = z.infer<typeof RateEntryUpdateSchema>;

/** Whole-table replacement payload. Keys are bedroom sizes as strings ("0".."5"). */
export const RateTableReplaceSchema = z
  .object({
    rates: z.record(z.string(), RateRecordSchema),
    effectiveDate: EffectiveDateSchema.optional(),
  })
  .strict();

export type RateTableReplace = z.infer<typeof RateTableReplaceSchema>;
