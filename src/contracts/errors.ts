// src/contracts/errors.ts

/** User-correctable input problems. Reported per field, all at once. */
export const VALIDATION_ERROR_CODES = [
  "MISSING_FIELD",
  "INVALID_AMOUNT",
  "OUT_OF_RANGE",
  "INVALID_FAMILY_COMPOSITION",
] as const;

export type ValidationErrorCode = typeof VALIDATION_ERROR_CODES[number];

/** Rate table problems. Shown as a setup problem, never defaulted. */
export const CONFIG_ERROR_CODES = ["MISSING_RATE", "INVALID_RATE_VALUE"] as const;

export type ConfigErrorCode = typeof CONFIG_ERROR_CODES[number];

export function isValidationErrorCode(v: unknown): v is ValidationErrorCode {
  return typeof v === "string" && VALIDATION_ERROR_CODES.some((code) => code === v);
}

export interface ValidationIssue {
  code: ValidationErrorCode;
  /** Dotted path of the offending field, e.g. "financial.rentToOwner". */
  field: string;
  message: string;
}
