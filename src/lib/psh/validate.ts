// src/lib/psh/validate.ts
import { z } from "zod";
import {
  CalculationInputSchema,
  type ValidCalculationInput,
} from "@/contracts/household";
import {
  isValidationErrorCode,
  type ValidationErrorCode,
  type ValidationIssue,
} from "@/contracts/errors";
import { ValidationError } from "./errors";

export type ValidationOk = { ok: true; value: ValidCalculationInput };
export type ValidationErr = { ok: false; errors: ValidationIssue[] };
export type ValidationOutcome = ValidationOk | ValidationErr;

/**
 * Code used when zod rejects a field before its own rule runs
 * (wrong type, missing key). Keyed by the last path segment.
 */
const FIELD_FALLBACK_CODES: Readonly<Record<string, ValidationErrorCode>> = {
  headOfHouseholdName: "MISSING_FIELD",
  voucherBedroomSize: "OUT_OF_RANGE",
  unitBedrooms: "OUT_OF_RANGE",
  rentToOwner: "INVALID_AMOUNT",
  utilityAllowance: "INVALID_AMOUNT",
  totalTenantPayment: "INVALID_AMOUNT",
  eligibleMembers: "INVALID_FAMILY_COMPOSITION",
  ineligibleMembers: "INVALID_FAMILY_COMPOSITION",
  totalMembers: "INVALID_FAMILY_COMPOSITION",
};

/**
 * Pure check of a raw calculation input. Reports every violation at once so the
 * presentation layer can highlight all bad fields in one pass.
 */
export function validate(input: unknown): ValidationOutcome {
  const parsed = CalculationInputSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, errors: parsed.error.issues.map(toValidationIssue) };
}

/** validate(), throwing a ValidationError that carries every issue. */
export function assertValid(input: unknown): ValidCalculationInput {
  const outcome = validate(input);
  if (!outcome.ok) throw new ValidationError(outcome.errors);
  return outcome.value;
}

function toValidationIssue(issue: z.ZodIssue): ValidationIssue {
  return {
    code: issueCode(issue),
    field: issue.path.join("."),
    message: issue.message,
  };
}

function issueCode(issue: z.ZodIssue): ValidationErrorCode {
  if (issue.code === z.ZodIssueCode.custom) {
    const code: unknown = issue.params?.code;
    if (isValidationErrorCode(code)) return code;
  }

  const last = issue.path[issue.path.length - 1];
  if (typeof last === "string") {
    const fallback = FIELD_FALLBACK_CODES[last];
    if (fallback) return fallback;
  }

  // A whole section is missing or the wrong type (e.g. `financial: null`).
  return "MISSING_FIELD";
}
