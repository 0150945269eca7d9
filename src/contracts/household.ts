// /src/contracts/household.ts
/**
 * Calculation input contract.
 *
 * Every field carries its own check so that a single parse reports every bad field.
 * Custom issues carry `params.code` (a ValidationErrorCode); plain type errors are
 * mapped to a code by field in lib/psh/validate.ts.
 */

import { z } from "zod";
import { isBedroomSize, type BedroomSize } from "./rates";
import type { ValidationErrorCode } from "./errors";

function withCode(message: string, code: ValidationErrorCode) {
  return { message, params: { code } };
}

/** Largest accepted dollar amount on any money field. */
export const MAX_AMOUNT = 10_000_000;

function hasCentPrecision(n: number): boolean {
  return Math.round(n * 100) / 100 === n;
}

const bedroomSize = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number`, required_error: `${label} is required` })
    .refine(
      (n): n is BedroomSize => isBedroomSize(n),
      withCode(`${label} must be a whole number from 0 to 5`, "OUT_OF_RANGE"),
    );

// One issue per field: the first rule the amount breaks.
const amount = (label: string, check: (n: number) => boolean, rule: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number`, required_error: `${label} is required` })
    .superRefine((n, ctx) => {
      let problem: string | null = null;
      if (!Number.isFinite(n)) problem = `${label} must be a number`;
      else if (!check(n)) problem = `${label} ${rule}`;
      else if (n > MAX_AMOUNT) problem = `${label} must be $${MAX_AMOUNT.toLocaleString("en-US")} or less`;
      else if (!hasCentPrecision(n)) problem = `${label} must be in whole cents`;

      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, ...withCode(problem, "INVALID_AMOUNT") });
      }
    });

const memberCount = (label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number`, required_error: `${label} is required` })
    .refine(
      (n) => Number.isInteger(n) && n >= 0,
      withCode(`${label} must be a whole number of 0 or more`, "INVALID_FAMILY_COMPOSITION"),
    );

export const HouseholdInputSchema = z.object({
  headOfHouseholdName: z
    .string({ invalid_type_error: "Head of household name is required", required_error: "Head of household name is required" })
    .refine((s) => s.trim().length > 0, withCode("Head of household name is required", "MISSING_FIELD"))
    .transform((s) => s.trim()),
  voucherBedroomSize: bedroomSize("Voucher bedroom size"),
  unitBedrooms: bedroomSize("Unit bedrooms"),
});

export const FinancialInputSchema = z.object({
  rentToOwner: amount("Rent to owner", (n) => n > 0, "must be greater than $0"),
  utilityAllowance: amount("Utility allowance", (n) => n >= 0, "cannot be negative"),
  totalTenantPayment: amount("Total tenant payment", (n) => n >= 0, "cannot be negative"),
});

export const FamilyCompositionSchema = z
  .object({
    eligibleMembers: memberCount("Eligible members"),
    ineligibleMembers: memberCount("Ineligible members"),
  })
  .superRefine((family, ctx) => {
    // a bad count already carries its own issue
    const countsValid = [family.eligibleMembers, family.ineligibleMembers].every(
      (n) => Number.isInteger(n) && n >= 0,
    );
    if (countsValid && family.eligibleMembers + family.ineligibleMembers === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["totalMembers"],
        ...withCode("Household must have at least one member", "INVALID_FAMILY_COMPOSITION"),
      });
    }
  });

export const CalculationInputSchema = z.object({
  household: HouseholdInputSchema,
  financial: FinancialInputSchema,
  family: FamilyCompositionSchema,
});

/** Raw shape a caller supplies. */
export type CalculationInput = z.input<typeof CalculationInputSchema>;

/** Shape produced by validate(): name trimmed, amounts in whole cents up to MAX_AMOUNT. */
export type ValidCalculationInput = z.output<typeof CalculationInputSchema>;

export type HouseholdInput = ValidCalculationInput["household"];
export type FinancialInput = ValidCalculationInput["financial"];
export type FamilyComposition = ValidCalculationInput["family"];

/**
 * Worksheet header fields. Carried through to reports; never affects amounts.
 */
export const CaseMetadataSchema = z
  .object({
    staffName: z.string().trim().optional(),
    calculationDate: z.string().trim().optional(),
    supervisorName: z.string().trim().optional(),
    supervisorDate: z.string().trim().optional(),
  })
  .strict();

export type CaseMetadata = z.infer<typeof CaseMetadataSchema>;
