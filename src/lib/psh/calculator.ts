// /src/lib/psh/calculator.ts
// PSH subsidy determination (deterministic; no I/O; no shared state).

import type { ValidCalculationInput } from "@/contracts/household";
import type { FmrRateTable } from "@/contracts/rates";
import type { CalculationResult } from "@/contracts/result";
import { fromCents, maxCents, minCents, mulDivRoundHalfUp, toCents } from "./money";
import { applicableBedroomSize, resolveRate } from "./rateResolver";
import { assertValid } from "./validate";
import { buildWarnings } from "./warnings";

/** Minimum Total Tenant Payment. Enforced, not advisory. */
export const MIN_TTP = 50;

/**
 * Compute HAP, tenant rent and utility reimbursement for a validated input against one
 * rate table snapshot.
 *
 * Order of operations:
 * 1. gross rent = rent to owner + utility allowance
 * 2. effective TTP = max(TTP, $50)
 * 3. raw HAP = gross rent - effective TTP (may be negative)
 * 4. negative raw HAP: HAP 0, tenant pays gross rent, excess TTP returned as utility
 *    reimbursement up to the utility allowance; otherwise HAP = raw HAP, tenant pays TTP
 * 5. mixed family: HAP prorated by eligible / total, rounded half-up to the cent
 * 6. FMR check on the lesser of voucher and unit size (strictly greater flags it)
 *
 * Throws ConfigError when the table lacks a usable entry for the applicable size.
 */
export function calculate(input: ValidCalculationInput, table: FmrRateTable): CalculationResult {
  const { household, financial, family } = input;

  const size = applicableBedroomSize(household.voucherBedroomSize, household.unitBedrooms);
  const rate = resolveRate(table, size);

  const rentToOwner = toCents(financial.rentToOwner);
  const utilityAllowance = toCents(financial.utilityAllowance);
  const enteredTtp = toCents(financial.totalTenantPayment);
  const minTtp = toCents(MIN_TTP);

  const grossRent = rentToOwner + utilityAllowance;
  const effectiveTtp = maxCents(enteredTtp, minTtp);
  const rawHap = grossRent - effectiveTtp;

  let hapToOwner: number;
  let tenantRent: number;
  let utilityReimbursement: number;
  if (rawHap < 0) {
    hapToOwner = 0;
    tenantRent = grossRent;
    utilityReimbursement = minCents(utilityAllowance, maxCents(0, effectiveTtp - grossRent));
  } else {
    hapToOwner = rawHap;
    tenantRent = effectiveTtp;
    utilityReimbursement = 0;
  }

  const totalMembers = family.eligibleMembers + family.ineligibleMembers;
  const isMixedFamily = family.ineligibleMembers > 0;

  let proratedHap: number | undefined;
  let prorationPercentage: number | undefined;
  let mixedFamilyTenantRent: number | undefined;
  if (isMixedFamily) {
    prorationPercentage = family.eligibleMembers / totalMembers;
    proratedHap = mulDivRoundHalfUp(hapToOwner, family.eligibleMembers, totalMembers);
    mixedFamilyTenantRent = rentToOwner - proratedHap;
  }

  const fmr = toCents(rate.fmr);
  const exceedsFmr = grossRent > fmr;
  const amountAboveFmr = maxCents(0, grossRent - fmr);

  const warnings = buildWarnings({
    exceedsFmr,
    grossRent: fromCents(grossRent),
    applicableFmr: fromCents(fmr),
    amountAboveFmr: fromCents(amountAboveFmr),
    applicableBedroomSize: size,
    isMixedFamily,
    eligibleMembers: family.eligibleMembers,
    totalMembers,
    hapToOwner: fromCents(hapToOwner),
    ...(prorationPercentage !== undefined ? { prorationPercentage } : {}),
    ...(proratedHap !== undefined ? { proratedHap: fromCents(proratedHap) } : {}),
    ttpFloored: enteredTtp < minTtp,
    enteredTtp: fromCents(enteredTtp),
    minimumTtp: MIN_TTP,
  });

  const result: CalculationResult = {
    grossRent: fromCents(grossRent),
    effectiveTtp: fromCents(effectiveTtp),
    rawHap: fromCents(rawHap),
    hapToOwner: fromCents(hapToOwner),
    tenantRent: fromCents(tenantRent),
    utilityReimbursement: fromCents(utilityReimbursement),
    // Do not set the mixed-family fields to undefined; omit them.
    ...(proratedHap !== undefined ? { proratedHap: fromCents(proratedHap) } : {}),
    ...(prorationPercentage !== undefined ? { prorationPercentage } : {}),
    ...(mixedFamilyTenantRent !== undefined ? { mixedFamilyTenantRent: fromCents(mixedFamilyTenantRent) } : {}),
    reportedHap: fromCents(proratedHap ?? hapToOwner),
    applicableBedroomSize: size,
    applicableFmr: fromCents(fmr),
    paymentStandard: rate.paymentStandard,
    amountAboveFmr: fromCents(amountAboveFmr),
    exceedsFmr,
    isMixedFamily,
    totalMembers,
    ttpFloored: enteredTtp < minTtp,
    rateTableVersion: table.version,
    rateTableEffectiveDate: table.effectiveDate,
    warnings: Object.freeze(warnings.map((w) => Object.freeze(w))),
  };

  return Object.freeze(result);
}

/**
 * validate() then calculate(). Throws ValidationError with every issue when the input is bad.
 */
export function calculateFromInput(input: unknown, table: FmrRateTable): CalculationResult {
  return calculate(assertValid(input), table);
}
