// /src/contracts/result.ts
/**
 * Subsidy determination contract (engine output).
 *
 * All currency fields are dollars with at most two decimal places.
 * Results are frozen by the engine; presentation and export layers must not mutate them.
 */

import type { BedroomSize } from "./rates";

export type WarningSeverity = "info" | "caution" | "blocking";

export type WarningCode = "FMR_EXCEEDED" | "MIXED_FAMILY_PRORATION" | "TTP_FLOORED";

export interface WarningRecord {
  severity: WarningSeverity;
  code: WarningCode;
  message: string;
}

export interface CalculationResult {
  grossRent: number;
  effectiveTtp: number;
  /** gross rent minus effective TTP, before the zero floor. Negative when TTP exceeds gross rent. */
  rawHap: number;
  /** Unprorated HAP. */
  hapToOwner: number;
  tenantRent: number;
  utilityReimbursement: number;

  /** Present for mixed families only. */
  proratedHap?: number;
  /** eligible / total, in [0, 1]. Present for mixed families only. */
  prorationPercentage?: number;
  /** Present for mixed families only: rent to owner less prorated HAP. */
  mixedFamilyTenantRent?: number;
  /** The HAP figure to report: prorated for mixed families, otherwise hapToOwner. */
  reportedHap: number;

  applicableBedroomSize: BedroomSize;
  applicableFmr: number;
  paymentStandard: number;
  /** max(0, grossRent - applicableFmr) */
  amountAboveFmr: number;
  exceedsFmr: boolean;

  isMixedFamily: boolean;
  totalMembers: number;
  /** True when the entered TTP was below the $50 minimum. */
  ttpFloored: boolean;

  rateTableVersion: number;
  rateTableEffectiveDate: string;

  warnings: readonly WarningRecord[];
}
