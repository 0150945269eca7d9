// src/lib/psh/warnings.ts
import type { BedroomSize } from "@/contracts/rates";
import type { WarningRecord } from "@/contracts/result";
import { formatPercent, formatUsdCompact } from "./money";

export type WarningFacts = {
  exceedsFmr: boolean;
  grossRent: number;
  applicableFmr: number;
  amountAboveFmr: number;
  applicableBedroomSize: BedroomSize;

  isMixedFamily: boolean;
  eligibleMembers: number;
  totalMembers: number;
  prorationPercentage?: number;
  hapToOwner: number;
  proratedHap?: number;

  ttpFloored: boolean;
  enteredTtp: number;
  minimumTtp: number;
};

/**
 * Fixed order: FMR violation, mixed-family proration, TTP floor.
 * None of these stop the calculation; FMR_EXCEEDED requires supervisor sign-off.
 */
export function buildWarnings(f: WarningFacts): WarningRecord[] {
  const warnings: WarningRecord[] = [];

  if (f.exceedsFmr) {
    warnings.push({
      severity: "blocking",
      code: "FMR_EXCEEDED",
      message:
        `Gross rent ${formatUsdCompact(f.grossRent)} exceeds the ${f.applicableBedroomSize}-bedroom FMR ` +
        `${formatUsdCompact(f.applicableFmr)} by ${formatUsdCompact(f.amountAboveFmr)}. Supervisor approval required.`,
    });
  }

  if (f.isMixedFamily) {
    const pct = formatPercent(f.prorationPercentage ?? 0);
    warnings.push({
      severity: "caution",
      code: "MIXED_FAMILY_PRORATION",
      message:
        `Mixed family: ${f.eligibleMembers} of ${f.totalMembers} members eligible. ` +
        `HAP prorated at ${pct} (${formatUsdCompact(f.hapToOwner)} to ${formatUsdCompact(f.proratedHap ?? 0)}).`,
    });
  }

  if (f.ttpFloored) {
    warnings.push({
      severity: "info",
      code: "TTP_FLOORED",
      message: `TTP floored to ${formatUsdCompact(f.minimumTtp)} (entered ${formatUsdCompact(f.enteredTtp)}).`,
    });
  }

  return warnings;
}
