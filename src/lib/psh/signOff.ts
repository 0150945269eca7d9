// src/lib/psh/signOff.ts
import type { CaseMetadata } from "@/contracts/household";
import type { CalculationResult } from "@/contracts/result";

export type SignOffStatus = {
  /** Gross rent exceeds FMR, so a supervisor must approve. */
  required: boolean;
  satisfied: boolean;
  /** Metadata fields still needed, e.g. ["supervisorName"]. */
  missing: string[];
};

export function checkSupervisorSignOff(result: CalculationResult, metadata: CaseMetadata = {}): SignOffStatus {
  if (!result.exceedsFmr) {
    return { required: false, satisfied: true, missing: [] };
  }

  const missing: string[] = [];
  if (!metadata.supervisorName?.trim()) missing.push("supervisorName");

  return { required: true, satisfied: missing.length === 0, missing };
}
