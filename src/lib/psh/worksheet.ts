// /src/lib/psh/worksheet.ts
/**
 * Worksheet model for report exporters (spreadsheet, PDF, print view).
 *
 * Line numbers follow the PSH rent calculation worksheet. Exporters render `lines` in order,
 * then `warnings` verbatim, and give highlighted rows a distinct background:
 * - "fmr": rows that drive supervisor sign-off
 * - "mixed": mixed-family proration rows
 */

import type { CaseMetadata, ValidCalculationInput } from "@/contracts/household";
import { BEDROOM_SIZE_LABELS } from "@/contracts/rates";
import type { CalculationResult, WarningRecord } from "@/contracts/result";
import { formatPercent, formatUsdCompact } from "./money";

export type WorksheetHighlight = "fmr" | "mixed";

export type WorksheetLine = {
  line: number;
  label: string;
  value: string;
  highlight?: WorksheetHighlight;
};

export type Worksheet = {
  header: {
    headOfHousehold: string;
    staffName: string;
    calculationDate: string;
    supervisorName: string;
    supervisorDate: string;
    rateTableEffectiveDate: string;
  };
  lines: WorksheetLine[];
  warnings: readonly WarningRecord[];
};

export function buildWorksheet(
  input: ValidCalculationInput,
  result: CalculationResult,
  metadata: CaseMetadata = {},
): Worksheet {
  const { household, financial, family } = input;
  const fmrFlag: { highlight?: WorksheetHighlight } = result.exceedsFmr ? { highlight: "fmr" } : {};

  const lines: WorksheetLine[] = [
    { line: 1, label: "Voucher Size", value: BEDROOM_SIZE_LABELS[household.voucherBedroomSize] },
    { line: 2, label: "Unit Bedrooms", value: BEDROOM_SIZE_LABELS[household.unitBedrooms] },
    { line: 3, label: "FMR Bedroom Size Used", value: BEDROOM_SIZE_LABELS[result.applicableBedroomSize] },
    { line: 4, label: "Fair Market Rent", value: formatUsdCompact(result.applicableFmr) },
    { line: 5, label: "Payment Standard", value: formatUsdCompact(result.paymentStandard) },
    { line: 6, label: "Rent to Owner", value: formatUsdCompact(financial.rentToOwner) },
    { line: 7, label: "Utility Allowance", value: formatUsdCompact(financial.utilityAllowance) },
    { line: 8, label: "Gross Rent", value: formatUsdCompact(result.grossRent), ...fmrFlag },
    { line: 9, label: "Amount Above FMR", value: formatUsdCompact(result.amountAboveFmr), ...fmrFlag },
    { line: 10, label: "Total Tenant Payment", value: formatUsdCompact(result.effectiveTtp) },
    { line: 11, label: "Total HAP", value: formatUsdCompact(result.rawHap) },
    { line: 12, label: "HAP to Owner", value: formatUsdCompact(result.hapToOwner) },
    { line: 13, label: "Tenant Rent", value: formatUsdCompact(result.tenantRent) },
    { line: 14, label: "Utility Reimbursement", value: formatUsdCompact(result.utilityReimbursement) },
  ];

  if (result.isMixedFamily) {
    const mixed = { highlight: "mixed" as const };
    lines.push(
      { line: 15, label: "Eligible Members", value: String(family.eligibleMembers), ...mixed },
      { line: 16, label: "Total Members", value: String(result.totalMembers), ...mixed },
      { line: 17, label: "Prorate %", value: formatPercent(result.prorationPercentage ?? 0, 2), ...mixed },
      { line: 18, label: "Prorated HAP", value: formatUsdCompact(result.proratedHap ?? 0), ...mixed },
      {
        line: 19,
        label: "Mixed Family Tenant Rent",
        value: formatUsdCompact(result.mixedFamilyTenantRent ?? 0),
        ...mixed,
      },
    );
  }

  return {
    header: {
      headOfHousehold: household.headOfHouseholdName,
      staffName: metadata.staffName ?? "",
      calculationDate: metadata.calculationDate ?? "",
      supervisorName: metadata.supervisorName ?? "",
      supervisorDate: metadata.supervisorDate ?? "",
      rateTableEffectiveDate: result.rateTableEffectiveDate,
    },
    lines,
    warnings: result.warnings,
  };
}
