// src/lib/ui/formMapper.ts
import type { ValidCalculationInput } from "@/contracts";
import type { ValidationIssue } from "@/contracts/errors";
import { validate } from "@/lib/psh/validate";
import type { UiCalculatorFormState } from "./types";

export type FormMapperOk = {
  ok: true;
  input: ValidCalculationInput;
};

export type FormMapperErr = {
  ok: false;
  /** One entry per bad field, keyed by form field name for inline highlighting. */
  issues: Array<ValidationIssue & { formField: keyof UiCalculatorFormState | null }>;
};

const DEFAULT_TTP = 50;

export function mapFormToCalculationInput(ui: UiCalculatorFormState): FormMapperOk | FormMapperErr {
  const ttp = toMoney(ui.totalTenantPayment);

  const candidate: unknown = {
    household: {
      headOfHouseholdName: String(ui.headOfHouseholdName ?? ""),
      voucherBedroomSize: toInt(ui.voucherBedroomSize),
      unitBedrooms: toInt(ui.unitBedrooms),
    },
    financial: {
      rentToOwner: toMoney(ui.rentToOwner),
      utilityAllowance: toMoney(ui.utilityAllowance),
      totalTenantPayment: ttp === null && isBlank(ui.totalTenantPayment) ? DEFAULT_TTP : ttp,
    },
    family: {
      eligibleMembers: toInt(ui.eligibleMembers),
      // an empty ineligible box means nobody is ineligible
      ineligibleMembers: isBlank(ui.ineligibleMembers) ? 0 : toInt(ui.ineligibleMembers),
    },
  };

  const outcome = validate(candidate);
  if (outcome.ok) {
    return { ok: true, input: outcome.value };
  }

  return {
    ok: false,
    issues: outcome.errors.map((e) => ({ ...e, formField: toFormField(e.field) })),
  };
}

/* ---------------- helpers ---------------- */

const FORM_FIELDS: ReadonlyArray<keyof UiCalculatorFormState> = [
  "headOfHouseholdName",
  "voucherBedroomSize",
  "unitBedrooms",
  "rentToOwner",
  "utilityAllowance",
  "totalTenantPayment",
  "eligibleMembers",
  "ineligibleMembers",
];

function toFormField(path: string): keyof UiCalculatorFormState | null {
  const last = path.split(".").pop() ?? "";
  // "family.totalMembers" has no box of its own; highlight the eligible count
  if (last === "totalMembers") return "eligibleMembers";
  return FORM_FIELDS.find((f) => f === last) ?? null;
}

function isBlank(v: unknown): boolean {
  return v === null || v === undefined || String(v).trim().length === 0;
}

/** Whole numbers only; "2.5" stays 2.5 so validation rejects it. */
function toInt(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (isBlank(v)) return null;
  const n = Number(String(v).replace(/[,_\s]/g, ""));
  return Number.isFinite(n) ? n : null;
}

/** "$1,850.25" -> 1850.25. Sub-cent input is left as typed so validation rejects it. */
function toMoney(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (isBlank(v)) return null;
  const n = Number(String(v).replace(/[$,_\s]/g, ""));
  return Number.isFinite(n) ? n : null;
}
