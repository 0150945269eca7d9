// src/lib/psh/validate.test.ts
import { describe, it, expect } from "vitest";

import { MAX_AMOUNT } from "@/contracts/household";

import { validate } from "./validate";

const valid = {
  household: { headOfHouseholdName: "  Pat Example ", voucherBedroomSize: 2, unitBedrooms: 3 },
  financial: { rentToOwner: 1800, utilityAllowance: 125.5, totalTenantPayment: 0 },
  family: { eligibleMembers: 3, ineligibleMembers: 0 },
};

describe("validate", () => {
  it("accepts a complete input and trims the name", () => {
    const outcome = validate(valid);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.household.headOfHouseholdName).toBe("Pat Example");
    expect(outcome.value.financial).toEqual({ rentToOwner: 1800, utilityAllowance: 125.5, totalTenantPayment: 0 });
  });

  it("accepts a TTP below $50 (floored later, not rejected)", () => {
    const outcome = validate({ ...valid, financial: { ...valid.financial, totalTenantPayment: 20 } });
    expect(outcome.ok).toBe(true);
  });

  it("reports every violation at once, in field order", () => {
    const outcome = validate({
      household: { headOfHouseholdName: "   ", voucherBedroomSize: 6, unitBedrooms: -1 },
      financial: { rentToOwner: 0, utilityAllowance: -5, totalTenantPayment: -1 },
      family: { eligibleMembers: 0, ineligibleMembers: 0 },
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map((e) => [e.code, e.field])).toEqual([
      ["MISSING_FIELD", "household.headOfHouseholdName"],
      ["OUT_OF_RANGE", "household.voucherBedroomSize"],
      ["OUT_OF_RANGE", "household.unitBedrooms"],
      ["INVALID_AMOUNT", "financial.rentToOwner"],
      ["INVALID_AMOUNT", "financial.utilityAllowance"],
      ["INVALID_AMOUNT", "financial.totalTenantPayment"],
      ["INVALID_FAMILY_COMPOSITION", "family.totalMembers"],
    ]);
    expect(outcome.errors[0]?.message).toBe("Head of household name is required");
    expect(outcome.errors[6]?.message).toBe("Household must have at least one member");
  });

  it("rejects fractional bedroom sizes as out of range", () => {
    const outcome = validate({ ...valid, household: { ...valid.household, unitBedrooms: 1.5 } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors).toEqual([
      {
        code: "OUT_OF_RANGE",
        field: "household.unitBedrooms",
        message: "Unit bedrooms must be a whole number from 0 to 5",
      },
    ]);
  });

  it("maps wrong types to the field's code", () => {
    const outcome = validate({
      ...valid,
      financial: { ...valid.financial, rentToOwner: "abc" },
      family: { eligibleMembers: null, ineligibleMembers: 0 },
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors).toEqual([
      { code: "INVALID_AMOUNT", field: "financial.rentToOwner", message: "Rent to owner must be a number" },
      {
        code: "INVALID_FAMILY_COMPOSITION",
        field: "family.eligibleMembers",
        message: "Eligible members must be a number",
      },
    ]);
  });

  it("reports a bad member count once, without a second total-members issue", () => {
    const outcome = validate({ ...valid, family: { eligibleMembers: 1, ineligibleMembers: -1 } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map((e) => e.field)).toEqual(["family.ineligibleMembers"]);
    expect(outcome.errors[0]?.code).toBe("INVALID_FAMILY_COMPOSITION");
  });

  it("rejects non-finite amounts", () => {
    const outcome = validate({ ...valid, financial: { ...valid.financial, utilityAllowance: Infinity } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors[0]?.code).toBe("INVALID_AMOUNT");
  });

  it("treats a missing section as a missing field", () => {
    const outcome = validate({ household: valid.household, family: valid.family });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map((e) => [e.code, e.field])).toEqual([["MISSING_FIELD", "financial"]]);
  });

  it("caps amounts so they stay exact in cents", () => {
    const outcome = validate({
      ...valid,
      financial: { rentToOwner: 1e308, utilityAllowance: 1e17, totalTenantPayment: 300 },
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors).toEqual([
      {
        code: "INVALID_AMOUNT",
        field: "financial.rentToOwner",
        message: "Rent to owner must be $10,000,000 or less",
      },
      {
        code: "INVALID_AMOUNT",
        field: "financial.utilityAllowance",
        message: "Utility allowance must be $10,000,000 or less",
      },
    ]);
  });

  it("accepts the largest allowed amount", () => {
    const outcome = validate({ ...valid, financial: { ...valid.financial, rentToOwner: MAX_AMOUNT } });
    expect(outcome.ok).toBe(true);
  });

  it("rejects fractions of a cent instead of rounding them", () => {
    const outcome = validate({ ...valid, financial: { ...valid.financial, rentToOwner: 1.005 } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors).toEqual([
      { code: "INVALID_AMOUNT", field: "financial.rentToOwner", message: "Rent to owner must be in whole cents" },
    ]);
  });

  it("reports one issue per amount even when it breaks several rules", () => {
    const outcome = validate({ ...valid, financial: { ...valid.financial, utilityAllowance: -0.001 } });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.errors.map((e) => e.message)).toEqual(["Utility allowance cannot be negative"]);
  });
});
