// src/lib/ui/types.ts

/** Raw form values as a desktop or web form collects them (strings from inputs, numbers from selects). */
export type UiCalculatorFormState = {
  headOfHouseholdName: string;

  voucherBedroomSize: string | number;
  unitBedrooms: string | number;

  rentToOwner: string | number;
  utilityAllowance: string | number;
  /** Blank means the $50 minimum. */
  totalTenantPayment?: string | number | null;

  eligibleMembers: string | number;
  ineligibleMembers?: string | number | null;
};
