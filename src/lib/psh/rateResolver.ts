// src/lib/psh/rateResolver.ts
import type { BedroomSize, FmrRateTable, RateRecord } from "@/contracts/rates";
import { ConfigError } from "./errors";
import { checkRateRecord } from "./rateTables";

/** The lesser of voucher size and unit size governs which rate applies. */
export function applicableBedroomSize(voucherBedroomSize: BedroomSize, unitBedrooms: BedroomSize): BedroomSize {
  return voucherBedroomSize < unitBedrooms ? voucherBedroomSize : unitBedrooms;
}

/**
 * Look up the rate for a bedroom size.
 * A complete table always has one, but imported or hand-edited tables are checked anyway.
 */
export function resolveRate(table: FmrRateTable, size: BedroomSize): RateRecord {
  const record: Readonly<RateRecord> | undefined = table.rates[size];
  if (!record) {
    throw new ConfigError("MISSING_RATE", `Rate table has no entry for ${size}-bedroom units`);
  }
  checkRateRecord(size, record);
  return { paymentStandard: record.paymentStandard, fmr: record.fmr };
}
