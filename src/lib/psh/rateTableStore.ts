// src/lib/psh/rateTableStore.ts
// Holder of the active rate table. Copy-on-write: every write builds and validates a new
// frozen snapshot and swaps the reference, so a calculation holding a snapshot never sees
// a half-edited table.

import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  BEDROOM_SIZES,
  EffectiveDateSchema,
  isBedroomSize,
  parseBedroomKey,
  type BedroomSize,
  type FmrRateTable,
  type RateRecord,
} from "@/contracts/rates";
import { ConfigError } from "./errors";
import {
  DEFAULT_EFFECTIVE_DATE,
  DEFAULT_RATES,
  createRateTable,
  defaultPaymentStandard,
} from "./rateTables";

export type RateTableListener = (table: FmrRateTable) => void;

export type RateTableStoreOptions = {
  initial?: Partial<Record<BedroomSize, RateRecord>>;
  effectiveDate?: string;
  /** Used for imports that do not carry their own effective date. Defaults to today (UTC). */
  today?: () => string;
};

/** Settings file layout: { effective_date, fmr_data: { "0": { payment_standard, fmr } | number } } */
const SettingsRateSchema = z.union([
  z.number(),
  z.object({ payment_standard: z.number().optional(), fmr: z.number() }),
]);

const SettingsFileSchema = z.object({
  effective_date: EffectiveDateSchema.optional(),
  fmr_data: z.record(z.string(), SettingsRateSchema),
});

export class RateTableStore {
  private snapshot: FmrRateTable;
  private readonly listeners = new Set<RateTableListener>();
  private readonly today: () => string;

  constructor(opts?: RateTableStoreOptions) {
    this.today = opts?.today ?? todayIso;
    this.snapshot = createRateTable(opts?.initial ?? DEFAULT_RATES, {
      effectiveDate: checkEffectiveDate(opts?.effectiveDate ?? DEFAULT_EFFECTIVE_DATE),
      version: 1,
    });
  }

  /** Current snapshot. Read once per calculation. */
  current(): FmrRateTable {
    return this.snapshot;
  }

  /** Replace the whole table. Nothing changes if the candidate is incomplete or invalid. */
  replace(rates: Partial<Record<BedroomSize, RateRecord>>, effectiveDate?: string): FmrRateTable {
    return this.commit(rates, effectiveDate ?? this.snapshot.effectiveDate);
  }

  resetToDefault(): FmrRateTable {
    return this.commit(DEFAULT_RATES, DEFAULT_EFFECTIVE_DATE);
  }

  /** Edit one bedroom size; the rest of the table is carried over. */
  updateEntry(size: number, rate: RateRecord): FmrRateTable {
    if (!isBedroomSize(size)) {
      throw new ConfigError("MISSING_RATE", `Bedroom size ${size} is outside 0-5`);
    }
    return this.commit({ ...this.snapshot.rates, [size]: rate }, this.snapshot.effectiveDate);
  }

  /**
   * Import `bedrooms,payment_standard,fmr` CSV (header required, one row per size).
   * A row without payment_standard gets 110% of its FMR.
   */
  importCsv(text: string, effectiveDate?: string): FmrRateTable {
    const rates = parseRateCsv(text);
    return this.commit(rates, effectiveDate ?? this.today());
  }

  /**
   * Import a settings JSON document (see SettingsFileSchema).
   * A document without effective_date takes `fallbackEffectiveDate`, else today.
   */
  importJson(text: string, fallbackEffectiveDate?: string): FmrRateTable {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ConfigError("INVALID_RATE_VALUE", "Rate settings file is not valid JSON");
    }

    const parsed = SettingsFileSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? ` at ${first.path.join(".") || "(root)"}: ${first.message}` : "";
      throw new ConfigError("INVALID_RATE_VALUE", `Invalid rate settings file${where}`);
    }

    const rates: Partial<Record<BedroomSize, RateRecord>> = {};
    for (const [key, value] of Object.entries(parsed.data.fmr_data)) {
      const size = parseBedroomKey(key);
      if (size === null) continue;
      rates[size] =
        typeof value === "number"
          ? { paymentStandard: defaultPaymentStandard(value), fmr: value }
          : { paymentStandard: value.payment_standard ?? defaultPaymentStandard(value.fmr), fmr: value.fmr };
    }

    return this.commit(rates, parsed.data.effective_date ?? fallbackEffectiveDate ?? this.today());
  }

  /** Settings JSON for the current snapshot; round-trips through importJson. */
  exportJson(): string {
    const table = this.snapshot;
    const fmr_data: Record<string, { payment_standard: number; fmr: number }> = {};
    for (const size of BEDROOM_SIZES) {
      const r = table.rates[size];
      fmr_data[String(size)] = { payment_standard: r.paymentStandard, fmr: r.fmr };
    }
    return JSON.stringify({ effective_date: table.effectiveDate, fmr_data }, null, 2);
  }

  subscribe(listener: RateTableListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(rates: Partial<Record<BedroomSize, RateRecord>>, effectiveDate: string): FmrRateTable {
    const next = createRateTable(rates, {
      effectiveDate: checkEffectiveDate(effectiveDate),
      version: this.snapshot.version + 1,
    });
    this.snapshot = next;
    for (const listener of this.listeners) listener(next);
    return next;
  }
}

/* ---------------- CSV ---------------- */

const CsvRowsSchema = z.array(z.record(z.string(), z.string()));

export function parseRateCsv(text: string): Partial<Record<BedroomSize, RateRecord>> {
  let header: string[] = [];
  let raw: unknown;
  try {
    raw = parse(text, {
      columns: (names: string[]) => {
        header = names.map((h) => h.trim().toLowerCase());
        return header;
      },
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError("INVALID_RATE_VALUE", `Rate CSV could not be read: ${reason}`);
  }

  if (header.length === 0) {
    throw new ConfigError("MISSING_RATE", "Rate CSV is empty");
  }
  if (!header.includes("bedrooms") || !header.includes("fmr")) {
    throw new ConfigError("INVALID_RATE_VALUE", "Rate CSV header must include bedrooms and fmr columns");
  }

  const rows = CsvRowsSchema.safeParse(raw);
  if (!rows.success) {
    throw new ConfigError("INVALID_RATE_VALUE", "Rate CSV rows could not be read");
  }

  const rates: Partial<Record<BedroomSize, RateRecord>> = {};
  const seen = new Set<BedroomSize>();
  rows.data.forEach((row, idx) => {
    // header is line 1
    const rowNo = idx + 2;

    const size = parseCsvNumber(row["bedrooms"]);
    if (size === null || !isBedroomSize(size)) {
      throw new ConfigError("INVALID_RATE_VALUE", `Rate CSV row ${rowNo}: bedrooms must be 0-5`);
    }
    if (seen.has(size)) {
      throw new ConfigError("INVALID_RATE_VALUE", `Rate CSV row ${rowNo}: duplicate row for ${size} bedrooms`);
    }
    seen.add(size);

    const fmr = parseCsvNumber(row["fmr"]);
    if (fmr === null) {
      throw new ConfigError("INVALID_RATE_VALUE", `Rate CSV row ${rowNo}: fmr is not a number`);
    }

    const ps = parseCsvNumber(row["payment_standard"]);
    rates[size] = { paymentStandard: ps ?? defaultPaymentStandard(fmr), fmr };
  });

  return rates;
}

/** "$2,485" -> 2485; blank -> null */
function parseCsvNumber(cell: string | undefined): number | null {
  const s = String(cell ?? "").replace(/[$,_\s]/g, "");
  if (s.length === 0) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function checkEffectiveDate(date: string): string {
  if (!EffectiveDateSchema.safeParse(date).success) {
    throw new ConfigError("INVALID_RATE_VALUE", `Invalid effective date: ${date}`);
  }
  return date;
}

function todayIso(): string {
  return new Date().toISOString().slice(0, 10);
}
