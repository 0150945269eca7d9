// src/lib/psh/activeRateStore.ts
// Server-side process-wide rate table store, seeded from config on first use.

import { loadServerConfig, type ServerConfig } from "@/lib/config";
import { RateTableStore } from "./rateTableStore";

let active: RateTableStore | null = null;

/**
 * Get (or lazily create) the process-wide store.
 * A seed without its own effective_date takes PSH_RATE_EFFECTIVE_DATE.
 * A seed table that fails validation throws ConfigError and is retried on the next call;
 * the bundled defaults are never substituted for a broken seed.
 */
export function getActiveRateStore(config: ServerConfig = loadServerConfig()): RateTableStore {
  if (active) return active;

  const store = new RateTableStore(
    config.defaultEffectiveDate ? { effectiveDate: config.defaultEffectiveDate } : undefined,
  );
  if (config.seedRateTableJson) {
    store.importJson(config.seedRateTableJson, config.defaultEffectiveDate ?? undefined);
    console.log("[RATES] seeded rate table from PSH_RATE_TABLE_JSON", {
      version: store.current().version,
      effectiveDate: store.current().effectiveDate,
    });
  }

  active = store;
  return store;
}

/** Drop the process-wide store; the next getActiveRateStore() builds a fresh one. */
export function resetActiveRateStore(): void {
  active = null;
}
