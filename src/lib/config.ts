// src/lib/config.ts
// Server configuration from environment variables.

export type ServerConfig = {
  /** Shared secret for rate table writes. Writes are refused when unset. */
  adminToken: string | null;
  /** Optional settings-file JSON used to seed the active rate table at startup. */
  seedRateTableJson: string | null;
  /** Effective date for the bundled default table when no seed is given. */
  defaultEffectiveDate: string | null;
};

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string): string | null {
  const v = env[name];
  if (!v || v.trim().length === 0) return null;
  return v.trim();
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    adminToken: optionalEnv(env, "PSH_ADMIN_TOKEN"),
    seedRateTableJson: optionalEnv(env, "PSH_RATE_TABLE_JSON"),
    defaultEffectiveDate: optionalEnv(env, "PSH_RATE_EFFECTIVE_DATE"),
  };
}
