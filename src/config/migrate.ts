import { defaultConfig } from "./index";

export const CURRENT_SCHEMA_VERSION = 1;

type RawConfig = Record<string, unknown>;

// Each entry upgrades a file from version `from` to `from + 1`.
const MIGRATIONS: Array<{ from: number; apply: (config: RawConfig) => void }> = [
  {
    from: 0,
    apply: (config) => {
      // Unversioned files kept the resume path at the top level.
      if (typeof config.resumePath === "string" && config.resume === undefined) {
        config.resume = { path: config.resumePath };
      }
      delete config.resumePath;
    },
  },
];

export function migrateConfig(raw: unknown): { config: unknown; changed: boolean } {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return { config: { ...defaultConfig(), schemaVersion: CURRENT_SCHEMA_VERSION }, changed: true };
  }

  const config: RawConfig = { ...raw };
  const startVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : 0;
  let version = startVersion;
  for (const migration of MIGRATIONS) {
    if (migration.from === version) {
      migration.apply(config);
      version += 1;
    }
  }

  config.schemaVersion = CURRENT_SCHEMA_VERSION;
  return { config, changed: startVersion !== CURRENT_SCHEMA_VERSION };
}
