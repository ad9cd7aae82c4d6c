import fs from "fs";
import os from "os";
import path from "path";
import { ConfigError, errorMessage } from "../core/errors";
import type { ResumeAsset, SkillEntry, UserProfile } from "../types/context";
import type { SourceConfig } from "../types/jobs";
import { validateConfig } from "./validate";
import { migrateConfig } from "./migrate";

export interface SearchConfig {
  windows: string[];
  limit: number;
  titles: string[];
  locations: string[];
  excludeCompanies: string[];
  excludeKeywords: string[];
  sources: SourceConfig[];
  sourcePriority: string[];
  remoteOnly: boolean;
}

export interface AutomationConfig {
  maxRetries: number;
  concurrency: number;
  discoveryConcurrency: number;
  backoffMs: number;
  maxBackoffMs: number;
  navigationTimeoutMs: number;
  deadlineMinutes?: number;
  templateThreshold: number;
  templateScales: number[];
  cooldownMs: number;
}

export interface ScoringConfig {
  recencyHalflifeHours: number;
  boosts: {
    title: number;
    location: number;
  };
  vocabulary: SkillEntry[];
}

export interface AppConfig {
  schemaVersion: number;
  app: {
    dataDir: string;
    recordsPath: string;
    assetsDir: string;
    templatesDir: string;
    textCacheDir: string;
    headless: boolean;
    slowMoMs: number;
    maxApplicationsPerRun: number;
    retentionDays: number;
  };
  profile: UserProfile;
  resume: ResumeAsset;
  search: SearchConfig;
  automation: AutomationConfig;
  scoring: ScoringConfig;
}

export function defaultDataDir(): string {
  return path.join(os.homedir(), ".hireloop");
}

export function defaultConfig(dataDir = defaultDataDir()): AppConfig {
  return {
    schemaVersion: 1,
    app: {
      dataDir,
      recordsPath: path.join(dataDir, "applications.json"),
      assetsDir: path.join(dataDir, "assets"),
      templatesDir: path.join(dataDir, "templates"),
      textCacheDir: path.join(dataDir, "cache", "resume-text"),
      headless: false,
      slowMoMs: 200,
      maxApplicationsPerRun: 25,
      retentionDays: 90,
    },
    profile: {
      fullName: "",
      email: "",
      phone: "",
      skills: [],
    },
    resume: {
      path: "",
    },
    search: {
      windows: ["24h", "3d", "7d"],
      limit: 25,
      titles: [],
      locations: [],
      excludeCompanies: [],
      excludeKeywords: [],
      sources: [{ type: "remotive" }],
      sourcePriority: ["greenhouse", "lever", "remotive"],
      remoteOnly: false,
    },
    automation: {
      maxRetries: 3,
      concurrency: 1,
      discoveryConcurrency: 4,
      backoffMs: 500,
      maxBackoffMs: 8000,
      navigationTimeoutMs: 30000,
      templateThreshold: 0.8,
      templateScales: [0.9, 1, 1.1],
      cooldownMs: 1000,
    },
    scoring: {
      recencyHalflifeHours: 72,
      boosts: {
        title: 1.2,
        location: 1.1,
      },
      vocabulary: [],
    },
  };
}

export function configPath(): string {
  return process.env.HIRELOOP_CONFIG ?? path.join(defaultDataDir(), "config.json");
}

export function loadConfig(filePath = configPath()): AppConfig {
  if (!fs.existsSync(filePath)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config at ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const migrated = migrateConfig(parsed);
  const validated = validateConfig(migrated.config);
  if (migrated.changed) {
    saveConfig(validated, filePath);
  }
  return validated;
}

export function saveConfig(config: AppConfig, filePath = configPath()): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
}
