import os from "os";
import path from "path";
import { defaultConfig } from "./index";
import type { AppConfig } from "./index";
import { CURRENT_SCHEMA_VERSION } from "./migrate";
import { ConfigError } from "../core/errors";
import { parseWindow } from "../discovery/window";
import type { SkillEntry, UserProfile } from "../types/context";
import type { SourceConfig } from "../types/jobs";

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number" && Number.isFinite(item));
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && !Number.isNaN(value) ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function stringsOr(value: unknown, fallback: string[]): string[] {
  return isStringArray(value) ? value : fallback;
}

function expandHome(value: string): string {
  if (!value.startsWith("~")) {
    return value;
  }

  return path.join(os.homedir(), value.slice(1));
}

function positiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer (got ${value})`);
  }
  return value;
}

export function validateConfig(raw: unknown): AppConfig {
  const config: RawObject = isRecord(raw) ? raw : {};
  const schemaVersion = numberOr(config.schemaVersion, CURRENT_SCHEMA_VERSION);

  const appRaw = section(config, "app");
  const dataDir = expandHome(stringOr(appRaw.dataDir, defaultConfig().app.dataDir));
  const base = defaultConfig(dataDir);

  const app: AppConfig["app"] = {
    dataDir,
    recordsPath: expandHome(stringOr(appRaw.recordsPath, base.app.recordsPath)),
    assetsDir: expandHome(stringOr(appRaw.assetsDir, base.app.assetsDir)),
    templatesDir: expandHome(stringOr(appRaw.templatesDir, base.app.templatesDir)),
    textCacheDir: expandHome(stringOr(appRaw.textCacheDir, base.app.textCacheDir)),
    headless: booleanOr(appRaw.headless, base.app.headless),
    slowMoMs: numberOr(appRaw.slowMoMs, base.app.slowMoMs),
    maxApplicationsPerRun: positiveInteger(
      numberOr(appRaw.maxApplicationsPerRun, base.app.maxApplicationsPerRun),
      "app.maxApplicationsPerRun"
    ),
    retentionDays: numberOr(appRaw.retentionDays, base.app.retentionDays),
  };

  const profileRaw = section(config, "profile");
  const profile: UserProfile = {
    fullName: stringOr(profileRaw.fullName, ""),
    email: stringOr(profileRaw.email, ""),
    phone: stringOr(profileRaw.phone, ""),
    location: optionalString(profileRaw.location),
    linkedin: optionalString(profileRaw.linkedin),
    website: optionalString(profileRaw.website),
    github: optionalString(profileRaw.github),
    skills: stringsOr(profileRaw.skills, []),
  };

  const resumeRaw = section(config, "resume");
  const resume = {
    path: expandHome(stringOr(resumeRaw.path, "")),
    sha256: optionalString(resumeRaw.sha256),
  };

  const searchRaw = section(config, "search");
  const windows = stringsOr(searchRaw.windows, base.search.windows);
  if (windows.length === 0) {
    throw new ConfigError("search.windows must name at least one window");
  }
  windows.forEach((value) => parseWindow(value));

  const search: AppConfig["search"] = {
    windows,
    limit: positiveInteger(numberOr(searchRaw.limit, base.search.limit), "search.limit"),
    titles: stringsOr(searchRaw.titles, base.search.titles),
    locations: stringsOr(searchRaw.locations, base.search.locations),
    excludeCompanies: stringsOr(searchRaw.excludeCompanies, base.search.excludeCompanies),
    excludeKeywords: stringsOr(searchRaw.excludeKeywords, base.search.excludeKeywords),
    sources: Array.isArray(searchRaw.sources) ? searchRaw.sources.map(validateSource) : base.search.sources,
    sourcePriority: stringsOr(searchRaw.sourcePriority, base.search.sourcePriority),
    remoteOnly: booleanOr(searchRaw.remoteOnly, base.search.remoteOnly),
  };

  const automationRaw = section(config, "automation");
  const deadlineMinutes = numberOr(automationRaw.deadlineMinutes, Number.NaN);
  const automation: AppConfig["automation"] = {
    maxRetries: positiveInteger(numberOr(automationRaw.maxRetries, base.automation.maxRetries), "automation.maxRetries"),
    concurrency: positiveInteger(
      numberOr(automationRaw.concurrency, base.automation.concurrency),
      "automation.concurrency"
    ),
    discoveryConcurrency: positiveInteger(
      numberOr(automationRaw.discoveryConcurrency, base.automation.discoveryConcurrency),
      "automation.discoveryConcurrency"
    ),
    backoffMs: Math.max(0, numberOr(automationRaw.backoffMs, base.automation.backoffMs)),
    maxBackoffMs: Math.max(0, numberOr(automationRaw.maxBackoffMs, base.automation.maxBackoffMs)),
    navigationTimeoutMs: numberOr(automationRaw.navigationTimeoutMs, base.automation.navigationTimeoutMs),
    deadlineMinutes: deadlineMinutes > 0 ? deadlineMinutes : undefined,
    templateThreshold: numberOr(automationRaw.templateThreshold, base.automation.templateThreshold),
    templateScales: isNumberArray(automationRaw.templateScales)
      ? automationRaw.templateScales.filter((scale) => scale > 0)
      : base.automation.templateScales,
    cooldownMs: Math.max(0, numberOr(automationRaw.cooldownMs, base.automation.cooldownMs)),
  };
  if (automation.templateThreshold <= 0 || automation.templateThreshold > 1) {
    throw new ConfigError(`automation.templateThreshold must be in (0, 1] (got ${automation.templateThreshold})`);
  }

  const scoringRaw = section(config, "scoring");
  const boostsRaw = section(scoringRaw, "boosts");
  const scoring: AppConfig["scoring"] = {
    recencyHalflifeHours: numberOr(scoringRaw.recencyHalflifeHours, base.scoring.recencyHalflifeHours),
    boosts: {
      title: numberOr(boostsRaw.title, base.scoring.boosts.title),
      location: numberOr(boostsRaw.location, base.scoring.boosts.location),
    },
    vocabulary: Array.isArray(scoringRaw.vocabulary) ? scoringRaw.vocabulary.filter(isSkillEntry) : [],
  };
  if (!(scoring.recencyHalflifeHours > 0)) {
    throw new ConfigError("scoring.recencyHalflifeHours must be positive");
  }
  if (scoring.boosts.title < 0 || scoring.boosts.location < 0) {
    throw new ConfigError("scoring.boosts multipliers cannot be negative");
  }

  return {
    schemaVersion,
    app,
    profile,
    resume,
    search,
    automation,
    scoring,
  };
}

function validateSource(value: unknown, index: number): SourceConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`search.sources[${index}] must be an object`);
  }

  const type = value.type;
  switch (type) {
    case "remotive":
      return {
        type: "remotive",
        keywords: isStringArray(value.keywords) ? value.keywords : undefined,
        category: optionalString(value.category),
        limit: typeof value.limit === "number" ? value.limit : undefined,
      };
    case "greenhouse":
    case "lever": {
      const slug = optionalString(value.slug);
      if (!slug) {
        throw new ConfigError(`search.sources[${index}] (${type}) needs a slug`);
      }
      return { type, slug, company: stringOr(value.company, slug) };
    }
    default:
      throw new ConfigError(`search.sources[${index}] has unknown type ${JSON.stringify(type)}`);
  }
}

function isSkillEntry(value: unknown): value is SkillEntry {
  return (
    isRecord(value) &&
    typeof value.skill === "string" &&
    (value.aliases === undefined || isStringArray(value.aliases)) &&
    (value.weight === undefined || typeof value.weight === "number")
  );
}
