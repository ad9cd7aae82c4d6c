import crypto from "crypto";
import fs from "fs";
import path from "path";
import { addResumeToVault } from "../assets";
import { PlaywrightSessionProvider } from "../automation/playwright";
import { configPath, defaultConfig, loadConfig, saveConfig } from "../config";
import type { AppConfig } from "../config";
import { ApplicationOrchestrator, prepareProfile, rankCandidates } from "../core/orchestrator";
import type { RunSummary } from "../core/orchestrator";
import { ConfigError } from "../core/errors";
import { discoverWindows } from "../discovery";
import type { DiscoveryResult } from "../discovery";
import { buildSources } from "../discovery/registry";
import { parseWindow } from "../discovery/window";
import { DEFAULT_INTENTS } from "../automation/intents";
import { createLogger, createRunLogger } from "../logging";
import { createResumeExtractor } from "../resume/extract";
import { APPLICATION_STATUSES, FileApplicationStore } from "../storage/applicationStore";
import type { ApplicationStatus } from "../storage/applicationStore";
import { FileJobStore } from "../storage/jobStore";
import { loadTemplateLibrary } from "../vision/templateLibrary";

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  const file = readFlag(argv, "--config") ?? configPath();
  const args = stripFlag(argv, "--config");
  const command = args[0] ?? "";

  switch (command) {
    case "init":
      await handleInit(file);
      return;
    case "profile":
      await handleProfile(args.slice(1), file);
      return;
    case "resume":
      await handleResume(args.slice(1), file);
      return;
    case "config":
      await handleConfig(args.slice(1), file);
      return;
    case "discover":
      await handleDiscover(args.slice(1), file);
      return;
    case "rank":
      await handleRank(args.slice(1), file);
      return;
    case "run":
      await handleRun(args.slice(1), file);
      return;
    case "records":
      await handleRecords(args.slice(1), file);
      return;
    case "evict":
      await handleEvict(args.slice(1), file);
      return;
    case "history":
      await handleHistory(args.slice(1), file);
      return;
    default:
      printHelp();
      return;
  }
}

async function handleInit(file: string): Promise<void> {
  const config = fs.existsSync(file) ? loadConfig(file) : defaultConfig();
  saveConfig(config, file);
  for (const intent of Object.keys(DEFAULT_INTENTS)) {
    fs.mkdirSync(path.join(config.app.templatesDir, intent), { recursive: true });
  }
  process.stdout.write(`Initialized config at ${file}\n`);
  process.stdout.write(`Image templates go in ${config.app.templatesDir}/<intent>/*.png\n`);
}

async function handleProfile(args: string[], file: string): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "set") {
    process.stderr.write("Unknown profile command. Use: hireloop profile set [flags]\n");
    return;
  }

  const config = loadConfig(file);
  const profile = { ...config.profile };

  const fullName = readFlag(args, "--full-name");
  if (fullName) {
    profile.fullName = fullName;
  }

  const email = readFlag(args, "--email");
  if (email) {
    profile.email = email;
  }

  const phone = readFlag(args, "--phone");
  if (phone) {
    profile.phone = phone;
  }

  const location = readFlag(args, "--location");
  if (location) {
    profile.location = location;
  }

  const linkedin = readFlag(args, "--linkedin");
  if (linkedin) {
    profile.linkedin = linkedin;
  }

  const website = readFlag(args, "--website");
  if (website) {
    profile.website = website;
  }

  const github = readFlag(args, "--github");
  if (github) {
    profile.github = github;
  }

  const skills = readMultiFlag(args, "--skill");
  if (skills.length > 0) {
    profile.skills = Array.from(new Set([...(profile.skills ?? []), ...skills]));
  }

  saveConfig({ ...config, profile }, file);
  process.stdout.write("Profile updated.\n");
}

async function handleResume(args: string[], file: string): Promise<void> {
  const subcommand = args[0] ?? "";
  const filePath = args[1];
  if (subcommand !== "set" || !filePath) {
    process.stderr.write("Resume path required. Use: hireloop resume set <path>\n");
    return;
  }

  const config = loadConfig(file);
  const { resume, config: updatedConfig, reused } = await addResumeToVault(config, filePath);
  const text = await createResumeExtractor({ cacheDir: config.app.textCacheDir }).extractText(resume.path);
  saveConfig(updatedConfig, file);
  const verb = reused ? "Using stored" : "Stored";
  process.stdout.write(`${verb} resume at ${resume.path} (${text.length} characters of text).\n`);
}

async function handleConfig(args: string[], file: string): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "show") {
    process.stderr.write("Unknown config command. Use: hireloop config show\n");
    return;
  }

  const config = loadConfig(file);
  process.stdout.write(`${JSON.stringify(redactConfig(config), null, 2)}\n`);
}

async function handleDiscover(args: string[], file: string): Promise<void> {
  const config = loadConfig(file);
  const windowFlag = readFlag(args, "--window");
  const windows = (windowFlag ? [windowFlag] : config.search.windows).map(parseWindow);
  const logger = createLogger("discover");

  const result = await discoverWindows(buildSources(config.search.sources), windows, {
    concurrency: config.automation.discoveryConcurrency,
    logger,
  });
  const store = new FileJobStore(config.app.dataDir);
  await store.writeAll(result.postings);
  printDiscoverySummary(result);
  process.stdout.write(`Saved postings to ${store.getPath()}\n`);
}

async function handleRank(args: string[], file: string): Promise<void> {
  const config = loadConfig(file);
  const limit = readNumberFlag(args, "--limit") ?? config.search.limit;
  const postings = await new FileJobStore(config.app.dataDir).loadAll();
  if (postings.length === 0) {
    process.stdout.write("No postings stored. Run hireloop discover first.\n");
    return;
  }

  const logger = createLogger("rank");
  const profile = await prepareProfile(config, createResumeExtractor({ cacheDir: config.app.textCacheDir }), logger);
  const records = await new FileApplicationStore(config.app.recordsPath).list();
  const { ranker, skippedDuplicate, skippedExcluded } = rankCandidates(config, profile, postings, records, new Date());

  for (const candidate of ranker.topK(limit)) {
    const { posting } = candidate;
    process.stdout.write(
      `${candidate.score.toFixed(3)}  ${posting.title} @ ${posting.company} [${posting.source}] ${posting.url}\n`
    );
    if (candidate.matched.length > 0) {
      process.stdout.write(`       matched: ${candidate.matched.join(", ")}\n`);
    }
  }
  process.stdout.write(
    `Ranked ${ranker.size()} of ${postings.length} postings (skipped: ${skippedDuplicate} already handled, ${skippedExcluded} excluded).\n`
  );
}

async function handleRun(args: string[], file: string): Promise<void> {
  const config = loadConfig(file);
  const runId = generateRunId();
  const runDir = path.join(config.app.dataDir, "runs", runId);
  fs.mkdirSync(runDir, { recursive: true });

  const limit = readNumberFlag(args, "--limit");
  const maxApplications = readNumberFlag(args, "--max-applications");
  const deadlineMinutes = readNumberFlag(args, "--deadline-minutes");
  const headless = resolveHeadless(args, config.app.headless);

  writeRunManifest(runDir, {
    runId,
    startedAt: new Date().toISOString(),
    limit: limit ?? config.search.limit,
    maxApplications: maxApplications ?? config.app.maxApplicationsPerRun,
    deadlineMinutes: deadlineMinutes ?? config.automation.deadlineMinutes,
    headless,
  });

  const logger = createLogger("run");
  const orchestrator = new ApplicationOrchestrator({
    config,
    store: new FileApplicationStore(config.app.recordsPath),
    sources: buildSources(config.search.sources),
    extractor: createResumeExtractor({ cacheDir: config.app.textCacheDir }),
    sessions: new PlaywrightSessionProvider({
      headless,
      slowMoMs: config.app.slowMoMs,
      navigationTimeoutMs: config.automation.navigationTimeoutMs,
    }),
    templates: loadTemplateLibrary(config.app.templatesDir, logger),
    logger,
    runLogger: createRunLogger(runDir, runId),
  });

  const onInterrupt = (): void => {
    process.stderr.write("Stopping after the current step...\n");
    orchestrator.stop("interrupted");
  };
  process.once("SIGINT", onInterrupt);

  let summary: RunSummary;
  try {
    summary = await orchestrator.run({ runId, limit, maxApplications, deadlineMinutes });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  fs.writeFileSync(path.join(runDir, "summary.json"), JSON.stringify(summary, null, 2), "utf8");
  printRunSummary(summary);
  process.stdout.write(`Run log: ${path.join(runDir, `run-${runId}.jsonl`)}\n`);
}

async function handleRecords(args: string[], file: string): Promise<void> {
  const status = readFlag(args, "--status");
  if (status !== undefined && !isApplicationStatus(status)) {
    throw new ConfigError(`Unknown status ${status}; expected one of ${APPLICATION_STATUSES.join(", ")}`);
  }
  const config = loadConfig(file);
  const store = new FileApplicationStore(config.app.recordsPath);

  const records = status ? await store.queryByStatus(status) : await store.list();
  if (records.length === 0) {
    process.stdout.write("No application records.\n");
    return;
  }
  for (const record of records) {
    const error = record.lastError ? ` | ${record.lastError}` : "";
    process.stdout.write(
      `${record.fingerprint.slice(0, 12)} | ${record.status} | attempts=${record.attempts} | ${record.updatedAt} | ${record.title ?? "?"} @ ${record.company ?? "?"}${error}\n`
    );
  }
}

async function handleEvict(args: string[], file: string): Promise<void> {
  const days = readNumberFlag(args, "--days");
  const config = loadConfig(file);
  const retentionDays = days ?? config.app.retentionDays;
  const store = new FileApplicationStore(config.app.recordsPath);
  const evicted = await store.evictOlderThan(retentionDays * DAY_MS);
  process.stdout.write(`Evicted ${evicted} record(s) older than ${retentionDays} day(s).\n`);
}

async function handleHistory(args: string[], file: string): Promise<void> {
  const config = loadConfig(file);
  const limit = readNumberFlag(args, "--limit") ?? 10;
  const runsDir = path.join(config.app.dataDir, "runs");
  if (!fs.existsSync(runsDir)) {
    process.stdout.write("No runs found.\n");
    return;
  }

  const summaries = fs
    .readdirSync(runsDir)
    .map((runId) => path.join(runsDir, runId, "summary.json"))
    .filter((summaryPath) => fs.existsSync(summaryPath))
    .map((summaryPath): RunSummary => JSON.parse(fs.readFileSync(summaryPath, "utf8")))
    .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
    .slice(0, limit);

  if (summaries.length === 0) {
    process.stdout.write("No runs found.\n");
    return;
  }
  for (const run of summaries) {
    process.stdout.write(
      `${run.runId} | ${run.startedAt} | attempted=${run.attempted} | completed=${run.completed} | failed=${run.failed} | aborted=${run.aborted}\n`
    );
  }
}

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }

  return args[index + 1];
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

// --headed and --headless both override app.headless; --headed wins when both are given.
export function resolveHeadless(args: string[], configured: boolean): boolean {
  if (hasFlag(args, "--headed")) {
    return false;
  }
  if (hasFlag(args, "--headless")) {
    return true;
  }
  return configured;
}

function stripFlag(args: string[], name: string): string[] {
  const index = args.indexOf(name);
  if (index === -1) {
    return args;
  }
  return [...args.slice(0, index), ...args.slice(index + 2)];
}

function readNumberFlag(args: string[], name: string): number | undefined {
  const raw = readFlag(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} expects a positive number (got ${raw})`);
  }
  return value;
}

function readMultiFlag(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    if (args[i] === name && typeof args[i + 1] === "string") {
      values.push(...splitList(args[i + 1]));
    }
  }
  return values;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isApplicationStatus(value: string): value is ApplicationStatus {
  return APPLICATION_STATUSES.some((status) => status === value);
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    profile: {
      ...config.profile,
      email: redactValue(config.profile.email),
      phone: redactValue(config.profile.phone),
    },
    resume: {
      path: redactPath(config.resume.path),
      sha256: config.resume.sha256 ? redactValue(config.resume.sha256) : undefined,
    },
  };
}

export function redactValue(value: string): string {
  if (value.length === 0) {
    return value;
  }

  if (value.length <= 4) {
    return "***";
  }

  return `${value.slice(0, 2)}***${value.slice(-2)}`;
}

function redactPath(value: string): string {
  if (value.length === 0) {
    return value;
  }
  const filename = path.basename(value);
  return filename ? `***${filename}` : "***";
}

function generateRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:.TZ]/g, "");
  const random = crypto.randomBytes(3).toString("hex");
  return `${stamp}_${random}`;
}

function writeRunManifest(
  runDir: string,
  payload: {
    runId: string;
    startedAt: string;
    limit: number;
    maxApplications: number;
    deadlineMinutes?: number;
    headless: boolean;
  }
): void {
  fs.writeFileSync(path.join(runDir, "manifest.json"), JSON.stringify(payload, null, 2), "utf8");
}

function printDiscoverySummary(result: DiscoveryResult): void {
  process.stdout.write(`Discovered ${result.postings.length} postings.\n`);
  process.stdout.write("Counts by source:\n");
  for (const [source, count] of Object.entries(result.countsBySource).sort(([a], [b]) => a.localeCompare(b))) {
    process.stdout.write(`  ${source}: ${count}\n`);
  }
  if (result.failures.length > 0) {
    process.stdout.write("Failures:\n");
    for (const failure of result.failures) {
      process.stdout.write(`  ${failure.name}: ${failure.error}\n`);
    }
  }
}

function printRunSummary(summary: RunSummary): void {
  process.stdout.write(`Run ${summary.runId} finished${summary.stopReason ? ` (${summary.stopReason})` : ""}.\n`);
  if (summary.recovered > 0) {
    process.stdout.write(`  recovered:          ${summary.recovered}\n`);
  }
  process.stdout.write(`  discovered:         ${summary.discovered}\n`);
  process.stdout.write(`  ranked:             ${summary.ranked}\n`);
  process.stdout.write(`  attempted:          ${summary.attempted}\n`);
  process.stdout.write(`  completed:          ${summary.completed}\n`);
  process.stdout.write(`  failed:             ${summary.failed}\n`);
  process.stdout.write(`  aborted:            ${summary.aborted}\n`);
  process.stdout.write(`  skipped duplicate:  ${summary.skippedDuplicate}\n`);
  process.stdout.write(`  skipped excluded:   ${summary.skippedExcluded}\n`);
  if (summary.sessionFailures > 0) {
    process.stdout.write(`  session failures:   ${summary.sessionFailures}\n`);
  }
  for (const failure of summary.sourceFailures) {
    process.stdout.write(`  source failure: ${failure.name}: ${failure.error}\n`);
  }
}

function printHelp(): void {
  process.stdout.write("hireloop <command> [--config <path>]\n\n");
  process.stdout.write("Commands:\n");
  process.stdout.write("  init\n");
  process.stdout.write(
    "  profile set [--full-name <name>] [--email <email>] [--phone <phone>] [--location <loc>] [--linkedin <url>] [--website <url>] [--github <url>] [--skill <a,b>]\n"
  );
  process.stdout.write("  resume set <path>\n");
  process.stdout.write("  config show\n");
  process.stdout.write("  discover [--window 24h]\n");
  process.stdout.write("  rank [--limit N]\n");
  process.stdout.write("  run [--limit N] [--max-applications N] [--deadline-minutes N] [--headless | --headed]\n");
  process.stdout.write(`  records [--status ${APPLICATION_STATUSES.join("|")}]\n`);
  process.stdout.write("  evict [--days N]\n");
  process.stdout.write("  history [--limit 10]\n");
}
