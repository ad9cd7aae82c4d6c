import { ElementLocator } from "../automation/locator";
import type { BrowserSession, SessionProvider } from "../automation/session";
import { computeSha256 } from "../assets/vault";
import type { AppConfig } from "../config";
import { discoverWindows } from "../discovery";
import type { SourceFailure } from "../discovery";
import { parseWindow } from "../discovery/window";
import { childLogger } from "../logging";
import type { Logger, RunLogger } from "../logging";
import { Ranker } from "../ranking/ranker";
import type { ResumeExtractor } from "../resume/extract";
import { buildResumeProfile } from "../resume/profile";
import type { ResumeProfile } from "../resume/profile";
import { buildVocabulary, defaultSkillEntries } from "../resume/vocabulary";
import { scorePosting } from "../scoring/scorer";
import type { ApplicationRecord, ApplicationStore } from "../storage/applicationStore";
import type { JobPosting, JobSource, ScoredCandidate } from "../types/jobs";
import type { TemplateLibrary } from "../vision/templateLibrary";
import { sleep as defaultSleep } from "./backoff";
import type { Sleep } from "./backoff";
import { RunController } from "./cancellation";
import { ApplicationDriver } from "./driver";
import type { DriverOutcome } from "./driver";
import { ConfigError, SourceError, errorMessage } from "./errors";
import { runPool } from "./workerPool";

export interface RunOptions {
  runId: string;
  limit?: number;
  maxApplications?: number;
  deadlineMinutes?: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  recovered: number;
  discovered: number;
  ranked: number;
  attempted: number;
  completed: number;
  failed: number;
  aborted: number;
  skippedDuplicate: number;
  skippedExcluded: number;
  sessionFailures: number;
  sourceFailures: SourceFailure[];
  stopReason?: string;
}

export interface RunStatus {
  state: "idle" | "running" | "stopped";
  attempted: number;
  completed: number;
  lastMessage?: string;
}

export interface OrchestratorDeps {
  config: AppConfig;
  store: ApplicationStore;
  sources: JobSource[];
  extractor: ResumeExtractor;
  sessions: SessionProvider;
  templates: TemplateLibrary;
  logger: Logger;
  runLogger?: RunLogger;
  now?: () => Date;
  sleep?: Sleep;
}

export interface Orchestrator {
  run(options: RunOptions): Promise<RunSummary>;
  stop(reason?: string): void;
  status(): RunStatus;
}

export async function prepareProfile(
  config: AppConfig,
  extractor: ResumeExtractor,
  logger: Logger
): Promise<ResumeProfile> {
  if (!config.resume.path) {
    throw new ConfigError("No resume configured; run `hireloop resume set <path>` first");
  }
  const text = await extractor.extractText(config.resume.path);
  const contentHash = await computeSha256(config.resume.path);
  if (config.resume.sha256 && config.resume.sha256 !== contentHash) {
    logger.warn(`Resume ${config.resume.path} changed since it was registered; scoring uses the current file`);
  }
  const profile = buildResumeProfile(text, {
    contentHash,
    vocabulary: buildVocabulary(defaultSkillEntries(), config.scoring.vocabulary),
    declaredSkills: config.profile.skills ?? [],
  });
  logger.info(`Resume profile: ${profile.skills.size} skills`);
  return profile;
}

export function rankCandidates(
  config: AppConfig,
  profile: ResumeProfile,
  postings: JobPosting[],
  records: ApplicationRecord[],
  now: Date
): { ranker: Ranker; skippedDuplicate: number; skippedExcluded: number } {
  const ranker = new Ranker({
    scorer: (posting) =>
      scorePosting(
        posting,
        profile,
        {
          recencyHalflifeHours: config.scoring.recencyHalflifeHours,
          boosts: config.scoring.boosts,
          titles: config.search.titles,
          locations: config.search.locations,
        },
        now
      ),
    sourcePriority: config.search.sourcePriority,
    maxAttempts: config.automation.maxRetries,
    excludeCompanies: config.search.excludeCompanies,
    excludeKeywords: config.search.excludeKeywords,
    remoteOnly: config.search.remoteOnly,
  });
  const loaded = ranker.load(postings, new Map(records.map((record) => [record.fingerprint, record])));
  return { ranker, skippedDuplicate: loaded.skippedDuplicate, skippedExcluded: loaded.skippedExcluded };
}

// Records an interrupted run left in_progress cannot be trusted to be unsubmitted.
export async function recoverInterrupted(store: ApplicationStore, now: Date, logger: Logger): Promise<number> {
  const stale = await store.queryByStatus("in_progress");
  for (const record of stale) {
    await store.upsert({
      ...record,
      status: "aborted",
      lastErrorMessage: "Interrupted by an earlier run",
      updatedAt: now.toISOString(),
    });
    logger.warn(`Marked interrupted application ${record.fingerprint} as aborted`);
  }
  return stale.length;
}

export class ApplicationOrchestrator implements Orchestrator {
  private deps: OrchestratorDeps;
  private now: () => Date;
  private sleep: Sleep;
  private controller?: RunController;
  private statusState: RunStatus = { state: "idle", attempted: 0, completed: 0 };

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(options: RunOptions): Promise<RunSummary> {
    const { config, store, logger } = this.deps;
    const startedAt = this.now();
    if (!config.profile.fullName || !config.profile.email) {
      throw new ConfigError("Profile needs fullName and email; run `hireloop profile set` first");
    }

    const deadlineMinutes = options.deadlineMinutes ?? config.automation.deadlineMinutes;
    const controller = new RunController({
      deadline: deadlineMinutes ? new Date(startedAt.getTime() + deadlineMinutes * 60_000) : undefined,
      maxApplications: options.maxApplications ?? config.app.maxApplicationsPerRun,
      now: this.now,
    });
    this.controller = controller;
    this.statusState = { state: "running", attempted: 0, completed: 0 };

    const summary: RunSummary = {
      runId: options.runId,
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      recovered: await recoverInterrupted(store, startedAt, logger),
      discovered: 0,
      ranked: 0,
      attempted: 0,
      completed: 0,
      failed: 0,
      aborted: 0,
      skippedDuplicate: 0,
      skippedExcluded: 0,
      sessionFailures: 0,
      sourceFailures: [],
    };

    const profile = await prepareProfile(config, this.deps.extractor, logger);

    let postings: JobPosting[] = [];
    try {
      const discovered = await discoverWindows(this.deps.sources, config.search.windows.map(parseWindow), {
        concurrency: config.automation.discoveryConcurrency,
        logger,
        now: startedAt,
      });
      postings = discovered.postings;
      summary.sourceFailures = discovered.failures;
    } catch (error) {
      if (!(error instanceof SourceError)) {
        throw error;
      }
      logger.error(`Discovery produced nothing: ${error.message}`);
    }
    summary.discovered = postings.length;
    logger.info(`Discovered ${postings.length} postings`);

    if (controller.isCancelled()) {
      return this.finish(summary, controller);
    }

    const ranking = rankCandidates(config, profile, postings, await store.list(), startedAt);
    summary.skippedDuplicate = ranking.skippedDuplicate;
    summary.skippedExcluded = ranking.skippedExcluded;
    const candidates = ranking.ranker.topK(options.limit ?? config.search.limit);
    summary.ranked = candidates.length;
    logger.info(`Ranked ${ranking.ranker.size()} candidates, attempting up to ${candidates.length}`);

    await this.apply(candidates, options.runId, controller, summary);
    return this.finish(summary, controller);
  }

  stop(reason = "stop requested"): void {
    this.controller?.stop(reason);
    this.statusState = { ...this.statusState, state: "stopped", lastMessage: reason };
  }

  status(): RunStatus {
    return this.statusState;
  }

  private async apply(
    candidates: ScoredCandidate[],
    runId: string,
    controller: RunController,
    summary: RunSummary
  ): Promise<void> {
    const { config, logger } = this.deps;
    const locator = new ElementLocator({
      templates: this.deps.templates,
      threshold: config.automation.templateThreshold,
      scales: config.automation.templateScales,
      logger,
    });
    const sessions = new Map<number, BrowserSession>();

    try {
      await runPool(
        candidates,
        {
          concurrency: config.automation.concurrency,
          shouldContinue: () => !controller.isCancelled() && !controller.limitReached(),
        },
        async (candidate, index, workerId) => {
          if (!controller.tryStartApplication()) {
            return true;
          }
          const session = sessions.get(workerId) ?? (await this.openSession(workerId, summary));
          if (!session) {
            controller.releaseApplication();
            return false;
          }
          sessions.set(workerId, session);

          const driver = new ApplicationDriver(
            candidate.posting,
            {
              session,
              locator,
              store: this.deps.store,
              profile: config.profile,
              resumePath: config.resume.path,
              token: controller,
              logger: childLogger(logger, `[${candidate.posting.fingerprint.slice(0, 8)}]`),
              runLogger: this.deps.runLogger,
              runId,
            },
            {
              maxRetries: config.automation.maxRetries,
              backoffMs: config.automation.backoffMs,
              maxBackoffMs: config.automation.maxBackoffMs,
              sleep: this.sleep,
              now: this.now,
            }
          );

          let outcome: DriverOutcome;
          try {
            outcome = await driver.run();
          } catch (error) {
            // Only store writes escape the driver.
            logger.error(
              `${candidate.posting.title} @ ${candidate.posting.company} could not be recorded: ${errorMessage(error)}`
            );
            summary.attempted += 1;
            summary.failed += 1;
            return true;
          }
          this.record(outcome, summary, controller);

          if (outcome.sessionLost) {
            sessions.delete(workerId);
            await this.closeSession(session);
          }
          if (outcome.state !== "Skipped" && index < candidates.length - 1 && !controller.isCancelled()) {
            await this.cooldown();
          }
          return true;
        }
      );
    } finally {
      for (const session of sessions.values()) {
        await this.closeSession(session);
      }
      await this.deps.sessions.close();
    }
  }

  private record(outcome: DriverOutcome, summary: RunSummary, controller: RunController): void {
    if (outcome.state === "Skipped") {
      controller.releaseApplication();
      summary.skippedDuplicate += 1;
      return;
    }
    summary.attempted += 1;
    if (outcome.state === "Completed") {
      summary.completed += 1;
    } else if (outcome.state === "Failed") {
      summary.failed += 1;
    } else {
      summary.aborted += 1;
    }
    this.statusState = {
      ...this.statusState,
      attempted: summary.attempted,
      completed: summary.completed,
      lastMessage: `${outcome.state} ${outcome.fingerprint}`,
    };
  }

  private async openSession(workerId: number, summary: RunSummary): Promise<BrowserSession | undefined> {
    try {
      return await this.deps.sessions.newSession();
    } catch (error) {
      summary.sessionFailures += 1;
      this.deps.logger.error(`Worker ${workerId} could not open a browser session and stops: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async cooldown(): Promise<void> {
    const { cooldownMs } = this.deps.config.automation;
    if (cooldownMs > 0) {
      await this.sleep(cooldownMs);
    }
  }

  private async closeSession(session: BrowserSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.deps.logger.warn(`Closing browser session failed: ${errorMessage(error)}`);
    }
  }

  private finish(summary: RunSummary, controller: RunController): RunSummary {
    summary.finishedAt = this.now().toISOString();
    summary.stopReason = controller.reason() ?? (controller.limitReached() ? "application limit reached" : undefined);
    this.statusState = { ...this.statusState, state: "stopped" };
    this.deps.logger.info(
      `Run ${summary.runId}: discovered=${summary.discovered} ranked=${summary.ranked} attempted=${summary.attempted} ` +
        `completed=${summary.completed} failed=${summary.failed} aborted=${summary.aborted} ` +
        `skipped_duplicate=${summary.skippedDuplicate}`
    );
    return summary;
  }
}
