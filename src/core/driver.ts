import type { IntentName } from "../automation/intents";
import type { ElementLocator } from "../automation/locator";
import type { ActionTarget, BrowserSession } from "../automation/session";
import type { Logger, RunEvent, RunLogger } from "../logging";
import type { ApplicationRecord, ApplicationStatus, ApplicationStore } from "../storage/applicationStore";
import type { UserProfile } from "../types/context";
import type { JobPosting } from "../types/jobs";
import { backoffDelay, sleep as defaultSleep } from "./backoff";
import type { Sleep } from "./backoff";
import type { CancellationToken } from "./cancellation";
import {
  ConfirmationMissingError,
  FormValidationError,
  LocatorNotFoundError,
  errorMessage,
  toHireloopError,
} from "./errors";
import type { HireloopError } from "./errors";

export type StepState =
  | "NavigatePosting"
  | "LocateApplyControl"
  | "OpenApplicationForm"
  | "FillFields"
  | "UploadResume"
  | "Submit"
  | "Verify";

export type DriverState = "Discovered" | StepState | "Completed" | "Failed" | "Aborted";

export type StepAction = "navigate" | "click" | "verify" | "type" | "upload";

export interface DriverStep {
  state: StepState;
  action: StepAction;
  intent?: IntentName;
  // Overrides automation.maxRetries for this state.
  attemptBudget?: number;
}

export const APPLICATION_STEPS: readonly DriverStep[] = [
  { state: "NavigatePosting", action: "navigate" },
  { state: "LocateApplyControl", action: "click", intent: "apply-button" },
  { state: "OpenApplicationForm", action: "verify", intent: "application-form" },
  { state: "FillFields", action: "type" },
  { state: "UploadResume", action: "upload", intent: "resume-upload" },
  { state: "Submit", action: "click", intent: "submit-button" },
  { state: "Verify", action: "verify", intent: "confirmation", attemptBudget: 2 },
];

export type DriverOutcomeState = "Completed" | "Failed" | "Aborted" | "Skipped";

export interface DriverOutcome {
  state: DriverOutcomeState;
  fingerprint: string;
  attempts: number;
  history: DriverState[];
  error?: HireloopError;
  sessionLost: boolean;
  record?: ApplicationRecord;
}

export interface DriverContext {
  session: BrowserSession;
  locator: ElementLocator;
  store: ApplicationStore;
  profile: UserProfile;
  resumePath: string;
  token: CancellationToken;
  logger: Logger;
  runLogger?: RunLogger;
  runId: string;
}

export interface DriverOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs: number;
  sleep?: Sleep;
  now?: () => Date;
}

type EventFields = Pick<RunEvent, "status" | "error" | "reason" | "intent" | "strategy">;

class CancelledSignal extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Cancelled: ${reason}`);
    this.reason = reason;
  }
}

export class ApplicationDriver {
  private posting: JobPosting;
  private ctx: DriverContext;
  private options: DriverOptions;
  private sleep: Sleep;
  private now: () => Date;
  private state: DriverState = "Discovered";
  private history: DriverState[] = ["Discovered"];
  private priorAttempts = 0;
  private runAttempts = 1;

  constructor(posting: JobPosting, ctx: DriverContext, options: DriverOptions) {
    this.posting = posting;
    this.ctx = ctx;
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  currentState(): DriverState {
    return this.state;
  }

  async run(): Promise<DriverOutcome> {
    const { fingerprint } = this.posting;
    const claimed = await this.ctx.store.claim(
      fingerprint,
      {
        title: this.posting.title,
        company: this.posting.company,
        url: this.posting.url,
        source: this.posting.source,
      },
      this.options.maxRetries,
      this.now()
    );
    if (!claimed) {
      this.event("Discovered", { status: "skipped", reason: "fingerprint already owned or finished" });
      return { state: "Skipped", fingerprint, attempts: 0, history: this.history.slice(), sessionLost: false };
    }

    this.priorAttempts = claimed.attempts;
    this.event("Discovered", { status: "in_progress" });

    try {
      for (const step of APPLICATION_STEPS) {
        this.checkCancelled();
        this.enter(step.state);
        await this.runStep(step);
      }
    } catch (error) {
      if (error instanceof CancelledSignal) {
        return this.abort(error.reason);
      }
      return this.fail(toHireloopError(error));
    }

    return this.complete();
  }

  private async runStep(step: DriverStep): Promise<void> {
    const budget = step.attemptBudget ?? this.options.maxRetries;
    for (let tryNumber = 1; ; tryNumber += 1) {
      try {
        await this.perform(step);
        return;
      } catch (error) {
        const failure = toHireloopError(error);
        if (!failure.recoverable || tryNumber >= budget) {
          throw failure;
        }
        this.runAttempts += 1;
        await this.writeRecord("in_progress", failure);
        this.event(step.state, { status: "in_progress", error: failure.message, intent: step.intent });
        this.ctx.logger.warn(
          `${step.state} failed (${failure.kind}), retry ${tryNumber}/${budget - 1}: ${failure.message}`
        );
        await this.sleep(backoffDelay(tryNumber, this.options.backoffMs, this.options.maxBackoffMs));
        this.checkCancelled();
      }
    }
  }

  private async perform(step: DriverStep): Promise<void> {
    const { session } = this.ctx;
    switch (step.state) {
      case "NavigatePosting":
        await session.navigate(this.posting.url);
        return;
      case "LocateApplyControl":
        await session.click(await this.resolve("apply-button"));
        return;
      case "OpenApplicationForm":
        await this.resolve("application-form");
        return;
      case "FillFields":
        await this.fillFields();
        return;
      case "UploadResume":
        await session.uploadFile(await this.resolve("resume-upload"), this.ctx.resumePath);
        return;
      case "Submit":
        await session.click(await this.resolve("submit-button"));
        return;
      case "Verify":
        await this.verify();
        return;
    }
  }

  private async fillFields(): Promise<void> {
    const { session, locator, profile } = this.ctx;
    const named = await locator.locate(session, "name-field");
    if (named.kind === "found") {
      await session.typeText(named.target, profile.fullName);
    } else {
      const [first, ...rest] = profile.fullName.trim().split(/\s+/);
      await session.typeText(await this.resolve("first-name-field"), first);
      await session.typeText(await this.resolve("last-name-field"), rest.join(" "));
    }

    await session.typeText(await this.resolve("email-field"), profile.email);

    const optional: Array<[IntentName, string | undefined]> = [
      ["phone-field", profile.phone],
      ["location-field", profile.location],
    ];
    for (const [intent, value] of optional) {
      if (!value) {
        continue;
      }
      const result = await locator.locate(session, intent);
      if (result.kind === "found") {
        await session.typeText(result.target, value);
      }
    }
  }

  private async verify(): Promise<void> {
    const { session, locator } = this.ctx;
    const confirmation = await locator.locate(session, "confirmation");
    if (confirmation.kind === "found") {
      return;
    }
    const invalid = await locator.locate(session, "validation-error");
    if (invalid.kind === "found") {
      const detail = invalid.target.kind === "element" ? invalid.target.element.text : undefined;
      throw new FormValidationError(`Form rejected the submission${detail ? `: ${detail}` : ""}`);
    }
    throw new ConfirmationMissingError();
  }

  private async resolve(intent: IntentName): Promise<ActionTarget> {
    const result = await this.ctx.locator.locate(this.ctx.session, intent);
    if (result.kind === "not-found") {
      throw new LocatorNotFoundError(intent, result.reason);
    }
    this.event(this.state, { intent, strategy: result.strategy });
    return result.target;
  }

  private checkCancelled(): void {
    if (this.ctx.token.isCancelled()) {
      throw new CancelledSignal(this.ctx.token.reason() ?? "cancelled");
    }
  }

  private enter(state: DriverState, fields: EventFields = { status: "in_progress" }): void {
    this.state = state;
    this.history.push(state);
    this.event(state, fields);
  }

  private async complete(): Promise<DriverOutcome> {
    this.enter("Completed", { status: "completed" });
    const record = await this.writeRecord("completed");
    this.ctx.logger.info(`Applied to ${this.posting.title} @ ${this.posting.company}`);
    return this.outcome("Completed", { record });
  }

  private async fail(error: HireloopError): Promise<DriverOutcome> {
    const sessionLost = error.kind === "BrowserCrash";
    const failedAt = this.state;
    this.enter("Failed", { status: "failed", error: `${error.kind}: ${error.message}` });
    const record = await this.writeRecord("failed", error, sessionLost);
    this.ctx.logger.error(`${this.posting.title} @ ${this.posting.company} failed at ${failedAt}: ${error.message}`);
    return this.outcome("Failed", { record, error, sessionLost });
  }

  private async abort(reason: string): Promise<DriverOutcome> {
    this.enter("Aborted", { status: "aborted", reason });
    const record = await this.ctx.store.upsert({
      ...this.baseRecord("aborted"),
      lastErrorMessage: `Run cancelled: ${reason}`,
    });
    this.ctx.logger.warn(`${this.posting.title} @ ${this.posting.company} aborted: ${reason}`);
    return this.outcome("Aborted", { record });
  }

  private writeRecord(status: ApplicationStatus, error?: HireloopError, retryable?: boolean): Promise<ApplicationRecord> {
    return this.ctx.store.upsert({
      ...this.baseRecord(status),
      lastError: error?.kind,
      lastErrorMessage: error ? errorMessage(error) : undefined,
      retryable,
    });
  }

  private baseRecord(status: ApplicationStatus): ApplicationRecord {
    const timestamp = this.now().toISOString();
    return {
      fingerprint: this.posting.fingerprint,
      status,
      attempts: this.priorAttempts + this.runAttempts,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  private outcome(
    state: DriverOutcomeState,
    extra: { record: ApplicationRecord; error?: HireloopError; sessionLost?: boolean }
  ): DriverOutcome {
    return {
      state,
      fingerprint: this.posting.fingerprint,
      attempts: this.priorAttempts + this.runAttempts,
      history: this.history.slice(),
      error: extra.error,
      sessionLost: extra.sessionLost ?? false,
      record: extra.record,
    };
  }

  private event(step: DriverState, fields: EventFields): void {
    this.ctx.runLogger?.logEvent({
      runId: this.ctx.runId,
      fingerprint: this.posting.fingerprint,
      step,
      attempt: this.priorAttempts + this.runAttempts,
      title: this.posting.title,
      company: this.posting.company,
      url: this.posting.url,
      timestamp: this.now().toISOString(),
      ...fields,
    });
  }
}
