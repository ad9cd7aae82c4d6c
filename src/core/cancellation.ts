export interface CancellationToken {
  isCancelled(): boolean;
  reason(): string | undefined;
}

export interface RunControllerOptions {
  deadline?: Date;
  maxApplications?: number;
  now?: () => Date;
}

// Stop requests and the deadline cancel in-flight drivers; the application limit only refuses new starts.
export class RunController implements CancellationToken {
  private deadline?: Date;
  private maxApplications: number;
  private now: () => Date;
  private started = 0;
  private stopReason?: string;

  constructor(options: RunControllerOptions = {}) {
    this.deadline = options.deadline;
    this.maxApplications = options.maxApplications ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? (() => new Date());
  }

  stop(reason = "stop requested"): void {
    this.stopReason = this.stopReason ?? reason;
  }

  isCancelled(): boolean {
    return this.reason() !== undefined;
  }

  reason(): string | undefined {
    if (this.stopReason) {
      return this.stopReason;
    }
    if (this.deadline && this.now().getTime() >= this.deadline.getTime()) {
      return `deadline ${this.deadline.toISOString()} reached`;
    }
    return undefined;
  }

  tryStartApplication(): boolean {
    if (this.isCancelled() || this.started >= this.maxApplications) {
      return false;
    }
    this.started += 1;
    return true;
  }

  // Gives back a slot when the started posting turned out to be owned elsewhere.
  releaseApplication(): void {
    this.started = Math.max(0, this.started - 1);
  }

  startedCount(): number {
    return this.started;
  }

  limitReached(): boolean {
    return this.started >= this.maxApplications;
  }
}
