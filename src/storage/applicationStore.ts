import fs from "fs";
import path from "path";
import { RecordTransitionError } from "../core/errors";
import type { ErrorKind } from "../core/errors";

export type ApplicationStatus = "pending" | "in_progress" | "completed" | "failed" | "aborted";

export const APPLICATION_STATUSES: readonly ApplicationStatus[] = [
  "pending",
  "in_progress",
  "completed",
  "failed",
  "aborted",
];

export interface ApplicationRecord {
  fingerprint: string;
  status: ApplicationStatus;
  attempts: number;
  lastError?: ErrorKind;
  lastErrorMessage?: string;
  retryable?: boolean;
  createdAt: string;
  updatedAt: string;
  title?: string;
  company?: string;
  url?: string;
  source?: string;
}

export interface ClaimDetails {
  title?: string;
  company?: string;
  url?: string;
  source?: string;
}

export interface ApplicationStore {
  upsert(record: ApplicationRecord): Promise<ApplicationRecord>;
  get(fingerprint: string): Promise<ApplicationRecord | undefined>;
  queryByStatus(status: ApplicationStatus): Promise<ApplicationRecord[]>;
  list(): Promise<ApplicationRecord[]>;
  evictOlderThan(retentionMs: number, now?: Date): Promise<number>;
  claim(fingerprint: string, details: ClaimDetails, maxAttempts: number, now?: Date): Promise<ApplicationRecord | null>;
}

const TRANSITIONS: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
  pending: ["pending", "in_progress", "failed", "aborted"],
  in_progress: ["in_progress", "completed", "failed", "aborted"],
  failed: ["failed", "in_progress"],
  aborted: ["aborted"],
  completed: ["completed"],
};

export function canTransition(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isRetryableFailure(record: ApplicationRecord, maxAttempts: number): boolean {
  return record.status === "failed" && record.retryable === true && record.attempts < maxAttempts;
}

export function isEligibleForAttempt(record: ApplicationRecord | undefined, maxAttempts: number): boolean {
  if (!record) {
    return true;
  }
  return record.status === "pending" || isRetryableFailure(record, maxAttempts);
}

export class InMemoryApplicationStore implements ApplicationStore {
  protected records = new Map<string, ApplicationRecord>();

  async upsert(record: ApplicationRecord): Promise<ApplicationRecord> {
    return this.upsertSync(record);
  }

  async get(fingerprint: string): Promise<ApplicationRecord | undefined> {
    const record = this.records.get(fingerprint);
    return record ? { ...record } : undefined;
  }

  async queryByStatus(status: ApplicationStatus): Promise<ApplicationRecord[]> {
    return this.sorted().filter((record) => record.status === status);
  }

  async list(): Promise<ApplicationRecord[]> {
    return this.sorted();
  }

  async evictOlderThan(retentionMs: number, now = new Date()): Promise<number> {
    const cutoff = now.getTime() - retentionMs;
    let evicted = 0;
    for (const [fingerprint, record] of this.records) {
      if (record.status === "in_progress") {
        continue;
      }
      if (Date.parse(record.updatedAt) < cutoff) {
        this.records.delete(fingerprint);
        evicted += 1;
      }
    }
    if (evicted > 0) {
      this.persist();
    }
    return evicted;
  }

  // Check-and-set runs without awaiting, so two drivers in this process cannot both win.
  async claim(
    fingerprint: string,
    details: ClaimDetails,
    maxAttempts: number,
    now = new Date()
  ): Promise<ApplicationRecord | null> {
    const existing = this.records.get(fingerprint);
    if (!isEligibleForAttempt(existing, maxAttempts)) {
      return null;
    }
    const timestamp = now.toISOString();
    return this.upsertSync({
      fingerprint,
      status: "in_progress",
      attempts: existing?.attempts ?? 0,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
      lastError: existing?.lastError,
      lastErrorMessage: existing?.lastErrorMessage,
      retryable: undefined,
      ...details,
    });
  }

  protected upsertSync(record: ApplicationRecord): ApplicationRecord {
    const existing = this.records.get(record.fingerprint);
    if (existing && !canTransition(existing.status, record.status)) {
      throw new RecordTransitionError(
        `Cannot move ${record.fingerprint} from ${existing.status} to ${record.status}`
      );
    }

    const merged: ApplicationRecord = existing
      ? {
          ...existing,
          ...stripUndefined(record),
          retryable: record.retryable,
          createdAt: existing.createdAt,
          attempts: Math.max(existing.attempts, record.attempts),
        }
      : { ...record };

    this.records.set(record.fingerprint, merged);
    this.persist();
    return { ...merged };
  }

  protected persist(): void {
    return;
  }

  private sorted(): ApplicationRecord[] {
    return Array.from(this.records.values())
      .map((record) => ({ ...record }))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.fingerprint.localeCompare(b.fingerprint));
  }
}

export class FileApplicationStore extends InMemoryApplicationStore {
  private filePath: string;

  constructor(filePath: string) {
    super();
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.load();
  }

  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }
    const raw = fs.readFileSync(this.filePath, "utf8");
    const parsed = JSON.parse(raw) as unknown;
    if (!Array.isArray(parsed)) {
      throw new Error(`Application records file is not a list: ${this.filePath}`);
    }
    for (const entry of parsed) {
      if (isApplicationRecord(entry)) {
        this.records.set(entry.fingerprint, entry);
      }
    }
  }

  protected persist(): void {
    const payload = Array.from(this.records.values());
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(payload, null, 2));
    fs.renameSync(tmpPath, this.filePath);
  }
}

export function isApplicationRecord(value: unknown): value is ApplicationRecord {
  if (!value || typeof value !== "object") {
    return false;
  }
  const status: unknown = Reflect.get(value, "status");
  return (
    typeof Reflect.get(value, "fingerprint") === "string" &&
    APPLICATION_STATUSES.some((known) => known === status) &&
    typeof Reflect.get(value, "attempts") === "number" &&
    typeof Reflect.get(value, "createdAt") === "string" &&
    typeof Reflect.get(value, "updatedAt") === "string"
  );
}

function stripUndefined(record: ApplicationRecord): Partial<ApplicationRecord> {
  const result: Partial<ApplicationRecord> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
