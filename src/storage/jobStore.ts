import fs from "fs";
import path from "path";
import { createPosting } from "../discovery/fingerprint";
import type { JobPosting } from "../types/jobs";

export interface JobStore {
  upsertMany(postings: JobPosting[]): Promise<void>;
  writeAll(postings: JobPosting[]): Promise<void>;
  loadAll(): Promise<JobPosting[]>;
}

// Postings are re-created on load so the fingerprint always matches the stored fields.
export class FileJobStore implements JobStore {
  private filePath: string;

  constructor(dataDir: string, filename = "postings.json") {
    this.filePath = path.join(dataDir, filename);
    fs.mkdirSync(dataDir, { recursive: true });
  }

  async loadAll(): Promise<JobPosting[]> {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.filter(isStoredPosting).map((entry) => createPosting(entry));
  }

  async upsertMany(postings: JobPosting[]): Promise<void> {
    const existing = await this.loadAll();
    const map = new Map(existing.map((posting) => [posting.fingerprint, posting]));
    for (const posting of postings) {
      map.set(posting.fingerprint, posting);
    }
    await this.writeAll(Array.from(map.values()));
  }

  async writeAll(postings: JobPosting[]): Promise<void> {
    fs.writeFileSync(this.filePath, JSON.stringify(postings, null, 2));
  }

  getPath(): string {
    return this.filePath;
  }
}

const REQUIRED_FIELDS = ["source", "sourceId", "title", "company", "url", "postedAt"] as const;

function isStoredPosting(value: unknown): value is JobPosting {
  if (!value || typeof value !== "object") {
    return false;
  }
  return REQUIRED_FIELDS.every((field) => field in value && typeof Reflect.get(value, field) === "string");
}
