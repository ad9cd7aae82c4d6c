import { isEligibleForAttempt } from "../storage/applicationStore";
import type { ApplicationRecord } from "../storage/applicationStore";
import type { JobPosting, ScoredCandidate } from "../types/jobs";

export type CandidateScorer = (posting: JobPosting) => ScoredCandidate;

export interface RankerOptions {
  scorer: CandidateScorer;
  sourcePriority?: string[];
  maxAttempts: number;
  excludeCompanies?: string[];
  excludeKeywords?: string[];
  // Keeps only postings whose location mentions "remote".
  remoteOnly?: boolean;
}

export interface RankerLoadResult {
  ranked: number;
  skippedDuplicate: number;
  skippedExcluded: number;
}

export class Ranker {
  private options: RankerOptions;
  private candidates: ScoredCandidate[] = [];

  constructor(options: RankerOptions) {
    this.options = options;
  }

  load(postings: JobPosting[], records: ReadonlyMap<string, ApplicationRecord>): RankerLoadResult {
    const excludeCompanies = normalizeList(this.options.excludeCompanies ?? []);
    const excludeKeywords = normalizeList(this.options.excludeKeywords ?? []);
    const scored: ScoredCandidate[] = [];
    const seen = new Set<string>();
    let skippedDuplicate = 0;
    let skippedExcluded = 0;

    for (const posting of postings) {
      if (seen.has(posting.fingerprint)) {
        continue;
      }
      seen.add(posting.fingerprint);

      if (!isEligibleForAttempt(records.get(posting.fingerprint), this.options.maxAttempts)) {
        skippedDuplicate += 1;
        continue;
      }

      const company = posting.company.toLowerCase();
      const title = posting.title.toLowerCase();
      if (
        excludeCompanies.includes(company) ||
        excludeKeywords.some((keyword) => title.includes(keyword)) ||
        (this.options.remoteOnly && !posting.location.toLowerCase().includes("remote"))
      ) {
        skippedExcluded += 1;
        continue;
      }

      scored.push(this.options.scorer(posting));
    }

    this.candidates = scored.sort((a, b) => this.compare(a, b));
    return { ranked: this.candidates.length, skippedDuplicate, skippedExcluded };
  }

  topK(n: number): ScoredCandidate[] {
    if (!(n > 0)) {
      return [];
    }
    return this.candidates.slice(0, Math.floor(n));
  }

  size(): number {
    return this.candidates.length;
  }

  private compare(a: ScoredCandidate, b: ScoredCandidate): number {
    if (a.score !== b.score) {
      return b.score - a.score;
    }
    const byTime = Date.parse(b.posting.postedAt) - Date.parse(a.posting.postedAt);
    if (byTime !== 0) {
      return byTime;
    }
    const byPriority = this.priorityOf(a.posting.source) - this.priorityOf(b.posting.source);
    if (byPriority !== 0) {
      return byPriority;
    }
    return a.posting.fingerprint < b.posting.fingerprint ? -1 : a.posting.fingerprint > b.posting.fingerprint ? 1 : 0;
  }

  // A priority entry matches the full source name ("greenhouse:acme") or its type prefix ("greenhouse").
  private priorityOf(source: string): number {
    const order = this.options.sourcePriority ?? [];
    const exact = order.indexOf(source);
    if (exact !== -1) {
      return exact;
    }
    const prefix = order.indexOf(source.split(":")[0]);
    return prefix === -1 ? order.length : prefix;
  }
}

function normalizeList(values: string[]): string[] {
  return values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
}
