import { SourceError, errorMessage } from "../core/errors";
import { runPool } from "../core/workerPool";
import type { Logger } from "../logging";
import type { JobPosting, JobSource, TimeWindow } from "../types/jobs";
import { isWithinWindow, sortWindows } from "./window";

export interface SourceFailure {
  name: string;
  error: string;
}

export interface DiscoveryResult {
  postings: JobPosting[];
  countsBySource: Record<string, number>;
  failures: SourceFailure[];
}

export interface DiscoverOptions {
  concurrency?: number;
  logger?: Logger;
  now?: Date;
}

export async function discover(
  sources: JobSource[],
  window: TimeWindow,
  options: DiscoverOptions = {}
): Promise<DiscoveryResult> {
  const now = options.now ?? new Date();
  const buffered: JobPosting[][] = sources.map(() => []);
  const countsBySource: Record<string, number> = {};
  const failures: SourceFailure[] = [];

  await runPool(sources, { concurrency: options.concurrency ?? 4 }, async (source, index) => {
    try {
      const fetched = await source.list(window);
      buffered[index] = fetched.filter((posting) => isWithinWindow(posting.postedAt, window, now));
      countsBySource[source.name] = buffered[index].length;
    } catch (error) {
      countsBySource[source.name] = 0;
      failures.push({ name: source.name, error: errorMessage(error) });
      options.logger?.warn(`Source ${source.name} failed for window ${window.label}: ${errorMessage(error)}`);
    }
  });

  if (sources.length > 0 && failures.length === sources.length) {
    throw new SourceError(
      "*",
      `All ${sources.length} sources failed for window ${window.label}: ${failures.map((f) => f.name).join(", ")}`
    );
  }

  failures.sort((a, b) => a.name.localeCompare(b.name));
  return { postings: mergePostings(buffered.flat()), countsBySource, failures };
}

export async function discoverWindows(
  sources: JobSource[],
  windows: TimeWindow[],
  options: DiscoverOptions = {}
): Promise<DiscoveryResult> {
  const results: DiscoveryResult[] = [];
  const errors: string[] = [];

  for (const window of sortWindows(windows)) {
    try {
      results.push(await discover(sources, window, options));
    } catch (error) {
      errors.push(errorMessage(error));
      options.logger?.warn(errorMessage(error));
    }
  }

  if (results.length === 0) {
    throw new SourceError("*", errors.join("; ") || "No discovery windows configured");
  }

  const countsBySource: Record<string, number> = {};
  const failures = new Map<string, SourceFailure>();
  for (const result of results) {
    for (const [name, count] of Object.entries(result.countsBySource)) {
      countsBySource[name] = Math.max(countsBySource[name] ?? 0, count);
    }
    for (const failure of result.failures) {
      failures.set(failure.name, failure);
    }
  }

  return {
    postings: mergePostings(results.flatMap((result) => result.postings)),
    countsBySource,
    failures: Array.from(failures.values()).sort((a, b) => a.name.localeCompare(b.name)),
  };
}

export function comparePostings(a: JobPosting, b: JobPosting): number {
  const byTime = Date.parse(b.postedAt) - Date.parse(a.postedAt);
  if (byTime !== 0) {
    return byTime;
  }
  if (a.source !== b.source) {
    return a.source < b.source ? -1 : 1;
  }
  if (a.sourceId !== b.sourceId) {
    return a.sourceId < b.sourceId ? -1 : 1;
  }
  return 0;
}

export function mergePostings(postings: JobPosting[]): JobPosting[] {
  const seen = new Set<string>();
  const merged: JobPosting[] = [];
  for (const posting of postings.slice().sort(comparePostings)) {
    if (seen.has(posting.fingerprint)) {
      continue;
    }
    seen.add(posting.fingerprint);
    merged.push(posting);
  }
  return merged;
}
