import type { JobPosting, JobSource, TimeWindow } from "../types/jobs";
import { createPosting } from "./fingerprint";
import { fetchJson } from "./http";
import { isWithinWindow } from "./window";

const REMOTIVE_URL = "https://remotive.com/api/remote-jobs";

interface RemotiveJob {
  id: number;
  url?: string;
  title?: string;
  company_name?: string;
  category?: string;
  tags?: string[];
  job_type?: string;
  publication_date?: string;
  candidate_required_location?: string;
  description?: string;
}

export interface RemotiveOptions {
  keywords?: string[];
  category?: string;
  limit?: number;
}

export function createRemotiveSource(options: RemotiveOptions = {}): JobSource {
  const name = "remotive";
  return {
    name,
    async list(window: TimeWindow): Promise<JobPosting[]> {
      const params = new URLSearchParams();
      if (options.keywords && options.keywords.length > 0) {
        params.set("search", options.keywords.join(" "));
      }
      if (options.category) {
        params.set("category", options.category);
      }
      if (options.limit) {
        params.set("limit", String(options.limit));
      }
      const query = params.toString();
      const url = query ? `${REMOTIVE_URL}?${query}` : REMOTIVE_URL;

      const data = await fetchJson<{ jobs?: RemotiveJob[] }>(name, url);
      const now = new Date();
      const postings: JobPosting[] = [];
      for (const job of data.jobs ?? []) {
        if (!job.publication_date) {
          continue;
        }
        const postedAt = asUtc(job.publication_date);
        if (!isWithinWindow(postedAt, window, now)) {
          continue;
        }
        postings.push(
          createPosting({
            source: name,
            sourceId: String(job.id),
            title: job.title ?? "",
            company: job.company_name ?? "Unknown",
            location: job.candidate_required_location ?? "Remote",
            description: job.description ?? "",
            postedAt,
            url: job.url ?? "",
            tags: job.tags ?? [],
          })
        );
      }
      return postings;
    },
  };
}

// Remotive omits the zone designator; its timestamps are UTC.
function asUtc(timestamp: string): string {
  return /([zZ]|[+-]\d{2}:?\d{2})$/.test(timestamp) ? timestamp : `${timestamp}Z`;
}
