import type { JobPosting, JobSource, TimeWindow } from "../types/jobs";
import { createPosting } from "./fingerprint";
import { fetchJson } from "./http";
import { isWithinWindow } from "./window";

interface GreenhouseJob {
  id: number;
  title: string;
  location?: { name?: string };
  departments?: Array<{ name?: string }>;
  absolute_url?: string;
  content?: string;
  updated_at?: string;
  first_published?: string;
}

export function createGreenhouseSource(companySlug: string, companyName: string): JobSource {
  const name = `greenhouse:${companySlug}`;
  return {
    name,
    async list(window: TimeWindow): Promise<JobPosting[]> {
      const url = `https://boards-api.greenhouse.io/v1/boards/${companySlug}/jobs?content=true`;
      const data = await fetchJson<{ jobs?: GreenhouseJob[] }>(name, url);
      const now = new Date();
      const postings: JobPosting[] = [];
      for (const job of data.jobs ?? []) {
        const postedAt = job.first_published ?? job.updated_at;
        if (!postedAt || !isWithinWindow(postedAt, window, now)) {
          continue;
        }
        postings.push(
          createPosting({
            source: name,
            sourceId: String(job.id),
            company: companyName,
            title: job.title ?? "",
            location: job.location?.name ?? "",
            description: job.content ?? "",
            postedAt,
            url: job.absolute_url ?? `https://boards.greenhouse.io/${companySlug}/jobs/${job.id}`,
            tags: job.departments?.map((department) => department.name ?? "").filter(Boolean),
          })
        );
      }
      return postings;
    },
  };
}
