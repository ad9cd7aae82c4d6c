import type { JobPosting, JobSource, TimeWindow } from "../types/jobs";
import { createPosting } from "./fingerprint";
import { fetchJson } from "./http";
import { isWithinWindow } from "./window";

interface LeverPosting {
  id: string;
  text?: string;
  categories?: {
    location?: string;
    team?: string;
    commitment?: string;
  };
  hostedUrl?: string;
  applyUrl?: string;
  createdAt?: number;
  descriptionPlain?: string;
  description?: string;
}

export function createLeverSource(companySlug: string, companyName: string): JobSource {
  const name = `lever:${companySlug}`;
  return {
    name,
    async list(window: TimeWindow): Promise<JobPosting[]> {
      const url = `https://api.lever.co/v0/postings/${companySlug}?mode=json`;
      const jobs = await fetchJson<LeverPosting[]>(name, url);
      const now = new Date();
      return jobs
        .filter((job) => typeof job.createdAt === "number")
        .map((job) => ({ job, postedAt: new Date(job.createdAt ?? 0).toISOString() }))
        .filter(({ postedAt }) => isWithinWindow(postedAt, window, now))
        .map(({ job, postedAt }) =>
          createPosting({
            source: name,
            sourceId: job.id,
            company: companyName,
            title: job.text ?? "",
            location: job.categories?.location ?? "",
            description: job.descriptionPlain ?? job.description ?? "",
            postedAt,
            url: job.hostedUrl ?? job.applyUrl ?? `https://jobs.lever.co/${companySlug}/${job.id}`,
            tags: [job.categories?.team, job.categories?.commitment].filter(
              (tag): tag is string => typeof tag === "string" && tag.length > 0
            ),
          })
        );
    },
  };
}
