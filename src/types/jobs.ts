export interface TimeWindow {
  label: string;
  hours: number;
}

export interface JobPosting {
  readonly source: string;
  readonly sourceId: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly description: string;
  readonly postedAt: string;
  readonly url: string;
  readonly tags: readonly string[];
  readonly fingerprint: string;
}

export type JobPostingInput = Omit<JobPosting, "fingerprint" | "tags" | "description" | "location"> & {
  description?: string;
  location?: string;
  tags?: readonly string[];
};

export interface JobSource {
  name: string;
  list(window: TimeWindow): Promise<JobPosting[]>;
}

export interface ScoredCandidate {
  posting: JobPosting;
  score: number;
  matched: string[];
}

export type SourceConfig =
  | { type: "remotive"; keywords?: string[]; category?: string; limit?: number }
  | { type: "greenhouse"; company: string; slug: string }
  | { type: "lever"; company: string; slug: string };
