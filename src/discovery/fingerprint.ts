import crypto from "crypto";
import type { JobPosting, JobPostingInput } from "../types/jobs";

const TRACKING_PARAMS = new Set(["ref", "source", "src", "gh_src", "lever-source", "lever-origin", "trk"]);

export function normalizeUrl(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, "");
  const pathname = url.pathname.replace(/\/+$/, "");
  if (pathname.length === 0) {
    return null;
  }

  const params = Array.from(url.searchParams.entries())
    .filter(([key]) => !key.toLowerCase().startsWith("utm_") && !TRACKING_PARAMS.has(key.toLowerCase()))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  const query = params.map(([key, value]) => `${key}=${value}`).join("&");

  return `${host}${pathname}${query ? `?${query}` : ""}`;
}

export function normalizeText(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, " ").trim();
}

export function computeFingerprint(posting: Pick<JobPosting, "source" | "url" | "title" | "company">): string {
  const normalizedUrl = normalizeUrl(posting.url);
  const key = normalizedUrl
    ? `${posting.source}|url|${normalizedUrl}`
    : `${posting.source}|title|${normalizeText(posting.title)}|${normalizeText(posting.company)}`;
  return crypto.createHash("sha256").update(key).digest("hex").slice(0, 32);
}

export function createPosting(input: JobPostingInput): JobPosting {
  const postedAt = new Date(input.postedAt);
  if (Number.isNaN(postedAt.getTime())) {
    throw new Error(`Invalid postedAt for ${input.source}/${input.sourceId}: ${input.postedAt}`);
  }

  const posting: JobPosting = {
    source: input.source,
    sourceId: input.sourceId,
    title: input.title.trim(),
    company: input.company.trim(),
    location: (input.location ?? "").trim(),
    description: input.description ?? "",
    postedAt: postedAt.toISOString(),
    url: input.url.trim(),
    tags: Object.freeze((input.tags ?? []).slice()),
    fingerprint: "",
  };

  return Object.freeze({ ...posting, fingerprint: computeFingerprint(posting) });
}
