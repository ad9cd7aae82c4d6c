import { extractKeywords } from "../resume/vocabulary";
import type { ResumeProfile } from "../resume/profile";
import type { JobPosting, ScoredCandidate } from "../types/jobs";

export interface ScoringOptions {
  recencyHalflifeHours: number;
  boosts: {
    title: number;
    location: number;
  };
  titles: string[];
  locations: string[];
}

export function postingKeywords(posting: JobPosting, profile: ResumeProfile): Map<string, number> {
  const text = [posting.title, posting.description, posting.tags.join(" ")].join("\n");
  return extractKeywords(text, profile.vocabulary);
}

export function weightedOverlap(resume: ReadonlyMap<string, number>, posting: ReadonlyMap<string, number>): number {
  let intersection = 0;
  let union = 0;
  const skills = new Set([...resume.keys(), ...posting.keys()]);
  for (const skill of skills) {
    const r = resume.get(skill) ?? 0;
    const p = posting.get(skill) ?? 0;
    intersection += Math.min(r, p);
    union += Math.max(r, p);
  }
  return union > 0 ? intersection / union : 0;
}

export function recencyMultiplier(postedAt: string, halflifeHours: number, now: Date): number {
  const ageHours = Math.max(0, (now.getTime() - Date.parse(postedAt)) / 3_600_000);
  return Math.pow(0.5, ageHours / halflifeHours);
}

function containsAny(value: string, needles: string[]): boolean {
  const haystack = value.toLowerCase();
  return needles.some((needle) => needle.trim().length > 0 && haystack.includes(needle.trim().toLowerCase()));
}

export function scorePosting(
  posting: JobPosting,
  profile: ResumeProfile,
  options: ScoringOptions,
  now: Date
): ScoredCandidate {
  const keywords = postingKeywords(posting, profile);
  let score = weightedOverlap(profile.skills, keywords);
  score *= recencyMultiplier(posting.postedAt, options.recencyHalflifeHours, now);

  if (containsAny(posting.title, options.titles)) {
    score *= options.boosts.title;
  }
  if (containsAny(posting.location, options.locations)) {
    score *= options.boosts.location;
  }

  const matched = Array.from(keywords.keys())
    .filter((skill) => profile.skills.has(skill))
    .sort();

  return {
    posting,
    score: Math.min(1, Math.max(0, score)),
    matched,
  };
}
