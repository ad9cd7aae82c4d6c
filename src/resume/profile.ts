import crypto from "crypto";
import { buildVocabulary, defaultSkillEntries, extractKeywords, withDeclaredSkills } from "./vocabulary";
import type { SkillVocabulary } from "./vocabulary";
import type { SkillEntry } from "../types/context";

export interface ResumeProfile {
  readonly text: string;
  readonly skills: ReadonlyMap<string, number>;
  readonly contentHash: string;
  readonly vocabulary: SkillVocabulary;
}

export interface ResumeProfileOptions {
  contentHash?: string;
  vocabulary?: SkillVocabulary;
  extraEntries?: SkillEntry[];
  declaredSkills?: string[];
}

export function buildResumeProfile(text: string, options: ResumeProfileOptions = {}): ResumeProfile {
  const base = options.vocabulary ?? buildVocabulary(defaultSkillEntries(), options.extraEntries ?? []);
  const declared = options.declaredSkills ?? [];
  const vocabulary = withDeclaredSkills(base, declared);

  const skills = extractKeywords(text, vocabulary);
  for (const skill of declared) {
    const key = skill.trim().toLowerCase();
    const term = vocabulary.find((entry) => entry.skill === key);
    if (term && !skills.has(key)) {
      skills.set(key, term.weight);
    }
  }

  return Object.freeze({
    text,
    skills: new Map(Array.from(skills.entries()).sort(([a], [b]) => a.localeCompare(b))),
    contentHash: options.contentHash ?? hashText(text),
    vocabulary,
  });
}

export function hashText(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}
