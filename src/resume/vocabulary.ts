import defaultEntries from "./skills.json";
import { consumePhrase, joinTokens, tokenize } from "./text";
import type { SkillEntry } from "../types/context";

export interface VocabularyTerm {
  skill: string;
  weight: number;
  phrases: readonly string[];
}

export type SkillVocabulary = readonly VocabularyTerm[];

export function defaultSkillEntries(): SkillEntry[] {
  return defaultEntries.map((entry) => ({ ...entry }));
}

// Later entries override earlier ones with the same skill name.
export function buildVocabulary(...sources: SkillEntry[][]): SkillVocabulary {
  const bySkill = new Map<string, VocabularyTerm>();
  for (const entries of sources) {
    for (const entry of entries) {
      const skill = entry.skill.trim().toLowerCase();
      if (!skill) {
        continue;
      }
      const phrases = [skill, ...(entry.aliases ?? [])]
        .map((term) => tokenize(term).join(" "))
        .filter((phrase) => phrase.length > 0);
      bySkill.set(skill, {
        skill,
        weight: typeof entry.weight === "number" && entry.weight > 0 ? entry.weight : 1,
        phrases: Object.freeze(
          Array.from(new Set(phrases)).sort((a, b) => wordCount(b) - wordCount(a))
        ),
      });
    }
  }
  return Object.freeze(Array.from(bySkill.values()).map((term) => Object.freeze(term)));
}

export function withDeclaredSkills(vocabulary: SkillVocabulary, skills: string[]): SkillVocabulary {
  const known = new Set(vocabulary.map((term) => term.skill));
  const extra = skills
    .map((skill) => skill.trim().toLowerCase())
    .filter((skill) => skill.length > 0 && !known.has(skill))
    .map((skill) => ({ skill, weight: 1 }));
  if (extra.length === 0) {
    return vocabulary;
  }
  return buildVocabulary(
    vocabulary.map((term) => ({ skill: term.skill, aliases: term.phrases.slice(), weight: term.weight })),
    extra
  );
}

// Phrases are consumed longest first across the whole vocabulary, so "spring boot" never also counts as "spring".
export function extractKeywords(text: string, vocabulary: SkillVocabulary): Map<string, number> {
  let rest = joinTokens(tokenize(text));
  const occurrences = new Map<string, number>();
  const phrases = vocabulary
    .flatMap((term) => term.phrases.map((phrase) => ({ skill: term.skill, phrase })))
    .sort((a, b) => wordCount(b.phrase) - wordCount(a.phrase));

  for (const { skill, phrase } of phrases) {
    const consumed = consumePhrase(rest, phrase);
    rest = consumed.rest;
    if (consumed.count > 0) {
      occurrences.set(skill, (occurrences.get(skill) ?? 0) + consumed.count);
    }
  }

  const weights = new Map<string, number>();
  for (const term of vocabulary) {
    const count = occurrences.get(term.skill);
    if (count) {
      weights.set(term.skill, term.weight * (1 + Math.log(count)));
    }
  }
  return weights;
}

function wordCount(phrase: string): number {
  return phrase.split(" ").length;
}
