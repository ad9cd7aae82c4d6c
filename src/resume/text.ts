const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "for",
  "from",
  "have",
  "in",
  "into",
  "is",
  "it",
  "of",
  "on",
  "or",
  "our",
  "such",
  "that",
  "the",
  "this",
  "to",
  "we",
  "will",
  "with",
  "you",
  "your",
]);

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const code = hex ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

export function stripHtml(text: string): string {
  // Greenhouse returns escaped markup, so entities are decoded on both sides of the tag strip.
  const unescaped = decodeEntities(text);
  return decodeEntities(unescaped.replace(/<[^>]*>/g, " "));
}

export function tokenize(text: string): string[] {
  return stripHtml(text)
    .toLowerCase()
    .split(/[^a-z0-9+#.]+/)
    .map((token) => token.replace(/^\.+|\.+$/g, ""))
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

export function joinTokens(tokens: string[]): string {
  return ` ${tokens.join(" ")} `;
}

// Occurrences are replaced with a marker so a shorter phrase does not count them again.
export function consumePhrase(joined: string, phrase: string): { count: number; rest: string } {
  const needle = ` ${phrase} `;
  let count = 0;
  let rest = joined;
  let index = rest.indexOf(needle);
  while (index !== -1) {
    count += 1;
    rest = `${rest.slice(0, index)} ~ ${rest.slice(index + needle.length)}`;
    index = rest.indexOf(needle, index + 2);
  }
  return { count, rest };
}
