import { normalizeText } from "./keyword_set.js";
import { CATEGORIES, type Category, type KeywordSet } from "./types.js";

interface AliasEntry {
  readonly alias: string;
  readonly canonical: string;
}

export interface KeywordMatch {
  readonly category: Category;
  readonly keyword: string;
}

const WORD_CHAR = /[\p{L}\p{N}_]/u;

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

/**
 * True when `needle` sits at `index` of `haystack` with no word character glued to either end.
 * Edges of the needle that are themselves punctuation need no boundary.
 */
export function matchesWholeWordAt(haystack: string, needle: string, index: number): boolean {
  if (!haystack.startsWith(needle, index)) {
    return false;
  }
  if (isWordChar(needle[0]) && isWordChar(haystack[index - 1])) {
    return false;
  }
  const end = index + needle.length;
  return !(isWordChar(needle[needle.length - 1]) && isWordChar(haystack[end]));
}

export function containsWholeWord(haystack: string, needle: string): boolean {
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    if (matchesWholeWordAt(haystack, needle, index)) {
      return true;
    }
    index = haystack.indexOf(needle, index + 1);
  }
  return false;
}

type AliasIndex = Map<string, AliasEntry[]>;

function buildIndex(keywordSet: KeywordSet, category: Category): AliasIndex {
  const index: AliasIndex = new Map();
  for (const entry of keywordSet.categories[category]) {
    for (const alias of entry.aliases) {
      const first = alias[0];
      if (first === undefined) {
        continue;
      }
      const bucket = index.get(first) ?? [];
      bucket.push({ alias, canonical: entry.canonical });
      index.set(first, bucket);
    }
  }
  for (const bucket of index.values()) {
    bucket.sort((a, b) => b.alias.length - a.alias.length);
  }
  return index;
}

/**
 * Leftmost-longest, non-overlapping alias scan, run once per category. A canonical keyword is
 * reported once per text no matter how many of its aliases occur.
 */
export class KeywordMatcher {
  private readonly indexes: ReadonlyMap<Category, AliasIndex>;

  constructor(keywordSet: KeywordSet) {
    this.indexes = new Map(CATEGORIES.map((category) => [category, buildIndex(keywordSet, category)]));
  }

  match(text: string): KeywordMatch[] {
    const normalised = normalizeText(text);
    return CATEGORIES.flatMap((category) =>
      this.scan(normalised, category).map((keyword) => ({ category, keyword })),
    );
  }

  matchCategory(text: string, category: Category): string[] {
    return this.scan(normalizeText(text), category);
  }

  private scan(text: string, category: Category): string[] {
    const index = this.indexes.get(category);
    if (!index || index.size === 0) {
      return [];
    }

    const found: string[] = [];
    let position = 0;
    while (position < text.length) {
      const candidates = index.get(text[position] ?? "");
      const hit = candidates?.find((candidate) => matchesWholeWordAt(text, candidate.alias, position));
      if (!hit) {
        position += 1;
        continue;
      }
      if (!found.includes(hit.canonical)) {
        found.push(hit.canonical);
      }
      position += hit.alias.length;
    }
    return found;
  }
}
