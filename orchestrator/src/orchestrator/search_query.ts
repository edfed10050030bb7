import type { Platform } from "@mention-pulse/collector";
import { compareStrings } from "./count_store.js";
import { containsWholeWord } from "./keyword_matcher.js";
import type { Category, KeywordSet } from "./types.js";

export const QUERY_LENGTH_LIMITS: Record<Platform, number> = {
  twitter: 512,
  youtube: 500,
};

export interface SearchQueryOptions {
  /** Appended to Twitter queries, e.g. `-is:retweet`. */
  twitterSuffix?: string;
  maxLength?: number;
  category?: Category;
}

/**
 * Shortest aliases first; an alias that already contains a kept alias as a whole word adds no
 * results to an OR query and is dropped.
 */
export function searchTerms(keywordSet: KeywordSet, category: Category = "product"): string[] {
  const aliases = [...new Set(keywordSet.categories[category].flatMap((entry) => entry.aliases))].sort(
    (a, b) => a.length - b.length || compareStrings(a, b),
  );

  const kept: string[] = [];
  for (const alias of aliases) {
    if (!kept.some((shorter) => containsWholeWord(alias, shorter))) {
      kept.push(alias);
    }
  }
  return kept;
}

function quote(term: string): string {
  return /\s/.test(term) ? `"${term}"` : term;
}

function render(platform: Platform, terms: readonly string[], suffix: string): string {
  if (platform === "youtube") {
    return terms.join("|");
  }
  const joined = terms.join(" OR ");
  const grouped = terms.length > 1 ? `(${joined})` : joined;
  return suffix ? `${grouped} ${suffix}` : grouped;
}

export function buildSearchQuery(keywordSet: KeywordSet, platform: Platform, options: SearchQueryOptions = {}): string {
  const suffix = platform === "twitter" ? (options.twitterSuffix ?? "").trim() : "";
  const maxLength = options.maxLength ?? QUERY_LENGTH_LIMITS[platform];
  const terms = searchTerms(keywordSet, options.category).map(quote);

  let count = terms.length;
  let query = render(platform, terms.slice(0, count), suffix);
  while (count > 1 && query.length > maxLength) {
    count -= 1;
    query = render(platform, terms.slice(0, count), suffix);
  }
  return query;
}
