import type { RawItem } from "@mention-pulse/collector";

import { parseKeywordSet } from "../src/orchestrator/keyword_set.js";
import type { KeywordSet } from "../src/orchestrator/types.js";

export function buildKeywordSet(): KeywordSet {
  return parseKeywordSet({
    version: "test-1",
    categories: {
      product: [
        { canonical: "Oreo Original", aliases: ["oreo", "oreos"] },
        { canonical: "Oreo Double Stuf", aliases: ["double stuf"] },
        { canonical: "Oreo Golden", aliases: ["golden oreo"] },
      ],
      flavor: [
        { canonical: "golden" },
        { canonical: "mint" },
        { canonical: "chocolate" },
        { canonical: "dark chocolate" },
        { canonical: "s'mores", aliases: ["smores"] },
      ],
    },
  });
}

let sequence = 0;

export function item(text: string, overrides: Partial<RawItem> = {}): RawItem {
  sequence += 1;
  return {
    id: `item-${sequence}`,
    source: "twitter",
    kind: "tweet",
    text,
    timestamp: "2024-06-10T09:15:00.000Z",
    authorId: "author-1",
    ...overrides,
  };
}
