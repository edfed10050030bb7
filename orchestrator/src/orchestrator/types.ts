import type { Platform, RawItemKind } from "@mention-pulse/collector";

export const CATEGORIES = ["product", "flavor"] as const;

export type Category = (typeof CATEGORIES)[number];

export type Granularity = "minute" | "hour" | "day";

export interface KeywordEntry {
  readonly canonical: string;
  readonly aliases: readonly string[];
}

export interface KeywordSet {
  readonly version: string;
  readonly categories: Readonly<Record<Category, readonly KeywordEntry[]>>;
}

export interface MentionRecord {
  readonly source: Platform;
  readonly category: Category;
  readonly keyword: string;
  /** ISO start of the time bucket the item falls in. */
  readonly bucket: string;
  readonly itemId: string;
  readonly timestamp: string;
}

export interface SkippedItem {
  readonly itemId: string;
  readonly source: string;
  readonly reason: string;
}

export interface BatchResult {
  readonly records: MentionRecord[];
  readonly processed: number;
  readonly skipped: SkippedItem[];
  readonly duplicates: number;
}

export type AggregatorState = "idle" | "processing";

export interface CountFilter {
  readonly source?: Platform;
  readonly category?: Category;
  readonly keyword?: string;
  /** Inclusive bucket start. */
  readonly from?: string;
  /** Exclusive bucket start. */
  readonly to?: string;
}

export interface CountEntry {
  readonly source: Platform;
  readonly category: Category;
  readonly keyword: string;
  readonly bucket: string;
  readonly count: number;
}

export interface KeywordTotal {
  readonly category: Category;
  readonly keyword: string;
  readonly count: number;
}

export interface ItemTotal {
  readonly source: Platform;
  readonly kind: RawItemKind;
  readonly bucket: string;
  readonly count: number;
}

export interface CoMentionEntry {
  readonly source: Platform;
  readonly bucket: string;
  readonly product: string;
  readonly flavor: string;
  readonly count: number;
}

/** Latest statistics seen for one video; re-delivery of the video refreshes them. */
export interface VideoStat {
  readonly videoId: string;
  readonly title: string;
  readonly url: string | null;
  readonly publishedAt: string;
  readonly views: number;
  readonly likes: number;
  readonly comments: number;
}

export interface AggregateCountView {
  counts(filter?: CountFilter): CountEntry[];
  totals(filter?: CountFilter): KeywordTotal[];
  itemTotals(filter?: Omit<CountFilter, "category" | "keyword">): ItemTotal[];
  coMentions(filter?: Omit<CountFilter, "category" | "keyword">): CoMentionEntry[];
  /** Videos ordered by views, most viewed first. */
  topVideos(limit?: number): VideoStat[];
}

export interface ExecutiveSummary {
  source: Platform | "all";
  generatedAt: string;
  totalItems: number;
  itemsByKind: Record<RawItemKind, number>;
  totalMentions: number;
  productsMentioned: number;
  mostDiscussedProduct: string | null;
  popularFlavor: string | null;
  productShare: Array<{ product: string; mentions: number; percentage: number }>;
  topFlavors: Array<{ flavor: string; mentions: number }>;
  flavorByProduct: Array<{ product: string; flavor: string; mentions: number }>;
  topVideos: VideoStat[];
  summary: string;
}

export type PlatformStatus = "idle" | "ok" | "rate_limited" | "auth_error" | "degraded" | "error";

export interface TimingBreakdown {
  collectMs: number;
  aggregateMs: number;
  totalMs: number;
}
