import {
  isPlatform,
  isRawItemKind,
  type Engagement,
  type Platform,
  type RawItem,
  type RawItemKind,
} from "@mention-pulse/collector";
import { bucketStart, parseTimestamp } from "./buckets.js";
import { compareStrings, TallyTable } from "./count_store.js";
import { MalformedItemError } from "./errors.js";
import { KeywordMatcher } from "./keyword_matcher.js";
import { logger as rootLogger } from "./logger.js";
import type {
  AggregateCountView,
  AggregatorState,
  BatchResult,
  Category,
  CoMentionEntry,
  CountEntry,
  CountFilter,
  Granularity,
  ItemTotal,
  KeywordSet,
  KeywordTotal,
  MentionRecord,
  SkippedItem,
  VideoStat,
} from "./types.js";

type CountKey = { source: Platform; category: Category; keyword: string; bucket: string };
type ItemKey = { source: Platform; kind: RawItemKind; bucket: string };
type CoMentionKey = { source: Platform; bucket: string; product: string; flavor: string };

type TimeFilter = Pick<CountFilter, "source" | "from" | "to">;

export interface MentionAggregatorOptions {
  keywordSet: KeywordSet;
  granularity: Granularity;
}

interface ValidItem {
  id: string;
  source: Platform;
  kind: RawItemKind;
  text: string;
  timestamp: string;
  date: Date;
}

function validate(item: RawItem): ValidItem {
  const id = typeof item.id === "string" ? item.id.trim() : "";
  const source = String(item.source ?? "");
  if (!id) {
    throw new MalformedItemError("", source, "missing id");
  }
  if (!isPlatform(item.source)) {
    throw new MalformedItemError(id, source, `unknown source "${source}"`);
  }
  if (!isRawItemKind(item.kind)) {
    throw new MalformedItemError(id, source, `unknown kind "${String(item.kind ?? "")}"`);
  }
  if (typeof item.text !== "string" || item.text.trim().length === 0) {
    throw new MalformedItemError(id, source, "empty text");
  }
  if (typeof item.timestamp !== "string" || item.timestamp.trim().length === 0) {
    throw new MalformedItemError(id, source, "missing timestamp");
  }
  const date = parseTimestamp(item.timestamp);
  if (!date) {
    throw new MalformedItemError(id, source, `unparsable timestamp "${item.timestamp}"`);
  }
  return { id, source: item.source, kind: item.kind, text: item.text, timestamp: item.timestamp, date };
}

function statistic(engagement: Engagement | undefined, field: "views" | "likes" | "comments"): number {
  const value = engagement?.[field];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 0;
}

function toVideoStat(item: RawItem, valid: ValidItem): VideoStat {
  return {
    videoId: valid.id,
    title: valid.text.split("\n", 1)[0].trim(),
    url: item.url ?? null,
    publishedAt: valid.timestamp,
    views: statistic(item.engagement, "views"),
    likes: statistic(item.engagement, "likes"),
    comments: statistic(item.engagement, "comments"),
  };
}

function inRange(bucket: string, filter: TimeFilter): boolean {
  if (filter.from !== undefined && bucket < filter.from) {
    return false;
  }
  return !(filter.to !== undefined && bucket >= filter.to);
}

/**
 * Turns raw items into mention records and owns the only mutable copy of the counts. Batches are
 * applied synchronously, so a batch is never observed half-applied.
 */
export class MentionAggregator implements AggregateCountView {
  readonly keywordSet: KeywordSet;
  readonly granularity: Granularity;

  private readonly matcher: KeywordMatcher;
  private readonly mentionCounts = new TallyTable<CountKey>(["source", "category", "keyword", "bucket"]);
  private readonly itemCounts = new TallyTable<ItemKey>(["source", "kind", "bucket"]);
  private readonly coMentionCounts = new TallyTable<CoMentionKey>(["source", "bucket", "product", "flavor"]);
  // source + id -> bucket, so pruning can forget items along with their counts
  private readonly seen = new Map<string, string>();
  private readonly videos = new Map<string, { stat: VideoStat; bucket: string }>();
  private currentState: AggregatorState = "idle";
  private readonly logger = rootLogger.child({ component: "aggregator" });

  constructor(options: MentionAggregatorOptions) {
    this.keywordSet = options.keywordSet;
    this.granularity = options.granularity;
    this.matcher = new KeywordMatcher(options.keywordSet);
  }

  get state(): AggregatorState {
    return this.currentState;
  }

  get trackedItems(): number {
    return this.seen.size;
  }

  processBatch(items: readonly RawItem[]): BatchResult {
    this.currentState = "processing";
    const records: MentionRecord[] = [];
    const skipped: SkippedItem[] = [];
    let processed = 0;
    let duplicates = 0;

    try {
      for (const item of items) {
        let valid: ValidItem;
        try {
          valid = validate(item);
        } catch (error) {
          if (!(error instanceof MalformedItemError)) {
            throw error;
          }
          skipped.push({ itemId: error.itemId, source: error.source, reason: error.reason });
          this.logger.warn({ itemId: error.itemId, source: error.source, reason: error.reason }, "Skipping malformed item");
          continue;
        }

        const seenKey = `${valid.source}:${valid.id}`;
        const seenBucket = this.seen.get(seenKey);
        if (seenBucket !== undefined) {
          duplicates += 1;
          // statistics move after publication; the counts do not
          if (valid.kind === "video") {
            this.videos.set(seenKey, { stat: toVideoStat(item, valid), bucket: seenBucket });
          }
          continue;
        }

        const bucket = bucketStart(valid.date, this.granularity);
        this.seen.set(seenKey, bucket);
        processed += 1;
        this.itemCounts.increment({ source: valid.source, kind: valid.kind, bucket });
        if (valid.kind === "video") {
          this.videos.set(seenKey, { stat: toVideoStat(item, valid), bucket });
        }

        const matches = this.matcher.match(valid.text);
        for (const match of matches) {
          records.push({
            source: valid.source,
            category: match.category,
            keyword: match.keyword,
            bucket,
            itemId: valid.id,
            timestamp: valid.timestamp,
          });
          this.mentionCounts.increment({ source: valid.source, category: match.category, keyword: match.keyword, bucket });
        }

        const products = matches.filter((match) => match.category === "product");
        const flavors = matches.filter((match) => match.category === "flavor");
        for (const product of products) {
          for (const flavor of flavors) {
            this.coMentionCounts.increment({
              source: valid.source,
              bucket,
              product: product.keyword,
              flavor: flavor.keyword,
            });
          }
        }
      }
    } finally {
      this.currentState = "idle";
    }

    if (skipped.length > 0 || duplicates > 0) {
      this.logger.debug({ processed, skipped: skipped.length, duplicates, records: records.length }, "Batch aggregated");
    }

    return { records, processed, skipped, duplicates };
  }

  counts(filter: CountFilter = {}): CountEntry[] {
    const keyword = filter.keyword?.trim().toLowerCase();
    return this.mentionCounts
      .rows(
        (key) =>
          (filter.source === undefined || key.source === filter.source) &&
          (filter.category === undefined || key.category === filter.category) &&
          (keyword === undefined || key.keyword.toLowerCase() === keyword) &&
          inRange(key.bucket, filter),
      )
      .sort(
        (a, b) =>
          compareStrings(a.bucket, b.bucket) ||
          compareStrings(a.source, b.source) ||
          compareStrings(a.category, b.category) ||
          compareStrings(a.keyword, b.keyword),
      );
  }

  totals(filter: CountFilter = {}): KeywordTotal[] {
    const sums = new TallyTable<{ category: Category; keyword: string }>(["category", "keyword"]);
    for (const entry of this.counts(filter)) {
      sums.increment({ category: entry.category, keyword: entry.keyword }, entry.count);
    }
    return sums
      .rows()
      .sort(
        (a, b) =>
          b.count - a.count || compareStrings(a.keyword, b.keyword) || compareStrings(a.category, b.category),
      );
  }

  itemTotals(filter: TimeFilter = {}): ItemTotal[] {
    return this.itemCounts
      .rows((key) => (filter.source === undefined || key.source === filter.source) && inRange(key.bucket, filter))
      .sort(
        (a, b) =>
          compareStrings(a.bucket, b.bucket) || compareStrings(a.source, b.source) || compareStrings(a.kind, b.kind),
      );
  }

  topVideos(limit = 10): VideoStat[] {
    return [...this.videos.values()]
      .map((entry) => entry.stat)
      .sort((a, b) => b.views - a.views || compareStrings(a.videoId, b.videoId))
      .slice(0, Math.max(0, limit));
  }

  coMentions(filter: TimeFilter = {}): CoMentionEntry[] {
    return this.coMentionCounts
      .rows((key) => (filter.source === undefined || key.source === filter.source) && inRange(key.bucket, filter))
      .sort(
        (a, b) =>
          compareStrings(a.bucket, b.bucket) ||
          compareStrings(a.source, b.source) ||
          compareStrings(a.product, b.product) ||
          compareStrings(a.flavor, b.flavor),
      );
  }

  /** Drops every bucket that starts before the bucket containing `before`. */
  prune(before: Date): number {
    const cutoff = bucketStart(before, this.granularity);
    const isStale = (key: { bucket: string }) => key.bucket < cutoff;
    const removed = this.mentionCounts.deleteWhere(isStale);
    this.itemCounts.deleteWhere(isStale);
    this.coMentionCounts.deleteWhere(isStale);
    for (const [key, bucket] of this.seen) {
      if (bucket < cutoff) {
        this.seen.delete(key);
      }
    }
    for (const [key, video] of this.videos) {
      if (video.bucket < cutoff) {
        this.videos.delete(key);
      }
    }
    if (removed > 0) {
      this.logger.info({ cutoff, removed }, "Pruned expired buckets");
    }
    return removed;
  }

  /** Read-only facade for renderers; exposes no mutators. */
  view(): AggregateCountView {
    return {
      counts: (filter) => this.counts(filter),
      totals: (filter) => this.totals(filter),
      itemTotals: (filter) => this.itemTotals(filter),
      coMentions: (filter) => this.coMentions(filter),
      topVideos: (limit) => this.topVideos(limit),
    };
  }
}
