import type { AxiosInstance } from "axios";
import { z } from "zod";
import { logger } from "../../../utils/logger.js";
import { RequestRejectedError } from "../../../utils/errors.js";
import { decodeHtmlEntities } from "../../../utils/html.js";
import { sendOnce } from "../../../utils/retry.js";
import { classifyHttpError } from "./http-errors.js";
import type {
  CollectionRequest,
  FetchPageOptions,
  MentionProvider,
  ProviderPage,
  RequestRetry,
} from "../types/provider.js";
import type { RawItem, TimeWindow } from "../types/raw-item.js";

/** Recent search only reaches this far back. */
export const RECENT_SEARCH_HORIZON_MS = 7 * 24 * 60 * 60 * 1000;
// start_time must be strictly inside the horizon when the request reaches the API
const HORIZON_MARGIN_MS = 60_000;
// end_time has to be at least 10s before the request
const END_TIME_LAG_MS = 10_000;

const TWEET_FIELDS = "created_at,public_metrics,lang,author_id";

const PublicMetricsSchema = z
  .object({
    like_count: z.number().optional(),
    reply_count: z.number().optional(),
    retweet_count: z.number().optional(),
    quote_count: z.number().optional(),
    impression_count: z.number().optional(),
  })
  .partial();

const TweetSchema = z.object({
  id: z.string(),
  text: z.string().optional(),
  created_at: z.string().optional(),
  author_id: z.string().optional(),
  public_metrics: PublicMetricsSchema.optional(),
});

const SearchResponseSchema = z.object({
  data: z.array(TweetSchema).optional(),
  meta: z
    .object({
      next_token: z.string().optional(),
      result_count: z.number().optional(),
    })
    .optional(),
});

type Tweet = z.infer<typeof TweetSchema>;

export interface TwitterProviderOptions {
  http: AxiosInstance;
  pageSize: number;
  maxPages: number;
  defaultRetryAfterMs: number;
  bearerToken?: string;
  now?: () => number;
}

export class TwitterProvider implements MentionProvider {
  readonly platform = "twitter" as const;
  readonly maxPages: number;

  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly defaultRetryAfterMs: number;
  private readonly bearerToken?: string;
  private readonly now: () => number;

  constructor(options: TwitterProviderOptions) {
    this.http = options.http;
    this.pageSize = options.pageSize;
    this.maxPages = options.maxPages;
    this.defaultRetryAfterMs = options.defaultRetryAfterMs;
    this.bearerToken = options.bearerToken;
    this.now = options.now ?? Date.now;
  }

  isEnabled(): boolean {
    return Boolean(this.bearerToken);
  }

  async fetchPage(request: CollectionRequest, options: FetchPageOptions = {}): Promise<ProviderPage> {
    const { from, to } = this.searchWindow(request.window);
    if (from.getTime() >= to.getTime()) {
      return { items: [] };
    }
    const params: Record<string, string | number> = {
      query: request.query,
      max_results: this.pageSize,
      start_time: from.toISOString(),
      end_time: to.toISOString(),
      "tweet.fields": TWEET_FIELDS,
    };
    if (options.cursor) {
      params.next_token = options.cursor;
    }

    const retry: RequestRetry = options.retry ?? sendOnce;
    const body = await retry(async () => {
      try {
        const response = await this.http.get<unknown>("/tweets/search/recent", {
          params,
          signal: options.signal,
        });
        return response.data;
      } catch (error) {
        throw classifyHttpError(error, {
          platform: this.platform,
          defaultRetryAfterMs: this.defaultRetryAfterMs,
          now: this.now,
        });
      }
    });

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestRejectedError(this.platform, "Unexpected recent search response shape", undefined, {
        cause: parsed.error,
      });
    }

    const tweets = parsed.data.data ?? [];
    logger.debug(
      { platform: this.platform, count: tweets.length, hasNext: Boolean(parsed.data.meta?.next_token) },
      "Fetched recent search page",
    );

    return {
      items: tweets.map((tweet) => this.toRawItem(tweet)),
      nextCursor: parsed.data.meta?.next_token,
    };
  }

  /**
   * Clamps a window to what recent search accepts now. The end moves back to `now - 10s`, so callers
   * must continue from the returned `to`, not from the requested one.
   */
  searchWindow(window: TimeWindow): TimeWindow {
    const now = this.now();
    const earliest = now - RECENT_SEARCH_HORIZON_MS + HORIZON_MARGIN_MS;
    const from = window.from.getTime() < earliest ? new Date(earliest) : window.from;
    if (from.getTime() !== window.from.getTime()) {
      logger.debug(
        { requested: window.from.toISOString(), clamped: from.toISOString() },
        "Clamped start_time to search horizon",
      );
    }
    const latest = Math.max(now - END_TIME_LAG_MS, from.getTime());
    const to = window.to.getTime() > latest ? new Date(latest) : window.to;
    return { from, to };
  }

  private toRawItem(tweet: Tweet): RawItem {
    const metrics = tweet.public_metrics;
    const authorId = tweet.author_id ?? "";
    return {
      id: tweet.id,
      source: this.platform,
      kind: "tweet",
      text: decodeHtmlEntities(tweet.text ?? ""),
      timestamp: tweet.created_at ?? "",
      authorId,
      url: authorId ? `https://twitter.com/${authorId}/status/${tweet.id}` : `https://twitter.com/i/web/status/${tweet.id}`,
      engagement: metrics
        ? {
            likes: metrics.like_count,
            replies: metrics.reply_count,
            reposts: (metrics.retweet_count ?? 0) + (metrics.quote_count ?? 0),
            views: metrics.impression_count,
          }
        : undefined,
    };
  }
}
