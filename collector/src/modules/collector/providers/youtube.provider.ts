import type { AxiosInstance } from "axios";
import { z } from "zod";
import { logger } from "../../../utils/logger.js";
import { RateLimitedError, RequestRejectedError, TransientNetworkError } from "../../../utils/errors.js";
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
import type { Engagement, RawItem, TimeWindow } from "../types/raw-item.js";

const ErrorBodySchema = z.object({
  error: z.object({
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

// refusals scoped to one resource rather than to the credentials
const REJECTED_REASONS: ReadonlySet<string> = new Set(["commentsDisabled", "videoNotFound", "forbiddenCommentThreads"]);

export function extractYouTubeReason(data: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(data);
  if (!parsed.success) {
    return undefined;
  }
  return parsed.data.error.errors?.find((entry) => entry.reason)?.reason;
}

const SearchResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: z
          .object({
            publishedAt: z.string().optional(),
            channelId: z.string().optional(),
            title: z.string().optional(),
            description: z.string().optional(),
          })
          .optional(),
      }),
    )
    .default([]),
});

// the API returns counters as decimal strings
const counter = z
  .string()
  .optional()
  .transform((value) => (value === undefined ? undefined : Number(value)))
  .refine((value) => value === undefined || Number.isFinite(value));

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        statistics: z
          .object({
            viewCount: counter,
            likeCount: counter,
            commentCount: counter,
          })
          .optional(),
      }),
    )
    .default([]),
});

const CommentThreadsResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          totalReplyCount: z.number().optional(),
          topLevelComment: z.object({
            id: z.string(),
            snippet: z.object({
              textOriginal: z.string().optional(),
              textDisplay: z.string().optional(),
              publishedAt: z.string().optional(),
              likeCount: z.number().optional(),
              authorChannelId: z.object({ value: z.string() }).optional(),
            }),
          }),
        }),
      }),
    )
    .default([]),
});

type SearchResult = z.infer<typeof SearchResponseSchema>["items"][number];

interface RequestOptions {
  signal?: AbortSignal;
  retry: RequestRetry;
}

export interface YouTubeProviderOptions {
  http: AxiosInstance;
  pageSize: number;
  maxPages: number;
  includeComments: boolean;
  commentsPerVideo: number;
  defaultRetryAfterMs: number;
  quotaRetryMs: number;
  apiKey?: string;
  now?: () => number;
}

export class YouTubeProvider implements MentionProvider {
  readonly platform = "youtube" as const;
  readonly maxPages: number;

  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly includeComments: boolean;
  private readonly commentsPerVideo: number;
  private readonly defaultRetryAfterMs: number;
  private readonly quotaRetryMs: number;
  private readonly apiKey?: string;
  private readonly now: () => number;

  constructor(options: YouTubeProviderOptions) {
    this.http = options.http;
    this.pageSize = options.pageSize;
    this.maxPages = options.maxPages;
    this.includeComments = options.includeComments;
    this.commentsPerVideo = options.commentsPerVideo;
    this.defaultRetryAfterMs = options.defaultRetryAfterMs;
    this.quotaRetryMs = options.quotaRetryMs;
    this.apiKey = options.apiKey;
    this.now = options.now ?? Date.now;
  }

  isEnabled(): boolean {
    return Boolean(this.apiKey);
  }

  searchWindow(window: TimeWindow): TimeWindow {
    return window;
  }

  async fetchPage(request: CollectionRequest, options: FetchPageOptions = {}): Promise<ProviderPage> {
    const requestOptions: RequestOptions = { signal: options.signal, retry: options.retry ?? sendOnce };
    const search = await this.get(
      "/search",
      {
        part: "snippet",
        type: "video",
        order: "date",
        q: request.query,
        publishedAfter: request.window.from.toISOString(),
        publishedBefore: request.window.to.toISOString(),
        maxResults: this.pageSize,
        ...(options.cursor ? { pageToken: options.cursor } : {}),
      },
      SearchResponseSchema,
      requestOptions,
    );

    const videos = search.items.filter((result): result is SearchResult & { id: { videoId: string } } =>
      Boolean(result.id.videoId),
    );
    if (videos.length === 0) {
      return { items: [], nextCursor: search.nextPageToken };
    }

    const statistics = await this.fetchStatistics(
      videos.map((video) => video.id.videoId),
      requestOptions,
    );

    const items: RawItem[] = [];
    for (const video of videos) {
      const videoId = video.id.videoId;
      const snippet = video.snippet;
      const text = [snippet?.title, snippet?.description]
        .filter((part): part is string => Boolean(part && part.trim()))
        .map(decodeHtmlEntities)
        .join("\n");

      items.push({
        id: videoId,
        source: this.platform,
        kind: "video",
        text,
        timestamp: snippet?.publishedAt ?? "",
        authorId: snippet?.channelId ?? "",
        url: `https://www.youtube.com/watch?v=${videoId}`,
        engagement: statistics.get(videoId),
      });

      if (this.includeComments) {
        try {
          items.push(...(await this.fetchComments(videoId, requestOptions)));
        } catch (error) {
          // keep the videos and comments already fetched on this page
          if (error instanceof RateLimitedError) {
            throw error.withPartialItems(items);
          }
          throw error;
        }
      }
    }

    logger.debug(
      { platform: this.platform, videos: videos.length, items: items.length, hasNext: Boolean(search.nextPageToken) },
      "Fetched search page",
    );

    return { items, nextCursor: search.nextPageToken };
  }

  private async fetchStatistics(videoIds: string[], options: RequestOptions): Promise<Map<string, Engagement>> {
    const response = await this.get(
      "/videos",
      { part: "statistics", id: videoIds.join(",") },
      VideosResponseSchema,
      options,
    );

    const stats = new Map<string, Engagement>();
    for (const video of response.items) {
      if (!video.statistics) {
        continue;
      }
      stats.set(video.id, {
        views: video.statistics.viewCount,
        likes: video.statistics.likeCount,
        comments: video.statistics.commentCount,
      });
    }
    return stats;
  }

  private async fetchComments(videoId: string, options: RequestOptions): Promise<RawItem[]> {
    try {
      const response = await this.get(
        "/commentThreads",
        {
          part: "snippet",
          videoId,
          maxResults: this.commentsPerVideo,
          textFormat: "plainText",
          order: "time",
        },
        CommentThreadsResponseSchema,
        options,
      );

      return response.items.map<RawItem>((thread) => {
        const comment = thread.snippet.topLevelComment;
        return {
          id: comment.id,
          source: this.platform,
          kind: "comment",
          text: comment.snippet.textOriginal ?? comment.snippet.textDisplay ?? "",
          timestamp: comment.snippet.publishedAt ?? "",
          authorId: comment.snippet.authorChannelId?.value ?? "",
          url: `https://www.youtube.com/watch?v=${videoId}&lc=${comment.id}`,
          engagement: {
            likes: comment.snippet.likeCount,
            replies: thread.snippet.totalReplyCount,
          },
        };
      });
    } catch (error) {
      // only this video's comments are lost; quota, auth and abort still end the page
      if (error instanceof RequestRejectedError || error instanceof TransientNetworkError) {
        logger.warn({ platform: this.platform, videoId, reason: error.message }, "Skipping comments for video");
        return [];
      }
      throw error;
    }
  }

  private async get<T extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | number>,
    schema: T,
    options: RequestOptions,
  ): Promise<z.output<T>> {
    const body = await options.retry(async () => {
      try {
        const response = await this.http.get<unknown>(path, {
          params: { ...params, key: this.apiKey },
          signal: options.signal,
        });
        return response.data;
      } catch (error) {
        throw classifyHttpError(error, {
          platform: this.platform,
          defaultRetryAfterMs: this.defaultRetryAfterMs,
          quotaRetryAfterMs: this.quotaRetryMs,
          extractReason: extractYouTubeReason,
          rejectedReasons: REJECTED_REASONS,
          now: this.now,
        });
      }
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RequestRejectedError(this.platform, `Unexpected ${path} response shape`, undefined, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

