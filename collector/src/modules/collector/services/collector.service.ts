import { logger } from "../../../utils/logger.js";
import { exponentialBackoff } from "../../../utils/retry.js";
import {
  AuthError,
  CollectionAbortedError,
  RateLimitedError,
  TransientNetworkError,
} from "../../../utils/errors.js";
import type { CollectionRequest, MentionProvider, RequestRetry } from "../types/provider.js";
import type { Platform, RawItem, TimeWindow } from "../types/raw-item.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CollectOptions {
  signal?: AbortSignal;
}

export interface CollectionResult {
  items: RawItem[];
  /**
   * The window actually searched. It differs from the request when a stored cursor was resumed or
   * the platform cannot search up to the requested end yet; the next window starts at its `to`.
   */
  window: TimeWindow;
  pages: number;
  /** False when the page limit stopped pagination before the last page. */
  complete: boolean;
  resumed: boolean;
}

export interface ResumeCursor {
  readonly query: string;
  readonly window: TimeWindow;
  readonly cursor: string;
}

export class CollectorService {
  private readonly providers = new Map<Platform, MentionProvider>();
  private readonly cursors = new Map<Platform, ResumeCursor>();

  constructor(
    providers: MentionProvider[],
    private readonly retry: RetryPolicy,
  ) {
    for (const provider of providers) {
      this.providers.set(provider.platform, provider);
    }
  }

  enabledPlatforms(): Platform[] {
    return [...this.providers.values()].filter((provider) => provider.isEnabled()).map((provider) => provider.platform);
  }

  resumeCursor(platform: Platform): ResumeCursor | undefined {
    return this.cursors.get(platform);
  }

  async collect(request: CollectionRequest, options: CollectOptions = {}): Promise<CollectionResult> {
    const { platform } = request;
    const provider = this.providers.get(platform);
    if (!provider || !provider.isEnabled()) {
      throw new AuthError(platform, "Missing credentials");
    }

    const stored = this.cursors.get(platform);
    const resumed = stored !== undefined && stored.query === request.query;
    if (stored && !resumed) {
      logger.info({ platform }, "Discarding resume cursor for a different query");
      this.cursors.delete(platform);
    }

    const window = resumed ? stored.window : provider.searchWindow(request.window);
    const effective: CollectionRequest = { ...request, window };
    let cursor = resumed ? stored.cursor : undefined;

    const retry: RequestRetry = <T>(send: () => Promise<T>): Promise<T> =>
      exponentialBackoff(send, {
        ...this.retry,
        shouldRetry: (error) => error instanceof TransientNetworkError && !options.signal?.aborted,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { platform, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            "Retrying collector request",
          );
        },
      });

    const items: RawItem[] = [];
    let pages = 0;

    while (pages < provider.maxPages) {
      if (options.signal?.aborted) {
        throw new CollectionAbortedError(platform);
      }

      try {
        const page = await provider.fetchPage(effective, { cursor, signal: options.signal, retry });
        pages += 1;
        items.push(...page.items);
        cursor = page.nextCursor;
      } catch (error) {
        if (error instanceof RateLimitedError) {
          if (cursor) {
            this.cursors.set(platform, { query: request.query, window, cursor });
          }
          const partialItems = [...items, ...error.partialItems];
          logger.warn(
            { platform, pages, partialItems: partialItems.length, retryAfterMs: error.retryAfterMs },
            "Collection rate limited",
          );
          throw error.withPartialItems(partialItems);
        }
        throw error;
      }

      if (!cursor) {
        break;
      }
    }

    // a truncated run drops the cursor as well; the next window starts where this one ended
    this.cursors.delete(platform);

    const complete = cursor === undefined;
    logger.debug({ platform, pages, items: items.length, complete, resumed }, "Collection finished");
    return { items, window, pages, complete, resumed };
  }
}
