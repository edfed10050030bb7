import type { AxiosInstance } from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { TwitterProvider } from "../src/modules/collector/providers/twitter.provider.js";
import { CollectorService } from "../src/modules/collector/services/collector.service.js";
import type {
  CollectionRequest,
  FetchPageOptions,
  MentionProvider,
  ProviderPage,
  RequestRetry,
} from "../src/modules/collector/types/provider.js";
import type { RawItem } from "../src/modules/collector/types/raw-item.js";
import {
  AuthError,
  CollectionAbortedError,
  RateLimitedError,
  TransientNetworkError,
} from "../src/utils/errors.js";
import { sendOnce } from "../src/utils/retry.js";

type FetchPage = ReturnType<typeof vi.fn<[CollectionRequest, FetchPageOptions?], Promise<ProviderPage>>>;

interface FakeProvider extends MentionProvider {
  fetchPage: FetchPage;
}

function createProvider(maxPages = 3, enabled = true): FakeProvider {
  return {
    platform: "twitter",
    maxPages,
    isEnabled: () => enabled,
    searchWindow: (window) => window,
    fetchPage: vi.fn(),
  };
}

function tweet(id: string): RawItem {
  return {
    id,
    source: "twitter",
    kind: "tweet",
    text: `oreo post ${id}`,
    timestamp: "2024-06-10T09:00:00.000Z",
    authorId: "author",
  };
}

const withRetry = (options?: FetchPageOptions): RequestRetry => options?.retry ?? sendOnce;

const retry = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

const request: CollectionRequest = {
  platform: "twitter",
  query: "oreo",
  window: { from: new Date("2024-06-10T08:00:00.000Z"), to: new Date("2024-06-10T10:00:00.000Z") },
};

describe("CollectorService", () => {
  let provider: FakeProvider;
  let service: CollectorService;

  beforeEach(() => {
    provider = createProvider();
    service = new CollectorService([provider], retry);
  });

  it("follows cursors until the last page", async () => {
    provider.fetchPage
      .mockResolvedValueOnce({ items: [tweet("1")], nextCursor: "c1" })
      .mockResolvedValueOnce({ items: [tweet("2")] });

    const result = await service.collect(request);

    expect(result.items.map((item) => item.id)).toEqual(["1", "2"]);
    expect(result).toMatchObject({ pages: 2, complete: true, resumed: false, window: request.window });
    expect(provider.fetchPage.mock.calls.map(([, options]) => options?.cursor)).toEqual([undefined, "c1"]);
  });

  it("stops at the page limit and reports the run as incomplete", async () => {
    provider.fetchPage.mockImplementation(async (_request, options) => ({
      items: [tweet(options?.cursor ?? "first")],
      nextCursor: `${options?.cursor ?? ""}x`,
    }));

    const result = await service.collect(request);

    expect(result.pages).toBe(3);
    expect(result.complete).toBe(false);
    expect(service.resumeCursor("twitter")).toBeUndefined();
  });

  it("retries a failing request and then surfaces the failure", async () => {
    const send = vi.fn<[], Promise<ProviderPage>>().mockRejectedValue(new TransientNetworkError("twitter"));
    provider.fetchPage.mockImplementation(async (_request, options) => withRetry(options)(send));

    await expect(service.collect(request)).rejects.toBeInstanceOf(TransientNetworkError);
    expect(send).toHaveBeenCalledTimes(3);
    expect(provider.fetchPage).toHaveBeenCalledTimes(1);
  });

  it("recovers when a retry succeeds", async () => {
    const send = vi
      .fn<[], Promise<ProviderPage>>()
      .mockRejectedValueOnce(new TransientNetworkError("twitter"))
      .mockResolvedValueOnce({ items: [tweet("1")] });
    provider.fetchPage.mockImplementation(async (_request, options) => withRetry(options)(send));

    const result = await service.collect(request);

    expect(result.items).toHaveLength(1);
    expect(send).toHaveBeenCalledTimes(2);
  });

  it("never retries auth errors", async () => {
    const send = vi.fn<[], Promise<ProviderPage>>().mockRejectedValue(new AuthError("twitter"));
    provider.fetchPage.mockImplementation(async (_request, options) => withRetry(options)(send));

    await expect(service.collect(request)).rejects.toBeInstanceOf(AuthError);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("keeps earlier pages and the cursor when a later page is rate limited", async () => {
    provider.fetchPage
      .mockResolvedValueOnce({ items: [tweet("1")], nextCursor: "c1" })
      .mockRejectedValueOnce(new RateLimitedError("twitter", 30_000));

    const failure = await service.collect(request).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RateLimitedError);
    expect(failure).toMatchObject({ retryAfterMs: 30_000, partialItems: [tweet("1")] });
    expect(service.resumeCursor("twitter")).toEqual({ query: "oreo", window: request.window, cursor: "c1" });
  });

  it("adds the items of the interrupted page to the partial items", async () => {
    provider.fetchPage
      .mockResolvedValueOnce({ items: [tweet("1")], nextCursor: "c1" })
      .mockRejectedValueOnce(new RateLimitedError("twitter", 30_000, "Quota exhausted", [tweet("2")]));

    const failure = await service.collect(request).catch((error: unknown) => error);

    expect(failure).toMatchObject({ message: "Quota exhausted", partialItems: [tweet("1"), tweet("2")] });
  });

  it("resumes from the stored cursor and window on the next call", async () => {
    provider.fetchPage
      .mockResolvedValueOnce({ items: [tweet("1")], nextCursor: "c1" })
      .mockRejectedValueOnce(new RateLimitedError("twitter", 30_000))
      .mockResolvedValueOnce({ items: [tweet("2")] });

    await expect(service.collect(request)).rejects.toBeInstanceOf(RateLimitedError);

    const later: CollectionRequest = {
      ...request,
      window: { from: request.window.to, to: new Date("2024-06-10T12:00:00.000Z") },
    };
    const result = await service.collect(later);

    expect(result.resumed).toBe(true);
    expect(result.window).toEqual(request.window);
    expect(result.items.map((item) => item.id)).toEqual(["2"]);
    expect(provider.fetchPage.mock.calls[2]?.[0].window).toEqual(request.window);
    expect(provider.fetchPage.mock.calls[2]?.[1]?.cursor).toBe("c1");
    expect(service.resumeCursor("twitter")).toBeUndefined();
  });

  it("drops a stored cursor when the query changes", async () => {
    provider.fetchPage
      .mockResolvedValueOnce({ items: [], nextCursor: "c1" })
      .mockRejectedValueOnce(new RateLimitedError("twitter", 1_000))
      .mockResolvedValueOnce({ items: [] });

    await expect(service.collect(request)).rejects.toBeInstanceOf(RateLimitedError);
    const result = await service.collect({ ...request, query: "cakesters" });

    expect(result.resumed).toBe(false);
    expect(provider.fetchPage.mock.calls[2]?.[1]?.cursor).toBeUndefined();
  });

  it("fails with an auth error when the platform has no credentials", async () => {
    const disabled = new CollectorService([createProvider(3, false)], retry);

    await expect(disabled.collect(request)).rejects.toMatchObject({
      code: "auth_error",
      message: "Missing credentials",
    });
    expect(disabled.enabledPlatforms()).toEqual([]);
  });

  it("stops before the next page once the signal is aborted", async () => {
    const controller = new AbortController();
    provider.fetchPage.mockImplementation(async () => {
      controller.abort();
      return { items: [tweet("1")], nextCursor: "c1" };
    });

    await expect(service.collect(request, { signal: controller.signal })).rejects.toBeInstanceOf(
      CollectionAbortedError,
    );
    expect(provider.fetchPage).toHaveBeenCalledTimes(1);
  });
});

type GetConfig = { params?: Record<string, unknown>; signal?: AbortSignal };

describe("CollectorService with the Twitter provider", () => {
  it("starts each window where the previous search actually ended", async () => {
    let now = Date.parse("2024-06-10T11:58:00.000Z");
    const http = {
      get: vi
        .fn<[string, GetConfig?], Promise<{ data: unknown }>>()
        .mockResolvedValue({ data: { meta: { result_count: 0 } } }),
    };
    const twitter = new TwitterProvider({
      http: http as unknown as AxiosInstance,
      pageSize: 100,
      maxPages: 3,
      defaultRetryAfterMs: 60_000,
      bearerToken: "test-bearer-token",
      now: () => now,
    });
    const collector = new CollectorService([twitter], retry);

    const first = await collector.collect({
      platform: "twitter",
      query: "oreo",
      window: { from: new Date(now - 60 * 60 * 1000), to: new Date(now) },
    });
    now += 120_000;
    await collector.collect({ platform: "twitter", query: "oreo", window: { from: first.window.to, to: new Date(now) } });

    const [firstParams, secondParams] = http.get.mock.calls.map(([, config]) => config?.params);
    expect(first.window.to).toEqual(new Date("2024-06-10T11:57:50.000Z"));
    expect(firstParams?.end_time).toBe("2024-06-10T11:57:50.000Z");
    expect(secondParams?.start_time).toBe(firstParams?.end_time);
    expect(secondParams?.end_time).toBe("2024-06-10T11:59:50.000Z");
  });
});
