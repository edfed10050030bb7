import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Redis } from "ioredis";
import {
  AuthError,
  CollectionAbortedError,
  RateLimitedError,
  TransientNetworkError,
  type CollectionRequest,
  type CollectionResult,
  type CollectOptions,
  type Platform,
  type RawItem,
} from "@mention-pulse/collector";

import { OrchestratorApp, type OrchestratorSettings } from "../src/orchestrator/app.js";
import { SnapshotPublisher, type DashboardSnapshot } from "../src/orchestrator/snapshot_publisher.js";
import { buildKeywordSet, item } from "./fixtures.js";

const NOW = Date.parse("2024-06-10T10:00:00.000Z");
const HOUR_MS = 60 * 60 * 1000;

type CollectMock = ReturnType<typeof vi.fn<[CollectionRequest, CollectOptions?], Promise<CollectionResult>>>;

function result(request: CollectionRequest, items: RawItem[]): CollectionResult {
  return { items, window: request.window, pages: 1, complete: true, resumed: false };
}

describe("OrchestratorApp.runCycle", () => {
  let now: number;
  let collect: CollectMock;
  let enabled: Platform[];
  let responses: Record<Platform, (request: CollectionRequest) => Promise<CollectionResult>>;

  const createApp = (publisher: SnapshotPublisher | null = null, settings: Partial<OrchestratorSettings> = {}) =>
    new OrchestratorApp({
      collector: { collect, enabledPlatforms: () => enabled },
      keywordSet: buildKeywordSet(),
      publisher,
      clock: () => now,
      settings: {
        initialLookbackHours: 2,
        concurrency: 2,
        granularity: "hour",
        retentionDays: 7,
        twitterQuerySuffix: "",
        ...settings,
      },
    });

  beforeEach(() => {
    now = NOW;
    enabled = ["twitter", "youtube"];
    responses = {
      twitter: async (request) => result(request, [item("oreo and mint")]),
      youtube: async (request) =>
        result(request, [item("golden oreo", { source: "youtube", kind: "video" })]),
    };
    collect = vi.fn<[CollectionRequest, CollectOptions?], Promise<CollectionResult>>((request) =>
      responses[request.platform](request),
    );
  });

  it("collects every platform and aggregates the items", async () => {
    const app = createApp();

    const report = await app.runCycle();

    expect(report).toEqual({
      startedAt: "2024-06-10T10:00:00.000Z",
      durationMs: 0,
      platforms: [
        { platform: "twitter", outcome: "ok", items: 1, records: 2 },
        { platform: "youtube", outcome: "ok", items: 1, records: 2 },
      ],
      pruned: 0,
      published: false,
    });
    expect(collect).toHaveBeenCalledWith(
      {
        platform: "twitter",
        query: '(oreo OR oreos OR "double stuf")',
        window: { from: new Date(NOW - 2 * HOUR_MS), to: new Date(NOW) },
      },
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
    expect(app.view.totals({ category: "product" })).toEqual([
      { category: "product", keyword: "Oreo Golden", count: 1 },
      { category: "product", keyword: "Oreo Original", count: 1 },
    ]);
    expect(app.getHealth()).toMatchObject({ status: "ok", cyclesCompleted: 1 });
  });

  it("starts the next window where the last one ended", async () => {
    const app = createApp();
    await app.runCycle();

    now = NOW + 5 * 60 * 1000;
    await app.runCycle();

    const lastTwitterCall = collect.mock.calls.filter(([request]) => request.platform === "twitter")[1];
    expect(lastTwitterCall?.[0].window).toEqual({ from: new Date(NOW), to: new Date(now) });
  });

  it("keeps partial items from a rate-limited platform and skips it until the retry time", async () => {
    responses.twitter = async () => {
      throw new RateLimitedError("twitter", 60_000, "Rate limited", [item("oreos")]);
    };
    const app = createApp();

    const report = await app.runCycle();

    expect(report?.platforms[0]).toEqual({ platform: "twitter", outcome: "rate_limited", items: 1, records: 1 });
    expect(app.getPlatformStatus()[0]).toMatchObject({
      platform: "twitter",
      status: "rate_limited",
      enabled: true,
      retryAt: "2024-06-10T10:01:00.000Z",
      itemsLastRun: 1,
    });

    collect.mockClear();
    now = NOW + 30_000;
    const skipped = await app.runCycle();
    expect(skipped?.platforms[0]).toEqual({ platform: "twitter", outcome: "skipped", items: 0, records: 0 });
    expect(collect.mock.calls.map(([request]) => request.platform)).toEqual(["youtube"]);

    now = NOW + 60_000;
    await app.runCycle();
    expect(collect.mock.calls.map(([request]) => request.platform)).toEqual(["youtube", "twitter", "youtube"]);
  });

  it("disables a platform whose credentials are rejected", async () => {
    responses.youtube = async () => {
      throw new AuthError("youtube", "Missing credentials");
    };
    const app = createApp();

    const report = await app.runCycle();
    expect(report?.platforms[1]).toEqual({ platform: "youtube", outcome: "auth_error", items: 0, records: 0 });

    now = NOW + 24 * HOUR_MS;
    const next = await app.runCycle();
    expect(next?.platforms[1]?.outcome).toBe("skipped");

    const health = app.getHealth();
    expect(health.status).toBe("degraded");
    expect(health.platforms[1]).toMatchObject({ enabled: false, status: "auth_error", lastError: "Missing credentials" });
  });

  it("never polls a platform without configured credentials", async () => {
    enabled = ["twitter"];
    const app = createApp();

    const report = await app.runCycle();

    expect(report?.platforms.map((platform) => platform.outcome)).toEqual(["ok", "skipped"]);
    expect(collect.mock.calls.map(([request]) => request.platform)).toEqual(["twitter"]);
    expect(app.getPlatformStatus()[1]).toMatchObject({
      platform: "youtube",
      enabled: false,
      status: "auth_error",
      lastError: "Missing credentials",
    });
  });

  it("marks a platform degraded after network failures and polls it again", async () => {
    responses.twitter = async () => {
      throw new TransientNetworkError("twitter", "Request timed out");
    };
    const app = createApp();

    const report = await app.runCycle();
    expect(report?.platforms[0]?.outcome).toBe("degraded");
    expect(app.getPlatformStatus()[0]).toMatchObject({ status: "degraded", lastError: "Request timed out" });

    responses.twitter = async (request) => result(request, []);
    const recovered = await app.runCycle();
    expect(recovered?.platforms[0]?.outcome).toBe("ok");
    expect(app.getPlatformStatus()[0]).toMatchObject({ status: "ok", lastError: null });
  });

  it("reports unexpected failures without stopping the other platform", async () => {
    responses.twitter = async () => {
      throw new Error("boom");
    };
    const app = createApp();

    const report = await app.runCycle();

    expect(report?.platforms.map((platform) => platform.outcome)).toEqual(["error", "ok"]);
    expect(app.getPlatformStatus()[0]).toMatchObject({ status: "error", lastError: "boom" });
  });

  it("refuses to start a cycle while one is running", async () => {
    let release: () => void = () => undefined;
    responses.twitter = (request) =>
      new Promise((resolve) => {
        release = () => resolve(result(request, []));
      });
    const app = createApp();

    const first = app.runCycle();
    const second = await app.runCycle();
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(2));
    release();

    expect(second).toBeNull();
    expect((await first)?.platforms[0]?.outcome).toBe("ok");
  });

  it("aborts the running collection on stop and keeps the window for the next cycle", async () => {
    collect.mockImplementation(
      (request, options) =>
        new Promise<CollectionResult>((resolve, reject) => {
          options?.signal?.addEventListener(
            "abort",
            () => {
              if (request.platform === "twitter") {
                resolve(result(request, [item("oreo and mint")]));
              } else {
                reject(new CollectionAbortedError(request.platform));
              }
            },
            { once: true },
          );
        }),
    );
    const app = createApp(null, { httpPort: 0, metricsPort: 0, pollIntervalMs: 60_000 });

    await app.start();
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(2));
    await app.stop();

    expect(collect.mock.calls[0]?.[1]?.signal?.aborted).toBe(true);
    expect(app.view.counts()).toEqual([]);
    expect(app.view.itemTotals()).toEqual([]);
    expect(app.getHealth().cyclesCompleted).toBe(0);

    collect.mockImplementation((request) => responses[request.platform](request));
    now = NOW + 5 * 60 * 1000;
    await app.runCycle();

    const twitterCalls = collect.mock.calls.filter(([request]) => request.platform === "twitter");
    expect(twitterCalls).toHaveLength(2);
    expect(twitterCalls[1]?.[0].window).toEqual({ from: new Date(NOW - 2 * HOUR_MS), to: new Date(now) });
  });

  it("prunes buckets older than the retention period", async () => {
    const app = createApp();
    await app.runCycle();

    responses.twitter = async (request) => result(request, []);
    responses.youtube = async (request) => result(request, []);
    now = NOW + 8 * 24 * HOUR_MS;
    const report = await app.runCycle();

    expect(report?.pruned).toBe(4);
    expect(app.view.counts()).toEqual([]);
  });

  it("publishes the dashboard snapshot after each cycle", async () => {
    const set = vi.fn().mockResolvedValue("OK");
    const publisher = new SnapshotPublisher({ set } as unknown as Redis, { key: "snapshot-test", ttlSeconds: 60, retries: 0 });
    const app = createApp(publisher);

    const report = await app.runCycle();

    expect(report?.published).toBe(true);
    expect(set).toHaveBeenCalledWith("snapshot-test", expect.any(String), "EX", 60);
    const snapshot: DashboardSnapshot = JSON.parse(String(set.mock.calls[0]?.[1]));
    expect(snapshot.keywordSetVersion).toBe("test-1");
    expect(snapshot.generatedAt).toBe("2024-06-10T10:00:00.000Z");
    expect(snapshot.counts).toHaveLength(4);
    expect(snapshot.summaries.all.totalItems).toBe(2);
    expect(snapshot.summaries.youtube.mostDiscussedProduct).toBe("Oreo Golden");
  });

  it("completes the cycle when publishing fails", async () => {
    const set = vi.fn().mockRejectedValue(new Error("connection refused"));
    const publisher = new SnapshotPublisher({ set } as unknown as Redis, { key: "snapshot-test", ttlSeconds: 60, retries: 0 });
    const app = createApp(publisher);

    const report = await app.runCycle();

    expect(report?.published).toBe(false);
    expect(app.getHealth().cyclesCompleted).toBe(1);
  });
});
