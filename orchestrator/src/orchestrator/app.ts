import type { FastifyInstance } from "fastify";
import pLimit from "p-limit";
import {
  AuthError,
  CollectionAbortedError,
  CollectorError,
  PLATFORMS,
  RateLimitedError,
  TransientNetworkError,
  type CollectionRequest,
  type CollectionResult,
  type CollectOptions,
  type Platform,
  type RawItem,
} from "@mention-pulse/collector";

import { MentionAggregator } from "./aggregator.js";
import { config } from "./config.js";
import { errorMessage, logRecoverableError, normaliseError } from "./error_utils.js";
import {
  buildHealthPayload,
  buildPlatformStatus,
  createHealthSnapshot,
  isPollable,
  type HealthSnapshot,
  updateHealthOnFailure,
  updateHealthOnStart,
  updateHealthOnSuccess,
} from "./health.js";
import { buildHttpServer, buildMetricsServer } from "./http_server.js";
import { logger } from "./logger.js";
import {
  aggregationTimeSeconds,
  collectionFailuresTotal,
  collectionTimeSeconds,
  duplicateItemsTotal,
  itemsFetchedTotal,
  malformedItemsTotal,
  memoryUsageBytes,
  mentionsRecordedTotal,
} from "./metrics.js";
import { disconnectRedis } from "./redis_client.js";
import { buildSearchQuery } from "./search_query.js";
import type { DashboardSnapshot, SnapshotPublisher } from "./snapshot_publisher.js";
import { generateSummary } from "./summary_generator.js";
import type { AggregateCountView, BatchResult, ExecutiveSummary, Granularity, KeywordSet } from "./types.js";
import { measureAsync, measureSync } from "./utils.js";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface Collector {
  collect(request: CollectionRequest, options?: CollectOptions): Promise<CollectionResult>;
  /** Platforms whose credentials are configured. */
  enabledPlatforms(): Platform[];
}

export interface OrchestratorSettings {
  orchestratorId: string;
  httpPort: number;
  metricsPort: number;
  pollIntervalMs: number;
  initialLookbackHours: number;
  concurrency: number;
  granularity: Granularity;
  retentionDays: number;
  twitterQuerySuffix: string;
}

export interface OrchestratorDeps {
  collector: Collector;
  keywordSet: KeywordSet;
  publisher?: SnapshotPublisher | null;
  settings?: Partial<OrchestratorSettings>;
  clock?: () => number;
}

export type PlatformOutcome = "ok" | "rate_limited" | "auth_error" | "degraded" | "error" | "aborted" | "skipped";

export interface PlatformReport {
  platform: Platform;
  outcome: PlatformOutcome;
  items: number;
  records: number;
}

export interface CycleReport {
  startedAt: string;
  durationMs: number;
  platforms: PlatformReport[];
  pruned: number;
  published: boolean;
}

function settingsFromConfig(): OrchestratorSettings {
  return {
    orchestratorId: config.ORCHESTRATOR_ID,
    httpPort: config.HTTP_PORT,
    metricsPort: config.PROMETHEUS_PORT,
    pollIntervalMs: config.POLL_INTERVAL_MS,
    initialLookbackHours: config.INITIAL_LOOKBACK_HOURS,
    concurrency: config.COLLECTION_CONCURRENCY,
    granularity: config.BUCKET_GRANULARITY,
    retentionDays: config.RETENTION_DAYS,
    twitterQuerySuffix: config.TWITTER_QUERY_SUFFIX,
  };
}

export class OrchestratorApp {
  readonly aggregator: MentionAggregator;

  private readonly settings: OrchestratorSettings;
  private readonly collector: Collector;
  private readonly publisher: SnapshotPublisher | null;
  private readonly clock: () => number;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly health: HealthSnapshot;
  private readonly queries: Record<Platform, string>;
  // end of the last successfully collected window per platform
  private readonly windowEnds = new Map<Platform, Date>();

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private cyclePromise: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private httpServer: FastifyInstance | null = null;
  private metricsServer: FastifyInstance | null = null;

  constructor(deps: OrchestratorDeps) {
    this.settings = { ...settingsFromConfig(), ...deps.settings };
    this.collector = deps.collector;
    this.publisher = deps.publisher ?? null;
    this.clock = deps.clock ?? Date.now;
    this.limiter = pLimit(this.settings.concurrency);
    this.health = createHealthSnapshot(PLATFORMS, this.clock());
    this.aggregator = new MentionAggregator({ keywordSet: deps.keywordSet, granularity: this.settings.granularity });
    this.queries = {
      twitter: buildSearchQuery(deps.keywordSet, "twitter", { twitterSuffix: this.settings.twitterQuerySuffix }),
      youtube: buildSearchQuery(deps.keywordSet, "youtube"),
    };

    const enabled = new Set(this.collector.enabledPlatforms());
    for (const platform of PLATFORMS) {
      if (!enabled.has(platform)) {
        logger.fatal({ platform }, "Missing credentials; platform disabled until restart");
        updateHealthOnFailure(this.health, platform, "auth_error", "Missing credentials", { disable: true });
      }
    }
  }

  get view(): AggregateCountView {
    return this.aggregator.view();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    if (config.warnings.length > 0) {
      config.warnings.forEach((warning) => {
        logger.warn({ warning }, "Configuration warning");
      });
    }

    await Promise.all([this.startHttpServer(), this.startMetricsServer()]);
    logger.info({ queries: this.queries, pollIntervalMs: this.settings.pollIntervalMs }, "Scheduler started");
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    if (this.cyclePromise) {
      await this.cyclePromise;
    }

    await Promise.all([this.stopServer(this.httpServer), this.stopServer(this.metricsServer)]);
    this.httpServer = null;
    this.metricsServer = null;
    await disconnectRedis();
    logger.info("Orchestrator stopped");
  }

  /** Collects every pollable platform once, aggregates, prunes and publishes. */
  async runCycle(): Promise<CycleReport | null> {
    if (this.health.cycleRunning) {
      logger.warn("Collection cycle already in progress");
      return null;
    }

    this.health.cycleRunning = true;
    const controller = new AbortController();
    this.abortController = controller;
    const startedAt = this.clock();

    try {
      const reports: PlatformReport[] = await Promise.all(
        PLATFORMS.map((platform) => {
          if (!isPollable(this.health, platform, startedAt)) {
            return { platform, outcome: "skipped" as const, items: 0, records: 0 };
          }
          return this.limiter(() => this.collectPlatform(platform, startedAt, controller.signal));
        }),
      );

      if (controller.signal.aborted) {
        return {
          startedAt: new Date(startedAt).toISOString(),
          durationMs: this.clock() - startedAt,
          platforms: reports,
          pruned: 0,
          published: false,
        };
      }

      const pruned = this.aggregator.prune(new Date(this.clock() - this.settings.retentionDays * DAY_MS));
      const published = await this.publishSnapshot();

      this.health.cyclesCompleted += 1;
      this.health.lastCycleAt = this.clock();
      memoryUsageBytes.set(process.memoryUsage().rss);

      const durationMs = this.clock() - startedAt;
      logger.info(
        {
          durationMs,
          platforms: reports.map((report) => `${report.platform}:${report.outcome}`),
          items: reports.reduce((acc, report) => acc + report.items, 0),
          records: reports.reduce((acc, report) => acc + report.records, 0),
          pruned,
        },
        "Collection cycle completed",
      );

      return { startedAt: new Date(startedAt).toISOString(), durationMs, platforms: reports, pruned, published };
    } finally {
      this.health.cycleRunning = false;
      if (this.abortController === controller) {
        this.abortController = null;
      }
    }
  }

  getHealth() {
    return buildHealthPayload(this.health, this.settings.orchestratorId, this.clock());
  }

  getPlatformStatus() {
    return buildPlatformStatus(this.health);
  }

  buildSnapshot(): DashboardSnapshot {
    const view = this.view;
    const now = new Date(this.clock());
    const summaries: Record<Platform | "all", ExecutiveSummary> = {
      all: generateSummary(view, undefined, now),
      twitter: generateSummary(view, "twitter", now),
      youtube: generateSummary(view, "youtube", now),
    };

    return {
      keywordSetVersion: this.aggregator.keywordSet.version,
      granularity: this.settings.granularity,
      generatedAt: now.toISOString(),
      counts: view.counts(),
      summaries,
      platforms: this.getPlatformStatus(),
    };
  }

  private async collectPlatform(platform: Platform, now: number, signal: AbortSignal): Promise<PlatformReport> {
    const window = {
      from: this.windowEnds.get(platform) ?? new Date(now - this.settings.initialLookbackHours * HOUR_MS),
      to: new Date(now),
    };
    updateHealthOnStart(this.health, platform, now);
    const stopTimer = collectionTimeSeconds.startTimer({ platform });

    try {
      const { result, durationMs } = await measureAsync(() =>
        this.collector.collect({ platform, query: this.queries[platform], window }, { signal }),
      );
      if (signal.aborted) {
        return { platform, outcome: "aborted", items: 0, records: 0 };
      }

      const batch = this.aggregate(platform, result.items);
      this.windowEnds.set(platform, result.window.to);
      updateHealthOnSuccess(this.health, platform, result.items.length, this.clock());
      logger.info(
        {
          platform,
          items: result.items.length,
          records: batch.records.length,
          pages: result.pages,
          complete: result.complete,
          resumed: result.resumed,
          collectMs: Number(durationMs.toFixed(2)),
        },
        "Platform collected",
      );
      return { platform, outcome: "ok", items: result.items.length, records: batch.records.length };
    } catch (error) {
      return this.handleCollectionError(platform, error, signal);
    } finally {
      stopTimer();
    }
  }

  private handleCollectionError(platform: Platform, error: unknown, signal: AbortSignal): PlatformReport {
    if (error instanceof CollectionAbortedError || signal.aborted) {
      logger.info({ platform }, "Collection aborted");
      return { platform, outcome: "aborted", items: 0, records: 0 };
    }

    const reason = error instanceof CollectorError ? error.code : "unknown";
    collectionFailuresTotal.inc({ platform, reason });

    if (error instanceof RateLimitedError) {
      const batch = this.aggregate(platform, error.partialItems);
      const retryAt = this.clock() + error.retryAfterMs;
      updateHealthOnFailure(this.health, platform, "rate_limited", error.message, {
        retryAt,
        items: error.partialItems.length,
      });
      logger.warn(
        { platform, retryAfterMs: error.retryAfterMs, partialItems: error.partialItems.length },
        "Platform rate limited; backing off",
      );
      return { platform, outcome: "rate_limited", items: error.partialItems.length, records: batch.records.length };
    }

    if (error instanceof AuthError) {
      logger.fatal(
        { error: normaliseError(error), context: { location: "collectPlatform", platform } },
        "Credentials rejected; platform disabled until restart",
      );
      updateHealthOnFailure(this.health, platform, "auth_error", error.message, { disable: true });
      return { platform, outcome: "auth_error", items: 0, records: 0 };
    }

    if (error instanceof TransientNetworkError) {
      logger.warn({ platform, error: error.message }, "Collection failed after retries; serving degraded data");
      updateHealthOnFailure(this.health, platform, "degraded", error.message);
      return { platform, outcome: "degraded", items: 0, records: 0 };
    }

    logRecoverableError(logger, error, { location: "collectPlatform", platform }, "Collection failed");
    updateHealthOnFailure(this.health, platform, "error", errorMessage(error));
    return { platform, outcome: "error", items: 0, records: 0 };
  }

  private aggregate(platform: Platform, items: readonly RawItem[]): BatchResult {
    const { result, durationMs } = measureSync(() => this.aggregator.processBatch(items));
    aggregationTimeSeconds.observe(durationMs / 1000);
    itemsFetchedTotal.inc({ platform }, items.length);
    for (const record of result.records) {
      mentionsRecordedTotal.inc({ source: record.source, category: record.category });
    }
    if (result.skipped.length > 0) {
      malformedItemsTotal.inc({ source: platform }, result.skipped.length);
    }
    if (result.duplicates > 0) {
      duplicateItemsTotal.inc(result.duplicates);
    }
    return result;
  }

  private async publishSnapshot(): Promise<boolean> {
    if (!this.publisher) {
      return false;
    }
    try {
      await this.publisher.publish(this.buildSnapshot());
      return true;
    } catch (error) {
      logRecoverableError(logger, error, { location: "publishSnapshot" }, "Failed to publish dashboard snapshot");
      return false;
    }
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.cyclePromise = this.runCycle()
        .then(() => undefined)
        .catch((error: unknown) => {
          logRecoverableError(logger, error, { location: "runCycle" }, "Collection cycle crashed");
        })
        .finally(() => {
          this.cyclePromise = null;
          this.scheduleNext(this.settings.pollIntervalMs);
        });
    }, delayMs);
  }

  private async startHttpServer(): Promise<void> {
    if (this.httpServer) return;

    const server = await buildHttpServer({
      view: this.view,
      keywordSet: this.aggregator.keywordSet,
      granularity: this.settings.granularity,
      getHealth: () => this.getHealth(),
      getPlatformStatus: () => this.getPlatformStatus(),
    });

    await server.listen({ port: this.settings.httpPort, host: "0.0.0.0" });
    logger.info({ port: this.settings.httpPort }, "HTTP API listening");
    this.httpServer = server;
  }

  private async startMetricsServer(): Promise<void> {
    if (this.metricsServer) return;

    const server = buildMetricsServer();
    await server.listen({ port: this.settings.metricsPort, host: "0.0.0.0" });
    logger.info({ port: this.settings.metricsPort }, "Metrics server listening");
    this.metricsServer = server;
  }

  private async stopServer(server: FastifyInstance | null): Promise<void> {
    if (!server) return;
    await server.close();
  }
}
