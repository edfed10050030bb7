import type { Redis } from "ioredis";
import type { Platform } from "@mention-pulse/collector";
import type { buildPlatformStatus } from "./health.js";
import { logger } from "./logger.js";
import { redisWriteLatencySeconds } from "./metrics.js";
import type { CountEntry, ExecutiveSummary, Granularity } from "./types.js";
import { exponentialBackoff, measureAsync } from "./utils.js";

export interface DashboardSnapshot {
  keywordSetVersion: string;
  granularity: Granularity;
  generatedAt: string;
  counts: CountEntry[];
  summaries: Record<Platform | "all", ExecutiveSummary>;
  platforms: ReturnType<typeof buildPlatformStatus>;
}

export interface SnapshotPublisherOptions {
  key: string;
  ttlSeconds: number;
  retries?: number;
  baseDelaySeconds?: number;
}

export class SnapshotPublisher {
  constructor(
    private readonly redis: Pick<Redis, "set">,
    private readonly options: SnapshotPublisherOptions,
  ) {}

  /** Writes the snapshot with a TTL and returns the write latency in milliseconds. */
  async publish(snapshot: DashboardSnapshot): Promise<number> {
    const payload = JSON.stringify(snapshot);
    const { durationMs } = await measureAsync(() =>
      exponentialBackoff(() => this.redis.set(this.options.key, payload, "EX", this.options.ttlSeconds), {
        retries: this.options.retries,
        baseDelaySeconds: this.options.baseDelaySeconds,
      }),
    );
    redisWriteLatencySeconds.observe(durationMs / 1000);
    logger.debug({ key: this.options.key, bytes: payload.length, durationMs: Number(durationMs.toFixed(2)) }, "Snapshot published");
    return durationMs;
  }
}
