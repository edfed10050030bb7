import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "mention-pulse-orchestrator" });

export const itemsFetchedTotal = new Counter({
  name: "orchestrator_items_fetched_total",
  help: "Total number of raw items returned by the collector",
  labelNames: ["platform"] as const,
  registers: [registry],
});

export const mentionsRecordedTotal = new Counter({
  name: "orchestrator_mentions_recorded_total",
  help: "Total number of mention records produced by the aggregator",
  labelNames: ["source", "category"] as const,
  registers: [registry],
});

export const malformedItemsTotal = new Counter({
  name: "orchestrator_malformed_items_total",
  help: "Items skipped because they were missing text, id or a valid timestamp",
  labelNames: ["source"] as const,
  registers: [registry],
});

export const duplicateItemsTotal = new Counter({
  name: "orchestrator_duplicate_items_total",
  help: "Items skipped because they were already aggregated",
  registers: [registry],
});

export const collectionFailuresTotal = new Counter({
  name: "orchestrator_collection_failures_total",
  help: "Collector calls that failed, by platform and error code",
  labelNames: ["platform", "reason"] as const,
  registers: [registry],
});

export const collectionTimeSeconds = new Histogram({
  name: "orchestrator_collection_time_seconds",
  help: "Time spent in one collector call per platform",
  labelNames: ["platform"] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});

export const aggregationTimeSeconds = new Histogram({
  name: "orchestrator_aggregation_time_seconds",
  help: "Time spent aggregating one batch",
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [registry],
});

export const redisWriteLatencySeconds = new Histogram({
  name: "orchestrator_redis_write_latency_seconds",
  help: "Latency of Redis write operations when publishing snapshots",
  buckets: [0.005, 0.01, 0.05, 0.1, 0.2, 0.5, 1, 2],
  registers: [registry],
});

export const memoryUsageBytes = new Gauge({
  name: "orchestrator_memory_usage_bytes",
  help: "Resident set size (RSS) memory usage of orchestrator",
  registers: [registry],
});
