import { config as loadEnv } from "dotenv";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";
import type { Granularity } from "./types.js";

loadEnv();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const GRANULARITIES: readonly Granularity[] = ["minute", "hour", "day"];

interface NumberOptions {
  readonly min?: number;
  readonly max?: number;
  readonly integer?: boolean;
}

const DEFAULT_KEYWORDS_FILE = fileURLToPath(new URL("../../config/keywords.json", import.meta.url));

const DEFAULTS: Omit<OrchestratorConfig, "ORCHESTRATOR_ID" | "REDIS_URL" | "warnings"> = {
  HTTP_PORT: 9000,
  PROMETHEUS_PORT: 9001,
  POLL_INTERVAL_MS: 120_000,
  INITIAL_LOOKBACK_HOURS: 24,
  COLLECTION_CONCURRENCY: 2,
  BUCKET_GRANULARITY: "hour" satisfies Granularity,
  RETENTION_DAYS: 30,
  KEYWORDS_FILE: DEFAULT_KEYWORDS_FILE,
  TWITTER_QUERY_SUFFIX: "-is:retweet",
  SNAPSHOT_KEY: "mention-pulse:snapshot",
  SNAPSHOT_TTL_SECONDS: 30 * 60,
  MAX_RETRIES: 3,
  RETRY_BACKOFF_BASE: 2,
  LOG_LEVEL: "info" satisfies LogLevel,
  NODE_ENV: "development",
};

const warnings: string[] = [];

function warn(message: string): void {
  warnings.push(message);
}

function readString(key: string, fallback: string, { allowEmpty = false }: { allowEmpty?: boolean } = {}): string {
  const raw = process.env[key];
  if (raw === undefined || (!allowEmpty && raw.trim().length === 0)) {
    warn(`${key} is not set; using fallback value.`);
    return fallback;
  }
  return raw;
}

function readOptionalUrl(key: string): string | undefined {
  const raw = process.env[key];
  if (!raw || raw.trim().length === 0) {
    return undefined;
  }
  try {
    // eslint-disable-next-line no-new
    new URL(raw);
    return raw;
  } catch {
    warn(`${key} is invalid (${raw}); snapshot publishing disabled.`);
    return undefined;
  }
}

function readNumber(key: string, fallback: number, options: NumberOptions = {}): number {
  const raw = process.env[key];
  if (raw === undefined) {
    warn(`${key} is not set; using fallback value ${fallback}.`);
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    warn(`${key} must be numeric; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.integer && !Number.isInteger(value)) {
    warn(`${key} must be an integer; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.min !== undefined && value < options.min) {
    warn(`${key} must be >= ${options.min}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  if (options.max !== undefined && value > options.max) {
    warn(`${key} must be <= ${options.max}; received ${value}. Falling back to ${fallback}.`);
    return fallback;
  }

  return value;
}

function readChoice<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[key];
  if (!raw) {
    warn(`${key} is not set; defaulting to ${fallback}.`);
    return fallback;
  }
  const normalised = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalised);
  if (match === undefined) {
    warn(`${key} must be one of ${allowed.join(", ")}; received "${raw}". Falling back to ${fallback}.`);
    return fallback;
  }
  return match;
}

const orchestratorId = (() => {
  const raw = process.env.ORCHESTRATOR_ID;
  if (!raw) {
    const fallback = `orchestrator-${randomUUID().slice(0, 8)}`;
    warn(`ORCHESTRATOR_ID is not set; generated fallback ${fallback}.`);
    return fallback;
  }
  return raw;
})();

export interface OrchestratorConfig {
  readonly ORCHESTRATOR_ID: string;
  readonly NODE_ENV: string;
  readonly LOG_LEVEL: LogLevel;
  readonly HTTP_PORT: number;
  readonly PROMETHEUS_PORT: number;
  readonly POLL_INTERVAL_MS: number;
  readonly INITIAL_LOOKBACK_HOURS: number;
  readonly COLLECTION_CONCURRENCY: number;
  readonly BUCKET_GRANULARITY: Granularity;
  readonly RETENTION_DAYS: number;
  readonly KEYWORDS_FILE: string;
  readonly TWITTER_QUERY_SUFFIX: string;
  readonly REDIS_URL?: string;
  readonly SNAPSHOT_KEY: string;
  readonly SNAPSHOT_TTL_SECONDS: number;
  readonly MAX_RETRIES: number;
  readonly RETRY_BACKOFF_BASE: number;
  readonly warnings: readonly string[];
}

export const config: OrchestratorConfig = {
  ORCHESTRATOR_ID: orchestratorId,
  NODE_ENV: readString("NODE_ENV", DEFAULTS.NODE_ENV),
  LOG_LEVEL: readChoice("LOG_LEVEL", LOG_LEVELS, DEFAULTS.LOG_LEVEL),
  HTTP_PORT: readNumber("HTTP_PORT", DEFAULTS.HTTP_PORT, { integer: true, min: 1 }),
  PROMETHEUS_PORT: readNumber("PROMETHEUS_PORT", DEFAULTS.PROMETHEUS_PORT, { integer: true, min: 1 }),
  POLL_INTERVAL_MS: readNumber("POLL_INTERVAL_MS", DEFAULTS.POLL_INTERVAL_MS, { integer: true, min: 1_000 }),
  INITIAL_LOOKBACK_HOURS: readNumber("INITIAL_LOOKBACK_HOURS", DEFAULTS.INITIAL_LOOKBACK_HOURS, {
    min: 0,
    max: 24 * 30,
  }),
  COLLECTION_CONCURRENCY: readNumber("COLLECTION_CONCURRENCY", DEFAULTS.COLLECTION_CONCURRENCY, {
    integer: true,
    min: 1,
  }),
  BUCKET_GRANULARITY: readChoice("BUCKET_GRANULARITY", GRANULARITIES, DEFAULTS.BUCKET_GRANULARITY),
  RETENTION_DAYS: readNumber("RETENTION_DAYS", DEFAULTS.RETENTION_DAYS, { min: 1 }),
  KEYWORDS_FILE: readString("KEYWORDS_FILE", DEFAULTS.KEYWORDS_FILE),
  TWITTER_QUERY_SUFFIX: readString("TWITTER_QUERY_SUFFIX", DEFAULTS.TWITTER_QUERY_SUFFIX, { allowEmpty: true }),
  REDIS_URL: readOptionalUrl("REDIS_URL"),
  SNAPSHOT_KEY: readString("SNAPSHOT_KEY", DEFAULTS.SNAPSHOT_KEY),
  SNAPSHOT_TTL_SECONDS: readNumber("SNAPSHOT_TTL_SECONDS", DEFAULTS.SNAPSHOT_TTL_SECONDS, {
    integer: true,
    min: 60,
  }),
  MAX_RETRIES: readNumber("MAX_RETRIES", DEFAULTS.MAX_RETRIES, { integer: true, min: 1 }),
  RETRY_BACKOFF_BASE: readNumber("RETRY_BACKOFF_BASE", DEFAULTS.RETRY_BACKOFF_BASE, { min: 0.1 }),
  warnings,
};

if (warnings.length > 0 && config.LOG_LEVEL !== "silent") {
  // eslint-disable-next-line no-console
  console.warn("Orchestrator configuration warnings:", warnings);
}
