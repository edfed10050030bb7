import axios from "axios";
import {
  AuthError,
  CollectionAbortedError,
  RateLimitedError,
  RequestRejectedError,
  TransientNetworkError,
} from "../../../utils/errors.js";
import type { Platform } from "../types/raw-item.js";

const RATE_LIMIT_REASONS = new Set([
  "quotaExceeded",
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "dailyLimitExceeded",
]);

const AUTH_REASONS = new Set(["keyInvalid", "keyExpired", "forbidden", "authError", "ipRefererBlocked"]);

const MIN_RETRY_AFTER_MS = 1_000;

export interface ClassifyOptions {
  readonly platform: Platform;
  readonly defaultRetryAfterMs: number;
  /** Delay applied when an error body reports an exhausted quota rather than a short window. */
  readonly quotaRetryAfterMs?: number;
  /** Pulls the platform's machine-readable failure reason out of an error body. */
  readonly extractReason?: (data: unknown) => string | undefined;
  /** Reasons that refuse a single request even though they arrive as 403. */
  readonly rejectedReasons?: ReadonlySet<string>;
  readonly now?: () => number;
}

export function readHeader(headers: unknown, name: string): string | undefined {
  if (!headers || typeof headers !== "object") {
    return undefined;
  }
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  const value: unknown = match?.[1];
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function parseRetryAfterMs(headers: unknown, now: number): number | undefined {
  const retryAfter = readHeader(headers, "retry-after");
  if (retryAfter !== undefined) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(seconds * 1000, MIN_RETRY_AFTER_MS);
    }
    const date = Date.parse(retryAfter);
    if (Number.isFinite(date)) {
      return Math.max(date - now, MIN_RETRY_AFTER_MS);
    }
  }

  const reset = readHeader(headers, "x-rate-limit-reset");
  if (reset !== undefined) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) {
      return Math.max(epochSeconds * 1000 - now, MIN_RETRY_AFTER_MS);
    }
  }

  return undefined;
}

/**
 * Maps an axios failure onto the collector error taxonomy. Anything that did not come from
 * axios is returned untouched so programming errors keep their original stack.
 */
export function classifyHttpError(error: unknown, options: ClassifyOptions): unknown {
  const { platform, defaultRetryAfterMs } = options;
  const now = options.now?.() ?? Date.now();

  if (axios.isCancel(error)) {
    return new CollectionAbortedError(platform, { cause: error });
  }

  if (!axios.isAxiosError(error)) {
    return error;
  }

  const response = error.response;
  if (!response) {
    const timedOut = error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
    const message = timedOut ? "Request timed out" : `Network error${error.code ? ` (${error.code})` : ""}`;
    return new TransientNetworkError(platform, message, { cause: error });
  }

  const { status } = response;
  const reason = options.extractReason?.(response.data);

  if (reason && RATE_LIMIT_REASONS.has(reason)) {
    const retryAfterMs =
      options.quotaRetryAfterMs ?? parseRetryAfterMs(response.headers, now) ?? defaultRetryAfterMs;
    return new RateLimitedError(platform, retryAfterMs, `Quota exhausted (${reason})`, [], { cause: error });
  }

  if (reason && options.rejectedReasons?.has(reason)) {
    return new RequestRejectedError(platform, `Request rejected (${reason})`, status, { cause: error });
  }

  if (reason && AUTH_REASONS.has(reason)) {
    return new AuthError(platform, `Credentials rejected (${reason})`, { cause: error });
  }

  if (status === 401 || status === 403) {
    return new AuthError(platform, `Credentials rejected with HTTP ${status}`, { cause: error });
  }

  if (status === 429) {
    const retryAfterMs = parseRetryAfterMs(response.headers, now) ?? defaultRetryAfterMs;
    return new RateLimitedError(platform, retryAfterMs, "Rate limited with HTTP 429", [], { cause: error });
  }

  if (status === 408 || status >= 500) {
    return new TransientNetworkError(platform, `Upstream responded with HTTP ${status}`, { cause: error });
  }

  return new RequestRejectedError(
    platform,
    `Request rejected with HTTP ${status}${reason ? ` (${reason})` : ""}`,
    status,
    { cause: error },
  );
}
