import type { Platform, RawItem } from "../modules/collector/types/raw-item.js";

export type CollectorErrorCode =
  | "auth_error"
  | "rate_limited"
  | "transient_network"
  | "request_rejected"
  | "aborted";

export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: CollectorErrorCode,
    public readonly platform: Platform,
    public readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class AuthError extends CollectorError {
  constructor(platform: Platform, message = "Credentials rejected", options?: { cause?: unknown }) {
    super(message, "auth_error", platform, false, options);
  }
}

export class RateLimitedError extends CollectorError {
  constructor(
    platform: Platform,
    public readonly retryAfterMs: number,
    message = "Rate limited",
    public readonly partialItems: readonly RawItem[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, "rate_limited", platform, false, options);
  }

  withPartialItems(items: readonly RawItem[]): RateLimitedError {
    return new RateLimitedError(this.platform, this.retryAfterMs, this.message, items, { cause: this.cause });
  }
}

export class TransientNetworkError extends CollectorError {
  constructor(platform: Platform, message = "Transient network failure", options?: { cause?: unknown }) {
    super(message, "transient_network", platform, true, options);
  }
}

export class RequestRejectedError extends CollectorError {
  constructor(
    platform: Platform,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, "request_rejected", platform, false, options);
  }
}

export class CollectionAbortedError extends CollectorError {
  constructor(platform: Platform, options?: { cause?: unknown }) {
    super("Collection aborted", "aborted", platform, false, options);
  }
}
