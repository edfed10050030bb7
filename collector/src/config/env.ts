import { config } from "dotenv";
import { z } from "zod";

config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  TWITTER_BEARER_TOKEN: z.string().optional(),
  YOUTUBE_API_KEY: z.string().optional(),
  TWITTER_API_BASE_URL: z.string().url().default("https://api.twitter.com/2"),
  YOUTUBE_API_BASE_URL: z.string().url().default("https://www.googleapis.com/youtube/v3"),
  COLLECTOR_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  COLLECTOR_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  COLLECTOR_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(500),
  COLLECTOR_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8_000),
  COLLECTOR_DEFAULT_RETRY_AFTER_MS: z.coerce.number().int().min(1_000).default(60_000),
  TWITTER_PAGE_SIZE: z.coerce.number().int().min(10).max(100).default(100),
  TWITTER_MAX_PAGES: z.coerce.number().int().min(1).default(3),
  YOUTUBE_PAGE_SIZE: z.coerce.number().int().min(1).max(50).default(50),
  YOUTUBE_MAX_PAGES: z.coerce.number().int().min(1).default(1),
  YOUTUBE_INCLUDE_COMMENTS: booleanFlag,
  YOUTUBE_COMMENTS_PER_VIDEO: z.coerce.number().int().min(1).max(100).default(20),
  YOUTUBE_QUOTA_RETRY_MS: z.coerce.number().int().min(1_000).default(60 * 60 * 1000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

type EnvValues = z.infer<typeof EnvSchema>;
type EnvSource = Record<string, string | undefined>;

const warn = (message: string) => {
  console.warn(`[collector:env] ${message}`);
};

// an invalid key falls back to its own default; the other keys keep their values
function parseValues(source: EnvSource): EnvValues {
  const parsed = EnvSchema.safeParse(source);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    .join(", ");
  warn(`Invalid values detected. Falling back to defaults for: ${issues}`);

  const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
  const kept = Object.fromEntries(Object.entries(source).filter(([key]) => !invalid.has(key)));
  return EnvSchema.parse(kept);
}

export interface CollectorEnv {
  readonly twitter: {
    readonly bearerToken?: string;
    readonly baseUrl: string;
    readonly pageSize: number;
    readonly maxPages: number;
  };
  readonly youtube: {
    readonly apiKey?: string;
    readonly baseUrl: string;
    readonly pageSize: number;
    readonly maxPages: number;
    readonly includeComments: boolean;
    readonly commentsPerVideo: number;
    readonly quotaRetryMs: number;
  };
  readonly requestTimeoutMs: number;
  readonly retry: {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
  };
  readonly defaultRetryAfterMs: number;
  readonly logLevel: EnvValues["LOG_LEVEL"];
}

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export function loadCollectorEnv(source: EnvSource): CollectorEnv {
  const values = parseValues(source);

  const warnIfMissing = (key: string, message: string) => {
    const raw = source[key];
    if (raw === undefined || raw.trim() === "") {
      warn(message);
    }
  };

  warnIfMissing("TWITTER_BEARER_TOKEN", "TWITTER_BEARER_TOKEN missing. Twitter collection will fail with an auth error.");
  warnIfMissing("YOUTUBE_API_KEY", "YOUTUBE_API_KEY missing. YouTube collection will fail with an auth error.");

  return {
    twitter: {
      bearerToken: blankToUndefined(values.TWITTER_BEARER_TOKEN),
      baseUrl: values.TWITTER_API_BASE_URL,
      pageSize: values.TWITTER_PAGE_SIZE,
      maxPages: values.TWITTER_MAX_PAGES,
    },
    youtube: {
      apiKey: blankToUndefined(values.YOUTUBE_API_KEY),
      baseUrl: values.YOUTUBE_API_BASE_URL,
      pageSize: values.YOUTUBE_PAGE_SIZE,
      maxPages: values.YOUTUBE_MAX_PAGES,
      includeComments: values.YOUTUBE_INCLUDE_COMMENTS,
      commentsPerVideo: values.YOUTUBE_COMMENTS_PER_VIDEO,
      quotaRetryMs: values.YOUTUBE_QUOTA_RETRY_MS,
    },
    requestTimeoutMs: values.COLLECTOR_REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: values.COLLECTOR_MAX_ATTEMPTS,
      baseDelayMs: values.COLLECTOR_BACKOFF_BASE_MS,
      maxDelayMs: values.COLLECTOR_BACKOFF_MAX_MS,
    },
    defaultRetryAfterMs: values.COLLECTOR_DEFAULT_RETRY_AFTER_MS,
    logLevel: values.LOG_LEVEL,
  };
}

export const env: CollectorEnv = loadCollectorEnv({ ...process.env });
