export { env, loadCollectorEnv } from "./config/env.js";
export type { CollectorEnv } from "./config/env.js";
export { logger as collectorLogger } from "./utils/logger.js";
export {
  AuthError,
  CollectionAbortedError,
  CollectorError,
  RateLimitedError,
  RequestRejectedError,
  TransientNetworkError,
} from "./utils/errors.js";
export type { CollectorErrorCode } from "./utils/errors.js";
export { backoffDelay, exponentialBackoff, sendOnce } from "./utils/retry.js";
export type { BackoffOptions } from "./utils/retry.js";
export { PLATFORMS, RAW_ITEM_KINDS, isPlatform, isRawItemKind } from "./modules/collector/types/raw-item.js";
export type { Engagement, Platform, RawItem, RawItemKind, TimeWindow } from "./modules/collector/types/raw-item.js";
export type {
  CollectionRequest,
  FetchPageOptions,
  MentionProvider,
  ProviderPage,
  RequestRetry,
} from "./modules/collector/types/provider.js";
export { TwitterProvider, RECENT_SEARCH_HORIZON_MS } from "./modules/collector/providers/twitter.provider.js";
export { YouTubeProvider } from "./modules/collector/providers/youtube.provider.js";
export { CollectorService } from "./modules/collector/services/collector.service.js";
export type {
  CollectOptions,
  CollectionResult,
  ResumeCursor,
  RetryPolicy,
} from "./modules/collector/services/collector.service.js";
export { createCollector } from "./modules/collector/collector.factory.js";
