import type { Platform, RawItem, TimeWindow } from "./raw-item.js";

export interface CollectionRequest {
  readonly platform: Platform;
  readonly query: string;
  readonly window: TimeWindow;
}

export interface ProviderPage {
  readonly items: RawItem[];
  readonly nextCursor?: string;
}

/** Runs one HTTP request, retrying it as the caller's policy allows. */
export type RequestRetry = <T>(send: () => Promise<T>) => Promise<T>;

export interface FetchPageOptions {
  readonly cursor?: string;
  readonly signal?: AbortSignal;
  readonly retry?: RequestRetry;
}

export interface MentionProvider {
  readonly platform: Platform;
  /** Upper bound on pages followed per collection run. */
  readonly maxPages: number;
  isEnabled(): boolean;
  /** The part of a requested window the platform can actually search right now. */
  searchWindow(window: TimeWindow): TimeWindow;
  fetchPage(request: CollectionRequest, options?: FetchPageOptions): Promise<ProviderPage>;
}
