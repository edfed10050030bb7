import axios from "axios";
import { env, type CollectorEnv } from "../../config/env.js";
import { TwitterProvider } from "./providers/twitter.provider.js";
import { YouTubeProvider } from "./providers/youtube.provider.js";
import { CollectorService } from "./services/collector.service.js";

export function createCollector(config: CollectorEnv = env): CollectorService {
  const twitterHttp = axios.create({
    baseURL: config.twitter.baseUrl,
    timeout: config.requestTimeoutMs,
    headers: config.twitter.bearerToken ? { Authorization: `Bearer ${config.twitter.bearerToken}` } : {},
  });

  const youtubeHttp = axios.create({
    baseURL: config.youtube.baseUrl,
    timeout: config.requestTimeoutMs,
  });

  const providers = [
    new TwitterProvider({
      http: twitterHttp,
      pageSize: config.twitter.pageSize,
      maxPages: config.twitter.maxPages,
      defaultRetryAfterMs: config.defaultRetryAfterMs,
      bearerToken: config.twitter.bearerToken,
    }),
    new YouTubeProvider({
      http: youtubeHttp,
      pageSize: config.youtube.pageSize,
      maxPages: config.youtube.maxPages,
      includeComments: config.youtube.includeComments,
      commentsPerVideo: config.youtube.commentsPerVideo,
      defaultRetryAfterMs: config.defaultRetryAfterMs,
      quotaRetryMs: config.youtube.quotaRetryMs,
      apiKey: config.youtube.apiKey,
    }),
  ];

  return new CollectorService(providers, config.retry);
}
