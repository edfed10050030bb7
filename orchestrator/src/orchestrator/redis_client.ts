import { Redis } from "ioredis";
import { logger } from "./logger.js";

let client: Redis | null = null;

export function getRedisClient(url: string): Redis {
  if (client) {
    return client;
  }

  const redis = new Redis(url, {
    lazyConnect: false,
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
  });

  redis.on("connect", () => {
    logger.info({ event: "redis_connect" }, "Redis connection established");
  });
  redis.on("error", (error: Error) => {
    logger.error({ error, event: "redis_error" }, "Redis client error");
  });
  redis.on("close", () => {
    logger.warn({ event: "redis_close" }, "Redis connection closed");
  });

  client = redis;
  return redis;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {
    return;
  }

  const redis = client;
  client = null;

  try {
    await redis.quit();
  } catch (error) {
    logger.warn({ error, event: "redis_quit_error" }, "Error quitting Redis connection");
  }
  redis.removeAllListeners();
}
