import { createCollector } from "@mention-pulse/collector";
import { config } from "./orchestrator/config.js";
import { logger } from "./orchestrator/logger.js";
import { OrchestratorApp } from "./orchestrator/app.js";
import { loadKeywordSet } from "./orchestrator/keyword_set.js";
import { getRedisClient } from "./orchestrator/redis_client.js";
import { SnapshotPublisher } from "./orchestrator/snapshot_publisher.js";
import { logRecoverableError, normaliseError } from "./orchestrator/error_utils.js";

async function main(): Promise<void> {
  try {
    const keywordSet = await loadKeywordSet(config.KEYWORDS_FILE);
    logger.info(
      {
        version: keywordSet.version,
        products: keywordSet.categories.product.length,
        flavors: keywordSet.categories.flavor.length,
      },
      "Keyword set loaded",
    );

    const publisher = config.REDIS_URL
      ? new SnapshotPublisher(getRedisClient(config.REDIS_URL), {
          key: config.SNAPSHOT_KEY,
          ttlSeconds: config.SNAPSHOT_TTL_SECONDS,
        })
      : null;

    const orchestrator = new OrchestratorApp({ collector: createCollector(), keywordSet, publisher });
    await orchestrator.start();
    logger.info(
      {
        httpPort: config.HTTP_PORT,
        metricsPort: config.PROMETHEUS_PORT,
        granularity: config.BUCKET_GRANULARITY,
        snapshot: publisher ? config.SNAPSHOT_KEY : null,
      },
      "Orchestrator started",
    );

    const shutdown = async (signal: string) => {
      logger.info({ signal }, "Graceful shutdown initiated");
      try {
        await orchestrator.stop();
        process.exit(0);
      } catch (error) {
        logRecoverableError(logger, error, { location: "shutdown" }, "Error during shutdown");
        process.exit(1);
      }
    };

    process.once("SIGINT", () => void shutdown("SIGINT"));
    process.once("SIGTERM", () => void shutdown("SIGTERM"));
  } catch (error) {
    logger.fatal({ error: normaliseError(error), context: { location: "main" } }, "Failed to start orchestrator");
    process.exit(1);
  }
}

void main();
