import {
  createConductor,
  createResearchJobService,
  loadModelCatalog,
} from "@research-agent/conductor";
import { createDb } from "@research-agent/db";
import { createOllamaClient } from "@research-agent/llm";
import {
  createQueueJobRunner,
  createResearchQueue,
  getQueueDepth,
  RESEARCH_QUEUE_NAME,
} from "@research-agent/queues";
import {
  createLogger,
  errorMessage,
  loadDotEnvIfPresent,
  loadRuntimeEnv,
  requireEnv,
} from "@research-agent/shared";

import {
  conductorMetricsHooks,
  recordResearchJob,
  startMetricsServer,
  updateHealthStatus,
  updateQueueDepth,
} from "./metrics";
import { createResearchWorker } from "./workers/research.worker";

// Load .env and .env.local files (must happen before reading env vars)
loadDotEnvIfPresent();

const log = createLogger({ component: "worker" });

async function main(): Promise<void> {
  log.info("Starting research worker");

  const env = loadRuntimeEnv();
  const redisUrl = requireEnv("REDIS_URL", env.redisUrl);
  const databaseUrl = requireEnv("DATABASE_URL", env.databaseUrl);

  updateHealthStatus({ startedAt: new Date().toISOString() });

  const catalog = loadModelCatalog(env.modelCatalogPath, {
    defaultComplexModel: env.defaultComplexModel,
  });
  const db = createDb(databaseUrl, { maxRecordsPerModel: env.analyticsMaxRecordsPerModel });
  const queue = createResearchQueue(redisUrl);

  const conductor = createConductor({
    catalog,
    inference: createOllamaClient({ host: env.ollamaHost }),
    analytics: db.executionRecords,
    inferenceTimeoutMs: env.inferenceTimeoutMs,
    hooks: conductorMetricsHooks,
  });
  const service = createResearchJobService({
    conductor,
    store: db.researchJobs,
    runner: createQueueJobRunner(queue),
    onStatusChange: recordResearchJob,
  });

  const worker = createResearchWorker({
    redisUrl,
    service,
    concurrency: env.researchConcurrency,
  });

  // Start metrics server (also serves /health)
  const metricsServer = startMetricsServer(env.workerMetricsPort);
  log.info({ port: env.workerMetricsPort }, "Metrics server started");

  // Update queue depth periodically
  const queueDepthInterval = setInterval(() => {
    getQueueDepth(queue)
      .then((depth) => updateQueueDepth(RESEARCH_QUEUE_NAME, depth))
      .catch((err: unknown) => {
        log.warn({ err: errorMessage(err) }, "Failed to update queue depth");
      });
  }, 15_000); // Every 15 seconds

  log.info(
    { models: catalog.models.map((m) => m.name), concurrency: env.researchConcurrency },
    "Worker started, listening for jobs",
  );

  // Graceful shutdown
  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return; // Prevent double shutdown
    isShuttingDown = true;

    log.info({ signal }, "Received signal, shutting down");

    clearInterval(queueDepthInterval);

    await metricsServer.close();
    await worker.close();
    await queue.close();
    await db.close();

    log.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err: errorMessage(err) }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "Fatal error");
  process.exit(1);
});
