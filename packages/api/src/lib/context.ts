import {
  type AnalyticsLog,
  type Conductor,
  type ConductorHooks,
  createConductor,
  createMemoryAnalyticsLog,
  createMemoryResearchJobStore,
  createResearchJobService,
  type JobRunner,
  loadModelCatalog,
  type ResearchJobService,
  type ResearchJobStore,
} from "@research-agent/conductor";
import { createDb } from "@research-agent/db";
import { createOllamaClient, type InferenceService } from "@research-agent/llm";
import {
  createQueueJobRunner,
  createRedisClient,
  createResearchQueue,
  isRedisReachable,
} from "@research-agent/queues";
import {
  ConfigurationError,
  createLogger,
  type Logger,
  type ModelCatalog,
  type ResearchJob,
  type RuntimeEnv,
} from "@research-agent/shared";

/**
 * Everything the routes need. Built once at startup.
 */
export interface AppContext {
  catalog: ModelCatalog;
  inference: InferenceService;
  conductor: Conductor;
  research: ResearchJobService;
  analytics: AnalyticsLog;
  maxModelMemoryGb: number;
  /** Present when research jobs go through the Redis-backed queue */
  queueHealth?: () => Promise<boolean>;
  close(): Promise<void>;
}

export interface AppContextParts {
  catalog: ModelCatalog;
  inference: InferenceService;
  maxModelMemoryGb: number;
  analytics?: AnalyticsLog;
  store?: ResearchJobStore;
  /** Defaults to the in-process pool */
  runner?: JobRunner;
  researchConcurrency?: number;
  inferenceTimeoutMs?: number;
  hooks?: ConductorHooks;
  onStatusChange?: (job: ResearchJob) => void;
  queueHealth?: () => Promise<boolean>;
  close?: () => Promise<void>;
  log?: Logger;
}

export function buildAppContext(parts: AppContextParts): AppContext {
  const analytics = parts.analytics ?? createMemoryAnalyticsLog();
  const conductor = createConductor({
    catalog: parts.catalog,
    inference: parts.inference,
    analytics,
    inferenceTimeoutMs: parts.inferenceTimeoutMs,
    hooks: parts.hooks,
    log: parts.log,
  });
  const research = createResearchJobService({
    conductor,
    store: parts.store ?? createMemoryResearchJobStore(),
    runner: parts.runner,
    concurrency: parts.researchConcurrency,
    onStatusChange: parts.onStatusChange,
  });

  return {
    catalog: parts.catalog,
    inference: parts.inference,
    conductor,
    research,
    analytics,
    maxModelMemoryGb: parts.maxModelMemoryGb,
    queueHealth: parts.queueHealth,
    close: parts.close ?? (async () => {}),
  };
}

/**
 * Wire the context from the environment: Postgres stores when DATABASE_URL is set,
 * the BullMQ runner when REDIS_URL is set, in-memory otherwise.
 */
export function createAppContext(
  env: RuntimeEnv,
  extra: Pick<AppContextParts, "hooks" | "onStatusChange"> = {},
): AppContext {
  const log = createLogger({ component: "api-context" });
  if (env.redisUrl && !env.databaseUrl) {
    throw new ConfigurationError(
      "REDIS_URL requires DATABASE_URL: the worker reads submitted jobs from Postgres",
    );
  }

  const catalog = loadModelCatalog(env.modelCatalogPath, {
    defaultComplexModel: env.defaultComplexModel,
  });
  const db = env.databaseUrl
    ? createDb(env.databaseUrl, { maxRecordsPerModel: env.analyticsMaxRecordsPerModel })
    : null;
  const queue = env.redisUrl ? createResearchQueue(env.redisUrl) : null;
  const redis = env.redisUrl ? createRedisClient(env.redisUrl) : null;

  log.info(
    {
      models: catalog.models.map((m) => m.name),
      defaultComplexModel: catalog.defaultComplexModel,
      storage: db ? "postgres" : "memory",
      runner: queue ? "queue" : "in-process",
    },
    "Application context ready",
  );

  return buildAppContext({
    catalog,
    inference: createOllamaClient({ host: env.ollamaHost }),
    maxModelMemoryGb: env.maxModelMemoryGb,
    analytics:
      db?.executionRecords ??
      createMemoryAnalyticsLog({ maxRecordsPerModel: env.analyticsMaxRecordsPerModel }),
    store: db?.researchJobs,
    runner: queue ? createQueueJobRunner(queue) : undefined,
    researchConcurrency: env.researchConcurrency,
    inferenceTimeoutMs: env.inferenceTimeoutMs,
    queueHealth: redis ? () => isRedisReachable(redis) : undefined,
    log,
    ...extra,
    async close() {
      await queue?.close();
      await redis?.quit();
      await db?.close();
    },
  });
}
