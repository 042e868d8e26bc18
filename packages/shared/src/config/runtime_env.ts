import { isAbsolute, resolve } from "node:path";
import { ConfigurationError } from "../errors.js";
import { findProjectRoot } from "./load_dotenv.js";

export interface RuntimeEnv {
  appEnv: "local" | "dev" | "prod";

  apiPort: number;

  /** Base URL of the local inference service (Ollama HTTP API) */
  ollamaHost: string;
  /** Per-call inference timeout; undefined means the call is not timed out */
  inferenceTimeoutMs?: number;

  modelCatalogPath: string;
  /** Overrides the catalog file's defaultComplexModel */
  defaultComplexModel?: string;
  maxModelMemoryGb: number;

  researchConcurrency: number;
  analyticsMaxRecordsPerModel: number;

  /** When set, execution records and research jobs are kept in Postgres */
  databaseUrl?: string;
  /** When set, research jobs are queued through BullMQ for the worker */
  redisUrl?: string;

  workerMetricsPort: number;
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePositiveNumber(name: string, value: string | undefined): number | undefined {
  const raw = optionalString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid positive number env var: ${name}=${raw}`);
  }
  return parsed;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  const parsed = parsePositiveNumber(name, value);
  if (parsed !== undefined && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`Invalid integer env var: ${name}=${parsed}`);
  }
  return parsed;
}

export function requireEnv(name: string, value: string | undefined): string {
  const trimmed = optionalString(value);
  if (!trimmed) {
    throw new ConfigurationError(`Missing required env var: ${name}`);
  }
  return trimmed;
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  const catalogRaw = optionalString(env.MODEL_CATALOG_PATH);
  const projectRoot = findProjectRoot();
  const modelCatalogPath = catalogRaw
    ? isAbsolute(catalogRaw)
      ? catalogRaw
      : resolve(projectRoot, catalogRaw)
    : resolve(projectRoot, "config", "models.json");

  return {
    appEnv,
    apiPort: parsePositiveInt("API_PORT", env.API_PORT ?? env.PORT) ?? 8001,
    ollamaHost: (optionalString(env.OLLAMA_HOST) ?? "http://localhost:11434").replace(/\/+$/, ""),
    inferenceTimeoutMs: parsePositiveInt("INFERENCE_TIMEOUT_MS", env.INFERENCE_TIMEOUT_MS),
    modelCatalogPath,
    defaultComplexModel: optionalString(env.DEFAULT_COMPLEX_MODEL),
    maxModelMemoryGb: parsePositiveNumber("MAX_MODEL_MEMORY_GB", env.MAX_MODEL_MEMORY_GB) ?? 20,
    researchConcurrency: parsePositiveInt("RESEARCH_CONCURRENCY", env.RESEARCH_CONCURRENCY) ?? 2,
    analyticsMaxRecordsPerModel:
      parsePositiveInt("ANALYTICS_MAX_RECORDS_PER_MODEL", env.ANALYTICS_MAX_RECORDS_PER_MODEL) ??
      100,
    databaseUrl: optionalString(env.DATABASE_URL),
    redisUrl: optionalString(env.REDIS_URL),
    workerMetricsPort: parsePositiveInt("WORKER_METRICS_PORT", env.WORKER_METRICS_PORT) ?? 9091,
  };
}
