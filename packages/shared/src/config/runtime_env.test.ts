import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import { loadRuntimeEnv, requireEnv } from "./runtime_env";

describe("loadRuntimeEnv", () => {
  it("returns defaults when env vars are missing", () => {
    const env = loadRuntimeEnv({});
    expect(env.appEnv).toBe("local");
    expect(env.apiPort).toBe(8001);
    expect(env.ollamaHost).toBe("http://localhost:11434");
    expect(env.inferenceTimeoutMs).toBeUndefined();
    expect(env.maxModelMemoryGb).toBe(20);
    expect(env.researchConcurrency).toBe(2);
    expect(env.analyticsMaxRecordsPerModel).toBe(100);
    expect(env.databaseUrl).toBeUndefined();
    expect(env.redisUrl).toBeUndefined();
    expect(env.workerMetricsPort).toBe(9091);
    expect(env.modelCatalogPath.endsWith(join("config", "models.json"))).toBe(true);
  });

  it("parses explicit values", () => {
    const env = loadRuntimeEnv({
      APP_ENV: "prod",
      API_PORT: "9000",
      OLLAMA_HOST: "http://gpu-box:11434/",
      INFERENCE_TIMEOUT_MS: "45000",
      MODEL_CATALOG_PATH: "/etc/research-agent/models.json",
      DEFAULT_COMPLEX_MODEL: " gemma2:9b ",
      MAX_MODEL_MEMORY_GB: "12.5",
      RESEARCH_CONCURRENCY: "4",
      DATABASE_URL: "postgres://localhost/test",
      REDIS_URL: "redis://localhost:6379/1",
    });
    expect(env.appEnv).toBe("prod");
    expect(env.apiPort).toBe(9000);
    expect(env.ollamaHost).toBe("http://gpu-box:11434");
    expect(env.inferenceTimeoutMs).toBe(45000);
    expect(env.modelCatalogPath).toBe("/etc/research-agent/models.json");
    expect(env.defaultComplexModel).toBe("gemma2:9b");
    expect(env.maxModelMemoryGb).toBe(12.5);
    expect(env.researchConcurrency).toBe(4);
    expect(env.databaseUrl).toBe("postgres://localhost/test");
    expect(env.redisUrl).toBe("redis://localhost:6379/1");
  });

  it("falls back to local for unknown APP_ENV", () => {
    expect(loadRuntimeEnv({ APP_ENV: "staging" }).appEnv).toBe("local");
  });

  it("treats blank optional values as unset", () => {
    const env = loadRuntimeEnv({ INFERENCE_TIMEOUT_MS: "  ", DATABASE_URL: "" });
    expect(env.inferenceTimeoutMs).toBeUndefined();
    expect(env.databaseUrl).toBeUndefined();
  });

  it("rejects invalid numbers with a configuration error", () => {
    expect(() => loadRuntimeEnv({ INFERENCE_TIMEOUT_MS: "soon" })).toThrow(ConfigurationError);
    expect(() => loadRuntimeEnv({ RESEARCH_CONCURRENCY: "0" })).toThrow(
      "Invalid positive number env var: RESEARCH_CONCURRENCY=0",
    );
    expect(() => loadRuntimeEnv({ RESEARCH_CONCURRENCY: "1.5" })).toThrow(
      "Invalid integer env var: RESEARCH_CONCURRENCY=1.5",
    );
  });
});

describe("requireEnv", () => {
  it("returns the trimmed value", () => {
    expect(requireEnv("REDIS_URL", " redis://x ")).toBe("redis://x");
  });

  it("throws when missing", () => {
    expect(() => requireEnv("REDIS_URL", undefined)).toThrow("Missing required env var: REDIS_URL");
  });
});
