import { fileURLToPath } from "node:url";
import { ConfigurationError } from "@research-agent/shared";
import { describe, expect, it } from "vitest";
import {
  createModelCatalog,
  fastestModel,
  findModel,
  loadModelCatalog,
  parseModelCatalog,
} from "./catalog";
import { ALL_MODELS, DEEP_REASONING, FAST, REASONING, WRITING } from "./test_fixtures";

describe("createModelCatalog", () => {
  it("rejects an empty catalog", () => {
    expect(() => createModelCatalog([])).toThrow(ConfigurationError);
    expect(() => createModelCatalog([])).toThrow("Model catalog is empty");
  });

  it("rejects duplicate names", () => {
    expect(() => createModelCatalog([FAST, FAST])).toThrow(
      "Duplicate model in catalog: llama3.1:8b",
    );
  });

  it("defaults the complex model to the fastest writing model among the slower ones", () => {
    expect(createModelCatalog(ALL_MODELS).defaultComplexModel).toBe("qwen2.5:7b");
  });

  it("defaults to the fastest slower model when no writer exists", () => {
    expect(createModelCatalog([FAST, DEEP_REASONING, REASONING]).defaultComplexModel).toBe(
      "gemma2:9b",
    );
  });

  it("uses the only model of a single-model catalog", () => {
    expect(createModelCatalog([WRITING]).defaultComplexModel).toBe("qwen2.5:7b");
  });

  it("honours an explicit default", () => {
    const catalog = createModelCatalog(ALL_MODELS, { defaultComplexModel: "deepseek-r1:8b" });
    expect(catalog.defaultComplexModel).toBe("deepseek-r1:8b");
  });

  it("rejects a default that is missing or is the fastest model", () => {
    expect(() => createModelCatalog(ALL_MODELS, { defaultComplexModel: "phi3:mini" })).toThrow(
      "Default complex model phi3:mini is not in the catalog",
    );
    expect(() => createModelCatalog(ALL_MODELS, { defaultComplexModel: "llama3.1:8b" })).toThrow(
      ConfigurationError,
    );
  });

  it("freezes the catalog and its descriptors", () => {
    const catalog = createModelCatalog(ALL_MODELS);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.models)).toBe(true);
    expect(Object.isFrozen(catalog.models[0])).toBe(true);
    expect(Object.isFrozen(catalog.models[0]?.specialties)).toBe(true);
  });
});

describe("fastestModel", () => {
  it("picks the lowest baseline latency", () => {
    expect(fastestModel(createModelCatalog([WRITING, FAST, REASONING])).name).toBe("llama3.1:8b");
  });

  it("keeps catalog order on ties", () => {
    const twin = { ...FAST, name: "llama3.2:3b" };
    expect(fastestModel(createModelCatalog([twin, FAST])).name).toBe("llama3.2:3b");
  });
});

describe("parseModelCatalog", () => {
  it("fills optional descriptor fields with defaults", () => {
    const catalog = parseModelCatalog({
      models: [
        { name: "llama3.1:8b", strength: "speed", baselineLatencyMs: 1850 },
        { name: "qwen2.5:7b", strength: "writing", baselineLatencyMs: 14560 },
      ],
    });
    expect(findModel(catalog, "qwen2.5:7b")).toEqual({
      name: "qwen2.5:7b",
      strength: "writing",
      baselineLatencyMs: 14560,
      sizeGb: 0,
      maxContext: 4096,
      qualityScore: 5,
      specialties: [],
    });
  });

  it("lets the caller override the document default", () => {
    const doc = { defaultComplexModel: "qwen2.5:7b", models: ALL_MODELS };
    expect(parseModelCatalog(doc, { defaultComplexModel: "gemma2:9b" }).defaultComplexModel).toBe(
      "gemma2:9b",
    );
  });

  it("reports malformed documents as configuration errors", () => {
    expect(() =>
      parseModelCatalog({ models: [{ name: "x", strength: "speed", baselineLatencyMs: -1 }] }),
    ).toThrow(/^Malformed model catalog: models\.0\.baselineLatencyMs/);
    expect(() =>
      parseModelCatalog({ models: [{ name: "x", strength: "vision", baselineLatencyMs: 10 }] }),
    ).toThrow(ConfigurationError);
    expect(() => parseModelCatalog(null)).toThrow(ConfigurationError);
  });
});

describe("loadModelCatalog", () => {
  it("loads the shipped catalog", () => {
    const path = fileURLToPath(new URL("../../../config/models.json", import.meta.url));
    const catalog = loadModelCatalog(path);
    expect(catalog.models.map((m) => m.name)).toEqual([
      "llama3.1:8b",
      "qwen2.5:7b",
      "gemma2:9b",
      "deepseek-r1:8b",
    ]);
    expect(catalog.defaultComplexModel).toBe("qwen2.5:7b");
  });

  it("fails with a configuration error when the file is missing", () => {
    expect(() => loadModelCatalog("/nonexistent/models.json")).toThrow(
      "Cannot read model catalog at /nonexistent/models.json",
    );
  });
});
