import { describe, expect, it } from "vitest";
import { createModelCatalog } from "./catalog";
import { canLoadModel, estimateMemoryUsage } from "./resources";
import { ALL_MODELS } from "./test_fixtures";

const catalog = createModelCatalog(ALL_MODELS);

describe("estimateMemoryUsage", () => {
  it("sums catalog sizes of loaded models once each", () => {
    expect(
      estimateMemoryUsage(catalog, [
        { name: "gemma2:9b" },
        { name: "qwen2.5:7b" },
        { name: "gemma2:9b" },
      ]),
    ).toBe(10);
  });

  it("ignores models the catalog does not describe", () => {
    expect(estimateMemoryUsage(catalog, [{ name: "phi3:mini" }])).toBe(0);
  });
});

describe("canLoadModel", () => {
  const loaded = [{ name: "llama3.1:8b" }, { name: "gemma2:9b" }, { name: "qwen2.5:7b" }];

  it("allows a model that fits", () => {
    expect(canLoadModel(catalog, "deepseek-r1:8b", loaded, 20)).toBe(true);
  });

  it("refuses a model that would exceed the budget", () => {
    expect(canLoadModel(catalog, "deepseek-r1:8b", loaded, 19)).toBe(false);
  });

  it("always allows loaded and unknown models", () => {
    expect(canLoadModel(catalog, "gemma2:9b", loaded, 1)).toBe(true);
    expect(canLoadModel(catalog, "phi3:mini", loaded, 1)).toBe(true);
  });
});
