import type { Logger } from "@research-agent/shared";
import { describe, expect, it, vi } from "vitest";
import { createModelCatalog } from "./catalog";
import { selectModel } from "./select";
import { ALL_MODELS, FAST, REASONING, WRITING } from "./test_fixtures";

const catalog = createModelCatalog(ALL_MODELS);

function fakeLog() {
  const warn = vi.fn();
  return { warn, log: { warn } as unknown as Logger };
}

describe("selectModel", () => {
  describe("simple requests", () => {
    it("picks the fastest model when the hint is simple", () => {
      const decision = selectModel(catalog, { complexity: "simple" });
      expect(decision).toEqual({
        model: catalog.models[0],
        complexity: "simple",
        reason: "fastest",
        fallback: false,
        requestedComplexity: "simple",
      });
    });

    it("picks the fastest model when no hint is given", () => {
      const decision = selectModel(catalog, {});
      expect(decision.model.name).toBe("llama3.1:8b");
      expect(decision.complexity).toBe("simple");
      expect(decision.requestedComplexity).toBeUndefined();
    });

    it("normalizes case and whitespace", () => {
      expect(selectModel(catalog, { complexity: "  SIMPLE " }).reason).toBe("fastest");
      expect(selectModel(catalog, { complexity: "Complex" }).model.name).toBe("qwen2.5:7b");
    });

    it("ignores the category", () => {
      expect(selectModel(catalog, { complexity: "simple", category: "reasoning" }).model.name).toBe(
        "llama3.1:8b",
      );
    });
  });

  describe("complex requests", () => {
    it("uses the designated default when no category is given", () => {
      const decision = selectModel(catalog, { complexity: "complex" });
      expect(decision.model.name).toBe("qwen2.5:7b");
      expect(decision.reason).toBe("default_complex");
      expect(decision.fallback).toBe(false);
    });

    it("picks the fastest reasoning model for reasoning work", () => {
      const decision = selectModel(catalog, { complexity: "complex", category: "reasoning" });
      expect(decision.model.name).toBe("gemma2:9b");
      expect(decision.reason).toBe("category_match");
      expect(decision.category).toBe("reasoning");
    });

    it("picks the writing model for writing work", () => {
      expect(selectModel(catalog, { complexity: "complex", category: "writing" }).model.name).toBe(
        "qwen2.5:7b",
      );
    });

    it("falls back to the default when no slower model matches the category", () => {
      const small = createModelCatalog([FAST, REASONING]);
      const decision = selectModel(small, { complexity: "complex", category: "writing" });
      expect(decision.model.name).toBe("gemma2:9b");
      expect(decision.reason).toBe("default_complex");
    });

    it("respects a configured default", () => {
      const custom = createModelCatalog(ALL_MODELS, { defaultComplexModel: "deepseek-r1:8b" });
      expect(selectModel(custom, { complexity: "complex" }).model.name).toBe("deepseek-r1:8b");
    });
  });

  describe("standard requests", () => {
    it("uses the fastest model without a category", () => {
      expect(selectModel(catalog, { complexity: "standard" }).model.name).toBe("llama3.1:8b");
    });

    it("uses the fastest model of the requested strength", () => {
      const decision = selectModel(catalog, { complexity: "standard", category: "reasoning" });
      expect(decision.model.name).toBe("gemma2:9b");
      expect(decision.reason).toBe("category_match");
    });
  });

  describe("critical requests", () => {
    it("picks the highest quality slower model", () => {
      const decision = selectModel(catalog, { complexity: "critical" });
      expect(decision.model.name).toBe("deepseek-r1:8b");
      expect(decision.reason).toBe("highest_quality");
    });

    it("narrows to the category when one matches", () => {
      expect(selectModel(catalog, { complexity: "critical", category: "writing" }).model.name).toBe(
        "qwen2.5:7b",
      );
    });

    it("breaks quality ties by latency", () => {
      const tied = createModelCatalog([FAST, REASONING, WRITING]);
      expect(selectModel(tied, { complexity: "critical" }).model.name).toBe("qwen2.5:7b");
    });
  });

  describe("unknown hints", () => {
    it("falls back to the fastest model and logs the fallback", () => {
      const { warn, log } = fakeLog();
      const decision = selectModel(catalog, { complexity: "urgent" }, log);

      expect(decision.model.name).toBe("llama3.1:8b");
      expect(decision.fallback).toBe(true);
      expect(decision.reason).toBe("unknown_complexity_fallback");
      expect(decision.complexity).toBe("simple");
      expect(decision.requestedComplexity).toBe("urgent");
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        { requestedComplexity: "urgent", model: "llama3.1:8b" },
        "Unknown complexity hint, falling back to simple selection",
      );
    });

    it("does not log for known hints", () => {
      const { warn, log } = fakeLog();
      selectModel(catalog, { complexity: "complex" }, log);
      expect(warn).not.toHaveBeenCalled();
    });
  });

  it("always returns the only model of a single-model catalog", () => {
    const single = createModelCatalog([WRITING]);
    for (const complexity of [undefined, "simple", "standard", "complex", "critical", "urgent"]) {
      expect(selectModel(single, { complexity }).model.name).toBe("qwen2.5:7b");
    }
  });

  it("is deterministic and leaves the catalog untouched", () => {
    const before = JSON.stringify(catalog);
    const first = selectModel(catalog, { complexity: "complex" });
    for (let i = 0; i < 50; i += 1) {
      expect(selectModel(catalog, { complexity: "complex" })).toEqual(first);
      expect(selectModel(catalog, { complexity: "simple" }).model).toBe(catalog.models[0]);
    }
    expect(JSON.stringify(catalog)).toBe(before);
  });
});
