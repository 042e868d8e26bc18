import {
  type ConductorRequest,
  isComplexity,
  type Logger,
  type ModelCatalog,
  type ModelDescriptor,
  type SelectionDecision,
  type TaskCategory,
} from "@research-agent/shared";

import { fastestModel, findModel } from "./catalog";

export type SelectionInput = Pick<ConductorRequest, "complexity" | "category">;

/** Stable pick: the earlier entry wins unless `better` says otherwise. */
function pick(
  models: readonly ModelDescriptor[],
  better: (candidate: ModelDescriptor, current: ModelDescriptor) => boolean,
): ModelDescriptor | undefined {
  let best: ModelDescriptor | undefined;
  for (const model of models) {
    if (!best || better(model, best)) best = model;
  }
  return best;
}

const lowerLatency = (a: ModelDescriptor, b: ModelDescriptor): boolean =>
  a.baselineLatencyMs < b.baselineLatencyMs;

const higherQuality = (a: ModelDescriptor, b: ModelDescriptor): boolean =>
  a.qualityScore > b.qualityScore ||
  (a.qualityScore === b.qualityScore && a.baselineLatencyMs < b.baselineLatencyMs);

function withCategory(
  models: readonly ModelDescriptor[],
  category: TaskCategory | undefined,
): readonly ModelDescriptor[] {
  if (!category) return [];
  return models.filter((model) => model.strength === category);
}

function defaultComplex(catalog: ModelCatalog, fallback: ModelDescriptor): ModelDescriptor {
  return findModel(catalog, catalog.defaultComplexModel) ?? fallback;
}

/**
 * Map a request's complexity hint (and optional category) to one catalog model.
 *
 * Pure: reads the catalog, never mutates it, performs no I/O. The only side effect
 * is a warning on `log` when the hint is outside the enumerated set.
 *
 * - absent / simple: fastest model
 * - standard: fastest model whose strength matches the category, else fastest
 * - complex: among the slower models, the fastest one matching the category,
 *   else the designated default complex model
 * - critical: among the slower models (category-filtered when it matches),
 *   highest quality score
 * - anything else: fastest model, flagged as a fallback
 */
export function selectModel(
  catalog: ModelCatalog,
  request: SelectionInput,
  log?: Logger,
): SelectionDecision {
  const fastest = fastestModel(catalog);
  const category = request.category;
  const requested = request.complexity;
  const hint = requested?.trim().toLowerCase();
  const base = {
    ...(category ? { category } : {}),
    ...(requested !== undefined ? { requestedComplexity: requested } : {}),
  };

  if (hint === undefined || hint === "" || hint === "simple") {
    return { ...base, model: fastest, complexity: "simple", reason: "fastest", fallback: false };
  }

  if (!isComplexity(hint)) {
    log?.warn(
      { requestedComplexity: requested, model: fastest.name },
      "Unknown complexity hint, falling back to simple selection",
    );
    return {
      ...base,
      model: fastest,
      complexity: "simple",
      reason: "unknown_complexity_fallback",
      fallback: true,
    };
  }

  const slower = catalog.models.filter((model) => model !== fastest);

  switch (hint) {
    case "standard": {
      const match = pick(withCategory(catalog.models, category), lowerLatency);
      return match
        ? { ...base, model: match, complexity: hint, reason: "category_match", fallback: false }
        : { ...base, model: fastest, complexity: hint, reason: "fastest", fallback: false };
    }
    case "complex": {
      const match = pick(withCategory(slower, category), lowerLatency);
      return match
        ? { ...base, model: match, complexity: hint, reason: "category_match", fallback: false }
        : {
            ...base,
            model: defaultComplex(catalog, fastest),
            complexity: hint,
            reason: "default_complex",
            fallback: false,
          };
    }
    case "critical": {
      const pool = slower.length > 0 ? slower : catalog.models;
      const matching = withCategory(pool, category);
      const model = pick(matching.length > 0 ? matching : pool, higherQuality) ?? fastest;
      return { ...base, model, complexity: hint, reason: "highest_quality", fallback: false };
    }
    case "simple":
      return { ...base, model: fastest, complexity: hint, reason: "fastest", fallback: false };
  }
}
