import type { Complexity, ModelCatalog, ModelDescriptor, TaskCategory } from "@research-agent/shared";

import { canLoadModel, type LoadedModelRef } from "./resources";
import { selectModel } from "./select";

export interface TaskClassification {
  taskType: "simple" | "analysis" | "writing" | "executive_report" | "general";
  complexity: Complexity;
  category?: TaskCategory;
}

const RULES: Array<{ words: string[]; classification: TaskClassification }> = [
  {
    words: ["quick", "simple", "fast", "parse"],
    classification: { taskType: "simple", complexity: "simple" },
  },
  {
    words: ["analyze", "research", "investigate"],
    classification: { taskType: "analysis", complexity: "complex", category: "reasoning" },
  },
  {
    words: ["write", "report", "create", "generate"],
    classification: { taskType: "writing", complexity: "complex", category: "writing" },
  },
  {
    words: ["executive", "critical", "important", "final"],
    classification: { taskType: "executive_report", complexity: "critical" },
  },
];

/**
 * Keyword classification of a free-text task description. First matching rule wins.
 */
export function classifyTaskDescription(description: string): TaskClassification {
  const text = description.toLowerCase();
  for (const rule of RULES) {
    if (rule.words.some((word) => text.includes(word))) return { ...rule.classification };
  }
  return { taskType: "general", complexity: "standard" };
}

export interface PerformanceEstimate {
  responseTime: string;
  quality: string;
  specialties: string;
}

export function estimatePerformance(model: ModelDescriptor): PerformanceEstimate {
  const latency = model.baselineLatencyMs;
  const responseTime =
    latency < 5_000
      ? "Very Fast (1-5s)"
      : latency < 15_000
        ? "Fast (5-15s)"
        : latency < 30_000
          ? "Moderate (15-30s)"
          : "Slow (30s+)";
  const quality =
    model.qualityScore >= 8 ? "High Quality" : model.qualityScore >= 6 ? "Good Quality" : "Basic Quality";
  return { responseTime, quality, specialties: model.specialties.join(", ") };
}

export interface ModelRecommendation {
  primaryRecommendation: string;
  alternatives: string[];
  classification: TaskClassification;
  reasoning: string;
  estimatedPerformance: PerformanceEstimate;
}

export function recommendModels(
  catalog: ModelCatalog,
  description: string,
  options: { loaded?: readonly LoadedModelRef[]; maxMemoryGb: number },
): ModelRecommendation {
  const classification = classifyTaskDescription(description);
  const decision = selectModel(catalog, classification);
  const loaded = options.loaded ?? [];

  const alternatives = catalog.models
    .filter((model) => model !== decision.model)
    .filter((model) => canLoadModel(catalog, model.name, loaded, options.maxMemoryGb))
    .slice(0, 2)
    .map((model) => model.name);

  return {
    primaryRecommendation: decision.model.name,
    alternatives,
    classification,
    reasoning: `Based on task type '${classification.taskType}' with '${classification.complexity}' complexity`,
    estimatedPerformance: estimatePerformance(decision.model),
  };
}
