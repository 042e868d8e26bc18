export const MODEL_STRENGTHS = ["speed", "reasoning", "writing"] as const;
export type ModelStrength = (typeof MODEL_STRENGTHS)[number];

/** Categories a complex request can name to pick between the slower models. */
export const TASK_CATEGORIES = ["reasoning", "writing"] as const;
export type TaskCategory = (typeof TASK_CATEGORIES)[number];

export const COMPLEXITIES = ["simple", "standard", "complex", "critical"] as const;
export type Complexity = (typeof COMPLEXITIES)[number];

export interface ModelDescriptor {
  name: string;
  strength: ModelStrength;
  /** Observed benchmark latency for a short prompt */
  baselineLatencyMs: number;
  /** Resident memory once loaded */
  sizeGb: number;
  maxContext: number;
  /** Relative output quality, 1-10 */
  qualityScore: number;
  specialties: readonly string[];
}

export interface ModelCatalog {
  readonly models: readonly ModelDescriptor[];
  /** Name of the model used for complex requests with no usable category */
  readonly defaultComplexModel: string;
}

export type SelectionReason =
  | "fastest"
  | "category_match"
  | "default_complex"
  | "highest_quality"
  | "unknown_complexity_fallback";

export interface SelectionDecision {
  model: ModelDescriptor;
  /** Complexity the policy acted on (unknown hints resolve to "simple") */
  complexity: Complexity;
  category?: TaskCategory;
  reason: SelectionReason;
  /** True when the caller's hint was outside the enumerated set */
  fallback: boolean;
  /** The hint exactly as received */
  requestedComplexity?: string;
}

export function isComplexity(value: string): value is Complexity {
  return (COMPLEXITIES as readonly string[]).includes(value);
}

export function isTaskCategory(value: string): value is TaskCategory {
  return (TASK_CATEGORIES as readonly string[]).includes(value);
}
