export {
  type AnalyticsLog,
  type AnalyticsSink,
  type AnalyticsSource,
  type AnalyticsSummary,
  createMemoryAnalyticsLog,
  type ListRecordsOptions,
  type MemoryUsage,
  type ModelUsage,
  summarizeAnalytics,
} from "./analytics";
export {
  type CatalogOptions,
  createModelCatalog,
  fastestModel,
  findModel,
  loadModelCatalog,
  parseModelCatalog,
} from "./catalog";
export {
  type Conductor,
  type ConductorHooks,
  type ConductorOptions,
  createConductor,
  type DispatchOptions,
  type DispatchResult,
} from "./conductor";
export {
  classifyTaskDescription,
  estimatePerformance,
  type ModelRecommendation,
  type PerformanceEstimate,
  recommendModels,
  type TaskClassification,
} from "./recommend";
export {
  assertTransition,
  buildResearchPrompt,
  canTransition,
  createMemoryResearchJobStore,
  createResearchJobService,
  emptyStatusCounts,
  isResearchJobStatus,
  type JobStatusCounts,
  type JobTransitionPatch,
  type ResearchJobService,
  type ResearchJobServiceOptions,
  type ResearchJobStore,
  type ResearchSubmission,
} from "./research";
export { canLoadModel, estimateMemoryUsage, type LoadedModelRef } from "./resources";
export { createInProcessJobRunner, type InProcessJobRunner, type JobRunner } from "./runner";
export { selectModel, type SelectionInput } from "./select";
