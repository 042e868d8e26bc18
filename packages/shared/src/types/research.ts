import type { ExecutionRecord } from "./execution";
import type { Complexity, SelectionReason, TaskCategory } from "./models";

export const RESEARCH_JOB_STATUSES = ["submitted", "running", "completed", "failed"] as const;
export type ResearchJobStatus = (typeof RESEARCH_JOB_STATUSES)[number];

export interface ResearchResult {
  report: string;
  modelUsed: string;
  processingTimeMs: number;
  complexity: Complexity;
  completedAt: string;
}

export interface ResearchJob {
  id: string;
  topic: string;
  /** Prompt sent to the model */
  content: string;
  complexity: Complexity;
  requestedComplexity?: string;
  category?: TaskCategory;
  model: string;
  reason: SelectionReason;
  status: ResearchJobStatus;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  result?: ResearchResult;
  error?: string;
  record?: ExecutionRecord;
}

/** Returned by submit; the caller polls status by jobId. */
export interface ResearchJobHandle {
  jobId: string;
  status: "submitted";
  model: string;
}
