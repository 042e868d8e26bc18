import type { Complexity, SelectionReason, TaskCategory } from "./models";

export type RequestKind = "chat" | "research";

/**
 * A unit of work handed to the conductor. Consumed by a single dispatch.
 */
export interface ConductorRequest {
  id: string;
  kind: RequestKind;
  content: string;
  /** Raw complexity hint; any string is accepted and validated by select() */
  complexity?: string;
  category?: TaskCategory;
  topic?: string;
}

export interface ExecutionRecord {
  id: string;
  requestId: string;
  kind: RequestKind;
  model: string;
  complexity: Complexity;
  reason: SelectionReason;
  startedAt: string; // ISO
  endedAt: string; // ISO
  latencyMs: number;
  success: boolean;
  errorCategory?: string;
  errorMessage?: string;
  jobId?: string;
}
