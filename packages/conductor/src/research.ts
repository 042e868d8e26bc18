import { randomUUID } from "node:crypto";
import {
  type ConductorRequest,
  createJobLogger,
  createLogger,
  errorMessage,
  InvalidJobTransitionError,
  type Logger,
  RESEARCH_JOB_STATUSES,
  type ResearchJob,
  type ResearchJobHandle,
  type ResearchJobStatus,
  type SelectionDecision,
  type TaskCategory,
} from "@research-agent/shared";

import { findModel } from "./catalog";
import type { Conductor, DispatchResult } from "./conductor";
import { createInProcessJobRunner, type JobRunner } from "./runner";

const NEXT_STATUS: Record<ResearchJobStatus, readonly ResearchJobStatus[]> = {
  submitted: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: ResearchJobStatus, to: ResearchJobStatus): boolean {
  return NEXT_STATUS[from].includes(to);
}

export function assertTransition(jobId: string, from: ResearchJobStatus, to: ResearchJobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(jobId, from, to);
  }
}

/** Fields a transition may fill in alongside the new status. */
export type JobTransitionPatch = Partial<
  Pick<ResearchJob, "startedAt" | "completedAt" | "result" | "error" | "record">
>;

export type JobStatusCounts = Record<ResearchJobStatus, number>;

export interface ResearchJobStore {
  create(job: ResearchJob): Promise<void>;
  get(id: string): Promise<ResearchJob | null>;
  /** Newest first */
  list(options?: { limit?: number }): Promise<ResearchJob[]>;
  /** Applies the transition or throws InvalidJobTransitionError */
  transition(id: string, to: ResearchJobStatus, patch?: JobTransitionPatch): Promise<ResearchJob>;
  /** Drops a job that was never handed to a runner */
  remove(id: string): Promise<void>;
  counts(): Promise<JobStatusCounts>;
}

export function emptyStatusCounts(): JobStatusCounts {
  return { submitted: 0, running: 0, completed: 0, failed: 0 };
}

export function createMemoryResearchJobStore(): ResearchJobStore {
  const jobs = new Map<string, ResearchJob>();
  const copy = (job: ResearchJob): ResearchJob => structuredClone(job);

  return {
    async create(job) {
      if (jobs.has(job.id)) throw new Error(`Research job ${job.id} already exists`);
      jobs.set(job.id, copy(job));
    },

    async get(id) {
      const job = jobs.get(id);
      return job ? copy(job) : null;
    },

    async list(options = {}) {
      const all = [...jobs.values()].reverse();
      const limited = options.limit !== undefined ? all.slice(0, options.limit) : all;
      return limited.map(copy);
    },

    async transition(id, to, patch = {}) {
      const current = jobs.get(id);
      if (!current) throw new Error(`Research job ${id} not found`);
      assertTransition(id, current.status, to);
      const next: ResearchJob = copy({ ...current, ...patch, status: to });
      jobs.set(id, next);
      return copy(next);
    },

    async remove(id) {
      jobs.delete(id);
    },

    async counts() {
      const counts = emptyStatusCounts();
      for (const job of jobs.values()) counts[job.status] += 1;
      return counts;
    },
  };
}

export function buildResearchPrompt(topic: string): string {
  return [
    `Conduct research on the topic: ${topic}`,
    "",
    "Please provide:",
    "1. Executive Summary",
    "2. Key Findings",
    "3. Important Sources",
    "4. Recommendations",
    "",
    "Keep it concise but informative.",
  ].join("\n");
}

export interface ResearchSubmission {
  topic: string;
  complexity?: string;
  category?: TaskCategory;
}

export interface ResearchJobService {
  submit(submission: ResearchSubmission): Promise<ResearchJobHandle>;
  /** Run a submitted job to a terminal state. Used by runners and the worker. */
  execute(jobId: string): Promise<ResearchJob | null>;
  get(jobId: string): Promise<ResearchJob | null>;
  list(options?: { limit?: number }): Promise<ResearchJob[]>;
  counts(): Promise<JobStatusCounts>;
}

export interface ResearchJobServiceOptions {
  conductor: Conductor;
  store: ResearchJobStore;
  /** Defaults to an in-process pool of `concurrency` workers */
  runner?: JobRunner;
  concurrency?: number;
  /** Called after every status change, for metrics */
  onStatusChange?: (job: ResearchJob) => void;
  log?: Logger;
  now?: () => Date;
  newId?: () => string;
}

export function createResearchJobService(options: ResearchJobServiceOptions): ResearchJobService {
  const { conductor, store, onStatusChange } = options;
  const log = options.log ?? createLogger({ component: "research" });
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;

  async function move(id: string, to: ResearchJobStatus, patch?: JobTransitionPatch): Promise<ResearchJob> {
    const job = await store.transition(id, to, patch);
    onStatusChange?.(job);
    return job;
  }

  /**
   * Writes a terminal status. When that write fails the job is marked failed
   * with the persistence error so it never stays running; the original error
   * is rethrown either way.
   */
  async function finish(
    jobId: string,
    to: "completed" | "failed",
    patch: JobTransitionPatch,
    jobLog: Logger,
  ): Promise<ResearchJob> {
    try {
      return await move(jobId, to, patch);
    } catch (err) {
      const error = `Failed to save job result: ${errorMessage(err)}`;
      jobLog.error({ status: to, err: errorMessage(err) }, "Failed to save research job outcome");
      try {
        await move(jobId, "failed", { completedAt: patch.completedAt ?? now().toISOString(), error });
      } catch (retryErr) {
        jobLog.error({ err: errorMessage(retryErr) }, "Failed to mark research job failed");
      }
      throw err;
    }
  }

  function decisionFor(job: ResearchJob): SelectionDecision | null {
    const model = findModel(conductor.catalog, job.model);
    if (!model) return null;
    return {
      model,
      complexity: job.complexity,
      reason: job.reason,
      fallback: job.reason === "unknown_complexity_fallback",
      ...(job.category ? { category: job.category } : {}),
      ...(job.requestedComplexity !== undefined
        ? { requestedComplexity: job.requestedComplexity }
        : {}),
    };
  }

  async function execute(jobId: string): Promise<ResearchJob | null> {
    const jobLog = createJobLogger(jobId);
    const job = await store.get(jobId);
    if (!job) {
      jobLog.warn("Research job not found");
      return null;
    }
    if (job.status !== "submitted") {
      // redelivered by the queue; the first delivery owns the job
      jobLog.warn({ status: job.status }, "Research job already started");
      return job;
    }

    await move(jobId, "running", { startedAt: now().toISOString() });
    jobLog.info({ model: job.model, complexity: job.complexity }, "Research job running");

    const decision = decisionFor(job);
    if (!decision) {
      const error = `Model ${job.model} is not in the catalog`;
      jobLog.error({ model: job.model }, error);
      return finish(jobId, "failed", { completedAt: now().toISOString(), error }, jobLog);
    }

    const request: ConductorRequest = {
      id: jobId,
      kind: "research",
      content: job.content,
      complexity: job.requestedComplexity,
      topic: job.topic,
      ...(job.category ? { category: job.category } : {}),
    };

    let result: DispatchResult;
    try {
      result = await conductor.dispatch(request, decision, { jobId });
    } catch (err) {
      const error = errorMessage(err);
      jobLog.error({ err: error }, "Research job failed before dispatch");
      return finish(jobId, "failed", { completedAt: now().toISOString(), error }, jobLog);
    }

    const completedAt = now().toISOString();
    if (!result.ok) {
      jobLog.warn({ err: result.error.message }, "Research job failed");
      return finish(
        jobId,
        "failed",
        { completedAt, error: result.error.message, record: result.record },
        jobLog,
      );
    }

    jobLog.info({ latencyMs: result.record.latencyMs }, "Research job completed");
    return finish(
      jobId,
      "completed",
      {
        completedAt,
        record: result.record,
        result: {
          report: result.text,
          modelUsed: decision.model.name,
          processingTimeMs: result.record.latencyMs,
          complexity: decision.complexity,
          completedAt,
        },
      },
      jobLog,
    );
  }

  const runner =
    options.runner ?? createInProcessJobRunner(execute, { concurrency: options.concurrency, log });

  return {
    async submit(submission: ResearchSubmission): Promise<ResearchJobHandle> {
      const id = newId();
      const content = buildResearchPrompt(submission.topic);
      const decision = conductor.select({
        id,
        kind: "research",
        content,
        topic: submission.topic,
        complexity: submission.complexity,
        ...(submission.category ? { category: submission.category } : {}),
      });

      const job: ResearchJob = {
        id,
        topic: submission.topic,
        content,
        complexity: decision.complexity,
        model: decision.model.name,
        reason: decision.reason,
        status: "submitted",
        createdAt: now().toISOString(),
        ...(submission.complexity !== undefined ? { requestedComplexity: submission.complexity } : {}),
        ...(submission.category ? { category: submission.category } : {}),
      };

      await store.create(job);
      try {
        await runner.schedule(id);
      } catch (err) {
        await store.remove(id);
        throw err;
      }
      onStatusChange?.(job);
      log.info({ jobId: id, model: job.model, complexity: job.complexity }, "Research job submitted");

      return { jobId: id, status: "submitted", model: job.model };
    },

    execute,
    get: (jobId) => store.get(jobId),
    list: (listOptions) => store.list(listOptions),
    counts: () => store.counts(),
  };
}

export function isResearchJobStatus(value: string): value is ResearchJobStatus {
  return (RESEARCH_JOB_STATUSES as readonly string[]).includes(value);
}
