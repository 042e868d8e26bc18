import {
  canTransition,
  emptyStatusCounts,
  type JobStatusCounts,
  type JobTransitionPatch,
  type ResearchJobStore,
} from "@research-agent/conductor";
import {
  type Complexity,
  type ExecutionRecord,
  InvalidJobTransitionError,
  RESEARCH_JOB_STATUSES,
  type ResearchJob,
  type ResearchJobStatus,
  type ResearchResult,
  type SelectionReason,
  type TaskCategory,
} from "@research-agent/shared";

import type { Queryable } from "../db";
import { toIso, toIsoOrUndefined } from "./timestamps";

export interface ResearchJobRow {
  id: string;
  topic: string;
  content: string;
  complexity: Complexity;
  requested_complexity: string | null;
  category: TaskCategory | null;
  model: string;
  reason: SelectionReason;
  status: ResearchJobStatus;
  created_at: Date | string;
  started_at: Date | string | null;
  completed_at: Date | string | null;
  result_json: ResearchResult | null;
  error: string | null;
  record_json: ExecutionRecord | null;
}

const COLUMNS =
  "id, topic, content, complexity, requested_complexity, category, model, reason, status, created_at, started_at, completed_at, result_json, error, record_json";

export function rowToResearchJob(row: ResearchJobRow): ResearchJob {
  const startedAt = toIsoOrUndefined(row.started_at);
  const completedAt = toIsoOrUndefined(row.completed_at);
  return {
    id: row.id,
    topic: row.topic,
    content: row.content,
    complexity: row.complexity,
    model: row.model,
    reason: row.reason,
    status: row.status,
    createdAt: toIso(row.created_at),
    ...(row.requested_complexity !== null ? { requestedComplexity: row.requested_complexity } : {}),
    ...(row.category !== null ? { category: row.category } : {}),
    ...(startedAt !== undefined ? { startedAt } : {}),
    ...(completedAt !== undefined ? { completedAt } : {}),
    ...(row.result_json !== null ? { result: row.result_json } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
    ...(row.record_json !== null ? { record: row.record_json } : {}),
  };
}

/** Statuses a job may be in for a move to `to` to be legal. */
function sourcesOf(to: ResearchJobStatus): ResearchJobStatus[] {
  return RESEARCH_JOB_STATUSES.filter((from) => canTransition(from, to));
}

export function createResearchJobsRepo(db: Queryable): ResearchJobStore {
  async function get(id: string): Promise<ResearchJob | null> {
    const res = await db.query<ResearchJobRow>(`select ${COLUMNS} from research_jobs where id = $1`, [id]);
    const row = res.rows[0];
    return row ? rowToResearchJob(row) : null;
  }

  return {
    async create(job: ResearchJob): Promise<void> {
      await db.query(
        `insert into research_jobs (
           id, topic, content, complexity, requested_complexity, category,
           model, reason, status, created_at
         ) values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10::timestamptz)`,
        [
          job.id,
          job.topic,
          job.content,
          job.complexity,
          job.requestedComplexity ?? null,
          job.category ?? null,
          job.model,
          job.reason,
          job.status,
          job.createdAt,
        ],
      );
    },

    get,

    async list(options: { limit?: number } = {}): Promise<ResearchJob[]> {
      const res = await db.query<ResearchJobRow>(
        `select ${COLUMNS} from research_jobs order by created_at desc, seq desc limit $1`,
        [options.limit ?? null],
      );
      return res.rows.map(rowToResearchJob);
    },

    /**
     * The status guard lives in the WHERE clause so two workers racing on the
     * same job cannot both apply a transition.
     */
    async transition(
      id: string,
      to: ResearchJobStatus,
      patch: JobTransitionPatch = {},
    ): Promise<ResearchJob> {
      const res = await db.query<ResearchJobRow>(
        `update research_jobs
         set status = $2,
             started_at = coalesce($3::timestamptz, started_at),
             completed_at = coalesce($4::timestamptz, completed_at),
             result_json = coalesce($5::jsonb, result_json),
             error = coalesce($6, error),
             record_json = coalesce($7::jsonb, record_json)
         where id = $1 and status = any($8::text[])
         returning ${COLUMNS}`,
        [
          id,
          to,
          patch.startedAt ?? null,
          patch.completedAt ?? null,
          patch.result ? JSON.stringify(patch.result) : null,
          patch.error ?? null,
          patch.record ? JSON.stringify(patch.record) : null,
          sourcesOf(to),
        ],
      );
      const row = res.rows[0];
      if (row) return rowToResearchJob(row);

      const current = await get(id);
      if (!current) throw new Error(`Research job ${id} not found`);
      throw new InvalidJobTransitionError(id, current.status, to);
    },

    async remove(id: string): Promise<void> {
      await db.query("delete from research_jobs where id = $1", [id]);
    },

    async counts(): Promise<JobStatusCounts> {
      const res = await db.query<{ status: ResearchJobStatus; count: string }>(
        "select status, count(*) as count from research_jobs group by status",
      );
      const counts = emptyStatusCounts();
      for (const row of res.rows) {
        counts[row.status] = Number.parseInt(row.count, 10);
      }
      return counts;
    },
  };
}
