import type { AnalyticsLog, ListRecordsOptions } from "@research-agent/conductor";
import type { Complexity, ExecutionRecord, RequestKind, SelectionReason } from "@research-agent/shared";

import type { Queryable } from "../db";
import { toIso } from "./timestamps";

export interface ExecutionRecordRow {
  id: string;
  request_id: string;
  kind: RequestKind;
  model: string;
  complexity: Complexity;
  reason: SelectionReason;
  started_at: Date | string;
  ended_at: Date | string;
  latency_ms: number;
  success: boolean;
  error_category: string | null;
  error_message: string | null;
  job_id: string | null;
}

const COLUMNS =
  "id, request_id, kind, model, complexity, reason, started_at, ended_at, latency_ms, success, error_category, error_message, job_id";

export function rowToExecutionRecord(row: ExecutionRecordRow): ExecutionRecord {
  return {
    id: row.id,
    requestId: row.request_id,
    kind: row.kind,
    model: row.model,
    complexity: row.complexity,
    reason: row.reason,
    startedAt: toIso(row.started_at),
    endedAt: toIso(row.ended_at),
    latencyMs: row.latency_ms,
    success: row.success,
    ...(row.error_category !== null ? { errorCategory: row.error_category } : {}),
    ...(row.error_message !== null ? { errorMessage: row.error_message } : {}),
    ...(row.job_id !== null ? { jobId: row.job_id } : {}),
  };
}

/**
 * Postgres-backed analytics log. Keeps the newest `maxRecordsPerModel` rows per model.
 */
export function createExecutionRecordsRepo(
  db: Queryable,
  options: { maxRecordsPerModel?: number } = {},
): AnalyticsLog {
  const maxPerModel = options.maxRecordsPerModel ?? 100;

  return {
    async append(record: ExecutionRecord): Promise<void> {
      await db.query(
        `insert into execution_records (${COLUMNS})
         values ($1, $2, $3, $4, $5, $6, $7::timestamptz, $8::timestamptz, $9, $10, $11, $12, $13)`,
        [
          record.id,
          record.requestId,
          record.kind,
          record.model,
          record.complexity,
          record.reason,
          record.startedAt,
          record.endedAt,
          record.latencyMs,
          record.success,
          record.errorCategory ?? null,
          record.errorMessage ?? null,
          record.jobId ?? null,
        ],
      );
      await db.query(
        `delete from execution_records
         where model = $1
           and seq in (
             select seq from execution_records
             where model = $1
             order by seq desc
             offset $2
           )`,
        [record.model, maxPerModel],
      );
    },

    async list(opts: ListRecordsOptions = {}): Promise<ExecutionRecord[]> {
      if (opts.limit !== undefined && opts.limit <= 0) return [];
      const res = await db.query<ExecutionRecordRow>(
        `select ${COLUMNS} from execution_records order by seq desc limit $1`,
        [opts.limit ?? null],
      );
      return res.rows.map(rowToExecutionRecord).reverse();
    },
  };
}
