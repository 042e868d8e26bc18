import type { ExecutionRecord } from "@research-agent/shared";
import { describe, expect, it, vi } from "vitest";
import type { Queryable } from "../db";
import { createExecutionRecordsRepo, type ExecutionRecordRow } from "./execution_records";

const record: ExecutionRecord = {
  id: "rec-1",
  requestId: "req-1",
  kind: "chat",
  model: "llama3.1:8b",
  complexity: "simple",
  reason: "fastest",
  startedAt: "2026-03-01T10:00:00.000Z",
  endedAt: "2026-03-01T10:00:01.500Z",
  latencyMs: 1500,
  success: false,
  errorCategory: "Dispatch error",
  errorMessage: "Inference service unreachable: fetch failed",
};

function toRow(r: ExecutionRecord): ExecutionRecordRow {
  return {
    id: r.id,
    request_id: r.requestId,
    kind: r.kind,
    model: r.model,
    complexity: r.complexity,
    reason: r.reason,
    started_at: new Date(r.startedAt),
    ended_at: new Date(r.endedAt),
    latency_ms: r.latencyMs,
    success: r.success,
    error_category: r.errorCategory ?? null,
    error_message: r.errorMessage ?? null,
    job_id: r.jobId ?? null,
  };
}

describe("execution_records repo", () => {
  it("inserts the record then trims the model's history", async () => {
    const query = vi.fn().mockResolvedValue({ rows: [] });
    const repo = createExecutionRecordsRepo({ query } as unknown as Queryable, { maxRecordsPerModel: 50 });

    await repo.append(record);

    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0]?.[1]).toEqual([
      "rec-1",
      "req-1",
      "chat",
      "llama3.1:8b",
      "simple",
      "fastest",
      "2026-03-01T10:00:00.000Z",
      "2026-03-01T10:00:01.500Z",
      1500,
      false,
      "Dispatch error",
      "Inference service unreachable: fetch failed",
      null,
    ]);
    expect(query.mock.calls[1]?.[1]).toEqual(["llama3.1:8b", 50]);
  });

  it("returns records oldest first", async () => {
    const newer = { ...record, id: "rec-2", success: true, errorCategory: undefined, errorMessage: undefined };
    const query = vi.fn().mockResolvedValue({ rows: [toRow(newer), toRow(record)] });
    const repo = createExecutionRecordsRepo({ query } as unknown as Queryable);

    const records = await repo.list({ limit: 2 });

    expect(records.map((r) => r.id)).toEqual(["rec-1", "rec-2"]);
    expect(records[0]).toEqual(record);
    expect(records[1]).not.toHaveProperty("errorCategory");
    expect(query.mock.calls[0]?.[1]).toEqual([2]);
  });

  it("skips the query for a zero limit", async () => {
    const query = vi.fn();
    const repo = createExecutionRecordsRepo({ query } as unknown as Queryable);

    expect(await repo.list({ limit: 0 })).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});
