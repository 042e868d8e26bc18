import type { ExecutionRecord, ResearchJob } from "@research-agent/shared";
import { beforeEach, describe, expect, it } from "vitest";
import {
  inferenceCallDuration,
  inferenceCallsTotal,
  queueDepth,
  recordExecution,
  recordResearchJob,
  registry,
  researchJobDuration,
  researchJobsTotal,
  updateQueueDepth,
} from "./metrics";

const record: ExecutionRecord = {
  id: "rec-1",
  requestId: "job-1",
  kind: "research",
  model: "gemma2:9b",
  complexity: "complex",
  reason: "category_match",
  startedAt: "2026-03-01T10:00:00.000Z",
  endedAt: "2026-03-01T10:00:02.500Z",
  latencyMs: 2500,
  success: true,
};

describe("worker metrics", () => {
  beforeEach(() => {
    registry.resetMetrics();
  });

  it("counts inference calls by model and outcome", async () => {
    recordExecution(record);
    recordExecution({ ...record, id: "rec-2", success: false });

    const { values } = await inferenceCallsTotal.get();
    expect(values).toEqual(
      expect.arrayContaining([
        { labels: { model: "gemma2:9b", kind: "research", status: "success" }, value: 1 },
        { labels: { model: "gemma2:9b", kind: "research", status: "error" }, value: 1 },
      ]),
    );

    const duration = await inferenceCallDuration.get();
    const sum = duration.values.find((v) => v.metricName === "inference_call_duration_seconds_sum");
    expect(sum?.value).toBe(5);
  });

  it("records research job duration once the job is terminal", async () => {
    const job: ResearchJob = {
      id: "job-1",
      topic: "tides",
      content: "Conduct research on the topic: tides",
      complexity: "complex",
      model: "gemma2:9b",
      reason: "category_match",
      status: "running",
      createdAt: "2026-03-01T09:59:59.000Z",
      startedAt: "2026-03-01T10:00:00.000Z",
    };

    recordResearchJob(job);
    recordResearchJob({ ...job, status: "completed", completedAt: "2026-03-01T10:00:04.000Z" });

    const { values } = await researchJobsTotal.get();
    expect(values).toEqual(
      expect.arrayContaining([
        { labels: { status: "running" }, value: 1 },
        { labels: { status: "completed" }, value: 1 },
      ]),
    );
    const duration = await researchJobDuration.get();
    const count = duration.values.find((v) => v.metricName === "research_job_duration_seconds_count");
    const sum = duration.values.find((v) => v.metricName === "research_job_duration_seconds_sum");
    expect(count?.value).toBe(1);
    expect(sum?.value).toBe(4);
  });

  it("sets the queue depth gauge", async () => {
    updateQueueDepth("research", 7);
    const { values } = await queueDepth.get();
    expect(values).toEqual([{ labels: { queue_name: "research" }, value: 7 }]);
  });
});
