import type { ResearchJob } from "@research-agent/shared";
import { describe, expect, it, vi } from "vitest";
import { getHealthStatus } from "../metrics";
import { processResearchJob } from "./research.worker";

const completed: ResearchJob = {
  id: "job-1",
  topic: "tides",
  content: "Conduct research on the topic: tides",
  complexity: "simple",
  model: "llama3.1:8b",
  reason: "fastest",
  status: "completed",
  createdAt: "2026-03-01T10:00:00.000Z",
};

describe("processResearchJob", () => {
  it("executes the stored job and reports its final status", async () => {
    const execute = vi.fn().mockResolvedValue(completed);

    const result = await processResearchJob({ execute }, { jobId: "job-1" });

    expect(execute).toHaveBeenCalledWith("job-1");
    expect(result).toEqual({ jobId: "job-1", status: "completed" });
    expect(getHealthStatus().jobsProcessed).toBe(1);
  });

  it("fails the queue job when the research job is unknown", async () => {
    const execute = vi.fn().mockResolvedValue(null);

    await expect(processResearchJob({ execute }, { jobId: "ghost" })).rejects.toThrow(
      "Research job ghost not found",
    );
    expect(getHealthStatus().jobsProcessed).toBe(1);
  });
});
