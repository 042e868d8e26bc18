import type { ResearchJobService } from "@research-agent/conductor";
import {
  RESEARCH_QUEUE_NAME,
  type RunResearchJobData,
  parseRedisConnection,
} from "@research-agent/queues";
import { createJobLogger, type ResearchJobStatus } from "@research-agent/shared";
import { type Job, Worker } from "bullmq";

import { updateHealthStatus } from "../metrics";

let jobsProcessed = 0;

/**
 * Handle a run_research job: run the stored research job to a terminal status.
 * Throws when the job is unknown so BullMQ marks the queue job failed.
 */
export async function processResearchJob(
  service: Pick<ResearchJobService, "execute">,
  data: RunResearchJobData,
): Promise<{ jobId: string; status: ResearchJobStatus }> {
  const job = await service.execute(data.jobId);
  if (!job) {
    throw new Error(`Research job ${data.jobId} not found`);
  }
  jobsProcessed += 1;
  updateHealthStatus({ lastJobAt: new Date().toISOString(), jobsProcessed });
  return { jobId: job.id, status: job.status };
}

/**
 * Create the research worker.
 */
export function createResearchWorker(params: {
  redisUrl: string;
  service: Pick<ResearchJobService, "execute">;
  concurrency: number;
}): Worker<RunResearchJobData> {
  const worker = new Worker<RunResearchJobData>(
    RESEARCH_QUEUE_NAME,
    async (job: Job<RunResearchJobData>) => processResearchJob(params.service, job.data),
    {
      connection: parseRedisConnection(params.redisUrl),
      concurrency: params.concurrency,
    },
  );

  worker.on("failed", (job, err) => {
    const jobLog = createJobLogger(job?.data.jobId ?? "unknown");
    jobLog.error({ err: err.message }, "Research queue job failed");
  });

  worker.on("completed", (job) => {
    const jobLog = createJobLogger(job.data.jobId);
    jobLog.info("Research queue job completed");
  });

  return worker;
}
