import type { JobRunner } from "@research-agent/conductor";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import { Queue } from "bullmq";
import Redis from "ioredis";

/**
 * Queue name for research jobs.
 */
export const RESEARCH_QUEUE_NAME = "research";

/**
 * Job name for research execution.
 */
export const RUN_RESEARCH_JOB_NAME = "run_research";

/**
 * Job payload. The job itself lives in the research job store;
 * the queue only carries its id.
 */
export interface RunResearchJobData {
  jobId: string;
}

export type ResearchQueue = Queue<RunResearchJobData>;

const JOB_OPTIONS: JobsOptions = {
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 50, // Keep last 50 failed jobs
};

function parseRedisUrl(redisUrl: string) {
  const url = new URL(redisUrl);
  const isTls = url.protocol === "rediss:";

  // Extract db from path (e.g., /1 -> db 1)
  const dbMatch = /^\/(\d+)$/.exec(url.pathname);
  const db = dbMatch?.[1] ? Number.parseInt(dbMatch[1], 10) : undefined;

  return {
    host: url.hostname,
    port: Number.parseInt(url.port || "6379", 10),
    password: url.password ? decodeURIComponent(url.password) : undefined,
    db,
    tls: isTls ? {} : undefined,
  };
}

/**
 * Parse Redis URL into BullMQ connection options.
 * Supports: redis://[:password@]host:port[/db]
 *           rediss://... (TLS)
 */
export function parseRedisConnection(redisUrl: string): ConnectionOptions {
  return parseRedisUrl(redisUrl);
}

/**
 * Create the research queue.
 * The API enqueues into it; the worker consumes it.
 */
export function createResearchQueue(redisUrl: string): ResearchQueue {
  return new Queue<RunResearchJobData>(RESEARCH_QUEUE_NAME, {
    connection: parseRedisConnection(redisUrl),
  });
}

/**
 * JobRunner that hands research job ids to the queue.
 * The queue job id is the research job id, so a job is never enqueued twice.
 */
export function createQueueJobRunner(queue: Pick<ResearchQueue, "add">): JobRunner {
  return {
    async schedule(jobId: string): Promise<void> {
      await queue.add(RUN_RESEARCH_JOB_NAME, { jobId }, { ...JOB_OPTIONS, jobId });
    },
  };
}

/**
 * Jobs waiting, delayed or being worked on.
 */
export async function getQueueDepth(queue: Pick<ResearchQueue, "getJobCounts">): Promise<number> {
  const counts = await queue.getJobCounts("waiting", "active", "delayed");
  return (counts.waiting ?? 0) + (counts.active ?? 0) + (counts.delayed ?? 0);
}

/**
 * Create a Redis client for health checks.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis({ ...parseRedisUrl(redisUrl), lazyConnect: true, maxRetriesPerRequest: 1 });
}

export async function isRedisReachable(redis: Pick<Redis, "ping">): Promise<boolean> {
  try {
    return (await redis.ping()) === "PONG";
  } catch {
    return false;
  }
}
