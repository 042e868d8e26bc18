import type { ResearchJob } from "@research-agent/shared";
import type { FastifyInstance } from "fastify";
import { invalidParam, notFound } from "../lib/replies.js";
import {
  optionalCategory,
  optionalComplexity,
  optionalLimit,
  requiredText,
} from "../lib/validation.js";
import type { RouteOptions } from "./types.js";

const MAX_TOPIC_LENGTH = 2000;

interface ResearchBody {
  topic?: unknown;
  complexity?: unknown;
  category?: unknown;
}

/** Convert a job to API response format */
function formatJob(job: ResearchJob) {
  return {
    jobId: job.id,
    topic: job.topic,
    status: job.status,
    model: job.model,
    complexity: job.complexity,
    reason: job.reason,
    createdAt: job.createdAt,
    startedAt: job.startedAt ?? null,
    completedAt: job.completedAt ?? null,
    ...(job.status === "completed" && job.result ? { result: job.result } : {}),
    ...(job.status === "failed" ? { error: job.error ?? "Unknown error" } : {}),
  };
}

export async function researchRoutes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { ctx } = opts;

  // POST /research - Submit a research job; returns before the job runs
  fastify.post<{ Body: ResearchBody | undefined }>("/research", async (request, reply) => {
    const body: ResearchBody = request.body ?? {};

    const topic = requiredText("topic", body.topic, MAX_TOPIC_LENGTH);
    if (!topic.ok) return invalidParam(reply, topic.message);
    const complexity = optionalComplexity(body.complexity);
    if (!complexity.ok) return invalidParam(reply, complexity.message);
    const category = optionalCategory(body.category);
    if (!category.ok) return invalidParam(reply, category.message);

    const handle = await ctx.research.submit({
      topic: topic.value,
      complexity: complexity.value,
      ...(category.value ? { category: category.value } : {}),
    });

    return reply.code(202).send({ ok: true, ...handle });
  });

  // GET /research - Most recent jobs first
  fastify.get<{ Querystring: { limit?: string } }>("/research", async (request, reply) => {
    const limit = optionalLimit(request.query.limit, 50, 200);
    if (!limit.ok) return invalidParam(reply, limit.message);

    const jobs = await ctx.research.list({ limit: limit.value });
    return { ok: true, jobs: jobs.map(formatJob) };
  });

  // GET /research/:jobId - Job status, with the report once completed
  fastify.get<{ Params: { jobId: string } }>("/research/:jobId", async (request, reply) => {
    const job = await ctx.research.get(request.params.jobId);
    if (!job) return notFound(reply, `Research job ${request.params.jobId} not found`);
    return { ok: true, ...formatJob(job) };
  });
}
