import type { ConductorHooks } from "@research-agent/conductor";
import {
  type ExecutionRecord,
  HTTP_DURATION_BUCKETS,
  INFERENCE_DURATION_BUCKETS,
  MetricLabels,
  MetricNames,
  type ResearchJob,
  type SelectionDecision,
} from "@research-agent/shared";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

declare module "fastify" {
  interface FastifyRequest {
    metricsStartTime?: bigint;
  }
}

/** Global registry for API metrics */
export const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: registry });

/** HTTP request duration histogram */
export const httpRequestDuration = new Histogram({
  name: MetricNames.HTTP_REQUEST_DURATION,
  help: "Duration of HTTP requests in seconds",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  buckets: HTTP_DURATION_BUCKETS,
  registers: [registry],
});

/** HTTP requests counter */
export const httpRequestsTotal = new Counter({
  name: MetricNames.HTTP_REQUESTS_TOTAL,
  help: "Total number of HTTP requests",
  labelNames: [MetricLabels.METHOD, MetricLabels.ROUTE, MetricLabels.STATUS_CODE],
  registers: [registry],
});

/** Active HTTP connections gauge */
export const httpActiveConnections = new Gauge({
  name: MetricNames.HTTP_ACTIVE_CONNECTIONS,
  help: "Number of active HTTP connections",
  registers: [registry],
});

/** Model selections by model and reason */
export const modelSelectionsTotal = new Counter({
  name: MetricNames.MODEL_SELECTIONS_TOTAL,
  help: "Total number of model selections",
  labelNames: [MetricLabels.MODEL, MetricLabels.REASON],
  registers: [registry],
});

/** Inference call duration histogram */
export const inferenceCallDuration = new Histogram({
  name: MetricNames.INFERENCE_CALL_DURATION,
  help: "Duration of inference calls in seconds",
  labelNames: [MetricLabels.MODEL, MetricLabels.KIND],
  buckets: INFERENCE_DURATION_BUCKETS,
  registers: [registry],
});

/** Inference calls counter */
export const inferenceCallsTotal = new Counter({
  name: MetricNames.INFERENCE_CALLS_TOTAL,
  help: "Total number of inference calls",
  labelNames: [MetricLabels.MODEL, MetricLabels.KIND, MetricLabels.STATUS],
  registers: [registry],
});

/** Research jobs reaching a status */
export const researchJobsTotal = new Counter({
  name: MetricNames.RESEARCH_JOBS_TOTAL,
  help: "Total number of research job status changes",
  labelNames: [MetricLabels.STATUS],
  registers: [registry],
});

/**
 * Normalize route path by replacing dynamic segments with placeholders.
 * e.g., /api/research/3f2c...-... -> /api/research/:id
 */
export function normalizeRoute(url: string): string {
  // Remove query string
  const path = url.split("?")[0] ?? url;

  return (
    path
      // Replace UUID-like segments
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, "/:id")
      // Replace model names under /models/ (e.g. /models/qwen2.5:7b/load)
      .replace(/\/models\/(?!recommend(?:\/|$))[^/]+/, "/models/:name")
      // Replace numeric IDs
      .replace(/\/\d+(?=\/|$)/g, "/:id")
  );
}

/**
 * Register metrics hooks on a Fastify instance.
 */
export function registerMetricsHooks(fastify: FastifyInstance): void {
  // Track request start time
  fastify.addHook("onRequest", async (request: FastifyRequest) => {
    httpActiveConnections.inc();
    request.metricsStartTime = process.hrtime.bigint();
  });

  // Record metrics on response
  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    httpActiveConnections.dec();

    const startTime = request.metricsStartTime;
    if (!startTime) return;

    const durationNs = process.hrtime.bigint() - startTime;
    const durationSec = Number(durationNs) / 1e9;

    const labels = {
      [MetricLabels.METHOD]: request.method,
      [MetricLabels.ROUTE]: normalizeRoute(request.url),
      [MetricLabels.STATUS_CODE]: String(reply.statusCode),
    };

    httpRequestDuration.observe(labels, durationSec);
    httpRequestsTotal.inc(labels);
  });
}

export function recordSelection(decision: SelectionDecision): void {
  modelSelectionsTotal.inc({
    [MetricLabels.MODEL]: decision.model.name,
    [MetricLabels.REASON]: decision.reason,
  });
}

export function recordExecution(record: ExecutionRecord): void {
  inferenceCallDuration.observe(
    { [MetricLabels.MODEL]: record.model, [MetricLabels.KIND]: record.kind },
    record.latencyMs / 1000,
  );
  inferenceCallsTotal.inc({
    [MetricLabels.MODEL]: record.model,
    [MetricLabels.KIND]: record.kind,
    [MetricLabels.STATUS]: record.success ? "success" : "error",
  });
}

export function recordResearchJob(job: ResearchJob): void {
  researchJobsTotal.inc({ [MetricLabels.STATUS]: job.status });
}

export const conductorMetricsHooks: ConductorHooks = {
  onSelection: recordSelection,
  onExecution: recordExecution,
};

/**
 * Get metrics in Prometheus text format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get the content type for Prometheus metrics.
 */
export function getMetricsContentType(): string {
  return registry.contentType;
}
