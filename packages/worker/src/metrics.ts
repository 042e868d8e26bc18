import http from "node:http";
import type { ConductorHooks } from "@research-agent/conductor";
import {
  createLogger,
  errorMessage,
  type ExecutionRecord,
  INFERENCE_DURATION_BUCKETS,
  MetricLabels,
  MetricNames,
  type ResearchJob,
} from "@research-agent/shared";
import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

const log = createLogger({ component: "worker-metrics" });

/** Global registry for Worker metrics */
export const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
collectDefaultMetrics({ register: registry });

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

/** Research job duration from start to terminal status */
export const researchJobDuration = new Histogram({
  name: MetricNames.RESEARCH_JOB_DURATION,
  help: "Duration of research jobs in seconds",
  labelNames: [MetricLabels.STATUS],
  buckets: INFERENCE_DURATION_BUCKETS,
  registers: [registry],
});

/** Queue depth gauge */
export const queueDepth = new Gauge({
  name: MetricNames.QUEUE_DEPTH,
  help: "Current queue depth",
  labelNames: [MetricLabels.QUEUE_NAME],
  registers: [registry],
});

/**
 * Record inference metrics for one execution record.
 */
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

/**
 * Record a research job status change; terminal statuses also record duration.
 */
export function recordResearchJob(job: ResearchJob): void {
  researchJobsTotal.inc({ [MetricLabels.STATUS]: job.status });
  if (job.startedAt && job.completedAt) {
    const durationSec = (Date.parse(job.completedAt) - Date.parse(job.startedAt)) / 1000;
    researchJobDuration.observe({ [MetricLabels.STATUS]: job.status }, durationSec);
  }
}

export const conductorMetricsHooks: ConductorHooks = {
  onExecution: recordExecution,
};

/**
 * Update queue depth gauge.
 */
export function updateQueueDepth(queueName: string, depth: number): void {
  queueDepth.set({ [MetricLabels.QUEUE_NAME]: queueName }, depth);
}

export interface WorkerHealth {
  startedAt: string | null;
  lastJobAt: string | null;
  jobsProcessed: number;
}

const health: WorkerHealth = { startedAt: null, lastJobAt: null, jobsProcessed: 0 };

export function updateHealthStatus(patch: Partial<WorkerHealth>): void {
  Object.assign(health, patch);
}

export function getHealthStatus(): WorkerHealth & { ok: true } {
  return { ok: true, ...health };
}

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

/**
 * Start a simple HTTP server exposing /metrics and /health.
 * Returns a function to close the server.
 */
export function startMetricsServer(port: number): { close: () => Promise<void> } {
  const server = http.createServer((req, res) => {
    if (req.url === "/metrics" && req.method === "GET") {
      getMetrics()
        .then((metrics) => {
          res.setHeader("Content-Type", getMetricsContentType());
          res.end(metrics);
        })
        .catch((err: unknown) => {
          log.error({ err: errorMessage(err) }, "Failed to collect metrics");
          res.statusCode = 500;
          res.end("Internal Server Error");
        });
    } else if (req.url === "/health" && req.method === "GET") {
      res.setHeader("Content-Type", "application/json");
      res.end(JSON.stringify(getHealthStatus()));
    } else {
      res.statusCode = 404;
      res.end("Not Found");
    }
  });

  server.listen(port);

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
