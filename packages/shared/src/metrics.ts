/**
 * Shared metrics constants for Prometheus instrumentation.
 */

/** Standard label names used across API and Worker metrics */
export const MetricLabels = {
  // HTTP labels
  METHOD: "method",
  ROUTE: "route",
  STATUS_CODE: "status_code",

  // Inference labels
  MODEL: "model",
  KIND: "kind",
  STATUS: "status",
  REASON: "reason",

  // Queue labels
  QUEUE_NAME: "queue_name",
} as const;

export const MetricNames = {
  // API metrics
  HTTP_REQUEST_DURATION: "http_request_duration_seconds",
  HTTP_REQUESTS_TOTAL: "http_requests_total",
  HTTP_ACTIVE_CONNECTIONS: "http_active_connections",

  // Conductor metrics
  MODEL_SELECTIONS_TOTAL: "model_selections_total",
  INFERENCE_CALL_DURATION: "inference_call_duration_seconds",
  INFERENCE_CALLS_TOTAL: "inference_calls_total",

  // Research job metrics
  RESEARCH_JOBS_TOTAL: "research_jobs_total",
  RESEARCH_JOB_DURATION: "research_job_duration_seconds",

  // Queue metrics
  QUEUE_DEPTH: "queue_depth",
} as const;

/** Histogram buckets for HTTP request duration (seconds) */
export const HTTP_DURATION_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

/** Local models answer in 2-25s on the benchmark prompt; long reports run past a minute */
export const INFERENCE_DURATION_BUCKETS = [0.5, 1, 2, 5, 10, 20, 30, 60, 120];
