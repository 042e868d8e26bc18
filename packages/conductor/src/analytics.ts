import type { ExecutionRecord, ModelCatalog } from "@research-agent/shared";

import { estimateMemoryUsage, type LoadedModelRef } from "./resources";

/** Append-only destination for execution records. */
export interface AnalyticsSink {
  append(record: ExecutionRecord): Promise<void>;
}

export interface ListRecordsOptions {
  /** Most recent N records */
  limit?: number;
}

export interface AnalyticsSource {
  /** Records in append order, oldest first */
  list(options?: ListRecordsOptions): Promise<ExecutionRecord[]>;
}

export type AnalyticsLog = AnalyticsSink & AnalyticsSource;

/**
 * In-memory analytics log keeping the latest `maxRecordsPerModel` records per model.
 */
export function createMemoryAnalyticsLog(options: { maxRecordsPerModel?: number } = {}): AnalyticsLog {
  const maxPerModel = options.maxRecordsPerModel ?? 100;
  const records: ExecutionRecord[] = [];
  const perModel = new Map<string, number>();

  return {
    async append(record: ExecutionRecord): Promise<void> {
      records.push({ ...record });
      const count = (perModel.get(record.model) ?? 0) + 1;
      if (count > maxPerModel) {
        const oldest = records.findIndex((r) => r.model === record.model);
        records.splice(oldest, 1);
        perModel.set(record.model, count - 1);
      } else {
        perModel.set(record.model, count);
      }
    },

    async list(opts: ListRecordsOptions = {}): Promise<ExecutionRecord[]> {
      if (opts.limit !== undefined && opts.limit >= 0) {
        return opts.limit === 0 ? [] : records.slice(-opts.limit).map((r) => ({ ...r }));
      }
      return records.map((r) => ({ ...r }));
    },
  };
}

export interface ModelUsage {
  model: string;
  requests: number;
  successes: number;
  failures: number;
  /** Percent, one decimal */
  successRate: number;
  averageLatencyMs: number;
}

export interface MemoryUsage {
  currentEstimatedGb: number;
  maxAllocatedGb: number;
  /** Percent, one decimal */
  utilizationPct: number;
}

export interface AnalyticsSummary {
  totalRequests: number;
  successCount: number;
  failureCount: number;
  successRate: number;
  modelUsage: ModelUsage[];
  mostUsedModel: string | null;
  errorsByCategory: Record<string, number>;
  memoryUsage: MemoryUsage;
  recommendations: string[];
  message?: string;
}

export interface SummarizeParams {
  records: readonly ExecutionRecord[];
  catalog: ModelCatalog;
  loadedModels?: readonly LoadedModelRef[];
  maxMemoryGb: number;
}

const round1 = (value: number): number => Math.round(value * 10) / 10;

function percent(part: number, total: number): number {
  return total === 0 ? 0 : round1((part / total) * 100);
}

function recommendationsFor(
  memory: MemoryUsage,
  usage: readonly ModelUsage[],
  totalRequests: number,
): string[] {
  const out: string[] = [];
  if (memory.currentEstimatedGb > memory.maxAllocatedGb * 0.8) {
    out.push("Consider unloading unused models to free memory");
  }
  if (memory.currentEstimatedGb < memory.maxAllocatedGb * 0.3) {
    out.push("You have plenty of memory - consider loading larger models for better quality");
  }
  if (totalRequests > 10) {
    for (const entry of usage) {
      if (entry.requests / totalRequests < 0.05) {
        out.push(`Model ${entry.model} is rarely used - consider unloading`);
      }
    }
  }
  return out;
}

/**
 * Fold execution records into the analytics report served by /api/analytics.
 */
export function summarizeAnalytics(params: SummarizeParams): AnalyticsSummary {
  const { records, catalog, maxMemoryGb } = params;
  const currentGb = estimateMemoryUsage(catalog, params.loadedModels ?? []);
  const memoryUsage: MemoryUsage = {
    currentEstimatedGb: round1(currentGb),
    maxAllocatedGb: maxMemoryGb,
    utilizationPct: percent(currentGb, maxMemoryGb),
  };

  const byModel = new Map<string, { requests: number; successes: number; latencyTotal: number }>();
  const errorsByCategory: Record<string, number> = {};
  let successCount = 0;

  for (const record of records) {
    const entry = byModel.get(record.model) ?? { requests: 0, successes: 0, latencyTotal: 0 };
    entry.requests += 1;
    entry.latencyTotal += record.latencyMs;
    if (record.success) {
      entry.successes += 1;
      successCount += 1;
    } else {
      const category = record.errorCategory ?? "unknown";
      errorsByCategory[category] = (errorsByCategory[category] ?? 0) + 1;
    }
    byModel.set(record.model, entry);
  }

  const modelUsage: ModelUsage[] = [...byModel.entries()].map(([model, entry]) => ({
    model,
    requests: entry.requests,
    successes: entry.successes,
    failures: entry.requests - entry.successes,
    successRate: percent(entry.successes, entry.requests),
    averageLatencyMs: Math.round(entry.latencyTotal / entry.requests),
  }));

  let mostUsedModel: string | null = null;
  let mostUsedCount = 0;
  for (const entry of modelUsage) {
    if (entry.requests > mostUsedCount) {
      mostUsedModel = entry.model;
      mostUsedCount = entry.requests;
    }
  }

  const totalRequests = records.length;
  return {
    totalRequests,
    successCount,
    failureCount: totalRequests - successCount,
    successRate: percent(successCount, totalRequests),
    modelUsage,
    mostUsedModel,
    errorsByCategory,
    memoryUsage,
    recommendations: recommendationsFor(memoryUsage, modelUsage, totalRequests),
    ...(totalRequests === 0 ? { message: "No usage data available yet" } : {}),
  };
}
