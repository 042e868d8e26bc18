import { randomUUID } from "node:crypto";
import { type InferenceResult, type InferenceService, runWithTimeout, toDispatchError } from "@research-agent/llm";
import {
  type ConductorRequest,
  ConfigurationError,
  createLogger,
  DISPATCH_ERROR_CATEGORY,
  type DispatchError,
  errorMessage,
  type ExecutionRecord,
  type Logger,
  type ModelCatalog,
  type SelectionDecision,
} from "@research-agent/shared";

import type { AnalyticsSink } from "./analytics";
import { findModel } from "./catalog";
import { selectModel } from "./select";

export type DispatchResult =
  | {
      ok: true;
      text: string;
      decision: SelectionDecision;
      record: ExecutionRecord;
      inference: InferenceResult;
    }
  | {
      ok: false;
      error: DispatchError;
      decision: SelectionDecision;
      record: ExecutionRecord;
    };

/** Observers for metrics; called synchronously, must not throw. */
export interface ConductorHooks {
  onSelection?(decision: SelectionDecision): void;
  onExecution?(record: ExecutionRecord): void;
}

export interface ConductorOptions {
  catalog: ModelCatalog;
  inference: InferenceService;
  analytics: AnalyticsSink;
  /** Per-call deadline; omitted means no timeout */
  inferenceTimeoutMs?: number;
  temperature?: number;
  hooks?: ConductorHooks;
  log?: Logger;
  now?: () => Date;
  newId?: () => string;
}

export interface DispatchOptions {
  /** Research job this dispatch belongs to */
  jobId?: string;
}

export interface Conductor {
  readonly catalog: ModelCatalog;
  select(request: ConductorRequest): SelectionDecision;
  dispatch(
    request: ConductorRequest,
    decision: SelectionDecision,
    options?: DispatchOptions,
  ): Promise<DispatchResult>;
  /** select() then dispatch() */
  route(request: ConductorRequest, options?: DispatchOptions): Promise<DispatchResult>;
}

export function createConductor(options: ConductorOptions): Conductor {
  const { catalog, inference, analytics, hooks } = options;
  if (catalog.models.length === 0) {
    throw new ConfigurationError("Model catalog is empty");
  }

  const log = options.log ?? createLogger({ component: "conductor" });
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;

  async function record(entry: ExecutionRecord): Promise<void> {
    hooks?.onExecution?.(entry);
    try {
      await analytics.append(entry);
    } catch (err) {
      // the dispatch outcome still reaches the caller
      log.error(
        { recordId: entry.id, model: entry.model, err: errorMessage(err) },
        "Failed to append execution record",
      );
    }
  }

  function select(request: ConductorRequest): SelectionDecision {
    const decision = selectModel(catalog, request, log);
    hooks?.onSelection?.(decision);
    log.debug(
      {
        requestId: request.id,
        kind: request.kind,
        complexity: decision.complexity,
        model: decision.model.name,
        reason: decision.reason,
      },
      "Model selected",
    );
    return decision;
  }

  async function dispatch(
    request: ConductorRequest,
    decision: SelectionDecision,
    dispatchOptions: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const model = findModel(catalog, decision.model.name);
    if (!model) {
      throw new ConfigurationError(`Model ${decision.model.name} is not in the catalog`);
    }

    const startedAt = now();
    const base = {
      id: newId(),
      requestId: request.id,
      kind: request.kind,
      model: model.name,
      complexity: decision.complexity,
      reason: decision.reason,
      startedAt: startedAt.toISOString(),
      ...(dispatchOptions.jobId ? { jobId: dispatchOptions.jobId } : {}),
    };

    try {
      const inferenceResult = await runWithTimeout(
        (signal) =>
          inference.chat({
            model: model.name,
            messages: [{ role: "user", content: request.content }],
            temperature: options.temperature,
            signal,
          }),
        options.inferenceTimeoutMs,
        `inference ${model.name}`,
      );
      const endedAt = now();
      const entry: ExecutionRecord = {
        ...base,
        endedAt: endedAt.toISOString(),
        latencyMs: endedAt.getTime() - startedAt.getTime(),
        success: true,
      };
      await record(entry);
      return { ok: true, text: inferenceResult.text, decision, record: entry, inference: inferenceResult };
    } catch (err) {
      const endedAt = now();
      const error = toDispatchError(err, model.name);
      const entry: ExecutionRecord = {
        ...base,
        endedAt: endedAt.toISOString(),
        latencyMs: endedAt.getTime() - startedAt.getTime(),
        success: false,
        errorCategory: DISPATCH_ERROR_CATEGORY,
        errorMessage: error.message,
      };
      log.warn(
        { requestId: request.id, model: model.name, reason: error.reason, err: error.message },
        "Dispatch failed",
      );
      await record(entry);
      return { ok: false, error, decision, record: entry };
    }
  }

  return {
    catalog,
    select,
    dispatch,
    async route(request, dispatchOptions) {
      return dispatch(request, select(request), dispatchOptions);
    },
  };
}
