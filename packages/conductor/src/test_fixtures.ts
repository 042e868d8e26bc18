import type { InferenceRequest, InferenceResult, InferenceService } from "@research-agent/llm";
import type { ModelDescriptor } from "@research-agent/shared";

export const FAST: ModelDescriptor = {
  name: "llama3.1:8b",
  strength: "speed",
  baselineLatencyMs: 1850,
  sizeGb: 5,
  maxContext: 4096,
  qualityScore: 7,
  specialties: ["general", "fast_processing"],
};

export const REASONING: ModelDescriptor = {
  name: "gemma2:9b",
  strength: "reasoning",
  baselineLatencyMs: 15630,
  sizeGb: 6,
  maxContext: 8192,
  qualityScore: 8,
  specialties: ["reasoning", "analysis"],
};

export const WRITING: ModelDescriptor = {
  name: "qwen2.5:7b",
  strength: "writing",
  baselineLatencyMs: 14560,
  sizeGb: 4,
  maxContext: 8192,
  qualityScore: 8,
  specialties: ["writing", "report_generation"],
};

export const DEEP_REASONING: ModelDescriptor = {
  name: "deepseek-r1:8b",
  strength: "reasoning",
  baselineLatencyMs: 24890,
  sizeGb: 5,
  maxContext: 4096,
  qualityScore: 9,
  specialties: ["complex_reasoning", "math"],
};

export const ALL_MODELS = [FAST, REASONING, WRITING, DEEP_REASONING];

/**
 * Inference stand-in answering every chat with `reply(request)`.
 */
export function fakeInference(
  reply: (request: InferenceRequest) => Promise<string> | string = (request) =>
    `answer from ${request.model}`,
): InferenceService & { calls: InferenceRequest[] } {
  const calls: InferenceRequest[] = [];
  return {
    calls,
    async chat(request: InferenceRequest): Promise<InferenceResult> {
      calls.push(request);
      const text = await reply(request);
      return { model: request.model, text, promptTokens: 0, outputTokens: 0, rawResponse: {} };
    },
    async listModels() {
      return [];
    },
    async listLoaded() {
      return [];
    },
  };
}

/** Clock that advances `stepMs` on every call, starting at `startIso`. */
export function steppingClock(startIso: string, stepMs: number): () => Date {
  let next = Date.parse(startIso);
  return () => {
    const current = new Date(next);
    next += stepMs;
    return current;
  };
}

export function sequentialIds(prefix: string): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}
