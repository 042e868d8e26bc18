import type { InferenceFailureReason } from "@research-agent/shared";

import type {
  AvailableModel,
  InferenceRequest,
  InferenceResult,
  InferenceService,
  LoadedModel,
} from "./types";

/**
 * Non-2xx answer (or unusable body) from the inference service.
 */
export class InferenceServiceError extends Error {
  constructor(
    message: string,
    public readonly reason: InferenceFailureReason,
    public readonly status?: number,
    public readonly responseSnippet?: string,
  ) {
    super(message);
    this.name = "InferenceServiceError";
  }
}

export interface OllamaClientOptions {
  /** e.g. http://localhost:11434 */
  host: string;
  fetch?: typeof fetch;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function truncateString(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}…`;
}

function extractErrorDetail(response: unknown): string | null {
  if (typeof response === "string") return response.trim() || null;
  const obj = asRecord(response);
  return asString(obj.error) ?? asString(obj.message) ?? null;
}

function responseSnippet(response: unknown): string | undefined {
  if (typeof response === "string") return truncateString(response, 800);
  try {
    return truncateString(JSON.stringify(response), 800);
  } catch {
    return undefined;
  }
}

function nsToMs(value: unknown): number | undefined {
  const ns = asNumber(value);
  return ns === null ? undefined : Math.round(ns / 1e6);
}

export function createOllamaClient(options: OllamaClientOptions): InferenceService {
  const base = options.host.replace(/\/+$/, "");
  const doFetch = options.fetch ?? fetch;

  async function request(
    path: string,
    init: { method: "GET" | "POST"; body?: unknown; signal?: AbortSignal },
  ): Promise<unknown> {
    const res = await doFetch(`${base}${path}`, {
      method: init.method,
      headers: init.body === undefined ? undefined : { "content-type": "application/json" },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: init.signal,
    });

    const contentType = res.headers.get("content-type") ?? "";
    const response: unknown = contentType.includes("application/json")
      ? await res.json()
      : await res.text();

    if (!res.ok) {
      const detail = extractErrorDetail(response);
      const snippet = responseSnippet(response);
      const notFound = res.status === 404 && detail !== null && /not found/i.test(detail);
      const suffix = detail ? `: ${truncateString(detail, 300)}` : "";
      throw new InferenceServiceError(
        `Inference service error (${res.status})${suffix}`,
        notFound ? "model_not_found" : "http",
        res.status,
        snippet,
      );
    }

    return response;
  }

  return {
    async chat(req: InferenceRequest): Promise<InferenceResult> {
      const response = await request("/api/chat", {
        method: "POST",
        signal: req.signal,
        body: {
          model: req.model,
          messages: req.messages,
          stream: false,
          ...(req.temperature !== undefined ? { options: { temperature: req.temperature } } : {}),
        },
      });

      const obj = asRecord(response);
      const content = asRecord(obj.message).content;
      if (typeof content !== "string") {
        throw new InferenceServiceError(
          "Inference response missing message content",
          "invalid_response",
          undefined,
          responseSnippet(response),
        );
      }

      return {
        model: asString(obj.model) ?? req.model,
        text: content.trim(),
        totalDurationMs: nsToMs(obj.total_duration),
        promptTokens: asNumber(obj.prompt_eval_count) ?? 0,
        outputTokens: asNumber(obj.eval_count) ?? 0,
        rawResponse: response,
      };
    },

    async listModels(): Promise<AvailableModel[]> {
      const response = asRecord(await request("/api/tags", { method: "GET" }));
      const models = Array.isArray(response.models) ? response.models : [];
      return models.map((entry) => {
        const m = asRecord(entry);
        return {
          name: asString(m.name) ?? asString(m.model) ?? "unknown",
          sizeBytes: asNumber(m.size) ?? 0,
          modifiedAt: asString(m.modified_at) ?? undefined,
        };
      });
    },

    async listLoaded(): Promise<LoadedModel[]> {
      const response = asRecord(await request("/api/ps", { method: "GET" }));
      const models = Array.isArray(response.models) ? response.models : [];
      return models.map((entry) => {
        const m = asRecord(entry);
        return {
          name: asString(m.name) ?? asString(m.model) ?? "unknown",
          sizeBytes: asNumber(m.size) ?? 0,
          sizeVramBytes: asNumber(m.size_vram) ?? undefined,
          expiresAt: asString(m.expires_at) ?? undefined,
        };
      });
    },
  };
}
