import { DispatchError, type InferenceFailureReason } from "@research-agent/shared";

import { InferenceServiceError } from "./ollama";
import { TimeoutError } from "./timeout";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const CONNECTION_PATTERNS: RegExp[] = [
  /fetch failed/i,
  /econnrefused/i,
  /socket hang up/i,
  /network error/i,
  /connection (refused|reset|closed)/i,
];

function errorCode(error: unknown): string | null {
  if (!error || typeof error !== "object" || !("code" in error)) return null;
  return typeof error.code === "string" ? error.code : null;
}

function causeOf(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}

function isConnectionError(error: unknown): boolean {
  // fetch wraps socket errors: TypeError("fetch failed", { cause: { code: "ECONNREFUSED" } })
  for (let current: unknown = error, depth = 0; current && depth < 3; depth += 1) {
    const code = errorCode(current);
    if (code && CONNECTION_CODES.has(code)) return true;
    current = causeOf(current);
  }
  const message = error instanceof Error ? error.message : String(error);
  return CONNECTION_PATTERNS.some((pattern) => pattern.test(message));
}

export function classifyInferenceFailure(error: unknown): InferenceFailureReason {
  if (error instanceof DispatchError) return error.reason;
  if (error instanceof InferenceServiceError) return error.reason;
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
    return "timeout";
  }
  if (isConnectionError(error)) return "connection";
  return "unknown";
}

/**
 * Normalize anything thrown by an inference call into a DispatchError for `model`.
 */
export function toDispatchError(error: unknown, model: string): DispatchError {
  if (error instanceof DispatchError) return error;
  const reason = classifyInferenceFailure(error);
  const detail = error instanceof Error ? error.message : String(error);
  const prefix =
    reason === "connection"
      ? "Inference service unreachable"
      : reason === "timeout"
        ? "Inference call timed out"
        : reason === "model_not_found"
          ? `Model ${model} is not available on the inference service`
          : "Inference call failed";
  return new DispatchError(`${prefix}: ${detail}`, model, reason, { cause: error });
}
