/**
 * Error taxonomy shared by the conductor, the API and the worker.
 *
 * Every error carries a stable `code` (surfaced in the API error envelope)
 * and the HTTP status the API should answer with.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

/** Catalog or environment is missing or malformed. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", 500, options);
    this.name = "ConfigurationError";
  }
}

/** Category recorded on failed execution records. */
export const DISPATCH_ERROR_CATEGORY = "Dispatch error";

export type InferenceFailureReason =
  | "connection"
  | "timeout"
  | "http"
  | "model_not_found"
  | "invalid_response"
  | "unknown";

/**
 * The inference service was unreachable, timed out or answered with a failure.
 */
export class DispatchError extends AppError {
  readonly category = DISPATCH_ERROR_CATEGORY;

  constructor(
    message: string,
    public readonly model: string,
    public readonly reason: InferenceFailureReason,
    options?: { cause?: unknown },
  ) {
    super(message, "DISPATCH_ERROR", 502, options);
    this.name = "DispatchError";
  }
}

export class InvalidJobTransitionError extends AppError {
  constructor(
    public readonly jobId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Research job ${jobId} cannot move from ${from} to ${to}`, "INVALID_JOB_TRANSITION", 409);
    this.name = "InvalidJobTransitionError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
