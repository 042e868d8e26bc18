import { DispatchError } from "@research-agent/shared";
import { describe, expect, it } from "vitest";
import { classifyInferenceFailure, toDispatchError } from "./error_classification";
import { InferenceServiceError } from "./ollama";
import { TimeoutError } from "./timeout";

describe("classifyInferenceFailure", () => {
  it("detects refused connections wrapped by fetch", () => {
    const err = new TypeError("fetch failed", {
      cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:11434"), {
        code: "ECONNREFUSED",
      }),
    });
    expect(classifyInferenceFailure(err)).toBe("connection");
  });

  it("detects timeouts and aborts", () => {
    expect(classifyInferenceFailure(new TimeoutError("chat", 10))).toBe("timeout");
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyInferenceFailure(abort)).toBe("timeout");
  });

  it("keeps the reason from service errors", () => {
    expect(classifyInferenceFailure(new InferenceServiceError("x", "model_not_found", 404))).toBe(
      "model_not_found",
    );
  });

  it("falls back to unknown", () => {
    expect(classifyInferenceFailure(new Error("boom"))).toBe("unknown");
    expect(classifyInferenceFailure("boom")).toBe("unknown");
  });
});

describe("toDispatchError", () => {
  it("wraps the failure with the model and category", () => {
    const cause = new Error("connect ECONNREFUSED 127.0.0.1:11434");
    const err = toDispatchError(cause, "llama3.1:8b");

    expect(err).toBeInstanceOf(DispatchError);
    expect(err.model).toBe("llama3.1:8b");
    expect(err.reason).toBe("connection");
    expect(err.category).toBe("Dispatch error");
    expect(err.code).toBe("DISPATCH_ERROR");
    expect(err.message).toBe(
      "Inference service unreachable: connect ECONNREFUSED 127.0.0.1:11434",
    );
    expect(err.cause).toBe(cause);
  });

  it("returns dispatch errors unchanged", () => {
    const original = new DispatchError("already wrapped", "gemma2:9b", "http");
    expect(toDispatchError(original, "other")).toBe(original);
  });
});
