export { classifyInferenceFailure, toDispatchError } from "./error_classification";
export { createOllamaClient, InferenceServiceError, type OllamaClientOptions } from "./ollama";
export { runWithTimeout, TimeoutError } from "./timeout";
export type {
  AvailableModel,
  ChatMessage,
  InferenceRequest,
  InferenceResult,
  InferenceService,
  LoadedModel,
} from "./types";
