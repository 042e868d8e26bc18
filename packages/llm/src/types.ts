export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface InferenceRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  signal?: AbortSignal;
}

export interface InferenceResult {
  model: string;
  text: string;
  /** Server-side generation time, when the service reports it */
  totalDurationMs?: number;
  promptTokens: number;
  outputTokens: number;
  rawResponse: unknown;
}

export interface AvailableModel {
  name: string;
  sizeBytes: number;
  modifiedAt?: string;
}

export interface LoadedModel {
  name: string;
  sizeBytes: number;
  sizeVramBytes?: number;
  expiresAt?: string;
}

/**
 * The local inference service, addressed by model name.
 */
export interface InferenceService {
  chat(request: InferenceRequest): Promise<InferenceResult>;
  /** Models pulled onto the host */
  listModels(): Promise<AvailableModel[]>;
  /** Models currently resident in memory */
  listLoaded(): Promise<LoadedModel[]>;
}
