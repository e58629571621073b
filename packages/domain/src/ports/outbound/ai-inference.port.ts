export interface AiMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Sampling settings belong to the adapter; they are fixed when it is constructed. */
export interface AiCompletionOptions {
  /** Aborts the in-flight request; adapters forward it where the client supports it. */
  signal?: AbortSignal;
}

export interface AiCompletionResult {
  content: string;
  model: string;
  promptTokens?: number;
  completionTokens?: number;
}

export interface AiInferencePort {
  generateCompletion(
    messages: AiMessage[],
    opts?: AiCompletionOptions,
  ): Promise<AiCompletionResult>;
}
