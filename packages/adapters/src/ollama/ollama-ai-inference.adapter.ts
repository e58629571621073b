import { Ollama } from 'ollama';
import type {
  AiInferencePort,
  AiMessage,
  AiCompletionOptions,
  AiCompletionResult,
} from '@taxi-analytics/domain';

export interface OllamaAdapterOptions {
  host?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const DEFAULT_HOST = 'http://localhost:11434';
const DEFAULT_CHAT_MODEL = 'llama3.1:8b';

export class OllamaAiInferenceAdapter implements AiInferencePort {
  private readonly ollama: Ollama;
  private readonly host: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(opts: OllamaAdapterOptions = {}) {
    this.host = opts.host ?? DEFAULT_HOST;
    this.ollama = new Ollama({ host: this.host });
    this.model = opts.model ?? DEFAULT_CHAT_MODEL;
    this.temperature = opts.temperature ?? 0.3;
    this.maxTokens = opts.maxTokens ?? 500;
  }

  async generateCompletion(
    messages: AiMessage[],
    opts: AiCompletionOptions = {},
  ): Promise<AiCompletionResult> {
    const response = await this.client(opts.signal).chat({
      model: this.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      options: {
        temperature: this.temperature,
        num_predict: this.maxTokens,
      },
      stream: false,
    });

    return {
      content: response.message.content,
      model: response.model,
      promptTokens: response.prompt_eval_count,
      completionTokens: response.eval_count,
    };
  }

  // Ollama#abort() only reaches streamed requests, so the signal goes to fetch itself.
  private client(signal?: AbortSignal): Ollama {
    if (!signal) return this.ollama;
    const abortable: typeof fetch = (input, init) => fetch(input, { ...init, signal });
    return new Ollama({ host: this.host, fetch: abortable });
  }
}
