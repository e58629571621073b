import { AIMessage, HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type {
  AiInferencePort,
  AiMessage,
  AiCompletionOptions,
  AiCompletionResult,
} from '@taxi-analytics/domain';

function toLangChainMessage(m: AiMessage): BaseMessage {
  switch (m.role) {
    case 'system':
      return new SystemMessage(m.content);
    case 'assistant':
      return new AIMessage(m.content);
    case 'user':
    default:
      return new HumanMessage(m.content);
  }
}

/** Flattens multi-part message content down to its text parts. */
export function messageText(content: BaseMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => {
      if (typeof part === 'string') return part;
      return 'text' in part && typeof part.text === 'string' ? part.text : '';
    })
    .join('');
}

/**
 * Adapts any LangChain chat model (OpenAI, Anthropic, ...) to the inference port.
 * Temperature and token limits are fixed when the model is constructed.
 */
export class LangChainAiInferenceAdapter implements AiInferencePort {
  constructor(
    private readonly model: BaseChatModel,
    private readonly modelName: string,
  ) {}

  async generateCompletion(
    messages: AiMessage[],
    opts: AiCompletionOptions = {},
  ): Promise<AiCompletionResult> {
    const response = await this.model.invoke(messages.map(toLangChainMessage), {
      signal: opts.signal,
    });

    return {
      content: messageText(response.content),
      model: this.modelName,
      promptTokens: response.usage_metadata?.input_tokens,
      completionTokens: response.usage_metadata?.output_tokens,
    };
  }
}
