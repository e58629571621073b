/**
 * AI Provider Factory
 * Select the oracle via AI_PROVIDER: ollama (default) | openai | claude
 */

import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import { LangChainAiInferenceAdapter, OllamaAiInferenceAdapter } from '@taxi-analytics/adapters';
import type { AiInferencePort } from '@taxi-analytics/domain';
import type { AppConfig } from './env.js';

const PLACEHOLDER_KEYS = new Set(['your_openai_api_key_here', 'your_anthropic_api_key_here']);

function hasKey(key: string | undefined): boolean {
  return !!key && !PLACEHOLDER_KEYS.has(key);
}

/** Ollama runs locally without credentials; hosted providers need an API key. */
export function isAiConfigured(config: AppConfig): boolean {
  switch (config.ai.provider) {
    case 'openai':
      return hasKey(config.ai.openAiApiKey);
    case 'claude':
      return hasKey(config.ai.anthropicApiKey);
    case 'ollama':
      return true;
  }
}

export function createAiInference(config: AppConfig): AiInferencePort {
  const { ai, oracle } = config;

  switch (ai.provider) {
    case 'openai':
      return new LangChainAiInferenceAdapter(
        new ChatOpenAI({
          model: ai.openAiModel,
          apiKey: ai.openAiApiKey,
          temperature: oracle.temperature,
          maxTokens: oracle.maxTokens,
        }),
        ai.openAiModel,
      );

    case 'claude':
      return new LangChainAiInferenceAdapter(
        new ChatAnthropic({
          model: ai.claudeModel,
          apiKey: ai.anthropicApiKey,
          temperature: oracle.temperature,
          maxTokens: oracle.maxTokens,
        }),
        ai.claudeModel,
      );

    case 'ollama':
      return new OllamaAiInferenceAdapter({
        host: ai.ollamaBaseUrl,
        model: ai.ollamaChatModel,
        temperature: oracle.temperature,
        maxTokens: oracle.maxTokens,
      });
  }
}
