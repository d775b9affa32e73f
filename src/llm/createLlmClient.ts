import type { BotConfig } from '../runtime/botConfig.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { AnthropicClient } from './anthropicClient.js';
import { DisabledLlmClient } from './disabledClient.js';
import { OllamaClient } from './ollamaClient.js';
import { OpenAIClient } from './openaiClient.js';
import type { FetchLike, LlmClient } from './types.js';

type CreateLlmClientDeps = {
  fetch?: FetchLike;
};

export function createLlmClient(
  config: BotConfig['llm'],
  logger?: RuntimeLogger,
  deps: CreateLlmClientDeps = {},
): LlmClient {
  switch (config.provider) {
    case 'ollama':
      return new OllamaClient(
        {
          baseUrl: config.ollamaBaseUrl,
          model: config.model,
          autoSelect: config.autoSelect,
          timeoutMs: config.timeoutMs,
          logger,
        },
        deps,
      );
    case 'openai':
      return new OpenAIClient({
        apiKey: config.openaiApiKey,
        baseUrl: config.openaiBaseUrl,
        model: config.model,
        timeoutMs: config.timeoutMs,
        logger,
      });
    case 'anthropic':
      return new AnthropicClient(
        {
          apiKey: config.anthropicApiKey,
          baseUrl: config.anthropicBaseUrl,
          model: config.model,
          timeoutMs: config.timeoutMs,
          logger,
        },
        deps,
      );
    case 'none':
      return new DisabledLlmClient();
  }
}
