import OpenAI from 'openai';

import type { LlmProvider } from '../runtime/botConfig.js';
import { errorMessage, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { toChatMessages, type ChatMessage } from './chatMessages.js';
import { clampGenerationOptions } from './generationOptions.js';
import { unavailable, type GenerationRequest, type GenerationResult, type LlmClient } from './types.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export type OpenAIChatClientLike = {
  chat: {
    completions: {
      create: (body: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
        max_tokens: number;
      }) => Promise<{
        model?: string;
        choices: Array<{ message?: { content?: string | null } | null }>;
      }>;
    };
  };
};

export type OpenAIClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  logger?: RuntimeLogger;
};

type OpenAIClientDeps = {
  client?: OpenAIChatClientLike;
};

function createDefaultClient(options: OpenAIClientOptions): OpenAIChatClientLike | null {
  if (!options.apiKey) return null;
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    maxRetries: 0,
    timeout: options.timeoutMs,
  }) as unknown as OpenAIChatClientLike;
}

export class OpenAIClient implements LlmClient {
  readonly provider: LlmProvider = 'openai';
  readonly model: string;
  private readonly client: OpenAIChatClientLike | null;
  private readonly logger?: RuntimeLogger;

  constructor(options: OpenAIClientOptions, deps: OpenAIClientDeps = {}) {
    this.model = options.model === 'auto' ? DEFAULT_OPENAI_MODEL : options.model;
    this.client = deps.client ?? createDefaultClient(options);
    this.logger = options.logger;
  }

  async initialize(): Promise<boolean> {
    if (!this.client) {
      this.logger?.warn('OPENAI_API_KEY is not set; replies will use templates');
      return false;
    }
    this.logger?.info('openai client ready', { model: this.model });
    return true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (!this.client) {
      return unavailable('OPENAI_API_KEY is not set');
    }

    const options = clampGenerationOptions(request.options);
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: toChatMessages(request),
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });
      const text = completion.choices[0]?.message?.content?.trim() ?? '';
      if (!text) {
        return unavailable('OpenAI returned an empty reply');
      }
      return { ok: true, text, model: completion.model ?? this.model };
    } catch (err) {
      return unavailable(`OpenAI request failed: ${errorMessage(err)}`);
    }
  }
}
