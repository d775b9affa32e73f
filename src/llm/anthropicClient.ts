import { z } from 'zod';

import type { LlmProvider } from '../runtime/botConfig.js';
import { errorMessage, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { clampGenerationOptions } from './generationOptions.js';
import {
  unavailable,
  type FetchLike,
  type GenerationRequest,
  type GenerationResult,
  type LlmClient,
} from './types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';
const ANTHROPIC_VERSION = '2023-06-01';

export type AnthropicClientOptions = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  logger?: RuntimeLogger;
};

type AnthropicClientDeps = {
  fetch?: FetchLike;
};

type AnthropicMessage = {
  role: 'user' | 'assistant';
  content: string;
};

const MESSAGES_SCHEMA = z.object({
  model: z.string().optional(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

// The messages API requires the first message to come from the user.
export function toAnthropicMessages(request: GenerationRequest): AnthropicMessage[] {
  const messages: AnthropicMessage[] = [
    ...request.history.map((turn) => ({ role: turn.role, content: turn.text })),
    { role: 'user', content: request.message },
  ];
  const firstUser = messages.findIndex((message) => message.role === 'user');
  return messages.slice(firstUser);
}

export class AnthropicClient implements LlmClient {
  readonly provider: LlmProvider = 'anthropic';
  readonly model: string;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: RuntimeLogger;
  private readonly fetchImpl: FetchLike;

  constructor(options: AnthropicClientOptions, deps: AnthropicClientDeps = {}) {
    this.model = options.model === 'auto' ? DEFAULT_ANTHROPIC_MODEL : options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  async initialize(): Promise<boolean> {
    if (!this.apiKey) {
      this.logger?.warn('ANTHROPIC_API_KEY is not set; replies will use templates');
      return false;
    }
    this.logger?.info('anthropic client ready', { model: this.model });
    return true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    if (!this.apiKey) {
      return unavailable('ANTHROPIC_API_KEY is not set');
    }

    const options = clampGenerationOptions(request.options);

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          system: request.system,
          messages: toAnthropicMessages(request),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      return unavailable(`Anthropic request failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      return unavailable(`Anthropic messages error (${res.status})`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      return unavailable(`Anthropic returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = MESSAGES_SCHEMA.safeParse(body);
    if (!parsed.success) {
      return unavailable('Anthropic messages response is malformed');
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();
    if (!text) {
      return unavailable('Anthropic returned an empty reply');
    }

    return { ok: true, text, model: parsed.data.model ?? this.model };
  }
}
