import { z } from 'zod';

import type { LlmProvider } from '../runtime/botConfig.js';
import { errorMessage, type RuntimeLogger } from '../utils/runtimeLogger.js';
import { toChatMessages } from './chatMessages.js';
import { clampGenerationOptions } from './generationOptions.js';
import { selectModel, type ModelSelection } from './modelSelector.js';
import {
  unavailable,
  type FetchLike,
  type GenerationRequest,
  type GenerationResult,
  type LlmClient,
} from './types.js';

export type OllamaClientOptions = {
  baseUrl: string;
  model: string;
  autoSelect: boolean;
  timeoutMs: number;
  logger?: RuntimeLogger;
};

type OllamaClientDeps = {
  fetch?: FetchLike;
};

const TAGS_SCHEMA = z.object({
  models: z
    .array(
      z.object({
        name: z.string().optional(),
        model: z.string().optional(),
      }),
    )
    .default([]),
});

const CHAT_SCHEMA = z.object({
  message: z.object({
    content: z.string(),
  }),
});

const trimSlash = (url: string) => url.replace(/\/+$/, '');

export class OllamaClient implements LlmClient {
  readonly provider: LlmProvider = 'ollama';
  private resolvedModel: string;
  /** False until a model list has been read; `generate` retries the lookup until then. */
  private modelResolved: boolean;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly options: OllamaClientOptions;

  constructor(options: OllamaClientOptions, deps: OllamaClientDeps = {}) {
    this.options = options;
    this.baseUrl = trimSlash(options.baseUrl);
    this.resolvedModel = options.model;
    // A fixed model name with auto-select off needs no lookup.
    this.modelResolved = options.model.trim().toLowerCase() !== 'auto' && !options.autoSelect;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  get model(): string {
    return this.resolvedModel;
  }

  async listModels(): Promise<string[]> {
    const res = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
      method: 'GET',
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`Ollama tags error (${res.status})`);
    }
    const parsed = TAGS_SCHEMA.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Ollama tags response is malformed');
    }
    return parsed.data.models
      .map((entry) => entry.name ?? entry.model ?? '')
      .filter((name) => name.length > 0);
  }

  private async resolveModel(): Promise<{ selection: ModelSelection; installed: string[] }> {
    const installed = await this.listModels();
    const selection = selectModel(this.options.model, installed, this.options.autoSelect);
    this.resolvedModel = selection.model;
    this.modelResolved = true;
    return { selection, installed };
  }

  async initialize(): Promise<boolean> {
    let resolved: { selection: ModelSelection; installed: string[] };
    try {
      resolved = await this.resolveModel();
    } catch (err) {
      this.options.logger?.warn('ollama is not reachable', {
        baseUrl: this.baseUrl,
        error: errorMessage(err),
      });
      return false;
    }

    const { selection, installed } = resolved;
    if (!selection.installed) {
      this.options.logger?.warn('ollama model is not installed', {
        model: selection.model,
        installed,
      });
      return false;
    }

    this.options.logger?.info('ollama ready', {
      model: selection.model,
      autoSelected: selection.autoSelected,
    });
    return true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const options = clampGenerationOptions(request.options);

    // The server was down at startup: pick the model now that it may be back.
    if (!this.modelResolved) {
      try {
        const { selection } = await this.resolveModel();
        this.options.logger?.info('ollama model resolved', {
          model: selection.model,
          autoSelected: selection.autoSelected,
        });
      } catch (err) {
        return unavailable(`Ollama request failed: ${errorMessage(err)}`);
      }
    }

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          model: this.resolvedModel,
          messages: toChatMessages(request),
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: options.maxTokens,
            top_p: 0.9,
            top_k: 40,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      return unavailable(`Ollama request failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      return unavailable(`Ollama chat error (${res.status})`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      return unavailable(`Ollama returned invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = CHAT_SCHEMA.safeParse(body);
    if (!parsed.success) {
      return unavailable('Ollama chat response is malformed');
    }

    const text = parsed.data.message.content.trim();
    if (!text) {
      return unavailable('Ollama returned an empty reply');
    }

    return { ok: true, text, model: this.resolvedModel };
  }
}
