import type { LlmProvider } from '../runtime/botConfig.js';
import type { ConversationTurn } from '../conversations/types.js';

export type GenerationOptions = {
  temperature: number;
  maxTokens: number;
};

export type GenerationRequest = {
  /** Persona instructions, sent as the system prompt. */
  system: string;
  /** Prior turns of the chat, oldest first. Does not include `message`. */
  history: readonly ConversationTurn[];
  message: string;
  options: GenerationOptions;
};

export type GenerationResult =
  | { ok: true; text: string; model: string }
  | { ok: false; kind: 'unavailable'; message: string };

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * A text-generation backend. `generate` never throws: transport failures,
 * non-2xx statuses, malformed payloads and timeouts come back as
 * `{ ok: false, kind: 'unavailable' }`.
 */
export interface LlmClient {
  readonly provider: LlmProvider;
  /** Resolved model name; may change after `initialize`. */
  readonly model: string;
  initialize(): Promise<boolean>;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export const unavailable = (message: string): GenerationResult => ({
  ok: false,
  kind: 'unavailable',
  message,
});
