import type { LlmProvider } from '../runtime/botConfig.js';
import { unavailable, type GenerationResult, type LlmClient } from './types.js';

/** `LLM_PROVIDER=none`: every reply comes from templates. */
export class DisabledLlmClient implements LlmClient {
  readonly provider: LlmProvider = 'none';
  readonly model = 'none';

  async initialize(): Promise<boolean> {
    return false;
  }

  async generate(): Promise<GenerationResult> {
    return unavailable('LLM provider is disabled');
  }
}
