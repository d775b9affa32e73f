import type { GenerationOptions } from './types.js';

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 200;

// Out-of-range values are clamped rather than rejected.
export function clampGenerationOptions(options: GenerationOptions): GenerationOptions {
  const temperature = Number.isFinite(options.temperature)
    ? Math.min(1, Math.max(0, options.temperature))
    : DEFAULT_TEMPERATURE;
  const maxTokens = Number.isFinite(options.maxTokens)
    ? Math.max(1, Math.floor(options.maxTokens))
    : DEFAULT_MAX_TOKENS;

  return { temperature, maxTokens };
}
