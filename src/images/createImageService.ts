import type { BotConfig } from '../runtime/botConfig.js';
import type { FetchLike } from '../llm/types.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { ImageService } from './imageService.js';
import { OpenAIImageBackend } from './openaiImageBackend.js';
import { StableDiffusionBackend } from './stableDiffusionBackend.js';
import type { ImageBackend } from './types.js';

type CreateImageServiceOptions = {
  image: BotConfig['image'];
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  logger?: RuntimeLogger;
  fetch?: FetchLike;
};

function createImageBackend(options: CreateImageServiceOptions): ImageBackend {
  const { image } = options;
  switch (image.provider) {
    case 'openai':
      return new OpenAIImageBackend({
        apiKey: options.openaiApiKey,
        baseUrl: options.openaiBaseUrl,
        model: image.model,
        timeoutMs: image.timeoutMs,
      });
    case 'stable_diffusion':
      return new StableDiffusionBackend(
        { baseUrl: image.stableDiffusionUrl, model: image.model, timeoutMs: image.timeoutMs },
        { fetch: options.fetch },
      );
  }
}

/** Returns null when `IMAGE_GENERATION` is off. */
export function createImageService(options: CreateImageServiceOptions): ImageService | null {
  if (!options.image.enabled) return null;

  return new ImageService({
    backend: createImageBackend(options),
    outputDir: options.image.outputDir,
    safetyCheck: options.image.safetyCheck,
    logger: options.logger,
  });
}
