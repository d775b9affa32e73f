import OpenAI from 'openai';

import type { ImageBackend, ImagePrompt } from './types.js';

export type OpenAIImagesClientLike = {
  images: {
    generate: (body: {
      model: string;
      prompt: string;
      n: number;
      size: '1024x1024';
      response_format: 'b64_json';
    }) => Promise<{ data?: Array<{ b64_json?: string | null }> }>;
  };
};

export type OpenAIImageBackendOptions = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
};

type OpenAIImageBackendDeps = {
  client?: OpenAIImagesClientLike;
};

const DEFAULT_OPENAI_IMAGE_MODEL = 'dall-e-3';

function getDefaultClient(options: OpenAIImageBackendOptions): OpenAIImagesClientLike | null {
  if (!options.apiKey) return null;
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    maxRetries: 0,
    timeout: options.timeoutMs,
  }) as unknown as OpenAIImagesClientLike;
}

// Diffusion checkpoint names (org/model) are not OpenAI image models.
const resolveModel = (model: string) => (model.includes('/') ? DEFAULT_OPENAI_IMAGE_MODEL : model);

export class OpenAIImageBackend implements ImageBackend {
  readonly name = 'openai';
  readonly model: string;
  private readonly client: OpenAIImagesClientLike | null;

  constructor(options: OpenAIImageBackendOptions, deps: OpenAIImageBackendDeps = {}) {
    this.model = resolveModel(options.model);
    this.client = deps.client ?? getDefaultClient(options);
  }

  async generate(prompt: ImagePrompt): Promise<Buffer> {
    if (!this.client) {
      throw new Error('OPENAI_API_KEY is required for IMAGE_PROVIDER=openai');
    }
    const res = await this.client.images.generate({
      model: this.model,
      prompt: prompt.text,
      n: 1,
      size: '1024x1024',
      response_format: 'b64_json',
    });

    const encoded = res.data?.[0]?.b64_json;
    if (!encoded) {
      throw new Error('OpenAI image response has no data');
    }
    return Buffer.from(encoded, 'base64');
  }
}
