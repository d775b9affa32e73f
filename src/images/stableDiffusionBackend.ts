import { z } from 'zod';

import type { FetchLike } from '../llm/types.js';
import type { ImageBackend, ImagePrompt } from './types.js';

export type StableDiffusionBackendOptions = {
  baseUrl: string;
  model: string;
  timeoutMs: number;
};

type StableDiffusionBackendDeps = {
  fetch?: FetchLike;
};

const TXT2IMG_SCHEMA = z.object({
  images: z.array(z.string()).min(1),
});

/** Client of a Stable Diffusion web UI server (`/sdapi/v1/txt2img`). */
export class StableDiffusionBackend implements ImageBackend {
  readonly name = 'stable_diffusion';
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: StableDiffusionBackendOptions, deps: StableDiffusionBackendDeps = {}) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
  }

  async generate(prompt: ImagePrompt): Promise<Buffer> {
    const res = await this.fetchImpl(`${this.baseUrl}/sdapi/v1/txt2img`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        prompt: prompt.text,
        negative_prompt: prompt.negativePrompt ?? '',
        width: prompt.width,
        height: prompt.height,
        steps: prompt.steps,
        cfg_scale: prompt.cfgScale,
        override_settings: { sd_model_checkpoint: this.model },
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`Stable Diffusion error (${res.status})`);
    }

    const parsed = TXT2IMG_SCHEMA.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Stable Diffusion response has no images');
    }

    const bytes = Buffer.from(parsed.data.images[0], 'base64');
    if (bytes.length === 0) {
      throw new Error('Stable Diffusion returned an empty image');
    }
    return bytes;
  }
}
