import { describe, expect, it, vi } from 'vitest';

import { StableDiffusionBackend } from './stableDiffusionBackend.js';
import type { ImagePrompt } from './types.js';

const prompt: ImagePrompt = {
  text: 'a red fox in snow',
  negativePrompt: 'blurry',
  width: 512,
  height: 512,
  steps: 20,
  cfgScale: 7.5,
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('StableDiffusionBackend', () => {
  it('posts txt2img and decodes the first image', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ images: [Buffer.from('png').toString('base64')] }));
    const backend = new StableDiffusionBackend(
      { baseUrl: 'http://sd.test/', model: 'runwayml/stable-diffusion-v1-5', timeoutMs: 1000 },
      { fetch: fetchMock },
    );

    expect((await backend.generate(prompt)).toString()).toBe('png');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://sd.test/sdapi/v1/txt2img');
    expect(JSON.parse(init.body)).toEqual({
      prompt: 'a red fox in snow',
      negative_prompt: 'blurry',
      width: 512,
      height: 512,
      steps: 20,
      cfg_scale: 7.5,
      override_settings: { sd_model_checkpoint: 'runwayml/stable-diffusion-v1-5' },
    });
  });

  it('throws on HTTP errors', async () => {
    const backend = new StableDiffusionBackend(
      { baseUrl: 'http://sd.test', model: 'm', timeoutMs: 1000 },
      { fetch: vi.fn().mockResolvedValue(jsonResponse({}, 503)) },
    );

    await expect(backend.generate(prompt)).rejects.toThrow('Stable Diffusion error (503)');
  });

  it('throws when no image comes back', async () => {
    const backend = new StableDiffusionBackend(
      { baseUrl: 'http://sd.test', model: 'm', timeoutMs: 1000 },
      { fetch: vi.fn().mockResolvedValue(jsonResponse({ images: [] })) },
    );

    await expect(backend.generate(prompt)).rejects.toThrow('Stable Diffusion response has no images');
  });
});
