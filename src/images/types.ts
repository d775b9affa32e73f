export type ImagePrompt = {
  text: string;
  negativePrompt?: string;
  width: number;
  height: number;
  steps: number;
  cfgScale: number;
};

/** A text-to-image backend. Throws on any failure; `ImageService` maps errors. */
export interface ImageBackend {
  readonly name: string;
  readonly model: string;
  generate(prompt: ImagePrompt): Promise<Buffer>;
}

export type GeneratedImage = {
  bytes: Buffer;
  path: string;
  fileName: string;
  model: string;
  durationMs: number;
};

export type ImageErrorKind = 'rejected_content' | 'generation_failed';

export type ImageResult =
  | { ok: true; image: GeneratedImage }
  | { ok: false; kind: ImageErrorKind; message: string };

export const DEFAULT_NEGATIVE_PROMPT = 'nsfw, nude, lowres, blurry, bad anatomy, watermark, text';
