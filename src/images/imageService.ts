import { randomBytes } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { checkImagePrompt } from '../policies/contentFilter.js';
import { errorMessage, type RuntimeLogger } from '../utils/runtimeLogger.js';
import {
  DEFAULT_NEGATIVE_PROMPT,
  type ImageBackend,
  type ImagePrompt,
  type ImageResult,
} from './types.js';

export type ImageServiceOptions = {
  backend: ImageBackend;
  outputDir: string;
  safetyCheck: boolean;
  logger?: RuntimeLogger;
  nowMs?: () => number;
  randomId?: () => string;
};

const defaultRandomId = () => randomBytes(4).toString('hex');

export const buildImageFileName = (nowMs: number, id: string) =>
  `img_${Math.floor(nowMs / 1000)}_${id}.png`;

export class ImageService {
  private readonly options: ImageServiceOptions;
  private readonly nowMs: () => number;
  private readonly randomId: () => string;

  constructor(options: ImageServiceOptions) {
    this.options = options;
    this.nowMs = options.nowMs ?? Date.now;
    this.randomId = options.randomId ?? defaultRandomId;
  }

  get model(): string {
    return this.options.backend.model;
  }

  get backendName(): string {
    return this.options.backend.name;
  }

  async generate(description: string): Promise<ImageResult> {
    const text = description.trim();

    if (this.options.safetyCheck) {
      const check = checkImagePrompt(text);
      if (!check.safe) {
        this.options.logger?.info('image description rejected', { category: check.category });
        return {
          ok: false,
          kind: 'rejected_content',
          message: `Description rejected by the content check (${check.category})`,
        };
      }
    }

    const prompt: ImagePrompt = {
      text,
      negativePrompt: DEFAULT_NEGATIVE_PROMPT,
      width: 512,
      height: 512,
      steps: 20,
      cfgScale: 7.5,
    };

    const startedAt = this.nowMs();
    try {
      const bytes = await this.options.backend.generate(prompt);
      const fileName = buildImageFileName(startedAt, this.randomId());
      const filePath = path.join(this.options.outputDir, fileName);

      await mkdir(this.options.outputDir, { recursive: true });
      await writeFile(filePath, bytes);

      const durationMs = this.nowMs() - startedAt;
      this.options.logger?.info('image generated', {
        backend: this.options.backend.name,
        fileName,
        durationMs,
      });

      return {
        ok: true,
        image: { bytes, path: filePath, fileName, model: this.options.backend.model, durationMs },
      };
    } catch (err) {
      this.options.logger?.warn('image generation failed', {
        backend: this.options.backend.name,
        error: errorMessage(err),
      });
      return { ok: false, kind: 'generation_failed', message: errorMessage(err) };
    }
  }
}
