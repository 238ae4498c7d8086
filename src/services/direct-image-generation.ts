// Direct image API path: OpenAI image models through the AI SDK, persisted locally

import { experimental_generateImage as generateImage } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { OpenAIImageSettings } from '../types/env';
import {
  AppError,
  BillingCreditError,
  ConfigurationError,
  UpstreamProviderError,
  errorMessage,
  isBillingFailure,
} from '../utils/errors';
import { imageLogger } from '../utils/logger';
import { IMAGE_RETRY_POLICY, Sleep, withRetry } from '../utils/retry';
import { buildImageFileName, extensionForMediaType, toStaticUrl, writeOutputFile } from '../utils/storage';
import type { ImageProvider } from './image-generation';

export type ImageSize = `${number}x${number}`;

export function isImageSize(value: string): value is ImageSize {
  return /^\d+x\d+$/.test(value);
}

/** Landscape-first sizes the direct API accepts, tried in order after the preferred one. */
export const SUPPORTED_IMAGE_SIZES: readonly ImageSize[] = ['1792x1024', '1536x1024', '1024x1024'];

export interface GeneratedImage {
  data: Uint8Array;
  mediaType: string;
}

export interface ImageGenerator {
  generate(request: { prompt: string; size: ImageSize; seed?: number; signal?: AbortSignal }): Promise<GeneratedImage>;
}

export class AiSdkImageGenerator implements ImageGenerator {
  private readonly apiKey: string;
  private readonly model: string;

  constructor(apiKey: string, model: string) {
    this.apiKey = apiKey;
    this.model = model;
  }

  async generate(request: { prompt: string; size: ImageSize; seed?: number; signal?: AbortSignal }): Promise<GeneratedImage> {
    const openai = createOpenAI({ apiKey: this.apiKey });
    const { image } = await generateImage({
      model: openai.image(this.model),
      prompt: request.prompt,
      size: request.size,
      seed: request.seed,
      n: 1,
      maxRetries: 0,
      abortSignal: request.signal,
    });
    return { data: image.uint8Array, mediaType: image.mediaType };
  }
}

export function candidateSizes(preferred: string): ImageSize[] {
  const sizes: ImageSize[] = isImageSize(preferred) ? [preferred] : [];
  for (const size of SUPPORTED_IMAGE_SIZES) {
    if (!sizes.includes(size)) sizes.push(size);
  }
  return sizes;
}

function isSizeRejection(error: unknown): boolean {
  return /size|dimension|resolution/i.test(errorMessage(error));
}

export interface OpenAIImageProviderOptions {
  settings: OpenAIImageSettings;
  generator: ImageGenerator | null;
  outputDir: string;
  staticPrefix: string;
  sleep?: Sleep;
}

export class OpenAIImageProvider implements ImageProvider {
  readonly name = 'openai';
  private readonly options: OpenAIImageProviderOptions;

  constructor(options: OpenAIImageProviderOptions) {
    this.options = options;
  }

  isConfigured(): boolean {
    return this.options.generator !== null;
  }

  /** Returns a static path (e.g. `/static/images/img_...png`), not a remote URL. */
  async generate(prompt: string, seed?: number): Promise<string> {
    const generator = this.options.generator;
    if (!generator) {
      throw new ConfigurationError('OPENAI_API_KEY is not set in environment');
    }

    try {
      return await withRetry(() => this.generateOnce(generator, prompt, seed), {
        ...IMAGE_RETRY_POLICY,
        sleep: this.options.sleep,
        shouldRetry: (error) => !(isBillingFailure(error) || error instanceof ConfigurationError),
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      if (isBillingFailure(error)) {
        throw new BillingCreditError('OpenAI billing: quota exhausted. Please check your plan and billing details.');
      }
      throw new UpstreamProviderError(errorMessage(error), 'Image generation failed');
    }
  }

  private async generateOnce(generator: ImageGenerator, prompt: string, seed?: number): Promise<string> {
    const { settings } = this.options;
    const sizes = candidateSizes(settings.size);
    let lastError: unknown;

    for (const size of sizes) {
      try {
        const image = await imageLogger.logApiCall(
          'openai.image',
          () => generator.generate({
            prompt,
            size,
            seed,
            signal: AbortSignal.timeout(settings.timeoutSeconds * 1000),
          }),
          { model: settings.model, size }
        );
        return await this.persist(image);
      } catch (error) {
        lastError = error;
        if (isBillingFailure(error) || !isSizeRejection(error)) throw error;
        imageLogger.warn(`Size ${size} rejected; trying next size`, { model: settings.model });
      }
    }

    throw lastError;
  }

  private async persist(image: GeneratedImage): Promise<string> {
    if (image.data.byteLength === 0) {
      throw new UpstreamProviderError('empty image payload', 'Image generation failed');
    }
    const fileName = buildImageFileName(extensionForMediaType(image.mediaType, 'png'));
    const filePath = await writeOutputFile(this.options.outputDir, fileName, image.data);
    imageLogger.info(`Saved generated image`, { filePath, bytes: image.data.byteLength });
    return toStaticUrl(this.options.staticPrefix, 'images', fileName);
  }
}
