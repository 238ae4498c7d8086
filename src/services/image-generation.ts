// Image generation service using Replicate SDK

import Replicate from 'replicate';
import { DEFAULT_ASPECT_RATIO, clampDimension, getModelSizingConfig } from '../config/model-families';
import { ImageRequestPayload } from '../types';
import { ReplicateSettings } from '../types/env';
import {
  AppError,
  BillingCreditError,
  ConfigurationError,
  ProviderRejectionError,
  UpstreamProviderError,
  errorMessage,
  isBillingFailure,
} from '../utils/errors';
import { imageLogger } from '../utils/logger';
import { IMAGE_RETRY_POLICY, Sleep, withRetry } from '../utils/retry';
import { extractImageUrl } from './image-output';

export interface ImageProvider {
  readonly name: string;
  /** Whether credentials are present; does not run a paid prediction. */
  isConfigured(): boolean;
  generate(prompt: string, seed?: number): Promise<string>;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Transport to a hosted-model runner. Provider refusals surface as ProviderRejectionError. */
export interface ImageModelRunner {
  run(model: string, input: ImageRequestPayload, options: RunOptions): Promise<unknown>;
}

type ModelIdentifier = `${string}/${string}` | `${string}/${string}:${string}`;

function isModelIdentifier(model: string): model is ModelIdentifier {
  return /^[^/\s]+\/[^/\s]+$/.test(model);
}

function responseStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) return undefined;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) return undefined;
  return typeof response.status === 'number' ? response.status : undefined;
}

export class ReplicateRunner implements ImageModelRunner {
  private readonly client: Replicate;

  constructor(apiToken: string) {
    this.client = new Replicate({ auth: apiToken, useFileOutput: false });
  }

  async run(model: string, input: ImageRequestPayload, options: RunOptions): Promise<unknown> {
    if (!isModelIdentifier(model)) {
      throw new ConfigurationError(`REPLICATE_MODEL must look like "owner/name", got "${model}"`);
    }
    try {
      return await this.client.run(model, { input, signal: options.signal });
    } catch (error) {
      // API errors carry the HTTP response; failed predictions report "Prediction failed: ..."
      const status = responseStatus(error);
      const message = errorMessage(error);
      if (status !== undefined || message.startsWith('Prediction failed')) {
        throw new ProviderRejectionError(message, status);
      }
      throw error;
    }
  }
}

/**
 * First sizing parameters for a model: aspect-ratio-only families get
 * `aspect_ratio`; otherwise explicit width/height (clamped) win over a
 * configured aspect ratio; otherwise nothing and the model picks.
 */
export function buildInitialPayload(
  prompt: string,
  settings: Pick<ReplicateSettings, 'model' | 'aspectRatio' | 'width' | 'height'>,
  seed?: number
): ImageRequestPayload {
  const family = getModelSizingConfig(settings.model);
  const payload: ImageRequestPayload = { ...family.defaultInputs, prompt };

  if (family.aspectRatioOnly) {
    payload.aspect_ratio = settings.aspectRatio || DEFAULT_ASPECT_RATIO;
  } else if (settings.width && settings.height) {
    const width = clampDimension(settings.width);
    const height = clampDimension(settings.height);
    if (width !== settings.width || height !== settings.height) {
      imageLogger.info(`Adjusted requested size ${settings.width}x${settings.height} -> ${width}x${height}`, {
        model: settings.model,
      });
    }
    payload.width = width;
    payload.height = height;
  } else if (settings.aspectRatio) {
    payload.aspect_ratio = settings.aspectRatio;
  }

  if (seed !== undefined) {
    payload.seed = seed;
  }
  return payload;
}

export interface FallbackStep {
  name: string;
  matches: (message: string) => boolean;
  reshape: (payload: ImageRequestPayload, settings: Pick<ReplicateSettings, 'aspectRatio'>) => ImageRequestPayload;
}

function without(payload: ImageRequestPayload, keys: string[]): ImageRequestPayload {
  const copy: ImageRequestPayload = { ...payload };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

const BILLING_MESSAGE = 'Replicate billing: insufficient credit. Please add credit to your Replicate account.';

export const ASPECT_RATIO_HINT = '[Compose in a 16:9 aspect ratio]';

/**
 * Reshaping applied after a provider rejection. The first step whose
 * predicate matches the rejection message is applied once.
 */
export const FALLBACK_LADDER: readonly FallbackStep[] = [
  {
    name: 'aspect-ratio-to-dimensions',
    matches: (message) => /aspect/i.test(message) && /ratio/i.test(message),
    reshape: (payload) => ({ ...without(payload, ['aspect_ratio']), width: 1280, height: 720 }),
  },
  {
    name: 'dimensions-to-aspect-ratio',
    matches: (message) => /width|height|size|dimension/i.test(message),
    reshape: (payload, settings) => ({
      ...without(payload, ['width', 'height']),
      aspect_ratio: settings.aspectRatio || DEFAULT_ASPECT_RATIO,
    }),
  },
  {
    name: 'prompt-hint',
    matches: () => true,
    reshape: (payload) => ({
      ...without(payload, ['width', 'height', 'aspect_ratio']),
      prompt: `${payload.prompt}\n\n${ASPECT_RATIO_HINT}`,
    }),
  },
];

export interface ReplicateImageProviderOptions {
  settings: ReplicateSettings;
  runner: ImageModelRunner | null;
  ladder?: readonly FallbackStep[];
  sleep?: Sleep;
  attempts?: number;
}

export class ReplicateImageProvider implements ImageProvider {
  readonly name = 'replicate';
  private readonly settings: ReplicateSettings;
  private readonly runner: ImageModelRunner | null;
  private readonly ladder: readonly FallbackStep[];
  private readonly sleep?: Sleep;
  private readonly attempts: number;

  constructor(options: ReplicateImageProviderOptions) {
    this.settings = options.settings;
    this.runner = options.runner;
    this.ladder = options.ladder ?? FALLBACK_LADDER;
    this.sleep = options.sleep;
    this.attempts = options.attempts ?? IMAGE_RETRY_POLICY.attempts;
  }

  isConfigured(): boolean {
    return this.runner !== null;
  }

  async generate(prompt: string, seed?: number): Promise<string> {
    const runner = this.runner;
    if (!runner) {
      throw new ConfigurationError('REPLICATE_API_TOKEN is not set in environment');
    }

    try {
      return await withRetry((attempt) => this.generateOnce(runner, prompt, seed, attempt), {
        attempts: this.attempts,
        minDelayMs: IMAGE_RETRY_POLICY.minDelayMs,
        maxDelayMs: IMAGE_RETRY_POLICY.maxDelayMs,
        sleep: this.sleep,
        shouldRetry: (error) => !(isBillingFailure(error) || error instanceof ConfigurationError),
        onRetry: (error, attempt, delayMs) =>
          imageLogger.warn('Image generation attempt failed; backing off', {
            attempt,
            delayMs,
            error: errorMessage(error),
          }),
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      if (isBillingFailure(error)) throw new BillingCreditError(BILLING_MESSAGE);
      throw new UpstreamProviderError(errorMessage(error), 'Image generation failed');
    }
  }

  private async generateOnce(
    runner: ImageModelRunner,
    prompt: string,
    seed: number | undefined,
    attempt: number
  ): Promise<string> {
    const payload = buildInitialPayload(prompt, this.settings, seed);
    const output = await this.runWithFallback(runner, payload, attempt);
    return extractImageUrl(output);
  }

  private async runWithFallback(
    runner: ImageModelRunner,
    payload: ImageRequestPayload,
    attempt: number
  ): Promise<unknown> {
    try {
      return await this.call(runner, payload, attempt);
    } catch (error) {
      if (!(error instanceof ProviderRejectionError)) throw error;
      const message = error.message;
      imageLogger.warn(`Replicate rejected request: ${message}`, { model: this.settings.model, attempt });
      if (isBillingFailure(error)) {
        throw new BillingCreditError(BILLING_MESSAGE);
      }

      const step = this.ladder.find((candidate) => candidate.matches(message));
      if (!step) throw error;
      imageLogger.info(`Retrying with fallback: ${step.name}`, { model: this.settings.model, attempt });

      try {
        return await this.call(runner, step.reshape(payload, this.settings), attempt);
      } catch (retryError) {
        if (isBillingFailure(retryError)) {
          throw new BillingCreditError(BILLING_MESSAGE);
        }
        throw retryError;
      }
    }
  }

  private call(runner: ImageModelRunner, payload: ImageRequestPayload, attempt: number): Promise<unknown> {
    return imageLogger.logApiCall(
      'replicate.run',
      () => runner.run(this.settings.model, payload, {
        signal: AbortSignal.timeout(this.settings.timeoutSeconds * 1000),
      }),
      { model: this.settings.model, attempt }
    );
  }
}
