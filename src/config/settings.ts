/**
 * Environment-driven configuration.
 *
 * Values are read from `process.env` (after `.env` is loaded through dotenv),
 * validated with zod and frozen. The result is cached for the process lifetime.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig } from '../types/env';
import { ConfigurationError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';

export const DEFAULT_STYLE_GUIDE =
  'Friendly illustrated style; gentle colors; clear primary subject; soft lighting; clean composition; ' +
  'no text overlays or watermarks; keep characters and props consistent across scenes.';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const optionalInt = optionalString.pipe(z.coerce.number().int().positive().optional());

function stringWithDefault(fallback: string) {
  return optionalString.pipe(z.string().default(fallback));
}

function intWithDefault(fallback: number) {
  return optionalString.pipe(z.coerce.number().int().positive().default(fallback));
}

const ENV_SCHEMA = z.object({
  ENVIRONMENT: stringWithDefault('local'),
  PORT: intWithDefault(8000),
  API_PREFIX: stringWithDefault(''),
  STATIC_PREFIX: stringWithDefault('/static'),
  LOG_LEVEL: optionalString.pipe(z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  CORS_ORIGINS: optionalString,
  CORS_ORIGIN_REGEX: optionalString,

  OPENAI_API_KEY: optionalString,
  LLM_MODEL: stringWithDefault('gpt-4o-mini'),
  LLM_TEMPERATURE: optionalString.pipe(z.coerce.number().min(0).max(2).default(0.3)),

  IMAGE_PROVIDER: optionalString.pipe(z.enum(['replicate', 'openai']).default('replicate')),
  IMAGE_OUTPUT_DIR: stringWithDefault('/tmp/scene-visuals/images'),
  REPLICATE_API_TOKEN: optionalString,
  REPLICATE_MODEL: stringWithDefault('black-forest-labs/flux-1.1-pro'),
  REPLICATE_TIMEOUT_SECONDS: intWithDefault(300),
  // An explicitly empty value disables the aspect ratio
  REPLICATE_ASPECT_RATIO: z.string().default('16:9'),
  REPLICATE_WIDTH: optionalInt,
  REPLICATE_HEIGHT: optionalInt,
  OPENAI_IMAGE_MODEL: stringWithDefault('dall-e-3'),
  OPENAI_IMAGE_SIZE: optionalString.pipe(z.string().regex(/^\d+x\d+$/).default('1792x1024')),
  OPENAI_IMAGE_TIMEOUT_SECONDS: intWithDefault(120),

  PIPELINE_ENGINE: optionalString.pipe(z.enum(['graph', 'imperative']).default('graph')),
  MAX_CONCURRENCY: intWithDefault(4),
  STYLE_GUIDE: optionalString,

  TTS_PROVIDER: optionalString.pipe(z.enum(['openai', 'none']).default('openai')),
  TTS_MODEL: stringWithDefault('gpt-4o-mini-tts'),
  TTS_VOICE: stringWithDefault('alloy'),
  TTS_OUTPUT_DIR: stringWithDefault('/tmp/scene-visuals/audio'),
  FFMPEG_PATH: optionalString,
});

function parseList(value: string | undefined): string[] {
  if (!value) return ['*'];
  return value.split(',').map((item) => item.trim()).filter((item) => item !== '');
}

/**
 * Builds an {@link AppConfig} from an environment map. Does not touch `.env`;
 * see {@link getConfig} for the process-wide instance.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ENV_SCHEMA.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const aspectRatio = e.REPLICATE_ASPECT_RATIO.trim();

  const config: AppConfig = {
    environment: e.ENVIRONMENT,
    port: e.PORT,
    apiPrefix: e.API_PREFIX.replace(/\/+$/, ''),
    staticPrefix: e.STATIC_PREFIX.replace(/\/+$/, ''),
    logLevel: e.LOG_LEVEL,
    cors: {
      // A regex replaces the origin list so '*' is never combined with credentials
      origins: e.CORS_ORIGIN_REGEX ? [] : parseList(e.CORS_ORIGINS),
      originRegex: e.CORS_ORIGIN_REGEX,
    },
    openaiApiKey: e.OPENAI_API_KEY,
    llm: {
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
    },
    image: {
      provider: e.IMAGE_PROVIDER,
      outputDir: e.IMAGE_OUTPUT_DIR,
      replicate: {
        apiToken: e.REPLICATE_API_TOKEN,
        model: e.REPLICATE_MODEL,
        timeoutSeconds: e.REPLICATE_TIMEOUT_SECONDS,
        aspectRatio: aspectRatio === '' ? undefined : aspectRatio,
        width: e.REPLICATE_WIDTH,
        height: e.REPLICATE_HEIGHT,
      },
      openai: {
        model: e.OPENAI_IMAGE_MODEL,
        size: e.OPENAI_IMAGE_SIZE,
        timeoutSeconds: e.OPENAI_IMAGE_TIMEOUT_SECONDS,
      },
    },
    pipeline: {
      engine: e.PIPELINE_ENGINE,
      maxConcurrency: e.MAX_CONCURRENCY,
      styleGuide: e.STYLE_GUIDE ?? DEFAULT_STYLE_GUIDE,
    },
    tts: {
      provider: e.TTS_PROVIDER,
      model: e.TTS_MODEL,
      voice: e.TTS_VOICE,
      outputDir: e.TTS_OUTPUT_DIR,
      ffmpegPath: e.FFMPEG_PATH,
    },
  };

  return Object.freeze(config);
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
    setLogLevel(cached.logLevel);
  }
  return cached;
}
