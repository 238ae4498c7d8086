// Process configuration, resolved once at startup from the environment

import type { LogLevel } from '../utils/logger';

export type ImageProviderName = 'replicate' | 'openai';
export type PipelineEngine = 'graph' | 'imperative';
export type TtsProviderName = 'openai' | 'none';

export interface ReplicateSettings {
  apiToken?: string;
  model: string;
  timeoutSeconds: number;
  aspectRatio?: string;
  width?: number;
  height?: number;
}

export interface OpenAIImageSettings {
  model: string;
  size: string;
  timeoutSeconds: number;
}

export interface AppConfig {
  environment: string;
  port: number;
  apiPrefix: string;
  staticPrefix: string;
  logLevel: LogLevel;
  cors: {
    origins: string[];
    originRegex?: string;
  };
  openaiApiKey?: string;
  llm: {
    model: string;
    temperature: number;
  };
  image: {
    provider: ImageProviderName;
    outputDir: string;
    replicate: ReplicateSettings;
    openai: OpenAIImageSettings;
  };
  pipeline: {
    engine: PipelineEngine;
    maxConcurrency: number;
    styleGuide: string;
  };
  tts: {
    provider: TtsProviderName;
    model: string;
    voice: string;
    outputDir: string;
    /** Explicit ffmpeg binary; PATH is searched when unset. */
    ffmpegPath?: string;
  };
}
