// Wires providers from configuration. Built once per process.

import { AppConfig } from '../types/env';
import { AiSdkSpeechSynthesizer, DISABLED_NARRATION, NarrationProvider, SpeechNarrationProvider } from './audio-generation';
import { AudioToolkit, FfmpegToolkit } from './audio-merge';
import { AiSdkImageGenerator, OpenAIImageProvider } from './direct-image-generation';
import { ImageProvider, ReplicateImageProvider, ReplicateRunner } from './image-generation';
import { ScenePipeline } from './pipeline';
import { AiSdkTextClient, TextGenerationClient } from './text-generation';

export interface Services {
  text: TextGenerationClient;
  images: ImageProvider;
  narration: NarrationProvider;
  audio: AudioToolkit;
  pipeline: ScenePipeline;
}

export function createImageProvider(config: AppConfig): ImageProvider {
  const { image, openaiApiKey, staticPrefix } = config;
  if (image.provider === 'openai') {
    return new OpenAIImageProvider({
      settings: image.openai,
      generator: openaiApiKey ? new AiSdkImageGenerator(openaiApiKey, image.openai.model) : null,
      outputDir: image.outputDir,
      staticPrefix,
    });
  }
  return new ReplicateImageProvider({
    settings: image.replicate,
    runner: image.replicate.apiToken ? new ReplicateRunner(image.replicate.apiToken) : null,
  });
}

export function createNarrationProvider(config: AppConfig): NarrationProvider {
  const { tts, openaiApiKey, staticPrefix } = config;
  if (tts.provider === 'none') return DISABLED_NARRATION;
  return new SpeechNarrationProvider({
    synthesizer: openaiApiKey ? new AiSdkSpeechSynthesizer(openaiApiKey, tts.model) : null,
    voice: tts.voice,
    outputDir: tts.outputDir,
    staticPrefix,
  });
}

/** Whether the selected image provider has credentials; runs no prediction. */
export function canGenerateImages(config: AppConfig): boolean {
  return createImageProvider(config).isConfigured();
}

export function createServices(config: AppConfig): Services {
  const text = new AiSdkTextClient({
    apiKey: config.openaiApiKey,
    model: config.llm.model,
    temperature: config.llm.temperature,
  });
  const images = createImageProvider(config);
  const narration = createNarrationProvider(config);
  const audio = new FfmpegToolkit(config.tts.ffmpegPath);

  const pipeline = new ScenePipeline({
    text,
    images,
    narration,
    audio,
    settings: {
      engine: config.pipeline.engine,
      maxConcurrency: config.pipeline.maxConcurrency,
      styleGuide: config.pipeline.styleGuide,
      audioOutputDir: config.tts.outputDir,
      staticPrefix: config.staticPrefix,
    },
  });

  return { text, images, narration, audio, pipeline };
}
