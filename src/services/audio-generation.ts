// Narration synthesis: text-to-speech per scene, saved locally with a measured duration

import { experimental_generateSpeech as generateSpeech } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { errorMessage } from '../utils/errors';
import { audioLogger } from '../utils/logger';
import { buildAudioFileName, extensionForMediaType, toStaticUrl, writeOutputFile } from '../utils/storage';
import { measureAudioDuration } from './audio-duration';

export interface SynthesizedSpeech {
  data: Uint8Array;
  mediaType: string;
}

export interface SpeechSynthesizer {
  synthesize(request: { text: string; voice: string }): Promise<SynthesizedSpeech>;
}

export class AiSdkSpeechSynthesizer implements SpeechSynthesizer {
  private readonly apiKey: string;
  private readonly model: string;

  constructor(apiKey: string, model: string) {
    this.apiKey = apiKey;
    this.model = model;
  }

  async synthesize(request: { text: string; voice: string }): Promise<SynthesizedSpeech> {
    const openai = createOpenAI({ apiKey: this.apiKey });
    const { audio } = await generateSpeech({
      model: openai.speech(this.model),
      text: request.text,
      voice: request.voice,
      outputFormat: 'mp3',
      maxRetries: 1,
    });
    return { data: audio.uint8Array, mediaType: audio.mediaType };
  }
}

export interface NarrationResult {
  audioUrl?: string;
  durationSeconds?: number;
  /** Local file, kept so clips can be merged afterwards */
  filePath?: string;
}

export interface NarrationProvider {
  readonly enabled: boolean;
  /** Never rejects: failures resolve to an empty result. */
  synthesize(sceneId: number, text: string): Promise<NarrationResult>;
}

class NarrationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NarrationFailure';
  }
}

export interface SpeechNarrationProviderOptions {
  synthesizer: SpeechSynthesizer | null;
  voice: string;
  outputDir: string;
  staticPrefix: string;
  measureDuration?: (filePath: string) => Promise<number>;
}

export class SpeechNarrationProvider implements NarrationProvider {
  private readonly options: SpeechNarrationProviderOptions;

  constructor(options: SpeechNarrationProviderOptions) {
    this.options = options;
  }

  get enabled(): boolean {
    return this.options.synthesizer !== null;
  }

  async synthesize(sceneId: number, text: string): Promise<NarrationResult> {
    try {
      return await this.synthesizeOrThrow(sceneId, text);
    } catch (error) {
      audioLogger.warn(`Narration failed for scene ${sceneId}`, { sceneId, error: errorMessage(error) });
      return {};
    }
  }

  private async synthesizeOrThrow(sceneId: number, text: string): Promise<NarrationResult> {
    const { synthesizer, voice, outputDir, staticPrefix } = this.options;
    if (!synthesizer) {
      throw new NarrationFailure('speech synthesis is disabled');
    }
    const narration = text.trim();
    if (!narration) {
      throw new NarrationFailure('nothing to narrate');
    }

    const speech = await audioLogger.logApiCall(
      'tts.synthesize',
      () => synthesizer.synthesize({ text: narration, voice }),
      { sceneId, voice }
    );
    if (speech.data.byteLength === 0) {
      throw new NarrationFailure('speech synthesizer returned no audio');
    }

    const fileName = buildAudioFileName(sceneId, voice, extensionForMediaType(speech.mediaType, 'mp3'));
    // writeOutputFile resolves after the data is flushed, so the probe sees the whole clip
    const filePath = await writeOutputFile(outputDir, fileName, speech.data);
    const measure = this.options.measureDuration ?? ((path: string) => measureAudioDuration(path));
    const durationSeconds = await measure(filePath);

    audioLogger.info(`Narration saved for scene ${sceneId}`, { sceneId, filePath, durationSeconds });
    return {
      audioUrl: toStaticUrl(staticPrefix, 'audio', fileName),
      durationSeconds,
      filePath,
    };
  }
}

/** Used when narration is turned off (`TTS_PROVIDER=none`). */
export const DISABLED_NARRATION: NarrationProvider = {
  enabled: false,
  synthesize: async () => ({}),
};
