// Pipeline entry points used by the route handlers

import { Scene, SingleAudioResult, VisualsResult, VisualsWithAudioResult } from '../../types';
import { NoNarrationProducedError } from '../../utils/errors';
import { pipelineLogger } from '../../utils/logger';
import { toStaticUrl } from '../../utils/storage';
import { mergeNarrationClips } from '../audio-merge';
import { segmentTextIntoScenes } from '../scene-segmentation';
import { runGraphVisuals } from './graph';
import { SendEvent, StreamRequest, runImperativeVisuals, streamVisuals } from './imperative';
import { PipelineDeps, VisualsRequest, collectClips, narrateScene, titleBestEffort } from './stages';

export type { PipelineDeps, PipelineSettings, VisualsRequest } from './stages';
export type { SendEvent, StreamRequest } from './imperative';

export class ScenePipeline {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  segment(text: string, maxScenes: number): Promise<Scene[]> {
    return segmentTextIntoScenes(this.deps.text, text, maxScenes);
  }

  generateImage(prompt: string, seed?: number): Promise<string> {
    return this.deps.images.generate(prompt, seed);
  }

  async generateVisuals(request: VisualsRequest): Promise<VisualsResult> {
    const { engine } = this.deps.settings;
    const startTime = Date.now();
    pipelineLogger.info('Generating visuals', { engine, maxScenes: request.maxScenes });

    const scenes = engine === 'imperative'
      ? await runImperativeVisuals(this.deps, request)
      : await runGraphVisuals(this.deps, request);
    const title = await titleBestEffort(this.deps, request.text);

    pipelineLogger.info('Visuals ready', {
      engine,
      scenes: scenes.length,
      withImages: scenes.filter((scene) => scene.image_url).length,
      durationMs: Date.now() - startTime,
    });
    return { title, scenes };
  }

  /** Narration runs after images; a failed clip leaves that scene without audio. */
  async generateVisualsWithAudio(request: VisualsRequest): Promise<VisualsWithAudioResult> {
    const visuals = await this.generateVisuals(request);
    const narrated = await Promise.all(visuals.scenes.map((scene) => narrateScene(this.deps, scene)));
    return { title: visuals.title, scenes: narrated.map((entry) => entry.scene) };
  }

  async generateVisualsSingleAudio(request: VisualsRequest): Promise<SingleAudioResult> {
    const visuals = await this.generateVisuals(request);
    const narrated = await Promise.all(visuals.scenes.map((scene) => narrateScene(this.deps, scene)));
    const clips = collectClips(narrated);
    if (clips.length === 0) {
      throw new NoNarrationProducedError();
    }

    const merged = await mergeNarrationClips(clips, {
      outputDir: this.deps.settings.audioOutputDir,
      toolkit: this.deps.audio,
    });
    return {
      title: visuals.title,
      audio_url: toStaticUrl(this.deps.settings.staticPrefix, 'audio', merged.fileName),
      duration_seconds: merged.totalDuration,
      timeline: merged.timeline,
      scenes: narrated.map((entry) => entry.scene),
    };
  }

  streamVisuals(request: StreamRequest, send: SendEvent): Promise<void> {
    return streamVisuals(this.deps, request, send);
  }
}
