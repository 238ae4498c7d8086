// Imperative strategy: batch fan-out under a concurrency gate, and a progress-reporting stream

import { PipelineEvent, Scene, SceneWithAudio } from '../../types';
import { isBillingFailure } from '../../utils/errors';
import { pipelineLogger } from '../../utils/logger';
import { toStaticUrl } from '../../utils/storage';
import { mergeNarrationClips, NarrationClip } from '../audio-merge';
import { mapWithConcurrency } from '../concurrency-manager';
import { segmentTextIntoScenes } from '../scene-segmentation';
import {
  PipelineDeps,
  VisualsRequest,
  describeFailure,
  narrateScene,
  processSceneImage,
  summarizeBestEffort,
  titleBestEffort,
  writeScenePrompt,
} from './stages';

export type SendEvent = (event: PipelineEvent) => void | Promise<void>;

async function writePrompts(
  deps: PipelineDeps,
  scenes: Scene[],
  globalSummary: string | undefined,
  styleGuide?: string
): Promise<Scene[]> {
  const prompted: Scene[] = [];
  for (const scene of scenes) {
    prompted.push(await writeScenePrompt(deps, scene, globalSummary, styleGuide));
  }
  return prompted;
}

/**
 * Images run in parallel with at most `maxConcurrency` calls in flight.
 * After a billing failure, queued scenes are skipped and the failure is rethrown.
 */
export async function runImperativeVisuals(deps: PipelineDeps, request: VisualsRequest): Promise<Scene[]> {
  const segmented = await segmentTextIntoScenes(deps.text, request.text, request.maxScenes);
  const globalSummary = await summarizeBestEffort(deps, request.text);
  const prompted = await writePrompts(deps, segmented, globalSummary, request.styleGuide);

  let billingFailed = false;
  return mapWithConcurrency(prompted, deps.settings.maxConcurrency, async (scene) => {
    if (billingFailed) return scene;
    try {
      return await processSceneImage(deps, scene);
    } catch (error) {
      if (isBillingFailure(error)) billingFailed = true;
      throw error;
    }
  });
}

export interface StreamRequest extends VisualsRequest {
  withAudio: boolean;
  /** Aborted when the client goes away; checked between paid calls. */
  signal?: AbortSignal;
}

function disconnected(request: StreamRequest, stage: string, sceneId?: number): boolean {
  if (!request.signal?.aborted) return false;
  pipelineLogger.info('Client disconnected; stopping stream', { stage, sceneId });
  return true;
}

/**
 * Emits progress events in causal order and ends with exactly one
 * `complete` or `error` event. Scenes are processed in declaration order;
 * any image failure ends the stream. A disconnected client stops the run
 * before the next image, narration or merge without a terminal event.
 */
export async function streamVisuals(deps: PipelineDeps, request: StreamRequest, send: SendEvent): Promise<void> {
  try {
    const segmented = await segmentTextIntoScenes(deps.text, request.text, request.maxScenes);
    await send({ type: 'segmented', scenes: segmented });

    const globalSummary = await summarizeBestEffort(deps, request.text);
    await send({ type: 'summarized', global_summary: globalSummary ?? null });

    const title = await titleBestEffort(deps, request.text);
    if (title) {
      await send({ type: 'title', title });
    }

    const prompted: Scene[] = [];
    for (const scene of segmented) {
      const withPrompt = await writeScenePrompt(deps, scene, globalSummary, request.styleGuide);
      prompted.push(withPrompt);
      await send({ type: 'prompt', scene_id: scene.scene_id, prompt: withPrompt.prompt ?? '' });
    }

    const illustrated: Scene[] = [];
    for (const scene of prompted) {
      if (disconnected(request, 'image', scene.scene_id)) return;
      await send({ type: 'image_start', scene_id: scene.scene_id });
      const imageUrl = await deps.images.generate(scene.prompt ?? scene.scene_summary);
      illustrated.push({ ...scene, image_url: imageUrl });
      await send({ type: 'image_done', scene_id: scene.scene_id, image_url: imageUrl });
    }

    let scenes: SceneWithAudio[] = illustrated;
    if (request.withAudio) {
      scenes = [];
      const clips: NarrationClip[] = [];
      for (const scene of illustrated) {
        if (disconnected(request, 'narration', scene.scene_id)) return;
        await send({ type: 'narration_start', scene_id: scene.scene_id });
        const narrated = await narrateScene(deps, scene);
        scenes.push(narrated.scene);
        if (narrated.clip) clips.push(narrated.clip);
        await send({
          type: 'narration_done',
          scene_id: scene.scene_id,
          audio_url: narrated.scene.audio_url ?? null,
          audio_duration_seconds: narrated.scene.audio_duration_seconds ?? null,
        });
      }

      if (clips.length > 0) {
        if (disconnected(request, 'merge')) return;
        await send({ type: 'merge_start', clips: clips.length });
        const merged = await mergeNarrationClips(clips, {
          outputDir: deps.settings.audioOutputDir,
          toolkit: deps.audio,
        });
        await send({
          type: 'merge_done',
          audio_url: toStaticUrl(deps.settings.staticPrefix, 'audio', merged.fileName),
          duration_seconds: merged.totalDuration,
          timeline: merged.timeline,
        });
      }
    }

    await send({ type: 'complete', title, scenes });
  } catch (error) {
    pipelineLogger.error('Visuals stream stopped', error);
    await send({ type: 'error', ...describeFailure(error) });
  }
}
