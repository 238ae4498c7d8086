// Stage functions shared by the graph and imperative pipeline strategies

import { PipelineEngine } from '../../types/env';
import { Scene, SceneWithAudio } from '../../types';
import { attempt, valueOrUndefined } from '../../utils/best-effort';
import { errorMessage, isBillingFailure } from '../../utils/errors';
import { pipelineLogger } from '../../utils/logger';
import type { NarrationProvider } from '../audio-generation';
import type { AudioToolkit, NarrationClip } from '../audio-merge';
import type { ImageProvider } from '../image-generation';
import { generateTitle, generateVisualPrompt, summarizeGlobalContext } from '../prompt-synthesis';
import type { TextGenerationClient } from '../text-generation';

export interface PipelineSettings {
  engine: PipelineEngine;
  maxConcurrency: number;
  styleGuide: string;
  audioOutputDir: string;
  staticPrefix: string;
}

export interface PipelineDeps {
  text: TextGenerationClient;
  images: ImageProvider;
  narration: NarrationProvider;
  audio: AudioToolkit;
  settings: PipelineSettings;
}

export interface VisualsRequest {
  text: string;
  maxScenes: number;
  styleGuide?: string;
}

export async function summarizeBestEffort(deps: PipelineDeps, text: string): Promise<string | undefined> {
  const result = await attempt(() => summarizeGlobalContext(deps.text, text));
  if (!result.success) {
    pipelineLogger.warn('Global summary failed; continuing without it', { error: result.error });
  }
  return valueOrUndefined(result) || undefined;
}

export async function titleBestEffort(deps: PipelineDeps, text: string): Promise<string | undefined> {
  const result = await attempt(() => generateTitle(deps.text, text));
  if (!result.success) {
    pipelineLogger.warn('Title generation failed; continuing without it', { error: result.error });
  }
  return valueOrUndefined(result) || undefined;
}

export async function writeScenePrompt(
  deps: PipelineDeps,
  scene: Scene,
  globalSummary: string | undefined,
  styleGuide?: string
): Promise<Scene> {
  const prompt = await generateVisualPrompt(
    deps.text,
    {
      sceneSummary: scene.scene_summary,
      globalSummary,
      styleGuide,
      sourceSentences: scene.source_sentences,
    },
    deps.settings.styleGuide
  );
  return { ...scene, prompt };
}

/**
 * Generates the image for one scene. Billing failures propagate; any other
 * failure leaves the scene without an image.
 */
export async function processSceneImage(deps: PipelineDeps, scene: Scene): Promise<Scene> {
  if (!scene.prompt) {
    return { ...scene, image_url: undefined };
  }
  try {
    const imageUrl = await deps.images.generate(scene.prompt);
    return { ...scene, image_url: imageUrl };
  } catch (error) {
    if (isBillingFailure(error)) throw error;
    pipelineLogger.error(`Image generation failed for scene ${scene.scene_id}`, error, {
      sceneId: scene.scene_id,
      provider: deps.images.name,
    });
    return { ...scene, image_url: undefined };
  }
}

export interface NarratedScene {
  scene: SceneWithAudio;
  clip?: NarrationClip;
}

/** Narrates the scene summary; never rejects. */
export async function narrateScene(deps: PipelineDeps, scene: Scene): Promise<NarratedScene> {
  const result = await deps.narration.synthesize(scene.scene_id, scene.scene_summary);
  const narrated: SceneWithAudio = {
    ...scene,
    audio_url: result.audioUrl,
    audio_duration_seconds: result.durationSeconds,
  };
  return {
    scene: narrated,
    clip: result.audioUrl && result.filePath ? { sceneId: scene.scene_id, path: result.filePath } : undefined,
  };
}

export function collectClips(narrated: NarratedScene[]): NarrationClip[] {
  const clips: NarrationClip[] = [];
  for (const entry of narrated) {
    if (entry.clip) clips.push(entry.clip);
  }
  return clips;
}

export function describeFailure(error: unknown): { kind: string; message: string } {
  if (typeof error === 'object' && error !== null && 'kind' in error && typeof error.kind === 'string') {
    return { kind: error.kind, message: errorMessage(error) };
  }
  return { kind: 'upstream_failed', message: errorMessage(error) };
}
