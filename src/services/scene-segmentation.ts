// Scene segmentation: raw text -> ordered, renumbered story beats

import { Scene } from '../types';
import {
  SEGMENT_INDICES_SCHEMA,
  SEGMENT_SENTENCES_SCHEMA,
  SEGMENT_SUMMARY_SCHEMA,
} from '../types/zod-types';
import { MalformedModelOutputError } from '../utils/errors';
import { pipelineLogger } from '../utils/logger';
import { getPrompt } from '../utils/systemPrompts';
import type { TextGenerationClient } from './text-generation';

const SUMMARY_FIELDS = ['scene_summary', 'summary'] as const;
const INDEX_FIELDS = ['source_sentence_indices', 'source_indices'] as const;
const SENTENCE_FIELDS = ['source_sentences', 'sources'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the completion as JSON, falling back to the outermost `[...]`
 * substring when the model wrapped the payload in prose or code fences.
 */
export function parseSegmentationPayload(raw: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(raw.trim());
  } catch {
    const match = raw.match(/\[[\s\S]*\]/);
    if (!match) {
      throw new MalformedModelOutputError(`LLM returned non-JSON output: ${raw.slice(0, 200)}`);
    }
    try {
      data = JSON.parse(match[0]);
    } catch {
      throw new MalformedModelOutputError(`LLM returned unparseable JSON: ${match[0].slice(0, 200)}`);
    }
  }

  if (Array.isArray(data)) return data;
  if (isRecord(data) && Array.isArray(data.scenes)) return data.scenes;
  throw new MalformedModelOutputError(`Expected a JSON array of scenes, got ${typeof data}`);
}

function firstField(record: Record<string, unknown>, fields: readonly string[]): unknown {
  for (const field of fields) {
    if (record[field] !== undefined && record[field] !== null) return record[field];
  }
  return undefined;
}

/**
 * Turns one model record into a scene. Bad or missing fields degrade to
 * empty values; index/sentence lists are kept the same length.
 */
export function normalizeSceneRecord(item: unknown, sceneId: number): Scene {
  if (!isRecord(item)) {
    return {
      scene_id: sceneId,
      scene_summary: typeof item === 'string' ? item : '',
      source_sentence_indices: [],
      source_sentences: [],
    };
  }

  const summary = SEGMENT_SUMMARY_SCHEMA.safeParse(firstField(item, SUMMARY_FIELDS));
  const indices = SEGMENT_INDICES_SCHEMA.safeParse(firstField(item, INDEX_FIELDS));
  const sentences = SEGMENT_SENTENCES_SCHEMA.safeParse(firstField(item, SENTENCE_FIELDS));

  let sourceIndices: number[] | undefined = indices.success ? indices.data : [];
  let sourceSentences: string[] | undefined = sentences.success ? sentences.data : [];

  if (sourceIndices.length > 0 && sourceSentences.length > 0) {
    const length = Math.min(sourceIndices.length, sourceSentences.length);
    sourceIndices = sourceIndices.slice(0, length);
    sourceSentences = sourceSentences.slice(0, length);
  } else if (sourceIndices.length > 0) {
    sourceSentences = undefined;
  } else if (sourceSentences.length > 0) {
    sourceIndices = undefined;
  }

  const scene: Scene = {
    scene_id: sceneId,
    scene_summary: summary.success ? summary.data.trim() : '',
  };
  if (sourceIndices) scene.source_sentence_indices = sourceIndices;
  if (sourceSentences) scene.source_sentences = sourceSentences;
  return scene;
}

export async function segmentTextIntoScenes(
  client: TextGenerationClient,
  text: string,
  maxScenes: number = 8
): Promise<Scene[]> {
  const limit = Math.max(1, Math.floor(maxScenes));
  const { system, user } = getPrompt('SEGMENT_SCENES');
  const raw = await client.complete({
    system,
    user,
    variables: { text, max_scenes: limit },
  });

  const records = parseSegmentationPayload(raw);
  if (records.length > limit) {
    pipelineLogger.warn('Segmentation over-produced; truncating', { produced: records.length, limit });
  }

  return records.slice(0, limit).map((item, index) => normalizeSceneRecord(item, index + 1));
}
