// Wire models shared by services, pipeline and routes.
// Field names follow the JSON contract (snake_case).

export interface Scene {
  scene_id: number;
  scene_summary: string;
  source_sentence_indices?: number[];
  source_sentences?: string[];
  prompt?: string;
  image_url?: string;
}

export interface SceneWithAudio extends Scene {
  audio_url?: string;
  audio_duration_seconds?: number;
}

export interface TimelineEntry {
  scene_id: number;
  start_sec: number;
  duration_sec: number;
}

export interface VisualsResult {
  title?: string;
  scenes: Scene[];
}

export interface VisualsWithAudioResult {
  title?: string;
  scenes: SceneWithAudio[];
}

export interface SingleAudioResult {
  title?: string;
  audio_url: string;
  duration_seconds: number;
  timeline: TimelineEntry[];
  scenes: SceneWithAudio[];
}

export type AspectRatio = '16:9' | '1:1' | '9:16' | '4:3' | '3:2' | (string & {});

/** Provider-shaped input for one image-generation call. Rebuilt per attempt. */
export interface ImageRequestPayload {
  prompt: string;
  aspect_ratio?: AspectRatio;
  width?: number;
  height?: number;
  seed?: number;
  [key: string]: unknown;
}

export type PipelineEvent =
  | { type: 'segmented'; scenes: Scene[] }
  | { type: 'summarized'; global_summary: string | null }
  | { type: 'title'; title: string }
  | { type: 'prompt'; scene_id: number; prompt: string }
  | { type: 'image_start'; scene_id: number }
  | { type: 'image_done'; scene_id: number; image_url: string }
  | { type: 'narration_start'; scene_id: number }
  | { type: 'narration_done'; scene_id: number; audio_url: string | null; audio_duration_seconds: number | null }
  | { type: 'merge_start'; clips: number }
  | { type: 'merge_done'; audio_url: string; duration_seconds: number; timeline: TimelineEntry[] }
  | { type: 'complete'; title?: string; scenes: SceneWithAudio[] }
  | { type: 'error'; kind: string; message: string };
