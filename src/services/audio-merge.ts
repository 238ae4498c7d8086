// Concatenates narration clips into one track and records where each scene starts

import { access, rm, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { delimiter, join, resolve } from 'node:path';
import ffmpeg from 'fluent-ffmpeg';
import { TimelineEntry } from '../types';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { audioLogger } from '../utils/logger';
import { buildSequenceFileNames, ensureDir } from '../utils/storage';
import { measureAudioDuration } from './audio-duration';

export interface AudioToolkit {
  probeDuration(filePath: string): Promise<number>;
  isConcatAvailable(): Promise<boolean>;
  /** Lossless concatenation of the files named in a concat-demuxer list. */
  concat(listFile: string, outputPath: string): Promise<void>;
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class FfmpegToolkit implements AudioToolkit {
  private readonly ffmpegPath?: string;

  constructor(ffmpegPath?: string) {
    this.ffmpegPath = ffmpegPath;
  }

  probeDuration(filePath: string): Promise<number> {
    return measureAudioDuration(filePath);
  }

  async isConcatAvailable(): Promise<boolean> {
    if (this.ffmpegPath) return isExecutable(this.ffmpegPath);

    const names = process.platform === 'win32' ? ['ffmpeg.exe', 'ffmpeg'] : ['ffmpeg'];
    for (const dir of (process.env.PATH ?? '').split(delimiter)) {
      if (!dir) continue;
      for (const name of names) {
        if (await isExecutable(join(dir, name))) return true;
      }
    }
    return false;
  }

  concat(listFile: string, outputPath: string): Promise<void> {
    return new Promise((resolvePromise, reject) => {
      const command = ffmpeg();
      if (this.ffmpegPath) command.setFfmpegPath(this.ffmpegPath);
      command
        .input(listFile)
        .inputOptions(['-f', 'concat', '-safe', '0'])
        .outputOptions(['-c', 'copy'])
        .output(outputPath)
        .on('end', () => resolvePromise())
        .on('error', (error: Error) => reject(error))
        .run();
    });
  }
}

export interface NarrationClip {
  sceneId: number;
  path: string;
}

export interface MergedNarration {
  outputPath: string;
  fileName: string;
  totalDuration: number;
  timeline: TimelineEntry[];
}

export function buildTimeline(durations: { sceneId: number; duration: number }[]): TimelineEntry[] {
  const timeline: TimelineEntry[] = [];
  let cursor = 0;
  for (const { sceneId, duration } of durations) {
    timeline.push({ scene_id: sceneId, start_sec: cursor, duration_sec: duration });
    cursor += duration;
  }
  return timeline;
}

/** One `file '<path>'` line per clip, single quotes escaped for the concat demuxer. */
export function buildConcatList(paths: string[]): string {
  return paths.map((path) => `file '${resolve(path).replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export interface MergeOptions {
  outputDir: string;
  toolkit: AudioToolkit;
}

export async function mergeNarrationClips(clips: NarrationClip[], options: MergeOptions): Promise<MergedNarration> {
  if (clips.length === 0) {
    throw new Error('No audio clips to merge');
  }
  const { toolkit, outputDir } = options;

  const durations: { sceneId: number; duration: number }[] = [];
  for (const clip of clips) {
    durations.push({ sceneId: clip.sceneId, duration: await toolkit.probeDuration(clip.path) });
  }
  const timeline = buildTimeline(durations);

  if (!(await toolkit.isConcatAvailable())) {
    throw new ConfigurationError('ffmpeg not found on PATH; install ffmpeg or set FFMPEG_PATH to merge narration');
  }

  await ensureDir(outputDir);
  const { listFile, outputFile } = buildSequenceFileNames();
  const listPath = join(outputDir, listFile);
  const outputPath = join(outputDir, outputFile);

  try {
    await writeFile(listPath, buildConcatList(clips.map((clip) => clip.path)), 'utf8');
    await audioLogger.logApiCall('ffmpeg.concat', () => toolkit.concat(listPath, outputPath), {
      clips: clips.length,
    });
  } finally {
    try {
      await rm(listPath, { force: true });
    } catch (error) {
      audioLogger.warn(`Could not remove concat list ${listPath}`, { error: errorMessage(error) });
    }
  }

  const totalDuration = await toolkit.probeDuration(outputPath);
  return { outputPath, fileName: outputFile, totalDuration, timeline };
}
