// Clip duration measurement: WAV header parsing, ffprobe, MP3 frame estimate

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import ffmpeg from 'fluent-ffmpeg';
import { errorMessage } from '../utils/errors';
import { audioLogger } from '../utils/logger';
import { Sleep, defaultSleep } from '../utils/retry';

export type DurationStrategy = (path: string) => Promise<number>;

/** Seconds of PCM audio described by a RIFF/WAVE header. */
export function parseWavDuration(buffer: Buffer): number {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('not a RIFF/WAVE file');
  }

  let byteRate = 0;
  let offset = 12;
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ' && body + 12 <= buffer.length) {
      byteRate = buffer.readUInt32LE(body + 8);
    } else if (chunkId === 'data') {
      if (!byteRate) throw new Error('WAV data chunk before fmt chunk');
      // Streamed WAVs may leave the size as a placeholder
      const available = buffer.length - body;
      const dataSize = chunkSize > available ? available : chunkSize;
      return dataSize / byteRate;
    }
    offset = body + chunkSize + (chunkSize % 2);
  }
  throw new Error('WAV file has no data chunk');
}

export async function readWavDuration(path: string): Promise<number> {
  return parseWavDuration(await readFile(path));
}

export function ffprobeDuration(path: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(path, (err, metadata) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      const duration = metadata.format.duration;
      if (typeof duration === 'number' && Number.isFinite(duration) && duration > 0) {
        resolve(duration);
      } else {
        reject(new Error('ffprobe reported no duration'));
      }
    });
  });
}

const MPEG1_LAYER3_KBPS = [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320];
const MPEG2_LAYER3_KBPS = [0, 8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160];

function id3v2Length(buffer: Buffer): number {
  if (buffer.length < 10 || buffer.toString('ascii', 0, 3) !== 'ID3') return 0;
  const size = ((buffer[6] & 0x7f) << 21) | ((buffer[7] & 0x7f) << 14) | ((buffer[8] & 0x7f) << 7) | (buffer[9] & 0x7f);
  return 10 + size;
}

/**
 * Constant-bitrate estimate from the first MPEG Layer III frame header.
 */
export function estimateMp3Duration(buffer: Buffer): number {
  let offset = id3v2Length(buffer);
  while (offset + 4 <= buffer.length) {
    if (buffer[offset] === 0xff && (buffer[offset + 1] & 0xe0) === 0xe0) {
      const version = (buffer[offset + 1] >> 3) & 0x03;
      const layer = (buffer[offset + 1] >> 1) & 0x03;
      const bitrateIndex = (buffer[offset + 2] >> 4) & 0x0f;
      if (version !== 1 && layer === 1 && bitrateIndex > 0 && bitrateIndex < 15) {
        const table = version === 3 ? MPEG1_LAYER3_KBPS : MPEG2_LAYER3_KBPS;
        const bitsPerSecond = table[bitrateIndex] * 1000;
        return ((buffer.length - offset) * 8) / bitsPerSecond;
      }
    }
    offset++;
  }
  throw new Error('no MPEG audio frame found');
}

export async function readMp3Duration(path: string): Promise<number> {
  return estimateMp3Duration(await readFile(path));
}

export function strategiesFor(path: string): DurationStrategy[] {
  switch (extname(path).toLowerCase()) {
    case '.wav':
      return [readWavDuration, ffprobeDuration];
    case '.mp3':
      return [ffprobeDuration, readMp3Duration];
    default:
      return [ffprobeDuration];
  }
}

export interface MeasureOptions {
  attempts?: number;
  delayMs?: number;
  sleep?: Sleep;
  strategies?: DurationStrategy[];
}

/**
 * Duration in seconds, or 0 when every strategy fails on every attempt.
 * Never throws.
 */
export async function measureAudioDuration(path: string, options: MeasureOptions = {}): Promise<number> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const delayMs = options.delayMs ?? 100;
  const sleep = options.sleep ?? defaultSleep;
  const strategies = options.strategies ?? strategiesFor(path);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    for (const strategy of strategies) {
      try {
        const duration = await strategy(path);
        if (Number.isFinite(duration) && duration >= 0) return duration;
      } catch (error) {
        audioLogger.debug(`Duration probe failed for ${path}`, { attempt, error: errorMessage(error) });
      }
    }
    if (attempt < attempts) {
      await sleep(delayMs);
    }
  }

  let size = -1;
  try {
    size = (await stat(path)).size;
  } catch (error) {
    audioLogger.debug(`Cannot stat ${path}`, { error: errorMessage(error) });
  }
  audioLogger.warn(`Duration fallback 0.0 for ${path}`, { size });
  return 0;
}
