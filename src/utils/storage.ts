// Local output storage for generated audio and images

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

export type StaticKind = 'audio' | 'images';

export function shortId(length: number = 6): string {
  return uuidv4().replace(/-/g, '').slice(0, length);
}

export function sanitizeFileComponent(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, 80);
}

function stamp(): string {
  return `${Date.now()}_${shortId()}`;
}

export function buildAudioFileName(sceneId: number, voice: string, extension: string): string {
  return `scene_${sceneId}_${sanitizeFileComponent(voice)}_${stamp()}.${extension}`;
}

export function buildImageFileName(extension: string): string {
  return `img_${stamp()}.${extension}`;
}

export function buildSequenceFileNames(): { listFile: string; outputFile: string } {
  const suffix = stamp();
  return {
    listFile: `concat_${suffix}.txt`,
    outputFile: `sequence_${suffix}.mp3`,
  };
}

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/** Writes `data` under `dir`, creating the directory if needed, and returns the full path. */
export async function writeOutputFile(dir: string, fileName: string, data: Uint8Array | string): Promise<string> {
  await ensureDir(dir);
  const filePath = join(dir, fileName);
  await writeFile(filePath, data);
  return filePath;
}

export function toStaticUrl(staticPrefix: string, kind: StaticKind, fileName: string): string {
  const prefix = staticPrefix.endsWith('/') ? staticPrefix.slice(0, -1) : staticPrefix;
  return `${prefix}/${kind}/${fileName}`;
}

const EXTENSIONS_BY_MEDIA_TYPE: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/ogg': 'ogg',
  'audio/aac': 'aac',
  'audio/flac': 'flac',
};

export function extensionForMediaType(mediaType: string | undefined, fallback: string): string {
  if (!mediaType) return fallback;
  return EXTENSIONS_BY_MEDIA_TYPE[mediaType.toLowerCase()] ?? fallback;
}

const MEDIA_TYPES_BY_EXTENSION: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  ogg: 'audio/ogg',
  aac: 'audio/aac',
  flac: 'audio/flac',
};

export function mediaTypeForFile(fileName: string): string {
  const extension = fileName.split('.').pop()?.toLowerCase() ?? '';
  return MEDIA_TYPES_BY_EXTENSION[extension] ?? 'application/octet-stream';
}
