import { access, chmod, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FakeAudioToolkit } from '../test/fakes';
import { ConfigurationError } from '../utils/errors';
import { FfmpegToolkit, buildConcatList, buildTimeline, mergeNarrationClips } from './audio-merge';

const CLIPS = [
  { sceneId: 1, path: '/clips/one.mp3' },
  { sceneId: 2, path: '/clips/two.mp3' },
  { sceneId: 3, path: '/clips/three.mp3' },
];

const DURATIONS = { '/clips/one.mp3': 2.0, '/clips/two.mp3': 3.5, '/clips/three.mp3': 1.0 };

describe('buildTimeline', () => {
  it('accumulates start offsets without gaps', () => {
    expect(buildTimeline([{ sceneId: 4, duration: 1.25 }, { sceneId: 5, duration: 0 }, { sceneId: 6, duration: 2 }])).toEqual([
      { scene_id: 4, start_sec: 0, duration_sec: 1.25 },
      { scene_id: 5, start_sec: 1.25, duration_sec: 0 },
      { scene_id: 6, start_sec: 1.25, duration_sec: 2 },
    ]);
  });
});

describe('buildConcatList', () => {
  it('quotes each path and escapes single quotes', () => {
    expect(buildConcatList(['/clips/a.mp3', "/clips/it's.mp3"])).toBe(
      "file '/clips/a.mp3'\nfile '/clips/it'\\''s.mp3'\n"
    );
  });
});

describe('mergeNarrationClips', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'audio-merge-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(outputDir, { recursive: true, force: true });
  });

  it('builds the timeline from per-clip durations and measures the merged file', async () => {
    const toolkit = new FakeAudioToolkit(DURATIONS, 6.52);
    let listContents = '';
    toolkit.concat = async (listFile, outputPath) => {
      listContents = await readFile(listFile, 'utf8');
      toolkit.concatCalls.push({ listFile, outputPath });
    };

    const merged = await mergeNarrationClips(CLIPS, { outputDir, toolkit });

    expect(merged.timeline).toEqual([
      { scene_id: 1, start_sec: 0, duration_sec: 2 },
      { scene_id: 2, start_sec: 2, duration_sec: 3.5 },
      { scene_id: 3, start_sec: 5.5, duration_sec: 1 },
    ]);
    expect(merged.totalDuration).toBe(6.52);
    expect(merged.fileName).toMatch(/^sequence_\d+_[0-9a-f]{6}\.mp3$/);
    expect(merged.outputPath).toBe(join(outputDir, merged.fileName));
    expect(listContents).toBe("file '/clips/one.mp3'\nfile '/clips/two.mp3'\nfile '/clips/three.mp3'\n");
    expect(toolkit.concatCalls).toHaveLength(1);
    await expect(access(toolkit.concatCalls[0].listFile)).rejects.toThrow();
  });

  it('fails fast when ffmpeg is unavailable', async () => {
    const toolkit = new FakeAudioToolkit(DURATIONS, 6.5);
    toolkit.available = false;

    await expect(mergeNarrationClips(CLIPS, { outputDir, toolkit })).rejects.toBeInstanceOf(ConfigurationError);
    expect(toolkit.concatCalls).toHaveLength(0);
  });

  it('removes the list file when concatenation fails', async () => {
    const toolkit = new FakeAudioToolkit(DURATIONS, 6.5);
    let listPath = '';
    toolkit.concat = async (listFile) => {
      listPath = listFile;
      throw new Error('ffmpeg exited with code 1');
    };

    await expect(mergeNarrationClips(CLIPS, { outputDir, toolkit })).rejects.toThrow('ffmpeg exited with code 1');
    await expect(access(listPath)).rejects.toThrow();
  });

  it('rejects an empty clip list', async () => {
    await expect(mergeNarrationClips([], { outputDir, toolkit: new FakeAudioToolkit({}, 0) })).rejects.toThrow(
      'No audio clips to merge'
    );
  });
});

describe('FfmpegToolkit.isConcatAvailable', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await mkdtemp(join(tmpdir(), 'ffmpeg-bin-'));
  });

  afterEach(async () => {
    await rm(binDir, { recursive: true, force: true });
  });

  it('accepts a configured executable', async () => {
    const binary = join(binDir, 'ffmpeg');
    await writeFile(binary, '#!/bin/sh\n');
    await chmod(binary, 0o755);

    await expect(new FfmpegToolkit(binary).isConcatAvailable()).resolves.toBe(true);
  });

  it('rejects a configured path that is missing or not executable', async () => {
    const plain = join(binDir, 'ffmpeg-plain');
    await writeFile(plain, 'not a program');
    await chmod(plain, 0o644);

    await expect(new FfmpegToolkit(join(binDir, 'missing')).isConcatAvailable()).resolves.toBe(false);
    await expect(new FfmpegToolkit(plain).isConcatAvailable()).resolves.toBe(false);
  });
});
