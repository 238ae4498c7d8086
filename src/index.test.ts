import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from './config/settings';
import { App, createApp } from './index';
import type { Services } from './services';
import { ScenePipeline } from './services/pipeline';
import {
  FakeAudioToolkit,
  FakeImageProvider,
  FakeNarrationProvider,
  FakeTextClient,
  TEST_SETTINGS,
  respondByPrompt,
  scenesJson,
} from './test/fakes';
import { DEFAULT_OCR_HINT } from './services/vision';
import { BillingCreditError, UpstreamProviderError } from './utils/errors';

const BASE = 'http://localhost:8000';

let outputDir: string;
let textClient: FakeTextClient;
let ocrText: string;

function buildServices(generate: (prompt: string) => Promise<string>): Services {
  const scripted = respondByPrompt({
    SEGMENT_SCENES: () => scenesJson(['Fox at dawn', 'Fox at home']),
    GLOBAL_SUMMARY: () => 'A fox journey.',
    TITLE: () => 'Fox Day',
    KEY_FACTS: () => '- fox',
    VISUAL_PROMPT: (request) => `prompt for ${request.variables?.scene}`,
  });
  // Requests carrying an image are OCR calls
  const text = new FakeTextClient((request) => (request.images ? ocrText : scripted(request)));
  textClient = text;
  const images = new FakeImageProvider(generate);
  const narration = new FakeNarrationProvider(() => ({}));
  const audio = new FakeAudioToolkit({}, 0);
  const pipeline = new ScenePipeline({
    text,
    images,
    narration,
    audio,
    settings: { ...TEST_SETTINGS, audioOutputDir: outputDir },
  });
  return { text, images, narration, audio, pipeline };
}

function buildApp(
  generate: (prompt: string) => Promise<string> = async () => 'http://img/ok.png',
  env: NodeJS.ProcessEnv = {}
): App {
  const config = loadConfig({ ENVIRONMENT: 'test', TTS_OUTPUT_DIR: outputDir, ...env });
  return createApp(config, buildServices(generate));
}

function post(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`${BASE}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

beforeEach(async () => {
  outputDir = await mkdtemp(join(tmpdir(), 'app-'));
  ocrText = '  A fox wakes. It goes home.\n';
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  jest.restoreAllMocks();
  await rm(outputDir, { recursive: true, force: true });
});

describe('GET /health', () => {
  it('reports the provider without calling it', async () => {
    const response = await buildApp().fetch(new Request(`${BASE}/health`));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      status: 'ok',
      environment: 'test',
      imageProvider: 'fake',
      canGenerateImages: true,
      pipelineEngine: 'graph',
    });
  });
});

describe('POST /generate_image', () => {
  it('returns the image URL', async () => {
    const response = await buildApp().fetch(post('/generate_image', { prompt: 'a fox' }));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ image_url: 'http://img/ok.png' });
  });

  it('answers 402 on a billing failure', async () => {
    const app = buildApp(async () => {
      throw new BillingCreditError();
    });

    const response = await app.fetch(post('/generate_image', { prompt: 'a fox' }));

    expect(response.status).toBe(402);
    await expect(response.json()).resolves.toEqual({
      error: 'Image provider credit is insufficient. Please top up.',
      kind: 'payment_required',
    });
  });

  it('answers 502 with the provider message on an upstream failure', async () => {
    const app = buildApp(async () => {
      throw new UpstreamProviderError('socket hang up', 'Image generation failed');
    });

    const response = await app.fetch(post('/generate_image', { prompt: 'a fox' }));

    expect(response.status).toBe(502);
    await expect(response.json()).resolves.toEqual({
      error: 'Image generation failed: socket hang up',
      kind: 'upstream_failed',
      details: 'socket hang up',
    });
  });

  it('answers 500 for unexpected errors', async () => {
    const app = buildApp(async () => {
      throw new TypeError('undefined is not a function');
    });

    const response = await app.fetch(post('/generate_image', { prompt: 'a fox' }));

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      error: 'Internal server error',
      kind: 'internal',
      details: 'undefined is not a function',
    });
  });
});

describe('request validation', () => {
  it('rejects an empty text with the field named', async () => {
    const response = await buildApp().fetch(post('/segment', { text: '   ' }));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: 'Invalid request: text: text must not be empty',
      kind: 'invalid_request',
      details: ['text: text must not be empty'],
    });
  });

  it('rejects a body that is not JSON', async () => {
    const response = await buildApp().fetch(post('/segment', '{text:'));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({ kind: 'invalid_request', details: ['body must be valid JSON'] });
  });
});

describe('POST /segment', () => {
  it('returns the scenes', async () => {
    const response = await buildApp().fetch(post('/segment', { text: 'A fox wakes. It goes home.', max_scenes: 2 }));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      scenes: [
        { scene_id: 1, scene_summary: 'Fox at dawn' },
        { scene_id: 2, scene_summary: 'Fox at home' },
      ],
    });
  });
});

describe('routing', () => {
  it('lists the endpoints on a miss', async () => {
    const response = await buildApp().fetch(new Request(`${BASE}/nope`));

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toMatchObject({
      path: '/nope',
      availableEndpoints: { 'GET /health': 'Liveness and image provider readiness' },
    });
  });

  it('serves routes under the API prefix only', async () => {
    const app = buildApp(undefined, { API_PREFIX: '/api' });

    expect((await app.fetch(new Request(`${BASE}/api/health`))).status).toBe(200);
    expect((await app.fetch(new Request(`${BASE}/health`))).status).toBe(404);
  });
});

describe('CORS', () => {
  it('answers preflight with a wildcard by default', async () => {
    const response = await buildApp().fetch(
      new Request(`${BASE}/generate_visuals`, { method: 'OPTIONS', headers: { Origin: 'http://localhost:3000' } })
    );

    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
    expect(response.headers.get('Access-Control-Allow-Credentials')).toBeNull();
  });

  it('echoes an origin matching the regex and allows credentials', async () => {
    const app = buildApp(undefined, { CORS_ORIGIN_REGEX: '^https://[a-z]+\\.example\\.com$' });

    const allowed = await app.fetch(new Request(`${BASE}/health`, { headers: { Origin: 'https://app.example.com' } }));
    const denied = await app.fetch(new Request(`${BASE}/health`, { headers: { Origin: 'https://evil.test' } }));

    expect(allowed.headers.get('Access-Control-Allow-Origin')).toBe('https://app.example.com');
    expect(allowed.headers.get('Access-Control-Allow-Credentials')).toBe('true');
    expect(denied.headers.get('Access-Control-Allow-Origin')).toBeNull();
  });
});

describe('static files', () => {
  it('serves a generated clip with its media type', async () => {
    await writeFile(join(outputDir, 'clip.mp3'), Buffer.from([1, 2, 3]));

    const response = await buildApp().fetch(new Request(`${BASE}/static/audio/clip.mp3`));

    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('audio/mpeg');
    expect(new Uint8Array(await response.arrayBuffer())).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('refuses hidden files and missing files', async () => {
    await writeFile(join(outputDir, '.env'), 'OPENAI_API_KEY=test-secret');
    const app = buildApp();

    expect((await app.fetch(new Request(`${BASE}/static/audio/.env`))).status).toBe(404);
    expect((await app.fetch(new Request(`${BASE}/static/audio/missing.mp3`))).status).toBe(404);
  });
});

describe('POST /generate_visuals_stream', () => {
  function frames(body: string): string[] {
    return body.split('\n\n').filter((frame) => frame !== '');
  }

  it('streams progress frames ending in complete', async () => {
    const response = await buildApp().fetch(post('/generate_visuals_stream', { text: 'A fox wakes. It goes home.' }));

    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('text/event-stream');

    const all = frames(await response.text());
    expect(all.map((frame) => frame.split('\n')[0])).toEqual([
      'event: segmented',
      'event: summarized',
      'event: title',
      'event: prompt',
      'event: prompt',
      'event: image_start',
      'event: image_done',
      'event: image_start',
      'event: image_done',
      'event: complete',
    ]);
    expect(all[1]).toBe('event: summarized\ndata: {"global_summary":"A fox journey."}');
    expect(all[6]).toBe('event: image_done\ndata: {"scene_id":1,"image_url":"http://img/ok.png"}');
  });

  it('ends with an error frame when an image fails', async () => {
    const app = buildApp(async () => {
      throw new BillingCreditError('credit exhausted');
    });

    const all = frames(await (await app.fetch(post('/generate_visuals_stream', { text: 'A fox wakes.' }))).text());

    expect(all[all.length - 1]).toBe('event: error\ndata: {"kind":"payment_required","message":"credit exhausted"}');
  });
});

describe('OCR endpoints', () => {
  const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

  function upload(path: string, body: RequestInit['body'], contentType?: string): Request {
    return new Request(`${BASE}${path}`, {
      method: 'POST',
      headers: contentType ? { 'Content-Type': contentType } : {},
      body,
    });
  }

  function multipart(path: string, blob: Blob): Request {
    const form = new FormData();
    form.append('file', blob, 'page.png');
    return new Request(`${BASE}${path}`, { method: 'POST', body: form });
  }

  it('reads text from an image URL with the default hint', async () => {
    const response = await buildApp().fetch(post('/ocr/image_url', { image_url: 'https://example.com/page.png' }));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ extracted_text: 'A fox wakes. It goes home.' });
    expect(textClient.calls[0].user).toBe(DEFAULT_OCR_HINT);
    expect(textClient.calls[0].images?.[0].image).toEqual(new URL('https://example.com/page.png'));
  });

  it('rejects an image URL that is not absolute', async () => {
    const response = await buildApp().fetch(post('/ocr/image_url', { image_url: 'page.png' }));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({
      kind: 'invalid_request',
      details: ['image_url: image_url must be an absolute URL'],
    });
    expect(textClient.calls).toHaveLength(0);
  });

  it('reads a multipart upload and takes the hint from the query string', async () => {
    const app = buildApp();

    const response = await app.fetch(
      multipart('/ocr/upload?prompt_hint=Read%20the%20caption', new Blob([PNG], { type: 'image/png' }))
    );

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ extracted_text: 'A fox wakes. It goes home.' });
    expect(textClient.calls[0].user).toBe('Read the caption');
    expect(textClient.calls[0].images?.[0].mediaType).toBe('image/png');
    expect(textClient.calls[0].images?.[0].image).toEqual(PNG);
  });

  it('rejects a multipart upload that is not an image', async () => {
    const response = await buildApp().fetch(multipart('/ocr/upload', new Blob(['hello'], { type: 'text/plain' })));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({ details: ['file: expected an image, got "text/plain"'] });
  });

  it('reads a raw image body', async () => {
    const response = await buildApp().fetch(upload('/ocr/upload', PNG, 'image/png'));

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ extracted_text: 'A fox wakes. It goes home.' });
    expect(textClient.calls[0].images?.[0]).toEqual({ image: PNG, mediaType: 'image/png' });
  });

  it('rejects a raw body without an image content type', async () => {
    const response = await buildApp().fetch(upload('/ocr/upload', 'hello', 'text/plain'));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({
      kind: 'invalid_request',
      details: ['Content-Type must be an image type, got "text/plain"'],
    });
  });

  it('rejects an empty raw upload', async () => {
    const response = await buildApp().fetch(upload('/ocr/upload', new Uint8Array(0), 'image/png'));

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({ details: ['body: image upload is empty'] });
  });
});

describe('visuals from images', () => {
  const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

  it('runs the pipeline on uploaded text with max_scenes from the query string', async () => {
    const response = await buildApp().fetch(
      new Request(`${BASE}/generate_visuals_from_upload?max_scenes=1`, {
        method: 'POST',
        headers: { 'Content-Type': 'image/png' },
        body: PNG,
      })
    );

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      extracted_text: 'A fox wakes. It goes home.',
      result: {
        title: 'Fox Day',
        scenes: [{ scene_id: 1, scene_summary: 'Fox at dawn', image_url: 'http://img/ok.png' }],
      },
    });
    expect(textClient.callsFor('SEGMENT_SCENES')[0].variables).toEqual({ text: 'A fox wakes. It goes home.', max_scenes: 1 });
  });

  it('rejects a max_scenes query below one', async () => {
    const response = await buildApp().fetch(
      new Request(`${BASE}/generate_visuals_from_upload?max_scenes=0`, {
        method: 'POST',
        headers: { 'Content-Type': 'image/png' },
        body: PNG,
      })
    );

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toMatchObject({ kind: 'invalid_request' });
    expect(textClient.calls).toHaveLength(0);
  });

  it('runs the pipeline on text read from an image URL', async () => {
    const response = await buildApp().fetch(
      post('/generate_visuals_from_image_url', { image_url: 'https://example.com/page.png', max_scenes: 2 })
    );

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      extracted_text: 'A fox wakes. It goes home.',
      result: { scenes: [{ scene_id: 1 }, { scene_id: 2 }] },
    });
  });

  it('answers 400 when the image has no readable text', async () => {
    ocrText = '   ';

    const response = await buildApp().fetch(
      post('/generate_visuals_from_image_url', { image_url: 'https://example.com/blank.png' })
    );

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: 'Invalid request: image: no readable text found',
      kind: 'invalid_request',
      details: ['image: no readable text found'],
    });
    expect(textClient.callsFor('SEGMENT_SCENES')).toHaveLength(0);
  });
});
