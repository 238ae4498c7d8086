// Fetch handler: routes requests to endpoint handlers

import type { Services } from './services';
import { AppConfig } from './types/env';
import { RouteContext, RouteHandler } from './routes/context';
import { handleGenerateImage } from './routes/generate-image';
import { handleHealth } from './routes/health';
import {
  handleOcrImageUrl,
  handleOcrUpload,
  handleVisualsFromImageUrl,
  handleVisualsFromUpload,
} from './routes/ocr';
import { handleSegment } from './routes/segment';
import { handleStatic } from './routes/static';
import {
  handleGenerateVisuals,
  handleGenerateVisualsSingleAudio,
  handleGenerateVisualsStream,
  handleGenerateVisualsWithAudio,
} from './routes/visuals';
import { apiLogger } from './utils/logger';
import { corsResponse, errorResponse, notFoundResponse, withCors } from './utils/response';

interface Route {
  method: 'GET' | 'POST';
  path: string;
  handler: RouteHandler;
  description: string;
}

const ROUTES: Route[] = [
  { method: 'GET', path: '/health', handler: handleHealth, description: 'Liveness and image provider readiness' },
  { method: 'POST', path: '/segment', handler: handleSegment, description: 'Split text into scenes' },
  { method: 'POST', path: '/generate_image', handler: handleGenerateImage, description: 'Generate one image for a prompt' },
  { method: 'POST', path: '/generate_visuals', handler: handleGenerateVisuals, description: 'Scenes with prompts and images' },
  {
    method: 'POST',
    path: '/generate_visuals_with_audio',
    handler: handleGenerateVisualsWithAudio,
    description: 'Scenes with images and per-scene narration',
  },
  {
    method: 'POST',
    path: '/generate_visuals_single_audio',
    handler: handleGenerateVisualsSingleAudio,
    description: 'Scenes with images and one merged narration track',
  },
  {
    method: 'POST',
    path: '/generate_visuals_stream',
    handler: handleGenerateVisualsStream,
    description: 'Server-Sent Events progress feed',
  },
  { method: 'POST', path: '/ocr/image_url', handler: handleOcrImageUrl, description: 'Read text from an image URL' },
  { method: 'POST', path: '/ocr/upload', handler: handleOcrUpload, description: 'Read text from an uploaded image' },
  {
    method: 'POST',
    path: '/generate_visuals_from_image_url',
    handler: handleVisualsFromImageUrl,
    description: 'OCR an image URL, then generate visuals',
  },
  {
    method: 'POST',
    path: '/generate_visuals_from_upload',
    handler: handleVisualsFromUpload,
    description: 'OCR an uploaded image, then generate visuals',
  },
];

export interface App {
  fetch(request: Request): Promise<Response>;
}

export function createApp(config: AppConfig, services: Services): App {
  const ctx: RouteContext = { config, services };
  const staticPattern = new RegExp(`^${escapeRegExp(config.staticPrefix)}/(audio|images)/([^/]+)$`);

  async function dispatch(request: Request): Promise<Response> {
    const url = new URL(request.url);

    if (request.method === 'GET') {
      const match = staticPattern.exec(url.pathname);
      if (match) {
        return handleStatic(match[1] === 'audio' ? 'audio' : 'images', match[2], ctx);
      }
    }

    const path = stripPrefix(url.pathname, config.apiPrefix);
    const route = ROUTES.find((candidate) => candidate.method === request.method && candidate.path === path);
    if (!route) {
      return notFoundResponse(request.method, url.pathname, availableEndpoints(config.apiPrefix));
    }

    const startTime = Date.now();
    try {
      const response = await route.handler(request, ctx);
      apiLogger.info(`${request.method} ${url.pathname} ${response.status}`, { durationMs: Date.now() - startTime });
      return response;
    } catch (error) {
      const response = errorResponse(error);
      apiLogger.warn(`${request.method} ${url.pathname} ${response.status}`, {
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      return response;
    }
  }

  return {
    async fetch(request: Request): Promise<Response> {
      // Handle CORS preflight
      if (request.method === 'OPTIONS') {
        return corsResponse(request, config.cors);
      }
      return withCors(await dispatch(request), request, config.cors);
    },
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function stripPrefix(pathname: string, prefix: string): string | null {
  if (!prefix) return pathname;
  if (pathname === prefix) return '/';
  return pathname.startsWith(`${prefix}/`) ? pathname.slice(prefix.length) : null;
}

function availableEndpoints(prefix: string): Record<string, string> {
  const endpoints: Record<string, string> = {};
  for (const route of ROUTES) {
    endpoints[`${route.method} ${prefix}${route.path}`] = route.description;
  }
  return endpoints;
}
