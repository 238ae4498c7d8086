// Common response utilities for API endpoints

import { AppConfig } from '../types/env';
import { AppError, UpstreamProviderError, ValidationError, errorMessage } from './errors';
import { apiLogger } from './logger';

/**
 * Creates a JSON response
 */
export function jsonResponse(data: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(data), {
        status,
        headers: {
            'Content-Type': 'application/json',
        },
    });
}

/**
 * Maps an error to `{ error, kind, details }` with the status its kind carries
 */
export function errorResponse(error: unknown): Response {
    if (error instanceof AppError) {
        let details: string | string[] | undefined;
        if (error instanceof UpstreamProviderError) details = error.upstreamMessage;
        if (error instanceof ValidationError) details = error.issues;
        return jsonResponse({ error: error.message, kind: error.kind, details }, error.status);
    }
    apiLogger.error('Unhandled error', error);
    return jsonResponse({ error: 'Internal server error', kind: 'internal', details: errorMessage(error) }, 500);
}

/**
 * Resolves the Access-Control-Allow-Origin value for a request, or null when the origin is not allowed
 */
export function allowedOrigin(origin: string | null, cors: AppConfig['cors']): string | null {
    if (cors.originRegex) {
        return origin && new RegExp(cors.originRegex).test(origin) ? origin : null;
    }
    if (cors.origins.includes('*')) return '*';
    return origin && cors.origins.includes(origin) ? origin : null;
}

function corsHeaders(request: Request, cors: AppConfig['cors']): Record<string, string> {
    const origin = allowedOrigin(request.headers.get('Origin'), cors);
    if (!origin) return {};
    const headers: Record<string, string> = {
        'Access-Control-Allow-Origin': origin,
        'Access-Control-Allow-Methods': 'POST, GET, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type, Authorization',
    };
    if (origin !== '*') {
        headers['Access-Control-Allow-Credentials'] = 'true';
        headers['Vary'] = 'Origin';
    }
    return headers;
}

/**
 * Creates a CORS preflight response
 */
export function corsResponse(request: Request, cors: AppConfig['cors']): Response {
    return new Response(null, { status: 204, headers: corsHeaders(request, cors) });
}

/**
 * Copies the response with CORS headers added
 */
export function withCors(response: Response, request: Request, cors: AppConfig['cors']): Response {
    const headers = new Headers(response.headers);
    for (const [name, value] of Object.entries(corsHeaders(request, cors))) {
        headers.set(name, value);
    }
    return new Response(response.body, { status: response.status, statusText: response.statusText, headers });
}

/**
 * Creates a 404 not found response with available endpoints
 */
export function notFoundResponse(method: string, path: string, availableEndpoints: Record<string, string>): Response {
    return jsonResponse({
        error: 'Not found',
        message: `The endpoint '${path}' does not exist.`,
        method,
        path,
        availableEndpoints,
    }, 404);
}

export interface SseEvent {
    type: string;
}

/**
 * One SSE frame: `event: <type>` then the remaining fields as JSON
 */
export function formatSseEvent<E extends SseEvent>(event: E): string {
    const { type, ...data } = event;
    return `event: ${type}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Streams events produced by `run` as Server-Sent Events. Events sent after
 * the client disconnects are dropped.
 */
export function sseResponse<E extends SseEvent>(
    run: (send: (event: E) => void) => Promise<void>,
    signal?: AbortSignal
): Response {
    const encoder = new TextEncoder();
    let closed = false;

    const stream = new ReadableStream<Uint8Array>({
        async start(controller) {
            const send = (event: E): void => {
                if (closed || signal?.aborted) return;
                controller.enqueue(encoder.encode(formatSseEvent(event)));
            };
            try {
                await run(send);
            } catch (error) {
                apiLogger.error('Event stream failed', error);
            } finally {
                if (!closed) {
                    closed = true;
                    controller.close();
                }
            }
        },
        cancel() {
            closed = true;
        },
    });

    return new Response(stream, {
        status: 200,
        headers: {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache',
            'Connection': 'keep-alive',
        },
    });
}
