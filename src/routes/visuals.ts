// Visuals pipeline endpoint handlers

import { PipelineEvent } from '../types';
import { GENERATE_VISUALS_REQUEST_SCHEMA, GENERATE_VISUALS_STREAM_REQUEST_SCHEMA } from '../types/zod-types';
import { jsonResponse, sseResponse } from '../utils/response';
import { RouteContext, readJsonBody } from './context';

/**
 * POST /generate_visuals
 * Full pipeline: scenes with prompts and images
 */
export async function handleGenerateVisuals(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, GENERATE_VISUALS_REQUEST_SCHEMA);
    const result = await ctx.services.pipeline.generateVisuals({
        text: body.text,
        maxScenes: body.max_scenes,
        styleGuide: body.style_guide,
    });
    return jsonResponse(result);
}

/**
 * POST /generate_visuals_with_audio
 * Full pipeline plus one narration clip per scene
 */
export async function handleGenerateVisualsWithAudio(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, GENERATE_VISUALS_REQUEST_SCHEMA);
    const result = await ctx.services.pipeline.generateVisualsWithAudio({
        text: body.text,
        maxScenes: body.max_scenes,
        styleGuide: body.style_guide,
    });
    return jsonResponse(result);
}

/**
 * POST /generate_visuals_single_audio
 * Full pipeline with the narration clips merged into one track and a timeline
 */
export async function handleGenerateVisualsSingleAudio(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, GENERATE_VISUALS_REQUEST_SCHEMA);
    const result = await ctx.services.pipeline.generateVisualsSingleAudio({
        text: body.text,
        maxScenes: body.max_scenes,
        styleGuide: body.style_guide,
    });
    return jsonResponse(result);
}

/**
 * POST /generate_visuals_stream
 * Server-Sent Events progress feed ending in one `complete` or `error` event
 */
export async function handleGenerateVisualsStream(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, GENERATE_VISUALS_STREAM_REQUEST_SCHEMA);
    return sseResponse<PipelineEvent>(
        (send) => ctx.services.pipeline.streamVisuals(
            {
                text: body.text,
                maxScenes: body.max_scenes,
                styleGuide: body.style_guide,
                withAudio: body.with_audio,
                signal: request.signal,
            },
            send
        ),
        request.signal
    );
}
