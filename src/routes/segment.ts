// Segmentation endpoint handler

import { SEGMENT_REQUEST_SCHEMA } from '../types/zod-types';
import { jsonResponse } from '../utils/response';
import { RouteContext, readJsonBody } from './context';

/**
 * POST /segment
 * Splits text into scenes without prompts or images
 */
export async function handleSegment(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, SEGMENT_REQUEST_SCHEMA);
    const scenes = await ctx.services.pipeline.segment(body.text, body.max_scenes);
    return jsonResponse({ scenes });
}
