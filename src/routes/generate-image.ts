// Single image endpoint handler

import { GENERATE_IMAGE_REQUEST_SCHEMA } from '../types/zod-types';
import { apiLogger } from '../utils/logger';
import { jsonResponse } from '../utils/response';
import { RouteContext, readJsonBody } from './context';

/**
 * POST /generate_image
 * Generates one image for a prompt. Billing failures answer 402, other provider failures 502.
 */
export async function handleGenerateImage(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, GENERATE_IMAGE_REQUEST_SCHEMA);
    apiLogger.info('Generating single image', { provider: ctx.services.images.name, seed: body.seed });
    const imageUrl = await ctx.services.pipeline.generateImage(body.prompt, body.seed);
    return jsonResponse({ image_url: imageUrl });
}
