// Health endpoint handler

import { jsonResponse } from '../utils/response';
import { RouteContext } from './context';

/**
 * GET /health
 * Reports liveness and whether the configured image provider has credentials
 */
export async function handleHealth(_request: Request, ctx: RouteContext): Promise<Response> {
    return jsonResponse({
        status: 'ok',
        environment: ctx.config.environment,
        imageProvider: ctx.services.images.name,
        canGenerateImages: ctx.services.images.isConfigured(),
        pipelineEngine: ctx.config.pipeline.engine,
    });
}
