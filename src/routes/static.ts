// Serves generated audio and images from the output directories

import { readFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { StaticKind, mediaTypeForFile } from '../utils/storage';
import { jsonResponse } from '../utils/response';
import { RouteContext } from './context';

function directoryFor(kind: StaticKind, ctx: RouteContext): string {
    return kind === 'audio' ? ctx.config.tts.outputDir : ctx.config.image.outputDir;
}

/**
 * GET {STATIC_PREFIX}/audio/<file> and {STATIC_PREFIX}/images/<file>
 * Only plain file names are served; anything with a path component is rejected.
 */
export async function handleStatic(kind: StaticKind, fileName: string, ctx: RouteContext): Promise<Response> {
    let decoded: string;
    try {
        decoded = decodeURIComponent(fileName);
    } catch {
        return jsonResponse({ error: 'Not found' }, 404);
    }
    if (!decoded || decoded !== basename(decoded) || decoded.startsWith('.')) {
        return jsonResponse({ error: 'Not found' }, 404);
    }

    let data: Buffer;
    try {
        data = await readFile(join(directoryFor(kind, ctx), decoded));
    } catch {
        return jsonResponse({ error: 'Not found' }, 404);
    }

    return new Response(new Uint8Array(data), {
        status: 200,
        headers: {
            'Content-Type': mediaTypeForFile(decoded),
            'Content-Length': String(data.byteLength),
            'Cache-Control': 'public, max-age=3600',
        },
    });
}
