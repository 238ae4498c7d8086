// OCR endpoint handlers: read text from an image, optionally feed it into the pipeline

import { extractTextFromImageBytes, extractTextFromImageUrl } from '../services/vision';
import {
    OCR_IMAGE_URL_REQUEST_SCHEMA,
    UPLOAD_QUERY_SCHEMA,
    VISUALS_FROM_IMAGE_URL_REQUEST_SCHEMA,
} from '../types/zod-types';
import { ValidationError } from '../utils/errors';
import { apiLogger } from '../utils/logger';
import { jsonResponse } from '../utils/response';
import { RouteContext, parseQuery, readJsonBody } from './context';

export interface UploadedImage {
    mediaType: string;
    bytes: Uint8Array;
}

/**
 * Reads an uploaded image: either a multipart form with a `file` field,
 * or the raw image as the body with an image Content-Type
 */
export async function readUploadedImage(request: Request): Promise<UploadedImage> {
    const contentType = (request.headers.get('Content-Type') ?? '').toLowerCase();

    if (contentType.startsWith('multipart/form-data')) {
        const form = await request.formData();
        const file = form.get('file');
        if (!file || typeof file === 'string') {
            throw new ValidationError(['file: multipart field "file" with an image is required']);
        }
        if (!file.type.startsWith('image/')) {
            throw new ValidationError([`file: expected an image, got "${file.type || 'unknown'}"`]);
        }
        return { mediaType: file.type, bytes: new Uint8Array(await file.arrayBuffer()) };
    }

    const mediaType = contentType.split(';')[0].trim();
    if (!mediaType.startsWith('image/')) {
        throw new ValidationError([`Content-Type must be an image type, got "${mediaType || 'none'}"`]);
    }
    const bytes = new Uint8Array(await request.arrayBuffer());
    if (bytes.byteLength === 0) {
        throw new ValidationError(['body: image upload is empty']);
    }
    return { mediaType, bytes };
}

/**
 * POST /ocr/image_url
 */
export async function handleOcrImageUrl(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, OCR_IMAGE_URL_REQUEST_SCHEMA);
    const extractedText = await extractTextFromImageUrl(ctx.services.text, body.image_url, body.prompt_hint);
    return jsonResponse({ extracted_text: extractedText });
}

/**
 * POST /ocr/upload
 */
export async function handleOcrUpload(request: Request, ctx: RouteContext): Promise<Response> {
    const query = parseQuery(new URL(request.url), UPLOAD_QUERY_SCHEMA);
    const image = await readUploadedImage(request);
    const extractedText = await extractTextFromImageBytes(ctx.services.text, image.mediaType, image.bytes, query.prompt_hint);
    return jsonResponse({ extracted_text: extractedText });
}

/**
 * POST /generate_visuals_from_image_url
 * OCR on a remote image, then the visuals pipeline on the extracted text
 */
export async function handleVisualsFromImageUrl(request: Request, ctx: RouteContext): Promise<Response> {
    const body = await readJsonBody(request, VISUALS_FROM_IMAGE_URL_REQUEST_SCHEMA);
    const extractedText = await extractTextFromImageUrl(ctx.services.text, body.image_url, body.prompt_hint);
    return visualsFromText(extractedText, body.max_scenes, ctx);
}

/**
 * POST /generate_visuals_from_upload?max_scenes=<n>
 */
export async function handleVisualsFromUpload(request: Request, ctx: RouteContext): Promise<Response> {
    const query = parseQuery(new URL(request.url), UPLOAD_QUERY_SCHEMA);
    const image = await readUploadedImage(request);
    const extractedText = await extractTextFromImageBytes(ctx.services.text, image.mediaType, image.bytes, query.prompt_hint);
    return visualsFromText(extractedText, query.max_scenes, ctx);
}

async function visualsFromText(extractedText: string, maxScenes: number, ctx: RouteContext): Promise<Response> {
    if (!extractedText) {
        throw new ValidationError(['image: no readable text found']);
    }
    apiLogger.info('Extracted text from image', { characters: extractedText.length });
    const result = await ctx.services.pipeline.generateVisuals({ text: extractedText, maxScenes });
    return jsonResponse({ extracted_text: extractedText, result });
}
