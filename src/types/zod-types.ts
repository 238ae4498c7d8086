import { z } from "zod";

// Fields of one segmentation record (sentence indices are 1-based), read leniently: each field is parsed on
// its own so a bad field degrades instead of discarding the record.
export const SEGMENT_SUMMARY_SCHEMA = z.string();
export const SEGMENT_INDICES_SCHEMA = z.array(z.number().int().positive());
export const SEGMENT_SENTENCES_SCHEMA = z.array(z.string());

// Request bodies
export const SEGMENT_REQUEST_SCHEMA = z.object({
    text: z.string().trim().min(1, 'text must not be empty'),
    max_scenes: z.number().int().min(1).default(8),
});

export const GENERATE_IMAGE_REQUEST_SCHEMA = z.object({
    prompt: z.string().trim().min(1, 'prompt must not be empty'),
    seed: z.number().int().optional(),
});

export const GENERATE_VISUALS_REQUEST_SCHEMA = SEGMENT_REQUEST_SCHEMA.extend({
    style_guide: z.string().trim().min(1).optional(),
});

export const GENERATE_VISUALS_STREAM_REQUEST_SCHEMA = GENERATE_VISUALS_REQUEST_SCHEMA.extend({
    with_audio: z.boolean().default(false),
});

export const OCR_IMAGE_URL_REQUEST_SCHEMA = z.object({
    image_url: z.string().trim().url('image_url must be an absolute URL'),
    prompt_hint: z.string().optional(),
});

export const VISUALS_FROM_IMAGE_URL_REQUEST_SCHEMA = OCR_IMAGE_URL_REQUEST_SCHEMA.extend({
    max_scenes: z.number().int().min(1).default(8),
});

// Query string of the upload endpoints (the body carries the image)
export const UPLOAD_QUERY_SCHEMA = z.object({
    max_scenes: z.coerce.number().int().min(1).default(8),
    prompt_hint: z.string().optional(),
});

export type SegmentRequest = z.infer<typeof SEGMENT_REQUEST_SCHEMA>;
export type GenerateVisualsRequest = z.infer<typeof GENERATE_VISUALS_REQUEST_SCHEMA>;
export type GenerateImageRequest = z.infer<typeof GENERATE_IMAGE_REQUEST_SCHEMA>;
export type GenerateVisualsStreamRequest = z.infer<typeof GENERATE_VISUALS_STREAM_REQUEST_SCHEMA>;
export type OcrImageUrlRequest = z.infer<typeof OCR_IMAGE_URL_REQUEST_SCHEMA>;
export type VisualsFromImageUrlRequest = z.infer<typeof VISUALS_FROM_IMAGE_URL_REQUEST_SCHEMA>;
