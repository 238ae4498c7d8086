// OCR: read the text in an image through the multimodal text-generation model

import { ValidationError } from '../utils/errors';
import { getPrompt } from '../utils/systemPrompts';
import type { TextGenerationClient } from './text-generation';

export const DEFAULT_OCR_HINT = getPrompt('OCR').user;

function parseImageUrl(imageUrl: string): URL {
  try {
    return new URL(imageUrl);
  } catch {
    throw new ValidationError([`image_url: not an absolute URL: ${imageUrl}`]);
  }
}

export async function extractTextFromImageUrl(
  client: TextGenerationClient,
  imageUrl: string,
  hint?: string
): Promise<string> {
  const image = parseImageUrl(imageUrl);
  const text = await client.complete({
    user: hint || DEFAULT_OCR_HINT,
    images: [{ image }],
    temperature: 0,
  });
  return text.trim();
}

export async function extractTextFromImageBytes(
  client: TextGenerationClient,
  mediaType: string,
  bytes: Uint8Array,
  hint?: string
): Promise<string> {
  const text = await client.complete({
    user: hint || DEFAULT_OCR_HINT,
    images: [{ image: bytes, mediaType }],
    temperature: 0,
  });
  return text.trim();
}
