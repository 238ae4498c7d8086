/**
 * Centralized prompt configuration
 * All language-model instructions for the pipeline are defined here.
 * Placeholders in `{braces}` are filled by the text-generation client.
 */

export interface PromptPair {
  system: string;
  user: string;
}

export const SYSTEM_PROMPTS = {
  SEGMENT_SCENES: {
    system: `You are a story editor preparing text for visual learners. Split the user's text into at most {max_scenes} story beats. Each beat is one short, concrete, depictable scene. Keep factual details intact: names, dates, places, numbers, distinctive objects, colors and actions. Do not over-summarize; keep the concrete nouns and attributes an illustrator needs. For every scene, list the original sentences you drew on by 1-based index, together with their exact text.`,
    user: `Text:

{text}

Respond with a JSON array only. Each element is an object with fields: scene_id (1-based integer), scene_summary (at most 30 words), source_sentence_indices (array of 1-based integers), source_sentences (array of strings, verbatim).`,
  },

  KEY_FACTS: {
    system: `Pick out the concrete facts an illustration must preserve. Prefer names, dates, locations, quantities, colors, distinctive objects and relationships.`,
    user: `Scene summary: {scene}

Reference snippets (verbatim):
{references}

Return at most {max_facts} bullets. Keep each bullet under 12 words.`,
  },

  VISUAL_PROMPT: {
    system: `You write concise, concrete prompts for an illustration model. Never ask for text, captions or watermarks in the image. Keep the critical details of the scene (names, numbers, locations, distinctive items, colors, relationships) so the picture stays informative.`,
    user: `Write a single-sentence image prompt for this scene (35-60 words, present tense).
Global context (keep scenes consistent): {global_context}
Style guide: {style_guide}
Reference material from the original text:
{references}
Scene: {scene}
Constraints: consistent characters and props; no text overlays; include composition cues (framing, foreground/background, camera distance); keep concrete facts and attributes from the scene.`,
  },

  GLOBAL_SUMMARY: {
    system: `You write one concise synopsis capturing the overall narrative, recurring characters, setting and tone, used to keep illustrations consistent.`,
    user: `Summarize the following text in 1-2 sentences (hard limit {max_chars} characters) for global visual context.

{text}`,
  },

  TITLE: {
    system: `You write concise, engaging educational titles that name the core topic precisely.`,
    user: `Write a short chapter title (at most {max_chars} characters) for the following content. Do not wrap it in quotes.

{text}`,
  },

  OCR: {
    system: '',
    user: `Extract all readable text from this image as plain text. Preserve line breaks.`,
  },
} as const satisfies Record<string, PromptPair>;

export type SystemPromptKey = keyof typeof SYSTEM_PROMPTS;

export function getPrompt(key: SystemPromptKey): PromptPair {
  return SYSTEM_PROMPTS[key];
}
