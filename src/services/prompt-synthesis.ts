// Prompt synthesis: scene summary + context -> one image instruction

import { attempt, BestEffort } from '../utils/best-effort';
import { llmLogger } from '../utils/logger';
import { getPrompt } from '../utils/systemPrompts';
import type { TextGenerationClient } from './text-generation';

export interface VisualPromptInput {
  sceneSummary: string;
  globalSummary?: string;
  styleGuide?: string;
  sourceSentences?: string[];
}

const ELLIPSIS = '…';

export function truncateWithEllipsis(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  if (maxChars <= 0) return '';
  return value.slice(0, maxChars - 1) + ELLIPSIS;
}

const QUOTE_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['‘', '’'],
];

/** Removes one pair of matching quotes wrapping the whole string. */
export function stripWrappingQuotes(value: string): string {
  for (const [open, close] of QUOTE_PAIRS) {
    if (value.length >= 2 && value.startsWith(open) && value.endsWith(close)) {
      return value.slice(open.length, value.length - close.length).trim();
    }
  }
  return value;
}

export async function extractKeyFacts(
  client: TextGenerationClient,
  sceneSummary: string,
  sourceSentences: string[],
  maxFacts: number = 6
): Promise<BestEffort<string>> {
  const { system, user } = getPrompt('KEY_FACTS');
  const result = await attempt(() =>
    client.complete({
      system,
      user,
      variables: {
        scene: sceneSummary,
        references: sourceSentences.join('\n'),
        max_facts: maxFacts,
      },
    })
  );
  if (!result.success) {
    llmLogger.warn('Key fact extraction failed; continuing without facts', { error: result.error });
  }
  return result;
}

/**
 * Builds the single-sentence image prompt for a scene. The explicit style
 * guide wins over `defaultStyleGuide`; key facts are only attempted when
 * source sentences are available.
 */
export async function generateVisualPrompt(
  client: TextGenerationClient,
  input: VisualPromptInput,
  defaultStyleGuide: string = ''
): Promise<string> {
  const sources = input.sourceSentences ?? [];
  let references = sources.join('\n');

  if (sources.length > 0) {
    const facts = await extractKeyFacts(client, input.sceneSummary, sources);
    if (facts.success && facts.value.trim() !== '') {
      references = `Key facts to preserve:\n${facts.value.trim()}\n\n${references}`;
    }
  }

  const { system, user } = getPrompt('VISUAL_PROMPT');
  const prompt = await client.complete({
    system,
    user,
    variables: {
      scene: input.sceneSummary,
      global_context: input.globalSummary ?? '',
      style_guide: input.styleGuide || defaultStyleGuide,
      references,
    },
  });
  return prompt.trim();
}

export async function summarizeGlobalContext(
  client: TextGenerationClient,
  text: string,
  maxChars: number = 400
): Promise<string> {
  const { system, user } = getPrompt('GLOBAL_SUMMARY');
  const summary = await client.complete({
    system,
    user,
    variables: { text, max_chars: maxChars },
  });
  return truncateWithEllipsis(summary.trim(), maxChars);
}

export async function generateTitle(
  client: TextGenerationClient,
  text: string,
  maxChars: number = 80
): Promise<string> {
  const { system, user } = getPrompt('TITLE');
  const title = await client.complete({
    system,
    user,
    variables: { text, max_chars: maxChars },
  });
  return truncateWithEllipsis(stripWrappingQuotes(title.trim()), maxChars);
}
