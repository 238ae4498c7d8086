// Text generation capability using Vercel AI SDK

import { generateText } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { ConfigurationError, UpstreamProviderError, errorMessage } from '../utils/errors';
import { llmLogger } from '../utils/logger';

export type TemplateVariables = Record<string, string | number>;

export interface ImageAttachment {
  image: URL | Uint8Array;
  mediaType?: string;
}

export interface CompletionRequest {
  system?: string;
  user: string;
  variables?: TemplateVariables;
  images?: ImageAttachment[];
  temperature?: number;
}

/**
 * The one seam every reasoning step goes through (segmentation, prompts,
 * summaries, titles, OCR). Swapping the model provider means swapping this.
 */
export interface TextGenerationClient {
  complete(request: CompletionRequest): Promise<string>;
}

/** Replaces `{name}` placeholders; unknown placeholders are left as-is. */
export function renderTemplate(template: string, variables: TemplateVariables = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? String(variables[name]) : match
  );
}

export interface AiSdkTextClientOptions {
  apiKey?: string;
  model: string;
  temperature: number;
}

export class AiSdkTextClient implements TextGenerationClient {
  private readonly options: AiSdkTextClientOptions;

  constructor(options: AiSdkTextClientOptions) {
    this.options = options;
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.options.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not set in environment');
    }
    const openai = createOpenAI({ apiKey: this.options.apiKey });
    const model = openai.chat(this.options.model);
    const system = request.system ? renderTemplate(request.system, request.variables) : undefined;
    const user = renderTemplate(request.user, request.variables);
    const temperature = request.temperature ?? this.options.temperature;
    const images = request.images ?? [];

    const call = () =>
      images.length > 0
        ? generateText({
            model,
            system,
            temperature,
            messages: [
              {
                role: 'user',
                content: [
                  { type: 'text', text: user },
                  ...images.map((attachment) => ({
                    type: 'image' as const,
                    image: attachment.image,
                    mediaType: attachment.mediaType,
                  })),
                ],
              },
            ],
          })
        : generateText({ model, system, prompt: user, temperature });

    try {
      const { text } = await llmLogger.logApiCall('generateText', call, { model: this.options.model });
      return text.trim();
    } catch (error) {
      throw new UpstreamProviderError(errorMessage(error), 'Text generation failed');
    }
  }
}
