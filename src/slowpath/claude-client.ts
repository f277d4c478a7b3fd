import Anthropic from '@anthropic-ai/sdk';
import type { TokenUsage } from '../metrics/cost-model.js';

const MAX_TOKENS = 1024;
const TIMEOUT_MS = 30000;
const MAX_RETRIES = 1;

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

export interface CompletionRequest {
  system: string;
  prompt: string;
  image?: { data: Buffer; mediaType: ImageMediaType };
}

export interface Completion {
  text: string;
  usage: TokenUsage;
}

export interface CompletionClient {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<Completion>;
}

export function toImageMediaType(contentType: string): ImageMediaType | null {
  const base = contentType.split(';')[0].trim().toLowerCase();
  switch (base) {
    case 'image/jpeg':
    case 'image/png':
    case 'image/gif':
    case 'image/webp':
      return base;
    case 'image/jpg':
      return 'image/jpeg';
    default:
      return null;
  }
}

export class ClaudeClient implements CompletionClient {
  private client: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string
  ) {
    if (!apiKey) {
      throw new Error('Anthropic API key is required');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: TIMEOUT_MS,
      maxRetries: MAX_RETRIES,
    });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<Completion> {
    const imageBlocks = request.image
      ? [
          {
            type: 'image' as const,
            source: {
              type: 'base64' as const,
              media_type: request.image.mediaType,
              data: request.image.data.toString('base64'),
            },
          },
        ]
      : [];

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          system: request.system,
          messages: [
            {
              role: 'user',
              content: [...imageBlocks, { type: 'text' as const, text: request.prompt }],
            },
          ],
        },
        { signal }
      );

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          parts.push(block.text);
        }
      }

      return {
        text: parts.join('\n').trim(),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new Error(`Claude API failed: ${error.message}`);
      }
      throw error;
    }
  }
}
