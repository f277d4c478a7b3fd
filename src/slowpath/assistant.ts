import type { ExpiringCache } from '../cache/expiring-cache.js';
import type { ContentFetcher } from '../line/client.js';
import type { ConversationTurn, MessageStore } from '../persistence/message-log.js';
import type { Metrics } from '../metrics/metrics.js';
import type { ImageRef } from '../types.js';
import { CompletionClient, CompletionRequest, toImageMediaType } from './claude-client.js';
import {
  buildChatSystemPrompt,
  buildChatUserPrompt,
  buildImageSystemPrompt,
  buildImageUserPrompt,
} from './prompts.js';
import { logger } from '../observability/logger.js';

const HISTORY_TURNS = 5;

export interface SlowPathHandler {
  handleText(userId: string, text: string, signal: AbortSignal): Promise<string>;
  handleImage(userId: string, image: ImageRef, signal: AbortSignal): Promise<string>;
}

export interface NutritionAssistantDeps {
  /** Null when no API key is configured; every request gets `fallbackText`. */
  completions: CompletionClient | null;
  content: ContentFetcher;
  answerCache: ExpiringCache<string>;
  historyCache: ExpiringCache<ConversationTurn[]>;
  imageCache: ExpiringCache<string>;
  messageLog: MessageStore | null;
  metrics: Metrics;
  fallbackText: string;
}

export function renderHistory(turns: ConversationTurn[]): string | undefined {
  if (turns.length === 0) return undefined;

  return turns
    .map(turn => {
      const question = turn.kind === 'image' ? '[照片]' : turn.content;
      return `使用者：${question}\n助手：${turn.reply}`;
    })
    .join('\n');
}

export function answerCacheKey(userId: string, text: string): string {
  return `chat:${userId}:${text.trim().toLowerCase()}`;
}

/**
 * Answers free text and food photos through the completion client. Answers
 * are cached per user, and each exchange is appended to the message log when
 * persistence is configured.
 */
export class NutritionAssistant implements SlowPathHandler {
  constructor(private readonly deps: NutritionAssistantDeps) {}

  async handleText(userId: string, text: string, signal: AbortSignal): Promise<string> {
    const key = answerCacheKey(userId, text);
    const cached = this.deps.answerCache.get(key);
    if (cached !== undefined) {
      logger.debug('slow_path_text', 'Answer served from cache');
      return cached;
    }

    const completions = this.deps.completions;
    if (!completions) {
      return this.deps.fallbackText;
    }

    const history = await this.loadHistory(userId);
    const reply = await this.complete(
      completions,
      { system: buildChatSystemPrompt(), prompt: buildChatUserPrompt(text, renderHistory(history)) },
      signal
    );

    this.deps.answerCache.set(key, reply);
    await this.remember(userId, history, { kind: 'text', content: text, reply });
    return reply;
  }

  async handleImage(userId: string, image: ImageRef, signal: AbortSignal): Promise<string> {
    const { messageId } = image;
    const cached = this.deps.imageCache.get(messageId);
    if (cached !== undefined) {
      return cached;
    }

    const completions = this.deps.completions;
    if (!completions) {
      return this.deps.fallbackText;
    }

    const content = image.externalUrl
      ? await this.deps.content.getExternalContent(image.externalUrl, signal)
      : await this.deps.content.getMessageContent(messageId, signal);
    if (!content.ok) {
      throw new Error(`Image download failed: ${content.message}`);
    }

    const mediaType = toImageMediaType(content.value.contentType);
    if (!mediaType) {
      throw new Error(`Unsupported image type: ${content.value.contentType}`);
    }

    const reply = await this.complete(
      completions,
      {
        system: buildImageSystemPrompt(),
        prompt: buildImageUserPrompt(),
        image: { data: content.value.data, mediaType },
      },
      signal
    );

    this.deps.imageCache.set(messageId, reply);
    const history = await this.loadHistory(userId);
    await this.remember(userId, history, { kind: 'image', content: messageId, reply });
    return reply;
  }

  private async complete(
    completions: CompletionClient,
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<string> {
    try {
      const completion = await completions.complete(request, signal);
      this.deps.metrics.recordAIInvocation(completion.usage);
      if (!completion.text) {
        throw new Error('Completion returned no text');
      }
      return completion.text;
    } catch (error) {
      this.deps.metrics.recordAIError();
      throw error;
    }
  }

  private async loadHistory(userId: string): Promise<ConversationTurn[]> {
    const cached = this.deps.historyCache.get(userId);
    if (cached !== undefined) {
      return cached;
    }
    if (!this.deps.messageLog) {
      return [];
    }

    const recent = await this.deps.messageLog.recent(userId, HISTORY_TURNS);
    if (!recent.ok) {
      logger.warn('slow_path_history', 'Could not load message history', {
        kind: recent.kind,
        error: recent.message,
      });
      return [];
    }

    const turns = recent.value.map(({ kind, content, reply }) => ({ kind, content, reply }));
    this.deps.historyCache.set(userId, turns);
    return turns;
  }

  private async remember(userId: string, history: ConversationTurn[], turn: ConversationTurn): Promise<void> {
    this.deps.historyCache.set(userId, [...history, turn].slice(-HISTORY_TURNS));

    if (!this.deps.messageLog) {
      return;
    }

    const saved = await this.deps.messageLog.append({ userId, ...turn });
    if (!saved.ok) {
      logger.warn('slow_path_history', 'Could not persist message', {
        kind: saved.kind,
        error: saved.message,
      });
    }
  }
}
