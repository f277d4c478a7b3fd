import type { EventDeduplicator } from '../idempotency/deduplicator.js';
import type { TieredResponseResolver } from '../responder/resolver.js';
import type { WorkerPool } from '../concurrency/worker-pool.js';
import type { SlowPathHandler } from '../slowpath/assistant.js';
import type { ReplySender } from '../line/client.js';
import type { Metrics } from '../metrics/metrics.js';
import type { EventOutcome, ImageRef, LineEvent, OutcomeStatus } from '../types.js';
import { logger, describeError } from '../observability/logger.js';

export interface CoordinatorDeps {
  deduplicator: EventDeduplicator;
  resolver: TieredResponseResolver;
  workers: WorkerPool;
  slowPath: SlowPathHandler;
  replies: ReplySender;
  metrics: Metrics;
  welcomeText: string;
  apologyText: string;
}

interface Handled {
  status: OutcomeStatus;
  detail?: string;
  replyDelivered?: boolean;
}

const ANONYMOUS_USER = 'anonymous';

/**
 * Runs each webhook event through dedup, dispatch, the quick-answer resolver
 * and, on a miss, the slow path. One event failing never stops the batch.
 */
export class RequestCoordinator {
  constructor(private readonly deps: CoordinatorDeps) {}

  async handleBatch(events: LineEvent[], requestId: string): Promise<EventOutcome[]> {
    const outcomes: EventOutcome[] = [];

    for (const [index, event] of events.entries()) {
      const outcome = await logger.runWithContext(
        { requestId, userId: event.source?.userId, eventType: event.type },
        () => this.handleEvent(event, index, requestId)
      );
      this.deps.metrics.recordOutcome(outcome);
      outcomes.push(outcome);
    }

    logger.info('batch_complete', 'Webhook batch processed', {
      requestId,
      events: events.length,
      statuses: outcomes.map(outcome => outcome.status),
    });

    return outcomes;
  }

  private async handleEvent(event: LineEvent, index: number, requestId: string): Promise<EventOutcome> {
    const startedAt = Date.now();
    const eventType = event.type ?? 'unknown';
    let fingerprint = '';

    const finish = (handled: Handled): EventOutcome => ({
      index,
      eventType,
      fingerprint,
      ...handled,
      durationMs: Date.now() - startedAt,
    });

    try {
      const dedup = this.deps.deduplicator.check(event);
      fingerprint = dedup.fingerprint;

      if (dedup.status === 'duplicate') {
        logger.warn('event_duplicate', 'Duplicate event rejected', {
          requestId,
          index,
          eventType,
          fingerprint: fingerprint.slice(0, 16),
          firstSeenAt: dedup.firstSeenAt.toISOString(),
        });
        return finish({ status: 'duplicate' });
      }

      return finish(await this.dispatch(event, requestId));
    } catch (error) {
      logger.error('event_failed', 'Unexpected error while handling event', {
        requestId,
        index,
        eventType,
        error: describeError(error),
      });
      return finish({ status: 'failed', detail: describeError(error) });
    }
  }

  private async dispatch(event: LineEvent, requestId: string): Promise<Handled> {
    switch (event.type) {
      case 'message':
        return this.handleMessage(event, requestId);

      case 'follow':
      case 'join': {
        if (!event.replyToken) {
          return { status: 'ignored', detail: 'missing_reply_token' };
        }
        const delivered = await this.sendReply(event.replyToken, this.deps.welcomeText, requestId);
        return { status: 'welcome', replyDelivered: delivered };
      }

      default:
        logger.debug('event_ignored', 'Event type not handled', { requestId, eventType: event.type });
        return { status: 'ignored', detail: event.type ?? 'unknown' };
    }
  }

  private async handleMessage(event: LineEvent, requestId: string): Promise<Handled> {
    const message = event.message;
    const messageType = message?.type;

    if (messageType !== 'text' && messageType !== 'image') {
      return { status: 'ignored', detail: 'unsupported_message' };
    }

    const replyToken = event.replyToken;
    if (!replyToken) {
      return { status: 'ignored', detail: 'missing_reply_token' };
    }

    const userId = event.source?.userId ?? ANONYMOUS_USER;

    if (messageType === 'image') {
      const messageId = message?.id;
      if (!messageId) {
        return { status: 'ignored', detail: 'missing_message_id' };
      }
      const provider = message?.contentProvider;
      const image: ImageRef = {
        messageId,
        externalUrl: provider?.type === 'external' ? provider.originalContentUrl : undefined,
      };
      return this.runSlowPath(
        'image_analysis',
        signal => this.deps.slowPath.handleImage(userId, image, signal),
        replyToken,
        requestId
      );
    }

    const text = message?.text ?? '';
    const resolved = this.deps.resolver.resolve(userId, text);

    if (!resolved.ok) {
      logger.warn('resolver_failed', 'Resolver failed, using slow path', {
        requestId,
        error: resolved.message,
      });
    } else if (resolved.value.kind === 'hit') {
      const { answer } = resolved.value;
      this.deps.metrics.recordQuickAnswer(answer.source);
      logger.info('quick_reply', 'Answered without slow path', {
        requestId,
        source: answer.source,
        intent: answer.intent,
      });
      const delivered = await this.sendReply(replyToken, answer.text, requestId);
      return { status: 'quick_reply', detail: answer.source, replyDelivered: delivered };
    }

    return this.runSlowPath(
      'text_answer',
      signal => this.deps.slowPath.handleText(userId, text, signal),
      replyToken,
      requestId
    );
  }

  private async runSlowPath(
    name: string,
    task: (signal: AbortSignal) => Promise<string>,
    replyToken: string,
    requestId: string
  ): Promise<Handled> {
    const result = await this.deps.workers.run(name, task);

    if (!result.ok) {
      logger.warn('slow_path_failed', 'Slow path did not produce an answer', {
        requestId,
        task: name,
        kind: result.kind,
        error: result.message,
      });
      const delivered = await this.sendReply(replyToken, this.deps.apologyText, requestId);
      return { status: 'slow_path_failed', detail: result.kind, replyDelivered: delivered };
    }

    const delivered = await this.sendReply(replyToken, result.value, requestId);
    return { status: 'slow_path', detail: name, replyDelivered: delivered };
  }

  private async sendReply(replyToken: string, text: string, requestId: string): Promise<boolean> {
    const sent = await this.deps.replies.reply(replyToken, [{ type: 'text', text }]);
    if (!sent.ok) {
      logger.error('reply_failed', 'Reply was not delivered', {
        requestId,
        kind: sent.kind,
        error: sent.message,
      });
      return false;
    }
    return true;
  }
}
