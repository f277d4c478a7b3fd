import { Request, Response } from 'express';
import type { RequestCoordinator } from '../pipeline/coordinator.js';
import type { LineEvent, LineMessage, LineEventSource, WebhookPayload } from '../types.js';
import { Result, ok, err } from '../types.js';
import { verifySignature } from '../line/signature.js';
import { logger, generateRequestId, describeError } from '../observability/logger.js';

export interface WebhookHandlerOptions {
  /** When absent, signatures are not checked unless `requireSignature` is set. */
  channelSecret?: string;
  /** Refuse every delivery while no secret is configured. */
  requireSignature?: boolean;
  coordinator: Pick<RequestCoordinator, 'handleBatch'>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseSource(value: unknown): LineEventSource | undefined {
  if (!isRecord(value)) return undefined;
  return {
    type: optionalString(value.type),
    userId: optionalString(value.userId),
    groupId: optionalString(value.groupId),
    roomId: optionalString(value.roomId),
  };
}

function parseMessage(value: unknown): LineMessage | undefined {
  if (!isRecord(value)) return undefined;
  const provider = value.contentProvider;
  return {
    type: optionalString(value.type),
    id: optionalString(value.id),
    text: optionalString(value.text),
    contentProvider: isRecord(provider)
      ? {
          type: optionalString(provider.type),
          originalContentUrl: optionalString(provider.originalContentUrl),
          previewImageUrl: optionalString(provider.previewImageUrl),
        }
      : undefined,
  };
}

function parseEvent(value: Record<string, unknown>): LineEvent {
  const timestamp = value.timestamp;
  return {
    type: optionalString(value.type),
    replyToken: optionalString(value.replyToken),
    timestamp: typeof timestamp === 'number' || typeof timestamp === 'string' ? timestamp : undefined,
    webhookEventId: optionalString(value.webhookEventId),
    source: parseSource(value.source),
    message: parseMessage(value.message),
  };
}

/** Non-object entries in `events` are dropped. A missing `events` array is an empty batch. */
export function parseWebhookPayload(raw: string): Result<WebhookPayload, 'invalid_payload'> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return err('invalid_payload', `Body is not JSON: ${describeError(error)}`);
  }

  if (!isRecord(parsed)) {
    return err('invalid_payload', 'Body must be a JSON object');
  }

  const events = parsed.events ?? [];
  if (!Array.isArray(events)) {
    return err('invalid_payload', '"events" must be an array');
  }

  return ok({
    destination: optionalString(parsed.destination),
    events: events.filter(isRecord).map(parseEvent),
  });
}

function rawBody(req: Request): Buffer {
  const body: unknown = req.body;
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === 'string') return Buffer.from(body);
  return Buffer.alloc(0);
}

/**
 * Verifies and acknowledges a webhook delivery, then hands the events to the
 * coordinator after the response is sent. Expects the route to use a raw body
 * parser so the signature is computed over the exact bytes LINE sent.
 */
export function createWebhookHandler(options: WebhookHandlerOptions) {
  const handle = (req: Request, res: Response, requestId: string): void => {
    const body = rawBody(req);

    if (!options.channelSecret && options.requireSignature) {
      logger.error('webhook_validation', 'Channel secret not configured, refusing delivery', { requestId });
      res.status(500).json({ error: 'Webhook secret not configured' });
      return;
    }

    if (options.channelSecret) {
      const signature = req.get('x-line-signature');
      if (!signature) {
        logger.warn('webhook_validation', 'Missing signature header', { requestId });
        res.status(401).json({ error: 'Missing signature' });
        return;
      }
      if (!verifySignature(body, signature, options.channelSecret)) {
        logger.warn('webhook_validation', 'Invalid signature', { requestId });
        res.status(401).json({ error: 'Invalid signature' });
        return;
      }
    }

    const payload = parseWebhookPayload(body.toString('utf8'));
    if (!payload.ok) {
      logger.warn('webhook_validation', 'Rejected webhook body', { requestId, error: payload.message });
      res.status(400).json({ error: 'Invalid payload' });
      return;
    }

    const { events } = payload.value;
    logger.info('webhook_received', 'Webhook accepted', { requestId, events: events.length });

    res.status(200).json({ message: 'ok', requestId, events: events.length });

    if (events.length === 0) {
      return;
    }

    options.coordinator.handleBatch(events, requestId).catch(error => {
      logger.error('pipeline_fatal', 'Unhandled batch error', {
        requestId,
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    });
  };

  return (req: Request, res: Response): void => {
    const requestId = generateRequestId();
    logger.runWithContext({ requestId }, () => handle(req, res, requestId));
  };
}
