export type Result<T, K extends string = string> =
  | { ok: true; value: T }
  | { ok: false; kind: K; message: string };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<K extends string>(kind: K, message: string): Result<never, K> {
  return { ok: false, kind, message };
}

export interface LineEventSource {
  type?: string;
  userId?: string;
  groupId?: string;
  roomId?: string;
}

export interface LineContentProvider {
  type?: string;
  originalContentUrl?: string;
  previewImageUrl?: string;
}

export interface LineMessage {
  type?: string;
  id?: string;
  text?: string;
  contentProvider?: LineContentProvider;
}

export interface LineEvent {
  type?: string;
  replyToken?: string;
  timestamp?: number | string;
  webhookEventId?: string;
  source?: LineEventSource;
  message?: LineMessage;
}

/** An image to analyse. `externalUrl` is set when the sender hosts the bytes. */
export interface ImageRef {
  messageId: string;
  externalUrl?: string;
}

export interface WebhookPayload {
  destination?: string;
  events: LineEvent[];
}

export interface TextMessage {
  type: 'text';
  text: string;
}

export type OutcomeStatus =
  | 'duplicate'
  | 'quick_reply'
  | 'slow_path'
  | 'slow_path_failed'
  | 'welcome'
  | 'ignored'
  | 'failed';

export interface EventOutcome {
  index: number;
  eventType: string;
  fingerprint: string;
  status: OutcomeStatus;
  detail?: string;
  replyDelivered?: boolean;
  durationMs: number;
}
