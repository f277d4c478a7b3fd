import axios, { AxiosInstance } from 'axios';
import type { TextMessage } from '../types.js';
import { Result, ok, err } from '../types.js';
import { logger, describeError } from '../observability/logger.js';

const REQUEST_TIMEOUT_MS = 10000;

export type ReplyFailure = 'reply_rejected' | 'reply_failed';
export type ContentFailure = 'content_rejected' | 'content_failed';

export interface MessageContent {
  data: Buffer;
  contentType: string;
}

/** The subset of the Messaging API the coordinator and slow path use. */
export interface ReplySender {
  reply(replyToken: string, messages: TextMessage[]): Promise<Result<void, ReplyFailure>>;
}

export interface ContentFetcher {
  getMessageContent(messageId: string, signal?: AbortSignal): Promise<Result<MessageContent, ContentFailure>>;
  getExternalContent(url: string, signal?: AbortSignal): Promise<Result<MessageContent, ContentFailure>>;
}

export interface LineClientOptions {
  channelAccessToken: string;
  apiBaseUrl: string;
  dataApiBaseUrl: string;
  http?: AxiosInstance;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Messaging API client. Non-2xx answers are returned as rejections rather
 * than thrown, and nothing is retried: a reply token is single-use.
 */
export class LineMessagingClient implements ReplySender, ContentFetcher {
  private readonly http: AxiosInstance;
  private readonly apiBaseUrl: string;
  private readonly dataApiBaseUrl: string;
  private readonly authorization: string;

  constructor(options: LineClientOptions) {
    this.apiBaseUrl = trimSlash(options.apiBaseUrl);
    this.dataApiBaseUrl = trimSlash(options.dataApiBaseUrl);
    this.authorization = `Bearer ${options.channelAccessToken}`;
    this.http = options.http ?? axios.create({ timeout: REQUEST_TIMEOUT_MS });
  }

  async reply(replyToken: string, messages: TextMessage[]): Promise<Result<void, ReplyFailure>> {
    try {
      const response = await this.http.post(
        `${this.apiBaseUrl}/v2/bot/message/reply`,
        { replyToken, messages },
        {
          headers: { Authorization: this.authorization, 'Content-Type': 'application/json' },
          validateStatus: () => true,
        }
      );

      if (response.status < 200 || response.status >= 300) {
        logger.warn('line_reply', 'Reply rejected by LINE', {
          status: response.status,
          body: response.data,
        });
        return err('reply_rejected', `LINE answered ${response.status}`);
      }

      return ok(undefined);
    } catch (error) {
      logger.error('line_reply', 'Reply request failed', { error: describeError(error) });
      return err('reply_failed', describeError(error));
    }
  }

  getMessageContent(messageId: string, signal?: AbortSignal): Promise<Result<MessageContent, ContentFailure>> {
    return this.download(
      `${this.dataApiBaseUrl}/v2/bot/message/${encodeURIComponent(messageId)}/content`,
      { Authorization: this.authorization },
      signal
    );
  }

  /** Images sent with an external content provider live at the sender's URL, not on LINE. */
  getExternalContent(url: string, signal?: AbortSignal): Promise<Result<MessageContent, ContentFailure>> {
    return this.download(url, {}, signal);
  }

  private async download(
    url: string,
    headers: Record<string, string>,
    signal: AbortSignal | undefined
  ): Promise<Result<MessageContent, ContentFailure>> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        headers,
        responseType: 'arraybuffer',
        signal,
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        logger.warn('line_content', 'Content download rejected', {
          status: response.status,
          url,
        });
        return err('content_rejected', `Content host answered ${response.status}`);
      }

      const contentType = response.headers['content-type'];
      return ok({
        data: Buffer.from(response.data),
        contentType: typeof contentType === 'string' ? contentType : 'application/octet-stream',
      });
    } catch (error) {
      logger.error('line_content', 'Content download failed', {
        url,
        error: describeError(error),
      });
      return err('content_failed', describeError(error));
    }
  }
}
