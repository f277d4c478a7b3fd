import { ResourcePool } from './connection-pool.js';
import type { BackingConnection } from './types.js';
import { Result, ok } from '../types.js';

export interface LoggedMessage {
  userId: string;
  kind: 'text' | 'image';
  content: string;
  reply: string;
  createdAt: Date;
}

export type ConversationTurn = Pick<LoggedMessage, 'kind' | 'content' | 'reply'>;

export type StoreFailure = 'no_connection' | 'query_failed';

export interface MessageStore {
  append(entry: Omit<LoggedMessage, 'createdAt'>): Promise<Result<void, StoreFailure>>;
  recent(userId: string, limit: number): Promise<Result<LoggedMessage[], StoreFailure>>;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS message_log (
  id BIGSERIAL PRIMARY KEY,
  user_id TEXT NOT NULL,
  kind TEXT NOT NULL,
  content TEXT NOT NULL,
  reply TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`;

const INDEX_SQL = 'CREATE INDEX IF NOT EXISTS message_log_user_created ON message_log (user_id, created_at DESC)';

function toLoggedMessage(row: Record<string, unknown>): LoggedMessage {
  const createdAt = row.created_at instanceof Date ? row.created_at : new Date(String(row.created_at));
  return {
    userId: String(row.user_id ?? ''),
    kind: row.kind === 'image' ? 'image' : 'text',
    content: String(row.content ?? ''),
    reply: String(row.reply ?? ''),
    createdAt,
  };
}

/**
 * Conversation history for the slow path, stored through the connection pool.
 */
export class MessageLogRepository<C extends BackingConnection> implements MessageStore {
  constructor(private readonly pool: ResourcePool<C>) {}

  async ensureSchema(): Promise<Result<void, StoreFailure>> {
    const table = await this.pool.run(SCHEMA_SQL);
    if (!table.ok) return table;

    const index = await this.pool.run(INDEX_SQL);
    if (!index.ok) return index;

    return ok(undefined);
  }

  async append(entry: Omit<LoggedMessage, 'createdAt'>): Promise<Result<void, StoreFailure>> {
    const result = await this.pool.run(
      'INSERT INTO message_log (user_id, kind, content, reply) VALUES ($1, $2, $3, $4)',
      [entry.userId, entry.kind, entry.content, entry.reply]
    );
    return result.ok ? ok(undefined) : result;
  }

  async recent(userId: string, limit: number): Promise<Result<LoggedMessage[], StoreFailure>> {
    const result = await this.pool.run(
      'SELECT user_id, kind, content, reply, created_at FROM message_log WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2',
      [userId, limit]
    );
    if (!result.ok) return result;

    return ok(result.value.rows.map(toLoggedMessage).reverse());
  }

  /** Users with the most recent activity, newest first. */
  async recentUsers(limit: number): Promise<Result<string[], StoreFailure>> {
    const result = await this.pool.run(
      'SELECT user_id FROM message_log GROUP BY user_id ORDER BY MAX(created_at) DESC LIMIT $1',
      [limit]
    );
    if (!result.ok) return result;

    return ok(result.value.rows.map(row => String(row.user_id ?? '')).filter(Boolean));
  }
}
