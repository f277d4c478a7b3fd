import { describe, it, expect } from 'vitest';
import { ResourcePool } from './connection-pool.js';
import { MessageLogRepository } from './message-log.js';
import type { BackingConnection, ConnectionFactory, QueryOutcome, QueryParam } from './types.js';

interface Statement {
  sql: string;
  params: QueryParam[];
}

class ScriptedConnection implements BackingConnection {
  statements: Statement[] = [];
  rows: Record<string, unknown>[] = [];
  failOn: string | null = null;

  async query(sql: string, params: QueryParam[] = []): Promise<QueryOutcome> {
    if (sql === 'SELECT 1') {
      return { rows: [], rowCount: 0 };
    }
    this.statements.push({ sql, params });
    if (this.failOn && sql.startsWith(this.failOn)) {
      throw new Error('relation "message_log" does not exist');
    }
    return { rows: this.rows, rowCount: this.rows.length };
  }

  async commit(): Promise<void> {}
  async rollback(): Promise<void> {}
  async close(): Promise<void> {}
}

function createRepository() {
  const connection = new ScriptedConnection();
  const factory: ConnectionFactory<ScriptedConnection> = { create: async () => connection };
  const pool = new ResourcePool(factory, { minConnections: 0, maxConnections: 1, acquireTimeoutMs: 100 });
  return { connection, repository: new MessageLogRepository(pool) };
}

describe('MessageLogRepository', () => {
  it('should create the table and its index', async () => {
    const { connection, repository } = createRepository();

    const result = await repository.ensureSchema();

    expect(result.ok).toBe(true);
    expect(connection.statements).toHaveLength(2);
    expect(connection.statements[0].sql).toContain('CREATE TABLE IF NOT EXISTS message_log');
    expect(connection.statements[1].sql).toContain('CREATE INDEX IF NOT EXISTS message_log_user_created');
  });

  it('should stop at the first failing schema statement', async () => {
    const { connection, repository } = createRepository();
    connection.failOn = '\nCREATE TABLE';

    const result = await repository.ensureSchema();

    expect(result).toEqual({
      ok: false,
      kind: 'query_failed',
      message: 'relation "message_log" does not exist',
    });
    expect(connection.statements).toHaveLength(1);
  });

  it('should insert a turn with positional parameters', async () => {
    const { connection, repository } = createRepository();

    const result = await repository.append({ userId: 'U1', kind: 'text', content: '一碗白飯熱量？', reply: '約 280 大卡' });

    expect(result.ok).toBe(true);
    expect(connection.statements[0]).toEqual({
      sql: 'INSERT INTO message_log (user_id, kind, content, reply) VALUES ($1, $2, $3, $4)',
      params: ['U1', 'text', '一碗白飯熱量？', '約 280 大卡'],
    });
  });

  it('should return recent turns oldest first', async () => {
    const { connection, repository } = createRepository();
    connection.rows = [
      { user_id: 'U1', kind: 'image', content: 'photo', reply: 'second', created_at: new Date('2024-01-01T10:05:00Z') },
      { user_id: 'U1', kind: 'text', content: 'hi', reply: 'first', created_at: '2024-01-01T10:00:00Z' },
    ];

    const result = await repository.recent('U1', 5);

    expect(connection.statements[0].params).toEqual(['U1', 5]);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map(turn => turn.reply)).toEqual(['first', 'second']);
      expect(result.value[0].createdAt.toISOString()).toBe('2024-01-01T10:00:00.000Z');
      expect(result.value[1].kind).toBe('image');
    }
  });

  it('should list recently active users without blanks', async () => {
    const { connection, repository } = createRepository();
    connection.rows = [{ user_id: 'U2' }, { user_id: null }, { user_id: 'U1' }];

    const result = await repository.recentUsers(20);

    expect(connection.statements[0].params).toEqual([20]);
    expect(result).toEqual({ ok: true, value: ['U2', 'U1'] });
  });
});
