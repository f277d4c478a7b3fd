import pg from 'pg';
import type { Client } from 'pg';
import { logger } from '../observability/logger.js';
import type { BackingConnection, ConnectionFactory, QueryOutcome, QueryParam } from './types.js';

export class PgConnection implements BackingConnection {
  private broken = false;

  constructor(private readonly client: Client) {
    // Emitted when an idle client loses its socket.
    client.on('error', error => {
      this.broken = true;
      logger.warn('pg_connection_error', 'PostgreSQL connection error', {
        error: error.message,
      });
    });
  }

  async query(sql: string, params: QueryParam[] = []): Promise<QueryOutcome> {
    if (this.broken) {
      throw new Error('Connection is broken');
    }
    const result = await this.client.query<Record<string, unknown>>(sql, params);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
    };
  }

  async commit(): Promise<void> {
    await this.client.query('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.client.query('ROLLBACK');
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export class PgConnectionFactory implements ConnectionFactory<PgConnection> {
  constructor(
    private readonly connectionString: string,
    private readonly connectTimeoutMs: number,
    private readonly queryTimeoutMs: number
  ) {}

  async create(): Promise<PgConnection> {
    const client = new pg.Client({
      connectionString: this.connectionString,
      connectionTimeoutMillis: this.connectTimeoutMs,
      query_timeout: this.queryTimeoutMs,
      statement_timeout: this.queryTimeoutMs,
    });
    await client.connect();
    return new PgConnection(client);
  }
}
