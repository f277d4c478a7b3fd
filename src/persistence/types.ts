export type QueryParam = string | number | boolean | null | Date;

export interface QueryOutcome {
  rows: Record<string, unknown>[];
  rowCount: number;
}

/**
 * A live backing-store handle. The pool treats it as opaque apart from the
 * liveness probe.
 */
export interface BackingConnection {
  query(sql: string, params?: QueryParam[]): Promise<QueryOutcome>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface ConnectionFactory<C extends BackingConnection> {
  create(): Promise<C>;
}

export type ConnectionState = 'idle' | 'in_use' | 'invalid';

export interface PoolOptions {
  minConnections: number;
  maxConnections: number;
  acquireTimeoutMs: number;
  probeSql?: string;
}

export interface PoolStats {
  totalRequests: number;
  avgLatencyMs: number;
  activeConnections: number;
  idleCount: number;
  inUseCount: number;
  waiting: number;
  acquireRequests: number;
  acquireTimeouts: number;
  connectionsCreated: number;
  connectionsDiscarded: number;
  minConnections: number;
  maxConnections: number;
}
