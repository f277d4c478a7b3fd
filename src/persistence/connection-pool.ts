import { logger, describeError } from '../observability/logger.js';
import { checkInvariants } from '../invariants/checker.js';
import { Result, ok, err } from '../types.js';
import type {
  BackingConnection,
  ConnectionFactory,
  ConnectionState,
  PoolOptions,
  PoolStats,
  QueryOutcome,
  QueryParam,
} from './types.js';

const DEFAULT_PROBE_SQL = 'SELECT 1';

export class PooledConnection<C extends BackingConnection> {
  state: ConnectionState = 'idle';
  lastUsedAt: number;

  constructor(
    public readonly id: number,
    public readonly handle: C
  ) {
    this.lastUsedAt = Date.now();
  }
}

type Raced<T> = { settled: true; value: T } | { settled: false };

function raceDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<Raced<T>> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<Raced<T>>(resolve => {
    timer = setTimeout(() => resolve({ settled: false }), Math.max(0, timeoutMs));
  });
  const settled = work.then<Raced<T>>(value => ({ settled: true, value }));

  return Promise.race([settled, expired]).finally(() => clearTimeout(timer));
}

interface Waiter {
  resolve: (woken: boolean) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded pool of backing-store connections.
 *
 * `activeCount` covers idle, checked-out, returning and still-being-created
 * connections. Capacity is reserved synchronously before any await, so two
 * acquirers can never both pass the `activeCount < maxConnections` check for
 * the last slot. Probes and connection creation inside `acquire` share its
 * deadline; a connection that arrives after the deadline joins the idle list.
 */
export class ResourcePool<C extends BackingConnection> {
  private idle: PooledConnection<C>[] = [];
  private inUse = new Set<PooledConnection<C>>();
  private returning = 0;
  private activeCount = 0;
  private waiters: Waiter[] = [];
  private closed = false;
  private nextId = 1;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private readonly probeSql: string;

  private counters = {
    totalRequests: 0,
    totalLatencyMs: 0,
    acquireRequests: 0,
    acquireTimeouts: 0,
    connectionsCreated: 0,
    connectionsDiscarded: 0,
  };

  constructor(
    private readonly factory: ConnectionFactory<C>,
    private readonly options: PoolOptions
  ) {
    if (options.maxConnections <= 0) {
      throw new Error('Pool maxConnections must be > 0');
    }
    if (options.minConnections > options.maxConnections) {
      throw new Error('Pool minConnections must not exceed maxConnections');
    }
    this.probeSql = options.probeSql ?? DEFAULT_PROBE_SQL;
  }

  async initialize(): Promise<number> {
    let created = 0;

    while (!this.closed && this.activeCount < this.options.minConnections) {
      this.activeCount++;
      const connection = await this.createConnection();
      if (!connection) break;

      this.idle.push(connection);
      created++;
      this.notifyWaiter();
    }

    logger.info('pool_initialization', 'Connection pool initialized', {
      created,
      minConnections: this.options.minConnections,
      maxConnections: this.options.maxConnections,
    });
    this.checkInvariants();

    return created;
  }

  /**
   * Resolves `null` on timeout, on creation failure and after shutdown.
   * Never rejects.
   */
  async acquire(timeoutMs: number = this.options.acquireTimeoutMs): Promise<PooledConnection<C> | null> {
    this.counters.acquireRequests++;
    const deadline = Date.now() + timeoutMs;

    while (!this.closed) {
      const candidate = this.idle.shift();
      if (candidate) {
        this.checkOut(candidate);
        if (await this.probe(candidate, deadline - Date.now())) {
          return candidate;
        }
        this.discard(candidate, 'acquire_probe_failed');
        continue;
      }

      if (this.activeCount < this.options.maxConnections) {
        this.activeCount++;
        const creating = this.createConnection();
        const created = await raceDeadline(creating, deadline - Date.now());
        if (!created.settled) {
          this.adoptLate(creating);
          break;
        }
        if (!created.value) {
          return null;
        }
        this.checkOut(created.value);
        return created.value;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForSlot(remaining))) {
        break;
      }
    }

    if (this.closed) {
      return null;
    }

    this.counters.acquireTimeouts++;
    logger.warn('pool_exhausted', 'No connection available before timeout', {
      timeoutMs,
      activeConnections: this.activeCount,
      waiting: this.waiters.length,
    });
    return null;
  }

  async release(connection: PooledConnection<C>): Promise<void> {
    if (!this.inUse.delete(connection)) {
      logger.warn('pool_release_ignored', 'Connection is not checked out', {
        connectionId: connection.id,
        state: connection.state,
      });
      return;
    }

    this.returning++;
    const valid = this.closed ? false : await this.probe(connection, this.options.acquireTimeoutMs);
    this.returning--;

    if (this.closed) {
      await this.retire(connection);
      return;
    }

    if (!valid) {
      this.discard(connection, 'release_probe_failed');
      return;
    }

    connection.state = 'idle';
    connection.lastUsedAt = Date.now();
    this.idle.push(connection);
    this.checkInvariants();
    this.notifyWaiter();
  }

  /**
   * Out-of-band liveness check of every idle connection. Connections are
   * checked out while probed so that no acquirer receives one mid-probe.
   */
  async validateIdle(): Promise<{ checked: number; discarded: number }> {
    const batch = this.idle.splice(0);
    batch.forEach(connection => this.checkOut(connection));

    const results = await Promise.all(
      batch.map(async connection => ({
        connection,
        valid: await this.probe(connection, this.options.acquireTimeoutMs),
      }))
    );

    let discarded = 0;
    for (const { connection, valid } of results) {
      this.inUse.delete(connection);

      if (this.closed) {
        void this.retire(connection);
      } else if (valid) {
        connection.state = 'idle';
        this.idle.push(connection);
        this.notifyWaiter();
      } else {
        this.discard(connection, 'health_check_failed');
        discarded++;
      }
    }

    if (discarded > 0) {
      logger.warn('pool_health_check', 'Discarded invalid idle connections', {
        checked: batch.length,
        discarded,
      });
    }
    this.checkInvariants();

    return { checked: batch.length, discarded };
  }

  startHealthCheck(intervalMs: number): () => void {
    this.stopHealthCheck();
    if (intervalMs <= 0) {
      return () => {};
    }

    const timer = setInterval(() => {
      this.validateIdle().catch(error => {
        logger.error('pool_health_check', 'Idle validation failed', {
          error: describeError(error),
        });
      });
    }, intervalMs);
    timer.unref();
    this.healthCheckTimer = timer;

    return () => this.stopHealthCheck();
  }

  /** Acquires and releases one connection; true when a valid connection was available. */
  async ping(timeoutMs: number = this.options.acquireTimeoutMs): Promise<boolean> {
    const connection = await this.acquire(timeoutMs);
    if (!connection) {
      return false;
    }
    await this.release(connection);
    return true;
  }

  async run(sql: string, params: QueryParam[] = []): Promise<Result<QueryOutcome, 'no_connection' | 'query_failed'>> {
    const startedAt = Date.now();
    const connection = await this.acquire();

    if (!connection) {
      return err('no_connection', 'No database connection available');
    }

    try {
      return ok(await connection.handle.query(sql, params));
    } catch (error) {
      logger.error('pool_query_failed', 'Statement execution failed', {
        connectionId: connection.id,
        error: describeError(error),
      });
      return err('query_failed', describeError(error));
    } finally {
      this.recordRequest(startedAt);
      await this.release(connection);
    }
  }

  async withTransaction<T>(work: (handle: C) => Promise<T>): Promise<Result<T, 'no_connection' | 'transaction_failed'>> {
    const startedAt = Date.now();
    const connection = await this.acquire();

    if (!connection) {
      return err('no_connection', 'No database connection available');
    }

    try {
      await connection.handle.query('BEGIN');
      const value = await work(connection.handle);
      await connection.handle.commit();
      return ok(value);
    } catch (error) {
      try {
        await connection.handle.rollback();
      } catch (rollbackError) {
        logger.warn('pool_rollback_failed', 'Rollback failed, connection will be probed on release', {
          connectionId: connection.id,
          error: describeError(rollbackError),
        });
      }
      logger.error('pool_transaction_failed', 'Transaction rolled back', {
        connectionId: connection.id,
        error: describeError(error),
      });
      return err('transaction_failed', describeError(error));
    } finally {
      this.recordRequest(startedAt);
      await this.release(connection);
    }
  }

  stats(): PoolStats {
    const { totalRequests, totalLatencyMs } = this.counters;

    return {
      totalRequests,
      avgLatencyMs: totalRequests > 0 ? totalLatencyMs / totalRequests : 0,
      activeConnections: this.activeCount,
      idleCount: this.idle.length,
      inUseCount: this.inUse.size + this.returning,
      waiting: this.waiters.length,
      acquireRequests: this.counters.acquireRequests,
      acquireTimeouts: this.counters.acquireTimeouts,
      connectionsCreated: this.counters.connectionsCreated,
      connectionsDiscarded: this.counters.connectionsDiscarded,
      minConnections: this.options.minConnections,
      maxConnections: this.options.maxConnections,
    };
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stopHealthCheck();

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(false);
    }

    const idle = this.idle.splice(0);
    await Promise.all(idle.map(connection => this.retire(connection)));

    logger.info('pool_shutdown', 'Connection pool closed', {
      closedIdle: idle.length,
      stillCheckedOut: this.inUse.size,
    });
  }

  private async createConnection(): Promise<PooledConnection<C> | null> {
    try {
      const handle = await this.factory.create();
      const connection = new PooledConnection(this.nextId++, handle);
      this.counters.connectionsCreated++;

      if (this.closed) {
        await this.retire(connection);
        return null;
      }
      return connection;
    } catch (error) {
      this.activeCount--;
      logger.error('pool_connect_failed', 'Failed to create backing-store connection', {
        error: describeError(error),
        activeConnections: this.activeCount,
      });
      this.notifyWaiter();
      return null;
    }
  }

  /** Parks a connection whose creation outlived the acquire deadline. */
  private adoptLate(creating: Promise<PooledConnection<C> | null>): void {
    creating
      .then(connection => {
        if (!connection) return;
        if (this.closed) {
          return this.retire(connection);
        }
        connection.state = 'idle';
        connection.lastUsedAt = Date.now();
        this.idle.push(connection);
        this.checkInvariants();
        this.notifyWaiter();
      })
      .catch(error => {
        logger.error('pool_connect_failed', 'Late connection could not be pooled', {
          error: describeError(error),
        });
      });
  }

  private checkOut(connection: PooledConnection<C>): void {
    connection.state = 'in_use';
    connection.lastUsedAt = Date.now();
    this.inUse.add(connection);
    this.checkInvariants();
  }

  private async probe(connection: PooledConnection<C>, timeoutMs: number): Promise<boolean> {
    try {
      const answered = await raceDeadline(connection.handle.query(this.probeSql), timeoutMs);
      if (!answered.settled) {
        logger.warn('pool_probe_failed', 'Connection did not answer its liveness probe in time', {
          connectionId: connection.id,
          timeoutMs,
        });
        return false;
      }
      return true;
    } catch (error) {
      logger.warn('pool_probe_failed', 'Connection failed liveness probe', {
        connectionId: connection.id,
        error: describeError(error),
      });
      return false;
    }
  }

  private discard(connection: PooledConnection<C>, reason: string): void {
    this.counters.connectionsDiscarded++;
    logger.info('pool_discard', 'Discarding invalid connection', {
      connectionId: connection.id,
      reason,
    });
    void this.retire(connection);
    this.notifyWaiter();
  }

  private retire(connection: PooledConnection<C>): Promise<void> {
    connection.state = 'invalid';
    this.inUse.delete(connection);
    this.activeCount--;
    this.checkInvariants();

    return connection.handle.close().catch(error => {
      logger.warn('pool_close_failed', 'Closing connection failed', {
        connectionId: connection.id,
        error: describeError(error),
      });
    });
  }

  private waitForSlot(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve(false);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private notifyWaiter(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }

  private recordRequest(startedAt: number): void {
    this.counters.totalRequests++;
    this.counters.totalLatencyMs += Date.now() - startedAt;
  }

  private stopHealthCheck(): void {
    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }
  }

  private checkInvariants(): void {
    checkInvariants({
      poolIdle: this.idle.length,
      poolInUse: this.inUse.size + this.returning,
      poolActive: this.activeCount,
      poolMaxConnections: this.options.maxConnections,
    }, ['POOL_WITHIN_CAPACITY', 'POOL_ACTIVE_COUNT_CONSISTENT']);
  }
}
