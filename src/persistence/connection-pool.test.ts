import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResourcePool } from './connection-pool.js';
import type { BackingConnection, ConnectionFactory, QueryOutcome, QueryParam } from './types.js';

class FakeConnection implements BackingConnection {
  alive = true;
  hang = false;
  closed = false;
  statements: string[] = [];

  async query(sql: string, _params: QueryParam[] = []): Promise<QueryOutcome> {
    if (this.hang) {
      return new Promise<QueryOutcome>(() => {});
    }
    if (!this.alive) {
      throw new Error('connection lost');
    }
    this.statements.push(sql);
    if (sql === 'FAIL') {
      throw new Error('syntax error');
    }
    return { rows: [{ value: 1 }], rowCount: 1 };
  }

  async commit(): Promise<void> {
    this.statements.push('COMMIT');
  }

  async rollback(): Promise<void> {
    this.statements.push('ROLLBACK');
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class FakeFactory implements ConnectionFactory<FakeConnection> {
  created: FakeConnection[] = [];
  failNext = false;
  delayMs = 0;

  async create(): Promise<FakeConnection> {
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failNext) {
      this.failNext = false;
      throw new Error('connection refused');
    }
    const connection = new FakeConnection();
    this.created.push(connection);
    return connection;
  }
}

function createPool(factory: FakeFactory, min = 2, max = 5) {
  return new ResourcePool(factory, { minConnections: min, maxConnections: max, acquireTimeoutMs: 1000 });
}

describe('ResourcePool', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create minConnections eagerly on initialize', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory);

    expect(await pool.initialize()).toBe(2);
    expect(pool.stats()).toMatchObject({ activeConnections: 2, idleCount: 2, inUseCount: 0, connectionsCreated: 2 });
  });

  it('should hand out five connections and time out the sixth acquirer', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory);
    await pool.initialize();

    const pending = Array.from({ length: 6 }, () => pool.acquire(1000));
    await vi.advanceTimersByTimeAsync(999);
    expect(pool.stats().waiting).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const results = await Promise.all(pending);

    expect(results.filter(connection => connection !== null)).toHaveLength(5);
    expect(results[5]).toBeNull();
    expect(pool.stats()).toMatchObject({
      activeConnections: 5,
      inUseCount: 5,
      acquireRequests: 6,
      acquireTimeouts: 1,
    });
  });

  it('should wake a waiter when a connection is released', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 0, 1);

    const first = await pool.acquire();
    const waiting = pool.acquire(1000);
    if (!first) throw new Error('expected a connection');

    await pool.release(first);
    const second = await waiting;

    expect(second).toBe(first);
    expect(factory.created).toHaveLength(1);
  });

  it('should discard a dead idle connection and create a replacement on acquire', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 1, 1);
    await pool.initialize();
    factory.created[0].alive = false;

    const connection = await pool.acquire();

    expect(connection?.handle).toBe(factory.created[1]);
    expect(factory.created[0].closed).toBe(true);
    expect(pool.stats()).toMatchObject({ activeConnections: 1, connectionsDiscarded: 1 });
  });

  it('should discard an idle connection that stops answering within the acquire timeout', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 1, 1);
    await pool.initialize();
    factory.created[0].hang = true;
    factory.failNext = true;

    const pending = pool.acquire(200);
    await vi.advanceTimersByTimeAsync(200);

    expect(await pending).toBeNull();
    expect(factory.created[0].closed).toBe(true);
    expect(pool.stats()).toMatchObject({ activeConnections: 0, inUseCount: 0, connectionsDiscarded: 1 });
  });

  it('should give up on a slow connect at the deadline and pool the late connection', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 0, 1);
    factory.delayMs = 1000;

    const pending = pool.acquire(200);
    await vi.advanceTimersByTimeAsync(200);

    expect(await pending).toBeNull();
    expect(pool.stats()).toMatchObject({ activeConnections: 1, idleCount: 0, acquireTimeouts: 1 });

    await vi.advanceTimersByTimeAsync(800);

    expect(pool.stats()).toMatchObject({ activeConnections: 1, idleCount: 1 });
    const late = await pool.acquire(200);
    expect(late?.handle).toBe(factory.created[0]);
  });

  it('should discard a connection that fails its probe on release', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 0, 2);
    const connection = await pool.acquire();
    if (!connection) throw new Error('expected a connection');

    connection.handle.alive = false;
    await pool.release(connection);

    expect(connection.state).toBe('invalid');
    expect(pool.stats()).toMatchObject({ activeConnections: 0, idleCount: 0, inUseCount: 0 });
  });

  it('should ignore a second release of the same connection', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 0, 2);
    const connection = await pool.acquire();
    if (!connection) throw new Error('expected a connection');

    await pool.release(connection);
    await pool.release(connection);

    expect(pool.stats()).toMatchObject({ activeConnections: 1, idleCount: 1 });
  });

  it('should return null and free the slot when connection creation fails', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 0, 1);
    factory.failNext = true;

    expect(await pool.acquire()).toBeNull();
    expect(pool.stats().activeConnections).toBe(0);
    expect(await pool.acquire()).not.toBeNull();
  });

  it('should discard dead idle connections during validation', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 2, 5);
    await pool.initialize();
    factory.created[1].alive = false;

    const result = await pool.validateIdle();

    expect(result).toEqual({ checked: 2, discarded: 1 });
    expect(pool.stats()).toMatchObject({ activeConnections: 1, idleCount: 1 });
  });

  it('should validate idle connections on the health-check interval', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 1, 1);
    await pool.initialize();
    const stop = pool.startHealthCheck(1000);
    factory.created[0].alive = false;

    await vi.advanceTimersByTimeAsync(1000);
    stop();

    expect(pool.stats()).toMatchObject({ activeConnections: 0, connectionsDiscarded: 1 });
  });

  describe('run', () => {
    it('should execute the statement and record latency', async () => {
      const factory = new FakeFactory();
      const pool = createPool(factory, 0, 1);

      const result = await pool.run('SELECT value FROM t WHERE id = $1', [7]);

      expect(result).toEqual({ ok: true, value: { rows: [{ value: 1 }], rowCount: 1 } });
      expect(pool.stats()).toMatchObject({ totalRequests: 1, idleCount: 1, inUseCount: 0 });
    });

    it('should return query_failed and still release the connection', async () => {
      const factory = new FakeFactory();
      const pool = createPool(factory, 0, 1);

      const result = await pool.run('FAIL');

      expect(result).toEqual({ ok: false, kind: 'query_failed', message: 'syntax error' });
      expect(pool.stats().idleCount).toBe(1);
    });

    it('should return no_connection when the pool is exhausted', async () => {
      const factory = new FakeFactory();
      const pool = createPool(factory, 0, 1);
      await pool.acquire();

      const pending = pool.run('SELECT 1');
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending).toEqual({ ok: false, kind: 'no_connection', message: 'No database connection available' });
    });
  });

  describe('withTransaction', () => {
    it('should wrap work in BEGIN and COMMIT', async () => {
      const factory = new FakeFactory();
      const pool = createPool(factory, 0, 1);

      const result = await pool.withTransaction(async handle => {
        await handle.query('INSERT 1');
        return 'done';
      });

      expect(result).toEqual({ ok: true, value: 'done' });
      expect(factory.created[0].statements).toEqual(['BEGIN', 'INSERT 1', 'COMMIT', 'SELECT 1']);
    });

    it('should roll back when the work throws', async () => {
      const factory = new FakeFactory();
      const pool = createPool(factory, 0, 1);

      const result = await pool.withTransaction(async handle => {
        await handle.query('FAIL');
      });

      expect(result).toEqual({ ok: false, kind: 'transaction_failed', message: 'syntax error' });
      expect(factory.created[0].statements).toEqual(['BEGIN', 'FAIL', 'ROLLBACK', 'SELECT 1']);
    });
  });

  it('should resolve waiters with null and close idle connections on shutdown', async () => {
    const factory = new FakeFactory();
    const pool = createPool(factory, 1, 1);
    await pool.initialize();
    const held = await pool.acquire();
    const waiting = pool.acquire(5000);

    await pool.shutdown();

    expect(await waiting).toBeNull();
    if (!held) throw new Error('expected a connection');
    await pool.release(held);
    expect(factory.created[0].closed).toBe(true);
    expect(pool.stats().activeConnections).toBe(0);
  });
});
