import express, { Express } from 'express';
import { createWebhookHandler, WebhookHandlerOptions } from './webhook/handler.js';
import type { Metrics } from './metrics/metrics.js';
import { getPricingModel } from './metrics/cost-model.js';
import type { CacheMonitor } from './cache/monitor.js';
import type { EventDeduplicator } from './idempotency/deduplicator.js';
import type { TieredResponseResolver } from './responder/resolver.js';
import type { WorkerPool } from './concurrency/worker-pool.js';
import type { PoolStats } from './persistence/types.js';
import { logger, describeError } from './observability/logger.js';

export interface DatabaseStatus {
  ping(timeoutMs?: number): Promise<boolean>;
  stats(): PoolStats;
}

export interface ServerDeps extends WebhookHandlerOptions {
  metrics: Metrics;
  cacheMonitor: CacheMonitor;
  deduplicator: EventDeduplicator;
  resolver: TieredResponseResolver;
  workers: WorkerPool;
  /** Null when no database is configured. */
  database: DatabaseStatus | null;
  healthPingTimeoutMs?: number;
}

const DEFAULT_HEALTH_PING_TIMEOUT_MS = 2000;

export function createServer(deps: ServerDeps): Express {
  const app = express();
  const webhookHandler = createWebhookHandler(deps);

  app.post('/webhook', express.raw({ type: '*/*', limit: '1mb' }), (req, res, next) => {
    try {
      webhookHandler(req, res);
    } catch (error) {
      logger.error('webhook_error', 'Unhandled webhook error', {
        error: describeError(error),
      });
      next(error);
    }
  });

  app.get('/health', async (_req, res) => {
    let database: 'ok' | 'unavailable' | 'disabled' = 'disabled';
    if (deps.database) {
      try {
        const reachable = await deps.database.ping(deps.healthPingTimeoutMs ?? DEFAULT_HEALTH_PING_TIMEOUT_MS);
        database = reachable ? 'ok' : 'unavailable';
      } catch (error) {
        logger.error('health_check', 'Database ping failed', { error: describeError(error) });
        database = 'unavailable';
      }
    }

    const slow = deps.metrics.shouldAlert();
    const healthy = database !== 'unavailable' && !slow;

    res.status(200).json({
      status: healthy ? 'healthy' : 'warning',
      timestamp: new Date().toISOString(),
      database,
      performance: slow ? 'slow' : 'normal',
    });
  });

  app.get('/metrics', (_req, res) => {
    try {
      const snapshot = deps.metrics.snapshot({
        pool: deps.database?.stats(),
        dedup: deps.deduplicator.getStats(),
        resolver: deps.resolver.getStats(),
        caches: deps.cacheMonitor.getAllStats(),
        workers: deps.workers.getStats(),
      });
      res.status(200).json({ ...snapshot, pricing: getPricingModel() });
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', {
        error: describeError(error),
      });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  });

  app.get('/cache/stats', (_req, res) => {
    res.status(200).json(deps.cacheMonitor.getAllStats());
  });

  app.get('/cache/report', (_req, res) => {
    res.status(200).type('text/plain').send(deps.cacheMonitor.generateReport());
  });

  app.post('/cache/cleanup', (_req, res) => {
    const report = deps.cacheMonitor.clearExpired();
    logger.info('cache_cleanup', 'Expired cache entries cleared', { itemsRemoved: report.itemsRemoved });
    res.status(200).json(report);
  });

  return app;
}
