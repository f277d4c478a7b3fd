import dotenv from 'dotenv';
import type { Server } from 'http';
import { loadSettings, ConfigurationError, Settings } from './config/settings.js';
import { logger, describeError } from './observability/logger.js';
import { createCacheRegistry, startSweeper } from './cache/registry.js';
import { CacheMonitor } from './cache/monitor.js';
import { EventDeduplicator } from './idempotency/deduplicator.js';
import { loadResponseTables, ResponseTableError, ResponseTables } from './responder/tables.js';
import { TieredResponseResolver } from './responder/resolver.js';
import { WorkerPool } from './concurrency/worker-pool.js';
import { Metrics } from './metrics/metrics.js';
import { ResourcePool } from './persistence/connection-pool.js';
import { PgConnection, PgConnectionFactory } from './persistence/pg-connection.js';
import { MessageLogRepository } from './persistence/message-log.js';
import { LineMessagingClient } from './line/client.js';
import { ClaudeClient } from './slowpath/claude-client.js';
import { NutritionAssistant } from './slowpath/assistant.js';
import { RequestCoordinator } from './pipeline/coordinator.js';
import { createServer } from './server.js';

const WARM_HISTORY_USERS = 20;
const WARM_HISTORY_TURNS = 5;
const SHUTDOWN_GRACE_MS = 10000;

dotenv.config();

function readSettings(): Settings {
  try {
    return loadSettings();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('startup', 'Invalid configuration', { variable: error.variable, error: error.message });
      process.exit(1);
    }
    throw error;
  }
}

function readTables(path: string | undefined): ResponseTables {
  try {
    return loadResponseTables(path);
  } catch (error) {
    if (error instanceof ResponseTableError) {
      logger.error('startup', 'Invalid response tables', { error: error.message });
      process.exit(1);
    }
    throw error;
  }
}

async function startDatabase(settings: Settings): Promise<{
  pool: ResourcePool<PgConnection>;
  messageLog: MessageLogRepository<PgConnection>;
} | null> {
  const { connectionString } = settings.database;
  if (!connectionString) {
    logger.warn('startup', 'DATABASE_URL not set, running without message history persistence');
    return null;
  }

  const pool = new ResourcePool(
    new PgConnectionFactory(
      connectionString,
      settings.database.connectTimeoutMs,
      settings.database.queryTimeoutMs
    ),
    {
      minConnections: settings.database.minConnections,
      maxConnections: settings.database.maxConnections,
      acquireTimeoutMs: settings.database.acquireTimeoutMs,
    }
  );

  const created = await pool.initialize();
  logger.info('startup', 'Connection pool initialized', {
    created,
    minConnections: settings.database.minConnections,
    maxConnections: settings.database.maxConnections,
  });

  const messageLog = new MessageLogRepository(pool);
  const schema = await messageLog.ensureSchema();
  if (!schema.ok) {
    logger.error('startup', 'Could not prepare message_log table', { kind: schema.kind, error: schema.message });
  }

  return { pool, messageLog };
}

async function main(): Promise<void> {
  const settings = readSettings();
  logger.setLevel(settings.logLevel);

  const tables = readTables(settings.responsesPath);

  const metrics = new Metrics();
  const caches = createCacheRegistry(settings.caches);
  const cacheMonitor = new CacheMonitor(caches);
  const deduplicator = new EventDeduplicator(settings.dedup);
  const resolver = new TieredResponseResolver(tables, caches.quickAnswer);
  const workers = new WorkerPool(settings.workers.maxConcurrency, settings.workers.taskTimeoutMs);

  // Resolver answers come from static tables, so a popular entry can simply be re-stored.
  caches.quickAnswer.setRefreshHandler((key, value) => caches.quickAnswer.set(key, value));

  const database = await startDatabase(settings);

  if (!settings.line.channelAccessToken) {
    logger.warn('startup', 'LINE_CHANNEL_ACCESS_TOKEN not set, replies will be rejected');
  }
  if (!settings.line.channelSecret) {
    if (settings.line.requireSignature) {
      logger.error('startup', 'LINE_CHANNEL_SECRET not set, webhook deliveries will be refused');
    } else {
      logger.warn('startup', 'LINE_CHANNEL_SECRET not set, webhook signatures are not verified');
    }
  }

  const line = new LineMessagingClient({
    channelAccessToken: settings.line.channelAccessToken ?? '',
    apiBaseUrl: settings.line.apiBaseUrl,
    dataApiBaseUrl: settings.line.dataApiBaseUrl,
  });

  let completions: ClaudeClient | null = null;
  if (settings.anthropic.apiKey) {
    completions = new ClaudeClient(settings.anthropic.apiKey, settings.anthropic.model);
  } else {
    logger.warn('startup', 'ANTHROPIC_API_KEY not set, slow path answers with a fixed reply');
  }

  const assistant = new NutritionAssistant({
    completions,
    content: line,
    answerCache: caches.general,
    historyCache: caches.user,
    imageCache: caches.image,
    messageLog: database?.messageLog ?? null,
    metrics,
    fallbackText: tables.apology,
  });

  const coordinator = new RequestCoordinator({
    deduplicator,
    resolver,
    workers,
    slowPath: assistant,
    replies: line,
    metrics,
    welcomeText: tables.welcome,
    apologyText: tables.apology,
  });

  const stopSweeper = startSweeper(caches, settings.cacheSweepIntervalMs);
  const stopHealthCheck = database?.pool.startHealthCheck(settings.database.healthCheckIntervalMs);

  if (database) {
    const users = await database.messageLog.recentUsers(WARM_HISTORY_USERS);
    if (users.ok) {
      const messageLog = database.messageLog;
      caches.user.preload(async userId => {
        const recent = await messageLog.recent(userId, WARM_HISTORY_TURNS);
        if (!recent.ok) {
          throw new Error(recent.message);
        }
        return recent.value.map(({ kind, content, reply }) => ({ kind, content, reply }));
      }, users.value);
    } else {
      logger.warn('startup', 'Could not list recent users for history warm-up', { error: users.message });
    }
  }

  const app = createServer({
    channelSecret: settings.line.channelSecret,
    requireSignature: settings.line.requireSignature,
    coordinator,
    metrics,
    cacheMonitor,
    deduplicator,
    resolver,
    workers,
    database: database?.pool ?? null,
  });

  const server: Server = app.listen(settings.port, () => {
    logger.info('startup', 'Server listening', {
      port: settings.port,
      persistence: database !== null,
      slowPath: completions ? 'completion' : 'fallback',
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutdown', 'Shutting down', { signal });

    stopSweeper();
    stopHealthCheck?.();

    const forceExit = setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS);
    forceExit.unref();

    server.close(() => {
      const closing = database ? database.pool.shutdown() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('shutdown', 'Pool shutdown failed', { error: describeError(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.error('startup', 'Fatal startup error', {
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
