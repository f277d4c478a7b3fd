import { describe, it, expect } from 'vitest';
import { loadSettings, ConfigurationError } from './settings.js';

describe('loadSettings', () => {
  it('should apply defaults for an empty environment', () => {
    const settings = loadSettings({});

    expect(settings.port).toBe(3000);
    expect(settings.line).toEqual({
      channelSecret: undefined,
      channelAccessToken: undefined,
      requireSignature: false,
      apiBaseUrl: 'https://api.line.me',
      dataApiBaseUrl: 'https://api-data.line.me',
    });
    expect(settings.database).toMatchObject({
      connectionString: undefined,
      minConnections: 2,
      maxConnections: 5,
      acquireTimeoutMs: 5000,
      queryTimeoutMs: 10000,
    });
    expect(settings.caches.general).toEqual({ ttlSeconds: 300, maxEntries: 100, popularityThreshold: 5 });
    expect(settings.caches.image.ttlSeconds).toBe(1800);
    expect(settings.caches.user.ttlSeconds).toBe(600);
    expect(settings.caches.quickAnswer.ttlSeconds).toBe(600);
    expect(settings.dedup).toEqual({ expireWindowSeconds: 300, maxSize: 1000 });
    expect(settings.workers).toEqual({ maxConcurrency: 3, taskTimeoutMs: 30000 });
  });

  it('should read overrides from the environment', () => {
    const settings = loadSettings({
      PORT: '8080',
      LINE_CHANNEL_SECRET: 'test-secret',
      DATABASE_URL: 'postgres://localhost/test',
      DB_MAX_CONNECTIONS: '10',
      CACHE_QUICK_ANSWER_TTL_SECONDS: '120',
      WORKER_TASK_TIMEOUT_MS: '5000',
    });

    expect(settings.port).toBe(8080);
    expect(settings.line.channelSecret).toBe('test-secret');
    expect(settings.database.connectionString).toBe('postgres://localhost/test');
    expect(settings.database.maxConnections).toBe(10);
    expect(settings.caches.quickAnswer.ttlSeconds).toBe(120);
    expect(settings.workers.taskTimeoutMs).toBe(5000);
  });

  it('should require signed webhooks in production', () => {
    expect(loadSettings({ NODE_ENV: 'production' }).line.requireSignature).toBe(true);
    expect(loadSettings({ NODE_ENV: 'development' }).line.requireSignature).toBe(false);
  });

  it('should treat blank values as unset', () => {
    const settings = loadSettings({ ANTHROPIC_API_KEY: '   ', PORT: '' });

    expect(settings.anthropic.apiKey).toBeUndefined();
    expect(settings.port).toBe(3000);
  });

  it('should reject a non-integer number', () => {
    expect(() => loadSettings({ DEDUP_MAX_SIZE: 'lots' })).toThrow(
      new ConfigurationError('DEDUP_MAX_SIZE', 'expected an integer, got "lots"')
    );
  });

  it('should reject a value below its minimum', () => {
    expect(() => loadSettings({ WORKER_MAX_CONCURRENCY: '0' })).toThrow('WORKER_MAX_CONCURRENCY: must be >= 1, got 0');
  });

  it('should reject more minimum than maximum connections', () => {
    expect(() => loadSettings({ DB_MIN_CONNECTIONS: '6', DB_MAX_CONNECTIONS: '5' })).toThrow(ConfigurationError);
  });
});
