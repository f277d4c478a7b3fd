export class ConfigurationError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export interface CacheSettings {
  ttlSeconds: number;
  maxEntries: number;
  popularityThreshold: number;
}

export type CacheName = 'general' | 'image' | 'user' | 'quickAnswer';

export interface Settings {
  port: number;
  line: {
    channelSecret?: string;
    channelAccessToken?: string;
    /** True in production: unsigned deliveries are refused when no secret is set. */
    requireSignature: boolean;
    apiBaseUrl: string;
    dataApiBaseUrl: string;
  };
  anthropic: {
    apiKey?: string;
    model: string;
  };
  database: {
    connectionString?: string;
    minConnections: number;
    maxConnections: number;
    acquireTimeoutMs: number;
    connectTimeoutMs: number;
    queryTimeoutMs: number;
    healthCheckIntervalMs: number;
  };
  caches: Record<CacheName, CacheSettings>;
  cacheSweepIntervalMs: number;
  dedup: {
    expireWindowSeconds: number;
    maxSize: number;
  };
  workers: {
    maxConcurrency: number;
    taskTimeoutMs: number;
  };
  responsesPath?: string;
  logLevel?: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CACHE_TTLS: Record<CacheName, number> = {
  general: 300,
  image: 1800,
  user: 600,
  quickAnswer: 600,
};

const CACHE_ENV_PREFIX: Record<CacheName, string> = {
  general: 'CACHE_GENERAL',
  image: 'CACHE_IMAGE',
  user: 'CACHE_USER',
  quickAnswer: 'CACHE_QUICK_ANSWER',
};

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(name, `expected an integer, got "${raw}"`);
  }
  if (parsed < min) {
    throw new ConfigurationError(name, `must be >= ${min}, got ${parsed}`);
  }
  return parsed;
}

export function loadSettings(env: Env = process.env): Settings {
  const maxEntries = readInt(env, 'CACHE_MAX_ENTRIES', 100, 1);
  const popularityThreshold = readInt(env, 'CACHE_POPULARITY_THRESHOLD', 5, 0);

  const cacheSettings = (name: CacheName): CacheSettings => ({
    ttlSeconds: readInt(env, `${CACHE_ENV_PREFIX[name]}_TTL_SECONDS`, DEFAULT_CACHE_TTLS[name], 1),
    maxEntries,
    popularityThreshold,
  });

  const minConnections = readInt(env, 'DB_MIN_CONNECTIONS', 2, 0);
  const maxConnections = readInt(env, 'DB_MAX_CONNECTIONS', 5, 1);
  if (minConnections > maxConnections) {
    throw new ConfigurationError(
      'DB_MIN_CONNECTIONS',
      `must not exceed DB_MAX_CONNECTIONS (${minConnections} > ${maxConnections})`
    );
  }

  return {
    port: readInt(env, 'PORT', 3000, 0),
    line: {
      channelSecret: readString(env, 'LINE_CHANNEL_SECRET'),
      channelAccessToken: readString(env, 'LINE_CHANNEL_ACCESS_TOKEN'),
      requireSignature: readString(env, 'NODE_ENV') === 'production',
      apiBaseUrl: readString(env, 'LINE_API_BASE_URL') ?? 'https://api.line.me',
      dataApiBaseUrl: readString(env, 'LINE_DATA_API_BASE_URL') ?? 'https://api-data.line.me',
    },
    anthropic: {
      apiKey: readString(env, 'ANTHROPIC_API_KEY'),
      model: readString(env, 'ANTHROPIC_MODEL') ?? 'claude-sonnet-4-20250514',
    },
    database: {
      connectionString: readString(env, 'DATABASE_URL'),
      minConnections,
      maxConnections,
      acquireTimeoutMs: readInt(env, 'DB_ACQUIRE_TIMEOUT_MS', 5000, 0),
      connectTimeoutMs: readInt(env, 'DB_CONNECT_TIMEOUT_MS', 30000, 0),
      queryTimeoutMs: readInt(env, 'DB_QUERY_TIMEOUT_MS', 10000, 1),
      healthCheckIntervalMs: readInt(env, 'DB_HEALTH_CHECK_INTERVAL_MS', 60000, 0),
    },
    caches: {
      general: cacheSettings('general'),
      image: cacheSettings('image'),
      user: cacheSettings('user'),
      quickAnswer: cacheSettings('quickAnswer'),
    },
    cacheSweepIntervalMs: readInt(env, 'CACHE_SWEEP_INTERVAL_MS', 60000, 0),
    dedup: {
      expireWindowSeconds: readInt(env, 'DEDUP_EXPIRE_WINDOW_SECONDS', 300, 1),
      maxSize: readInt(env, 'DEDUP_MAX_SIZE', 1000, 2),
    },
    workers: {
      maxConcurrency: readInt(env, 'WORKER_MAX_CONCURRENCY', 3, 1),
      taskTimeoutMs: readInt(env, 'WORKER_TASK_TIMEOUT_MS', 30000, 1),
    },
    responsesPath: readString(env, 'RESPONSES_PATH'),
    logLevel: readString(env, 'LOG_LEVEL'),
  };
}
