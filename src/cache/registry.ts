import { ExpiringCache, MonitoredCache } from './expiring-cache.js';
import type { CacheName, CacheSettings } from '../config/settings.js';
import type { ConversationTurn } from '../persistence/message-log.js';
import { logger } from '../observability/logger.js';

export interface CacheRegistry {
  /** Slow-path text answers, keyed by user and normalized text. */
  general: ExpiringCache<string>;
  /** Image analysis results, keyed by message id. */
  image: ExpiringCache<string>;
  /** Recent conversation turns per user. */
  user: ExpiringCache<ConversationTurn[]>;
  /** Resolver answers, keyed by user and raw text. */
  quickAnswer: ExpiringCache<string>;
}

export function createCacheRegistry(settings: Record<CacheName, CacheSettings>): CacheRegistry {
  function build<V>(name: CacheName): ExpiringCache<V> {
    return new ExpiringCache<V>({
      name,
      ttlSeconds: settings[name].ttlSeconds,
      maxEntries: settings[name].maxEntries,
      popularityThreshold: settings[name].popularityThreshold,
    });
  }

  return {
    general: build<string>('general'),
    image: build<string>('image'),
    user: build<ConversationTurn[]>('user'),
    quickAnswer: build<string>('quickAnswer'),
  };
}

export function listCaches(registry: CacheRegistry): MonitoredCache[] {
  return [registry.general, registry.image, registry.user, registry.quickAnswer];
}

/**
 * Periodically removes expired entries from every cache. Returns a stop
 * function; the timer does not keep the process alive.
 */
export function startSweeper(registry: CacheRegistry, intervalMs: number): () => void {
  if (intervalMs <= 0) {
    return () => {};
  }

  const timer = setInterval(() => {
    let removed = 0;
    for (const cache of listCaches(registry)) {
      removed += cache.cleanupExpired();
    }
    if (removed > 0) {
      logger.debug('cache_sweep', 'Expired cache entries removed', { removed });
    }
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
