import { logger, describeError } from '../observability/logger.js';

export interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

export interface AccessStats {
  count: number;
  lastAccess: number;
}

export interface ExpiringCacheOptions {
  name: string;
  ttlSeconds: number;
  maxEntries?: number;
  popularityThreshold?: number;
  /** Fraction of the TTL after which a popular hit emits a refresh hint. */
  refreshAfterRatio?: number;
}

export interface CacheStats {
  name: string;
  size: number;
  totalAccesses: number;
  popularKeyCount: number;
  hitRateEstimate: number;
  ttlSeconds: number;
}

/** What the registry sweeper and the monitor need from any cache. */
export interface MonitoredCache {
  readonly name: string;
  readonly size: number;
  cleanupExpired(): number;
  stats(): CacheStats;
}

export type RefreshHandler<V> = (key: string, value: V) => void;

export type PreloadLoader<V> = (key: string) => V | Promise<V>;

const DEFAULT_MAX_ENTRIES = 100;
const DEFAULT_POPULARITY_THRESHOLD = 5;
const DEFAULT_REFRESH_AFTER_RATIO = 0.8;

/**
 * In-memory key/value cache with per-entry TTL and access tracking.
 *
 * Expiry is lazy: an expired entry is deleted when `get` observes it or when
 * `cleanupExpired` sweeps. Exceeding `maxEntries` only triggers a sweep, so a
 * cache full of live entries keeps growing.
 */
export class ExpiringCache<V> implements MonitoredCache {
  readonly name: string;
  private entries = new Map<string, CacheEntry<V>>();
  private access = new Map<string, AccessStats>();
  private popularKeys = new Set<string>();
  private refreshHandler: RefreshHandler<V> | null = null;
  private preloadChain: Promise<void> = Promise.resolve();

  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly popularityThreshold: number;
  private readonly refreshAfterRatio: number;

  constructor(options: ExpiringCacheOptions) {
    if (options.ttlSeconds <= 0) {
      throw new Error(`Cache ${options.name}: ttlSeconds must be > 0`);
    }
    this.name = options.name;
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.popularityThreshold = options.popularityThreshold ?? DEFAULT_POPULARITY_THRESHOLD;
    this.refreshAfterRatio = options.refreshAfterRatio ?? DEFAULT_REFRESH_AFTER_RATIO;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    const now = Date.now();
    this.trackAccess(key, now);

    const age = now - entry.storedAt;
    if (age > this.ttlMs) {
      this.entries.delete(key);
      if (this.popularKeys.has(key)) {
        logger.info('cache_popular_expired', 'Popular cache entry expired', {
          cache: this.name,
          key: key.slice(0, 40),
        });
      }
      return undefined;
    }

    if (age > this.ttlMs * this.refreshAfterRatio && this.popularKeys.has(key)) {
      this.emitRefreshHint(key, entry.value);
    }

    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, storedAt: Date.now() });

    if (this.entries.size > this.maxEntries) {
      this.cleanupExpired();
    }
  }

  /** Presence check that neither tracks access nor deletes. */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, Date.now());
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  cleanupExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.access.clear();
    this.popularKeys.clear();
  }

  isPopular(key: string): boolean {
    return this.popularKeys.has(key);
  }

  setRefreshHandler(handler: RefreshHandler<V> | null): void {
    this.refreshHandler = handler;
  }

  /**
   * Loads every missing key in the background and returns immediately.
   * Preloads on the same cache run one after another.
   */
  preload(loader: PreloadLoader<V>, keys: string[]): void {
    this.preloadChain = this.preloadChain
      .then(() => this.runPreload(loader, keys))
      .catch(error => {
        logger.error('cache_preload', 'Preload run failed', {
          cache: this.name,
          error: describeError(error),
        });
      });
  }

  /**
   * `hitRateEstimate` is `(totalAccesses - size) / totalAccesses`, an
   * approximation rather than a true hit/miss ratio. Clamped to [0, 1].
   */
  stats(): CacheStats {
    let totalAccesses = 0;
    for (const stats of this.access.values()) {
      totalAccesses += stats.count;
    }

    const size = this.entries.size;
    const estimate = totalAccesses > 0 ? (totalAccesses - size) / totalAccesses : 0;

    return {
      name: this.name,
      size,
      totalAccesses,
      popularKeyCount: this.popularKeys.size,
      hitRateEstimate: Math.min(1, Math.max(0, estimate)),
      ttlSeconds: this.ttlMs / 1000,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.storedAt > this.ttlMs;
  }

  private trackAccess(key: string, now: number): void {
    const stats = this.access.get(key) ?? { count: 0, lastAccess: now };
    stats.count++;
    stats.lastAccess = now;
    this.access.set(key, stats);

    if (stats.count > this.popularityThreshold) {
      this.popularKeys.add(key);
    }
  }

  private emitRefreshHint(key: string, value: V): void {
    if (!this.refreshHandler) {
      logger.debug('cache_refresh_hint', 'Popular entry near expiry', {
        cache: this.name,
        key: key.slice(0, 40),
      });
      return;
    }

    try {
      this.refreshHandler(key, value);
    } catch (error) {
      logger.warn('cache_refresh_hint', 'Refresh handler failed', {
        cache: this.name,
        error: describeError(error),
      });
    }
  }

  private async runPreload(loader: PreloadLoader<V>, keys: string[]): Promise<void> {
    let loaded = 0;

    for (const key of keys) {
      if (this.has(key)) continue;

      try {
        this.set(key, await loader(key));
        loaded++;
      } catch (error) {
        logger.warn('cache_preload', 'Preload failed for key', {
          cache: this.name,
          key: key.slice(0, 40),
          error: describeError(error),
        });
      }
    }

    logger.info('cache_preload', 'Preload finished', {
      cache: this.name,
      requested: keys.length,
      loaded,
    });
  }
}
