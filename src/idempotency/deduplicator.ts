import crypto from 'crypto';
import type { LineEvent } from '../types.js';
import type { DedupOptions, DedupResult, DedupStats } from './types.js';
import { checkInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';

const DEFAULT_OPTIONS: DedupOptions = {
  expireWindowSeconds: 300,
  maxSize: 1000,
};

function field(value: string | number | undefined): string {
  return value === undefined ? '' : String(value);
}

export function fingerprintEvent(event: LineEvent): string {
  const material = [
    field(event.type),
    field(event.replyToken),
    field(event.source?.userId),
    field(event.message?.id),
    field(event.timestamp),
  ].join('|');

  return crypto.createHash('sha256').update(material).digest('hex');
}

/**
 * Rejects events whose fingerprint was admitted within the trailing window.
 *
 * `check` never awaits, so the lookup and the insert happen in one turn of the
 * event loop and two concurrent deliveries of one event admit exactly one.
 */
export class EventDeduplicator {
  // Map iteration order is insertion order, which is seenAt order.
  private seen = new Map<string, number>();
  private admitted = 0;
  private rejected = 0;
  private readonly expireWindowMs: number;
  private readonly maxSize: number;

  constructor(options: Partial<DedupOptions> = {}) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.expireWindowMs = resolved.expireWindowSeconds * 1000;
    this.maxSize = resolved.maxSize;
  }

  check(event: LineEvent): DedupResult {
    const fingerprint = fingerprintEvent(event);
    const now = Date.now();

    this.purge(now);

    const seenAt = this.seen.get(fingerprint);
    if (seenAt !== undefined) {
      this.rejected++;
      return { status: 'duplicate', fingerprint, firstSeenAt: new Date(seenAt) };
    }

    this.seen.set(fingerprint, now);
    this.admitted++;

    checkInvariants({ dedupSize: this.seen.size, dedupMaxSize: this.maxSize }, ['DEDUP_TABLE_BOUNDED']);

    return { status: 'new', fingerprint };
  }

  isDuplicate(event: LineEvent): boolean {
    return this.check(event).status === 'duplicate';
  }

  getStats(): DedupStats {
    return {
      size: this.seen.size,
      maxSize: this.maxSize,
      expireWindowMs: this.expireWindowMs,
      admitted: this.admitted,
      rejected: this.rejected,
    };
  }

  clear(): void {
    this.seen.clear();
  }

  private purge(now: number): void {
    if (this.seen.size > this.maxSize) {
      const evictCount = Math.floor(this.seen.size / 2);
      let evicted = 0;
      for (const key of this.seen.keys()) {
        if (evicted >= evictCount) break;
        this.seen.delete(key);
        evicted++;
      }
      logger.warn('dedup_evict', 'Fingerprint table over capacity, evicted oldest half', {
        evicted,
        remaining: this.seen.size,
      });
    }

    for (const [key, seenAt] of this.seen) {
      if (now - seenAt <= this.expireWindowMs) break;
      this.seen.delete(key);
    }
  }
}
