import type { CacheStats } from './expiring-cache.js';
import { CacheRegistry, listCaches } from './registry.js';

export interface CleanupReport {
  initialSizes: Record<string, number>;
  finalSizes: Record<string, number>;
  itemsRemoved: Record<string, number>;
}

export class CacheMonitor {
  constructor(private readonly registry: CacheRegistry) {}

  getAllStats(): Record<string, CacheStats> {
    const stats: Record<string, CacheStats> = {};
    for (const cache of listCaches(this.registry)) {
      stats[cache.name] = cache.stats();
    }
    return stats;
  }

  clearExpired(): CleanupReport {
    const report: CleanupReport = { initialSizes: {}, finalSizes: {}, itemsRemoved: {} };

    for (const cache of listCaches(this.registry)) {
      report.initialSizes[cache.name] = cache.size;
      cache.cleanupExpired();
      report.finalSizes[cache.name] = cache.size;
      report.itemsRemoved[cache.name] = report.initialSizes[cache.name] - report.finalSizes[cache.name];
    }

    return report;
  }

  generateReport(): string {
    const lines = ['=== Cache report ===', ''];

    for (const stats of Object.values(this.getAllStats())) {
      lines.push(`${stats.name} (ttl ${stats.ttlSeconds}s):`);
      lines.push(`  size: ${stats.size}`);
      lines.push(`  accesses: ${stats.totalAccesses}`);
      lines.push(`  popular keys: ${stats.popularKeyCount}`);
      lines.push(`  hit rate (est.): ${(stats.hitRateEstimate * 100).toFixed(1)}%`);
      lines.push('');
    }

    return lines.join('\n');
  }
}
