import type { EventOutcome } from '../types.js';
import type { AnswerSource, ResolverStats } from '../responder/resolver.js';
import type { DedupStats } from '../idempotency/types.js';
import type { PoolStats } from '../persistence/types.js';
import type { CacheStats } from '../cache/expiring-cache.js';
import type { WorkerPoolStats } from '../concurrency/worker-pool.js';
import { calculateCost, TokenUsage } from './cost-model.js';

const RESPONSE_TIME_SAMPLES = 100;
const ALERT_WINDOW = 10;
const ALERT_THRESHOLD_MS = 2000;

export interface ResponseTimeStats {
  samples: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
  recentAverageMs: number;
}

export interface MetricsSources {
  pool?: PoolStats;
  dedup?: DedupStats;
  resolver?: ResolverStats;
  caches?: Record<string, CacheStats>;
  workers?: WorkerPoolStats;
}

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  events: {
    total: number;
    duplicates: number;
    quickReplies: number;
    slowPath: number;
    slowPathFailed: number;
    welcomes: number;
    ignored: number;
    failed: number;
    errorRate: number;
  };
  quickAnswers: Record<AnswerSource, number>;
  replies: {
    delivered: number;
    failed: number;
  };
  ai: {
    invocationCount: number;
    errorCount: number;
    totalInputTokens: number;
    totalOutputTokens: number;
    totalCostUSD: number;
  };
  responseTimes: ResponseTimeStats & { alert: boolean };
  sources: MetricsSources;
  recommendations: string[];
}

export function buildRecommendations(
  responseTimes: ResponseTimeStats,
  errorRate: number,
  sources: MetricsSources
): string[] {
  const recommendations: string[] = [];

  if (responseTimes.averageMs > ALERT_THRESHOLD_MS) {
    recommendations.push('Average response time is above 2s; check slow-path latency');
  }

  if (errorRate > 0.05) {
    recommendations.push('Error rate is above 5%; check the error logs');
  }

  if (sources.pool) {
    if (sources.pool.avgLatencyMs > 1000) {
      recommendations.push('Database statements average over 1s; review queries and indexes');
    }
    if (sources.pool.activeConnections >= sources.pool.maxConnections) {
      recommendations.push('Connection pool is at capacity; consider raising DB_MAX_CONNECTIONS');
    }
  }

  if (sources.resolver && sources.resolver.totalRequests > 0) {
    if (sources.resolver.quickResponseRate < 0.2) {
      recommendations.push('Quick-answer rate is low; consider extending the response tables');
    } else if (sources.resolver.quickResponseRate > 0.6) {
      recommendations.push('Quick answers are handling most traffic');
    }
  }

  const quickAnswerCache = sources.caches?.quickAnswer;
  if (quickAnswerCache && quickAnswerCache.totalAccesses > 0 && quickAnswerCache.hitRateEstimate < 0.5) {
    recommendations.push('Quick-answer cache hit rate is low; review cache TTLs');
  }

  return recommendations;
}

export class Metrics {
  private startTime: Date = new Date();
  private responseTimes: number[] = [];

  private counters = {
    eventsTotal: 0,
    duplicates: 0,
    quickReplies: 0,
    slowPath: 0,
    slowPathFailed: 0,
    welcomes: 0,
    ignored: 0,
    failed: 0,
    repliesDelivered: 0,
    repliesFailed: 0,
    aiInvocationCount: 0,
    aiErrorCount: 0,
    tokensInput: 0,
    tokensOutput: 0,
    costTotalUSD: 0,
  };

  private quickAnswers: Record<AnswerSource, number> = {
    cache: 0,
    exact: 0,
    pattern: 0,
    faq: 0,
  };

  recordOutcome(outcome: EventOutcome): void {
    this.counters.eventsTotal++;

    switch (outcome.status) {
      case 'duplicate':
        this.counters.duplicates++;
        break;
      case 'quick_reply':
        this.counters.quickReplies++;
        break;
      case 'slow_path':
        this.counters.slowPath++;
        break;
      case 'slow_path_failed':
        this.counters.slowPathFailed++;
        break;
      case 'welcome':
        this.counters.welcomes++;
        break;
      case 'ignored':
        this.counters.ignored++;
        break;
      case 'failed':
        this.counters.failed++;
        break;
    }

    if (outcome.replyDelivered === true) {
      this.counters.repliesDelivered++;
    } else if (outcome.replyDelivered === false) {
      this.counters.repliesFailed++;
    }

    this.recordResponseTime(outcome.durationMs);
  }

  recordQuickAnswer(source: AnswerSource): void {
    this.quickAnswers[source]++;
  }

  recordAIInvocation(usage: TokenUsage): void {
    this.counters.aiInvocationCount++;
    this.counters.tokensInput += usage.inputTokens;
    this.counters.tokensOutput += usage.outputTokens;
    this.counters.costTotalUSD += calculateCost(usage).totalCost;
  }

  recordAIError(): void {
    this.counters.aiErrorCount++;
  }

  recordResponseTime(durationMs: number): void {
    this.responseTimes.push(durationMs);
    if (this.responseTimes.length > RESPONSE_TIME_SAMPLES) {
      this.responseTimes.shift();
    }
  }

  getResponseTimeStats(): ResponseTimeStats {
    const samples = this.responseTimes;
    if (samples.length === 0) {
      return { samples: 0, averageMs: 0, minMs: 0, maxMs: 0, recentAverageMs: 0 };
    }

    const recent = samples.slice(-ALERT_WINDOW);
    return {
      samples: samples.length,
      averageMs: average(samples),
      minMs: Math.min(...samples),
      maxMs: Math.max(...samples),
      recentAverageMs: average(recent),
    };
  }

  /** True once ten samples exist and their mean is above two seconds. */
  shouldAlert(): boolean {
    if (this.responseTimes.length < ALERT_WINDOW) {
      return false;
    }
    return average(this.responseTimes.slice(-ALERT_WINDOW)) > ALERT_THRESHOLD_MS;
  }

  snapshot(sources: MetricsSources = {}): MetricsSnapshot {
    const uptimeMs = Date.now() - this.startTime.getTime();
    const { eventsTotal } = this.counters;
    const errorRate = eventsTotal > 0
      ? (this.counters.failed + this.counters.slowPathFailed) / eventsTotal
      : 0;
    const responseTimes = this.getResponseTimeStats();

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      events: {
        total: eventsTotal,
        duplicates: this.counters.duplicates,
        quickReplies: this.counters.quickReplies,
        slowPath: this.counters.slowPath,
        slowPathFailed: this.counters.slowPathFailed,
        welcomes: this.counters.welcomes,
        ignored: this.counters.ignored,
        failed: this.counters.failed,
        errorRate: parseFloat(errorRate.toFixed(4)),
      },
      quickAnswers: { ...this.quickAnswers },
      replies: {
        delivered: this.counters.repliesDelivered,
        failed: this.counters.repliesFailed,
      },
      ai: {
        invocationCount: this.counters.aiInvocationCount,
        errorCount: this.counters.aiErrorCount,
        totalInputTokens: this.counters.tokensInput,
        totalOutputTokens: this.counters.tokensOutput,
        totalCostUSD: parseFloat(this.counters.costTotalUSD.toFixed(6)),
      },
      responseTimes: { ...responseTimes, alert: this.shouldAlert() },
      sources,
      recommendations: buildRecommendations(responseTimes, errorRate, sources),
    };
  }
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
