import type { ExpiringCache } from '../cache/expiring-cache.js';
import type { ResponseTables } from './tables.js';
import { logger, describeError } from '../observability/logger.js';
import { Result, ok, err } from '../types.js';

export type AnswerSource = 'cache' | 'exact' | 'pattern' | 'faq';

export interface QuickAnswer {
  text: string;
  source: AnswerSource;
  intent: string | null;
  processingTimeMs: number;
}

export type Resolution =
  | { kind: 'hit'; answer: QuickAnswer }
  | { kind: 'miss'; reason: 'ineligible' | 'no_match' };

export interface ResolverStats {
  totalRequests: number;
  quickHits: number;
  quickResponseRate: number;
  cacheHits: number;
  exactHits: number;
  patternHits: number;
  faqHits: number;
}

const MAX_QUICK_LENGTH = 10;
const FAQ_SIMILARITY_THRESHOLD = 0.6;
const TRAILING_PUNCTUATION = /[!！.。?？~～]+$/u;

export function normalizeText(text: string): string {
  return text.toLowerCase().trim().replace(TRAILING_PUNCTUATION, '');
}

/** Jaccard similarity of the whitespace-separated token sets. Empty sets score 0. */
export function tokenSimilarity(a: string, b: string): number {
  const left = new Set(a.split(/\s+/).filter(Boolean));
  const right = new Set(b.split(/\s+/).filter(Boolean));
  if (left.size === 0 || right.size === 0) return 0;

  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection++;
  }
  return intersection / (left.size + right.size - intersection);
}

/**
 * Answers short or conversational messages without the slow path. Tiers are
 * tried in order: per-user cache, exact phrase, regex pattern, FAQ similarity.
 */
export class TieredResponseResolver {
  private counters = {
    totalRequests: 0,
    quickHits: 0,
    cacheHits: 0,
    exactHits: 0,
    patternHits: 0,
    faqHits: 0,
  };

  constructor(
    private readonly tables: ResponseTables,
    private readonly cache: ExpiringCache<string>
  ) {}

  classifyIntent(text: string): string | null {
    const lowered = text.toLowerCase();
    for (const { intent, keywords } of this.tables.intents) {
      if (keywords.some(keyword => lowered.includes(keyword))) {
        return intent;
      }
    }
    return null;
  }

  isEligible(text: string): boolean {
    if ([...text.trim()].length <= MAX_QUICK_LENGTH) return true;
    const intent = this.classifyIntent(text);
    return intent !== null && this.tables.quickIntents.has(intent);
  }

  resolve(userId: string, text: string): Result<Resolution, 'resolver_error'> {
    const startedAt = Date.now();
    this.counters.totalRequests++;

    try {
      if (!this.isEligible(text)) {
        return ok({ kind: 'miss', reason: 'ineligible' });
      }

      const cacheKey = `response:${userId}:${text}`;
      const cached = this.cache.get(cacheKey);
      if (cached !== undefined) {
        this.counters.cacheHits++;
        return ok(this.hit(cached, 'cache', text, startedAt));
      }

      const found = this.match(normalizeText(text));
      if (!found) {
        return ok({ kind: 'miss', reason: 'no_match' });
      }

      this.cache.set(cacheKey, found.text);
      return ok(this.hit(found.text, found.source, text, startedAt));
    } catch (error) {
      logger.error('resolver_error', 'Quick response lookup failed', {
        error: describeError(error),
      });
      return err('resolver_error', describeError(error));
    }
  }

  getStats(): ResolverStats {
    const { totalRequests, quickHits } = this.counters;
    return {
      ...this.counters,
      quickResponseRate: totalRequests > 0 ? quickHits / totalRequests : 0,
    };
  }

  private match(normalized: string): { text: string; source: Exclude<AnswerSource, 'cache'> } | null {
    const exact = this.tables.exact.get(normalized);
    if (exact !== undefined) {
      this.counters.exactHits++;
      return { text: exact, source: 'exact' };
    }

    for (const rule of this.tables.patterns) {
      if (rule.regex.test(normalized)) {
        this.counters.patternHits++;
        return { text: rule.response, source: 'pattern' };
      }
    }

    for (const [question, answer] of this.tables.faq) {
      if (tokenSimilarity(normalized, question.toLowerCase()) > FAQ_SIMILARITY_THRESHOLD) {
        this.counters.faqHits++;
        return { text: answer, source: 'faq' };
      }
    }

    return null;
  }

  private hit(text: string, source: AnswerSource, raw: string, startedAt: number): Resolution {
    this.counters.quickHits++;
    return {
      kind: 'hit',
      answer: {
        text,
        source,
        intent: this.classifyIntent(raw),
        processingTimeMs: Date.now() - startedAt,
      },
    };
  }
}
