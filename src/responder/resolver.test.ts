import { describe, it, expect, beforeEach } from 'vitest';
import { ExpiringCache } from '../cache/expiring-cache.js';
import { loadResponseTables } from './tables.js';
import { TieredResponseResolver, normalizeText, tokenSimilarity } from './resolver.js';

const tables = loadResponseTables();

class FailingCache extends ExpiringCache<string> {
  get(_key: string): string | undefined {
    throw new Error('cache unavailable');
  }
}

describe('normalizeText', () => {
  it('should lowercase, trim and strip trailing punctuation', () => {
    expect(normalizeText('  Hello!! ')).toBe('hello');
    expect(normalizeText('謝謝！')).toBe('謝謝');
    expect(normalizeText('bye~')).toBe('bye');
  });
});

describe('tokenSimilarity', () => {
  it('should compute Jaccard similarity over whitespace tokens', () => {
    expect(tokenSimilarity('a b c', 'a b c d')).toBe(0.75);
    expect(tokenSimilarity('a b', 'a c')).toBeCloseTo(1 / 3);
  });

  it('should return 0 when either side has no tokens', () => {
    expect(tokenSimilarity('', 'a')).toBe(0);
    expect(tokenSimilarity('   ', '   ')).toBe(0);
  });
});

describe('TieredResponseResolver', () => {
  let cache: ExpiringCache<string>;
  let resolver: TieredResponseResolver;

  beforeEach(() => {
    cache = new ExpiringCache<string>({ name: 'quickAnswer', ttlSeconds: 600 });
    resolver = new TieredResponseResolver(tables, cache);
  });

  it('should answer a greeting from the exact table and cache it for the user', () => {
    const result = resolver.resolve('U1', '你好');

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer).toMatchObject({
      text: '您好！我是營養助手，可以幫您分析食物和管理卡路里。',
      source: 'exact',
      intent: 'greeting',
    });
    expect(cache.get('response:U1:你好')).toBe('您好！我是營養助手，可以幫您分析食物和管理卡路里。');
  });

  it('should serve a repeated question from the cache', () => {
    resolver.resolve('U1', '你好');
    const result = resolver.resolve('U1', '你好');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer.source).toBe('cache');
  });

  it('should keep cached answers separate per user', () => {
    resolver.resolve('U1', '你好');
    const result = resolver.resolve('U2', '你好');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer.source).toBe('exact');
  });

  it('should match exact phrases case-insensitively with trailing punctuation', () => {
    const result = resolver.resolve('U1', 'Hello!');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer).toMatchObject({ text: 'Hello! How can I help you today?', source: 'exact' });
  });

  it('should fall back to the first matching pattern', () => {
    const result = resolver.resolve('U1', '嗨嗨');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer).toMatchObject({
      text: '您好！我是您的營養助手，有什麼可以幫助您的嗎？',
      source: 'pattern',
      intent: 'greeting',
    });
  });

  it('should accept a long message when it carries a quick intent', () => {
    const result = resolver.resolve('U1', 'hello there, could you tell me about my lunch today');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer.source).toBe('pattern');
  });

  it('should answer FAQ questions by token similarity', () => {
    const result = resolver.resolve('U1', '如何計算BMI');

    if (!result.ok || result.value.kind !== 'hit') throw new Error('expected a hit');
    expect(result.value.answer).toMatchObject({ source: 'faq', intent: 'bmi' });
    expect(result.value.answer.text.startsWith('BMI = 體重(kg) / 身高(m)²')).toBe(true);
  });

  it('should report long messages without a quick intent as ineligible', () => {
    const result = resolver.resolve('U1', '我今天中午吃了一個很大的排骨便當');

    expect(result).toEqual({ ok: true, value: { kind: 'miss', reason: 'ineligible' } });
  });

  it('should report short messages no tier matches as no_match', () => {
    const result = resolver.resolve('U1', '早餐吃什麼');

    expect(result).toEqual({ ok: true, value: { kind: 'miss', reason: 'no_match' } });
    expect(cache.size).toBe(0);
  });

  it('should return resolver_error when a tier throws', () => {
    const failing = new TieredResponseResolver(tables, new FailingCache({ name: 'broken', ttlSeconds: 60 }));

    const result = failing.resolve('U1', '你好');

    expect(result).toEqual({ ok: false, kind: 'resolver_error', message: 'cache unavailable' });
  });

  it('should classify intents by the first keyword group that matches', () => {
    expect(resolver.classifyIntent('今天的卡路里')).toBe('calories');
    expect(resolver.classifyIntent('THANK you')).toBe('thanks');
    expect(resolver.classifyIntent('早餐吃什麼')).toBeNull();
  });

  it('should count hits per tier and the quick response rate', () => {
    resolver.resolve('U1', '你好');
    resolver.resolve('U1', '你好');
    resolver.resolve('U1', '嗨嗨');
    resolver.resolve('U1', '卡路里查詢');
    resolver.resolve('U1', '早餐吃什麼');

    expect(resolver.getStats()).toEqual({
      totalRequests: 5,
      quickHits: 4,
      cacheHits: 1,
      exactHits: 1,
      patternHits: 1,
      faqHits: 1,
      quickResponseRate: 0.8,
    });
  });
});
