import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger, describeError } from './logger.js';

function captureLines() {
  const lines: Array<Record<string, unknown>> = [];
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    lines.push(JSON.parse(String(line)));
  });
  return lines;
}

describe('logger', () => {
  beforeEach(() => {
    logger.setLevel('debug');
  });

  afterEach(() => {
    logger.setLevel('silent');
    vi.restoreAllMocks();
  });

  it('should log requestId unknown outside any context', () => {
    const lines = captureLines();

    logger.info('startup', 'ready');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', requestId: 'unknown', phase: 'startup', message: 'ready' });
  });

  it('should keep the context across awaits started inside it', async () => {
    const lines = captureLines();

    const work = logger.runWithContext({ requestId: 'req-1' }, async () => {
      await Promise.resolve();
      await new Promise(resolve => setTimeout(resolve, 1));
      logger.warn('later', 'still inside');
    });
    logger.info('outside', 'after run returned');
    await work;

    expect(lines.map(line => [line.phase, line.requestId])).toEqual([
      ['outside', 'unknown'],
      ['later', 'req-1'],
    ]);
  });

  it('should merge a nested context over the enclosing one', () => {
    const lines = captureLines();

    logger.runWithContext({ requestId: 'req-2' }, () => {
      logger.runWithContext({ userId: 'U1', eventType: 'message' }, () => {
        logger.debug('event', 'nested');
      });
    });

    expect(lines[0]).toMatchObject({ requestId: 'req-2', userId: 'U1', eventType: 'message' });
  });

  it('should drop entries below the threshold', () => {
    const lines = captureLines();
    logger.setLevel('warn');

    logger.info('noise', 'hidden');
    logger.error('failure', 'shown');

    expect(lines.map(line => line.phase)).toEqual(['failure']);
  });

  it('should describe errors and other thrown values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('Unknown error');
  });
});
