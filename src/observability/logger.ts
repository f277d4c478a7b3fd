import crypto from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';

export interface LogContext {
  requestId?: string;
  userId?: string;
  eventType?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  requestId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  userId?: string;
  eventType?: string;
}

function parseThreshold(value: string | undefined): LogThreshold {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value;
    default:
      return 'info';
  }
}

class Logger {
  private readonly scope = new AsyncLocalStorage<LogContext>();
  private threshold: LogThreshold = parseThreshold(process.env.LOG_LEVEL);

  /**
   * Runs `fn` with `context` merged over the enclosing one. Everything `fn`
   * starts, including work that outlives the call, logs with that context.
   */
  runWithContext<T>(context: LogContext, fn: () => T): T {
    return this.scope.run({ ...this.scope.getStore(), ...context }, fn);
  }

  setLevel(level: string | undefined): void {
    this.threshold = parseThreshold(level);
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }

    const context = this.scope.getStore();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      requestId: context?.requestId || 'unknown',
      phase,
      message,
      data,
    };

    if (context?.userId) entry.userId = context.userId;
    if (context?.eventType) entry.eventType = context.eventType;

    console.log(JSON.stringify(entry));
  }

  debug(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', phase, message, data);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
