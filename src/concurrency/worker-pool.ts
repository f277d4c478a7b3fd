import { InMemorySemaphore } from './semaphore.js';
import { logger, describeError } from '../observability/logger.js';
import { Result, ok, err } from '../types.js';

export type TaskFailure = 'timeout' | 'task_failed';

export type Task<T> = (signal: AbortSignal) => Promise<T>;

type Settled<T> =
  | { state: 'fulfilled'; value: T }
  | { state: 'rejected'; error: unknown }
  | { state: 'timeout' };

export interface WorkerPoolStats {
  maxConcurrency: number;
  inFlight: number;
  peak: number;
  waiting: number;
  completed: number;
  failed: number;
  timedOut: number;
}

/**
 * Runs slow-path tasks with bounded concurrency. The timeout clock starts at
 * submission, so time spent queued for a worker counts against the task.
 */
export class WorkerPool {
  private readonly semaphore: InMemorySemaphore;
  private counters = {
    completed: 0,
    failed: 0,
    timedOut: 0,
  };

  constructor(
    private readonly maxConcurrency: number,
    private readonly defaultTimeoutMs: number
  ) {
    this.semaphore = new InMemorySemaphore(maxConcurrency);
  }

  async run<T>(name: string, task: Task<T>, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<T, TaskFailure>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<Settled<T>>(resolve => {
      timer = setTimeout(() => resolve({ state: 'timeout' }), timeoutMs);
    });

    const work = this.execute(task, controller.signal).then<Settled<T>, Settled<T>>(
      value => ({ state: 'fulfilled', value }),
      error => ({ state: 'rejected', error })
    );

    const settled = await Promise.race([work, timeout]);
    clearTimeout(timer);

    switch (settled.state) {
      case 'fulfilled':
        this.counters.completed++;
        return ok(settled.value);

      case 'rejected':
        this.counters.failed++;
        logger.error('worker_task_failed', 'Worker task failed', {
          task: name,
          error: describeError(settled.error),
        });
        return err('task_failed', describeError(settled.error));

      case 'timeout':
        this.counters.timedOut++;
        controller.abort();
        logger.warn('worker_task_timeout', 'Worker task timed out', {
          task: name,
          timeoutMs,
        });
        return err('timeout', `${name} exceeded ${timeoutMs}ms`);
    }
  }

  getStats(): WorkerPoolStats {
    return {
      maxConcurrency: this.maxConcurrency,
      inFlight: this.semaphore.getInFlight(),
      peak: this.semaphore.getPeak(),
      waiting: this.semaphore.getWaiting(),
      ...this.counters,
    };
  }

  private async execute<T>(task: Task<T>, signal: AbortSignal): Promise<T> {
    const acquired = await this.semaphore.acquire(signal);
    if (!acquired) {
      throw new Error('Task aborted before a worker became available');
    }

    try {
      return await task(signal);
    } finally {
      this.semaphore.release();
    }
  }
}
