import { checkInvariants } from '../invariants/checker.js';

interface Waiter {
  resolve: (acquired: boolean) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class InMemorySemaphore {
  private permits: number;
  private maxPermits: number;
  private waiting: Waiter[] = [];
  private currentInFlight: number = 0;
  private peakInFlight: number = 0;

  constructor(maxPermits: number) {
    if (maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be > 0');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      this.markInFlight();
      this.checkInvariants();
      return true;
    }
    return false;
  }

  /**
   * Waits for a permit. Resolves `false` when the signal aborts before one is
   * granted; a waiter that gave up never holds a permit.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.tryAcquire()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      const waiter: Waiter = { resolve, signal };

      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiting.indexOf(waiter);
          if (index !== -1) {
            this.waiting.splice(index, 1);
            resolve(false);
          }
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      this.waiting.push(waiter);
    });
  }

  release(): void {
    if (this.currentInFlight === 0) {
      return;
    }
    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      this.markInFlight();
      next.resolve(true);
    } else {
      this.permits++;
    }

    this.checkInvariants();
  }

  getInFlight(): number {
    return this.currentInFlight;
  }

  getPeak(): number {
    return this.peakInFlight;
  }

  getAvailable(): number {
    return this.permits;
  }

  getWaiting(): number {
    return this.waiting.length;
  }

  private markInFlight(): void {
    this.currentInFlight++;
    if (this.currentInFlight > this.peakInFlight) {
      this.peakInFlight = this.currentInFlight;
    }
  }

  private checkInvariants(): void {
    checkInvariants({
      semaphorePermits: this.permits,
      semaphoreInFlight: this.currentInFlight,
      semaphoreMaxPermits: this.maxPermits,
    }, ['SEMAPHORE_PERMITS_NON_NEGATIVE', 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED']);
  }
}
