import { abortError } from './abort';

interface RateWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Process-wide gate on model calls: at most `requestsPerMinute` permits are granted
 * in any sliding window of `windowMs`.
 *
 * Callers queue in FIFO order and are never turned away. A caller whose signal
 * aborts while queued leaves the queue without consuming a permit.
 */
export class RateLimiter {
  private readonly granted: number[] = [];
  private readonly waiters: RateWaiter[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    public readonly requestsPerMinute: number,
    private readonly windowMs: number = 60_000,
  ) {
    if (!Number.isInteger(requestsPerMinute) || requestsPerMinute < 1) {
      throw new RangeError(`requestsPerMinute must be a positive integer, got ${requestsPerMinute}`);
    }
  }

  /** Number of callers waiting for a permit. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Permits that could be granted right now. */
  get available(): number {
    this.prune(Date.now());
    return this.requestsPerMinute - this.granted.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    const now = Date.now();
    this.prune(now);
    if (this.waiters.length === 0 && this.granted.length < this.requestsPerMinute) {
      this.granted.push(now);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: RateWaiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(abortError(signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  private prune(now: number): void {
    while (this.granted.length > 0 && this.granted[0] <= now - this.windowMs) {
      this.granted.shift();
    }
  }

  private schedule(): void {
    if (this.timer !== null || this.waiters.length === 0) {
      return;
    }

    const oldest = this.granted[0];
    const delay = oldest === undefined ? 0 : Math.max(0, oldest + this.windowMs - Date.now());
    this.timer = setTimeout(() => this.drain(), delay);
  }

  private drain(): void {
    this.timer = null;
    const now = Date.now();
    this.prune(now);

    while (this.granted.length < this.requestsPerMinute) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        break;
      }
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      this.granted.push(now);
      waiter.resolve();
    }

    this.schedule();
  }
}
