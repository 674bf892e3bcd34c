import { abortError } from './abort';

export interface WorkerSlot {
  /** Returns the slot to the pool. Idempotent. */
  release(): void;
}

interface SlotWaiter {
  resolve: (slot: WorkerSlot) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Global concurrency ceiling shared by every active review.
 *
 * Waiters are queued per owner (review id) and freed slots are handed out
 * round-robin across owners, so a review with many files cannot starve the
 * reviews submitted after it.
 */
export class WorkerPool {
  private active = 0;
  // Map order is the rotation order: the owner served last moves to the back.
  private readonly queues = new Map<string, SlotWaiter[]>();

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get pending(): number {
    let count = 0;
    for (const queue of this.queues.values()) {
      count += queue.length;
    }
    return count;
  }

  pendingFor(ownerId: string): number {
    return this.queues.get(ownerId)?.length ?? 0;
  }

  acquire(ownerId: string, signal?: AbortSignal): Promise<WorkerSlot> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    if (this.active < this.capacity && this.queues.size === 0) {
      return Promise.resolve(this.grant());
    }

    return new Promise<WorkerSlot>((resolve, reject) => {
      const waiter: SlotWaiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.remove(ownerId, waiter);
          reject(abortError(signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }

      const queue = this.queues.get(ownerId);
      if (queue) {
        queue.push(waiter);
      } else {
        this.queues.set(ownerId, [waiter]);
      }
      this.dispatch();
    });
  }

  private grant(): WorkerSlot {
    this.active++;
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.active--;
        this.dispatch();
      },
    };
  }

  private remove(ownerId: string, waiter: SlotWaiter): void {
    const queue = this.queues.get(ownerId);
    if (!queue) {
      return;
    }
    const index = queue.indexOf(waiter);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.queues.delete(ownerId);
    }
  }

  private dispatch(): void {
    while (this.active < this.capacity) {
      const next = this.queues.entries().next();
      if (next.done) {
        return;
      }

      const [ownerId, queue] = next.value;
      const waiter = queue.shift();
      this.queues.delete(ownerId);
      if (queue.length > 0) {
        this.queues.set(ownerId, queue);
      }
      if (!waiter) {
        continue;
      }

      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve(this.grant());
    }
  }
}
