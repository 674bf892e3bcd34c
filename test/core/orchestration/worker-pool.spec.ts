import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../../../src/core/orchestration/worker-pool';
import { ReviewCancelledError } from '../../../src/core/domain/errors/review.errors';

describe('WorkerPool', () => {
  it('should reject a capacity below one', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });

  it('should grant slots up to its capacity and queue the rest', async () => {
    const pool = new WorkerPool(2);

    await pool.acquire('a');
    await pool.acquire('a');
    const third = pool.acquire('a');

    expect(pool.inUse).toBe(2);
    expect(pool.pending).toBe(1);
    expect(pool.pendingFor('a')).toBe(1);

    const slots = await Promise.race([third, Promise.resolve('queued')]);
    expect(slots).toBe('queued');
  });

  it('should hand freed slots out round-robin across owners', async () => {
    const pool = new WorkerPool(1);
    const order: string[] = [];

    const first = await pool.acquire('review-a');
    const a1 = pool.acquire('review-a').then(slot => {
      order.push('a1');
      return slot;
    });
    const a2 = pool.acquire('review-a').then(slot => {
      order.push('a2');
      return slot;
    });
    const b1 = pool.acquire('review-b').then(slot => {
      order.push('b1');
      return slot;
    });

    first.release();
    (await a1).release();
    (await b1).release();
    (await a2).release();

    expect(order).toEqual(['a1', 'b1', 'a2']);
    expect(pool.inUse).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it('should ignore a second release of the same slot', async () => {
    const pool = new WorkerPool(2);
    const slot = await pool.acquire('a');
    await pool.acquire('a');

    slot.release();
    slot.release();

    expect(pool.inUse).toBe(1);
  });

  it('should remove an aborted waiter from its queue', async () => {
    const pool = new WorkerPool(1);
    const held = await pool.acquire('a');
    const controller = new AbortController();
    const waiting = pool.acquire('b', controller.signal);

    const reason = new ReviewCancelledError('b', 'cancelled by request');
    controller.abort(reason);

    await expect(waiting).rejects.toBe(reason);
    expect(pool.pendingFor('b')).toBe(0);

    held.release();
    expect(pool.inUse).toBe(0);
  });

  it('should not let a new caller jump the queue when a slot frees up', async () => {
    const pool = new WorkerPool(1);
    const held = await pool.acquire('a');
    const order: string[] = [];

    const queued = pool.acquire('b').then(slot => {
      order.push('b');
      return slot;
    });
    held.release();
    const late = pool.acquire('c').then(slot => {
      order.push('c');
      return slot;
    });

    (await queued).release();
    (await late).release();
    expect(order).toEqual(['b', 'c']);
  });
});
