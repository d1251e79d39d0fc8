/**
 * Worker pool tests
 */

import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../src/integrations/orchestration/worker-pool.js';
import { createCancellationTokenSource } from '../src/integrations/cancellation.js';
import { RunCancelledError, ValidationError } from '../src/errors/index.js';

describe('WorkerPool', () => {
  it('rejects a size below one', () => {
    expect(() => new WorkerPool(0)).toThrow(ValidationError);
    expect(() => new WorkerPool(1.5)).toThrow(ValidationError);
  });

  it('never runs more than its size at once', async () => {
    const pool = new WorkerPool(3);
    let running = 0;
    let maxRunning = 0;

    const task = async (): Promise<void> => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
    };

    await Promise.all(Array.from({ length: 10 }, () => pool.run(task)));

    expect(maxRunning).toBe(3);
    expect(pool.getStats()).toEqual({ size: 3, active: 0, pending: 0, peak: 3, totalAcquired: 10 });
  });

  it('serves waiters in FIFO order', async () => {
    const pool = new WorkerPool(1);
    const first = await pool.acquire();
    const order: number[] = [];

    const waiting = [1, 2, 3].map((n) =>
      pool.acquire().then((slot) => {
        order.push(n);
        slot.release();
      }),
    );
    expect(pool.getStats().pending).toBe(3);

    first.release();
    await Promise.all(waiting);
    expect(order).toEqual([1, 2, 3]);
  });

  it('ignores a second release of the same slot', async () => {
    const pool = new WorkerPool(1);
    const slot = await pool.acquire();
    slot.release();
    slot.release();
    expect(pool.getStats().active).toBe(0);

    const again = await pool.acquire();
    expect(pool.getStats().active).toBe(1);
    again.release();
  });

  it('removes a waiter whose token is cancelled', async () => {
    const pool = new WorkerPool(1);
    const held = await pool.acquire();
    const cts = createCancellationTokenSource();

    const waiting = pool.acquire(cts.token);
    cts.cancel('stop');

    await expect(waiting).rejects.toBeInstanceOf(RunCancelledError);
    expect(pool.getStats().pending).toBe(0);
    held.release();
    expect(pool.getStats().active).toBe(0);
  });

  it('rejects immediately with an already cancelled token', async () => {
    const pool = new WorkerPool(2);
    const cts = createCancellationTokenSource();
    cts.cancel();
    await expect(pool.acquire(cts.token)).rejects.toBeInstanceOf(RunCancelledError);
    expect(pool.getStats().totalAcquired).toBe(0);
  });

  it('releases the slot when the task throws', async () => {
    const pool = new WorkerPool(1);
    await expect(pool.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(pool.getStats().active).toBe(0);
  });

  it('drain rejects queued waiters but leaves held slots alone', async () => {
    const pool = new WorkerPool(1);
    const held = await pool.acquire();
    const waiting = pool.acquire();

    pool.drain('closing');
    await expect(waiting).rejects.toThrow('closing');
    expect(pool.getStats().active).toBe(1);

    held.release();
    expect(pool.getStats().active).toBe(0);
  });
});
