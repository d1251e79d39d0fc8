/**
 * Worker Pool
 *
 * Process-wide bound on concurrently executing agents. Every run shares one
 * pool, so the bound holds across runs and not only within one.
 *
 * Waiters are served FIFO. A released slot passes straight to the next
 * waiter without going back through the free count, which keeps a burst of
 * new acquirers from overtaking queued ones.
 */

import { RunCancelledError, ValidationError } from '../../errors/index.js';
import type { CancellationToken } from '../cancellation.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface WorkerSlot {
  /** Idempotent. */
  release(): void;
}

export interface WorkerPoolStats {
  size: number;
  active: number;
  pending: number;
  /** Highest `active` seen since construction */
  peak: number;
  totalAcquired: number;
}

interface Waiter {
  grant: () => void;
  reject: (error: Error) => void;
}

// ─── Pool ───────────────────────────────────────────────────────────────────

export class WorkerPool {
  private active = 0;
  private peak = 0;
  private totalAcquired = 0;
  private queue: Waiter[] = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ValidationError(`Worker pool size must be a positive integer, got ${size}`, ['size']);
    }
  }

  /**
   * Wait for a slot. Rejects with RunCancelledError if `token` cancels while
   * queued; the place in the queue is given up.
   */
  acquire(token?: CancellationToken): Promise<WorkerSlot> {
    if (token?.isCancellationRequested) {
      return Promise.reject(new RunCancelledError(token.cancellationReason));
    }

    if (this.active < this.size && this.queue.length === 0) {
      this.occupy();
      return Promise.resolve(this.createSlot());
    }

    return new Promise<WorkerSlot>((resolve, reject) => {
      let registration: { dispose: () => void } | undefined;
      const waiter: Waiter = {
        grant: () => {
          registration?.dispose();
          resolve(this.createSlot());
        },
        reject,
      };
      this.queue.push(waiter);

      registration = token?.register((reason) => {
        const index = this.queue.indexOf(waiter);
        if (index === -1) return;
        this.queue.splice(index, 1);
        reject(new RunCancelledError(reason));
      });
    });
  }

  /**
   * Run `fn` inside a slot, releasing it however `fn` settles.
   */
  async run<T>(fn: () => Promise<T>, token?: CancellationToken): Promise<T> {
    const slot = await this.acquire(token);
    try {
      return await fn();
    } finally {
      slot.release();
    }
  }

  getStats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.active,
      pending: this.queue.length,
      peak: this.peak,
      totalAcquired: this.totalAcquired,
    };
  }

  /**
   * Reject every queued waiter. Slots already handed out stay valid.
   */
  drain(reason = 'Worker pool shut down'): void {
    const waiters = this.queue;
    this.queue = [];
    for (const waiter of waiters) {
      waiter.reject(new RunCancelledError(reason));
    }
  }

  private occupy(): void {
    this.active++;
    this.totalAcquired++;
    if (this.active > this.peak) this.peak = this.active;
  }

  private createSlot(): WorkerSlot {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  private handOff(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot moves to the waiter; active count is unchanged.
      this.totalAcquired++;
      next.grant();
      return;
    }
    this.active--;
  }
}
