/**
 * Progress Broadcaster
 *
 * Fan-out channel for run lifecycle events. Delivery is at-most-once with no
 * replay: a subscriber sees only what is published after it subscribed.
 * The Run Ledger, not this stream, is the source of truth for current state.
 *
 * `publish()` is synchronous. It stamps the sequence number and hands the
 * event to every subscriber registered at that moment, in registration
 * order, so two publishes from the same caller can never reach a subscriber
 * reordered. Each subscription buffers independently; a subscriber that
 * stops reading loses its oldest events once its buffer is full and never
 * slows the producer or its peers.
 */

import { AtomicCounter } from '../../core/atomic-counter.js';
import { createComponentLogger } from '../utilities/logger.js';
import type { RunEvent, RunEventInput } from './run-events.js';

const log = createComponentLogger('ProgressBroadcaster');

// =============================================================================
// TYPES
// =============================================================================

export interface SubscriptionFilter {
  /** Only events of this run */
  runId?: string;
}

export interface Subscription extends AsyncIterable<RunEvent> {
  readonly id: number;
  /** Events discarded because the buffer was full */
  readonly dropped: number;
  readonly closed: boolean;
  /** Next event, or undefined once closed and drained */
  next(): Promise<RunEvent | undefined>;
  close(): void;
}

export type RunEventListener = (event: RunEvent) => void;

export interface BroadcasterStats {
  subscribers: number;
  listeners: number;
  published: number;
  dropped: number;
}

export interface ProgressBroadcasterConfig {
  /** Per-subscriber buffer size (default: 256) */
  bufferSize?: number;
  /** Clock override */
  now?: () => Date;
}

// =============================================================================
// SUBSCRIPTION
// =============================================================================

class BufferedSubscription implements Subscription {
  private buffer: RunEvent[] = [];
  private waiter: ((event: RunEvent | undefined) => void) | null = null;
  private _closed = false;
  private _dropped = 0;

  constructor(
    readonly id: number,
    private readonly filter: SubscriptionFilter,
    private readonly capacity: number,
    private readonly onClose: (sub: BufferedSubscription) => void,
  ) {}

  get dropped(): number {
    return this._dropped;
  }

  get closed(): boolean {
    return this._closed;
  }

  matches(event: RunEvent): boolean {
    return this.filter.runId === undefined || this.filter.runId === event.runId;
  }

  /** @internal */
  deliver(event: RunEvent): boolean {
    if (this._closed) return false;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(event);
      return false;
    }

    let dropped = false;
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this._dropped++;
      dropped = true;
    }
    this.buffer.push(event);
    return dropped;
  }

  next(): Promise<RunEvent | undefined> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve(event);
    if (this._closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(undefined);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RunEvent> {
    try {
      while (true) {
        const event = await this.next();
        if (!event) return;
        yield event;
      }
    } finally {
      this.close();
    }
  }
}

// =============================================================================
// BROADCASTER
// =============================================================================

export class ProgressBroadcaster {
  private readonly seq = new AtomicCounter();
  private readonly subscriptionIds = new AtomicCounter();
  private readonly subscriptions = new Set<BufferedSubscription>();
  private readonly listeners = new Set<RunEventListener>();
  private readonly bufferSize: number;
  private readonly now: () => Date;
  private published = 0;
  private droppedTotal = 0;
  private closed = false;

  constructor(config: ProgressBroadcasterConfig = {}) {
    this.bufferSize = Math.max(1, config.bufferSize ?? 256);
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Stamp and deliver an event. Returns the stamped event; after close()
   * the event is stamped but goes nowhere.
   */
  publish(input: RunEventInput): RunEvent {
    const event: RunEvent = {
      ...input,
      seq: this.seq.next(),
      timestamp: this.now().toISOString(),
    };
    if (this.closed) return event;

    this.published++;
    // Snapshot so (un)subscribing from inside a listener cannot skip anyone
    for (const sub of [...this.subscriptions]) {
      if (sub.matches(event) && sub.deliver(event)) {
        this.droppedTotal++;
      }
    }
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (err) {
        log.warn('Event listener threw', { type: event.type, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return event;
  }

  subscribe(filter: SubscriptionFilter = {}): Subscription {
    const sub = new BufferedSubscription(this.subscriptionIds.next(), filter, this.bufferSize, (s) =>
      this.subscriptions.delete(s),
    );
    if (this.closed) {
      sub.close();
      return sub;
    }
    this.subscriptions.add(sub);
    return sub;
  }

  /**
   * Synchronous listener, called inline by publish(). Returns an unsubscribe.
   */
  on(listener: RunEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): BroadcasterStats {
    return {
      subscribers: this.subscriptions.size,
      listeners: this.listeners.size,
      published: this.published,
      dropped: this.droppedTotal,
    };
  }

  /**
   * End every subscription. Buffered events can still be drained.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sub of [...this.subscriptions]) {
      sub.close();
    }
    this.subscriptions.clear();
    this.listeners.clear();
  }
}
