/**
 * Monotonic counter for event sequence numbers and generated ids.
 * Node runs callbacks on one thread, so increments never interleave;
 * the class exists to give every producer the same source of order.
 */
export class AtomicCounter {
  private counter: number;

  constructor(initial = 0) {
    this.counter = initial;
  }

  /**
   * Returns the next value. The first call returns `initial + 1`.
   */
  next(): number {
    this.counter += 1;
    return this.counter;
  }
}
