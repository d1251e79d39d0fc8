/**
 * Circuit Breaker for model calls
 *
 * Stops hammering a failing model provider. Planning and code generation
 * both go through the same breaker, so a provider outage fails new runs
 * at once instead of burning every agent's timeout.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Service is failing, requests are rejected immediately
 * - HALF_OPEN: Testing if service has recovered
 *
 * @example
 * ```typescript
 * const breaker = new CircuitBreaker('anthropic', { failureThreshold: 5, resetTimeoutMs: 60_000 });
 * const client = breaker.wrap(new AnthropicClient(config));
 * ```
 */

import { CircuitOpenError, isCancellationRelated, toError } from '../errors/index.js';
import type { CompletionRequest, CompletionResponse, LlmClient } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Number of failures before opening circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms before attempting to close circuit (default: 60000) */
  resetTimeoutMs?: number;
  /** Number of test requests in half-open state (default: 1) */
  halfOpenRequests?: number;
  /** Which failures count against the provider (default: all but cancellations) */
  shouldTrip?: (error: Error) => boolean;
  now?: () => number;
}

export interface CircuitBreakerMetrics {
  state: CircuitState;
  /** Number of consecutive failures */
  failures: number;
  successes: number;
  totalRequests: number;
  /** Requests rejected due to open circuit */
  rejectedRequests: number;
  lastStateChange: number;
  /** When an OPEN circuit will let a probe through */
  resetAt?: number;
  lastError?: string;
}

export type CircuitBreakerEvent =
  | { type: 'state.change'; from: CircuitState; to: CircuitState; reason: string }
  | { type: 'request.success' }
  | { type: 'request.failure'; error: Error }
  | { type: 'request.rejected'; reason: string };

export type CircuitBreakerEventListener = (event: CircuitBreakerEvent) => void;

// =============================================================================
// CIRCUIT BREAKER
// =============================================================================

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private successes = 0;
  private totalRequests = 0;
  private rejectedRequests = 0;
  private lastStateChange: number;
  private resetAt?: number;
  private lastError?: string;
  private halfOpenInProgress = 0;
  private listeners: CircuitBreakerEventListener[] = [];
  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenRequests: number;
  private readonly shouldTrip: (error: Error) => boolean;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    config: CircuitBreakerConfig = {},
  ) {
    this.failureThreshold = config.failureThreshold ?? 5;
    this.resetTimeoutMs = config.resetTimeoutMs ?? 60_000;
    this.halfOpenRequests = config.halfOpenRequests ?? 1;
    this.shouldTrip = config.shouldTrip ?? ((error) => !isCancellationRelated(error));
    this.now = config.now ?? Date.now;
    this.lastStateChange = this.now();
  }

  getState(): CircuitState {
    this.checkStateTransition();
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    this.checkStateTransition();
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      totalRequests: this.totalRequests,
      rejectedRequests: this.rejectedRequests,
      lastStateChange: this.lastStateChange,
      resetAt: this.resetAt,
      lastError: this.lastError,
    };
  }

  canRequest(): boolean {
    this.checkStateTransition();

    switch (this.state) {
      case 'CLOSED':
        return true;
      case 'OPEN':
        return false;
      case 'HALF_OPEN':
        return this.halfOpenInProgress < this.halfOpenRequests;
    }
  }

  recordSuccess(): void {
    this.successes++;
    this.totalRequests++;

    if (this.state === 'HALF_OPEN') {
      this.halfOpenInProgress--;
      if (this.halfOpenInProgress === 0) {
        this.transitionTo('CLOSED', 'Half-open test succeeded');
      }
    } else if (this.state === 'CLOSED') {
      this.failures = 0;
    }

    this.emit({ type: 'request.success' });
  }

  recordFailure(error: Error): void {
    this.totalRequests++;
    this.lastError = error.message;

    if (this.state === 'HALF_OPEN') {
      this.halfOpenInProgress--;
    }

    if (!this.shouldTrip(error)) {
      this.emit({ type: 'request.failure', error });
      return;
    }

    this.failures++;
    if (this.state === 'HALF_OPEN') {
      this.transitionTo('OPEN', 'Half-open test failed');
    } else if (this.state === 'CLOSED' && this.failures >= this.failureThreshold) {
      this.transitionTo('OPEN', `Failure threshold reached (${this.failures})`);
    }

    this.emit({ type: 'request.failure', error });
  }

  reset(): void {
    this.transitionTo('CLOSED', 'Manual reset');
    this.halfOpenInProgress = 0;
  }

  trip(reason = 'Manual trip'): void {
    this.transitionTo('OPEN', reason);
  }

  /**
   * Run `fn` under the breaker.
   *
   * @throws CircuitOpenError without calling `fn` while the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canRequest()) {
      this.rejectedRequests++;
      this.emit({ type: 'request.rejected', reason: `Circuit is ${this.state}` });
      throw new CircuitOpenError(this.name, this.resetAt);
    }

    if (this.state === 'HALF_OPEN') {
      this.halfOpenInProgress++;
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(toError(error));
      throw error;
    }
  }

  /**
   * A client whose every completion goes through this breaker.
   */
  wrap(client: LlmClient): LlmClient {
    return {
      name: client.name,
      complete: (request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> =>
        this.execute(() => client.complete(request, signal)),
    };
  }

  on(listener: CircuitBreakerEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private checkStateTransition(): void {
    if (this.state === 'OPEN' && this.resetAt !== undefined && this.now() >= this.resetAt) {
      this.transitionTo('HALF_OPEN', 'Reset timeout elapsed');
    }
  }

  private transitionTo(newState: CircuitState, reason: string): void {
    const oldState = this.state;
    this.state = newState;
    this.lastStateChange = this.now();
    this.resetAt = newState === 'OPEN' ? this.now() + this.resetTimeoutMs : undefined;

    if (newState === 'CLOSED') {
      this.failures = 0;
    }

    this.emit({ type: 'state.change', from: oldState, to: newState, reason });
  }

  private emit(event: CircuitBreakerEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
