/**
 * Cancellation Tokens
 *
 * Run-level and agent-level cancellation. A run owns one source; every agent
 * execution links a child source to it and adds its own timeout, so a run
 * cancel reaches every in-flight agent while an agent timeout stays local.
 *
 * Collaborators that speak AbortSignal (fetch, child_process) get one through
 * `toAbortSignal()`.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   const agentCts = createLinkedToken(cts).cancelAfter(30_000);
 *   await race(work(toAbortSignal(agentCts.token)), agentCts.token);
 */

import { RunCancelledError } from '../errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Token that can be checked for cancellation.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  /** The reason for cancellation (if cancelled) */
  readonly cancellationReason?: string;
  /** Resolves when cancelled */
  readonly onCancellationRequested: Promise<string | undefined>;
  register(callback: (reason?: string) => void): { dispose: () => void };
  throwIfCancellationRequested(): void;
}

/**
 * Source that controls a cancellation token.
 */
export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  /** True once cancelled by its own cancelAfter() timer */
  readonly timedOut: boolean;
  cancel(reason?: string): void;
  /** Cancel after timeout */
  cancelAfter(ms: number, reason?: string): this;
  /** Release the timer and parent registrations */
  dispose(): void;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class CancellationTokenImpl implements CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private _callbacks = new Set<(reason?: string) => void>();
  private _promise: Promise<string | undefined>;
  private _resolve: (reason?: string) => void = () => {};

  constructor() {
    this._promise = new Promise((r) => {
      this._resolve = r;
    });
  }

  get isCancellationRequested(): boolean {
    return this._cancelled;
  }

  get cancellationReason(): string | undefined {
    return this._reason;
  }

  get onCancellationRequested(): Promise<string | undefined> {
    return this._promise;
  }

  register(callback: (reason?: string) => void): { dispose: () => void } {
    if (this._cancelled) {
      callback(this._reason);
      return { dispose: () => {} };
    }
    this._callbacks.add(callback);
    return { dispose: () => this._callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this._cancelled) {
      throw new RunCancelledError(this._reason);
    }
  }

  /** @internal */
  _cancel(reason?: string): void {
    if (this._cancelled) return;
    this._cancelled = true;
    this._reason = reason;
    this._resolve(reason);
    const callbacks = [...this._callbacks];
    this._callbacks.clear();
    for (const cb of callbacks) {
      cb(reason);
    }
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private _token = new CancellationTokenImpl();
  private _timeoutId?: ReturnType<typeof setTimeout>;
  private _timedOut = false;
  private _disposed = false;
  private _disposables: Array<{ dispose: () => void }> = [];

  get token(): CancellationToken {
    return this._token;
  }

  get isCancellationRequested(): boolean {
    return this._token.isCancellationRequested;
  }

  get timedOut(): boolean {
    return this._timedOut;
  }

  cancel(reason?: string): void {
    if (this._disposed) return;
    this._token._cancel(reason);
  }

  cancelAfter(ms: number, reason = 'Operation timed out'): this {
    if (this._disposed || this._token.isCancellationRequested) return this;
    if (this._timeoutId) clearTimeout(this._timeoutId);
    this._timeoutId = setTimeout(() => {
      if (this._token.isCancellationRequested) return;
      this._timedOut = true;
      this.cancel(reason);
    }, ms);
    return this;
  }

  /** @internal */
  _track(disposable: { dispose: () => void }): void {
    this._disposables.push(disposable);
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    if (this._timeoutId) {
      clearTimeout(this._timeoutId);
      this._timeoutId = undefined;
    }
    for (const d of this._disposables) d.dispose();
    this._disposables = [];
    // Not a cancel: the guarded operation finished on its own.
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

/**
 * Create a child source that cancels when any parent cancels. Cancelling the
 * child never propagates upward.
 */
export function createLinkedToken(...parents: Array<CancellationTokenSource | CancellationToken>): CancellationTokenSource {
  const linked = new CancellationTokenSourceImpl();

  for (const parent of parents) {
    const token = 'token' in parent ? parent.token : parent;
    if (token.isCancellationRequested) {
      linked.cancel(token.cancellationReason);
      break;
    }
    linked._track(token.register((reason) => linked.cancel(reason)));
  }

  return linked;
}

/**
 * A token that is never cancelled.
 */
export const NONE_TOKEN: CancellationToken = {
  isCancellationRequested: false,
  cancellationReason: undefined,
  onCancellationRequested: new Promise<string | undefined>(() => {}),
  register: () => ({ dispose: () => {} }),
  throwIfCancellationRequested: () => {},
};

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Race a promise against cancellation. The losing promise keeps running;
 * callers that can stop it should also pass `toAbortSignal(token)` down.
 */
export function race<T>(promise: Promise<T>, token: CancellationToken): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const registration = token.register((reason) => reject(new RunCancelledError(reason)));
    promise.then(
      (value) => {
        registration.dispose();
        resolve(value);
      },
      (error: unknown) => {
        registration.dispose();
        reject(error);
      },
    );
  });
}

/**
 * Create an AbortSignal from a CancellationToken.
 */
export function toAbortSignal(token: CancellationToken): AbortSignal {
  const controller = new AbortController();

  if (token.isCancellationRequested) {
    controller.abort(new RunCancelledError(token.cancellationReason));
  } else {
    token.register((reason) => controller.abort(new RunCancelledError(reason)));
  }

  return controller.signal;
}

export function isCancellationError(error: unknown): error is RunCancelledError {
  return error instanceof RunCancelledError;
}
