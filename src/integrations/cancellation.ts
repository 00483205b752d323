/**
 * Cancellation Tokens
 *
 * Tool execution slots and the sticky lane hand a token to every handler.
 * When a call times out the slot cancels its token; handlers that honour
 * `signal` (fetch, child processes, fs streams) stop, others keep running
 * detached until they settle on their own.
 *
 * Usage:
 *   const cts = createCancellationTokenSource();
 *   await handler(args, { cancellation: cts.token });
 *   // Later: cts.cancel('tool timed out');
 */

import { CancellationError } from '../errors/index.js';

export { CancellationError };

// =============================================================================
// TYPES
// =============================================================================

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly cancellationReason?: string;
  /** AbortSignal view of the token, for fetch and other signal-based APIs */
  readonly signal: AbortSignal;
  /** Register a callback for cancellation; runs immediately if already cancelled */
  register(callback: (reason?: string) => void): { dispose: () => void };
  throwIfCancellationRequested(): void;
}

export interface CancellationTokenSource {
  readonly token: CancellationToken;
  readonly isCancellationRequested: boolean;
  cancel(reason?: string): void;
  /** Cancel after `ms` unless disposed first */
  cancelAfter(ms: number): this;
  dispose(): void;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

class CancellationTokenImpl implements CancellationToken {
  private controller = new AbortController();
  private reason?: string;
  private callbacks = new Set<(reason?: string) => void>();
  /** Callback failures, surfaced to the canceller after every callback ran */
  private failures: unknown[] = [];

  get isCancellationRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get cancellationReason(): string | undefined {
    return this.reason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  register(callback: (reason?: string) => void): { dispose: () => void } {
    if (this.isCancellationRequested) {
      callback(this.reason);
      return { dispose: () => undefined };
    }
    this.callbacks.add(callback);
    return { dispose: () => this.callbacks.delete(callback) };
  }

  throwIfCancellationRequested(): void {
    if (this.isCancellationRequested) {
      throw new CancellationError(this.reason);
    }
  }

  cancel(reason?: string): void {
    if (this.isCancellationRequested) return;
    this.reason = reason;
    this.controller.abort(new CancellationError(reason));
    for (const cb of this.callbacks) {
      try {
        cb(reason);
      } catch (err) {
        this.failures.push(err);
      }
    }
    this.callbacks.clear();
    if (this.failures.length > 0) {
      const failures = this.failures;
      this.failures = [];
      throw new AggregateError(failures, 'Cancellation callback failed');
    }
  }
}

class CancellationTokenSourceImpl implements CancellationTokenSource {
  private impl = new CancellationTokenImpl();
  private timeoutId?: ReturnType<typeof setTimeout>;
  private disposed = false;

  get token(): CancellationToken {
    return this.impl;
  }

  get isCancellationRequested(): boolean {
    return this.impl.isCancellationRequested;
  }

  cancel(reason?: string): void {
    if (this.disposed) return;
    this.impl.cancel(reason);
  }

  cancelAfter(ms: number): this {
    if (this.disposed || this.impl.isCancellationRequested) return this;
    this.timeoutId = setTimeout(() => this.cancel('Operation timed out'), ms);
    return this;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.timeoutId) {
      clearTimeout(this.timeoutId);
      this.timeoutId = undefined;
    }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export function createCancellationTokenSource(): CancellationTokenSource {
  return new CancellationTokenSourceImpl();
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Sleep with cancellation support.
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  return new Promise((resolve, reject) => {
    if (token?.isCancellationRequested) {
      reject(new CancellationError(token.cancellationReason));
      return;
    }

    const registration = token?.register((reason) => {
      clearTimeout(id);
      reject(new CancellationError(reason));
    });
    const id = setTimeout(() => {
      registration?.dispose();
      resolve();
    }, ms);
  });
}
