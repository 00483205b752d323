/**
 * Sticky Lane
 *
 * Single sequential worker for stateful tools. Calls run one at a time in
 * submission order and share a session map that survives across rounds.
 * `reset()` tears the lane down: the running call's token is cancelled,
 * its promise is handed to the detached-task registry, the session is
 * dropped and the queue starts empty, so the next call runs immediately.
 */

import {
  createCancellationTokenSource,
  type CancellationToken,
  type CancellationTokenSource,
} from '../integrations/cancellation.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import { DetachedTaskRegistry } from './detached-tasks.js';

const log = createComponentLogger('StickyLane');

export type LaneJob<T> = (token: CancellationToken, session: Map<string, unknown>) => Promise<T>;

interface ResetGate {
  promise: Promise<never>;
  release: (reason: Error) => void;
}

function createResetGate(): ResetGate {
  let release: (reason: Error) => void = () => undefined;
  const promise = new Promise<never>((_, reject) => {
    release = reject;
  });
  promise.catch(() => undefined);
  return { promise, release };
}

export class StickyLane {
  private tail: Promise<void> = Promise.resolve();
  private running?: { source: CancellationTokenSource; promise: Promise<unknown>; label: string };
  private session = new Map<string, unknown>();
  private generation = 0;
  private resetCount = 0;
  private resetGate = createResetGate();
  private closed = false;
  private detached: DetachedTaskRegistry;

  constructor(detached: DetachedTaskRegistry = new DetachedTaskRegistry()) {
    this.detached = detached;
  }

  /** Increments on every reset */
  get currentGeneration(): number {
    return this.generation;
  }

  get resets(): number {
    return this.resetCount;
  }

  get busy(): boolean {
    return this.running !== undefined;
  }

  /**
   * Queue `job` behind the lane's current work.
   */
  run<T>(label: string, job: LaneJob<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Sticky lane is closed'));
    }

    // Work queued behind a stuck call is released with an error when the lane resets.
    const result = Promise.race([this.tail, this.resetGate.promise]).then(() => {
      const source = createCancellationTokenSource();
      const promise = job(source.token, this.session);
      this.running = { source, promise, label };
      return promise.finally(() => {
        if (this.running?.source === source) this.running = undefined;
        source.dispose();
      });
    });

    // The queue advances whether the job succeeds or fails; the caller sees the outcome via `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Abandon in-flight work and discard session state.
   */
  reset(reason = 'lane reset'): void {
    this.generation++;
    this.resetCount++;

    const running = this.running;
    this.running = undefined;
    this.resetGate.release(new Error(`Sticky lane was reset: ${reason}`));
    this.resetGate = createResetGate();
    this.session = new Map();
    this.tail = Promise.resolve();

    if (!running) {
      log.debug('Sticky lane reset', { reason, generation: this.generation });
      return;
    }
    log.warn('Sticky lane reset', { reason, generation: this.generation, abandoned: running.label });
    this.detached.track(`sticky:${running.label}`, running.promise);
    // Last: callback failures throw to the caller, the lane is already clean.
    running.source.cancel(reason);
  }

  /** Reset and refuse further work; called when the owning task ends */
  close(): void {
    if (this.closed) return;
    if (this.running) this.reset('lane closed');
    this.closed = true;
  }
}
