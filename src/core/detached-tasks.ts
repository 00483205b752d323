/**
 * Detached Task Registry
 *
 * A tool call that times out is no longer awaited, but its promise may
 * still be running. Each one is tracked here until it settles so the
 * engine can report (and tests can assert) that nothing leaked.
 */

import { formatError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('DetachedTasks');

export interface DetachedTask {
  id: number;
  label: string;
  detachedAt: number;
}

export class DetachedTaskRegistry {
  private tasks = new Map<number, { info: DetachedTask; done: Promise<void> }>();
  private nextId = 1;
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Track an abandoned promise. Its eventual rejection is logged here, so
   * it never surfaces as an unhandled rejection.
   */
  track(label: string, promise: Promise<unknown>): DetachedTask {
    const info: DetachedTask = { id: this.nextId++, label, detachedAt: this.now() };
    const done = promise.then(
      () => {
        this.tasks.delete(info.id);
        log.debug('Detached task finished', { label, id: info.id });
      },
      (err: unknown) => {
        this.tasks.delete(info.id);
        log.debug('Detached task failed after abandonment', { label, id: info.id, error: formatError(err) });
      }
    );
    this.tasks.set(info.id, { info, done });
    return info;
  }

  pending(): DetachedTask[] {
    return Array.from(this.tasks.values(), (t) => ({ ...t.info }));
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Resolves once every task tracked so far has settled */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.tasks.values(), (t) => t.done));
  }
}
