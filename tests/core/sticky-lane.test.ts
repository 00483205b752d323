/**
 * Sticky Lane and Detached Task Registry Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { StickyLane } from '../../src/core/sticky-lane.js';
import { DetachedTaskRegistry } from '../../src/core/detached-tasks.js';
import type { CancellationToken } from '../../src/integrations/cancellation.js';

function createDeferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const never = () => new Promise<never>(() => undefined);

// =============================================================================
// STICKY LANE
// =============================================================================

describe('StickyLane', () => {
  it('should run jobs one at a time in submission order', async () => {
    const lane = new StickyLane();
    const gate = createDeferred<void>();
    const order: string[] = [];

    const first = lane.run('first', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = lane.run('second', async () => {
      order.push('second:start');
      return 2;
    });

    await vi.waitFor(() => expect(order).toEqual(['first:start']));
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should share session state between calls', async () => {
    const lane = new StickyLane();

    await lane.run('open', async (_token, session) => {
      session.set('page', 'home');
    });
    const page = await lane.run('read', async (_token, session) => session.get('page'));

    expect(page).toBe('home');
  });

  it('should keep the queue moving after a failed job', async () => {
    const lane = new StickyLane();

    await expect(
      lane.run('bad', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await lane.run('good', async () => 'ok')).toBe('ok');
  });

  it('should cancel the running job and start clean after reset', async () => {
    const detached = new DetachedTaskRegistry();
    const lane = new StickyLane(detached);
    let captured: CancellationToken | undefined;

    void lane.run('browse', async (token, session) => {
      captured = token;
      session.set('page', 'home');
      return never();
    });
    await vi.waitFor(() => expect(lane.busy).toBe(true));

    lane.reset('tool timed out');

    expect(captured?.isCancellationRequested).toBe(true);
    expect(captured?.cancellationReason).toBe('tool timed out');
    expect(lane.busy).toBe(false);
    expect(lane.resets).toBe(1);
    expect(lane.currentGeneration).toBe(1);
    expect(detached.pending().map((t) => t.label)).toEqual(['sticky:browse']);
    expect(await lane.run('next', async (_token, session) => session.size)).toBe(0);
  });

  it('should release queued jobs with an error on reset', async () => {
    const lane = new StickyLane();

    void lane.run('stuck', never);
    const queued = lane.run('queued', async () => 'never runs');
    await vi.waitFor(() => expect(lane.busy).toBe(true));

    lane.reset('stuck');

    await expect(queued).rejects.toThrow('Sticky lane was reset: stuck');
  });

  it('should be clean even when a cancellation callback throws', async () => {
    const lane = new StickyLane();

    void lane.run('browse', async (token) => {
      token.register(() => {
        throw new Error('cleanup failed');
      });
      return never();
    });
    await vi.waitFor(() => expect(lane.busy).toBe(true));

    expect(() => lane.reset()).toThrow('Cancellation callback failed');
    expect(lane.busy).toBe(false);
    expect(await lane.run('next', async () => 'ok')).toBe('ok');
  });

  it('should refuse work once closed', async () => {
    const lane = new StickyLane();
    lane.close();

    await expect(lane.run('late', async () => 1)).rejects.toThrow('Sticky lane is closed');
  });
});

// =============================================================================
// DETACHED TASKS
// =============================================================================

describe('DetachedTaskRegistry', () => {
  it('should list tracked tasks until they settle', async () => {
    const registry = new DetachedTaskRegistry(() => 42);
    const task = createDeferred<string>();

    registry.track('slow', task.promise);
    expect(registry.pending()).toEqual([{ id: 1, label: 'slow', detachedAt: 42 }]);

    task.resolve('done');
    await registry.drain();

    expect(registry.size).toBe(0);
  });

  it('should absorb rejections of abandoned work', async () => {
    const registry = new DetachedTaskRegistry();

    registry.track('failing', Promise.reject(new Error('late failure')));
    await registry.drain();

    expect(registry.size).toBe(0);
  });
});
