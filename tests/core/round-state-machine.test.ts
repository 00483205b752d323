/**
 * Round State Machine Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  RoundStateMachine,
  canTransition,
  createRoundStateMachine,
  type RoundStateEvent,
} from '../../src/core/round-state-machine.js';

describe('RoundStateMachine', () => {
  let sm: RoundStateMachine;

  beforeEach(() => {
    sm = createRoundStateMachine({ now: () => 100 });
  });

  it('should start in BUILDING_CONTEXT at round zero', () => {
    expect(sm.getState()).toBe('BUILDING_CONTEXT');
    expect(sm.round).toBe(0);
    expect(sm.isTerminated).toBe(false);
  });

  it('should count a round on each BUILDING_CONTEXT to CALLING_MODEL move', () => {
    sm.transition('CALLING_MODEL', 'context ready');
    sm.transition('HANDLING_TOOLS', 'tools');
    sm.transition('BUILDING_CONTEXT', 'results');
    sm.transition('CALLING_MODEL', 'context ready');

    expect(sm.round).toBe(2);
  });

  it('should not count a retry as a new round', () => {
    sm.transition('CALLING_MODEL', 'context ready');
    sm.transition('RETRY_WITH_FALLBACK', 'm1 failed');
    sm.transition('CALLING_MODEL', 'retrying with m2');

    expect(sm.round).toBe(1);
    expect(sm.getTransitions().map((t) => t.to)).toEqual(['CALLING_MODEL', 'RETRY_WITH_FALLBACK', 'CALLING_MODEL']);
  });

  it('should reject invalid transitions without changing state', () => {
    expect(sm.transition('HANDLING_TOOLS', 'skip')).toBe(false);
    expect(sm.getState()).toBe('BUILDING_CONTEXT');
    expect(sm.getTransitions()).toHaveLength(0);
  });

  it('should only allow termination after a final response', () => {
    expect(canTransition('FINAL_RESPONSE', 'TERMINATED')).toBe(true);
    expect(canTransition('FINAL_RESPONSE', 'CALLING_MODEL')).toBe(false);
    expect(canTransition('TERMINATED', 'BUILDING_CONTEXT')).toBe(false);
  });

  it('should terminate once and report the status', () => {
    const events: RoundStateEvent[] = [];
    sm.on((e) => events.push(e));
    sm.transition('CALLING_MODEL', 'context ready');

    expect(sm.terminate('success', 'done')).toBe(true);
    expect(sm.terminate('fatal_error', 'again')).toBe(false);
    expect(sm.terminationStatus).toBe('success');
    expect(events.at(-1)).toEqual({ type: 'state.terminated', status: 'success', round: 1, reason: 'done' });
    expect(events[0]).toEqual({
      type: 'state.changed',
      transition: { from: 'BUILDING_CONTEXT', to: 'CALLING_MODEL', round: 1, reason: 'context ready', timestamp: 100 },
    });
  });

  it('should keep notifying when a listener throws', () => {
    const seen: string[] = [];
    sm.on(() => {
      throw new Error('listener bug');
    });
    const unsubscribe = sm.on((e) => seen.push(e.type));

    sm.transition('CALLING_MODEL', 'context ready');
    unsubscribe();
    sm.transition('FINAL_RESPONSE', 'answer');

    expect(seen).toEqual(['state.changed']);
  });
});
