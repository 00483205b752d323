/**
 * Fallback Chain Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createFallbackChain,
  formatHealthStatus,
  type FallbackChainEvent,
} from '../../src/providers/fallback-chain.js';

describe('FallbackChain', () => {
  describe('next', () => {
    it('should walk the chain in order', () => {
      const chain = createFallbackChain({ models: ['m1', 'm2', 'm3'] });

      expect(chain.next('m1')).toBe('m2');
      expect(chain.next('m2')).toBe('m3');
      expect(chain.next('m3')).toBeUndefined();
    });

    it('should start at the head for a model outside the chain', () => {
      expect(createFallbackChain({ models: ['m1', 'm2'] }).next('primary')).toBe('m1');
    });

    it('should have nothing after any model when empty', () => {
      const chain = createFallbackChain({ models: [] });
      expect(chain.next('primary')).toBeUndefined();
      expect(chain.length).toBe(0);
    });
  });

  describe('health', () => {
    it('should track failures and reset the streak on success', () => {
      const chain = createFallbackChain({ models: ['m1'], now: () => 1234 });

      chain.recordFailure('m1', new Error('down'));
      chain.recordFailure('m1', new Error('still down'));
      chain.recordSuccess('m1');

      expect(chain.getHealth()).toEqual([
        {
          model: 'm1',
          consecutiveFailures: 0,
          totalRequests: 3,
          totalFailures: 2,
          lastError: 'still down',
          lastFailureAt: 1234,
        },
      ]);
      expect(formatHealthStatus(chain.getHealth())).toBe('m1: 33% ok over 3 calls (last error: still down)');
    });

    it('should describe an empty history', () => {
      expect(formatHealthStatus([])).toBe('No model calls recorded');
    });
  });

  describe('events', () => {
    it('should notify listeners and the fallback hook', () => {
      const onFallback = vi.fn();
      const chain = createFallbackChain({ models: ['m1', 'm2'], onFallback });
      const events: FallbackChainEvent[] = [];
      const unsubscribe = chain.on((e) => events.push(e));
      const error = new Error('boom');

      chain.recordFallback('m1', 'm2', error);
      unsubscribe();
      chain.recordExhausted('m2', error);

      expect(onFallback).toHaveBeenCalledWith('m1', 'm2', error);
      expect(events).toEqual([{ type: 'model.fallback', from: 'm1', to: 'm2', error }]);
    });
  });
});
