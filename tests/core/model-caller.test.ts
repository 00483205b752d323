/**
 * Model Caller Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { defaultConfig } from '../../src/config/schema.js';
import {
  ModelCaller,
  classifyFailure,
  computeBackoff,
  decideRetry,
  normalizeReasoningEffort,
} from '../../src/core/model-caller.js';
import { PricingCache } from '../../src/costs/pricing.js';
import { UsageAccountant } from '../../src/costs/usage-accountant.js';
import { ModelValidationError, ProviderError } from '../../src/errors/index.js';
import { MemoryEventLog } from '../../src/persistence/event-log.js';
import { ScriptedProvider, textReply, type ScriptStep } from '../../src/providers/adapters/mock.js';
import { FallbackChain, type FallbackChainEvent } from '../../src/providers/fallback-chain.js';
import { ProviderRouter } from '../../src/providers/router.js';
import type { EventSink } from '../../src/types.js';

// =============================================================================
// TEST HELPERS
// =============================================================================

const backoff = { initialMs: 2000, maxMs: 60_000, multiplier: 2, jitter: false };
const policy = { maxRetries: 3, backoff };

function createMockCaller(
  steps: ScriptStep[],
  options: { chain?: string[]; maxRetries?: number; events?: EventSink } = {}
) {
  const provider = new ScriptedProvider(steps);
  const log = new MemoryEventLog();
  const events = options.events ?? log;
  const chain = new FallbackChain({ models: options.chain ?? ['m1', 'm2', 'm3'] });
  const router = new ProviderRouter({
    routing: defaultConfig({ routing: { whitelist: ['primary', 'm1', 'm2', 'm3'] } }).routing,
    pricedModels: () => [],
    env: {},
  });
  const sleep = vi.fn(async (_ms: number) => undefined);
  const caller = new ModelCaller({
    provider,
    router,
    chain,
    accountant: new UsageAccountant({ pricing: new PricingCache(), events }),
    events,
    maxRetries: options.maxRetries ?? 3,
    backoff: { ...backoff, jitter: true },
    maxOutputTokens: 1024,
    requestTimeoutMs: 1000,
    sleep,
    random: () => 0.5,
  });
  return { caller, provider, log, chain, sleep };
}

const input = (model: string) => ({
  taskId: 'task-1',
  category: 'task',
  model,
  messages: [{ role: 'user' as const, content: 'hi' }],
  reasoningEffort: 'medium' as const,
});

// =============================================================================
// DECISION LOGIC
// =============================================================================

describe('decideRetry', () => {
  const chain = new FallbackChain({ models: ['m1', 'm2', 'm3'] });

  it('should move to the next model without delay for transport failures', () => {
    expect(decideRetry({ attempt: 1, fallbacksUsed: 0, model: 'm1' }, new Error('reset'), chain, policy)).toEqual({
      action: 'retry_fallback',
      model: 'm2',
      delayMs: 0,
      failure: 'transport',
    });
  });

  it('should back off before retrying a rate-limited call', () => {
    const error = ProviderError.fromStatus('openrouter', 429);
    expect(decideRetry({ attempt: 2, fallbacksUsed: 1, model: 'm1' }, error, chain, policy)).toEqual({
      action: 'retry_fallback',
      model: 'm2',
      delayMs: 4000,
      failure: 'rate_limited',
    });
  });

  it('should abort at the end of the chain', () => {
    expect(decideRetry({ attempt: 3, fallbacksUsed: 2, model: 'm3' }, new Error('x'), chain, policy)).toEqual({
      action: 'abort',
      reason: 'chain_exhausted',
      failure: 'transport',
    });
  });

  it('should abort once the retry bound is reached', () => {
    const bounded = { ...policy, maxRetries: 1 };
    expect(decideRetry({ attempt: 2, fallbacksUsed: 1, model: 'm1' }, new Error('x'), chain, bounded)).toMatchObject({
      action: 'abort',
      reason: 'retry_limit',
    });
  });
});

describe('classifyFailure', () => {
  it('should classify each failure family', () => {
    expect(classifyFailure(new ModelValidationError('x', 'no'))).toBe('validation');
    expect(classifyFailure(ProviderError.fromStatus('p', 413))).toBe('rate_limited');
    expect(classifyFailure(ProviderError.emptyResponse('p', 'm1'))).toBe('empty_response');
    expect(classifyFailure(ProviderError.fromStatus('p', 502))).toBe('transport');
  });
});

describe('computeBackoff', () => {
  it('should grow exponentially up to the ceiling', () => {
    expect(computeBackoff(1, backoff)).toBe(2000);
    expect(computeBackoff(3, backoff)).toBe(8000);
    expect(computeBackoff(10, backoff)).toBe(60_000);
  });

  it('should scale by the jitter factor', () => {
    expect(computeBackoff(1, { ...backoff, jitter: true }, () => 0)).toBe(1500);
    expect(computeBackoff(1, { ...backoff, jitter: true }, () => 1)).toBe(2500);
  });
});

describe('normalizeReasoningEffort', () => {
  it('should accept known levels case-insensitively', () => {
    expect(normalizeReasoningEffort(' HIGH ')).toBe('high');
    expect(normalizeReasoningEffort('xhigh')).toBe('xhigh');
  });

  it('should fall back for unknown values', () => {
    expect(normalizeReasoningEffort('extreme')).toBe('medium');
    expect(normalizeReasoningEffort(undefined, 'low')).toBe('low');
  });
});

// =============================================================================
// CALLER
// =============================================================================

describe('ModelCaller', () => {
  it('should return the first successful response', async () => {
    const { caller, provider, log } = createMockCaller([textReply('hello', { cost: 0.01 })]);

    const result = await caller.call(input('m1'));

    expect(result.model).toBe('m1');
    expect(result.attempts).toBe(1);
    expect(result.usage.cost).toBe(0.01);
    expect(provider.requests[0]?.route.wireModel).toBe('m1');
    expect(provider.requests[0]?.maxTokens).toBe(1024);
    expect(log.ofType('llm_usage')).toHaveLength(1);
  });

  it('should rethrow the last error unchanged when every model fails', async () => {
    const e1 = new Error('m1 down');
    const e2 = new Error('m2 down');
    const e3 = new Error('m3 down');
    const { caller, provider, log } = createMockCaller([e1, e2, e3]);

    const outcome = caller.call(input('m1'));

    await expect(outcome).rejects.toBe(e3);
    expect(provider.modelsCalled).toEqual(['m1', 'm2', 'm3']);
    expect(log.ofType('llm_api_error').map((e) => e.nextModel)).toEqual(['m2', 'm3', undefined]);
  });

  it('should never exceed min(chain length, maxRetries) + 1 attempts', async () => {
    const failures = Array.from({ length: 10 }, (_, i) => new Error(`fail ${i}`));
    const { caller, provider } = createMockCaller(failures, { maxRetries: 2 });

    await expect(caller.call(input('primary'))).rejects.toBe(failures[2]);
    expect(provider.modelsCalled).toEqual(['primary', 'm1', 'm2']);
  });

  it('should bound attempts when the chain repeats a model', async () => {
    const failures = Array.from({ length: 10 }, (_, i) => new Error(`fail ${i}`));
    const { caller, provider } = createMockCaller(failures, { chain: ['m1', 'm1'], maxRetries: 5 });

    await expect(caller.call(input('m1'))).rejects.toBeInstanceOf(Error);
    expect(provider.modelsCalled).toEqual(['m1', 'm1', 'm1']);
  });

  it('should sleep before falling back from a rate-limited model', async () => {
    const { caller, sleep, chain } = createMockCaller([ProviderError.fromStatus('openrouter', 429), textReply('ok')]);
    const events: FallbackChainEvent[] = [];
    chain.on((e) => events.push(e));

    const result = await caller.call(input('m1'));

    expect(result.model).toBe('m2');
    expect(result.attempts).toBe(2);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(events.map((e) => e.type)).toEqual(['model.failure', 'model.fallback', 'model.success']);
  });

  it('should record usage for an empty response and then fall back', async () => {
    const { caller, log } = createMockCaller([textReply('  '), textReply('second try')]);

    const result = await caller.call(input('m1'));

    expect(result.model).toBe('m2');
    expect(log.ofType('llm_usage')).toHaveLength(2);
    expect(log.ofType('llm_api_error')[0]?.error).toBe('ProviderError: Empty response from openrouter for m1');
  });

  it('should reject an unlisted model before any request', async () => {
    const { caller, provider } = createMockCaller([textReply('unused')], { chain: [] });

    await expect(caller.call(input('mystery/model'))).rejects.toBeInstanceOf(ModelValidationError);
    expect(provider.requests).toHaveLength(0);
  });

  it('should report the HTTP status in the error event', async () => {
    const { caller, log } = createMockCaller([ProviderError.fromStatus('openrouter', 503)], { chain: [] });

    await expect(caller.call(input('m1'))).rejects.toBeInstanceOf(ProviderError);
    expect(log.ofType('llm_api_error')[0]).toMatchObject({ model: 'm1', attempt: 1, statusCode: 503 });
  });

  it('should keep falling back when the event sink throws', async () => {
    const failingSink: EventSink = {
      emit: () => {
        throw new Error('disk full');
      },
    };
    const { caller, provider } = createMockCaller([new Error('m1 down'), textReply('recovered', { cost: 0.03 })], {
      events: failingSink,
    });

    const result = await caller.call(input('m1'));

    expect(result.model).toBe('m2');
    expect(result.attempts).toBe(2);
    expect(result.usage.cost).toBe(0.03);
    expect(provider.modelsCalled).toEqual(['m1', 'm2']);
  });
});
