/**
 * Model Caller
 *
 * One logical model call with validation, fallback and usage recording.
 * Retry is an explicit state machine rather than nested handlers:
 *
 *   attempt -> classify failure -> decide { retry_fallback | abort }
 *
 * `decideRetry` is pure, so the attempt bound and the chain-exhausted
 * condition are testable without a provider. Every failure moves to the
 * next model in the chain; rate-limit class failures sleep first. When no
 * candidate is left the caller sees the underlying error unchanged.
 */

import { ModelValidationError, ProviderError, categorizeError, formatError, isRateLimited } from '../errors/index.js';
import type { BackoffConfig } from '../config/schema.js';
import { REASONING_EFFORTS } from '../config/schema.js';
import type { UsageAccountant } from '../costs/usage-accountant.js';
import { sleep as defaultSleep } from '../integrations/cancellation.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import type { FallbackChain } from '../providers/fallback-chain.js';
import type { ProviderRouter } from '../providers/router.js';
import type { ChatResponse, LLMProvider, ResolvedRoute, ToolDefinitionSchema } from '../providers/types.js';
import type { EventSink, LoopEvent, Message, ReasoningEffort, UsageRecord } from '../types.js';

const log = createComponentLogger('ModelCaller');

// =============================================================================
// TYPES
// =============================================================================

export type FailureClass = 'rate_limited' | 'validation' | 'empty_response' | 'transport';

export interface RetryState {
  /** 1-based attempt that just failed */
  attempt: number;
  /** Fallback swaps already made */
  fallbacksUsed: number;
  model: string;
}

export type RetryDecision =
  | { action: 'retry_fallback'; model: string; delayMs: number; failure: FailureClass }
  | { action: 'abort'; reason: 'chain_exhausted' | 'retry_limit'; failure: FailureClass };

export interface RetryPolicy {
  maxRetries: number;
  backoff: BackoffConfig;
}

export interface ModelCallInput {
  taskId: string;
  category: string;
  model: string;
  messages: Message[];
  tools?: ToolDefinitionSchema[];
  reasoningEffort: ReasoningEffort;
}

export interface ModelCallResult {
  response: ChatResponse;
  /** Model that produced the response; differs from the input after a fallback */
  model: string;
  route: ResolvedRoute;
  usage: UsageRecord;
  attempts: number;
}

export interface ModelCallerConfig {
  provider: LLMProvider;
  router: ProviderRouter;
  chain: FallbackChain;
  accountant: UsageAccountant;
  events: EventSink;
  maxRetries: number;
  backoff: BackoffConfig;
  maxOutputTokens: number;
  requestTimeoutMs: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

// =============================================================================
// DECISION LOGIC
// =============================================================================

export function normalizeReasoningEffort(value: string | undefined, fallback: ReasoningEffort = 'medium'): ReasoningEffort {
  const v = (value ?? '').trim().toLowerCase();
  for (const effort of REASONING_EFFORTS) {
    if (effort === v) return effort;
  }
  return fallback;
}

export function classifyFailure(error: Error): FailureClass {
  if (error instanceof ModelValidationError) return 'validation';
  if (isRateLimited(error)) return 'rate_limited';
  if (error instanceof ProviderError && error.context.emptyResponse === true) return 'empty_response';
  return 'transport';
}

/**
 * initial × multiplier^(attempt−1), capped, optionally scaled into [0.75, 1.25].
 */
export function computeBackoff(attempt: number, backoff: BackoffConfig, random: () => number = Math.random): number {
  const base = backoff.initialMs * Math.pow(backoff.multiplier, Math.max(0, attempt - 1));
  const capped = Math.min(base, backoff.maxMs);
  return backoff.jitter ? Math.round(capped * (0.75 + random() * 0.5)) : capped;
}

/**
 * Decide what follows a failed attempt. Total attempts never exceed
 * `min(chain length, maxRetries) + 1`, even if the chain lists a model twice.
 */
export function decideRetry(
  state: RetryState,
  error: Error,
  chain: Pick<FallbackChain, 'next' | 'length'>,
  policy: RetryPolicy,
  random: () => number = Math.random
): RetryDecision {
  const failure = classifyFailure(error);
  const next = chain.next(state.model);

  if (next === undefined) {
    return { action: 'abort', reason: 'chain_exhausted', failure };
  }
  if (state.fallbacksUsed >= policy.maxRetries || state.fallbacksUsed >= chain.length) {
    return { action: 'abort', reason: 'retry_limit', failure };
  }

  const delayMs = failure === 'rate_limited' ? computeBackoff(state.fallbacksUsed + 1, policy.backoff, random) : 0;
  return { action: 'retry_fallback', model: next, delayMs, failure };
}

function isEmptyResponse(response: ChatResponse): boolean {
  const content = response.message.content;
  const hasText = typeof content === 'string' ? content.trim().length > 0 : Array.isArray(content) && content.length > 0;
  return !hasText && (response.message.tool_calls?.length ?? 0) === 0;
}

// =============================================================================
// CALLER
// =============================================================================

type AttemptOutcome =
  | { ok: true; response: ChatResponse; route: ResolvedRoute; usage: UsageRecord }
  | { ok: false; error: Error };

export class ModelCaller {
  private config: Required<Omit<ModelCallerConfig, 'sleep' | 'random' | 'now'>>;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private now: () => number;

  constructor(config: ModelCallerConfig) {
    this.config = {
      provider: config.provider,
      router: config.router,
      chain: config.chain,
      accountant: config.accountant,
      events: config.events,
      maxRetries: config.maxRetries,
      backoff: config.backoff,
      maxOutputTokens: config.maxOutputTokens,
      requestTimeoutMs: config.requestTimeoutMs,
    };
    this.sleep = config.sleep ?? ((ms) => defaultSleep(ms));
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
  }

  get chain(): FallbackChain {
    return this.config.chain;
  }

  /**
   * Call the model, walking the fallback chain on failure. Rejects with
   * the last attempt's own error once no candidate is left.
   */
  async call(input: ModelCallInput): Promise<ModelCallResult> {
    const { chain } = this.config;
    let state: RetryState = { attempt: 1, fallbacksUsed: 0, model: input.model };

    for (;;) {
      const outcome = await this.attempt(input, state.model);

      if (outcome.ok) {
        chain.recordSuccess(state.model);
        return {
          response: outcome.response,
          model: state.model,
          route: outcome.route,
          usage: outcome.usage,
          attempts: state.attempt,
        };
      }

      const { error } = outcome;
      chain.recordFailure(state.model, error);
      const decision = decideRetry(state, error, chain, this.config, this.random);

      this.emitSafely({
        type: 'llm_api_error',
        ts: new Date(this.now()).toISOString(),
        taskId: input.taskId,
        category: input.category,
        model: state.model,
        attempt: state.attempt,
        error: formatError(error),
        ...(error instanceof ProviderError && error.statusCode !== undefined && { statusCode: error.statusCode }),
        ...(decision.action === 'retry_fallback' && { nextModel: decision.model }),
      });

      if (decision.action === 'abort') {
        chain.recordExhausted(state.model, error);
        log.error('Model call failed, no fallback left', {
          taskId: input.taskId,
          model: state.model,
          attempts: state.attempt,
          reason: decision.reason,
          error: formatError(error),
        });
        throw error;
      }

      log.warn('Model call failed, falling back', {
        taskId: input.taskId,
        from: state.model,
        to: decision.model,
        failure: decision.failure,
        category: categorizeError(error),
        delayMs: decision.delayMs,
        error: formatError(error),
      });
      chain.recordFallback(state.model, decision.model, error);

      if (decision.delayMs > 0) {
        await this.sleep(decision.delayMs);
      }

      state = { attempt: state.attempt + 1, fallbacksUsed: state.fallbacksUsed + 1, model: decision.model };
    }
  }

  private emitSafely(event: LoopEvent): void {
    try {
      this.config.events.emit(event);
    } catch (err) {
      log.warn('Event sink write failed', { type: event.type, error: formatError(err) });
    }
  }

  /**
   * One request. Usage is recorded whenever the provider answered, even
   * with an empty message, since those tokens were billed.
   */
  private async attempt(input: ModelCallInput, model: string): Promise<AttemptOutcome> {
    const { provider, router, accountant } = this.config;

    let route: ResolvedRoute;
    let response: ChatResponse;
    const started = this.now();
    try {
      route = router.route(model);
      response = await provider.chat({
        route,
        messages: input.messages,
        tools: input.tools,
        maxTokens: this.config.maxOutputTokens,
        reasoningEffort: input.reasoningEffort,
        timeoutMs: this.config.requestTimeoutMs,
      });
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }

    const { record } = await accountant.record({
      taskId: input.taskId,
      category: input.category,
      provider: route.provider,
      model: response.model ?? model,
      usage: response.usage,
      elapsedSec: (this.now() - started) / 1000,
    });

    if (isEmptyResponse(response)) {
      return { ok: false, error: ProviderError.emptyResponse(route.provider, model) };
    }

    return { ok: true, response, route, usage: record };
  }
}
