/**
 * Model Fallback Chain
 *
 * An ordered list of model identifiers tried after a failure. The chain
 * only answers "what comes after this model"; the model caller owns the
 * attempt loop and the retry bound.
 *
 * @example
 * ```typescript
 * const chain = createFallbackChain({ models: ['m1', 'm2', 'm3'] });
 * chain.next('m2');       // 'm3'
 * chain.next('m3');       // undefined, chain exhausted
 * chain.next('other');    // 'm1', chain not entered yet
 * ```
 */

// =============================================================================
// TYPES
// =============================================================================

export interface ModelHealth {
  model: string;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  lastError?: string;
  lastFailureAt?: number;
}

export interface FallbackChainConfig {
  models: readonly string[];
  /** Called when the caller moves from one model to the next */
  onFallback?: (from: string, to: string, error: Error) => void;
  now?: () => number;
}

export type FallbackChainEvent =
  | { type: 'model.success'; model: string }
  | { type: 'model.failure'; model: string; error: Error }
  | { type: 'model.fallback'; from: string; to: string; error: Error }
  | { type: 'chain.exhausted'; model: string; error: Error };

export type FallbackChainEventListener = (event: FallbackChainEvent) => void;

// =============================================================================
// FALLBACK CHAIN
// =============================================================================

export class FallbackChain {
  private models: readonly string[];
  private onFallback?: FallbackChainConfig['onFallback'];
  private now: () => number;
  private healthMap = new Map<string, ModelHealth>();
  private listeners: FallbackChainEventListener[] = [];

  constructor(config: FallbackChainConfig) {
    this.models = [...config.models];
    this.onFallback = config.onFallback;
    this.now = config.now ?? Date.now;
  }

  get length(): number {
    return this.models.length;
  }

  get entries(): readonly string[] {
    return this.models;
  }

  /**
   * Entry after `current`; the first entry when `current` is not in the
   * chain; undefined at the end or on an empty chain.
   */
  next(current: string): string | undefined {
    const index = this.models.indexOf(current);
    if (index === -1) return this.models[0];
    return this.models[index + 1];
  }

  // ---------------------------------------------------------------------------
  // Health and events
  // ---------------------------------------------------------------------------

  private healthOf(model: string): ModelHealth {
    let health = this.healthMap.get(model);
    if (!health) {
      health = { model, consecutiveFailures: 0, totalRequests: 0, totalFailures: 0 };
      this.healthMap.set(model, health);
    }
    return health;
  }

  recordSuccess(model: string): void {
    const health = this.healthOf(model);
    health.totalRequests++;
    health.consecutiveFailures = 0;
    this.emit({ type: 'model.success', model });
  }

  recordFailure(model: string, error: Error): void {
    const health = this.healthOf(model);
    health.totalRequests++;
    health.totalFailures++;
    health.consecutiveFailures++;
    health.lastError = error.message;
    health.lastFailureAt = this.now();
    this.emit({ type: 'model.failure', model, error });
  }

  recordFallback(from: string, to: string, error: Error): void {
    this.onFallback?.(from, to, error);
    this.emit({ type: 'model.fallback', from, to, error });
  }

  recordExhausted(model: string, error: Error): void {
    this.emit({ type: 'chain.exhausted', model, error });
  }

  getHealth(): ModelHealth[] {
    return Array.from(this.healthMap.values(), (h) => ({ ...h }));
  }

  on(listener: FallbackChainEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: FallbackChainEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

export function createFallbackChain(config: FallbackChainConfig): FallbackChain {
  return new FallbackChain(config);
}

/**
 * Human-readable health summary, one line per model.
 */
export function formatHealthStatus(health: ModelHealth[]): string {
  if (health.length === 0) return 'No model calls recorded';
  return health
    .map((h) => {
      const rate = h.totalRequests > 0 ? ((1 - h.totalFailures / h.totalRequests) * 100).toFixed(0) : '100';
      const err = h.lastError ? ` (last error: ${h.lastError})` : '';
      return `${h.model}: ${rate}% ok over ${h.totalRequests} calls${err}`;
    })
    .join('\n');
}
