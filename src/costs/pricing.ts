/**
 * Model Pricing Cache
 *
 * Per-million-token prices keyed by model identifier. The static table
 * ships with the package; live prices from the gateway are merged over it
 * lazily, at most once per TTL window (once per process when no TTL is set).
 *
 * A failed fetch is logged and not retried until the window expires, so a
 * dead pricing endpoint costs at most one slow call.
 */

import { z } from 'zod';
import staticPricingJson from './static-pricing.json' with { type: 'json' };
import { formatError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('Pricing');

// =============================================================================
// TYPES
// =============================================================================

export const PriceEntrySchema = z.object({
  /** USD per million regular input tokens */
  input: z.number().nonnegative(),
  /** USD per million cached input tokens */
  cachedInput: z.number().nonnegative(),
  /** USD per million output tokens */
  output: z.number().nonnegative(),
});

export type PriceEntry = z.infer<typeof PriceEntrySchema>;

export type PricingTable = Record<string, PriceEntry>;

export const PricingTableSchema = z.record(z.string(), PriceEntrySchema);

export type PricingFetcher = () => Promise<PricingTable>;

export interface PricingCacheConfig {
  staticTable?: PricingTable;
  /** Remote source; when absent only the static table is used */
  fetchPricing?: PricingFetcher;
  /** Clock in epoch milliseconds */
  now?: () => number;
  /** Refresh window; undefined means fetch once per cache lifetime */
  ttlMs?: number;
  /** Live data is merged only when it holds more entries than this */
  minLiveEntries?: number;
  /** Decimal places of the returned cost */
  decimals?: number;
}

export const STATIC_PRICING: Readonly<PricingTable> = PricingTableSchema.parse(staticPricingJson);

// =============================================================================
// LOOKUP AND COST
// =============================================================================

/**
 * Exact match first, then the longest key that prefixes `model`.
 * Equal-length prefixes keep the first one in table order.
 */
export function findPrice(table: Readonly<PricingTable>, model: string): PriceEntry | undefined {
  if (Object.hasOwn(table, model)) return table[model];

  let best: { key: string; price: PriceEntry } | undefined;
  for (const [key, price] of Object.entries(table)) {
    if (model.startsWith(key) && (!best || key.length > best.key.length)) {
      best = { key, price };
    }
  }
  return best?.price;
}

export function roundCost(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * `(prompt - cached) * input + cached * cachedInput + completion * output`, per million.
 */
export function computeCost(
  price: PriceEntry,
  promptTokens: number,
  completionTokens: number,
  cachedTokens: number,
  decimals: number
): number {
  const regularInput = Math.max(0, promptTokens - cachedTokens);
  const cost =
    (regularInput * price.input + cachedTokens * price.cachedInput + completionTokens * price.output) /
    1_000_000;
  return roundCost(cost, decimals);
}

// =============================================================================
// CACHE
// =============================================================================

export class PricingCache {
  private table: PricingTable;
  private fetchPricing?: PricingFetcher;
  private now: () => number;
  private ttlMs?: number;
  private minLiveEntries: number;
  private decimals: number;
  private fetchedAt?: number;
  private inflight?: Promise<void>;

  constructor(config: PricingCacheConfig = {}) {
    this.table = { ...(config.staticTable ?? STATIC_PRICING) };
    this.fetchPricing = config.fetchPricing;
    this.now = config.now ?? Date.now;
    this.ttlMs = config.ttlMs;
    this.minLiveEntries = config.minLiveEntries ?? 5;
    this.decimals = config.decimals ?? 6;
  }

  /** True when a refresh would hit the remote source */
  isStale(): boolean {
    if (!this.fetchPricing) return false;
    if (this.fetchedAt === undefined) return true;
    return this.ttlMs !== undefined && this.now() - this.fetchedAt >= this.ttlMs;
  }

  /**
   * Merge live prices over the table if the window has expired.
   * Concurrent callers share one fetch. Never rejects.
   */
  refresh(): Promise<void> {
    if (this.inflight) return this.inflight;
    const fetchPricing = this.fetchPricing;
    if (!fetchPricing || !this.isStale()) return Promise.resolve();

    this.fetchedAt = this.now();
    this.inflight = this.load(fetchPricing).finally(() => {
      this.inflight = undefined;
    });
    return this.inflight;
  }

  private async load(fetchPricing: PricingFetcher): Promise<void> {
    try {
      const live = await fetchPricing();
      const count = Object.keys(live).length;
      if (count > this.minLiveEntries) {
        this.table = { ...this.table, ...live };
        log.info('Merged live pricing', { models: count });
      } else {
        log.warn('Live pricing too small, keeping static table', { models: count });
      }
    } catch (err) {
      log.warn('Pricing fetch failed, keeping static table', { error: formatError(err) });
    }
  }

  lookup(model: string): PriceEntry | undefined {
    return findPrice(this.table, model);
  }

  /**
   * Estimated USD cost; 0 when no key matches. Cache-write tokens are part
   * of `promptTokens` and are billed at the input rate.
   */
  estimateCost(model: string, promptTokens: number, completionTokens: number, cachedTokens = 0): number {
    const price = this.lookup(model);
    if (!price) return 0;
    return computeCost(price, promptTokens, completionTokens, cachedTokens, this.decimals);
  }

  /** Model identifiers with a price, used as the validation whitelist */
  models(): string[] {
    return Object.keys(this.table);
  }

  has(model: string): boolean {
    return Object.hasOwn(this.table, model);
  }

  get roundingDecimals(): number {
    return this.decimals;
  }
}
