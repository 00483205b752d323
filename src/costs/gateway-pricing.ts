/**
 * Gateway Pricing Source
 *
 * Reads the gateway's model catalogue and converts per-token string prices
 * into the per-million table used by {@link PricingCache}.
 */

import { z } from 'zod';
import { ProviderError } from '../errors/index.js';
import type { PricingFetcher, PricingTable } from './pricing.js';

// =============================================================================
// TYPES
// =============================================================================

const CatalogueSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      pricing: z
        .object({
          prompt: z.string().optional(),
          completion: z.string().optional(),
          input_cache_read: z.string().optional(),
        })
        .passthrough()
        .optional(),
    }).passthrough()
  ),
});

export interface GatewayPricingOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

function perMillion(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseFloat(value);
  if (!Number.isFinite(n) || n < 0) return undefined;
  return Math.round(n * 1_000_000 * 1e6) / 1e6;
}

/**
 * Convert a parsed catalogue into a pricing table. Models without both
 * prompt and completion prices are skipped; a missing cache-read price
 * falls back to the input price.
 */
export function catalogueToPricing(payload: unknown): PricingTable {
  const parsed = CatalogueSchema.parse(payload);
  const table: PricingTable = {};

  for (const model of parsed.data) {
    const input = perMillion(model.pricing?.prompt);
    const output = perMillion(model.pricing?.completion);
    if (input === undefined || output === undefined) continue;
    table[model.id] = {
      input,
      output,
      cachedInput: perMillion(model.pricing?.input_cache_read) ?? input,
    };
  }

  return table;
}

export async function fetchGatewayPricing(options: GatewayPricingOptions): Promise<PricingTable> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

  const response = await fetchImpl(`${options.baseUrl}/models`, {
    headers,
    signal: AbortSignal.timeout(options.timeoutMs ?? 15_000),
  });

  if (!response.ok) {
    throw ProviderError.fromStatus('pricing', response.status, await response.text());
  }

  return catalogueToPricing(await response.json());
}

export function createGatewayPricingFetcher(options: GatewayPricingOptions): PricingFetcher {
  return () => fetchGatewayPricing(options);
}
