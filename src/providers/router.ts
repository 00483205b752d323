/**
 * Provider Router
 *
 * Maps a logical model identifier to an endpoint and credential, and
 * decides whether the identifier may be called at all. Validation runs
 * before any request leaves the process; a rejected model fails the call
 * instead of being swapped for another one.
 *
 * Resolution order:
 * 1. native allow-list  -> that provider, full identifier on the wire
 * 2. `prefix/model` where `prefix` is a direct provider -> that provider, prefix stripped
 * 3. everything else    -> the gateway
 */

import { existsSync, readFileSync } from 'node:fs';
import { ModelValidationError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import type { EndpointConfig, RoutingConfig } from '../config/schema.js';
import type { ResolvedRoute } from './types.js';

const log = createComponentLogger('ProviderRouter');

// =============================================================================
// TYPES
// =============================================================================

export type ValidationResult =
  | { ok: true; bypass?: 'native' | 'free_tier' }
  | { ok: false; reason: string };

export interface ProviderRouterConfig {
  routing: RoutingConfig;
  /** Identifiers with a known price; read on every validation */
  pricedModels: () => Iterable<string>;
  /** Identifiers loaded from a whitelist file */
  extraWhitelist?: Iterable<string>;
  env?: NodeJS.ProcessEnv;
}

interface EndpointMatch {
  provider: string;
  endpoint: EndpointConfig;
  wireModel: string;
  native: boolean;
}

// =============================================================================
// ROUTER
// =============================================================================

export class ProviderRouter {
  private routing: RoutingConfig;
  private pricedModels: () => Iterable<string>;
  private whitelist: Set<string>;
  private env: NodeJS.ProcessEnv;

  constructor(config: ProviderRouterConfig) {
    this.routing = config.routing;
    this.pricedModels = config.pricedModels;
    this.whitelist = new Set([...config.routing.whitelist, ...(config.extraWhitelist ?? [])]);
    this.env = config.env ?? process.env;
  }

  private match(modelId: string): EndpointMatch {
    const { directProviders, nativeModels } = this.routing;

    if (Object.hasOwn(nativeModels, modelId)) {
      const provider = nativeModels[modelId];
      const endpoint = directProviders[provider];
      if (!endpoint) {
        throw new ModelValidationError(modelId, `native provider '${provider}' has no endpoint configured`);
      }
      return { provider, endpoint, wireModel: modelId, native: true };
    }

    const slash = modelId.indexOf('/');
    if (slash > 0) {
      const prefix = modelId.slice(0, slash);
      if (Object.hasOwn(directProviders, prefix)) {
        return {
          provider: prefix,
          endpoint: directProviders[prefix],
          wireModel: modelId.slice(slash + 1),
          native: false,
        };
      }
    }

    return {
      provider: this.routing.gatewayName,
      endpoint: this.routing.gateway,
      wireModel: modelId,
      native: false,
    };
  }

  resolve(modelId: string): ResolvedRoute {
    const { provider, endpoint, wireModel } = this.match(modelId);
    const apiKey = this.env[endpoint.apiKeyEnv];
    if (!apiKey) {
      log.debug('No credential for endpoint', { provider, env: endpoint.apiKeyEnv });
    }
    return {
      provider,
      baseUrl: endpoint.baseUrl.replace(/\/+$/, ''),
      apiKey: apiKey || undefined,
      model: modelId,
      wireModel,
      headers: endpoint.headers,
    };
  }

  validate(modelId: string): ValidationResult {
    if (!modelId.trim()) {
      return { ok: false, reason: 'empty model identifier' };
    }

    let matched: EndpointMatch;
    try {
      matched = this.match(modelId);
    } catch (err) {
      return { ok: false, reason: err instanceof ModelValidationError ? err.reason : String(err) };
    }

    if (matched.native) {
      return { ok: true, bypass: 'native' };
    }

    if (!this.routing.paidTier && this.routing.freeTierModel === modelId) {
      return { ok: true, bypass: 'free_tier' };
    }

    const providerModels = matched.endpoint.modelIds;
    if (matched.provider !== this.routing.gatewayName && providerModels) {
      return providerModels.includes(matched.wireModel)
        ? { ok: true }
        : { ok: false, reason: `'${matched.wireModel}' is not a ${matched.provider} model` };
    }

    if (this.whitelist.has(modelId)) return { ok: true };
    for (const priced of this.pricedModels()) {
      if (priced === modelId) return { ok: true };
    }

    return { ok: false, reason: 'not in the pricing table or model whitelist' };
  }

  /** Resolve after validation; throws ModelValidationError on rejection */
  route(modelId: string): ResolvedRoute {
    const verdict = this.validate(modelId);
    if (!verdict.ok) {
      throw new ModelValidationError(modelId, verdict.reason);
    }
    return this.resolve(modelId);
  }
}

// =============================================================================
// WHITELIST FILE
// =============================================================================

/**
 * One identifier per line; blank lines and `#` comments ignored.
 * A missing file yields an empty list.
 */
export function loadModelWhitelist(filePath: string): string[] {
  if (!existsSync(filePath)) return [];
  return readFileSync(filePath, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
