/**
 * Provider Router Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultConfig, type LoopConfigInput } from '../../src/config/schema.js';
import { ModelValidationError } from '../../src/errors/index.js';
import { ProviderRouter, loadModelWhitelist } from '../../src/providers/router.js';

function createRouter(routing: LoopConfigInput['routing'] = {}, priced: string[] = ['openai/o3']): ProviderRouter {
  return new ProviderRouter({
    routing: defaultConfig({ routing }).routing,
    pricedModels: () => priced,
    env: { OPENROUTER_API_KEY: 'test-secret', ANTHROPIC_KEY: 'test-direct-secret' },
  });
}

const anthropicEndpoint = {
  baseUrl: 'https://api.anthropic.test/v1/',
  apiKeyEnv: 'ANTHROPIC_KEY',
  modelIds: ['claude-x', 'claude-native'],
};

// =============================================================================
// RESOLUTION
// =============================================================================

describe('ProviderRouter.resolve', () => {
  it('should send unprefixed and unknown-prefix models to the gateway', () => {
    expect(createRouter().resolve('openai/o3')).toEqual({
      provider: 'openrouter',
      baseUrl: 'https://openrouter.ai/api/v1',
      apiKey: 'test-secret',
      model: 'openai/o3',
      wireModel: 'openai/o3',
      headers: undefined,
    });
  });

  it('should strip the prefix for a direct provider', () => {
    const route = createRouter({ directProviders: { anthropic: anthropicEndpoint } }).resolve('anthropic/claude-x');

    expect(route).toMatchObject({
      provider: 'anthropic',
      baseUrl: 'https://api.anthropic.test/v1',
      apiKey: 'test-direct-secret',
      wireModel: 'claude-x',
    });
  });

  it('should route native models without a prefix', () => {
    const router = createRouter({
      directProviders: { anthropic: anthropicEndpoint },
      nativeModels: { 'claude-native': 'anthropic' },
    });

    expect(router.resolve('claude-native')).toMatchObject({ provider: 'anthropic', wireModel: 'claude-native' });
  });

  it('should leave the credential unset when the variable is missing', () => {
    const router = new ProviderRouter({ routing: defaultConfig().routing, pricedModels: () => [], env: {} });
    expect(router.resolve('openai/o3').apiKey).toBeUndefined();
  });
});

// =============================================================================
// VALIDATION
// =============================================================================

describe('ProviderRouter.validate', () => {
  it('should accept priced and whitelisted models', () => {
    const router = createRouter({ whitelist: ['lab/experimental'] });

    expect(router.validate('openai/o3')).toEqual({ ok: true });
    expect(router.validate('lab/experimental')).toEqual({ ok: true });
  });

  it('should reject unknown models with a reason', () => {
    expect(createRouter().validate('mystery/model')).toEqual({
      ok: false,
      reason: 'not in the pricing table or model whitelist',
    });
    expect(createRouter().validate('  ')).toEqual({ ok: false, reason: 'empty model identifier' });
  });

  it('should check direct-provider models against that provider list', () => {
    const router = createRouter({ directProviders: { anthropic: anthropicEndpoint } });

    expect(router.validate('anthropic/claude-x')).toEqual({ ok: true });
    expect(router.validate('anthropic/claude-y')).toEqual({ ok: false, reason: "'claude-y' is not a anthropic model" });
  });

  it('should bypass validation for native models', () => {
    const router = createRouter({
      directProviders: { anthropic: anthropicEndpoint },
      nativeModels: { 'claude-native': 'anthropic' },
    });
    expect(router.validate('claude-native')).toEqual({ ok: true, bypass: 'native' });
  });

  it('should reject a native model whose provider has no endpoint', () => {
    const router = createRouter({ nativeModels: { 'claude-native': 'anthropic' } });
    expect(router.validate('claude-native')).toEqual({
      ok: false,
      reason: "native provider 'anthropic' has no endpoint configured",
    });
  });

  it('should bypass validation for the free-tier model only without a paid tier', () => {
    expect(createRouter({ freeTierModel: 'free/model' }).validate('free/model')).toEqual({ ok: true, bypass: 'free_tier' });
    expect(createRouter({ freeTierModel: 'free/model', paidTier: true }).validate('free/model').ok).toBe(false);
  });

  it('should throw before routing a rejected model', () => {
    expect(() => createRouter().route('mystery/model')).toThrow(ModelValidationError);
    expect(() => createRouter().route('mystery/model')).toThrow(
      "Model 'mystery/model' rejected: not in the pricing table or model whitelist"
    );
  });
});

// =============================================================================
// WHITELIST FILE
// =============================================================================

describe('loadModelWhitelist', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should read one identifier per line and skip comments', () => {
    dir = mkdtempSync(join(tmpdir(), 'roundloop-wl-'));
    const file = join(dir, 'model-whitelist.txt');
    writeFileSync(file, '# approved\nlab/one\n\n  lab/two  \n');

    expect(loadModelWhitelist(file)).toEqual(['lab/one', 'lab/two']);
  });

  it('should return nothing for a missing file', () => {
    expect(loadModelWhitelist('/nonexistent/roundloop/whitelist.txt')).toEqual([]);
  });
});
