/**
 * Runtime assembly
 *
 * Builds every collaborator of the round orchestrator from a LoopConfig.
 * Anything with I/O (provider, event log, environment, memory, pricing
 * fetch, clock) can be swapped, which is how tests and `--dry-run` run
 * without a network.
 */

import { join } from 'node:path';
import { configuredModels, type LoopConfig } from './config/schema.js';
import { createGatewayPricingFetcher } from './costs/gateway-pricing.js';
import { PricingCache, STATIC_PRICING, type PricingFetcher } from './costs/pricing.js';
import { UsageAccountant } from './costs/usage-accountant.js';
import { ContextBuilder, type EnvironmentAccessors, type MemoryStore } from './core/context-builder.js';
import { RoundOrchestrator } from './core/execution-loop.js';
import { ModelCaller } from './core/model-caller.js';
import { ToolDispatchEngine } from './core/tool-executor.js';
import { DRIVE_PATHS, FileEnvironment, FileMemoryStore } from './memory/file-memory-store.js';
import { MemoryEventLog } from './persistence/event-log.js';
import { OpenAICompatibleProvider } from './providers/adapters/openai-compatible.js';
import { FallbackChain } from './providers/fallback-chain.js';
import { ProviderRouter, loadModelWhitelist } from './providers/router.js';
import type { LLMProvider } from './providers/types.js';
import { registerFileTools } from './tools/file.js';
import { ToolRegistry } from './tools/registry.js';
import type { ToolDefinition } from './tools/types.js';
import type { AuditLog, BudgetSource, EventSink } from './types.js';

export interface RuntimeOptions {
  config: LoopConfig;
  /** Defaults to the OpenAI-compatible HTTP provider */
  provider?: LLMProvider;
  /** Event sink and audit log; in-memory when absent */
  log?: EventSink & AuditLog;
  env?: NodeJS.ProcessEnv;
  environment?: EnvironmentAccessors;
  memory?: MemoryStore;
  budgetSource?: BudgetSource;
  /** Remote pricing source; `null` disables it, absent uses the gateway catalogue when enabled */
  fetchPricing?: PricingFetcher | null;
  /** Tools registered after the standard file tools */
  tools?: ToolDefinition[];
  /** Skip the standard repo/drive tools */
  withoutFileTools?: boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface LoopRuntime {
  config: LoopConfig;
  orchestrator: RoundOrchestrator;
  registry: ToolRegistry;
  router: ProviderRouter;
  chain: FallbackChain;
  pricing: PricingCache;
  accountant: UsageAccountant;
  caller: ModelCaller;
  dispatcher: ToolDispatchEngine;
  contextBuilder: ContextBuilder;
  log: EventSink & AuditLog;
}

function pricingFetcher(options: RuntimeOptions, env: NodeJS.ProcessEnv): PricingFetcher | undefined {
  if (options.fetchPricing === null) return undefined;
  if (options.fetchPricing) return options.fetchPricing;
  const { pricing, routing } = options.config;
  if (!pricing.remote) return undefined;
  return createGatewayPricingFetcher({
    baseUrl: routing.gateway.baseUrl,
    apiKey: env[routing.gateway.apiKeyEnv],
  });
}

export function createLoopRuntime(options: RuntimeOptions): LoopRuntime {
  const { config } = options;
  const env = options.env ?? process.env;
  const now = options.now ?? Date.now;
  const log = options.log ?? new MemoryEventLog();
  const repoDir = config.repoDir ?? process.cwd();
  const driveDir = config.driveDir ?? process.cwd();

  const pricing = new PricingCache({
    staticTable: { ...STATIC_PRICING },
    fetchPricing: pricingFetcher(options, env),
    now,
    ttlMs: config.pricing.ttlMs,
    minLiveEntries: config.pricing.minLiveEntries,
    decimals: config.pricing.decimals,
  });
  const accountant = new UsageAccountant({ pricing, events: log, now: () => new Date(now()) });

  const router = new ProviderRouter({
    routing: config.routing,
    pricedModels: () => pricing.models(),
    extraWhitelist: [
      ...configuredModels(config),
      ...(config.driveDir ? loadModelWhitelist(join(config.driveDir, DRIVE_PATHS.modelWhitelist)) : []),
    ],
    env,
  });
  const chain = new FallbackChain({ models: config.fallbackModels, now });

  const caller = new ModelCaller({
    provider: options.provider ?? new OpenAICompatibleProvider(),
    router,
    chain,
    accountant,
    events: log,
    maxRetries: config.maxModelRetries,
    backoff: config.backoff,
    maxOutputTokens: config.maxOutputTokens,
    requestTimeoutMs: config.requestTimeoutMs,
    sleep: options.sleep,
    random: options.random,
    now,
  });

  const registry = new ToolRegistry({ defaultTimeoutSec: config.tools.defaultTimeoutSec });
  if (!options.withoutFileTools) registerFileTools(registry);
  for (const tool of options.tools ?? []) registry.register(tool);

  const dispatcher = new ToolDispatchEngine({
    registry,
    events: log,
    audit: log,
    maxParallel: config.tools.maxParallel,
    resultMaxChars: config.tools.resultMaxChars,
    auditPreviewChars: config.tools.auditPreviewChars,
    now,
  });

  const contextBuilder = new ContextBuilder({
    env: options.environment ?? new FileEnvironment(repoDir, driveDir, now),
    memory: options.memory ?? new FileMemoryStore(driveDir),
    context: config.context,
  });

  const orchestrator = new RoundOrchestrator({
    config: { ...config, repoDir, driveDir },
    contextBuilder,
    caller,
    accountant,
    tools: dispatcher,
    registry,
    audit: log,
    budgetSource: options.budgetSource,
    now,
  });

  return { config, orchestrator, registry, router, chain, pricing, accountant, caller, dispatcher, contextBuilder, log };
}
