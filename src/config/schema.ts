/**
 * Zod schema for loop configuration (config.json).
 *
 * Every threshold the loop uses lives here with its default, so a file
 * only needs the keys it changes. Sub-schemas are `.strict()` to catch
 * typos; the top level strips unknown keys.
 */

import { z } from 'zod';

// =============================================================================
// SUB-SCHEMAS
// =============================================================================

const LOG_LEVEL = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

export const REASONING_EFFORTS = ['none', 'minimal', 'low', 'medium', 'high', 'xhigh'] as const;

const BackoffSchema = z
  .object({
    initialMs: z.number().int().nonnegative().default(2000),
    maxMs: z.number().int().nonnegative().default(60_000),
    multiplier: z.number().min(1).default(2),
    /** Scale each delay by a random factor in [0.75, 1.25] */
    jitter: z.boolean().default(true),
  })
  .strict();

const BudgetSchema = z
  .object({
    forceFraction: z.number().gt(0).max(1).default(0.5),
    warnFraction: z.number().gt(0).max(1).default(0.3),
    warnEveryRounds: z.number().int().positive().default(10),
    /** Used when neither the task nor a budget source supplies one */
    defaultUsd: z.number().positive().optional(),
  })
  .strict();

const ToolsSchema = z
  .object({
    maxParallel: z.number().int().positive().default(8),
    resultMaxChars: z.number().int().positive().default(15_000),
    auditPreviewChars: z.number().int().positive().default(2000),
    defaultTimeoutSec: z.number().positive().default(120),
    /** Tool errors per task before the task is aborted */
    maxErrors: z.number().int().positive().default(25),
  })
  .strict();

const PrefixCapSchema = z
  .object({
    prefix: z.string().min(1),
    cap: z.number().int().positive(),
  })
  .strict();

const ClipSchema = z
  .object({
    systemPrompt: z.number().int().positive().default(60_000),
    bible: z.number().int().positive().default(180_000),
    scratchpad: z.number().int().positive().default(90_000),
    identity: z.number().int().positive().default(80_000),
    knowledgeIndex: z.number().int().positive().default(50_000),
    state: z.number().int().positive().default(90_000),
  })
  .strict();

const ContextSchema = z
  .object({
    defaultCap: z.number().int().positive().default(200_000),
    evolutionCap: z.number().int().positive().default(4096),
    /** Checked in order, first matching prefix wins */
    lowThroughputCaps: z.array(PrefixCapSchema).default([
      { prefix: 'groq/', cap: 4096 },
      { prefix: 'google/', cap: 4096 },
      { prefix: 'stepfun/', cap: 8192 },
      { prefix: 'arcee-ai/', cap: 8192 },
      { prefix: 'z-ai/', cap: 8192 },
      { prefix: 'qwen/', cap: 8192 },
    ]),
    clip: ClipSchema.default({}),
    staleIdentityHours: z.number().positive().default(8),
  })
  .strict();

const EndpointSchema = z
  .object({
    baseUrl: z.string().url(),
    /** Environment variable holding the credential */
    apiKeyEnv: z.string().min(1),
    /** Models this endpoint serves, without provider prefix */
    modelIds: z.array(z.string()).optional(),
    headers: z.record(z.string(), z.string()).optional(),
  })
  .strict();

const RoutingSchema = z
  .object({
    gatewayName: z.string().min(1).default('openrouter'),
    gateway: EndpointSchema.default({
      baseUrl: 'https://openrouter.ai/api/v1',
      apiKeyEnv: 'OPENROUTER_API_KEY',
    }),
    /** Providers reached directly when a model carries their prefix */
    directProviders: z.record(z.string(), EndpointSchema).default({}),
    /** Model identifier -> direct provider, routed without a prefix and not validated */
    nativeModels: z.record(z.string(), z.string()).default({}),
    /** Model allowed without validation while `paidTier` is false */
    freeTierModel: z.string().optional(),
    paidTier: z.boolean().default(false),
    /** Extra identifiers accepted besides priced models */
    whitelist: z.array(z.string()).default([]),
  })
  .strict();

const PricingSchema = z
  .object({
    remote: z.boolean().default(true),
    /** Refresh window; absent means once per process */
    ttlMs: z.number().int().positive().optional(),
    minLiveEntries: z.number().int().nonnegative().default(5),
    decimals: z.number().int().min(0).max(12).default(6),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: LOG_LEVEL.default('info'),
    file: z.string().optional(),
  })
  .strict();

// =============================================================================
// ROOT SCHEMA
// =============================================================================

export const LoopConfigSchema = z.object({
  model: z.string().min(1).default('anthropic/claude-sonnet-4.6'),
  codeModel: z.string().min(1).optional(),
  lightModel: z.string().min(1).optional(),
  fallbackModels: z.array(z.string().min(1)).default([]),
  maxRounds: z.number().int().positive().default(200),
  maxOutputTokens: z.number().int().positive().default(16_384),
  /** Fallback attempts per model call, independent of chain length */
  maxModelRetries: z.number().int().nonnegative().default(3),
  requestTimeoutMs: z.number().int().positive().default(300_000),
  reasoningEffort: z.enum(REASONING_EFFORTS).default('medium'),
  selfCheckEveryRounds: z.number().int().positive().default(50),

  backoff: BackoffSchema.default({}),
  budget: BudgetSchema.default({}),
  tools: ToolsSchema.default({}),
  context: ContextSchema.default({}),
  routing: RoutingSchema.default({}),
  pricing: PricingSchema.default({}),
  logging: LoggingSchema.default({}),

  repoDir: z.string().optional(),
  driveDir: z.string().optional(),
});

export type LoopConfig = z.infer<typeof LoopConfigSchema>;
export type LoopConfigInput = z.input<typeof LoopConfigSchema>;
export type EndpointConfig = z.infer<typeof EndpointSchema>;
export type RoutingConfig = z.infer<typeof RoutingSchema>;
export type ContextConfig = z.infer<typeof ContextSchema>;
export type ToolsConfig = z.infer<typeof ToolsSchema>;
export type BackoffConfig = z.infer<typeof BackoffSchema>;

/** Fully defaulted configuration, optionally with overrides */
export function defaultConfig(overrides: LoopConfigInput = {}): LoopConfig {
  return LoopConfigSchema.parse(overrides);
}

/** Main, code, light and fallback models in that order, without repeats */
export function configuredModels(
  config: Pick<LoopConfig, 'model' | 'codeModel' | 'lightModel' | 'fallbackModels'>
): string[] {
  const models = [config.model, config.codeModel, config.lightModel, ...config.fallbackModels];
  return [...new Set(models.filter((m): m is string => m !== undefined && m.length > 0))];
}

/**
 * `code` and `light` name the configured role models; any other name is
 * returned as is. Undefined when the role has no model configured.
 */
export function resolveModelName(config: Pick<LoopConfig, 'codeModel' | 'lightModel'>, name: string): string | undefined {
  if (name === 'code') return config.codeModel;
  if (name === 'light') return config.lightModel;
  return name;
}
