/**
 * roundloop - public API
 */

// Data model
export type * from './types.js';

// Runtime assembly
export { createLoopRuntime, type RuntimeOptions, type LoopRuntime } from './runtime.js';

// Round orchestrator
export {
  RoundOrchestrator,
  createRoundOrchestrator,
  type TaskOutcome,
  type RoundOrchestratorConfig,
  type RunOptions,
} from './core/execution-loop.js';
export {
  RoundStateMachine,
  createRoundStateMachine,
  canTransition,
  type RoundState,
  type TerminationStatus,
  type RoundTransition,
} from './core/round-state-machine.js';

// Context
export {
  ContextBuilder,
  createContextBuilder,
  buildUserMessage,
  FALLBACK_TEXT,
  type EnvironmentAccessors,
  type MemoryStore,
  type BuiltContext,
} from './core/context-builder.js';
export { capMessages, softCapFor, estimateMessageTokens, estimateTotalTokens, type CapResult } from './core/context-cap.js';
export { checkHealthInvariants, readmeVersion } from './core/health.js';
export { FileEnvironment, FileMemoryStore, StaticMemoryStore, DRIVE_PATHS } from './memory/file-memory-store.js';

// Model calls
export {
  ModelCaller,
  decideRetry,
  classifyFailure,
  computeBackoff,
  normalizeReasoningEffort,
  type RetryDecision,
  type ModelCallResult,
} from './core/model-caller.js';
export { ProviderRouter, loadModelWhitelist, type ValidationResult } from './providers/router.js';
export { FallbackChain, createFallbackChain, formatHealthStatus, type ModelHealth } from './providers/fallback-chain.js';
export { OpenAICompatibleProvider } from './providers/adapters/openai-compatible.js';
export { ScriptedProvider, textReply, toolCallReply } from './providers/adapters/mock.js';
export type { LLMProvider, ChatRequest, ChatResponse, ResolvedRoute, ToolDefinitionSchema } from './providers/types.js';

// Costs
export { PricingCache, STATIC_PRICING, findPrice, computeCost, type PricingTable, type PriceEntry } from './costs/pricing.js';
export { fetchGatewayPricing, catalogueToPricing } from './costs/gateway-pricing.js';
export { UsageAccountant, evaluateBudget, UNKNOWN_MODEL, type RawUsage, type UsageTotals } from './costs/usage-accountant.js';

// Tools
export { ToolDispatchEngine, createToolDispatchEngine, parseToolArguments, type DispatchContext } from './core/tool-executor.js';
export { StickyLane } from './core/sticky-lane.js';
export { DetachedTaskRegistry } from './core/detached-tasks.js';
export { ToolRegistry, ToolArgumentError, zodToJsonSchema } from './tools/registry.js';
export { registerFileTools } from './tools/file.js';
export type { ToolDefinition, ToolContext, ToolPolicy } from './tools/types.js';

// Persistence
export { MemoryEventLog, JsonlEventLog, CompositeEventLog } from './persistence/event-log.js';
export { SqliteEventStore, openEventStore } from './persistence/event-store.js';

// Config, errors, logging
export * from './config/index.js';
export * from './errors/index.js';
export {
  logger,
  configureLogger,
  createComponentLogger,
  ConsoleSink,
  MemorySink,
  FileSink,
  type LogLevel,
} from './integrations/utilities/logger.js';
