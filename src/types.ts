/**
 * Shared data model for the round loop.
 *
 * Messages use the OpenAI-compatible chat shape that the gateway accepts:
 * content is either a string or a list of typed blocks, and system-message
 * blocks can carry a cache hint.
 */

// =============================================================================
// MESSAGES
// =============================================================================

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/** Cache lifetime of a system-message segment */
export type CacheTier = 'static' | 'semi_stable' | 'dynamic';

export interface CacheControl {
  type: 'ephemeral';
  ttl?: '5m' | '1h';
}

export interface TextBlock {
  type: 'text';
  text: string;
  cache_control?: CacheControl;
}

export interface ImageBlock {
  type: 'image_url';
  image_url: { url: string };
}

export type ContentBlock = TextBlock | ImageBlock;

export interface ToolCallResponse {
  id: string;
  type: 'function';
  function: {
    name: string;
    /** Raw argument payload as emitted by the model, normally a JSON object string */
    arguments: string;
  };
}

export interface Message {
  role: Role;
  content: string | ContentBlock[] | null;
  tool_calls?: ToolCallResponse[];
  tool_call_id?: string;
  name?: string;
}

// =============================================================================
// TASKS
// =============================================================================

export type TaskType = 'user' | 'evolution' | (string & {});

export type ReasoningEffort = 'none' | 'minimal' | 'low' | 'medium' | 'high' | 'xhigh';

export interface TaskImage {
  /** Base64 payload without the data: prefix */
  base64: string;
  mimeType: string;
  caption?: string;
}

export interface Task {
  readonly id: string;
  readonly type: TaskType;
  readonly text: string;
  readonly image?: TaskImage;
  readonly reasoningEffort?: string;
  /** Budget ceiling for this task; falls back to the budget source when absent */
  readonly budgetUsd?: number;
}

// =============================================================================
// TOOLS
// =============================================================================

export type ToolOutcome = 'ok' | 'error' | 'timeout' | 'arg_error';

export interface ToolResult {
  toolCallId: string;
  toolName: string;
  /** Result text, already truncated for the context */
  result: string;
  isError: boolean;
  outcome: ToolOutcome;
  /** Arguments with secrets masked and long values clipped */
  argsForLog: Record<string, unknown>;
  isCodeTool: boolean;
  durationMs: number;
}

// =============================================================================
// USAGE
// =============================================================================

export interface UsageRecord {
  promptTokens: number;
  completionTokens: number;
  cachedTokens: number;
  cacheWriteTokens: number;
  elapsedSec: number;
  cost: number;
  /** True when the provider reported the cost, false when it was estimated */
  costMeasured: boolean;
}

export interface BudgetState {
  spentUsd: number;
  remainingUsd: number;
  ceilingUsd: number;
}

// =============================================================================
// EVENTS AND AUDIT
// =============================================================================

export interface LlmUsageEvent {
  type: 'llm_usage';
  ts: string;
  taskId: string;
  category: string;
  provider: string;
  model: string;
  usage: Omit<UsageRecord, 'cost' | 'costMeasured'>;
  cost: number;
  costEstimated: boolean;
}

export interface ToolErrorEvent {
  type: 'tool_error';
  ts: string;
  taskId: string;
  category: string;
  tool: string;
  args: Record<string, unknown>;
  error: string;
}

export interface ToolTimeoutEvent {
  type: 'tool_timeout';
  ts: string;
  taskId: string;
  category: string;
  tool: string;
  args: Record<string, unknown>;
  timeoutSec: number;
  stateful: boolean;
}

export interface ModelErrorEvent {
  type: 'llm_api_error';
  ts: string;
  taskId: string;
  category: string;
  model: string;
  attempt: number;
  error: string;
  statusCode?: number;
  nextModel?: string;
}

export type LoopEvent = LlmUsageEvent | ToolErrorEvent | ToolTimeoutEvent | ModelErrorEvent;

/** Append-only structured event stream read by an external supervisor */
export interface EventSink {
  emit(event: LoopEvent): void;
}

export interface ToolAuditEntry {
  ts: string;
  taskId: string;
  tool: string;
  args: Record<string, unknown>;
  resultPreview: string;
  isError: boolean;
  outcome: ToolOutcome;
  durationMs: number;
}

export interface CapReport {
  requestedCap: number;
  actualTokens: number;
  originalTokens: number;
  droppedMessages: number;
  trimmed: boolean;
}

export interface RoundAuditEntry {
  ts: string;
  taskId: string;
  round: number;
  model: string;
  status: 'tools' | 'final' | 'budget_forced' | 'error';
  toolCalls: number;
  cost: number;
  promptTokens: number;
  completionTokens: number;
  cap: CapReport;
}

export interface AuditLog {
  recordTool(entry: ToolAuditEntry): void;
  recordRound(entry: RoundAuditEntry): void;
}

/** Spent and total currency for the active task or process */
export interface BudgetSource {
  getBudget(): { spentUsd: number; totalUsd: number };
}
