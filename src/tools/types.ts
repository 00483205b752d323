/**
 * Tool System Types
 *
 * A tool is a name, a zod parameter schema, a handler and a timeout. Its
 * execution policy is fixed when it is registered, so the dispatch engine
 * looks policies up instead of matching names.
 */

import type { z } from 'zod';
import type { CancellationToken } from '../integrations/cancellation.js';
import type { LoopEvent } from '../types.js';

// =============================================================================
// POLICIES
// =============================================================================

/**
 * - read_only: safe to run alongside other read-only calls
 * - stateful: runs on the sticky lane, one at a time, session kept across calls
 * - default: fresh single-use slot per call
 */
export type ToolPolicy = 'read_only' | 'stateful' | 'default';

/** Tools that may share a parallel batch when nothing else is in it */
export const READ_ONLY_PARALLEL_TOOLS: ReadonlySet<string> = new Set([
  'repo_read',
  'repo_list',
  'drive_read',
  'drive_list',
  'web_search',
  'codebase_digest',
  'chat_history',
]);

/** Tools bound to the sticky lane */
export const STATEFUL_TOOLS: ReadonlySet<string> = new Set(['browse_page', 'browser_action']);

// =============================================================================
// DEFINITIONS
// =============================================================================

export interface ToolContext {
  repoDir: string;
  driveDir: string;
  taskId: string;
  /** Append to the event stream */
  emit: (event: LoopEvent) => void;
  /** Cancelled when the call times out or its lane is reset */
  cancellation: CancellationToken;
  /**
   * Per-lane state for stateful tools, discarded on reset. Non-stateful
   * calls get a fresh empty map.
   */
  session: Map<string, unknown>;
}

export interface ToolDefinition<TInput extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  /** Shown to the model */
  description: string;
  parameters: TInput;
  execute: (input: z.infer<TInput>, context: ToolContext) => Promise<string>;
  /** Seconds before the call is abandoned; registry default when absent */
  timeoutSec?: number;
  /** Edits code in the repository */
  isCodeTool?: boolean;
  /** Overrides the name-based default policy */
  policy?: ToolPolicy;
}

/** A registered tool with its schema validation folded into `invoke` */
export interface RegisteredTool {
  name: string;
  description: string;
  policy: ToolPolicy;
  timeoutSec: number;
  isCodeTool: boolean;
  jsonSchema: Record<string, unknown>;
  /** Validates `args` against the schema, then runs the handler */
  invoke: (args: Record<string, unknown>, context: ToolContext) => Promise<string>;
}
