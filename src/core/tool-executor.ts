/**
 * Tool Dispatch Engine
 *
 * Runs the tool calls the model requested in one round and turns every
 * outcome (success, exception, bad arguments, timeout) into a result the
 * model can read. Batches made only of read-only calls run on a bounded
 * worker pool; everything else runs one call at a time. Stateful tools go
 * through the sticky lane, all other tools get a fresh slot per call.
 *
 * Results always come back in the order the calls were requested.
 */

import { formatError } from '../errors/index.js';
import {
  createCancellationTokenSource,
  type CancellationToken,
} from '../integrations/cancellation.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import { sanitizeArgs, truncateForLog, truncateToolResult } from '../integrations/utilities/text.js';
import { ToolArgumentError, type ToolRegistry } from '../tools/registry.js';
import { READ_ONLY_PARALLEL_TOOLS, type RegisteredTool, type ToolContext } from '../tools/types.js';
import type {
  AuditLog,
  EventSink,
  LoopEvent,
  Message,
  ToolCallResponse,
  ToolOutcome,
  ToolResult,
} from '../types.js';
import { DetachedTaskRegistry } from './detached-tasks.js';
import { StickyLane } from './sticky-lane.js';

const log = createComponentLogger('ToolExecutor');

/** Prefix of every result the engine produced instead of the tool */
export const WARNING_MARKER = '⚠️';

// =============================================================================
// ARGUMENT RECOVERY
// =============================================================================

export type ParsedArguments =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Recover an argument object from whatever the model emitted.
 *
 * Accepts an object, a JSON object string, a JSON string holding a JSON
 * object string, a fenced code block, or JSON with chatter around it.
 * An empty payload means "no arguments".
 */
export function parseToolArguments(raw: unknown): ParsedArguments {
  if (isPlainObject(raw)) return { ok: true, args: raw };
  if (raw === null || raw === undefined) return { ok: true, args: {} };
  if (typeof raw !== 'string') {
    return { ok: false, error: `expected a JSON object, got ${Array.isArray(raw) ? 'array' : typeof raw}` };
  }

  let text = raw.trim();
  if (text === '') return { ok: true, args: {} };

  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text);
  if (fenced?.[1] !== undefined) text = fenced[1].trim();

  let parsed = tryJson(text);
  if (!parsed.ok) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) return { ok: false, error: parsed.error };
    const inner = tryJson(text.slice(start, end + 1));
    if (!inner.ok) return { ok: false, error: parsed.error };
    parsed = inner;
  }

  let value = parsed.value;
  // Double-encoded: "{\"path\": \"a\"}"
  if (typeof value === 'string') {
    const again = tryJson(value.trim());
    if (!again.ok) return { ok: false, error: 'expected a JSON object, got string' };
    value = again.value;
  }

  if (!isPlainObject(value)) {
    const kind = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
    return { ok: false, error: `expected a JSON object, got ${kind}` };
  }
  return { ok: true, args: value };
}

// =============================================================================
// RESULT TEXT
// =============================================================================

export function argErrorText(toolName: string, detail: string): string {
  return `${WARNING_MARKER} TOOL_ARG_ERROR: Could not parse arguments for '${toolName}': ${detail}`;
}

export function toolErrorText(toolName: string, error: unknown): string {
  return `${WARNING_MARKER} TOOL_ERROR (${toolName}): ${formatError(error)}`;
}

export function unknownToolText(toolName: string): string {
  return `${WARNING_MARKER} UNKNOWN_TOOL: '${toolName}' is not available.`;
}

export function timeoutText(toolName: string, timeoutSec: number, stateReset: boolean): string {
  const resetNote = stateReset ? 'Session state has been reset. ' : '';
  const advice = stateReset ? 'Try a different approach or inform the owner.' : 'Try a different approach or inform the owner about the issue.';
  return (
    `${WARNING_MARKER} TOOL_TIMEOUT (${toolName}): exceeded ${timeoutSec}s limit. ` +
    `The tool is still running in background but control is returned to you. ${resetNote}${advice}`
  );
}

// =============================================================================
// TIMEOUT RACE
// =============================================================================

type Raced<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Wait for `promise` at most `timeoutMs`. A rejection before the deadline
 * propagates; after the deadline the promise is left to the caller.
 */
async function raceTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<Raced<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<Raced<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });
  const settled = promise.then((value): Raced<T> => ({ timedOut: false, value }));
  try {
    return await Promise.race([settled, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export interface ToolDispatchConfig {
  registry: ToolRegistry;
  events: EventSink;
  audit: AuditLog;
  /** Owned by the orchestrator; outlives rounds */
  lane?: StickyLane;
  detached?: DetachedTaskRegistry;
  /** Worker pool ceiling for parallel batches */
  maxParallel?: number;
  resultMaxChars?: number;
  auditPreviewChars?: number;
  now?: () => number;
}

export interface DispatchContext {
  taskId: string;
  category: string;
  repoDir: string;
  driveDir: string;
}

interface CallOutcome {
  text: string;
  outcome: ToolOutcome;
}

export class ToolDispatchEngine {
  private registry: ToolRegistry;
  private events: EventSink;
  private audit: AuditLog;
  readonly lane: StickyLane;
  readonly detached: DetachedTaskRegistry;
  private maxParallel: number;
  private resultMaxChars: number;
  private auditPreviewChars: number;
  private now: () => number;

  constructor(config: ToolDispatchConfig) {
    this.registry = config.registry;
    this.events = config.events;
    this.audit = config.audit;
    this.detached = config.detached ?? new DetachedTaskRegistry();
    this.lane = config.lane ?? new StickyLane(this.detached);
    this.maxParallel = Math.max(1, config.maxParallel ?? 8);
    this.resultMaxChars = config.resultMaxChars ?? 15000;
    this.auditPreviewChars = config.auditPreviewChars ?? 2000;
    this.now = config.now ?? Date.now;
  }

  /**
   * A batch runs in parallel only when it has more than one call and every
   * call is read-only.
   */
  canRunInParallel(calls: readonly ToolCallResponse[]): boolean {
    if (calls.length < 2) return false;
    return calls.every((call) => {
      const name = call.function.name;
      return this.registry.has(name) ? this.registry.policyOf(name) === 'read_only' : READ_ONLY_PARALLEL_TOOLS.has(name);
    });
  }

  /**
   * Execute a round's tool calls. Never rejects: every failure becomes a
   * warning result.
   */
  async dispatch(calls: readonly ToolCallResponse[], ctx: DispatchContext): Promise<ToolResult[]> {
    if (calls.length === 0) return [];

    if (this.canRunInParallel(calls)) {
      return this.runPool(calls, ctx);
    }

    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await this.executeOne(call, ctx));
    }
    return results;
  }

  /** Tool-response messages in result order */
  toMessages(results: readonly ToolResult[]): Message[] {
    return results.map((r) => ({
      role: 'tool',
      tool_call_id: r.toolCallId,
      name: r.toolName,
      content: r.result,
    }));
  }

  private async runPool(calls: readonly ToolCallResponse[], ctx: DispatchContext): Promise<ToolResult[]> {
    const workers = Math.min(calls.length, this.maxParallel);
    const results: ToolResult[] = new Array<ToolResult>(calls.length);
    const completionOrder: string[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < calls.length) {
        const index = next++;
        const call = calls[index];
        if (call === undefined) continue;
        results[index] = await this.executeOne(call, ctx);
        completionOrder.push(call.id);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
    log.debug('Parallel batch finished', { workers, completionOrder });
    return results;
  }

  /**
   * Run one call to completion, timeout or failure.
   */
  async executeOne(call: ToolCallResponse, ctx: DispatchContext): Promise<ToolResult> {
    const started = this.now();
    const name = call.function.name;
    const parsed = parseToolArguments(call.function.arguments);
    const args = parsed.ok ? parsed.args : { raw: truncateForLog(call.function.arguments, 500) };
    const argsForLog = sanitizeArgs(args);
    const tool = this.registry.get(name);

    let outcome: CallOutcome;
    if (!parsed.ok) {
      outcome = { text: argErrorText(name, parsed.error), outcome: 'arg_error' };
      this.emitError(ctx, name, argsForLog, parsed.error);
    } else if (!tool) {
      outcome = { text: unknownToolText(name), outcome: 'error' };
      this.emitError(ctx, name, argsForLog, 'unknown tool');
    } else {
      outcome = await this.invoke(tool, parsed.args, argsForLog, ctx);
    }

    return this.buildResult(call, ctx, argsForLog, tool, outcome, started);
  }

  private async invoke(
    tool: RegisteredTool,
    args: Record<string, unknown>,
    argsForLog: Record<string, unknown>,
    ctx: DispatchContext
  ): Promise<CallOutcome> {
    const stateful = tool.policy === 'stateful';
    try {
      const raced = stateful
        ? await this.invokeOnLane(tool, args, ctx)
        : await this.invokeInSlot(tool, args, ctx);

      if (raced.timedOut) {
        log.warn('Tool timed out', { tool: tool.name, timeoutSec: tool.timeoutSec, stateful });
        this.emitSafely({
          type: 'tool_timeout',
          ts: new Date(this.now()).toISOString(),
          taskId: ctx.taskId,
          category: ctx.category,
          tool: tool.name,
          args: argsForLog,
          timeoutSec: tool.timeoutSec,
          stateful,
        });
        return { text: timeoutText(tool.name, tool.timeoutSec, stateful), outcome: 'timeout' };
      }
      return { text: raced.value, outcome: 'ok' };
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        this.emitError(ctx, tool.name, argsForLog, err.message);
        return { text: argErrorText(tool.name, err.message), outcome: 'arg_error' };
      }
      log.warn('Tool raised', { tool: tool.name, error: formatError(err) });
      this.emitError(ctx, tool.name, argsForLog, formatError(err));
      return { text: toolErrorText(tool.name, err), outcome: 'error' };
    }
  }

  private toolContext(ctx: DispatchContext, cancellation: CancellationToken, session: Map<string, unknown>): ToolContext {
    return {
      repoDir: ctx.repoDir,
      driveDir: ctx.driveDir,
      taskId: ctx.taskId,
      emit: (event) => this.emitSafely(event),
      cancellation,
      session,
    };
  }

  private async invokeInSlot(tool: RegisteredTool, args: Record<string, unknown>, ctx: DispatchContext): Promise<Raced<string>> {
    const slot = createCancellationTokenSource();
    const running = Promise.resolve().then(() => tool.invoke(args, this.toolContext(ctx, slot.token, new Map())));
    const raced = await raceTimeout(running, tool.timeoutSec * 1000);

    if (raced.timedOut) {
      this.detached.track(`slot:${tool.name}`, running);
      this.cancelQuietly(() => slot.cancel(`${tool.name} timed out`));
    }
    slot.dispose();
    return raced;
  }

  private async invokeOnLane(tool: RegisteredTool, args: Record<string, unknown>, ctx: DispatchContext): Promise<Raced<string>> {
    const running = this.lane.run(tool.name, (token, session) => tool.invoke(args, this.toolContext(ctx, token, session)));
    const raced = await raceTimeout(running, tool.timeoutSec * 1000);

    if (raced.timedOut) {
      this.cancelQuietly(() => this.lane.reset(`${tool.name} timed out after ${tool.timeoutSec}s`));
    }
    return raced;
  }

  /** Cancellation callbacks belong to the abandoned tool; their failures are logged only */
  private cancelQuietly(cancel: () => void): void {
    try {
      cancel();
    } catch (err) {
      log.warn('Cancellation callback failed', { error: formatError(err) });
    }
  }

  private buildResult(
    call: ToolCallResponse,
    ctx: DispatchContext,
    argsForLog: Record<string, unknown>,
    tool: RegisteredTool | undefined,
    outcome: CallOutcome,
    started: number
  ): ToolResult {
    const text = truncateToolResult(outcome.text, this.resultMaxChars);
    const isError = outcome.outcome !== 'ok' || text.startsWith(WARNING_MARKER);
    const durationMs = Math.max(0, this.now() - started);

    try {
      this.audit.recordTool({
        ts: new Date(this.now()).toISOString(),
        taskId: ctx.taskId,
        tool: call.function.name,
        args: argsForLog,
        resultPreview: truncateForLog(text, this.auditPreviewChars),
        isError,
        outcome: outcome.outcome,
        durationMs,
      });
    } catch (err) {
      log.warn('Audit write failed', { tool: call.function.name, error: formatError(err) });
    }

    return {
      toolCallId: call.id,
      toolName: call.function.name,
      result: text,
      isError,
      outcome: outcome.outcome,
      argsForLog,
      isCodeTool: tool?.isCodeTool ?? false,
      durationMs,
    };
  }

  private emitError(ctx: DispatchContext, tool: string, args: Record<string, unknown>, error: string): void {
    this.emitSafely({
      type: 'tool_error',
      ts: new Date(this.now()).toISOString(),
      taskId: ctx.taskId,
      category: ctx.category,
      tool,
      args,
      error,
    });
  }

  private emitSafely(event: LoopEvent): void {
    try {
      this.events.emit(event);
    } catch (err) {
      log.warn('Event sink write failed', { type: event.type, error: formatError(err) });
    }
  }
}

export function createToolDispatchEngine(config: ToolDispatchConfig): ToolDispatchEngine {
  return new ToolDispatchEngine(config);
}
