/**
 * Round Orchestrator
 *
 * Drives one task through rounds of build context → call model → run
 * tools until the model answers, the budget forces an answer, or the task
 * fails. Every exit produces a TaskOutcome with a readable explanation;
 * `run()` only rejects on programming errors.
 *
 * Shared task state (history, budget, counters) is touched only here,
 * after each model call or tool batch has settled.
 *
 * An orchestrator runs one task at a time: the fallback chain and the
 * sticky lane it drives are shared, so a second `run()` while one is in
 * flight is rejected.
 */

import type { LoopConfig } from '../config/schema.js';
import { type UsageAccountant, type UsageTotals, evaluateBudget } from '../costs/usage-accountant.js';
import { AgentError, ErrorCategory, TerminationError, formatError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import type { ToolDefinitionSchema } from '../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type {
  AuditLog,
  BudgetSource,
  CapReport,
  Message,
  ReasoningEffort,
  RoundAuditEntry,
  Task,
} from '../types.js';
import type { ContextBuilder } from './context-builder.js';
import { estimateTotalTokens } from './context-cap.js';
import { type ModelCaller, type ModelCallResult, normalizeReasoningEffort } from './model-caller.js';
import { RoundStateMachine, type TerminationStatus } from './round-state-machine.js';
import type { ToolDispatchEngine } from './tool-executor.js';

const log = createComponentLogger('RoundOrchestrator');

// =============================================================================
// TYPES
// =============================================================================

export interface TaskOutcome {
  taskId: string;
  status: TerminationStatus;
  /** Final answer, forced answer, or the reason the task stopped */
  text: string;
  rounds: number;
  /** Model in use when the task ended */
  model: string;
  usage: UsageTotals;
  capReports: CapReport[];
  toolErrors: number;
  /** Set for round_limit and fatal_error */
  error?: TerminationError;
}

export interface RoundOrchestratorConfig {
  config: Pick<
    LoopConfig,
    'model' | 'maxRounds' | 'reasoningEffort' | 'selfCheckEveryRounds' | 'budget' | 'tools' | 'repoDir' | 'driveDir'
  >;
  contextBuilder: ContextBuilder;
  caller: ModelCaller;
  accountant: UsageAccountant;
  tools: ToolDispatchEngine;
  registry: ToolRegistry;
  audit: AuditLog;
  budgetSource?: BudgetSource;
  now?: () => number;
}

export interface RunOptions {
  /** Overrides the configured model for this task */
  model?: string;
}

// =============================================================================
// MESSAGE TEXT
// =============================================================================

export function budgetExhaustedText(rounds: number, spentUsd: number): string {
  return `Task stopped: budget limit reached after ${rounds} rounds ($${spentUsd.toFixed(3)} spent). No final answer was produced.`;
}

export function roundLimitText(maxRounds: number): string {
  return `Task stopped: reached the ${maxRounds}-round limit without a final answer.`;
}

export function selfCheckText(round: number, maxRounds: number, every: number, contextTokens: number, spentUsd: number): string {
  const n = Math.floor(round / every);
  return (
    `[CHECKPOINT ${n}: round ${round}/${maxRounds}] Context is about ${contextTokens} tokens and this task ` +
    `has spent $${spentUsd.toFixed(3)}. Step back: is the current approach converging? ` +
    'If not, change course or finish with what you have.'
  );
}

/** Plain text of an assistant message, empty when it has none */
export function messageText(message: Message): string {
  if (typeof message.content === 'string') return message.content;
  if (!message.content) return '';
  return message.content.map((b) => (b.type === 'text' ? b.text : '')).join('');
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class RoundOrchestrator {
  private readonly cfg: RoundOrchestratorConfig['config'];
  private readonly deps: RoundOrchestratorConfig;
  private readonly now: () => number;
  private activeTaskId: string | undefined;

  constructor(config: RoundOrchestratorConfig) {
    this.cfg = config.config;
    this.deps = config;
    this.now = config.now ?? Date.now;
  }

  /**
   * Budget available to `task` at start: its own ceiling, else what the
   * budget source has left, else the configured default.
   */
  remainingBudget(task: Task): number | undefined {
    if (task.budgetUsd !== undefined) return task.budgetUsd;
    if (this.deps.budgetSource) {
      const { spentUsd, totalUsd } = this.deps.budgetSource.getBudget();
      return totalUsd - spentUsd;
    }
    return this.cfg.budget.defaultUsd;
  }

  async run(task: Task, options: RunOptions = {}): Promise<TaskOutcome> {
    if (this.activeTaskId !== undefined) {
      throw new AgentError(
        `Cannot start task ${task.id} while task ${this.activeTaskId} is running`,
        ErrorCategory.INTERNAL,
        false,
        { taskId: task.id, activeTaskId: this.activeTaskId }
      );
    }
    this.activeTaskId = task.id;
    try {
      const run = new TaskRun(this.deps, task, options.model ?? this.cfg.model, this.remainingBudget(task), this.now);
      try {
        return await run.execute();
      } finally {
        run.dispose();
      }
    } finally {
      this.activeTaskId = undefined;
    }
  }
}

/**
 * State for one task. Lives for the duration of `RoundOrchestrator.run`.
 */
class TaskRun {
  private readonly sm: RoundStateMachine;
  private readonly category: string;
  private readonly effort: ReasoningEffort;
  private readonly toolSchemas: ToolDefinitionSchema[];
  private readonly unsubscribe: () => void;
  private messages: Message[] = [];
  private capReports: CapReport[] = [];
  private toolErrors = 0;
  private model: string;

  constructor(
    private readonly deps: RoundOrchestratorConfig,
    private readonly task: Task,
    model: string,
    private readonly remainingUsd: number | undefined,
    private readonly now: () => number
  ) {
    this.sm = new RoundStateMachine({ now: this.now });
    this.category = task.type;
    this.model = model;
    this.effort = normalizeReasoningEffort(task.reasoningEffort, deps.config.reasoningEffort);
    this.toolSchemas = deps.registry.getSchemas();

    this.unsubscribe = deps.caller.chain.on((event) => {
      if (event.type !== 'model.fallback') return;
      this.sm.transition('RETRY_WITH_FALLBACK', `${event.from} failed: ${formatError(event.error)}`);
      this.sm.transition('CALLING_MODEL', `retrying with ${event.to}`);
    });
  }

  dispose(): void {
    this.unsubscribe();
    this.deps.accountant.release(this.task.id);
    this.deps.tools.lane.reset(`task ${this.task.id} finished`);
  }

  async execute(): Promise<TaskOutcome> {
    const { config, contextBuilder } = this.deps;

    const built = await contextBuilder.build(this.task, {
      model: this.model,
      budgetRemainingUsd: this.remainingUsd,
    });
    this.messages = built.messages;
    log.info('Task started', {
      taskId: this.task.id,
      type: this.task.type,
      model: this.model,
      softCap: built.softCap,
      remainingUsd: this.remainingUsd,
    });

    for (;;) {
      if (this.sm.round >= config.maxRounds) {
        return this.finish(
          'round_limit',
          roundLimitText(config.maxRounds),
          new TerminationError('round_limit', roundLimitText(config.maxRounds), { maxRounds: config.maxRounds })
        );
      }

      this.sm.transition('CALLING_MODEL', 'context ready');
      const round = this.sm.round;
      this.injectSelfCheck(round);
      const cap = this.capHistory();

      let result: ModelCallResult;
      try {
        result = await this.callModel(this.toolSchemas);
      } catch (err) {
        this.recordRound(round, 'error', cap, undefined, 0);
        const text = `Task failed: every model in the fallback chain failed. Last error: ${formatError(err)}`;
        return this.finish(
          'fatal_error',
          text,
          new TerminationError('fallback_exhausted', text, { round }, err instanceof Error ? err : undefined)
        );
      }

      const assistant = result.response.message;
      const calls = assistant.tool_calls ?? [];
      this.messages.push({
        role: 'assistant',
        content: assistant.content,
        ...(calls.length > 0 && { tool_calls: calls }),
      });

      if (calls.length === 0) {
        this.sm.transition('FINAL_RESPONSE', 'no tool calls');
        this.recordRound(round, 'final', cap, result, 0);
        return this.finish('success', messageText(assistant));
      }

      this.sm.transition('HANDLING_TOOLS', `${calls.length} tool call(s)`);
      const results = await this.deps.tools.dispatch(calls, {
        taskId: this.task.id,
        category: this.category,
        repoDir: config.repoDir ?? process.cwd(),
        driveDir: config.driveDir ?? process.cwd(),
      });
      this.messages.push(...this.deps.tools.toMessages(results));
      this.toolErrors += results.filter((r) => r.isError).length;
      this.recordRound(round, 'tools', cap, result, calls.length);

      if (this.toolErrors >= config.tools.maxErrors) {
        const text = `Task failed: ${this.toolErrors} tool errors reached the limit of ${config.tools.maxErrors}.`;
        return this.finish(
          'fatal_error',
          text,
          new TerminationError('tool_error_limit', text, { toolErrors: this.toolErrors, round })
        );
      }

      const spent = this.deps.accountant.taskCost(this.task.id);
      const budget = evaluateBudget(spent, this.remainingUsd, round, config.budget);
      if (budget.kind === 'force') {
        log.warn('Budget limit reached, forcing final answer', { taskId: this.task.id, round, spent });
        this.messages.push({ role: 'system', content: budget.message });
        return this.forceFinalAnswer();
      }
      if (budget.kind === 'warn') {
        this.messages.push({ role: 'system', content: budget.message });
      }

      this.sm.transition('BUILDING_CONTEXT', 'tool results appended');
    }
  }

  /**
   * One last call without tools. The task ends whatever it returns.
   */
  private async forceFinalAnswer(): Promise<TaskOutcome> {
    this.sm.transition('BUILDING_CONTEXT', 'budget limit');
    this.sm.transition('CALLING_MODEL', 'forced final answer');
    const round = this.sm.round;
    const cap = this.capHistory();

    let text: string;
    try {
      const result = await this.callModel(undefined);
      this.messages.push({ role: 'assistant', content: result.response.message.content });
      this.recordRound(round, 'budget_forced', cap, result, 0);
      text = messageText(result.response.message).trim();
    } catch (err) {
      log.warn('Forced final call failed', { taskId: this.task.id, error: formatError(err) });
      this.recordRound(round, 'error', cap, undefined, 0);
      text = '';
    }

    if (text === '') {
      text = budgetExhaustedText(round, this.deps.accountant.taskCost(this.task.id));
    }
    return this.finish('budget_exhausted', text);
  }

  private async callModel(tools: ToolDefinitionSchema[] | undefined): Promise<ModelCallResult> {
    const result = await this.deps.caller.call({
      taskId: this.task.id,
      category: this.category,
      model: this.model,
      messages: this.messages,
      tools: tools && tools.length > 0 ? tools : undefined,
      reasoningEffort: this.effort,
    });
    if (result.model !== this.model) {
      log.info('Continuing on fallback model', { taskId: this.task.id, from: this.model, to: result.model });
      this.model = result.model;
    }
    return result;
  }

  /** Trim the history in place for the active model */
  private capHistory(): CapReport {
    const capped = this.deps.contextBuilder.cap(this.messages, this.model, this.task.type);
    if (capped.report.trimmed) {
      log.info('History trimmed to soft cap', { taskId: this.task.id, ...capped.report });
    }
    this.messages = capped.messages;
    this.capReports.push(capped.report);
    return capped.report;
  }

  private injectSelfCheck(round: number): void {
    const every = this.deps.config.selfCheckEveryRounds;
    if (round <= 1 || round % every !== 0) return;
    this.messages.push({
      role: 'system',
      content: selfCheckText(
        round,
        this.deps.config.maxRounds,
        every,
        estimateTotalTokens(this.messages),
        this.deps.accountant.taskCost(this.task.id)
      ),
    });
  }

  private recordRound(
    round: number,
    status: RoundAuditEntry['status'],
    cap: CapReport,
    result: ModelCallResult | undefined,
    toolCalls: number
  ): void {
    try {
      this.deps.audit.recordRound({
        ts: new Date(this.now()).toISOString(),
        taskId: this.task.id,
        round,
        model: result?.model ?? this.model,
        status,
        toolCalls,
        cost: result?.usage.cost ?? 0,
        promptTokens: result?.usage.promptTokens ?? 0,
        completionTokens: result?.usage.completionTokens ?? 0,
        cap,
      });
    } catch (err) {
      log.warn('Round audit write failed', { taskId: this.task.id, round, error: formatError(err) });
    }
  }

  private finish(status: TerminationStatus, text: string, error?: TerminationError): TaskOutcome {
    this.sm.terminate(status, error?.message ?? status);
    const outcome: TaskOutcome = {
      taskId: this.task.id,
      status,
      text,
      rounds: this.sm.round,
      model: this.model,
      usage: this.deps.accountant.taskTotals(this.task.id),
      capReports: this.capReports,
      toolErrors: this.toolErrors,
      ...(error && { error }),
    };

    const fields = { taskId: this.task.id, status, rounds: outcome.rounds, cost: outcome.usage.cost };
    if (status === 'fatal_error' || status === 'round_limit') {
      log.error('Task terminated', { ...fields, reason: text });
    } else {
      log.info('Task finished', fields);
    }
    return outcome;
  }
}

export function createRoundOrchestrator(config: RoundOrchestratorConfig): RoundOrchestrator {
  return new RoundOrchestrator(config);
}
