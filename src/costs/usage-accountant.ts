/**
 * Usage & Cost Accountant
 *
 * Turns the usage block of every model call into a UsageRecord, emits an
 * `llm_usage` event, and keeps per-task running totals. The task's
 * BudgetState is the sum of the costs of the events emitted for it.
 */

import type { BudgetState, EventSink, LlmUsageEvent, UsageRecord } from '../types.js';
import { formatError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import { PricingCache, roundCost } from './pricing.js';

const log = createComponentLogger('UsageAccountant');

/** Model name recorded when a provider reports none */
export const UNKNOWN_MODEL = '(unknown)';

// =============================================================================
// TYPES
// =============================================================================

/** Usage block as reported by a provider */
export interface RawUsage {
  promptTokens: number;
  completionTokens: number;
  cachedTokens?: number;
  cacheWriteTokens?: number;
  /** Cost reported by the provider, when it reports one */
  cost?: number;
}

export interface RecordUsageInput {
  taskId: string;
  category: string;
  provider: string;
  model: string | undefined;
  usage: RawUsage;
  elapsedSec: number;
}

export interface UsageTotals {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  cachedTokens: number;
  cacheWriteTokens: number;
  cost: number;
}

export interface UsageAccountantConfig {
  pricing: PricingCache;
  events: EventSink;
  now?: () => Date;
}

export interface BudgetPolicy {
  /** Share of remaining budget above which the task is forced to finish */
  forceFraction: number;
  /** Share of remaining budget above which an advisory is injected */
  warnFraction: number;
  /** Advisory cadence in rounds */
  warnEveryRounds: number;
}

export type BudgetDecision =
  | { kind: 'ok' }
  | { kind: 'warn'; message: string }
  | { kind: 'force'; message: string };

// =============================================================================
// ACCOUNTANT
// =============================================================================

function emptyTotals(): UsageTotals {
  return { calls: 0, promptTokens: 0, completionTokens: 0, cachedTokens: 0, cacheWriteTokens: 0, cost: 0 };
}

export class UsageAccountant {
  private pricing: PricingCache;
  private events: EventSink;
  private now: () => Date;
  private totals = new Map<string, UsageTotals>();

  constructor(config: UsageAccountantConfig) {
    this.pricing = config.pricing;
    this.events = config.events;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Record one model call. Provider-reported cost wins over the estimate.
   */
  async record(input: RecordUsageInput): Promise<{ record: UsageRecord; event: LlmUsageEvent }> {
    const model = input.model && input.model.trim() ? input.model : UNKNOWN_MODEL;
    const cachedTokens = input.usage.cachedTokens ?? 0;
    const cacheWriteTokens = input.usage.cacheWriteTokens ?? 0;
    const reported = input.usage.cost;
    const measured = typeof reported === 'number' && Number.isFinite(reported);

    let cost: number;
    if (measured) {
      cost = reported;
    } else {
      await this.pricing.refresh();
      cost = this.pricing.estimateCost(model, input.usage.promptTokens, input.usage.completionTokens, cachedTokens);
    }

    const record: UsageRecord = {
      promptTokens: input.usage.promptTokens,
      completionTokens: input.usage.completionTokens,
      cachedTokens,
      cacheWriteTokens,
      elapsedSec: input.elapsedSec,
      cost,
      costMeasured: measured,
    };

    const event: LlmUsageEvent = {
      type: 'llm_usage',
      ts: this.now().toISOString(),
      taskId: input.taskId,
      category: input.category,
      provider: input.provider,
      model,
      usage: {
        promptTokens: record.promptTokens,
        completionTokens: record.completionTokens,
        cachedTokens,
        cacheWriteTokens,
        elapsedSec: record.elapsedSec,
      },
      cost,
      costEstimated: !measured,
    };

    // Billed tokens count toward the task even if the sink rejects the event
    this.accumulate(input.taskId, record);
    try {
      this.events.emit(event);
    } catch (err) {
      log.warn('Event sink write failed', { type: event.type, taskId: input.taskId, error: formatError(err) });
    }

    log.debug('Recorded usage', { taskId: input.taskId, model, cost, measured });
    return { record, event };
  }

  private accumulate(taskId: string, record: UsageRecord): void {
    const totals = this.totals.get(taskId) ?? emptyTotals();
    totals.calls++;
    totals.promptTokens += record.promptTokens;
    totals.completionTokens += record.completionTokens;
    totals.cachedTokens += record.cachedTokens;
    totals.cacheWriteTokens += record.cacheWriteTokens;
    totals.cost = roundCost(totals.cost + record.cost, this.pricing.roundingDecimals);
    this.totals.set(taskId, totals);
  }

  taskTotals(taskId: string): UsageTotals {
    return { ...(this.totals.get(taskId) ?? emptyTotals()) };
  }

  taskCost(taskId: string): number {
    return this.totals.get(taskId)?.cost ?? 0;
  }

  budgetState(taskId: string, ceilingUsd: number): BudgetState {
    const spentUsd = this.taskCost(taskId);
    return { spentUsd, remainingUsd: ceilingUsd - spentUsd, ceilingUsd };
  }

  /** Drop a finished task's totals */
  release(taskId: string): void {
    this.totals.delete(taskId);
  }
}

// =============================================================================
// BUDGET DECISION
// =============================================================================

/**
 * Compare task spend with the budget that was remaining when the task
 * started. A non-positive remaining budget counts as fully spent.
 */
export function evaluateBudget(
  taskCost: number,
  remainingUsd: number | undefined,
  round: number,
  policy: BudgetPolicy
): BudgetDecision {
  if (remainingUsd === undefined) return { kind: 'ok' };

  const share = remainingUsd > 0 ? taskCost / remainingUsd : 1.0;

  if (share > policy.forceFraction) {
    const pct = Math.round(policy.forceFraction * 100);
    return {
      kind: 'force',
      message:
        `[BUDGET LIMIT] Task spent $${taskCost.toFixed(3)} (>${pct}% of remaining $${remainingUsd.toFixed(2)}). ` +
        'Budget exhausted. Give your final response now.',
    };
  }

  if (share > policy.warnFraction && policy.warnEveryRounds > 0 && round % policy.warnEveryRounds === 0) {
    return {
      kind: 'warn',
      message: `[INFO] Task spent $${taskCost.toFixed(3)} of $${remainingUsd.toFixed(2)}. Wrap up if possible.`,
    };
  }

  return { kind: 'ok' };
}
