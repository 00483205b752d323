/**
 * SQLite Event Store
 *
 * Durable EventSink and AuditLog backed by better-sqlite3. Writes are
 * synchronous, so an event is on disk before the loop moves on. Opens
 * `:memory:` for tests.
 *
 * @example
 * ```typescript
 * const store = openEventStore({ dbPath: getEventDbPath() });
 * const orchestrator = createRoundOrchestrator({ ..., audit: store });
 * store.taskCost('task-1');
 * ```
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { AuditLog, EventSink, LoopEvent, RoundAuditEntry, ToolAuditEntry } from '../types.js';
import { applyMigrations, type MigrationResult } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface EventStoreConfig {
  /** File path or `:memory:` */
  dbPath: string;
  /** Enable WAL mode (default: true, ignored for `:memory:`) */
  walMode?: boolean;
}

export interface StoredEvent {
  id: number;
  ts: string;
  type: LoopEvent['type'];
  taskId: string;
  category: string;
  data: Record<string, unknown>;
}

const EVENT_TYPES = ['llm_usage', 'tool_error', 'tool_timeout', 'llm_api_error'] as const;

const EventRowSchema = z.object({
  id: z.number(),
  ts: z.string(),
  type: z.enum(EVENT_TYPES),
  task_id: z.string(),
  category: z.string(),
  data: z.string(),
});

const ToolRowSchema = z.object({
  ts: z.string(),
  task_id: z.string(),
  tool: z.string(),
  args: z.string(),
  result_preview: z.string(),
  is_error: z.number(),
  outcome: z.enum(['ok', 'error', 'timeout', 'arg_error']),
  duration_ms: z.number(),
});

const TotalRowSchema = z.object({ total: z.number() });

const JsonObjectSchema = z.record(z.string(), z.unknown());

function parseObject(text: string): Record<string, unknown> {
  const parsed = JsonObjectSchema.safeParse(JSON.parse(text));
  return parsed.success ? parsed.data : {};
}

// =============================================================================
// STORE
// =============================================================================

export class SqliteEventStore implements EventSink, AuditLog {
  readonly migration: MigrationResult;
  private db: Database.Database;
  private insertEvent: Database.Statement;
  private insertTool: Database.Statement;
  private insertRound: Database.Statement;

  constructor(config: EventStoreConfig) {
    if (config.dbPath !== ':memory:') {
      mkdirSync(dirname(config.dbPath), { recursive: true });
    }
    this.db = new Database(config.dbPath);
    if (config.walMode !== false && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.migration = applyMigrations(this.db);

    this.insertEvent = this.db.prepare(
      `INSERT INTO events (ts, type, task_id, category, data, cost_usd)
       VALUES (@ts, @type, @taskId, @category, @data, @cost)`
    );
    this.insertTool = this.db.prepare(
      `INSERT INTO tool_calls (ts, task_id, tool, args, result_preview, is_error, outcome, duration_ms)
       VALUES (@ts, @taskId, @tool, @args, @resultPreview, @isError, @outcome, @durationMs)`
    );
    this.insertRound = this.db.prepare(
      `INSERT INTO rounds (ts, task_id, round, model, status, tool_calls, cost_usd, prompt_tokens, completion_tokens, cap)
       VALUES (@ts, @taskId, @round, @model, @status, @toolCalls, @cost, @promptTokens, @completionTokens, @cap)`
    );
  }

  emit(event: LoopEvent): void {
    this.insertEvent.run({
      ts: event.ts,
      type: event.type,
      taskId: event.taskId,
      category: event.category,
      data: JSON.stringify(event),
      cost: event.type === 'llm_usage' ? event.cost : null,
    });
  }

  recordTool(entry: ToolAuditEntry): void {
    this.insertTool.run({
      ts: entry.ts,
      taskId: entry.taskId,
      tool: entry.tool,
      args: JSON.stringify(entry.args),
      resultPreview: entry.resultPreview,
      isError: entry.isError ? 1 : 0,
      outcome: entry.outcome,
      durationMs: Math.round(entry.durationMs),
    });
  }

  recordRound(entry: RoundAuditEntry): void {
    this.insertRound.run({
      ts: entry.ts,
      taskId: entry.taskId,
      round: entry.round,
      model: entry.model,
      status: entry.status,
      toolCalls: entry.toolCalls,
      cost: entry.cost,
      promptTokens: entry.promptTokens,
      completionTokens: entry.completionTokens,
      cap: JSON.stringify(entry.cap),
    });
  }

  /** Sum of recorded `llm_usage` costs for a task */
  taskCost(taskId: string): number {
    const row = this.db
      .prepare(`SELECT COALESCE(SUM(cost_usd), 0) AS total FROM events WHERE task_id = ? AND type = 'llm_usage'`)
      .get(taskId);
    return TotalRowSchema.parse(row).total;
  }

  events(taskId: string, type?: LoopEvent['type']): StoredEvent[] {
    const rows = type
      ? this.db.prepare('SELECT * FROM events WHERE task_id = ? AND type = ? ORDER BY id').all(taskId, type)
      : this.db.prepare('SELECT * FROM events WHERE task_id = ? ORDER BY id').all(taskId);

    return z.array(EventRowSchema).parse(rows).map((row) => ({
      id: row.id,
      ts: row.ts,
      type: row.type,
      taskId: row.task_id,
      category: row.category,
      data: parseObject(row.data),
    }));
  }

  toolCalls(taskId: string): ToolAuditEntry[] {
    const rows = this.db.prepare('SELECT * FROM tool_calls WHERE task_id = ? ORDER BY id').all(taskId);
    return z.array(ToolRowSchema).parse(rows).map((row) => ({
      ts: row.ts,
      taskId: row.task_id,
      tool: row.tool,
      args: parseObject(row.args),
      resultPreview: row.result_preview,
      isError: row.is_error === 1,
      outcome: row.outcome,
      durationMs: row.duration_ms,
    }));
  }

  roundCount(taskId: string): number {
    const row = this.db.prepare('SELECT COUNT(*) AS total FROM rounds WHERE task_id = ?').get(taskId);
    return TotalRowSchema.parse(row).total;
  }

  close(): void {
    this.db.close();
  }
}

export function openEventStore(config: EventStoreConfig): SqliteEventStore {
  return new SqliteEventStore(config);
}
