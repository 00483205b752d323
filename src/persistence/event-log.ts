/**
 * In-memory and JSON-lines event logs.
 *
 * JSONL layout under the drive directory:
 *   logs/events.jsonl  every LoopEvent
 *   logs/tools.jsonl   one line per tool call
 *   logs/rounds.jsonl  one line per round
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { AuditLog, EventSink, LoopEvent, RoundAuditEntry, ToolAuditEntry } from '../types.js';

export const LOG_FILES = {
  events: 'logs/events.jsonl',
  tools: 'logs/tools.jsonl',
  rounds: 'logs/rounds.jsonl',
} as const;

// =============================================================================
// MEMORY
// =============================================================================

export class MemoryEventLog implements EventSink, AuditLog {
  readonly events: LoopEvent[] = [];
  readonly tools: ToolAuditEntry[] = [];
  readonly rounds: RoundAuditEntry[] = [];

  emit(event: LoopEvent): void {
    this.events.push(event);
  }

  recordTool(entry: ToolAuditEntry): void {
    this.tools.push(entry);
  }

  recordRound(entry: RoundAuditEntry): void {
    this.rounds.push(entry);
  }

  ofType<T extends LoopEvent['type']>(type: T): Array<Extract<LoopEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<LoopEvent, { type: T }> => e.type === type);
  }

  taskCost(taskId: string): number {
    return this.ofType('llm_usage')
      .filter((e) => e.taskId === taskId)
      .reduce((sum, e) => sum + e.cost, 0);
  }
}

// =============================================================================
// JSONL
// =============================================================================

export class JsonlEventLog implements EventSink, AuditLog {
  private readonly paths: Record<keyof typeof LOG_FILES, string>;

  constructor(driveDir: string) {
    this.paths = {
      events: join(driveDir, LOG_FILES.events),
      tools: join(driveDir, LOG_FILES.tools),
      rounds: join(driveDir, LOG_FILES.rounds),
    };
    mkdirSync(join(driveDir, 'logs'), { recursive: true });
  }

  emit(event: LoopEvent): void {
    appendFileSync(this.paths.events, JSON.stringify(event) + '\n', 'utf-8');
  }

  recordTool(entry: ToolAuditEntry): void {
    appendFileSync(this.paths.tools, JSON.stringify(entry) + '\n', 'utf-8');
  }

  recordRound(entry: RoundAuditEntry): void {
    appendFileSync(this.paths.rounds, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

// =============================================================================
// FAN-OUT
// =============================================================================

/**
 * Writes to every target in order. A target that throws does not stop the
 * others; the first failure is rethrown after all were tried.
 */
export class CompositeEventLog implements EventSink, AuditLog {
  constructor(private readonly targets: ReadonlyArray<EventSink & AuditLog>) {}

  emit(event: LoopEvent): void {
    this.each((t) => t.emit(event));
  }

  recordTool(entry: ToolAuditEntry): void {
    this.each((t) => t.recordTool(entry));
  }

  recordRound(entry: RoundAuditEntry): void {
    this.each((t) => t.recordRound(entry));
  }

  private each(write: (target: EventSink & AuditLog) => void): void {
    const failures: unknown[] = [];
    for (const target of this.targets) {
      try {
        write(target);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }
}
