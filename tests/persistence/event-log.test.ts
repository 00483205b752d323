/**
 * Event Log Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CompositeEventLog, JsonlEventLog, LOG_FILES, MemoryEventLog } from '../../src/persistence/event-log.js';
import type { AuditLog, EventSink, ToolErrorEvent } from '../../src/types.js';

const toolError: ToolErrorEvent = {
  type: 'tool_error',
  ts: '2026-01-01T00:00:00.000Z',
  taskId: 't1',
  category: 'task',
  tool: 'echo',
  args: {},
  error: 'boom',
};

describe('MemoryEventLog', () => {
  it('should filter events by type', () => {
    const log = new MemoryEventLog();
    log.emit(toolError);

    expect(log.ofType('tool_error')).toEqual([toolError]);
    expect(log.ofType('llm_usage')).toEqual([]);
    expect(log.taskCost('t1')).toBe(0);
  });
});

describe('JsonlEventLog', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should append one JSON line per event', () => {
    dir = mkdtempSync(join(tmpdir(), 'roundloop-logs-'));
    const log = new JsonlEventLog(dir);

    log.emit(toolError);
    log.emit({ ...toolError, tool: 'other' });

    const lines = readFileSync(join(dir, LOG_FILES.events), 'utf-8').trim().split('\n');
    expect(lines.map((l) => JSON.parse(l).tool)).toEqual(['echo', 'other']);
  });
});

describe('CompositeEventLog', () => {
  it('should write to every target and rethrow the first failure', () => {
    const failure = new Error('disk full');
    const broken: EventSink & AuditLog = {
      emit: () => {
        throw failure;
      },
      recordTool: () => undefined,
      recordRound: () => undefined,
    };
    const memory = new MemoryEventLog();
    const log = new CompositeEventLog([broken, memory]);

    expect(() => log.emit(toolError)).toThrow(failure);
    expect(memory.events).toEqual([toolError]);
  });
});
