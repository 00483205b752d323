/**
 * Structured Logger with Trace IDs and Multiple Sinks
 *
 * Single logging entry point for the loop. Components take a child logger
 * through `createComponentLogger()`; children share level and sinks with
 * the process logger, so `configureLogger()` after module load still
 * reaches them.
 *
 * Sinks:
 * - console: human-readable lines on stdout/stderr
 * - memory: ring buffer for tests and programmatic access
 * - file: JSON lines appended to a log file
 *
 * Usage:
 *   const log = createComponentLogger('ToolDispatch');
 *   log.info('Dispatching batch', { size: 3 });
 *   log.withTrace(taskId).warn('Tool timed out');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

/** Level and sinks shared by a logger and all of its children. */
interface SharedState {
  minLevel: LogLevel;
  sinks: LogSink[];
  droppedWrites: number;
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/**
 * Console sink: one line per entry, errors and warnings to stderr.
 * `stderrOnly` keeps stdout free for command output.
 */
export class ConsoleSink implements LogSink {
  private stderrOnly: boolean;

  constructor(options: { stderrOnly?: boolean } = {}) {
    this.stderrOnly = options.stderrOnly ?? false;
  }

  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    const line = `${prefix}${traceStr} ${entry.message}${dataStr}`;

    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        if (this.stderrOnly) console.error(line);
        else console.log(line);
        break;
    }
  }
}

/** Memory sink: ring buffer for tests and programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; traceId?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.traceId) {
      entries = entries.filter((e) => e.traceId === filter.traceId);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink: JSON lines appended to `filePath`, parent directory created on first write */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private state: SharedState;
  private defaultContext: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}) {
    this.state = {
      minLevel: config.level ?? 'info',
      sinks: config.sinks ?? [new ConsoleSink()],
      droppedWrites: 0,
    };
    this.defaultContext = config.defaultContext ?? {};
  }

  private child(context: Record<string, unknown>, traceId: string | undefined): StructuredLogger {
    const child = new StructuredLogger({ defaultContext: context });
    child.state = this.state;
    child.traceId = traceId;
    return child;
  }

  /** Create a child logger with a bound trace ID */
  withTrace(traceId: string): StructuredLogger {
    return this.child(this.defaultContext, traceId);
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return this.child({ ...this.defaultContext, ...context }, this.traceId);
  }

  /** Replace level and sinks for this logger and every child sharing its state */
  reconfigure(config: LoggerConfig): void {
    if (config.level) this.state.minLevel = config.level;
    if (config.sinks) this.state.sinks = [...config.sinks];
  }

  setLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  addSink(sink: LogSink): void {
    this.state.sinks.push(sink);
  }

  get level(): LogLevel {
    return this.state.minLevel;
  }

  /** Writes that a sink rejected */
  get droppedWrites(): number {
    return this.state.droppedWrites;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.state.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.state.sinks) {
      try {
        sink.write(entry);
      } catch {
        this.state.droppedWrites++;
      }
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Process logger. Console sink at 'info' until `configureLogger()` runs.
 */
export const logger = new StructuredLogger();

/**
 * Reconfigure the process logger. Component loggers created earlier follow.
 *
 * Example:
 *   configureLogger({
 *     level: 'debug',
 *     sinks: [new ConsoleSink(), new FileSink('.roundloop/logs/loop.log')],
 *   });
 */
export function configureLogger(config: LoggerConfig): void {
  logger.reconfigure(config);
}

/**
 * Create a logger for a specific component (adds component name to context).
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
