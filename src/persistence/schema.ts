/**
 * SQLite Schema Definitions
 *
 * Migrations are embedded as code and tracked with PRAGMA user_version.
 * Statements are idempotent (IF NOT EXISTS), so a migration that failed
 * partway can be re-run after the cause is fixed.
 */

import type Database from 'better-sqlite3';

// =============================================================================
// TYPES
// =============================================================================

export interface Migration {
  /** Unique, sequential */
  version: number;
  name: string;
  sql: string;
}

export interface MigrationResult {
  applied: number;
  currentVersion: number;
  appliedMigrations: string[];
}

// =============================================================================
// EMBEDDED MIGRATIONS
// =============================================================================

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'initial',
    sql: `
      -- Append-only event stream (llm_usage, tool_error, tool_timeout, llm_api_error)
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        type TEXT NOT NULL,
        task_id TEXT NOT NULL,
        category TEXT NOT NULL,
        data TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tool_calls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        task_id TEXT NOT NULL,
        tool TEXT NOT NULL,
        args TEXT NOT NULL,
        result_preview TEXT NOT NULL,
        is_error INTEGER NOT NULL DEFAULT 0,
        outcome TEXT NOT NULL,
        duration_ms INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_events_task ON events(task_id);
      CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
      CREATE INDEX IF NOT EXISTS idx_tool_calls_task ON tool_calls(task_id);
    `,
  },
  {
    version: 2,
    name: 'rounds_and_costs',
    sql: `
      CREATE TABLE IF NOT EXISTS rounds (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        task_id TEXT NOT NULL,
        round INTEGER NOT NULL,
        model TEXT NOT NULL,
        status TEXT NOT NULL,
        tool_calls INTEGER NOT NULL DEFAULT 0,
        cost_usd REAL NOT NULL DEFAULT 0.0,
        prompt_tokens INTEGER NOT NULL DEFAULT 0,
        completion_tokens INTEGER NOT NULL DEFAULT 0,
        cap TEXT NOT NULL
      );

      -- Denormalised so task cost is a single indexed sum
      ALTER TABLE events ADD COLUMN cost_usd REAL;

      CREATE INDEX IF NOT EXISTS idx_rounds_task ON rounds(task_id, round);
    `,
  },
];

// =============================================================================
// MIGRATION APPLICATION
// =============================================================================

export function getSchemaVersion(db: Database.Database): number {
  const result = db.pragma('user_version', { simple: true });
  return typeof result === 'number' ? result : 0;
}

function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((s) =>
      s
        .split('\n')
        .filter((line) => !line.trim().startsWith('--'))
        .join('\n')
        .trim()
    )
    .filter((s) => s.length > 0);
}

/**
 * Apply pending migrations in order. Each migration commits on its own;
 * a repeated ADD COLUMN is skipped.
 */
export function applyMigrations(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): MigrationResult {
  const currentVersion = getSchemaVersion(db);
  const pending = [...migrations].filter((m) => m.version > currentVersion).sort((a, b) => a.version - b.version);
  const appliedMigrations: string[] = [];

  for (const migration of pending) {
    try {
      for (const statement of splitStatements(migration.sql)) {
        try {
          db.exec(statement);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          if (!message.includes('duplicate column name')) throw err;
        }
      }
      db.pragma(`user_version = ${migration.version}`);
      appliedMigrations.push(migration.name);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Migration ${migration.version}_${migration.name} failed: ${message}`);
    }
  }

  return { applied: appliedMigrations.length, currentVersion: getSchemaVersion(db), appliedMigrations };
}
