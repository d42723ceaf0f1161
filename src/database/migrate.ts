/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type { Db } from './connection.js';
import { MigrationRowSchema, validateRows } from './validation.js';

/**
 * Result of running migrations.
 *
 * Failures are reported rather than thrown so the caller decides whether a
 * partially migrated database is usable.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the compiled output needs no data files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Sessions: one row per conversation
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_active_at TEXT NOT NULL,
  turn_count INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_sessions_last_active ON sessions(last_active_at);

-- Turns: append-only, seq is the 0-based position in the session
CREATE TABLE IF NOT EXISTS turns (
  session_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  query TEXT NOT NULL,
  intent TEXT NOT NULL,
  constraints TEXT NOT NULL,   -- JSON object
  evidence TEXT NOT NULL,      -- JSON EvidenceBundle
  answer TEXT NOT NULL,
  citations TEXT NOT NULL,     -- JSON array of sourceIds
  agent_used TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  PRIMARY KEY (session_id, seq),
  FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
);
    `.trim(),
  },
  {
    name: '002-add-trace-id.sql',
    sql: `
-- Links a stored turn to its Langfuse trace
ALTER TABLE turns ADD COLUMN trace_id TEXT;
    `.trim(),
  },
];

/**
 * Run all pending migrations against `db`.
 *
 * Failed migrations do not stop subsequent migrations from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations(db);
 * if (result.failed.length > 0) {
 *   throw new DatabaseError(`Migration ${result.failed[0].name} failed`);
 * }
 * ```
 */
export function runMigrations(db: Db): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  // Ensure migrations table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = new Set(getAppliedMigrations(db).map((m) => m.name));

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      // Run migration in transaction for atomicity
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();

      applied.push(migration.name);
      appliedMigrations.add(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Get list of applied migrations, oldest first.
 */
export function getAppliedMigrations(db: Db): Array<{ name: string; applied_at: string }> {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();

  if (!tableExists) {
    return [];
  }

  const rows = db.prepare('SELECT name, applied_at FROM _migrations ORDER BY id').all();
  return validateRows(MigrationRowSchema, rows, '_migrations');
}

/**
 * Count of migrations defined in the system.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
