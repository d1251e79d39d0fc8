/**
 * SQLite Schema Definitions
 *
 * Migrations are embedded as code and tracked through `PRAGMA user_version`.
 * Statements must stay idempotent (IF NOT EXISTS) so a half-applied
 * migration can be re-run after a fix.
 */

import type Database from 'better-sqlite3';

// =============================================================================
// TYPES
// =============================================================================

export interface Migration {
  /** Version number (unique, sequential) */
  version: number;
  name: string;
  /** SQL statements (semicolon-separated) */
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
    name: 'runs_and_executions',
    sql: `
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        dataset_id TEXT NOT NULL,
        dataset_digest TEXT NOT NULL,
        question TEXT NOT NULL,
        agents TEXT NOT NULL DEFAULT '[]',
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        completed_at TEXT,
        report TEXT,
        error TEXT
      );

      CREATE TABLE IF NOT EXISTS agent_executions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        display_name TEXT NOT NULL,
        status TEXT NOT NULL,
        fingerprint TEXT NOT NULL,
        cache_hit INTEGER NOT NULL DEFAULT 0,
        started_at TEXT,
        ended_at TEXT,
        duration_ms INTEGER,
        payload TEXT,
        error_category TEXT,
        error_message TEXT,
        UNIQUE (run_id, agent_id),
        FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);
      CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
      CREATE INDEX IF NOT EXISTS idx_executions_run ON agent_executions(run_id);
    `,
  },
  {
    version: 2,
    name: 'agent_performance',
    sql: `
      CREATE TABLE IF NOT EXISTS agent_performance (
        agent_id TEXT PRIMARY KEY,
        total_runs INTEGER NOT NULL DEFAULT 0,
        successful_runs INTEGER NOT NULL DEFAULT 0,
        failed_runs INTEGER NOT NULL DEFAULT 0,
        cache_hits INTEGER NOT NULL DEFAULT 0,
        executed_runs INTEGER NOT NULL DEFAULT 0,
        total_duration_ms INTEGER NOT NULL DEFAULT 0,
        min_duration_ms INTEGER,
        max_duration_ms INTEGER,
        updated_at TEXT NOT NULL
      );
    `,
  },
  {
    version: 3,
    name: 'cache_entries',
    sql: `
      CREATE TABLE IF NOT EXISTS cache_entries (
        fingerprint TEXT PRIMARY KEY,
        agent_id TEXT,
        payload TEXT NOT NULL,
        compute_ms INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        time_saved_ms INTEGER NOT NULL DEFAULT 0,
        last_accessed_at INTEGER,
        CHECK (expires_at > created_at)
      );

      CREATE INDEX IF NOT EXISTS idx_cache_expires ON cache_entries(expires_at);
    `,
  },
];

// =============================================================================
// MIGRATION RUNNER
// =============================================================================

export function getSchemaVersion(db: Database.Database): number {
  const result: unknown = db.pragma('user_version', { simple: true });
  return typeof result === 'number' ? result : 0;
}

function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

/**
 * Strip leading comment lines from SQL statement.
 */
function stripLeadingComments(sql: string): string {
  const lines = sql.split('\n');
  let startIndex = 0;

  while (startIndex < lines.length) {
    const line = lines[startIndex].trim();
    if (line === '' || line.startsWith('--')) {
      startIndex++;
    } else {
      break;
    }
  }

  return lines.slice(startIndex).join('\n').trim();
}

function executeMigrationSql(db: Database.Database, sql: string): void {
  const statements = sql
    .split(';')
    .map((s) => stripLeadingComments(s.trim()))
    .filter((s) => s.length > 0);

  for (const statement of statements) {
    try {
      db.exec(statement);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (msg.includes('duplicate column name')) {
        continue;
      }
      throw err;
    }
  }
}

/**
 * Apply all pending migrations to the database.
 */
export function applyMigrations(db: Database.Database): MigrationResult {
  const currentVersion = getSchemaVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > currentVersion);
  const applied: string[] = [];

  for (const migration of pending) {
    try {
      executeMigrationSql(db, migration.sql);
      setSchemaVersion(db, migration.version);
      applied.push(migration.name);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Migration ${migration.version}_${migration.name} failed: ${msg}`);
    }
  }

  return {
    applied: applied.length,
    currentVersion: getSchemaVersion(db),
    appliedMigrations: applied,
  };
}
