/**
 * SQLite Analysis Store
 *
 * Owns the database handle shared by the cache store and the run ledger.
 * Opening the store applies embedded migrations and prepares every
 * statement once.
 *
 * Query logic lives with the components that own each table:
 * - orchestration/cache-store.ts: cache entries, sweeps, cache stats
 * - orchestration/run-ledger.ts: runs, agent executions, performance aggregates
 *
 * @example
 * ```typescript
 * const store = new AnalysisStore({ dbPath: ':memory:' });
 * const cache = new SQLiteCacheStore(store);
 * const ledger = new RunLedger(store);
 * ```
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { applyMigrations } from '../../persistence/schema.js';
import { createComponentLogger } from '../utilities/logger.js';

const log = createComponentLogger('AnalysisStore');

// =============================================================================
// ROW TYPES
// =============================================================================

export interface CacheRow {
  fingerprint: string;
  agent_id: string | null;
  payload: string;
  compute_ms: number;
  created_at: number;
  expires_at: number;
  access_count: number;
  time_saved_ms: number;
  last_accessed_at: number | null;
}

export interface RunRow {
  id: string;
  dataset_id: string;
  dataset_digest: string;
  question: string;
  agents: string;
  status: string;
  created_at: string;
  completed_at: string | null;
  report: string | null;
  error: string | null;
}

export interface ExecutionRow {
  run_id: string;
  agent_id: string;
  display_name: string;
  status: string;
  fingerprint: string;
  cache_hit: number;
  started_at: string | null;
  ended_at: string | null;
  duration_ms: number | null;
  payload: string | null;
  error_category: string | null;
  error_message: string | null;
}

export interface PerformanceRow {
  agent_id: string;
  total_runs: number;
  successful_runs: number;
  failed_runs: number;
  cache_hits: number;
  executed_runs: number;
  total_duration_ms: number;
  min_duration_ms: number | null;
  max_duration_ms: number | null;
  updated_at: string;
}

export interface CacheTotalsRow {
  entries: number;
  expired: number;
  total_hits: number;
  total_time_saved_ms: number;
}

export interface RunTotalsRow {
  total: number;
  completed: number;
  partially_failed: number;
  failed: number;
  cancelled: number;
  active: number;
  avg_duration_ms: number | null;
}

// =============================================================================
// STATEMENTS
// =============================================================================

export interface ExecutionParams {
  runId: string;
  agentId: string;
  displayName: string;
  status: string;
  fingerprint: string;
  cacheHit: number;
  startedAt: string | null;
  endedAt: string | null;
  durationMs: number | null;
  payload: string | null;
  errorCategory: string | null;
  errorMessage: string | null;
}

interface CacheUpsertParams {
  key: string;
  agentId: string | null;
  payload: string;
  computeMs: number;
  createdAt: number;
  expiresAt: number;
}

interface RunInsertParams {
  id: string;
  datasetId: string;
  datasetDigest: string;
  question: string;
  agents: string;
  status: string;
  createdAt: string;
}

interface RunUpdateParams {
  id: string;
  status: string | null;
  agents: string | null;
  completedAt: string | null;
  report: string | null;
  error: string | null;
}

interface PerformanceParams {
  agentId: string;
  success: number;
  failure: number;
  cacheHit: number;
  executed: number;
  durationMs: number | null;
  updatedAt: string;
}

type KeyAtTime = { key: string; now: number };

/**
 * What table owners receive instead of the store itself.
 */
export interface StoreDeps {
  db: Database.Database;
  stmts: PreparedStatements;
  /** Epoch ms; injectable for expiry tests */
  now: () => number;
}

function prepareStatements(db: Database.Database) {
  return {
    getLiveCacheEntry: db.prepare<KeyAtTime, CacheRow>(`
      SELECT * FROM cache_entries WHERE fingerprint = @key AND expires_at > @now
    `),
    touchCacheEntry: db.prepare<KeyAtTime>(`
      UPDATE cache_entries SET
        access_count = access_count + 1,
        time_saved_ms = time_saved_ms + compute_ms,
        last_accessed_at = @now
      WHERE fingerprint = @key
    `),
    upsertCacheEntry: db.prepare<CacheUpsertParams>(`
      INSERT INTO cache_entries (fingerprint, agent_id, payload, compute_ms, created_at, expires_at, access_count, time_saved_ms)
      VALUES (@key, @agentId, @payload, @computeMs, @createdAt, @expiresAt, 0, 0)
      ON CONFLICT(fingerprint) DO UPDATE SET
        agent_id = excluded.agent_id,
        payload = excluded.payload,
        compute_ms = excluded.compute_ms,
        created_at = excluded.created_at,
        expires_at = excluded.expires_at,
        access_count = 0,
        time_saved_ms = 0,
        last_accessed_at = NULL
    `),
    deleteExpiredCache: db.prepare<{ now: number }>(`DELETE FROM cache_entries WHERE expires_at <= @now`),
    deleteAllCache: db.prepare<[]>(`DELETE FROM cache_entries`),
    countCache: db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM cache_entries`),
    trimCache: db.prepare<{ excess: number }>(`
      DELETE FROM cache_entries WHERE fingerprint IN (
        SELECT fingerprint FROM cache_entries ORDER BY expires_at ASC, created_at ASC LIMIT @excess
      )
    `),
    cacheTotals: db.prepare<{ now: number }, CacheTotalsRow>(`
      SELECT
        COUNT(*) AS entries,
        COALESCE(SUM(CASE WHEN expires_at <= @now THEN 1 ELSE 0 END), 0) AS expired,
        COALESCE(SUM(access_count), 0) AS total_hits,
        COALESCE(SUM(time_saved_ms), 0) AS total_time_saved_ms
      FROM cache_entries
    `),

    insertRun: db.prepare<RunInsertParams>(`
      INSERT INTO runs (id, dataset_id, dataset_digest, question, agents, status, created_at)
      VALUES (@id, @datasetId, @datasetDigest, @question, @agents, @status, @createdAt)
    `),
    updateRun: db.prepare<RunUpdateParams>(`
      UPDATE runs SET
        status = COALESCE(@status, status),
        agents = COALESCE(@agents, agents),
        completed_at = COALESCE(@completedAt, completed_at),
        report = COALESCE(@report, report),
        error = COALESCE(@error, error)
      WHERE id = @id
    `),
    getRun: db.prepare<[string], RunRow>(`SELECT * FROM runs WHERE id = ?`),
    listRuns: db.prepare<{ status: string | null; limit: number; offset: number }, RunRow>(`
      SELECT * FROM runs
      WHERE (@status IS NULL OR status = @status)
      ORDER BY created_at DESC, rowid DESC
      LIMIT @limit OFFSET @offset
    `),
    runTotals: db.prepare<[], RunTotalsRow>(`
      SELECT
        COUNT(*) AS total,
        COALESCE(SUM(status = 'completed'), 0) AS completed,
        COALESCE(SUM(status = 'partially_failed'), 0) AS partially_failed,
        COALESCE(SUM(status = 'failed'), 0) AS failed,
        COALESCE(SUM(status = 'cancelled'), 0) AS cancelled,
        COALESCE(SUM(status IN ('planning', 'executing', 'aggregating')), 0) AS active,
        AVG(CASE WHEN completed_at IS NOT NULL
          THEN (julianday(completed_at) - julianday(created_at)) * 86400000.0 END) AS avg_duration_ms
      FROM runs
    `),

    upsertExecution: db.prepare<ExecutionParams>(`
      INSERT INTO agent_executions (
        run_id, agent_id, display_name, status, fingerprint, cache_hit,
        started_at, ended_at, duration_ms, payload, error_category, error_message
      ) VALUES (
        @runId, @agentId, @displayName, @status, @fingerprint, @cacheHit,
        @startedAt, @endedAt, @durationMs, @payload, @errorCategory, @errorMessage
      )
      ON CONFLICT(run_id, agent_id) DO UPDATE SET
        status = excluded.status,
        cache_hit = excluded.cache_hit,
        started_at = excluded.started_at,
        ended_at = excluded.ended_at,
        duration_ms = excluded.duration_ms,
        payload = excluded.payload,
        error_category = excluded.error_category,
        error_message = excluded.error_message
    `),
    listExecutions: db.prepare<[string], ExecutionRow>(`SELECT * FROM agent_executions WHERE run_id = ? ORDER BY id ASC`),

    recordPerformance: db.prepare<PerformanceParams>(`
      INSERT INTO agent_performance (
        agent_id, total_runs, successful_runs, failed_runs, cache_hits, executed_runs,
        total_duration_ms, min_duration_ms, max_duration_ms, updated_at
      ) VALUES (
        @agentId, 1, @success, @failure, @cacheHit, @executed,
        COALESCE(@durationMs, 0), @durationMs, @durationMs, @updatedAt
      )
      ON CONFLICT(agent_id) DO UPDATE SET
        total_runs = total_runs + 1,
        successful_runs = successful_runs + @success,
        failed_runs = failed_runs + @failure,
        cache_hits = cache_hits + @cacheHit,
        executed_runs = executed_runs + @executed,
        total_duration_ms = total_duration_ms + COALESCE(@durationMs, 0),
        min_duration_ms = CASE
          WHEN @durationMs IS NULL THEN min_duration_ms
          WHEN min_duration_ms IS NULL OR @durationMs < min_duration_ms THEN @durationMs
          ELSE min_duration_ms END,
        max_duration_ms = CASE
          WHEN @durationMs IS NULL THEN max_duration_ms
          WHEN max_duration_ms IS NULL OR @durationMs > max_duration_ms THEN @durationMs
          ELSE max_duration_ms END,
        updated_at = @updatedAt
    `),
    getPerformance: db.prepare<[string], PerformanceRow>(`SELECT * FROM agent_performance WHERE agent_id = ?`),
    listPerformance: db.prepare<[], PerformanceRow>(`SELECT * FROM agent_performance ORDER BY agent_id ASC`),
  };
}

export type PreparedStatements = ReturnType<typeof prepareStatements>;

// =============================================================================
// STORE
// =============================================================================

export interface AnalysisStoreConfig {
  /** Path to the database file, or ':memory:' */
  dbPath: string;
  /** Enable WAL mode (default: true, ignored for in-memory databases) */
  walMode?: boolean;
  /** Clock override, epoch ms */
  now?: () => number;
}

export class AnalysisStore {
  readonly db: Database.Database;
  private readonly stmts: PreparedStatements;
  private readonly now: () => number;
  private closed = false;

  constructor(config: AnalysisStoreConfig) {
    const inMemory = config.dbPath === ':memory:';

    // better-sqlite3 requires the parent directory to exist
    if (!inMemory) {
      const dbDir = dirname(config.dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(config.dbPath);
    if ((config.walMode ?? true) && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    const result = applyMigrations(this.db);
    if (result.applied > 0) {
      log.debug('Applied migrations', { migrations: result.appliedMigrations, version: result.currentVersion });
    }

    this.stmts = prepareStatements(this.db);
    this.now = config.now ?? Date.now;
  }

  get deps(): StoreDeps {
    return { db: this.db, stmts: this.stmts, now: this.now };
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
