/**
 * Run Ledger
 *
 * Durable history of runs, their agent executions and the rolling
 * per-agent performance aggregates. The orchestrator writes on every state
 * transition; HTTP handlers read from here, never from in-memory state.
 */

import { z } from 'zod';
import { formatError } from '../../errors/index.js';
import type { AnalysisStore, ExecutionRow, PerformanceRow, RunRow, StoreDeps } from '../persistence/analysis-store.js';
import { createComponentLogger } from '../utilities/logger.js';
import { AgentArtifactSchema, parsePayload } from './payload.js';
import type {
  AgentDescriptor,
  AgentErrorCategory,
  AgentExecution,
  ExecutionStatus,
  Report,
  Run,
  RunStatus,
} from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RunDetail {
  run: Run;
  executions: AgentExecution[];
}

export interface ListRunsOptions {
  limit?: number;
  offset?: number;
  status?: RunStatus;
}

export interface RunUpdate {
  status?: RunStatus;
  agents?: AgentDescriptor[];
  completedAt?: string;
  report?: Report;
  error?: string;
}

export interface AgentPerformance {
  agentId: string;
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  cacheHits: number;
  /** successful / total, 0 when nothing ran */
  successRate: number;
  /** Over executed (non-cached) runs only */
  avgDurationMs: number;
  minDurationMs: number | null;
  maxDurationMs: number | null;
  updatedAt: string;
}

export interface LedgerStatistics {
  totalRuns: number;
  completedRuns: number;
  partiallyFailedRuns: number;
  failedRuns: number;
  cancelledRuns: number;
  activeRuns: number;
  /** (completed + partially failed) / finished runs */
  successRate: number;
  avgRunDurationMs: number;
}

const RUN_STATUSES: ReadonlySet<string> = new Set<RunStatus>([
  'planning',
  'executing',
  'aggregating',
  'completed',
  'partially_failed',
  'failed',
  'cancelled',
]);

const EXECUTION_STATUSES: ReadonlySet<string> = new Set<ExecutionStatus>([
  'pending',
  'running',
  'completed',
  'failed',
  'cache_hit',
]);

const ERROR_CATEGORIES: ReadonlySet<string> = new Set<AgentErrorCategory>([
  'generation-failure',
  'execution-failure',
  'timeout',
  'cancelled',
]);

const log = createComponentLogger('RunLedger');

// JSON columns are re-validated on read; a row another process or an older
// build wrote must not surface as a typed value it does not fit.

const AgentDescriptorsSchema = z.array(
  z.object({
    id: z.string(),
    displayName: z.string(),
    description: z.string(),
  }),
);

const ReportSchema = z.object({
  runId: z.string(),
  question: z.string(),
  outcome: z.enum(['completed', 'partially_failed', 'failed', 'cancelled']),
  summary: z.string(),
  content: z.string(),
  insights: z.array(z.string()),
  recommendations: z.array(z.string()),
  successes: z.array(
    z.object({
      agentId: z.string(),
      displayName: z.string(),
      cached: z.boolean(),
      narrative: z.string(),
      insights: z.array(z.string()),
      recommendations: z.array(z.string()),
      artifacts: z.array(AgentArtifactSchema),
    }),
  ),
  failures: z.array(
    z.object({
      agentId: z.string(),
      displayName: z.string(),
      category: z.enum(['generation-failure', 'execution-failure', 'timeout', 'cancelled']),
      message: z.string(),
    }),
  ),
  skipped: z.array(z.string()),
  counts: z.object({
    total: z.number(),
    succeeded: z.number(),
    failed: z.number(),
    cached: z.number(),
    skipped: z.number(),
  }),
});

/**
 * Parse and validate one JSON column. Returns undefined, with a warning,
 * when the text is not JSON or does not fit the schema.
 */
function readJsonColumn<S extends z.ZodTypeAny>(
  column: string,
  key: string,
  text: string,
  schema: S,
): z.output<S> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    log.warn('Unreadable JSON column', { column, key, error: formatError(err) });
    return undefined;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    log.warn('Invalid JSON column', { column, key, error: result.error.issues[0]?.message });
    return undefined;
  }
  return result.data;
}

function isRunStatus(value: string): value is RunStatus {
  return RUN_STATUSES.has(value);
}

function isExecutionStatus(value: string): value is ExecutionStatus {
  return EXECUTION_STATUSES.has(value);
}

function isErrorCategory(value: string): value is AgentErrorCategory {
  return ERROR_CATEGORIES.has(value);
}

// =============================================================================
// LEDGER
// =============================================================================

export class RunLedger {
  private readonly deps: StoreDeps;

  constructor(store: AnalysisStore) {
    this.deps = store.deps;
  }

  // ─── Writes ───────────────────────────────────────────────────────────────

  createRun(run: Run): void {
    this.deps.stmts.insertRun.run({
      id: run.id,
      datasetId: run.datasetId,
      datasetDigest: run.datasetDigest,
      question: run.question,
      agents: JSON.stringify(run.agents),
      status: run.status,
      createdAt: run.createdAt,
    });
  }

  updateRun(runId: string, update: RunUpdate): void {
    this.deps.stmts.updateRun.run({
      id: runId,
      status: update.status ?? null,
      agents: update.agents ? JSON.stringify(update.agents) : null,
      completedAt: update.completedAt ?? null,
      report: update.report ? JSON.stringify(update.report) : null,
      error: update.error ?? null,
    });
  }

  /**
   * Insert or update the single row for (runId, agentId).
   */
  saveExecution(execution: AgentExecution): void {
    this.deps.stmts.upsertExecution.run({
      runId: execution.runId,
      agentId: execution.agentId,
      displayName: execution.displayName,
      status: execution.status,
      fingerprint: execution.fingerprint,
      cacheHit: execution.cacheHit ? 1 : 0,
      startedAt: execution.startedAt ?? null,
      endedAt: execution.endedAt ?? null,
      durationMs: execution.durationMs ?? null,
      payload: execution.payload ? JSON.stringify(execution.payload) : null,
      errorCategory: execution.error?.category ?? null,
      errorMessage: execution.error?.message ?? null,
    });
  }

  /**
   * Fold one terminal execution into its agent's aggregate.
   *
   * Cache hits count as successful runs and as cache hits but add no
   * duration. Cancelled executions say nothing about the agent and are
   * skipped.
   */
  recordPerformance(execution: AgentExecution): void {
    if (execution.status === 'pending' || execution.status === 'running') return;
    if (execution.error?.category === 'cancelled') return;

    const success = execution.status === 'completed' || execution.status === 'cache_hit';
    const executed = execution.status !== 'cache_hit';

    this.deps.stmts.recordPerformance.run({
      agentId: execution.agentId,
      success: success ? 1 : 0,
      failure: success ? 0 : 1,
      cacheHit: execution.status === 'cache_hit' ? 1 : 0,
      executed: executed ? 1 : 0,
      durationMs: executed ? Math.round(execution.durationMs ?? 0) : null,
      updatedAt: new Date(this.deps.now()).toISOString(),
    });
  }

  /**
   * Run `fn` in one SQLite transaction. Nests as a savepoint.
   */
  transaction(fn: () => void): void {
    this.deps.db.transaction(fn)();
  }

  /**
   * Persist a terminal execution and its performance contribution together.
   */
  settleExecution(execution: AgentExecution): void {
    this.deps.db.transaction(() => {
      this.saveExecution(execution);
      this.recordPerformance(execution);
    })();
  }

  // ─── Reads ────────────────────────────────────────────────────────────────

  getRun(runId: string): RunDetail | undefined {
    const row = this.deps.stmts.getRun.get(runId);
    if (!row) return undefined;
    return {
      run: toRun(row),
      executions: this.deps.stmts.listExecutions.all(runId).map(toExecution),
    };
  }

  listRuns(options: ListRunsOptions = {}): Run[] {
    const limit = Math.min(Math.max(options.limit ?? 20, 1), 200);
    const offset = Math.max(options.offset ?? 0, 0);
    return this.deps.stmts.listRuns.all({ status: options.status ?? null, limit, offset }).map(toRun);
  }

  getStatistics(): LedgerStatistics {
    const row = this.deps.stmts.runTotals.get();
    const completed = row?.completed ?? 0;
    const partial = row?.partially_failed ?? 0;
    const failed = row?.failed ?? 0;
    const cancelled = row?.cancelled ?? 0;
    const finished = completed + partial + failed + cancelled;

    return {
      totalRuns: row?.total ?? 0,
      completedRuns: completed,
      partiallyFailedRuns: partial,
      failedRuns: failed,
      cancelledRuns: cancelled,
      activeRuns: row?.active ?? 0,
      successRate: finished > 0 ? (completed + partial) / finished : 0,
      avgRunDurationMs: Math.round(row?.avg_duration_ms ?? 0),
    };
  }

  getAgentPerformance(agentId: string): AgentPerformance | undefined {
    const row = this.deps.stmts.getPerformance.get(agentId);
    return row ? toPerformance(row) : undefined;
  }

  listAgentPerformance(): AgentPerformance[] {
    return this.deps.stmts.listPerformance.all().map(toPerformance);
  }
}

// =============================================================================
// ROW MAPPING
// =============================================================================

function toRun(row: RunRow): Run {
  const agents: AgentDescriptor[] = readJsonColumn('runs.agents', row.id, row.agents, AgentDescriptorsSchema) ?? [];
  const report: Report | undefined = row.report
    ? readJsonColumn('runs.report', row.id, row.report, ReportSchema)
    : undefined;
  return {
    id: row.id,
    datasetId: row.dataset_id,
    datasetDigest: row.dataset_digest,
    question: row.question,
    agents,
    status: isRunStatus(row.status) ? row.status : 'failed',
    createdAt: row.created_at,
    ...(row.completed_at && { completedAt: row.completed_at }),
    ...(report && { report }),
    ...(row.error && { error: row.error }),
  };
}

function toExecution(row: ExecutionRow): AgentExecution {
  const payload = row.payload
    ? parsePayload(readJsonColumn('agent_executions.payload', `${row.run_id}/${row.agent_id}`, row.payload, z.unknown()))
    : null;
  const category = row.error_category;
  return {
    runId: row.run_id,
    agentId: row.agent_id,
    displayName: row.display_name,
    status: isExecutionStatus(row.status) ? row.status : 'failed',
    fingerprint: row.fingerprint,
    cacheHit: row.cache_hit === 1,
    ...(row.started_at && { startedAt: row.started_at }),
    ...(row.ended_at && { endedAt: row.ended_at }),
    ...(row.duration_ms !== null && { durationMs: row.duration_ms }),
    ...(payload && { payload }),
    ...(category &&
      isErrorCategory(category) && {
        error: { category, message: row.error_message ?? '' },
      }),
  };
}

function toPerformance(row: PerformanceRow): AgentPerformance {
  return {
    agentId: row.agent_id,
    totalRuns: row.total_runs,
    successfulRuns: row.successful_runs,
    failedRuns: row.failed_runs,
    cacheHits: row.cache_hits,
    successRate: row.total_runs > 0 ? row.successful_runs / row.total_runs : 0,
    avgDurationMs: row.executed_runs > 0 ? Math.round(row.total_duration_ms / row.executed_runs) : 0,
    minDurationMs: row.min_duration_ms,
    maxDurationMs: row.max_duration_ms,
    updatedAt: row.updated_at,
  };
}
