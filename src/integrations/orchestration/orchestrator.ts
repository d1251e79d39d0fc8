/**
 * Orchestrator
 *
 * Drives one run through planning, concurrent agent execution and
 * aggregation:
 *
 *   planning → executing → aggregating → completed | partially_failed | failed
 *   planning | executing → cancelled
 *
 * Per agent: a cache hit settles immediately without a worker slot; a miss
 * waits for a slot in the shared pool, runs, and settles. Agents never
 * affect each other: one failing leaves its siblings running. The run moves
 * to aggregating once, after every agent promise has settled, so the
 * terminal event always follows the last agent event.
 *
 * Every transition is written to the ledger before its event is published;
 * an observer that sees an event and then reads the ledger sees at least
 * that state.
 */

import { randomUUID } from 'node:crypto';
import {
  AgentFailure,
  CacheStoreError,
  ValidationError,
  formatError,
  isInsightError,
  toError,
} from '../../errors/index.js';
import { RunStateMachine, advanceExecution } from '../../core/run-state-machine.js';
import type { CancellationTokenSource } from '../cancellation.js';
import { createCancellationTokenSource, isCancellationError } from '../cancellation.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { aggregate, classifyOutcome } from './aggregator.js';
import type { AgentRunContext } from './agent-runner.js';
import type { CacheHit, CacheStore } from './cache-store.js';
import { fingerprintFromDigest } from './fingerprint.js';
import type { PlannerGateway } from './planner-gateway.js';
import type { ProgressBroadcaster } from './progress-broadcaster.js';
import type { RunEventInput, RunProgress } from './run-events.js';
import { formatRunEvent } from './run-events.js';
import type { RunLedger } from './run-ledger.js';
import type {
  AgentDescriptor,
  AgentExecution,
  AgentPayload,
  AgentResult,
  DatasetRef,
  DatasetSummary,
  Report,
  Run,
  RunStatus,
  TerminalRunStatus,
} from './types.js';
import { isTerminalRunStatus } from './types.js';
import type { WorkerPool, WorkerSlot } from './worker-pool.js';

const baseLog = createComponentLogger('Orchestrator');

// =============================================================================
// TYPES
// =============================================================================

export interface RunRequest {
  dataset: DatasetRef;
  summary: DatasetSummary;
  question: string;
  /** Client-reviewed agent list; skips the planner when present */
  agents?: string[];
}

export interface RunOutcome {
  runId: string;
  status: TerminalRunStatus;
  /** Null only when the run failed before any agent was selected */
  report: Report | null;
  /** Top-level failure reason */
  error?: string;
}

export interface RunHandle {
  runId: string;
  /** Settles once the run is terminal; never rejects */
  done: Promise<RunOutcome>;
}

export interface ActiveRunInfo {
  runId: string;
  status: RunStatus;
  question: string;
  progress: RunProgress;
}

/**
 * The slice of AgentRunner the orchestrator calls.
 */
export interface AgentExecutor {
  run(ctx: AgentRunContext): Promise<AgentResult>;
}

export interface OrchestratorDeps {
  gateway: PlannerGateway;
  runner: AgentExecutor;
  cache: CacheStore;
  ledger: RunLedger;
  broadcaster: ProgressBroadcaster;
  pool: WorkerPool;
}

export interface OrchestratorOptions {
  /** Per-agent budget for generation plus execution */
  agentTimeoutMs: number;
  /** TTL for payloads written to the cache; store default when omitted */
  cacheTtlMs?: number;
  now?: () => Date;
}

interface ActiveRun {
  run: Run;
  request: RunRequest;
  machine: RunStateMachine;
  cts: CancellationTokenSource;
  /** Resolved client selection, when the planner is skipped */
  preselected?: AgentDescriptor[];
  executions: Map<string, AgentExecution>;
  settled: number;
  log: StructuredLogger;
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  private readonly active = new Map<string, { state: ActiveRun; done: Promise<RunOutcome> }>();
  private readonly now: () => Date;
  private shuttingDown = false;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate and start a run. Returns as soon as the run is recorded; the
   * run proceeds in the background and `done` reports its end.
   *
   * @throws ValidationError on an empty question, or an agent list that is empty or too long
   * @throws PlanningError when a client-chosen agent is unknown
   */
  submit(request: RunRequest): RunHandle {
    if (this.shuttingDown) {
      throw new ValidationError('Orchestrator is shutting down');
    }
    const question = request.question.trim();
    if (!question) {
      throw new ValidationError('Question must not be empty', ['question']);
    }
    if (request.agents !== undefined && request.agents.length === 0) {
      throw new ValidationError('Agent list must not be empty when provided', ['agents']);
    }
    const preselected = request.agents ? this.deps.gateway.describe(request.agents) : undefined;

    const run: Run = {
      id: randomUUID(),
      datasetId: request.dataset.id,
      datasetDigest: request.dataset.digest,
      question,
      agents: [],
      status: 'planning',
      createdAt: this.timestamp(),
    };

    const state: ActiveRun = {
      run,
      request: { ...request, question },
      machine: new RunStateMachine(),
      cts: createCancellationTokenSource(),
      ...(preselected && { preselected }),
      executions: new Map(),
      settled: 0,
      log: baseLog.withTrace(run.id),
    };

    state.machine.subscribe(({ from, to, reason }) => state.log.debug('Run transition', { from, to, reason }));

    this.deps.ledger.createRun(run);
    this.publish(state, { type: 'run_started', payload: { question, datasetId: run.datasetId } });
    state.log.info('Run started', { datasetId: run.datasetId, preselected: request.agents?.length ?? 0 });

    const done = this.drive(state).finally(() => {
      state.cts.dispose();
      this.active.delete(run.id);
    });
    this.active.set(run.id, { state, done });
    return { runId: run.id, done };
  }

  /**
   * Submit and wait for the terminal outcome.
   */
  async execute(request: RunRequest): Promise<RunOutcome> {
    return this.submit(request).done;
  }

  /**
   * Cancel a live run. Returns false when the run is unknown or already past
   * the point where it can be cancelled.
   */
  cancel(runId: string, reason = 'Cancelled by user'): boolean {
    const entry = this.active.get(runId);
    if (!entry) return false;
    const { state } = entry;

    if (!state.machine.transition('cancelled', reason)) return false;

    state.run.status = 'cancelled';
    state.run.completedAt = this.timestamp();
    this.deps.ledger.updateRun(runId, { status: 'cancelled', completedAt: state.run.completedAt, error: reason });
    state.log.info('Run cancelled', { reason });
    state.cts.cancel(reason);
    return true;
  }

  getActiveRuns(): ActiveRunInfo[] {
    return [...this.active.values()].map(({ state }) => ({
      runId: state.run.id,
      status: state.machine.status,
      question: state.run.question,
      progress: this.progress(state),
    }));
  }

  /**
   * Stop accepting runs, cancel the live ones and wait for them to settle.
   */
  async shutdown(reason = 'Service shutting down'): Promise<void> {
    this.shuttingDown = true;
    const pending = [...this.active.entries()];
    for (const [runId] of pending) {
      this.cancel(runId, reason);
    }
    await Promise.all(pending.map(([, entry]) => entry.done));
  }

  // ─── Run lifecycle ────────────────────────────────────────────────────────

  private async drive(state: ActiveRun): Promise<RunOutcome> {
    try {
      const agents = await this.planRun(state);
      if (state.machine.status === 'cancelled') {
        return this.finishCancelled(state);
      }
      if (!agents) {
        return this.outcome(state, 'failed', null);
      }

      this.startExecuting(state, agents);

      const settled = await Promise.allSettled(agents.map((agent) => this.executeAgent(state, agent)));
      const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) throw rejected.reason;

      if (state.machine.status === 'cancelled') {
        return this.finishCancelled(state);
      }
      return this.finishAggregating(state);
    } catch (err) {
      return this.failInternally(state, err);
    }
  }

  /**
   * Returns the fixed agent set, or undefined when the run ended here.
   */
  private async planRun(state: ActiveRun): Promise<AgentDescriptor[] | undefined> {
    const { request } = state;
    if (state.preselected) return state.preselected;
    try {
      return await this.deps.gateway.plan(request.summary, request.question, state.cts.token);
    } catch (err) {
      if (isCancellationError(err) || state.machine.status === 'cancelled') {
        return undefined;
      }
      const message = toError(err).message;
      state.log.warn('Planning failed', { error: message, category: isInsightError(err) ? err.category : undefined });

      state.machine.transition('failed', message);
      state.run.status = 'failed';
      state.run.completedAt = this.timestamp();
      state.run.error = message;
      this.deps.ledger.updateRun(state.run.id, { status: 'failed', completedAt: state.run.completedAt, error: message });
      this.publish(state, { type: 'run_failed', error: { category: 'planning', message } });
      return undefined;
    }
  }

  private startExecuting(state: ActiveRun, agents: AgentDescriptor[]): void {
    const { run, request } = state;
    state.machine.transition('executing', `${agents.length} agents selected`);
    run.status = 'executing';
    run.agents = agents;

    for (const agent of agents) {
      const execution: AgentExecution = {
        runId: run.id,
        agentId: agent.id,
        displayName: agent.displayName,
        status: 'pending',
        fingerprint: fingerprintFromDigest(request.dataset.digest, request.question, agent.id),
        cacheHit: false,
      };
      state.executions.set(agent.id, execution);
    }

    // Status and agent set land together with the pending rows
    this.deps.ledger.transaction(() => {
      this.deps.ledger.updateRun(run.id, { status: 'executing', agents });
      for (const execution of state.executions.values()) {
        this.deps.ledger.saveExecution(execution);
      }
    });

    this.publish(state, {
      type: 'run_planned',
      payload: { agents: agents.map((a) => ({ id: a.id, displayName: a.displayName })) },
    });
    state.log.info('Run planned', { agents: agents.map((a) => a.id) });
  }

  private async executeAgent(state: ActiveRun, agent: AgentDescriptor): Promise<void> {
    const token = state.cts.token;
    const execution = state.executions.get(agent.id);
    if (!execution || token.isCancellationRequested) return;
    const log = state.log.withContext({ agentId: agent.id });

    const hit = this.lookupCache(log, execution.fingerprint);
    if (hit) {
      const at = this.timestamp();
      const settled = this.settle(state, log, {
        ...execution,
        status: 'cache_hit',
        cacheHit: true,
        startedAt: at,
        endedAt: at,
        durationMs: 0,
        payload: hit.payload,
      });
      if (!settled) return;
      log.debug('Served from cache', { savedMs: hit.savedMs });
      this.publish(state, {
        type: 'agent_cache_hit',
        agentId: agent.id,
        payload: { savedMs: hit.savedMs, accessCount: hit.accessCount },
      });
      return;
    }

    let slot: WorkerSlot;
    try {
      slot = await this.deps.pool.acquire(token);
    } catch (err) {
      // Cancelled while queued: never dispatched, stays pending
      if (isCancellationError(err)) return;
      throw err;
    }

    try {
      if (token.isCancellationRequested) return;

      const running: AgentExecution = { ...execution, status: 'running', startedAt: this.timestamp() };
      if (!this.advance(state, log, running)) return;
      this.deps.ledger.saveExecution(running);
      log.debug('Agent dispatched');
      this.publish(state, { type: 'agent_started', agentId: agent.id });

      const result = await this.invokeRunner(state, agent);
      const endedAt = this.timestamp();

      if (result.ok) {
        const settled = this.settle(state, log, {
          ...running,
          status: 'completed',
          endedAt,
          durationMs: result.durationMs,
          payload: result.payload,
        });
        if (!settled) return;
        this.storeInCache(log, running.fingerprint, agent.id, result.payload, result.durationMs);
        this.publish(state, {
          type: 'agent_completed',
          agentId: agent.id,
          payload: { durationMs: result.durationMs, insights: result.payload.insights.length },
        });
      } else {
        const settled = this.settle(state, log, {
          ...running,
          status: 'failed',
          endedAt,
          durationMs: result.durationMs,
          error: result.error,
        });
        if (!settled) return;
        log.warn('Agent failed', { category: result.error.category, error: result.error.message });
        this.publish(state, { type: 'agent_failed', agentId: agent.id, error: result.error });
      }
    } finally {
      slot.release();
    }
  }

  private async invokeRunner(state: ActiveRun, agent: AgentDescriptor): Promise<AgentResult> {
    const startedAt = Date.now();
    try {
      return await this.deps.runner.run({
        runId: state.run.id,
        agent,
        dataset: state.request.dataset,
        question: state.request.question,
        summary: state.request.summary,
        token: state.cts.token,
        timeoutMs: this.options.agentTimeoutMs,
      });
    } catch (err) {
      // Runners are not supposed to throw; contain it as this agent's failure
      const failure = isCancellationError(err)
        ? AgentFailure.cancelled(agent.id, err.message)
        : AgentFailure.execution(agent.id, `Runner error: ${toError(err).message}`);
      return {
        ok: false,
        error: { category: failure.failureCategory, message: failure.message },
        durationMs: Date.now() - startedAt,
      };
    }
  }

  private finishAggregating(state: ActiveRun): RunOutcome {
    const { run } = state;
    state.machine.transition('aggregating', 'all agents settled');
    run.status = 'aggregating';
    this.deps.ledger.updateRun(run.id, { status: 'aggregating' });

    const executions = this.orderedExecutions(state);
    const status = classifyOutcome(executions);
    run.status = status;
    const report = aggregate(run, executions);

    state.machine.transition(status, report.summary);
    run.completedAt = this.timestamp();
    run.report = report;
    this.deps.ledger.updateRun(run.id, { status, completedAt: run.completedAt, report });

    const payload = { status, summary: report.summary, counts: report.counts };
    if (status === 'failed') {
      this.publish(state, {
        type: 'run_failed',
        payload,
        error: { category: 'all-agents-failed', message: 'Every agent failed' },
      });
    } else {
      this.publish(state, { type: 'run_completed', payload });
    }
    state.log.info('Run finished', { status, ...report.counts });
    return this.outcome(state, status, report);
  }

  private finishCancelled(state: ActiveRun): RunOutcome {
    const { run } = state;
    const report = aggregate(run, this.orderedExecutions(state));
    run.report = report;
    this.deps.ledger.updateRun(run.id, { report });
    this.publish(state, {
      type: 'run_cancelled',
      payload: { counts: report.counts, reason: state.cts.token.cancellationReason },
    });
    return this.outcome(state, 'cancelled', report);
  }

  private failInternally(state: ActiveRun, err: unknown): RunOutcome {
    const message = `Internal error: ${formatError(err)}`;
    state.log.error('Run failed unexpectedly', {
      error: message,
      category: isInsightError(err) ? err.category : undefined,
    });
    state.cts.cancel(message);

    const { machine, run } = state;
    const current = machine.status;
    if (isTerminalRunStatus(current)) {
      return this.outcome(state, current, run.report ?? null, message);
    }
    if (current === 'executing') machine.transition('aggregating', 'internal error');
    machine.transition('failed', message);

    run.status = 'failed';
    run.completedAt = this.timestamp();
    run.error = message;
    try {
      this.deps.ledger.updateRun(run.id, { status: 'failed', completedAt: run.completedAt, error: message });
    } catch (ledgerErr) {
      state.log.error('Could not record run failure', { error: formatError(ledgerErr) });
    }
    this.publish(state, { type: 'run_failed', error: { category: 'internal', message } });
    return this.outcome(state, 'failed', null, message);
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  /**
   * Replace an agent's in-memory execution if the status change is allowed.
   * A refused write leaves the previous record in place.
   */
  private advance(state: ActiveRun, log: StructuredLogger, next: AgentExecution): boolean {
    const previous = state.executions.get(next.agentId);
    const accepted = previous ? advanceExecution(previous, next) : null;
    if (!accepted) {
      log.warn('Refused execution status change', { from: previous?.status, to: next.status });
      return false;
    }
    state.executions.set(accepted.agentId, accepted);
    return true;
  }

  /**
   * Record a terminal execution: memory, progress, ledger and performance.
   * Returns false when the status change was refused.
   */
  private settle(state: ActiveRun, log: StructuredLogger, execution: AgentExecution): boolean {
    if (!this.advance(state, log, execution)) return false;
    state.settled++;
    this.deps.ledger.settleExecution(execution);
    return true;
  }

  /** Cache failures degrade to a miss. */
  private lookupCache(log: StructuredLogger, key: string): CacheHit | undefined {
    try {
      return this.deps.cache.lookup(key);
    } catch (err) {
      log.warn('Cache lookup failed, treating as miss', {
        error: err instanceof CacheStoreError ? err.message : formatError(err),
      });
      return undefined;
    }
  }

  private storeInCache(log: StructuredLogger, key: string, agentId: string, payload: AgentPayload, computeMs: number): void {
    try {
      this.deps.cache.insert(key, payload, {
        agentId,
        computeMs,
        ...(this.options.cacheTtlMs !== undefined && { ttlMs: this.options.cacheTtlMs }),
      });
    } catch (err) {
      log.warn('Cache insert failed', { error: formatError(err) });
    }
  }

  private orderedExecutions(state: ActiveRun): AgentExecution[] {
    return state.run.agents.flatMap((agent) => {
      const execution = state.executions.get(agent.id);
      return execution ? [execution] : [];
    });
  }

  private progress(state: ActiveRun): RunProgress {
    return { settled: state.settled, total: state.run.agents.length };
  }

  private publish(state: ActiveRun, input: Omit<RunEventInput, 'runId' | 'progress'>): void {
    const event = this.deps.broadcaster.publish({ ...input, runId: state.run.id, progress: this.progress(state) });
    state.log.trace(formatRunEvent(event), { seq: event.seq });
  }

  private outcome(state: ActiveRun, status: TerminalRunStatus, report: Report | null, error?: string): RunOutcome {
    const reason = error ?? state.run.error;
    return { runId: state.run.id, status, report, ...(reason !== undefined && { error: reason }) };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
