/**
 * Run State Machine
 *
 * Typed transitions for a run and for each of its agent executions.
 *
 * Run:
 *   planning    → executing | failed | cancelled
 *   executing   → aggregating | cancelled
 *   aggregating → completed | partially_failed | failed
 *   completed, partially_failed, failed, cancelled: terminal
 *
 * Execution:
 *   pending → running | cache_hit
 *   running → completed | failed
 *
 * Invalid transitions are rejected (return false or null), never thrown, so
 * a late agent settling after a cancel cannot move a terminal run.
 */

import type { AgentExecution, ExecutionStatus, RunStatus } from '../integrations/orchestration/types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RunTransition {
  from: RunStatus;
  to: RunStatus;
  reason: string;
}

export type RunTransitionListener = (transition: RunTransition) => void;

// =============================================================================
// VALID TRANSITIONS
// =============================================================================

const RUN_TRANSITIONS: Record<RunStatus, Set<RunStatus>> = {
  planning: new Set(['executing', 'failed', 'cancelled']),
  executing: new Set(['aggregating', 'cancelled']),
  aggregating: new Set(['completed', 'partially_failed', 'failed']),
  completed: new Set(),
  partially_failed: new Set(),
  failed: new Set(),
  cancelled: new Set(),
};

const EXECUTION_TRANSITIONS: Record<ExecutionStatus, Set<ExecutionStatus>> = {
  pending: new Set(['running', 'cache_hit']),
  running: new Set(['completed', 'failed']),
  completed: new Set(),
  failed: new Set(),
  cache_hit: new Set(),
};

export function canTransitionRun(from: RunStatus, to: RunStatus): boolean {
  return RUN_TRANSITIONS[from].has(to);
}

export function canTransitionExecution(from: ExecutionStatus, to: ExecutionStatus): boolean {
  return EXECUTION_TRANSITIONS[from].has(to);
}

/**
 * Check a proposed write of an execution record against the one it replaces.
 * Returns `next` when it belongs to the same run and agent and its status
 * follows `previous.status`; otherwise null.
 */
export function advanceExecution(previous: AgentExecution, next: AgentExecution): AgentExecution | null {
  if (previous.runId !== next.runId || previous.agentId !== next.agentId) return null;
  return canTransitionExecution(previous.status, next.status) ? next : null;
}

// =============================================================================
// RUN STATE MACHINE
// =============================================================================

export class RunStateMachine {
  private current: RunStatus = 'planning';
  private listeners: RunTransitionListener[] = [];

  get status(): RunStatus {
    return this.current;
  }

  get isTerminal(): boolean {
    return RUN_TRANSITIONS[this.current].size === 0;
  }

  /**
   * Returns true if the transition was valid and applied.
   */
  transition(to: RunStatus, reason: string): boolean {
    if (!canTransitionRun(this.current, to)) return false;

    const transition: RunTransition = { from: this.current, to, reason };
    this.current = to;
    for (const listener of this.listeners) {
      listener(transition);
    }
    return true;
  }

  subscribe(listener: RunTransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
