/**
 * Run Event Types
 *
 * Lifecycle events pushed to live observers. The wire shape is flat JSON:
 * `{ seq, timestamp, type, runId, agentId?, progress?, payload?, error? }`.
 */

import type { AgentErrorDetail } from './types.js';

// ─── Run Events ────────────────────────────────────────────────────────────

export type RunEventType =
  | 'run_started'
  | 'run_planned'
  | 'agent_started'
  | 'agent_cache_hit'
  | 'agent_completed'
  | 'agent_failed'
  | 'run_completed'
  | 'run_failed'
  | 'run_cancelled';

export interface RunProgress {
  /** Agents that reached a terminal state */
  settled: number;
  total: number;
}

export interface RunEventInput {
  type: RunEventType;
  runId: string;
  agentId?: string;
  progress?: RunProgress;
  payload?: Record<string, unknown>;
  error?: AgentErrorDetail | { category: string; message: string };
}

export interface RunEvent extends RunEventInput {
  /** Broadcaster-wide, strictly increasing */
  seq: number;
  /** ISO-8601 */
  timestamp: string;
}

export const TERMINAL_EVENT_TYPES: ReadonlySet<RunEventType> = new Set(['run_completed', 'run_failed', 'run_cancelled']);

export function isTerminalEvent(event: { type: RunEventType }): boolean {
  return TERMINAL_EVENT_TYPES.has(event.type);
}

/**
 * Format a run event for log display.
 */
export function formatRunEvent(event: RunEvent): string {
  const progress = event.progress ? ` (${event.progress.settled}/${event.progress.total})` : '';
  switch (event.type) {
    case 'run_started':
      return `Run ${event.runId} started`;
    case 'run_planned':
      return `Run ${event.runId} planned${progress}`;
    case 'agent_started':
      return `Agent ${event.agentId ?? '?'} started`;
    case 'agent_cache_hit':
      return `Agent ${event.agentId ?? '?'} served from cache${progress}`;
    case 'agent_completed':
      return `Agent ${event.agentId ?? '?'} completed${progress}`;
    case 'agent_failed':
      return `Agent ${event.agentId ?? '?'} failed [${event.error?.category ?? 'unknown'}]: ${event.error?.message ?? ''}${progress}`;
    case 'run_completed':
      return `Run ${event.runId} completed${progress}`;
    case 'run_failed':
      return `Run ${event.runId} failed: ${event.error?.message ?? 'unknown error'}`;
    case 'run_cancelled':
      return `Run ${event.runId} cancelled`;
    default:
      return `${event.type}: ${event.runId}`;
  }
}
