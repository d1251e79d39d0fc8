/**
 * Orchestration Types
 *
 * Shared vocabulary of the analysis engine: runs, per-agent executions,
 * agent payloads and reports.
 */

import type { AgentErrorCategory } from '../../errors/index.js';

export type { AgentErrorCategory };

// ─── Agents ─────────────────────────────────────────────────────────────────

/** What the planner hands back for one selected agent. */
export interface AgentDescriptor {
  id: string;
  displayName: string;
  description: string;
}

/** Full catalog entry. */
export interface CatalogAgent extends AgentDescriptor {
  specialties: string[];
  keywords: string[];
  outputType: string;
}

export interface AgentArtifact {
  name: string;
  /** MIME type or short kind tag such as `table` */
  type: string;
  /** Inline content (text, JSON or base64) */
  data: string;
}

/** Structured result of one successful agent. */
export interface AgentPayload {
  narrative: string;
  insights: string[];
  recommendations: string[];
  artifacts: AgentArtifact[];
  metadata: Record<string, unknown>;
}

export interface AgentErrorDetail {
  category: AgentErrorCategory;
  message: string;
}

export type AgentResult =
  | { ok: true; payload: AgentPayload; durationMs: number }
  | { ok: false; error: AgentErrorDetail; durationMs: number };

// ─── Datasets ───────────────────────────────────────────────────────────────

/** Stored dataset, addressed by the sha256 of its bytes. */
export interface DatasetRef {
  id: string;
  digest: string;
  path: string;
  fileName: string;
  sizeBytes: number;
}

export type ColumnType = 'number' | 'boolean' | 'date' | 'string' | 'empty';

export interface ColumnSummary {
  name: string;
  type: ColumnType;
  missing: number;
  samples: string[];
}

/** What the planner and code generator see of a dataset. */
export interface DatasetSummary {
  fileName: string;
  format: 'delimited' | 'json' | 'text';
  rowCount: number;
  columns: ColumnSummary[];
}

// ─── Runs ───────────────────────────────────────────────────────────────────

export type RunStatus =
  | 'planning'
  | 'executing'
  | 'aggregating'
  | 'completed'
  | 'partially_failed'
  | 'failed'
  | 'cancelled';

export type TerminalRunStatus = Extract<RunStatus, 'completed' | 'partially_failed' | 'failed' | 'cancelled'>;

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  'completed',
  'partially_failed',
  'failed',
  'cancelled',
]);

export function isTerminalRunStatus(status: RunStatus): status is TerminalRunStatus {
  return TERMINAL_RUN_STATUSES.has(status);
}

export interface Run {
  id: string;
  datasetId: string;
  datasetDigest: string;
  question: string;
  /** Fixed once the run enters `executing` */
  agents: AgentDescriptor[];
  status: RunStatus;
  createdAt: string;
  completedAt?: string;
  report?: Report;
  /** Top-level failure reason (planning failure, internal error) */
  error?: string;
}

export type ExecutionStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cache_hit';

export interface AgentExecution {
  runId: string;
  agentId: string;
  displayName: string;
  status: ExecutionStatus;
  fingerprint: string;
  cacheHit: boolean;
  startedAt?: string;
  endedAt?: string;
  /** Wall time of the runner call; 0 for cache hits */
  durationMs?: number;
  payload?: AgentPayload;
  error?: AgentErrorDetail;
}

// ─── Reports ────────────────────────────────────────────────────────────────

export interface ReportSuccess {
  agentId: string;
  displayName: string;
  cached: boolean;
  narrative: string;
  insights: string[];
  recommendations: string[];
  artifacts: AgentArtifact[];
}

export interface ReportFailure {
  agentId: string;
  displayName: string;
  category: AgentErrorCategory;
  message: string;
}

export interface ReportCounts {
  total: number;
  succeeded: number;
  failed: number;
  cached: number;
  /** Agents never dispatched because the run was cancelled */
  skipped: number;
}

export interface Report {
  runId: string;
  question: string;
  outcome: TerminalRunStatus;
  summary: string;
  /** Markdown rendering of every success, in plan order */
  content: string;
  insights: string[];
  recommendations: string[];
  successes: ReportSuccess[];
  failures: ReportFailure[];
  skipped: string[];
  counts: ReportCounts;
}
