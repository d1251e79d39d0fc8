/**
 * Aggregator
 *
 * Pure merge of terminal agent executions into one report. The output
 * depends only on the run's plan order and the executions' contents, never
 * on completion order or the clock, so aggregating the same set twice gives
 * the same report and a run served from cache renders the same content as
 * the run that filled the cache.
 */

import type {
  AgentExecution,
  Report,
  ReportFailure,
  ReportSuccess,
  Run,
  TerminalRunStatus,
} from './types.js';

export const NO_INSIGHTS = 'No insights generated';

/**
 * Terminal status implied by a settled execution set.
 *
 * - completed: every agent succeeded (cache hits count)
 * - partially_failed: at least one of each
 * - failed: nothing succeeded
 */
export function classifyOutcome(executions: readonly AgentExecution[]): Exclude<TerminalRunStatus, 'cancelled'> {
  let succeeded = 0;
  let failed = 0;
  for (const execution of executions) {
    if (execution.status === 'completed' || execution.status === 'cache_hit') succeeded++;
    else if (execution.status === 'failed') failed++;
  }
  if (succeeded === 0) return 'failed';
  return failed === 0 ? 'completed' : 'partially_failed';
}

export function aggregate(run: Run, executions: readonly AgentExecution[]): Report {
  const order = new Map(run.agents.map((agent, index) => [agent.id, index]));
  const sorted = [...executions].sort((a, b) => {
    const diff = (order.get(a.agentId) ?? Number.MAX_SAFE_INTEGER) - (order.get(b.agentId) ?? Number.MAX_SAFE_INTEGER);
    return diff !== 0 ? diff : a.agentId.localeCompare(b.agentId);
  });

  const successes: ReportSuccess[] = [];
  const failures: ReportFailure[] = [];
  const skipped: string[] = [];

  for (const execution of sorted) {
    if (execution.status === 'completed' || execution.status === 'cache_hit') {
      const payload = execution.payload;
      successes.push({
        agentId: execution.agentId,
        displayName: execution.displayName,
        cached: execution.status === 'cache_hit',
        narrative: payload?.narrative ?? '',
        insights: [...(payload?.insights ?? [])],
        recommendations: [...(payload?.recommendations ?? [])],
        artifacts: (payload?.artifacts ?? []).map((artifact) => ({ ...artifact })),
      });
    } else if (execution.status === 'failed') {
      failures.push({
        agentId: execution.agentId,
        displayName: execution.displayName,
        category: execution.error?.category ?? 'execution-failure',
        message: execution.error?.message ?? 'Unknown failure',
      });
    } else {
      skipped.push(execution.agentId);
    }
  }

  const insights = successes.flatMap((s) => s.insights.map((insight) => `[${s.agentId}] ${insight}`));
  const recommendations = dedupe(successes.flatMap((s) => s.recommendations));
  const cached = successes.filter((s) => s.cached).length;

  const counts = {
    total: executions.length,
    succeeded: successes.length,
    failed: failures.length,
    cached,
    skipped: skipped.length,
  };

  return {
    runId: run.id,
    question: run.question,
    outcome: run.status === 'cancelled' ? 'cancelled' : classifyOutcome(executions),
    summary: summarize(counts),
    content: successes.length > 0 ? successes.map(renderSuccess).join('\n\n') : `${NO_INSIGHTS}.`,
    insights,
    recommendations,
    successes,
    failures,
    skipped,
    counts,
  };
}

// ─── Rendering ─────────────────────────────────────────────────────────────

function summarize(counts: Report['counts']): string {
  if (counts.succeeded === 0) return NO_INSIGHTS;
  const parts = [`${counts.succeeded}/${counts.total} agents succeeded`];
  if (counts.cached > 0) parts.push(`${counts.cached} from cache`);
  if (counts.failed > 0) parts.push(`${counts.failed} failed`);
  if (counts.skipped > 0) parts.push(`${counts.skipped} skipped`);
  return parts.join(', ');
}

function renderSuccess(success: ReportSuccess): string {
  const sections = [`## ${success.displayName}`];
  if (success.narrative) sections.push(success.narrative.trim());
  if (success.insights.length > 0) {
    sections.push(['### Insights', ...success.insights.map((i) => `- ${i}`)].join('\n'));
  }
  if (success.recommendations.length > 0) {
    sections.push(['### Recommendations', ...success.recommendations.map((r) => `- ${r}`)].join('\n'));
  }
  if (success.artifacts.length > 0) {
    sections.push(['### Artifacts', ...success.artifacts.map((a) => `- ${a.name} (${a.type})`)].join('\n'));
  }
  return sections.join('\n\n');
}

function dedupe(items: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const key = item.trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(key);
  }
  return result;
}
