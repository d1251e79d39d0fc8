/**
 * Aggregator tests
 */

import { describe, it, expect } from 'vitest';
import { NO_INSIGHTS, aggregate, classifyOutcome } from '../src/integrations/orchestration/aggregator.js';
import type { AgentExecution, AgentPayload, Run } from '../src/integrations/orchestration/types.js';

const run: Run = {
  id: 'run-1',
  datasetId: 'd',
  datasetDigest: 'd',
  question: 'What changed?',
  agents: [
    { id: 'data_quality', displayName: 'Data Quality', description: '' },
    { id: 'trend_analysis', displayName: 'Trend Analysis', description: '' },
    { id: 'forecast', displayName: 'Forecast', description: '' },
  ],
  status: 'aggregating',
  createdAt: '2026-01-01T00:00:00.000Z',
};

function payload(overrides: Partial<AgentPayload> = {}): AgentPayload {
  return { narrative: '', insights: [], recommendations: [], artifacts: [], metadata: {}, ...overrides };
}

function execution(agentId: string, overrides: Partial<AgentExecution>): AgentExecution {
  const displayName = run.agents.find((a) => a.id === agentId)?.displayName ?? agentId;
  return { runId: run.id, agentId, displayName, status: 'pending', fingerprint: `fp-${agentId}`, cacheHit: false, ...overrides };
}

const quality = execution('data_quality', {
  status: 'completed',
  payload: payload({ narrative: '2 columns have gaps.', insights: ['email is 4% empty'], recommendations: ['Backfill email'] }),
});
const trend = execution('trend_analysis', {
  status: 'cache_hit',
  cacheHit: true,
  payload: payload({
    narrative: 'Sales rise in Q4.',
    insights: ['Q4 is 30% above average'],
    recommendations: ['Backfill email', ' Stock up for Q4 '],
    artifacts: [{ name: 'trend.csv', type: 'text/csv', data: 'q,v' }],
  }),
});
const forecast = execution('forecast', { status: 'failed', error: { category: 'timeout', message: 'took too long' } });

describe('classifyOutcome', () => {
  it('is completed when everything succeeded', () => {
    expect(classifyOutcome([quality, trend])).toBe('completed');
  });

  it('is partially_failed with a mix', () => {
    expect(classifyOutcome([quality, forecast])).toBe('partially_failed');
  });

  it('is failed when nothing succeeded', () => {
    expect(classifyOutcome([forecast])).toBe('failed');
    expect(classifyOutcome([])).toBe('failed');
  });
});

describe('aggregate', () => {
  it('orders sections by plan order, not settle order', () => {
    const report = aggregate(run, [forecast, trend, quality]);
    expect(report.successes.map((s) => s.agentId)).toEqual(['data_quality', 'trend_analysis']);
    expect(report.failures).toEqual([
      { agentId: 'forecast', displayName: 'Forecast', category: 'timeout', message: 'took too long' },
    ]);
  });

  it('renders markdown content', () => {
    const report = aggregate(run, [quality, trend]);
    expect(report.content).toBe(
      [
        '## Data Quality',
        '',
        '2 columns have gaps.',
        '',
        '### Insights',
        '- email is 4% empty',
        '',
        '### Recommendations',
        '- Backfill email',
        '',
        '## Trend Analysis',
        '',
        'Sales rise in Q4.',
        '',
        '### Insights',
        '- Q4 is 30% above average',
        '',
        '### Recommendations',
        '- Backfill email',
        '-  Stock up for Q4 ',
        '',
        '### Artifacts',
        '- trend.csv (text/csv)',
      ].join('\n'),
    );
  });

  it('prefixes insights and dedupes recommendations', () => {
    const report = aggregate(run, [quality, trend]);
    expect(report.insights).toEqual(['[data_quality] email is 4% empty', '[trend_analysis] Q4 is 30% above average']);
    expect(report.recommendations).toEqual(['Backfill email', 'Stock up for Q4']);
  });

  it('summarizes counts', () => {
    const report = aggregate(run, [quality, trend, forecast]);
    expect(report.outcome).toBe('partially_failed');
    expect(report.summary).toBe('2/3 agents succeeded, 1 from cache, 1 failed');
    expect(report.counts).toEqual({ total: 3, succeeded: 2, failed: 1, cached: 1, skipped: 0 });
  });

  it('reports no insights when nothing succeeded', () => {
    const report = aggregate(run, [forecast]);
    expect(report.outcome).toBe('failed');
    expect(report.summary).toBe(NO_INSIGHTS);
    expect(report.content).toBe('No insights generated.');
  });

  it('lists never-dispatched agents of a cancelled run as skipped', () => {
    const pending = execution('forecast', {});
    const report = aggregate({ ...run, status: 'cancelled' }, [quality, pending]);
    expect(report.outcome).toBe('cancelled');
    expect(report.skipped).toEqual(['forecast']);
    expect(report.summary).toBe('1/2 agents succeeded, 1 skipped');
  });

  it('is idempotent', () => {
    const executions = [trend, forecast, quality];
    expect(aggregate(run, executions)).toEqual(aggregate(run, executions));
  });

  it('renders the same content whether a result came from cache or not', () => {
    const fresh = aggregate(run, [quality, { ...trend, status: 'completed', cacheHit: false }]);
    const cached = aggregate(run, [quality, trend]);
    expect(cached.content).toBe(fresh.content);
  });
});
