/**
 * Agent catalog, keyword planner and planner gateway tests
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import { AgentCatalog, loadAgentCatalog } from '../src/integrations/agents/catalog.js';
import { KeywordPlanner } from '../src/integrations/agents/keyword-planner.js';
import { PlannerGateway, type PlannerService } from '../src/integrations/orchestration/planner-gateway.js';
import { createCancellationTokenSource } from '../src/integrations/cancellation.js';
import type { CatalogAgent, DatasetSummary } from '../src/integrations/orchestration/types.js';
import { ErrorCategory, PlanningError, RunCancelledError, ValidationError } from '../src/errors/index.js';

const summary: DatasetSummary = { fileName: 'sales.csv', format: 'delimited', rowCount: 3, columns: [] };

function agent(id: string, keywords: string[] = []): CatalogAgent {
  return { id, displayName: id, description: `${id} agent`, specialties: [], keywords, outputType: 'report' };
}

const catalog = new AgentCatalog([
  agent('data_quality', ['missing', 'quality']),
  agent('trend_analysis', ['trend', 'over time', 'growth']),
  agent('forecasting', ['forecast', 'predict']),
]);

function plannerReturning(ids: string[]): PlannerService & { selectAgents: Mock<PlannerService['selectAgents']> } {
  return { name: 'stub', selectAgents: vi.fn<PlannerService['selectAgents']>(async () => ids) };
}

describe('AgentCatalog', () => {
  it('loads the bundled catalog', () => {
    const bundled = loadAgentCatalog();
    expect(bundled.size).toBe(23);
    expect(bundled.get('churn_prediction')?.displayName).toBeTruthy();
  });

  it('rejects duplicate ids', () => {
    expect(() => new AgentCatalog([agent('a'), agent('a')])).toThrow(ValidationError);
  });

  it('resolves known ids in order and reports the rest', () => {
    const { known, unknown } = catalog.resolve(['trend_analysis', 'nope', ' data_quality ', 'trend_analysis']);
    expect(known.map((a) => a.id)).toEqual(['trend_analysis', 'data_quality']);
    expect(unknown).toEqual(['nope']);
  });

  it('scores questions by keyword hits', () => {
    const scores = catalog.scoreQuestion('Forecast GROWTH and the trend over time');
    expect(scores).toEqual([
      { id: 'trend_analysis', score: 0.75 },
      { id: 'forecasting', score: 0.25 },
      { id: 'data_quality', score: 0 },
    ]);
  });
});

describe('KeywordPlanner', () => {
  it('picks agents whose keywords match', async () => {
    const planner = new KeywordPlanner(loadAgentCatalog());
    const ids = await planner.selectAgents({
      summary,
      question: 'Which customers are likely to churn, and what drives retention?',
      catalog: [],
    });
    expect(ids).toEqual(['churn_prediction', 'cohort_analysis']);
  });

  it('falls back to the default agents when nothing matches', async () => {
    const planner = new KeywordPlanner(loadAgentCatalog());
    const ids = await planner.selectAgents({ summary, question: 'hello there', catalog: [] });
    expect(ids).toEqual(['data_cleaning', 'data_visualization', 'statistical_analysis']);
  });

  it('only falls back to defaults the catalog knows', async () => {
    const planner = new KeywordPlanner(catalog, { defaults: ['data_quality', 'missing_agent'] });
    expect(await planner.selectAgents({ summary, question: 'hello', catalog: [] })).toEqual(['data_quality']);
  });
});

describe('PlannerGateway', () => {
  it('hands the planner the catalog and question', async () => {
    const planner = plannerReturning(['data_quality']);
    await new PlannerGateway(planner, catalog).plan(summary, 'Any gaps?');

    const request = planner.selectAgents.mock.calls[0]?.[0];
    expect(request?.question).toBe('Any gaps?');
    expect(request?.catalog.map((a) => a.id)).toEqual(['data_quality', 'trend_analysis', 'forecasting']);
  });

  it('drops unknown and duplicate ids', async () => {
    const gateway = new PlannerGateway(plannerReturning(['ghost', 'trend_analysis', 'trend_analysis', 'data_quality']), catalog);
    const agents = await gateway.plan(summary, 'q');
    expect(agents).toEqual([
      { id: 'trend_analysis', displayName: 'trend_analysis', description: 'trend_analysis agent' },
      { id: 'data_quality', displayName: 'data_quality', description: 'data_quality agent' },
    ]);
  });

  it('caps the plan at maxAgents', async () => {
    const gateway = new PlannerGateway(plannerReturning(['forecasting', 'trend_analysis', 'data_quality']), catalog, {
      maxAgents: 2,
    });
    expect((await gateway.plan(summary, 'q')).map((a) => a.id)).toEqual(['forecasting', 'trend_analysis']);
  });

  it('treats an empty selection as a permanent planning error', async () => {
    const gateway = new PlannerGateway(plannerReturning(['ghost']), catalog);
    const error = await gateway.plan(summary, 'q').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ message: 'Planner selected no applicable agents', category: ErrorCategory.PERMANENT });
  });

  it('wraps planner errors as unreachable', async () => {
    const planner: PlannerService = {
      name: 'flaky',
      selectAgents: vi.fn<PlannerService['selectAgents']>(async () => Promise.reject(new Error('connection reset'))),
    };
    const error = await new PlannerGateway(planner, catalog).plan(summary, 'q').catch((e: unknown) => e);
    expect(error).toMatchObject({ message: 'Planner flaky failed: connection reset', category: ErrorCategory.DEPENDENCY });
  });

  it('passes planning errors through unchanged', async () => {
    const original = PlanningError.malformedResponse('llm', 'sure!');
    const planner: PlannerService = {
      name: 'llm',
      selectAgents: vi.fn<PlannerService['selectAgents']>(async () => Promise.reject(original)),
    };
    await expect(new PlannerGateway(planner, catalog).plan(summary, 'q')).rejects.toBe(original);
  });

  it('stops waiting when the run is cancelled', async () => {
    const planner: PlannerService = {
      name: 'slow',
      selectAgents: vi.fn<PlannerService['selectAgents']>(() => new Promise<string[]>(() => {})),
    };
    const cts = createCancellationTokenSource();
    const pending = new PlannerGateway(planner, catalog).plan(summary, 'q', cts.token);
    cts.cancel('stop');
    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('describes an explicit agent list', () => {
    const gateway = new PlannerGateway(plannerReturning([]), catalog);
    expect(gateway.describe(['forecasting']).map((a) => a.id)).toEqual(['forecasting']);
    expect(() => gateway.describe(['forecasting', 'ghost'])).toThrow('Unknown agents: ghost');
    expect(() => gateway.describe([])).toThrow(PlanningError);
  });

  it('rejects an explicit list longer than maxAgents instead of truncating it', () => {
    const gateway = new PlannerGateway(plannerReturning([]), catalog, { maxAgents: 2 });

    let error: unknown;
    try {
      gateway.describe(['forecasting', 'trend_analysis', 'data_quality']);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ message: 'At most 2 agents per run; 3 were selected', fields: ['agents'] });
  });

  it('counts an explicit list after removing duplicates', () => {
    const gateway = new PlannerGateway(plannerReturning([]), catalog, { maxAgents: 2 });
    expect(gateway.describe(['forecasting', 'forecasting', 'data_quality']).map((a) => a.id)).toEqual([
      'forecasting',
      'data_quality',
    ]);
  });
});
