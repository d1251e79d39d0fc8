/**
 * Model-backed planner and code generator tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LlmPlanner, parseAgentIds } from '../src/integrations/agents/llm-planner.js';
import { LlmCodeGenerator, extractPythonCode } from '../src/integrations/agents/code-generator.js';
import { describeDataset } from '../src/integrations/agents/prompts.js';
import type { CompletionResponse, LlmClient } from '../src/providers/types.js';
import type { CatalogAgent, DatasetSummary } from '../src/integrations/orchestration/types.js';
import { PlanningError } from '../src/errors/index.js';

const summary: DatasetSummary = {
  fileName: 'sales.csv',
  format: 'delimited',
  rowCount: 3,
  columns: [
    { name: 'month', type: 'date', missing: 0, samples: ['2024-01-01', '2024-02-01'] },
    { name: 'revenue', type: 'number', missing: 1, samples: ['10', '12'] },
  ],
};

const catalog: CatalogAgent[] = [
  {
    id: 'trend_analysis',
    displayName: 'Trend Analysis',
    description: 'Finds trends',
    specialties: ['growth'],
    keywords: ['trend'],
    outputType: 'report',
  },
];

function clientAnswering(text: string, stopReason: CompletionResponse['stopReason'] = 'end_turn') {
  const complete = vi.fn<LlmClient['complete']>(async () => ({ text, stopReason, usage: { inputTokens: 10, outputTokens: 5 } }));
  const client: LlmClient = { name: 'fake', complete };
  return { client, complete };
}

describe('parseAgentIds', () => {
  it('reads a bare JSON array', () => {
    expect(parseAgentIds('["data_cleaning", "trend_analysis"]')).toEqual(['data_cleaning', 'trend_analysis']);
  });

  it('reads an array inside a fence and prose', () => {
    const text = 'Here you go:\n```json\n[" trend_analysis ", ""]\n```\nGood luck.';
    expect(parseAgentIds(text)).toEqual(['trend_analysis']);
  });

  it('returns null for anything else', () => {
    expect(parseAgentIds('I would pick trend analysis')).toBeNull();
    expect(parseAgentIds('[1, 2]')).toBeNull();
    expect(parseAgentIds('[trend_analysis]')).toBeNull();
  });
});

describe('LlmPlanner', () => {
  it('sends the question and catalog and returns the named ids', async () => {
    const { client, complete } = clientAnswering('["trend_analysis"]');
    const planner = new LlmPlanner(client, { maxAgents: 2 });

    const ids = await planner.selectAgents({ summary, question: 'How is revenue trending?', catalog });

    expect(ids).toEqual(['trend_analysis']);
    const request = complete.mock.calls[0]?.[0];
    expect(request?.temperature).toBe(0);
    expect(request?.prompt).toContain('"How is revenue trending?"');
    expect(request?.prompt).toContain('- **trend_analysis**: Finds trends (specialties: growth)');
    expect(request?.prompt).toContain('Select at most 2 agents');
  });

  it('rejects a response without an id list', async () => {
    const { client } = clientAnswering('Trend analysis seems right.');
    await expect(new LlmPlanner(client).selectAgents({ summary, question: 'q', catalog })).rejects.toBeInstanceOf(
      PlanningError,
    );
  });
});

describe('extractPythonCode', () => {
  it('prefers a python-tagged block', () => {
    const text = '```\nuntagged()\n```\n```python\nimport pandas as pd\n```';
    expect(extractPythonCode(text)).toBe('import pandas as pd');
  });

  it('falls back to the first untagged block', () => {
    expect(extractPythonCode('```\nprint(1)\n```\n```sql\nselect 1\n```')).toBe('print(1)');
  });

  it('accepts a JSON code object', () => {
    expect(extractPythonCode('{"code": "print(2)\\n"}')).toBe('print(2)');
  });

  it('returns null when there is no code', () => {
    expect(extractPythonCode('```bash\nls\n```')).toBeNull();
    expect(extractPythonCode('no code here')).toBeNull();
  });
});

describe('LlmCodeGenerator', () => {
  const agent = { id: 'trend_analysis', displayName: 'Trend Analysis', description: 'Finds trends' };

  it('returns the script from the response', async () => {
    const { client, complete } = clientAnswering('```py\nprint("hi")\n```');
    const generated = await new LlmCodeGenerator(client, { maxTokens: 2048 }).generate({
      agent,
      question: 'Trend?',
      summary,
    });

    expect(generated).toEqual({ language: 'python', code: 'print("hi")' });
    expect(complete.mock.calls[0]?.[0].maxTokens).toBe(2048);
  });

  it('throws when the response holds no script', async () => {
    const { client } = clientAnswering('Sorry, I cannot help.');
    await expect(new LlmCodeGenerator(client).generate({ agent, question: 'q', summary })).rejects.toThrow(
      'no python code block in response for trend_analysis',
    );
  });
});

describe('describeDataset', () => {
  it('renders columns as a table', () => {
    expect(describeDataset(summary)).toBe(
      [
        '- File: sales.csv',
        '- Format: delimited',
        '- Rows: 3',
        '- Columns: 2',
        '',
        '| column | type | missing | samples |',
        '|---|---|---|---|',
        '| month | date | 0 | 2024-01-01, 2024-02-01 |',
        '| revenue | number | 1 | 10, 12 |',
      ].join('\n'),
    );
  });
});
