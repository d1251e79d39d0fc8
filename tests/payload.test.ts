/**
 * Agent payload parsing tests
 */

import { describe, it, expect } from 'vitest';
import { parsePayload, payloadFromOutput } from '../src/integrations/orchestration/payload.js';

describe('payloadFromOutput', () => {
  it('uses a JSON object on the last line', () => {
    const stdout = 'loading\n{"narrative":"Churn is 4%","insights":["Q2 spike"],"artifacts":[{"name":"t","data":"x"}]}\n';

    expect(payloadFromOutput(stdout)).toEqual({
      narrative: 'Churn is 4%',
      insights: ['Q2 spike'],
      recommendations: [],
      artifacts: [{ name: 't', type: 'text/plain', data: 'x' }],
      metadata: {},
    });
  });

  it('fills an empty narrative from the preceding prose', () => {
    const stdout = 'Revenue grew steadily.\n{"insights":["Up 4%"]}';
    expect(payloadFromOutput(stdout).narrative).toBe('Revenue grew steadily.');
  });

  it('treats output without a valid trailing object as narrative', () => {
    expect(payloadFromOutput('{"insights": "not a list"}')).toEqual({
      narrative: '{"insights": "not a list"}',
      insights: [],
      recommendations: [],
      artifacts: [],
      metadata: {},
    });
  });
});

describe('parsePayload', () => {
  it('rejects a payload with neither narrative nor insights', () => {
    expect(parsePayload({ recommendations: ['x'] })).toBeNull();
    expect(parsePayload('text')).toBeNull();
  });
});
