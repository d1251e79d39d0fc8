/**
 * Agent payload validation.
 *
 * Payloads arrive from untrusted places (script stdout, cached JSON), so
 * both go through the same schema before the engine touches them.
 */

import { z } from 'zod';
import type { AgentPayload } from './types.js';

export const AgentArtifactSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default('text/plain'),
  data: z.string(),
});

export const AgentPayloadSchema = z.object({
  narrative: z.string().default(''),
  insights: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
  artifacts: z.array(AgentArtifactSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Validate an unknown value as a payload. Returns null when it does not fit.
 */
export function parsePayload(value: unknown): AgentPayload | null {
  const result = AgentPayloadSchema.safeParse(value);
  if (!result.success) return null;
  const payload = result.data;
  return payload.narrative || payload.insights.length > 0 ? payload : null;
}

/**
 * Turn raw script output into a payload.
 *
 * Scripts may print any prose followed by one JSON object on the last
 * non-empty line. That object wins when it validates; otherwise the whole
 * output becomes the narrative.
 */
export function payloadFromOutput(stdout: string): AgentPayload {
  const text = stdout.trim();
  const lines = text.split('\n');
  const lastLine = lines[lines.length - 1]?.trim() ?? '';

  if (lastLine.startsWith('{') && lastLine.endsWith('}')) {
    const structured = parsePayload(tryParseJson(lastLine));
    if (structured) {
      const prose = lines.slice(0, -1).join('\n').trim();
      return structured.narrative || !prose ? structured : { ...structured, narrative: prose };
    }
  }

  return { narrative: text, insights: [], recommendations: [], artifacts: [], metadata: {} };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
