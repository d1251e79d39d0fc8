/**
 * Model-backed planner. Sends the dataset summary, the question and the
 * catalog to the model and reads back a JSON array of agent ids.
 *
 * Validation against the catalog happens in the gateway; this class only
 * extracts whatever ids the model named.
 */

import { z } from 'zod';
import { PlanningError } from '../../errors/index.js';
import type { PlanRequest, PlannerService } from '../orchestration/planner-gateway.js';
import type { LlmClient } from '../../providers/types.js';
import { createComponentLogger } from '../utilities/logger.js';
import { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt } from './prompts.js';

const log = createComponentLogger('LlmPlanner');

const AgentIdListSchema = z.array(z.string());

export interface LlmPlannerOptions {
  /** Upper bound suggested to the model (default: 4) */
  maxAgents?: number;
}

export class LlmPlanner implements PlannerService {
  readonly name = 'llm';
  private readonly maxAgents: number;

  constructor(
    private readonly client: LlmClient,
    options: LlmPlannerOptions = {},
  ) {
    this.maxAgents = options.maxAgents ?? 4;
  }

  async selectAgents(request: PlanRequest, signal?: AbortSignal): Promise<string[]> {
    const response = await this.client.complete(
      {
        system: PLANNER_SYSTEM_PROMPT,
        prompt: buildPlannerPrompt(request.summary, request.question, request.catalog, this.maxAgents),
        maxTokens: 512,
        temperature: 0,
      },
      signal,
    );

    const ids = parseAgentIds(response.text);
    if (ids === null) {
      const preview = response.text.slice(0, 200);
      log.warn('Unparseable planner response', { preview });
      throw PlanningError.malformedResponse(this.name, preview);
    }
    return ids;
  }
}

/**
 * Pull the agent id array out of a model response. Tolerates code fences
 * and prose around the array. Returns null when no string array is found.
 */
export function parseAgentIds(text: string): string[] | null {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end <= start) return null;

  let value: unknown;
  try {
    value = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = AgentIdListSchema.safeParse(value);
  if (!parsed.success) return null;
  return parsed.data.map((id) => id.trim()).filter((id) => id.length > 0);
}
