/**
 * Offline planner: picks agents by keyword overlap with the question.
 * Used when no model is configured, and as the mock planner.
 */

import type { PlanRequest, PlannerService } from '../orchestration/planner-gateway.js';
import type { AgentCatalog } from './catalog.js';

export const DEFAULT_AGENT_IDS = ['data_cleaning', 'data_visualization', 'statistical_analysis'] as const;

export interface KeywordPlannerOptions {
  /** Scores at or below this never qualify (default: 0.2) */
  minScore?: number;
  /** How many agents to pick (default: 3) */
  maxAgents?: number;
  /** Fallback when nothing qualifies */
  defaults?: readonly string[];
}

export class KeywordPlanner implements PlannerService {
  readonly name = 'keyword';
  private readonly minScore: number;
  private readonly maxAgents: number;
  private readonly defaults: readonly string[];

  constructor(
    private readonly catalog: AgentCatalog,
    options: KeywordPlannerOptions = {},
  ) {
    this.minScore = options.minScore ?? 0.2;
    this.maxAgents = options.maxAgents ?? 3;
    this.defaults = options.defaults ?? DEFAULT_AGENT_IDS;
  }

  async selectAgents(request: PlanRequest): Promise<string[]> {
    const selected = this.catalog
      .scoreQuestion(request.question)
      .filter((entry) => entry.score > this.minScore)
      .slice(0, this.maxAgents)
      .map((entry) => entry.id);

    return selected.length > 0 ? selected : this.defaults.filter((id) => this.catalog.has(id));
  }
}
