/**
 * Planner Gateway
 *
 * Boundary to whatever picks agents for a question. The planner proposes
 * ids; the gateway checks them against the catalog, drops unknown ids and
 * duplicates, caps the list, and turns every way of producing nothing into
 * a PlanningError. No retries and no caching here: a planning failure
 * fails the run.
 */

import { PlanningError, ValidationError, isInsightError, toError } from '../../errors/index.js';
import type { AgentCatalog } from '../agents/catalog.js';
import type { CancellationToken } from '../cancellation.js';
import { NONE_TOKEN, race, toAbortSignal } from '../cancellation.js';
import { createComponentLogger } from '../utilities/logger.js';
import type { AgentDescriptor, CatalogAgent, DatasetSummary } from './types.js';

const log = createComponentLogger('PlannerGateway');

export interface PlanRequest {
  summary: DatasetSummary;
  question: string;
  catalog: readonly CatalogAgent[];
}

/**
 * Something that proposes agent ids, in priority order.
 */
export interface PlannerService {
  readonly name: string;
  selectAgents(request: PlanRequest, signal?: AbortSignal): Promise<string[]>;
}

export interface PlannerGatewayOptions {
  /** Upper bound on agents per plan (default: 10) */
  maxAgents?: number;
}

export class PlannerGateway {
  private readonly maxAgents: number;

  constructor(
    private readonly planner: PlannerService,
    private readonly catalog: AgentCatalog,
    options: PlannerGatewayOptions = {},
  ) {
    this.maxAgents = Math.max(1, options.maxAgents ?? 10);
  }

  get plannerName(): string {
    return this.planner.name;
  }

  /**
   * Ask the planner for agents and validate its answer.
   *
   * @throws PlanningError when the planner fails or nothing usable remains
   * @throws RunCancelledError when `token` cancels first
   */
  async plan(summary: DatasetSummary, question: string, token: CancellationToken = NONE_TOKEN): Promise<AgentDescriptor[]> {
    let proposed: string[];
    try {
      proposed = await race(
        this.planner.selectAgents({ summary, question, catalog: this.catalog.list() }, toAbortSignal(token)),
        token,
      );
    } catch (err) {
      if (token.isCancellationRequested) throw err;
      if (err instanceof PlanningError) throw err;
      const cause = toError(err);
      log.warn('Planner failed', { planner: this.planner.name, error: cause.message, category: isInsightError(err) ? err.category : undefined });
      throw PlanningError.unreachable(this.planner.name, cause);
    }

    const { known, unknown } = this.catalog.resolve(proposed);
    if (unknown.length > 0) {
      log.warn('Planner proposed unknown agents', { planner: this.planner.name, unknown });
    }
    if (known.length === 0) {
      throw PlanningError.emptyPlan(question, unknown);
    }
    return known.slice(0, this.maxAgents);
  }

  /**
   * Resolve a client-chosen agent list. Unlike plan(), unknown ids and an
   * over-long list are errors here: the client named every agent explicitly,
   * so none is dropped quietly.
   *
   * @throws PlanningError on unknown ids or an empty list
   * @throws ValidationError when more than `maxAgents` distinct agents are named
   */
  describe(ids: readonly string[]): AgentDescriptor[] {
    const { known, unknown } = this.catalog.resolve(ids);
    if (unknown.length > 0) {
      throw PlanningError.unknownAgents(unknown);
    }
    if (known.length === 0) {
      throw PlanningError.emptyPlan('', []);
    }
    if (known.length > this.maxAgents) {
      throw new ValidationError(`At most ${this.maxAgents} agents per run; ${known.length} were selected`, ['agents'], {
        selected: known.length,
        maxAgents: this.maxAgents,
      });
    }
    return known;
  }
}
