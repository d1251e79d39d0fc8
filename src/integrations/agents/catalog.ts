/**
 * Agent Catalog
 *
 * The closed set of analysis agents a plan may select from. Loaded once at
 * startup from `data/agent-catalog.json` and immutable afterwards; planners
 * hand back ids, and the gateway resolves them here into descriptors.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import { normalizeQuestion } from '../orchestration/fingerprint.js';
import type { AgentDescriptor, CatalogAgent } from '../orchestration/types.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../../data/agent-catalog.json', import.meta.url));

const CatalogAgentSchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9_]*$/),
  displayName: z.string().min(1),
  description: z.string().min(1),
  specialties: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  outputType: z.string().default('report'),
});

const CatalogFileSchema = z.object({
  agents: z.array(CatalogAgentSchema).min(1),
});

export interface ResolvedAgents {
  /** Known agents, in request order, duplicates removed */
  known: AgentDescriptor[];
  unknown: string[];
}

export interface AgentScore {
  id: string;
  /** 0..1 */
  score: number;
}

// Each keyword hit adds this much relevance, capped at 1
const KEYWORD_WEIGHT = 0.25;

export class AgentCatalog {
  private readonly agents = new Map<string, CatalogAgent>();

  constructor(agents: readonly CatalogAgent[]) {
    for (const agent of agents) {
      if (this.agents.has(agent.id)) {
        throw new ValidationError(`Duplicate agent id in catalog: ${agent.id}`, ['id']);
      }
      this.agents.set(agent.id, agent);
    }
  }

  get size(): number {
    return this.agents.size;
  }

  list(): CatalogAgent[] {
    return [...this.agents.values()];
  }

  get(id: string): CatalogAgent | undefined {
    return this.agents.get(id);
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  resolve(ids: readonly string[]): ResolvedAgents {
    const known: AgentDescriptor[] = [];
    const unknown: string[] = [];
    const seen = new Set<string>();

    for (const raw of ids) {
      const id = raw.trim();
      if (seen.has(id)) continue;
      seen.add(id);
      const agent = this.agents.get(id);
      if (agent) {
        known.push(toDescriptor(agent));
      } else {
        unknown.push(id);
      }
    }
    return { known, unknown };
  }

  /**
   * Keyword relevance of every agent to `question`, best first. Ties keep
   * catalog order.
   */
  scoreQuestion(question: string): AgentScore[] {
    const text = normalizeQuestion(question);
    const scores = this.list().map((agent) => {
      const hits = agent.keywords.filter((keyword) => text.includes(keyword.toLowerCase())).length;
      return { id: agent.id, score: Math.min(1, hits * KEYWORD_WEIGHT) };
    });
    // Array.prototype.sort is stable
    return scores.sort((a, b) => b.score - a.score);
  }
}

export function toDescriptor(agent: CatalogAgent): AgentDescriptor {
  return { id: agent.id, displayName: agent.displayName, description: agent.description };
}

/**
 * Load and validate a catalog file.
 */
export function loadAgentCatalog(path: string = DEFAULT_CATALOG_PATH): AgentCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ValidationError(`Cannot read agent catalog at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return new AgentCatalog(parsed.data.agents);
}
