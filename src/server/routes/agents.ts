/**
 * Agent Catalog API Routes
 */

import { Hono } from 'hono';
import { NotFoundError } from '../../errors/index.js';
import type { Services } from '../../services.js';

export function agentsRoutes(services: Services): Hono {
  const routes = new Hono();

  // List the catalog
  routes.get('/', (c) => {
    return c.json({ success: true, data: services.catalog.list() });
  });

  // One agent with its track record
  routes.get('/:id', (c) => {
    const id = c.req.param('id');
    const agent = services.catalog.get(id);
    if (!agent) {
      throw new NotFoundError('Agent', id);
    }
    return c.json({
      success: true,
      data: { ...agent, performance: services.ledger.getAgentPerformance(id) ?? null },
    });
  });

  return routes;
}
