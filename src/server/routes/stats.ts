/**
 * Statistics API Routes
 */

import { Hono } from 'hono';
import type { Services } from '../../services.js';

export function statsRoutes(services: Services): Hono {
  const routes = new Hono();

  routes.get('/', (c) => {
    return c.json({
      success: true,
      data: {
        runs: services.ledger.getStatistics(),
        cache: services.cache.stats(),
        workers: services.pool.getStats(),
        events: services.broadcaster.stats(),
        activeRuns: services.orchestrator.getActiveRuns(),
      },
    });
  });

  routes.get('/agents', (c) => {
    return c.json({ success: true, data: services.ledger.listAgentPerformance() });
  });

  return routes;
}
