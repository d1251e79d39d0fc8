/**
 * Health API Routes
 */

import { Hono } from 'hono';
import type { Services } from '../../services.js';

export function healthRoutes(services: Services): Hono {
  const routes = new Hono();

  routes.get('/', (c) => {
    return c.json({
      success: true,
      data: {
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptimeMs: Date.now() - services.startedAt.getTime(),
        mode: services.mode,
        planner: services.gateway.plannerName,
        activeRuns: services.orchestrator.getActiveRuns().length,
        workers: services.pool.getStats(),
        ...(services.breaker && { circuit: services.breaker.getState() }),
      },
    });
  });

  return routes;
}
