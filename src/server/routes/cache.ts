/**
 * Cache Maintenance API Routes
 */

import { Hono } from 'hono';
import type { Services } from '../../services.js';

export function cacheRoutes(services: Services): Hono {
  const routes = new Hono();

  // Drop expired entries now instead of waiting for the periodic sweep
  routes.post('/sweep', (c) => {
    const removed = services.cache.evictExpired();
    return c.json({ success: true, data: { removed, stats: services.cache.stats() } });
  });

  // Drop everything
  routes.delete('/', (c) => {
    const removed = services.cache.purge();
    return c.json({ success: true, data: { removed } });
  });

  return routes;
}
