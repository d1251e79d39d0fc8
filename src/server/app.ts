/**
 * HTTP API
 *
 * Hono app over the service graph. Every JSON route answers
 * `{ success: true, data }` or `{ success: false, error }`; thrown errors
 * land in `onError` and are mapped by type.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { formatErrorForLog } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';
import type { Services } from '../services.js';
import { toErrorResponse } from './http-errors.js';
import { agentsRoutes } from './routes/agents.js';
import { cacheRoutes } from './routes/cache.js';
import { datasetsRoutes } from './routes/datasets.js';
import { eventsRoutes } from './routes/events.js';
import { healthRoutes } from './routes/health.js';
import { planRoutes } from './routes/plan.js';
import { runsRoutes } from './routes/runs.js';
import { statsRoutes } from './routes/stats.js';

const log = createComponentLogger('HttpServer');

export interface CreateAppOptions {
  /** Log each request line (default: true) */
  requestLogging?: boolean;
}

export function createApp(services: Services, options: CreateAppOptions = {}): Hono {
  const app = new Hono();

  if (options.requestLogging ?? true) {
    app.use('*', requestLogger((message, ...rest) => log.info(message, rest.length > 0 ? { detail: rest } : undefined)));
  }
  app.use(
    '/api/*',
    cors({
      origin: services.config.server.corsOrigins,
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    }),
  );

  app.route('/api/health', healthRoutes(services));
  app.route('/api/agents', agentsRoutes(services));
  app.route('/api/datasets', datasetsRoutes(services));
  app.route('/api/plan', planRoutes(services));
  app.route('/api/runs', runsRoutes(services));
  app.route('/api/events', eventsRoutes(services));
  app.route('/api/stats', statsRoutes(services));
  app.route('/api/cache', cacheRoutes(services));

  app.notFound((c) => c.json({ success: false, error: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((err, c) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      log.error('Request failed', { method: c.req.method, path: c.req.path, error: formatErrorForLog(err) });
    } else {
      log.debug('Request rejected', { method: c.req.method, path: c.req.path, status, error: body.error });
    }
    if (body.retryAfterMs !== undefined) {
      c.header('Retry-After', String(Math.ceil(body.retryAfterMs / 1000)));
    }
    return c.json(body, status);
  });

  return app;
}
