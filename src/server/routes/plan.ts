/**
 * Plan Preview API Routes
 *
 * Runs the planner alone so a client can review the suggested agents and
 * submit a trimmed list to /api/runs.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { Services } from '../../services.js';
import { readJsonBody } from '../http-errors.js';

const PlanBodySchema = z.object({
  datasetId: z.string().min(1),
  question: z.string().trim().min(1, 'question must not be empty'),
});

export function planRoutes(services: Services): Hono {
  const routes = new Hono();

  routes.post('/', async (c) => {
    const body = await readJsonBody(c, PlanBodySchema);
    const dataset = await services.datasets.get(body.datasetId);
    const agents = await services.gateway.plan(dataset.summary, body.question);
    return c.json({ success: true, data: { datasetId: dataset.ref.id, question: body.question, agents } });
  });

  return routes;
}
