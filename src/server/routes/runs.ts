/**
 * Run API Routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../errors/index.js';
import type { Services } from '../../services.js';
import { readJsonBody } from '../http-errors.js';
import { streamEvents } from './events.js';

const RunBodySchema = z.object({
  datasetId: z.string().min(1),
  question: z.string().trim().min(1, 'question must not be empty'),
  agents: z.array(z.string().min(1)).optional(),
});

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).optional(),
  status: z
    .enum(['planning', 'executing', 'aggregating', 'completed', 'partially_failed', 'failed', 'cancelled'])
    .optional(),
});

const CancelBodySchema = z.object({ reason: z.string().trim().min(1).optional() });

export function runsRoutes(services: Services): Hono {
  const routes = new Hono();

  // Submit a run; it proceeds in the background
  routes.post('/', async (c) => {
    services.rateLimiter.consume(clientKey(c.req.header('x-client-id'), c.req.header('x-forwarded-for')));
    const body = await readJsonBody(c, RunBodySchema);
    const dataset = await services.datasets.get(body.datasetId);

    const handle = services.orchestrator.submit({
      dataset: dataset.ref,
      summary: dataset.summary,
      question: body.question,
      ...(body.agents && { agents: body.agents }),
    });
    return c.json({ success: true, data: { runId: handle.runId, status: 'planning' } }, 202);
  });

  // Run history
  routes.get('/', (c) => {
    const query = ListQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      throw ValidationError.fromZodError(query.error);
    }
    return c.json({ success: true, data: services.ledger.listRuns(query.data) });
  });

  // One run with its executions and report
  routes.get('/:id', (c) => {
    const id = c.req.param('id');
    const detail = services.ledger.getRun(id);
    if (!detail) {
      throw new NotFoundError('Run', id);
    }
    const active = services.orchestrator.getActiveRuns().find((r) => r.runId === id);
    return c.json({
      success: true,
      data: { ...detail, active: active !== undefined, ...(active && { progress: active.progress }) },
    });
  });

  routes.post('/:id/cancel', async (c) => {
    const id = c.req.param('id');
    const detail = services.ledger.getRun(id);
    if (!detail) {
      throw new NotFoundError('Run', id);
    }

    const raw = await c.req.text();
    let reason: string | undefined;
    if (raw.trim()) {
      const parsed = CancelBodySchema.safeParse(parseJson(raw));
      if (!parsed.success) throw ValidationError.fromZodError(parsed.error);
      reason = parsed.data.reason;
    }

    if (!services.orchestrator.cancel(id, reason)) {
      return c.json({ success: false, error: `Run ${id} is ${detail.run.status} and cannot be cancelled` }, 409);
    }
    return c.json({ success: true, data: { runId: id, status: 'cancelled' } });
  });

  // Live progress of one run
  routes.get('/:id/events', (c) => {
    const id = c.req.param('id');
    const detail = services.ledger.getRun(id);
    if (!detail) {
      throw new NotFoundError('Run', id);
    }
    return streamEvents(c, services, detail);
  });

  return routes;
}

/**
 * Rate-limit key: an explicit client id, else the first forwarded address.
 */
export function clientKey(clientId: string | undefined, forwardedFor: string | undefined): string {
  const explicit = clientId?.trim();
  if (explicit) return explicit;
  const forwarded = forwardedFor?.split(',')[0]?.trim();
  return forwarded || 'anonymous';
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}
