/**
 * Live Event API Routes
 *
 * Server-sent events from the progress broadcaster. Each SSE message
 * carries one RunEvent; its `seq` is the SSE id. A run-scoped stream ends
 * after that run's terminal event; the global stream runs until the
 * client goes away.
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { isTerminalEvent } from '../../integrations/orchestration/run-events.js';
import type { RunDetail } from '../../integrations/orchestration/run-ledger.js';
import { isTerminalRunStatus } from '../../integrations/orchestration/types.js';
import { createComponentLogger } from '../../integrations/utilities/logger.js';
import type { Services } from '../../services.js';

const log = createComponentLogger('EventStream');

export function eventsRoutes(services: Services): Hono {
  const routes = new Hono();

  routes.get('/', (c) => streamEvents(c, services));

  return routes;
}

/**
 * Stream broadcaster events, all runs or one. For one run the stream opens
 * with a `snapshot` of the ledger so late subscribers see what they missed.
 */
export function streamEvents(c: Context, services: Services, detail?: RunDetail): Response {
  const runId = detail?.run.id;

  return streamSSE(c, async (stream) => {
    // Subscribe before reading state, so nothing published in between is lost.
    const subscription = services.broadcaster.subscribe(runId ? { runId } : {});
    let aborted = false;

    const heartbeat = setInterval(() => {
      stream
        .writeSSE({ event: 'heartbeat', data: JSON.stringify({ ts: new Date().toISOString() }) })
        .catch(() => subscription.close());
    }, services.config.broadcaster.heartbeatMs);

    stream.onAbort(() => {
      aborted = true;
      clearInterval(heartbeat);
      subscription.close();
    });

    try {
      if (runId) {
        const current = services.ledger.getRun(runId) ?? detail;
        await stream.writeSSE({ event: 'snapshot', data: JSON.stringify(current) });
        if (current && isTerminalRunStatus(current.run.status)) {
          return;
        }
      }

      for await (const event of subscription) {
        await stream.writeSSE({ event: event.type, data: JSON.stringify(event), id: String(event.seq) });
        if (runId && isTerminalEvent(event)) break;
      }
    } finally {
      clearInterval(heartbeat);
      subscription.close();
      log.debug('Event stream closed', { runId, aborted, dropped: subscription.dropped });
    }
  });
}
