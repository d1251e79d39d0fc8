/**
 * Dataset API Routes
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { ValidationError } from '../../errors/index.js';
import type { Services } from '../../services.js';

/** Room for multipart boundaries and part headers around the file itself */
const MULTIPART_ALLOWANCE_BYTES = 16 * 1024;

export function datasetsRoutes(services: Services): Hono {
  const routes = new Hono();
  const maxBodyBytes = services.config.upload.maxFileBytes + MULTIPART_ALLOWANCE_BYTES;

  // Upload a dataset (multipart, field "file"). The body is buffered, so it
  // is capped before parsing; the store still checks the file's own size.
  routes.post(
    '/',
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) =>
        c.json({ success: false, error: `Upload exceeds ${maxBodyBytes} bytes`, fields: ['file'] }, 413),
    }),
    async (c) => {
      const body = await c.req.parseBody();
      const file = body['file'];
      if (!(file instanceof File)) {
        throw new ValidationError('Missing multipart field "file"', ['file']);
      }

      const stored = await services.datasets.put(file.name, new Uint8Array(await file.arrayBuffer()));
      return c.json({ success: true, data: stored }, 201);
    },
  );

  // Dataset metadata and summary
  routes.get('/:id', async (c) => {
    const stored = await services.datasets.get(c.req.param('id'));
    return c.json({ success: true, data: stored });
  });

  return routes;
}
