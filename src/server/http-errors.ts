/**
 * Error → HTTP response mapping, shared by the global error handler and the
 * SSE routes that must answer before a stream opens.
 */

import type { Context } from 'hono';
import { z } from 'zod';
import {
  CircuitOpenError,
  ErrorCategory,
  InsightError,
  NotFoundError,
  PlanningError,
  ProviderError,
  RateLimitError,
  ValidationError,
} from '../errors/index.js';

export type ErrorStatus = 400 | 404 | 409 | 422 | 429 | 500 | 502 | 503;

export interface ErrorBody {
  success: false;
  error: string;
  category?: ErrorCategory;
  retryAfterMs?: number;
  fields?: string[];
}

export function toErrorResponse(err: unknown): { status: ErrorStatus; body: ErrorBody } {
  if (err instanceof RateLimitError) {
    return { status: 429, body: { success: false, error: err.message, category: err.category, retryAfterMs: err.retryAfterMs } };
  }
  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: { success: false, error: err.message, category: err.category, ...(err.fields && { fields: err.fields }) },
    };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { success: false, error: err.message, category: err.category } };
  }
  if (err instanceof PlanningError) {
    return { status: planningStatus(err.category), body: { success: false, error: err.message, category: err.category } };
  }
  if (err instanceof CircuitOpenError) {
    return { status: 503, body: { success: false, error: err.message, category: err.category } };
  }
  if (err instanceof ProviderError) {
    return { status: 502, body: { success: false, error: err.message, category: err.category } };
  }
  if (err instanceof InsightError) {
    return { status: 500, body: { success: false, error: err.message, category: err.category } };
  }
  return { status: 500, body: { success: false, error: 'Internal server error' } };
}

function planningStatus(category: ErrorCategory): ErrorStatus {
  switch (category) {
    case ErrorCategory.VALIDATION:
      return 400;
    case ErrorCategory.PERMANENT:
      return 422;
    default:
      return 502;
  }
}

/**
 * Parse a JSON request body against `schema`.
 *
 * @throws ValidationError on malformed JSON or a schema mismatch
 */
export async function readJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }
  return parsed.data;
}
