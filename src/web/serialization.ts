/**
 * Shared helpers for the web API layer: query validation and mapping
 * engine error types to HTTP status codes.
 */

import { z } from 'zod';
import type { FastifyReply } from 'fastify';
import type { EngineErrorType } from '../core/analysis-engine.js';

// ── Error Mapping ─────────────────────────────────────────────────────

const ERROR_STATUS_MAP: Record<EngineErrorType | 'validation', number> = {
  invalid_ticker: 400,
  validation: 400,
  company_not_found: 404,
  no_data: 404,
  rate_limited: 429,
  api_error: 502,
};

export function errorToHttpStatus(errorType: EngineErrorType | 'validation'): number {
  return ERROR_STATUS_MAP[errorType] ?? 500;
}

// ── Query Validation ──────────────────────────────────────────────────

/** Parse a query string against a schema, or send a 400 and return null */
export function parseQuery<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: unknown,
  reply: FastifyReply
): T | null {
  const parsed = schema.safeParse(query);
  if (parsed.success) return parsed.data;

  const message = parsed.error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  reply.status(errorToHttpStatus('validation')).send({ error: { type: 'validation', message } });
  return null;
}
