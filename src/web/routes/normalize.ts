import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import { validateTicker } from '../../processing/ticker-normalizer.js';
import { errorToHttpStatus, parseQuery } from '../serialization.js';

const normalizeQuery = z.object({
  ticker: z.string({ required_error: 'ticker is required' }),
});

export function registerNormalizeRoutes(server: FastifyInstance) {
  server.get('/api/normalize', async (request, reply) => {
    const query = parseQuery(normalizeQuery, request.query, reply);
    if (!query) return reply;

    const result = validateTicker(query.ticker);
    if (!result.success) {
      return reply.status(errorToHttpStatus('invalid_ticker')).send({
        error: {
          type: 'invalid_ticker',
          message: result.message,
          suggestions: result.error.suggestions,
        },
      });
    }

    return reply.send({
      symbol: result.ticker.symbol,
      input: result.ticker.input,
      warnings: result.ticker.warnings,
    });
  });
}
