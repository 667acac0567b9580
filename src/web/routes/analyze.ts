import { z } from 'zod';
import type { FastifyInstance } from 'fastify';
import { analyzeCompany } from '../../core/analysis-engine.js';
import { getSecClient } from '../../core/sec-client.js';
import { parseMetricList } from '../../processing/metric-definitions.js';
import { toJsonPayload } from '../../output/json-renderer.js';
import { renderCsv } from '../../output/csv-renderer.js';
import { errorToHttpStatus, parseQuery } from '../serialization.js';
import type { ServerDeps } from '../app.js';
import type { Metric } from '../../core/types.js';

const analyzeQuery = z.object({
  ticker: z.string().trim().min(1, 'ticker is required'),
  years: z.coerce.number().int().min(1).max(30).optional(),
  metrics: z.string().optional(),
  cagr_years: z.coerce.number().int().min(2).optional(),
  format: z.enum(['json', 'csv']).default('json'),
  section: z.enum(['series', 'growth', 'quality']).default('series'),
});

export function registerAnalyzeRoutes(server: FastifyInstance, deps: ServerDeps) {
  server.get('/api/analyze', async (request, reply) => {
    const query = parseQuery(analyzeQuery, request.query, reply);
    if (!query) return reply;

    let metrics: Metric[] | undefined;
    if (query.metrics) {
      const parsed = parseMetricList(query.metrics);
      if (parsed.unknown.length > 0) {
        return reply.status(errorToHttpStatus('validation')).send({
          error: { type: 'validation', message: `Unknown metric: ${parsed.unknown.join(', ')}` },
        });
      }
      metrics = parsed.metrics;
    }

    const outcome = await analyzeCompany(
      { ticker: query.ticker, years: query.years, metrics, cagrYears: query.cagr_years },
      deps.client ?? getSecClient()
    );

    if (!outcome.success) {
      return reply.status(errorToHttpStatus(outcome.error.type)).send({ error: outcome.error });
    }

    if (query.format === 'csv') {
      return reply
        .type('text/csv; charset=utf-8')
        .header('content-disposition', `attachment; filename="${outcome.ticker.symbol}-${query.section}.csv"`)
        .send(renderCsv(outcome.result, query.section));
    }

    return reply.send({ ticker: outcome.ticker, ...toJsonPayload(outcome.result) });
  });
}
