import type { FastifyInstance } from 'fastify';
import { METRIC_DEFINITIONS, METRIC_TABLE_VERSION } from '../../processing/metric-definitions.js';
import { TICKER_CORRECTIONS_VERSION } from '../../processing/ticker-normalizer.js';
import { getCache } from '../../core/cache.js';
import { createLogger } from '../../core/logger.js';
import type { ServerDeps } from '../app.js';

const log = createLogger('web');

export function registerMetaRoutes(server: FastifyInstance, deps: ServerDeps) {
  server.get('/api/metrics', async () => {
    return {
      version: METRIC_TABLE_VERSION,
      ticker_corrections_version: TICKER_CORRECTIONS_VERSION,
      metrics: METRIC_DEFINITIONS.map(m => ({
        id: m.id,
        display_name: m.display_name,
        description: m.description,
        statement_type: m.statement_type,
        unit_type: m.unit_type,
        concepts: m.concepts,
      })),
    };
  });

  server.get('/api/cache-stats', async () => {
    try {
      const stats = (deps.cache ?? getCache()).stats();
      return {
        entries: stats.entries,
        size_bytes: stats.sizeBytes,
        size_mb: (stats.sizeBytes / 1024 / 1024).toFixed(1),
      };
    } catch (err) {
      log.debug(`cache stats unavailable: ${err instanceof Error ? err.message : String(err)}`);
      return { entries: 0, size_bytes: 0, size_mb: '0.0' };
    }
  });
}
