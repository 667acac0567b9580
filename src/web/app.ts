import Fastify, { type FastifyInstance } from 'fastify';
import { registerAnalyzeRoutes } from './routes/analyze.js';
import { registerNormalizeRoutes } from './routes/normalize.js';
import { registerMetaRoutes } from './routes/meta.js';
import { createLogger } from '../core/logger.js';
import type { SecClient } from '../core/sec-client.js';
import type { ResponseCache } from '../core/cache.js';

const log = createLogger('web');

/** Collaborators the routes use; the process-wide ones when omitted */
export interface ServerDeps {
  client?: SecClient;
  cache?: ResponseCache;
}

/** Build the API server without listening, so tests can `inject` requests */
export function buildServer(deps: ServerDeps = {}): FastifyInstance {
  const server = Fastify({ logger: false });

  registerAnalyzeRoutes(server, deps);
  registerNormalizeRoutes(server);
  registerMetaRoutes(server, deps);

  server.setErrorHandler((error: Error, _request, reply) => {
    log.error(`Server error: ${error.message}`);
    reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}
