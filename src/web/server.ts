#!/usr/bin/env node

/**
 * HTTP API server for filing-metrics.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { buildServer } from './app.js';
import { getConfig } from '../core/config.js';
import { setLogLevel } from '../core/logger.js';
import { closeCache } from '../core/cache.js';

const config = getConfig();
setLogLevel(config.logLevel);

const server = buildServer();
server.addHook('onClose', async () => {
  closeCache();
});

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  filing-metrics API
  http://localhost:${config.port}

  Try: http://localhost:${config.port}/api/analyze?ticker=AAPL
  Press Ctrl+C to stop
`);
