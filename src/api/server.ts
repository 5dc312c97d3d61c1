/**
 * Fastify HTTP server for the query API. Creates the instance with logging and
 * registers routes; listening is left to the runner.
 */

import Fastify, { type FastifyInstance } from 'fastify';

import type { RunnerConfig } from '../schemas/config.js';
import type { RouteDeps } from './routes.js';
import { registerRoutes } from './routes.js';

/**
 * Create and configure the Fastify server. Routes are registered but server is not started.
 */
export function createServer(
  config: RunnerConfig,
  deps: RouteDeps,
): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.log.level,
      ...(config.log.file ? { file: config.log.file } : {}),
    },
  });

  registerRoutes(app, { triggerLimit: config.triggerLimit, ...deps });

  return app;
}
