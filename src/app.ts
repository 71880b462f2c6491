import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import {
  servicesPlugin,
  configRoutes,
  caseRoutes,
  healthRoutes,
  registerErrorHandler,
} from './interfaces/http/index.js';
import type { CaseDeskServices } from './interfaces/http/index.js';

export interface BuildServerOptions {
  /** Shared pino instance; logging is off when omitted. */
  logger?: FastifyBaseLogger;
}

/**
 * Builds the Fastify app without binding a port.
 *
 * Order:
 * 1) Error handler
 * 2) Services decoration
 * 3) HTTP routes
 */
export async function buildServer(
  services: CaseDeskServices,
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = options.logger
    ? Fastify({ loggerInstance: options.logger })
    : Fastify({ logger: false });

  registerErrorHandler(fastify);

  await fastify.register(servicesPlugin, services);
  await fastify.register(healthRoutes);
  await fastify.register(configRoutes);
  await fastify.register(caseRoutes);

  return fastify;
}
