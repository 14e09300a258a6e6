/**
 * Fastify app setup
 *
 * The deployment is decorated onto the Fastify instance, so every route
 * reaches the services as `fastify.deployment`.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { Deployment } from '@picstore/deployment';

import { formatErrorResponse, statusCodeFor } from './error.js';
import { healthRoutes } from './routes/health.js';
import { mediaRoutes } from './routes/media.js';
import { pictureRoutes } from './routes/pictures.js';
import { productRoutes } from './routes/products.js';

export interface ServerConfig {
  deployment: Deployment;
  /** Fastify logger option; defaults to pino at the configured level */
  logger?: FastifyServerOptions['logger'];
}

export async function createApp(config: ServerConfig): Promise<FastifyInstance> {
  const settings = config.deployment.config();

  const app = Fastify({
    logger: config.logger ?? { level: settings.get('logLevel') }
  });

  await app.register(cors, {
    origin: true,
    credentials: true
  });

  // One file per request; the route enforces the exact byte limit
  await app.register(multipart, {
    limits: {
      fileSize: settings.get('maximumFileSizeBytes') + 1,
      files: 1
    }
  });

  app.decorate('deployment', config.deployment);

  app.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeFor(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Request failed');
    } else {
      request.log.debug({ err: error }, 'Request rejected');
    }
    return reply.status(statusCode).send(formatErrorResponse(error));
  });

  // ========================================
  // API routes
  // ========================================

  await app.register(healthRoutes, { prefix: '/api' });
  await app.register(pictureRoutes, { prefix: '/api' });
  await app.register(productRoutes, { prefix: '/api' });

  // ========================================
  // Media files
  // ========================================

  await app.register(mediaRoutes);

  return app;
}

export async function startServer(config: ServerConfig): Promise<FastifyInstance> {
  const app = await createApp(config);
  const settings = config.deployment.config();

  try {
    const address = await app.listen({
      port: settings.get('port'),
      host: settings.get('host')
    });
    app.log.info(`Server listening on ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    deployment: Deployment;
  }
}
