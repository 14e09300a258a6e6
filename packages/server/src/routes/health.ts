/**
 * Health check routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { getAppVersion } from '@picstore/utils';

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: string;
}

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  // GET /api/health
  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      version: getAppVersion(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString()
    };
  });

  // GET /api/health/ready - Readiness: the database answers
  fastify.get('/health/ready', async (_request, reply) => {
    try {
      fastify.deployment.db().database.prepare('SELECT 1').get();
      return reply.status(200).send({ ready: true });
    } catch (err) {
      fastify.log.warn({ err }, 'Readiness check failed');
      return reply.status(503).send({ ready: false });
    }
  });

  // GET /api/health/live
  fastify.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ alive: true });
  });
};
