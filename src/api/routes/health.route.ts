import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { PipelineServices } from '../../core/pipeline/index.js';

export interface RouteOptions {
  services: PipelineServices;
}

type ServiceCheck = { status: 'healthy' | 'unhealthy'; latencyMs?: number; error?: string };

export async function healthRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { store, timeline } = options.services;

  // Basic health check
  fastify.get(
    '/health',
    {
      schema: {
        tags: ['Health'],
        summary: 'Basic health check',
        description: 'Returns basic service status',
        response: {
          200: {
            description: 'Service is healthy',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ok'] },
              timestamp: { type: 'string', format: 'date-time' },
              service: { type: 'string' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'inquiry-quote-pipeline',
      });
    }
  );

  // Detailed readiness check
  fastify.get(
    '/health/ready',
    {
      schema: {
        tags: ['Health'],
        summary: 'Detailed readiness check',
        description: 'Checks that the artifact directories are writable and the timeline is readable',
        response: {
          200: {
            description: 'All checks passed',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ready', 'not_ready'] },
              timestamp: { type: 'string', format: 'date-time' },
              checks: { type: 'object', additionalProperties: true },
            },
          },
          503: {
            description: 'One or more checks failed',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['not_ready'] },
              timestamp: { type: 'string', format: 'date-time' },
              checks: { type: 'object', additionalProperties: true },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const checks: Record<string, ServiceCheck> = {};

      // Check artifact storage
      const storageStart = Date.now();
      const storageHealthy = await store.healthCheck();
      checks.storage = storageHealthy
        ? { status: 'healthy', latencyMs: Date.now() - storageStart }
        : { status: 'unhealthy', error: `Artifact directories under ${store.root} are not writable` };

      // Check timeline
      const timelineStart = Date.now();
      try {
        await timeline.getRecent(1);
        checks.timeline = { status: 'healthy', latencyMs: Date.now() - timelineStart };
      } catch (error) {
        checks.timeline = {
          status: 'unhealthy',
          error: error instanceof Error ? error.message : 'Unknown error',
        };
      }

      const allHealthy = Object.values(checks).every((check) => check.status === 'healthy');

      return reply.status(allHealthy ? 200 : 503).send({
        status: allHealthy ? 'ready' : 'not_ready',
        timestamp: new Date().toISOString(),
        checks,
      });
    }
  );
}
