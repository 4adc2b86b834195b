import Fastify from 'fastify';
import { config } from '../config/index.js';
import { PipelineServices } from '../core/pipeline/index.js';
import { logger } from '../shared/utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { emailRoutes, healthRoutes, timelineRoutes } from './routes/index.js';
import { registerSwagger } from './swagger.config.js';

export async function createServer(services: PipelineServices) {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:standard',
              },
            }
          : undefined,
    },
    bodyLimit: 1024 * 1024, // 1MB of email text
  });

  // Register Swagger documentation
  await registerSwagger(fastify);

  // Register error handler
  fastify.setErrorHandler(errorHandler);

  // Register routes
  await fastify.register(healthRoutes, { services });
  await fastify.register(emailRoutes, { prefix: '/api/v1', services });
  await fastify.register(timelineRoutes, { prefix: '/api/v1', services });

  // Add request logging hook
  fastify.addHook('onRequest', async (request) => {
    logger.debug(
      { method: request.method, url: request.url },
      'Incoming request'
    );
  });

  // Add response logging hook
  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  return fastify;
}

export async function startServer(services: PipelineServices) {
  const server = await createServer(services);

  try {
    await server.listen({ port: config.port, host: '0.0.0.0' });
    logger.info({ port: config.port }, 'Server started');
    return server;
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    throw error;
  }
}
