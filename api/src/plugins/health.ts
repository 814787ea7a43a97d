import { FastifyPluginAsync } from 'fastify';
import type { ReviewService } from '../services/review.js';
import type { DetailedHealthResponse, HealthCheckResponse } from '../types/api.js';
import { errorMessage } from '../types/errors.js';

export interface HealthPluginOptions {
  service: ReviewService;
  environment?: string;
  version?: string;
}

const healthPlugin: FastifyPluginAsync<HealthPluginOptions> = async (fastify, options) => {
  const { service, environment = 'development', version = '1.0.0' } = options;

  // Basic health check
  fastify.get<{ Reply: HealthCheckResponse }>('/health', {
    schema: {
      tags: ['health'],
      description: 'Basic health check endpoint',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['healthy', 'unhealthy', 'degraded'] },
            timestamp: { type: 'string' },
            responseTime: { type: 'string' },
            services: {
              type: 'object',
              properties: {
                github: { oneOf: [{ type: 'boolean' }, { type: 'string' }] },
              },
            },
          },
        },
      },
    },
  }, async (request, reply) => {
    const startTime = Date.now();

    try {
      await service.rateLimit();
      return reply.status(200).send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        responseTime: `${Date.now() - startTime}ms`,
        services: { github: 'healthy' },
      });
    } catch (error) {
      request.log.warn({ err: error }, 'GitHub health check failed');
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        responseTime: `${Date.now() - startTime}ms`,
        services: { github: errorMessage(error) },
      });
    }
  });

  // Liveness probe (for Kubernetes)
  fastify.get('/health/live', {
    schema: {
      tags: ['health'],
      description: 'Liveness probe endpoint',
    },
  }, async () => {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
    };
  });

  // Readiness probe: not ready once the work pools stop taking tasks
  fastify.get('/health/ready', {
    schema: {
      tags: ['health'],
      description: 'Readiness probe endpoint',
    },
  }, async (_request, reply) => {
    if (service.pools.repository.isClosed) {
      return reply.status(503).send({
        status: 'not_ready',
        error: 'Work pools are shut down',
        timestamp: new Date().toISOString(),
      });
    }
    return {
      status: 'ready',
      timestamp: new Date().toISOString(),
    };
  });

  // Detailed health information
  fastify.get<{ Reply: DetailedHealthResponse }>('/health/detailed', {
    schema: {
      tags: ['health'],
      description: 'Detailed health check with engine counters and GitHub quota',
    },
  }, async (request, reply) => {
    const startTime = Date.now();
    const details: DetailedHealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      environment,
      version,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      services: { github: 'healthy' },
      engine: service.stats(),
    };

    try {
      const rateLimit = await service.rateLimit();
      details.rateLimit = {
        limit: rateLimit.limit,
        remaining: rateLimit.remaining,
        used: rateLimit.used,
        reset: rateLimit.reset.toISOString(),
      };
      if (rateLimit.remaining === 0) {
        details.status = 'degraded';
        details.services.github = 'rate limited';
      }
    } catch (error) {
      request.log.warn({ err: error }, 'GitHub health check failed');
      details.status = 'degraded';
      details.services.github = errorMessage(error);
    }

    details.responseTime = `${Date.now() - startTime}ms`;
    return reply.status(details.status === 'healthy' ? 200 : 503).send(details);
  });
};

export default healthPlugin;
