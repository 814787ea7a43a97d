import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { z } from 'zod';
import { loadConfig, type AppConfig } from './config/index.js';
import { createReviewService, type ReviewService } from './services/review.js';
import { classifyError } from './services/engine/retry.js';
import type { ApiError } from './types/api.js';
import { FatalRunError } from './types/errors.js';
import { buildLoggerOptions, createLogger, setLogger } from './utils/logger.js';

// Import plugins
import healthPlugin from './plugins/health.js';
import reviewsPlugin from './plugins/reviews.js';

export const API_VERSION = '1.0.0';

export interface ServerOptions {
  config: AppConfig;
  service: ReviewService;
  /** Request logging with the configured level; off in tests. */
  logging?: boolean;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config, service, logging = true } = options;

  const server = Fastify({
    logger: logging ? buildLoggerOptions(config.logging) : false,
    bodyLimit: 1024 * 1024, // 1MB
  });

  // CORS
  await server.register(cors, {
    origin: config.server.corsOrigin,
    credentials: true,
  });

  // Security headers
  await server.register(helmet);

  // Swagger documentation
  await server.register(swagger, {
    swagger: {
      info: {
        title: 'PR Flow Metrics API',
        description: 'Pull request flow, review and bottleneck metrics for GitHub organizations',
        version: API_VERSION,
      },
      host: `${config.server.host}:${config.server.port}`,
      schemes: ['http'],
      consumes: ['application/json'],
      produces: ['application/json'],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'reviews', description: 'Review runs and snapshots' },
      ],
    },
  });

  await server.register(swaggerUi, {
    routePrefix: '/api/docs',
    uiConfig: {
      docExpansion: 'full',
      deepLinking: false,
    },
  });

  // API routes
  await server.register(healthPlugin, { service, environment: config.environment, version: API_VERSION });
  await server.register(reviewsPlugin, {
    prefix: '/api/v1',
    service,
    defaultOrganization: config.github.organization,
  });

  // Root endpoint
  server.get('/', async () => {
    return {
      name: 'PR Flow Metrics API',
      version: API_VERSION,
      environment: config.environment,
      api_version: 'v1',
      timestamp: new Date().toISOString(),
      endpoints: {
        health: '/health',
        api_v1: '/api/v1',
        docs: '/api/docs',
      },
    };
  });

  // Error handler
  server.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, 'Request failed');

    let statusCode = error.statusCode || 500;
    if (error instanceof z.ZodError) {
      statusCode = 400;
    } else if (error instanceof FatalRunError) {
      statusCode = classifyError(error.cause).kind === 'auth' ? 401 : 502;
    }

    const body: ApiError = {
      error: error.name || 'Internal Server Error',
      message: error.message || 'An unexpected error occurred',
      statusCode,
      timestamp: new Date().toISOString(),
      ...(config.environment === 'development' && { stack: error.stack }),
    };
    reply.status(statusCode).send(body);
  });

  // 404 handler
  server.setNotFoundHandler((request, reply) => {
    const body: ApiError = {
      error: 'Not Found',
      message: `Cannot ${request.method} ${request.url}`,
      statusCode: 404,
      timestamp: new Date().toISOString(),
    };
    reply.status(404).send(body);
  });

  server.addHook('onClose', async () => {
    await service.shutdown();
  });

  return server;
}

// Initialize the engine and start server
export async function startServer(config: AppConfig = loadConfig()): Promise<FastifyInstance> {
  const logger = createLogger(config.logging);
  setLogger(logger);

  const service = createReviewService(config, logger);
  const server = await buildServer({ config, service });

  // Graceful shutdown: stop accepting requests, drain the pools, close the client
  const gracefulShutdown = async (signal: string) => {
    logger.info({ signal }, 'Graceful shutdown initiated...');
    try {
      await server.close();
      logger.info('All work drained. Exiting...');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', (signal) => void gracefulShutdown(signal));
  process.once('SIGINT', (signal) => void gracefulShutdown(signal));

  const { host, port } = config.server;
  await server.listen({ port, host });

  logger.info(`API Server running on http://${host}:${port}`);
  logger.info(`Environment: ${config.environment}`);
  logger.info(`API Documentation: http://${host}:${port}/api/docs`);
  return server;
}

// Start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((error: unknown) => {
    console.error('Failed to start server', error);
    process.exit(1);
  });
}
