import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ReviewService } from '../services/review.js';
import { ReviewRequestSchema } from '../types/api.js';
import { FatalRunError } from '../types/errors.js';
import { classifyError } from '../services/engine/retry.js';
import { resolveWindow } from '../utils/window.js';

export interface ReviewsPluginOptions {
  service: ReviewService;
  /** Used when a request names no organization; a lone `user` then filters this organization by author. */
  defaultOrganization?: string;
}

const summarySchema = {
  type: 'object',
  additionalProperties: true,
};

const reviewsPlugin: FastifyPluginAsync<ReviewsPluginOptions> = async (fastify, options) => {
  const { service, defaultOrganization } = options;

  // Run a review
  fastify.post('/reviews', {
    schema: {
      tags: ['reviews'],
      description: 'Run a review for an organization or user and write its snapshot',
      body: {
        type: 'object',
        properties: {
          organization: { type: 'string' },
          user: { type: 'string' },
          team: { type: 'string' },
          since: { type: 'string' },
          until: { type: 'string' },
          days: { type: 'integer', minimum: 1, maximum: 365 },
          repositories: { type: 'array', items: { type: 'string' } },
        },
      },
      response: {
        201: {
          type: 'object',
          properties: {
            organization: { type: 'string' },
            path: { type: 'string' },
            window: {
              type: 'object',
              properties: {
                since: { type: 'string', format: 'date-time' },
                until: { type: 'string', format: 'date-time' },
              },
            },
            summary: summarySchema,
          },
        },
      },
    },
  }, async (request, reply) => {
    try {
      const body = ReviewRequestSchema.parse(request.body ?? {});
      const organization = body.organization ?? defaultOrganization;

      if (!organization && !body.user) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: 'An organization or a user is required',
        });
      }

      const window = resolveWindow({ since: body.since, until: body.until, days: body.days });
      const result = await service.run({
        organization,
        user: body.user,
        team: body.team,
        window,
        repositories: body.repositories,
      });

      return reply.status(201).send({
        organization: result.organization.name,
        path: result.path,
        window: result.snapshot.window,
        summary: result.summary,
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: 'Invalid review request',
          details: error.errors,
        });
      }
      if (error instanceof RangeError) {
        return reply.status(400).send({
          error: 'Bad Request',
          message: error.message,
        });
      }
      if (error instanceof FatalRunError) {
        const unauthorized = classifyError(error.cause).kind === 'auth';
        request.log.error({ err: error }, 'Review run failed');
        return reply.status(unauthorized ? 401 : 502).send({
          error: unauthorized ? 'Unauthorized' : 'Bad Gateway',
          message: error.message,
          stage: error.stage,
        });
      }
      throw error;
    }
  });

  // Latest written snapshot
  fastify.get('/reviews/latest', {
    schema: {
      tags: ['reviews'],
      description: 'Most recent review snapshot',
    },
  }, async (_request, reply) => {
    const latest = await service.latest();
    if (!latest) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'No review snapshot has been written yet',
      });
    }
    return { path: latest.path, ...latest.snapshot };
  });
};

export default reviewsPlugin;
