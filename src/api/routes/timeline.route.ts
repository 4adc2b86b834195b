import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { TimelineEntry } from '../../core/timeline/timeline.service.js';
import { RouteOptions } from './health.route.js';

const TimelineQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(10),
  emailId: z.string().min(1).optional(),
  action: z.string().min(1).optional(),
});

const timelineEntry = {
  type: 'object',
  properties: {
    timestamp: { type: 'string' },
    action: { type: 'string' },
    email_id: { type: 'string' },
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true },
  },
};

export async function timelineRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { timeline } = options.services;

  // Recent activity, optionally filtered by email or action
  fastify.get(
    '/timeline',
    {
      schema: {
        tags: ['Timeline'],
        summary: 'List activity log entries',
        description:
          'Returns the most recent entries, oldest first. With `emailId` or `action` the whole log is filtered and the last `limit` matches are returned.',
        querystring: {
          type: 'object',
          properties: {
            limit: { type: 'integer', minimum: 1, maximum: 500, default: 10 },
            emailId: { type: 'string' },
            action: { type: 'string' },
          },
        },
        response: {
          200: {
            description: 'Timeline entries',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              data: { type: 'array', items: timelineEntry },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const query = TimelineQuerySchema.parse(request.query);

      let entries: TimelineEntry[];
      if (query.emailId) {
        entries = await timeline.getByEmail(query.emailId);
      } else if (query.action) {
        entries = await timeline.getByAction(query.action);
      } else {
        entries = await timeline.getRecent(query.limit);
      }

      if (query.emailId && query.action) {
        entries = entries.filter((entry) => entry.action === query.action);
      }

      return reply.send({ success: true, data: entries.slice(-query.limit) });
    }
  );

  // Counts over the whole log
  fastify.get(
    '/timeline/stats',
    {
      schema: {
        tags: ['Timeline'],
        summary: 'Activity log statistics',
        response: {
          200: {
            description: 'Summary statistics',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              data: {
                type: 'object',
                properties: {
                  totalEntries: { type: 'integer' },
                  actions: { type: 'object', additionalProperties: { type: 'integer' } },
                  emailIds: { type: 'array', items: { type: 'string' } },
                  uniqueEmails: { type: 'integer' },
                  errors: { type: 'integer' },
                },
              },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const stats = await timeline.getSummaryStats();
      return reply.send({ success: true, data: stats });
    }
  );
}
