import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../shared/utils/errors.js';
import { RouteOptions } from './health.route.js';

// Request schemas
const ProcessEmailSchema = z.object({
  content: z.string(),
  source: z.string().min(1).optional(),
});

const EmailIdParamsSchema = z.object({
  emailId: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Invalid email id'),
});

const artifactResponse = (description: string) => ({
  description,
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    data: { type: 'object', additionalProperties: true },
  },
});

const notFoundResponse = {
  description: 'No artifact for this email id',
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
      },
    },
  },
};

export async function emailRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pipeline, store } = options.services;

  // Run an email through the pipeline
  fastify.post(
    '/emails',
    {
      schema: {
        tags: ['Emails'],
        summary: 'Process an inquiry email',
        description: `
Parse the email, draft an acknowledgment and generate a quote. Emails whose id was already
processed are reported as \`skipped\` and their stored artifacts are returned.

**Example using curl:**
\`\`\`bash
curl -X POST http://localhost:3000/api/v1/emails \\
  -H 'Content-Type: application/json' \\
  -d '{"content":"From: Jane Doe <jane@example.com>\\n\\nWe need 10 Widget Pro."}'
\`\`\`
        `,
        body: {
          type: 'object',
          required: ['content'],
          properties: {
            content: { type: 'string', description: 'Raw email text' },
            source: { type: 'string', description: 'Label for logs, e.g. a file name' },
          },
        },
        response: {
          200: {
            description: 'Email processed',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              emailId: { type: 'string' },
              status: { type: 'string', enum: ['processed', 'skipped'] },
              event: { type: 'object', additionalProperties: true, nullable: true },
              acknowledgment: { type: 'object', additionalProperties: true, nullable: true },
              quote: { type: 'object', additionalProperties: true, nullable: true },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = ProcessEmailSchema.parse(request.body);
      const outcome = await pipeline.processEmail(body.content, { source: body.source });

      if (outcome.status === 'skipped') {
        const [event, acknowledgment, quote] = await Promise.all([
          store.getEvent(outcome.emailId),
          store.getAcknowledgment(outcome.emailId),
          store.getQuote(outcome.emailId),
        ]);

        return reply.send({
          success: true,
          emailId: outcome.emailId,
          status: outcome.status,
          event,
          acknowledgment,
          quote,
        });
      }

      return reply.send({
        success: true,
        emailId: outcome.emailId,
        status: outcome.status,
        event: outcome.event,
        acknowledgment: outcome.acknowledgment,
        quote: outcome.quote,
      });
    }
  );

  // Get the quote for an email
  fastify.get(
    '/quotes/:emailId',
    {
      schema: {
        tags: ['Emails'],
        summary: 'Get quote',
        params: {
          type: 'object',
          required: ['emailId'],
          properties: {
            emailId: { type: 'string' },
          },
        },
        response: {
          200: artifactResponse('Stored quote'),
          404: notFoundResponse,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const quote = await store.getQuote(emailId);
      if (!quote) {
        throw new NotFoundError('Quote', emailId);
      }

      return reply.send({ success: true, data: quote });
    }
  );

  // Get the parsed event for an email
  fastify.get(
    '/events/:emailId',
    {
      schema: {
        tags: ['Emails'],
        summary: 'Get parsed event',
        params: {
          type: 'object',
          required: ['emailId'],
          properties: {
            emailId: { type: 'string' },
          },
        },
        response: {
          200: artifactResponse('Stored parsed event'),
          404: notFoundResponse,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const event = await store.getEvent(emailId);
      if (!event) {
        throw new NotFoundError('Parsed event', emailId);
      }

      return reply.send({ success: true, data: event });
    }
  );

  // Get the acknowledgment draft for an email
  fastify.get(
    '/acknowledgments/:emailId',
    {
      schema: {
        tags: ['Emails'],
        summary: 'Get acknowledgment draft',
        params: {
          type: 'object',
          required: ['emailId'],
          properties: {
            emailId: { type: 'string' },
          },
        },
        response: {
          200: artifactResponse('Stored acknowledgment'),
          404: notFoundResponse,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const acknowledgment = await store.getAcknowledgment(emailId);
      if (!acknowledgment) {
        throw new NotFoundError('Acknowledgment', emailId);
      }

      return reply.send({ success: true, data: acknowledgment });
    }
  );
}
