import { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

export async function registerSwagger(fastify: FastifyInstance) {
  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Inquiry Quote Pipeline API',
        description: `
## Overview

Turns free-form customer inquiry emails into a parsed event, an acknowledgment draft and a
priced quote.

### Pipeline

1. **Intake** - Extract sender, products, quantities, urgency and currency
2. **Acknowledgment** - Draft a reply with follow-up questions for any gaps
3. **Auto-Quote** - Price the request from the catalog and discount tiers

A quote is \`complete\` only when every product is in the catalog and has a quantity.
Otherwise it is \`pending\` and lists the reasons.
        `,
        version: '1.0.0',
        license: {
          name: 'MIT',
        },
      },
      servers: [
        {
          url: 'http://localhost:3000',
          description: 'Development server',
        },
      ],
      tags: [
        {
          name: 'Health',
          description: 'Health check endpoints',
        },
        {
          name: 'Emails',
          description: 'Email intake and generated artifacts',
        },
        {
          name: 'Timeline',
          description: 'Activity log',
        },
      ],
      components: {
        schemas: {
          ErrorResponse: {
            type: 'object',
            properties: {
              success: { type: 'boolean', example: false },
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                },
              },
            },
          },
          ParsedEvent: {
            type: 'object',
            properties: {
              email_id: { type: 'string' },
              timestamp: { type: 'string', format: 'date-time' },
              sender: {
                type: 'object',
                properties: {
                  name: { type: 'string', nullable: true },
                  email: { type: 'string', nullable: true },
                  confidence: { type: 'number' },
                },
              },
              products: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    name: { type: 'string' },
                    quantity: { type: 'number', nullable: true },
                    unit: { type: 'string', nullable: true },
                    confidence: { type: 'number' },
                    notes: { type: 'string' },
                  },
                },
              },
              urgency: { type: 'string', nullable: true, enum: ['high', 'medium', 'low'] },
              currency: { type: 'string', nullable: true },
              gaps: { type: 'array', items: { type: 'string' } },
              raw_content: { type: 'string' },
            },
          },
          Quote: {
            type: 'object',
            properties: {
              email_id: { type: 'string' },
              timestamp: { type: 'string', format: 'date-time' },
              status: { type: 'string', enum: ['complete', 'pending'] },
              line_items: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    product: { type: 'string' },
                    quantity: { type: 'number' },
                    unit_price: { type: 'number' },
                    total: { type: 'number' },
                    unit: { type: 'string' },
                  },
                },
              },
              subtotal: { type: 'number' },
              discount: { type: 'number' },
              tax: { type: 'number' },
              total: { type: 'number' },
              currency: { type: 'string' },
              pending_reasons: { type: 'array', items: { type: 'string' } },
              valid_until: { type: 'string', format: 'date-time' },
              discount_rate: { type: 'number' },
            },
          },
          Acknowledgment: {
            type: 'object',
            properties: {
              email_id: { type: 'string' },
              timestamp: { type: 'string', format: 'date-time' },
              to: { type: 'string', nullable: true },
              subject: { type: 'string' },
              greeting: { type: 'string' },
              body: { type: 'string' },
              questions: { type: 'array', items: { type: 'string' } },
              closing: { type: 'string' },
              sla_hours: { type: 'number' },
              urgency_level: { type: 'string', nullable: true },
            },
          },
          TimelineEntry: {
            type: 'object',
            properties: {
              timestamp: { type: 'string', format: 'date-time' },
              action: { type: 'string' },
              email_id: { type: 'string' },
              message: { type: 'string' },
              details: { type: 'object' },
            },
          },
          HealthCheck: {
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ok'] },
              timestamp: { type: 'string', format: 'date-time' },
              service: { type: 'string' },
            },
          },
          ReadinessCheck: {
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ready', 'not_ready'] },
              timestamp: { type: 'string', format: 'date-time' },
              checks: {
                type: 'object',
                properties: {
                  storage: { $ref: '#/components/schemas/ServiceCheck' },
                  timeline: { $ref: '#/components/schemas/ServiceCheck' },
                },
              },
            },
          },
          ServiceCheck: {
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['healthy', 'unhealthy'] },
              latencyMs: { type: 'integer' },
              error: { type: 'string' },
            },
          },
        },
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
    },
    staticCSP: true,
  });
}
