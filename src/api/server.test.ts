import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FastifyInstance } from 'fastify';
import { createServer } from './server.js';
import { createPipelineServices } from '../core/pipeline/index.js';
import { createEmailId } from '../core/extraction/index.js';

const WIDGET_ORDER = 'From: Jane Doe <jane@example.com>\n\nPlease quote 10 Widget Pro.\n';

describe('API server', () => {
  let workDir: string;
  let server: FastifyInstance;

  beforeEach(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'api-'));
    // An empty config directory means built-in defaults
    const services = await createPipelineServices({
      configDir: join(workDir, 'config'),
      dataDir: join(workDir, 'data'),
    });
    server = await createServer(services);
  });

  afterEach(async () => {
    await server.close();
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('should report the service as up', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', service: 'inquiry-quote-pipeline' });
    });

    it('should report readiness of storage and timeline', async () => {
      const response = await server.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ready');
      expect(body.checks.storage.status).toBe('healthy');
      expect(body.checks.timeline.status).toBe('healthy');
    });
  });

  describe('POST /api/v1/emails', () => {
    it('should process the email and return all artifacts', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/emails',
        payload: { content: WIDGET_ORDER },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.status).toBe('processed');
      expect(body.emailId).toBe(createEmailId(WIDGET_ORDER));
      expect(body.event.sender).toEqual({ name: 'Jane Doe', email: 'jane@example.com', confidence: 1 });
      expect(body.acknowledgment.to).toBe('jane@example.com');
      expect(body.quote.status).toBe('complete');
      expect(body.quote.total).toBe(246.38);
    });

    it('should return the stored artifacts for a repeated email', async () => {
      await server.inject({ method: 'POST', url: '/api/v1/emails', payload: { content: WIDGET_ORDER } });
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/emails',
        payload: { content: WIDGET_ORDER },
      });

      const body = response.json();
      expect(body.status).toBe('skipped');
      expect(body.quote.total).toBe(246.38);
    });

    it('should reject a request without content', async () => {
      const response = await server.inject({ method: 'POST', url: '/api/v1/emails', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject blank emails', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/api/v1/emails',
        payload: { content: '   ' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'EMPTY_INPUT', message: "Email 'api' is empty or unreadable" },
      });
    });
  });

  describe('GET /api/v1/quotes/:emailId and /api/v1/events/:emailId', () => {
    it('should return stored artifacts', async () => {
      await server.inject({ method: 'POST', url: '/api/v1/emails', payload: { content: WIDGET_ORDER } });
      const emailId = createEmailId(WIDGET_ORDER);

      const quote = await server.inject({ method: 'GET', url: `/api/v1/quotes/${emailId}` });
      expect(quote.statusCode).toBe(200);
      expect(quote.json().data.line_items).toEqual([
        { product: 'Widget Pro', quantity: 10, unit_price: 25, total: 250, unit: 'piece' },
      ]);

      const event = await server.inject({ method: 'GET', url: `/api/v1/events/${emailId}` });
      expect(event.statusCode).toBe(200);
      expect(event.json().data.raw_content).toBe(WIDGET_ORDER);
    });

    it('should answer 404 for unknown ids', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/events/unknown0000' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: "Parsed event with id 'unknown0000' not found" },
      });
    });
  });

  describe('GET /api/v1/timeline', () => {
    it('should return the latest entries', async () => {
      await server.inject({ method: 'POST', url: '/api/v1/emails', payload: { content: WIDGET_ORDER } });

      const response = await server.inject({ method: 'GET', url: '/api/v1/timeline?limit=2' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.map((entry: { action: string }) => entry.action)).toEqual([
        'ack',
        'quote',
      ]);
    });

    it('should summarize the log', async () => {
      await server.inject({ method: 'POST', url: '/api/v1/emails', payload: { content: WIDGET_ORDER } });

      const response = await server.inject({ method: 'GET', url: '/api/v1/timeline/stats' });

      expect(response.json().data).toEqual({
        totalEntries: 4,
        actions: { start: 1, parse: 1, ack: 1, quote: 1 },
        emailIds: [createEmailId(WIDGET_ORDER)],
        uniqueEmails: 1,
        errors: 0,
      });
    });
  });
});
