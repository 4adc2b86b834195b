import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { initializeTemplates, renderTemplate } from './engine.js';
import {
  AcknowledgmentBodyContext,
  AcknowledgmentClosingContext,
  AcknowledgmentGreetingContext,
  AcknowledgmentSubjectContext,
} from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const TEMPLATES_DIR = join(__dirname, 'templates');
initializeTemplates(TEMPLATES_DIR);

/**
 * Type-safe accessors for the outbound message templates
 */
export const messages = {
  acknowledgment: {
    subject: (ctx: AcknowledgmentSubjectContext) => renderTemplate('acknowledgment.subject', ctx),
    greeting: (ctx: AcknowledgmentGreetingContext) => renderTemplate('acknowledgment.greeting', ctx),
    body: (ctx: AcknowledgmentBodyContext) => renderTemplate('acknowledgment.body', ctx),
    closing: (ctx: AcknowledgmentClosingContext) => renderTemplate('acknowledgment.closing', ctx),
  },
};

export * from './types.js';
export * from './engine.js';
