import Handlebars from 'handlebars';
import { readFileSync, readdirSync, existsSync } from 'fs';
import { join } from 'path';
import { logger } from '../shared/utils/logger.js';

// Isolated environment: helpers and partials never leak into the global instance
const hbs = Handlebars.create();

hbs.registerHelper('lowercase', (str: string) => str?.toLowerCase());

hbs.registerHelper(
  'ifEquals',
  function (this: unknown, arg1: unknown, arg2: unknown, options: Handlebars.HelperOptions) {
    return arg1 === arg2 ? options.fn(this) : options.inverse(this);
  }
);

hbs.registerHelper('default', (value: unknown, defaultValue: unknown) => {
  return value ?? defaultValue;
});

hbs.registerHelper('join', (arr: unknown[], separator: string) => {
  if (!Array.isArray(arr)) return '';
  return arr.join(typeof separator === 'string' ? separator : ', ');
});

// Template cache
const templateCache = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Load all `.hbs` files of a directory. Messages are plain text, so nothing is
 * HTML-escaped.
 */
export function initializeTemplates(templatesDir: string): void {
  if (!existsSync(templatesDir)) {
    logger.warn({ templatesDir }, 'Templates directory does not exist');
    return;
  }

  const files = readdirSync(templatesDir).filter((f) => f.endsWith('.hbs'));

  for (const file of files) {
    const templateName = file.replace('.hbs', '');
    const templateSource = readFileSync(join(templatesDir, file), 'utf-8');

    try {
      templateCache.set(templateName, hbs.compile(templateSource, { noEscape: true }));
    } catch (error) {
      logger.error({ template: templateName, error }, 'Failed to compile template');
      throw error;
    }
  }

  logger.debug({ count: templateCache.size }, 'Message templates loaded');
}

/**
 * Render a template with the given context. Trailing whitespace is dropped.
 */
export function renderTemplate<T extends object>(templateName: string, context: T): string {
  const template = templateCache.get(templateName);
  if (!template) {
    throw new Error(`Template not found: ${templateName}`);
  }
  return template(context).trimEnd();
}
