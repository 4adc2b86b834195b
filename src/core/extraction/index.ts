export * from './extractor.js';
export * from './products.js';
export * from './scoring.js';
export * from './gaps.js';
export * from './sender.js';
export * from './signals.js';
export { cleanContent } from './content.js';
