export * from './quote.engine.js';
export * from './tiers.js';
export * from './money.js';
export * from './summary.js';
