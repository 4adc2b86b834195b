export * from './event.types.js';
export * from './quote.types.js';
export * from './acknowledgment.types.js';
export * from './pipeline.types.js';
export * from './agent.types.js';
