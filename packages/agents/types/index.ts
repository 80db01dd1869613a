export * from './context.js';
export * from './stages.js';
export * from './decision.js';
export * from './events.js';
export * from './reasoner.js';
