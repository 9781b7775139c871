export * from './agents.js';
export * from './document.js';
export * from './run.js';
export * from './events.js';
