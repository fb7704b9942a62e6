export * from './span-db.js';
export * from './sqlite-tracing.js';
