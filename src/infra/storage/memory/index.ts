export * from './memory-tracing.js';
