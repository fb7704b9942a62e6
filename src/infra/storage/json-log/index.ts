export * from './parse-json-log.js';
export * from './json-log-tracing.js';
