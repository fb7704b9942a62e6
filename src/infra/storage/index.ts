export * from './memory/index.js';
export * from './json-log/index.js';
export * from './sqlite/index.js';
export * from './remote/index.js';
export * from './resolvers.js';
