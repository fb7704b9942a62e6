export * from './protocol.js';
export * from './client.js';
export * from './server.js';
export * from './server-process.js';
export * from './remote-tracing.js';
