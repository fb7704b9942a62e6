export * from './protocol.js';
export * from './entry-path.js';
export * from './task-runner.js';
export * from './channel.js';
export * from './traced-worker.js';
export * from './worker-pool.js';
