/**
 * Child process bootstrap
 */

import { runWorkerLoop } from './worker-loop.js';

if (typeof process.send !== 'function') {
  throw new Error('process-entry must run with an IPC channel');
}

runWorkerLoop({
  post: (message) => {
    process.send?.(message);
  },
  onMessage: (listener) => {
    process.on('message', listener);
  },
  close: () => {
    process.exit(0);
  },
});
