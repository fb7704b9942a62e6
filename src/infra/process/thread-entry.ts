/**
 * Worker thread bootstrap
 */

import { parentPort } from 'node:worker_threads';
import { runWorkerLoop } from './worker-loop.js';

const port = parentPort;
if (!port) {
  throw new Error('thread-entry must run inside a worker thread');
}

runWorkerLoop({
  post: (message) => port.postMessage(message),
  onMessage: (listener) => port.on('message', listener),
  close: () => port.close(),
});
