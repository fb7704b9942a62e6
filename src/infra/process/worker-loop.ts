/**
 * Worker side of the message loop, shared by the thread and process
 * bootstraps
 */

import { configureLoggerFromEnv } from '../../shared/logging/structured.js';
import * as logger from '../../shared/logging/logger.js';
import { registerBuiltinSpanResolvers } from '../storage/resolvers.js';
import { isParentMessage, serializeError, type ParentMessage, type WorkerMessage } from './protocol.js';
import { executeTask } from './task-runner.js';

export interface WorkerPort {
  post(message: WorkerMessage): void;
  onMessage(listener: (raw: unknown) => void): void;
  close(): void;
}

async function handle(message: ParentMessage, port: WorkerPort): Promise<void> {
  if (message.type === 'shutdown') {
    port.close();
    return;
  }
  try {
    const value = await executeTask(message.task, message.spanRef);
    port.post({ type: 'result', taskId: message.taskId, value });
  } catch (error) {
    port.post({ type: 'error', taskId: message.taskId, error: serializeError(error) });
  }
}

/**
 * Serve run requests on `port` until told to shut down
 */
export function runWorkerLoop(port: WorkerPort): void {
  configureLoggerFromEnv();
  registerBuiltinSpanResolvers();

  port.onMessage((raw) => {
    if (!isParentMessage(raw)) {
      logger.warn('Worker received an unexpected message');
      return;
    }
    handle(raw, port).catch((error: unknown) => {
      logger.error('Worker failed to reply', error);
    });
  });
  port.post({ type: 'ready', pid: process.pid });
}
