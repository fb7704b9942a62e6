/**
 * Worker errors
 *
 * Raised in the parent when a task shipped to a worker thread or child
 * process fails or the worker goes away before answering.
 */

import { TreetraceError } from './base.js';

/**
 * Worker error codes - union of all possible worker error types
 */
export type WorkerErrorCode =
  | 'WORKER_ERROR'
  | 'WORKER_TASK_FAILED'
  | 'WORKER_EXITED';

/**
 * Base class for all worker errors
 */
export class WorkerError extends TreetraceError {
  declare readonly code: WorkerErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    (this as { code: WorkerErrorCode }).code = 'WORKER_ERROR';
  }
}

/**
 * Error thrown by user code inside a worker, rebuilt in the parent
 *
 * `name`, `message` and `stack` are the ones raised in the worker.
 */
export class WorkerTaskError extends WorkerError {
  declare readonly code: 'WORKER_TASK_FAILED';
  readonly remoteName: string;
  readonly task: string;

  constructor(task: string, remote: { name: string; message: string; stack?: string }) {
    super(remote.message);
    (this as { code: 'WORKER_TASK_FAILED' }).code = 'WORKER_TASK_FAILED';
    this.name = remote.name;
    this.remoteName = remote.name;
    this.task = task;
    if (remote.stack) {
      this.stack = remote.stack;
    }
  }
}

/**
 * Worker exited before replying
 */
export class WorkerExitError extends WorkerError {
  declare readonly code: 'WORKER_EXITED';
  readonly exitCode: number | null;

  constructor(exitCode: number | null, signal?: string | null) {
    const cause = exitCode !== null ? `exit code ${exitCode}` : signal ? `signal ${signal}` : 'unknown reason';
    super(`Worker exited before finishing its task (${cause})`);
    (this as { code: 'WORKER_EXITED' }).code = 'WORKER_EXITED';
    this.exitCode = exitCode;
  }
}
