/**
 * Traced Threads and Processes
 *
 * Run one task in a worker thread or child process with the span that was
 * current at `start()` as the worker's current span. The span crosses as a
 * SpanRef and is rebuilt on the other side by the resolver of its store.
 *
 * @example
 * await tracing.run(async () => {
 *   const worker = new TracedProcess({ modulePath, exportName: 'crunch', args: [42] });
 *   worker.start();
 *   const result = await worker.join();
 * });
 */

import { WorkerError, WorkerExitError, WorkerTaskError } from '../../shared/errors/index.js';
import * as logger from '../../shared/logging/logger.js';
import { getCurrentSpan, type SpanRef } from '../../shared/tracing/index.js';
import type { JsonValue } from '../../shared/utils/json.js';
import { createProcessChannel, createThreadChannel, type StartMethod, type WorkerChannel } from './channel.js';
import type { TaskSpec } from './protocol.js';

/**
 * Reference to the current span, or null outside a Tracing
 */
export function captureSpanRef(): SpanRef | null {
  return getCurrentSpan()?.toRef() ?? null;
}

export function describeTask(task: TaskSpec): string {
  return `${task.modulePath}#${task.exportName ?? 'default'}`;
}

/**
 * Send one task over a ready channel and wait for its reply
 *
 * @throws WorkerTaskError when the task threw in the worker
 * @throws WorkerExitError when the worker exits before replying
 */
export function runTaskOnChannel(
  channel: WorkerChannel,
  taskId: number,
  task: TaskSpec,
  spanRef: SpanRef | null
): Promise<JsonValue> {
  return new Promise<JsonValue>((resolve, reject) => {
    if (channel.exited) {
      reject(new WorkerExitError(null));
      return;
    }

    const cleanup = (): void => {
      offMessage();
      offExit();
      offError();
    };

    const offMessage = channel.onMessage((message) => {
      if (message.type === 'ready' || message.taskId !== taskId) return;
      cleanup();
      if (message.type === 'result') {
        resolve(message.value);
      } else {
        reject(new WorkerTaskError(describeTask(task), message.error));
      }
    });
    const offExit = channel.onExit((code, signal) => {
      cleanup();
      reject(new WorkerExitError(code, signal));
    });
    const offError = channel.onError((error) => {
      cleanup();
      reject(new WorkerError(`${channel.kind} worker failed: ${error.message}`, { cause: error }));
    });

    channel.send({ type: 'run', taskId, task, spanRef });
  });
}

/**
 * One task in one dedicated worker
 */
export abstract class TracedWorker {
  private result: Promise<JsonValue> | undefined;

  constructor(readonly task: TaskSpec) {}

  protected abstract createChannel(): WorkerChannel;

  get started(): boolean {
    return this.result !== undefined;
  }

  /**
   * Capture the current span and launch the worker
   */
  start(): void {
    if (this.result) {
      throw new WorkerError(`Worker for ${describeTask(this.task)} already started`);
    }
    const result = this.execute(captureSpanRef());
    result.catch((error: unknown) => {
      logger.debug(`Traced worker for ${describeTask(this.task)} failed`, error);
    });
    this.result = result;
  }

  /**
   * Wait for the task's result
   */
  join(): Promise<JsonValue> {
    if (!this.result) {
      return Promise.reject(new WorkerError(`Worker for ${describeTask(this.task)} was never started`));
    }
    return this.result;
  }

  private async execute(spanRef: SpanRef | null): Promise<JsonValue> {
    const channel = this.createChannel();
    try {
      await channel.ready();
      return await runTaskOnChannel(channel, 1, this.task, spanRef);
    } finally {
      await channel.terminate();
    }
  }
}

export class TracedThread extends TracedWorker {
  protected createChannel(): WorkerChannel {
    return createThreadChannel();
  }
}

export interface TracedProcessOptions {
  /** Default: 'fork' */
  startMethod?: StartMethod;
}

export class TracedProcess extends TracedWorker {
  readonly startMethod: StartMethod;

  constructor(task: TaskSpec, options: TracedProcessOptions = {}) {
    super(task);
    this.startMethod = options.startMethod ?? 'fork';
  }

  protected createChannel(): WorkerChannel {
    return createProcessChannel(this.startMethod);
  }
}
