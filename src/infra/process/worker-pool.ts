/**
 * Traced Worker Pool
 *
 * A fixed number of long-lived worker threads or child processes. Each
 * submission carries the span that was current when it was submitted,
 * which is not necessarily the span current when a worker picks it up.
 */

import { getDefaultPoolSize } from '../../shared/config/limits.js';
import { WorkerError } from '../../shared/errors/index.js';
import { createChildLogger } from '../../shared/logging/structured.js';
import type { SpanRef } from '../../shared/tracing/index.js';
import type { JsonValue } from '../../shared/utils/json.js';
import {
  createProcessChannel,
  createThreadChannel,
  type StartMethod,
  type WorkerChannel,
  type WorkerKind,
} from './channel.js';
import type { TaskSpec } from './protocol.js';
import { captureSpanRef, runTaskOnChannel } from './traced-worker.js';

const log = createChildLogger({ component: 'worker-pool' });

export interface TracedWorkerPoolOptions {
  /** Default: 'process' */
  kind?: WorkerKind;
  /** Number of workers (default: available parallelism) */
  size?: number;
  /** Start method for process workers (default: 'fork') */
  startMethod?: StartMethod;
}

interface PoolWorker {
  channel: WorkerChannel;
  ready: Promise<void>;
  busy: boolean;
}

interface Job {
  task: TaskSpec;
  spanRef: SpanRef | null;
  resolve: (value: JsonValue) => void;
  reject: (error: unknown) => void;
}

export class TracedWorkerPool {
  readonly kind: WorkerKind;
  readonly size: number;
  readonly startMethod: StartMethod;
  private readonly workers: PoolWorker[] = [];
  private readonly queue: Job[] = [];
  private nextTaskId = 1;
  private closed = false;

  constructor(options: TracedWorkerPoolOptions = {}) {
    this.kind = options.kind ?? 'process';
    this.size = options.size ?? getDefaultPoolSize();
    this.startMethod = options.startMethod ?? 'fork';
    if (!Number.isInteger(this.size) || this.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${this.size}`);
    }
  }

  /** Submissions waiting for a worker */
  get queued(): number {
    return this.queue.length;
  }

  /** Workers currently running a task */
  get busy(): number {
    return this.workers.filter((worker) => worker.busy).length;
  }

  /**
   * Queue a task; the current span is captured now
   */
  submit(task: TaskSpec): Promise<JsonValue> {
    if (this.closed) {
      return Promise.reject(new WorkerError('Worker pool is closed'));
    }
    const spanRef = captureSpanRef();
    return new Promise<JsonValue>((resolve, reject) => {
      this.queue.push({ task, spanRef, resolve, reject });
      this.dispatch();
    });
  }

  /**
   * Reject queued submissions and terminate every worker
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const job of this.queue.splice(0)) {
      job.reject(new WorkerError('Worker pool closed before the task started'));
    }
    await Promise.all(this.workers.map((worker) => worker.channel.terminate()));
    log.debug('Worker pool closed', { kind: this.kind });
  }

  private dispatch(): void {
    while (!this.closed && this.queue.length > 0) {
      const worker = this.workers.find((candidate) => !candidate.busy) ?? this.spawnWorker();
      if (!worker) return;
      const job = this.queue.shift();
      if (!job) return;
      worker.busy = true;
      void this.runJob(worker, job);
    }
  }

  private spawnWorker(): PoolWorker | undefined {
    if (this.workers.length >= this.size) return undefined;

    const channel = this.kind === 'thread' ? createThreadChannel() : createProcessChannel(this.startMethod);
    const worker: PoolWorker = { channel, ready: channel.ready(), busy: false };
    channel.onExit((code, signal) => {
      const index = this.workers.indexOf(worker);
      if (index >= 0) this.workers.splice(index, 1);
      if (!this.closed) {
        log.warn('Pool worker exited', { kind: this.kind, code, signal });
        this.dispatch();
      }
    });
    this.workers.push(worker);
    return worker;
  }

  private async runJob(worker: PoolWorker, job: Job): Promise<void> {
    try {
      await worker.ready;
      job.resolve(await runTaskOnChannel(worker.channel, this.nextTaskId++, job.task, job.spanRef));
    } catch (error) {
      job.reject(error);
    } finally {
      worker.busy = false;
      this.dispatch();
    }
  }
}
