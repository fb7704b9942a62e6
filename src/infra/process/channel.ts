/**
 * Worker Channels
 *
 * One message interface over a worker thread or a child process. Every
 * live channel is tracked so stragglers can be terminated on shutdown.
 */

import { fork, spawn, type ChildProcess } from 'node:child_process';
import { Worker } from 'node:worker_threads';
import { FORCE_KILL_TIMEOUT_MS, WORKER_START_TIMEOUT_MS } from '../../shared/config/timeouts.js';
import { WorkerExitError, WorkerError } from '../../shared/errors/index.js';
import * as logger from '../../shared/logging/logger.js';
import { resolveEntryPoint, resolveThreadEntryPoint, type EntryPoint } from './entry-path.js';
import { isWorkerMessage, type ParentMessage, type WorkerMessage } from './protocol.js';

/**
 * How a child process is started
 *
 * - `fork`: Node's fork helper; the child inherits the parent's environment
 * - `spawn`: a fresh interpreter from `process.execPath` with an explicit
 *   IPC pipe and only the flags the entry needs
 */
export type StartMethod = 'fork' | 'spawn';

export type WorkerKind = 'thread' | 'process';

type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

export interface WorkerChannel {
  readonly kind: WorkerKind;
  readonly exited: boolean;
  send(message: ParentMessage): void;
  onMessage(listener: (message: WorkerMessage) => void): () => void;
  onExit(listener: ExitListener): () => void;
  onError(listener: (error: Error) => void): () => void;
  /** Resolve once the worker reported ready */
  ready(): Promise<void>;
  /** Ask the worker to stop, force it after a grace period; resolves on exit */
  terminate(): Promise<void>;
}

const activeChannels = new Set<WorkerChannel>();

/**
 * Number of channels whose worker has not exited
 */
export function getActiveChannelCount(): number {
  return activeChannels.size;
}

/**
 * Terminate every live worker
 */
export async function terminateAllWorkers(): Promise<void> {
  const channels = [...activeChannels];
  await Promise.all(channels.map((channel) => channel.terminate()));
}

abstract class BaseChannel implements WorkerChannel {
  abstract readonly kind: WorkerKind;
  private readonly messageListeners: Array<(message: WorkerMessage) => void> = [];
  private readonly exitListeners: ExitListener[] = [];
  private readonly errorListeners: Array<(error: Error) => void> = [];
  private isExited = false;
  private readonly exitPromise: Promise<void>;
  private resolveExit: () => void = () => {};

  constructor() {
    this.exitPromise = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
    activeChannels.add(this);
  }

  get exited(): boolean {
    return this.isExited;
  }

  abstract send(message: ParentMessage): void;
  protected abstract forceStop(): void;

  protected emitMessage(raw: unknown): void {
    if (!isWorkerMessage(raw)) {
      logger.debug(`Ignoring unexpected ${this.kind} message`);
      return;
    }
    for (const listener of [...this.messageListeners]) {
      listener(raw);
    }
  }

  protected emitExit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.isExited) return;
    this.isExited = true;
    activeChannels.delete(this);
    for (const listener of [...this.exitListeners]) {
      listener(code, signal);
    }
    this.resolveExit();
  }

  protected emitError(error: Error): void {
    for (const listener of [...this.errorListeners]) {
      listener(error);
    }
  }

  onMessage(listener: (message: WorkerMessage) => void): () => void {
    return addListener(this.messageListeners, listener);
  }

  onExit(listener: ExitListener): () => void {
    return addListener(this.exitListeners, listener);
  }

  onError(listener: (error: Error) => void): () => void {
    return addListener(this.errorListeners, listener);
  }

  ready(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const cleanup = (): void => {
        clearTimeout(timeout);
        offMessage();
        offExit();
        offError();
      };
      const fail = (error: Error): void => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(error);
      };

      const timeout = setTimeout(() => {
        fail(new WorkerError(`${this.kind} worker did not report ready within ${WORKER_START_TIMEOUT_MS}ms`));
        void this.terminate();
      }, WORKER_START_TIMEOUT_MS);

      const offMessage = this.onMessage((message) => {
        if (message.type !== 'ready' || settled) return;
        settled = true;
        cleanup();
        resolve();
      });
      const offExit = this.onExit((code, signal) => fail(new WorkerExitError(code, signal ?? undefined)));
      const offError = this.onError(fail);
    });
  }

  terminate(): Promise<void> {
    if (this.isExited) return this.exitPromise;

    try {
      this.send({ type: 'shutdown' });
    } catch (error) {
      logger.debug(`Shutdown message not delivered to ${this.kind} worker`, error);
    }
    const timer = setTimeout(() => {
      if (!this.isExited) {
        logger.debug(`Force stopping ${this.kind} worker`);
        this.forceStop();
      }
    }, FORCE_KILL_TIMEOUT_MS);
    return this.exitPromise.finally(() => clearTimeout(timer));
  }
}

function addListener<L>(listeners: L[], listener: L): () => void {
  listeners.push(listener);
  return () => {
    const index = listeners.indexOf(listener);
    if (index >= 0) listeners.splice(index, 1);
  };
}

class ThreadChannel extends BaseChannel {
  readonly kind = 'thread';
  private readonly worker: Worker;

  constructor(entry: EntryPoint) {
    super();
    this.worker = new Worker(entry.path, { execArgv: entry.execArgv });
    this.worker.on('message', (raw: unknown) => this.emitMessage(raw));
    this.worker.on('error', (error: Error) => this.emitError(error));
    this.worker.on('exit', (code: number) => this.emitExit(code, null));
  }

  send(message: ParentMessage): void {
    this.worker.postMessage(message);
  }

  protected forceStop(): void {
    void this.worker.terminate();
  }
}

class ProcessChannel extends BaseChannel {
  readonly kind = 'process';
  private readonly child: ChildProcess;

  constructor(entry: EntryPoint, startMethod: StartMethod) {
    super();
    this.child =
      startMethod === 'fork'
        ? fork(entry.path, [], {
            execArgv: entry.execArgv,
            stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
          })
        : spawn(process.execPath, [...entry.execArgv, entry.path], {
            stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
          });

    this.child.on('message', (raw: unknown) => this.emitMessage(raw));
    this.child.on('error', (error: Error) => this.emitError(error));
    this.child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => this.emitExit(code, signal));
  }

  get pid(): number {
    return this.child.pid ?? -1;
  }

  send(message: ParentMessage): void {
    if (this.child.connected) {
      this.child.send(message);
    }
  }

  protected forceStop(): void {
    this.child.kill('SIGTERM');
    setTimeout(() => {
      if (!this.exited) {
        this.child.kill('SIGKILL');
      }
    }, FORCE_KILL_TIMEOUT_MS).unref();
  }
}

/**
 * Start a worker thread running the thread bootstrap
 */
export function createThreadChannel(entry: EntryPoint = resolveThreadEntryPoint(import.meta.url)): WorkerChannel {
  return new ThreadChannel(entry);
}

/**
 * Start a child process running the process bootstrap
 */
export function createProcessChannel(
  startMethod: StartMethod = 'fork',
  entry: EntryPoint = resolveEntryPoint('./process-entry', import.meta.url)
): WorkerChannel {
  return new ProcessChannel(entry, startMethod);
}
