/**
 * Span Server Process
 *
 * Runs the span server in a forked child so that a traced program's own
 * event loop never serves requests. Start waits for the child to report its
 * address; stop sends SIGTERM and escalates to SIGKILL.
 */

import { fork, type ChildProcess } from 'node:child_process';
import * as path from 'node:path';
import { ENV_VARS } from '../../../shared/config/env.js';
import { FORCE_KILL_TIMEOUT_MS, SERVER_START_TIMEOUT_MS } from '../../../shared/config/timeouts.js';
import { ServerStartError } from '../../../shared/errors/index.js';
import { createChildLogger } from '../../../shared/logging/structured.js';
import { isRecord } from '../../../shared/validation/index.js';
import { resolveEntryPoint } from '../../process/entry-path.js';

const log = createChildLogger({ component: 'span-server-process' });

export type ServerStatusMessage =
  | { type: 'listening'; url: string; port: number }
  | { type: 'start_error'; message: string };

function isServerStatusMessage(value: unknown): value is ServerStatusMessage {
  if (!isRecord(value)) return false;
  if (value.type === 'listening') {
    return typeof value.url === 'string' && typeof value.port === 'number';
  }
  return value.type === 'start_error' && typeof value.message === 'string';
}

export interface SpanServerProcessOptions {
  dbPath: string;
  /** Default: 127.0.0.1 */
  host?: string;
  /** Default: 0, any free port */
  port?: number;
  /** Default: SERVER_START_TIMEOUT_MS */
  startTimeoutMs?: number;
}

export class SpanServerProcess {
  private child: ChildProcess | null = null;
  private serverUrl: string | null = null;
  private exitPromise: Promise<void> | null = null;

  constructor(private readonly options: SpanServerProcessOptions) {}

  /**
   * Base URL of the running server
   *
   * @throws ServerStartError before start() has resolved
   */
  get url(): string {
    if (this.serverUrl === null) {
      throw new ServerStartError('span server is not running');
    }
    return this.serverUrl;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get isRunning(): boolean {
    return this.child !== null && this.child.exitCode === null && this.child.signalCode === null;
  }

  async start(): Promise<string> {
    if (this.child) {
      throw new ServerStartError('span server process already started');
    }

    const entry = resolveEntryPoint('./server-entry', import.meta.url);
    const child = fork(entry.path, [], {
      execArgv: entry.execArgv,
      env: {
        ...process.env,
        [ENV_VARS.DB_PATH]: path.resolve(this.options.dbPath),
        [ENV_VARS.SERVER_HOST]: this.options.host ?? '127.0.0.1',
        [ENV_VARS.SERVER_PORT]: String(this.options.port ?? 0),
      },
      stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    });
    this.child = child;
    this.exitPromise = new Promise((resolve) => {
      child.once('exit', () => resolve());
    });

    const url = await this.waitForListening(child, this.options.startTimeoutMs ?? SERVER_START_TIMEOUT_MS);
    this.serverUrl = url;
    log.debug('Span server process started', { url, pid: child.pid });
    return url;
  }

  private waitForListening(child: ChildProcess, timeoutMs: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const cleanup = (): void => {
        clearTimeout(timeout);
        child.off('message', onMessage);
        child.off('error', onError);
        child.off('exit', onExit);
      };

      const fail = (error: ServerStartError): void => {
        if (settled) return;
        settled = true;
        cleanup();
        void this.stop();
        reject(error);
      };

      const timeout = setTimeout(() => {
        fail(new ServerStartError(`no address reported within ${timeoutMs}ms`));
      }, timeoutMs);

      const onMessage = (message: unknown): void => {
        if (!isServerStatusMessage(message) || settled) return;
        if (message.type === 'start_error') {
          fail(new ServerStartError(message.message));
          return;
        }
        settled = true;
        cleanup();
        resolve(message.url);
      };

      const onError = (error: Error): void => {
        fail(new ServerStartError(error.message, error));
      };

      const onExit = (code: number | null, signal: NodeJS.Signals | null): void => {
        const cause = code !== null ? `exit code ${code}` : signal ? `signal ${signal}` : 'unknown reason';
        fail(new ServerStartError(`process exited during startup (${cause})`));
      };

      child.on('message', onMessage);
      child.on('error', onError);
      child.on('exit', onExit);
    });
  }

  /**
   * Stop the server; resolves once the child has exited
   */
  async stop(): Promise<void> {
    const child = this.child;
    const exited = this.exitPromise;
    if (!child || !exited) return;

    if (this.isRunning) {
      child.kill('SIGTERM');
      const forceKill = setTimeout(() => {
        if (this.isRunning) {
          log.warn('Span server ignored SIGTERM, sending SIGKILL', { pid: child.pid });
          child.kill('SIGKILL');
        }
      }, FORCE_KILL_TIMEOUT_MS);
      await exited.finally(() => clearTimeout(forceKill));
    } else {
      await exited;
    }

    this.child = null;
    this.exitPromise = null;
    this.serverUrl = null;
    log.debug('Span server process stopped');
  }
}
