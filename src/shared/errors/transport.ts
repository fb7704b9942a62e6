/**
 * Transport errors
 *
 * Covers the span server being unreachable, not becoming ready in time,
 * failing to start, or answering with an error status.
 */

import { TreetraceError } from './base.js';

/**
 * Transport error codes - union of all possible transport error types
 */
export type TransportErrorCode =
  | 'TRANSPORT_ERROR'
  | 'SERVER_UNAVAILABLE'
  | 'SERVER_NOT_READY'
  | 'SERVER_START_FAILED'
  | 'REMOTE_REQUEST_FAILED';

/**
 * Base class for all transport errors
 */
export class TransportError extends TreetraceError {
  declare readonly code: TransportErrorCode;

  constructor(
    message: string,
    options?: { cause?: Error; recoverable?: boolean }
  ) {
    super(message, options);
    (this as { code: TransportErrorCode }).code = 'TRANSPORT_ERROR';
  }
}

/**
 * The span server could not be reached
 */
export class ServerUnavailableError extends TransportError {
  declare readonly code: 'SERVER_UNAVAILABLE';
  readonly url: string;

  constructor(url: string, cause?: Error) {
    super(`Span server unreachable at ${url}`, { cause, recoverable: true });
    (this as { code: 'SERVER_UNAVAILABLE' }).code = 'SERVER_UNAVAILABLE';
    this.url = url;
  }
}

/**
 * The span server did not answer the readiness probe within the bound
 */
export class ServerNotReadyError extends TransportError {
  declare readonly code: 'SERVER_NOT_READY';
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: Error) {
    super(`Span server at ${url} not ready after ${timeoutMs}ms`, { cause });
    (this as { code: 'SERVER_NOT_READY' }).code = 'SERVER_NOT_READY';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The span server process failed to start
 */
export class ServerStartError extends TransportError {
  declare readonly code: 'SERVER_START_FAILED';

  constructor(reason: string, cause?: Error) {
    super(`Span server failed to start: ${reason}`, { cause });
    (this as { code: 'SERVER_START_FAILED' }).code = 'SERVER_START_FAILED';
  }
}

/**
 * The span server answered with a non-success status
 */
export class RemoteRequestError extends TransportError {
  declare readonly code: 'REMOTE_REQUEST_FAILED';
  readonly method: string;
  readonly path: string;
  readonly status: number;

  constructor(method: string, path: string, status: number, detail?: string) {
    const d = detail ? `: ${detail}` : '';
    super(`${method} ${path} failed with status ${status}${d}`, {
      recoverable: status >= 500,
    });
    (this as { code: 'REMOTE_REQUEST_FAILED' }).code = 'REMOTE_REQUEST_FAILED';
    this.method = method;
    this.path = path;
    this.status = status;
  }
}
