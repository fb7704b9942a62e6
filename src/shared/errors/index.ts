/**
 * treetrace Error System
 *
 * Standardized error classes for consistent error handling across the codebase.
 *
 * Usage:
 *   import { NoCurrentSpanError, DatabaseBusyError } from '../shared/errors/index.js';
 *
 *   throw new RecordNotFoundError('trace_spans', spanIdToString(id));
 *
 * Error hierarchy:
 *   TreetraceError (base)
 *   ├── TraceError
 *   │   ├── NoCurrentSpanError
 *   │   ├── SpanTypeMismatchError
 *   │   ├── TracingStateError
 *   │   ├── TreeStructureError
 *   │   └── UnknownSpanRefError
 *   ├── DatabaseError
 *   │   ├── DatabaseBusyError
 *   │   ├── RecordNotFoundError
 *   │   └── DatabaseConnectionError
 *   ├── TransportError
 *   │   ├── ServerUnavailableError
 *   │   ├── ServerNotReadyError
 *   │   ├── ServerStartError
 *   │   └── RemoteRequestError
 *   ├── WorkerError
 *   │   ├── WorkerTaskError
 *   │   └── WorkerExitError
 *   ├── ConfigError
 *   │   └── InvalidConfigValueError
 *   └── ValidationError
 */

// Base
import { TreetraceError } from './base.js';
export { TreetraceError } from './base.js';

// Trace usage errors
export {
  TraceError,
  NoCurrentSpanError,
  SpanTypeMismatchError,
  TracingStateError,
  TreeStructureError,
  UnknownSpanRefError,
} from './trace.js';

// Database errors
export {
  DatabaseError,
  DatabaseBusyError,
  RecordNotFoundError,
  DatabaseConnectionError,
} from './database.js';

// Transport errors
export {
  TransportError,
  ServerUnavailableError,
  ServerNotReadyError,
  ServerStartError,
  RemoteRequestError,
} from './transport.js';

// Worker errors
export {
  WorkerError,
  WorkerTaskError,
  WorkerExitError,
} from './worker.js';

// Config errors
export {
  ConfigError,
  InvalidConfigValueError,
} from './config.js';

// Validation errors
export { ValidationError } from '../validation/errors.js';

/**
 * Type guard to check if an error is a treetrace error
 */
export function isTreetraceError(error: unknown): error is TreetraceError {
  return error instanceof TreetraceError;
}

/**
 * Type guard to check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof TreetraceError) {
    return error.recoverable;
  }
  return false;
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof TreetraceError) {
    return error.code;
  }
  if (error instanceof Error) {
    return 'UNKNOWN_ERROR';
  }
  return 'INVALID_ERROR';
}
