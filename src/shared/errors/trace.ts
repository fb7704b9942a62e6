/**
 * Trace usage errors
 *
 * Raised when the tracing API is used outside its contract: reading the
 * current span where none is active, expecting a different span type,
 * or driving a Tracing through an invalid lifecycle transition.
 */

import { TreetraceError } from './base.js';

/**
 * Trace error codes - union of all possible trace error types
 */
export type TraceErrorCode =
  | 'TRACE_ERROR'
  | 'NO_CURRENT_SPAN'
  | 'SPAN_TYPE_MISMATCH'
  | 'TRACING_STATE'
  | 'TREE_STRUCTURE'
  | 'UNKNOWN_SPAN_REF';

/**
 * Base class for all trace usage errors
 */
export class TraceError extends TreetraceError {
  declare readonly code: TraceErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    (this as { code: TraceErrorCode }).code = 'TRACE_ERROR';
  }
}

/**
 * No span is current in this execution context
 */
export class NoCurrentSpanError extends TraceError {
  declare readonly code: 'NO_CURRENT_SPAN';

  constructor() {
    super('No span is running. Run inside an active Tracing.');
    (this as { code: 'NO_CURRENT_SPAN' }).code = 'NO_CURRENT_SPAN';
  }
}

/**
 * The current span is not of the requested implementation
 */
export class SpanTypeMismatchError extends TraceError {
  declare readonly code: 'SPAN_TYPE_MISMATCH';
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Expected current span of type ${expected}, got ${actual}`);
    (this as { code: 'SPAN_TYPE_MISMATCH' }).code = 'SPAN_TYPE_MISMATCH';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A Tracing was used in a state that does not allow the operation
 */
export class TracingStateError extends TraceError {
  declare readonly code: 'TRACING_STATE';
  readonly tracing: string;
  readonly state: string;

  constructor(tracing: string, state: string, operation: string) {
    super(`Cannot ${operation}: ${tracing} is ${state}`);
    (this as { code: 'TRACING_STATE' }).code = 'TRACING_STATE';
    this.tracing = tracing;
    this.state = state;
  }
}

/**
 * A persisted trace could not be assembled into a single tree
 */
export class TreeStructureError extends TraceError {
  declare readonly code: 'TREE_STRUCTURE';

  constructor(message: string) {
    super(message);
    (this as { code: 'TREE_STRUCTURE' }).code = 'TREE_STRUCTURE';
  }
}

/**
 * No resolver is registered for a span reference kind
 */
export class UnknownSpanRefError extends TraceError {
  declare readonly code: 'UNKNOWN_SPAN_REF';
  readonly kind: string;
  readonly availableKinds: string[];

  constructor(kind: string, availableKinds: string[]) {
    const available = availableKinds.length
      ? ` Registered kinds: ${availableKinds.join(', ')}`
      : ' No resolvers are registered.';
    super(`No span resolver registered for kind '${kind}'.${available}`);
    (this as { code: 'UNKNOWN_SPAN_REF' }).code = 'UNKNOWN_SPAN_REF';
    this.kind = kind;
    this.availableKinds = availableKinds;
  }
}
