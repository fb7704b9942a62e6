/**
 * Span, tree and tracing contracts shared by every store
 */

import type { JsonObject } from '../utils/json.js';
import type { SpanId } from './ids.js';

/**
 * Serializable locator of a span
 *
 * Crosses isolate boundaries (worker threads, child processes) where a live
 * span holding a connection or in-memory tree cannot go. `kind` selects the
 * resolver that rebuilds the span on the other side.
 */
export interface SpanRef {
  /** Store kind, e.g. 'sqlite' or 'remote' */
  kind: string;
  /** Display form of the span id */
  id: string;
  /** Store-specific location (database path, server URL, snapshot) */
  locator: JsonObject;
}

/**
 * A node being written to
 *
 * Persisted stores do not cache `name` or `data`: every read goes to the
 * store, so writes from other processes are visible.
 */
export interface Span {
  readonly id: SpanId;
  getName(): Promise<string>;
  getData(): Promise<JsonObject>;
  /** Create and persist a child whose parent is this span */
  newChild(name?: string, data?: JsonObject): Promise<Span>;
  /** Merge-patch `patch` into the stored data; allowed after close */
  updateData(patch: JsonObject): Promise<void>;
  /** Called when a scope running in this span is entered */
  open(): Promise<void>;
  /** Called when that scope exits, on every exit path */
  close(): Promise<void>;
  toRef(): SpanRef;
}

/**
 * Read-only, children-navigable view of a span
 */
export interface TraceTree {
  readonly id: SpanId;
  getName(): Promise<string>;
  getData(): Promise<JsonObject>;
  getChildren(): Promise<TraceTree[]>;
  getParent(): Promise<TraceTree | undefined>;
}

/**
 * Lifecycle of a Tracing: inactive → active → closed
 */
export type TracingState = 'inactive' | 'active' | 'closed';

/**
 * Owner of one trace's root span
 */
export interface Tracing<S extends Span = Span, T extends TraceTree = TraceTree> {
  readonly state: TracingState;
  getRootSpan(): S;
  getTree(): Promise<T>;
  /** Make the root span current for the duration of `fn`; single use */
  run<R>(fn: (root: S) => Promise<R> | R): Promise<R>;
}

/**
 * Rebuilds a live span from its reference
 */
export type SpanResolver = (ref: SpanRef) => Span | Promise<Span>;
