/**
 * Tracing lifecycle shared by every store
 */

import { TracingStateError } from '../errors/index.js';
import { createChildLogger } from '../logging/structured.js';
import { runCleanupAfterFailure, withSpanScope } from './span.js';
import type { Span, TraceTree, Tracing, TracingState } from './types.js';

/**
 * Base class implementing the inactive → active → closed state machine
 *
 * Subclasses provide the root span and tree, and may acquire resources in
 * `start()` and release them in `stop()`; `stop()` runs on every exit
 * path of `run()`.
 */
export abstract class BaseTracing<S extends Span, T extends TraceTree> implements Tracing<S, T> {
  private currentState: TracingState = 'inactive';
  protected readonly log = createChildLogger({ tracing: this.constructor.name });

  get state(): TracingState {
    return this.currentState;
  }

  abstract getRootSpan(): S;
  abstract getTree(): Promise<T>;

  protected async start(): Promise<void> {}

  protected async stop(): Promise<void> {}

  async run<R>(fn: (root: S) => Promise<R> | R): Promise<R> {
    if (this.currentState !== 'inactive') {
      throw new TracingStateError(this.constructor.name, this.currentState, 'run tracing');
    }
    this.currentState = 'active';
    this.log.debug('Tracing started');

    let result: R;
    try {
      await this.start();
      result = await withSpanScope(this.getRootSpan(), fn);
    } catch (error) {
      await runCleanupAfterFailure('stop tracing', () => this.finish());
      throw error;
    }
    await this.finish();
    return result;
  }

  private async finish(): Promise<void> {
    try {
      await this.stop();
    } finally {
      this.currentState = 'closed';
      this.log.debug('Tracing closed');
    }
  }
}
