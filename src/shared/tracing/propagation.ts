/**
 * In-Process Context Propagation
 *
 * AsyncLocalStorage already carries the current span into promises and
 * callbacks created inside a scope. These helpers cover work that is
 * created in one context but started later from another, such as queued
 * tasks.
 */

import { getCurrentSpan, runInSpan } from './context.js';
import type { Span } from './types.js';

/**
 * Capture the current span now; the returned function runs `fn` with it
 */
export function bindToCurrentSpan<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  const captured = getCurrentSpan();
  return (...args: A) => runInSpan(captured, () => fn(...args));
}

interface QueuedTask {
  span: Span | undefined;
  run: () => Promise<void>;
}

/**
 * Bounded pool of async tasks
 *
 * `submit()` captures the span current at submission. The task starts
 * when a slot frees up and sees that span as current, whatever the
 * context that frees the slot.
 *
 * @example
 * const pool = new TracedTaskPool(4);
 * const results = await Promise.all(items.map((item) => pool.submit(() => handle(item))));
 */
export class TracedTaskPool {
  private readonly queue: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Tasks waiting for a slot */
  get size(): number {
    return this.queue.length;
  }

  /** Tasks running now */
  get pending(): number {
    return this.running;
  }

  submit<T>(task: () => Promise<T> | T): Promise<T> {
    const span = getCurrentSpan();
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        span,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
      this.next();
    });
  }

  /**
   * Resolve once the queue is empty and nothing is running
   */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private next(): void {
    while (this.running < this.concurrency) {
      const item = this.queue.shift();
      if (!item) break;

      this.running++;
      void runInSpan(item.span, item.run).finally(() => {
        this.running--;
        this.next();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.running > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
