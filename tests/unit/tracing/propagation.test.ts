/**
 * In-Process Propagation Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { bindToCurrentSpan, getCurrentSpan, TracedTaskPool, withTrace, type Span } from '../../../src/shared/tracing/index.js';
import { MemoryTracing } from '../../../src/infra/storage/memory/memory-tracing.js';
import { sleep } from '../../../src/shared/utils/retry.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('bindToCurrentSpan', () => {
  it('should run later calls in the span current at binding', async () => {
    const tracing = new MemoryTracing();
    let bound: () => Span | undefined = () => undefined;

    const root = await tracing.run((rootSpan) => {
      bound = bindToCurrentSpan(() => getCurrentSpan());
      return rootSpan;
    });

    expect(getCurrentSpan()).toBeUndefined();
    expect(bound()).toBe(root);
  });

  it('should keep an unbound function untraced inside a span', async () => {
    const bound = bindToCurrentSpan(() => getCurrentSpan());
    const tracing = new MemoryTracing();

    await tracing.run(() => {
      expect(bound()).toBeUndefined();
    });
  });
});

describe('TracedTaskPool', () => {
  it('should reject a non-positive concurrency', () => {
    expect(() => new TracedTaskPool(0)).toThrow(RangeError);
  });

  it('should run a queued task in the span current at submit', async () => {
    const pool = new TracedTaskPool(1);
    const gate = deferred();
    const tracing = new MemoryTracing();

    const seen = await tracing.run(async () => {
      let blocker: Promise<void> = Promise.resolve();
      await withTrace('blocker', async () => {
        blocker = pool.submit(() => gate.promise);
      });
      let queued: Promise<string | undefined> = Promise.resolve(undefined);
      await withTrace('submitter', async () => {
        queued = pool.submit(async () => getCurrentSpan()?.getName());
      });

      expect(pool.pending).toBe(1);
      expect(pool.size).toBe(1);
      gate.resolve();
      await blocker;
      return queued;
    });

    expect(seen).toBe('submitter');
  });

  it('should cap concurrency and report idle', async () => {
    const pool = new TracedTaskPool(2);
    let running = 0;
    let maxRunning = 0;

    const results = Array.from({ length: 5 }, (_, index) =>
      pool.submit(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(5);
        running--;
        return index;
      })
    );
    await pool.onIdle();

    await expect(Promise.all(results)).resolves.toEqual([0, 1, 2, 3, 4]);
    expect(maxRunning).toBe(2);
    expect(pool.pending).toBe(0);
    expect(pool.size).toBe(0);
  });

  it('should propagate task failures', async () => {
    const pool = new TracedTaskPool(1);

    await expect(pool.submit(() => Promise.reject(new Error('task failed')))).rejects.toThrow('task failed');
    await expect(pool.submit(() => 'next')).resolves.toBe('next');
  });
});
