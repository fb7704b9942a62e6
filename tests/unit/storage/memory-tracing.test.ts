/**
 * In-Memory Store Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveSpanRef, spanIdToString, treeToDict, withTrace } from '../../../src/shared/tracing/index.js';
import {
  MEMORY_SPAN_KIND,
  MemorySpan,
  MemoryTracing,
  registerMemorySpanResolver,
} from '../../../src/infra/storage/memory/memory-tracing.js';

describe('MemoryTracing', () => {
  it('should create the root at construction', async () => {
    const tracing = new MemoryTracing({ rootName: 'batch', rootData: { size: 10 } });
    const root = tracing.getRootSpan();

    await expect(root.getName()).resolves.toBe('batch');
    await expect(root.getData()).resolves.toEqual({ size: 10 });
    await expect(tracing.getTree()).resolves.toBe(root);
  });

  it('should link children and parents', async () => {
    const tracing = new MemoryTracing();
    const root = tracing.getRootSpan();

    const child = await root.newChild('step', { n: 1 });

    const children = await root.getChildren();
    expect(children).toHaveLength(1);
    expect(children[0]).toBe(child);
    await expect(child.getParent()).resolves.toBe(root);
    await expect(root.getParent()).resolves.toBeUndefined();
  });

  it('should merge-patch data updates', async () => {
    const span = new MemorySpan(Buffer.alloc(16), 'span', { a: { b: 1, c: 2 }, drop: true });

    await span.updateData({ a: { c: null, d: 3 }, drop: null });

    await expect(span.getData()).resolves.toEqual({ a: { b: 1, d: 3 } });
  });

  it('should hand out copies of its data', async () => {
    const span = new MemorySpan(Buffer.alloc(16), 'span', { list: [1] });

    const data = await span.getData();
    data.list = [];

    await expect(span.getData()).resolves.toEqual({ list: [1] });
  });

  it('should default child names', async () => {
    const child = await new MemoryTracing().getRootSpan().newChild();

    await expect(child.getName()).resolves.toBe('no-name');
  });

  it('should accept updates after the scope closed', async () => {
    const tracing = new MemoryTracing();
    const captured: { span?: MemorySpan } = {};

    await tracing.run(() =>
      withTrace('step', (span) => {
        if (span instanceof MemorySpan) captured.span = span;
      })
    );
    await captured.span?.updateData({ reviewed: true });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children[0].data.reviewed).toBe(true);
  });

  describe('references', () => {
    it('should resolve to a detached copy', async () => {
      registerMemorySpanResolver();
      const tracing = new MemoryTracing({ rootData: { job: 'x' } });
      const root = tracing.getRootSpan();

      const ref = root.toRef();
      const copy = await resolveSpanRef(ref);
      await copy.newChild('remote-child');

      expect(ref.kind).toBe(MEMORY_SPAN_KIND);
      expect(ref.id).toBe(spanIdToString(root.id));
      await expect(copy.getName()).resolves.toBe('root');
      await expect(copy.getData()).resolves.toEqual({ job: 'x' });
      await expect(root.getChildren()).resolves.toHaveLength(0);
    });
  });
});
