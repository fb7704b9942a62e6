/**
 * Traced Process Integration Tests
 *
 * Child processes and worker threads run the TypeScript bootstrap under
 * tsx and write into a SQLite file shared with this process.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  compareSpanIds,
  newSpanId,
  spanIdFromString,
  spanIdToString,
  treeToDict,
  withTrace,
} from '../../../src/shared/tracing/index.js';
import { WorkerError, WorkerExitError, WorkerTaskError } from '../../../src/shared/errors/index.js';
import { SqliteTracing } from '../../../src/infra/storage/sqlite/sqlite-tracing.js';
import { TracedProcess, TracedThread } from '../../../src/infra/process/traced-worker.js';
import { TracedWorkerPool } from '../../../src/infra/process/worker-pool.js';
import { getActiveChannelCount, terminateAllWorkers } from '../../../src/infra/process/channel.js';

const modulePath = fileURLToPath(new URL('../../fixtures/traced-tasks.ts', import.meta.url));

let testDir: string;
let tracing: SqliteTracing;

describe('TracedProcess', () => {
  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-process-'));
    tracing = new SqliteTracing({ dbPath: path.join(testDir, 'traces.db'), rootName: 'job' });
  });

  afterEach(async () => {
    await terminateAllWorkers();
    expect(getActiveChannelCount()).toBe(0);
    rmSync(testDir, { recursive: true, force: true });
  });

  it.each(['fork', 'spawn'] as const)('should trace a child started with %s', async (startMethod) => {
    const childId = await tracing.run(async () => {
      const task = { modulePath, exportName: 'recordChild', args: ['in-child'] };
      const worker = new TracedProcess(task, { startMethod });
      worker.start();
      return worker.join();
    });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children).toHaveLength(1);
    expect(tree.children[0].id).toBe(childId);
    expect(tree.children[0].name).toBe('in-child');
    expect(typeof tree.children[0].data.pid).toBe('number');
    expect(tree.children[0].data.pid).not.toBe(process.pid);
  });

  it('should run under the span current at start', async () => {
    const seen = await tracing.run(async () =>
      withTrace('outer', async (span) => {
        const worker = new TracedProcess({ modulePath, exportName: 'currentSpanId' });
        worker.start();
        return { expected: span ? spanIdToString(span.id) : null, actual: await worker.join() };
      })
    );

    expect(seen.actual).toBe(seen.expected);
  });

  it('should run untraced outside a tracing', async () => {
    const worker = new TracedProcess({ modulePath, exportName: 'currentSpanId' });
    worker.start();

    await expect(worker.join()).resolves.toBeNull();
  });

  it('should surface task errors with the remote name and message', async () => {
    const worker = new TracedProcess({ modulePath, exportName: 'failWith', args: ['boom'] });
    worker.start();

    const error = await worker.join().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WorkerTaskError);
    expect(error).toMatchObject({ name: 'TypeError', message: 'boom', remoteName: 'TypeError' });
  });

  it('should report a child that exits mid-task', async () => {
    const worker = new TracedProcess({ modulePath, exportName: 'exitWorker', args: [3] });
    worker.start();

    const error = await worker.join().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WorkerExitError);
    expect(error).toMatchObject({ exitCode: 3 });
  });

  it('should generate ids greater than those this process made earlier', async () => {
    const before = newSpanId();
    const worker = new TracedProcess({ modulePath, exportName: 'newSpanIds', args: [3] });
    worker.start();

    const result = await worker.join();

    const ids = Array.isArray(result) ? result.map((value) => spanIdFromString(String(value))) : [];
    expect(ids).toHaveLength(3);
    for (const id of ids) {
      expect(compareSpanIds(id, before)).toBe(1);
    }
    expect(compareSpanIds(ids[0], ids[1])).toBe(-1);
    expect(compareSpanIds(ids[1], ids[2])).toBe(-1);
  });

  it('should refuse to start twice or join before start', async () => {
    const worker = new TracedProcess({ modulePath, args: [1] });

    await expect(worker.join()).rejects.toThrow(WorkerError);
    worker.start();
    expect(() => worker.start()).toThrow(WorkerError);
    await expect(worker.join()).resolves.toBe(2);
  });
});

describe('TracedThread', () => {
  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-thread-'));
    tracing = new SqliteTracing({ dbPath: path.join(testDir, 'traces.db'), rootName: 'job' });
  });

  afterEach(async () => {
    await terminateAllWorkers();
    expect(getActiveChannelCount()).toBe(0);
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should run under the span current at start', async () => {
    const seen = await tracing.run(async () =>
      withTrace('outer', async (span) => {
        const worker = new TracedThread({ modulePath, exportName: 'currentSpanId' });
        worker.start();
        return { expected: span ? spanIdToString(span.id) : null, actual: await worker.join() };
      })
    );

    expect(typeof seen.expected).toBe('string');
    expect(seen.actual).toBe(seen.expected);
  });

  it('should write children into the shared tree', async () => {
    const childId = await tracing.run(async () => {
      const worker = new TracedThread({ modulePath, exportName: 'recordChild', args: ['in-thread'] });
      worker.start();
      return worker.join();
    });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children.map((child) => child.name)).toEqual(['in-thread']);
    expect(tree.children[0].id).toBe(childId);
  });

  it('should run untraced outside a tracing', async () => {
    const worker = new TracedThread({ modulePath, exportName: 'currentSpanId' });
    worker.start();

    await expect(worker.join()).resolves.toBeNull();
  });

  it('should surface task errors with the remote name and message', async () => {
    const worker = new TracedThread({ modulePath, exportName: 'failWith', args: ['thread boom'] });
    worker.start();

    const error = await worker.join().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WorkerTaskError);
    expect(error).toMatchObject({ name: 'TypeError', message: 'thread boom' });
  });
});

describe('TracedWorkerPool', () => {
  let pool: TracedWorkerPool;

  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-pool-'));
    tracing = new SqliteTracing({ dbPath: path.join(testDir, 'traces.db'), rootName: 'job' });
  });

  afterEach(async () => {
    await pool.close();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should use the span current at submit time', async () => {
    pool = new TracedWorkerPool({ size: 1 });

    await tracing.run(async () => {
      const submitChild = (name: string) => ({
        pending: pool.submit({ modulePath, exportName: 'recordChild', args: [name] }),
      });
      const first = await withTrace('a', () => submitChild('x'));
      const second = await withTrace('b', () => submitChild('y'));
      await Promise.all([first.pending, second.pending]);
    });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children.map((child) => child.name)).toEqual(['a', 'b']);
    expect(tree.children[0].children.map((child) => child.name)).toEqual(['x']);
    expect(tree.children[1].children.map((child) => child.name)).toEqual(['y']);
  });

  it('should use the span current at submit time in thread workers', async () => {
    pool = new TracedWorkerPool({ kind: 'thread', size: 1 });

    await tracing.run(async () => {
      const submitChild = (name: string) => ({
        pending: pool.submit({ modulePath, exportName: 'recordChild', args: [name] }),
      });
      const first = await withTrace('a', () => submitChild('x'));
      const second = await withTrace('b', () => submitChild('y'));
      await Promise.all([first.pending, second.pending]);
    });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children.map((child) => child.name)).toEqual(['a', 'b']);
    expect(tree.children[0].children.map((child) => child.name)).toEqual(['x']);
    expect(tree.children[1].children.map((child) => child.name)).toEqual(['y']);
  });

  it('should run untraced in a thread worker outside a tracing', async () => {
    pool = new TracedWorkerPool({ kind: 'thread', size: 1 });

    await expect(pool.submit({ modulePath, exportName: 'currentSpanId' })).resolves.toBeNull();
  });

  it('should keep disjoint keys written from several processes', async () => {
    pool = new TracedWorkerPool({ size: 3 });

    await tracing.run(() =>
      Promise.all(
        ['p', 'q', 'r'].map((prefix) => pool.submit({ modulePath, exportName: 'writeKeys', args: [prefix, 10] }))
      )
    );

    const data = await tracing.getRootSpan().getData();
    for (const prefix of ['p', 'q', 'r']) {
      for (let n = 0; n < 10; n++) {
        expect(data[`${prefix}_${n}`]).toBe(n);
      }
    }
  });

  it('should reject submissions after close and stop its workers', async () => {
    pool = new TracedWorkerPool({ size: 2 });
    await expect(pool.submit({ modulePath, exportName: 'add', args: [2, 3] })).resolves.toBe(5);

    await pool.close();

    await expect(pool.submit({ modulePath, args: [1] })).rejects.toThrow('Worker pool is closed');
    expect(pool.busy).toBe(0);
    expect(getActiveChannelCount()).toBe(0);
  });

  it('should reject an invalid size', () => {
    pool = new TracedWorkerPool({ size: 1 });

    expect(() => new TracedWorkerPool({ size: 0 })).toThrow(RangeError);
  });
});
