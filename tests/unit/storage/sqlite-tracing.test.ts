/**
 * SQLite Store Unit Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  newSpanId,
  resolveSpanRef,
  spanIdEquals,
  spanIdToString,
  treeToDict,
  trace,
  withTrace,
  type TreeDict,
} from '../../../src/shared/tracing/index.js';
import { RecordNotFoundError } from '../../../src/shared/errors/index.js';
import { SpanDatabase } from '../../../src/infra/storage/sqlite/span-db.js';
import {
  SQLITE_SPAN_KIND,
  SqliteSpan,
  SqliteTraceTree,
  SqliteTracing,
  registerSqliteSpanResolver,
} from '../../../src/infra/storage/sqlite/sqlite-tracing.js';

let testDir: string;
let dbPath: string;

describe('SqliteTracing', () => {
  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-sqlite-'));
    dbPath = path.join(testDir, 'traces.db');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should insert the root at construction', () => {
    const tracing = new SqliteTracing({ dbPath, rootName: 'job' });

    expect(tracing.db.getRootIds()).toHaveLength(1);
    expect(tracing.db.getName(tracing.rootId)).toBe('job');
  });

  it('should persist the whole tree', async () => {
    const tracing = new SqliteTracing({ dbPath });
    const load = trace(async function load(rows: number) {
      return rows * 2;
    });

    await tracing.run(async () => {
      await withTrace('batch', async () => {
        await load(3);
      });
    });

    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children.map((child) => child.name)).toEqual(['batch']);
    expect(tree.children[0].children[0].name).toBe('load');
    expect(tree.children[0].children[0].data.trace_function).toEqual({ name: 'load', args: [3], returned: 6 });
    expect(typeof tree.data.end_time).toBe('string');
  });

  it('should keep a nested shape', async () => {
    const tracing = new SqliteTracing({ dbPath, rootName: 'A' });

    await tracing.run(() =>
      withTrace('B', async () => {
        await withTrace('C', () => undefined);
        await withTrace('D', () => undefined);
      })
    );

    const root = await tracing.getTree();
    const rootChildren = await root.getChildren();
    expect(rootChildren).toHaveLength(1);
    expect(await rootChildren[0].getName()).toBe('B');
    const grandchildren = await rootChildren[0].getChildren();
    expect(grandchildren).toHaveLength(2);

    const leaves: string[] = [];
    const collectLeaves = (node: TreeDict): void => {
      if (node.children.length === 0) leaves.push(node.name);
      node.children.forEach(collectLeaves);
    };
    collectLeaves(await treeToDict(root));
    expect(new Set(leaves)).toEqual(new Set(['C', 'D']));
  });

  it('should attach to a given root and create it when missing', () => {
    const rootId = newSpanId();

    const first = new SqliteTracing({ dbPath, rootId: spanIdToString(rootId), rootName: 'shared' });
    const second = new SqliteTracing({ dbPath, rootId, rootName: 'ignored' });

    expect(spanIdEquals(first.rootId, rootId)).toBe(true);
    expect(spanIdEquals(second.rootId, rootId)).toBe(true);
    expect(first.db.getRootIds()).toHaveLength(1);
    expect(first.db.getName(rootId)).toBe('shared');
  });

  it('should read through to the database on every access', async () => {
    const tracing = new SqliteTracing({ dbPath });
    const span = tracing.getRootSpan();
    const other = new SpanDatabase(dbPath);

    other.updateDataJson(span.id, JSON.stringify({ written: 'elsewhere' }));

    await expect(span.getData()).resolves.toEqual({ written: 'elsewhere' });
  });

  it('should fail to update a span that does not exist', async () => {
    const span = new SqliteSpan(new SpanDatabase(dbPath), newSpanId());

    await expect(span.updateData({ a: 1 })).rejects.toThrow(RecordNotFoundError);
  });

  it('should navigate the tree both ways', async () => {
    const tracing = new SqliteTracing({ dbPath });
    const child = await tracing.getRootSpan().newChild('child');

    const tree = new SqliteTraceTree(tracing.db, child.id);
    const parent = await tree.getParent();

    expect(parent && spanIdEquals(parent.id, tracing.rootId)).toBe(true);
    await expect(parent?.getParent()).resolves.toBeUndefined();
    await expect(tree.getChildren()).resolves.toEqual([]);
  });

  it('should resolve references onto the same file', async () => {
    registerSqliteSpanResolver();
    const tracing = new SqliteTracing({ dbPath });
    const ref = tracing.getRootSpan().toRef();

    const span = await resolveSpanRef(ref);
    await span.newChild('via-ref');

    expect(ref.kind).toBe(SQLITE_SPAN_KIND);
    expect(ref.locator).toEqual({ dbPath: path.resolve(dbPath) });
    const tree = await treeToDict(await tracing.getTree());
    expect(tree.children.map((child) => child.name)).toEqual(['via-ref']);
  });

  it('should keep disjoint keys written concurrently', async () => {
    const tracing = new SqliteTracing({ dbPath });
    const root = tracing.getRootSpan();
    const writers = Array.from({ length: 4 }, () => new SqliteSpan(new SpanDatabase(dbPath), root.id));

    await Promise.all(
      writers.flatMap((span, writer) =>
        Array.from({ length: 10 }, (_, n) => span.updateData({ [`w${writer}_${n}`]: n }))
      )
    );

    const data = await root.getData();
    expect(Object.keys(data)).toHaveLength(40);
    expect(data.w3_9).toBe(9);
  });
});
