/**
 * Show Command Unit Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { newSpanId, spanIdToString, withTrace } from '../../../src/shared/tracing/index.js';
import { SpanDatabase } from '../../../src/infra/storage/sqlite/span-db.js';
import { SqliteTracing } from '../../../src/infra/storage/sqlite/sqlite-tracing.js';
import { JsonLogTracing } from '../../../src/infra/storage/json-log/json-log-tracing.js';
import { loadTree } from '../../../src/cli/commands/show.command.js';

let testDir: string;

describe('loadTree', () => {
  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-show-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should read the latest root from the default database', async () => {
    new SqliteTracing({ dbPath: path.join(testDir, '.treetrace', 'traces.db'), rootName: 'older' });
    const latest = new SqliteTracing({ dbPath: path.join(testDir, '.treetrace', 'traces.db'), rootName: 'newer' });
    await latest.run(() => withTrace('step', () => undefined));

    const tree = await loadTree({}, testDir);

    expect(tree.name).toBe('newer');
    expect(tree.children.map((child) => child.name)).toEqual(['step']);
  });

  it('should read a chosen root from a given database', async () => {
    const first = new SqliteTracing({ dbPath: path.join(testDir, 'spans.db'), rootName: 'first' });
    new SqliteTracing({ dbPath: path.join(testDir, 'spans.db'), rootName: 'second' });

    const tree = await loadTree({ db: 'spans.db', root: spanIdToString(first.rootId) }, testDir);

    expect(tree.name).toBe('first');
  });

  it('should fail on an empty database', async () => {
    const dbPath = path.join(testDir, 'empty.db');
    new SpanDatabase(dbPath);

    await expect(loadTree({ db: dbPath }, testDir)).rejects.toThrow(`No traces found in ${dbPath}`);
  });

  it('should fail on a missing database without creating it', async () => {
    const dbPath = path.join(testDir, 'typo.db');

    await expect(loadTree({ db: 'typo.db' }, testDir)).rejects.toThrow(`Span database not found: ${dbPath}`);
    expect(readdirSync(testDir)).toEqual([]);
  });

  it('should fail on an unknown root', async () => {
    new SqliteTracing({ dbPath: path.join(testDir, 'spans.db') });
    const missing = spanIdToString(newSpanId());

    await expect(loadTree({ db: 'spans.db', root: missing }, testDir)).rejects.toThrow(
      `Span ${missing} not found in ${path.join(testDir, 'spans.db')}`
    );
  });

  it('should read a closed JSON log and a subtree of it', async () => {
    const logPath = path.join(testDir, 'run.jsonl');
    const tracing = new JsonLogTracing({ logPath, rootName: 'job' });
    const stepId = await tracing.run(() =>
      withTrace('step', async (span) => {
        await withTrace('inner', () => undefined);
        return span ? spanIdToString(span.id) : '';
      })
    );

    const whole = await loadTree({ log: 'run.jsonl' }, testDir);
    const subtree = await loadTree({ log: logPath, root: stepId }, testDir);

    expect(whole.name).toBe('job');
    expect(subtree.name).toBe('step');
    expect(subtree.children.map((child) => child.name)).toEqual(['inner']);
  });

  it('should fail on a span missing from the log', async () => {
    const logPath = path.join(testDir, 'run.jsonl');
    await new JsonLogTracing({ logPath }).run(() => undefined);

    await expect(loadTree({ log: logPath, root: 'nope' }, testDir)).rejects.toThrow(
      `Span nope not found in ${logPath}`
    );
  });
});
