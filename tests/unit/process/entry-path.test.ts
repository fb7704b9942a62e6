/**
 * Bootstrap Entry Resolution Unit Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { resolveEntryPoint, resolveThreadEntryPoint } from '../../../src/infra/process/entry-path.js';

let testDir: string;
let baseUrl: URL;

describe('Entry resolution', () => {
  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-entry-'));
    baseUrl = pathToFileURL(path.join(testDir, 'channel.js'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should load a TypeScript process entry through tsx', () => {
    expect(resolveEntryPoint('./process-entry', baseUrl)).toEqual({
      path: path.join(testDir, 'process-entry.ts'),
      execArgv: ['--import', 'tsx'],
    });
  });

  it('should prefer the compiled entry', () => {
    writeFileSync(path.join(testDir, 'process-entry.js'), '');

    expect(resolveEntryPoint('./process-entry', baseUrl)).toEqual({
      path: path.join(testDir, 'process-entry.js'),
      execArgv: [],
    });
  });

  it('should start a TypeScript thread entry through the bootstrap', () => {
    expect(resolveThreadEntryPoint(baseUrl)).toEqual({
      path: path.join(testDir, 'thread-bootstrap.mjs'),
      execArgv: [],
    });
  });

  it('should start a compiled thread entry directly', () => {
    writeFileSync(path.join(testDir, 'thread-entry.js'), '');

    expect(resolveThreadEntryPoint(baseUrl)).toEqual({
      path: path.join(testDir, 'thread-entry.js'),
      execArgv: [],
    });
  });
});
