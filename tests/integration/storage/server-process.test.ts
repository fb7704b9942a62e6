/**
 * Span Server Process Integration Tests
 *
 * A separate parent process owns the span server so the parent can be
 * killed without taking the test runner down with it.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { spawn, type ChildProcess } from 'node:child_process';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { sleep } from '../../../src/shared/utils/retry.js';

const parentScript = fileURLToPath(new URL('../../fixtures/span-server-parent.ts', import.meta.url));

function readFirstLine(stream: Readable): Promise<string> {
  return new Promise((resolve, reject) => {
    const lines = createInterface({ input: stream });
    lines.once('line', (line) => {
      lines.close();
      resolve(line);
    });
    lines.once('close', () => reject(new Error('parent exited before reporting the server pid')));
  });
}

/**
 * A zombie still answers signal 0, so on Linux the process state decides
 */
function isAlive(pid: number): boolean {
  const statPath = `/proc/${pid}/stat`;
  if (existsSync('/proc/self/stat')) {
    if (!existsSync(statPath)) return false;
    const stat = readFileSync(statPath, 'utf8');
    return stat.charAt(stat.lastIndexOf(')') + 2) !== 'Z';
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isAlive(pid)) return true;
    await sleep(100);
  }
  return !isAlive(pid);
}

describe('SpanServerProcess', () => {
  let testDir: string;
  let parent: ChildProcess | undefined;
  let serverPid: number | undefined;

  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), 'treetrace-server-process-'));
  });

  afterEach(() => {
    parent?.kill('SIGKILL');
    if (serverPid !== undefined && isAlive(serverPid)) {
      process.kill(serverPid, 'SIGKILL');
    }
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should stop the server when its parent is killed', async () => {
    const child = spawn(process.execPath, ['--import', 'tsx', parentScript, path.join(testDir, 'traces.db')], {
      stdio: ['ignore', 'pipe', 'inherit'],
    });
    parent = child;
    if (!child.stdout) {
      throw new Error('parent stdout is not piped');
    }

    serverPid = Number(await readFirstLine(child.stdout));
    expect(Number.isInteger(serverPid)).toBe(true);
    expect(serverPid).toBeGreaterThan(0);
    expect(isAlive(serverPid)).toBe(true);

    child.kill('SIGKILL');

    await expect(waitForExit(serverPid, 10_000)).resolves.toBe(true);
  });
});
