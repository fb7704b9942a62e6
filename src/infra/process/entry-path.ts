/**
 * Bootstrap Entry Resolution
 *
 * Entries are looked up beside the calling module: the compiled `.js` when
 * it exists, else the `.ts` source, which needs the tsx loader.
 */

import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export interface EntryPoint {
  /** Absolute file path */
  path: string;
  /** Node flags the entry needs */
  execArgv: string[];
}

export const TS_LOADER_ARGS: readonly string[] = ['--import', 'tsx'];

/**
 * Resolve `<relativePath>.js` or `<relativePath>.ts` against `baseUrl`
 *
 * @example
 * resolveEntryPoint('./process-entry', import.meta.url)
 */
export function resolveEntryPoint(relativePath: string, baseUrl: string | URL): EntryPoint {
  const jsPath = fileURLToPath(new URL(`${relativePath}.js`, baseUrl));
  if (existsSync(jsPath)) {
    return { path: jsPath, execArgv: [] };
  }
  const tsPath = fileURLToPath(new URL(`${relativePath}.ts`, baseUrl));
  return { path: tsPath, execArgv: [...TS_LOADER_ARGS] };
}

/**
 * Entry for worker threads
 *
 * A thread does not apply `--import` from its execArgv, so the `.ts` entry
 * is started through `thread-bootstrap.mjs`, which registers tsx inside
 * the thread and then imports `thread-entry.ts`.
 */
export function resolveThreadEntryPoint(baseUrl: string | URL): EntryPoint {
  const entry = resolveEntryPoint('./thread-entry', baseUrl);
  if (entry.execArgv.length === 0) {
    return entry;
  }
  return { path: fileURLToPath(new URL('./thread-bootstrap.mjs', baseUrl)), execArgv: [] };
}
