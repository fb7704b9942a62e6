/**
 * Centralized Path Constants
 *
 * All .treetrace directory paths and common file locations
 * are defined here to ensure consistency across the codebase.
 */

import * as path from 'node:path';

/**
 * Root directory name for treetrace state
 */
export const TREETRACE_ROOT_DIR = '.treetrace';

/**
 * Subdirectory names within .treetrace
 */
export const TREETRACE_DIRS = {
  /** JSON span logs */
  LOGS: 'logs',
} as const;

/**
 * Common file names within .treetrace
 */
export const TREETRACE_FILES = {
  /** SQLite span store */
  TRACES_DB: 'traces.db',
} as const;

/**
 * File extension used for JSON span logs
 */
export const JSON_LOG_EXTENSION = '.jsonl';

/**
 * Get the .treetrace root path for a given working directory
 */
export function getTreetraceRoot(cwd: string): string {
  return path.join(cwd, TREETRACE_ROOT_DIR);
}

/**
 * Get subdirectory paths within .treetrace
 */
export function getTreetracePaths(cwd: string) {
  const root = getTreetraceRoot(cwd);

  return {
    root,
    logs: path.join(root, TREETRACE_DIRS.LOGS),
  };
}

/**
 * Get common file paths within .treetrace
 */
export function getTreetraceFiles(cwd: string) {
  const paths = getTreetracePaths(cwd);

  return {
    tracesDb: path.join(paths.root, TREETRACE_FILES.TRACES_DB),
  };
}
