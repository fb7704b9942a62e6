/**
 * Centralized Size and Data Limits
 */

import { availableParallelism } from 'node:os';

/**
 * Largest request body the span server accepts (bytes)
 */
export const MAX_REQUEST_BODY_BYTES = 16 * 1024 * 1024;

/**
 * Default number of workers in a traced worker pool
 */
export function getDefaultPoolSize(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Deepest nesting the best-effort JSON encoder follows
 */
export const MAX_ENCODE_DEPTH = 32;
