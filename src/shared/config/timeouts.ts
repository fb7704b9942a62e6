/**
 * Centralized Timeout Constants
 *
 * All timeout values used throughout the codebase are defined here
 * to ensure consistency and easy configuration.
 */

import { ENV_VARS, getEnvInt } from './env.js';

// =============================================================================
// Process Timeouts
// =============================================================================

/**
 * Force kill timeout after SIGTERM (ms)
 * Time to wait before sending SIGKILL after SIGTERM
 */
export const FORCE_KILL_TIMEOUT_MS = 1000;

/**
 * Maximum time a forked span server has to report its address (ms)
 */
export const SERVER_START_TIMEOUT_MS = 30000;

/**
 * Maximum time a worker thread or child process has to report ready (ms)
 */
export const WORKER_START_TIMEOUT_MS = 30000;

// =============================================================================
// Span Server Readiness
// =============================================================================

/**
 * Default bound for waiting until a span server answers the readiness probe (ms)
 */
export const SERVER_READY_TIMEOUT_MS = 30000;

/**
 * Interval between readiness probes (ms)
 */
export const SERVER_READY_POLL_INTERVAL_MS = 500;

/**
 * Timeout of a single request to the span server (ms)
 */
export const REQUEST_TIMEOUT_MS = 10000;

/**
 * Readiness bound with TREETRACE_READY_TIMEOUT_MS override
 */
export function getServerReadyTimeoutMs(): number {
  const value = getEnvInt(ENV_VARS.READY_TIMEOUT_MS, SERVER_READY_TIMEOUT_MS);
  return value > 0 ? value : SERVER_READY_TIMEOUT_MS;
}

// =============================================================================
// Database Timeouts
// =============================================================================

/**
 * SQLite busy timeout (ms)
 * How long SQLite waits for a locked database
 */
export const SQLITE_BUSY_TIMEOUT_MS = 5000;

// =============================================================================
// Tree Watching
// =============================================================================

/**
 * Tree watcher polling interval (ms)
 */
export const TREE_WATCH_INTERVAL_MS = 500;

// =============================================================================
// Retry Configuration
// =============================================================================

/**
 * Database retry configuration
 */
export const DATABASE_RETRY_CONFIG = {
  maxAttempts: 5,
  initialDelayMs: 50,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
} as const;
