/**
 * Centralized Environment Variable Definitions
 *
 * All TREETRACE_* environment variables are defined here
 * to provide a single source of truth and avoid scattered parsing logic.
 */

import * as path from 'node:path';
import { InvalidConfigValueError } from '../errors/config.js';
import { getTreetraceFiles, getTreetracePaths } from './paths.js';

/**
 * Environment variable names used by treetrace
 */
export const ENV_VARS = {
  // =============================================================================
  // Core Configuration
  // =============================================================================

  /** Current working directory override */
  CWD: 'TREETRACE_CWD',

  /** Default SQLite database path for the CLI and tree watcher */
  DB_PATH: 'TREETRACE_DB_PATH',

  // =============================================================================
  // Logging and Debug
  // =============================================================================

  /** Enable plain logs without formatting */
  PLAIN_LOGS: 'TREETRACE_PLAIN_LOGS',

  /** Log output format (text, json, pretty) */
  LOG_FORMAT: 'TREETRACE_LOG_FORMAT',

  /** Debug mode flag (standard) */
  DEBUG: 'DEBUG',

  /** Log level (debug, info, warn, error) */
  LOG_LEVEL: 'LOG_LEVEL',

  // =============================================================================
  // Span Server
  // =============================================================================

  /** Host the span server binds to */
  SERVER_HOST: 'TREETRACE_SERVER_HOST',

  /** Port the span server binds to (0 picks a free port) */
  SERVER_PORT: 'TREETRACE_SERVER_PORT',

  /** Readiness wait override in milliseconds */
  READY_TIMEOUT_MS: 'TREETRACE_READY_TIMEOUT_MS',
} as const;

/**
 * Get environment variable value with optional default
 */
export function getEnv(name: string, defaultValue?: string): string | undefined {
  return process.env[name] ?? defaultValue;
}

/**
 * Get environment variable as boolean
 * Returns true for '1', 'true', 'yes' (case-insensitive)
 */
export function getEnvBoolean(name: string, defaultValue = false): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;

  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

/**
 * Get environment variable as integer
 */
export function getEnvInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Check if debug mode is enabled
 * Checks both LOG_LEVEL=debug and DEBUG environment variables
 */
export function isDebugEnabled(): boolean {
  const logLevel = (process.env[ENV_VARS.LOG_LEVEL] || '').trim().toLowerCase();
  const debugFlag = (process.env[ENV_VARS.DEBUG] || '').trim().toLowerCase();

  return (
    logLevel === 'debug' ||
    (debugFlag !== '' && debugFlag !== '0' && debugFlag !== 'false')
  );
}

/**
 * Check if plain logs are enabled (no color/formatting)
 */
export function isPlainLogsEnabled(): boolean {
  return getEnvBoolean(ENV_VARS.PLAIN_LOGS);
}

/**
 * Get the current working directory (with override support)
 */
export function getWorkingDirectory(fallback: string = process.cwd()): string {
  return process.env[ENV_VARS.CWD] || fallback;
}

/**
 * Resolve the database path: explicit env override, else `.treetrace/traces.db`
 */
export function getDefaultDbPath(cwd: string = getWorkingDirectory()): string {
  const override = process.env[ENV_VARS.DB_PATH];
  if (override) {
    return path.resolve(cwd, override);
  }
  return getTreetraceFiles(cwd).tracesDb;
}

/**
 * Directory JSON-log tracings write to when given no path
 */
export function getDefaultLogDir(cwd: string = getWorkingDirectory()): string {
  return getTreetracePaths(cwd).logs;
}

/**
 * Span server port from TREETRACE_SERVER_PORT (0 picks a free port)
 *
 * @throws InvalidConfigValueError when the value is not a port number
 */
export function getServerPort(defaultPort = 0): number {
  const raw = (process.env[ENV_VARS.SERVER_PORT] ?? '').trim();
  if (raw === '') return defaultPort;

  const port = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!(port >= 0 && port <= 65535)) {
    throw new InvalidConfigValueError(ENV_VARS.SERVER_PORT, raw, 'an integer from 0 to 65535');
  }
  return port;
}
