/**
 * Configuration-related errors
 *
 * Covers invalid environment values and CLI options.
 */

import { TreetraceError } from './base.js';

/**
 * Configuration error codes - union of all possible config error types
 */
export type ConfigErrorCode =
  | 'CONFIG_ERROR'
  | 'INVALID_CONFIG_VALUE';

/**
 * Base class for all configuration errors
 */
export class ConfigError extends TreetraceError {
  declare readonly code: ConfigErrorCode;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    (this as { code: ConfigErrorCode }).code = 'CONFIG_ERROR';
  }
}

/**
 * Invalid configuration value
 */
export class InvalidConfigValueError extends ConfigError {
  declare readonly code: 'INVALID_CONFIG_VALUE';
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown, expected?: string) {
    const exp = expected ? ` Expected: ${expected}` : '';
    super(`Invalid configuration value for '${key}': ${String(value)}.${exp}`);
    (this as { code: 'INVALID_CONFIG_VALUE' }).code = 'INVALID_CONFIG_VALUE';
    this.key = key;
    this.value = value;
  }
}
