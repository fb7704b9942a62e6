/**
 * Shared Configuration Module
 *
 * Re-exports all configuration constants and utilities
 */

export * from './paths.js';
export * from './timeouts.js';
export * from './env.js';
export * from './limits.js';
