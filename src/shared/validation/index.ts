/**
 * Input Validation Framework
 *
 * Centralized validation utilities for wire payloads, span references
 * and user inputs with type-safe error messages.
 */

export * from './validators.js';
export * from './schemas.js';
export * from './errors.js';
