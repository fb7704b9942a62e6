import { InvalidArgumentError } from 'commander';
import { validatePort, validatePositiveInteger, type ValidationResult } from '../../shared/validation/index.js';

function fromResult<T>(result: ValidationResult<T>): T {
  if (!result.valid) {
    throw new InvalidArgumentError(result.errors.map((error) => error.message).join('; '));
  }
  return result.value;
}

export function parsePortOption(value: string): number {
  return fromResult(validatePort(value));
}

export function parseIntervalOption(value: string): number {
  const numeric = /^\d+$/.test(value.trim()) ? parseInt(value.trim(), 10) : value;
  return fromResult(validatePositiveInteger(numeric, 'interval'));
}
