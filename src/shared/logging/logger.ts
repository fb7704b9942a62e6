/**
 * Module-level logging shorthands over the structured logger
 *
 * Extra arguments are folded into the message the way `console.*` does,
 * with `Error` arguments routed to the entry's error field.
 */

import { format } from 'node:util';
import { logDebug, logError, logInfo, logWarn } from './structured.js';

function split(args: unknown[]): { message: string; error?: Error } {
  const error = args.find((arg): arg is Error => arg instanceof Error);
  const rest = error ? args.filter((arg) => arg !== error) : args;
  return { message: format(...rest), error };
}

export function debug(...args: unknown[]): void {
  logDebug(split(args).message);
}

export function info(...args: unknown[]): void {
  logInfo(split(args).message);
}

export function warn(...args: unknown[]): void {
  const { message, error } = split(args);
  logWarn(message, undefined, error);
}

export function error(...args: unknown[]): void {
  const { message, error: err } = split(args);
  logError(message, undefined, err);
}
