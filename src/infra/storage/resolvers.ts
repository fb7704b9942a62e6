/**
 * Registers the span resolver of every built-in store
 */

import { registerJsonLogSpanResolver } from './json-log/json-log-tracing.js';
import { registerMemorySpanResolver } from './memory/memory-tracing.js';
import { registerRemoteSpanResolver } from './remote/remote-tracing.js';
import { registerSqliteSpanResolver } from './sqlite/sqlite-tracing.js';

export function registerBuiltinSpanResolvers(): void {
  registerMemorySpanResolver();
  registerJsonLogSpanResolver();
  registerSqliteSpanResolver();
  registerRemoteSpanResolver();
}
