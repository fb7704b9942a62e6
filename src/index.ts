/**
 * treetrace
 *
 * Execution tracing with nested spans, a current span that follows async
 * work into worker threads and child processes, and interchangeable span
 * stores (memory, JSON log, SQLite, SQLite behind an HTTP span server).
 */

export * from './shared/tracing/index.js';
export * from './shared/errors/index.js';
export * from './infra/storage/index.js';
export * from './infra/process/index.js';
export { TreeWatcher, selectRootId, type TreeChange, type TreeWatcherConfig } from './runtime/services/tree-watcher.js';
export {
  configureLogger,
  configureLoggerFromEnv,
  createChildLogger,
  LogBuffer,
  type LogEntry,
  type LogFormat,
  type LoggerConfig,
  type LogLevel,
} from './shared/logging/structured.js';
export { mergeObjectPatch, mergePatch } from './shared/utils/merge-patch.js';
export { toJsonValue, type JsonObject, type JsonValue } from './shared/utils/json.js';
