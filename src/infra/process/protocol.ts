/**
 * Worker Messages
 *
 * Exchanged between a parent and a worker thread or child process. Every
 * payload is plain JSON so the same messages work over worker ports and
 * process IPC.
 */

import type { JsonValue } from '../../shared/utils/json.js';
import type { SpanRef } from '../../shared/tracing/index.js';
import { isRecord } from '../../shared/validation/index.js';

/**
 * Exported function to run in a worker
 */
export interface TaskSpec {
  /** Absolute path or file URL of the module */
  modulePath: string;
  /** Export to call (default: 'default') */
  exportName?: string;
  args?: JsonValue[];
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface RunTaskMessage {
  type: 'run';
  taskId: number;
  task: TaskSpec;
  /** Span current in the parent when the task was captured; null runs untraced */
  spanRef: SpanRef | null;
}

export interface ShutdownMessage {
  type: 'shutdown';
}

export type ParentMessage = RunTaskMessage | ShutdownMessage;

export interface ReadyMessage {
  type: 'ready';
  pid: number;
}

export interface TaskResultMessage {
  type: 'result';
  taskId: number;
  value: JsonValue;
}

export interface TaskErrorMessage {
  type: 'error';
  taskId: number;
  error: SerializedError;
}

export type WorkerMessage = ReadyMessage | TaskResultMessage | TaskErrorMessage;

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'Error', message: String(error) };
}

export function isSerializedError(value: unknown): value is SerializedError {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.message === 'string' &&
    (value.stack === undefined || typeof value.stack === 'string')
  );
}

export function isTaskSpec(value: unknown): value is TaskSpec {
  return (
    isRecord(value) &&
    typeof value.modulePath === 'string' &&
    (value.exportName === undefined || typeof value.exportName === 'string') &&
    (value.args === undefined || Array.isArray(value.args))
  );
}

export function isParentMessage(value: unknown): value is ParentMessage {
  if (!isRecord(value)) return false;
  if (value.type === 'shutdown') return true;
  return (
    value.type === 'run' &&
    typeof value.taskId === 'number' &&
    isTaskSpec(value.task) &&
    (value.spanRef === null || isRecord(value.spanRef))
  );
}

export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case 'ready':
      return typeof value.pid === 'number';
    case 'result':
      return typeof value.taskId === 'number' && 'value' in value;
    case 'error':
      return typeof value.taskId === 'number' && isSerializedError(value.error);
    default:
      return false;
  }
}
