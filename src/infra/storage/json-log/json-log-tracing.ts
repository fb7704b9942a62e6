/**
 * JSON Log Store
 *
 * Spans keep name and data in memory and append one line to the log when
 * they close. The root closes last, when the tracing exits; its line is
 * always the final one for a complete trace.
 */

import { appendFileSync, existsSync, mkdirSync, statSync } from 'node:fs';
import * as path from 'node:path';
import { getDefaultLogDir } from '../../../shared/config/env.js';
import { JSON_LOG_EXTENSION } from '../../../shared/config/paths.js';
import { createChildLogger } from '../../../shared/logging/structured.js';
import type { JsonObject } from '../../../shared/utils/json.js';
import { mergeObjectPatch } from '../../../shared/utils/merge-patch.js';
import { validateNonEmptyString, validateString, unwrapResult } from '../../../shared/validation/index.js';
import {
  BaseSpan,
  BaseTracing,
  DEFAULT_ROOT_NAME,
  DEFAULT_SPAN_NAME,
  newSpanId,
  registerSpanResolver,
  spanIdFromString,
  spanIdToString,
  type SpanId,
  type SpanRef,
} from '../../../shared/tracing/index.js';
import { formatJsonLogLine, parseJsonLog, type JsonLogTraceTree } from './parse-json-log.js';

export const JSON_LOG_SPAN_KIND = 'json-log';

const log = createChildLogger({ component: 'json-log' });

/**
 * Resolve the file a tracing writes to
 *
 * An existing directory gets a fresh, timestamp-named file inside it;
 * missing parent directories are created.
 */
export function prepareLogPath(logPath: string): string {
  let filePath = path.resolve(logPath);
  if (existsSync(filePath) && statSync(filePath).isDirectory()) {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    filePath = path.join(filePath, `${stamp}-${spanIdToString(newSpanId()).slice(-6)}${JSON_LOG_EXTENSION}`);
  }
  mkdirSync(path.dirname(filePath), { recursive: true });
  return filePath;
}

export class JsonLogSpan extends BaseSpan {
  private data: JsonObject;
  private closed = false;

  /**
   * @param persist - false for a span rebuilt in another isolate: its own
   *   line belongs to the isolate that created it
   */
  constructor(
    readonly logPath: string,
    readonly id: SpanId,
    private readonly name: string,
    readonly parentId: SpanId | null,
    data: JsonObject = {},
    private readonly persist = true
  ) {
    super();
    this.data = { ...data };
  }

  async getName(): Promise<string> {
    return this.name;
  }

  async getData(): Promise<JsonObject> {
    return structuredClone(this.data);
  }

  async newChild(name: string = DEFAULT_SPAN_NAME, data: JsonObject = {}): Promise<JsonLogSpan> {
    return new JsonLogSpan(this.logPath, newSpanId(), name, this.id, data);
  }

  /**
   * After close every update appends a new line, which supersedes the
   * previous one when the log is read. A span rebuilt from a reference
   * keeps updates in memory only.
   */
  async updateData(patch: JsonObject): Promise<void> {
    this.data = mergeObjectPatch(this.data, patch);
    if (!this.persist) {
      log.warn('Update to a JSON log span from another isolate is not written to the log', {
        spanId: spanIdToString(this.id),
        keys: Object.keys(patch),
      });
      return;
    }
    if (this.closed) {
      this.write();
    }
  }

  override async close(): Promise<void> {
    await super.close();
    this.closed = true;
    this.write();
  }

  toRef(): SpanRef {
    return {
      kind: JSON_LOG_SPAN_KIND,
      id: spanIdToString(this.id),
      locator: { logPath: this.logPath, name: this.name },
    };
  }

  private write(): void {
    if (!this.persist) return;
    const line = formatJsonLogLine({
      id: spanIdToString(this.id),
      name: this.name,
      parentId: this.parentId ? spanIdToString(this.parentId) : null,
      data: this.data,
    });
    appendFileSync(this.logPath, line + '\n', 'utf-8');
  }
}

export interface JsonLogTracingOptions {
  /** Log file, or a directory to create a fresh log file in (default: .treetrace/logs) */
  logPath?: string;
  rootName?: string;
}

export class JsonLogTracing extends BaseTracing<JsonLogSpan, JsonLogTraceTree> {
  readonly logPath: string;
  private readonly root: JsonLogSpan;

  constructor(options: JsonLogTracingOptions = {}) {
    super();
    this.logPath = prepareLogPath(options.logPath ?? getDefaultLogDir());
    this.root = new JsonLogSpan(this.logPath, newSpanId(), options.rootName ?? DEFAULT_ROOT_NAME, null);
  }

  getRootSpan(): JsonLogSpan {
    return this.root;
  }

  /**
   * Read the tree back from the log; complete once the tracing has closed
   */
  async getTree(): Promise<JsonLogTraceTree> {
    return parseJsonLog(this.logPath);
  }

  protected override async start(): Promise<void> {
    this.log.info('Writing trace log', { logPath: this.logPath, rootId: spanIdToString(this.root.id) });
  }
}

/**
 * Rebuild a span that appends its children to the same log
 *
 * The span's own line is written by the isolate that created it, so
 * `updateData` on the rebuilt span is not persisted and logs a warning.
 * Record data in a child span instead.
 */
export function resolveJsonLogSpanRef(ref: SpanRef): JsonLogSpan {
  const logPath = unwrapResult(validateNonEmptyString(ref.locator.logPath, 'locator.logPath'), 'JSON log span ref');
  const name = unwrapResult(validateString(ref.locator.name, 'locator.name'), 'JSON log span ref');
  return new JsonLogSpan(logPath, spanIdFromString(ref.id), name, null, {}, false);
}

export function registerJsonLogSpanResolver(): void {
  registerSpanResolver(JSON_LOG_SPAN_KIND, resolveJsonLogSpanRef);
}
