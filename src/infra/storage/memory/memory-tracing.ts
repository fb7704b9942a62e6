/**
 * In-Memory Store
 *
 * Spans live in process memory; a span is its own tree node. Nothing is
 * persisted, and other isolates only receive a detached copy.
 */

import type { JsonObject } from '../../../shared/utils/json.js';
import { mergeObjectPatch } from '../../../shared/utils/merge-patch.js';
import { validateJsonObject, validateString, unwrapResult } from '../../../shared/validation/index.js';
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
  type TraceTree,
} from '../../../shared/tracing/index.js';

export const MEMORY_SPAN_KIND = 'memory';

export class MemorySpan extends BaseSpan implements TraceTree {
  private data: JsonObject;
  private readonly children: MemorySpan[] = [];

  constructor(
    readonly id: SpanId,
    private readonly name: string,
    data: JsonObject = {},
    readonly parent?: MemorySpan
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

  async getChildren(): Promise<MemorySpan[]> {
    return [...this.children];
  }

  async getParent(): Promise<MemorySpan | undefined> {
    return this.parent;
  }

  async newChild(name: string = DEFAULT_SPAN_NAME, data: JsonObject = {}): Promise<MemorySpan> {
    const child = new MemorySpan(newSpanId(), name, data, this);
    this.children.push(child);
    return child;
  }

  async updateData(patch: JsonObject): Promise<void> {
    this.data = mergeObjectPatch(this.data, patch);
  }

  /**
   * Snapshot of name and data; children created from the resolved copy stay
   * in the receiving isolate
   */
  toRef(): SpanRef {
    return {
      kind: MEMORY_SPAN_KIND,
      id: spanIdToString(this.id),
      locator: { name: this.name, data: structuredClone(this.data) },
    };
  }
}

export interface MemoryTracingOptions {
  rootName?: string;
  rootData?: JsonObject;
}

export class MemoryTracing extends BaseTracing<MemorySpan, MemorySpan> {
  private readonly root: MemorySpan;

  constructor(options: MemoryTracingOptions = {}) {
    super();
    this.root = new MemorySpan(newSpanId(), options.rootName ?? DEFAULT_ROOT_NAME, options.rootData);
  }

  getRootSpan(): MemorySpan {
    return this.root;
  }

  async getTree(): Promise<MemorySpan> {
    return this.root;
  }
}

/**
 * Rebuild a detached copy of a span from its snapshot
 */
export function resolveMemorySpanRef(ref: SpanRef): MemorySpan {
  const name = unwrapResult(validateString(ref.locator.name, 'locator.name'), 'memory span ref');
  const data = unwrapResult(validateJsonObject(ref.locator.data, 'locator.data'), 'memory span ref');
  return new MemorySpan(spanIdFromString(ref.id), name, data);
}

export function registerMemorySpanResolver(): void {
  registerSpanResolver(MEMORY_SPAN_KIND, resolveMemorySpanRef);
}
