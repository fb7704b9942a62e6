/**
 * JSON Log Parsing
 *
 * A log holds one JSON object per line: `{ id, name, parent_id, data }`.
 * A span written more than once (data updated after close) is represented
 * by its last line.
 */

import { readFileSync } from 'node:fs';
import type { JsonObject } from '../../../shared/utils/json.js';
import { parseJsonObject } from '../../../shared/utils/json.js';
import { TreeStructureError } from '../../../shared/errors/index.js';
import {
  validateJsonObject,
  validateSpanIdString,
  validateString,
  validateOptional,
  unwrapResult,
} from '../../../shared/validation/index.js';
import {
  compareSpanIds,
  spanIdFromString,
  spanIdToString,
  type SpanId,
  type TraceTree,
} from '../../../shared/tracing/index.js';

/**
 * One parsed log line
 */
export interface JsonLogNode {
  id: string;
  name: string;
  parentId: string | null;
  data: JsonObject;
}

/**
 * Node of a tree read back from a log
 */
export class JsonLogTraceTree implements TraceTree {
  readonly id: SpanId;
  readonly children: JsonLogTraceTree[] = [];
  parent: JsonLogTraceTree | undefined;

  constructor(private readonly node: JsonLogNode) {
    this.id = spanIdFromString(node.id);
  }

  get name(): string {
    return this.node.name;
  }

  get data(): JsonObject {
    return this.node.data;
  }

  get parentId(): string | null {
    return this.node.parentId;
  }

  async getName(): Promise<string> {
    return this.node.name;
  }

  async getData(): Promise<JsonObject> {
    return structuredClone(this.node.data);
  }

  async getChildren(): Promise<JsonLogTraceTree[]> {
    return [...this.children];
  }

  async getParent(): Promise<JsonLogTraceTree | undefined> {
    return this.parent;
  }
}

/**
 * Serialize a node as one log line (without the newline)
 */
export function formatJsonLogLine(node: JsonLogNode): string {
  return JSON.stringify({ id: node.id, name: node.name, parent_id: node.parentId, data: node.data });
}

/**
 * Parse one log line
 *
 * @throws SyntaxError for text that is not a JSON object
 * @throws ValidationError for an object without the expected fields
 */
export function parseJsonLogLine(line: string): JsonLogNode {
  const obj = parseJsonObject(line);
  const context = 'JSON log line';
  return {
    id: unwrapResult(validateSpanIdString(obj.id, 'id'), context),
    name: unwrapResult(validateString(obj.name, 'name'), context),
    parentId: unwrapResult(validateOptional(obj.parent_id, (v) => validateSpanIdString(v, 'parent_id')), context) ?? null,
    data: unwrapResult(validateJsonObject(obj.data, 'data'), context),
  };
}

/**
 * Link nodes into a tree by `parentId`
 *
 * Children are ordered by id, which is creation order.
 *
 * @throws TreeStructureError when there is no root, more than one root, or
 *   a node names a parent that is not in the log
 */
export function buildTreeFromNodes(nodes: Iterable<JsonLogNode>): JsonLogTraceTree {
  const byId = new Map<string, JsonLogTraceTree>();
  for (const node of nodes) {
    byId.set(node.id, new JsonLogTraceTree(node));
  }

  const roots: JsonLogTraceTree[] = [];
  for (const tree of byId.values()) {
    const parentId = tree.parentId;
    if (parentId === null) {
      roots.push(tree);
      continue;
    }
    const parent = byId.get(parentId);
    if (!parent) {
      throw new TreeStructureError(`Span ${spanIdToString(tree.id)} names unknown parent ${parentId}`);
    }
    tree.parent = parent;
    parent.children.push(tree);
  }

  if (roots.length === 0) {
    throw new TreeStructureError('No root span found');
  }
  if (roots.length > 1) {
    throw new TreeStructureError(
      `More than one root span found: ${roots.map((root) => spanIdToString(root.id)).join(', ')}`
    );
  }

  for (const tree of byId.values()) {
    tree.children.sort((a, b) => compareSpanIds(a.id, b.id));
  }
  return roots[0];
}

/**
 * Read a log file and build its tree
 *
 * Blank lines are skipped.
 *
 * @throws TreeStructureError for an empty log or a malformed tree
 */
export function parseJsonLog(logPath: string): JsonLogTraceTree {
  const lines = readFileSync(logPath, 'utf-8')
    .split('\n')
    .filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new TreeStructureError(`No spans found in ${logPath}`);
  }
  return buildTreeFromNodes(lines.map(parseJsonLogLine));
}
