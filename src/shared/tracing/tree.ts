/**
 * Tree Rendering
 *
 * Materializes a TraceTree into plain data and renders it as indented text.
 */

import type { JsonObject } from '../utils/json.js';
import { spanIdToString } from './ids.js';
import { END_TIME_KEY, START_TIME_KEY } from './constants.js';
import type { TraceTree } from './types.js';

/**
 * Plain, JSON-serializable snapshot of a tree
 */
export interface TreeDict {
  id: string;
  name: string;
  data: JsonObject;
  children: TreeDict[];
}

/**
 * Read a whole tree into a snapshot, children in creation order
 */
export async function treeToDict(tree: TraceTree): Promise<TreeDict> {
  const [name, data, children] = await Promise.all([tree.getName(), tree.getData(), tree.getChildren()]);
  return {
    id: spanIdToString(tree.id),
    name,
    data,
    children: await Promise.all(children.map(treeToDict)),
  };
}

/**
 * Number of nodes in a snapshot
 */
export function countNodes(dict: TreeDict): number {
  return dict.children.reduce((total, child) => total + countNodes(child), 1);
}

export interface FormatTreeOptions {
  /** Include span data after each name (default: false) */
  showData?: boolean;
  /** Indentation per level (default: 2) */
  indent?: number;
}

function durationMs(data: JsonObject): number | undefined {
  const start = data[START_TIME_KEY];
  const end = data[END_TIME_KEY];
  if (typeof start !== 'string' || typeof end !== 'string') return undefined;
  const ms = Date.parse(end) - Date.parse(start);
  return Number.isNaN(ms) ? undefined : ms;
}

/**
 * Render a snapshot as indented text
 *
 * One line per node: name, short id (last 8 characters) and duration
 * once the span has both timestamps.
 */
export function formatTree(dict: TreeDict, options: FormatTreeOptions = {}): string {
  const { showData = false, indent = 2 } = options;
  const lines: string[] = [];

  function formatNode(node: TreeDict, depth: number): void {
    const prefix = ' '.repeat(depth * indent);
    const duration = durationMs(node.data);
    let line = `${prefix}${node.name} [${node.id.slice(-8)}]`;
    if (duration !== undefined) {
      line += ` ${duration}ms`;
    }
    if (showData) {
      line += ` ${JSON.stringify(node.data)}`;
    }
    lines.push(line);

    for (const child of node.children) {
      formatNode(child, depth + 1);
    }
  }

  formatNode(dict, 0);
  return lines.join('\n');
}
