import { existsSync } from 'node:fs';
import * as path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { getDefaultDbPath, getWorkingDirectory } from '../../shared/config/env.js';
import { formatTree, treeToDict, type TreeDict } from '../../shared/tracing/index.js';
import { debug } from '../../shared/logging/logger.js';
import { parseJsonLog } from '../../infra/storage/json-log/parse-json-log.js';
import { SpanDatabase } from '../../infra/storage/sqlite/span-db.js';
import { SqliteTraceTree } from '../../infra/storage/sqlite/sqlite-tracing.js';
import { selectRootId } from '../../runtime/services/tree-watcher.js';

type ShowCommandOptions = {
  db?: string;
  log?: string;
  root?: string;
  json?: boolean;
  data?: boolean;
};

function findNode(tree: TreeDict, id: string): TreeDict | undefined {
  if (tree.id === id) return tree;
  for (const child of tree.children) {
    const found = findNode(child, id);
    if (found) return found;
  }
  return undefined;
}

/**
 * Load the tree to display from a database or a JSON log
 *
 * @throws Error when the source is missing, holds no trace or the root is unknown
 */
export async function loadTree(options: ShowCommandOptions, cwd: string = getWorkingDirectory()): Promise<TreeDict> {
  if (options.log) {
    const logPath = path.resolve(cwd, options.log);
    debug(`Reading trace log ${logPath}`);
    const tree = await treeToDict(parseJsonLog(logPath));
    if (!options.root) return tree;
    const node = findNode(tree, options.root);
    if (!node) {
      throw new Error(`Span ${options.root} not found in ${logPath}`);
    }
    return node;
  }

  const dbPath = options.db ? path.resolve(cwd, options.db) : getDefaultDbPath(cwd);
  if (!existsSync(dbPath)) {
    throw new Error(`Span database not found: ${dbPath}`);
  }
  debug(`Reading span database ${dbPath}`);
  const db = new SpanDatabase(dbPath);
  const rootId = selectRootId(db, options.root);
  if (!rootId) {
    throw new Error(`No traces found in ${dbPath}`);
  }
  if (!db.exists(rootId)) {
    throw new Error(`Span ${options.root ?? ''} not found in ${dbPath}`);
  }
  return treeToDict(new SqliteTraceTree(db, rootId));
}

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Print a trace tree from a span database or a JSON log')
    .option('--db <path>', 'SQLite span database (default: .treetrace/traces.db)')
    .option('--log <file>', 'JSON log file written by a JSON-log tracing')
    .option('--root <id>', 'Root span id (default: latest root)')
    .option('--json', 'Print the tree as JSON')
    .option('--data', 'Include span data in text output')
    .action(async (options: ShowCommandOptions) => {
      if (options.db && options.log) {
        console.error(chalk.red('\nUse either --db or --log, not both\n'));
        process.exit(1);
      }

      try {
        const tree = await loadTree(options);
        if (options.json) {
          console.log(JSON.stringify(tree, null, 2));
        } else {
          console.log(formatTree(tree, { showData: options.data }));
        }
      } catch (error) {
        console.error(chalk.red(`\n✗ ${error instanceof Error ? error.message : String(error)}\n`));
        process.exit(1);
      }
    });
}
