import * as path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { getDefaultDbPath, getWorkingDirectory } from '../../shared/config/env.js';
import { TREE_WATCH_INTERVAL_MS } from '../../shared/config/timeouts.js';
import { countNodes, formatTree } from '../../shared/tracing/index.js';
import { TreeWatcher } from '../../runtime/services/tree-watcher.js';
import { parseIntervalOption } from './options.js';

type WatchCommandOptions = {
  db?: string;
  root?: string;
  interval?: number;
  data?: boolean;
};

export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Reprint the latest trace tree whenever it changes')
    .option('--db <path>', 'SQLite span database (default: .treetrace/traces.db)')
    .option('--root <id>', 'Root span id (default: latest root)')
    .option('--interval <ms>', 'Polling interval in milliseconds', parseIntervalOption)
    .option('--data', 'Include span data')
    .action((options: WatchCommandOptions) => {
      const cwd = getWorkingDirectory();
      const dbPath = options.db ? path.resolve(cwd, options.db) : getDefaultDbPath(cwd);
      const watcher = new TreeWatcher({
        dbPath,
        rootId: options.root,
        intervalMs: options.interval ?? TREE_WATCH_INTERVAL_MS,
      });

      watcher.on('change', (change) => {
        const stamp = new Date(change.lastUpdated * 1000).toISOString();
        console.log(chalk.bold(`\n── ${change.rootId} · ${countNodes(change.tree)} spans · ${stamp}`));
        console.log(formatTree(change.tree, { showData: options.data }));
      });
      watcher.on('error', (error) => {
        console.error(chalk.red(`✗ ${error.message}`));
      });

      const shutdown = (): void => {
        watcher.stop();
        process.exit(0);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      console.log(chalk.gray(`Watching ${dbPath} (Ctrl+C to stop)`));
      watcher.start();
    });
}
