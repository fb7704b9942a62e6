import * as path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { ENV_VARS, getDefaultDbPath, getEnv, getServerPort, getWorkingDirectory } from '../../shared/config/env.js';
import { startSpanServer } from '../../infra/storage/remote/server.js';
import { parsePortOption } from './options.js';

type ServeCommandOptions = {
  db?: string;
  host?: string;
  port?: number;
};

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run a span server in the foreground')
    .option('--db <path>', 'SQLite span database (default: .treetrace/traces.db)')
    .option('--host <host>', 'Address to bind', getEnv(ENV_VARS.SERVER_HOST, '127.0.0.1'))
    .option('--port <port>', 'Port to listen on (0 picks a free port)', parsePortOption)
    .action(async (options: ServeCommandOptions) => {
      const cwd = getWorkingDirectory();
      const dbPath = options.db ? path.resolve(cwd, options.db) : getDefaultDbPath(cwd);

      try {
        const port = options.port ?? getServerPort();
        const server = await startSpanServer({ dbPath, host: options.host, port });
        console.log(`\n${chalk.green('●')} Span server listening at ${chalk.cyan(server.url)}`);
        console.log(chalk.gray(`  database: ${server.db.dbPath}`));
        console.log(chalk.gray('  Hit Ctrl+C to stop\n'));

        const shutdown = (): void => {
          server.close().then(
            () => process.exit(0),
            (error: unknown) => {
              console.error(chalk.red(`\n✗ ${error instanceof Error ? error.message : String(error)}`));
              process.exit(1);
            }
          );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (error) {
        console.error(chalk.red(`\n✗ Span server failed to start: ${error instanceof Error ? error.message : String(error)}\n`));
        process.exit(1);
      }
    });
}
