import { readFileSync } from 'node:fs';
import { Command, Option } from 'commander';

import { configureLogger, isLogFormat, isLogLevel, type LoggerConfig } from '../shared/logging/structured.js';
import { registerServeCommand } from './commands/serve.command.js';
import { registerShowCommand } from './commands/show.command.js';
import { registerWatchCommand } from './commands/watch.command.js';

type GlobalOptions = {
  logLevel?: string;
  logFormat?: string;
};

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }
  return '0.0.0';
}

/**
 * Apply the global logging flags before any command runs
 */
export function applyGlobalOptions(options: GlobalOptions): void {
  const config: Partial<LoggerConfig> = {};
  if (options.logLevel && isLogLevel(options.logLevel)) config.level = options.logLevel;
  if (options.logFormat && isLogFormat(options.logFormat)) config.format = options.logFormat;
  configureLogger(config);
}

export function createProgram(): Command {
  const program = new Command()
    .name('treetrace')
    .description('Inspect and serve execution trace trees')
    .version(readVersion())
    .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
    .addOption(new Option('--log-format <format>', 'Log format').choices(['text', 'json', 'pretty']));

  program.hook('preAction', (thisCommand) => {
    applyGlobalOptions(thisCommand.opts<GlobalOptions>());
  });

  registerShowCommand(program);
  registerWatchCommand(program);
  registerServeCommand(program);

  return program;
}
