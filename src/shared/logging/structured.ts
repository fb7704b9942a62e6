/**
 * Structured Logging
 *
 * Every entry carries the display id of the span that was current when it
 * was written, so log lines can be matched to the trace tree. Entries go
 * to stderr by default; stdout stays free for CLI output.
 */

import chalk, { type ChalkInstance } from 'chalk';
import { getCurrentSpan } from '../tracing/context.js';
import { spanIdToString } from '../tracing/ids.js';
import { ENV_VARS, getEnv, isDebugEnabled, isPlainLogsEnabled } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text' | 'pretty';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Display id of the current span, if any */
  spanId?: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  format: LogFormat;
  includeStackTrace: boolean;
  includeSpanId: boolean;
  /** Text format only */
  includeTimestamp: boolean;
  /** Text format only */
  colorize: boolean;
  output: 'stdout' | 'stderr';
  /** Merged under the context of every entry */
  defaultContext?: LogContext;
}

const LEVELS: Record<LogLevel, { priority: number; color: ChalkInstance }> = {
  debug: { priority: 0, color: chalk.gray },
  info: { priority: 1, color: chalk.blue },
  warn: { priority: 2, color: chalk.yellow },
  error: { priority: 3, color: chalk.red },
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'text',
  includeStackTrace: true,
  includeSpanId: true,
  includeTimestamp: true,
  colorize: true,
  output: 'stderr',
};

let currentConfig: LoggerConfig = { ...DEFAULT_CONFIG };

type LogListener = (entry: LogEntry) => void;
const listeners: LogListener[] = [];

export function configureLogger(config: Partial<LoggerConfig>): void {
  currentConfig = { ...currentConfig, ...config };
}

/**
 * Apply LOG_LEVEL (or DEBUG), TREETRACE_LOG_FORMAT and TREETRACE_PLAIN_LOGS
 *
 * Unknown level or format names are ignored.
 */
export function configureLoggerFromEnv(): void {
  const level = (getEnv(ENV_VARS.LOG_LEVEL) ?? '').trim().toLowerCase();
  const format = (getEnv(ENV_VARS.LOG_FORMAT) ?? '').trim().toLowerCase();
  const config: Partial<LoggerConfig> = {};

  if (isDebugEnabled()) {
    config.level = 'debug';
  } else if (isLogLevel(level)) {
    config.level = level;
  }
  if (isLogFormat(format)) {
    config.format = format;
  }
  if (isPlainLogsEnabled()) {
    config.colorize = false;
  }
  configureLogger(config);
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function isLogFormat(value: string): value is LogFormat {
  return Object.hasOwn(FORMATTERS, value);
}

export function getLoggerConfig(): LoggerConfig {
  return { ...currentConfig };
}

/**
 * Receive every entry that passes the level filter
 *
 * @returns unsubscribe function
 */
export function addLogListener(listener: LogListener): () => void {
  listeners.push(listener);
  return () => {
    const index = listeners.indexOf(listener);
    if (index >= 0) {
      listeners.splice(index, 1);
    }
  };
}

function createEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };

  const span = currentConfig.includeSpanId ? getCurrentSpan() : undefined;
  if (span) {
    entry.spanId = spanIdToString(span.id);
  }
  if (context || currentConfig.defaultContext) {
    entry.context = { ...currentConfig.defaultContext, ...context };
  }
  if (error) {
    entry.error = { name: error.name, message: error.message };
    if (currentConfig.includeStackTrace && error.stack) {
      entry.error.stack = error.stack;
    }
  }
  return entry;
}

function formatText(entry: LogEntry): string {
  const paint = (color: ChalkInstance, text: string): string => (currentConfig.colorize ? color(text) : text);
  const parts: string[] = [];

  if (currentConfig.includeTimestamp) {
    parts.push(paint(chalk.dim, entry.timestamp));
  }
  parts.push(`[${paint(LEVELS[entry.level].color, entry.level.toUpperCase().padEnd(5))}]`);
  if (entry.spanId) {
    // last 8 characters, the same short id the tree renderer prints
    parts.push(paint(chalk.cyan, `[${entry.spanId.slice(-8)}]`));
  }
  parts.push(entry.message);

  const contextPairs = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  if (contextPairs.length > 0) {
    parts.push(paint(chalk.dim, contextPairs.join(' ')));
  }
  if (entry.error) {
    parts.push(paint(chalk.red, `${entry.error.name}: ${entry.error.message}`));
  }

  const line = parts.join(' ');
  return entry.error?.stack ? `${line}\n${paint(chalk.dim, entry.error.stack)}` : line;
}

const FORMATTERS: Record<LogFormat, (entry: LogEntry) => string> = {
  json: (entry) => JSON.stringify(entry),
  pretty: (entry) => JSON.stringify(entry, null, 2),
  text: formatText,
};

function notifyListeners(entry: LogEntry): void {
  for (const listener of [...listeners]) {
    try {
      listener(entry);
    } catch (listenerError) {
      const reason = listenerError instanceof Error ? listenerError.message : String(listenerError);
      process.stderr.write(`log listener failed: ${reason}\n`);
    }
  }
}

function log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
  if (LEVELS[level].priority < LEVELS[currentConfig.level].priority) return;

  const entry = createEntry(level, message, context, error);
  const stream = currentConfig.output === 'stdout' ? process.stdout : process.stderr;
  stream.write(FORMATTERS[currentConfig.format](entry) + '\n');
  notifyListeners(entry);
}

export function logDebug(message: string, context?: LogContext): void {
  log('debug', message, context);
}

export function logInfo(message: string, context?: LogContext): void {
  log('info', message, context);
}

export function logWarn(message: string, context?: LogContext, error?: Error): void {
  log('warn', message, context, error);
}

export function logError(message: string, context?: LogContext, error?: Error): void {
  log('error', message, context, error);
}

export interface ChildLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: Error): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logger whose entries always carry `defaultContext`
 *
 * @example
 * const log = createChildLogger({ component: 'span-server' });
 * log.info('Span server listening', { url });
 */
export function createChildLogger(defaultContext: LogContext): ChildLogger {
  return {
    debug: (message, context) => log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) => log('info', message, { ...defaultContext, ...context }),
    warn: (message, context, error) => log('warn', message, { ...defaultContext, ...context }, error),
    error: (message, context, error) => log('error', message, { ...defaultContext, ...context }, error),
  };
}

/**
 * Collects entries while started; for tests and embedding applications
 */
export class LogBuffer {
  private entries: LogEntry[] = [];
  private unsubscribe: (() => void) | undefined;

  start(): void {
    this.entries = [];
    this.unsubscribe = addLogListener((entry) => {
      this.entries.push(entry);
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries = [];
  }
}
