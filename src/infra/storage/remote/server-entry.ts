/**
 * Span server child process
 *
 * Started by SpanServerProcess with TREETRACE_DB_PATH,
 * TREETRACE_SERVER_HOST and TREETRACE_SERVER_PORT set. Reports
 * `{ type: 'listening', url, port }` over IPC once bound; stops on
 * SIGTERM, SIGINT or when the IPC channel to the parent closes, so the
 * server does not outlive a parent that died.
 */

import { ENV_VARS, getEnv, getServerPort } from '../../../shared/config/env.js';
import { configureLoggerFromEnv } from '../../../shared/logging/structured.js';
import * as logger from '../../../shared/logging/logger.js';
import { unwrapResult, validateNonEmptyString } from '../../../shared/validation/index.js';
import { startSpanServer } from './server.js';
import type { ServerStatusMessage } from './server-process.js';

async function main(): Promise<void> {
  configureLoggerFromEnv();
  const context = 'span server environment';

  const server = await startSpanServer({
    dbPath: unwrapResult(validateNonEmptyString(getEnv(ENV_VARS.DB_PATH), ENV_VARS.DB_PATH), context),
    host: getEnv(ENV_VARS.SERVER_HOST, '127.0.0.1'),
    port: getServerPort(),
  });

  let closing = false;
  const shutdown = (): void => {
    if (closing) return;
    closing = true;
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Span server did not close cleanly', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
  process.once('disconnect', shutdown);

  const listening: ServerStatusMessage = { type: 'listening', url: server.url, port: server.port };
  process.send?.(listening);
}

main().catch((error: unknown) => {
  logger.error('Span server failed to start', error);
  const failed: ServerStatusMessage = {
    type: 'start_error',
    message: error instanceof Error ? error.message : String(error),
  };
  if (process.send) {
    process.send(failed, undefined, {}, () => process.exit(1));
  } else {
    process.exit(1);
  }
});
