/**
 * Starts a span server process, prints its pid and waits to be killed
 *
 * Usage: node --import tsx span-server-parent.ts <dbPath>
 */

import { SpanServerProcess } from '../../src/infra/storage/remote/server-process.js';

const dbPath = process.argv[2];
if (!dbPath) {
  throw new Error('usage: span-server-parent.ts <dbPath>');
}

const server = new SpanServerProcess({ dbPath });
await server.start();
process.stdout.write(`${server.pid ?? -1}\n`);

setInterval(() => undefined, 60_000);
