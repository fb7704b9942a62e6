/**
 * Span Server
 *
 * HTTP front for a SpanDatabase. Handlers run one database statement per
 * request, so any number of clients in any number of processes may write
 * concurrently.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { MAX_REQUEST_BODY_BYTES } from '../../../shared/config/limits.js';
import { RecordNotFoundError, ValidationError } from '../../../shared/errors/index.js';
import { createChildLogger } from '../../../shared/logging/structured.js';
import { spanIdFromString, spanIdToString, type SpanId } from '../../../shared/tracing/index.js';
import { isRecord, type ValidationResult } from '../../../shared/validation/index.js';
import { SpanDatabase } from '../sqlite/span-db.js';
import {
  matchRoute,
  validateSpanDataPayload,
  validateSpanPayload,
  type ErrorPayload,
  type SpanPayload,
} from './protocol.js';

const log = createChildLogger({ component: 'span-server' });

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

type JsonBody = string | string[] | SpanPayload | ErrorPayload;

function sendJson(res: ServerResponse, status: number, body: JsonBody, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_REQUEST_BODY_BYTES) {
        reject(new HttpError(413, `Request body exceeds ${MAX_REQUEST_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

async function readJsonBody<T>(req: IncomingMessage, validate: (value: unknown) => ValidationResult<T>): Promise<T> {
  const text = await readBody(req);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new HttpError(400, 'Request body is not valid JSON');
  }
  const result = validate(parsed);
  if (!result.valid) {
    throw new HttpError(400, ValidationError.fromErrors('request body', result.errors).message);
  }
  return result.value;
}

function parseId(text: string): SpanId {
  try {
    return spanIdFromString(decodeURIComponent(text));
  } catch (error) {
    throw new HttpError(400, error instanceof Error ? error.message : `Invalid span id: ${text}`);
  }
}

function isConstraintError(error: unknown): boolean {
  return isRecord(error) && typeof error.code === 'string' && error.code.startsWith('SQLITE_CONSTRAINT');
}

function methodNotAllowed(res: ServerResponse, allowed: string[]): void {
  sendJson(res, 405, { error: 'Method not allowed' }, { Allow: allowed.join(', ') });
}

/**
 * Build the request listener serving the span API from `db`
 */
export function createSpanRequestHandler(db: SpanDatabase): (req: IncomingMessage, res: ServerResponse) => void {
  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const route = matchRoute(url.pathname);
    const method = req.method ?? 'GET';

    if (!route) {
      sendJson(res, 404, { error: `Not found: ${url.pathname}` });
      return;
    }

    switch (route.kind) {
      case 'ready':
        sendJson(res, 200, 'ok');
        return;

      case 'roots':
        if (method !== 'GET') return methodNotAllowed(res, ['GET']);
        sendJson(res, 200, db.getRootIds().map(spanIdToString));
        return;

      case 'children': {
        if (method !== 'GET') return methodNotAllowed(res, ['GET']);
        const id = parseId(route.id);
        sendJson(res, 200, db.getChildrenIds(id).map(spanIdToString));
        return;
      }

      case 'span': {
        const id = parseId(route.id);
        if (method === 'GET') {
          const record = db.getSpan(id);
          sendJson(res, 200, {
            name: record.name,
            data_json: record.dataJson,
            parent_id: record.parentId ? spanIdToString(record.parentId) : null,
          });
          return;
        }
        if (method === 'PUT') {
          const payload = await readJsonBody(req, validateSpanPayload);
          if (db.exists(id)) {
            throw new HttpError(409, `Span already exists: ${spanIdToString(id)}`);
          }
          try {
            db.insert(id, payload.name, payload.data_json, payload.parent_id ? spanIdFromString(payload.parent_id) : null);
          } catch (error) {
            if (isConstraintError(error)) {
              throw new HttpError(409, `Span already exists: ${spanIdToString(id)}`);
            }
            throw error;
          }
          sendJson(res, 200, 'ok');
          return;
        }
        if (method === 'PATCH') {
          const payload = await readJsonBody(req, validateSpanDataPayload);
          if (!db.updateDataJson(id, payload.data_json)) {
            throw new HttpError(404, `Span not found: ${spanIdToString(id)}`);
          }
          sendJson(res, 200, 'ok');
          return;
        }
        return methodNotAllowed(res, ['GET', 'PUT', 'PATCH']);
      }
    }
  }

  return (req, res) => {
    handle(req, res).catch((error: unknown) => {
      if (error instanceof HttpError) {
        sendJson(res, error.status, { error: error.message });
        return;
      }
      if (error instanceof RecordNotFoundError) {
        sendJson(res, 404, { error: error.message });
        return;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      log.error('Span request failed', { method: req.method, url: req.url }, err);
      if (!res.headersSent) {
        sendJson(res, 500, { error: err.message });
      } else {
        res.end();
      }
    });
  };
}

export interface SpanServerOptions {
  dbPath: string;
  /** Default: 127.0.0.1 */
  host?: string;
  /** Default: 0, any free port */
  port?: number;
}

/**
 * A listening span server
 */
export interface SpanServer {
  readonly server: Server;
  readonly db: SpanDatabase;
  readonly host: string;
  readonly port: number;
  readonly url: string;
  close(): Promise<void>;
}

/**
 * Open the database and start listening
 */
export function startSpanServer(options: SpanServerOptions): Promise<SpanServer> {
  const db = new SpanDatabase(options.dbPath);
  const host = options.host ?? '127.0.0.1';
  const server = createServer(createSpanRequestHandler(db));

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? 0, host, () => {
      server.off('error', reject);
      const address: AddressInfo | string | null = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : (options.port ?? 0);
      const urlHost = host.includes(':') ? `[${host}]` : host;
      const url = `http://${urlHost}:${port}`;
      log.info('Span server listening', { url, dbPath: db.dbPath });

      resolve({
        server,
        db,
        host,
        port,
        url,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((error) => {
              if (error) {
                rejectClose(error);
                return;
              }
              log.debug('Span server closed', { url });
              resolveClose();
            });
            server.closeAllConnections();
          }),
      });
    });
  });
}
