/**
 * Remote Store
 *
 * Spans are written through the span server, which owns the SQLite file;
 * the tracing starts that server in a child process for its lifetime.
 * Trees are read straight from the file, so they stay readable after the
 * server has stopped.
 */

import { TracingStateError } from '../../../shared/errors/index.js';
import type { JsonObject } from '../../../shared/utils/json.js';
import { validateNonEmptyString, unwrapResult } from '../../../shared/validation/index.js';
import {
  BaseSpan,
  BaseTracing,
  DEFAULT_ROOT_NAME,
  DEFAULT_SPAN_NAME,
  newSpanId,
  registerSpanResolver,
  spanIdFromString,
  spanIdToString,
  type SpanId,
  type SpanRef,
  type TraceTree,
} from '../../../shared/tracing/index.js';
import { SpanDatabase } from '../sqlite/span-db.js';
import { SqliteTraceTree } from '../sqlite/sqlite-tracing.js';
import { RemoteSpanClient } from './client.js';
import { SpanServerProcess } from './server-process.js';

export const REMOTE_SPAN_KIND = 'remote';

export class RemoteSpan extends BaseSpan {
  constructor(
    readonly client: RemoteSpanClient,
    readonly id: SpanId
  ) {
    super();
  }

  static async create(
    client: RemoteSpanClient,
    name: string,
    data: JsonObject,
    parentId: SpanId | null
  ): Promise<RemoteSpan> {
    const id = newSpanId();
    await client.putSpan(id, name, data, parentId);
    return new RemoteSpan(client, id);
  }

  async getName(): Promise<string> {
    return (await this.client.getSpan(this.id)).name;
  }

  async getData(): Promise<JsonObject> {
    return (await this.client.getSpan(this.id)).data;
  }

  async newChild(name: string = DEFAULT_SPAN_NAME, data: JsonObject = {}): Promise<RemoteSpan> {
    return RemoteSpan.create(this.client, name, data, this.id);
  }

  async updateData(patch: JsonObject): Promise<void> {
    await this.client.patchSpan(this.id, patch);
  }

  toRef(): SpanRef {
    return {
      kind: REMOTE_SPAN_KIND,
      id: spanIdToString(this.id),
      locator: { url: this.client.url },
    };
  }
}

/**
 * Tree read over HTTP, for processes without access to the database file
 */
export class RemoteTraceTree implements TraceTree {
  constructor(
    readonly client: RemoteSpanClient,
    readonly id: SpanId
  ) {}

  async getName(): Promise<string> {
    return (await this.client.getSpan(this.id)).name;
  }

  async getData(): Promise<JsonObject> {
    return (await this.client.getSpan(this.id)).data;
  }

  async getChildren(): Promise<RemoteTraceTree[]> {
    const ids = await this.client.getChildrenIds(this.id);
    return ids.map((childId) => new RemoteTraceTree(this.client, childId));
  }

  async getParent(): Promise<RemoteTraceTree | undefined> {
    const { parentId } = await this.client.getSpan(this.id);
    return parentId ? new RemoteTraceTree(this.client, parentId) : undefined;
  }
}

export interface RemoteTracingOptions {
  dbPath: string;
  rootName?: string;
  /** Attach to this root instead of creating one */
  rootId?: SpanId | string;
  /** Server bind host (default: 127.0.0.1) */
  host?: string;
  /** Server port (default: 0, any free port) */
  port?: number;
}

export class RemoteTracing extends BaseTracing<RemoteSpan, SqliteTraceTree> {
  readonly db: SpanDatabase;
  private readonly server: SpanServerProcess;
  private readonly rootName: string;
  private client: RemoteSpanClient | undefined;
  private rootId: SpanId | undefined;

  constructor(options: RemoteTracingOptions) {
    super();
    this.db = new SpanDatabase(options.dbPath);
    this.server = new SpanServerProcess({ dbPath: this.db.dbPath, host: options.host, port: options.port });
    this.rootName = options.rootName ?? DEFAULT_ROOT_NAME;
    if (options.rootId !== undefined) {
      this.rootId = typeof options.rootId === 'string' ? spanIdFromString(options.rootId) : options.rootId;
    }
  }

  /**
   * Server URL while the tracing is active
   */
  get url(): string {
    return this.requireClient('get server url').url;
  }

  private requireClient(operation: string): RemoteSpanClient {
    if (!this.client) {
      throw new TracingStateError(this.constructor.name, this.state, operation);
    }
    return this.client;
  }

  private requireRootId(operation: string): SpanId {
    if (!this.rootId) {
      throw new TracingStateError(this.constructor.name, this.state, operation);
    }
    return this.rootId;
  }

  getRootSpan(): RemoteSpan {
    return new RemoteSpan(this.requireClient('get root span'), this.requireRootId('get root span'));
  }

  async getTree(): Promise<SqliteTraceTree> {
    return new SqliteTraceTree(this.db, this.requireRootId('get tree'));
  }

  /**
   * Tree read through the server while the tracing is active
   */
  getRemoteTree(): RemoteTraceTree {
    return new RemoteTraceTree(this.requireClient('get remote tree'), this.requireRootId('get remote tree'));
  }

  protected override async start(): Promise<void> {
    const url = await this.server.start();
    const client = new RemoteSpanClient(url);
    await client.waitForReady();
    this.client = client;

    if (this.rootId === undefined) {
      this.rootId = (await RemoteSpan.create(client, this.rootName, {}, null)).id;
    } else if (!this.db.exists(this.rootId)) {
      await client.putSpan(this.rootId, this.rootName, {}, null);
    }
    this.log.info('Tracing through span server', { url, rootId: spanIdToString(this.rootId) });
  }

  protected override async stop(): Promise<void> {
    await this.server.stop();
    this.client = undefined;
  }
}

/**
 * Rebuild a span that writes through the same server
 */
export function resolveRemoteSpanRef(ref: SpanRef): RemoteSpan {
  const url = unwrapResult(validateNonEmptyString(ref.locator.url, 'locator.url'), 'remote span ref');
  return new RemoteSpan(new RemoteSpanClient(url), spanIdFromString(ref.id));
}

export function registerRemoteSpanResolver(): void {
  registerSpanResolver(REMOTE_SPAN_KIND, resolveRemoteSpanRef);
}
