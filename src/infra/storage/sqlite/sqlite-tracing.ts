/**
 * SQLite Store
 *
 * Spans and tree nodes are thin handles (database + id); every read goes
 * to the database, so writes from other processes are visible at once.
 */

import { RecordNotFoundError } from '../../../shared/errors/index.js';
import { parseJsonObject, type JsonObject } from '../../../shared/utils/json.js';
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
import { SpanDatabase, TABLE_NAME } from './span-db.js';

export const SQLITE_SPAN_KIND = 'sqlite';

export class SqliteSpan extends BaseSpan {
  constructor(
    readonly db: SpanDatabase,
    readonly id: SpanId
  ) {
    super();
  }

  /**
   * Insert a new span and return its handle
   */
  static create(db: SpanDatabase, name: string, data: JsonObject, parentId: SpanId | null): SqliteSpan {
    const id = newSpanId();
    db.insert(id, name, JSON.stringify(data), parentId);
    return new SqliteSpan(db, id);
  }

  async getName(): Promise<string> {
    return this.db.getName(this.id);
  }

  async getData(): Promise<JsonObject> {
    return parseJsonObject(this.db.getDataJson(this.id));
  }

  async newChild(name: string = DEFAULT_SPAN_NAME, data: JsonObject = {}): Promise<SqliteSpan> {
    return SqliteSpan.create(this.db, name, data, this.id);
  }

  async updateData(patch: JsonObject): Promise<void> {
    if (!this.db.updateDataJson(this.id, JSON.stringify(patch))) {
      throw new RecordNotFoundError(TABLE_NAME, spanIdToString(this.id));
    }
  }

  toRef(): SpanRef {
    return {
      kind: SQLITE_SPAN_KIND,
      id: spanIdToString(this.id),
      locator: { dbPath: this.db.dbPath },
    };
  }
}

export class SqliteTraceTree implements TraceTree {
  constructor(
    readonly db: SpanDatabase,
    readonly id: SpanId
  ) {}

  async getName(): Promise<string> {
    return this.db.getName(this.id);
  }

  async getData(): Promise<JsonObject> {
    return parseJsonObject(this.db.getDataJson(this.id));
  }

  async getChildren(): Promise<SqliteTraceTree[]> {
    return this.db.getChildrenIds(this.id).map((childId) => new SqliteTraceTree(this.db, childId));
  }

  async getParent(): Promise<SqliteTraceTree | undefined> {
    const parentId = this.db.getParentId(this.id);
    return parentId ? new SqliteTraceTree(this.db, parentId) : undefined;
  }
}

export interface SqliteTracingOptions {
  dbPath: string;
  rootName?: string;
  /**
   * Attach to this root instead of creating one; inserted when the
   * database does not hold it yet
   */
  rootId?: SpanId | string;
}

export class SqliteTracing extends BaseTracing<SqliteSpan, SqliteTraceTree> {
  readonly db: SpanDatabase;
  readonly rootId: SpanId;

  constructor(options: SqliteTracingOptions) {
    super();
    this.db = new SpanDatabase(options.dbPath);
    const rootName = options.rootName ?? DEFAULT_ROOT_NAME;

    if (options.rootId === undefined) {
      this.rootId = SqliteSpan.create(this.db, rootName, {}, null).id;
    } else {
      this.rootId = typeof options.rootId === 'string' ? spanIdFromString(options.rootId) : options.rootId;
      if (!this.db.exists(this.rootId)) {
        this.db.insertOrUpdate(this.rootId, rootName, '{}', null);
      }
    }
  }

  getRootSpan(): SqliteSpan {
    return new SqliteSpan(this.db, this.rootId);
  }

  async getTree(): Promise<SqliteTraceTree> {
    return new SqliteTraceTree(this.db, this.rootId);
  }

  protected override async start(): Promise<void> {
    this.log.debug('Tracing to SQLite', { dbPath: this.db.dbPath, rootId: spanIdToString(this.rootId) });
  }
}

/**
 * Rebuild a span handle on the same database file
 */
export function resolveSqliteSpanRef(ref: SpanRef): SqliteSpan {
  const dbPath = unwrapResult(validateNonEmptyString(ref.locator.dbPath, 'locator.dbPath'), 'SQLite span ref');
  return new SqliteSpan(new SpanDatabase(dbPath), spanIdFromString(ref.id));
}

export function registerSqliteSpanResolver(): void {
  registerSpanResolver(SQLITE_SPAN_KIND, resolveSqliteSpanRef);
}
