/**
 * Span Database
 *
 * Repository over a single-file SQLite store. Every call opens its own
 * short-lived connection, so one `SpanDatabase` may be shared freely and
 * several processes may write the same file.
 *
 * Data is passed as JSON text; decoding is left to callers.
 */

import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { SQLITE_BUSY_TIMEOUT_MS } from '../../../shared/config/timeouts.js';
import { DatabaseConnectionError, RecordNotFoundError } from '../../../shared/errors/index.js';
import * as logger from '../../../shared/logging/logger.js';
import { spanIdToString, type SpanId } from '../../../shared/tracing/index.js';
import { withDatabaseRetrySync } from '../../../shared/utils/retry.js';

export const TABLE_NAME = 'trace_spans';

/** Unix time in fractional seconds, evaluated by SQLite */
const NOW_UNIX_SECONDS = "(julianday('now') - 2440587.5) * 86400.0";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
    id BLOB PRIMARY KEY,
    parent_id BLOB,
    name TEXT NOT NULL,
    data_json TEXT NOT NULL,
    last_updated REAL
  ) WITHOUT ROWID;

  CREATE INDEX IF NOT EXISTS idx_${TABLE_NAME}_parent_id ON ${TABLE_NAME}(parent_id);
  CREATE INDEX IF NOT EXISTS idx_${TABLE_NAME}_last_updated ON ${TABLE_NAME}(last_updated);

  CREATE TRIGGER IF NOT EXISTS ${TABLE_NAME}_after_insert
  AFTER INSERT ON ${TABLE_NAME}
  BEGIN
    UPDATE ${TABLE_NAME} SET last_updated = ${NOW_UNIX_SECONDS} WHERE id = NEW.id;
  END;

  CREATE TRIGGER IF NOT EXISTS ${TABLE_NAME}_after_update
  AFTER UPDATE OF data_json, name, parent_id ON ${TABLE_NAME}
  BEGIN
    UPDATE ${TABLE_NAME} SET last_updated = ${NOW_UNIX_SECONDS} WHERE id = NEW.id;
  END;
`;

type SpanRow = {
  id: Buffer;
  parent_id: Buffer | null;
  name: string;
  data_json: string;
  last_updated: number | null;
};

type IdRow = { id: Buffer };

/**
 * Stored span as read from the table
 */
export interface SpanRecord {
  id: SpanId;
  parentId: SpanId | null;
  name: string;
  dataJson: string;
  /** Unix seconds of the last insert or update */
  lastUpdated: number;
}

/**
 * Most recently changed span
 */
export interface LastUpdated {
  id: SpanId;
  lastUpdated: number;
}

function toRecord(row: SpanRow): SpanRecord {
  return {
    id: row.id,
    parentId: row.parent_id,
    name: row.name,
    dataJson: row.data_json,
    lastUpdated: row.last_updated ?? 0,
  };
}

export class SpanDatabase {
  readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = path.resolve(dbPath);
    this.init();
  }

  /**
   * Create the file, schema, indexes and triggers if missing
   */
  private init(): void {
    mkdirSync(path.dirname(this.dbPath), { recursive: true });
    withDatabaseRetrySync(
      () =>
        this.withConnection((db) => {
          db.pragma('journal_mode = WAL');
          db.exec(SCHEMA_SQL);
        }),
      'init span database'
    );
    logger.debug(`Span database ready at ${this.dbPath}`);
  }

  private withConnection<T>(fn: (db: Database.Database) => T): T {
    let db: Database.Database;
    try {
      db = new Database(this.dbPath, { timeout: SQLITE_BUSY_TIMEOUT_MS });
    } catch (error) {
      throw new DatabaseConnectionError(this.dbPath, error instanceof Error ? error : undefined);
    }
    try {
      return fn(db);
    } finally {
      db.close();
    }
  }

  /**
   * Insert a new span
   *
   * @throws when a span with the same id exists (primary key constraint)
   */
  insert(id: SpanId, name: string, dataJson: string, parentId: SpanId | null): void {
    withDatabaseRetrySync(
      () =>
        this.withConnection((db) => {
          db.prepare<[Buffer, Buffer | null, string, string]>(
            `INSERT INTO ${TABLE_NAME} (id, parent_id, name, data_json) VALUES (?, ?, ?, ?)`
          ).run(id, parentId, name, dataJson);
        }),
      'insert span'
    );
  }

  /**
   * Insert a span, or replace name and data of an existing one
   *
   * `parent_id` of an existing span is left unchanged.
   */
  insertOrUpdate(id: SpanId, name: string, dataJson: string, parentId: SpanId | null): void {
    withDatabaseRetrySync(
      () =>
        this.withConnection((db) => {
          db.prepare<[Buffer, Buffer | null, string, string]>(
            `INSERT INTO ${TABLE_NAME} (id, parent_id, name, data_json) VALUES (?, ?, ?, ?)
             ON CONFLICT (id) DO UPDATE SET
               name = excluded.name,
               data_json = excluded.data_json`
          ).run(id, parentId, name, dataJson);
        }),
      'upsert span'
    );
  }

  /**
   * @throws RecordNotFoundError for an unknown id
   */
  getSpan(id: SpanId): SpanRecord {
    const row = this.withConnection((db) =>
      db
        .prepare<[Buffer], SpanRow>(
          `SELECT id, parent_id, name, data_json, last_updated FROM ${TABLE_NAME} WHERE id = ?`
        )
        .get(id)
    );
    if (!row) {
      throw new RecordNotFoundError(TABLE_NAME, spanIdToString(id));
    }
    return toRecord(row);
  }

  exists(id: SpanId): boolean {
    const row = this.withConnection((db) =>
      db.prepare<[Buffer], IdRow>(`SELECT id FROM ${TABLE_NAME} WHERE id = ?`).get(id)
    );
    return row !== undefined;
  }

  count(): number {
    const row = this.withConnection((db) =>
      db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${TABLE_NAME}`).get()
    );
    return row?.total ?? 0;
  }

  /**
   * Ids of spans without a parent, in creation order
   */
  getRootIds(): SpanId[] {
    return this.selectIds(`SELECT id FROM ${TABLE_NAME} WHERE parent_id IS NULL ORDER BY id`, []);
  }

  /**
   * Ids of the children of a span, in creation order
   */
  getChildrenIds(id: SpanId): SpanId[] {
    return this.selectIds(`SELECT id FROM ${TABLE_NAME} WHERE parent_id = ? ORDER BY id`, [id]);
  }

  getSpanIdsFromName(name: string): SpanId[] {
    return this.selectIds(`SELECT id FROM ${TABLE_NAME} WHERE name = ? ORDER BY id`, [name]);
  }

  private selectIds(sql: string, params: Array<Buffer | string>): SpanId[] {
    const rows = this.withConnection((db) => db.prepare<Array<Buffer | string>, IdRow>(sql).all(...params));
    return rows.map((row) => row.id);
  }

  /**
   * Merge-patch `patchJson` into the stored data inside SQLite
   *
   * A single statement, so concurrent writers never lose disjoint keys.
   *
   * @returns false when no span has this id
   */
  updateDataJson(id: SpanId, patchJson: string): boolean {
    return withDatabaseRetrySync(
      () =>
        this.withConnection((db) => {
          const result = db
            .prepare<[string, Buffer]>(
              `UPDATE ${TABLE_NAME} SET data_json = json_patch(data_json, ?) WHERE id = ?`
            )
            .run(patchJson, id);
          return result.changes > 0;
        }),
      'update span data'
    );
  }

  /**
   * @throws RecordNotFoundError for an unknown id
   */
  getDataJson(id: SpanId): string {
    return this.getSpan(id).dataJson;
  }

  /**
   * @throws RecordNotFoundError for an unknown id
   */
  getName(id: SpanId): string {
    return this.getSpan(id).name;
  }

  /**
   * @throws RecordNotFoundError for an unknown id
   */
  getParentId(id: SpanId): SpanId | null {
    return this.getSpan(id).parentId;
  }

  /**
   * Greatest span id, i.e. the most recently created span
   */
  getLastSpanId(): SpanId | undefined {
    const row = this.withConnection((db) =>
      db.prepare<[], IdRow>(`SELECT id FROM ${TABLE_NAME} ORDER BY id DESC LIMIT 1`).get()
    );
    return row?.id;
  }

  /**
   * Span changed most recently, ties broken by the greater id
   */
  getLastUpdatedSpanId(): LastUpdated | undefined {
    const row = this.withConnection((db) =>
      db
        .prepare<[], { id: Buffer; last_updated: number | null }>(
          `SELECT id, last_updated FROM ${TABLE_NAME}
           ORDER BY last_updated DESC, id DESC LIMIT 1`
        )
        .get()
    );
    return row ? { id: row.id, lastUpdated: row.last_updated ?? 0 } : undefined;
  }

  /**
   * Move WAL content into the main database file
   */
  checkpoint(): void {
    withDatabaseRetrySync(
      () =>
        this.withConnection((db) => {
          db.pragma('wal_checkpoint(TRUNCATE)');
        }),
      'checkpoint'
    );
  }
}
