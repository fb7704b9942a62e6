/**
 * Span database errors
 */

import { TreetraceError } from './base.js';

export type DatabaseErrorCode =
  | 'DATABASE_ERROR'
  | 'DATABASE_BUSY'
  | 'RECORD_NOT_FOUND'
  | 'DATABASE_CONNECTION_FAILED';

export class DatabaseError extends TreetraceError {
  declare readonly code: DatabaseErrorCode;

  constructor(
    message: string,
    options?: { cause?: Error; recoverable?: boolean }
  ) {
    super(message, options);
    (this as { code: DatabaseErrorCode }).code = 'DATABASE_ERROR';
  }
}

/**
 * Another connection holds the write lock; recoverable
 */
export class DatabaseBusyError extends DatabaseError {
  declare readonly code: 'DATABASE_BUSY';

  constructor(operation?: string, cause?: Error) {
    super(`Database is busy${operation ? ` during ${operation}` : ''}`, { cause, recoverable: true });
    (this as { code: 'DATABASE_BUSY' }).code = 'DATABASE_BUSY';
  }

  /**
   * SQLITE_BUSY or SQLITE_LOCKED from better-sqlite3, by code or message
   */
  static isBusyError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    const code = 'code' in error ? error.code : undefined;
    return (
      code === 'SQLITE_BUSY' ||
      code === 'SQLITE_LOCKED' ||
      /sqlite_busy|database is (locked|busy)/i.test(error.message)
    );
  }
}

/**
 * Record not found
 *
 * Span ids reach the store only after a successful insert or a children
 * query, so a miss means the caller holds an id from somewhere else.
 */
export class RecordNotFoundError extends DatabaseError {
  declare readonly code: 'RECORD_NOT_FOUND';
  readonly table: string;
  readonly id: string | number;

  constructor(table: string, id: string | number) {
    super(`Record not found in ${table}: ${id}`);
    (this as { code: 'RECORD_NOT_FOUND' }).code = 'RECORD_NOT_FOUND';
    this.table = table;
    this.id = id;
  }
}

/**
 * The database file could not be opened or its schema created
 */
export class DatabaseConnectionError extends DatabaseError {
  declare readonly code: 'DATABASE_CONNECTION_FAILED';
  readonly dbPath: string;

  constructor(dbPath: string, cause?: Error) {
    super(`Failed to open span database: ${dbPath}`, { cause });
    (this as { code: 'DATABASE_CONNECTION_FAILED' }).code = 'DATABASE_CONNECTION_FAILED';
    this.dbPath = dbPath;
  }
}
