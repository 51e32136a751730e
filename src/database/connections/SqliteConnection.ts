import sqlite3 from 'sqlite3';
import { DatabaseConfig, DatabaseConnection, SqlParam } from '../../types/database.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';
import { getErrorCode } from '../../utils/errorHandling.js';

// SQLite result codes that clear up on their own when retried
const TRANSIENT_SQLITE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR'];

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename;
    const mode = this.config.readOnly
      ? sqlite3.OPEN_READONLY
      : sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;

    return new Promise((resolve, reject) => {
      const db = new sqlite3.Database(dbPath, mode, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to open SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath, readOnly: this.config.readOnly },
            },
            err
          ));
        } else {
          this.db = db;
          resolve();
        }
      });
    });
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            false,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types.
   * Only lock/busy/IO conditions are marked retryable; a missing table or
   * column will fail the same way on every attempt.
   */
  private convertDatabaseError(
    error: Error,
    sql: string,
    operation: string
  ): DatabaseError {
    const sqliteCode = getErrorCode(error);
    const retryable = sqliteCode !== undefined && TRANSIENT_SQLITE_CODES.includes(sqliteCode);

    return new DatabaseError(
      `Database ${operation} failed: ${error.message}`,
      ErrorCode.DATABASE_QUERY_FAILED,
      retryable,
      {
        service: 'SqliteConnection',
        operation,
        metadata: { sql, sqliteCode },
      },
      error
    );
  }
}
