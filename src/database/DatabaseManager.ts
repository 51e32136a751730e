import { DatabaseConfig, DatabaseConnection } from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { logger } from '../utils/logging.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { getErrorMessage } from '../utils/errorHandling.js';

/**
 * Owns the connection to the source relational store.
 * The build only reads from it; the connection is opened read-only by default.
 */
export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = new SqliteConnection(this.config);
    await connection.connect();
    this.connection = connection;

    logger.info('Source database connected', {
      type: this.config.type,
      filename: this.config.filename,
      readOnly: this.config.readOnly,
    });
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }

  /**
   * Validate database connection by running a simple query
   */
  async validateConnection(): Promise<boolean> {
    if (!this.connection) {
      return false;
    }

    try {
      await this.connection.query('SELECT 1 as ping', []);
      return true;
    } catch (error) {
      logger.warn('Database connection validation failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        {
          service: 'DatabaseManager',
          operation: 'getConnection'
        }
      );
    }
    return this.connection;
  }
}
