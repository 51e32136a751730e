/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface DatabaseConfig {
  type: 'sqlite3';
  filename: string;
  /** Open the source without write access; the build never mutates it */
  readOnly: boolean;
}

export interface DatabaseConnection {
  connect?(): Promise<void>;
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;
  close(): Promise<void>;
}
