import { DatabaseConfig } from '../types/database.js';

export type { DatabaseConfig };

export type RelationName =
  | 'movies'
  | 'ratings'
  | 'genres'
  | 'persons'
  | 'directors'
  | 'writers'
  | 'principals'
  | 'characters';

/**
 * Logical relation name → physical table name in the source database
 */
export type RelationTableMap = Record<RelationName, string>;

export interface DestinationConfig {
  uri: string;
  database: string;
  collection: string;
  serverSelectionTimeoutMs: number;
}

export type PublishMode = 'replace' | 'staged';

export interface BuildConfig {
  batchSize: number;
  pageSize: number;
  progressEveryBatches: number;
  callTimeoutMs: number; // 0 disables the per-call deadline
  publishMode: PublishMode;
  exampleMinVotes: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  destination: DestinationConfig;
  relations: RelationTableMap;
  build: BuildConfig;
  logging: LoggingConfig;
}
