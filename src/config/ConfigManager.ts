import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, BuildConfig, DatabaseConfig, DestinationConfig, RelationName } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

const RELATION_NAMES: RelationName[] = [
  'movies',
  'ratings',
  'genres',
  'persons',
  'directors',
  'writers',
  'principals',
  'characters',
];

// Table names are interpolated into SQL, so only plain identifiers are accepted
const sqlIdentifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

const collectionName = z
  .string()
  .min(1)
  .regex(/^[^$\0]+$/, 'must not contain "$" or null characters')
  .refine(name => !name.startsWith('system.'), 'must not use the reserved "system." prefix');

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']),
  database: z.object({
    type: z.literal('sqlite3'),
    filename: z.string().min(1),
    readOnly: z.boolean(),
  }),
  destination: z.object({
    uri: z.string().regex(/^mongodb(\+srv)?:\/\//, 'must be a mongodb:// or mongodb+srv:// URI'),
    database: z.string().min(1).regex(/^[^/\\. "$*<>:|?]+$/, 'contains characters MongoDB does not allow'),
    collection: collectionName,
    serverSelectionTimeoutMs: z.number().int().positive(),
  }),
  relations: z.object({
    movies: sqlIdentifier,
    ratings: sqlIdentifier,
    genres: sqlIdentifier,
    persons: sqlIdentifier,
    directors: sqlIdentifier,
    writers: sqlIdentifier,
    principals: sqlIdentifier,
    characters: sqlIdentifier,
  }),
  build: z.object({
    batchSize: z.number().int().positive(),
    pageSize: z.number().int().positive(),
    progressEveryBatches: z.number().int().positive(),
    callTimeoutMs: z.number().int().nonnegative(),
    publishMode: z.enum(['replace', 'staged']),
    exampleMinVotes: z.number().int().nonnegative(),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.object({
      enabled: z.boolean(),
      path: z.string().min(1),
      maxSize: z.string().regex(/^\d+[kmg]?$/, 'must look like 10m, 500k or 1g'),
      maxFiles: z.number().int().positive(),
    }),
    console: z.object({
      enabled: z.boolean(),
      colorize: z.boolean(),
    }),
  }),
});

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    config.env = this.getEnum('NODE_ENV', config.env, ['development', 'production', 'test']);

    // Source database (read-only)
    config.database.filename = this.getString('DB_FILE', config.database.filename);

    // Destination document store
    config.destination.uri = this.getString('MONGO_URI', config.destination.uri);
    config.destination.database = this.getString('MONGO_DB_NAME', config.destination.database);
    config.destination.collection = this.getString('MONGO_COLLECTION', config.destination.collection);
    config.destination.serverSelectionTimeoutMs = this.getNumber(
      'MONGO_SERVER_SELECTION_TIMEOUT_MS',
      config.destination.serverSelectionTimeoutMs
    );

    // Physical table names
    for (const relation of RELATION_NAMES) {
      config.relations[relation] = this.getString(
        `RELATION_${relation.toUpperCase()}`,
        config.relations[relation]
      );
    }

    // Build tuning
    config.build.batchSize = this.getNumber('BUILD_BATCH_SIZE', config.build.batchSize);
    config.build.pageSize = this.getNumber('BUILD_PAGE_SIZE', config.build.pageSize);
    config.build.progressEveryBatches = this.getNumber(
      'BUILD_PROGRESS_EVERY_BATCHES',
      config.build.progressEveryBatches
    );
    config.build.callTimeoutMs = this.getNumber('BUILD_CALL_TIMEOUT_MS', config.build.callTimeoutMs);
    config.build.publishMode = this.getEnum('BUILD_PUBLISH_MODE', config.build.publishMode, [
      'replace',
      'staged',
    ]);
    config.build.exampleMinVotes = this.getNumber(
      'BUILD_EXAMPLE_MIN_VOTES',
      config.build.exampleMinVotes
    );

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key]?.trim();
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key]?.trim();
    if (!value) {
      return defaultValue;
    }
    if (!/^-?\d+$/.test(value)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid integer`);
    }
    return parseInt(value, 10);
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key]?.trim();
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key]?.trim();
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getDestinationConfig(): DestinationConfig {
    return this.config.destination;
  }

  getBuildConfig(): BuildConfig {
    return this.config.build;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const result = configSchema.safeParse(this.config);
    if (result.success) {
      return;
    }

    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    const firstPath = result.error.issues[0]?.path.join('.') ?? 'config';

    throw new ConfigurationError(
      firstPath,
      `Configuration validation failed:\n${issues.join('\n')}`,
      { service: 'ConfigManager', operation: 'validate', metadata: { issues } }
    );
  }
}
