import { ConfigManager } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { MongoDocumentStore } from './database/connections/MongoDocumentStore.js';
import { RelationReader } from './services/relations/RelationReader.js';
import {
  BuildRunOptions,
  BuildSummary,
  MovieDocumentBuildService,
} from './services/movieDocumentBuildService.js';
import { DatabaseError, ErrorCode } from './errors/index.js';
import { initializeLogger, logger } from './utils/logging.js';
import { createErrorLogContext } from './utils/errorHandling.js';

export class App {
  private config: AppConfig;
  private dbManager: DatabaseManager;
  private store: MongoDocumentStore;

  constructor() {
    this.config = ConfigManager.getInstance().getConfig();
    this.dbManager = new DatabaseManager(this.config.database);
    this.store = new MongoDocumentStore(this.config.destination);
  }

  public async start(): Promise<void> {
    // Validate configuration before touching either store
    ConfigManager.getInstance().validate();
    initializeLogger(this.config.logging);

    await this.dbManager.connect();
    if (!(await this.dbManager.validateConnection())) {
      throw new DatabaseError(
        'Source database did not answer a ping',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        false,
        { service: 'App', operation: 'start', metadata: { filename: this.config.database.filename } }
      );
    }
    logger.info('Source database ready', { filename: this.config.database.filename });

    await this.store.connect();
    logger.info('Destination ready', {
      database: this.config.destination.database,
      collection: this.config.destination.collection,
    });
  }

  /**
   * Connect, run one full build and disconnect. Connections are closed whether
   * or not the build succeeds.
   */
  public async run(options: BuildRunOptions = {}): Promise<BuildSummary> {
    try {
      await this.start();

      const reader = new RelationReader(this.dbManager.getConnection(), {
        tables: this.config.relations,
        pageSize: this.config.build.pageSize,
        callTimeoutMs: this.config.build.callTimeoutMs,
      });
      const service = new MovieDocumentBuildService(reader, this.store, {
        collection: this.config.destination.collection,
        build: this.config.build,
      });

      return await service.run(options);
    } finally {
      await this.stop();
    }
  }

  public async stop(): Promise<void> {
    try {
      await this.store.close();
      logger.info('Destination connection closed');

      await this.dbManager.disconnect();
      logger.info('Stopped');
    } catch (error) {
      logger.error('Error during shutdown', createErrorLogContext(error));
    }
  }
}
