import { Collection, Db, MongoClient, MongoServerError } from 'mongodb';
import { DestinationConfig } from '../../config/types.js';
import { DocumentIndexSpec, MovieDocumentStore } from '../../types/documentStore.js';
import { CompositeMovieDocument } from '../../types/movie.js';
import { DocumentStoreError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';

// Server code for "ns not found", returned when dropping a collection that does not exist
const NAMESPACE_NOT_FOUND = 26;

export class MongoDocumentStore implements MovieDocumentStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  constructor(private readonly config: DestinationConfig) {}

  async connect(): Promise<void> {
    if (this.client) {
      return;
    }

    const client = new MongoClient(this.config.uri, {
      serverSelectionTimeoutMS: this.config.serverSelectionTimeoutMs,
    });

    try {
      await client.connect();
      const db = client.db(this.config.database);
      await db.command({ ping: 1 });
      this.client = client;
      this.db = db;
    } catch (error) {
      await client.close();
      throw new DocumentStoreError(
        `Failed to connect to MongoDB: ${getErrorMessage(error)}`,
        ErrorCode.DESTINATION_CONNECTION_FAILED,
        true,
        { service: 'MongoDocumentStore', operation: 'connect', metadata: { database: this.config.database } },
        toError(error)
      );
    }

    logger.info('Destination document store connected', { database: this.config.database });
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }
    await this.client.close();
    this.client = null;
    this.db = null;
  }

  async dropCollection(collection: string): Promise<boolean> {
    try {
      return await this.collection(collection).drop();
    } catch (error) {
      if (error instanceof MongoServerError && error.code === NAMESPACE_NOT_FOUND) {
        return false;
      }
      throw error;
    }
  }

  async insertMany(collection: string, documents: readonly CompositeMovieDocument[]): Promise<number> {
    const result = await this.collection(collection).insertMany([...documents], { ordered: true });
    return result.insertedCount;
  }

  async createIndex(collection: string, index: DocumentIndexSpec): Promise<string> {
    return this.collection(collection).createIndex(index.keys, { name: index.name });
  }

  async countDocuments(collection: string): Promise<number> {
    return this.collection(collection).countDocuments();
  }

  async findOneWithMinVotes(collection: string, minVotes: number): Promise<CompositeMovieDocument | null> {
    return this.collection(collection).findOne({ 'rating.votes': { $gt: minVotes } });
  }

  async findOne(collection: string): Promise<CompositeMovieDocument | null> {
    return this.collection(collection).findOne({});
  }

  async renameCollection(from: string, to: string): Promise<void> {
    await this.collection(from).rename(to, { dropTarget: true });
  }

  private collection(name: string): Collection<CompositeMovieDocument> {
    if (!this.db) {
      throw new DocumentStoreError(
        'Document store not connected. Call connect() first.',
        ErrorCode.DESTINATION_CONNECTION_FAILED,
        false,
        { service: 'MongoDocumentStore', operation: 'collection' }
      );
    }
    return this.db.collection<CompositeMovieDocument>(name);
  }
}
