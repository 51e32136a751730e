import { CompositeMovieDocument } from './movie.js';

/**
 * Secondary index definition on a document collection.
 * Array fields (genres) become multi-key indexes automatically.
 */
export interface DocumentIndexSpec {
  name: string;
  keys: Record<string, 1 | -1>;
}

/**
 * Destination store for composite movie documents.
 *
 * Every operation takes the collection name so the loader can write into a
 * staging collection and publish it under the final name.
 */
export interface MovieDocumentStore {
  connect?(): Promise<void>;
  close(): Promise<void>;

  /** Drops the collection. Resolves false when it did not exist. */
  dropCollection(collection: string): Promise<boolean>;

  /** Inserts the batch in order and resolves with the number of documents written. */
  insertMany(collection: string, documents: readonly CompositeMovieDocument[]): Promise<number>;

  /** Creates the index; re-creating an identical index is a no-op. Resolves with the index name. */
  createIndex(collection: string, index: DocumentIndexSpec): Promise<string>;

  countDocuments(collection: string): Promise<number>;

  /** First document whose rating.votes is strictly greater than minVotes */
  findOneWithMinVotes(collection: string, minVotes: number): Promise<CompositeMovieDocument | null>;

  findOne(collection: string): Promise<CompositeMovieDocument | null>;

  /** Atomically renames `from` to `to`, replacing `to` when it exists */
  renameCollection(from: string, to: string): Promise<void>;
}
