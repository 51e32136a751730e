import { DocumentIndexSpec, MovieDocumentStore } from '../../src/types/documentStore.js';
import { CompositeMovieDocument } from '../../src/types/movie.js';

export interface InMemoryDocumentStoreOptions {
  /** 1-based insertMany call that rejects (counted across all collections) */
  failOnInsertCall?: number;
  /** Index names whose creation rejects */
  failIndexNames?: string[];
  /** Reject every rename */
  failRename?: boolean;
}

/**
 * In-process stand-in for the destination store.
 * Collections exist only once a document is inserted into them, as in MongoDB.
 */
export class InMemoryDocumentStore implements MovieDocumentStore {
  readonly collections = new Map<string, CompositeMovieDocument[]>();
  readonly indexes = new Map<string, Map<string, DocumentIndexSpec>>();
  readonly calls: string[] = [];
  private insertCalls = 0;

  constructor(private readonly options: InMemoryDocumentStoreOptions = {}) {}

  async close(): Promise<void> {
    this.calls.push('close');
  }

  async dropCollection(collection: string): Promise<boolean> {
    this.calls.push(`drop:${collection}`);
    this.indexes.delete(collection);
    return this.collections.delete(collection);
  }

  async insertMany(collection: string, documents: readonly CompositeMovieDocument[]): Promise<number> {
    this.insertCalls++;
    this.calls.push(`insert:${collection}:${documents.length}`);
    if (this.options.failOnInsertCall === this.insertCalls) {
      throw new Error('simulated write failure');
    }

    const existing = this.collections.get(collection) ?? [];
    for (const document of documents) {
      if (existing.some(stored => stored._id === document._id)) {
        throw new Error(`E11000 duplicate key error: ${document._id}`);
      }
      existing.push(structuredClone(document));
    }
    this.collections.set(collection, existing);
    return documents.length;
  }

  async createIndex(collection: string, index: DocumentIndexSpec): Promise<string> {
    this.calls.push(`index:${collection}:${index.name}`);
    if (this.options.failIndexNames?.includes(index.name)) {
      throw new Error(`simulated index failure: ${index.name}`);
    }

    const indexes = this.indexes.get(collection) ?? new Map<string, DocumentIndexSpec>();
    indexes.set(index.name, index);
    this.indexes.set(collection, indexes);
    return index.name;
  }

  async countDocuments(collection: string): Promise<number> {
    return this.collections.get(collection)?.length ?? 0;
  }

  async findOneWithMinVotes(collection: string, minVotes: number): Promise<CompositeMovieDocument | null> {
    return this.documents(collection).find(document => document.rating.votes > minVotes) ?? null;
  }

  async findOne(collection: string): Promise<CompositeMovieDocument | null> {
    return this.documents(collection)[0] ?? null;
  }

  async renameCollection(from: string, to: string): Promise<void> {
    this.calls.push(`rename:${from}:${to}`);
    if (this.options.failRename) {
      throw new Error('simulated rename failure');
    }

    const documents = this.collections.get(from);
    if (!documents) {
      throw new Error(`source namespace does not exist: ${from}`);
    }
    this.collections.delete(from);
    this.collections.set(to, documents);

    const indexes = this.indexes.get(from);
    this.indexes.delete(from);
    this.indexes.delete(to);
    if (indexes) {
      this.indexes.set(to, indexes);
    }
  }

  documents(collection: string): CompositeMovieDocument[] {
    return this.collections.get(collection) ?? [];
  }

  indexNames(collection: string): string[] {
    return Array.from(this.indexes.get(collection)?.keys() ?? []);
  }
}
