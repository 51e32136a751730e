import { DocumentIndexSpec, MovieDocumentStore } from '../../types/documentStore.js';
import { IndexCreationError } from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { withDeadline } from '../../utils/deadline.js';
import { createErrorLogContext, getErrorMessage, toError } from '../../utils/errorHandling.js';

/**
 * Indexes for the read-side queries: lookup by title, filter by year,
 * genre membership (multi-key over the genres array) and sort by rating.
 */
export const MOVIE_DOCUMENT_INDEXES: readonly DocumentIndexSpec[] = [
  { name: 'idx_title', keys: { title: 1 } },
  { name: 'idx_year', keys: { year: 1 } },
  { name: 'idx_genres', keys: { genres: 1 } },
  { name: 'idx_rating_average', keys: { 'rating.average': 1 } },
];

export interface SecondaryIndexResult {
  created: string[];
  failed: IndexCreationError[];
}

export class SecondaryIndexBuilder {
  constructor(
    private readonly store: MovieDocumentStore,
    private readonly callTimeoutMs: number,
    private readonly indexes: readonly DocumentIndexSpec[] = MOVIE_DOCUMENT_INDEXES
  ) {}

  /**
   * Create every index on the collection. Existing identical indexes are left
   * as they are. A failed index is logged and reported; the remaining indexes
   * are still attempted and the call itself does not throw.
   */
  async build(collection: string): Promise<SecondaryIndexResult> {
    const result: SecondaryIndexResult = { created: [], failed: [] };

    for (const index of this.indexes) {
      try {
        const name = await withDeadline(
          this.store.createIndex(collection, index),
          this.callTimeoutMs,
          `createIndex ${index.name}`
        );
        result.created.push(name);
        logger.debug('Secondary index ready', { collection, index: name, keys: index.keys });
      } catch (error) {
        const failure = new IndexCreationError(
          collection,
          index.name,
          `Failed to create index '${index.name}' on '${collection}': ${getErrorMessage(error)}`,
          { service: 'SecondaryIndexBuilder', operation: 'createIndex' },
          toError(error)
        );
        logger.error('Secondary index creation failed', createErrorLogContext(error, {
          collection,
          index: index.name,
        }));
        result.failed.push(failure);
      }
    }

    logger.info('Secondary indexes processed', {
      collection,
      created: result.created,
      failed: result.failed.map(failure => failure.indexName),
    });

    return result;
  }
}
