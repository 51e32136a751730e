import { CompositeMovieDocument } from '../../types/movie.js';
import { MovieDocumentStore } from '../../types/documentStore.js';
import { PublishMode } from '../../config/types.js';
import { BatchWriteError, DocumentStoreError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../utils/logging.js';
import { withDeadline } from '../../utils/deadline.js';
import { createErrorLogContext, getErrorMessage, toError } from '../../utils/errorHandling.js';

export interface BulkLoadProgress {
  collection: string;
  batchNumber: number;
  insertedCount: number;
  expectedTotal: number | undefined;
}

export interface BulkLoaderOptions {
  /** Final destination collection */
  collection: string;
  batchSize: number;
  /** Report progress every N batches (the last batch is always reported) */
  progressEveryBatches: number;
  /** Deadline per store call in ms; 0 disables it */
  callTimeoutMs: number;
  publishMode: PublishMode;
  onProgress?: (progress: BulkLoadProgress) => void;
}

export interface BulkLoadResult {
  collection: string;
  publishMode: PublishMode;
  insertedCount: number;
  batchCount: number;
}

/**
 * BulkLoader
 *
 * Replaces the destination collection with freshly assembled documents.
 *
 * In `replace` mode the destination is dropped first and then filled batch by
 * batch; a crash in between leaves it empty or partially filled. In `staged`
 * mode the batches go to `<collection>_staging`, which is renamed over the
 * destination only after the last batch succeeds.
 *
 * A failed batch aborts the load with BatchWriteError. Batches written before
 * it stay committed.
 */
export class BulkLoader {
  constructor(
    private readonly store: MovieDocumentStore,
    private readonly options: BulkLoaderOptions
  ) {}

  get stagingCollection(): string {
    return `${this.options.collection}_staging`;
  }

  async load(
    documents: Iterable<CompositeMovieDocument> | AsyncIterable<CompositeMovieDocument>,
    expectedTotal?: number
  ): Promise<BulkLoadResult> {
    const { collection, batchSize, publishMode } = this.options;
    const target = publishMode === 'staged' ? this.stagingCollection : collection;

    const existed = await this.storeCall(() => this.store.dropCollection(target), 'dropCollection', target);
    logger.info('Destination collection dropped', { collection: target, existed });

    let batch: CompositeMovieDocument[] = [];
    let batchNumber = 0;
    let insertedCount = 0;
    let reportedBatch = -1;

    const report = (isFinal: boolean): void => {
      if (batchNumber === reportedBatch) {
        return;
      }
      if (!isFinal && batchNumber % this.options.progressEveryBatches !== 0) {
        return;
      }
      reportedBatch = batchNumber;
      this.emitProgress({ collection: target, batchNumber, insertedCount, expectedTotal });
    };

    for await (const document of documents) {
      batch.push(document);
      if (batch.length >= batchSize) {
        batchNumber++;
        insertedCount += await this.writeBatch(target, batch, batchNumber, insertedCount);
        report(false);
        batch = [];
      }
    }

    if (batch.length > 0) {
      batchNumber++;
      insertedCount += await this.writeBatch(target, batch, batchNumber, insertedCount);
    }
    report(true);

    if (publishMode === 'staged') {
      await this.publish(insertedCount);
    }

    logger.info('Bulk load complete', { collection, publishMode, insertedCount, batchCount: batchNumber });

    return { collection, publishMode, insertedCount, batchCount: batchNumber };
  }

  private async writeBatch(
    collection: string,
    batch: readonly CompositeMovieDocument[],
    batchNumber: number,
    committedCount: number
  ): Promise<number> {
    try {
      return await withDeadline(
        this.store.insertMany(collection, batch),
        this.options.callTimeoutMs,
        `insertMany ${collection}`
      );
    } catch (error) {
      logger.error('Batch write failed', createErrorLogContext(error, { collection, batchNumber, committedCount }));
      throw new BatchWriteError(
        collection,
        batchNumber,
        committedCount,
        `Batch ${batchNumber} failed writing to '${collection}': ${getErrorMessage(error)}`,
        { service: 'BulkLoader', operation: 'insertMany', metadata: { batchSize: batch.length } },
        toError(error)
      );
    }
  }

  /**
   * Swap the staging collection into place. A staging collection that received
   * no documents does not exist in the store, so the destination is just dropped.
   */
  private async publish(insertedCount: number): Promise<void> {
    const { collection } = this.options;

    if (insertedCount === 0) {
      await this.storeCall(() => this.store.dropCollection(collection), 'dropCollection', collection);
      return;
    }

    await this.storeCall(
      () => this.store.renameCollection(this.stagingCollection, collection),
      'renameCollection',
      collection
    );
    logger.info('Staging collection published', { from: this.stagingCollection, to: collection });
  }

  private emitProgress(progress: BulkLoadProgress): void {
    const { collection, batchNumber, insertedCount, expectedTotal } = progress;
    logger.info(`Inserted ${insertedCount}${expectedTotal === undefined ? '' : `/${expectedTotal}`} documents`, {
      collection,
      batchNumber,
    });

    if (!this.options.onProgress) {
      return;
    }
    try {
      this.options.onProgress(progress);
    } catch (error) {
      // A broken progress listener must not abort the load
      logger.warn('Progress listener failed', createErrorLogContext(error, { batchNumber }));
    }
  }

  private async storeCall<T>(call: () => Promise<T>, operation: string, collection: string): Promise<T> {
    try {
      return await withDeadline(call(), this.options.callTimeoutMs, `${operation} ${collection}`);
    } catch (error) {
      throw new DocumentStoreError(
        `${operation} on '${collection}' failed: ${getErrorMessage(error)}`,
        ErrorCode.DESTINATION_WRITE_FAILED,
        false,
        { service: 'BulkLoader', operation, entityType: 'collection', entityId: collection },
        toError(error)
      );
    }
  }
}
