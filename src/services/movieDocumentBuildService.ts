import { BuildConfig, RelationName } from '../config/types.js';
import { MovieDocumentStore } from '../types/documentStore.js';
import { MovieDocumentPreview, MovieRating } from '../types/movie.js';
import {
  ApplicationError,
  BuildCancelledError,
  BuildPhaseError,
} from '../errors/index.js';
import { logger } from '../utils/logging.js';
import { withDeadline } from '../utils/deadline.js';
import { createErrorLogContext, toError } from '../utils/errorHandling.js';
import { RelationReader, collectRows } from './relations/RelationReader.js';
import { REQUIRED_RELATIONS } from './relations/relationSchemas.js';
import { buildMultiValueIndex, buildSingleValueIndex } from './indexes/LookupIndex.js';
import { buildPersonResolver } from './indexes/PersonResolver.js';
import { buildCastIndex } from './indexes/CastAssembler.js';
import { AssemblyIndexes, assembleDocuments, toDocumentPreview } from './documents/DocumentAssembler.js';
import { BulkLoadProgress, BulkLoadResult, BulkLoader } from './documents/BulkLoader.js';
import { SecondaryIndexBuilder } from './documents/SecondaryIndexBuilder.js';

export type BuildPhase =
  | 'preflight'
  | 'movies'
  | 'ratings'
  | 'genres'
  | 'persons'
  | 'directors'
  | 'writers'
  | 'cast'
  | 'load'
  | 'indexes'
  | 'verify';

export type BuildProgressEvent =
  | { type: 'phase-started'; phase: BuildPhase }
  | { type: 'phase-completed'; phase: BuildPhase; durationMs: number }
  | ({ type: 'load-progress' } & BulkLoadProgress);

export interface BuildRunOptions {
  /** Checked between phases; an aborted signal stops the run before the next phase */
  signal?: AbortSignal;
  onProgress?: (event: BuildProgressEvent) => void;
}

export interface MovieDocumentBuildOptions {
  collection: string;
  build: BuildConfig;
}

export interface AssociationCounts {
  movies: number;
  ratings: number;
  moviesWithGenres: number;
  genres: number;
  persons: number;
  moviesWithDirectors: number;
  directors: number;
  moviesWithWriters: number;
  writers: number;
  moviesWithCast: number;
  castEntries: number;
  characters: number;
  orphanedCharacters: number;
}

export interface VerificationResult {
  expected: number;
  actual: number;
  verified: boolean;
}

/** Rows per source relation, counted during preflight */
export type SourceRowCounts = Record<RelationName, number>;

export interface BuildSummary {
  collection: string;
  sourceRows: SourceRowCounts;
  counts: AssociationCounts;
  load: BulkLoadResult;
  indexes: {
    created: string[];
    failed: Array<{ name: string; message: string }>;
  };
  verification: VerificationResult;
  example: MovieDocumentPreview | null;
  phaseDurations: Partial<Record<BuildPhase, number>>;
  elapsedMs: number;
}

/**
 * MovieDocumentBuildService
 *
 * Rebuilds the composite movie collection from the normalized source relations.
 *
 * Phases run strictly one after another: every relation is fully drained into
 * its index before the next one is read, then documents are assembled and
 * streamed into batched writes, secondary indexes are created and the result
 * is counted against the source. Indexes are local to one run and read-only
 * once built.
 */
export class MovieDocumentBuildService {
  constructor(
    private readonly reader: RelationReader,
    private readonly store: MovieDocumentStore,
    private readonly options: MovieDocumentBuildOptions
  ) {}

  async run(runOptions: BuildRunOptions = {}): Promise<BuildSummary> {
    const startedAt = Date.now();
    const { collection, build } = this.options;
    const phaseDurations: Partial<Record<BuildPhase, number>> = {};

    const phase = async <T>(name: BuildPhase, work: () => Promise<T>): Promise<T> => {
      if (runOptions.signal?.aborted) {
        logger.warn('Build cancelled', { phase: name });
        throw new BuildCancelledError(name, { service: 'MovieDocumentBuildService' });
      }

      const phaseStartedAt = Date.now();
      logger.info(`Phase '${name}' started`);
      this.emit(runOptions, { type: 'phase-started', phase: name });

      try {
        const result = await work();
        const durationMs = Date.now() - phaseStartedAt;
        phaseDurations[name] = durationMs;
        logger.info(`Phase '${name}' completed`, { durationMs });
        this.emit(runOptions, { type: 'phase-completed', phase: name, durationMs });
        return result;
      } catch (error) {
        logger.error(`Phase '${name}' failed`, createErrorLogContext(error, {
          phase: name,
          ...(error instanceof ApplicationError && { errorCode: error.code }),
        }));
        throw new BuildPhaseError(name, toError(error), { service: 'MovieDocumentBuildService' });
      }
    };

    logger.info('Movie document build started', {
      collection,
      publishMode: build.publishMode,
      batchSize: build.batchSize,
    });

    const sourceRows = await phase('preflight', async () => {
      await this.reader.assertAvailable(REQUIRED_RELATIONS);
      return this.countSourceRows();
    });
    logger.info('Source relations ready', sourceRows);

    const movies = await phase('movies', () => collectRows(this.reader.read('movies')));
    logger.info(`Found ${movies.length} movies`);

    const ratings = await phase('ratings', () =>
      buildSingleValueIndex(
        this.reader.read('ratings'),
        row => row.movie_id,
        (row): MovieRating => ({ average: row.average_rating, votes: row.num_votes ?? 0 })
      )
    );
    logger.info(`Found ${ratings.size} ratings`);

    const genres = await phase('genres', () =>
      buildMultiValueIndex(this.reader.read('genres'), row => row.movie_id, row => row.genre)
    );
    logger.info(`Found ${genres.size} movies with genres`);

    const persons = await phase('persons', () => buildPersonResolver(this.reader.read('persons')));
    logger.info(`Loaded ${persons.size} persons`);

    const directors = await phase('directors', () =>
      buildMultiValueIndex(this.reader.read('directors'), row => row.movie_id, row => row.person_id)
    );
    logger.info(`Found ${directors.size} movies with directors`);

    const writers = await phase('writers', () =>
      buildMultiValueIndex(this.reader.read('writers'), row => row.movie_id, row => row.person_id)
    );
    logger.info(`Found ${writers.size} movies with writers`);

    const cast = await phase('cast', () =>
      buildCastIndex(this.reader.read('principals'), this.reader.read('characters'), persons)
    );
    logger.info(`Found ${cast.movieCount} movies with cast`, {
      castEntries: cast.entryCount,
      characters: cast.characterCount,
      orphanedCharacters: cast.orphanedCharacterCount,
    });

    const indexes: AssemblyIndexes = { ratings, genres, directors, writers, cast, persons };

    // Documents are assembled lazily as the loader fills each batch
    const load = await phase('load', () => {
      const loader = new BulkLoader(this.store, {
        collection,
        batchSize: build.batchSize,
        progressEveryBatches: build.progressEveryBatches,
        callTimeoutMs: build.callTimeoutMs,
        publishMode: build.publishMode,
        onProgress: progress => this.emit(runOptions, { type: 'load-progress', ...progress }),
      });
      return loader.load(assembleDocuments(movies, indexes), movies.length);
    });

    const indexResult = await phase('indexes', () =>
      new SecondaryIndexBuilder(this.store, build.callTimeoutMs).build(collection)
    );

    const { verification, example } = await phase('verify', async () => ({
      verification: await this.verify(movies.length),
      example: await this.findExample(),
    }));

    const summary: BuildSummary = {
      collection,
      sourceRows,
      counts: {
        movies: movies.length,
        ratings: ratings.size,
        moviesWithGenres: genres.size,
        genres: genres.entryCount,
        persons: persons.size,
        moviesWithDirectors: directors.size,
        directors: directors.entryCount,
        moviesWithWriters: writers.size,
        writers: writers.entryCount,
        moviesWithCast: cast.movieCount,
        castEntries: cast.entryCount,
        characters: cast.characterCount,
        orphanedCharacters: cast.orphanedCharacterCount,
      },
      load,
      indexes: {
        created: indexResult.created,
        failed: indexResult.failed.map(failure => ({ name: failure.indexName, message: failure.message })),
      },
      verification,
      example,
      phaseDurations,
      elapsedMs: Date.now() - startedAt,
    };

    logger.info('Movie document build complete', {
      collection,
      elapsedMs: summary.elapsedMs,
      counts: summary.counts,
      verified: verification.verified,
      failedIndexes: summary.indexes.failed.map(failure => failure.name),
    });
    if (example) {
      logger.info('Example document', { example });
    }

    return summary;
  }

  private async countSourceRows(): Promise<SourceRowCounts> {
    return {
      movies: await this.reader.count('movies'),
      ratings: await this.reader.count('ratings'),
      genres: await this.reader.count('genres'),
      persons: await this.reader.count('persons'),
      directors: await this.reader.count('directors'),
      writers: await this.reader.count('writers'),
      principals: await this.reader.count('principals'),
      characters: await this.reader.count('characters'),
    };
  }

  /**
   * Count documents in the destination against the number of source movies
   */
  private async verify(expected: number): Promise<VerificationResult> {
    const { collection, build } = this.options;
    const actual = await withDeadline(
      this.store.countDocuments(collection),
      build.callTimeoutMs,
      `countDocuments ${collection}`
    );
    const verified = actual === expected;

    if (verified) {
      logger.info('Destination count verified', { collection, count: actual });
    } else {
      logger.warn('Destination count does not match source movies', { collection, expected, actual });
    }

    return { expected, actual, verified };
  }

  /**
   * A well-known movie if one exists (votes above the threshold), otherwise any movie
   */
  private async findExample(): Promise<MovieDocumentPreview | null> {
    const { collection, build } = this.options;
    const document =
      (await withDeadline(
        this.store.findOneWithMinVotes(collection, build.exampleMinVotes),
        build.callTimeoutMs,
        `findOne ${collection}`
      )) ??
      (await withDeadline(this.store.findOne(collection), build.callTimeoutMs, `findOne ${collection}`));

    return document ? toDocumentPreview(document) : null;
  }

  private emit(runOptions: BuildRunOptions, event: BuildProgressEvent): void {
    if (!runOptions.onProgress) {
      return;
    }
    try {
      runOptions.onProgress(event);
    } catch (error) {
      logger.warn('Progress listener failed', createErrorLogContext(error, { event: event.type }));
    }
  }
}
