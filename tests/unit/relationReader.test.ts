import { RelationReader, RelationReaderOptions, collectRows } from '../../src/services/relations/RelationReader.js';
import { REQUIRED_RELATIONS } from '../../src/services/relations/relationSchemas.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { SchemaValidationError, SourceUnavailableError, TimeoutError } from '../../src/errors/index.js';
import { DatabaseConnection, SqlParam } from '../../src/types/database.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

jest.mock('../../src/utils/logging.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function readerOptions(overrides: Partial<RelationReaderOptions> = {}): RelationReaderOptions {
  return {
    tables: defaultConfig.relations,
    pageSize: 2,
    callTimeoutMs: 0,
    retryPolicy: {
      maxAttempts: 1,
      initialDelayMs: 0,
      maxDelayMs: 0,
      backoffMultiplier: 1,
      jitterFactor: 0,
    },
    ...overrides,
  };
}

/**
 * Delegates to a real connection, except that the first `hangingCalls`
 * queries never settle.
 */
class StallingConnection implements DatabaseConnection {
  calls = 0;

  constructor(
    private readonly inner: DatabaseConnection,
    private readonly hangingCalls: number
  ) {}

  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]> {
    this.calls++;
    if (this.calls <= this.hangingCalls) {
      return new Promise<T[]>(() => undefined);
    }
    return this.inner.query<T>(sql, params);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

const TIMEOUT_RETRY_POLICY = {
  maxAttempts: 3,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
  jitterFactor: 0,
};

describe('RelationReader', () => {
  let testDb: TestDatabase;

  beforeEach(async () => {
    testDb = await createTestDatabase({
      movies: [
        ['m1', 'Alpha', 2000, 100],
        ['m2', 'Beta', 2001, null],
        ['m3', 'Gamma', 2002, 95],
        ['m4', 'Delta', 2003, 120],
        ['m5', 'Epsilon', 2004, 88],
      ],
      genres: [
        ['m1', 'Drama'],
        ['m1', 'Crime'],
        ['m2', 'Comedy'],
        ['m3', 'Drama'],
      ],
    });
  });

  afterEach(async () => {
    if (testDb) {
      await testDb.destroy();
    }
  });

  describe('read', () => {
    it('should stream every row across pages in a stable order', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const movies = await collectRows(reader.read('movies'));

      expect(movies.map(movie => movie.movie_id)).toEqual(['m1', 'm2', 'm3', 'm4', 'm5']);
      expect(movies[1]).toEqual({ movie_id: 'm2', primary_title: 'Beta', start_year: 2001, runtime_minutes: null });
    });

    it('should end cleanly when the last page is exactly full', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const genres = await collectRows(reader.read('genres'));

      expect(genres).toEqual([
        { movie_id: 'm1', genre: 'Drama' },
        { movie_id: 'm1', genre: 'Crime' },
        { movie_id: 'm2', genre: 'Comedy' },
        { movie_id: 'm3', genre: 'Drama' },
      ]);
    });

    it('should yield nothing for an empty relation', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      expect(await collectRows(reader.read('writers'))).toEqual([]);
    });

    it('should start a new scan on every call', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const first = await collectRows(reader.read('genres'));
      const second = await collectRows(reader.read('genres'));

      expect(second).toEqual(first);
    });

    it('should fail with SchemaValidationError on a row of the wrong shape', async () => {
      await testDb.exec("INSERT INTO movies VALUES ('m6', 'Zeta', 'unknown', 90)");
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const error = await collectRows(reader.read('movies')).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.errors.map(issue => issue.path)).toEqual(['start_year']);
        expect(error.context.entityId).toBe('movies');
        expect(error.context.metadata?.['rowid']).toBe(6);
      }
    });

    it('should fail with SourceUnavailableError when the table is gone', async () => {
      await testDb.exec('DROP TABLE ratings');
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const error = await collectRows(reader.read('ratings')).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SourceUnavailableError);
      if (error instanceof SourceUnavailableError) {
        expect(error.relation).toBe('ratings');
      }
    });
  });

  describe('read deadlines', () => {
    it('should retry a page whose query misses its deadline', async () => {
      const connection = new StallingConnection(testDb.getConnection(), 1);
      const reader = new RelationReader(
        connection,
        readerOptions({ pageSize: 10, callTimeoutMs: 50, retryPolicy: TIMEOUT_RETRY_POLICY })
      );

      const movies = await collectRows(reader.read('movies'));

      expect(connection.calls).toBe(2);
      expect(movies.map(movie => movie.movie_id)).toEqual(['m1', 'm2', 'm3', 'm4', 'm5']);
    });

    it('should give up with SourceUnavailableError once every attempt times out', async () => {
      const connection = new StallingConnection(testDb.getConnection(), Number.POSITIVE_INFINITY);
      const reader = new RelationReader(
        connection,
        readerOptions({ pageSize: 10, callTimeoutMs: 50, retryPolicy: TIMEOUT_RETRY_POLICY })
      );

      const error = await collectRows(reader.read('movies')).catch((caught: unknown) => caught);

      expect(connection.calls).toBe(3);
      expect(error).toBeInstanceOf(SourceUnavailableError);
      if (error instanceof SourceUnavailableError) {
        expect(error.relation).toBe('movies');
        expect(error.cause).toBeInstanceOf(TimeoutError);
        expect(error.message).toBe("Relation 'movies' became unreadable: read movies timed out after 50ms");
      }
    });
  });

  describe('assertAvailable', () => {
    it('should pass when every relation has its columns', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      await expect(reader.assertAvailable(REQUIRED_RELATIONS)).resolves.toBeUndefined();
    });

    it('should name the first missing relation', async () => {
      await testDb.exec('DROP TABLE characters');
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      const error = await reader.assertAvailable(REQUIRED_RELATIONS).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SourceUnavailableError);
      if (error instanceof SourceUnavailableError) {
        expect(error.relation).toBe('characters');
        expect(error.retryable).toBe(false);
      }
    });

    it('should reject a table that lacks a required column', async () => {
      await testDb.exec('CREATE TABLE movies_slim (movie_id TEXT, primary_title TEXT)');
      const reader = new RelationReader(
        testDb.getConnection(),
        readerOptions({ tables: { ...defaultConfig.relations, movies: 'movies_slim' } })
      );

      await expect(reader.assertAvailable(['movies'])).rejects.toBeInstanceOf(SourceUnavailableError);
    });
  });

  describe('count', () => {
    it('should count the rows of a relation', async () => {
      const reader = new RelationReader(testDb.getConnection(), readerOptions());

      expect(await reader.count('movies')).toBe(5);
      expect(await reader.count('genres')).toBe(4);
      expect(await reader.count('persons')).toBe(0);
    });
  });

  it('should read from the configured physical table', async () => {
    await testDb.exec("CREATE TABLE title_genres (movie_id TEXT, genre TEXT); INSERT INTO title_genres VALUES ('m9', 'Horror')");
    const reader = new RelationReader(
      testDb.getConnection(),
      readerOptions({ tables: { ...defaultConfig.relations, genres: 'title_genres' } })
    );

    expect(reader.tableFor('genres')).toBe('title_genres');
    expect(await collectRows(reader.read('genres'))).toEqual([{ movie_id: 'm9', genre: 'Horror' }]);
  });
});
