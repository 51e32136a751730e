import { MOVIE_DOCUMENT_INDEXES, SecondaryIndexBuilder } from '../../src/services/documents/SecondaryIndexBuilder.js';
import { IndexCreationError } from '../../src/errors/index.js';
import { InMemoryDocumentStore } from '../utils/InMemoryDocumentStore.js';

jest.mock('../../src/utils/logging.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('SecondaryIndexBuilder', () => {
  it('should create the title, year, genres and rating indexes', async () => {
    const store = new InMemoryDocumentStore();

    const result = await new SecondaryIndexBuilder(store, 0).build('movies');

    expect(result.created).toEqual(['idx_title', 'idx_year', 'idx_genres', 'idx_rating_average']);
    expect(result.failed).toEqual([]);
    expect(store.indexes.get('movies')?.get('idx_rating_average')?.keys).toEqual({ 'rating.average': 1 });
  });

  it('should be idempotent when run twice', async () => {
    const store = new InMemoryDocumentStore();
    const builder = new SecondaryIndexBuilder(store, 0);

    await builder.build('movies');
    const second = await builder.build('movies');

    expect(second.created).toHaveLength(MOVIE_DOCUMENT_INDEXES.length);
    expect(store.indexNames('movies')).toEqual(['idx_title', 'idx_year', 'idx_genres', 'idx_rating_average']);
  });

  it('should report a failed index and still create the others', async () => {
    const store = new InMemoryDocumentStore({ failIndexNames: ['idx_year'] });

    const result = await new SecondaryIndexBuilder(store, 0).build('movies');

    expect(result.created).toEqual(['idx_title', 'idx_genres', 'idx_rating_average']);
    expect(result.failed).toHaveLength(1);
    const [failure] = result.failed;
    expect(failure).toBeInstanceOf(IndexCreationError);
    expect(failure?.indexName).toBe('idx_year');
    expect(failure?.collection).toBe('movies');
    expect(failure?.message).toBe("Failed to create index 'idx_year' on 'movies': simulated index failure: idx_year");
  });

  it('should use a custom index list when given one', async () => {
    const store = new InMemoryDocumentStore();

    const result = await new SecondaryIndexBuilder(store, 0, [{ name: 'idx_runtime', keys: { runtime: -1 } }]).build(
      'movies'
    );

    expect(result.created).toEqual(['idx_runtime']);
  });
});
