import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import { DatabaseConnection, SqlParam } from '../../src/types/database.js';

/**
 * Test Database Utilities
 *
 * In-memory SQLite source with the eight relations the build reads.
 * Table names match the default relation → table mapping.
 */

const SOURCE_SCHEMA = `
  CREATE TABLE movies (
    movie_id TEXT PRIMARY KEY,
    primary_title TEXT NOT NULL,
    start_year INTEGER NOT NULL,
    runtime_minutes INTEGER
  );
  CREATE TABLE ratings (movie_id TEXT, average_rating REAL, num_votes INTEGER);
  CREATE TABLE genres (movie_id TEXT, genre TEXT);
  CREATE TABLE persons (person_id TEXT PRIMARY KEY, name TEXT NOT NULL);
  CREATE TABLE directors (movie_id TEXT, person_id TEXT);
  CREATE TABLE writers (movie_id TEXT, person_id TEXT);
  CREATE TABLE principals (movie_id TEXT, person_id TEXT);
  CREATE TABLE characters (movie_id TEXT, person_id TEXT, name TEXT);
`;

export interface SourceFixture {
  movies?: Array<[movieId: string, title: string, year: number, runtime: number | null]>;
  ratings?: Array<[movieId: string, average: number | null, votes: number | null]>;
  genres?: Array<[movieId: string, genre: string]>;
  persons?: Array<[personId: string, name: string]>;
  directors?: Array<[movieId: string, personId: string]>;
  writers?: Array<[movieId: string, personId: string]>;
  principals?: Array<[movieId: string, personId: string]>;
  characters?: Array<[movieId: string, personId: string, name: string]>;
}

const INSERTS: Record<keyof SourceFixture, string> = {
  movies: 'INSERT INTO movies (movie_id, primary_title, start_year, runtime_minutes) VALUES (?, ?, ?, ?)',
  ratings: 'INSERT INTO ratings (movie_id, average_rating, num_votes) VALUES (?, ?, ?)',
  genres: 'INSERT INTO genres (movie_id, genre) VALUES (?, ?)',
  persons: 'INSERT INTO persons (person_id, name) VALUES (?, ?)',
  directors: 'INSERT INTO directors (movie_id, person_id) VALUES (?, ?)',
  writers: 'INSERT INTO writers (movie_id, person_id) VALUES (?, ?)',
  principals: 'INSERT INTO principals (movie_id, person_id) VALUES (?, ?)',
  characters: 'INSERT INTO characters (movie_id, person_id, name) VALUES (?, ?, ?)',
};

const SEED_ORDER: ReadonlyArray<keyof SourceFixture> = [
  'movies',
  'ratings',
  'genres',
  'persons',
  'directors',
  'writers',
  'principals',
  'characters',
];

/**
 * The single-movie example: one drama with a director, one actor playing two
 * characters and no writers.
 */
export const ALPHA_FIXTURE: SourceFixture = {
  movies: [['m1', 'Alpha', 2000, 100]],
  ratings: [['m1', 8.5, 1000]],
  genres: [['m1', 'Drama']],
  persons: [['p1', 'A. Actor'], ['p2', 'B. Director']],
  principals: [['m1', 'p1']],
  characters: [['m1', 'p1', 'Hero'], ['m1', 'p1', 'Narrator']],
  directors: [['m1', 'p2']],
  writers: [],
};

export class TestDatabase {
  private db: Database | null = null;
  private connection: DatabaseConnection | null = null;

  /**
   * Create a new in-memory source database with all relations and no rows
   */
  async create(): Promise<DatabaseConnection> {
    const db = await open({
      filename: ':memory:',
      driver: sqlite3.Database,
    });
    await db.exec(SOURCE_SCHEMA);
    this.db = db;

    this.connection = {
      query: async <T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> =>
        db.all<T[]>(sql, params),

      close: async (): Promise<void> => {
        if (this.db) {
          await this.db.close();
          this.db = null;
        }
      },
    };

    return this.connection;
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new Error('Database not created');
    }
    return this.connection;
  }

  async seed(fixture: SourceFixture): Promise<void> {
    const db = this.requireDb();
    for (const relation of SEED_ORDER) {
      const rows: ReadonlyArray<readonly SqlParam[]> = fixture[relation] ?? [];
      for (const row of rows) {
        await db.run(INSERTS[relation], [...row]);
      }
    }
  }

  /**
   * Run raw SQL against the source, for tests that need rows or tables the
   * fixture shape cannot express.
   */
  async exec(sql: string): Promise<void> {
    await this.requireDb().exec(sql);
  }

  async destroy(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
    }
  }

  private requireDb(): Database {
    if (!this.db) {
      throw new Error('Database not created');
    }
    return this.db;
  }
}

export async function createTestDatabase(fixture?: SourceFixture): Promise<TestDatabase> {
  const testDb = new TestDatabase();
  await testDb.create();
  if (fixture) {
    await testDb.seed(fixture);
  }
  return testDb;
}
