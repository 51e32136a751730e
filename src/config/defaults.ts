import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  env: 'development',
  database: {
    type: 'sqlite3',
    filename: './data/imdb.db',
    readOnly: true,
  },
  destination: {
    uri: 'mongodb://localhost:27017',
    database: 'cineexplorer',
    collection: 'movies_complete',
    serverSelectionTimeoutMs: 60000,
  },
  relations: {
    movies: 'movies',
    ratings: 'ratings',
    genres: 'genres',
    persons: 'persons',
    directors: 'directors',
    writers: 'writers',
    principals: 'principals',
    characters: 'characters',
  },
  build: {
    batchSize: 1000,
    pageSize: 5000,
    progressEveryBatches: 5, // one progress line per 5,000 documents at the default batch size
    callTimeoutMs: 60000,
    publishMode: 'replace',
    exampleMinVotes: 1000000,
  },
  logging: {
    level: 'info',
    file: {
      enabled: true,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
