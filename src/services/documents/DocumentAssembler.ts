import { CompositeMovieDocument, MovieDocumentPreview, MovieRating, PersonRef } from '../../types/movie.js';
import { MovieRow } from '../relations/relationSchemas.js';
import { MultiValueIndex, SingleValueIndex } from '../indexes/LookupIndex.js';
import { PersonResolver } from '../indexes/PersonResolver.js';
import { CastIndex } from '../indexes/CastAssembler.js';

/**
 * Everything a document is assembled from, built earlier in the run.
 * Director and writer indexes hold person ids; names are attached here.
 */
export interface AssemblyIndexes {
  ratings: SingleValueIndex<string, MovieRating>;
  genres: MultiValueIndex<string, string>;
  directors: MultiValueIndex<string, string>;
  writers: MultiValueIndex<string, string>;
  cast: CastIndex;
  persons: PersonResolver;
}

export const DEFAULT_RATING: Readonly<MovieRating> = Object.freeze({ average: null, votes: 0 });

/**
 * Build the composite document for one movie.
 * Missing associations become their defaults, never absent fields.
 */
export function assembleDocument(movie: MovieRow, indexes: AssemblyIndexes): CompositeMovieDocument {
  const movieId = movie.movie_id;
  const rating = indexes.ratings.get(movieId) ?? DEFAULT_RATING;

  return {
    _id: movieId,
    title: movie.primary_title,
    year: movie.start_year,
    runtime: movie.runtime_minutes,
    rating: { average: rating.average, votes: rating.votes },
    genres: [...indexes.genres.get(movieId)],
    directors: toPersonRefs(indexes.directors.get(movieId), indexes.persons),
    cast: indexes.cast.get(movieId).map(entry => ({
      person_id: entry.person_id,
      name: entry.name,
      characters: [...entry.characters],
    })),
    writers: toPersonRefs(indexes.writers.get(movieId), indexes.persons),
  };
}

/**
 * One document per movie, in movie-input order.
 */
export function* assembleDocuments(
  movies: Iterable<MovieRow>,
  indexes: AssemblyIndexes
): Generator<CompositeMovieDocument, void, undefined> {
  for (const movie of movies) {
    yield assembleDocument(movie, indexes);
  }
}

export function toDocumentPreview(document: CompositeMovieDocument): MovieDocumentPreview {
  return {
    _id: document._id,
    title: document.title,
    year: document.year,
    rating: document.rating,
    genres: document.genres.slice(0, 3),
    directors_count: document.directors.length,
    cast_count: document.cast.length,
    writers_count: document.writers.length,
  };
}

function toPersonRefs(personIds: readonly string[], persons: PersonResolver): PersonRef[] {
  return personIds.map(personId => ({ person_id: personId, name: persons.resolve(personId) }));
}
