/**
 * Composite movie document types
 *
 * Shape of the denormalized documents written to the destination collection.
 * One document per movie; every association is inlined so reads need no joins.
 */

/**
 * A person attached to a movie as director or writer
 */
export interface PersonRef {
  person_id: string;
  name: string;
}

/**
 * One cast member of a movie with every character they play in it
 */
export interface CastEntry {
  person_id: string;
  name: string;
  characters: string[];
}

export interface MovieRating {
  average: number | null;
  votes: number;
}

/**
 * Fully denormalized movie record.
 * `_id` is the source movie_id and doubles as the document key.
 */
export interface CompositeMovieDocument {
  _id: string;
  title: string;
  year: number;
  runtime: number | null;
  rating: MovieRating;
  genres: string[];
  directors: PersonRef[];
  cast: CastEntry[];
  writers: PersonRef[];
}

/**
 * Compact preview of a document used in the build summary
 */
export interface MovieDocumentPreview {
  _id: string;
  title: string;
  year: number;
  rating: MovieRating;
  genres: string[];
  directors_count: number;
  cast_count: number;
  writers_count: number;
}
