import { z } from 'zod';
import { RelationName } from '../../config/types.js';

/**
 * Columns read from each source relation, with the types the pipeline relies on.
 * The keys of each shape are exactly the columns selected; anything else in the
 * table is never read.
 */
export const relationSchemas = {
  movies: z.object({
    movie_id: z.string(),
    primary_title: z.string(),
    start_year: z.number().int(),
    runtime_minutes: z.number().int().nullable(),
  }),
  ratings: z.object({
    movie_id: z.string(),
    average_rating: z.number().nullable(),
    num_votes: z.number().int().nullable(),
  }),
  genres: z.object({
    movie_id: z.string(),
    genre: z.string(),
  }),
  persons: z.object({
    person_id: z.string(),
    name: z.string(),
  }),
  directors: z.object({
    movie_id: z.string(),
    person_id: z.string(),
  }),
  writers: z.object({
    movie_id: z.string(),
    person_id: z.string(),
  }),
  principals: z.object({
    movie_id: z.string(),
    person_id: z.string(),
  }),
  characters: z.object({
    movie_id: z.string(),
    person_id: z.string(),
    name: z.string(),
  }),
} satisfies Record<RelationName, z.AnyZodObject>;

export type RelationRow<R extends RelationName> = z.infer<(typeof relationSchemas)[R]>;

export type MovieRow = RelationRow<'movies'>;
export type RatingRow = RelationRow<'ratings'>;
export type GenreRow = RelationRow<'genres'>;
export type PersonRow = RelationRow<'persons'>;
export type CreditRow = RelationRow<'directors'>;
export type PrincipalRow = RelationRow<'principals'>;
export type CharacterRow = RelationRow<'characters'>;

/**
 * Every relation a build needs. A missing one aborts the run before any write.
 */
export const REQUIRED_RELATIONS: readonly RelationName[] = [
  'movies',
  'ratings',
  'genres',
  'persons',
  'directors',
  'writers',
  'principals',
  'characters',
];

export function columnsOf(relation: RelationName): string[] {
  return Object.keys(relationSchemas[relation].shape);
}
