import { CastEntry } from '../../types/movie.js';
import { CharacterRow, PrincipalRow } from '../relations/relationSchemas.js';
import { RowSource } from './LookupIndex.js';
import { PersonResolver } from './PersonResolver.js';

/**
 * Per-movie cast lists, deduplicated by person.
 */
export interface CastIndex {
  /** Cast entries in order of first appearance in principals; empty when none */
  get(movieId: string): readonly CastEntry[];
  /** Movies with at least one principal */
  readonly movieCount: number;
  /** Distinct (movie, person) cast entries */
  readonly entryCount: number;
  /** Character names attached to an entry */
  readonly characterCount: number;
  /** Character rows dropped because no principal matched their (movie, person) */
  readonly orphanedCharacterCount: number;
}

class MapCastIndex implements CastIndex {
  constructor(
    private readonly castByMovie: ReadonlyMap<string, ReadonlyMap<string, CastEntry>>,
    readonly entryCount: number,
    readonly characterCount: number,
    readonly orphanedCharacterCount: number
  ) {}

  get(movieId: string): readonly CastEntry[] {
    const cast = this.castByMovie.get(movieId);
    return cast ? Array.from(cast.values()) : [];
  }

  get movieCount(): number {
    return this.castByMovie.size;
  }
}

/**
 * Two-pass cast join.
 *
 * Pass 1 drains principals and creates one entry per distinct (movie, person),
 * named through the resolver. Pass 2 drains characters and appends each name
 * to its entry; character rows without an entry are dropped.
 */
export async function buildCastIndex(
  principals: RowSource<PrincipalRow>,
  characters: RowSource<CharacterRow>,
  persons: PersonResolver
): Promise<CastIndex> {
  // Map keeps insertion order, so entries stay in first-appearance order
  const castByMovie = new Map<string, Map<string, CastEntry>>();
  let entryCount = 0;

  for await (const principal of principals) {
    let cast = castByMovie.get(principal.movie_id);
    if (!cast) {
      cast = new Map();
      castByMovie.set(principal.movie_id, cast);
    }

    if (!cast.has(principal.person_id)) {
      cast.set(principal.person_id, {
        person_id: principal.person_id,
        name: persons.resolve(principal.person_id),
        characters: [],
      });
      entryCount++;
    }
  }

  let characterCount = 0;
  let orphanedCharacterCount = 0;

  for await (const character of characters) {
    const entry = castByMovie.get(character.movie_id)?.get(character.person_id);
    if (entry) {
      entry.characters.push(character.name);
      characterCount++;
    } else {
      orphanedCharacterCount++;
    }
  }

  return new MapCastIndex(castByMovie, entryCount, characterCount, orphanedCharacterCount);
}
