import { PersonRow } from '../relations/relationSchemas.js';
import { RowSource } from './LookupIndex.js';

export const UNKNOWN_PERSON_NAME = 'Unknown';

/**
 * Person id → display name, loaded once per build and shared read-only by
 * every stage that attaches names to credits.
 */
export class PersonResolver {
  constructor(private readonly names: ReadonlyMap<string, string>) {}

  /**
   * Raw lookup. Undefined when the id has no row in persons.
   */
  find(personId: string): string | undefined {
    return this.names.get(personId);
  }

  /**
   * Display name for a credit. Orphaned ids resolve to "Unknown"; never throws.
   */
  resolve(personId: string): string {
    return this.names.get(personId) ?? UNKNOWN_PERSON_NAME;
  }

  get size(): number {
    return this.names.size;
  }
}

export async function buildPersonResolver(rows: RowSource<PersonRow>): Promise<PersonResolver> {
  const names = new Map<string, string>();
  for await (const person of rows) {
    names.set(person.person_id, person.name);
  }
  return new PersonResolver(names);
}
