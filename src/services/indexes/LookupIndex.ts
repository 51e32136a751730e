/**
 * In-memory lookup indexes
 *
 * Built once by fully draining a relation, then only read. Nothing here is
 * persisted; indexes live for the duration of one build.
 */

export type RowSource<T> = AsyncIterable<T> | Iterable<T>;

/**
 * At most one value per key (ratings)
 */
export interface SingleValueIndex<K, V> {
  get(key: K): V | undefined;
  has(key: K): boolean;
  /** Distinct keys */
  readonly size: number;
  /** Rows drained into the index, duplicates included */
  readonly entryCount: number;
}

/**
 * Any number of values per key, in the order they were read (genres, credits)
 */
export interface MultiValueIndex<K, V> {
  /** Values for the key; an empty array when the key is absent */
  get(key: K): readonly V[];
  has(key: K): boolean;
  readonly size: number;
  readonly entryCount: number;
}

const EMPTY: readonly never[] = Object.freeze([]);

class MapSingleValueIndex<K, V> implements SingleValueIndex<K, V> {
  constructor(
    private readonly entries: ReadonlyMap<K, V>,
    readonly entryCount: number
  ) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

class MapMultiValueIndex<K, V> implements MultiValueIndex<K, V> {
  constructor(
    private readonly entries: ReadonlyMap<K, readonly V[]>,
    readonly entryCount: number
  ) {}

  get(key: K): readonly V[] {
    return this.entries.get(key) ?? EMPTY;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Drain rows into a key → value map. Duplicate keys are not rejected:
 * the last row read wins.
 */
export async function buildSingleValueIndex<T, K, V>(
  rows: RowSource<T>,
  keyOf: (row: T) => K,
  valueOf: (row: T) => V
): Promise<SingleValueIndex<K, V>> {
  const entries = new Map<K, V>();
  let entryCount = 0;

  for await (const row of rows) {
    entries.set(keyOf(row), valueOf(row));
    entryCount++;
  }

  return new MapSingleValueIndex(entries, entryCount);
}

/**
 * Drain rows into a key → values multimap, keeping read order and duplicates.
 */
export async function buildMultiValueIndex<T, K, V>(
  rows: RowSource<T>,
  keyOf: (row: T) => K,
  valueOf: (row: T) => V
): Promise<MultiValueIndex<K, V>> {
  const entries = new Map<K, V[]>();
  let entryCount = 0;

  for await (const row of rows) {
    const key = keyOf(row);
    const values = entries.get(key);
    if (values) {
      values.push(valueOf(row));
    } else {
      entries.set(key, [valueOf(row)]);
    }
    entryCount++;
  }

  return new MapMultiValueIndex<K, V>(entries, entryCount);
}
