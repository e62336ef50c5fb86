/**
 * Size-indexed KeySet
 *
 * Stores circuit keys uniquely by transaction size and answers exact-fit and
 * best-fit lookups. Entries live in an array sorted by the strategy's sort
 * key; it is built once and never mutated, so a KeySet can be shared freely
 * between readers.
 */

import {
  DuplicateKeysError,
  KeySetInvariantError,
  KeySetSerializationError,
  NoKeysError
} from './errors';
import { compareSortKeys, type KeyOrder, type SortKey } from './keyOrder';
import { assertShape, dominates, formatShape, type Shape } from './shape';
import { shapeOf, type SizedKey } from './sizedKey';

/**
 * KeySet configuration
 */
export interface KeySetConfig {
  /** Prefix for log lines */
  label: string;
  /** Log construction and best-fit misses */
  debug: boolean;
}

export type KeySetEntry<K> = readonly [SortKey, K];

/**
 * Outcome of a best-fit lookup. A miss carries the largest supported size so
 * the caller can decide whether to reject the transaction or regenerate keys.
 */
export type BestFit<K> =
  | { found: true; numInputs: number; numOutputs: number; key: K }
  | { found: false; maxSize: Shape };

const DEFAULT_CONFIG: Omit<KeySetConfig, 'debug'> = {
  label: 'KeySet'
};

function resolveConfig(config: Partial<KeySetConfig> = {}): KeySetConfig {
  return { ...DEFAULT_CONFIG, debug: process.env.NODE_ENV === 'development', ...config };
}

export class KeySet<K extends SizedKey, O extends KeyOrder = KeyOrder>
  implements Iterable<K>
{
  private readonly sorted: ReadonlyArray<KeySetEntry<K>>;

  private constructor(
    readonly order: O,
    sorted: KeySetEntry<K>[],
    private readonly config: KeySetConfig
  ) {
    this.sorted = Object.freeze(sorted);
  }

  /**
   * Index a batch of keys. The batch may come in any order; it must be
   * non-empty and no two keys may share a size.
   *
   * @throws DuplicateKeysError naming the size of the first key whose sort
   * key is already taken
   * @throws NoKeysError if `keys` is empty
   */
  static create<K extends SizedKey, O extends KeyOrder>(
    keys: Iterable<K>,
    order: O,
    config?: Partial<KeySetConfig>
  ): KeySet<K, O> {
    const seen = new Set<string>();
    const entries: KeySetEntry<K>[] = [];

    for (const key of keys) {
      const numInputs = key.numInputs();
      const numOutputs = key.numOutputs();
      assertShape(numInputs, numOutputs);

      const sortKey = Object.freeze(order.sortKey(numInputs, numOutputs));
      const id = sortKey.join(':');
      if (seen.has(id)) {
        throw new DuplicateKeysError(numInputs, numOutputs);
      }
      seen.add(id);
      entries.push(Object.freeze([sortKey, key] as const));
    }

    if (entries.length === 0) {
      throw new NoKeysError();
    }

    entries.sort((a, b) => compareSortKeys(a[0], b[0]));
    const set = new KeySet(order, entries, resolveConfig(config));
    set.log(`Indexed ${entries.length} keys by ${order.name}, max size ${formatShape(set.maxSize())}`);
    return set;
  }

  /**
   * Rebuild a KeySet from entries already in sort-key order, as read back
   * from an encoding. Each stored sort key must match the one `order` gives
   * its key, and entries must be strictly ascending.
   *
   * An empty entry list is accepted: persisted state can be corrupt, and the
   * resulting set fails on `maxSize()` instead of here.
   */
  static fromSortedEntries<K extends SizedKey, O extends KeyOrder>(
    entries: Iterable<KeySetEntry<K>>,
    order: O,
    config?: Partial<KeySetConfig>
  ): KeySet<K, O> {
    const restored: KeySetEntry<K>[] = [];

    for (const [sortKey, key] of entries) {
      const numInputs = key.numInputs();
      const numOutputs = key.numOutputs();
      assertShape(numInputs, numOutputs);

      const expected = Object.freeze(order.sortKey(numInputs, numOutputs));
      if (compareSortKeys(expected, sortKey) !== 0) {
        throw new KeySetSerializationError(
          `Sort key [${sortKey.join(', ')}] does not match key of size ${formatShape({ numInputs, numOutputs })} under ${order.name} ordering`
        );
      }

      const previous = restored[restored.length - 1];
      if (previous && compareSortKeys(previous[0], expected) >= 0) {
        throw new KeySetSerializationError(
          `Entries out of order or duplicated at size ${formatShape({ numInputs, numOutputs })}`
        );
      }

      restored.push(Object.freeze([expected, key] as const));
    }

    return new KeySet(order, restored, resolveConfig(config));
  }

  /** Number of stored keys */
  get size(): number {
    return this.sorted.length;
  }

  /**
   * Largest size supported by this KeySet: the size of the last key in sort
   * order.
   *
   * @throws KeySetInvariantError if the set is empty, which `create` rules
   * out and only corrupted persisted state can produce
   */
  maxSize(): Shape {
    const last = this.sorted[this.sorted.length - 1];
    if (!last) {
      throw new KeySetInvariantError('KeySet is empty; it was decoded from corrupted state');
    }
    return shapeOf(last[1]);
  }

  /**
   * Key whose size is exactly (numInputs, numOutputs)
   */
  exactFitKey(numInputs: number, numOutputs: number): K | undefined {
    assertShape(numInputs, numOutputs);
    const target = this.order.sortKey(numInputs, numOutputs);
    const index = this.lowerBound(target);
    const entry = this.sorted[index];
    if (entry && compareSortKeys(entry[0], target) === 0) {
      return entry[1];
    }
    return undefined;
  }

  /**
   * @deprecated Use exactFitKey
   */
  keyForSize(numInputs: number, numOutputs: number): K | undefined {
    return this.exactFitKey(numInputs, numOutputs);
  }

  /**
   * Smallest key, under this set's ordering, whose size is at least
   * (numInputs, numOutputs) in both dimensions.
   */
  bestFitKey(numInputs: number, numOutputs: number): BestFit<K> {
    assertShape(numInputs, numOutputs);

    // Everything from the lower bound on has a primary axis at least as large
    // as requested, but not necessarily the secondary one: under
    // OrderByInputs, (3, 1) sorts after (2, 2) although 1 < 2. So the range
    // is only a superset of the candidates and each entry must be checked on
    // both axes. Nothing before the bound can fit.
    const request = { numInputs, numOutputs };
    const start = this.lowerBound(this.order.sortKey(numInputs, numOutputs));
    for (let i = start; i < this.sorted.length; i++) {
      const key = this.sorted[i][1];
      const shape = shapeOf(key);
      if (dominates(shape, request)) {
        return { found: true, ...shape, key };
      }
    }

    const maxSize = this.maxSize();
    this.log(
      `No key fits size ${formatShape(request)}; max size is ${formatShape(maxSize)}`
    );
    return { found: false, maxSize };
  }

  /**
   * Keys in ascending sort-key order. Each call starts a fresh traversal.
   */
  *keys(): IterableIterator<K> {
    for (const [, key] of this.sorted) {
      yield key;
    }
  }

  /**
   * (sort key, key) pairs in ascending sort-key order
   */
  *entries(): IterableIterator<KeySetEntry<K>> {
    yield* this.sorted;
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.keys();
  }

  /**
   * Same ordering, same sort keys, and pairwise equal keys under `keyEquals`
   */
  equals(other: KeySet<K>, keyEquals: (a: K, b: K) => boolean): boolean {
    if (this.order.name !== other.order.name || this.sorted.length !== other.sorted.length) {
      return false;
    }
    return this.sorted.every(([sortKey, key], i) => {
      const [otherSortKey, otherKey] = other.sorted[i];
      return compareSortKeys(sortKey, otherSortKey) === 0 && keyEquals(key, otherKey);
    });
  }

  /**
   * Index of the first entry whose sort key is >= target
   */
  private lowerBound(target: SortKey): number {
    let lo = 0;
    let hi = this.sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareSortKeys(this.sorted[mid][0], target) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.debug(`[${this.config.label}] ${message}`);
    }
  }
}
