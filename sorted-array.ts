import { IMap } from './interfaces';
import { defaultComparator } from './trie';

/**
 * Slow reference model of a Trie for tests: pairs kept in one sorted
 * array, with the prefix queries answered by linear scans. Prefix
 * queries need string keys.
 */
export default class SortedArray<K = string, V = unknown> implements IMap<K, V>
{
  private pairs: [K, V][] = [];
  private readonly cmp: (a: K, b: K) => number;

  public constructor(entries?: Iterable<readonly [K, V]>, compare?: (a: K, b: K) => number) {
    this.cmp = compare || defaultComparator;
    if (entries !== undefined)
      for (const [key, value] of entries)
        this.set(key, value);
  }

  get size(): number { return this.pairs.length; }

  /** The pairs themselves, in key order. Callers must not modify the array. */
  getArray(): [K, V][] { return this.pairs; }

  get(key: K, defaultValue?: V): V | undefined {
    const i = this.lowerBound(key);
    return this.matches(i, key) ? this.pairs[i][1] : defaultValue;
  }

  has(key: K): boolean {
    return this.matches(this.lowerBound(key), key);
  }

  set(key: K, value: V, overwrite?: boolean): boolean {
    const i = this.lowerBound(key);
    if (!this.matches(i, key)) {
      this.pairs.splice(i, 0, [key, value]);
      return true;
    }
    if (overwrite !== false)
      this.pairs[i] = [key, value];
    return false;
  }

  delete(key: K): boolean {
    const i = this.lowerBound(key);
    if (!this.matches(i, key))
      return false;
    this.pairs.splice(i, 1);
    return true;
  }

  clear(): void { this.pairs = []; }

  forEach(callbackFn: (v: V, k: K, list: SortedArray<K, V>) => void): void {
    for (const [k, v] of this.pairs)
      callbackFn(v, k, this);
  }

  [Symbol.iterator](): IterableIterator<[K, V]> { return this.entries(); }
  entries(): IterableIterator<[K, V]> { return this.pairs.slice().values(); }
  keys(): IterableIterator<K> { return this.pairs.map(([k]) => k).values(); }
  values(): IterableIterator<V> { return this.pairs.map(([, v]) => v).values(); }

  /////////////////////////////////////////////////////////////////////////////
  // Prefix queries ///////////////////////////////////////////////////////////

  /** Pairs whose key starts with `prefix`, in key order. */
  entriesWithPrefix(this: SortedArray<string, V>, prefix: string): [string, V][] {
    return this.pairs.filter(([k]) => k.startsWith(prefix));
  }

  /** Longest stored key that `query` starts with, or undefined. */
  longestPrefixOf(this: SortedArray<string, V>, query: string): string | undefined {
    let best: string | undefined;
    for (const [k] of this.pairs)
      if (query.startsWith(k) && (best === undefined || k.length > best.length))
        best = k;
    return best;
  }

  /** Longest stored key, the first one in key order on a tie. */
  longestKey(this: SortedArray<string, V>): string | undefined {
    let best: string | undefined;
    for (const [k] of this.pairs)
      if (best === undefined || k.length > best.length)
        best = k;
    return best;
  }

  // Index of the first pair whose key is not below `key`
  private lowerBound(key: K): number {
    let lo = 0, hi = this.pairs.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      const c = this.cmp(this.pairs[mid][0], key);
      if (c < 0)
        lo = mid + 1;
      else if (c >= 0)
        hi = mid;
      else
        throw new Error("SortedArray: keys are not comparable");
    }
    return lo;
  }

  private matches(i: number, key: K): boolean {
    return i < this.pairs.length && this.cmp(this.pairs[i][0], key) === 0;
  }
}
