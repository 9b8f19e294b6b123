/** Read-only set of key-value pairs. */
export interface IMapSource<K, V> {
  /** Returns the number of key-value pairs in the collection. */
  readonly size: number;
  /** Returns the value associated with the key, or `defaultValue` if there is none. */
  get(key: K, defaultValue?: V): V | undefined;
  /** Returns true if the key exists in the collection. */
  has(key: K): boolean;
  /** Calls the callback for each key-value pair, value first. */
  forEach(callbackFn: (v: V, k: K, map: IMapSource<K, V>) => void): void;
  /** Returns an iterator that provides all key-value pairs from the collection (as arrays of length 2). */
  entries(): IterableIterator<[K, V]>;
  /** Returns a new iterator for iterating the keys of each pair. */
  keys(): IterableIterator<K>;
  /** Returns a new iterator for iterating the values of each pair. */
  values(): IterableIterator<V>;
  /** Returns an iterator that provides all key-value pairs from the collection. */
  [Symbol.iterator](): IterableIterator<[K, V]>;
}

/** Write-only set of key-value pairs. */
export interface IMapSink<K, V> {
  /** Sets the value for the key. Returns true if the key was new. */
  set(key: K, value: V, overwrite?: boolean): boolean;
  /** Removes the key. Returns true if it existed. */
  delete(key: K): boolean;
  /** Removes everything so that `size` is 0. */
  clear(): void;
}

/** Set of key-value pairs: the subset of the standard Map that both Trie and SortedArray offer. */
export interface IMap<K, V> extends IMapSource<K, V>, IMapSink<K, V> {}

/**
 * Describes how a key breaks down into key units, the symbols a trie
 * branches on. Units need a total order; the trie keeps the children of
 * each node sorted with `compare` and finds them by binary search.
 */
export interface KeyUnits<K, U> {
  /** Returns the units of `key`, first unit first. */
  readonly split: (key: K) => ArrayLike<U>;
  /** Rebuilds a key from its units. */
  readonly join: (units: U[]) => K;
  /**
   * Provides a total order over units. Called without `this`.
   * @returns a negative value if a < b, 0 if a and b are the same unit and a positive value if a > b
   */
  readonly compare: (a: U, b: U) => number;
}
