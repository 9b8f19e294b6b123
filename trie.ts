import { IMap, KeyUnits } from './interfaces';
import { CursorTarget, TrieNode, TrieParent, TrieRoot } from './internal/nodes';
import { check } from './internal/assert';
import { TrieCursor, predecessor, successor } from './cursor';
import { DuplicateKeyError, EmptyKeyError, ForeignCursorError, OutOfRangeError } from './errors';

export { IMapSource, IMapSink, IMap, KeyUnits } from './interfaces';
export { TrieCursor } from './cursor';
export {
  TrieError, EmptyKeyError, DuplicateKeyError, EmptyAdvanceError, NoSuchPrefixError,
  OutOfRangeError, StaleCursorError, ForeignCursorError
} from './errors';

/**
 * Unit types that defaultComparator orders
 */
export type DefaultComparable = number | string | Date | boolean | bigint | null | undefined | DefaultComparable[] |
               { valueOf: () => number | string | Date | boolean | bigint | null | undefined };

/**
 * Compares DefaultComparables to form a total order.
 *
 * Values of different types are ordered by the name of their type, so
 * that units of mixed types can share one trie. Handles +/-0 and NaN like
 * Map: NaN is equal to NaN (and lower than every other number), and -0 is
 * equal to +0. Arrays compare element by element, shorter first on a tie.
 *
 * Two objects with equal valueOf compare the same, but compare unequal to
 * primitives that have the same value. Values with no order (symbols,
 * functions, objects whose valueOf is not a primitive) produce NaN, which
 * the trie rejects with an error.
 */
export function defaultComparator(a: unknown, b: unknown): number {
  // Special case numbers first for performance.
  if (typeof a === 'number' && typeof b === 'number')
    return compareNumbers(a, b);

  let ta: string = typeof a;
  let tb: string = typeof b;
  if (ta !== tb)
    return ta < tb ? -1 : 1;

  if (Array.isArray(a) && Array.isArray(b))
    return compareArrays(a, b);

  if (typeof a === 'object' && typeof b === 'object') {
    // standardized JavaScript bug: null is not an object, but typeof says it is
    if (a === null)
      return b === null ? 0 : -1;
    else if (b === null)
      return 1;

    a = a.valueOf();
    b = b.valueOf();
    ta = typeof a;
    tb = typeof b;
    // Deal with the two valueOf()s producing different types
    if (ta !== tb)
      return ta < tb ? -1 : 1;
    if (typeof a === 'number' && typeof b === 'number')
      return compareNumbers(a, b);
  }

  if (typeof a === 'string' && typeof b === 'string')
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'bigint' && typeof b === 'bigint')
    return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean')
    return Number(a) - Number(b);
  if (a === b)
    return 0;
  return Number.NaN;
}

function compareNumbers(a: number, b: number): number {
  if (Number.isFinite(a) && Number.isFinite(b))
    return a - b;
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  // Order NaN less than other numbers
  if (Number.isNaN(a))
    return Number.isNaN(b) ? 0 : -1;
  return 1;
}

function compareArrays(a: unknown[], b: unknown[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const c = defaultComparator(a[i], b[i]);
    if (c !== 0)
      return c;
  }
  return a.length - b.length;
}

/**
 * Compares items using the < and > operators. Faster than defaultComparator
 * for strings, but doesn't support mixed types: use it for units that are
 * all strings, all numbers (without NaN) or all Dates.
 */
export function simpleComparator<T extends string | number | Date>(a: T, b: T): number {
  return a > b ? 1 : a < b ? -1 : 0;
}

/**
 * String keys as sequences of UTF-16 code units. Keys then sort the same
 * way as with `<` on strings. This is what `Trie` uses by default.
 */
export const stringKeyUnits: KeyUnits<string, string> = {
  split: key => key,
  join: units => units.join(''),
  compare: simpleComparator,
};

/**
 * Keys that are arrays of units.
 * @param compare Orders the units; defaultComparator if not given.
 */
export function arrayKeyUnits<U>(compare: (a: U, b: U) => number = defaultComparator): KeyUnits<readonly U[], U> {
  return {
    split: key => key,
    join: units => units,
    compare,
  };
}

/** Unit type of the built-in key types: characters of a string, elements of an array. */
export type UnitOf<K> = K extends string ? string : K extends readonly (infer U)[] ? U : unknown;

/**
 * A prefix tree (trie) that maps keys to values, sorted by key.
 *
 * A key is a sequence of units, such as the characters of a string. Each
 * node of the tree holds one unit; a key is stored at the node reached by
 * following its units down from the root, so keys with a common prefix
 * share the nodes of that prefix. The children of a node are kept sorted
 * by unit and are found by binary search, which makes every traversal
 * come out in lexicographic order: a key comes right before the keys it
 * is a prefix of, e.g. "car" < "card" < "cat".
 *
 * Positions in the trie are `TrieCursor`s, modelled on bidirectional
 * iterators: `begin()` is the lowest key and `end()` is a position after
 * the highest one. `insert`, `find` and `erase` work with cursors; the
 * Map-like methods (`get`, `set`, `has`, `delete`, `entries`...) are
 * built on top of them.
 *
 * Out of the box, keys are strings split into UTF-16 code units. Other
 * key types need a `KeyUnits` codec, passed as the second argument to
 * the constructor (the first argument is an optional list of initial
 * pairs).
 *
 * @example
 * A trie keyed by arrays of numbers, such as IP address octets:
 *
 *     const routes = new Trie<readonly number[], string>(undefined, arrayKeyUnits<number>());
 *     routes.insert([10], "private");
 *     routes.insert([10, 8], "lab");
 *     routes.longestPrefixOf([10, 8, 0, 1]).value(); // "lab"
 *
 * Cost of the main operations, for keys of length L and at most c
 * children per node: insert/find/erase O(L · log c); moving a cursor
 * O(depth · log c); `cursor.key()` O(depth).
 */
export default class Trie<K = string, V = unknown, U = UnitOf<K>> implements IMap<K, V>
{
  private _root: TrieRoot<U, V>;
  private _size = 0;
  _units: KeyUnits<K, U>;

  /**
   * Initializes an empty trie.
   * @param entries Key-value pairs to insert. A repeated key throws DuplicateKeyError.
   * @param units How keys break down into units. If not specified,
   *   stringKeyUnits is used, which is valid as long as K is string.
   * @param root Used by clone() to adopt a copied tree. Must not belong
   *   to another trie.
   */
  public constructor(entries?: Iterable<readonly [K, V]>, units?: KeyUnits<K, U>, root?: TrieRoot<U, V>) {
    this._units = units || stringKeyUnits as unknown as KeyUnits<K, U>;
    this._root = root || new TrieRoot<U, V>();
    if (entries)
      for (const [key, value] of entries)
        this.insert(key, value);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Cursor-based API /////////////////////////////////////////////////////////

  /** Gets the number of keys stored in the trie. */
  get size(): number { return this._size; }
  /** Returns true iff the trie stores no keys. */
  get isEmpty(): boolean { return this._root.children.length === 0; }

  /** Cursor at the lowest key, or end() if the trie is empty. */
  begin(): TrieCursor<K, V, U> {
    return this._cursor(this._first());
  }

  /** Cursor at the position after the highest key. */
  end(): TrieCursor<K, V, U> {
    return this._cursor(this._root.sentinel);
  }

  /**
   * Stores a new key.
   *
   * Walks down the nodes of the longest stored prefix of `key`, then adds
   * one node per remaining unit. If every unit already has a node (because
   * `key` is a prefix of a stored key), that node simply becomes a leaf.
   * @returns a cursor at the new key.
   * @throws EmptyKeyError if `key` has no units.
   * @throws DuplicateKeyError if `key` is already stored; nothing changes.
   * @description Computational complexity: O(key length · log c)
   */
  insert(key: K, value: V): TrieCursor<K, V, U> {
    const units = this._units.split(key), cmp = this._units.compare;
    if (units.length === 0)
      throw new EmptyKeyError();

    let branch: TrieParent<U, V> = this._root, leaf: TrieNode<U, V> | undefined;
    let i = 0;
    for (; i < units.length; i++) {
      const child: TrieNode<U, V> | undefined = branch.findChild(units[i], cmp);
      if (child === undefined)
        break;
      branch = leaf = child;
    }

    if (i === units.length) {
      check(leaf !== undefined, "insert: no node for a non-empty key");
      if (leaf.isLeaf)
        throw new DuplicateKeyError(key);
    } else {
      for (; i < units.length; i++) {
        leaf = new TrieNode<U, V>(units[i]);
        branch.insertChild(leaf, cmp);
        branch = leaf;
      }
      check(leaf !== undefined, "insert: no node was created");
    }

    leaf.entry = { value };
    this._size++;
    return this._cursor(leaf);
  }

  /**
   * Removes the key under a cursor. If longer keys run through its node,
   * the node stays as part of their path; otherwise the node is removed
   * along with every ancestor that served no other key.
   * Cursors to the erased key become stale.
   * @throws OutOfRangeError for the end cursor.
   * @throws StaleCursorError if the key was already erased.
   * @throws ForeignCursorError if the cursor points into another trie.
   */
  erase(cursor: TrieCursor<K, V, U>): void {
    const target = cursor._target();
    if (!(target instanceof TrieNode))
      throw new OutOfRangeError("Trie: the end cursor cannot be erased");
    if (target.root() !== this._root)
      throw new ForeignCursorError();

    if (target.children.length !== 0) {
      target.unsetEntry();
    } else {
      let node = target, parent = target.parent;
      while (parent instanceof TrieNode && !parent.isLeaf && parent.children.length === 1) {
        node = parent;
        parent = node.parent;
      }
      check(parent !== undefined, "erase: node is detached");
      parent.removeChild(node);
    }
    this._size--;
  }

  /**
   * Finds a stored key.
   * @returns a cursor at `key`, or end() if it is not stored.
   * @description Computational complexity: O(key length · log c)
   */
  find(key: K): TrieCursor<K, V, U> {
    const node = this._findLeaf(key);
    return this._cursor(node || this._root.sentinel);
  }

  /**
   * Copies the value of a stored key into `out.value`.
   * @returns true if the key was found; if not, `out` is left untouched.
   */
  getValue(key: K, out: { value?: V }): boolean {
    const node = this._findLeaf(key);
    if (node === undefined || node.entry === undefined)
      return false;
    out.value = node.entry.value;
    return true;
  }

  /**
   * Returns a cursor at the longest stored key (the first one in key
   * order if several are equally long), or end() if the trie is empty.
   * Note that no query is involved; see longestPrefixOf for that.
   * @description Computational complexity: O(size · depth · log c)
   */
  findLongestPrefix(): TrieCursor<K, V, U> {
    const cmp = this._units.compare;
    let longest: CursorTarget<U, V> = this._root.sentinel, maxLength = 0;
    for (let node = this._first(); node instanceof TrieNode; node = successor(node, cmp)) {
      const length = node.depth();
      if (length > maxLength) {
        maxLength = length;
        longest = node;
      }
    }
    return this._cursor(longest);
  }

  /**
   * Returns a cursor at the longest stored key that is a prefix of
   * `query` (possibly `query` itself), or end() if there is none.
   * @description Computational complexity: O(query length · log c)
   */
  longestPrefixOf(query: K): TrieCursor<K, V, U> {
    const units = this._units.split(query), cmp = this._units.compare;
    let branch: TrieParent<U, V> = this._root, best: CursorTarget<U, V> = this._root.sentinel;
    for (let i = 0; i < units.length; i++) {
      const child: TrieNode<U, V> | undefined = branch.findChild(units[i], cmp);
      if (child === undefined)
        break;
      if (child.isLeaf)
        best = child;
      branch = child;
    }
    return this._cursor(best);
  }

  /** Removes every key. Cursors other than end() become stale. */
  clear(): void {
    this._root.destroyChildren();
    this._size = 0;
  }

  /** Returns a deep copy of the trie, sharing nothing but the unit codec and the values. */
  clone(): Trie<K, V, U> {
    const result = new Trie<K, V, U>(undefined, this._units, this._root.clone());
    result._size = this._size;
    return result;
  }

  /**
   * Replaces the contents of this trie with a copy of `other`. Cursors into
   * this trie become stale, end() included.
   */
  assign(other: Trie<K, V, U>): this {
    if (other !== this) {
      const copy = other.clone();
      this.swap(copy);
      copy._root.destroy();
    }
    return this;
  }

  /**
   * Exchanges the contents of two tries in O(1). Cursors keep pointing at
   * their keys, which now belong to the other trie.
   */
  swap(other: Trie<K, V, U>): void {
    const root = this._root, size = this._size, units = this._units;
    this._root = other._root;
    this._size = other._size;
    this._units = other._units;
    other._root = root;
    other._size = size;
    other._units = units;
  }

  /////////////////////////////////////////////////////////////////////////////
  // ES6 Map<K,V> methods /////////////////////////////////////////////////////

  /**
   * Finds a key and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   * @returns the value, or defaultValue if the key was not found.
   */
  get(key: K, defaultValue?: V): V | undefined {
    const node = this._findLeaf(key);
    return node === undefined || node.entry === undefined ? defaultValue : node.entry.value;
  }

  /** Returns true if the key is stored in the trie. */
  has(key: K): boolean {
    return this._findLeaf(key) !== undefined;
  }

  /**
   * Adds or overwrites a key-value pair.
   * @param overwrite Whether to overwrite the value of an existing key
   *        (default: true).
   * @returns true if a new key was added.
   * @throws EmptyKeyError if `key` has no units.
   */
  set(key: K, value: V, overwrite?: boolean): boolean {
    const node = this._findLeaf(key);
    if (node === undefined || node.entry === undefined) {
      this.insert(key, value);
      return true;
    }
    if (overwrite !== false)
      node.entry.value = value;
    return false;
  }

  /**
   * Removes a key.
   * @returns true if the key was found and removed, false otherwise.
   */
  delete(key: K): boolean {
    const node = this._findLeaf(key);
    if (node === undefined)
      return false;
    this.erase(this._cursor(node));
    return true;
  }

  /** Runs a function for each key-value pair, in order from lowest to
   *  highest key. For compatibility with ES6 Map, the argument order to
   *  the callback is backwards: value first, then key. */
  forEach(callback: (v: V, k: K, trie: Trie<K, V, U>) => void): number {
    return this.forEachPair((k, v) => { callback(v, k, this); });
  }

  /** Runs a function for each key-value pair, in order from lowest to
   *  highest key. The callback can return {break:R} (where R is any value
   *  except undefined) to stop immediately and return R from forEachPair.
   * @param initialCounter This is the value of the third argument of
   *        `onFound` the first time it is called. The counter increases
   *        by one each time `onFound` is called. Default value: 0
   * @returns the number of pairs sent to the callback (plus initialCounter,
   *        if you provided one). If the callback returned {break:R} then
   *        the R value is returned instead. */
  forEachPair<R = number>(callback: (k: K, v: V, counter: number) => { break?: R } | void, initialCounter?: number): R | number {
    const cmp = this._units.compare;
    let counter = initialCounter || 0;
    for (let node = this._first(); node instanceof TrieNode; node = successor(node, cmp)) {
      const result = callback(this._keyOf(node), this._valueOf(node), counter++);
      if (result && result.break !== undefined)
        return result.break;
    }
    return counter;
  }

  /** Returns an iterator that provides the pairs in ascending key order. */
  entries(): IterableIterator<[K, V]> {
    const cmp = this._units.compare;
    let node = this._first();
    return iterator<[K, V]>(() => {
      if (!(node instanceof TrieNode))
        return { done: true, value: undefined };
      const pair: [K, V] = [this._keyOf(node), this._valueOf(node)];
      node = successor(node, cmp);
      return { done: false, value: pair };
    });
  }

  /** Returns an iterator that provides the pairs in descending key order. */
  entriesReversed(): IterableIterator<[K, V]> {
    const cmp = this._units.compare;
    let node = predecessor(this._root.sentinel, cmp);
    return iterator<[K, V]>(() => {
      if (node === undefined)
        return { done: true, value: undefined };
      const pair: [K, V] = [this._keyOf(node), this._valueOf(node)];
      node = predecessor(node, cmp);
      return { done: false, value: pair };
    });
  }

  /**
   * Returns an iterator over the pairs whose key starts with `prefix`
   * (including `prefix` itself), in ascending key order.
   * @description Complexity: O(prefix length · log c) to start, then
   *   the same as entries() per pair.
   */
  entriesWithPrefix(prefix: K): IterableIterator<[K, V]> {
    const units = this._units.split(prefix), cmp = this._units.compare;
    if (units.length === 0)
      return this.entries();
    const top = this._root.walk(units, cmp);
    if (top === undefined)
      return iterator<[K, V]>();

    let node: CursorTarget<U, V> = top.firstLeaf();
    const stop = successor(top.lastLeaf(), cmp);
    return iterator<[K, V]>(() => {
      if (node === stop || !(node instanceof TrieNode))
        return { done: true, value: undefined };
      const pair: [K, V] = [this._keyOf(node), this._valueOf(node)];
      node = successor(node, cmp);
      return { done: false, value: pair };
    });
  }

  /** Returns a new iterator for iterating the keys in ascending order. */
  keys(): IterableIterator<K> {
    const it = this.entries();
    return iterator<K>(() => {
      const n = it.next();
      return n.done ? n : { done: false, value: n.value[0] };
    });
  }

  /** Returns a new iterator for iterating the values in order by key. */
  values(): IterableIterator<V> {
    const it = this.entries();
    return iterator<V>(() => {
      const n = it.next();
      return n.done ? n : { done: false, value: n.value[1] };
    });
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /////////////////////////////////////////////////////////////////////////////
  // Additional methods ///////////////////////////////////////////////////////

  /** Gets the lowest key in the trie. Complexity: O(depth) */
  minKey(): K | undefined {
    const node = this._first();
    return node instanceof TrieNode ? this._keyOf(node) : undefined;
  }

  /** Gets the highest key in the trie. Complexity: O(depth) */
  maxKey(): K | undefined {
    const node = predecessor(this._root.sentinel, this._units.compare);
    return node === undefined ? undefined : this._keyOf(node);
  }

  /** Gets an array filled with the contents of the trie, sorted by key */
  toArray(maxLength: number = 0x7FFFFFFF): [K, V][] {
    const results: [K, V][] = [];
    this.forEachPair((k, v) => {
      if (results.length >= maxLength)
        return Break;
      results.push([k, v]);
    });
    return results;
  }

  /** Gets an array of all keys, sorted */
  keysArray(): K[] {
    const results: K[] = [];
    this.forEachPair(k => { results.push(k); });
    return results;
  }

  /** Gets an array of all values, sorted by key */
  valuesArray(): V[] {
    const results: V[] = [];
    this.forEachPair((k, v) => { results.push(v); });
    return results;
  }

  /** Gets a string representing the trie's data based on toArray(). */
  toString(): string {
    return this.toArray().toString();
  }

  /** Scans the trie for signs of serious bugs (children out of order, a
   *  broken parent link, an internal node serving no key, this.size not
   *  matching the number of stored keys...) and throws if it finds one.
   *  Computational complexity: O(number of nodes) */
  checkValid(): void {
    const cmp = this._units.compare, root = this._root;
    check(root.sentinel.root === root, "sentinel belongs to another root");
    let leaves = 0;
    const work: TrieParent<U, V>[] = [root];
    for (let branch = work.pop(); branch !== undefined; branch = work.pop()) {
      const children = branch.children;
      for (let i = 0; i < children.length; i++) {
        const child = children[i];
        check(child.parent === branch, "broken parent link at unit", child.unit);
        if (i > 0)
          check(cmp(children[i - 1].unit, child.unit) < 0, "children out of order:", children[i - 1].unit, child.unit);
        check(child.isLeaf || child.children.length !== 0, "internal node with no children at unit", child.unit);
        if (child.isLeaf)
          leaves++;
        work.push(child);
      }
    }
    check(leaves === this._size, "size mismatch: counted", leaves, "but stored", this._size);
  }

  /////////////////////////////////////////////////////////////////////////////
  // Internal methods /////////////////////////////////////////////////////////

  private _cursor(node: CursorTarget<U, V>): TrieCursor<K, V, U> {
    return new TrieCursor<K, V, U>(node, this._units);
  }

  private _first(): CursorTarget<U, V> {
    const children = this._root.children;
    return children.length === 0 ? this._root.sentinel : children[0].firstLeaf();
  }

  private _findLeaf(key: K): TrieNode<U, V> | undefined {
    const node = this._root.walk(this._units.split(key), this._units.compare);
    return node !== undefined && node.isLeaf ? node : undefined;
  }

  private _keyOf(node: TrieNode<U, V>): K {
    return this._units.join(node.units());
  }

  private _valueOf(node: TrieNode<U, V>): V {
    check(node.entry !== undefined, "internal node has no value");
    return node.entry.value;
  }
}

function iterator<T>(next: () => IteratorResult<T> = (() => ({ done: true, value: undefined }))): IterableIterator<T> {
  return {
    next,
    [Symbol.iterator](): IterableIterator<T> { return this; }
  };
}

const Break = { break: true };
