import { KeyUnits } from './interfaces';
import { CursorTarget, TrieNode, TrieSentinel, UnitComparator } from './internal/nodes';
import { check } from './internal/assert';
import {
  DuplicateKeyError, EmptyAdvanceError, NoSuchPrefixError, OutOfRangeError, StaleCursorError
} from './errors';

/**
 * Returns the leaf that follows `node` in ascending key order, or the
 * sentinel if `node` holds the highest key. Complexity: O(depth · log c)
 */
export function successor<U, V>(node: TrieNode<U, V>, cmp: UnitComparator<U>): CursorTarget<U, V> {
  // A key sorts before every longer key that it is a prefix of
  if (node.children.length !== 0)
    return node.children[0].firstLeaf();

  for (let current = node;;) {
    const parent = current.parent;
    check(parent !== undefined, "successor: node was destroyed");
    const i = parent.indexOf(current.unit, 0, cmp);
    if (i + 1 < parent.children.length)
      return parent.children[i + 1].firstLeaf();
    if (!(parent instanceof TrieNode))
      return parent.sentinel;
    current = parent;
  }
}

/**
 * Returns the leaf that precedes `target` in ascending key order, or
 * undefined if `target` is the first leaf (or the sentinel of an empty trie).
 */
export function predecessor<U, V>(target: CursorTarget<U, V>, cmp: UnitComparator<U>): TrieNode<U, V> | undefined {
  if (target instanceof TrieSentinel) {
    const children = target.root.children;
    return children.length === 0 ? undefined : children[children.length - 1].lastLeaf();
  }

  for (let current = target;;) {
    const parent = current.parent;
    check(parent !== undefined, "predecessor: node was destroyed");
    const i = parent.indexOf(current.unit, 0, cmp);
    if (i > 0)
      return parent.children[i - 1].lastLeaf();
    if (!(parent instanceof TrieNode))
      return undefined;
    if (parent.isLeaf)
      return parent;
    current = parent;
  }
}

/**
 * A position in a Trie: one stored key, or the end of the trie.
 *
 * Cursors do not own anything. Once the key a cursor points at is erased
 * (or relabelled by another cursor's `advance`), or the trie is cleared,
 * every method of the cursor except `equals` throws `StaleCursorError`.
 * The end cursor survives `clear()` and `erase()`.
 *
 * Moving a cursor (`moveNext`, `movePrev`, `advance`) changes the cursor
 * itself; use `clone()` first to keep the old position.
 */
export class TrieCursor<K, V, U>
{
  private _node: CursorTarget<U, V>;
  private _generation: number;
  private readonly _units: KeyUnits<K, U>;

  constructor(node: CursorTarget<U, V>, units: KeyUnits<K, U>) {
    this._node = node;
    this._generation = node.generation;
    this._units = units;
  }

  /** @internal Node under the cursor; throws StaleCursorError if that entry is gone. */
  _target(): CursorTarget<U, V> {
    if (this._node.generation !== this._generation)
      throw new StaleCursorError();
    return this._node;
  }

  private _entryNode(what: string): TrieNode<U, V> {
    const node = this._target();
    if (!(node instanceof TrieNode))
      throw new OutOfRangeError("Trie: the end cursor has no " + what);
    return node;
  }

  private _moveTo(node: CursorTarget<U, V>): void {
    this._node = node;
    this._generation = node.generation;
  }

  /** True if this is the end cursor (the position after the highest key). */
  get isEnd(): boolean {
    return this._target() instanceof TrieSentinel;
  }

  /** Rebuilds the stored key by walking up to the root. Complexity: O(depth) */
  key(): K {
    return this._units.join(this._entryNode("key").units());
  }

  /** Gets the value stored under the key. */
  value(): V {
    const entry = this._entryNode("value").entry;
    check(entry !== undefined, "cursor points at an internal node");
    return entry.value;
  }

  /** Replaces the value stored under the key. The key itself is unchanged. */
  setValue(value: V): void {
    const entry = this._entryNode("value").entry;
    check(entry !== undefined, "cursor points at an internal node");
    entry.value = value;
  }

  /** Gets the key and value as a pair. */
  pair(): [K, V] {
    return [this.key(), this.value()];
  }

  /**
   * Moves the entry under this cursor to the longer key `key() + subKey`
   * and moves the cursor with it. Nodes are never created: the path for
   * `subKey` must already exist below the cursor, because some other
   * stored key runs through it. The old key stops being stored (cursors
   * to it become stale) while its value now belongs to the new key, so
   * `size` is unchanged.
   *
   * This is a relabelling, not a read-only move. Use `descend` to look
   * at a longer key without changing the trie.
   *
   * @throws EmptyAdvanceError if `subKey` has no units.
   * @throws NoSuchPrefixError if the path does not exist (the end cursor
   *   has no path below it).
   * @throws DuplicateKeyError if the longer key is already stored.
   * Nothing changes when any of these is thrown.
   */
  advance(subKey: K): this {
    const units = this._units.split(subKey);
    if (units.length === 0)
      throw new EmptyAdvanceError();
    const from = this._target();
    if (!(from instanceof TrieNode))
      throw new NoSuchPrefixError(subKey);
    const to = from.walk(units, this._units.compare);
    if (to === undefined)
      throw new NoSuchPrefixError(subKey);
    if (to.isLeaf)
      throw new DuplicateKeyError(this._units.join(to.units()));

    to.entry = from.unsetEntry();
    this._moveTo(to);
    return this;
  }

  /**
   * Returns a new cursor at the stored key `key() + subKey`, or the end
   * cursor if that key is not stored. Read-only counterpart of `advance`.
   * @throws EmptyAdvanceError if `subKey` has no units.
   */
  descend(subKey: K): TrieCursor<K, V, U> {
    const units = this._units.split(subKey);
    if (units.length === 0)
      throw new EmptyAdvanceError();
    const from = this._target();
    if (!(from instanceof TrieNode))
      return new TrieCursor<K, V, U>(from, this._units);
    const to = from.walk(units, this._units.compare);
    if (to !== undefined && to.isLeaf)
      return new TrieCursor<K, V, U>(to, this._units);
    const root = from.root();
    check(root !== undefined, "descend: node was destroyed");
    return new TrieCursor<K, V, U>(root.sentinel, this._units);
  }

  /**
   * Moves to the next key in ascending order, or to the end.
   * @throws OutOfRangeError if this is already the end cursor.
   */
  moveNext(): this {
    const node = this._target();
    if (!(node instanceof TrieNode))
      throw new OutOfRangeError("Trie: the end cursor cannot be incremented");
    this._moveTo(successor(node, this._units.compare));
    return this;
  }

  /**
   * Moves to the previous key in ascending order. From the end cursor
   * this is the highest key.
   * @throws OutOfRangeError if the cursor is at the first key (or the trie is empty).
   */
  movePrev(): this {
    const prev = predecessor(this._target(), this._units.compare);
    if (prev === undefined)
      throw new OutOfRangeError("Trie: the first cursor cannot be decremented");
    this._moveTo(prev);
    return this;
  }

  /** Returns true if both cursors point at the same node. */
  equals(other: TrieCursor<K, V, U>): boolean {
    return this._node === other._node;
  }

  /** Returns an independent cursor at the same position. */
  clone(): TrieCursor<K, V, U> {
    const copy = new TrieCursor<K, V, U>(this._node, this._units);
    copy._generation = this._generation;
    return copy;
  }

  toString(): string {
    if (this._node.generation !== this._generation)
      return "TrieCursor(stale)";
    return this._node instanceof TrieSentinel ? "TrieCursor(end)" : "TrieCursor(" + String(this.key()) + ")";
  }
}
