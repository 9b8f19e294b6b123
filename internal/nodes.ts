import { check } from './assert';

type index = number;

/** Comparison of two key units; negative, zero or positive like Array.sort. */
export type UnitComparator<U> = (a: U, b: U) => number;

/** Box holding the value of a stored key. A node is a leaf iff it has one. */
export type Entry<V> = { value: V };

/** A vertex with an owned list of children: the root, or a node carrying a key unit. */
export type TrieParent<U, V> = TrieRoot<U, V> | TrieNode<U, V>;

/** Any vertex a cursor may point at. */
export type CursorTarget<U, V> = TrieNode<U, V> | TrieSentinel<U, V>;

/** Child list / base class. **************************************************/
export abstract class TrieBranch<U, V> {
  // Sorted ascending by unit. Siblings never share a unit.
  children: TrieNode<U, V>[] = [];

  // If unit not found, returns i^failXor where i is the insertion index.
  // Callers that don't care whether there was a match will set failXor=0.
  indexOf(unit: U, failXor: number, cmp: UnitComparator<U>): index {
    const children = this.children;
    var lo = 0, hi = children.length, mid = hi >> 1;
    while (lo < hi) {
      var c = cmp(children[mid].unit, unit);
      if (c < 0)
        lo = mid + 1;
      else if (c > 0) // unit < children[mid].unit
        hi = mid;
      else if (c === 0)
        return mid;
      else
        throw new Error("Trie: key units are not comparable: " + String(unit));
      mid = (lo + hi) >> 1;
    }
    return mid ^ failXor;
  }

  findChild(unit: U, cmp: UnitComparator<U>): TrieNode<U, V> | undefined {
    const i = this.indexOf(unit, -1, cmp);
    return i < 0 ? undefined : this.children[i];
  }

  /** Adds a child whose unit is not yet used by any sibling. */
  insertChild(child: TrieNode<U, V>, cmp: UnitComparator<U>): void {
    const i = this.indexOf(child.unit, -1, cmp);
    check(i < 0, "insertChild: unit already present:", child.unit);
    this.children.splice(~i, 0, child);
    child.parent = this.asParent();
  }

  /** Detaches a child and destroys its whole subtree. */
  removeChild(child: TrieNode<U, V>): void {
    const i = this.children.indexOf(child);
    check(i >= 0, "removeChild: node is not a child of this branch");
    this.children.splice(i, 1);
    child.destroy();
  }

  /**
   * Follows `units` downward one child at a time.
   * @returns the node reached, or undefined if some unit has no child.
   *   An empty sequence returns undefined as well, since it names no node.
   */
  walk(units: ArrayLike<U>, cmp: UnitComparator<U>): TrieNode<U, V> | undefined {
    let branch: TrieBranch<U, V> = this, node: TrieNode<U, V> | undefined;
    for (let i = 0; i < units.length; i++) {
      node = branch.findChild(units[i], cmp);
      if (node === undefined)
        return undefined;
      branch = node;
    }
    return node;
  }

  protected abstract asParent(): TrieParent<U, V>;
}

/** A vertex carrying one key unit. **********************************************/
export class TrieNode<U, V> extends TrieBranch<U, V> {
  readonly unit: U;
  entry: Entry<V> | undefined = undefined;
  // Undefined until the node is linked under a parent, and again once it is destroyed.
  parent: TrieParent<U, V> | undefined = undefined;
  // Bumped whenever the node stops being the target of cursors made earlier.
  generation = 0;

  constructor(unit: U) {
    super();
    this.unit = unit;
  }

  get isLeaf(): boolean { return this.entry !== undefined; }

  protected asParent(): TrieParent<U, V> { return this; }

  /** Drops the stored value; the node survives as a shared prefix. */
  unsetEntry(): Entry<V> | undefined {
    const entry = this.entry;
    this.entry = undefined;
    this.generation++;
    return entry;
  }

  /** The key units from the root down to this node. O(depth) */
  units(): U[] {
    const units: U[] = [];
    for (let node: TrieParent<U, V> | undefined = this; node instanceof TrieNode; node = node.parent)
      units.push(node.unit);
    return units.reverse();
  }

  /** Number of units in the key that ends here. O(depth) */
  depth(): number {
    let depth = 0;
    for (let node: TrieParent<U, V> | undefined = this; node instanceof TrieNode; node = node.parent)
      depth++;
    return depth;
  }

  /** The root this node hangs from, or undefined if it was destroyed. */
  root(): TrieRoot<U, V> | undefined {
    let node = this.parent;
    while (node instanceof TrieNode)
      node = node.parent;
    return node;
  }

  /** First leaf in key order within this subtree: this node if it is a leaf. */
  firstLeaf(): TrieNode<U, V> {
    let node: TrieNode<U, V> = this;
    while (!node.isLeaf) {
      check(node.children.length !== 0, "dead internal node under", node.unit);
      node = node.children[0];
    }
    return node;
  }

  /** Last leaf in key order within this subtree, found by following last children. */
  lastLeaf(): TrieNode<U, V> {
    let node: TrieNode<U, V> = this;
    while (node.children.length !== 0)
      node = node.children[node.children.length - 1];
    check(node.isLeaf, "childless internal node under", node.unit);
    return node;
  }

  /** Deep copy with fresh parent links; the copy's parent is unset. */
  clone(): TrieNode<U, V> {
    const copy = this.shallowClone();
    cloneChildren(this, copy);
    return copy;
  }

  shallowClone(): TrieNode<U, V> {
    const copy = new TrieNode<U, V>(this.unit);
    if (this.entry !== undefined)
      copy.entry = { value: this.entry.value };
    return copy;
  }

  /**
   * Tears down this subtree without recursion. Every node loses its entry
   * and parent link and gets a new generation, so outstanding cursors fail.
   */
  destroy(): void {
    const work: TrieNode<U, V>[] = [this];
    for (let node = work.pop(); node !== undefined; node = work.pop()) {
      for (const child of node.children)
        work.push(child);
      node.children = [];
      node.parent = undefined;
      node.entry = undefined;
      node.generation++;
    }
  }
}

/** Past-the-end marker: the logical last child of the root. *******************/
export class TrieSentinel<U, V> {
  readonly root: TrieRoot<U, V>;
  generation = 0;

  constructor(root: TrieRoot<U, V>) {
    this.root = root;
  }
}

/** The root: no unit, never a leaf, owns the sentinel. ***********************/
export class TrieRoot<U, V> extends TrieBranch<U, V> {
  // Key units have no maximum value in general, so rather than sitting in
  // `children` under a reserved unit, the sentinel always follows them.
  readonly sentinel: TrieSentinel<U, V>;

  constructor() {
    super();
    this.sentinel = new TrieSentinel<U, V>(this);
  }

  protected asParent(): TrieParent<U, V> { return this; }

  /** Destroys every stored key; the sentinel stays. */
  destroyChildren(): void {
    const children = this.children;
    this.children = [];
    for (const child of children)
      child.destroy();
  }

  /** Destroys the whole tree, sentinel included. */
  destroy(): void {
    this.destroyChildren();
    this.sentinel.generation++;
  }

  clone(): TrieRoot<U, V> {
    const copy = new TrieRoot<U, V>();
    cloneChildren(this, copy);
    return copy;
  }
}

/** Copies the subtrees below `from` into the empty `to`, using a worklist. */
function cloneChildren<U, V>(from: TrieParent<U, V>, to: TrieParent<U, V>): void {
  const work: [TrieParent<U, V>, TrieParent<U, V>][] = [[from, to]];
  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    const [source, target] = item;
    for (const child of source.children) {
      const copy = child.shallowClone();
      copy.parent = target;
      target.children.push(copy);
      work.push([child, copy]);
    }
  }
}
