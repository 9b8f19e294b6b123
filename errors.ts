/** Base class of every error the trie throws on purpose. */
export class TrieError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** `insert` was called with a key that has no units. */
export class EmptyKeyError extends TrieError {
  constructor() {
    super("Trie: an empty key cannot be inserted");
  }
}

/** `insert` (or a cursor's `advance`) would create a key that is already stored. */
export class DuplicateKeyError<K = unknown> extends TrieError {
  readonly key: K;

  constructor(key: K) {
    super("Trie: key already exists: " + String(key));
    this.key = key;
  }
}

/** A cursor was asked to `advance` by an empty sub-key. */
export class EmptyAdvanceError extends TrieError {
  constructor() {
    super("Trie: cannot advance by an empty sub-key");
  }
}

/** A cursor was asked to `advance` along a path that does not exist below it. */
export class NoSuchPrefixError<K = unknown> extends TrieError {
  readonly subKey: K;

  constructor(subKey: K) {
    super("Trie: no such prefix below the cursor: " + String(subKey));
    this.subKey = subKey;
  }
}

/** A cursor moved past either end, or the end cursor was used as an entry. */
export class OutOfRangeError extends TrieError {}

/** A cursor refers to an entry that has since been erased or relabelled. */
export class StaleCursorError extends TrieError {
  constructor() {
    super("Trie: cursor refers to an entry that no longer exists");
  }
}

/** A cursor was handed to a trie it does not point into. */
export class ForeignCursorError extends TrieError {
  constructor() {
    super("Trie: cursor belongs to a different trie");
  }
}
