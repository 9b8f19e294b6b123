import Trie, {
  DuplicateKeyError, EmptyAdvanceError, NoSuchPrefixError, OutOfRangeError, StaleCursorError
} from '../trie';
import { keysBackward, keysForward } from './shared';

function catCarCard() {
  return new Trie<string, number>([['cat', 1], ['car', 2], ['card', 3]]);
}

describe('cursor navigation', () => {
  test('moveNext visits keys in ascending order and stops at end()', () => {
    const trie = catCarCard();
    const c = trie.begin();
    expect(c.key()).toBe('car');
    expect(c.moveNext().key()).toBe('card');
    expect(c.moveNext().key()).toBe('cat');
    expect(c.moveNext().isEnd).toBe(true);
    expect(c.equals(trie.end())).toBe(true);
  });

  test('movePrev from end() visits keys in descending order', () => {
    const trie = catCarCard();
    expect(keysBackward(trie)).toEqual(['cat', 'card', 'car']);
    const c = trie.end();
    expect(c.movePrev().key()).toBe('cat');
  });

  test('moving past either end throws', () => {
    const trie = catCarCard();
    expect(() => trie.end().moveNext()).toThrow(OutOfRangeError);
    expect(() => trie.end().moveNext()).toThrow('Trie: the end cursor cannot be incremented');
    expect(() => trie.begin().movePrev()).toThrow('Trie: the first cursor cannot be decremented');
  });

  test('an empty trie has nowhere to go', () => {
    const trie = new Trie<string, number>();
    expect(trie.begin().isEnd).toBe(true);
    expect(() => trie.end().movePrev()).toThrow(OutOfRangeError);
    expect(() => trie.end().moveNext()).toThrow(OutOfRangeError);
  });

  test('moveNext then movePrev returns to the same key', () => {
    const trie = new Trie<string, number>();
    for (const key of ['a', 'ab', 'abc', 'abd', 'b', 'ba', 'bz', 'c'])
      trie.insert(key, key.length);
    for (const c = trie.begin(); !c.isEnd; c.moveNext()) {
      const other = c.clone().moveNext().movePrev();
      expect(other.equals(c)).toBe(true);
    }
    const last = trie.end().movePrev();
    expect(last.key()).toBe('c');
    expect(last.clone().moveNext().isEnd).toBe(true);
  });

  test('forward and backward walks agree', () => {
    const trie = new Trie<string, number>();
    for (const key of ['b', 'abc', 'a', 'abd', 'ba', 'bz', 'ab', 'c'])
      trie.insert(key, 0);
    const forward = keysForward(trie);
    expect(forward).toEqual(['a', 'ab', 'abc', 'abd', 'b', 'ba', 'bz', 'c']);
    expect(keysBackward(trie)).toEqual(forward.reverse());
  });

  test('a single key', () => {
    const trie = new Trie<string, number>([['solo', 1]]);
    const c = trie.begin();
    expect(c.key()).toBe('solo');
    expect(c.moveNext().isEnd).toBe(true);
    expect(c.movePrev().key()).toBe('solo');
  });
});

describe('cursor access', () => {
  test('key, value and pair', () => {
    const trie = catCarCard();
    const c = trie.find('card');
    expect(c.key()).toBe('card');
    expect(c.value()).toBe(3);
    expect(c.pair()).toEqual(['card', 3]);
  });

  test('setValue replaces the value only', () => {
    const trie = catCarCard();
    trie.find('card').setValue(30);
    expect(trie.get('card')).toBe(30);
    expect(trie.keysArray()).toEqual(['car', 'card', 'cat']);
  });

  test('the end cursor has no key or value', () => {
    const trie = catCarCard();
    const end = trie.end();
    expect(end.isEnd).toBe(true);
    expect(() => end.key()).toThrow('Trie: the end cursor has no key');
    expect(() => end.value()).toThrow('Trie: the end cursor has no value');
    expect(() => end.setValue(5)).toThrow(OutOfRangeError);
  });

  test('clone moves independently', () => {
    const trie = catCarCard();
    const a = trie.begin();
    const b = a.clone();
    a.moveNext();
    expect(a.key()).toBe('card');
    expect(b.key()).toBe('car');
    expect(a.equals(b)).toBe(false);
  });

  test('toString', () => {
    const trie = catCarCard();
    const c = trie.find('car');
    expect(c.toString()).toBe('TrieCursor(car)');
    expect(trie.end().toString()).toBe('TrieCursor(end)');
    trie.erase(c);
    expect(c.toString()).toBe('TrieCursor(stale)');
  });
});

describe('cursor advance', () => {
  function abAbcd() {
    return new Trie<string, number>([['ab', 1], ['abcd', 2]]);
  }

  test('moves the entry to a longer key on an existing path', () => {
    const trie = abAbcd();
    const old = trie.find('ab');
    const c = old.clone();
    expect(c.advance('c')).toBe(c);
    expect(c.key()).toBe('abc');
    expect(c.value()).toBe(1);
    expect(trie.keysArray()).toEqual(['abc', 'abcd']);
    expect(trie.size).toBe(2);
    expect(() => old.key()).toThrow(StaleCursorError);
    expect(trie.has('ab')).toBe(false);
    trie.checkValid();
  });

  test('can go several units at once', () => {
    const trie = new Trie<string, number>([['a', 1], ['abcde', 2]]);
    const c = trie.find('a').advance('bcd');
    expect(c.key()).toBe('abcd');
    expect(trie.toArray()).toEqual([['abcd', 1], ['abcde', 2]]);
    trie.checkValid();
  });

  test('an empty sub-key is rejected', () => {
    const trie = abAbcd();
    const c = trie.find('ab');
    expect(() => c.advance('')).toThrow(EmptyAdvanceError);
    expect(c.key()).toBe('ab');
  });

  test('a missing path is rejected', () => {
    const trie = abAbcd();
    const c = trie.find('ab');
    expect(() => c.advance('x')).toThrow(NoSuchPrefixError);
    expect(() => c.advance('cde')).toThrow(NoSuchPrefixError);
    expect(c.key()).toBe('ab');
    expect(trie.keysArray()).toEqual(['ab', 'abcd']);
  });

  test('the end cursor cannot advance', () => {
    const trie = abAbcd();
    expect(() => trie.end().advance('a')).toThrow(NoSuchPrefixError);
  });

  test('advancing onto a stored key is rejected', () => {
    const trie = abAbcd();
    const c = trie.find('ab');
    expect(() => c.advance('cd')).toThrow(DuplicateKeyError);
    expect(() => c.advance('cd')).toThrow('Trie: key already exists: abcd');
    expect(c.value()).toBe(1);
    expect(trie.toArray()).toEqual([['ab', 1], ['abcd', 2]]);
    trie.checkValid();
  });

  test('NoSuchPrefixError carries the sub-key', () => {
    const trie = abAbcd();
    let caught: unknown;
    try {
      trie.find('ab').advance('zz');
    } catch (e) {
      caught = e;
    }
    expect(caught instanceof NoSuchPrefixError && caught.subKey).toBe('zz');
  });
});

describe('cursor descend', () => {
  test('finds a longer stored key without changing anything', () => {
    const trie = new Trie<string, number>([['ab', 1], ['abcd', 2]]);
    const c = trie.find('ab');
    const d = c.descend('cd');
    expect(d.key()).toBe('abcd');
    expect(c.key()).toBe('ab');
    expect(trie.size).toBe(2);
  });

  test('returns end() when the longer key is not stored', () => {
    const trie = new Trie<string, number>([['ab', 1], ['abcd', 2]]);
    const c = trie.find('ab');
    expect(c.descend('c').equals(trie.end())).toBe(true);
    expect(c.descend('x').equals(trie.end())).toBe(true);
    expect(trie.end().descend('a').isEnd).toBe(true);
    expect(() => c.descend('')).toThrow(EmptyAdvanceError);
  });
});

describe('stale cursors', () => {
  test('a cursor to an erased key is stale, others survive', () => {
    const trie = catCarCard();
    const car = trie.find('car'), card = trie.find('card'), end = trie.end();
    trie.erase(trie.find('car'));
    expect(() => car.value()).toThrow(StaleCursorError);
    expect(() => car.moveNext()).toThrow(StaleCursorError);
    expect(card.value()).toBe(3);
    expect(end.isEnd).toBe(true);
  });

  test('a cursor above an erased key keeps working', () => {
    const trie = catCarCard();
    const car = trie.find('car');
    trie.delete('card');
    expect(car.value()).toBe(2);
    expect(car.moveNext().key()).toBe('cat');
  });

  test('a re-inserted key does not revive old cursors', () => {
    const trie = catCarCard();
    const cat = trie.find('cat');
    trie.delete('cat');
    trie.insert('cat', 9);
    expect(() => cat.key()).toThrow(StaleCursorError);
    expect(trie.find('cat').value()).toBe(9);
  });

  test('a key promoted after being erased in place does not revive old cursors', () => {
    const trie = catCarCard();
    const car = trie.find('car');
    trie.delete('car');
    trie.insert('car', 20);
    expect(() => car.key()).toThrow(StaleCursorError);
    expect(trie.find('car').value()).toBe(20);
  });
});
