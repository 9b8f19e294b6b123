export function check(fact: boolean, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift('Trie'); // at beginning of message
    throw new Error(args.join(' '));
  }
}
