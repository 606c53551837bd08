/**
 * Index of an unknown in an equation system. Unknown i stands for the
 * language accepted from DFA state i; unknown 0 is the one being solved for.
 */
export type UnknownId = number;

/**
 * One alternative on the right hand side of an equation: a regex prefix,
 * optionally followed by an unknown.
 *
 * The prefix is always a complete fragment that can be concatenated with
 * anything without extra grouping. A term without a reference ends the
 * input, and the empty term without a reference accepts without consuming
 * anything.
 */
export class Term {
  readonly prefix: string;
  readonly reference: UnknownId | null;

  constructor(prefix: string, reference: UnknownId | null) {
    this.prefix = prefix;
    this.reference = reference;
  }

  /**
   * The term for "accept here"
   */
  static accepting(): Term {
    return new Term('', null);
  }

  /**
   * The term for a transition on `symbol` to `successor`
   */
  static transition(symbol: string, successor: UnknownId): Term {
    return new Term(symbol, successor);
  }

  /**
   * A copy of this term with `prefix` concatenated in front of its own prefix.
   */
  prepend(prefix: string): Term {
    return new Term(prefix + this.prefix, this.reference);
  }

  toString() {
    return `[${this.reference ?? '-'}] ${this.prefix}`;
  }
}
