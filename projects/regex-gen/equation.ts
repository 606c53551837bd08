import type { ConstDFA } from '../automata/dfa.js';
import { AlphabetError } from '../automata/errors.js';
import { EliminationError, EquationPhaseError } from './errors.js';
import { atom } from './syntax.js';
import { Term, type UnknownId } from './term.js';

/**
 * A regular language equation X_id = t_1 | t_2 | ... | t_n.
 *
 * Between calls there is at most one term per referenced unknown, plus at
 * most one term without a reference. {@link Equation.substitute} breaks
 * that, and until {@link Equation.mergeTerms} restores it the equation is
 * "pending merge" and refuses every other operation.
 */
export class Equation {
  readonly id: UnknownId;
  private terms: Term[];
  private pendingMerge = false;

  constructor(id: UnknownId, terms: Iterable<Term>) {
    this.id = id;
    this.terms = [...terms];
    this.mergeTerms();
  }

  /**
   * Create the equation for a DFA state from its transitions.
   *
   * @param alphabet one character per column of the transition table
   */
  static fromState(
    dfa: ConstDFA,
    state: number,
    alphabet: string = dfa.getAlphabet()
  ): Equation {
    if (alphabet.length != dfa.getAlphabet().length) {
      throw new AlphabetError(
        alphabet,
        `expected ${dfa.getAlphabet().length} symbols to match the transition table`
      );
    }
    const terms: Term[] = [];
    for (let ai = 0; ai < alphabet.length; ai++) {
      const target = dfa.getNextState(state, ai);
      if (target !== null) {
        terms.push(Term.transition(alphabet[ai], target));
      }
    }
    if (dfa.isAcceptingState(state)) {
      terms.push(Term.accepting());
    }
    return new Equation(state, terms);
  }

  get isPendingMerge() {
    return this.pendingMerge;
  }

  getTerms(): readonly Term[] {
    return this.terms;
  }

  /**
   * Get the term that references the given unknown (or null for the
   * accepting term)
   */
  getTerm(reference: UnknownId | null): Term | undefined {
    this.assertMerged('getTerm');
    return this.terms.find((t) => t.reference === reference);
  }

  /**
   * Arden's Lemma: for languages A, B where A does not contain the empty
   * word, X = AX | B has the unique solution X = A*B.
   *
   * Does nothing if the equation doesn't reference itself.
   * @returns whether the equation changed
   */
  applyArdensLemma(): boolean {
    this.assertMerged('applyArdensLemma');
    const recursive = this.getTerm(this.id);
    if (!recursive) {
      return false;
    }

    const star = atom(recursive.prefix) + '*';
    this.terms = this.terms
      .filter((t) => t.reference !== this.id)
      .map((t) => t.prepend(star));
    return true;
  }

  /**
   * Replace the unknown of `other` in this equation with the right hand side
   * of `other`, distributing the prefix over its terms.
   *
   * Leaves the equation pending merge if anything was substituted.
   * @returns whether the equation changed
   */
  substitute(other: Equation): boolean {
    this.assertMerged('substitute');
    other.assertMerged('substitute');
    const target = this.getTerm(other.id);
    if (!target) {
      return false;
    }

    this.terms = [
      ...this.terms.filter((t) => t.reference !== other.id),
      ...other.terms.map((t) => t.prepend(target.prefix)),
    ];
    this.pendingMerge = true;
    return true;
  }

  /**
   * Combine all terms with the same reference into a single term.
   *
   * Single characters are combined into a class `[abc]`, anything else into a
   * group `(ab|c)`.
   */
  mergeTerms() {
    const groups = new Map<UnknownId | null, Set<string>>();
    for (const term of this.terms) {
      let prefixes = groups.get(term.reference);
      if (!prefixes) {
        prefixes = new Set();
        groups.set(term.reference, prefixes);
      }
      prefixes.add(term.prefix);
    }

    this.terms = [];
    for (const [reference, prefixSet] of groups) {
      const prefixes = [...prefixSet];
      let combined: string;
      if (prefixes.length == 1) {
        combined = prefixes[0];
      } else if (prefixes.every((p) => p.length == 1)) {
        combined = `[${prefixes.join('')}]`;
      } else {
        combined = `(${prefixes.join('|')})`;
      }
      this.terms.push(new Term(combined, reference));
    }
    this.pendingMerge = false;
  }

  /**
   * The solution of a fully eliminated equation.
   */
  toExpression(): string {
    this.assertMerged('toExpression');
    const [only] = this.terms;
    if (this.terms.length != 1 || only.reference !== null) {
      throw new EliminationError(
        this.id,
        this.terms.map((t) => t.reference)
      );
    }
    return only.prefix;
  }

  toString() {
    return `EQ ${this.id}: ${this.terms.map(String).join('\n  ')}`;
  }

  private assertMerged(operation: string) {
    if (this.pendingMerge) {
      throw new EquationPhaseError(this.id, operation);
    }
  }
}
