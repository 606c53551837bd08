import type { ConstDFA } from '../automata/dfa.js';
import { log } from '../utils/debug.js';
import { Equation } from './equation.js';
import { EquationSystemStateError } from './errors.js';

/**
 * A system of regular language equations, one per DFA state, solved for
 * the start state by eliminating unknowns from the highest index down.
 */
export class EquationSystem {
  private readonly equations: Equation[];
  private solved = false;

  constructor(equations: Equation[]) {
    equations.forEach((eq, i) => {
      if (eq.id != i) {
        throw new EquationSystemStateError(
          `equation ${eq.id} is at index ${i}`
        );
      }
    });
    this.equations = equations;
  }

  /**
   * Create the equation system for a DFA, with state 0 as the start state.
   *
   * @param alphabet the symbols to write for each column of the transition
   *   table, defaults to the DFA's own alphabet
   */
  static fromDFA(dfa: ConstDFA, alphabet?: string): EquationSystem {
    const equations: Equation[] = [];
    for (let si = 0; si < dfa.numStates; si++) {
      equations.push(Equation.fromState(dfa, si, alphabet));
    }
    return new EquationSystem(equations);
  }

  get size() {
    return this.equations.length;
  }

  /**
   * Solve the system for unknown 0.
   *
   * This consumes the equations, so it can only be called once.
   * @returns a regular expression for the language of the start state
   */
  solve(): string {
    if (this.solved) {
      throw new EquationSystemStateError('EquationSystem was already solved');
    }
    if (this.equations.length == 0) {
      throw new EquationSystemStateError('EquationSystem has no equations');
    }
    this.solved = true;

    for (
      let eliminate = this.equations.length - 1;
      eliminate >= 0;
      eliminate--
    ) {
      // equations may already reference themselves before their own turn,
      // so every remaining equation gets Arden's lemma, this one included
      for (let i = 0; i <= eliminate; i++) {
        this.equations[i].applyArdensLemma();
      }

      const value = this.equations[eliminate];
      for (let i = 0; i < eliminate; i++) {
        this.equations[i].substitute(value);
      }
      for (let i = 0; i < eliminate; i++) {
        this.equations[i].mergeTerms();
      }
      log(`eliminated X${eliminate}:\n` + this.toDebugStr(eliminate));
    }

    this.equations[0].mergeTerms();
    return this.equations[0].toExpression();
  }

  toDebugStr(upTo = this.equations.length - 1) {
    return this.equations
      .slice(0, upTo + 1)
      .map((eq) => eq.toString())
      .join('\n');
  }
}
