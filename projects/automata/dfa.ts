import { Table } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import { RESERVED_CHARS } from '../regex-gen/syntax.js';
import { AlphabetError, DFAError } from './errors.js';

export interface ConstDFA extends IHaveDebugStr {
  /**
   * Get the number of states
   */
  readonly numStates: number;

  /**
   * Returns the alphabet of this DFA. Each character is one column of the
   * transition table, in order.
   */
  getAlphabet(): string;

  /**
   * Get the column of the given symbol, or -1 if it isn't in the alphabet.
   */
  getAlphabetIndex(symbol: string): number;

  /**
   * Get the state you get to from `state` via the alphabet item at
   * `alphaIndex`, or null if there is no such transition
   */
  getNextState(state: number, alphaIndex: number): number | null;

  hasTransition(state: number, alphaIndex: number): boolean;

  isAcceptingState(state: number): boolean;

  /**
   * Whether every state has a transition for every symbol of the alphabet
   */
  isComplete(): boolean;

  /**
   * Run the automaton from the start state over the whole input.
   */
  accepts(input: string): boolean;
}

/**
 * Check that every character of the alphabet can be written into an
 * expression as a plain literal.
 */
export function validateAlphabet(alphabet: string) {
  if (alphabet.length == 0) {
    throw new AlphabetError(alphabet, 'the alphabet is empty');
  }
  const seen = new Set<string>();
  for (const symbol of alphabet) {
    if (RESERVED_CHARS.includes(symbol)) {
      throw new AlphabetError(alphabet, `"${symbol}" is a reserved character`);
    }
    if (seen.has(symbol)) {
      throw new AlphabetError(alphabet, `"${symbol}" appears more than once`);
    }
    seen.add(symbol);
  }
}

/**
 * A deterministic finite automaton over a fixed alphabet. State 0 is always
 * the start state.
 */
export class DFA implements ConstDFA {
  static readonly START_STATE = 0;

  private readonly alphabet: string;
  private readonly accepting: boolean[] = [];

  // Each row of the table is a state, and each column
  // is the state you get to via the symbol at that index
  private readonly transitions: Table<number | null>;

  constructor(alphabet: string) {
    validateAlphabet(alphabet);
    this.alphabet = alphabet;
    this.transitions = new Table(alphabet.length);
  }

  /**
   * Build a DFA from a transition table with one row per state and one
   * column per alphabet symbol.
   *
   * @param rows the target state for each state and symbol, or null
   * @param accepting indices of the accepting states
   */
  static fromTransitions(
    alphabet: string,
    rows: readonly (readonly (number | null)[])[],
    accepting: Iterable<number>
  ): DFA {
    const dfa = new DFA(alphabet);
    for (let i = 0; i < rows.length; i++) {
      dfa.addState();
    }
    rows.forEach((row, from) => {
      if (row.length != alphabet.length) {
        throw new DFAError(
          `state ${from} has ${row.length} transitions, expected ${alphabet.length}`
        );
      }
      row.forEach((to, alphaIndex) => {
        if (to !== null) {
          dfa.addEdge(from, to, alphaIndex);
        }
      });
    });
    for (const state of accepting) {
      dfa.setAccepting(state, true);
    }
    return dfa;
  }

  get numStates() {
    return this.transitions.numRows;
  }

  getAlphabet() {
    return this.alphabet;
  }

  getAlphabetIndex(symbol: string) {
    return this.alphabet.indexOf(symbol);
  }

  /**
   * Adds a new state to the transition table.
   *
   * @param accepting Whether or not this state should be considered "accepting"
   * @returns the index of the newly added state.
   */
  addState(accepting = false): number {
    this.accepting.push(accepting);
    return this.transitions.addRow(() => null);
  }

  setAccepting(state: number, accepting: boolean) {
    this.checkState(state);
    this.accepting[state] = accepting;
  }

  /**
   * Add a labeled edge between states.
   *
   * @param fromState index of the state the edge starts from
   * @param toState index of the state the edge goes to
   * @param alphaIndex index of the alphabet symbol the edge is taken on
   */
  addEdge(fromState: number, toState: number, alphaIndex: number) {
    this.checkState(fromState, 'fromState');
    this.checkState(toState, 'toState');
    this.checkAlphaIndex(alphaIndex);
    const existing = this.transitions.getCell(fromState, alphaIndex);
    if (existing !== null) {
      throw new DFAError(
        `There is already an edge from ${fromState} to ${existing} via ${this.alphabet[alphaIndex]}`
      );
    }
    this.transitions.setCell(fromState, alphaIndex, toState);
  }

  getNextState(state: number, alphaIndex: number): number | null {
    this.checkState(state);
    this.checkAlphaIndex(alphaIndex);
    return this.transitions.getCell(state, alphaIndex);
  }

  hasTransition(state: number, alphaIndex: number) {
    return this.getNextState(state, alphaIndex) !== null;
  }

  isAcceptingState(state: number) {
    this.checkState(state);
    return this.accepting[state];
  }

  isComplete() {
    for (let si = 0; si < this.numStates; si++) {
      if (this.transitions.getRow(si).some((to) => to === null)) {
        return false;
      }
    }
    return true;
  }

  accepts(input: string) {
    if (this.numStates == 0) {
      return false;
    }
    let state: number | null = DFA.START_STATE;
    for (const symbol of input) {
      const alphaIndex = this.getAlphabetIndex(symbol);
      if (alphaIndex == -1) {
        return false;
      }
      state = this.getNextState(state, alphaIndex);
      if (state === null) {
        return false;
      }
    }
    return this.isAcceptingState(state);
  }

  toDebugStr(): string {
    const table = Table.init(
      1 + this.numStates,
      1 + this.alphabet.length,
      () => ''
    );
    table.setCell(0, 0, 'δ');
    for (let ai = 0; ai < this.alphabet.length; ai++) {
      table.setCell(0, ai + 1, this.alphabet[ai]);
    }

    const stateLabel = (s: number) => {
      let out = 's' + s;
      if (this.isAcceptingState(s)) {
        out = '*' + out;
      }
      if (s == DFA.START_STATE) {
        out = '>' + out;
      }
      return out;
    };

    for (let si = 0; si < this.numStates; si++) {
      table.setCell(si + 1, 0, stateLabel(si) + ':');
      for (let ai = 0; ai < this.alphabet.length; ai++) {
        const next = this.transitions.getCell(si, ai);
        table.setCell(si + 1, ai + 1, next === null ? '_' : stateLabel(next));
      }
    }
    return table.toDebugStr();
  }

  private checkState(state: number, name = 'state') {
    if (!Number.isInteger(state) || state < 0 || state >= this.numStates) {
      throw new DFAError(
        `IndexError: ${name} ${state} is not valid. Must be < ${this.numStates}`
      );
    }
  }

  private checkAlphaIndex(alphaIndex: number) {
    if (
      !Number.isInteger(alphaIndex) ||
      alphaIndex < 0 ||
      alphaIndex >= this.alphabet.length
    ) {
      throw new DFAError(
        `IndexError: alphaIndex ${alphaIndex} is not valid. Must be < ${this.alphabet.length}`
      );
    }
  }
}
