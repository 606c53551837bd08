import { DFA } from '../automata/dfa.js';
import { logger } from '../utils/debug.js';
import { Equation } from './equation.js';
import { EquationSystem } from './equation-system.js';
import { EliminationError, EquationSystemStateError } from './errors.js';
import { Term } from './term.js';

// even number of 1s
const parity = () =>
  DFA.fromTransitions(
    '01',
    [
      [0, 1],
      [1, 0],
    ],
    [0]
  );

describe('EquationSystem', () => {
  test('fromDFA() creates one equation per state', () => {
    const system = EquationSystem.fromDFA(parity());
    expect(system.size).toBe(2);
    expect(system.toDebugStr()).toBe('EQ 0: [0] 0\n  [1] 1\n  [-] \nEQ 1: [1] 0\n  [0] 1');
  });

  test('solve() eliminates from the last unknown down', () => {
    const system = EquationSystem.fromDFA(parity());
    const logs: string[] = [];
    const solution = logger.capture(() => system.solve(), logs);
    expect(solution).toBe('(0*10*1)*0*');
    expect(logs).toEqual([
      'eliminated X1:\nEQ 0: [-] 0*\n  [0] 0*10*1\nEQ 1: [0] 0*1',
      'eliminated X0:\nEQ 0: [-] (0*10*1)*0*',
    ]);
  });

  test('solve() for strings that are empty or end in 0', () => {
    const dfa = DFA.fromTransitions(
      '01',
      [
        [0, 1],
        [0, 1],
      ],
      [0]
    );
    expect(EquationSystem.fromDFA(dfa).solve()).toBe('(0*11*0)*0*');
  });

  test('solve() with a single state', () => {
    const dfa = DFA.fromTransitions('ab', [[0, 0]], [0]);
    expect(EquationSystem.fromDFA(dfa).solve()).toBe('[ab]*');
  });

  test('solve() writes the given alphabet', () => {
    expect(EquationSystem.fromDFA(parity(), 'ab').solve()).toBe(
      '(a*ba*b)*a*'
    );
  });

  test('solve() can only be called once', () => {
    const system = EquationSystem.fromDFA(parity());
    system.solve();
    expect(() => system.solve()).toThrow(EquationSystemStateError);
  });

  test('solve() fails when the start state accepts nothing', () => {
    const dfa = DFA.fromTransitions('a', [[0]], []);
    expect(() => EquationSystem.fromDFA(dfa).solve()).toThrow(
      EliminationError
    );
  });

  test('rejects equations out of order', () => {
    expect(
      () =>
        new EquationSystem([
          new Equation(1, [new Term('a', null)]),
          new Equation(0, [new Term('a', null)]),
        ])
    ).toThrow('equation 1 is at index 0');
  });
});
