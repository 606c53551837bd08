import { err, ok, Result } from 'neverthrow';
import type { ConstDFA } from '../automata/dfa.js';
import { AutomatonError } from '../automata/errors.js';
import { log } from '../utils/debug.js';
import { EquationSystem } from './equation-system.js';
import { RegexGenError } from './errors.js';
import { optimizeExpression } from './expression-optimizer.js';

export type ConvertOptions = {
  /**
   * Run the expression optimizer on the solution. Defaults to true.
   */
  optimize?: boolean;
  /**
   * Symbols to write for the columns of the transition table instead of the
   * DFA's own alphabet.
   */
  alphabet?: string;
};

export type Conversion = {
  /**
   * The solution of the equation system, as is
   */
  raw: string;
  /**
   * The expression to use: `raw` optimized, unless optimization was disabled
   */
  expression: string;
};

export type ConversionError = RegexGenError | AutomatonError;

/**
 * Convert a DFA into a regular expression for the language it accepts
 * from state 0. Throws if an internal invariant breaks.
 */
export function convertDFAOrThrow(
  dfa: ConstDFA,
  { optimize = true, alphabet }: ConvertOptions = {}
): Conversion {
  const raw = EquationSystem.fromDFA(dfa, alphabet).solve();
  log(`solution: ${raw}`);
  if (!optimize) {
    return { raw, expression: raw };
  }
  const expression = optimizeExpression(raw);
  log(`optimized: ${expression}`);
  return { raw, expression };
}

/**
 * Convert a DFA into a regular expression for the language it accepts
 * from state 0.
 */
export function convertDFA(
  dfa: ConstDFA,
  options?: ConvertOptions
): Result<Conversion, ConversionError> {
  try {
    return ok(convertDFAOrThrow(dfa, options));
  } catch (e) {
    if (e instanceof RegexGenError || e instanceof AutomatonError) {
      return err(e);
    }
    throw e;
  }
}
