export { DFA, type ConstDFA, validateAlphabet } from '../automata/dfa.js';
export { divisibilityDFA, toDigits } from '../automata/divisibility.js';
export {
  parseDFADescription,
  loadDFADescription,
  type DFADescription,
} from '../automata/dfa-description.js';
export * from '../automata/errors.js';
export * from './errors.js';
export { Term, type UnknownId } from './term.js';
export { Equation } from './equation.js';
export { EquationSystem } from './equation-system.js';
export {
  optimizeExpression,
  extractCommonAffixes,
  reduceQuantifiedTerms,
} from './expression-optimizer.js';
export {
  convertDFA,
  convertDFAOrThrow,
  type Conversion,
  type ConvertOptions,
  type ConversionError,
} from './convert.js';
