import { DFA } from './dfa.js';
import { DFAError } from './errors.js';

export const DIGITS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const MIN_BASE = 2;
export const MAX_BASE = DIGITS.length;

/**
 * Write a non-negative integer with the digits of the given base, upper case.
 */
export function toDigits(n: number, base: number): string {
  return n.toString(base).toUpperCase();
}

/**
 * Build the automaton that accepts the numbers in the given base (most
 * significant digit first, leading zeros allowed) that are divisible by
 * `divisor`.
 *
 * State s means "the digits read so far have remainder s", so reading
 * digit d moves to (s * base + d) mod divisor. The empty input has
 * remainder 0 and is accepted.
 */
export function divisibilityDFA(base: number, divisor: number): DFA {
  if (!Number.isInteger(base) || base < MIN_BASE || base > MAX_BASE) {
    throw new DFAError(
      `Invalid base ${base}. Allowed values are [${MIN_BASE}..${MAX_BASE}]`
    );
  }
  if (!Number.isInteger(divisor) || divisor < 1) {
    throw new DFAError(
      `Invalid divisor ${divisor}. Allowed values are [1..]`
    );
  }

  const dfa = new DFA(DIGITS.slice(0, base));
  for (let remainder = 0; remainder < divisor; remainder++) {
    dfa.addState(remainder == 0);
  }
  for (let remainder = 0; remainder < divisor; remainder++) {
    for (let digit = 0; digit < base; digit++) {
      dfa.addEdge(remainder, (remainder * base + digit) % divisor, digit);
    }
  }
  return dfa;
}
